import { z } from 'zod';
import { ConfigError } from './utils/errors';
import type { Platform } from './types';

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

// Список ID через запятую: "123, 456"
const userIdList = z
  .string({ required_error: 'AUTHORIZED_USERS is required' })
  .transform((raw, ctx) => {
    const ids: number[] = [];
    for (const part of raw.split(',')) {
      const trimmed = part.trim();
      if (!trimmed) continue;
      const id = Number(trimmed);
      if (!Number.isSafeInteger(id) || id <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${trimmed}" is not a Telegram user id` });
        return z.NEVER;
      }
      ids.push(id);
    }
    if (ids.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'AUTHORIZED_USERS must list at least one user id' });
      return z.NEVER;
    }
    return ids;
  });

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string({ required_error: 'TELEGRAM_BOT_TOKEN is required' }).trim().min(1),
  AUTHORIZED_USERS: userIdList,
  BLUESKY_IDENTIFIER: optionalString,
  BLUESKY_PASSWORD: optionalString,
  BLUESKY_SERVICE: z.string().url().default('https://bsky.social'),
  MASTODON_ACCESS_TOKEN: optionalString,
  MASTODON_API_BASE_URL: z.string().url().default('https://fosstodon.org'),
  SCHEDULED_POSTS_FILE: z.string().trim().min(1).default('./data/scheduled_posts.json'),
  PUBLISH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SCHEDULER_CRON: z.string().trim().min(1).default('* * * * *'),
});

export interface BlueskyConfig {
  service: string;
  identifier: string;
  password: string;
}

export interface MastodonConfig {
  baseUrl: string;
  accessToken: string;
}

export interface AppConfig {
  telegramToken: string;
  authorizedUsers: number[];
  bluesky?: BlueskyConfig;
  mastodon?: MastodonConfig;
  storageFile: string;
  publishTimeoutMs: number;
  schedulerCron: string;
}

/**
 * Собирает конфигурацию из переменных окружения.
 * Платформа включается, только если для неё заданы учётные данные.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;

  if (Boolean(vars.BLUESKY_IDENTIFIER) !== Boolean(vars.BLUESKY_PASSWORD)) {
    throw new ConfigError('BLUESKY_IDENTIFIER and BLUESKY_PASSWORD must be set together');
  }

  const bluesky =
    vars.BLUESKY_IDENTIFIER && vars.BLUESKY_PASSWORD
      ? { service: vars.BLUESKY_SERVICE, identifier: vars.BLUESKY_IDENTIFIER, password: vars.BLUESKY_PASSWORD }
      : undefined;

  const mastodon = vars.MASTODON_ACCESS_TOKEN
    ? { baseUrl: vars.MASTODON_API_BASE_URL.replace(/\/+$/, ''), accessToken: vars.MASTODON_ACCESS_TOKEN }
    : undefined;

  if (!bluesky && !mastodon) {
    throw new ConfigError('Configure at least one platform: Bluesky or Mastodon credentials');
  }

  return {
    telegramToken: vars.TELEGRAM_BOT_TOKEN,
    authorizedUsers: vars.AUTHORIZED_USERS,
    bluesky,
    mastodon,
    storageFile: vars.SCHEDULED_POSTS_FILE,
    publishTimeoutMs: vars.PUBLISH_TIMEOUT_MS,
    schedulerCron: vars.SCHEDULER_CRON,
  };
}

export function enabledPlatforms(config: AppConfig): Platform[] {
  const platforms: Platform[] = [];
  if (config.bluesky) platforms.push('bluesky');
  if (config.mastodon) platforms.push('mastodon');
  return platforms;
}
