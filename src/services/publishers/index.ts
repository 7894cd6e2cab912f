import type { Platform, PostContent, PublishResult, ResolvedMedia } from '../../types';

export interface Publisher {
  readonly platform: Platform;
  // Не бросает исключений: ошибки платформы возвращаются в PublishResult
  publish(content: PostContent, media: ResolvedMedia[]): Promise<PublishResult>;
}

export type PublisherRegistry = Partial<Record<Platform, Publisher>>;

const PLATFORM_LABELS: Record<Platform, string> = {
  bluesky: 'Bluesky',
  mastodon: 'Mastodon',
};

export function platformLabel(platform: Platform): string {
  return PLATFORM_LABELS[platform];
}

export function formatPlatforms(platforms: readonly Platform[]): string {
  return platforms.map(platformLabel).join(' and ');
}

export function failure(platform: Platform, error: unknown): PublishResult {
  return {
    platform,
    success: false,
    error: error instanceof Error ? error.message : String(error),
  };
}
