import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { PersistenceError } from '../utils/errors';
import type { ScheduledPost } from '../types';

/**
 * Граница хранения: стор запланированных постов знает только про read/write,
 * поэтому файл можно заменить на БД, не трогая планировщик и публикацию.
 */
export interface PostStorage {
  // Пустой массив, если хранилища ещё нет
  read(): Promise<ScheduledPost[]>;
  write(posts: readonly ScheduledPost[]): Promise<void>;
}

const STORAGE_VERSION = 1;

const mediaRefSchema = z.object({
  kind: z.literal('photo'),
  fileId: z.string().min(1),
  altText: z.string().optional(),
});

export const scheduledPostSchema = z.object({
  id: z.string().min(1),
  authorId: z.number().int(),
  chatId: z.number().int(),
  content: z.object({
    text: z.string(),
    media: z.array(mediaRefSchema).default([]),
  }),
  targets: z.array(z.enum(['bluesky', 'mastodon'])).min(1),
  scheduledAt: z.string().datetime(),
  createdAt: z.string().datetime(),
  status: z.enum(['pending', 'published', 'failed']),
});

const storageFileSchema = z.object({
  version: z.literal(STORAGE_VERSION),
  posts: z.array(scheduledPostSchema),
});

/**
 * Проверяет содержимое хранилища. Битые данные — фатальная ошибка, а не пустой стор.
 */
export function decodeStoredPosts(raw: unknown): ScheduledPost[] {
  const parsed = storageFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PersistenceError(
      `Malformed scheduled posts data at "${issue.path.join('.')}": ${issue.message}`
    );
  }

  const seen = new Set<string>();
  for (const post of parsed.data.posts) {
    if (seen.has(post.id)) {
      throw new PersistenceError(`Malformed scheduled posts data: duplicate id ${post.id}`);
    }
    seen.add(post.id);
  }

  return parsed.data.posts;
}

export function encodeStoredPosts(posts: readonly ScheduledPost[]): { version: number; posts: ScheduledPost[] } {
  return { version: STORAGE_VERSION, posts: [...posts] };
}

/**
 * Хранит посты в JSON-файле. Запись идёт во временный файл рядом,
 * затем rename поверх основного, чтобы сбой посреди записи не оставил половину файла.
 */
export class JsonFilePostStorage implements PostStorage {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  getFilePath(): string {
    return this.filePath;
  }

  async read(): Promise<ScheduledPost[]> {
    if (!(await fs.pathExists(this.filePath))) {
      return [];
    }

    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      throw new PersistenceError(`Failed to read ${this.filePath}`, { cause: error });
    }

    // Пустой файл считаем пустым хранилищем
    if (raw.trim() === '') {
      return [];
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(`${this.filePath} is not valid JSON`, { cause: error });
    }

    return decodeStoredPosts(json);
  }

  async write(posts: readonly ScheduledPost[]): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;

    try {
      await fs.ensureDir(path.dirname(this.filePath));
      await fs.writeJson(tempPath, encodeStoredPosts(posts), { spaces: 2 });
      await fs.move(tempPath, this.filePath, { overwrite: true });
    } catch (error) {
      await fs.remove(tempPath).catch((cleanupError: unknown) => {
        console.error(`Error cleaning up file ${tempPath}:`, cleanupError);
      });
      throw new PersistenceError(`Failed to write ${this.filePath}`, { cause: error });
    }
  }
}
