import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { JsonFilePostStorage, decodeStoredPosts } from '../postStorage';
import { PersistenceError } from '../../utils/errors';
import type { ScheduledPost } from '../../types';

const post: ScheduledPost = {
  id: 'a1',
  authorId: 42,
  chatId: 42,
  content: { text: 'Hello #world', media: [{ kind: 'photo', fileId: 'file-1' }] },
  targets: ['bluesky', 'mastodon'],
  scheduledAt: '2025-03-05T15:30:00.000Z',
  createdAt: '2025-03-05T12:00:00.000Z',
  status: 'pending',
};

describe('JsonFilePostStorage', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'crosspost-'));
    filePath = path.join(dir, 'nested', 'scheduled_posts.json');
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('treats a missing file as an empty store', async () => {
    expect(await new JsonFilePostStorage(filePath).read()).toEqual([]);
  });

  it('treats an empty file as an empty store', async () => {
    await fs.outputFile(filePath, '  \n');
    expect(await new JsonFilePostStorage(filePath).read()).toEqual([]);
  });

  it('writes the versioned document and reads it back', async () => {
    const storage = new JsonFilePostStorage(filePath);
    await storage.write([post]);

    expect(await fs.readJson(filePath)).toEqual({ version: 1, posts: [post] });
    expect(await storage.read()).toEqual([post]);
    expect(await fs.pathExists(`${filePath}.tmp`)).toBe(false);
  });

  it('rejects a file that is not JSON', async () => {
    await fs.outputFile(filePath, '{ not json');
    await expect(new JsonFilePostStorage(filePath).read()).rejects.toBeInstanceOf(PersistenceError);
  });

  it('rejects records with missing fields', async () => {
    await fs.outputJson(filePath, { version: 1, posts: [{ id: 'a1' }] });
    await expect(new JsonFilePostStorage(filePath).read()).rejects.toThrow(/Malformed scheduled posts data/);
  });
});

describe('decodeStoredPosts', () => {
  it('rejects duplicate ids', () => {
    expect(() => decodeStoredPosts({ version: 1, posts: [post, post] })).toThrow(
      'Malformed scheduled posts data: duplicate id a1'
    );
  });

  it('rejects an unknown version', () => {
    expect(() => decodeStoredPosts({ version: 2, posts: [] })).toThrow(PersistenceError);
  });

  it('fills in missing media', () => {
    const { media: _media, ...content } = post.content;
    expect(decodeStoredPosts({ version: 1, posts: [{ ...post, content }] })[0].content.media).toEqual([]);
  });
});
