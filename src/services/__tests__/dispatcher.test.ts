import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { PostDispatcher, formatResults, type Notifier } from '../dispatcher';
import { ScheduledPostStore } from '../scheduledPosts';
import type { PublisherRegistry } from '../publishers';
import type { MediaRef, PostDraft, PublishResult, ResolvedMedia } from '../../types';
import {
  MemoryPostStorage,
  T0,
  createFakePublisher,
  minutesFrom,
  sequentialIds,
  type FakePublisher,
} from '../../__tests__/test-utils';

const AUTHOR_A = 1;
const AUTHOR_B = 2;

function draft(overrides: Partial<PostDraft> = {}): PostDraft {
  return {
    authorId: AUTHOR_A,
    chatId: AUTHOR_A,
    content: { text: 'P1 text', media: [] },
    targets: ['bluesky'],
    scheduledAt: null,
    ...overrides,
  };
}

describe('PostDispatcher', () => {
  let store: ScheduledPostStore;
  let bluesky: FakePublisher;
  let mastodon: FakePublisher;
  let notify: Mock<Parameters<Notifier>, ReturnType<Notifier>>;
  let resolveMedia: Mock<[MediaRef], Promise<ResolvedMedia>>;
  let dispatcher: PostDispatcher;

  function createDispatcher(publishers: PublisherRegistry, publishTimeoutMs = 1000): PostDispatcher {
    return new PostDispatcher({ store, publishers, resolveMedia, notify, publishTimeoutMs });
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    store = new ScheduledPostStore(new MemoryPostStorage(), sequentialIds('P'), () => T0);
    await store.load();
    bluesky = createFakePublisher('bluesky');
    mastodon = createFakePublisher('mastodon');
    notify = vi.fn<Parameters<Notifier>, ReturnType<Notifier>>(async () => undefined);
    resolveMedia = vi.fn<[MediaRef], Promise<ResolvedMedia>>(async (ref) => ({
      data: Buffer.from(ref.fileId),
      mimeType: 'image/jpeg',
      altText: '',
    }));
    dispatcher = createDispatcher({ bluesky, mastodon });
  });

  it('publishes a scheduled post once it is due and removes it', async () => {
    const outcome = await dispatcher.submit(draft({ scheduledAt: minutesFrom(T0, 5).toISOString() }));
    expect(outcome.kind).toBe('scheduled');

    expect(await dispatcher.tick(T0)).toEqual([]);
    expect(bluesky.calls).toHaveLength(0);
    expect(store.list(AUTHOR_A).map((post) => post.id)).toEqual(['P-1']);

    const reports = await dispatcher.tick(minutesFrom(T0, 6));

    expect(reports.map((report) => report.status)).toEqual(['published']);
    expect(bluesky.calls).toEqual([{ content: { text: 'P1 text', media: [] }, media: [] }]);
    expect(mastodon.calls).toHaveLength(0);
    expect(store.list(AUTHOR_A)).toEqual([]);
  });

  it('publishes a post without a time immediately and never stores it', async () => {
    const outcome = await dispatcher.submit(draft({ content: { text: 'P2 text', media: [] } }));

    expect(outcome).toEqual({
      kind: 'published',
      results: [{ platform: 'bluesky', success: true, postId: 'bluesky-1', url: 'https://example.com/bluesky/1' }],
    });
    expect(store.list(AUTHOR_A)).toEqual([]);
    expect(store.size()).toBe(0);
  });

  it('keeps a post when another author tries to delete it', async () => {
    await dispatcher.submit(draft({ scheduledAt: minutesFrom(T0, 5).toISOString() }));

    expect(await store.remove('P-1', AUTHOR_B)).toBe(false);
    expect(store.list(AUTHOR_A).map((post) => post.id)).toEqual(['P-1']);
  });

  it('publishes once per platform when two ticks race', async () => {
    await dispatcher.submit(draft({ targets: ['bluesky', 'mastodon'], scheduledAt: T0.toISOString() }));

    const [first, second] = await Promise.all([dispatcher.tick(T0), dispatcher.tick(T0)]);

    expect(first.length + second.length).toBe(1);
    expect(bluesky.calls).toHaveLength(1);
    expect(mastodon.calls).toHaveLength(1);
  });

  it('never publishes a post before its time', async () => {
    await dispatcher.submit(draft({ scheduledAt: minutesFrom(T0, 1).toISOString() }));

    expect(await dispatcher.tick(minutesFrom(T0, 0.5))).toEqual([]);
    expect(bluesky.calls).toHaveLength(0);
  });

  it('continues with other platforms when one fails and notifies the author', async () => {
    const failing = createFakePublisher('bluesky', async () => ({
      platform: 'bluesky',
      success: false,
      error: 'rate limited',
    }));
    dispatcher = createDispatcher({ bluesky: failing, mastodon });
    await dispatcher.submit(draft({ targets: ['bluesky', 'mastodon'], scheduledAt: T0.toISOString() }));

    const [report] = await dispatcher.tick(T0);

    expect(report.status).toBe('published');
    expect(mastodon.calls).toHaveLength(1);
    expect(store.size()).toBe(0);
    expect(notify).toHaveBeenCalledWith(
      AUTHOR_A,
      'Your scheduled post (ID: P-1) has been published:\n' +
        'Scheduled for 2025-03-05 12:00 UTC\n\n' +
        'Post results:\n' +
        '❌ Failed to post to Bluesky: rate limited\n' +
        '✅ Posted to Mastodon successfully\n' +
        '🔗 https://example.com/mastodon/1'
    );
  });

  it('drops a post that failed everywhere and tells the author', async () => {
    const failing = createFakePublisher('bluesky', async () => {
      throw new Error('socket hang up');
    });
    dispatcher = createDispatcher({ bluesky: failing });
    await dispatcher.submit(draft({ scheduledAt: T0.toISOString() }));

    const [report] = await dispatcher.tick(T0);

    expect(report.status).toBe('failed');
    expect(report.results).toEqual([{ platform: 'bluesky', success: false, error: 'socket hang up' }]);
    expect(store.size()).toBe(0);
    expect(notify.mock.calls[0][1]).toContain('could not be published and was removed from the schedule');
  });

  it('treats a slow platform as failed after the timeout', async () => {
    const slow = createFakePublisher('bluesky', () => new Promise<PublishResult>(() => undefined));
    dispatcher = createDispatcher({ bluesky: slow, mastodon }, 20);

    const results = await dispatcher.publishNow({ text: 'hi', media: [] }, ['bluesky', 'mastodon']);

    expect(results).toEqual([
      { platform: 'bluesky', success: false, error: 'Publish timed out after 20 ms' },
      { platform: 'mastodon', success: true, postId: 'mastodon-1', url: 'https://example.com/mastodon/1' },
    ]);
  });

  it('reports a platform that is not configured', async () => {
    dispatcher = createDispatcher({ bluesky });

    const results = await dispatcher.publishNow({ text: 'hi', media: [] }, ['mastodon']);

    expect(results).toEqual([{ platform: 'mastodon', success: false, error: 'Mastodon is not configured' }]);
  });

  it('resolves media before publishing', async () => {
    await dispatcher.publishNow({ text: 'pic', media: [{ kind: 'photo', fileId: 'abc' }] }, ['bluesky']);

    expect(resolveMedia).toHaveBeenCalledWith({ kind: 'photo', fileId: 'abc' });
    expect(bluesky.calls[0].media).toEqual([{ data: Buffer.from('abc'), mimeType: 'image/jpeg', altText: '' }]);
  });

  it('fails every target when media cannot be fetched', async () => {
    resolveMedia.mockRejectedValueOnce(new Error('file expired'));

    const results = await dispatcher.publishNow(
      { text: 'pic', media: [{ kind: 'photo', fileId: 'abc' }] },
      ['bluesky', 'mastodon']
    );

    expect(results).toEqual([
      { platform: 'bluesky', success: false, error: 'Failed to fetch media: file expired' },
      { platform: 'mastodon', success: false, error: 'Failed to fetch media: file expired' },
    ]);
    expect(bluesky.calls).toHaveLength(0);
  });

  it('gives up on a media download that never finishes', async () => {
    resolveMedia.mockImplementation(() => new Promise<ResolvedMedia>(() => undefined));
    dispatcher = createDispatcher({ bluesky, mastodon }, 20);
    const post = await store.add({
      authorId: AUTHOR_A,
      chatId: AUTHOR_A,
      content: { text: 'pic', media: [{ kind: 'photo', fileId: 'abc' }] },
      targets: ['bluesky', 'mastodon'],
      scheduledAt: T0.toISOString(),
    });

    const [report] = await dispatcher.tick(T0);

    expect(report.status).toBe('failed');
    expect(report.results).toEqual([
      { platform: 'bluesky', success: false, error: 'Failed to fetch media: Media download timed out after 20 ms' },
      { platform: 'mastodon', success: false, error: 'Failed to fetch media: Media download timed out after 20 ms' },
    ]);
    expect(bluesky.calls).toHaveLength(0);
    expect(store.get(post.id)).toBeUndefined();
    expect(await store.remove(post.id, AUTHOR_A)).toBe(false);
  });

  it('still removes the post when the notification fails', async () => {
    notify.mockRejectedValueOnce(new Error('chat not found'));
    await dispatcher.submit(draft({ scheduledAt: T0.toISOString() }));

    const reports = await dispatcher.tick(T0);

    expect(reports).toHaveLength(1);
    expect(store.size()).toBe(0);
  });
});

describe('formatResults', () => {
  it('lists each platform outcome', () => {
    expect(
      formatResults([
        { platform: 'bluesky', success: true },
        { platform: 'mastodon', success: false },
      ])
    ).toBe('Post results:\n✅ Posted to Bluesky successfully\n❌ Failed to post to Mastodon: unknown error');
  });
});
