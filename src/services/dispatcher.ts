import { withTimeout } from '../utils/timeout';
import { errorMessage } from '../utils/errors';
import { formatUtc } from '../utils/timezone';
import { platformLabel, type PublisherRegistry } from './publishers';
import type { ScheduledPostStore } from './scheduledPosts';
import type {
  MediaRef,
  Platform,
  PostContent,
  PostDraft,
  PublishResult,
  ResolvedMedia,
  ScheduledPost,
} from '../types';

// Скачивает медиафайл по ссылке Telegram
export type MediaResolver = (ref: MediaRef) => Promise<ResolvedMedia>;

// Отправляет сообщение оператору
export type Notifier = (chatId: number, text: string) => Promise<void>;

export interface DispatchReport {
  post: ScheduledPost;
  status: 'published' | 'failed';
  results: PublishResult[];
}

export type SubmitOutcome =
  | { kind: 'published'; results: PublishResult[] }
  | { kind: 'scheduled'; post: ScheduledPost };

export interface DispatcherOptions {
  store: ScheduledPostStore;
  publishers: PublisherRegistry;
  resolveMedia: MediaResolver;
  notify: Notifier;
  publishTimeoutMs: number;
}

/**
 * Текст отчёта о публикации: по строке на платформу
 */
export function formatResults(results: PublishResult[]): string {
  const lines = ['Post results:'];

  for (const result of results) {
    const label = platformLabel(result.platform);
    if (result.success) {
      lines.push(`✅ Posted to ${label} successfully`);
      if (result.url) {
        lines.push(`🔗 ${result.url}`);
      }
    } else {
      lines.push(`❌ Failed to post to ${label}: ${result.error ?? 'unknown error'}`);
    }
  }

  return lines.join('\n');
}

/**
 * Публикует посты сразу или по расписанию.
 *
 * Каждая платформа независима: сбой одной не отменяет успех другой,
 * повторов нет, каждый запуск ограничен таймаутом. Запланированный пост
 * после попытки удаляется из очереди при любом исходе, автор получает отчёт.
 */
export class PostDispatcher {
  constructor(private readonly options: DispatcherOptions) {}

  async submit(draft: PostDraft): Promise<SubmitOutcome> {
    if (draft.scheduledAt === null) {
      const results = await this.publishNow(draft.content, draft.targets);
      return { kind: 'published', results };
    }

    const post = await this.options.store.add({ ...draft, scheduledAt: draft.scheduledAt });
    console.log(`🗓️ [dispatcher] Post ${post.id} scheduled for ${post.scheduledAt}`);
    return { kind: 'scheduled', post };
  }

  async publishNow(content: PostContent, targets: Platform[]): Promise<PublishResult[]> {
    let media: ResolvedMedia[];
    try {
      media = await withTimeout(
        Promise.all(content.media.map((ref) => this.options.resolveMedia(ref))),
        this.options.publishTimeoutMs,
        'Media download'
      );
    } catch (error) {
      // Без медиа публиковать нельзя: пост получился бы другим
      console.error('❌ [dispatcher] Failed to fetch media:', error);
      const reason = `Failed to fetch media: ${errorMessage(error)}`;
      return targets.map((platform) => ({ platform, success: false, error: reason }));
    }

    const results: PublishResult[] = [];
    for (const platform of targets) {
      results.push(await this.publishTo(platform, content, media));
    }
    return results;
  }

  /**
   * Публикует все посты, время которых наступило к now
   */
  async tick(now: Date = new Date()): Promise<DispatchReport[]> {
    const due = await this.options.store.claimDue(now);
    if (due.length === 0) {
      return [];
    }

    console.log(`[dispatcher] ${due.length} post(s) due for publishing.`);

    const reports: DispatchReport[] = [];
    for (const post of due) {
      reports.push(await this.dispatch(post));
    }
    return reports;
  }

  private async dispatch(post: ScheduledPost): Promise<DispatchReport> {
    const results = await this.publishNow(post.content, post.targets);
    const status = results.some((result) => result.success) ? 'published' : 'failed';

    try {
      await this.options.store.complete(post.id, status);
    } catch (error) {
      console.error(`❌ [dispatcher] Failed to remove post ${post.id} from the queue:`, errorMessage(error));
    }

    const summary = formatResults(results);
    console.log(`[dispatcher] Scheduled post ${post.id} executed (${status})`);

    const heading =
      status === 'published'
        ? `Your scheduled post (ID: ${post.id}) has been published:`
        : `Your scheduled post (ID: ${post.id}) could not be published and was removed from the schedule:`;

    try {
      await this.options.notify(
        post.chatId,
        `${heading}\nScheduled for ${formatUtc(new Date(post.scheduledAt))} UTC\n\n${summary}`
      );
    } catch (error) {
      console.error(`❌ [dispatcher] Failed to notify user ${post.authorId} about post ${post.id}:`, error);
    }

    return { post, status, results };
  }

  private async publishTo(platform: Platform, content: PostContent, media: ResolvedMedia[]): Promise<PublishResult> {
    const publisher = this.options.publishers[platform];
    if (!publisher) {
      return { platform, success: false, error: `${platformLabel(platform)} is not configured` };
    }

    try {
      return await withTimeout(publisher.publish(content, media), this.options.publishTimeoutMs);
    } catch (error) {
      console.error(`❌ [dispatcher] Publishing to ${platform} failed:`, errorMessage(error));
      return { platform, success: false, error: errorMessage(error) };
    }
  }
}
