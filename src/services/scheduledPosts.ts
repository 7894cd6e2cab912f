import { v4 as uuidv4 } from 'uuid';
import { InvalidPostError, PersistenceError, errorMessage } from '../utils/errors';
import { scheduledPostSchema, type PostStorage } from './postStorage';
import type { PostDraft, PostStatus, ScheduledPost } from '../types';

export type NewScheduledPost = Omit<PostDraft, 'scheduledAt'> & { scheduledAt: string };

function byScheduledAt(a: ScheduledPost, b: ScheduledPost): number {
  const diff = Date.parse(a.scheduledAt) - Date.parse(b.scheduledAt);
  return diff !== 0 ? diff : Date.parse(a.createdAt) - Date.parse(b.createdAt);
}

function copyPost(post: ScheduledPost): ScheduledPost {
  return {
    ...post,
    content: { text: post.content.text, media: post.content.media.map((ref) => ({ ...ref })) },
    targets: [...post.targets],
  };
}

/**
 * Очередь запланированных постов.
 *
 * Хранилище — единственная копия очереди: при старте читается целиком,
 * после каждой мутации записывается целиком до возврата из метода.
 * Все мутации выполняются по одной (цепочка промисов), так что команды из чата
 * и диспетчер не пересекаются между чтением, изменением и записью.
 */
export class ScheduledPostStore {
  private posts: ScheduledPost[] = [];
  // Посты, которые сейчас публикуются диспетчером
  private readonly inFlight = new Set<string>();
  private queue: Promise<unknown> = Promise.resolve();
  private loaded = false;

  constructor(
    private readonly storage: PostStorage,
    private readonly generateId: () => string = () => uuidv4(),
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Загружает очередь из хранилища. Битый файл — PersistenceError, стартовать нельзя.
   */
  async load(): Promise<number> {
    return this.exclusive(async () => {
      this.posts = await this.storage.read();
      this.inFlight.clear();
      this.loaded = true;
      return this.posts.length;
    });
  }

  async add(draft: NewScheduledPost): Promise<ScheduledPost> {
    return this.exclusive(async () => {
      this.ensureLoaded();

      let id = this.generateId();
      while (this.posts.some((post) => post.id === id)) {
        id = this.generateId();
      }

      const scheduledAt = new Date(draft.scheduledAt);
      if (Number.isNaN(scheduledAt.getTime())) {
        throw new InvalidPostError(`Invalid scheduled time: "${draft.scheduledAt}"`);
      }

      const post: ScheduledPost = {
        id,
        authorId: draft.authorId,
        chatId: draft.chatId,
        content: { text: draft.content.text, media: draft.content.media.map((ref) => ({ ...ref })) },
        targets: [...new Set(draft.targets)],
        scheduledAt: scheduledAt.toISOString(),
        createdAt: this.clock().toISOString(),
        status: 'pending',
      };

      // Та же схема, что при загрузке: в файл не попадёт то, что не прочитается при старте
      const checked = scheduledPostSchema.safeParse(post);
      if (!checked.success) {
        const issue = checked.error.issues[0];
        throw new InvalidPostError(`Invalid scheduled post at "${issue.path.join('.')}": ${issue.message}`);
      }

      await this.commit([...this.posts, post]);
      return copyPost(post);
    });
  }

  /**
   * Ожидающие посты автора, по возрастанию времени публикации.
   * Публикуемые сейчас посты не показываются: удалить их уже нельзя.
   */
  list(authorId: number): ScheduledPost[] {
    return this.posts
      .filter((post) => post.authorId === authorId && post.status === 'pending' && !this.inFlight.has(post.id))
      .sort(byScheduledAt)
      .map(copyPost);
  }

  get(id: string): ScheduledPost | undefined {
    const post = this.find(id);
    return post ? copyPost(post) : undefined;
  }

  size(): number {
    return this.posts.length;
  }

  /**
   * Удаляет пост автора. Чужой, несуществующий или уже публикуемый пост — просто false.
   */
  async remove(id: string, authorId: number): Promise<boolean> {
    return this.exclusive(async () => {
      this.ensureLoaded();

      const post = this.find(id);
      if (!post || post.authorId !== authorId || post.status !== 'pending' || this.inFlight.has(id)) {
        return false;
      }

      await this.commit(this.posts.filter((candidate) => candidate.id !== id));
      return true;
    });
  }

  /**
   * Забирает посты, время которых наступило. Повторный вызов не вернёт уже забранные.
   */
  async claimDue(now: Date): Promise<ScheduledPost[]> {
    return this.exclusive(async () => {
      const due = this.posts
        .filter(
          (post) =>
            post.status === 'pending' &&
            !this.inFlight.has(post.id) &&
            Date.parse(post.scheduledAt) <= now.getTime()
        )
        .sort(byScheduledAt);

      for (const post of due) {
        this.inFlight.add(post.id);
      }
      return due.map(copyPost);
    });
  }

  /**
   * Завершает публикацию: пост удаляется из очереди при любом исходе.
   * Если запись не удалась, пост всё равно остаётся удалённым из памяти,
   * чтобы процесс не опубликовал его второй раз.
   */
  async complete(id: string, status: Exclude<PostStatus, 'pending'>): Promise<void> {
    return this.exclusive(async () => {
      const post = this.find(id);
      this.inFlight.delete(id);
      if (!post) {
        return;
      }

      console.log(`[store] Post ${id} finished as ${status}, removing it from the queue`);
      const remaining = this.posts.filter((candidate) => candidate.id !== id);

      try {
        await this.storage.write(remaining);
      } catch (error) {
        console.error(`❌ [store] Post ${id} was dispatched but the queue was not saved: ${errorMessage(error)}`);
        throw error instanceof PersistenceError
          ? error
          : new PersistenceError(`Failed to save queue after dispatching ${id}`, { cause: error });
      } finally {
        this.posts = remaining;
      }
    });
  }

  /**
   * Записывает новое состояние; память меняется только после успешной записи.
   */
  private async commit(next: ScheduledPost[]): Promise<void> {
    try {
      await this.storage.write(next);
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw error;
      }
      throw new PersistenceError('Failed to save scheduled posts', { cause: error });
    }
    this.posts = next;
  }

  private find(id: string): ScheduledPost | undefined {
    return this.posts.find((post) => post.id === id);
  }

  private ensureLoaded(): void {
    if (!this.loaded) {
      throw new PersistenceError('Scheduled post store is not loaded');
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // Ошибка одной операции не должна ломать очередь для следующих
    this.queue = run.catch(() => undefined);
    return run;
  }
}
