import type { Platform, PostContent } from '../types';

// Шаги диалога /post
export type PostStep = 'awaiting_content' | 'choosing_platforms' | 'confirming' | 'awaiting_time';

// Состояние диалога /post в одном чате
export interface PostSession {
  chatId: number;
  userId: number;
  step: PostStep;
  content?: PostContent;
  targets?: Platform[];
  lastUpdate: number;
}

// Сессия без активности дольше этого времени считается брошенной
export const SESSION_LIFETIME = 30 * 60 * 1000;

/**
 * Хранилище диалогов /post по chatId. Живёт только в памяти:
 * после перезапуска оператор начинает /post заново.
 */
export class PostSessions {
  private readonly sessions = new Map<number, PostSession>();

  constructor(
    private readonly lifetimeMs: number = SESSION_LIFETIME,
    private readonly now: () => number = Date.now
  ) {}

  start(chatId: number, userId: number): PostSession {
    const session: PostSession = { chatId, userId, step: 'awaiting_content', lastUpdate: this.now() };
    this.sessions.set(chatId, session);
    return session;
  }

  /**
   * Активная сессия чата; устаревшая удаляется и не возвращается
   */
  get(chatId: number): PostSession | undefined {
    const session = this.sessions.get(chatId);
    if (!session) {
      return undefined;
    }
    if (this.now() - session.lastUpdate > this.lifetimeMs) {
      this.sessions.delete(chatId);
      return undefined;
    }
    return session;
  }

  update(session: PostSession, patch: Partial<Omit<PostSession, 'chatId' | 'userId' | 'lastUpdate'>>): PostSession {
    Object.assign(session, patch, { lastUpdate: this.now() });
    this.sessions.set(session.chatId, session);
    return session;
  }

  // true, если была активная сессия
  clear(chatId: number): boolean {
    const active = this.get(chatId) !== undefined;
    this.sessions.delete(chatId);
    return active;
  }
}
