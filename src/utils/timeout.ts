import { PublishTimeoutError } from './errors';

/**
 * Ждёт промис не дольше timeoutMs, иначе отклоняется с PublishTimeoutError.
 * Сам вызов не отменяется: его результат просто больше никто не ждёт.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, action?: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new PublishTimeoutError(timeoutMs, action)), timeoutMs);
      }),
    ]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
