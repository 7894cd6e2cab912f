/**
 * Ошибка чтения или записи хранилища запланированных постов.
 * При старте фатальна, во время работы сообщается оператору.
 */
export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

/**
 * Публикация (или скачивание медиа для неё) не уложилась в отведённое время
 */
export class PublishTimeoutError extends Error {
  constructor(public readonly timeoutMs: number, action: string = 'Publish') {
    super(`${action} timed out after ${timeoutMs} ms`);
    this.name = 'PublishTimeoutError';
  }
}

// Пост не проходит проверку и не может попасть в очередь
export class InvalidPostError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPostError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
