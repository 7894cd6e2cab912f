// Утилиты для работы со временем публикации (всё хранится и вводится в UTC)

const SCHEDULE_INPUT_PATTERN = /^(\d{4})-(\d{2})-(\d{2})\s+(\d{2}):(\d{2})$/;

export const SCHEDULE_INPUT_FORMAT = 'YYYY-MM-DD HH:MM';

/**
 * Разбирает строку вида "2025-03-05 15:30" как время в UTC.
 * Возвращает null, если формат неверный или такой даты не существует (например, 2025-02-30).
 */
export function parseScheduleInput(input: string): Date | null {
  const match = SCHEDULE_INPUT_PATTERN.exec(input.trim());
  if (!match) {
    return null;
  }

  const [year, month, day, hour, minute] = match.slice(1).map(Number);
  if (hour > 23 || minute > 59) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute));

  // Date.UTC молча переносит переполнение на следующий месяц, проверяем компоненты
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return date;
}

/**
 * Форматирует дату как "YYYY-MM-DD HH:MM" в UTC
 */
export function formatUtc(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');

  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`
  );
}
