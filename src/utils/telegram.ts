/**
 * Утилиты для сообщений и клавиатур Telegram
 */

import { Markup } from 'telegraf';
import { platformLabel } from '../services/publishers';
import type { Platform } from '../types';

// Кнопки постоянной клавиатуры
export const MAIN_BUTTONS = {
  post: '📝 New post',
  list: '🗓️ Scheduled posts',
  cancel: '❌ Cancel',
} as const;

// callback_data inline-кнопок
export const CALLBACK = {
  platformPrefix: 'platform_',
  both: 'platform_both',
  postNow: 'post_now',
  schedule: 'schedule',
  cancel: 'cancel',
} as const;

/**
 * Разбивает текст на части для отправки (Telegram лимит 4096 символов).
 * Режет по кодовым точкам, чтобы не разорвать эмодзи пополам.
 */
export function splitMessage(text: string, maxLength: number = 4000): string[] {
  const chars = Array.from(text);
  const chunks: string[] = [];
  let offset = 0;

  while (offset < chars.length) {
    chunks.push(chars.slice(offset, offset + maxLength).join(''));
    offset += maxLength;
  }

  return chunks;
}

/**
 * Обрезает текст для списка постов
 */
export function preview(text: string, maxLength: number = 50): string {
  const chars = Array.from(text);
  return chars.length > maxLength ? `${chars.slice(0, maxLength).join('')}...` : text;
}

/**
 * Создает постоянную клавиатуру с кнопками команд
 */
export function getMainKeyboard() {
  return Markup.keyboard([
    [MAIN_BUTTONS.post, MAIN_BUTTONS.list],
    [MAIN_BUTTONS.cancel]
  ])
    .resize()
    .persistent();
}

/**
 * Клавиатура выбора платформ: каждая настроенная платформа и «обе», если их две
 */
export function getPlatformKeyboard(platforms: readonly Platform[]) {
  const rows = [
    platforms.map((platform) => Markup.button.callback(platformLabel(platform), `${CALLBACK.platformPrefix}${platform}`)),
  ];
  if (platforms.length > 1) {
    rows.push([Markup.button.callback('Both', CALLBACK.both)]);
  }
  rows.push([Markup.button.callback('Cancel', CALLBACK.cancel)]);
  return Markup.inlineKeyboard(rows);
}

export function getConfirmKeyboard() {
  return Markup.inlineKeyboard([
    [Markup.button.callback('Post Now', CALLBACK.postNow), Markup.button.callback('Schedule', CALLBACK.schedule)],
    [Markup.button.callback('Cancel', CALLBACK.cancel)],
  ]);
}

/**
 * Разбирает callback_data выбора платформы. null — неизвестная или не настроенная платформа.
 */
export function parsePlatformChoice(data: string, available: readonly Platform[]): Platform[] | null {
  if (data === CALLBACK.both) {
    return available.length > 1 ? [...available] : null;
  }
  if (!data.startsWith(CALLBACK.platformPrefix)) {
    return null;
  }
  const choice = data.slice(CALLBACK.platformPrefix.length);
  const platform = available.find((candidate) => candidate === choice);
  return platform ? [platform] : null;
}
