import { Context } from 'telegraf';
import { requireOperator } from './guard';
import { AccessList } from '../services/access';
import { ScheduledPostStore } from '../services/scheduledPosts';
import { PostSessions } from '../services/sessions';
import { formatPlatforms } from '../services/publishers';
import { errorMessage } from '../utils/errors';
import { formatUtc } from '../utils/timezone';
import { getMainKeyboard, preview, splitMessage } from '../utils/telegram';
import type { ScheduledPost } from '../types';

export interface CommandDeps {
  access: AccessList;
  store: ScheduledPostStore;
  sessions: PostSessions;
}

export const HELP_TEXT = [
  'Welcome to the Social Media Cross-Poster Bot!',
  '',
  'Use /help to see the available commands.',
  'Use /post to create a new post (now or scheduled).',
  'Use /list_scheduled to view your scheduled posts.',
  'Use /delete_scheduled <id> to remove a scheduled post.',
  'Use /cancel to cancel current operation.',
].join('\n');

/**
 * Строки списка запланированных постов
 */
export function formatScheduledList(posts: ScheduledPost[]): string {
  if (posts.length === 0) {
    return "You don't have any scheduled posts.";
  }

  const blocks = posts.map((post) => {
    const lines = [
      `ID: ${post.id}`,
      `Time: ${formatUtc(new Date(post.scheduledAt))} UTC`,
      `Platforms: ${formatPlatforms(post.targets)}`,
      `Text: ${preview(post.content.text)}`,
    ];
    if (post.content.media.length > 0) {
      lines.push(`Media: ${post.content.media.length} photo(s)`);
    }
    return lines.join('\n');
  });

  return `Your scheduled posts:\n\n${blocks.join('\n\n')}`;
}

/**
 * Аргумент команды: "/delete_scheduled abc" → "abc"
 */
export function commandArgument(text: string): string | undefined {
  const [, argument] = text.trim().split(/\s+/, 2);
  return argument || undefined;
}

export function createCommandHandlers({ access, store, sessions }: CommandDeps) {
  const handleStart = async (ctx: Context): Promise<void> => {
    if ((await requireOperator(ctx, access)) === null) return;
    await ctx.reply(HELP_TEXT, getMainKeyboard());
  };

  const handleCancel = async (ctx: Context): Promise<void> => {
    if ((await requireOperator(ctx, access)) === null) return;
    const chatId = ctx.chat?.id;
    if (chatId !== undefined) {
      sessions.clear(chatId);
    }
    await ctx.reply('Operation cancelled.', getMainKeyboard());
  };

  const handleListScheduled = async (ctx: Context): Promise<void> => {
    const userId = await requireOperator(ctx, access);
    if (userId === null) return;

    for (const chunk of splitMessage(formatScheduledList(store.list(userId)))) {
      await ctx.reply(chunk);
    }
  };

  const handleDeleteScheduled = async (ctx: Context): Promise<void> => {
    const userId = await requireOperator(ctx, access);
    if (userId === null) return;

    const text = ctx.message && 'text' in ctx.message ? ctx.message.text : '';
    const postId = commandArgument(text);

    if (!postId) {
      await ctx.reply('Please provide the post ID to delete. Use /list_scheduled to see your scheduled posts.');
      return;
    }

    try {
      const removed = await store.remove(postId, userId);
      if (removed) {
        console.log(`🗑️ [commands] User ${userId} deleted scheduled post ${postId}`);
        await ctx.reply('Scheduled post deleted successfully.');
      } else {
        await ctx.reply('Post ID not found or not yours. Use /list_scheduled to see your scheduled posts.');
      }
    } catch (error) {
      console.error(`❌ [commands] Failed to delete post ${postId}:`, error);
      await ctx.reply(`❌ Could not delete the post: ${errorMessage(error)}`);
    }
  };

  return {
    handleStart,
    handleHelp: handleStart,
    handleCancel,
    handleListScheduled,
    handleDeleteScheduled,
  };
}
