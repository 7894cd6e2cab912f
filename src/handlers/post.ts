import { Context } from 'telegraf';
import { requireOperator } from './guard';
import { AccessList } from '../services/access';
import { PostDispatcher, formatResults } from '../services/dispatcher';
import { PostSessions, type PostSession } from '../services/sessions';
import { formatPlatforms } from '../services/publishers';
import { errorMessage } from '../utils/errors';
import { SCHEDULE_INPUT_FORMAT, formatUtc, parseScheduleInput } from '../utils/timezone';
import {
  CALLBACK,
  getConfirmKeyboard,
  getMainKeyboard,
  getPlatformKeyboard,
  parsePlatformChoice,
  preview,
} from '../utils/telegram';
import type { Platform, PostContent } from '../types';

export interface PostFlowDeps {
  access: AccessList;
  dispatcher: PostDispatcher;
  sessions: PostSessions;
  platforms: Platform[];
  now?: () => Date;
}

/**
 * Достаёт содержимое поста из сообщения: текст или фото с подписью
 */
export function extractContent(ctx: Context): PostContent | null {
  const message = ctx.message;
  if (!message) {
    return null;
  }

  if ('text' in message) {
    return { text: message.text, media: [] };
  }

  if ('photo' in message && message.photo.length > 0) {
    // Последний размер в массиве — самый крупный
    const largest = message.photo[message.photo.length - 1];
    return {
      text: message.caption ?? '',
      media: [{ kind: 'photo', fileId: largest.file_id }],
    };
  }

  return null;
}

function callbackData(ctx: Context): string | undefined {
  const query = ctx.callbackQuery;
  return query && 'data' in query ? query.data : undefined;
}

/**
 * Диалог /post: текст → платформы → сейчас или по расписанию → время
 */
export function createPostHandlers({ access, dispatcher, sessions, platforms, now = () => new Date() }: PostFlowDeps) {
  const handlePostCommand = async (ctx: Context): Promise<void> => {
    const userId = await requireOperator(ctx, access);
    const chatId = ctx.chat?.id;
    if (userId === null || chatId === undefined) return;

    sessions.start(chatId, userId);
    await ctx.reply(
      'Please send the text you want to post to your social media accounts.\n' +
      'You can also send a photo with a caption.'
    );
  };

  const receiveContent = async (ctx: Context, session: PostSession): Promise<void> => {
    const content = extractContent(ctx);
    if (!content || (content.text.trim() === '' && content.media.length === 0)) {
      await ctx.reply('Please send some text or a photo with a caption.');
      return;
    }

    sessions.update(session, { step: 'choosing_platforms', content });
    await ctx.reply('Where would you like to post this?', getPlatformKeyboard(platforms));
  };

  const receiveScheduleTime = async (ctx: Context, session: PostSession): Promise<void> => {
    const text = ctx.message && 'text' in ctx.message ? ctx.message.text : '';
    const scheduledAt = parseScheduleInput(text);

    if (!scheduledAt) {
      await ctx.reply(`Invalid date format. Please use ${SCHEDULE_INPUT_FORMAT} (UTC).`);
      return;
    }
    if (scheduledAt.getTime() <= now().getTime()) {
      await ctx.reply(`That time is in the past. Please enter a future time as ${SCHEDULE_INPUT_FORMAT} (UTC).`);
      return;
    }
    if (!session.content || !session.targets) {
      sessions.clear(session.chatId);
      await ctx.reply('This post was lost, please start again with /post.');
      return;
    }

    try {
      const outcome = await dispatcher.submit({
        authorId: session.userId,
        chatId: session.chatId,
        content: session.content,
        targets: session.targets,
        scheduledAt: scheduledAt.toISOString(),
      });
      sessions.clear(session.chatId);

      if (outcome.kind === 'scheduled') {
        await ctx.reply(
          `Your post has been scheduled for ${formatUtc(scheduledAt)} UTC.\nID: ${outcome.post.id}`,
          getMainKeyboard()
        );
      } else {
        await ctx.reply(formatResults(outcome.results), getMainKeyboard());
      }
    } catch (error) {
      console.error('❌ [post] Failed to schedule post:', error);
      await ctx.reply(
        `❌ Could not save the scheduled post: ${errorMessage(error)}\n` +
        'Send the time again to retry, or /cancel.'
      );
    }
  };

  /**
   * Обрабатывает текст или фото, если в чате идёт диалог /post.
   * Возвращает false, если сообщение не относится к диалогу.
   */
  const handlePostMessage = async (ctx: Context): Promise<boolean> => {
    const chatId = ctx.chat?.id;
    if (chatId === undefined) return false;

    const session = sessions.get(chatId);
    if (!session) return false;

    if ((await requireOperator(ctx, access)) === null) return true;

    switch (session.step) {
      case 'awaiting_content':
        await receiveContent(ctx, session);
        return true;
      case 'awaiting_time':
        await receiveScheduleTime(ctx, session);
        return true;
      default:
        await ctx.reply('Please use the buttons above, or /cancel.');
        return true;
    }
  };

  const handlePlatformChoice = async (ctx: Context): Promise<void> => {
    if ((await requireOperator(ctx, access)) === null) return;
    await ctx.answerCbQuery();

    const chatId = ctx.chat?.id;
    const session = chatId === undefined ? undefined : sessions.get(chatId);
    if (!session || session.step !== 'choosing_platforms' || !session.content) {
      await ctx.editMessageText('This post is no longer active. Start again with /post.');
      return;
    }

    const targets = parsePlatformChoice(callbackData(ctx) ?? '', platforms);
    if (!targets) {
      await ctx.editMessageText('That platform is not available. Start again with /post.');
      sessions.clear(session.chatId);
      return;
    }

    sessions.update(session, { step: 'confirming', targets });

    const media = session.content.media.length > 0 ? `\n📷 ${session.content.media.length} photo(s)` : '';
    await ctx.editMessageText(
      `You're about to post to ${formatPlatforms(targets)}:\n\n` +
      `${preview(session.content.text, 1000)}${media}\n\n` +
      'What would you like to do?',
      getConfirmKeyboard()
    );
  };

  const handleConfirmChoice = async (ctx: Context): Promise<void> => {
    if ((await requireOperator(ctx, access)) === null) return;
    await ctx.answerCbQuery();

    const chatId = ctx.chat?.id;
    const data = callbackData(ctx);

    if (data === CALLBACK.cancel) {
      if (chatId !== undefined) sessions.clear(chatId);
      await ctx.editMessageText('Operation cancelled.');
      return;
    }

    const session = chatId === undefined ? undefined : sessions.get(chatId);
    if (!session || session.step !== 'confirming' || !session.content || !session.targets) {
      await ctx.editMessageText('This post is no longer active. Start again with /post.');
      return;
    }

    if (data === CALLBACK.schedule) {
      sessions.update(session, { step: 'awaiting_time' });
      await ctx.editMessageText(
        `Please enter when you want to schedule this post in the format ${SCHEDULE_INPUT_FORMAT} (UTC).\n` +
        `Example: ${formatUtc(new Date(now().getTime() + 60 * 60 * 1000))}`
      );
      return;
    }

    if (data === CALLBACK.postNow) {
      // Сессию закрываем до публикации, чтобы повторное нажатие не опубликовало пост дважды
      sessions.clear(session.chatId);
      await ctx.editMessageText(`⏳ Publishing to ${formatPlatforms(session.targets)}...`);

      const outcome = await dispatcher.submit({
        authorId: session.userId,
        chatId: session.chatId,
        content: session.content,
        targets: session.targets,
        scheduledAt: null,
      });

      const text = outcome.kind === 'published' ? formatResults(outcome.results) : 'Post scheduled.';
      await ctx.editMessageText(text);
    }
  };

  return {
    handlePostCommand,
    handlePostMessage,
    handlePlatformChoice,
    handleConfirmChoice,
  };
}
