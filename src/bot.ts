import 'dotenv/config';
import { Telegraf } from 'telegraf';
import { loadConfig, enabledPlatforms, type AppConfig } from './config';
import { createCommandHandlers } from './handlers/commands';
import { createPostHandlers } from './handlers/post';
import { AccessList } from './services/access';
import { PostDispatcher, type MediaResolver, type Notifier } from './services/dispatcher';
import { JsonFilePostStorage } from './services/postStorage';
import { ScheduledPostStore } from './services/scheduledPosts';
import { PostSessions } from './services/sessions';
import { startScheduler } from './services/scheduler';
import { AtpBlueskyClient, BlueskyPublisher } from './services/publishers/bluesky';
import { MastodonPublisher } from './services/publishers/mastodon';
import type { PublisherRegistry } from './services/publishers';
import { errorMessage } from './utils/errors';
import { MAIN_BUTTONS, splitMessage } from './utils/telegram';

function createPublishers(config: AppConfig): PublisherRegistry {
  const publishers: PublisherRegistry = {};
  if (config.bluesky) {
    publishers.bluesky = new BlueskyPublisher(new AtpBlueskyClient(config.bluesky));
  }
  if (config.mastodon) {
    publishers.mastodon = new MastodonPublisher(config.mastodon);
  }
  return publishers;
}

async function start(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    console.error('❌', errorMessage(error));
    console.error('Создайте файл .env по образцу .env.example');
    process.exit(1);
  }

  const bot = new Telegraf(config.telegramToken);

  // Фото скачиваются из Telegram только в момент публикации
  const resolveMedia: MediaResolver = async (ref) => {
    const link = await bot.telegram.getFileLink(ref.fileId);
    const res = await fetch(link);
    if (!res.ok) {
      throw new Error(`Telegram file download failed with ${res.status}`);
    }
    return {
      data: Buffer.from(await res.arrayBuffer()),
      mimeType: res.headers.get('content-type') ?? 'image/jpeg',
      altText: ref.altText ?? '',
    };
  };

  const notify: Notifier = async (chatId, text) => {
    for (const chunk of splitMessage(text)) {
      await bot.telegram.sendMessage(chatId, chunk);
    }
  };

  // Загружаем очередь; битый файл — не стартуем, чтобы не потерять посты
  const storage = new JsonFilePostStorage(config.storageFile);
  const store = new ScheduledPostStore(storage);
  try {
    const count = await store.load();
    console.log(`✅ Загружено запланированных постов: ${count} (${storage.getFilePath()})`);
  } catch (error) {
    console.error('❌ Не удалось загрузить запланированные посты:', errorMessage(error));
    process.exit(1);
  }

  const platforms = enabledPlatforms(config);
  const access = new AccessList(config.authorizedUsers);
  const sessions = new PostSessions();
  const dispatcher = new PostDispatcher({
    store,
    publishers: createPublishers(config),
    resolveMedia,
    notify,
    publishTimeoutMs: config.publishTimeoutMs,
  });

  const commands = createCommandHandlers({ access, store, sessions });
  const post = createPostHandlers({ access, dispatcher, sessions, platforms });

  // Обработчики команд
  bot.start(commands.handleStart);
  bot.command('help', commands.handleHelp);
  bot.command('post', post.handlePostCommand);
  bot.command('cancel', commands.handleCancel);
  bot.command('list_scheduled', commands.handleListScheduled);
  bot.command('delete_scheduled', commands.handleDeleteScheduled);

  // Кнопки диалога /post
  bot.action(/^platform_/, post.handlePlatformChoice);
  bot.action(/^(post_now|schedule|cancel)$/, post.handleConfirmChoice);

  bot.on('text', async (ctx) => {
    const text = ctx.message.text;

    // Игнорируем команды (они обрабатываются отдельными обработчиками)
    if (text.startsWith('/')) {
      return;
    }

    // Обрабатываем нажатия на кнопки клавиатуры
    if (text === MAIN_BUTTONS.post) {
      await post.handlePostCommand(ctx);
      return;
    }

    if (text === MAIN_BUTTONS.list) {
      await commands.handleListScheduled(ctx);
      return;
    }

    if (text === MAIN_BUTTONS.cancel) {
      await commands.handleCancel(ctx);
      return;
    }

    if (!(await post.handlePostMessage(ctx))) {
      await commands.handleStart(ctx);
    }
  });

  bot.on('photo', async (ctx) => {
    if (!(await post.handlePostMessage(ctx))) {
      await commands.handleStart(ctx);
    }
  });

  // Обработка ошибок
  bot.catch(async (err, ctx) => {
    console.error('Ошибка в боте:', err);
    await ctx.reply('❌ Something went wrong. Please try again later.').catch((replyError: unknown) => {
      console.error('Не удалось отправить сообщение об ошибке:', replyError);
    });
  });

  const scheduler = startScheduler(dispatcher, config.schedulerCron);

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`Получен ${signal}, останавливаемся...`);
    scheduler.stop();
    bot.stop(signal);
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  // Посты, время которых наступило, пока бот был выключен
  await scheduler.runNow();

  console.log('🚀 Запуск Telegram бота...');
  console.log(`📋 Платформы: ${platforms.join(', ')}; операторов: ${config.authorizedUsers.length}`);

  // launch() резолвится только после остановки бота
  await bot.launch(() => {
    console.log('✅ Бот успешно запущен!');
  });
}

start().catch((error: unknown) => {
  console.error('❌ Ошибка при запуске бота:', error);
  process.exit(1);
});
