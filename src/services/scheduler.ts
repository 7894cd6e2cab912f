import cron from 'node-cron';
import type { PostDispatcher } from './dispatcher';

export interface SchedulerHandle {
  // Запускает проверку вне расписания; пропускается, если предыдущая ещё идёт
  runNow(): Promise<void>;
  stop(): void;
}

/**
 * Запускает cron-задачу, которая публикует наступившие посты (по умолчанию раз в минуту).
 * Проверки не перекрываются: если предыдущая не закончилась, очередная пропускается.
 */
export function startScheduler(dispatcher: PostDispatcher, cronExpression: string): SchedulerHandle {
  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression for scheduler: "${cronExpression}"`);
  }

  let running = false;

  const runTick = async (): Promise<void> => {
    if (running) {
      console.warn('⚠️ [scheduler] Previous check is still running, skipping this one');
      return;
    }

    running = true;
    try {
      await dispatcher.tick(new Date());
    } catch (err) {
      console.error('❌ [scheduler] Error:', err instanceof Error ? err.message : err);
    } finally {
      running = false;
    }
  };

  const task = cron.schedule(cronExpression, runTick, { timezone: 'Etc/UTC' });

  console.log(`[scheduler] Cron registered: "${cronExpression}" (UTC)`);

  return {
    runNow: runTick,
    stop: () => task.stop(),
  };
}
