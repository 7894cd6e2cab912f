import { Context } from 'telegraf';
import { AccessList, UNAUTHORIZED_MESSAGE } from '../services/access';

/**
 * Проверяет, что пользователь в списке операторов. Иначе отвечает отказом
 * и возвращает null: дальше обработчик ничего не трогает.
 */
export async function requireOperator(ctx: Context, access: AccessList): Promise<number | null> {
  const userId = ctx.from?.id;
  if (access.isAuthorized(userId)) {
    return userId;
  }

  console.log(`[access] Rejected ${ctx.updateType} from user ${userId ?? 'unknown'}`);

  if (ctx.callbackQuery) {
    await ctx.answerCbQuery(UNAUTHORIZED_MESSAGE);
  } else {
    await ctx.reply(UNAUTHORIZED_MESSAGE);
  }
  return null;
}
