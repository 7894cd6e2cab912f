export const UNAUTHORIZED_MESSAGE = 'Sorry, you are not authorized to use this bot.';

/**
 * Список операторов, которым разрешено пользоваться ботом
 */
export class AccessList {
  private readonly userIds: ReadonlySet<number>;

  constructor(userIds: Iterable<number>) {
    this.userIds = new Set(userIds);
  }

  isAuthorized(userId: number | undefined): userId is number {
    return userId !== undefined && this.userIds.has(userId);
  }
}
