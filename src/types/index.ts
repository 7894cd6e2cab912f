// Платформы, в которые бот умеет публиковать
export type Platform = 'bluesky' | 'mastodon';

// Статус запланированного поста
export type PostStatus = 'pending' | 'published' | 'failed';

// Ссылка на медиафайл в Telegram (скачивается в момент публикации)
export interface MediaRef {
  kind: 'photo';
  // file_id из Telegram
  fileId: string;
  altText?: string;
}

// Содержимое поста
export interface PostContent {
  text: string;
  media: MediaRef[];
}

// Черновик из диалога /post; без scheduledAt публикуется сразу
export interface PostDraft {
  authorId: number;
  chatId: number;
  content: PostContent;
  targets: Platform[];
  // ISO-строка в UTC или null
  scheduledAt: string | null;
}

// Запись запланированного поста в хранилище
export interface ScheduledPost {
  id: string;
  authorId: number;
  chatId: number;
  content: PostContent;
  targets: Platform[];
  scheduledAt: string;
  createdAt: string;
  status: PostStatus;
}

// Результат публикации в одну платформу
export interface PublishResult {
  platform: Platform;
  success: boolean;
  postId?: string;
  url?: string;
  error?: string;
}

// Скачанный медиафайл, готовый к загрузке на платформу
export interface ResolvedMedia {
  data: Buffer;
  mimeType: string;
  altText: string;
}
