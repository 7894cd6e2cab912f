import { z } from 'zod';
import { failure, type Publisher } from './index';
import type { MastodonConfig } from '../../config';
import type { PostContent, PublishResult, ResolvedMedia } from '../../types';

export const MASTODON_MAX_CHARS = 500;
export const MASTODON_MAX_MEDIA = 4;

const statusSchema = z.object({
  id: z.string().optional(),
  url: z.string().nullish(),
});

const mediaAttachmentSchema = z.object({
  id: z.string().optional(),
});

/**
 * Публикует статус через REST API Mastodon (по умолчанию fosstodon.org).
 * Никогда не бросает — всегда возвращает PublishResult.
 */
export class MastodonPublisher implements Publisher {
  readonly platform = 'mastodon' as const;

  constructor(
    private readonly config: MastodonConfig,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async publish(content: PostContent, media: ResolvedMedia[]): Promise<PublishResult> {
    const length = [...content.text].length;
    if (length > MASTODON_MAX_CHARS) {
      return failure(this.platform, `Text is ${length} characters, Mastodon allows ${MASTODON_MAX_CHARS}`);
    }
    if (media.length > MASTODON_MAX_MEDIA) {
      return failure(this.platform, `Mastodon allows at most ${MASTODON_MAX_MEDIA} attachments per post`);
    }

    try {
      const mediaIds: string[] = [];
      for (const [index, item] of media.entries()) {
        mediaIds.push(await this.uploadMedia(item, index));
      }

      const res = await this.fetchImpl(`${this.config.baseUrl}/api/v1/statuses`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.accessToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ status: content.text, media_ids: mediaIds }),
      });

      if (!res.ok) {
        const body = await res.text();
        return failure(this.platform, `Mastodon API ${res.status}: ${body}`);
      }

      const status = statusSchema.parse(await res.json());
      console.log(`✅ [mastodon] Posted ${status.url ?? status.id ?? '(no link)'}`);

      return {
        platform: this.platform,
        success: true,
        postId: status.id,
        url: status.url ?? undefined,
      };
    } catch (error) {
      console.error('❌ [mastodon] Failed to post:', error);
      return failure(this.platform, error);
    }
  }

  private async uploadMedia(item: ResolvedMedia, index: number): Promise<string> {
    const form = new FormData();
    form.append('file', new Blob([item.data], { type: item.mimeType }), `image-${index + 1}`);
    if (item.altText) {
      form.append('description', item.altText);
    }

    const res = await this.fetchImpl(`${this.config.baseUrl}/api/v2/media`, {
      method: 'POST',
      headers: { Authorization: `Bearer ${this.config.accessToken}` },
      body: form,
    });

    if (!res.ok) {
      const body = await res.text();
      throw new Error(`Mastodon media upload ${res.status}: ${body}`);
    }

    const attachment = mediaAttachmentSchema.parse(await res.json());
    if (!attachment.id) {
      throw new Error('Mastodon media upload returned no id');
    }
    return attachment.id;
  }
}
