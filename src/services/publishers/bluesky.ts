import { AtpAgent, RichText } from '@atproto/api';
import type { AppBskyEmbedImages } from '@atproto/api';
import { failure, type Publisher } from './index';
import type { BlueskyConfig } from '../../config';
import type { PostContent, PublishResult, ResolvedMedia } from '../../types';

// Ограничения Bluesky для поста
export const BLUESKY_MAX_GRAPHEMES = 300;
export const BLUESKY_MAX_IMAGES = 4;

/**
 * Узкий клиент Bluesky: всё, что нужно публикатору от AT Protocol
 */
export interface BlueskyClient {
  isLoggedIn(): boolean;
  login(): Promise<void>;
  createPost(text: string, images: ResolvedMedia[]): Promise<{ uri: string }>;
}

/**
 * Клиент поверх AtpAgent: ссылки, упоминания и хэштеги размечаются через RichText,
 * картинки загружаются блобами и прикрепляются как app.bsky.embed.images
 */
export class AtpBlueskyClient implements BlueskyClient {
  private readonly agent: AtpAgent;

  constructor(private readonly config: BlueskyConfig) {
    this.agent = new AtpAgent({ service: config.service });
  }

  isLoggedIn(): boolean {
    return this.agent.session !== undefined;
  }

  async login(): Promise<void> {
    await this.agent.login({ identifier: this.config.identifier, password: this.config.password });
    console.log('✅ [bluesky] Logged in as', this.config.identifier);
  }

  async createPost(text: string, images: ResolvedMedia[]): Promise<{ uri: string }> {
    const richText = new RichText({ text });
    // Неразрешённые упоминания detectFacets просто пропускает
    await richText.detectFacets(this.agent);

    const uploaded: AppBskyEmbedImages.Image[] = [];
    for (const image of images) {
      const { data } = await this.agent.uploadBlob(image.data, { encoding: image.mimeType });
      uploaded.push({ image: data.blob, alt: image.altText });
    }

    const embed: AppBskyEmbedImages.Main | undefined =
      uploaded.length > 0 ? { $type: 'app.bsky.embed.images', images: uploaded } : undefined;

    const response = await this.agent.post({
      text: richText.text,
      facets: richText.facets,
      embed,
      createdAt: new Date().toISOString(),
    });

    return { uri: response.uri };
  }
}

/**
 * Длина текста в графемах, как её считает Bluesky
 */
export function graphemeLength(text: string): number {
  const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });
  let count = 0;
  for (const _segment of segmenter.segment(text)) {
    count += 1;
  }
  return count;
}

/**
 * Переводит at://did/app.bsky.feed.post/rkey в ссылку на bsky.app
 */
export function bskyPostUrl(uri: string): string | undefined {
  const match = /^at:\/\/([^/]+)\/app\.bsky\.feed\.post\/([^/]+)$/.exec(uri);
  if (!match) {
    return undefined;
  }
  return `https://bsky.app/profile/${match[1]}/post/${match[2]}`;
}

export class BlueskyPublisher implements Publisher {
  readonly platform = 'bluesky' as const;

  constructor(private readonly client: BlueskyClient) {}

  async publish(content: PostContent, media: ResolvedMedia[]): Promise<PublishResult> {
    const length = graphemeLength(content.text);
    if (length > BLUESKY_MAX_GRAPHEMES) {
      return failure(this.platform, `Text is ${length} characters, Bluesky allows ${BLUESKY_MAX_GRAPHEMES}`);
    }
    if (media.length > BLUESKY_MAX_IMAGES) {
      return failure(this.platform, `Bluesky allows at most ${BLUESKY_MAX_IMAGES} images per post`);
    }

    try {
      if (!this.client.isLoggedIn()) {
        await this.client.login();
      }

      const { uri } = await this.client.createPost(content.text, media);
      const url = bskyPostUrl(uri);
      console.log(`✅ [bluesky] Posted ${uri}`);

      return { platform: this.platform, success: true, postId: uri, url };
    } catch (error) {
      console.error('❌ [bluesky] Failed to post:', error);
      return failure(this.platform, error);
    }
  }
}
