import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import fetch from 'node-fetch';
import { AppConfig, MetaConfig } from '../../config/configuration';
import { Result, errorMessage, fail, ok } from '../../common/result';
import { INSTAGRAM_IMAGE_REQUIRED } from '../../posts/scheduled-post.entity';
import { GraphResponse, readGraphResponse } from './graph-response';

export const GRAPH_API_BASE = 'https://graph.facebook.com/v18.0';

export type PublishResult = Result<{ postId: string }>;

export abstract class SocialPublisher {
  abstract publishToFacebook(content: string, imageUrl?: string): Promise<PublishResult>;
  /** Instagram only accepts posts with a public image. */
  abstract publishToInstagram(imageUrl: string, caption: string): Promise<PublishResult>;
}

@Injectable()
export class MetaGraphAdapter extends SocialPublisher {
  private readonly logger = new Logger(MetaGraphAdapter.name);
  private readonly config: MetaConfig;

  constructor(configService: ConfigService<AppConfig, true>) {
    super();
    this.config = configService.get('meta', { infer: true });
  }

  async publishToFacebook(content: string, imageUrl?: string): Promise<PublishResult> {
    const pageId = this.config.facebookPageId;

    try {
      const response = imageUrl
        ? await this.post(`${pageId}/photos`, { url: imageUrl, caption: content })
        : await this.post(`${pageId}/feed`, { message: content });
      if (response.ok && response.id) {
        this.logger.log(`📘 Published to Facebook: ${response.id}`);
        return ok({ postId: response.id });
      }
      const error = response.errorMessage ?? 'Unknown error';
      this.logger.error(`Facebook publish failed: ${error}`);
      return fail(error);
    } catch (error) {
      this.logger.error(`Failed to publish to Facebook: ${errorMessage(error)}`);
      return fail(errorMessage(error));
    }
  }

  async publishToInstagram(imageUrl: string, caption: string): Promise<PublishResult> {
    if (!imageUrl.trim()) {
      return fail(INSTAGRAM_IMAGE_REQUIRED);
    }

    const accountId = this.config.instagramAccountId;
    try {
      const container = await this.post(`${accountId}/media`, { image_url: imageUrl, caption });
      if (!container.id) {
        const error = container.errorMessage ?? 'Failed to create media container';
        this.logger.error(`Instagram container creation failed: ${error}`);
        return fail(error);
      }

      const published = await this.post(`${accountId}/media_publish`, { creation_id: container.id });
      if (!published.id) {
        const error = published.errorMessage ?? 'Failed to publish';
        this.logger.error(`Instagram publish failed: ${error}`);
        return fail(error);
      }

      this.logger.log(`📸 Published to Instagram: ${published.id}`);
      return ok({ postId: published.id });
    } catch (error) {
      this.logger.error(`Failed to publish to Instagram: ${errorMessage(error)}`);
      return fail(errorMessage(error));
    }
  }

  private async post(endpoint: string, params: Record<string, string>): Promise<GraphResponse> {
    const body = new URLSearchParams({ ...params, access_token: this.config.accessToken });
    const response = await fetch(`${GRAPH_API_BASE}/${endpoint}`, { method: 'POST', body });
    return readGraphResponse(response.ok, await response.json());
  }
}
