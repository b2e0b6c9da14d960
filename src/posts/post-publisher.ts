import { Injectable, Logger } from '@nestjs/common';
import { PostPlatform, ScheduledPost } from './scheduled-post.entity';
import { PublishResult, SocialPublisher } from '../integrations/meta/meta-graph.adapter';

export interface PostPublishResult {
  success: boolean;
  facebook?: PublishResult;
  instagram?: PublishResult;
  /** The post targets Instagram but carries no image. */
  skippedInstagram: boolean;
  error?: string;
}

const failureOf = (result?: PublishResult) => (result && !result.success ? result.error : undefined);

@Injectable()
export class PostPublisher {
  private readonly logger = new Logger(PostPublisher.name);

  constructor(private readonly socialPublisher: SocialPublisher) {}

  async publish(post: ScheduledPost): Promise<PostPublishResult> {
    const validationError = post.validateForInstagram();
    if (validationError && post.platform === PostPlatform.INSTAGRAM) {
      return { success: false, error: validationError, skippedInstagram: true };
    }
    if (validationError) {
      this.logger.warn(`Post ${post.id}: ${validationError}, publishing to Facebook only`);
    }

    const facebook =
      post.platform === PostPlatform.FACEBOOK || post.platform === PostPlatform.BOTH
        ? await this.socialPublisher.publishToFacebook(post.content, post.image_url)
        : undefined;

    const imageUrl = post.image_url;
    const instagram =
      post.canPublishToInstagram() && imageUrl
        ? await this.socialPublisher.publishToInstagram(imageUrl, post.content)
        : undefined;

    const success = this.isSuccess(post, facebook, instagram);
    return {
      success,
      facebook,
      instagram,
      skippedInstagram: post.requiresImage() && !post.canPublishToInstagram(),
      error: success ? undefined : failureOf(facebook) ?? failureOf(instagram) ?? 'Unknown error',
    };
  }

  private isSuccess(post: ScheduledPost, facebook?: PublishResult, instagram?: PublishResult): boolean {
    switch (post.platform) {
      case PostPlatform.FACEBOOK:
        return facebook?.success ?? false;
      case PostPlatform.INSTAGRAM:
        return instagram?.success ?? false;
      case PostPlatform.BOTH:
        return (facebook?.success ?? false) && (!post.canPublishToInstagram() || (instagram?.success ?? false));
    }
  }
}
