import { Injectable, Logger } from '@nestjs/common';
import { PostPlatform, PostStatus, ScheduledPost } from './scheduled-post.entity';
import { ScheduledPostsRepository } from './scheduled-posts.repository';
import { PostPublishResult, PostPublisher } from './post-publisher';
import { Clock } from '../common/timezone';

export interface AdHocPost {
  content: string;
  platform: PostPlatform;
  imageUrl?: string;
}

export type AdHocOutcome =
  | { kind: 'refused'; reason: string }
  | { kind: 'published' | 'partial' | 'failed'; post: ScheduledPost; result: PostPublishResult; facebookOnly: boolean };

/** Posts written by an admin in the bot and published right away. */
@Injectable()
export class PostingService {
  private readonly logger = new Logger(PostingService.name);

  constructor(
    private readonly publisher: PostPublisher,
    private readonly scheduledPostsRepository: ScheduledPostsRepository,
    private readonly clock: Clock,
  ) {}

  async publishNow(input: AdHocPost): Promise<AdHocOutcome> {
    const imageUrl = input.imageUrl?.trim() || undefined;
    let platform = input.platform;
    let facebookOnly = false;
    if (platform !== PostPlatform.FACEBOOK && !imageUrl) {
      if (platform === PostPlatform.INSTAGRAM) {
        return { kind: 'refused', reason: 'Instagram posts require a valid image_url' };
      }
      platform = PostPlatform.FACEBOOK;
      facebookOnly = true;
    }

    const post = ScheduledPost.create({
      content: input.content.trim(),
      scheduled_datetime: this.clock.now(),
      platform,
      image_url: imageUrl,
    });
    await this.scheduledPostsRepository.save(post);

    const result = await this.publisher.publish(post);
    const now = this.clock.now();
    if (result.success) {
      await this.scheduledPostsRepository.updateStatus(post.id, PostStatus.PUBLISHED, { published_at: now });
      post.status = PostStatus.PUBLISHED;
      post.published_at = now;
    } else {
      const reason = result.error ?? 'Unknown error';
      await this.scheduledPostsRepository.updateStatus(post.id, PostStatus.FAILED, { error_message: reason });
      post.status = PostStatus.FAILED;
      post.error_message = reason;
      this.logger.error(`Ad-hoc post ${post.id} failed: ${reason}`);
    }

    const kind = result.success ? 'published' : result.facebook?.success ? 'partial' : 'failed';
    return { kind, post, result, facebookOnly };
  }
}
