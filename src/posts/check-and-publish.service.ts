import { Injectable, Logger } from '@nestjs/common';
import { ScheduledPost } from './scheduled-post.entity';
import { PostPublishResult, PostPublisher } from './post-publisher';
import { PostSource } from '../integrations/google/google-sheets.adapter';
import { Clock } from '../common/timezone';
import { errorMessage } from '../common/result';

export interface PublishCallbacks {
  onSuccess?: (post: ScheduledPost, result: PostPublishResult) => Promise<void>;
  onError?: (message: string) => Promise<void>;
}

/** One poll of the posting sheet: publishes every pending row that is due. */
@Injectable()
export class CheckAndPublishPosts {
  private readonly logger = new Logger(CheckAndPublishPosts.name);

  constructor(
    private readonly postSource: PostSource,
    private readonly publisher: PostPublisher,
    private readonly clock: Clock,
  ) {}

  /** Returns the number of posts published in this poll. */
  async execute(callbacks: PublishCallbacks = {}): Promise<number> {
    let posts: ScheduledPost[];
    try {
      posts = await this.postSource.getScheduledPosts();
    } catch (error) {
      const message = `Failed to fetch posts from Google Sheets: ${errorMessage(error)}`;
      this.logger.error(message);
      await callbacks.onError?.(message);
      return 0;
    }

    let published = 0;
    for (const post of posts) {
      if (!this.clock.isPastOrNow(post.scheduled_datetime)) {
        continue;
      }
      const row = post.sheet_row_index ?? 0;
      const result = await this.publisher.publish(post);

      if (result.success) {
        try {
          await this.postSource.markPostPublished(row);
        } catch (error) {
          this.logger.error(`Failed to mark row ${row} as published: ${errorMessage(error)}`);
          continue;
        }
        published++;
        this.logger.log(`📤 Published post from row ${row}`);
        await callbacks.onSuccess?.(post, result);
      } else {
        const reason = result.error ?? 'Unknown error';
        this.logger.error(`Failed to publish post from row ${row}: ${reason}`);
        await this.postSource.addErrorNote(row, reason);
        await callbacks.onError?.(`Failed to publish post: ${reason}`);
      }
    }
    return published;
  }
}
