import { Module } from '@nestjs/common';
import { PostPublisher } from './post-publisher';
import { CheckAndPublishPosts } from './check-and-publish.service';
import { PostSchedulerService } from './post-scheduler.service';
import { PostingService } from './posting.service';
import { PostsController } from './posts.controller';
import { NotificationsModule } from '../notifications/notifications.module';

@Module({
  imports: [NotificationsModule],
  providers: [PostPublisher, CheckAndPublishPosts, PostSchedulerService, PostingService],
  controllers: [PostsController],
  exports: [PostSchedulerService, PostingService],
})
export class PostsModule {}
