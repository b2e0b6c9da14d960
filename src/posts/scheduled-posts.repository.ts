import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { MongoRepository } from 'typeorm';
import { compareAsc } from 'date-fns';
import { PostStatus, ScheduledPost } from './scheduled-post.entity';
import { toDocument } from '../database/documents';

export interface PostStatusUpdate {
  published_at?: Date;
  error_message?: string;
}

export abstract class ScheduledPostsRepository {
  abstract findById(id: string): Promise<ScheduledPost | null>;
  /** Pending posts, earliest first. */
  abstract findPending(): Promise<ScheduledPost[]>;
  abstract save(post: ScheduledPost): Promise<ScheduledPost>;
  abstract updateStatus(id: string, status: PostStatus, update?: PostStatusUpdate): Promise<boolean>;
}

@Injectable()
export class MongoScheduledPostsRepository extends ScheduledPostsRepository {
  constructor(
    @InjectRepository(ScheduledPost)
    private readonly repository: MongoRepository<ScheduledPost>,
  ) {
    super();
  }

  findById(id: string): Promise<ScheduledPost | null> {
    return this.repository.findOneBy({ _id: id });
  }

  async findPending(): Promise<ScheduledPost[]> {
    const posts = await this.repository.findBy({ status: PostStatus.PENDING });
    return posts.sort((a, b) => compareAsc(a.scheduled_datetime, b.scheduled_datetime));
  }

  async save(post: ScheduledPost): Promise<ScheduledPost> {
    await this.repository.replaceOne({ _id: post.id }, toDocument(post, 'id'), { upsert: true });
    return post;
  }

  async updateStatus(id: string, status: PostStatus, update: PostStatusUpdate = {}): Promise<boolean> {
    const result = await this.repository.updateOne(
      { _id: id, status: PostStatus.PENDING },
      { $set: { status, ...update } },
    );
    return result.matchedCount > 0;
  }
}
