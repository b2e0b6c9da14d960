import { Entity, ObjectIdColumn, Column, Index } from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import { v4 as uuidv4 } from 'uuid';

export enum PostPlatform {
  FACEBOOK = 'facebook',
  INSTAGRAM = 'instagram',
  BOTH = 'both',
}

export enum PostStatus {
  PENDING = 'pending',
  PUBLISHED = 'published',
  FAILED = 'failed',
  SKIPPED = 'skipped',
}

export const INSTAGRAM_IMAGE_REQUIRED = 'Instagram posts require a valid image_url';

export interface NewScheduledPost {
  content: string;
  scheduled_datetime: Date;
  platform: PostPlatform;
  image_url?: string;
  sheet_row_index?: number;
}

@Entity('scheduled_posts')
export class ScheduledPost {
  @ApiProperty({ description: 'Unique identifier (uuid)' })
  @ObjectIdColumn()
  id!: string;

  @ApiProperty()
  @Column()
  content!: string;

  @ApiProperty()
  @Column()
  scheduled_datetime!: Date;

  @ApiProperty({ enum: PostPlatform })
  @Column()
  platform!: PostPlatform;

  @ApiProperty({ enum: PostStatus })
  @Index()
  @Column()
  status!: PostStatus;

  @ApiProperty({ required: false })
  @Column({ nullable: true })
  image_url?: string;

  @ApiProperty({ required: false })
  @Column({ nullable: true })
  published_at?: Date;

  @ApiProperty({ required: false })
  @Column({ nullable: true })
  error_message?: string;

  @ApiProperty({ description: 'Source row in the posts sheet', required: false })
  @Column({ nullable: true })
  sheet_row_index?: number;

  static create(data: NewScheduledPost): ScheduledPost {
    return Object.assign(new ScheduledPost(), {
      ...data,
      id: uuidv4(),
      status: PostStatus.PENDING,
    });
  }

  requiresImage(): boolean {
    return this.platform === PostPlatform.INSTAGRAM || this.platform === PostPlatform.BOTH;
  }

  hasImage(): boolean {
    return Boolean(this.image_url?.trim());
  }

  canPublishToInstagram(): boolean {
    return this.requiresImage() && this.hasImage();
  }

  validateForInstagram(): string | null {
    return this.requiresImage() && !this.hasImage() ? INSTAGRAM_IMAGE_REQUIRED : null;
  }
}
