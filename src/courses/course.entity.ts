import { Entity, ObjectIdColumn, Column } from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import { v4 as uuidv4 } from 'uuid';

export enum CourseStatus {
  DRAFT = 'draft',
  PUBLISHED = 'published',
  ONGOING = 'ongoing',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
}

export const AVAILABLE_COURSE_STATUSES: readonly CourseStatus[] = [CourseStatus.PUBLISHED, CourseStatus.ONGOING];

export interface NewCourse {
  name: string;
  description: string;
  instructor: string;
  start_date: Date;
  end_date: Date;
  price: number;
  max_students: number;
  target_audience?: string;
  duration_hours?: number;
  materials_folder_id?: string;
}

@Entity('courses')
export class Course {
  @ApiProperty({ description: 'Unique identifier (uuid)' })
  @ObjectIdColumn()
  id!: string;

  @ApiProperty({ description: 'Course title' })
  @Column()
  name!: string;

  @ApiProperty({ description: 'Course description' })
  @Column()
  description!: string;

  @ApiProperty({ description: 'Instructor name' })
  @Column()
  instructor!: string;

  @ApiProperty({ description: 'First lesson' })
  @Column()
  start_date!: Date;

  @ApiProperty({ description: 'Last lesson' })
  @Column()
  end_date!: Date;

  @ApiProperty({ description: 'Full course price', example: 150000 })
  @Column()
  price!: number;

  @ApiProperty({ description: 'Seat limit', example: 20 })
  @Column()
  max_students!: number;

  @ApiProperty({ enum: CourseStatus })
  @Column()
  status!: CourseStatus;

  @ApiProperty({ description: 'Google Drive folder with course materials', required: false })
  @Column({ nullable: true })
  materials_folder_id?: string;

  @ApiProperty({ required: false })
  @Column({ nullable: true })
  target_audience?: string;

  @ApiProperty({ required: false })
  @Column({ nullable: true })
  duration_hours?: number;

  @ApiProperty()
  @Column()
  created_at!: Date;

  @ApiProperty()
  @Column()
  updated_at!: Date;

  static create(data: NewCourse, now: Date = new Date()): Course {
    return Object.assign(new Course(), {
      ...data,
      id: uuidv4(),
      status: CourseStatus.DRAFT,
      created_at: now,
      updated_at: now,
    });
  }

  isAvailable(): boolean {
    return AVAILABLE_COURSE_STATUSES.includes(this.status);
  }
}
