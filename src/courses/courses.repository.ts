import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { MongoRepository } from 'typeorm';
import { compareAsc } from 'date-fns';
import { AVAILABLE_COURSE_STATUSES, Course } from './course.entity';
import { toDocument } from '../database/documents';

export abstract class CoursesRepository {
  abstract findById(id: string): Promise<Course | null>;
  abstract findAll(): Promise<Course[]>;
  /** Published or ongoing courses, earliest start first. */
  abstract findAvailable(): Promise<Course[]>;
  abstract save(course: Course): Promise<Course>;
  abstract delete(id: string): Promise<boolean>;
}

export const byStartDate = (a: Course, b: Course) => compareAsc(a.start_date, b.start_date);

@Injectable()
export class MongoCoursesRepository extends CoursesRepository {
  constructor(
    @InjectRepository(Course)
    private readonly repository: MongoRepository<Course>,
  ) {
    super();
  }

  findById(id: string): Promise<Course | null> {
    return this.repository.findOneBy({ _id: id });
  }

  async findAll(): Promise<Course[]> {
    const courses = await this.repository.findBy({});
    return courses.sort(byStartDate);
  }

  async findAvailable(): Promise<Course[]> {
    const courses = await this.repository.findBy({ status: { $in: [...AVAILABLE_COURSE_STATUSES] } });
    return courses.sort(byStartDate);
  }

  async save(course: Course): Promise<Course> {
    await this.repository.replaceOne({ _id: course.id }, toDocument(course, 'id'), { upsert: true });
    return course;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.repository.deleteOne({ _id: id });
    return result.deletedCount > 0;
  }
}
