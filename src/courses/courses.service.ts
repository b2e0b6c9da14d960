import { Injectable, Logger } from '@nestjs/common';
import { Course, CourseStatus, NewCourse } from './course.entity';
import { CoursesRepository } from './courses.repository';
import { FileStorage } from '../integrations/google/google-drive.adapter';
import { Clock } from '../common/timezone';
import { Result, errorMessage, fail, ok } from '../common/result';

export type CourseResult = Result<{ course: Course }>;

export type EditableCourseField =
  | 'name'
  | 'description'
  | 'instructor'
  | 'price'
  | 'max_students'
  | 'target_audience'
  | 'duration_hours'
  | 'start_date'
  | 'end_date';

export const EDITABLE_COURSE_FIELDS: readonly EditableCourseField[] = [
  'name',
  'description',
  'instructor',
  'price',
  'max_students',
  'target_audience',
  'duration_hours',
  'start_date',
  'end_date',
];

export function isEditableCourseField(value: string): value is EditableCourseField {
  return EDITABLE_COURSE_FIELDS.some(field => field === value);
}

/** `-` or an empty value clears an optional field. */
const CLEAR_MARKER = '-';

@Injectable()
export class CoursesService {
  private readonly logger = new Logger(CoursesService.name);

  constructor(
    private readonly coursesRepository: CoursesRepository,
    private readonly fileStorage: FileStorage,
    private readonly clock: Clock,
  ) {}

  getCourses(availableOnly = true): Promise<Course[]> {
    return availableOnly ? this.coursesRepository.findAvailable() : this.coursesRepository.findAll();
  }

  getCourseById(id: string): Promise<Course | null> {
    return this.coursesRepository.findById(id);
  }

  /** Validates, creates the Drive materials folder and publishes the course right away. */
  async createCourse(data: NewCourse): Promise<CourseResult> {
    const error = this.validate(data);
    if (error) {
      return fail(error);
    }

    try {
      const course = Course.create(
        {
          ...data,
          name: data.name.trim(),
          description: data.description.trim(),
          instructor: data.instructor.trim(),
          target_audience: data.target_audience?.trim() || undefined,
        },
        this.clock.now(),
      );
      course.materials_folder_id = await this.createMaterialsFolder(course.name);
      course.status = CourseStatus.PUBLISHED;

      await this.coursesRepository.save(course);
      this.logger.log(`📚 Created course ${course.id} - ${course.name}`);
      return ok({ course });
    } catch (error) {
      this.logger.error(`Failed to create course: ${errorMessage(error)}`);
      return fail(errorMessage(error));
    }
  }

  async updateCourse(id: string, field: EditableCourseField, rawValue: string): Promise<CourseResult> {
    const course = await this.coursesRepository.findById(id);
    if (!course) {
      return fail('Course not found');
    }

    const value = rawValue.trim();
    const cleared = value === '' || value === CLEAR_MARKER;
    switch (field) {
      case 'name':
        if (value.length < 2) return fail('Course name too short');
        course.name = value;
        break;
      case 'description':
        course.description = value;
        break;
      case 'instructor':
        if (!value) return fail('Instructor is required');
        course.instructor = value;
        break;
      case 'price': {
        const price = Number(value);
        if (!value || !Number.isFinite(price) || price < 0) return fail('Price cannot be negative');
        course.price = price;
        break;
      }
      case 'max_students': {
        const max = Number(value);
        if (!Number.isInteger(max) || max < 1) return fail('Max students must be at least 1');
        course.max_students = max;
        break;
      }
      case 'target_audience':
        course.target_audience = cleared ? undefined : value;
        break;
      case 'duration_hours': {
        const hours = Number(value);
        if (!cleared && (!Number.isInteger(hours) || hours < 1)) return fail('Duration must be a whole number of hours');
        course.duration_hours = cleared ? undefined : hours;
        break;
      }
      case 'start_date':
      case 'end_date': {
        let date: Date;
        try {
          date = this.clock.parseDay(value);
        } catch (error) {
          return fail(errorMessage(error));
        }
        const start = field === 'start_date' ? date : course.start_date;
        const end = field === 'end_date' ? date : course.end_date;
        if (start.getTime() >= end.getTime()) return fail('Start date must be before end date');
        course[field] = date;
        break;
      }
    }

    course.updated_at = this.clock.now();
    await this.coursesRepository.save(course);
    this.logger.log(`✏️ Course ${course.id}: ${field} updated`);
    return ok({ course });
  }

  async changeStatus(id: string, status: CourseStatus): Promise<CourseResult> {
    const course = await this.coursesRepository.findById(id);
    if (!course) {
      return fail('Course not found');
    }
    course.status = status;
    course.updated_at = this.clock.now();
    await this.coursesRepository.save(course);
    this.logger.log(`🔄 Course ${course.id} is now ${status}`);
    return ok({ course });
  }

  private validate(data: NewCourse): string | null {
    if (!data.name || data.name.trim().length < 2) return 'Course name too short';
    if (data.price < 0) return 'Price cannot be negative';
    if (data.max_students < 1) return 'Max students must be at least 1';
    if (data.start_date.getTime() >= data.end_date.getTime()) return 'Start date must be before end date';
    return null;
  }

  private async createMaterialsFolder(name: string): Promise<string | undefined> {
    try {
      return await this.fileStorage.createFolder(name);
    } catch (error) {
      this.logger.error(`Failed to create Drive folder for "${name}": ${errorMessage(error)}`);
      return undefined;
    }
  }
}
