import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { MongoRepository } from 'typeorm';
import { compareAsc } from 'date-fns';
import { Registration, RegistrationStatus, SEAT_HOLDING_STATUSES } from './registration.entity';
import { toDocument } from '../database/documents';

export abstract class RegistrationsRepository {
  abstract findById(id: string): Promise<Registration | null>;
  abstract findByStudentAndCourse(studentId: string, courseId: string): Promise<Registration | null>;
  abstract findByStudent(studentId: string): Promise<Registration[]>;
  abstract findByCourse(courseId: string): Promise<Registration[]>;
  abstract findByStatus(status: RegistrationStatus): Promise<Registration[]>;
  /** Registrations holding a seat; rejected and cancelled ones are not counted. */
  abstract countByCourse(courseId: string): Promise<number>;
  abstract save(registration: Registration): Promise<Registration>;
  abstract delete(id: string): Promise<boolean>;
}

export const byRegisteredAt = (a: Registration, b: Registration) => compareAsc(a.registered_at, b.registered_at);

@Injectable()
export class MongoRegistrationsRepository extends RegistrationsRepository {
  constructor(
    @InjectRepository(Registration)
    private readonly repository: MongoRepository<Registration>,
  ) {
    super();
  }

  findById(id: string): Promise<Registration | null> {
    return this.repository.findOneBy({ _id: id });
  }

  findByStudentAndCourse(studentId: string, courseId: string): Promise<Registration | null> {
    return this.repository.findOneBy({ student_id: studentId, course_id: courseId });
  }

  async findByStudent(studentId: string): Promise<Registration[]> {
    const registrations = await this.repository.findBy({ student_id: studentId });
    return registrations.sort(byRegisteredAt);
  }

  async findByCourse(courseId: string): Promise<Registration[]> {
    const registrations = await this.repository.findBy({ course_id: courseId });
    return registrations.sort(byRegisteredAt);
  }

  async findByStatus(status: RegistrationStatus): Promise<Registration[]> {
    const registrations = await this.repository.findBy({ status });
    return registrations.sort(byRegisteredAt);
  }

  countByCourse(courseId: string): Promise<number> {
    return this.repository.countDocuments({
      course_id: courseId,
      status: { $in: [...SEAT_HOLDING_STATUSES] },
    });
  }

  async save(registration: Registration): Promise<Registration> {
    await this.repository.replaceOne({ _id: registration.id }, toDocument(registration, 'id'), { upsert: true });
    return registration;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.repository.deleteOne({ _id: id });
    return result.deletedCount > 0;
  }
}
