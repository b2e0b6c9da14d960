import { Injectable, Logger } from '@nestjs/common';
import { Registration, RegistrationStatus } from './registration.entity';
import { RegistrationsRepository } from './registrations.repository';
import { PaymentsRepository } from './payments.repository';
import { StudentsRepository } from '../students/students.repository';
import { Student } from '../students/student.entity';
import { CoursesRepository } from '../courses/courses.repository';
import { Course } from '../courses/course.entity';
import { Clock } from '../common/timezone';
import { Result, fail, ok } from '../common/result';

export type RegistrationResult = Result<{ registration: Registration; student: Student; course: Course }>;
export type DecisionResult = Result<{ registration: Registration }>;

export interface PendingRegistration {
  registration: Registration;
  student: Student | null;
  course: Course | null;
}

export interface StudentRegistration {
  registration: Registration;
  course: Course | null;
}

export interface CourseStudent {
  registration: Registration;
  student: Student | null;
  total_paid: number;
  remaining: number;
}

@Injectable()
export class RegistrationsService {
  private readonly logger = new Logger(RegistrationsService.name);

  constructor(
    private readonly registrationsRepository: RegistrationsRepository,
    private readonly studentsRepository: StudentsRepository,
    private readonly coursesRepository: CoursesRepository,
    private readonly paymentsRepository: PaymentsRepository,
    private readonly clock: Clock,
  ) {}

  /**
   * Quick registration: the student is created (or their name and phone
   * refreshed) and a pending registration is opened if a seat is left.
   */
  async requestRegistration(
    telegramId: number,
    fullName: string,
    phoneNumber: string,
    courseId: string,
  ): Promise<RegistrationResult> {
    const course = await this.coursesRepository.findById(courseId);
    if (!course) {
      return fail('Course not found');
    }

    const now = this.clock.now();
    let student = await this.studentsRepository.findByTelegramId(telegramId);
    if (student) {
      Object.assign(student, { full_name: fullName, phone_number: phoneNumber, updated_at: now });
    } else {
      student = Student.create(telegramId, fullName, phoneNumber, undefined, now);
    }
    await this.studentsRepository.save(student);

    return this.openRegistration(student, course);
  }

  /** Registration for a student whose profile is already complete. */
  async registerStudent(telegramId: number, courseId: string): Promise<RegistrationResult> {
    const student = await this.studentsRepository.findByTelegramId(telegramId);
    if (!student?.profile_completed) {
      return fail('Student profile is not complete');
    }
    const course = await this.coursesRepository.findById(courseId);
    if (!course) {
      return fail('Course not found');
    }
    if (!course.isAvailable()) {
      return fail('Course is not available for registration');
    }
    return this.openRegistration(student, course);
  }

  async approve(registrationId: string, adminId: number, notes?: string): Promise<DecisionResult> {
    return this.decide(registrationId, adminId, RegistrationStatus.APPROVED, notes);
  }

  async reject(registrationId: string, adminId: number, reason?: string): Promise<DecisionResult> {
    return this.decide(registrationId, adminId, RegistrationStatus.REJECTED, reason || 'Rejected by admin');
  }

  /** Withdrawal by the student while the request is still pending. */
  async cancel(registrationId: string, telegramId: number): Promise<DecisionResult> {
    const registration = await this.registrationsRepository.findById(registrationId);
    const student = await this.studentsRepository.findByTelegramId(telegramId);
    if (!registration || registration.student_id !== student?.id) {
      return fail('Registration not found');
    }
    if (registration.status !== RegistrationStatus.PENDING) {
      return fail(`Registration is not pending (status: ${registration.status})`);
    }
    registration.status = RegistrationStatus.CANCELLED;
    await this.registrationsRepository.save(registration);
    this.logger.log(`↩️ Registration ${registrationId} cancelled by ${telegramId}`);
    return ok({ registration });
  }

  async findById(registrationId: string): Promise<Registration | null> {
    return this.registrationsRepository.findById(registrationId);
  }

  async getPending(): Promise<PendingRegistration[]> {
    const pending = await this.registrationsRepository.findByStatus(RegistrationStatus.PENDING);
    return Promise.all(
      pending.map(async registration => ({
        registration,
        student: await this.studentsRepository.findById(registration.student_id),
        course: await this.coursesRepository.findById(registration.course_id),
      })),
    );
  }

  async getStudentRegistrations(telegramId: number): Promise<StudentRegistration[]> {
    const student = await this.studentsRepository.findByTelegramId(telegramId);
    if (!student) {
      return [];
    }
    const registrations = await this.registrationsRepository.findByStudent(student.id);
    return Promise.all(
      registrations.map(async registration => ({
        registration,
        course: await this.coursesRepository.findById(registration.course_id),
      })),
    );
  }

  /** Students of a course with what they paid; empty for an unknown course. */
  async getCourseStudents(courseId: string, status?: RegistrationStatus): Promise<CourseStudent[]> {
    const course = await this.coursesRepository.findById(courseId);
    if (!course) {
      return [];
    }
    const registrations = (await this.registrationsRepository.findByCourse(courseId)).filter(
      registration => status === undefined || registration.status === status,
    );
    return Promise.all(
      registrations.map(async registration => {
        const totalPaid = await this.paymentsRepository.getTotalPaid(registration.id);
        return {
          registration,
          student: await this.studentsRepository.findById(registration.student_id),
          total_paid: totalPaid,
          remaining: Math.max(0, course.price - totalPaid),
        };
      }),
    );
  }

  // Capacity is checked before the insert, so two concurrent requests can both take the last seat.
  private async openRegistration(student: Student, course: Course): Promise<RegistrationResult> {
    if (await this.registrationsRepository.findByStudentAndCourse(student.id, course.id)) {
      return fail('Already registered for this course');
    }
    if ((await this.registrationsRepository.countByCourse(course.id)) >= course.max_students) {
      return fail('Course is full');
    }

    const registration = Registration.create(student.id, course.id, this.clock.now());
    await this.registrationsRepository.save(registration);
    this.logger.log(`📝 ${student.full_name} requested ${course.name}`);
    return ok({ registration, student, course });
  }

  private async decide(
    registrationId: string,
    adminId: number,
    status: RegistrationStatus.APPROVED | RegistrationStatus.REJECTED,
    notes?: string,
  ): Promise<DecisionResult> {
    const registration = await this.registrationsRepository.findById(registrationId);
    if (!registration) {
      return fail('Registration not found');
    }
    if (registration.status !== RegistrationStatus.PENDING) {
      return fail(`Registration is not pending (status: ${registration.status})`);
    }

    registration.status = status;
    registration.approved_at = this.clock.now();
    registration.approved_by = adminId;
    if (notes) {
      registration.notes = notes;
    }
    await this.registrationsRepository.save(registration);
    this.logger.log(`${status === RegistrationStatus.APPROVED ? '✅' : '❌'} Registration ${registrationId} ${status}`);
    return ok({ registration });
  }
}
