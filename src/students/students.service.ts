import { Injectable, Logger } from '@nestjs/common';
import { Language, Student, StudentProfile } from './student.entity';
import { StudentsRepository } from './students.repository';
import { CoursesRepository } from '../courses/courses.repository';
import { Course } from '../courses/course.entity';
import { RegistrationsRepository } from '../registrations/registrations.repository';
import { Registration } from '../registrations/registration.entity';
import { PaymentsRepository } from '../registrations/payments.repository';
import { PaymentRecord } from '../registrations/payment-record.entity';
import { Clock } from '../common/timezone';
import { Result, fail, ok } from '../common/result';

export interface CourseEnrollment {
  course: Course;
  registration: Registration;
  payments: PaymentRecord[];
  total_paid: number;
  remaining: number;
}

export interface StudentProfileView {
  student: Student;
  courses: CourseEnrollment[];
}

export interface StudentPage {
  students: Student[];
  page: number;
  totalPages: number;
  total: number;
}

export type StudentSearch = { name: string } | { phone: string };

@Injectable()
export class StudentsService {
  private readonly logger = new Logger(StudentsService.name);

  constructor(
    private readonly studentsRepository: StudentsRepository,
    private readonly registrationsRepository: RegistrationsRepository,
    private readonly coursesRepository: CoursesRepository,
    private readonly paymentsRepository: PaymentsRepository,
    private readonly clock: Clock,
  ) {}

  findByTelegramId(telegramId: number): Promise<Student | null> {
    return this.studentsRepository.findByTelegramId(telegramId);
  }

  findById(id: string): Promise<Student | null> {
    return this.studentsRepository.findById(id);
  }

  async isProfileComplete(telegramId: number): Promise<boolean> {
    const student = await this.studentsRepository.findByTelegramId(telegramId);
    return student?.profile_completed ?? false;
  }

  /** Creates or overwrites the student's profile and marks it complete. */
  async completeProfile(telegramId: number, profile: StudentProfile, language: Language): Promise<Student> {
    const now = this.clock.now();
    const student =
      (await this.studentsRepository.findByTelegramId(telegramId)) ??
      Student.create(telegramId, profile.full_name, profile.phone_number, language, now);

    Object.assign(student, profile, { profile_completed: true, language, updated_at: now });
    await this.studentsRepository.save(student);
    this.logger.log(`👤 Profile completed for ${telegramId}`);
    return student;
  }

  async updateProfile(telegramId: number, changes: Partial<StudentProfile>): Promise<Result<{ student: Student }>> {
    const student = await this.studentsRepository.findByTelegramId(telegramId);
    if (!student) {
      return fail('Student not found');
    }
    Object.assign(student, changes, { updated_at: this.clock.now() });
    await this.studentsRepository.save(student);
    return ok({ student });
  }

  async setLanguage(telegramId: number, language: Language): Promise<void> {
    const student = await this.studentsRepository.findByTelegramId(telegramId);
    if (student && student.language !== language) {
      student.language = language;
      student.updated_at = this.clock.now();
      await this.studentsRepository.save(student);
    }
  }

  async getProfile(telegramId: number): Promise<Result<StudentProfileView>> {
    const student = await this.studentsRepository.findByTelegramId(telegramId);
    if (!student) {
      return fail('Student not found');
    }
    return ok({ student, courses: await this.getEnrollments(student) });
  }

  async getProfileById(studentId: string): Promise<Result<StudentProfileView>> {
    const student = await this.studentsRepository.findById(studentId);
    if (!student) {
      return fail('Student not found');
    }
    return ok({ student, courses: await this.getEnrollments(student) });
  }

  search(query: StudentSearch): Promise<Student[]> {
    return 'name' in query
      ? this.studentsRepository.searchByName(query.name)
      : this.studentsRepository.searchByPhone(query.phone);
  }

  async listPage(page: number, size: number): Promise<StudentPage> {
    const all = await this.studentsRepository.findAll();
    const totalPages = Math.max(1, Math.ceil(all.length / size));
    const current = Math.min(Math.max(page, 0), totalPages - 1);
    return {
      students: all.slice(current * size, (current + 1) * size),
      page: current,
      totalPages,
      total: all.length,
    };
  }

  private async getEnrollments(student: Student): Promise<CourseEnrollment[]> {
    const enrollments: CourseEnrollment[] = [];
    for (const registration of await this.registrationsRepository.findByStudent(student.id)) {
      const course = await this.coursesRepository.findById(registration.course_id);
      if (!course) {
        continue;
      }
      const payments = await this.paymentsRepository.findByRegistration(registration.id);
      const totalPaid = payments.reduce((sum, payment) => sum + payment.amount, 0);
      enrollments.push({
        course,
        registration,
        payments,
        total_paid: totalPaid,
        remaining: Math.max(0, course.price - totalPaid),
      });
    }
    return enrollments;
  }
}
