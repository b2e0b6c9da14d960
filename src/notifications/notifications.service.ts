import { Injectable, Logger } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { NotificationType, formatNotification } from './notification-format';
import { CoursesRepository } from '../courses/courses.repository';
import { Course } from '../courses/course.entity';
import { StudentsRepository } from '../students/students.repository';
import { Student } from '../students/student.entity';
import { RegistrationsRepository } from '../registrations/registrations.repository';
import { PaymentStatus, RegistrationStatus } from '../registrations/registration.entity';
import { PaymentsRepository } from '../registrations/payments.repository';
import { PreferencesRepository } from '../preferences/preferences.repository';
import { MessageSender } from '../telegram/message-sender';
import { LocalizationService } from '../i18n/localization.service';
import { Clock } from '../common/timezone';
import { errorMessage } from '../common/result';

export interface BroadcastResult {
  total_users: number;
  successful: number;
  failed: number;
}

export interface NotificationResult {
  success: boolean;
  sent_count: number;
  failed_count: number;
}

export type RecipientTarget =
  | { all: true }
  | { courseId: string; approvedOnly?: boolean }
  | { studentIds: string[] };

export interface UnpaidStudent {
  student: Student;
  total_paid: number;
  remaining: number;
}

export interface CourseReminder {
  course: Course;
  paid: Student[];
  unpaid: UnpaidStudent[];
}

interface ReminderMessage {
  student: Student;
  course: Course;
  type: NotificationType;
  key: string;
  remaining?: number;
}

const HOUR_MS = 60 * 60 * 1000;

@Injectable()
export class NotificationsService {
  private readonly logger = new Logger(NotificationsService.name);

  constructor(
    private readonly studentsRepository: StudentsRepository,
    private readonly preferencesRepository: PreferencesRepository,
    private readonly coursesRepository: CoursesRepository,
    private readonly registrationsRepository: RegistrationsRepository,
    private readonly paymentsRepository: PaymentsRepository,
    private readonly messageSender: MessageSender,
    private readonly localization: LocalizationService,
    private readonly clock: Clock,
  ) {}

  /** Plain message to every student who has not turned notifications off. */
  async broadcast(message: string): Promise<BroadcastResult> {
    const recipients: Student[] = [];
    for (const student of await this.studentsRepository.findAll()) {
      const preferences = await this.preferencesRepository.findByTelegramId(student.telegram_id);
      if (!preferences || preferences.notifications_enabled) {
        recipients.push(student);
      }
    }

    let successful = 0;
    for (const student of recipients) {
      if (await this.deliver(student.telegram_id, message, false)) {
        successful++;
      }
    }
    this.logger.log(`📣 Broadcast delivered to ${successful}/${recipients.length} students`);
    return { total_users: recipients.length, successful, failed: recipients.length - successful };
  }

  async getRecipients(target: RecipientTarget): Promise<Student[]> {
    if ('all' in target) {
      return this.studentsRepository.findAll();
    }
    if ('studentIds' in target) {
      return this.findStudents(target.studentIds);
    }
    const approvedOnly = target.approvedOnly ?? true;
    const registrations = (await this.registrationsRepository.findByCourse(target.courseId)).filter(
      registration => !approvedOnly || registration.status === RegistrationStatus.APPROVED,
    );
    return this.findStudents(registrations.map(registration => registration.student_id));
  }

  /** Formatted notification, each recipient in their own language. */
  async sendTargeted(type: NotificationType, content: string, recipients: Student[]): Promise<NotificationResult> {
    let sent = 0;
    for (const student of recipients) {
      if (await this.deliver(student.telegram_id, formatNotification(type, content, student.language), true)) {
        sent++;
      }
    }
    return { success: sent > 0, sent_count: sent, failed_count: recipients.length - sent };
  }

  /**
   * Available courses starting `hoursBefore` hours from now (give or take an
   * hour), with their approved students split by payment.
   */
  async getCoursesToRemind(hoursBefore = 24): Promise<CourseReminder[]> {
    const now = this.clock.now().getTime();
    const reminders: CourseReminder[] = [];

    for (const course of await this.coursesRepository.findAvailable()) {
      const hoursUntilStart = (course.start_date.getTime() - now) / HOUR_MS;
      if (hoursUntilStart < hoursBefore - 1 || hoursUntilStart > hoursBefore + 1) {
        continue;
      }

      const reminder: CourseReminder = { course, paid: [], unpaid: [] };
      for (const registration of await this.registrationsRepository.findByCourse(course.id)) {
        if (registration.status !== RegistrationStatus.APPROVED) {
          continue;
        }
        const student = await this.studentsRepository.findById(registration.student_id);
        if (!student) {
          continue;
        }
        if (registration.payment_status === PaymentStatus.PAID) {
          reminder.paid.push(student);
        } else {
          const totalPaid = await this.paymentsRepository.getTotalPaid(registration.id);
          reminder.unpaid.push({ student, total_paid: totalPaid, remaining: course.price - totalPaid });
        }
      }

      if (reminder.paid.length || reminder.unpaid.length) {
        reminders.push(reminder);
      }
    }
    return reminders;
  }

  @Cron('0 9 * * *', { name: 'course_reminders' })
  async sendCourseReminders(): Promise<NotificationResult> {
    this.logger.log('🔔 Sending course reminders...');
    const messages: ReminderMessage[] = [];
    for (const { course, paid, unpaid } of await this.getCoursesToRemind()) {
      paid.forEach(student =>
        messages.push({ student, course, type: NotificationType.REMINDER, key: 'notifications.reminder.starts_soon' }),
      );
      unpaid.forEach(({ student, remaining }) =>
        messages.push({
          student,
          course,
          remaining,
          type: NotificationType.WARNING,
          key: 'notifications.reminder.payment_due',
        }),
      );
    }

    let sent = 0;
    for (const { student, course, type, key, remaining } of messages) {
      const content = this.localization.t(key, student.language, {
        course: course.name,
        date: this.clock.format(course.start_date),
        remaining: remaining ?? 0,
      });
      if (await this.deliver(student.telegram_id, formatNotification(type, content, student.language), true)) {
        sent++;
      }
    }

    this.logger.log(`Course reminders completed: ${sent} sent, ${messages.length - sent} errors`);
    return { success: sent === messages.length, sent_count: sent, failed_count: messages.length - sent };
  }

  private async findStudents(ids: string[]): Promise<Student[]> {
    const students: Student[] = [];
    for (const id of ids) {
      const student = await this.studentsRepository.findById(id);
      if (student) {
        students.push(student);
      }
    }
    return students;
  }

  private async deliver(chatId: number, text: string, markdown: boolean): Promise<boolean> {
    try {
      await this.messageSender.sendMessage(chatId, text, { markdown });
      return true;
    } catch (error) {
      this.logger.error(`Failed to notify ${chatId}: ${errorMessage(error)}`);
      return false;
    }
  }
}
