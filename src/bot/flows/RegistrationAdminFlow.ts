import { Injectable, Logger } from '@nestjs/common';
import { ChatSession } from '../chat-session';
import { callbackData } from '../callback-data';
import { CallbackPrefix, RegistrationAdminAction } from '../constants';
import { Row, adminHomeButton, backButton, button, keyboard } from '../keyboards';
import { DIVIDER, formatAmount, studentSummary } from '../formatting';
import { LocalizationService } from '../../i18n/localization.service';
import { RegistrationsService } from '../../registrations/registrations.service';
import { Registration, RegistrationStatus } from '../../registrations/registration.entity';
import { StudentsService } from '../../students/students.service';
import { CoursesService } from '../../courses/courses.service';
import { MessageSender } from '../../telegram/message-sender';
import { Clock } from '../../common/timezone';
import { errorMessage } from '../../common/result';

@Injectable()
export class RegistrationAdminFlow {
  private readonly logger = new Logger(RegistrationAdminFlow.name);

  constructor(
    private readonly i18n: LocalizationService,
    private readonly registrationsService: RegistrationsService,
    private readonly studentsService: StudentsService,
    private readonly coursesService: CoursesService,
    private readonly messageSender: MessageSender,
    private readonly clock: Clock,
  ) {}

  async listPending(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    const pending = await this.registrationsService.getPending();
    if (pending.length === 0) {
      await session.edit(t('admin.registrations.none'), keyboard([[adminHomeButton(t)]]));
      return;
    }

    const rows: Row[] = pending.map(({ registration, student, course }) => [
      button(
        `👤 ${student?.full_name ?? '?'} → ${course?.name ?? '?'}`,
        callbackData(CallbackPrefix.REGISTRATION_ADMIN, RegistrationAdminAction.VIEW, registration.id),
      ),
    ]);
    rows.push([adminHomeButton(t)]);
    await session.edit(t('admin.registrations.title', { count: pending.length }), keyboard(rows));
  }

  async viewRegistration(session: ChatSession, registrationId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const back = backButton(t, callbackData(CallbackPrefix.REGISTRATION_ADMIN, RegistrationAdminAction.LIST));
    const registration = await this.registrationsService.findById(registrationId);
    if (!registration) {
      await session.edit(t('admin.registrations.not_found'), keyboard([[back]]));
      return;
    }

    const [student, course] = await Promise.all([
      this.studentsService.findById(registration.student_id),
      this.coursesService.getCourseById(registration.course_id),
    ]);
    const lines = [
      t('admin.registrations.details'),
      DIVIDER,
      student ? studentSummary(student, t) : '👤 ?',
      '',
      `📚 ${course?.name ?? '?'}${course ? ` · ${formatAmount(course.price)}` : ''}`,
      `🕒 ${this.clock.format(registration.registered_at)}`,
      `${t(`status.registration.${registration.status}`)}`,
    ];

    const rows: Row[] = [];
    if (registration.status === RegistrationStatus.PENDING) {
      rows.push([
        button(t('admin.registrations.approve'), callbackData(CallbackPrefix.REGISTRATION_ADMIN, RegistrationAdminAction.APPROVE, registration.id)),
        button(t('admin.registrations.reject'), callbackData(CallbackPrefix.REGISTRATION_ADMIN, RegistrationAdminAction.REJECT, registration.id)),
      ]);
    }
    rows.push([back]);
    await session.edit(lines.join('\n'), keyboard(rows));
  }

  async approve(session: ChatSession, registrationId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const result = await this.registrationsService.approve(registrationId, session.userId);
    if (!result.success) {
      await session.answer(result.error);
      await this.viewRegistration(session, registrationId);
      return;
    }
    await session.answer(t('admin.registrations.approved'));
    await this.notifyStudent(result.registration, 'notifications.registration.approved');
    await this.listPending(session);
  }

  async reject(session: ChatSession, registrationId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const result = await this.registrationsService.reject(registrationId, session.userId);
    if (!result.success) {
      await session.answer(result.error);
      await this.viewRegistration(session, registrationId);
      return;
    }
    await session.answer(t('admin.registrations.rejected'));
    await this.notifyStudent(result.registration, 'notifications.registration.rejected');
    await this.listPending(session);
  }

  /** The decision stands even when the student cannot be reached. */
  private async notifyStudent(registration: Registration, key: string): Promise<void> {
    const [student, course] = await Promise.all([
      this.studentsService.findById(registration.student_id),
      this.coursesService.getCourseById(registration.course_id),
    ]);
    if (!student) {
      return;
    }
    try {
      await this.messageSender.sendMessage(
        student.telegram_id,
        this.i18n.t(key, student.language, { course: course?.name ?? '' }),
      );
    } catch (error) {
      this.logger.warn(`Could not notify ${student.telegram_id} about ${registration.id}: ${errorMessage(error)}`);
    }
  }
}
