import { Injectable, Logger } from '@nestjs/common';
import { ChatSession } from '../chat-session';
import { StateService } from '../state.service';
import { StateOf } from '../conversation-state';
import { callbackData } from '../callback-data';
import { CallbackPrefix, NavAction, StudentRegistrationAction } from '../constants';
import { Row, backButton, button, homeButton, keyboard } from '../keyboards';
import { DIVIDER, formatAmount } from '../formatting';
import { ProfileFlow } from './ProfileFlow';
import { LocalizationService } from '../../i18n/localization.service';
import { StudentsService } from '../../students/students.service';
import { CoursesService } from '../../courses/courses.service';
import { RegistrationsService } from '../../registrations/registrations.service';
import { AdminAlertService } from '../../notifications/admin-alert.service';
import { formatPhoneDisplay, validateSyrianPhone } from '../../common/phone';

/** Service errors with a translated message of their own. */
const REGISTRATION_ERRORS: Record<string, string> = {
  'Already registered for this course': 'registration.errors.already_registered',
  'Course is full': 'registration.errors.full',
  'Course is not available for registration': 'registration.errors.unavailable',
  'Course not found': 'courses.not_found',
};

/** Student side of registering for a course. */
@Injectable()
export class EnrollmentFlow {
  private readonly logger = new Logger(EnrollmentFlow.name);

  constructor(
    private readonly i18n: LocalizationService,
    private readonly studentsService: StudentsService,
    private readonly coursesService: CoursesService,
    private readonly registrationsService: RegistrationsService,
    private readonly adminAlert: AdminAlertService,
    private readonly profileFlow: ProfileFlow,
    private readonly stateService: StateService,
  ) {}

  async chooseCourse(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    const courses = await this.coursesService.getCourses();
    if (courses.length === 0) {
      await session.edit(t('courses.none'), keyboard([[homeButton(t)]]));
      return;
    }

    const rows: Row[] = courses.map(course => [
      button(
        `📚 ${course.name} · ${formatAmount(course.price)}`,
        callbackData(CallbackPrefix.STUDENT_REGISTRATION, StudentRegistrationAction.COURSE, course.id),
      ),
    ]);
    rows.push([homeButton(t)]);
    await session.edit(t('registration.choose_course'), keyboard(rows));
  }

  /** Starts the profile first when it is not complete; registration resumes afterwards. */
  async selectCourse(session: ChatSession, courseId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    await session.answer();
    const course = await this.coursesService.getCourseById(courseId);
    if (!course?.isAvailable()) {
      await session.edit(t('registration.errors.unavailable'), keyboard([[homeButton(t)]]));
      return;
    }

    if (!(await this.studentsService.isProfileComplete(session.userId))) {
      await session.edit(t('registration.profile_first', { course: course.name }));
      await this.profileFlow.start(session, course.id);
      return;
    }
    await this.showConfirmation(session, course.id);
  }

  /** Shows the phone on file; typing another number replaces it before confirming. */
  async showConfirmation(session: ChatSession, courseId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const [course, student] = await Promise.all([
      this.coursesService.getCourseById(courseId),
      this.studentsService.findByTelegramId(session.userId),
    ]);
    if (!course || !student) {
      await session.reply(t('common.error'), keyboard([[homeButton(t)]]));
      return;
    }

    this.stateService.setUserState(session.userId, { kind: 'registration', courseId });
    await session.reply(
      `${t('registration.confirm_title')}\n${DIVIDER}\n` +
        `📚 ${course.name}\n💰 ${formatAmount(course.price)}\n👤 ${student.full_name}\n📱 ${formatPhoneDisplay(student.phone_number)}\n\n` +
        t('registration.confirm_phone'),
      keyboard([
        [
          button(t('common.confirm'), callbackData(CallbackPrefix.STUDENT_REGISTRATION, StudentRegistrationAction.CONFIRM, courseId)),
          button(t('common.cancel'), callbackData(CallbackPrefix.STUDENT_REGISTRATION, StudentRegistrationAction.CANCEL)),
        ],
      ]),
    );
  }

  async handlePhone(session: ChatSession, state: StateOf<'registration'>, text: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const phone = validateSyrianPhone(text);
    if (!phone.valid || !phone.normalized) {
      await session.reply(`❌ ${t('profile.errors.phone')}`);
      return;
    }
    await this.studentsService.updateProfile(session.userId, { phone_number: phone.normalized, phone_verified: false });
    await this.showConfirmation(session, state.courseId);
  }

  async confirm(session: ChatSession, courseId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    await session.answer();
    this.stateService.clearState(session.userId);

    const result = await this.registrationsService.registerStudent(session.userId, courseId);
    if (!result.success) {
      const key = REGISTRATION_ERRORS[result.error];
      await session.edit(key ? `❌ ${t(key)}` : `❌ ${result.error}`, keyboard([[homeButton(t)]]));
      return;
    }

    await session.edit(
      t('registration.submitted', { course: result.course.name }),
      keyboard([
        [button(t('menu.my_registrations'), callbackData(CallbackPrefix.NAV, NavAction.MY_REGISTRATIONS))],
        [homeButton(t)],
      ]),
    );
    await this.adminAlert.notifyAdmin(
      `🆕 New registration\n👤 ${result.student.full_name} (${result.student.phone_number})\n📚 ${result.course.name}`,
    );
  }

  async abort(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.clearState(session.userId);
    await session.answer();
    await session.edit(t('common.cancelled'), keyboard([[homeButton(t)]]));
  }

  async withdraw(session: ChatSession, registrationId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const result = await this.registrationsService.cancel(registrationId, session.userId);
    if (!result.success) {
      this.logger.warn(`Withdrawal of ${registrationId} by ${session.userId} refused: ${result.error}`);
      await session.answer(t('registration.withdraw_failed'));
      return;
    }
    await session.answer(t('registration.withdrawn'));
    await session.edit(
      t('registration.withdrawn'),
      keyboard([[backButton(t, callbackData(CallbackPrefix.NAV, NavAction.MY_REGISTRATIONS)), homeButton(t)]]),
    );
  }
}
