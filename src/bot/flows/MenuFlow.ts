import { Injectable } from '@nestjs/common';
import { ChatSession } from '../chat-session';
import { StateService } from '../state.service';
import { callbackData } from '../callback-data';
import { CallbackPrefix, NavAction, ProfileAction, StudentRegistrationAction } from '../constants';
import { Row, backButton, button, homeButton, keyboard, mainMenuKeyboard } from '../keyboards';
import { DIVIDER, courseCard, registrationStatusLine } from '../formatting';
import { LocalizationService } from '../../i18n/localization.service';
import { PreferencesService } from '../../preferences/preferences.service';
import { StudentsService } from '../../students/students.service';
import { Language } from '../../students/student.entity';
import { CoursesService } from '../../courses/courses.service';
import { MaterialsService } from '../../courses/materials.service';
import { RegistrationsService } from '../../registrations/registrations.service';
import { RegistrationStatus } from '../../registrations/registration.entity';
import { AdminAlertService } from '../../notifications/admin-alert.service';
import { Clock } from '../../common/timezone';

const LANGUAGES: readonly Language[] = [Language.AR, Language.EN];

function isLanguage(value: string): value is Language {
  return LANGUAGES.some(language => language === value);
}

@Injectable()
export class MenuFlow {
  constructor(
    private readonly i18n: LocalizationService,
    private readonly preferencesService: PreferencesService,
    private readonly studentsService: StudentsService,
    private readonly coursesService: CoursesService,
    private readonly materialsService: MaterialsService,
    private readonly registrationsService: RegistrationsService,
    private readonly adminAlert: AdminAlertService,
    private readonly stateService: StateService,
    private readonly clock: Clock,
  ) {}

  async start(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.clearState(session.userId);

    if (this.adminAlert.isAdmin(session.userId)) {
      await session.reply(t('menu.welcome_admin'), mainMenuKeyboard(t, true));
      return;
    }

    const student = await this.studentsService.findByTelegramId(session.userId);
    if (!student?.profile_completed) {
      await session.reply(
        t('menu.welcome_new'),
        keyboard([
          [button(t('profile.start_button'), callbackData(CallbackPrefix.PROFILE, ProfileAction.START))],
          [button(t('menu.language'), callbackData(CallbackPrefix.NAV, NavAction.LANGUAGE))],
        ]),
      );
      return;
    }

    await session.reply(t('menu.welcome_back', { name: student.full_name }), mainMenuKeyboard(t, false));
  }

  async showMainMenu(session: ChatSession, language = session.language): Promise<void> {
    const t = this.i18n.translator(language);
    await session.edit(t('menu.title'), mainMenuKeyboard(t, this.adminAlert.isAdmin(session.userId)));
  }

  async showHelp(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    const text = this.adminAlert.isAdmin(session.userId) ? `${t('help.text')}\n\n${t('help.admin')}` : t('help.text');
    await session.edit(text, keyboard([[homeButton(t)]]));
  }

  async showLanguage(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    const enabled = await this.preferencesService.notificationsEnabled(session.userId);
    await session.edit(
      t('language.choose'),
      keyboard([
        LANGUAGES.map(language =>
          button(t(`language.names.${language}`), callbackData(CallbackPrefix.NAV, NavAction.SET_LANGUAGE, language)),
        ),
        [
          button(
            t(enabled ? 'language.notifications_on' : 'language.notifications_off'),
            callbackData(CallbackPrefix.NAV, NavAction.NOTIFICATIONS, enabled ? 'off' : 'on'),
          ),
        ],
        [homeButton(t)],
      ]),
    );
  }

  async setLanguage(session: ChatSession, value: string): Promise<void> {
    if (!isLanguage(value)) {
      await session.answer();
      return;
    }
    await this.preferencesService.setLanguage(session.userId, value);
    await session.answer(this.i18n.t('language.changed', value));
    await this.showMainMenu(session, value);
  }

  /** `value` is `on` or `off`. */
  async setNotifications(session: ChatSession, value: string): Promise<void> {
    if (value !== 'on' && value !== 'off') {
      await session.answer();
      return;
    }
    const t = this.i18n.translator(session.language);
    const { notifications_enabled } = await this.preferencesService.setNotifications(session.userId, value === 'on');
    await session.answer(t(notifications_enabled ? 'language.notifications_enabled' : 'language.notifications_disabled'));
    await this.showLanguage(session);
  }

  async showCourses(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    const courses = await this.coursesService.getCourses();
    if (courses.length === 0) {
      await session.edit(t('courses.none'), keyboard([[homeButton(t)]]));
      return;
    }

    const rows: Row[] = courses.map(course => [
      button(`📚 ${course.name}`, callbackData(CallbackPrefix.NAV, NavAction.COURSE, course.id)),
    ]);
    rows.push([homeButton(t)]);
    await session.edit(t('courses.title', { count: courses.length }), keyboard(rows));
  }

  async showCourse(session: ChatSession, courseId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const course = await this.coursesService.getCourseById(courseId);
    if (!course) {
      await session.edit(t('courses.not_found'), keyboard([[homeButton(t)]]));
      return;
    }

    const rows: Row[] = [];
    if (course.isAvailable()) {
      rows.push([
        button(t('courses.register_button'), callbackData(CallbackPrefix.NAV, NavAction.ENROLL, course.id)),
      ]);
    }
    rows.push([backButton(t, callbackData(CallbackPrefix.NAV, NavAction.COURSES)), homeButton(t)]);
    await session.edit(courseCard(course, t, this.clock), keyboard(rows));
  }

  /** Courses the user may open materials for: every course for admins, approved ones for students. */
  async showMaterials(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    const courses = this.adminAlert.isAdmin(session.userId)
      ? await this.coursesService.getCourses(false)
      : (await this.registrationsService.getStudentRegistrations(session.userId))
          .filter(entry => entry.registration.status === RegistrationStatus.APPROVED)
          .flatMap(entry => (entry.course ? [entry.course] : []));

    if (courses.length === 0) {
      await session.edit(t('materials.none'), keyboard([[homeButton(t)]]));
      return;
    }

    const rows: Row[] = courses.map(course => [
      button(`📂 ${course.name}`, callbackData(CallbackPrefix.NAV, NavAction.MATERIAL, course.id)),
    ]);
    rows.push([homeButton(t)]);
    await session.edit(t('materials.choose_course'), keyboard(rows));
  }

  async showCourseMaterials(session: ChatSession, courseId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const back = keyboard([[backButton(t, callbackData(CallbackPrefix.NAV, NavAction.MATERIALS)), homeButton(t)]]);
    if (!(await this.canSeeMaterials(session.userId, courseId))) {
      await session.edit(t('materials.not_enrolled'), back);
      return;
    }

    const files = await this.materialsService.getMaterials(courseId);
    if (files.length === 0) {
      await session.edit(t('materials.empty'), back);
      return;
    }
    const list = files.map((file, index) => `${index + 1}. ${file.name}\n${file.webViewLink}`).join('\n\n');
    await session.edit(`${t('materials.title')}\n${DIVIDER}\n\n${list}`, back);
  }

  async showMyRegistrations(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    const registrations = await this.registrationsService.getStudentRegistrations(session.userId);
    if (registrations.length === 0) {
      await session.edit(
        t('registration.none'),
        keyboard([[button(t('menu.register'), callbackData(CallbackPrefix.NAV, NavAction.REGISTER))], [homeButton(t)]]),
      );
      return;
    }

    const lines: string[] = [];
    const rows: Row[] = [];
    for (const { registration, course } of registrations) {
      const name = course?.name ?? t('courses.unknown');
      lines.push(`📚 ${name}\n${registrationStatusLine(registration, t)}`);
      if (registration.status === RegistrationStatus.PENDING) {
        rows.push([
          button(
            t('registration.withdraw_button', { course: name }),
            callbackData(CallbackPrefix.STUDENT_REGISTRATION, StudentRegistrationAction.CANCEL, registration.id),
          ),
        ]);
      }
    }
    rows.push([homeButton(t)]);
    await session.edit(`${t('registration.my_title')}\n${DIVIDER}\n\n${lines.join('\n\n')}`, keyboard(rows));
  }

  private async canSeeMaterials(telegramId: number, courseId: string): Promise<boolean> {
    if (this.adminAlert.isAdmin(telegramId)) {
      return true;
    }
    const registrations = await this.registrationsService.getStudentRegistrations(telegramId);
    return registrations.some(
      entry => entry.registration.course_id === courseId && entry.registration.status === RegistrationStatus.APPROVED,
    );
  }
}
