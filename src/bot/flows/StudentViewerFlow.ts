import { Injectable } from '@nestjs/common';
import { ChatSession } from '../chat-session';
import { StateService } from '../state.service';
import { StateOf } from '../conversation-state';
import { callbackData } from '../callback-data';
import { AdminAction, CallbackPrefix, PaymentAction, STUDENTS_PER_PAGE, StudentViewAction } from '../constants';
import { Row, adminHomeButton, backButton, button, keyboard } from '../keyboards';
import { DIVIDER, formatAmount, registrationStatusLine, studentSummary } from '../formatting';
import { LocalizationService, Translate } from '../../i18n/localization.service';
import { StudentsService } from '../../students/students.service';
import { Student } from '../../students/student.entity';
import { RegistrationsService } from '../../registrations/registrations.service';
import { RegistrationStatus } from '../../registrations/registration.entity';
import { CoursesService } from '../../courses/courses.service';
import { Clock } from '../../common/timezone';

const MAX_SEARCH_RESULTS = 20;

@Injectable()
export class StudentViewerFlow {
  constructor(
    private readonly i18n: LocalizationService,
    private readonly studentsService: StudentsService,
    private readonly registrationsService: RegistrationsService,
    private readonly coursesService: CoursesService,
    private readonly stateService: StateService,
    private readonly clock: Clock,
  ) {}

  async showMenu(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    const view = (key: string, action: StudentViewAction) =>
      button(t(key), callbackData(CallbackPrefix.STUDENT_VIEW, action));
    await session.edit(
      t('admin.students.title'),
      keyboard([
        [view('admin.students.all', StudentViewAction.ALL), view('admin.students.by_course', StudentViewAction.COURSES)],
        [
          view('admin.students.search_name', StudentViewAction.SEARCH_NAME),
          view('admin.students.search_phone', StudentViewAction.SEARCH_PHONE),
        ],
        [adminHomeButton(t)],
      ]),
    );
  }

  async showPage(session: ChatSession, page: number): Promise<void> {
    const t = this.i18n.translator(session.language);
    const result = await this.studentsService.listPage(page, STUDENTS_PER_PAGE);
    const rows = this.studentRows(result.students);

    const pager: Row = [];
    if (result.page > 0) {
      pager.push(button('◀️', callbackData(CallbackPrefix.STUDENT_VIEW, StudentViewAction.PAGE, result.page - 1)));
    }
    if (result.page < result.totalPages - 1) {
      pager.push(button('▶️', callbackData(CallbackPrefix.STUDENT_VIEW, StudentViewAction.PAGE, result.page + 1)));
    }
    if (pager.length) {
      rows.push(pager);
    }
    rows.push([this.menuButton(t)]);

    await session.edit(
      t('admin.students.page', { page: result.page + 1, pages: result.totalPages, total: result.total }),
      keyboard(rows),
    );
  }

  async showStudent(session: ChatSession, studentId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const result = await this.studentsService.getProfileById(studentId);
    if (!result.success) {
      await session.edit(t('admin.students.not_found'), keyboard([[this.menuButton(t)]]));
      return;
    }

    const { student, courses } = result;
    const sections = [
      `${studentSummary(student, t)}\n🆔 ${student.telegram_id}\n🕒 ${this.clock.format(student.registered_at)}`,
    ];
    const rows: Row[] = [];
    for (const entry of courses) {
      sections.push(
        `📚 ${entry.course.name}\n${registrationStatusLine(entry.registration, t)}\n` +
          t('profile.paid_line', { paid: formatAmount(entry.total_paid), remaining: formatAmount(entry.remaining) }),
      );
      if (entry.registration.status === RegistrationStatus.APPROVED) {
        rows.push([
          button(
            `💰 ${entry.course.name}`,
            callbackData(CallbackPrefix.PAYMENT, PaymentAction.STUDENT, entry.registration.id),
          ),
        ]);
      }
    }
    if (!student.profile_completed) {
      sections.push(t('admin.students.incomplete'));
    }
    rows.push([this.menuButton(t)]);
    await session.edit(sections.join(`\n${DIVIDER}\n`), keyboard(rows));
  }

  async startSearch(session: ChatSession, by: 'name' | 'phone'): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.setUserState(session.userId, { kind: 'studentSearch', by });
    await session.edit(t(`admin.students.enter_${by}`), keyboard([[this.menuButton(t)]]));
  }

  async handleSearch(session: ChatSession, state: StateOf<'studentSearch'>, text: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const query = text.trim();
    if (!query) {
      await session.reply(t(`admin.students.enter_${state.by}`));
      return;
    }

    this.stateService.clearState(session.userId);
    const found = await this.studentsService.search(state.by === 'name' ? { name: query } : { phone: query });
    if (found.length === 0) {
      await session.reply(t('admin.students.no_results', { query }), keyboard([[this.menuButton(t)]]));
      return;
    }
    const rows = this.studentRows(found.slice(0, MAX_SEARCH_RESULTS));
    rows.push([this.menuButton(t)]);
    await session.reply(t('admin.students.results', { count: found.length }), keyboard(rows));
  }

  async chooseCourse(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    const courses = await this.coursesService.getCourses(false);
    const rows: Row[] = courses.map(course => [
      button(`📚 ${course.name}`, callbackData(CallbackPrefix.STUDENT_VIEW, StudentViewAction.COURSE, course.id)),
    ]);
    rows.push([this.menuButton(t)]);
    await session.edit(courses.length ? t('admin.students.choose_course') : t('courses.none'), keyboard(rows));
  }

  async showCourseStudents(session: ChatSession, courseId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const course = await this.coursesService.getCourseById(courseId);
    const back = backButton(t, callbackData(CallbackPrefix.STUDENT_VIEW, StudentViewAction.COURSES));
    if (!course) {
      await session.edit(t('courses.not_found'), keyboard([[back]]));
      return;
    }

    const students = await this.registrationsService.getCourseStudents(courseId);
    const lines = students.map(
      entry =>
        `• ${entry.student?.full_name ?? '?'} · ${registrationStatusLine(entry.registration, t)} · ` +
        `${formatAmount(entry.total_paid)}/${formatAmount(course.price)}`,
    );
    const rows: Row[] = students.flatMap(entry =>
      entry.student
        ? [[button(`👤 ${entry.student.full_name}`, callbackData(CallbackPrefix.STUDENT_VIEW, StudentViewAction.VIEW, entry.student.id))]]
        : [],
    );
    rows.push([back]);
    await session.edit(
      `📚 ${course.name}\n${DIVIDER}\n${lines.length ? lines.join('\n') : t('admin.students.none_in_course')}`,
      keyboard(rows),
    );
  }

  private studentRows(students: Student[]): Row[] {
    return students.map(student => [
      button(
        `${student.profile_completed ? '👤' : '⏳'} ${student.full_name}`,
        callbackData(CallbackPrefix.STUDENT_VIEW, StudentViewAction.VIEW, student.id),
      ),
    ]);
  }

  private menuButton(t: Translate) {
    return backButton(t, callbackData(CallbackPrefix.ADMIN, AdminAction.STUDENTS));
  }
}
