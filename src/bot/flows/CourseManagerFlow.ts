import { Injectable, Logger } from '@nestjs/common';
import { ChatSession } from '../chat-session';
import { StateService } from '../state.service';
import { StateOf } from '../conversation-state';
import { callbackData, splitArg } from '../callback-data';
import { AdminAction, CallbackPrefix, CourseManagerAction, StudentViewAction } from '../constants';
import { Row, adminHomeButton, backButton, button, keyboard } from '../keyboards';
import { DIVIDER, courseCard } from '../formatting';
import { LocalizationService, Translate } from '../../i18n/localization.service';
import { CoursesService, EDITABLE_COURSE_FIELDS } from '../../courses/courses.service';
import { MaterialsService, UploadedFile } from '../../courses/materials.service';
import { Course, CourseStatus } from '../../courses/course.entity';
import { RegistrationsService } from '../../registrations/registrations.service';
import { RegistrationStatus } from '../../registrations/registration.entity';
import { Clock } from '../../common/timezone';

const COURSE_STATUSES: readonly CourseStatus[] = Object.values(CourseStatus);

const isCourseStatus = (value: string): value is CourseStatus => COURSE_STATUSES.some(status => status === value);

/** Admin view of one course: edit fields, change status, manage its Drive files. */
@Injectable()
export class CourseManagerFlow {
  private readonly logger = new Logger(CourseManagerFlow.name);

  constructor(
    private readonly i18n: LocalizationService,
    private readonly coursesService: CoursesService,
    private readonly materialsService: MaterialsService,
    private readonly registrationsService: RegistrationsService,
    private readonly stateService: StateService,
    private readonly clock: Clock,
  ) {}

  async listCourses(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    const courses = await this.coursesService.getCourses(false);
    const rows: Row[] = courses.map(course => [
      button(
        `${statusEmoji(course.status)} ${course.name}`,
        callbackData(CallbackPrefix.COURSE_MANAGER, CourseManagerAction.VIEW, course.id),
      ),
    ]);
    rows.push([
      button(t('admin.panel.new_course'), callbackData(CallbackPrefix.ADMIN, AdminAction.NEW_COURSE)),
      adminHomeButton(t),
    ]);
    await session.edit(courses.length ? t('admin.courses.title') : t('courses.none'), keyboard(rows));
  }

  async viewCourse(session: ChatSession, courseId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const course = await this.findCourse(session, courseId, t);
    if (!course) {
      return;
    }

    const students = await this.registrationsService.getCourseStudents(course.id);
    const count = (status: RegistrationStatus) =>
      students.filter(entry => entry.registration.status === status).length;
    const action = (key: string, manager: CourseManagerAction) =>
      button(t(key), callbackData(CallbackPrefix.COURSE_MANAGER, manager, course.id));

    await session.edit(
      [
        courseCard(course, t, this.clock),
        `${t('admin.courses.status')}: ${t(`status.course.${course.status}`)}`,
        t('admin.courses.seats', {
          approved: count(RegistrationStatus.APPROVED),
          pending: count(RegistrationStatus.PENDING),
          max: course.max_students,
        }),
      ].join('\n'),
      keyboard([
        [action('admin.courses.edit', CourseManagerAction.EDIT), action('admin.courses.change_status', CourseManagerAction.STATUS)],
        [action('admin.courses.files', CourseManagerAction.FILES), action('admin.courses.upload', CourseManagerAction.UPLOAD)],
        [button(t('admin.courses.students'), callbackData(CallbackPrefix.STUDENT_VIEW, StudentViewAction.COURSE, course.id))],
        [backButton(t, callbackData(CallbackPrefix.ADMIN, AdminAction.COURSES))],
      ]),
    );
  }

  async chooseField(session: ChatSession, courseId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const rows: Row[] = EDITABLE_COURSE_FIELDS.map((field, index) => [
      button(t(`course.fields.${field}`), callbackData(CallbackPrefix.COURSE_MANAGER, CourseManagerAction.EDIT_FIELD, courseId, index)),
    ]);
    rows.push([backButton(t, callbackData(CallbackPrefix.COURSE_MANAGER, CourseManagerAction.VIEW, courseId))]);
    await session.edit(t('admin.courses.choose_field'), keyboard(rows));
  }

  /** `arg` is `<courseId>_<field index>`. */
  async startFieldEdit(session: ChatSession, arg: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const [courseId, index] = splitArg(arg);
    const field = EDITABLE_COURSE_FIELDS[Number(index)];
    const course = await this.findCourse(session, courseId, t);
    if (!course || !field) {
      return;
    }

    this.stateService.setUserState(session.userId, { kind: 'courseEdit', courseId, field });
    const current = course[field];
    const shown = current instanceof Date ? this.clock.format(current, false) : current ?? '-';
    await session.edit(
      t('admin.courses.enter_value', { field: t(`course.fields.${field}`), current: String(shown) }),
      keyboard([[backButton(t, callbackData(CallbackPrefix.COURSE_MANAGER, CourseManagerAction.VIEW, courseId))]]),
    );
  }

  async handleEditValue(session: ChatSession, state: StateOf<'courseEdit'>, text: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const result = await this.coursesService.updateCourse(state.courseId, state.field, text);
    if (!result.success) {
      await session.reply(`❌ ${result.error}`);
      return;
    }
    this.stateService.clearState(session.userId);
    await session.reply(
      t('admin.courses.updated'),
      keyboard([[button(t('admin.courses.open'), callbackData(CallbackPrefix.COURSE_MANAGER, CourseManagerAction.VIEW, state.courseId))]]),
    );
  }

  async chooseStatus(session: ChatSession, courseId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const rows: Row[] = COURSE_STATUSES.map(status => [
      button(
        `${statusEmoji(status)} ${t(`status.course.${status}`)}`,
        callbackData(CallbackPrefix.COURSE_MANAGER, CourseManagerAction.SET_STATUS, courseId, status),
      ),
    ]);
    rows.push([backButton(t, callbackData(CallbackPrefix.COURSE_MANAGER, CourseManagerAction.VIEW, courseId))]);
    await session.edit(t('admin.courses.choose_status'), keyboard(rows));
  }

  /** `arg` is `<courseId>_<status>`. */
  async setStatus(session: ChatSession, arg: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const [courseId, status] = splitArg(arg);
    if (!isCourseStatus(status)) {
      await session.answer();
      return;
    }
    const result = await this.coursesService.changeStatus(courseId, status);
    await session.answer(result.success ? t('admin.courses.status_changed') : result.error);
    await this.viewCourse(session, courseId);
  }

  async listFiles(session: ChatSession, courseId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const files = await this.materialsService.getMaterials(courseId);
    const back = backButton(t, callbackData(CallbackPrefix.COURSE_MANAGER, CourseManagerAction.VIEW, courseId));
    if (files.length === 0) {
      await session.edit(t('materials.empty'), keyboard([[back]]));
      return;
    }

    const list = files.map((file, index) => `${index + 1}. ${file.name}\n${file.webViewLink}`).join('\n\n');
    await session.edit(
      `${t('materials.title')}\n${DIVIDER}\n\n${list}`,
      keyboard([
        [button(t('admin.courses.delete_files'), callbackData(CallbackPrefix.COURSE_MANAGER, CourseManagerAction.DELETE_FILES, courseId))],
        [back],
      ]),
    );
  }

  async chooseFileToDelete(session: ChatSession, courseId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const files = await this.materialsService.getMaterials(courseId);
    const rows: Row[] = files.map((file, index) => [
      button(`🗑 ${file.name}`, callbackData(CallbackPrefix.COURSE_MANAGER, CourseManagerAction.DELETE_FILE, courseId, index)),
    ]);
    rows.push([backButton(t, callbackData(CallbackPrefix.COURSE_MANAGER, CourseManagerAction.FILES, courseId))]);
    await session.edit(t('admin.courses.choose_file'), keyboard(rows));
  }

  /**
   * `arg` is `<courseId>_<file index>`; Drive ids are too long for callback
   * data, so the folder is listed again.
   */
  async deleteFile(session: ChatSession, arg: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const [courseId, index] = splitArg(arg);
    const file = (await this.materialsService.getMaterials(courseId))[Number(index)];
    if (!file) {
      await session.answer(t('admin.courses.file_missing'));
      await this.listFiles(session, courseId);
      return;
    }

    const result = await this.materialsService.deleteMaterial(file.id);
    await session.answer(result.success ? t('admin.courses.file_deleted', { name: file.name }) : result.error);
    if (result.success) {
      this.logger.log(`🗑 ${file.name} removed from course ${courseId}`);
    }
    await this.listFiles(session, courseId);
  }

  async startUpload(session: ChatSession, courseId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.setUserState(session.userId, { kind: 'courseFileUpload', courseId });
    await session.edit(
      t('admin.upload.send_file'),
      keyboard([[backButton(t, callbackData(CallbackPrefix.COURSE_MANAGER, CourseManagerAction.VIEW, courseId))]]),
    );
  }

  async handleDocument(session: ChatSession, state: StateOf<'courseFileUpload'>, file: UploadedFile): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.clearState(session.userId);
    const result = await this.materialsService.uploadToCourses(file, [state.courseId]);
    const open = keyboard([
      [button(t('admin.courses.open'), callbackData(CallbackPrefix.COURSE_MANAGER, CourseManagerAction.VIEW, state.courseId))],
    ]);
    if (!result.success) {
      await session.reply(`❌ ${t('admin.upload.failed')}\n${result.error}`, open);
      return;
    }
    await session.reply(`${t('admin.upload.done', { name: file.fileName })}\n${result.links.join('\n')}`, open);
  }

  private async findCourse(session: ChatSession, courseId: string, t: Translate): Promise<Course | null> {
    const course = await this.coursesService.getCourseById(courseId);
    if (!course) {
      await session.edit(t('courses.not_found'), keyboard([[adminHomeButton(t)]]));
    }
    return course;
  }
}

function statusEmoji(status: CourseStatus): string {
  switch (status) {
    case CourseStatus.DRAFT:
      return '📝';
    case CourseStatus.PUBLISHED:
      return '🟢';
    case CourseStatus.ONGOING:
      return '▶️';
    case CourseStatus.COMPLETED:
      return '🏁';
    case CourseStatus.CANCELLED:
      return '⛔';
  }
}
