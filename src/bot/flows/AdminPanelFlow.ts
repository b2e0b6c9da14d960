import { Injectable, Logger } from '@nestjs/common';
import { ChatSession } from '../chat-session';
import { StateService } from '../state.service';
import { COURSE_CREATION_STEPS, CourseCreationStep, CourseDraft, StateOf } from '../conversation-state';
import { callbackData } from '../callback-data';
import { CallbackPrefix, CourseCreationAction, CourseManagerAction } from '../constants';
import { adminHomeButton, adminPanelKeyboard, button, keyboard } from '../keyboards';
import { DIVIDER, formatAmount } from '../formatting';
import { LocalizationService, Translate } from '../../i18n/localization.service';
import { StatisticsService } from '../../statistics/statistics.service';
import { PostSchedulerService } from '../../posts/post-scheduler.service';
import { CoursesService } from '../../courses/courses.service';
import { NewCourse } from '../../courses/course.entity';
import { Clock } from '../../common/timezone';
import { errorMessage } from '../../common/result';

type CourseCreationState = StateOf<'courseCreation'>;

/** Typed value parsed into the draft, or the key of the error to show. */
type StepOutcome = { draft: CourseDraft } | { errorKey: string };

const SKIP = '-';

@Injectable()
export class AdminPanelFlow {
  private readonly logger = new Logger(AdminPanelFlow.name);

  constructor(
    private readonly i18n: LocalizationService,
    private readonly statisticsService: StatisticsService,
    private readonly postScheduler: PostSchedulerService,
    private readonly coursesService: CoursesService,
    private readonly stateService: StateService,
    private readonly clock: Clock,
  ) {}

  async showPanel(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.clearState(session.userId);
    await session.edit(t('admin.panel.title'), adminPanelKeyboard(t));
  }

  async showGuide(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    await session.edit(t('admin.guide'), keyboard([[adminHomeButton(t)]]));
  }

  async showStats(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    const stats = await this.statisticsService.getAdminStatistics();
    await session.edit(
      [
        t('admin.stats.title'),
        DIVIDER,
        t('admin.stats.courses', { total: stats.totalCourses, available: stats.availableCourses }),
        t('admin.stats.students', { total: stats.totalStudents, completed: stats.completedProfiles }),
        t('admin.stats.pending', { count: stats.pendingRegistrations }),
        t('admin.stats.approved', { count: stats.approvedRegistrations }),
        t('admin.stats.collected', { amount: formatAmount(stats.totalCollected) }),
      ].join('\n'),
      keyboard([[adminHomeButton(t)]]),
    );
  }

  async checkPosts(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    await session.answer(t('admin.posts.checking'));
    const published = await this.postScheduler.triggerNow();
    await session.reply(t('admin.posts.checked', { count: published }), keyboard([[adminHomeButton(t)]]));
  }

  async startCourseCreation(session: ChatSession): Promise<void> {
    const state: CourseCreationState = { kind: 'courseCreation', step: 'name', draft: {} };
    this.stateService.setUserState(session.userId, state);
    await session.answer();
    await this.promptStep(session, state);
  }

  async handleCourseCreationText(session: ChatSession, state: CourseCreationState, text: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    if (state.step === 'confirm') {
      await session.reply(t('common.use_buttons'));
      return;
    }

    const outcome = this.applyStep(state.step, text.trim(), state.draft);
    if ('errorKey' in outcome) {
      await session.reply(`❌ ${t(outcome.errorKey)}`);
      return;
    }

    const next: CourseCreationState = {
      ...state,
      step: COURSE_CREATION_STEPS[COURSE_CREATION_STEPS.indexOf(state.step) + 1],
      draft: outcome.draft,
    };
    this.stateService.setUserState(session.userId, next);
    await this.promptStep(session, next);
  }

  async confirmCourseCreation(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    const state = this.stateService.getState(session.userId, 'courseCreation');
    await session.answer();
    const data = state ? toNewCourse(state.draft) : null;
    if (!data) {
      await session.edit(t('admin.newcourse.expired'), keyboard([[adminHomeButton(t)]]));
      return;
    }

    this.stateService.clearState(session.userId);
    const result = await this.coursesService.createCourse(data);
    if (!result.success) {
      await session.edit(`❌ ${result.error}`, keyboard([[adminHomeButton(t)]]));
      return;
    }

    this.logger.log(`📚 Course "${result.course.name}" created by ${session.userId}`);
    const folderNote = result.course.materials_folder_id ? '' : `\n\n${t('admin.newcourse.no_folder')}`;
    await session.edit(
      t('admin.newcourse.created', { name: result.course.name }) + folderNote,
      keyboard([
        [button(t('admin.courses.open'), callbackData(CallbackPrefix.COURSE_MANAGER, CourseManagerAction.VIEW, result.course.id))],
        [adminHomeButton(t)],
      ]),
    );
  }

  async cancelCourseCreation(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.clearState(session.userId);
    await session.answer();
    await session.edit(t('common.cancelled'), keyboard([[adminHomeButton(t)]]));
  }

  private applyStep(step: Exclude<CourseCreationStep, 'confirm'>, value: string, draft: CourseDraft): StepOutcome {
    switch (step) {
      case 'name':
        return value.length >= 2 ? { draft: { ...draft, name: value } } : { errorKey: 'admin.newcourse.errors.name' };
      case 'description':
        return value ? { draft: { ...draft, description: value } } : { errorKey: 'admin.newcourse.errors.required' };
      case 'instructor':
        return value ? { draft: { ...draft, instructor: value } } : { errorKey: 'admin.newcourse.errors.required' };
      case 'start_date':
      case 'end_date': {
        const date = this.parseDay(value);
        if (!date) {
          return { errorKey: 'admin.newcourse.errors.date' };
        }
        if (step === 'end_date' && draft.start_date && date.getTime() <= draft.start_date.getTime()) {
          return { errorKey: 'admin.newcourse.errors.end_before_start' };
        }
        return { draft: step === 'start_date' ? { ...draft, start_date: date } : { ...draft, end_date: date } };
      }
      case 'price': {
        const price = Number(value);
        return value && Number.isFinite(price) && price >= 0
          ? { draft: { ...draft, price } }
          : { errorKey: 'admin.newcourse.errors.price' };
      }
      case 'max_students': {
        const max = Number(value);
        return Number.isInteger(max) && max >= 1
          ? { draft: { ...draft, max_students: max } }
          : { errorKey: 'admin.newcourse.errors.max_students' };
      }
      case 'target_audience':
        return { draft: { ...draft, target_audience: value === SKIP || !value ? undefined : value } };
      case 'duration_hours': {
        if (value === SKIP || !value) {
          return { draft: { ...draft, duration_hours: undefined } };
        }
        const hours = Number(value);
        return Number.isInteger(hours) && hours >= 1
          ? { draft: { ...draft, duration_hours: hours } }
          : { errorKey: 'admin.newcourse.errors.duration' };
      }
    }
  }

  private parseDay(value: string): Date | null {
    try {
      return this.clock.parseDay(value);
    } catch (error) {
      this.logger.debug(`Rejected course date: ${errorMessage(error)}`);
      return null;
    }
  }

  private async promptStep(session: ChatSession, state: CourseCreationState): Promise<void> {
    const t = this.i18n.translator(session.language);
    const cancel = button(t('common.cancel'), callbackData(CallbackPrefix.COURSE_CREATION, CourseCreationAction.CANCEL));
    const number = COURSE_CREATION_STEPS.indexOf(state.step) + 1;
    const header = t('admin.newcourse.step_header', { current: number, total: COURSE_CREATION_STEPS.length });

    if (state.step !== 'confirm') {
      await session.reply(`${header}\n\n${t(`admin.newcourse.steps.${state.step}`)}`, keyboard([[cancel]]));
      return;
    }
    await session.reply(
      `${header}\n\n${t('admin.newcourse.steps.confirm')}\n${DIVIDER}\n${this.draftSummary(state.draft, t)}`,
      keyboard([
        [button(t('common.confirm'), callbackData(CallbackPrefix.COURSE_CREATION, CourseCreationAction.CONFIRM)), cancel],
      ]),
    );
  }

  private draftSummary(draft: CourseDraft, t: Translate): string {
    const day = (value: Date | undefined) => (value ? this.clock.format(value, false) : '-');
    return [
      `${t('course.fields.name')}: ${draft.name ?? '-'}`,
      `${t('course.fields.description')}: ${draft.description ?? '-'}`,
      `${t('course.fields.instructor')}: ${draft.instructor ?? '-'}`,
      `${t('course.fields.start_date')}: ${day(draft.start_date)}`,
      `${t('course.fields.end_date')}: ${day(draft.end_date)}`,
      `${t('course.fields.price')}: ${draft.price === undefined ? '-' : formatAmount(draft.price)}`,
      `${t('course.fields.max_students')}: ${draft.max_students ?? '-'}`,
      `${t('course.fields.target_audience')}: ${draft.target_audience ?? '-'}`,
      `${t('course.fields.duration_hours')}: ${draft.duration_hours ?? '-'}`,
    ].join('\n');
  }
}

function toNewCourse(draft: CourseDraft): NewCourse | null {
  const { name, description, instructor, start_date, end_date, price, max_students } = draft;
  if (
    name === undefined ||
    description === undefined ||
    instructor === undefined ||
    start_date === undefined ||
    end_date === undefined ||
    price === undefined ||
    max_students === undefined
  ) {
    return null;
  }
  return {
    name,
    description,
    instructor,
    start_date,
    end_date,
    price,
    max_students,
    target_audience: draft.target_audience,
    duration_hours: draft.duration_hours,
  };
}
