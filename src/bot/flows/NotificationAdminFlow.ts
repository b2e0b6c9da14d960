import { Injectable, Logger } from '@nestjs/common';
import { ChatSession } from '../chat-session';
import { StateService } from '../state.service';
import { StateOf } from '../conversation-state';
import { callbackData } from '../callback-data';
import { CallbackPrefix, NotifyAction } from '../constants';
import { Row, adminHomeButton, button, keyboard } from '../keyboards';
import { DIVIDER } from '../formatting';
import { LocalizationService, Translate } from '../../i18n/localization.service';
import { NotificationsService } from '../../notifications/notifications.service';
import {
  NotificationType,
  formatNotification,
  isNotificationType,
  notificationEmoji,
} from '../../notifications/notification-format';
import { CoursesService } from '../../courses/courses.service';

const RECIPIENTS_ALL = 'all';
const RECIPIENTS_COURSE = 'course_';

/** Typed notifications to a chosen audience, and plain broadcasts to everyone. */
@Injectable()
export class NotificationAdminFlow {
  private readonly logger = new Logger(NotificationAdminFlow.name);

  constructor(
    private readonly i18n: LocalizationService,
    private readonly notificationsService: NotificationsService,
    private readonly coursesService: CoursesService,
    private readonly stateService: StateService,
  ) {}

  async chooseType(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.clearState(session.userId);
    const rows: Row[] = Object.values(NotificationType).map(type => [
      button(
        `${notificationEmoji(type)} ${t(`admin.notify.types.${type}`)}`,
        callbackData(CallbackPrefix.ADMIN_NOTIFY, NotifyAction.TYPE, type),
      ),
    ]);
    rows.push([adminHomeButton(t)]);
    await session.edit(t('admin.notify.choose_type'), keyboard(rows));
  }

  async selectType(session: ChatSession, value: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    if (!isNotificationType(value)) {
      await session.answer();
      return;
    }
    this.stateService.setUserState(session.userId, { kind: 'notificationContent', type: value });

    const courses = await this.coursesService.getCourses();
    const rows: Row[] = [
      [button(t('admin.notify.all_students'), callbackData(CallbackPrefix.ADMIN_NOTIFY, NotifyAction.RECIPIENTS, RECIPIENTS_ALL))],
      ...courses.map(course => [
        button(
          `📚 ${course.name}`,
          callbackData(CallbackPrefix.ADMIN_NOTIFY, NotifyAction.RECIPIENTS, `${RECIPIENTS_COURSE}${course.id}`),
        ),
      ]),
      [this.cancelButton(t)],
    ];
    await session.edit(t('admin.notify.choose_recipients'), keyboard(rows));
  }

  /** `value` is `all` or `course_<id>`. */
  async selectRecipients(session: ChatSession, value: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const state = this.stateService.getState(session.userId, 'notificationContent');
    if (!state) {
      await session.edit(t('admin.notify.expired'), keyboard([[adminHomeButton(t)]]));
      return;
    }

    const target =
      value === RECIPIENTS_ALL
        ? { all: true as const }
        : value.startsWith(RECIPIENTS_COURSE)
          ? { courseId: value.slice(RECIPIENTS_COURSE.length) }
          : null;
    if (!target) {
      await session.answer();
      return;
    }
    this.stateService.setUserState(session.userId, { ...state, target });
    await session.edit(t('admin.notify.enter_content'), keyboard([[this.cancelButton(t)]]));
  }

  async handleContent(session: ChatSession, state: StateOf<'notificationContent'>, text: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    if (!state.target) {
      await session.reply(t('common.use_buttons'));
      return;
    }
    const content = text.trim();
    if (!content) {
      await session.reply(t('admin.notify.enter_content'));
      return;
    }

    this.stateService.setUserState(session.userId, { ...state, content });
    const recipients = await this.notificationsService.getRecipients(state.target);
    await session.reply(
      `${t('admin.notify.preview', { count: recipients.length })}\n${DIVIDER}\n\n` +
        formatNotification(state.type, content, session.language),
      keyboard([
        [button(t('admin.notify.send'), callbackData(CallbackPrefix.ADMIN_NOTIFY, NotifyAction.SEND)), this.cancelButton(t)],
      ]),
    );
  }

  async send(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    const state = this.stateService.getState(session.userId, 'notificationContent');
    await session.answer();
    if (!state?.target || !state.content) {
      await session.edit(t('admin.notify.expired'), keyboard([[adminHomeButton(t)]]));
      return;
    }

    this.stateService.clearState(session.userId);
    const recipients = await this.notificationsService.getRecipients(state.target);
    if (recipients.length === 0) {
      await session.edit(t('admin.notify.no_recipients'), keyboard([[adminHomeButton(t)]]));
      return;
    }
    await session.edit(t('admin.notify.sending', { count: recipients.length }));
    const result = await this.notificationsService.sendTargeted(state.type, state.content, recipients);
    this.logger.log(`📣 ${state.type} notification: ${result.sent_count} sent, ${result.failed_count} failed`);
    await session.reply(
      t('admin.notify.result', { sent: result.sent_count, failed: result.failed_count }),
      keyboard([[adminHomeButton(t)]]),
    );
  }

  async cancel(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.clearState(session.userId);
    await session.answer();
    await session.edit(t('common.cancelled'), keyboard([[adminHomeButton(t)]]));
  }

  async startBroadcast(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.setUserState(session.userId, { kind: 'broadcast' });
    await session.edit(t('admin.broadcast.enter_message'));
  }

  async handleBroadcast(session: ChatSession, text: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const message = text.trim();
    if (!message) {
      await session.reply(t('admin.broadcast.enter_message'));
      return;
    }

    this.stateService.clearState(session.userId);
    await session.reply(t('admin.broadcast.sending'));
    const result = await this.notificationsService.broadcast(message);
    await session.reply(
      result.total_users === 0
        ? t('admin.broadcast.no_users')
        : t('admin.broadcast.success', { successful: result.successful, total: result.total_users }),
      keyboard([[adminHomeButton(t)]]),
    );
  }

  private cancelButton(t: Translate) {
    return button(t('common.cancel'), callbackData(CallbackPrefix.ADMIN_NOTIFY, NotifyAction.CANCEL));
  }
}
