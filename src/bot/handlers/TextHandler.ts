import { Injectable, Logger } from '@nestjs/common';
import { ChatSession } from '../chat-session';
import { StateService } from '../state.service';
import { homeButton, keyboard } from '../keyboards';
import { ProfileFlow } from '../flows/ProfileFlow';
import { ProfileEditFlow } from '../flows/ProfileEditFlow';
import { EnrollmentFlow } from '../flows/EnrollmentFlow';
import { AdminPanelFlow } from '../flows/AdminPanelFlow';
import { CourseManagerFlow } from '../flows/CourseManagerFlow';
import { PaymentAdminFlow } from '../flows/PaymentAdminFlow';
import { NotificationAdminFlow } from '../flows/NotificationAdminFlow';
import { StudentViewerFlow } from '../flows/StudentViewerFlow';
import { PostingFlow } from '../flows/PostingFlow';
import { LocalizationService } from '../../i18n/localization.service';
import { errorMessage } from '../../common/result';

/** Routes free text to whichever conversation the user is in. */
@Injectable()
export class TextHandler {
  private readonly logger = new Logger(TextHandler.name);

  constructor(
    private readonly i18n: LocalizationService,
    private readonly stateService: StateService,
    private readonly profileFlow: ProfileFlow,
    private readonly profileEditFlow: ProfileEditFlow,
    private readonly enrollmentFlow: EnrollmentFlow,
    private readonly adminPanelFlow: AdminPanelFlow,
    private readonly courseManagerFlow: CourseManagerFlow,
    private readonly paymentAdminFlow: PaymentAdminFlow,
    private readonly notificationAdminFlow: NotificationAdminFlow,
    private readonly studentViewerFlow: StudentViewerFlow,
    private readonly postingFlow: PostingFlow,
  ) {}

  async handle(session: ChatSession, text: string): Promise<void> {
    try {
      await this.route(session, text);
    } catch (error) {
      this.logger.error(`Text handling error for ${session.userId}: ${errorMessage(error)}`, error instanceof Error ? error.stack : undefined);
      await session.reply(this.i18n.t('common.error', session.language));
      throw error;
    }
  }

  private async route(session: ChatSession, text: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const state = this.stateService.getUserState(session.userId);

    switch (state?.kind) {
      case 'profile':
        return this.profileFlow.handleText(session, state, text);
      case 'profileEdit':
        return this.profileEditFlow.handleText(session, state, text);
      case 'registration':
        return this.enrollmentFlow.handlePhone(session, state, text);
      case 'courseCreation':
        return this.adminPanelFlow.handleCourseCreationText(session, state, text);
      case 'courseEdit':
        return this.courseManagerFlow.handleEditValue(session, state, text);
      case 'paymentAmount':
        return this.paymentAdminFlow.handleAmount(session, state, text);
      case 'notificationContent':
        return this.notificationAdminFlow.handleContent(session, state, text);
      case 'studentSearch':
        return this.studentViewerFlow.handleSearch(session, state, text);
      case 'broadcast':
        return this.notificationAdminFlow.handleBroadcast(session, text);
      case 'postContent':
        return this.postingFlow.handleContent(session, text);
      case 'postImage':
        return this.postingFlow.handleImageText(session, state, text);
      case 'postPlatform':
      case 'uploadSelection':
        await session.reply(t('common.use_buttons'));
        return;
      case 'uploadFile':
      case 'courseFileUpload':
        await session.reply(t('admin.upload.send_file'));
        return;
      case undefined:
        await session.reply(t('common.use_menu'), keyboard([[homeButton(t)]]));
        return;
    }
  }
}
