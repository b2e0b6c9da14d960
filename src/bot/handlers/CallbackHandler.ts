import { Injectable, Logger } from '@nestjs/common';
import { ChatSession } from '../chat-session';
import { ParsedCallback, parseCallback } from '../callback-data';
import {
  AdminAction,
  CallbackPrefix,
  CourseCreationAction,
  CourseManagerAction,
  NavAction,
  NotifyAction,
  PaymentAction,
  ProfileAction,
  RegistrationAdminAction,
  StudentRegistrationAction,
  StudentViewAction,
  UploadSelectionAction,
} from '../constants';
import { MenuFlow } from '../flows/MenuFlow';
import { ProfileFlow } from '../flows/ProfileFlow';
import { ProfileEditFlow } from '../flows/ProfileEditFlow';
import { EnrollmentFlow } from '../flows/EnrollmentFlow';
import { AdminPanelFlow } from '../flows/AdminPanelFlow';
import { CourseManagerFlow } from '../flows/CourseManagerFlow';
import { RegistrationAdminFlow } from '../flows/RegistrationAdminFlow';
import { PaymentAdminFlow } from '../flows/PaymentAdminFlow';
import { StudentViewerFlow } from '../flows/StudentViewerFlow';
import { NotificationAdminFlow } from '../flows/NotificationAdminFlow';
import { POST_PLATFORM_CANCEL, PostingFlow } from '../flows/PostingFlow';
import { UploadFlow } from '../flows/UploadFlow';
import { LocalizationService } from '../../i18n/localization.service';
import { AdminAlertService } from '../../notifications/admin-alert.service';
import { PostPlatform } from '../../posts/scheduled-post.entity';
import { errorMessage } from '../../common/result';

const CALLBACK_ACTIONS: Record<CallbackPrefix, readonly string[]> = {
  [CallbackPrefix.NAV]: Object.values(NavAction),
  [CallbackPrefix.ADMIN]: Object.values(AdminAction),
  [CallbackPrefix.COURSE_MANAGER]: Object.values(CourseManagerAction),
  [CallbackPrefix.PAYMENT]: Object.values(PaymentAction),
  [CallbackPrefix.STUDENT_VIEW]: Object.values(StudentViewAction),
  [CallbackPrefix.REGISTRATION_ADMIN]: Object.values(RegistrationAdminAction),
  [CallbackPrefix.PROFILE]: Object.values(ProfileAction),
  [CallbackPrefix.STUDENT_REGISTRATION]: Object.values(StudentRegistrationAction),
  [CallbackPrefix.ADMIN_NOTIFY]: Object.values(NotifyAction),
  [CallbackPrefix.POST_PLATFORM]: [...Object.values(PostPlatform), POST_PLATFORM_CANCEL],
  [CallbackPrefix.COURSE_CREATION]: Object.values(CourseCreationAction),
  [CallbackPrefix.UPLOAD_SELECTION]: Object.values(UploadSelectionAction),
};

const STUDENT_PREFIXES: readonly CallbackPrefix[] = [
  CallbackPrefix.NAV,
  CallbackPrefix.PROFILE,
  CallbackPrefix.STUDENT_REGISTRATION,
];

@Injectable()
export class CallbackHandler {
  private readonly logger = new Logger(CallbackHandler.name);

  constructor(
    private readonly i18n: LocalizationService,
    private readonly adminAlert: AdminAlertService,
    private readonly menuFlow: MenuFlow,
    private readonly profileFlow: ProfileFlow,
    private readonly profileEditFlow: ProfileEditFlow,
    private readonly enrollmentFlow: EnrollmentFlow,
    private readonly adminPanelFlow: AdminPanelFlow,
    private readonly courseManagerFlow: CourseManagerFlow,
    private readonly registrationAdminFlow: RegistrationAdminFlow,
    private readonly paymentAdminFlow: PaymentAdminFlow,
    private readonly studentViewerFlow: StudentViewerFlow,
    private readonly notificationAdminFlow: NotificationAdminFlow,
    private readonly postingFlow: PostingFlow,
    private readonly uploadFlow: UploadFlow,
  ) {}

  async handle(session: ChatSession, data: string): Promise<void> {
    const callback = parseCallback(data, CALLBACK_ACTIONS);
    if (!callback) {
      this.logger.warn(`Unknown callback data "${data}" from ${session.userId}`);
      await session.answer();
      return;
    }

    if (!STUDENT_PREFIXES.includes(callback.prefix) && !this.adminAlert.isAdmin(session.userId)) {
      await session.answer(this.i18n.t('common.not_admin', session.language));
      return;
    }

    try {
      await this.route(session, callback);
      await session.answer();
    } catch (error) {
      this.logger.error(`Callback handling error (${data}): ${errorMessage(error)}`, error instanceof Error ? error.stack : undefined);
      await session.reply(this.i18n.t('common.error', session.language));
      throw error;
    }
  }

  private async route(session: ChatSession, { prefix, action, arg }: ParsedCallback): Promise<void> {
    switch (prefix) {
      case CallbackPrefix.NAV:
        return this.routeNav(session, action, arg);
      case CallbackPrefix.ADMIN:
        return this.routeAdmin(session, action);
      case CallbackPrefix.PROFILE:
        return this.routeProfile(session, action, arg);
      case CallbackPrefix.STUDENT_REGISTRATION:
        return this.routeStudentRegistration(session, action, arg);
      case CallbackPrefix.COURSE_MANAGER:
        return this.routeCourseManager(session, action, arg);
      case CallbackPrefix.PAYMENT:
        return this.routePayment(session, action, arg);
      case CallbackPrefix.STUDENT_VIEW:
        return this.routeStudentView(session, action, arg);
      case CallbackPrefix.REGISTRATION_ADMIN:
        return this.routeRegistrationAdmin(session, action, arg);
      case CallbackPrefix.ADMIN_NOTIFY:
        return this.routeNotify(session, action, arg);
      case CallbackPrefix.POST_PLATFORM:
        return this.postingFlow.selectPlatform(session, action);
      case CallbackPrefix.COURSE_CREATION:
        return action === CourseCreationAction.CONFIRM
          ? this.adminPanelFlow.confirmCourseCreation(session)
          : this.adminPanelFlow.cancelCourseCreation(session);
      case CallbackPrefix.UPLOAD_SELECTION:
        return action === UploadSelectionAction.TOGGLE ? this.uploadFlow.toggle(session, arg) : this.uploadFlow.done(session);
    }
  }

  private async routeNav(session: ChatSession, action: string, arg: string): Promise<void> {
    switch (action) {
      case NavAction.MAIN:
        return this.menuFlow.showMainMenu(session);
      case NavAction.HELP:
        return this.menuFlow.showHelp(session);
      case NavAction.LANGUAGE:
        return this.menuFlow.showLanguage(session);
      case NavAction.SET_LANGUAGE:
        return this.menuFlow.setLanguage(session, arg);
      case NavAction.NOTIFICATIONS:
        return this.menuFlow.setNotifications(session, arg);
      case NavAction.COURSES:
        return this.menuFlow.showCourses(session);
      case NavAction.COURSE:
        return this.menuFlow.showCourse(session, arg);
      case NavAction.REGISTER:
        return this.enrollmentFlow.chooseCourse(session);
      case NavAction.ENROLL:
        return this.enrollmentFlow.selectCourse(session, arg);
      case NavAction.MATERIALS:
        return this.menuFlow.showMaterials(session);
      case NavAction.MATERIAL:
        return this.menuFlow.showCourseMaterials(session, arg);
      case NavAction.MY_REGISTRATIONS:
        return this.menuFlow.showMyRegistrations(session);
    }
  }

  private async routeAdmin(session: ChatSession, action: string): Promise<void> {
    switch (action) {
      case AdminAction.PANEL:
        return this.adminPanelFlow.showPanel(session);
      case AdminAction.GUIDE:
        return this.adminPanelFlow.showGuide(session);
      case AdminAction.STATS:
        return this.adminPanelFlow.showStats(session);
      case AdminAction.CHECK_POSTS:
        return this.adminPanelFlow.checkPosts(session);
      case AdminAction.NEW_COURSE:
        return this.adminPanelFlow.startCourseCreation(session);
      case AdminAction.COURSES:
        return this.courseManagerFlow.listCourses(session);
      case AdminAction.REGISTRATIONS:
        return this.registrationAdminFlow.listPending(session);
      case AdminAction.PAYMENTS:
        return this.paymentAdminFlow.list(session, '');
      case AdminAction.STUDENTS:
        return this.studentViewerFlow.showMenu(session);
      case AdminAction.NOTIFY:
        return this.notificationAdminFlow.chooseType(session);
      case AdminAction.BROADCAST:
        return this.notificationAdminFlow.startBroadcast(session);
      case AdminAction.POST:
        return this.postingFlow.start(session);
      case AdminAction.UPLOAD:
        return this.uploadFlow.start(session);
    }
  }

  private async routeProfile(session: ChatSession, action: string, arg: string): Promise<void> {
    switch (action) {
      case ProfileAction.START:
        await session.answer();
        return this.profileFlow.start(session);
      case ProfileAction.GENDER:
        return this.profileFlow.selectGender(session, arg);
      case ProfileAction.EDUCATION:
        return this.profileFlow.selectEducation(session, arg);
      case ProfileAction.OTP_RESEND:
        return this.profileEditFlow.isEditing(session.userId)
          ? this.profileEditFlow.resendOtp(session)
          : this.profileFlow.resendOtp(session);
      case ProfileAction.OTP_CHANGE_PHONE:
        return this.profileEditFlow.isEditing(session.userId)
          ? this.profileEditFlow.changePhone(session)
          : this.profileFlow.changePhone(session);
      case ProfileAction.EDIT:
        return this.profileEditFlow.start(session, arg);
      case ProfileAction.EDIT_EDUCATION:
        return this.profileEditFlow.selectEducation(session, arg);
      case ProfileAction.CANCEL:
        return this.profileFlow.cancel(session);
      case ProfileAction.VIEW:
        this.profileEditFlow.leave(session.userId);
        return this.profileFlow.showProfile(session);
      case ProfileAction.CONFIRM: {
        const saved = await this.profileFlow.confirm(session);
        if (saved.courseId) {
          await this.enrollmentFlow.showConfirmation(session, saved.courseId);
        }
        return;
      }
    }
  }

  private async routeStudentRegistration(session: ChatSession, action: string, arg: string): Promise<void> {
    switch (action) {
      case StudentRegistrationAction.COURSE:
        return this.enrollmentFlow.selectCourse(session, arg);
      case StudentRegistrationAction.CONFIRM:
        return this.enrollmentFlow.confirm(session, arg);
      case StudentRegistrationAction.CANCEL:
        return arg ? this.enrollmentFlow.withdraw(session, arg) : this.enrollmentFlow.abort(session);
    }
  }

  private async routeCourseManager(session: ChatSession, action: string, arg: string): Promise<void> {
    switch (action) {
      case CourseManagerAction.VIEW:
        return this.courseManagerFlow.viewCourse(session, arg);
      case CourseManagerAction.EDIT:
        return this.courseManagerFlow.chooseField(session, arg);
      case CourseManagerAction.EDIT_FIELD:
        return this.courseManagerFlow.startFieldEdit(session, arg);
      case CourseManagerAction.STATUS:
        return this.courseManagerFlow.chooseStatus(session, arg);
      case CourseManagerAction.SET_STATUS:
        return this.courseManagerFlow.setStatus(session, arg);
      case CourseManagerAction.FILES:
        return this.courseManagerFlow.listFiles(session, arg);
      case CourseManagerAction.UPLOAD:
        return this.courseManagerFlow.startUpload(session, arg);
      case CourseManagerAction.DELETE_FILES:
        return this.courseManagerFlow.chooseFileToDelete(session, arg);
      case CourseManagerAction.DELETE_FILE:
        return this.courseManagerFlow.deleteFile(session, arg);
    }
  }

  private async routePayment(session: ChatSession, action: string, arg: string): Promise<void> {
    switch (action) {
      case PaymentAction.LIST:
        return this.paymentAdminFlow.list(session, arg);
      case PaymentAction.STUDENT:
        return this.paymentAdminFlow.showStudent(session, arg);
      case PaymentAction.ADD:
        return this.paymentAdminFlow.startPayment(session, arg);
      case PaymentAction.METHOD:
        return this.paymentAdminFlow.selectMethod(session, arg);
      case PaymentAction.HISTORY:
        return this.paymentAdminFlow.showHistory(session, arg);
      case PaymentAction.CANCEL:
        return this.paymentAdminFlow.cancel(session);
    }
  }

  private async routeStudentView(session: ChatSession, action: string, arg: string): Promise<void> {
    switch (action) {
      case StudentViewAction.ALL:
        return this.studentViewerFlow.showPage(session, 0);
      case StudentViewAction.PAGE:
        return this.studentViewerFlow.showPage(session, Number(arg) || 0);
      case StudentViewAction.VIEW:
        return this.studentViewerFlow.showStudent(session, arg);
      case StudentViewAction.SEARCH_NAME:
        return this.studentViewerFlow.startSearch(session, 'name');
      case StudentViewAction.SEARCH_PHONE:
        return this.studentViewerFlow.startSearch(session, 'phone');
      case StudentViewAction.COURSES:
        return this.studentViewerFlow.chooseCourse(session);
      case StudentViewAction.COURSE:
        return this.studentViewerFlow.showCourseStudents(session, arg);
    }
  }

  private async routeRegistrationAdmin(session: ChatSession, action: string, arg: string): Promise<void> {
    switch (action) {
      case RegistrationAdminAction.LIST:
        return this.registrationAdminFlow.listPending(session);
      case RegistrationAdminAction.VIEW:
        return this.registrationAdminFlow.viewRegistration(session, arg);
      case RegistrationAdminAction.APPROVE:
        return this.registrationAdminFlow.approve(session, arg);
      case RegistrationAdminAction.REJECT:
        return this.registrationAdminFlow.reject(session, arg);
    }
  }

  private async routeNotify(session: ChatSession, action: string, arg: string): Promise<void> {
    switch (action) {
      case NotifyAction.TYPE:
        return this.notificationAdminFlow.selectType(session, arg);
      case NotifyAction.RECIPIENTS:
        return this.notificationAdminFlow.selectRecipients(session, arg);
      case NotifyAction.SEND:
        return this.notificationAdminFlow.send(session);
      case NotifyAction.CANCEL:
        return this.notificationAdminFlow.cancel(session);
    }
  }
}
