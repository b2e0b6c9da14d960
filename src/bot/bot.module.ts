import { Module } from '@nestjs/common';
import { BotService } from './bot.service';
import { StateService } from './state.service';
import { TextHandler } from './handlers/TextHandler';
import { CallbackHandler } from './handlers/CallbackHandler';
import { DocumentHandler } from './handlers/DocumentHandler';
import { MenuFlow } from './flows/MenuFlow';
import { ProfileFlow } from './flows/ProfileFlow';
import { ProfileEditFlow } from './flows/ProfileEditFlow';
import { EnrollmentFlow } from './flows/EnrollmentFlow';
import { AdminPanelFlow } from './flows/AdminPanelFlow';
import { CourseManagerFlow } from './flows/CourseManagerFlow';
import { RegistrationAdminFlow } from './flows/RegistrationAdminFlow';
import { PaymentAdminFlow } from './flows/PaymentAdminFlow';
import { StudentViewerFlow } from './flows/StudentViewerFlow';
import { NotificationAdminFlow } from './flows/NotificationAdminFlow';
import { PostingFlow } from './flows/PostingFlow';
import { UploadFlow } from './flows/UploadFlow';
import { CoursesModule } from '../courses/courses.module';
import { StudentsModule } from '../students/students.module';
import { RegistrationsModule } from '../registrations/registrations.module';
import { PreferencesModule } from '../preferences/preferences.module';
import { OtpModule } from '../otp/otp.module';
import { NotificationsModule } from '../notifications/notifications.module';
import { PostsModule } from '../posts/posts.module';
import { StatisticsModule } from '../statistics/statistics.module';

@Module({
  imports: [
    CoursesModule,
    StudentsModule,
    RegistrationsModule,
    PreferencesModule,
    OtpModule,
    NotificationsModule,
    PostsModule,
    StatisticsModule,
  ],
  providers: [
    BotService,
    StateService,
    TextHandler,
    CallbackHandler,
    DocumentHandler,
    MenuFlow,
    ProfileFlow,
    ProfileEditFlow,
    EnrollmentFlow,
    AdminPanelFlow,
    CourseManagerFlow,
    RegistrationAdminFlow,
    PaymentAdminFlow,
    StudentViewerFlow,
    NotificationAdminFlow,
    PostingFlow,
    UploadFlow,
  ],
})
export class BotModule {}
