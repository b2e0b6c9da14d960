import { Global, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Course } from '../courses/course.entity';
import { Student } from '../students/student.entity';
import { Registration } from '../registrations/registration.entity';
import { PaymentRecord } from '../registrations/payment-record.entity';
import { ScheduledPost } from '../posts/scheduled-post.entity';
import { UserPreferences } from '../preferences/user-preferences.entity';
import { OtpCode } from '../otp/otp-code.entity';
import { CoursesRepository, MongoCoursesRepository } from '../courses/courses.repository';
import { MongoStudentsRepository, StudentsRepository } from '../students/students.repository';
import { MongoRegistrationsRepository, RegistrationsRepository } from '../registrations/registrations.repository';
import { MongoPaymentsRepository, PaymentsRepository } from '../registrations/payments.repository';
import { MongoScheduledPostsRepository, ScheduledPostsRepository } from '../posts/scheduled-posts.repository';
import { MongoPreferencesRepository, PreferencesRepository } from '../preferences/preferences.repository';
import { MongoOtpRepository, OtpRepository } from '../otp/otp.repository';

export const ENTITIES = [Course, Student, Registration, PaymentRecord, ScheduledPost, UserPreferences, OtpCode];

const REPOSITORIES = [
  { provide: CoursesRepository, useClass: MongoCoursesRepository },
  { provide: StudentsRepository, useClass: MongoStudentsRepository },
  { provide: RegistrationsRepository, useClass: MongoRegistrationsRepository },
  { provide: PaymentsRepository, useClass: MongoPaymentsRepository },
  { provide: ScheduledPostsRepository, useClass: MongoScheduledPostsRepository },
  { provide: PreferencesRepository, useClass: MongoPreferencesRepository },
  { provide: OtpRepository, useClass: MongoOtpRepository },
];

/** Collections shared by every feature module. */
@Global()
@Module({
  imports: [TypeOrmModule.forFeature(ENTITIES)],
  providers: REPOSITORIES,
  exports: REPOSITORIES.map(repository => repository.provide),
})
export class DatabaseModule {}
