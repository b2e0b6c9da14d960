import { DynamicModule, Module, Type } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { Test, TestingModule } from '@nestjs/testing';
import { Telegraf } from 'telegraf';
import { BotModule } from '../bot/bot.module';
import { StateService } from '../bot/state.service';
import { Clock } from '../common/timezone';
import { LocalizationService } from '../i18n/localization.service';
import { CoursesRepository } from '../courses/courses.repository';
import { StudentsRepository } from '../students/students.repository';
import { RegistrationsRepository } from '../registrations/registrations.repository';
import { PaymentsRepository } from '../registrations/payments.repository';
import { PreferencesRepository } from '../preferences/preferences.repository';
import { ScheduledPostsRepository } from '../posts/scheduled-posts.repository';
import { OtpRepository } from '../otp/otp.repository';
import { FileStorage } from '../integrations/google/google-drive.adapter';
import { PostSource } from '../integrations/google/google-sheets.adapter';
import { SocialPublisher } from '../integrations/meta/meta-graph.adapter';
import { OtpSender } from '../integrations/whatsapp/whatsapp.adapter';
import { MessageSender } from '../telegram/message-sender';
import { FileDownloader } from '../telegram/file-downloader';
import { TELEGRAF_BOT } from '../telegram/telegram.constants';
import { Course, CourseStatus, NewCourse } from '../courses/course.entity';
import { Language, Student } from '../students/student.entity';
import {
  InMemoryCoursesRepository,
  InMemoryOtpRepository,
  InMemoryPaymentsRepository,
  InMemoryPreferencesRepository,
  InMemoryRegistrationsRepository,
  InMemoryScheduledPostsRepository,
  InMemoryStudentsRepository,
} from './in-memory-repositories';
import { FakeFileStorage, FakeMessageSender, FakeOtpSender, FakePostSource, FakeSocialPublisher } from './fakes';
import { FakeFileDownloader } from './fake-session';
import { FixedClock, createTestConfig } from './test-config';

export const ADMIN_ID = 1001;
export const STUDENT_ID = 2001;
export const HARNESS_NOW = new Date('2024-05-10T09:00:00Z');

export interface BotFixtures {
  clock: FixedClock;
  courses: InMemoryCoursesRepository;
  students: InMemoryStudentsRepository;
  registrations: InMemoryRegistrationsRepository;
  payments: InMemoryPaymentsRepository;
  preferences: InMemoryPreferencesRepository;
  scheduledPosts: InMemoryScheduledPostsRepository;
  otp: InMemoryOtpRepository;
  fileStorage: FakeFileStorage;
  postSource: FakePostSource;
  socialPublisher: FakeSocialPublisher;
  otpSender: FakeOtpSender;
  messageSender: FakeMessageSender;
  fileDownloader: FakeFileDownloader;
}

export interface BotHarness extends BotFixtures {
  moduleRef: TestingModule;
  state: StateService;
  get<T>(type: Type<T>): T;
  addCourse(overrides?: Partial<NewCourse> & { status?: CourseStatus }): Promise<Course>;
  addStudent(telegramId: number, overrides?: Partial<Student>): Promise<Student>;
}

/** Stands in for the database, Google, Meta, WhatsApp and Telegram modules. */
@Module({})
class TestInfrastructureModule {
  static register(fixtures: BotFixtures): DynamicModule {
    const providers = [
      { provide: ConfigService, useValue: createTestConfig() },
      { provide: Clock, useValue: fixtures.clock },
      LocalizationService,
      { provide: CoursesRepository, useValue: fixtures.courses },
      { provide: StudentsRepository, useValue: fixtures.students },
      { provide: RegistrationsRepository, useValue: fixtures.registrations },
      { provide: PaymentsRepository, useValue: fixtures.payments },
      { provide: PreferencesRepository, useValue: fixtures.preferences },
      { provide: ScheduledPostsRepository, useValue: fixtures.scheduledPosts },
      { provide: OtpRepository, useValue: fixtures.otp },
      { provide: FileStorage, useValue: fixtures.fileStorage },
      { provide: PostSource, useValue: fixtures.postSource },
      { provide: SocialPublisher, useValue: fixtures.socialPublisher },
      { provide: OtpSender, useValue: fixtures.otpSender },
      { provide: MessageSender, useValue: fixtures.messageSender },
      { provide: FileDownloader, useValue: fixtures.fileDownloader },
      { provide: TELEGRAF_BOT, useValue: new Telegraf('test-token') },
    ];
    return {
      module: TestInfrastructureModule,
      global: true,
      providers,
      exports: [
        ConfigService,
        Clock,
        LocalizationService,
        CoursesRepository,
        StudentsRepository,
        RegistrationsRepository,
        PaymentsRepository,
        PreferencesRepository,
        ScheduledPostsRepository,
        OtpRepository,
        FileStorage,
        PostSource,
        SocialPublisher,
        OtpSender,
        MessageSender,
        FileDownloader,
        TELEGRAF_BOT,
      ],
    };
  }
}

/**
 * The real bot module over in-memory repositories and fake integrations.
 * Lifecycle hooks are not run, so the bot never launches.
 */
export async function createBotHarness(): Promise<BotHarness> {
  const clock = new FixedClock(HARNESS_NOW);
  const fixtures: BotFixtures = {
    clock,
    courses: new InMemoryCoursesRepository(),
    students: new InMemoryStudentsRepository(),
    registrations: new InMemoryRegistrationsRepository(),
    payments: new InMemoryPaymentsRepository(),
    preferences: new InMemoryPreferencesRepository(),
    scheduledPosts: new InMemoryScheduledPostsRepository(),
    otp: new InMemoryOtpRepository(),
    fileStorage: new FakeFileStorage(),
    postSource: new FakePostSource(),
    socialPublisher: new FakeSocialPublisher(),
    otpSender: new FakeOtpSender(),
    messageSender: new FakeMessageSender(),
    fileDownloader: new FakeFileDownloader(),
  };

  const moduleRef = await Test.createTestingModule({
    imports: [ScheduleModule.forRoot(), TestInfrastructureModule.register(fixtures), BotModule],
  }).compile();

  return {
    ...fixtures,
    moduleRef,
    state: moduleRef.get(StateService),
    get: type => moduleRef.get(type),
    async addCourse(overrides = {}) {
      const { status = CourseStatus.PUBLISHED, ...data } = overrides;
      const course = Course.create(
        {
          name: 'Web Basics',
          description: 'HTML and CSS from scratch',
          instructor: 'Sami Haddad',
          start_date: new Date('2024-06-01T00:00:00Z'),
          end_date: new Date('2024-07-01T00:00:00Z'),
          price: 150000,
          max_students: 10,
          ...data,
        },
        clock.now(),
      );
      course.status = status;
      return fixtures.courses.save(course);
    },
    async addStudent(telegramId, overrides = {}) {
      const student = Object.assign(
        Student.create(telegramId, 'Lina Omar Khalil', '0912345678', Language.EN, clock.now()),
        { profile_completed: true },
        overrides,
      );
      return fixtures.students.save(student);
    },
  };
}
