import { StudentsService } from './students.service';
import { EducationLevel, Gender, Language, Student, StudentProfile } from './student.entity';
import { Course, CourseStatus } from '../courses/course.entity';
import { Registration, RegistrationStatus } from '../registrations/registration.entity';
import { PaymentMethod, PaymentRecord } from '../registrations/payment-record.entity';
import {
  InMemoryCoursesRepository,
  InMemoryPaymentsRepository,
  InMemoryRegistrationsRepository,
  InMemoryStudentsRepository,
} from '../testing/in-memory-repositories';
import { FixedClock } from '../testing/test-config';

const profile: StudentProfile = {
  full_name: 'Rami Adel Khoury',
  phone_number: '0912345678',
  phone_verified: true,
  gender: Gender.MALE,
  age: 24,
  residence: 'Latakia',
  education_level: EducationLevel.BACHELOR,
  specialization: 'Accounting',
};

describe('StudentsService', () => {
  let students: InMemoryStudentsRepository;
  let registrations: InMemoryRegistrationsRepository;
  let courses: InMemoryCoursesRepository;
  let payments: InMemoryPaymentsRepository;
  let service: StudentsService;

  beforeEach(() => {
    students = new InMemoryStudentsRepository();
    registrations = new InMemoryRegistrationsRepository();
    courses = new InMemoryCoursesRepository();
    payments = new InMemoryPaymentsRepository();
    service = new StudentsService(
      students,
      registrations,
      courses,
      payments,
      new FixedClock(new Date('2024-05-01T08:00:00Z')),
    );
  });

  it('creates a completed profile for a new student', async () => {
    const student = await service.completeProfile(77, profile, Language.EN);

    expect(student).toMatchObject({ telegram_id: 77, profile_completed: true, language: Language.EN, age: 24 });
    expect(await service.isProfileComplete(77)).toBe(true);
    expect(students.items.size).toBe(1);
  });

  it('completes the profile of a student who registered before', async () => {
    const existing = await students.save(Student.create(77, 'Old Name Here', '0999999999'));

    const student = await service.completeProfile(77, profile, Language.AR);

    expect(student.id).toBe(existing.id);
    expect(student.full_name).toBe('Rami Adel Khoury');
    expect(students.items.size).toBe(1);
  });

  it('reports a missing student', async () => {
    await expect(service.getProfile(5)).resolves.toEqual({ success: false, error: 'Student not found' });
    await expect(service.updateProfile(5, { age: 30 })).resolves.toEqual({
      success: false,
      error: 'Student not found',
    });
  });

  it('sums payments per course in the profile', async () => {
    const student = await service.completeProfile(77, profile, Language.AR);
    const course = await courses.save(
      Object.assign(
        Course.create({
          name: 'Excel',
          description: '',
          instructor: 'Lina',
          start_date: new Date('2024-06-01T00:00:00Z'),
          end_date: new Date('2024-07-01T00:00:00Z'),
          price: 100,
          max_students: 10,
        }),
        { status: CourseStatus.PUBLISHED },
      ),
    );
    const registration = await registrations.save(
      Object.assign(Registration.create(student.id, course.id), { status: RegistrationStatus.APPROVED }),
    );
    await payments.save(PaymentRecord.create(registration.id, 30, PaymentMethod.CASH, 1001));
    await payments.save(PaymentRecord.create(registration.id, 25, PaymentMethod.CARD, 1001));

    const result = await service.getProfile(77);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.courses).toHaveLength(1);
      expect(result.courses[0]).toMatchObject({ total_paid: 55, remaining: 45 });
      expect(result.courses[0].payments).toHaveLength(2);
    }
  });

  it('searches by name and phone', async () => {
    await service.completeProfile(1, profile, Language.AR);
    await service.completeProfile(2, { ...profile, full_name: 'Huda Nader Saleh', phone_number: '0933000111' }, Language.AR);

    expect((await service.search({ name: 'huda' })).map(student => student.telegram_id)).toEqual([2]);
    expect((await service.search({ phone: '0912' })).map(student => student.telegram_id)).toEqual([1]);
  });

  it('pages through students sorted by name', async () => {
    for (const [id, name] of [
      [1, 'Cyrine Bassel Haddad'],
      [2, 'Adam Omar Haddad'],
      [3, 'Bilal Fadi Haddad'],
    ] as const) {
      await service.completeProfile(id, { ...profile, full_name: name }, Language.AR);
    }

    const second = await service.listPage(1, 2);
    expect(second).toMatchObject({ page: 1, totalPages: 2, total: 3 });
    expect(second.students.map(student => student.full_name)).toEqual(['Cyrine Bassel Haddad']);
    expect((await service.listPage(9, 2)).page).toBe(1);
  });
});
