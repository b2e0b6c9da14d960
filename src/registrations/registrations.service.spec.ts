import { RegistrationsService } from './registrations.service';
import { PaymentsService } from './payments.service';
import { PaymentStatus, RegistrationStatus } from './registration.entity';
import { PaymentMethod } from './payment-record.entity';
import { Course, CourseStatus } from '../courses/course.entity';
import { Language, Student } from '../students/student.entity';
import {
  InMemoryCoursesRepository,
  InMemoryPaymentsRepository,
  InMemoryRegistrationsRepository,
  InMemoryStudentsRepository,
} from '../testing/in-memory-repositories';
import { FixedClock } from '../testing/test-config';

function course(overrides: Partial<Course> = {}): Course {
  return Object.assign(
    Course.create({
      name: 'Graphic Design',
      description: 'Photoshop and Illustrator',
      instructor: 'Maya',
      start_date: new Date('2024-06-01T00:00:00Z'),
      end_date: new Date('2024-07-01T00:00:00Z'),
      price: 100,
      max_students: 10,
    }),
    { status: CourseStatus.PUBLISHED },
    overrides,
  );
}

describe('RegistrationsService', () => {
  let registrations: InMemoryRegistrationsRepository;
  let students: InMemoryStudentsRepository;
  let courses: InMemoryCoursesRepository;
  let payments: InMemoryPaymentsRepository;
  let clock: FixedClock;
  let service: RegistrationsService;

  beforeEach(() => {
    registrations = new InMemoryRegistrationsRepository();
    students = new InMemoryStudentsRepository();
    courses = new InMemoryCoursesRepository();
    payments = new InMemoryPaymentsRepository();
    clock = new FixedClock(new Date('2024-05-10T09:00:00Z'));
    service = new RegistrationsService(registrations, students, courses, payments, clock);
  });

  describe('requestRegistration', () => {
    it('creates the student and a pending, unpaid registration', async () => {
      const design = await courses.save(course());

      const result = await service.requestRegistration(501, 'Nour Ali Hasan', '0944556677', design.id);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.registration).toMatchObject({
          status: RegistrationStatus.PENDING,
          payment_status: PaymentStatus.UNPAID,
          student_id: result.student.id,
        });
        expect(result.registration.registered_at.toISOString()).toBe('2024-05-10T09:00:00.000Z');
      }
      expect(students.items.size).toBe(1);
    });

    it('refreshes the name and phone of a known student', async () => {
      const design = await courses.save(course());
      await students.save(Student.create(501, 'Old Name Value', '0911111111'));

      await service.requestRegistration(501, 'Nour Ali Hasan', '0944556677', design.id);

      expect(await students.findByTelegramId(501)).toMatchObject({
        full_name: 'Nour Ali Hasan',
        phone_number: '0944556677',
      });
      expect(students.items.size).toBe(1);
    });

    it('rejects a second registration for the same course', async () => {
      const design = await courses.save(course());
      await service.requestRegistration(501, 'Nour Ali Hasan', '0944556677', design.id);

      await expect(service.requestRegistration(501, 'Nour Ali Hasan', '0944556677', design.id)).resolves.toEqual({
        success: false,
        error: 'Already registered for this course',
      });
      expect(registrations.items.size).toBe(1);
    });

    it('stops at the seat limit', async () => {
      const design = await courses.save(course({ max_students: 1 }));

      const first = await service.requestRegistration(501, 'Nour Ali Hasan', '0944556677', design.id);
      const second = await service.requestRegistration(502, 'Omar Zaid Saleh', '0955667788', design.id);

      expect(first.success).toBe(true);
      expect(second).toEqual({ success: false, error: 'Course is full' });
    });

    it('frees the seat of a rejected registration', async () => {
      const design = await courses.save(course({ max_students: 1 }));
      const first = await service.requestRegistration(501, 'Nour Ali Hasan', '0944556677', design.id);
      if (first.success) {
        await service.reject(first.registration.id, 1001);
      }

      const second = await service.requestRegistration(502, 'Omar Zaid Saleh', '0955667788', design.id);

      expect(second.success).toBe(true);
    });

    it('reports an unknown course', async () => {
      await expect(service.requestRegistration(501, 'Nour Ali Hasan', '0944556677', 'missing')).resolves.toEqual({
        success: false,
        error: 'Course not found',
      });
      expect(students.items.size).toBe(0);
    });
  });

  describe('registerStudent', () => {
    beforeEach(async () => {
      await students.save(
        Object.assign(Student.create(601, 'Lama Fadi Nasser', '0933221100', Language.AR), { profile_completed: true }),
      );
    });

    it('registers a student with a completed profile', async () => {
      const design = await courses.save(course());

      const result = await service.registerStudent(601, design.id);

      expect(result.success && result.registration.status).toBe(RegistrationStatus.PENDING);
    });

    it('refuses courses that are not open', async () => {
      const draft = await courses.save(course({ status: CourseStatus.DRAFT }));

      await expect(service.registerStudent(601, draft.id)).resolves.toEqual({
        success: false,
        error: 'Course is not available for registration',
      });
    });

    it('requires a completed profile', async () => {
      const design = await courses.save(course());

      await expect(service.registerStudent(999, design.id)).resolves.toEqual({
        success: false,
        error: 'Student profile is not complete',
      });
    });
  });

  describe('approve and reject', () => {
    let registrationId: string;

    beforeEach(async () => {
      const design = await courses.save(course());
      const result = await service.requestRegistration(501, 'Nour Ali Hasan', '0944556677', design.id);
      registrationId = result.success ? result.registration.id : '';
    });

    it('approves a pending registration', async () => {
      const result = await service.approve(registrationId, 1001, 'Paid deposit at desk');

      expect(result.success && result.registration).toMatchObject({
        status: RegistrationStatus.APPROVED,
        approved_by: 1001,
        notes: 'Paid deposit at desk',
      });
    });

    it('only decides pending registrations', async () => {
      await service.approve(registrationId, 1001);

      await expect(service.reject(registrationId, 1001)).resolves.toEqual({
        success: false,
        error: 'Registration is not pending (status: approved)',
      });
    });

    it('uses a default rejection note', async () => {
      const result = await service.reject(registrationId, 1002);

      expect(result.success && result.registration.notes).toBe('Rejected by admin');
    });

    it('reports a missing registration', async () => {
      await expect(service.approve('missing', 1001)).resolves.toEqual({
        success: false,
        error: 'Registration not found',
      });
    });

    it('lets the student cancel while pending', async () => {
      await expect(service.cancel(registrationId, 999)).resolves.toEqual({
        success: false,
        error: 'Registration not found',
      });

      const result = await service.cancel(registrationId, 501);

      expect(result.success && result.registration.status).toBe(RegistrationStatus.CANCELLED);
    });
  });

  it('joins pending registrations with student and course', async () => {
    const design = await courses.save(course());
    await service.requestRegistration(501, 'Nour Ali Hasan', '0944556677', design.id);

    const pending = await service.getPending();

    expect(pending).toHaveLength(1);
    expect(pending[0].student?.full_name).toBe('Nour Ali Hasan');
    expect(pending[0].course?.name).toBe('Graphic Design');
  });

  it('moves the payment status from unpaid to partial to paid', async () => {
    const design = await courses.save(course({ price: 100 }));
    const paymentsService = new PaymentsService(payments, registrations, courses, clock);
    const requested = await service.requestRegistration(501, 'Nour Ali Hasan', '0944556677', design.id);
    const registrationId = requested.success ? requested.registration.id : '';

    await expect(paymentsService.addPayment(registrationId, 40, PaymentMethod.CASH, 1001)).resolves.toEqual({
      success: false,
      error: 'Can only add payments to approved registrations',
    });

    await service.approve(registrationId, 1001);
    const first = await paymentsService.addPayment(registrationId, 40, PaymentMethod.CASH, 1001);
    expect(first.success && first.total_paid).toBe(40);
    expect((await registrations.findById(registrationId))?.payment_status).toBe(PaymentStatus.PARTIAL);

    const second = await paymentsService.addPayment(registrationId, 60, PaymentMethod.TRANSFER, 1001, 'Bank receipt');
    expect(second.success && second.remaining).toBe(0);
    expect((await registrations.findById(registrationId))?.payment_status).toBe(PaymentStatus.PAID);

    const students = await service.getCourseStudents(design.id);
    expect(students).toHaveLength(1);
    expect(students[0]).toMatchObject({ total_paid: 100, remaining: 0 });
    expect((await paymentsService.getPaymentHistory(registrationId)).map(payment => payment.amount)).toEqual([40, 60]);
  });
});
