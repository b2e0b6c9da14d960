import { BadRequestException, NotFoundException } from '@nestjs/common';
import { HTTP_ADMIN_ID, RegistrationsController } from './registrations.controller';
import { RegistrationsService } from './registrations.service';
import { PaymentsService } from './payments.service';
import { PaymentStatus, Registration, RegistrationStatus } from './registration.entity';
import { PaymentMethod } from './payment-record.entity';
import { Course, CourseStatus } from '../courses/course.entity';
import {
  InMemoryCoursesRepository,
  InMemoryPaymentsRepository,
  InMemoryRegistrationsRepository,
  InMemoryStudentsRepository,
} from '../testing/in-memory-repositories';
import { FixedClock } from '../testing/test-config';

describe('RegistrationsController', () => {
  let registrations: InMemoryRegistrationsRepository;
  let students: InMemoryStudentsRepository;
  let courses: InMemoryCoursesRepository;
  let controller: RegistrationsController;
  let course: Course;

  beforeEach(async () => {
    registrations = new InMemoryRegistrationsRepository();
    students = new InMemoryStudentsRepository();
    courses = new InMemoryCoursesRepository();
    const payments = new InMemoryPaymentsRepository();
    const clock = new FixedClock(new Date('2024-05-10T09:00:00Z'));
    controller = new RegistrationsController(
      new RegistrationsService(registrations, students, courses, payments, clock),
      new PaymentsService(payments, registrations, courses, clock),
    );
    course = await courses.save(
      Object.assign(
        Course.create({
          name: 'Graphic Design',
          description: 'Photoshop and Illustrator',
          instructor: 'Maya Nasser',
          start_date: new Date('2024-06-01T00:00:00Z'),
          end_date: new Date('2024-07-01T00:00:00Z'),
          price: 100000,
          max_students: 10,
        }),
        { status: CourseStatus.PUBLISHED },
      ),
    );
  });

  const request = (overrides: Partial<{ telegram_id: number; full_name: string; phone_number: string; course_id: string }> = {}) => ({
    telegram_id: 555,
    full_name: 'Sara Ahmad Khalil',
    phone_number: '+963 991 234 567',
    course_id: course.id,
    ...overrides,
  });

  describe('create', () => {
    it('opens a pending registration with a normalized phone', async () => {
      const registration = await controller.create(request());

      expect(registration.status).toBe(RegistrationStatus.PENDING);
      expect(await students.findByTelegramId(555)).toMatchObject({
        full_name: 'Sara Ahmad Khalil',
        phone_number: '0991234567',
      });
    });

    it('validates the request body', async () => {
      await expect(controller.create(request({ telegram_id: -5 }))).rejects.toThrow(
        new BadRequestException('telegram_id must be a positive integer'),
      );
      await expect(controller.create(request({ full_name: 'Sara' }))).rejects.toThrow(BadRequestException);
      await expect(controller.create(request({ phone_number: '12345' }))).rejects.toThrow(
        'Phone number must look like 09XXXXXXXX',
      );
      await expect(controller.create(request({ course_id: '' }))).rejects.toThrow('course_id is required');
    });

    it('maps a missing course to 404 and a duplicate to 400', async () => {
      await expect(controller.create(request({ course_id: 'missing' }))).rejects.toThrow(NotFoundException);

      await controller.create(request());
      await expect(controller.create(request())).rejects.toThrow(
        new BadRequestException('Already registered for this course'),
      );
    });
  });

  describe('decisions', () => {
    it('approves as the HTTP admin', async () => {
      const created = await controller.create(request());

      const approved = await controller.approve(created.id, { notes: '  paid at desk  ' });

      expect(approved).toMatchObject({
        status: RegistrationStatus.APPROVED,
        approved_by: HTTP_ADMIN_ID,
        notes: 'paid at desk',
      });
    });

    it('maps unknown and already decided registrations', async () => {
      const created = await controller.create(request());
      await controller.reject(created.id, {});

      await expect(controller.approve('missing', {})).rejects.toThrow(NotFoundException);
      await expect(controller.approve(created.id, {})).rejects.toThrow(
        new BadRequestException('Registration is not pending (status: rejected)'),
      );
    });
  });

  describe('payments', () => {
    let registration: Registration;

    beforeEach(async () => {
      registration = await controller.create(request());
      await controller.approve(registration.id, {});
    });

    it('records a payment and returns the totals', async () => {
      const result = await controller.addPayment(registration.id, { amount: 40000, payment_method: PaymentMethod.TRANSFER });

      expect(result).toMatchObject({ total_paid: 40000, remaining: 60000 });
      expect(result.payment).toMatchObject({ amount: 40000, method: PaymentMethod.TRANSFER, received_by: HTTP_ADMIN_ID });
      expect(registration.payment_status).toBe(PaymentStatus.PARTIAL);
      expect(await controller.getPayments(registration.id)).toEqual([result.payment]);
    });

    it('rejects invalid amounts and unknown registrations', async () => {
      await expect(controller.addPayment(registration.id, { amount: 0, payment_method: PaymentMethod.CASH })).rejects.toThrow(
        'amount must be greater than zero',
      );
      await expect(controller.addPayment('missing', { amount: 10, payment_method: PaymentMethod.CASH })).rejects.toThrow(
        NotFoundException,
      );
      await expect(controller.getPayments('missing')).rejects.toThrow(NotFoundException);
    });
  });
});
