import { Injectable, Logger } from '@nestjs/common';
import { PaymentMethod, PaymentRecord } from './payment-record.entity';
import { RegistrationStatus, derivePaymentStatus } from './registration.entity';
import { RegistrationsRepository } from './registrations.repository';
import { PaymentsRepository } from './payments.repository';
import { CoursesRepository } from '../courses/courses.repository';
import { Clock } from '../common/timezone';
import { Result, fail, ok } from '../common/result';

export type PaymentResult = Result<{ payment: PaymentRecord; total_paid: number; remaining: number }>;

@Injectable()
export class PaymentsService {
  private readonly logger = new Logger(PaymentsService.name);

  constructor(
    private readonly paymentsRepository: PaymentsRepository,
    private readonly registrationsRepository: RegistrationsRepository,
    private readonly coursesRepository: CoursesRepository,
    private readonly clock: Clock,
  ) {}

  /** Records a payment and recomputes the registration's payment status from the new total. */
  async addPayment(
    registrationId: string,
    amount: number,
    method: PaymentMethod,
    adminId: number,
    notes?: string,
  ): Promise<PaymentResult> {
    if (!Number.isFinite(amount) || amount <= 0) {
      return fail('Amount must be greater than zero');
    }

    const registration = await this.registrationsRepository.findById(registrationId);
    if (!registration) {
      return fail('Registration not found');
    }
    if (registration.status !== RegistrationStatus.APPROVED) {
      return fail('Can only add payments to approved registrations');
    }
    const course = await this.coursesRepository.findById(registration.course_id);
    if (!course) {
      return fail('Course not found');
    }

    const payment = PaymentRecord.create(registrationId, amount, method, adminId, notes, this.clock.now());
    await this.paymentsRepository.save(payment);

    const totalPaid = await this.paymentsRepository.getTotalPaid(registrationId);
    registration.payment_status = derivePaymentStatus(totalPaid, course.price, registration.payment_status);
    await this.registrationsRepository.save(registration);

    this.logger.log(`💰 ${amount} received for registration ${registrationId} (total ${totalPaid}/${course.price})`);
    return ok({ payment, total_paid: totalPaid, remaining: Math.max(0, course.price - totalPaid) });
  }

  getPaymentHistory(registrationId: string): Promise<PaymentRecord[]> {
    return this.paymentsRepository.findByRegistration(registrationId);
  }

  getTotalCollected(): Promise<number> {
    return this.paymentsRepository.getTotalCollected();
  }
}
