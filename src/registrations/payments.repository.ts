import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { MongoRepository } from 'typeorm';
import { compareAsc } from 'date-fns';
import { PaymentRecord } from './payment-record.entity';
import { toDocument } from '../database/documents';

export abstract class PaymentsRepository {
  abstract findById(id: string): Promise<PaymentRecord | null>;
  /** Oldest payment first. */
  abstract findByRegistration(registrationId: string): Promise<PaymentRecord[]>;
  abstract save(payment: PaymentRecord): Promise<PaymentRecord>;
  abstract getTotalPaid(registrationId: string): Promise<number>;
  /** Sum over every payment record. */
  abstract getTotalCollected(): Promise<number>;
  abstract delete(id: string): Promise<boolean>;
}

export const byPaidAt = (a: PaymentRecord, b: PaymentRecord) => compareAsc(a.paid_at, b.paid_at);

interface TotalRow {
  total: number;
}

@Injectable()
export class MongoPaymentsRepository extends PaymentsRepository {
  constructor(
    @InjectRepository(PaymentRecord)
    private readonly repository: MongoRepository<PaymentRecord>,
  ) {
    super();
  }

  findById(id: string): Promise<PaymentRecord | null> {
    return this.repository.findOneBy({ _id: id });
  }

  async findByRegistration(registrationId: string): Promise<PaymentRecord[]> {
    const payments = await this.repository.findBy({ registration_id: registrationId });
    return payments.sort(byPaidAt);
  }

  async save(payment: PaymentRecord): Promise<PaymentRecord> {
    await this.repository.replaceOne({ _id: payment.id }, toDocument(payment, 'id'), { upsert: true });
    return payment;
  }

  getTotalPaid(registrationId: string): Promise<number> {
    return this.sum({ registration_id: registrationId });
  }

  getTotalCollected(): Promise<number> {
    return this.sum({});
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.repository.deleteOne({ _id: id });
    return result.deletedCount > 0;
  }

  private async sum(match: Record<string, unknown>): Promise<number> {
    const [row] = await this.repository
      .aggregate<TotalRow>([{ $match: match }, { $group: { _id: null, total: { $sum: '$amount' } } }])
      .toArray();
    return row?.total ?? 0;
  }
}
