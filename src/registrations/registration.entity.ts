import { Entity, ObjectIdColumn, Column, Index } from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import { v4 as uuidv4 } from 'uuid';

export enum RegistrationStatus {
  PENDING = 'pending',
  APPROVED = 'approved',
  REJECTED = 'rejected',
  CANCELLED = 'cancelled',
}

export enum PaymentStatus {
  UNPAID = 'unpaid',
  PARTIAL = 'partial',
  PAID = 'paid',
}

/** Statuses that hold a seat in the course. */
export const SEAT_HOLDING_STATUSES: readonly RegistrationStatus[] = [
  RegistrationStatus.PENDING,
  RegistrationStatus.APPROVED,
];

@Entity('registrations')
@Index(['student_id', 'course_id'], { unique: true })
export class Registration {
  @ApiProperty({ description: 'Unique identifier (uuid)' })
  @ObjectIdColumn()
  id!: string;

  @ApiProperty()
  @Column()
  student_id!: string;

  @ApiProperty()
  @Column()
  course_id!: string;

  @ApiProperty({ enum: RegistrationStatus })
  @Column()
  status!: RegistrationStatus;

  @ApiProperty({ enum: PaymentStatus })
  @Column()
  payment_status!: PaymentStatus;

  @ApiProperty()
  @Column()
  registered_at!: Date;

  @ApiProperty({ required: false })
  @Column({ nullable: true })
  approved_at?: Date;

  @ApiProperty({ description: 'Telegram id of the deciding admin', required: false })
  @Column({ nullable: true })
  approved_by?: number;

  @ApiProperty({ required: false })
  @Column({ nullable: true })
  notes?: string;

  static create(studentId: string, courseId: string, now: Date = new Date()): Registration {
    return Object.assign(new Registration(), {
      id: uuidv4(),
      student_id: studentId,
      course_id: courseId,
      status: RegistrationStatus.PENDING,
      payment_status: PaymentStatus.UNPAID,
      registered_at: now,
    });
  }
}

/**
 * Payment status derived from the paid total. A zero total keeps the
 * current status.
 */
export function derivePaymentStatus(totalPaid: number, price: number, current: PaymentStatus): PaymentStatus {
  if (totalPaid >= price && totalPaid > 0) {
    return PaymentStatus.PAID;
  }
  if (totalPaid > 0) {
    return PaymentStatus.PARTIAL;
  }
  return current;
}
