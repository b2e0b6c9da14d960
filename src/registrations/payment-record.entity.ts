import { Entity, ObjectIdColumn, Column, Index } from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import { v4 as uuidv4 } from 'uuid';

export enum PaymentMethod {
  CASH = 'cash',
  TRANSFER = 'transfer',
  CARD = 'card',
}

@Entity('payment_records')
export class PaymentRecord {
  @ApiProperty({ description: 'Unique identifier (uuid)' })
  @ObjectIdColumn()
  id!: string;

  @ApiProperty()
  @Index()
  @Column()
  registration_id!: string;

  @ApiProperty({ example: 50000 })
  @Column()
  amount!: number;

  @ApiProperty()
  @Column()
  paid_at!: Date;

  @ApiProperty({ enum: PaymentMethod })
  @Column()
  method!: PaymentMethod;

  @ApiProperty({ description: 'Telegram id of the admin who took the payment' })
  @Column()
  received_by!: number;

  @ApiProperty({ required: false })
  @Column({ nullable: true })
  notes?: string;

  static create(
    registrationId: string,
    amount: number,
    method: PaymentMethod,
    receivedBy: number,
    notes?: string,
    now: Date = new Date(),
  ): PaymentRecord {
    return Object.assign(new PaymentRecord(), {
      id: uuidv4(),
      registration_id: registrationId,
      amount,
      paid_at: now,
      method,
      received_by: receivedBy,
      notes,
    });
  }
}
