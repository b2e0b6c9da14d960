import { Entity, ObjectIdColumn, Column, Index } from 'typeorm';

/**
 * One phone verification per telegram user. The code stops being accepted at
 * `expires_at`; mongod drops the document, send count included, at
 * `send_window_expires_at`.
 */
@Entity('otp_codes')
export class OtpCode {
  @ObjectIdColumn()
  telegram_id!: number;

  @Column()
  code!: string;

  @Column()
  phone!: string;

  @Column({ default: 0 })
  attempts!: number;

  @Column({ default: 0 })
  resend_count!: number;

  @Column({ default: false })
  verified!: boolean;

  @Column()
  expires_at!: Date;

  @Index({ expireAfterSeconds: 0 })
  @Column()
  send_window_expires_at!: Date;
}
