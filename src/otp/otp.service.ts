import { Injectable, Logger } from '@nestjs/common';
import { randomInt } from 'crypto';
import { addMinutes } from 'date-fns';
import { OtpCode } from './otp-code.entity';
import { OtpRepository } from './otp.repository';
import { OtpSender } from '../integrations/whatsapp/whatsapp.adapter';
import { Clock } from '../common/timezone';

export const OTP_LENGTH = 6;
export const OTP_TTL_MINUTES = 5;
export const OTP_MAX_ATTEMPTS = 3;
export const OTP_MAX_SENDS = 3;
/** Sends are counted from the first one in this window. */
export const OTP_SEND_WINDOW_MINUTES = 60;

export type OtpSendResult =
  | { success: true; maskedPhone: string }
  | { success: false; reason: 'disabled' | 'resend_limit' | 'send_failed' };

export type OtpVerifyResult =
  | { success: true; phone: string }
  | { success: false; reason: 'not_sent' | 'expired' | 'too_many_attempts' }
  | { success: false; reason: 'wrong_code'; remainingAttempts: number };

export function maskPhone(phone: string): string {
  return `${phone.slice(0, 4)}****${phone.slice(-3)}`;
}

export function generateOtp(length = OTP_LENGTH): string {
  return Array.from({ length }, () => randomInt(10)).join('');
}

@Injectable()
export class OtpService {
  private readonly logger = new Logger(OtpService.name);

  constructor(
    private readonly otpRepository: OtpRepository,
    private readonly otpSender: OtpSender,
    private readonly clock: Clock,
  ) {}

  isEnabled(): boolean {
    return this.otpSender.isEnabled();
  }

  async sendOtp(telegramId: number, phone: string): Promise<OtpSendResult> {
    if (!this.otpSender.isEnabled()) {
      return { success: false, reason: 'disabled' };
    }
    const now = this.clock.now();
    const previous = await this.otpRepository.find(telegramId);
    const window = previous && now.getTime() < previous.send_window_expires_at.getTime() ? previous : null;
    const sends = window?.resend_count ?? 0;
    if (sends >= OTP_MAX_SENDS) {
      return { success: false, reason: 'resend_limit' };
    }

    const code = generateOtp();
    if (!(await this.otpSender.sendOtp(phone, code))) {
      return { success: false, reason: 'send_failed' };
    }

    await this.otpRepository.save(
      Object.assign(new OtpCode(), {
        telegram_id: telegramId,
        code,
        phone,
        attempts: 0,
        resend_count: sends + 1,
        verified: false,
        expires_at: addMinutes(now, OTP_TTL_MINUTES),
        send_window_expires_at: window?.send_window_expires_at ?? addMinutes(now, OTP_SEND_WINDOW_MINUTES),
      }),
    );
    this.logger.log(`🔐 OTP sent to ${maskPhone(phone)} for ${telegramId}`);
    return { success: true, maskedPhone: maskPhone(phone) };
  }

  async verifyOtp(telegramId: number, code: string): Promise<OtpVerifyResult> {
    const record = await this.otpRepository.find(telegramId);
    if (!record) {
      return { success: false, reason: 'not_sent' };
    }
    if (this.clock.now().getTime() > record.expires_at.getTime()) {
      return { success: false, reason: 'expired' };
    }

    record.attempts += 1;
    if (record.attempts > OTP_MAX_ATTEMPTS) {
      await this.otpRepository.save(record);
      return { success: false, reason: 'too_many_attempts' };
    }
    if (record.code !== code.trim()) {
      await this.otpRepository.save(record);
      return { success: false, reason: 'wrong_code', remainingAttempts: OTP_MAX_ATTEMPTS - record.attempts };
    }

    record.verified = true;
    await this.otpRepository.save(record);
    return { success: true, phone: record.phone };
  }

  /** Forgets the verification, send count included. */
  clear(telegramId: number): Promise<void> {
    return this.otpRepository.delete(telegramId);
  }
}
