import { OtpService, generateOtp, maskPhone } from './otp.service';
import { InMemoryOtpRepository } from '../testing/in-memory-repositories';
import { FakeOtpSender } from '../testing/fakes';
import { FixedClock } from '../testing/test-config';

describe('OtpService', () => {
  let repository: InMemoryOtpRepository;
  let sender: FakeOtpSender;
  let clock: FixedClock;
  let service: OtpService;

  const lastCode = () => sender.codes[sender.codes.length - 1].code;

  beforeEach(() => {
    repository = new InMemoryOtpRepository();
    sender = new FakeOtpSender();
    clock = new FixedClock(new Date('2024-05-01T10:00:00Z'));
    service = new OtpService(repository, sender, clock);
  });

  it('masks the middle of the phone', () => {
    expect(maskPhone('0912345678')).toBe('0912****678');
  });

  it('generates six digits', () => {
    expect(generateOtp()).toMatch(/^\d{6}$/);
  });

  it('sends a code and verifies it', async () => {
    await expect(service.sendOtp(7, '0912345678')).resolves.toEqual({ success: true, maskedPhone: '0912****678' });

    await expect(service.verifyOtp(7, ` ${lastCode()} `)).resolves.toEqual({ success: true, phone: '0912345678' });
    expect(repository.items.get(7)?.verified).toBe(true);
  });

  it('counts down the remaining attempts', async () => {
    await service.sendOtp(7, '0912345678');
    const wrong = lastCode() === '000000' ? '111111' : '000000';

    await expect(service.verifyOtp(7, wrong)).resolves.toEqual({
      success: false,
      reason: 'wrong_code',
      remainingAttempts: 2,
    });
    await service.verifyOtp(7, wrong);
    await service.verifyOtp(7, wrong);
    await expect(service.verifyOtp(7, lastCode())).resolves.toEqual({ success: false, reason: 'too_many_attempts' });
  });

  it('expires codes after five minutes', async () => {
    await service.sendOtp(7, '0912345678');
    clock.set(new Date('2024-05-01T10:05:01Z'));

    await expect(service.verifyOtp(7, lastCode())).resolves.toEqual({ success: false, reason: 'expired' });
  });

  it('reports a missing code', async () => {
    await expect(service.verifyOtp(7, '123456')).resolves.toEqual({ success: false, reason: 'not_sent' });
  });

  it('allows three sends per user', async () => {
    await service.sendOtp(7, '0912345678');
    await service.sendOtp(7, '0912345678');
    await service.sendOtp(7, '0912345678');

    await expect(service.sendOtp(7, '0912345678')).resolves.toEqual({ success: false, reason: 'resend_limit' });
    expect(sender.codes).toHaveLength(3);

    await service.clear(7);
    await expect(service.sendOtp(7, '0912345678')).resolves.toMatchObject({ success: true });
  });

  it('keeps the send limit after the code itself has expired', async () => {
    await service.sendOtp(7, '0912345678');
    await service.sendOtp(7, '0912345678');
    await service.sendOtp(7, '0912345678');

    clock.set(new Date('2024-05-01T10:30:00Z'));
    await expect(service.verifyOtp(7, lastCode())).resolves.toEqual({ success: false, reason: 'expired' });
    await expect(service.sendOtp(7, '0912345678')).resolves.toEqual({ success: false, reason: 'resend_limit' });
    expect(repository.items.get(7)?.send_window_expires_at).toEqual(new Date('2024-05-01T11:00:00Z'));
  });

  it('starts a new send window an hour after the first send', async () => {
    await service.sendOtp(7, '0912345678');
    await service.sendOtp(7, '0912345678');
    await service.sendOtp(7, '0912345678');

    clock.set(new Date('2024-05-01T11:00:00Z'));
    await expect(service.sendOtp(7, '0912345678')).resolves.toMatchObject({ success: true });
    expect(repository.items.get(7)).toMatchObject({
      resend_count: 1,
      send_window_expires_at: new Date('2024-05-01T12:00:00Z'),
    });
  });

  it('reports delivery failures and a disabled channel', async () => {
    sender.delivered = false;
    await expect(service.sendOtp(7, '0912345678')).resolves.toEqual({ success: false, reason: 'send_failed' });
    expect(repository.items.size).toBe(0);

    sender.enabled = false;
    await expect(service.sendOtp(7, '0912345678')).resolves.toEqual({ success: false, reason: 'disabled' });
  });
});
