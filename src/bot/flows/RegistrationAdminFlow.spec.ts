import { ADMIN_ID, BotHarness, STUDENT_ID, createBotHarness } from '../../testing/bot-harness';
import { FakeSession } from '../../testing/fake-session';
import { CallbackHandler } from '../handlers/CallbackHandler';
import { Registration, RegistrationStatus } from '../../registrations/registration.entity';
import { Language } from '../../students/student.entity';
import { LocalizationService } from '../../i18n/localization.service';

describe('RegistrationAdminFlow', () => {
  let harness: BotHarness;
  let session: FakeSession;
  let registration: Registration;
  let press: (data: string) => Promise<void>;

  beforeEach(async () => {
    harness = await createBotHarness();
    session = new FakeSession(ADMIN_ID);
    const course = await harness.addCourse();
    const student = await harness.addStudent(STUDENT_ID);
    registration = await harness.registrations.save(Registration.create(student.id, course.id, harness.clock.now()));
    const callbackHandler = harness.get(CallbackHandler);
    press = data => callbackHandler.handle(session, data);
  });

  it('lists pending requests', async () => {
    await press('admin_registrations');

    expect(session.last.text).toBe('📝 Pending registrations (1):');
    expect(session.last.buttons).toEqual([[`regadm_view_${registration.id}`], ['admin_panel']]);
  });

  it('shows a request with decision buttons', async () => {
    await press(`regadm_view_${registration.id}`);

    expect(session.last.text).toContain('👤 Lina Omar Khalil\n📱 0912 345 678');
    expect(session.last.text).toContain('📚 Web Basics · 150,000\n🕒 2024-05-10 09:00\n⏳ Pending');
    expect(session.last.buttons).toEqual([
      [`regadm_approve_${registration.id}`, `regadm_reject_${registration.id}`],
      ['regadm_list'],
    ]);
  });

  it('approves, tells the student and returns to the list', async () => {
    await press(`regadm_approve_${registration.id}`);

    expect(registration).toMatchObject({ status: RegistrationStatus.APPROVED, approved_by: ADMIN_ID });
    expect(session.answers[0]).toBe('Registration approved.');
    expect(harness.messageSender.sent).toEqual([
      { chatId: STUDENT_ID, text: '✅ Your registration for "Web Basics" was approved. Welcome aboard!' },
    ]);
    expect(session.last.text).toBe('There are no pending registrations.');
  });

  it('notifies in the student language', async () => {
    const student = await harness.students.findByTelegramId(STUDENT_ID);
    if (student) {
      student.language = Language.AR;
    }

    await press(`regadm_reject_${registration.id}`);

    expect(harness.messageSender.sent[0]?.text).toBe(
      harness.get(LocalizationService).t('notifications.registration.rejected', Language.AR, { course: 'Web Basics' }),
    );
  });

  it('rejects even when the student blocked the bot', async () => {
    harness.messageSender.unreachable.add(STUDENT_ID);

    await press(`regadm_reject_${registration.id}`);

    expect(registration.status).toBe(RegistrationStatus.REJECTED);
    expect(session.answers[0]).toBe('Registration rejected.');
    expect(harness.messageSender.sent).toEqual([]);
  });

  it('does not decide twice', async () => {
    await press(`regadm_approve_${registration.id}`);
    await press(`regadm_reject_${registration.id}`);

    expect(registration.status).toBe(RegistrationStatus.APPROVED);
    expect(session.answers).toContain('Registration is not pending (status: approved)');
    expect(session.lastButtons).toEqual(['regadm_list']);
  });
});
