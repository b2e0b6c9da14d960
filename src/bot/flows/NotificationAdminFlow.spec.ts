import { ADMIN_ID, BotHarness, createBotHarness } from '../../testing/bot-harness';
import { FakeSession } from '../../testing/fake-session';
import { CallbackHandler } from '../handlers/CallbackHandler';
import { TextHandler } from '../handlers/TextHandler';
import { DIVIDER } from '../formatting';
import { NotificationType, formatNotification } from '../../notifications/notification-format';
import { Registration, RegistrationStatus } from '../../registrations/registration.entity';
import { UserPreferences } from '../../preferences/user-preferences.entity';
import { Language } from '../../students/student.entity';

describe('NotificationAdminFlow', () => {
  let harness: BotHarness;
  let session: FakeSession;
  let press: (data: string) => Promise<void>;
  let text: (value: string) => Promise<void>;

  beforeEach(async () => {
    harness = await createBotHarness();
    session = new FakeSession(ADMIN_ID);
    const callbackHandler = harness.get(CallbackHandler);
    const textHandler = harness.get(TextHandler);
    press = data => callbackHandler.handle(session, data);
    text = value => textHandler.handle(session, value);
  });

  describe('broadcast', () => {
    it('messages every reachable student who keeps notifications on', async () => {
      await harness.addStudent(2001);
      await harness.addStudent(2002);
      await harness.addStudent(2003);
      harness.messageSender.unreachable.add(2002);
      await harness.preferences.save(Object.assign(UserPreferences.create(2003), { notifications_enabled: false }));

      await press('admin_broadcast');
      expect(session.last.text).toBe('📢 Type the message to send to every student:');
      await text('Classes resume on Sunday');

      expect(session.texts.slice(-2)).toEqual(['📤 Sending...', '✅ Message delivered to 1 of 2 students.']);
      expect(harness.messageSender.sent).toEqual([
        { chatId: 2001, text: 'Classes resume on Sunday', options: { markdown: false } },
      ]);
      expect(harness.state.getUserState(ADMIN_ID)).toBeUndefined();
    });

    it('says so when there is nobody to message', async () => {
      await press('admin_broadcast');
      await text('Classes resume on Sunday');

      expect(session.last.text).toBe('There are no students to message.');
    });
  });

  describe('targeted notification', () => {
    it('sends a formatted message to the approved students of a course', async () => {
      const course = await harness.addCourse();
      const approved = await harness.addStudent(2001, { language: Language.AR });
      const pending = await harness.addStudent(2002);
      await harness.registrations.save(
        Object.assign(Registration.create(approved.id, course.id, harness.clock.now()), { status: RegistrationStatus.APPROVED }),
      );
      await harness.registrations.save(Registration.create(pending.id, course.id, harness.clock.now()));

      await press('admin_notify');
      await press('adnotif_type_reminder');
      expect(session.lastButtons).toEqual(['adnotif_recipients_all', `adnotif_recipients_course_${course.id}`, 'adnotif_cancel']);

      await press(`adnotif_recipients_course_${course.id}`);
      expect(session.last.text).toBe('Type the notification text:');

      await text('Bring your laptops');
      expect(session.last.text).toBe(
        `Preview · 1 recipients\n${DIVIDER}\n\n${formatNotification(NotificationType.REMINDER, 'Bring your laptops', Language.EN)}`,
      );

      await press('adnotif_send');

      expect(session.texts.slice(-2)).toEqual(['📤 Sending to 1 recipients...', '✅ Sent: 1\n❌ Failed: 0']);
      expect(harness.messageSender.sent).toEqual([
        {
          chatId: 2001,
          text: formatNotification(NotificationType.REMINDER, 'Bring your laptops', Language.AR),
          options: { markdown: true },
        },
      ]);
    });

    it('asks for buttons before the audience is chosen', async () => {
      await press('adnotif_type_info');

      await text('Hello');

      expect(session.last.text).toBe('Please use the buttons below.');
    });

    it('treats a send without a draft as expired', async () => {
      await press('adnotif_send');

      expect(session.last.text).toBe('This notification draft has expired.');
      expect(harness.messageSender.sent).toEqual([]);
    });
  });
});
