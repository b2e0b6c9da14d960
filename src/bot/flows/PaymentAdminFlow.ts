import { Injectable, Logger } from '@nestjs/common';
import { ChatSession } from '../chat-session';
import { StateService } from '../state.service';
import { StateOf } from '../conversation-state';
import { callbackData, splitArg } from '../callback-data';
import { CallbackPrefix, PaymentAction } from '../constants';
import { Row, adminHomeButton, backButton, button, keyboard } from '../keyboards';
import { DIVIDER, formatAmount } from '../formatting';
import { LocalizationService, Translate } from '../../i18n/localization.service';
import { PaymentsService } from '../../registrations/payments.service';
import { PaymentMethod } from '../../registrations/payment-record.entity';
import { RegistrationsService } from '../../registrations/registrations.service';
import { RegistrationStatus } from '../../registrations/registration.entity';
import { StudentsService } from '../../students/students.service';
import { CoursesService } from '../../courses/courses.service';
import { MessageSender } from '../../telegram/message-sender';
import { Clock } from '../../common/timezone';
import { errorMessage } from '../../common/result';

const PAYMENT_METHODS: readonly PaymentMethod[] = Object.values(PaymentMethod);

const isPaymentMethod = (value: string): value is PaymentMethod => PAYMENT_METHODS.some(method => method === value);

/** `150,000` and `150000` are the same amount. */
export function parseAmount(input: string): number | null {
  const cleaned = input.trim().replace(/[,\s]/g, '');
  if (!/^\d+(\.\d+)?$/.test(cleaned)) {
    return null;
  }
  const amount = Number(cleaned);
  return amount > 0 ? amount : null;
}

@Injectable()
export class PaymentAdminFlow {
  private readonly logger = new Logger(PaymentAdminFlow.name);

  constructor(
    private readonly i18n: LocalizationService,
    private readonly paymentsService: PaymentsService,
    private readonly registrationsService: RegistrationsService,
    private readonly studentsService: StudentsService,
    private readonly coursesService: CoursesService,
    private readonly messageSender: MessageSender,
    private readonly stateService: StateService,
    private readonly clock: Clock,
  ) {}

  /** Without a course id, the courses to pick from; with one, its approved students. */
  async list(session: ChatSession, courseId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    if (!courseId) {
      const courses = await this.coursesService.getCourses(false);
      const rows: Row[] = courses.map(course => [
        button(`📚 ${course.name}`, callbackData(CallbackPrefix.PAYMENT, PaymentAction.LIST, course.id)),
      ]);
      rows.push([adminHomeButton(t)]);
      await session.edit(courses.length ? t('admin.payments.choose_course') : t('courses.none'), keyboard(rows));
      return;
    }

    const students = await this.registrationsService.getCourseStudents(courseId, RegistrationStatus.APPROVED);
    const back = backButton(t, callbackData(CallbackPrefix.PAYMENT, PaymentAction.LIST));
    if (students.length === 0) {
      await session.edit(t('admin.payments.no_students'), keyboard([[back]]));
      return;
    }

    const rows: Row[] = students.map(entry => [
      button(
        `${entry.remaining > 0 ? '🔴' : '🟢'} ${entry.student?.full_name ?? '?'} · ${formatAmount(entry.total_paid)}`,
        callbackData(CallbackPrefix.PAYMENT, PaymentAction.STUDENT, entry.registration.id),
      ),
    ]);
    rows.push([back]);
    await session.edit(t('admin.payments.choose_student'), keyboard(rows));
  }

  async showStudent(session: ChatSession, registrationId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const details = await this.loadDetails(registrationId);
    if (!details) {
      await session.edit(t('admin.registrations.not_found'), keyboard([[adminHomeButton(t)]]));
      return;
    }

    const { registration, studentName, courseName, price, totalPaid } = details;
    const action = (key: string, payment: PaymentAction) =>
      button(t(key), callbackData(CallbackPrefix.PAYMENT, payment, registration.id));
    await session.edit(
      [
        `👤 ${studentName}`,
        `📚 ${courseName}`,
        DIVIDER,
        `${t('admin.payments.price')}: ${formatAmount(price)}`,
        `${t('admin.payments.paid')}: ${formatAmount(totalPaid)}`,
        `${t('admin.payments.remaining')}: ${formatAmount(Math.max(0, price - totalPaid))}`,
        t(`status.payment.${registration.payment_status}`),
      ].join('\n'),
      keyboard([
        [action('admin.payments.add', PaymentAction.ADD), action('admin.payments.history', PaymentAction.HISTORY)],
        [backButton(t, callbackData(CallbackPrefix.PAYMENT, PaymentAction.LIST, registration.course_id))],
      ]),
    );
  }

  async startPayment(session: ChatSession, registrationId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.setUserState(session.userId, { kind: 'paymentAmount', registrationId });
    await session.edit(t('admin.payments.enter_amount'), keyboard([[this.cancelButton(t)]]));
  }

  async handleAmount(session: ChatSession, state: StateOf<'paymentAmount'>, text: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const amount = parseAmount(text);
    if (amount === null) {
      await session.reply(`❌ ${t('admin.payments.invalid_amount')}`);
      return;
    }

    this.stateService.setUserState(session.userId, { ...state, amount });
    const rows: Row[] = [
      PAYMENT_METHODS.map(method =>
        button(t(`payment.method.${method}`), callbackData(CallbackPrefix.PAYMENT, PaymentAction.METHOD, state.registrationId, method)),
      ),
      [this.cancelButton(t)],
    ];
    await session.reply(t('admin.payments.choose_method', { amount: formatAmount(amount) }), keyboard(rows));
  }

  /** `arg` is `<registrationId>_<method>`. */
  async selectMethod(session: ChatSession, arg: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const [registrationId, method] = splitArg(arg);
    const state = this.stateService.getState(session.userId, 'paymentAmount');
    await session.answer();
    if (!state?.amount || state.registrationId !== registrationId || !isPaymentMethod(method)) {
      await session.edit(t('admin.payments.expired'), keyboard([[adminHomeButton(t)]]));
      return;
    }

    this.stateService.clearState(session.userId);
    const result = await this.paymentsService.addPayment(registrationId, state.amount, method, session.userId);
    const back = keyboard([
      [button(t('admin.payments.back_to_student'), callbackData(CallbackPrefix.PAYMENT, PaymentAction.STUDENT, registrationId))],
    ]);
    if (!result.success) {
      await session.edit(`❌ ${result.error}`, back);
      return;
    }

    await session.edit(
      t('admin.payments.recorded', {
        amount: formatAmount(result.payment.amount),
        total: formatAmount(result.total_paid),
        remaining: formatAmount(result.remaining),
      }),
      back,
    );
    await this.sendReceipt(registrationId, result.payment.amount, result.remaining);
  }

  async showHistory(session: ChatSession, registrationId: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const payments = await this.paymentsService.getPaymentHistory(registrationId);
    const back = keyboard([[backButton(t, callbackData(CallbackPrefix.PAYMENT, PaymentAction.STUDENT, registrationId))]]);
    if (payments.length === 0) {
      await session.edit(t('admin.payments.no_history'), back);
      return;
    }

    const lines = payments.map(
      payment =>
        `• ${this.clock.format(payment.paid_at)} · ${formatAmount(payment.amount)} · ${t(`payment.method.${payment.method}`)}` +
        (payment.notes ? `\n  ${payment.notes}` : ''),
    );
    await session.edit(`${t('admin.payments.history_title')}\n${DIVIDER}\n${lines.join('\n')}`, back);
  }

  async cancel(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.clearState(session.userId);
    await session.answer();
    await session.edit(t('common.cancelled'), keyboard([[adminHomeButton(t)]]));
  }

  private async loadDetails(registrationId: string) {
    const registration = await this.registrationsService.findById(registrationId);
    if (!registration) {
      return null;
    }
    const [student, course, payments] = await Promise.all([
      this.studentsService.findById(registration.student_id),
      this.coursesService.getCourseById(registration.course_id),
      this.paymentsService.getPaymentHistory(registrationId),
    ]);
    return {
      registration,
      student,
      studentName: student?.full_name ?? '?',
      courseName: course?.name ?? '?',
      price: course?.price ?? 0,
      totalPaid: payments.reduce((sum, payment) => sum + payment.amount, 0),
    };
  }

  private async sendReceipt(registrationId: string, amount: number, remaining: number): Promise<void> {
    const details = await this.loadDetails(registrationId);
    if (!details?.student) {
      return;
    }
    const { student, courseName } = details;
    try {
      await this.messageSender.sendMessage(
        student.telegram_id,
        this.i18n.t('notifications.payment.received', student.language, {
          amount: formatAmount(amount),
          course: courseName,
          remaining: formatAmount(remaining),
        }),
      );
    } catch (error) {
      this.logger.warn(`Could not send a receipt to ${student.telegram_id}: ${errorMessage(error)}`);
    }
  }

  private cancelButton(t: Translate) {
    return button(t('common.cancel'), callbackData(CallbackPrefix.PAYMENT, PaymentAction.CANCEL));
  }
}
