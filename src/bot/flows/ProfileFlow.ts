import { Injectable, Logger } from '@nestjs/common';
import { ChatSession } from '../chat-session';
import { StateService } from '../state.service';
import { ProfileEditField, StateOf } from '../conversation-state';
import { callbackData } from '../callback-data';
import { CallbackPrefix, PROFILE_STEP_NUMBERS, PROFILE_TOTAL_STEPS, ProfileAction, ProfileStep } from '../constants';
import { Row, button, homeButton, keyboard, mainMenuKeyboard, progressBar } from '../keyboards';
import { DIVIDER, registrationStatusLine, formatAmount, studentSummary } from '../formatting';
import { LocalizationService, Translate } from '../../i18n/localization.service';
import { StudentsService } from '../../students/students.service';
import { EducationLevel, Gender, Student, StudentProfile } from '../../students/student.entity';
import {
  FieldCheck,
  checkAge,
  checkFullName,
  checkResidence,
  checkSpecialization,
  needsSpecialization,
} from '../../students/profile-validation';
import { OtpService } from '../../otp/otp.service';
import { validateSyrianPhone } from '../../common/phone';

type ProfileState = StateOf<'profile'>;

const GENDERS: readonly Gender[] = [Gender.MALE, Gender.FEMALE];
export const EDUCATION_LEVELS: readonly EducationLevel[] = Object.values(EducationLevel);

const isGender = (value: string): value is Gender => GENDERS.some(gender => gender === value);
export const isEducationLevel = (value: string): value is EducationLevel => EDUCATION_LEVELS.some(level => level === value);

export function otpKeyboard(t: Translate) {
  return keyboard([
    [
      button(t('otp.resend_button'), callbackData(CallbackPrefix.PROFILE, ProfileAction.OTP_RESEND)),
      button(t('otp.change_phone_button'), callbackData(CallbackPrefix.PROFILE, ProfileAction.OTP_CHANGE_PHONE)),
    ],
  ]);
}

/**
 * The guided profile: name, phone (verified over WhatsApp when configured),
 * gender, age, residence, education and specialization, then a summary to
 * confirm.
 */
@Injectable()
export class ProfileFlow {
  private readonly logger = new Logger(ProfileFlow.name);

  constructor(
    private readonly i18n: LocalizationService,
    private readonly studentsService: StudentsService,
    private readonly otpService: OtpService,
    private readonly stateService: StateService,
  ) {}

  /** `courseId` is kept so registration can continue once the profile is saved. */
  async start(session: ChatSession, courseId?: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const state: ProfileState = { kind: 'profile', step: 'full_name', draft: {}, courseId };
    this.stateService.setUserState(session.userId, state);
    await session.reply(t('profile.intro'));
    await this.prompt(session, state);
  }

  async handleText(session: ChatSession, state: ProfileState, text: string): Promise<void> {
    switch (state.step) {
      case 'full_name':
        await this.accept(session, state, checkFullName(text), full_name => ({ full_name }), 'phone');
        return;
      case 'phone':
        await this.handlePhone(session, state, text);
        return;
      case 'otp':
        await this.handleOtp(session, state, text);
        return;
      case 'age':
        await this.accept(session, state, checkAge(text), age => ({ age }), 'residence');
        return;
      case 'residence':
        await this.accept(session, state, checkResidence(text), residence => ({ residence }), 'education');
        return;
      case 'specialization':
        await this.accept(session, state, checkSpecialization(text), specialization => ({ specialization }), 'confirm');
        return;
      case 'gender':
      case 'education':
      case 'confirm':
        await session.reply(this.i18n.t('common.use_buttons', session.language));
        return;
    }
  }

  async selectGender(session: ChatSession, value: string): Promise<void> {
    const state = this.stateService.getState(session.userId, 'profile');
    await session.answer();
    if (!state || state.step !== 'gender' || !isGender(value)) {
      return;
    }
    await this.advance(session, { ...state, step: 'age', draft: { ...state.draft, gender: value } });
  }

  async selectEducation(session: ChatSession, value: string): Promise<void> {
    const state = this.stateService.getState(session.userId, 'profile');
    await session.answer();
    if (!state || state.step !== 'education' || !isEducationLevel(value)) {
      return;
    }
    const draft: Partial<StudentProfile> = { ...state.draft, education_level: value };
    if (needsSpecialization(value)) {
      await this.advance(session, { ...state, step: 'specialization', draft });
      return;
    }
    delete draft.specialization;
    await this.advance(session, { ...state, step: 'confirm', draft });
  }

  /** Back from the code step to the phone step, for a mistyped number. */
  async changePhone(session: ChatSession): Promise<void> {
    const state = this.stateService.getState(session.userId, 'profile');
    await session.answer();
    if (!state || state.step !== 'otp') {
      return;
    }
    await this.advance(session, { ...state, step: 'phone', draft: { ...state.draft, phone_number: undefined } });
  }

  async resendOtp(session: ChatSession): Promise<void> {
    const state = this.stateService.getState(session.userId, 'profile');
    await session.answer();
    if (!state || state.step !== 'otp' || !state.draft.phone_number) {
      return;
    }
    await this.sendCode(session, state, state.draft.phone_number);
  }

  /**
   * Saves the profile. Resolves to the course the user was registering for
   * when the profile was started from a registration, so it can continue.
   */
  async confirm(session: ChatSession): Promise<{ completed: boolean; courseId?: string }> {
    const t = this.i18n.translator(session.language);
    const state = this.stateService.getState(session.userId, 'profile');
    await session.answer();
    if (!state || state.step !== 'confirm' || !state.draft.full_name || !state.draft.phone_number) {
      await session.edit(t('profile.expired'), this.restartKeyboard(t));
      return { completed: false };
    }

    const profile: StudentProfile = {
      ...state.draft,
      full_name: state.draft.full_name,
      phone_number: state.draft.phone_number,
      phone_verified: state.draft.phone_verified ?? false,
    };
    const student = await this.studentsService.completeProfile(session.userId, profile, session.language);
    this.stateService.clearState(session.userId);
    this.logger.log(`✅ Profile saved for ${session.userId}`);

    if (state.courseId) {
      await session.edit(t('profile.saved_continue'));
      return { completed: true, courseId: state.courseId };
    }
    await session.edit(t('profile.saved', { name: student.full_name }), mainMenuKeyboard(t, false));
    return { completed: true };
  }

  async cancel(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.clearState(session.userId);
    await session.answer();
    await session.edit(t('common.cancelled'), keyboard([[homeButton(t)]]));
  }

  async showProfile(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    const result = await this.studentsService.getProfile(session.userId);
    if (!result.success || !result.student.profile_completed) {
      await session.edit(t('profile.missing'), this.restartKeyboard(t));
      return;
    }

    const sections = [`${t('profile.title')}\n${DIVIDER}`, studentSummary(result.student, t)];
    for (const entry of result.courses) {
      sections.push(
        `📚 ${entry.course.name}\n${registrationStatusLine(entry.registration, t)}\n` +
          t('profile.paid_line', { paid: formatAmount(entry.total_paid), remaining: formatAmount(entry.remaining) }),
      );
    }
    await session.edit(
      sections.join('\n\n'),
      keyboard([
        [this.editButton(t, 'profile.edit.name', 'name'), this.editButton(t, 'profile.edit.phone', 'phone')],
        [this.editButton(t, 'profile.edit.residence', 'residence'), this.editButton(t, 'profile.edit.education', 'education')],
        [button(t('profile.edit_button'), callbackData(CallbackPrefix.PROFILE, ProfileAction.START))],
        [homeButton(t)],
      ]),
    );
  }

  private async handlePhone(session: ChatSession, state: ProfileState, text: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const phone = validateSyrianPhone(text);
    if (!phone.valid || !phone.normalized) {
      await session.reply(`❌ ${t('profile.errors.phone')}`);
      return;
    }

    const next: ProfileState = { ...state, draft: { ...state.draft, phone_number: phone.normalized, phone_verified: false } };
    if (!this.otpService.isEnabled()) {
      await this.advance(session, { ...next, step: 'gender' });
      return;
    }
    await this.sendCode(session, next, phone.normalized);
  }

  private async sendCode(session: ChatSession, state: ProfileState, phone: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const sent = await this.otpService.sendOtp(session.userId, phone);
    if (sent.success) {
      this.stateService.setUserState(session.userId, { ...state, step: 'otp' });
      await session.reply(t('otp.sent', { phone: sent.maskedPhone }), otpKeyboard(t));
      return;
    }

    switch (sent.reason) {
      case 'resend_limit':
        await session.reply(t('otp.resend_limit'));
        return;
      case 'disabled':
      case 'send_failed':
        this.logger.warn(`OTP could not be sent to ${session.userId} (${sent.reason}), phone left unverified`);
        await session.reply(t('otp.unavailable'));
        await this.advance(session, { ...state, step: 'gender' });
        return;
    }
  }

  private async handleOtp(session: ChatSession, state: ProfileState, text: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const verified = await this.otpService.verifyOtp(session.userId, text);
    if (verified.success) {
      await this.otpService.clear(session.userId);
      await session.reply(t('otp.verified'));
      await this.advance(session, { ...state, step: 'gender', draft: { ...state.draft, phone_verified: true } });
      return;
    }

    switch (verified.reason) {
      case 'wrong_code':
        await session.reply(t('otp.wrong_code', { remaining: verified.remainingAttempts }));
        return;
      case 'expired':
      case 'not_sent':
        await session.reply(t('otp.expired'), otpKeyboard(t));
        return;
      case 'too_many_attempts':
        this.stateService.setUserState(session.userId, { ...state, step: 'phone' });
        await session.reply(t('otp.too_many_attempts'));
        return;
    }
  }

  private async accept<T>(
    session: ChatSession,
    state: ProfileState,
    check: FieldCheck<T>,
    apply: (value: T) => Partial<StudentProfile>,
    next: ProfileStep,
  ): Promise<void> {
    if (!check.valid) {
      await session.reply(`❌ ${this.i18n.t(check.errorKey, session.language)}`);
      return;
    }
    await this.advance(session, { ...state, step: next, draft: { ...state.draft, ...apply(check.value) } });
  }

  private async advance(session: ChatSession, state: ProfileState): Promise<void> {
    this.stateService.setUserState(session.userId, state);
    await this.prompt(session, state);
  }

  private async prompt(session: ChatSession, state: ProfileState): Promise<void> {
    const t = this.i18n.translator(session.language);
    const number = PROFILE_STEP_NUMBERS[state.step];
    const header = `${t('profile.step_header', { current: number, total: PROFILE_TOTAL_STEPS })}\n${progressBar(number, PROFILE_TOTAL_STEPS)}`;

    switch (state.step) {
      case 'gender':
        await session.reply(
          `${header}\n\n${t('profile.steps.gender')}`,
          keyboard([
            GENDERS.map(gender =>
              button(t(`profile.gender.${gender}`), callbackData(CallbackPrefix.PROFILE, ProfileAction.GENDER, gender)),
            ),
          ]),
        );
        return;
      case 'education': {
        const rows: Row[] = EDUCATION_LEVELS.map(level => [
          button(t(`profile.education.${level}`), callbackData(CallbackPrefix.PROFILE, ProfileAction.EDUCATION, level)),
        ]);
        await session.reply(`${header}\n\n${t('profile.steps.education')}`, keyboard(rows));
        return;
      }
      case 'confirm':
        await session.reply(
          `${header}\n\n${t('profile.steps.confirm')}\n${DIVIDER}\n${this.draftSummary(state.draft, t)}`,
          keyboard([
            [
              button(t('common.confirm'), callbackData(CallbackPrefix.PROFILE, ProfileAction.CONFIRM)),
              button(t('common.cancel'), callbackData(CallbackPrefix.PROFILE, ProfileAction.CANCEL)),
            ],
          ]),
        );
        return;
      default:
        await session.reply(`${header}\n\n${t(`profile.steps.${state.step}`)}`);
    }
  }

  private draftSummary(draft: Partial<StudentProfile>, t: Translate): string {
    return studentSummary(
      Object.assign(new Student(), { full_name: '', phone_number: '', phone_verified: false }, draft),
      t,
    );
  }

  private editButton(t: Translate, key: string, field: ProfileEditField) {
    return button(t(key), callbackData(CallbackPrefix.PROFILE, ProfileAction.EDIT, field));
  }

  private restartKeyboard(t: Translate) {
    return keyboard([
      [button(t('profile.start_button'), callbackData(CallbackPrefix.PROFILE, ProfileAction.START))],
      [homeButton(t)],
    ]);
  }
}
