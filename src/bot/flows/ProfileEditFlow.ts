import { Injectable, Logger } from '@nestjs/common';
import { ChatSession } from '../chat-session';
import { StateService } from '../state.service';
import { ProfileEditField, StateOf } from '../conversation-state';
import { callbackData } from '../callback-data';
import { CallbackPrefix, ProfileAction } from '../constants';
import { Row, backButton, button, keyboard } from '../keyboards';
import { LocalizationService, Translate } from '../../i18n/localization.service';
import { StudentsService } from '../../students/students.service';
import { StudentProfile } from '../../students/student.entity';
import { checkFullName, checkResidence, checkSpecialization, needsSpecialization } from '../../students/profile-validation';
import { OtpService } from '../../otp/otp.service';
import { validateSyrianPhone } from '../../common/phone';
import { EDUCATION_LEVELS, ProfileFlow, isEducationLevel, otpKeyboard } from './ProfileFlow';

type EditState = StateOf<'profileEdit'>;

const EDIT_FIELDS: readonly ProfileEditField[] = ['name', 'phone', 'residence', 'education'];

const isEditField = (value: string): value is ProfileEditField => EDIT_FIELDS.some(field => field === value);

/**
 * Changes one field of a saved profile. A new phone number is only stored
 * once its WhatsApp code is entered, unless WhatsApp is not configured.
 */
@Injectable()
export class ProfileEditFlow {
  private readonly logger = new Logger(ProfileEditFlow.name);

  constructor(
    private readonly i18n: LocalizationService,
    private readonly studentsService: StudentsService,
    private readonly otpService: OtpService,
    private readonly stateService: StateService,
    private readonly profileFlow: ProfileFlow,
  ) {}

  isEditing(userId: number): boolean {
    return this.stateService.getState(userId, 'profileEdit') !== undefined;
  }

  /** Drops an unfinished edit, for when the user goes back to the profile. */
  leave(userId: number): void {
    if (this.isEditing(userId)) {
      this.stateService.clearState(userId);
    }
  }

  async start(session: ChatSession, field: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    await session.answer();
    if (!isEditField(field)) {
      return;
    }
    if (!(await this.studentsService.isProfileComplete(session.userId))) {
      await this.profileFlow.showProfile(session);
      return;
    }

    this.stateService.setUserState(session.userId, { kind: 'profileEdit', field });
    if (field === 'education') {
      const rows: Row[] = EDUCATION_LEVELS.map(level => [
        button(t(`profile.education.${level}`), callbackData(CallbackPrefix.PROFILE, ProfileAction.EDIT_EDUCATION, level)),
      ]);
      rows.push([this.backToProfile(t)]);
      await session.edit(t('profile.edit.choose_education'), keyboard(rows));
      return;
    }
    await session.edit(t(`profile.edit.enter_${field}`), keyboard([[this.backToProfile(t)]]));
  }

  async handleText(session: ChatSession, state: EditState, text: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    switch (state.field) {
      case 'name': {
        const check = checkFullName(text);
        if (!check.valid) {
          await session.reply(`❌ ${t(check.errorKey)}`);
          return;
        }
        await this.save(session, { full_name: check.value }, 'profile.edit.updated');
        return;
      }
      case 'residence': {
        const check = checkResidence(text);
        if (!check.valid) {
          await session.reply(`❌ ${t(check.errorKey)}`);
          return;
        }
        await this.save(session, { residence: check.value }, 'profile.edit.updated');
        return;
      }
      case 'education': {
        if (!state.education) {
          await session.reply(t('common.use_buttons'));
          return;
        }
        const check = checkSpecialization(text);
        if (!check.valid) {
          await session.reply(`❌ ${t(check.errorKey)}`);
          return;
        }
        await this.save(
          session,
          { education_level: state.education, specialization: check.value },
          'profile.edit.updated',
        );
        return;
      }
      case 'phone':
        if (state.pendingPhone) {
          await this.handleCode(session, state, state.pendingPhone, text);
          return;
        }
        await this.handlePhone(session, state, text);
        return;
    }
  }

  /** Levels from diploma up ask for the specialization before saving. */
  async selectEducation(session: ChatSession, value: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const state = this.stateService.getState(session.userId, 'profileEdit');
    await session.answer();
    if (!state || state.field !== 'education' || !isEducationLevel(value)) {
      return;
    }
    if (needsSpecialization(value)) {
      this.stateService.setUserState(session.userId, { ...state, education: value });
      await session.edit(t('profile.steps.specialization'), keyboard([[this.backToProfile(t)]]));
      return;
    }
    await this.save(session, { education_level: value, specialization: undefined }, 'profile.edit.updated');
  }

  async resendOtp(session: ChatSession): Promise<void> {
    const state = this.stateService.getState(session.userId, 'profileEdit');
    await session.answer();
    if (state?.pendingPhone) {
      await this.sendCode(session, state, state.pendingPhone);
    }
  }

  async changePhone(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    const state = this.stateService.getState(session.userId, 'profileEdit');
    await session.answer();
    if (!state || state.field !== 'phone') {
      return;
    }
    this.stateService.setUserState(session.userId, { kind: 'profileEdit', field: 'phone' });
    await session.edit(t('profile.edit.enter_phone'), keyboard([[this.backToProfile(t)]]));
  }

  private async handlePhone(session: ChatSession, state: EditState, text: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const phone = validateSyrianPhone(text);
    if (!phone.valid || !phone.normalized) {
      await session.reply(`❌ ${t('profile.errors.phone')}`);
      return;
    }
    if (!this.otpService.isEnabled()) {
      await this.save(session, { phone_number: phone.normalized, phone_verified: false }, 'profile.edit.phone_updated');
      return;
    }
    await this.sendCode(session, state, phone.normalized);
  }

  private async sendCode(session: ChatSession, state: EditState, phone: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const sent = await this.otpService.sendOtp(session.userId, phone);
    if (sent.success) {
      this.stateService.setUserState(session.userId, { ...state, pendingPhone: phone });
      await session.reply(t('otp.sent', { phone: sent.maskedPhone }), otpKeyboard(t));
      return;
    }

    this.logger.warn(`OTP for a phone change of ${session.userId} not sent (${sent.reason})`);
    await session.reply(t(sent.reason === 'resend_limit' ? 'otp.resend_limit' : 'profile.edit.send_failed'));
  }

  private async handleCode(session: ChatSession, state: EditState, phone: string, text: string): Promise<void> {
    const t = this.i18n.translator(session.language);
    const verified = await this.otpService.verifyOtp(session.userId, text);
    if (verified.success) {
      await this.otpService.clear(session.userId);
      await this.save(session, { phone_number: phone, phone_verified: true }, 'profile.edit.phone_verified');
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
        this.stateService.setUserState(session.userId, { ...state, pendingPhone: undefined });
        await session.reply(t('otp.too_many_attempts'));
        return;
    }
  }

  private async save(session: ChatSession, changes: Partial<StudentProfile>, doneKey: string): Promise<void> {
    const result = await this.studentsService.updateProfile(session.userId, changes);
    this.stateService.clearState(session.userId);
    if (!result.success) {
      await this.profileFlow.showProfile(session);
      return;
    }
    this.logger.log(`✏️ Profile of ${session.userId} updated (${Object.keys(changes).join(', ')})`);
    await session.reply(this.i18n.t(doneKey, session.language));
    await this.profileFlow.showProfile(session);
  }

  private backToProfile(t: Translate) {
    return backButton(t, callbackData(CallbackPrefix.PROFILE, ProfileAction.VIEW));
  }
}
