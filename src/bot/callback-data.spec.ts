import { callbackData, parseCallback, splitArg } from './callback-data';
import { CallbackPrefix, StudentViewAction } from './constants';

const ACTIONS: Record<CallbackPrefix, readonly string[]> = {
  [CallbackPrefix.NAV]: ['main', 'course', 'courses'],
  [CallbackPrefix.ADMIN]: ['panel'],
  [CallbackPrefix.COURSE_MANAGER]: ['ef', 'edit'],
  [CallbackPrefix.PAYMENT]: ['method'],
  [CallbackPrefix.STUDENT_VIEW]: Object.values(StudentViewAction),
  [CallbackPrefix.REGISTRATION_ADMIN]: [],
  [CallbackPrefix.PROFILE]: ['otp_resend', 'start'],
  [CallbackPrefix.STUDENT_REGISTRATION]: [],
  [CallbackPrefix.ADMIN_NOTIFY]: [],
  [CallbackPrefix.POST_PLATFORM]: [],
  [CallbackPrefix.COURSE_CREATION]: [],
  [CallbackPrefix.UPLOAD_SELECTION]: [],
};

describe('callbackData', () => {
  it('joins prefix, action and arguments', () => {
    expect(callbackData(CallbackPrefix.PAYMENT, 'method', 'reg-1', 'cash')).toBe('pay_method_reg-1_cash');
    expect(callbackData(CallbackPrefix.NAV, 'main')).toBe('nav_main');
  });
});

describe('parseCallback', () => {
  it('reads an action without argument', () => {
    expect(parseCallback('nav_main', ACTIONS)).toEqual({ prefix: CallbackPrefix.NAV, action: 'main', arg: '' });
  });

  it('keeps everything after the action as the argument', () => {
    expect(parseCallback('pay_method_reg-1_cash', ACTIONS)).toEqual({
      prefix: CallbackPrefix.PAYMENT,
      action: 'method',
      arg: 'reg-1_cash',
    });
  });

  it('prefers the longest matching action', () => {
    expect(parseCallback('stdview_search_name', ACTIONS)).toEqual({
      prefix: CallbackPrefix.STUDENT_VIEW,
      action: 'search_name',
      arg: '',
    });
    expect(parseCallback('profile_otp_resend', ACTIONS)?.action).toBe('otp_resend');
  });

  it('does not match an action that is only a prefix of the word', () => {
    expect(parseCallback('nav_courses', ACTIONS)?.action).toBe('courses');
    expect(parseCallback('nav_course_c-1', ACTIONS)).toEqual({ prefix: CallbackPrefix.NAV, action: 'course', arg: 'c-1' });
  });

  it('returns null for unknown prefixes and actions', () => {
    expect(parseCallback('unknown_main', ACTIONS)).toBeNull();
    expect(parseCallback('nav_nowhere', ACTIONS)).toBeNull();
  });
});

describe('splitArg', () => {
  it('splits at the first underscore', () => {
    expect(splitArg('c-1_name')).toEqual(['c-1', 'name']);
    expect(splitArg('reg-1_file_a_b')).toEqual(['reg-1', 'file_a_b']);
    expect(splitArg('only')).toEqual(['only', '']);
  });
});
