import { formatPhoneDisplay, validateSyrianPhone } from './phone';

describe('validateSyrianPhone', () => {
  it.each([
    ['0912345678', '0912345678'],
    ['+963912345678', '0912345678'],
    ['00963 912 345 678', '0912345678'],
    ['963-912-345-678', '0912345678'],
    ['(091) 234-5678', '0912345678'],
    ['912345678', '0912345678'],
  ])('normalizes %p', (input, normalized) => {
    expect(validateSyrianPhone(input)).toEqual({ valid: true, normalized });
  });

  it('rejects letters', () => {
    expect(validateSyrianPhone('09abc45678')).toEqual({
      valid: false,
      error: 'Phone number may contain digits only',
    });
  });

  it('rejects landlines and short numbers', () => {
    expect(validateSyrianPhone('0112345678').valid).toBe(false);
    expect(validateSyrianPhone('09123').valid).toBe(false);
  });

  it('rejects empty input', () => {
    expect(validateSyrianPhone('  ').error).toBe('Phone number is required');
  });
});

describe('formatPhoneDisplay', () => {
  it('groups a normalized number', () => {
    expect(formatPhoneDisplay('0912345678')).toBe('0912 345 678');
  });

  it('leaves anything else untouched', () => {
    expect(formatPhoneDisplay('12345')).toBe('12345');
  });
});
