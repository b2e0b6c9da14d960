export interface PhoneValidation {
  valid: boolean;
  normalized?: string;
  error?: string;
}

const SYRIAN_MOBILE = /^09\d{8}$/;

/**
 * Normalizes Syrian mobile numbers to the local `09XXXXXXXX` form.
 * International prefixes (+963, 00963, 963) are folded into a leading 0.
 */
export function validateSyrianPhone(input: string): PhoneValidation {
  const cleaned = input.trim().replace(/[\s\-()]/g, '');
  if (!cleaned) {
    return { valid: false, error: 'Phone number is required' };
  }
  if (!/^\+?\d+$/.test(cleaned)) {
    return { valid: false, error: 'Phone number may contain digits only' };
  }

  let phone = cleaned;
  if (phone.startsWith('+963')) {
    phone = '0' + phone.slice(4);
  } else if (phone.startsWith('00963')) {
    phone = '0' + phone.slice(5);
  } else if (phone.startsWith('963')) {
    phone = '0' + phone.slice(3);
  }

  if (phone.length === 9 && !phone.startsWith('0')) {
    phone = '0' + phone;
  }

  if (!SYRIAN_MOBILE.test(phone)) {
    return { valid: false, error: 'Phone number must look like 09XXXXXXXX' };
  }
  return { valid: true, normalized: phone };
}

export function formatPhoneDisplay(phone: string): string {
  return SYRIAN_MOBILE.test(phone) ? `${phone.slice(0, 4)} ${phone.slice(4, 7)} ${phone.slice(7)}` : phone;
}
