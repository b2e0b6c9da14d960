import { EducationLevel, SPECIALIZED_EDUCATION_LEVELS } from './student.entity';

export const MIN_AGE = 10;
export const MAX_AGE = 80;

/** A failed check carries the localization key of the message to show. */
export type FieldCheck<T> = { valid: true; value: T } | { valid: false; errorKey: string };

export function checkFullName(input: string): FieldCheck<string> {
  const words = input.trim().split(/\s+/).filter(Boolean);
  if (words.length < 3) {
    return { valid: false, errorKey: 'profile.errors.name_words' };
  }
  if (words.some(word => word.length < 2)) {
    return { valid: false, errorKey: 'profile.errors.name_word_length' };
  }
  return { valid: true, value: words.join(' ') };
}

export function checkAge(input: string): FieldCheck<number> {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    return { valid: false, errorKey: 'profile.errors.age_number' };
  }
  const age = Number(trimmed);
  if (age < MIN_AGE || age > MAX_AGE) {
    return { valid: false, errorKey: 'profile.errors.age_range' };
  }
  return { valid: true, value: age };
}

export function checkResidence(input: string): FieldCheck<string> {
  const value = input.trim();
  return value.length >= 3 ? { valid: true, value } : { valid: false, errorKey: 'profile.errors.residence' };
}

export function checkSpecialization(input: string): FieldCheck<string> {
  const value = input.trim();
  return value.length >= 2 ? { valid: true, value } : { valid: false, errorKey: 'profile.errors.specialization' };
}

export function needsSpecialization(level: EducationLevel | undefined): boolean {
  return level !== undefined && SPECIALIZED_EDUCATION_LEVELS.includes(level);
}
