import { checkAge, checkFullName, checkResidence, checkSpecialization, needsSpecialization } from './profile-validation';
import { EducationLevel } from './student.entity';

describe('profile validation', () => {
  it('requires a three-word name', () => {
    expect(checkFullName('  Ahmad   Sami  Haddad ')).toEqual({ valid: true, value: 'Ahmad Sami Haddad' });
    expect(checkFullName('Ahmad Haddad')).toEqual({ valid: false, errorKey: 'profile.errors.name_words' });
    expect(checkFullName('Ahmad S Haddad')).toEqual({ valid: false, errorKey: 'profile.errors.name_word_length' });
  });

  it('accepts ages from 10 to 80', () => {
    expect(checkAge('10')).toEqual({ valid: true, value: 10 });
    expect(checkAge(' 80 ')).toEqual({ valid: true, value: 80 });
    expect(checkAge('9')).toEqual({ valid: false, errorKey: 'profile.errors.age_range' });
    expect(checkAge('81')).toEqual({ valid: false, errorKey: 'profile.errors.age_range' });
    expect(checkAge('25.5')).toEqual({ valid: false, errorKey: 'profile.errors.age_number' });
  });

  it('checks residence and specialization length', () => {
    expect(checkResidence('Homs')).toEqual({ valid: true, value: 'Homs' });
    expect(checkResidence('ab').valid).toBe(false);
    expect(checkSpecialization('IT')).toEqual({ valid: true, value: 'IT' });
    expect(checkSpecialization(' x ').valid).toBe(false);
  });

  it('asks for a specialization from diploma upwards', () => {
    expect(needsSpecialization(EducationLevel.DIPLOMA)).toBe(true);
    expect(needsSpecialization(EducationLevel.PHD)).toBe(true);
    expect(needsSpecialization(EducationLevel.HIGH_SCHOOL)).toBe(false);
    expect(needsSpecialization(EducationLevel.OTHER)).toBe(false);
    expect(needsSpecialization(undefined)).toBe(false);
  });
});
