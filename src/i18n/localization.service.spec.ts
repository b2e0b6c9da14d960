import { LocalizationService, interpolate } from './localization.service';
import { Language } from '../students/student.entity';
import ar from './locales/ar.json';
import en from './locales/en.json';

type Tree = { [key: string]: string | Tree };

function keysOf(tree: Tree, prefix = ''): string[] {
  return Object.entries(tree).flatMap(([key, value]) =>
    typeof value === 'string' ? [`${prefix}${key}`] : keysOf(value, `${prefix}${key}.`),
  );
}

describe('interpolate', () => {
  it('fills known placeholders and leaves unknown ones', () => {
    expect(interpolate('{name} paid {amount} {currency}', { name: 'Lina', amount: 500 })).toBe('Lina paid 500 {currency}');
  });
});

describe('LocalizationService', () => {
  const service = new LocalizationService();

  it('defaults to Arabic', () => {
    expect(service.t('common.cancelled')).toBe(service.t('common.cancelled', Language.AR));
    expect(service.t('common.cancelled', Language.EN)).toBe('Cancelled.');
  });

  it('interpolates parameters', () => {
    expect(service.t('menu.welcome_back', Language.EN, { name: 'Lina' })).toBe('👋 Welcome back, Lina!');
  });

  it('returns the key when no table has it', () => {
    expect(service.t('nothing.here', Language.EN)).toBe('nothing.here');
    expect(service.has('nothing.here')).toBe(false);
    expect(service.t('common', Language.EN)).toBe('common');
  });

  it('binds a language with translator', () => {
    const t = service.translator(Language.EN);

    expect(t('otp.wrong_code', { remaining: 1 })).toBe('❌ Wrong code. Attempts left: 1');
  });

  it('has the same keys in both tables', () => {
    expect(keysOf(ar).sort()).toEqual(keysOf(en).sort());
  });
});
