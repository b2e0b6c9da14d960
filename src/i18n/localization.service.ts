import { Injectable } from '@nestjs/common';
import { Language } from '../students/student.entity';
import ar from './locales/ar.json';
import en from './locales/en.json';

interface LocaleTree {
  [key: string]: string | LocaleTree;
}

export type TranslationParams = Record<string, string | number>;

export type Translate = (key: string, params?: TranslationParams) => string;

const LOCALES: Record<Language, LocaleTree> = { [Language.AR]: ar, [Language.EN]: en };

function lookup(tree: LocaleTree, key: string): string | undefined {
  let node: string | LocaleTree | undefined = tree;
  for (const part of key.split('.')) {
    if (node === undefined || typeof node === 'string') {
      return undefined;
    }
    node = node[part];
  }
  return typeof node === 'string' ? node : undefined;
}

/** `{name}` placeholders; unknown placeholders are left as they are. */
export function interpolate(template: string, params: TranslationParams = {}): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    name in params ? String(params[name]) : match,
  );
}

/**
 * Dot-key lookup in the Arabic and English string tables. Missing keys fall
 * back to English, then to the key itself.
 */
@Injectable()
export class LocalizationService {
  t(key: string, language: Language = Language.AR, params?: TranslationParams): string {
    const template = lookup(LOCALES[language], key) ?? lookup(LOCALES[Language.EN], key) ?? key;
    return interpolate(template, params);
  }

  /** `t` bound to one language. */
  translator(language: Language): Translate {
    return (key, params) => this.t(key, language, params);
  }

  has(key: string, language: Language = Language.AR): boolean {
    return lookup(LOCALES[language], key) !== undefined;
  }
}
