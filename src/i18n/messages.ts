import en from './locales/en.json';
import fr from './locales/fr.json';

export type Language = 'en' | 'fr';
export type MessageKey = keyof typeof en;
export type MessageParams = Record<string, string | number>;

// fr is checked against en's keys here
const catalogs: Record<Language, Record<MessageKey, string>> = { en, fr };

export const LANGUAGES: readonly Language[] = ['en', 'fr'];

export const isLanguage = (value: string): value is Language =>
  LANGUAGES.some((language) => language === value);

export const interpolate = (template: string, params: MessageParams = {}): string =>
  template.replace(/\{(\w+)\}/g, (placeholder: string, name: string) =>
    Object.prototype.hasOwnProperty.call(params, name) ? String(params[name]) : placeholder
  );

export interface Messages {
  language: Language;
  t(key: MessageKey, params?: MessageParams): string;
}

export const createMessages = (language: Language): Messages => {
  const catalog = catalogs[language];
  return {
    language,
    t: (key, params) => interpolate(catalog[key], params)
  };
};
