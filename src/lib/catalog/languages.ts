/**
 * Catalog languages
 *
 * Language tags sent to the catalogs (`lc` parameter) and the ordered
 * fallback list used when resolving a product.
 */

export const LANGUAGE_CODES = [
  'en',
  'fr',
  'es',
  'de',
  'it',
  'pt',
  'nl',
  'zh',
  'ja',
  'ar',
] as const;

export type LanguageCode = (typeof LANGUAGE_CODES)[number];

export const DEFAULT_LANGUAGE: LanguageCode = 'en';

const LANGUAGE_NAMES: Record<LanguageCode, string> = {
  en: 'English',
  fr: 'Français',
  es: 'Español',
  de: 'Deutsch',
  it: 'Italiano',
  pt: 'Português',
  nl: 'Nederlands',
  zh: '中文',
  ja: '日本語',
  ar: 'العربية',
};

export function isLanguageCode(value: string): value is LanguageCode {
  return (LANGUAGE_CODES as readonly string[]).includes(value);
}

/** Case-insensitive lookup; null for unsupported tags */
export function languageFromCode(code: string): LanguageCode | null {
  const lower = code.trim().toLowerCase();
  return isLanguageCode(lower) ? lower : null;
}

export function languageDisplayName(code: LanguageCode): string {
  return LANGUAGE_NAMES[code];
}

/**
 * Ordered fallback list. Never empty: an empty input becomes [DEFAULT_LANGUAGE].
 * Duplicates are kept as given.
 */
export function normalizeLanguages(
  languages: readonly LanguageCode[],
): LanguageCode[] {
  return languages.length > 0 ? [...languages] : [DEFAULT_LANGUAGE];
}
