export const LANGUAGE_CODES = [
  'en',
  'ko',
  'zh',
  'ja',
  'es',
  'fr',
  'de',
  'ar',
  'hi',
  'pt',
  'ru',
  'vi',
  'th',
] as const;

export type LanguageCode = (typeof LANGUAGE_CODES)[number];

export const DEFAULT_LANGUAGE: LanguageCode = 'en';

export interface SectionHeader {
  start: number;
  end: number;
  headerText: string;
  level: number;
}

/*
 * A header rule matches whole lines (patterns carry the `gm` flags). Markdown
 * rules take their level from the number of `#` in group 1 and their title from
 * group 2; idiom rules have a fixed level and use group 1 as the title.
 */
export interface HeaderRule {
  pattern: RegExp;
  level: number | 'markdown';
}

export interface LanguageDefinition {
  code: LanguageCode;
  name: string;
  charsPerToken: number;
  sentenceEnd: RegExp;
  headerRules: HeaderRule[];
  paragraphMarker?: RegExp;
  // Ignore terminators inside quotes or brackets
  quoteAware?: boolean;
}
