import type { LanguageCode } from './types';
import { DEFAULT_LANGUAGE } from './types';

// Tie-break order when two scripts have the same number of characters
export const DETECTION_PRIORITY: readonly LanguageCode[] = [
  'ko',
  'ja',
  'zh',
  'ru',
  'ar',
  'hi',
  'th',
  'vi',
  'en',
];

// Share of Latin letters that must be Vietnamese-specific before Latin text counts as vi
const VIETNAMESE_MIN_SHARE = 0.1;

interface ScriptCounts {
  hangul: number;
  kana: number;
  han: number;
  cyrillic: number;
  arabic: number;
  devanagari: number;
  thai: number;
  latin: number;
  vietnamese: number;
}

function isVietnameseLetter(cp: number): boolean {
  // ă â đ ê ô ơ ư (both cases) and the precomposed tone-marked block
  return (
    cp === 0x0102 || cp === 0x0103 ||
    cp === 0x00c2 || cp === 0x00e2 ||
    cp === 0x0110 || cp === 0x0111 ||
    cp === 0x00ca || cp === 0x00ea ||
    cp === 0x00d4 || cp === 0x00f4 ||
    cp === 0x01a0 || cp === 0x01a1 ||
    cp === 0x01af || cp === 0x01b0 ||
    (cp >= 0x1ea0 && cp <= 0x1ef9)
  );
}

function isLatinLetter(cp: number): boolean {
  return (
    (cp >= 0x41 && cp <= 0x5a) ||
    (cp >= 0x61 && cp <= 0x7a) ||
    (cp >= 0xc0 && cp <= 0x24f && cp !== 0xd7 && cp !== 0xf7) ||
    (cp >= 0x1e00 && cp <= 0x1eff)
  );
}

export function countScripts(text: string): ScriptCounts {
  const counts: ScriptCounts = {
    hangul: 0,
    kana: 0,
    han: 0,
    cyrillic: 0,
    arabic: 0,
    devanagari: 0,
    thai: 0,
    latin: 0,
    vietnamese: 0,
  };

  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if ((cp >= 0xac00 && cp <= 0xd7a3) || (cp >= 0x1100 && cp <= 0x11ff) || (cp >= 0x3130 && cp <= 0x318f)) {
      counts.hangul++;
    } else if ((cp >= 0x3040 && cp <= 0x30ff) || (cp >= 0x31f0 && cp <= 0x31ff)) {
      counts.kana++;
    } else if ((cp >= 0x4e00 && cp <= 0x9fff) || (cp >= 0x3400 && cp <= 0x4dbf) || (cp >= 0x20000 && cp <= 0x2a6df)) {
      counts.han++;
    } else if (cp >= 0x0400 && cp <= 0x052f) {
      counts.cyrillic++;
    } else if ((cp >= 0x0600 && cp <= 0x06ff) || (cp >= 0x0750 && cp <= 0x077f)) {
      // Arabic-Indic digits are digits, not script
      if (!(cp >= 0x0660 && cp <= 0x0669) && !(cp >= 0x06f0 && cp <= 0x06f9)) counts.arabic++;
    } else if (cp >= 0x0900 && cp <= 0x097f) {
      if (!(cp >= 0x0966 && cp <= 0x096f)) counts.devanagari++;
    } else if (cp >= 0x0e00 && cp <= 0x0e7f) {
      if (!(cp >= 0x0e50 && cp <= 0x0e59)) counts.thai++;
    } else if (isLatinLetter(cp)) {
      counts.latin++;
      if (isVietnameseLetter(cp)) counts.vietnamese++;
    }
  }
  return counts;
}

/*
 * Classifies text by its dominant script. Han characters count toward Japanese
 * when any kana is present and toward Chinese otherwise. Text without letters of
 * any known script falls back to the default language.
 */
export function detectLanguage(text: string | null | undefined): LanguageCode {
  if (!text) return DEFAULT_LANGUAGE;

  const c = countScripts(text);
  const hasKana = c.kana > 0;
  const latinIsVietnamese = c.latin > 0 && c.vietnamese / c.latin >= VIETNAMESE_MIN_SHARE;

  const scores: Partial<Record<LanguageCode, number>> = {
    ko: c.hangul,
    ja: hasKana ? c.kana + c.han : 0,
    zh: hasKana ? 0 : c.han,
    ru: c.cyrillic,
    ar: c.arabic,
    hi: c.devanagari,
    th: c.thai,
    vi: latinIsVietnamese ? c.latin : 0,
    en: latinIsVietnamese ? 0 : c.latin,
  };

  let best: LanguageCode = DEFAULT_LANGUAGE;
  let bestScore = 0;
  for (const code of DETECTION_PRIORITY) {
    const score = scores[code] ?? 0;
    if (score > bestScore) {
      best = code;
      bestScore = score;
    }
  }
  return best;
}
