import type { HeaderRule, LanguageCode, LanguageDefinition } from './types';

// Sentence terminators in Latin and Cyrillic scripts: the mark must follow a letter,
// digit or closing bracket, and may be followed by closing quotes.
const LATIN_SENTENCE_END = /(?<=[\p{L}\p{N}%)\]"'”’»])[.!?…]+["'”’»)\]]*(?=\s|$)/gmu;

// English additionally wants the next sentence to open with a capital or digit
const ENGLISH_SENTENCE_END =
  /(?<=[\p{L}\p{N}%)\]"'”’])[.!?…]+["'”’)\]]*(?=\s+["'“‘(]?[\p{Lu}\p{N}]|\s*$)/gmu;

// French puts a space before ! and ?
const FRENCH_SENTENCE_END =
  /(?<=[\p{L}\p{N}%)\]"'”’»])[.!?…]+["'”’»)\]]*(?=\s|$)|(?<=[\p{L}\p{N}] )[!?]+["'”’»)\]]*(?=\s|$)/gmu;

const KOREAN_SENTENCE_END =
  /(?:(?<=[가-힣])(?:습니다|입니다|됩니다|습니까|입니까)|[.!?。！？…])[.!?。！？…]*["'”’」』)）]*(?=\s|$)/gmu;

const CHINESE_SENTENCE_END = /[。！？；]+[”’」』）)]*|[.!?;]+["'”’)]*(?=\s|$)/gmu;

const JAPANESE_SENTENCE_END =
  /[。！？]+[」』）)]*|[.!?]+["'”’)]*(?=\s|$)|(?:です|ます|でした|ました)(?=[ \t\n]|$)/gmu;

const ARABIC_SENTENCE_END = /[.!?؟۔]+["'”’»)]*(?=\s|$)/gmu;

const HINDI_SENTENCE_END = /[।॥]+|[.!?]+["'”’)]*(?=\s|$)/gmu;

// Thai marks sentences with spaces between runs of Thai script
const THAI_SENTENCE_END = /[.!?]+(?=\s|$)|(?<=[\u0E00-\u0E7F])(?=[ \t]+[\u0E00-\u0E7F])/gmu;

const MARKDOWN_HEADERS: HeaderRule = {
  pattern: /^(#{1,6})[ \t]+(.+?)(?:[ \t]+#+)?[ \t]*$/gm,
  level: 'markdown',
};

// Numbering shared by Chinese and Japanese chapter markers
const CJK_NUMERAL = '[一二三四五六七八九十百千零〇0-9０-９]+';

function idiom(body: string, level: number, flags = 'gmu'): HeaderRule {
  return { pattern: new RegExp(`^[ \\t]*(${body}[^\\n]*)$`, flags), level };
}

const ROMAN_OR_ARABIC = '(?:\\d+|[IVXLCDM]+)\\b';

const CJK_HEADERS: HeaderRule[] = [
  MARKDOWN_HEADERS,
  idiom(`第${CJK_NUMERAL}[章編编卷部]`, 1),
  idiom(`第${CJK_NUMERAL}[節节]`, 2),
  idiom(`第${CJK_NUMERAL}[条條款]`, 3),
  idiom('[（(][一二三四五六七八九十]+[）)]', 3),
  idiom('[①-⑳]', 4),
];

export const LANGUAGE_DEFINITIONS: Record<LanguageCode, LanguageDefinition> = {
  en: {
    code: 'en',
    name: 'English',
    charsPerToken: 4.0,
    sentenceEnd: ENGLISH_SENTENCE_END,
    headerRules: [
      MARKDOWN_HEADERS,
      idiom(`(?:Chapter|CHAPTER|Part|PART)\\s+${ROMAN_OR_ARABIC}`, 1),
      idiom('(?:Section|SECTION)\\s+\\d+(?:\\.\\d+)*\\b', 2),
    ],
  },
  ko: {
    code: 'ko',
    name: 'Korean',
    charsPerToken: 2.0,
    sentenceEnd: KOREAN_SENTENCE_END,
    quoteAware: true,
    headerRules: [
      MARKDOWN_HEADERS,
      idiom('제\\s*\\d+\\s*[편장부]', 1),
      idiom('제\\s*\\d+\\s*절', 2),
      idiom('제\\s*\\d+\\s*조', 3),
      idiom('[①-⑳]', 4),
    ],
  },
  zh: {
    code: 'zh',
    name: 'Chinese',
    charsPerToken: 1.5,
    sentenceEnd: CHINESE_SENTENCE_END,
    quoteAware: true,
    paragraphMarker: /\n(?=\u3000)/g,
    headerRules: CJK_HEADERS,
  },
  ja: {
    code: 'ja',
    name: 'Japanese',
    charsPerToken: 1.5,
    sentenceEnd: JAPANESE_SENTENCE_END,
    quoteAware: true,
    paragraphMarker: /\n(?=\u3000)/g,
    headerRules: CJK_HEADERS,
  },
  es: {
    code: 'es',
    name: 'Spanish',
    charsPerToken: 4.5,
    sentenceEnd: LATIN_SENTENCE_END,
    headerRules: [
      MARKDOWN_HEADERS,
      idiom(`(?:Capítulo|CAPÍTULO|Parte)\\s+${ROMAN_OR_ARABIC}`, 1),
      idiom('(?:Sección|SECCIÓN)\\s+\\d+', 2),
    ],
  },
  fr: {
    code: 'fr',
    name: 'French',
    charsPerToken: 4.5,
    sentenceEnd: FRENCH_SENTENCE_END,
    headerRules: [
      MARKDOWN_HEADERS,
      idiom(`(?:Chapitre|CHAPITRE|Partie)\\s+${ROMAN_OR_ARABIC}`, 1),
      idiom('(?:Section|SECTION)\\s+\\d+', 2),
    ],
  },
  de: {
    code: 'de',
    name: 'German',
    charsPerToken: 5.0,
    sentenceEnd: LATIN_SENTENCE_END,
    headerRules: [
      MARKDOWN_HEADERS,
      idiom(`(?:Kapitel|KAPITEL|Teil)\\s+${ROMAN_OR_ARABIC}`, 1),
      idiom('(?:Abschnitt|ABSCHNITT)\\s+\\d+', 2),
    ],
  },
  ar: {
    code: 'ar',
    name: 'Arabic',
    charsPerToken: 3.0,
    sentenceEnd: ARABIC_SENTENCE_END,
    headerRules: [MARKDOWN_HEADERS, idiom('(?:الفصل|الباب)\\s+\\S+', 1)],
  },
  hi: {
    code: 'hi',
    name: 'Hindi',
    charsPerToken: 3.0,
    sentenceEnd: HINDI_SENTENCE_END,
    headerRules: [MARKDOWN_HEADERS, idiom('अध्याय\\s+\\S+', 1)],
  },
  pt: {
    code: 'pt',
    name: 'Portuguese',
    charsPerToken: 4.5,
    sentenceEnd: LATIN_SENTENCE_END,
    headerRules: [
      MARKDOWN_HEADERS,
      idiom(`(?:Capítulo|CAPÍTULO|Parte)\\s+${ROMAN_OR_ARABIC}`, 1),
      idiom('(?:Seção|Secção|SEÇÃO)\\s+\\d+', 2),
    ],
  },
  ru: {
    code: 'ru',
    name: 'Russian',
    charsPerToken: 4.0,
    sentenceEnd: LATIN_SENTENCE_END,
    headerRules: [
      MARKDOWN_HEADERS,
      idiom(`(?:Глава|ГЛАВА|Часть)\\s+${ROMAN_OR_ARABIC}`, 1),
      idiom('(?:Раздел|РАЗДЕЛ)\\s+\\d+', 2),
    ],
  },
  vi: {
    code: 'vi',
    name: 'Vietnamese',
    charsPerToken: 4.0,
    sentenceEnd: LATIN_SENTENCE_END,
    headerRules: [
      MARKDOWN_HEADERS,
      idiom(`(?:Chương|CHƯƠNG|Phần)\\s+${ROMAN_OR_ARABIC}`, 1),
      idiom('(?:Mục|MỤC)\\s+\\d+', 2),
    ],
  },
  th: {
    code: 'th',
    name: 'Thai',
    charsPerToken: 2.0,
    sentenceEnd: THAI_SENTENCE_END,
    headerRules: [MARKDOWN_HEADERS, idiom('บทที่\\s*\\S+', 1)],
  },
};
