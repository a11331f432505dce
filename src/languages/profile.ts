import { z } from 'zod';
import RAW_ABBREVIATIONS from './data/abbreviations.json';
import { countNonWhitespace, isWhitespaceCode } from '../chunking/utils';
import { LANGUAGE_CODES, type LanguageCode, type LanguageDefinition, type SectionHeader } from './types';

const ABBREVIATIONS_SCHEMA = z.record(z.enum(LANGUAGE_CODES), z.array(z.string()));
const ABBREVIATIONS = ABBREVIATIONS_SCHEMA.parse(RAW_ABBREVIATIONS);

// Idiom headers longer than this are prose that happens to start with "Chapter 3"
const MAX_IDIOM_HEADER_LENGTH = 100;

// How far back to look for the word in front of a terminator
const ABBREVIATION_LOOKBACK = 24;

const OPENERS: Record<string, string> = {
  '“': '”',
  '‘': '’',
  '「': '」',
  '『': '』',
  '（': '）',
  '(': ')',
  '《': '》',
  '〈': '〉',
};
const CLOSERS = new Set(Object.values(OPENERS));

/*
 * Boundary detection and token estimation for one language. Instances are built
 * once by the registry from a LanguageDefinition and never change afterwards.
 */
export class LanguageProfile {
  readonly languageCode: LanguageCode;
  readonly languageName: string;
  readonly charsPerToken: number;
  readonly abbreviations: ReadonlySet<string>;
  private readonly definition: LanguageDefinition;

  constructor(definition: LanguageDefinition) {
    this.definition = definition;
    this.languageCode = definition.code;
    this.languageName = definition.name;
    this.charsPerToken = definition.charsPerToken;
    this.abbreviations = new Set(
      (ABBREVIATIONS[definition.code] ?? []).map((a) => a.toLowerCase())
    );
  }

  estimateTokenCount(text: string | null | undefined): number {
    if (!text) return 0;
    return Math.ceil(countNonWhitespace(text) / this.charsPerToken);
  }

  /*
   * Token estimate for text[start, end) without slicing.
   */
  estimateSpanTokens(text: string, start: number, end: number): number {
    if (end <= start) return 0;
    return Math.ceil(countNonWhitespace(text, start, end) / this.charsPerToken);
  }

  findSentenceBoundaries(text: string | null | undefined): number[] {
    if (!text) return [];

    const boundaries: number[] = [];
    let depth = 0;
    let straightQuoteOpen = false;
    let scanned = 0;

    for (const match of text.matchAll(this.definition.sentenceEnd)) {
      const markAt = match.index ?? 0;
      const end = markAt + match[0].length;

      if (this.definition.quoteAware) {
        for (; scanned < end; scanned++) {
          const ch = text.charAt(scanned);
          if (ch === '"') straightQuoteOpen = !straightQuoteOpen;
          else if (ch in OPENERS) depth++;
          else if (CLOSERS.has(ch) && depth > 0) depth--;
        }
        if (depth > 0 || straightQuoteOpen) continue;
      }

      if (this.endsWithAbbreviation(text, markAt)) continue;
      if (end > 0 && boundaries[boundaries.length - 1] !== end) {
        boundaries.push(end);
      }
    }

    if (boundaries[boundaries.length - 1] !== text.length) {
      boundaries.push(text.length);
    }
    return boundaries;
  }

  findParagraphBoundaries(text: string | null | undefined): number[] {
    if (!text) return [];

    const found = new Set<number>();
    for (const match of text.matchAll(/\n\s*\n/g)) {
      found.add((match.index ?? 0) + match[0].length);
    }
    if (this.definition.paragraphMarker) {
      for (const match of text.matchAll(this.definition.paragraphMarker)) {
        found.add((match.index ?? 0) + match[0].length);
      }
    }

    const boundaries = [...found]
      .filter((b) => b > 0 && b < text.length)
      .sort((a, b) => a - b);
    boundaries.push(text.length);
    return boundaries;
  }

  findSectionHeaders(text: string | null | undefined): SectionHeader[] {
    if (!text) return [];

    const fences = findFencedBlocks(text);
    const headers: SectionHeader[] = [];

    for (const rule of this.definition.headerRules) {
      for (const match of text.matchAll(rule.pattern)) {
        const lineStart = match.index ?? 0;
        const line = match[0];
        const indent = line.length - line.trimStart().length;
        const start = lineStart + indent;
        const end = lineStart + line.trimEnd().length;
        if (fences.some((f) => start >= f.start && start < f.end)) continue;

        let level: number;
        let headerText: string;
        if (rule.level === 'markdown') {
          level = (match[1] ?? '#').length;
          headerText = (match[2] ?? '').trim();
        } else {
          level = rule.level;
          headerText = (match[1] ?? line).trim();
          if (headerText.length > MAX_IDIOM_HEADER_LENGTH) continue;
        }
        if (!headerText) continue;
        headers.push({ start, end, headerText, level });
      }
    }

    headers.sort((a, b) => a.start - b.start || a.level - b.level);

    // Earlier rules win when two rules claim the same line
    const result: SectionHeader[] = [];
    for (const header of headers) {
      const last = result[result.length - 1];
      if (last && header.start < last.end) continue;
      result.push(header);
    }
    return result;
  }

  isAbbreviation(word: string): boolean {
    return this.abbreviations.has(word.toLowerCase());
  }

  private endsWithAbbreviation(text: string, markAt: number): boolean {
    if (this.abbreviations.size === 0) return false;
    if (text.charAt(markAt) !== '.') return false;

    let wordStart = markAt;
    const limit = Math.max(0, markAt - ABBREVIATION_LOOKBACK);
    while (wordStart > limit && !isWhitespaceCode(text.charCodeAt(wordStart - 1))) {
      wordStart--;
    }
    const word = text.slice(wordStart, markAt + 1).replace(/^["'“‘(¿¡«]+/, '');
    return this.isAbbreviation(word);
  }
}

function findFencedBlocks(text: string): Array<{ start: number; end: number }> {
  const blocks: Array<{ start: number; end: number }> = [];
  let openAt: number | null = null;
  for (const match of text.matchAll(/^[ \t]*(?:```|~~~)/gm)) {
    const at = match.index ?? 0;
    if (openAt === null) {
      openAt = at;
    } else {
      blocks.push({ start: openAt, end: at + match[0].length });
      openAt = null;
    }
  }
  if (openAt !== null) blocks.push({ start: openAt, end: text.length });
  return blocks;
}
