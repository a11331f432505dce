import { describe, it, expect } from 'vitest';
import { getLanguageRegistry, getProfile, LanguageProfileRegistry } from '../src/languages/registry';
import { detectLanguage } from '../src/languages/script-detector';

describe('Script detection', () => {
  it('detects the dominant script', () => {
    expect(detectLanguage('안녕하세요 세계')).toBe('ko');
    expect(detectLanguage('これは日本語です')).toBe('ja');
    expect(detectLanguage('这是中文')).toBe('zh');
    expect(detectLanguage('Привет мир')).toBe('ru');
    expect(detectLanguage('Hello world')).toBe('en');
  });

  it('counts Han toward Japanese only when kana is present', () => {
    expect(detectLanguage('日本')).toBe('zh');
    expect(detectLanguage('日本です')).toBe('ja');
  });

  it('tells Vietnamese from other Latin text', () => {
    expect(detectLanguage('Tiếng Việt rất đẹp')).toBe('vi');
  });

  it('falls back to English without letters', () => {
    expect(detectLanguage('')).toBe('en');
    expect(detectLanguage(null)).toBe('en');
    expect(detectLanguage('12345 !!!')).toBe('en');
  });
});

describe('LanguageProfile', () => {
  const en = getProfile('en');

  describe('estimateTokenCount', () => {
    it('divides non-whitespace characters by the language ratio', () => {
      expect(en.estimateTokenCount('Hello world')).toBe(3);
      expect(getProfile('ko').estimateTokenCount('안녕하세요')).toBe(3);
      expect(getProfile('zh').estimateTokenCount('你好世界')).toBe(3);
    });

    it('returns 0 for empty input', () => {
      expect(en.estimateTokenCount('')).toBe(0);
      expect(en.estimateTokenCount(null)).toBe(0);
      expect(en.estimateTokenCount('   \n\t ')).toBe(0);
    });

    it('counts a surrogate pair once', () => {
      expect(en.estimateTokenCount('😀😀😀😀😀')).toBe(2);
    });

    it('is monotone under appending', () => {
      const base = 'The quick brown fox';
      expect(en.estimateTokenCount(`${base} jumps over the dog`)).toBeGreaterThanOrEqual(
        en.estimateTokenCount(base)
      );
    });
  });

  describe('findSentenceBoundaries', () => {
    it('skips abbreviations', () => {
      expect(en.findSentenceBoundaries('Dr. Smith arrived. He sat down.')).toEqual([18, 31]);
    });

    it('does not split decimals', () => {
      expect(en.findSentenceBoundaries('Version 2.5 is out. Next.')).toEqual([19, 25]);
    });

    it('always ends at the text length', () => {
      const text = 'no terminator here';
      expect(en.findSentenceBoundaries(text)).toEqual([text.length]);
    });

    it('returns nothing for empty text', () => {
      expect(en.findSentenceBoundaries('')).toEqual([]);
    });

    it('recognises Korean formal endings', () => {
      expect(getProfile('ko').findSentenceBoundaries('안녕하세요. 반갑습니다 감사합니다.')).toEqual([6, 12, 19]);
    });

    it('splits Chinese on full-width terminators', () => {
      expect(getProfile('zh').findSentenceBoundaries('今天天气很好。我们去公园吧！')).toEqual([7, 14]);
    });

    it('ignores terminators inside quotes for quote-aware languages', () => {
      const text = '그는 "좋아. 가자." 말했다. 끝.';
      const boundaries = getProfile('ko').findSentenceBoundaries(text);
      expect(boundaries).not.toContain(text.indexOf('좋아.') + 3);
      expect(boundaries[boundaries.length - 1]).toBe(text.length);
    });

    it('returns strictly increasing offsets', () => {
      const boundaries = en.findSentenceBoundaries('One. Two! Three? Four.');
      for (let i = 1; i < boundaries.length; i++) {
        expect(boundaries[i]).toBeGreaterThan(boundaries[i - 1] ?? -1);
      }
    });
  });

  describe('findParagraphBoundaries', () => {
    it('splits on blank lines', () => {
      expect(en.findParagraphBoundaries('A.\n\nB.\n\nC.')).toEqual([4, 8, 10]);
    });

    it('returns only the text length without blank lines', () => {
      expect(en.findParagraphBoundaries('one line\nanother line')).toEqual([21]);
    });
  });

  describe('findSectionHeaders', () => {
    const text = '# Intro\ntext\n## Details\nmore\nChapter 3 The End\n```\n# not a header\n```';

    it('finds markdown and idiom headers in order', () => {
      const headers = en.findSectionHeaders(text);
      expect(headers.map((h) => [h.level, h.headerText])).toEqual([
        [1, 'Intro'],
        [2, 'Details'],
        [1, 'Chapter 3 The End'],
      ]);
      expect(headers.map((h) => h.start)).toEqual([0, 13, 29]);
    });

    it('ignores headers inside fenced code', () => {
      expect(en.findSectionHeaders(text).some((h) => h.headerText === 'not a header')).toBe(false);
    });

    it('recognises Korean article headers', () => {
      const headers = getProfile('ko').findSectionHeaders('제1장 총칙\n내용\n제2조 목적\n내용');
      expect(headers.map((h) => h.level)).toEqual([1, 3]);
    });
  });
});

describe('LanguageProfileRegistry', () => {
  const registry = getLanguageRegistry();

  it('is a shared singleton', () => {
    expect(getLanguageRegistry()).toBe(registry);
  });

  it('resolves codes case-insensitively and through region tags', () => {
    expect(registry.getProfile('KO').languageCode).toBe('ko');
    expect(registry.getProfile('ko-KR').languageCode).toBe('ko');
    expect(registry.getProfile('pt_BR').languageCode).toBe('pt');
  });

  it('falls back to the default profile for unknown codes', () => {
    expect(registry.getProfile('xx').languageCode).toBe('en');
    expect(registry.getProfile(null)).toBe(registry.defaultProfile);
    expect(registry.hasProfile('xx')).toBe(false);
    expect(registry.hasProfile('ZH')).toBe(true);
  });

  it('prefers an explicit code over detection', () => {
    expect(registry.resolveProfile('안녕하세요', null).languageCode).toBe('ko');
    expect(registry.resolveProfile('안녕하세요', 'ja').languageCode).toBe('ja');
    expect(registry.resolveProfile('안녕하세요', '  ').languageCode).toBe('ko');
  });

  it('lists every supported language', () => {
    expect(new LanguageProfileRegistry().supportedLanguages()).toHaveLength(13);
  });
});
