// Same set of characters as \s in a JavaScript RegExp
export function isWhitespaceCode(code: number): boolean {
  if (code === 0x20 || (code >= 0x09 && code <= 0x0d)) return true;
  if (code < 0x80) return false;
  return (
    code === 0xa0 ||
    code === 0x1680 ||
    (code >= 0x2000 && code <= 0x200a) ||
    code === 0x2028 ||
    code === 0x2029 ||
    code === 0x202f ||
    code === 0x205f ||
    code === 0x3000 ||
    code === 0xfeff
  );
}

/*
 * Counts non-whitespace code points in text[start, end). A surrogate pair counts
 * once, so emoji and supplementary CJK weigh the same as any other character.
 */
export function countNonWhitespace(
  text: string,
  start = 0,
  end = text.length
): number {
  let count = 0;
  for (let i = start; i < end; i++) {
    const code = text.charCodeAt(i);
    if (code >= 0xdc00 && code <= 0xdfff && i > start) {
      const prev = text.charCodeAt(i - 1);
      if (prev >= 0xd800 && prev <= 0xdbff) continue;
    }
    if (!isWhitespaceCode(code)) count++;
  }
  return count;
}

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export interface Span {
  start: number;
  end: number;
}

// Shrinks [start, end) so it neither begins nor ends with whitespace
export function trimSpan(text: string, start: number, end: number): Span {
  let s = start;
  let e = end;
  while (s < e && isWhitespaceCode(text.charCodeAt(s))) s++;
  while (e > s && isWhitespaceCode(text.charCodeAt(e - 1))) e--;
  return { start: s, end: e };
}

export function isBlank(text: string | null | undefined): boolean {
  return !text || text.trim().length === 0;
}

/*
 * Maps character offsets to 1-based line numbers.
 */
export class LineIndex {
  private readonly lineStarts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 0x0a) this.lineStarts.push(i + 1);
    }
  }

  lineAt(position: number): number {
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      const lineStart = this.lineStarts[mid] ?? 0;
      if (lineStart <= position) lo = mid;
      else hi = mid - 1;
    }
    return lo + 1;
  }
}
