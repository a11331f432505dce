import type { LanguageProfile } from "../languages/profile";
import { isWhitespaceCode } from "./utils";

// A contiguous span of the source text: a sentence, paragraph or word run
export interface TextUnit {
  start: number;
  end: number;
  tokens: number;
  startsSection?: boolean;
}

export interface UnitGroup {
  units: TextUnit[];
  carried: number; // Leading units repeated from the previous group as overlap
  tokens: number;
}

export interface AccumulationLimits {
  minTokens: number;
  targetTokens: number;
  maxTokens: number;
  overlapTokens: number;
  preserveSentences: boolean;
  breakOnSections: boolean;
}

export type UnitSplitter = (unit: TextUnit, limit: number) => TextUnit[];

/*
 * Overlap is capped at half the target so every chunk carries new material.
 */
export function effectiveOverlap(overlapSize: number, targetChunkSize: number): number {
  return Math.max(0, Math.min(overlapSize, Math.floor(targetChunkSize / 2)));
}

/*
 * Cuts text between each pair of consecutive boundaries, dropping blank spans.
 * Boundaries are offsets relative to `offset`.
 */
export function unitsFromBoundaries(
  text: string,
  boundaries: number[],
  profile: LanguageProfile,
  offset = 0,
  rangeStart = offset
): TextUnit[] {
  const units: TextUnit[] = [];
  let prev = rangeStart;
  for (const relative of boundaries) {
    const boundary = relative + offset;
    if (boundary <= prev) continue;
    const tokens = profile.estimateSpanTokens(text, prev, boundary);
    if (tokens > 0) units.push({ start: prev, end: boundary, tokens });
    prev = boundary;
  }
  return units;
}

export function sentenceUnits(
  text: string,
  profile: LanguageProfile,
  start = 0,
  end = text.length
): TextUnit[] {
  const slice = start === 0 && end === text.length ? text : text.slice(start, end);
  return unitsFromBoundaries(text, profile.findSentenceBoundaries(slice), profile, start);
}

/*
 * Splits a span on word boundaries into pieces of at most `limit` tokens. A single
 * word longer than the limit is cut by characters.
 */
export function splitSpanByWords(
  text: string,
  unit: TextUnit,
  limit: number,
  profile: LanguageProfile
): TextUnit[] {
  const pieces: TextUnit[] = [];
  const words = text.slice(unit.start, unit.end).matchAll(/\S+/g);
  let pieceStart = -1;
  let pieceEnd = -1;
  let pieceChars = 0;
  const maxChars = Math.max(1, Math.floor(limit * profile.charsPerToken));

  const flush = (): void => {
    if (pieceStart >= 0) {
      pieces.push({ start: pieceStart, end: pieceEnd, tokens: Math.ceil(pieceChars / profile.charsPerToken) });
    }
    pieceStart = -1;
    pieceChars = 0;
  };

  for (const match of words) {
    const wordStart = unit.start + (match.index ?? 0);
    const word = match[0];
    const wordChars = [...word].length;

    if (wordChars > maxChars) {
      flush();
      const codePoints = [...word];
      let cursor = wordStart;
      for (let i = 0; i < codePoints.length; i += maxChars) {
        const part = codePoints.slice(i, i + maxChars).join("");
        pieces.push({
          start: cursor,
          end: cursor + part.length,
          tokens: Math.ceil([...part].length / profile.charsPerToken),
        });
        cursor += part.length;
      }
      continue;
    }

    if (pieceStart >= 0 && pieceChars + wordChars > maxChars) flush();
    if (pieceStart < 0) pieceStart = wordStart;
    pieceEnd = wordStart + word.length;
    pieceChars += wordChars;
  }
  flush();
  return pieces;
}

/*
 * Greedy unit accumulation shared by the sentence-based strategies and the
 * balancer. A group is closed when the next unit would push it over the maximum
 * and it already holds the minimum. Closed groups are released one step late so
 * an undersized final group can fold into its predecessor.
 */
export class UnitAccumulator {
  private buffer: TextUnit[] = [];
  private carried = 0;
  private tokens = 0;
  private pending: UnitGroup | null = null;
  private flushes = 0;

  constructor(
    private readonly limits: AccumulationLimits,
    private readonly splitter: UnitSplitter
  ) {}

  get bufferTokens(): number {
    return this.tokens;
  }

  get currentUnits(): readonly TextUnit[] {
    return this.buffer;
  }

  get hasNewContent(): boolean {
    return this.buffer.length > this.carried;
  }

  // Increments every time the buffer is restarted
  get generation(): number {
    return this.flushes;
  }

  add(unit: TextUnit): UnitGroup[] {
    const { minTokens, maxTokens, targetTokens, preserveSentences, breakOnSections } = this.limits;
    const out: UnitGroup[] = [];

    if (unit.tokens > maxTokens) {
      if (!preserveSentences) {
        for (const piece of this.splitter(unit, targetTokens)) out.push(...this.add(piece));
        return out;
      }
      if (this.hasNewContent) out.push(...this.flush(false));
      else this.reset([]);
      this.buffer = [unit];
      this.tokens = unit.tokens;
      out.push(...this.flush(false));
      return out;
    }

    if (breakOnSections && unit.startsSection && this.hasNewContent && this.tokens >= minTokens) {
      out.push(...this.flush(false));
    }

    if (this.tokens + unit.tokens > maxTokens) {
      // Inclusive: a group holding exactly the minimum may close
      if (this.hasNewContent && this.tokens >= minTokens) {
        out.push(...this.flush(true));
      } else if (this.hasNewContent && !preserveSentences) {
        const [head, ...rest] = this.splitter(unit, maxTokens - this.tokens);
        const restStart = rest[0]?.start;
        if (head && restStart !== undefined) {
          // Top the undersized group up to the maximum and carry on with the tail
          this.buffer.push(head);
          this.tokens += head.tokens;
          out.push(...this.flush(true));
          const tail = { start: restStart, end: unit.end, tokens: rest.reduce((sum, u) => sum + u.tokens, 0) };
          out.push(...this.add(tail));
          return out;
        }
      }
      if (!this.hasNewContent && this.tokens + unit.tokens > maxTokens) {
        this.reset([]);
      }
    }

    this.buffer.push(unit);
    this.tokens += unit.tokens;
    return out;
  }

  /*
   * Closes the running group now, regardless of size, when it holds new material.
   */
  breakHere(carryOverlap: boolean): UnitGroup[] {
    return this.hasNewContent ? this.flush(carryOverlap) : [];
  }

  /*
   * Releases everything still held. The accumulator starts empty afterwards.
   */
  finish(): UnitGroup[] {
    const out: UnitGroup[] = [];
    const last = this.hasNewContent ? this.takeGroup() : null;
    const pending = this.pending;
    this.pending = null;
    this.reset([]);

    if (pending && last && last.tokens < this.limits.minTokens) {
      const fresh = last.units.slice(last.carried);
      const freshTokens = fresh.reduce((sum, u) => sum + u.tokens, 0);
      if (pending.tokens + freshTokens <= this.limits.maxTokens) {
        out.push({
          units: [...pending.units, ...fresh],
          carried: pending.carried,
          tokens: pending.tokens + freshTokens,
        });
        return out;
      }
    }
    if (pending) out.push(pending);
    if (last) out.push(last);
    return out;
  }

  private flush(carryOverlap: boolean): UnitGroup[] {
    const group = this.takeGroup();
    const released = this.pending;
    this.pending = group;

    const overlap = carryOverlap ? this.overlapUnits(group.units) : [];
    this.reset(overlap);
    return released ? [released] : [];
  }

  private takeGroup(): UnitGroup {
    return { units: this.buffer, carried: this.carried, tokens: this.tokens };
  }

  private reset(carry: TextUnit[]): void {
    this.buffer = [...carry];
    this.carried = carry.length;
    this.tokens = carry.reduce((sum, u) => sum + u.tokens, 0);
    this.flushes++;
  }

  private overlapUnits(units: TextUnit[]): TextUnit[] {
    const budget = this.limits.overlapTokens;
    if (budget <= 0) return [];
    const carry: TextUnit[] = [];
    let total = 0;
    for (let i = units.length - 1; i > 0; i--) {
      const unit = units[i];
      if (!unit || total + unit.tokens > budget) break;
      carry.unshift(unit);
      total += unit.tokens;
    }
    return carry;
  }
}

/*
 * True when `position`, after stepping back over whitespace, sits on a sentence
 * boundary or the start of the text.
 */
export function isAtBoundary(text: string, position: number, boundaries: ReadonlySet<number>): boolean {
  let p = position;
  while (p > 0 && isWhitespaceCode(text.charCodeAt(p - 1))) p--;
  return p === 0 || boundaries.has(p) || boundaries.has(position);
}
