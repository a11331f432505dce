import { throwIfCancelled } from "../errors/index";
import { effectiveOverlap, splitSpanByWords } from "./accumulator";
import { BaseChunker } from "./chunker";
import { ChunkingStrategy, type ChunkContext, type ChunkDraft } from "./types";

interface Word {
  start: number;
  end: number;
  chars: number;
}

function collectWords(text: string): Word[] {
  const words: Word[] = [];
  for (const match of text.matchAll(/\S+/g)) {
    const start = match.index ?? 0;
    words.push({ start, end: start + match[0].length, chars: [...match[0]].length });
  }
  return words;
}

/*
 * Fixed-size windows over whitespace-delimited words. Sizes are compared in
 * characters: a window of c non-whitespace characters estimates to
 * ceil(c / charsPerToken) tokens, so it fits `n` tokens iff c <= n * charsPerToken.
 */
export class TokenChunker extends BaseChunker {
  readonly strategy = ChunkingStrategy.Token;

  protected async *generate({ text, options, profile, signal }: ChunkContext): AsyncGenerator<ChunkDraft> {
    const words = collectWords(text);
    const cpt = profile.charsPerToken;
    const targetChars = options.targetChunkSize * cpt;
    const maxChars = options.maxChunkSize * cpt;
    const minChars = (options.minChunkSize - 1) * cpt; // more than this reaches the minimum
    const overlapChars = effectiveOverlap(options.overlapSize, options.targetChunkSize) * cpt;
    const boundaries = options.preserveSentences ? new Set(profile.findSentenceBoundaries(text)) : null;

    let windowStart = 0; // First word of the chunk, overlap included
    let next = 0; // First word not yet emitted

    while (next < words.length) {
      throwIfCancelled(signal);
      const first = words[next];
      if (!first) break;

      if (first.chars > maxChars) {
        for (const piece of splitSpanByWords(text, { start: first.start, end: first.end, tokens: 0 }, options.targetChunkSize, profile)) {
          yield { start: piece.start, end: piece.end, strategy: this.strategy };
        }
        next++;
        windowStart = next;
        continue;
      }

      let chars = 0;
      for (let k = windowStart; k < next; k++) chars += words[k]?.chars ?? 0;
      if (chars + first.chars > targetChars) {
        windowStart = next;
        chars = 0;
      }

      let end = next;
      while (end < words.length) {
        const word = words[end];
        if (!word) break;
        if (end > next && chars + word.chars > targetChars) break;
        chars += word.chars;
        end++;
      }

      if (boundaries && end < words.length) {
        end = this.snapToSentence(words, boundaries, windowStart, next, end, minChars);
      }

      const last = words[end - 1];
      const head = words[windowStart];
      if (!last || !head) break;
      yield {
        start: head.start,
        end: last.end,
        strategy: this.strategy,
        ...(windowStart < next ? { overlapStart: first.start } : {}),
      };

      // Carry trailing words into the next window, never the whole chunk
      let carryFrom = end;
      let carried = 0;
      while (carryFrom - 1 > windowStart) {
        const word = words[carryFrom - 1];
        if (!word || carried + word.chars > overlapChars) break;
        carried += word.chars;
        carryFrom--;
      }
      windowStart = carryFrom;
      next = end;
    }
  }

  /*
   * Moves the cut back to the last word ending on a sentence boundary, unless the
   * shortened chunk would fall below the minimum size.
   */
  private snapToSentence(
    words: Word[],
    boundaries: ReadonlySet<number>,
    windowStart: number,
    next: number,
    end: number,
    minChars: number
  ): number {
    const lastWord = words[end - 1];
    if (!lastWord || boundaries.has(lastWord.end)) return end;

    let chars = 0;
    for (let k = windowStart; k < end; k++) chars += words[k]?.chars ?? 0;

    for (let k = end - 1; k > next; k--) {
      chars -= words[k]?.chars ?? 0;
      const candidate = words[k - 1];
      if (!candidate) break;
      if (chars <= minChars) break;
      if (boundaries.has(candidate.end)) return k;
    }
    return end;
  }
}
