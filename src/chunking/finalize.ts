import { createHash } from "crypto";
import type { LanguageProfile } from "../languages/profile";
import type { Chunk, ChunkDraft, ChunkOptions, ConcreteStrategy } from "./types";
import { isAtBoundary } from "./accumulator";
import { LineIndex, normalizeWhitespace, trimSpan, type Span } from "./utils";

const ID_LENGTH = 16;

/**
 * Chunk ids are derived from the producing strategy and the trimmed span, so
 * the same text chunked the same way always yields the same ids.
 */
export function createChunkId(strategy: ConcreteStrategy, start: number, end: number, salt = ""): string {
  return createHash("sha256")
    .update(`${strategy}:${start}:${end}${salt ? `:${salt}` : ""}`, "utf8")
    .digest("hex")
    .substring(0, ID_LENGTH);
}

export function draftSpan(text: string, draft: ChunkDraft): Span {
  return trimSpan(text, draft.start, draft.end);
}

export function draftId(text: string, draft: ChunkDraft): string {
  const span = draftSpan(text, draft);
  return createChunkId(draft.strategy, span.start, span.end);
}

/*
 * Turns drafts over one source text into Chunk records.
 */
export class ChunkFinalizer {
  private readonly lines: LineIndex;
  private readonly sentenceBoundaries: ReadonlySet<number>;
  private readonly headerStarts: number[];

  constructor(
    private readonly text: string,
    private readonly profile: LanguageProfile,
    private readonly options: Readonly<ChunkOptions>
  ) {
    this.lines = new LineIndex(text);
    this.sentenceBoundaries = new Set(profile.findSentenceBoundaries(text));
    this.headerStarts = profile.findSectionHeaders(text).map((h) => h.start);
  }

  isEmpty(draft: ChunkDraft): boolean {
    const span = draftSpan(this.text, draft);
    return span.end <= span.start;
  }

  build(draft: ChunkDraft, index: number, totalChunks: number): Chunk {
    const { start, end } = draftSpan(this.text, draft);
    const raw = this.text.slice(start, end);
    const content = this.options.normalizeWhitespace ? normalizeWhitespace(raw) : raw;

    let overlapFromPrevious: string | undefined;
    if (draft.overlapStart !== undefined && draft.overlapStart > start) {
      const carried = this.text.slice(start, draft.overlapStart).trim();
      if (carried) overlapFromPrevious = carried;
    }

    return {
      id: createChunkId(draft.strategy, start, end),
      index,
      totalChunks,
      content,
      metadata: {
        estimatedTokenCount: this.profile.estimateTokenCount(content),
        strategy: draft.strategy,
        languageCode: this.profile.languageCode,
        startsAtSentenceBoundary: isAtBoundary(this.text, start, this.sentenceBoundaries),
        endsAtSentenceBoundary: this.sentenceBoundaries.has(end) || end === this.text.length,
        containsSectionHeader: this.hasHeaderWithin(start, end),
        ...(draft.hierarchyLevel !== undefined ? { hierarchyLevel: draft.hierarchyLevel } : {}),
        ...(draft.parentId !== undefined ? { parentId: draft.parentId } : {}),
        ...(overlapFromPrevious !== undefined ? { overlapFromPrevious } : {}),
      },
      location: {
        startPosition: start,
        endPosition: end,
        startLine: this.lines.lineAt(start),
        endLine: this.lines.lineAt(Math.max(start, end - 1)),
        sectionPath: draft.sectionPath ?? "",
      },
    };
  }

  buildAll(drafts: ChunkDraft[]): Chunk[] {
    const kept = drafts.filter((d) => !this.isEmpty(d));
    return kept.map((draft, i) => this.build(draft, i, kept.length));
  }

  private hasHeaderWithin(start: number, end: number): boolean {
    let lo = 0;
    let hi = this.headerStarts.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if ((this.headerStarts[mid] ?? 0) < start) lo = mid + 1;
      else hi = mid;
    }
    const first = this.headerStarts[lo];
    return first !== undefined && first < end;
  }
}
