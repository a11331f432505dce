import { MAX_BALANCED_VARIANCE_RATIO } from "../config/constants";
import { throwIfCancelled } from "../errors/index";
import type { LanguageProfile } from "../languages/profile";
import { getLanguageRegistry, type LanguageProfileRegistry } from "../languages/registry";
import { isAtBoundary, splitSpanByWords } from "./accumulator";
import { createChunkId } from "./finalize";
import { chunkSpanBySentences } from "./sentence-chunker";
import type { Chunk, ChunkBalanceStats, ChunkMetadata, ChunkLocation, ChunkOptions } from "./types";
import { trimSpan, type Span } from "./utils";

const MERGE_SEPARATOR = "\n\n";

interface WorkingChunk {
  id: string;
  content: string;
  metadata: ChunkMetadata;
  location: ChunkLocation;
}

/*
 * Post-processes any ordered chunk sequence so that chunk sizes fall within
 * [minChunkSize, maxChunkSize]. Undersized chunks are merged into their right
 * neighbour (the last one into its left) when both belong to the same section
 * branch, then oversized chunks are re-split by sentences. Input chunks are
 * never mutated.
 */
export class ChunkBalancer {
  constructor(private readonly registry: LanguageProfileRegistry = getLanguageRegistry()) {}

  async balance(chunks: readonly Chunk[], options: Readonly<ChunkOptions>, signal?: AbortSignal): Promise<Chunk[]> {
    throwIfCancelled(signal);
    if (chunks.length === 0) return [];

    const { merged, absorbed } = this.mergePass(chunks.map(toWorking), options);
    throwIfCancelled(signal);

    const split: WorkingChunk[] = [];
    for (const chunk of merged) {
      if (chunk.metadata.estimatedTokenCount > options.maxChunkSize) {
        throwIfCancelled(signal);
        split.push(...this.splitChunk(chunk, options, signal));
      } else {
        split.push(chunk);
      }
    }

    return split.map((chunk, index) => {
      const parentId = chunk.metadata.parentId;
      const metadata: ChunkMetadata =
        parentId !== undefined ? { ...chunk.metadata, parentId: resolveAbsorbed(parentId, absorbed) } : chunk.metadata;
      return {
        id: chunk.id,
        index,
        totalChunks: split.length,
        content: chunk.content,
        metadata,
        location: chunk.location,
      };
    });
  }

  private mergePass(
    input: WorkingChunk[],
    options: Readonly<ChunkOptions>
  ): { merged: WorkingChunk[]; absorbed: Map<string, string> } {
    const absorbed = new Map<string, string>();
    const merged: WorkingChunk[] = [];
    let i = 0;

    while (i < input.length) {
      let current = input[i];
      if (!current) break;
      i++;
      while (current.metadata.estimatedTokenCount < options.minChunkSize) {
        const next = input[i];
        if (!next || !canAbsorb(current, next)) break;
        current = this.mergePair(current, next);
        absorbed.set(next.id, current.id);
        i++;
      }
      merged.push(current);
    }

    // A trailing undersized chunk has no right neighbour; fold it into the left one
    const last = merged[merged.length - 1];
    const previous = merged[merged.length - 2];
    if (
      last &&
      previous &&
      last.metadata.estimatedTokenCount < options.minChunkSize &&
      canAbsorb(previous, last)
    ) {
      merged.splice(merged.length - 2, 2, this.mergePair(previous, last));
      absorbed.set(last.id, previous.id);
    }

    return { merged, absorbed };
  }

  private mergePair(left: WorkingChunk, right: WorkingChunk): WorkingChunk {
    const content = `${left.content}${MERGE_SEPARATOR}${right.content}`;
    return {
      id: left.id,
      content,
      metadata: {
        ...left.metadata,
        estimatedTokenCount: this.profileOf(left).estimateTokenCount(content),
        endsAtSentenceBoundary: right.metadata.endsAtSentenceBoundary,
        containsSectionHeader: left.metadata.containsSectionHeader || right.metadata.containsSectionHeader,
      },
      location: {
        ...left.location,
        endPosition: Math.max(left.location.endPosition, right.location.endPosition),
        endLine: Math.max(left.location.endLine, right.location.endLine),
      },
    };
  }

  /*
   * Re-splits an oversized chunk by sentences into pieces of roughly equal size
   * near the target; a piece still over the maximum is cut on word boundaries. Positions of the fragments are mapped back through the
   * chunk's start offset: exact for chunks taken verbatim from the source,
   * approximate for chunks that were merged or had their whitespace normalized.
   */
  private splitChunk(chunk: WorkingChunk, options: Readonly<ChunkOptions>, signal?: AbortSignal): WorkingChunk[] {
    const profile = this.profileOf(chunk);
    const { content } = chunk;
    const limit = pieceLimit(chunk.metadata.estimatedTokenCount, options);
    const splitOptions: Readonly<ChunkOptions> = {
      ...options,
      targetChunkSize: limit,
      maxChunkSize: limit,
      minChunkSize: Math.min(options.minChunkSize, limit),
      overlapSize: 0,
      preserveSentences: false,
      preserveSectionHeaders: false,
    };

    const spans: Span[] = [];
    for (const draft of chunkSpanBySentences(content, splitOptions, profile, chunk.metadata.strategy, 0, content.length, signal)) {
      const span = trimSpan(content, draft.start, draft.end);
      if (span.end <= span.start) continue;
      const tokens = profile.estimateSpanTokens(content, span.start, span.end);
      if (tokens <= options.maxChunkSize) {
        spans.push(span);
        continue;
      }
      for (const piece of splitSpanByWords(content, { ...span, tokens }, options.maxChunkSize, profile)) {
        spans.push({ start: piece.start, end: piece.end });
      }
    }

    // The remainder after the last full piece folds back when the union still fits
    const last = spans[spans.length - 1];
    const previous = spans[spans.length - 2];
    if (
      last &&
      previous &&
      profile.estimateSpanTokens(content, last.start, last.end) < options.minChunkSize &&
      profile.estimateSpanTokens(content, previous.start, last.end) <= options.maxChunkSize
    ) {
      spans.splice(spans.length - 2, 2, { start: previous.start, end: last.end });
    }

    if (spans.length === 0) return [chunk];
    const boundaries = new Set(profile.findSentenceBoundaries(content));

    return spans.map(({ start, end }, i) => {
      const text = content.slice(start, end);
      const first = i === 0;
      const startPosition = Math.min(chunk.location.startPosition + start, chunk.location.endPosition);
      const endPosition = Math.min(chunk.location.startPosition + end, chunk.location.endPosition);

      return {
        id: first ? chunk.id : createChunkId(chunk.metadata.strategy, startPosition, endPosition, chunk.id),
        content: text,
        metadata: {
          ...(first ? chunk.metadata : withoutOverlap(chunk.metadata)),
          estimatedTokenCount: profile.estimateTokenCount(text),
          startsAtSentenceBoundary: first ? chunk.metadata.startsAtSentenceBoundary : isAtBoundary(content, start, boundaries),
          endsAtSentenceBoundary:
            end === content.length ? chunk.metadata.endsAtSentenceBoundary : boundaries.has(end),
          containsSectionHeader: profile.findSectionHeaders(text).length > 0,
        },
        location: {
          ...chunk.location,
          startPosition,
          endPosition,
          startLine: chunk.location.startLine + countNewlines(content, 0, start),
          endLine: chunk.location.startLine + countNewlines(content, 0, end),
        },
      };
    });
  }

  private profileOf(chunk: WorkingChunk): LanguageProfile {
    return this.registry.getProfile(chunk.metadata.languageCode);
  }
}

/*
 * Token-size summary of a chunk sequence. Pure; never mutates its input.
 */
export function calculateStats(chunks: readonly Chunk[], options: Readonly<ChunkOptions>): ChunkBalanceStats {
  if (chunks.length === 0) {
    return {
      chunkCount: 0,
      minTokenCount: 0,
      maxTokenCount: 0,
      averageTokenCount: 0,
      standardDeviation: 0,
      varianceRatio: 0,
      undersizedChunkCount: 0,
      oversizedChunkCount: 0,
      isBalanced: false,
    };
  }

  const counts = chunks.map((c) => c.metadata.estimatedTokenCount);
  const min = Math.min(...counts);
  const max = Math.max(...counts);
  const average = counts.reduce((sum, n) => sum + n, 0) / counts.length;
  const variance = counts.reduce((sum, n) => sum + (n - average) ** 2, 0) / counts.length;
  const varianceRatio = min > 0 ? max / min : 0;
  const undersized = counts.filter((n) => n < options.minChunkSize).length;
  const oversized = counts.filter((n) => n > options.maxChunkSize).length;

  return {
    chunkCount: chunks.length,
    minTokenCount: min,
    maxTokenCount: max,
    averageTokenCount: average,
    standardDeviation: Math.sqrt(variance),
    varianceRatio,
    undersizedChunkCount: undersized,
    oversizedChunkCount: oversized,
    isBalanced: varianceRatio <= MAX_BALANCED_VARIANCE_RATIO && undersized === 0 && oversized === 0,
  };
}

// Even share of `tokens` over as many target-sized pieces as it needs
function pieceLimit(tokens: number, options: Readonly<ChunkOptions>): number {
  const pieces = Math.max(1, Math.ceil(tokens / Math.max(1, options.targetChunkSize)));
  const even = Math.ceil(tokens / pieces);
  return Math.min(options.maxChunkSize, Math.max(options.minChunkSize, even, 1));
}

/*
 * A merged chunk keeps the left chunk's section path, and chunks that named the
 * right one as parent are re-pointed at it, so the left path must lead to the right.
 */
function canAbsorb(left: WorkingChunk, right: WorkingChunk): boolean {
  const outer = left.location.sectionPath;
  const inner = right.location.sectionPath;
  return outer === "" || outer === inner || inner.startsWith(`${outer}/`);
}

function toWorking(chunk: Chunk): WorkingChunk {
  return {
    id: chunk.id,
    content: chunk.content,
    metadata: { ...chunk.metadata },
    location: { ...chunk.location },
  };
}

// Only the first fragment still follows the previous chunk
function withoutOverlap(metadata: ChunkMetadata): ChunkMetadata {
  const copy = { ...metadata };
  delete copy.overlapFromPrevious;
  return copy;
}

function resolveAbsorbed(id: string, absorbed: ReadonlyMap<string, string>): string {
  let current = id;
  const seen = new Set<string>();
  while (absorbed.has(current) && !seen.has(current)) {
    seen.add(current);
    current = absorbed.get(current) ?? current;
  }
  return current;
}

function countNewlines(text: string, start: number, end: number): number {
  let count = 0;
  for (let i = start; i < end; i++) {
    if (text.charCodeAt(i) === 0x0a) count++;
  }
  return count;
}
