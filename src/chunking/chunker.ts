import type { LanguageProfile } from "../languages/profile";
import { throwIfCancelled } from "../errors/index";
import { ChunkFinalizer } from "./finalize";
import {
  effectiveOverlap,
  splitSpanByWords,
  UnitAccumulator,
  type AccumulationLimits,
  type TextUnit,
  type UnitGroup,
} from "./accumulator";
import type {
  Chunk,
  ChunkContext,
  ChunkDraft,
  ChunkOptions,
  Chunker,
  ConcreteStrategy,
} from "./types";
import { isBlank } from "./utils";

export function accumulationLimits(options: Readonly<ChunkOptions>): AccumulationLimits {
  return {
    minTokens: options.minChunkSize,
    targetTokens: options.targetChunkSize,
    maxTokens: options.maxChunkSize,
    overlapTokens: effectiveOverlap(options.overlapSize, options.targetChunkSize),
    preserveSentences: options.preserveSentences,
    breakOnSections: options.preserveSectionHeaders,
  };
}

export function createAccumulator(
  text: string,
  options: Readonly<ChunkOptions>,
  profile: LanguageProfile
): UnitAccumulator {
  return new UnitAccumulator(accumulationLimits(options), (unit, limit) =>
    splitSpanByWords(text, unit, limit, profile)
  );
}

export function groupToDraft(group: UnitGroup, strategy: ConcreteStrategy): ChunkDraft | null {
  const first = group.units[0];
  const last = group.units[group.units.length - 1];
  if (!first || !last) return null;
  const firstNew = group.units[group.carried];
  return {
    start: first.start,
    end: last.end,
    strategy,
    ...(group.carried > 0 && firstNew ? { overlapStart: firstNew.start } : {}),
  };
}

/*
 * Marks units that begin with a section header so the accumulator can break before them.
 */
export function markSectionStarts(units: TextUnit[], text: string, profile: LanguageProfile): TextUnit[] {
  const headerStarts = profile.findSectionHeaders(text).map((h) => h.start);
  if (headerStarts.length === 0) return units;
  let h = 0;
  for (const unit of units) {
    while (h < headerStarts.length && (headerStarts[h] ?? 0) < unit.start) h++;
    const headerStart = headerStarts[h];
    if (headerStart === undefined) break;
    if (headerStart < unit.end && text.slice(unit.start, headerStart).trim() === "") {
      unit.startsSection = true;
    }
  }
  return units;
}

/*
 * Shared plumbing for the strategy chunkers: subclasses only describe spans of
 * the source text, this class numbers them and builds the chunk records.
 */
export abstract class BaseChunker implements Chunker {
  abstract readonly strategy: ConcreteStrategy;
  readonly requiresSimilarityOracle: boolean = false;

  protected abstract generate(context: ChunkContext): AsyncGenerator<ChunkDraft>;

  async *stream(context: ChunkContext): AsyncGenerator<ChunkDraft> {
    if (isBlank(context.text)) return;
    throwIfCancelled(context.signal);
    for await (const draft of this.generate(context)) {
      throwIfCancelled(context.signal);
      yield draft;
    }
  }

  async chunk(context: ChunkContext): Promise<Chunk[]> {
    const drafts: ChunkDraft[] = [];
    for await (const draft of this.stream(context)) {
      drafts.push(draft);
    }
    throwIfCancelled(context.signal);
    return new ChunkFinalizer(context.text, context.profile, context.options).buildAll(drafts);
  }

  estimateChunkCount(text: string, options: Readonly<ChunkOptions>, profile: LanguageProfile): number {
    return estimateFromTokens(profile.estimateTokenCount(text), options);
  }
}

export function estimateFromTokens(totalTokens: number, options: Readonly<ChunkOptions>): number {
  if (totalTokens <= 0) return 0;
  if (totalTokens <= options.maxChunkSize) return 1;
  let effectiveSize = options.targetChunkSize - options.overlapSize;
  if (effectiveSize <= 0) effectiveSize = options.targetChunkSize / 2;
  return Math.ceil(totalTokens / effectiveSize);
}
