import type { LanguageProfile } from "../languages/profile";
import { throwIfCancelled } from "../errors/index";
import { sentenceUnits, type TextUnit } from "./accumulator";
import { BaseChunker, createAccumulator, groupToDraft, markSectionStarts } from "./chunker";
import { ChunkingStrategy, type ChunkContext, type ChunkDraft, type ChunkOptions } from "./types";

/*
 * Runs the sentence accumulation over text[start, end). Used on whole documents
 * and, by the other strategies and the balancer, on a single oversized span.
 */
export function* chunkSpanBySentences(
  text: string,
  options: Readonly<ChunkOptions>,
  profile: LanguageProfile,
  strategy: ChunkDraft["strategy"],
  start = 0,
  end = text.length,
  signal?: AbortSignal
): Generator<ChunkDraft> {
  let units: TextUnit[] = sentenceUnits(text, profile, start, end);
  if (options.preserveSectionHeaders) {
    units = markSectionStarts(units, text, profile);
  }
  const accumulator = createAccumulator(text, options, profile);

  for (const unit of units) {
    for (const group of accumulator.add(unit)) {
      const draft = groupToDraft(group, strategy);
      if (draft) yield draft;
      throwIfCancelled(signal);
    }
  }
  for (const group of accumulator.finish()) {
    const draft = groupToDraft(group, strategy);
    if (draft) yield draft;
  }
}

export class SentenceChunker extends BaseChunker {
  readonly strategy = ChunkingStrategy.Sentence;

  protected async *generate({ text, options, profile, signal }: ChunkContext): AsyncGenerator<ChunkDraft> {
    yield* chunkSpanBySentences(text, options, profile, this.strategy, 0, text.length, signal);
  }
}
