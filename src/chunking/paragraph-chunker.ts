import { throwIfCancelled } from "../errors/index";
import { sentenceUnits, unitsFromBoundaries, type UnitGroup } from "./accumulator";
import { BaseChunker, createAccumulator, groupToDraft, markSectionStarts } from "./chunker";
import { chunkSpanBySentences } from "./sentence-chunker";
import { ChunkingStrategy, type ChunkContext, type ChunkDraft } from "./types";

export class ParagraphChunker extends BaseChunker {
  readonly strategy = ChunkingStrategy.Paragraph;

  protected async *generate({ text, options, profile, signal }: ChunkContext): AsyncGenerator<ChunkDraft> {
    let paragraphs = unitsFromBoundaries(text, profile.findParagraphBoundaries(text), profile);
    if (options.preserveSectionHeaders) {
      paragraphs = markSectionStarts(paragraphs, text, profile);
    }
    const accumulator = createAccumulator(text, options, profile);
    const toDrafts = (groups: UnitGroup[]): ChunkDraft[] =>
      groups.map((g) => groupToDraft(g, this.strategy)).filter((d): d is ChunkDraft => d !== null);

    for (const paragraph of paragraphs) {
      throwIfCancelled(signal);

      if (paragraph.tokens <= options.maxChunkSize) {
        yield* toDrafts(accumulator.add(paragraph));
        continue;
      }

      if (options.preserveParagraphs) {
        // The oversized paragraph is chunked on its own, never sharing a chunk with its neighbours
        yield* toDrafts(accumulator.finish());
        throwIfCancelled(signal);
        yield* chunkSpanBySentences(
          text,
          { ...options, preserveSectionHeaders: false },
          profile,
          this.strategy,
          paragraph.start,
          paragraph.end,
          signal
        );
        continue;
      }

      for (const sentence of sentenceUnits(text, profile, paragraph.start, paragraph.end)) {
        yield* toDrafts(accumulator.add(sentence));
      }
    }

    yield* toDrafts(accumulator.finish());
  }
}
