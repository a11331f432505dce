import { EMBEDDING_BATCH_SIZE } from "../config/constants";
import { ProcessingError, throwIfCancelled } from "../errors/index";
import { extendMean, meanVector, type SimilarityOracle } from "../similarity/similarity-oracle";
import { sentenceUnits, type TextUnit, type UnitGroup } from "./accumulator";
import { BaseChunker, createAccumulator, groupToDraft } from "./chunker";
import { ChunkingStrategy, type ChunkContext, type ChunkDraft } from "./types";

/*
 * Greedy topical grouping: sentences join the running chunk while they stay
 * similar to the mean embedding of what the chunk already holds.
 */
export class SemanticChunker extends BaseChunker {
  readonly strategy = ChunkingStrategy.Semantic;
  override readonly requiresSimilarityOracle = true;

  constructor(private readonly oracle: SimilarityOracle) {
    super();
  }

  protected async *generate({ text, options, profile, signal }: ChunkContext): AsyncGenerator<ChunkDraft> {
    const units = sentenceUnits(text, profile);
    const accumulator = createAccumulator(text, options, profile);
    const embeddings = new Map<TextUnit, number[]>();
    const toDrafts = (groups: UnitGroup[]): ChunkDraft[] =>
      groups.map((g) => groupToDraft(g, this.strategy)).filter((d): d is ChunkDraft => d !== null);

    let running: number[] | null = null;
    let runningCount = 0;
    let generation = accumulator.generation;

    for (let i = 0; i < units.length; i++) {
      const unit = units[i];
      if (!unit) continue;

      if (i % EMBEDDING_BATCH_SIZE === 0) {
        throwIfCancelled(signal);
        const window = units.slice(i, i + EMBEDDING_BATCH_SIZE);
        const vectors = await this.embedWindow(text, window, signal);
        window.forEach((u, k) => {
          const vector = vectors[k];
          if (vector) embeddings.set(u, vector);
        });
      }
      const embedding = embeddings.get(unit) ?? null;

      if (running && embedding && accumulator.hasNewContent) {
        const similarity = this.oracle.similarity(running, embedding);
        if (similarity < options.semanticSimilarityThreshold && accumulator.bufferTokens >= options.minChunkSize) {
          yield* toDrafts(accumulator.breakHere(true));
        }
      }

      yield* toDrafts(accumulator.add(unit));

      if (accumulator.generation !== generation || !running) {
        const held = accumulator.currentUnits
          .map((u) => embeddings.get(u))
          .filter((v): v is number[] => v !== undefined);
        running = meanVector(held);
        runningCount = held.length;
        generation = accumulator.generation;
      } else if (embedding) {
        running = extendMean(running, runningCount, embedding);
        runningCount++;
      }
    }

    yield* toDrafts(accumulator.finish());
  }

  private async embedWindow(text: string, window: TextUnit[], signal?: AbortSignal): Promise<number[][]> {
    const inputs = window.map((u) => text.slice(u.start, u.end).trim());
    const vectors = await this.oracle.embedBatch(inputs, signal);
    throwIfCancelled(signal);

    if (!Array.isArray(vectors) || vectors.length !== inputs.length) {
      throw new ProcessingError(
        `Similarity oracle returned ${Array.isArray(vectors) ? vectors.length : 0} embeddings for ${inputs.length} sentences`
      );
    }
    const dimension = vectors[0]?.length ?? 0;
    if (dimension === 0 || vectors.some((v) => v.length !== dimension)) {
      throw new ProcessingError("Similarity oracle returned empty or mismatched embedding vectors");
    }
    return vectors;
  }
}
