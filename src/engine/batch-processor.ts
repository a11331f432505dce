import type { Chunk, ChunkOptions } from "../chunking/types";
import { isBlank } from "../chunking/utils";
import { DEFAULT_CONCURRENCY, MAX_CONCURRENCY, MIN_CONCURRENCY } from "../config/constants";
import { throwIfCancelled } from "../errors/index";
import type { ChunkingEngine } from "./chunking-engine";
import { runWithConcurrency } from "./concurrency";
import type { PipelineResult, PreprocessingPipeline } from "./pipeline";

export function clampConcurrency(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_CONCURRENCY;
  return Math.min(MAX_CONCURRENCY, Math.max(MIN_CONCURRENCY, Math.floor(value)));
}

/*
 * Chunks many independent texts with bounded concurrency. Results come back in
 * the order the texts were added, whatever order they finish in.
 */
export class BatchProcessor {
  private readonly texts: string[] = [];
  private maxConcurrency = DEFAULT_CONCURRENCY;

  constructor(
    private readonly engine: ChunkingEngine,
    private readonly options: Partial<ChunkOptions> = {}
  ) {}

  get count(): number {
    return this.texts.length;
  }

  get concurrency(): number {
    return this.maxConcurrency;
  }

  // Blank texts are ignored
  addText(text: string): this {
    if (!isBlank(text)) this.texts.push(text);
    return this;
  }

  addTexts(texts: Iterable<string>): this {
    for (const text of texts) this.addText(text);
    return this;
  }

  withMaxConcurrency(maxConcurrency: number): this {
    this.maxConcurrency = clampConcurrency(maxConcurrency);
    return this;
  }

  clear(): this {
    this.texts.length = 0;
    return this;
  }

  async process(signal?: AbortSignal): Promise<Chunk[][]> {
    throwIfCancelled(signal);
    return runWithConcurrency(this.texts, this.maxConcurrency, (text) =>
      this.engine.chunk(text, this.options, signal)
    );
  }

  async preprocess(pipeline: PreprocessingPipeline, signal?: AbortSignal): Promise<PipelineResult[]> {
    throwIfCancelled(signal);
    return runWithConcurrency(this.texts, this.maxConcurrency, (text) =>
      pipeline.run(text, this.options, signal)
    );
  }

  getTotalEstimatedChunks(): number {
    return this.texts.reduce((sum, text) => sum + this.engine.estimateChunkCount(text, this.options), 0);
  }
}
