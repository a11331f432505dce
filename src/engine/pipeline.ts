import type { Chunk, ChunkOptions } from "../chunking/types";
import { PatternError, throwIfCancelled } from "../errors/index";
import { CONSOLE_LOGGER, type Logger } from "../output/logger";
import type { ChunkingEngine } from "./chunking-engine";

/*
 * A text transformation applied before chunking, such as PII masking, content
 * filtering or noise removal. The engine knows nothing of what it does.
 */
export interface TextProcessor {
  readonly name: string;
  process(text: string): string | Promise<string>;
}

export interface PipelineResult {
  originalText: string;
  processedText: string;
  appliedProcessors: string[];
  skippedProcessors: string[];
  chunks: Chunk[];
}

/*
 * Runs text processors in order, then chunks the result. A processor failing
 * with a PatternError is skipped and the remaining ones still run; any other
 * failure aborts the run.
 */
export class PreprocessingPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly engine: ChunkingEngine,
    private readonly processors: readonly TextProcessor[] = [],
    logger?: Logger
  ) {
    this.logger = logger ?? CONSOLE_LOGGER;
  }

  async run(text: string, options: Partial<ChunkOptions> = {}, signal?: AbortSignal): Promise<PipelineResult> {
    let processed = text;
    const applied: string[] = [];
    const skipped: string[] = [];

    for (const processor of this.processors) {
      throwIfCancelled(signal);
      try {
        processed = await processor.process(processed);
        applied.push(processor.name);
      } catch (e: unknown) {
        if (!(e instanceof PatternError)) throw e;
        this.logger.warn(`Skipping processor ${processor.name}: ${e.message} (rule: ${e.rule})`);
        skipped.push(processor.name);
      }
    }

    const chunks = await this.engine.chunk(processed, options, signal);
    return {
      originalText: text,
      processedText: processed,
      appliedProcessors: applied,
      skippedProcessors: skipped,
      chunks,
    };
  }
}

export function summarizePreprocessing(result: PipelineResult): string {
  const parts = [`Produced ${result.chunks.length} chunk(s)`];
  if (result.processedText !== result.originalText) parts.push("Text changed by preprocessing");
  if (result.appliedProcessors.length > 0) parts.push(`Applied: ${result.appliedProcessors.join(", ")}`);
  if (result.skippedProcessors.length > 0) parts.push(`Skipped: ${result.skippedProcessors.join(", ")}`);
  return `${parts.join(". ")}.`;
}
