import { resolveChunkOptions } from "../boundaries/options-parser";
import { ChunkBalancer } from "../chunking/balancer";
import { estimateFromTokens } from "../chunking/chunker";
import { ChunkFinalizer } from "../chunking/finalize";
import { HierarchicalChunker } from "../chunking/hierarchical-chunker";
import { ParagraphChunker } from "../chunking/paragraph-chunker";
import { SemanticChunker } from "../chunking/semantic-chunker";
import { SentenceChunker } from "../chunking/sentence-chunker";
import { TokenChunker } from "../chunking/token-chunker";
import {
  ChunkingStrategy,
  type Chunk,
  type ChunkOptions,
  type Chunker,
  type ConcreteStrategy,
} from "../chunking/types";
import { isBlank } from "../chunking/utils";
import { ConfigError, throwIfCancelled } from "../errors/index";
import type { LanguageProfile } from "../languages/profile";
import { getLanguageRegistry, type LanguageProfileRegistry } from "../languages/registry";
import type { LanguageCode } from "../languages/types";
import { CONSOLE_LOGGER, type Logger } from "../output/logger";
import type { SimilarityOracle } from "../similarity/similarity-oracle";
import { BatchProcessor } from "./batch-processor";

// Auto resolution thresholds
const AUTO_PARAGRAPH_THRESHOLD = 3;
const AUTO_SENTENCE_THRESHOLD = 5;

export interface ChunkingEngineConfig {
  similarityOracle?: SimilarityOracle;
  logger?: Logger;
  registry?: LanguageProfileRegistry;
  balancer?: ChunkBalancer;
}

/*
 * Entry point for chunking: validates options, resolves the strategy and the
 * language profile, runs the matching chunker and, when enabled, the balancer.
 * Holds no per-call state, so one instance serves concurrent calls.
 */
export class ChunkingEngine {
  private readonly chunkers = new Map<ConcreteStrategy, Chunker>();
  private readonly oracle: SimilarityOracle | undefined;
  private readonly logger: Logger;
  private readonly registry: LanguageProfileRegistry;
  private readonly balancer: ChunkBalancer;

  constructor(config: ChunkingEngineConfig = {}) {
    this.oracle = config.similarityOracle;
    this.logger = config.logger ?? CONSOLE_LOGGER;
    this.registry = config.registry ?? getLanguageRegistry();
    this.balancer = config.balancer ?? new ChunkBalancer(this.registry);

    this.registerChunker(new SentenceChunker());
    this.registerChunker(new ParagraphChunker());
    this.registerChunker(new TokenChunker());
    this.registerChunker(new HierarchicalChunker());
    if (this.oracle) {
      this.registerChunker(new SemanticChunker(this.oracle));
    }
  }

  get hasSimilarityOracle(): boolean {
    return this.oracle !== undefined;
  }

  // Replaces whatever chunker was registered for the same strategy
  registerChunker(chunker: Chunker): void {
    this.chunkers.set(chunker.strategy, chunker);
  }

  getChunker(strategy: ConcreteStrategy): Chunker | undefined {
    return this.chunkers.get(strategy);
  }

  detectLanguage(text: string | null | undefined): LanguageCode {
    return this.registry.detectLanguage(text);
  }

  // An explicit code wins over detection
  resolveLanguage(text: string, languageCode: string | null = null): LanguageCode {
    return this.registry.resolveProfile(text, languageCode).languageCode;
  }

  /*
   * Auto picks a concrete strategy from the shape of the text: short text goes
   * by sentences, then paragraph-rich text by paragraphs, then sentence-rich
   * text by sentences, and anything else by token windows.
   */
  resolveStrategy(text: string, options: Partial<ChunkOptions> = {}): ConcreteStrategy {
    const resolved = resolveChunkOptions(options);
    return this.resolveWith(text, resolved, this.registry.resolveProfile(text, resolved.languageCode));
  }

  async chunk(text: string, options: Partial<ChunkOptions> = {}, signal?: AbortSignal): Promise<Chunk[]> {
    const { resolved, profile, chunker } = this.prepare(text, options);
    throwIfCancelled(signal);
    if (isBlank(text)) return [];

    this.logger.debug(
      `chunking ${text.length} chars with ${chunker.strategy} (${profile.languageCode})`
    );
    const chunks = await chunker.chunk({ text, options: resolved, profile, ...(signal ? { signal } : {}) });
    if (!resolved.enableChunkBalancing) return chunks;

    const balanced = await this.balancer.balance(chunks, resolved, signal);
    this.logger.debug(`balanced ${chunks.length} chunks into ${balanced.length}`);
    return balanced;
  }

  /*
   * Lazily yields one chunk per pull. Balancing never applies here, and
   * `totalChunks` is the number of chunks produced so far.
   */
  async *chunkStream(
    text: string,
    options: Partial<ChunkOptions> = {},
    signal?: AbortSignal
  ): AsyncGenerator<Chunk> {
    const { resolved, profile, chunker } = this.prepare(text, options);
    if (isBlank(text)) return;

    const finalizer = new ChunkFinalizer(text, profile, resolved);
    let index = 0;
    throwIfCancelled(signal);
    for await (const draft of chunker.stream({ text, options: resolved, profile, ...(signal ? { signal } : {}) })) {
      if (finalizer.isEmpty(draft)) continue;
      yield finalizer.build(draft, index, index + 1);
      index++;
      throwIfCancelled(signal);
    }
  }

  estimateChunkCount(text: string, options: Partial<ChunkOptions> = {}): number {
    const resolved = resolveChunkOptions(options);
    if (isBlank(text)) return 0;
    const profile = this.registry.resolveProfile(text, resolved.languageCode);
    const strategy = this.resolveWith(text, resolved, profile);
    const chunker = this.chunkers.get(strategy);
    return chunker
      ? chunker.estimateChunkCount(text, resolved, profile)
      : estimateFromTokens(profile.estimateTokenCount(text), resolved);
  }

  createBatchProcessor(options: Partial<ChunkOptions> = {}): BatchProcessor {
    return new BatchProcessor(this, options);
  }

  private prepare(
    text: string,
    options: Partial<ChunkOptions>
  ): { resolved: ChunkOptions; profile: LanguageProfile; chunker: Chunker } {
    const resolved = resolveChunkOptions(options);
    const profile = this.registry.resolveProfile(text, resolved.languageCode);
    const strategy = this.resolveWith(text, resolved, profile);
    return { resolved, profile, chunker: this.requireChunker(strategy) };
  }

  private requireChunker(strategy: ConcreteStrategy): Chunker {
    const chunker = this.chunkers.get(strategy);
    if (!chunker && strategy === ChunkingStrategy.Semantic) {
      throw new ConfigError("Semantic chunking requires a similarity oracle, but none is configured");
    }
    if (!chunker) {
      throw new ConfigError(`No chunker registered for strategy '${strategy}'`);
    }
    if (chunker.requiresSimilarityOracle && !this.oracle) {
      throw new ConfigError(`Strategy '${strategy}' requires a similarity oracle, but none is configured`);
    }
    return chunker;
  }

  private resolveWith(text: string, options: Readonly<ChunkOptions>, profile: LanguageProfile): ConcreteStrategy {
    if (options.strategy !== ChunkingStrategy.Auto) return options.strategy;

    if (profile.estimateTokenCount(text) <= 2 * options.targetChunkSize) {
      return ChunkingStrategy.Sentence;
    }
    if (profile.findParagraphBoundaries(text).length > AUTO_PARAGRAPH_THRESHOLD) {
      return ChunkingStrategy.Paragraph;
    }
    if (profile.findSentenceBoundaries(text).length > AUTO_SENTENCE_THRESHOLD) {
      return ChunkingStrategy.Sentence;
    }
    return ChunkingStrategy.Token;
  }
}
