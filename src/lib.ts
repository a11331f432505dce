// Engine
export { ChunkingEngine, type ChunkingEngineConfig } from './engine/chunking-engine';
export { BatchProcessor, clampConcurrency } from './engine/batch-processor';
export {
  PreprocessingPipeline,
  summarizePreprocessing,
  type PipelineResult,
  type TextProcessor,
} from './engine/pipeline';
export { runWithConcurrency } from './engine/concurrency';

// Chunkers and balancing
export { BaseChunker, estimateFromTokens } from './chunking/chunker';
export { SentenceChunker, chunkSpanBySentences } from './chunking/sentence-chunker';
export { ParagraphChunker } from './chunking/paragraph-chunker';
export { TokenChunker } from './chunking/token-chunker';
export { SemanticChunker } from './chunking/semantic-chunker';
export { HierarchicalChunker, buildSectionTree, type SectionNode } from './chunking/hierarchical-chunker';
export { ChunkBalancer, calculateStats } from './chunking/balancer';
export { ChunkFinalizer, createChunkId } from './chunking/finalize';
export {
  ChunkingStrategy,
  type Chunk,
  type ChunkBalanceStats,
  type ChunkContext,
  type ChunkDraft,
  type ChunkLocation,
  type ChunkMetadata,
  type ChunkOptions,
  type Chunker,
  type ConcreteStrategy,
} from './chunking/types';

// Languages
export { LanguageProfile } from './languages/profile';
export { LanguageProfileRegistry, getLanguageRegistry, getProfile } from './languages/registry';
export { detectLanguage } from './languages/script-detector';
export {
  DEFAULT_LANGUAGE,
  LANGUAGE_CODES,
  type LanguageCode,
  type SectionHeader,
} from './languages/types';

// Options and presets
export { resolveChunkOptions, DEFAULT_CHUNK_OPTIONS } from './boundaries/options-parser';
export { CHUNK_OPTIONS_SCHEMA, type ChunkOptionsInput } from './schemas/chunk-options-schemas';
export { BUILT_IN_PRESETS, fixedSize, forKorean, forLargeDocument, forRag, type ChunkPreset } from './config/presets';
export { PresetLoader } from './config/preset-loader';

// Similarity
export { cosineSimilarity, type SimilarityOracle } from './similarity/similarity-oracle';
export { OpenAIEmbeddingOracle, type OpenAIEmbeddingConfig } from './providers/openai-embedding-oracle';

// Errors and logging
export {
  ChunklineError,
  ChunkingCancelledError,
  ConfigError,
  MissingDependencyError,
  PatternError,
  ProcessingError,
  ValidationError,
} from './errors/index';
export type { Logger } from './output/logger';
