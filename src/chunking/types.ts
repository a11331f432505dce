import type { LanguageCode } from "../languages/types";
import type { LanguageProfile } from "../languages/profile";

export enum ChunkingStrategy {
  Auto = "auto",
  Sentence = "sentence",
  Paragraph = "paragraph",
  Token = "token",
  Semantic = "semantic",
  Hierarchical = "hierarchical",
}

// Strategies a chunker can actually run; Auto is resolved by the engine first
export type ConcreteStrategy = Exclude<ChunkingStrategy, ChunkingStrategy.Auto>;

export interface ChunkMetadata {
  estimatedTokenCount: number;
  strategy: ConcreteStrategy;
  languageCode: LanguageCode;
  startsAtSentenceBoundary: boolean;
  endsAtSentenceBoundary: boolean;
  containsSectionHeader: boolean;
  hierarchyLevel?: number; // 1-based heading depth, 0 before the first heading
  parentId?: string; // Id of the enclosing section's first chunk
  overlapFromPrevious?: string;
}

export interface ChunkLocation {
  startPosition: number;
  endPosition: number;
  startLine: number;
  endLine: number;
  sectionPath: string;
}

export interface Chunk {
  readonly id: string;
  readonly index: number;
  readonly totalChunks: number;
  readonly content: string;
  readonly metadata: Readonly<ChunkMetadata>;
  readonly location: Readonly<ChunkLocation>;
}

/*
 * A chunk before the engine has numbered it. Chunkers only ever describe a span
 * of the original text; content, lines and ids are derived when finalizing.
 */
export interface ChunkDraft {
  start: number;
  end: number;
  strategy: ConcreteStrategy;
  overlapStart?: number; // Start of the new material when [start, overlapStart) was carried over
  sectionPath?: string;
  hierarchyLevel?: number;
  parentId?: string;
}

export interface ChunkOptions {
  strategy: ChunkingStrategy;
  targetChunkSize: number;
  minChunkSize: number;
  maxChunkSize: number;
  overlapSize: number;
  languageCode: string | null;
  preserveSentences: boolean;
  preserveParagraphs: boolean;
  preserveSectionHeaders: boolean;
  semanticSimilarityThreshold: number;
  normalizeWhitespace: boolean;
  enableChunkBalancing: boolean;
}

export interface ChunkContext {
  text: string;
  options: Readonly<ChunkOptions>;
  profile: LanguageProfile;
  signal?: AbortSignal;
}

export interface Chunker {
  readonly strategy: ConcreteStrategy;
  readonly requiresSimilarityOracle: boolean;
  chunk(context: ChunkContext): Promise<Chunk[]>;
  stream(context: ChunkContext): AsyncGenerator<ChunkDraft>;
  estimateChunkCount(text: string, options: Readonly<ChunkOptions>, profile: LanguageProfile): number;
}

export interface ChunkBalanceStats {
  chunkCount: number;
  minTokenCount: number;
  maxTokenCount: number;
  averageTokenCount: number;
  standardDeviation: number;
  varianceRatio: number;
  undersizedChunkCount: number;
  oversizedChunkCount: number;
  isBalanced: boolean;
}
