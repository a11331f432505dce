import { ChunkingStrategy, type ChunkOptions } from '../chunking/types';

export interface ChunkPreset {
  description: string;
  options: Partial<ChunkOptions>;
}

// Retrieval-oriented semantic chunks of moderate size
export function forRag(): Partial<ChunkOptions> {
  return {
    strategy: ChunkingStrategy.Semantic,
    targetChunkSize: 512,
    minChunkSize: 128,
    maxChunkSize: 1024,
    overlapSize: 64,
    enableChunkBalancing: true,
  };
}

export function forKorean(): Partial<ChunkOptions> {
  return {
    strategy: ChunkingStrategy.Sentence,
    targetChunkSize: 400,
    minChunkSize: 80,
    maxChunkSize: 800,
    overlapSize: 40,
    languageCode: 'ko',
    enableChunkBalancing: true,
  };
}

export function forLargeDocument(): Partial<ChunkOptions> {
  return {
    strategy: ChunkingStrategy.Hierarchical,
    targetChunkSize: 768,
    minChunkSize: 200,
    maxChunkSize: 1536,
    overlapSize: 128,
    enableChunkBalancing: true,
  };
}

/*
 * Plain token windows of `size` tokens. No structural preservation.
 */
export function fixedSize(size: number, overlap = 50): Partial<ChunkOptions> {
  return {
    strategy: ChunkingStrategy.Token,
    targetChunkSize: size,
    minChunkSize: Math.floor(size / 4),
    maxChunkSize: size * 2,
    overlapSize: overlap,
    preserveSentences: false,
    preserveParagraphs: false,
    preserveSectionHeaders: false,
  };
}

export const BUILT_IN_PRESETS: Readonly<Record<string, ChunkPreset>> = {
  rag: { description: 'Semantic chunks for retrieval (needs an embedding oracle)', options: forRag() },
  korean: { description: 'Sentence chunks tuned for Korean text', options: forKorean() },
  'large-document': { description: 'Hierarchical chunks following document sections', options: forLargeDocument() },
  'fixed-512': { description: 'Fixed 512-token windows', options: fixedSize(512) },
};
