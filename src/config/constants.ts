/**
 * Configuration constants
 */

export const DEFAULT_CONFIG_FILENAME = 'chunkline.ini';
export const DEFAULT_PRESETS_FILENAME = 'chunkline-presets.yaml';
export const ALLOWED_EXTS = new Set(['.md', '.txt', '.mdx']);

// Batch concurrency bounds
export const MIN_CONCURRENCY = 1;
export const MAX_CONCURRENCY = 32;
export const DEFAULT_CONCURRENCY = 4;

// Semantic chunking requests embeddings in windows of this many sentences
export const EMBEDDING_BATCH_SIZE = 32;

// Balanced sequences keep max/min token counts at or below this ratio
export const MAX_BALANCED_VARIANCE_RATIO = 5.0;

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
