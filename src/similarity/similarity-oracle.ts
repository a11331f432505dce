/*
 * Embedding and similarity service consumed by semantic chunking. The engine
 * never implements one; callers wire in a provider-backed oracle.
 */
export interface SimilarityOracle {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
  // Result lies in [-1, 1]
  similarity(a: readonly number[], b: readonly number[]): number;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  const value = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return Math.max(-1, Math.min(1, value));
}

export function meanVector(vectors: ReadonlyArray<readonly number[]>): number[] | null {
  const first = vectors[0];
  if (!first) return null;
  const sum = new Array<number>(first.length).fill(0);
  for (const vector of vectors) {
    for (let i = 0; i < sum.length; i++) sum[i] = (sum[i] ?? 0) + (vector[i] ?? 0);
  }
  return sum.map((v) => v / vectors.length);
}

// Running mean of `count` vectors extended by one more
export function extendMean(mean: readonly number[], count: number, next: readonly number[]): number[] {
  return mean.map((v, i) => (v * count + (next[i] ?? 0)) / (count + 1));
}
