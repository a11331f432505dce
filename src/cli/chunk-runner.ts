import { calculateStats } from '../chunking/balancer';
import type { Chunk, ChunkBalanceStats, ConcreteStrategy } from '../chunking/types';
import { isBlank } from '../chunking/utils';
import { runWithConcurrency } from '../engine/concurrency';
import { handleUnknownError } from '../errors/index';
import type { LanguageCode } from '../languages/types';
import { debug } from '../output/logger';
import type { InputDocument, RunContext } from './types';

export type DocumentOutcome =
  | {
      ok: true;
      name: string;
      language: LanguageCode;
      strategy: ConcreteStrategy | null;
      chunks: Chunk[];
      stats: ChunkBalanceStats;
    }
  | { ok: false; name: string; error: Error };

/*
 * Chunks every document with the context's options. A failing document is
 * reported in its slot and does not stop the others.
 */
export async function chunkDocuments(
  documents: InputDocument[],
  context: RunContext
): Promise<DocumentOutcome[]> {
  const { engine, options } = context;
  return runWithConcurrency(documents, context.concurrency, async (doc): Promise<DocumentOutcome> => {
    try {
      const language = engine.resolveLanguage(doc.text, options.languageCode);
      const strategy = isBlank(doc.text) ? null : engine.resolveStrategy(doc.text, options);
      debug(`${doc.name}: ${language}, ${strategy ?? 'empty'}`);
      const chunks = await engine.chunk(doc.text, options);
      return { ok: true, name: doc.name, language, strategy, chunks, stats: calculateStats(chunks, options) };
    } catch (e: unknown) {
      return { ok: false, name: doc.name, error: handleUnknownError(e, `Chunking ${doc.name}`) };
    }
  });
}
