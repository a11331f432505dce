import { describe, it, expect } from 'vitest';
import { ChunkingEngine } from '../src/engine/chunking-engine';
import { TokenChunker } from '../src/chunking/token-chunker';
import { ChunkingStrategy, type Chunk } from '../src/chunking/types';
import { ChunkingCancelledError, ConfigError } from '../src/errors/index';
import { cosineSimilarity, type SimilarityOracle } from '../src/similarity/similarity-oracle';

const OWL = 'Owls hunt at night.';

function owls(count: number): string {
  return Array.from({ length: count }, () => OWL).join(' ');
}

const topicOracle: SimilarityOracle = {
  embed: (text: string) => Promise.resolve(text.includes('Cats') ? [1, 0] : [0, 1]),
  embedBatch: (texts: string[]) => Promise.resolve(texts.map((t) => (t.includes('Cats') ? [1, 0] : [0, 1]))),
  similarity: cosineSimilarity,
};

async function collect(stream: AsyncGenerator<Chunk>): Promise<Chunk[]> {
  const out: Chunk[] = [];
  for await (const chunk of stream) out.push(chunk);
  return out;
}

describe('ChunkingEngine', () => {
  const engine = new ChunkingEngine();
  const small = { targetChunkSize: 10, minChunkSize: 1, maxChunkSize: 20 };

  describe('resolveStrategy', () => {
    it('picks sentences for short text', () => {
      expect(engine.resolveStrategy('Hello world. This is a test.')).toBe(ChunkingStrategy.Sentence);
    });

    it('picks paragraphs for paragraph-rich text', () => {
      const text = Array.from({ length: 5 }, () => `${OWL} ${OWL}`).join('\n\n');
      expect(engine.resolveStrategy(text, small)).toBe(ChunkingStrategy.Paragraph);
    });

    it('picks sentences for sentence-rich text without paragraphs', () => {
      expect(engine.resolveStrategy(owls(10), small)).toBe(ChunkingStrategy.Sentence);
    });

    it('falls back to token windows', () => {
      const text = Array.from({ length: 60 }, () => 'alpha').join(' ');
      expect(engine.resolveStrategy(text, small)).toBe(ChunkingStrategy.Token);
    });

    it('returns an explicit strategy unchanged', () => {
      expect(engine.resolveStrategy('Hi.', { strategy: ChunkingStrategy.Hierarchical })).toBe(
        ChunkingStrategy.Hierarchical
      );
    });
  });

  describe('chunk', () => {
    it('validates options before anything else', async () => {
      await expect(engine.chunk('Some text.', { minChunkSize: 600 })).rejects.toThrow(ConfigError);
      await expect(engine.chunk('   ', { minChunkSize: 600 })).rejects.toThrow(
        'minChunkSize (600) must not exceed targetChunkSize (512)'
      );
    });

    it('returns an empty list for blank text', async () => {
      expect(await engine.chunk('  \n\t ')).toEqual([]);
    });

    it('rejects semantic chunking without an oracle', async () => {
      await expect(engine.chunk('Cats purr.', { strategy: ChunkingStrategy.Semantic })).rejects.toThrow(
        'Semantic chunking requires a similarity oracle, but none is configured'
      );
    });

    it('rejects a registered chunker that needs an oracle it does not have', async () => {
      class OracleTokenChunker extends TokenChunker {
        override readonly requiresSimilarityOracle = true;
      }
      const custom = new ChunkingEngine();
      custom.registerChunker(new OracleTokenChunker());

      await expect(custom.chunk('alpha beta', { strategy: ChunkingStrategy.Token })).rejects.toThrow(
        "Strategy 'token' requires a similarity oracle, but none is configured"
      );
    });

    it('runs semantic chunking when an oracle is wired', async () => {
      const withOracle = new ChunkingEngine({ similarityOracle: topicOracle });
      const chunks = await withOracle.chunk(
        'Cats purr softly. Cats nap often. Stocks rose today. Stocks fell later.',
        { strategy: ChunkingStrategy.Semantic, targetChunkSize: 8, minChunkSize: 4, maxChunkSize: 16, overlapSize: 0 }
      );

      expect(withOracle.hasSimilarityOracle).toBe(true);
      expect(chunks.map((c) => c.content)).toEqual([
        'Cats purr softly. Cats nap often.',
        'Stocks rose today. Stocks fell later.',
      ]);
    });

    it('keeps the hierarchy when balancing is off', async () => {
      const chunks = await engine.chunk('# Title\nIntro.\n## Sub\nBody text.', {
        strategy: ChunkingStrategy.Hierarchical,
      });

      expect(chunks).toHaveLength(2);
      expect(chunks[1]?.metadata.parentId).toBe(chunks[0]?.id);
    });

    it('balances the result when asked to', async () => {
      const chunks = await engine.chunk('# Title\nIntro.\n## Sub\nBody text.', {
        strategy: ChunkingStrategy.Hierarchical,
        enableChunkBalancing: true,
      });

      expect(chunks).toHaveLength(1);
      expect(chunks[0]?.content).toBe('# Title\nIntro.\n\n## Sub\nBody text.');
      expect(chunks[0]?.metadata.estimatedTokenCount).toBe(7);
    });

    it('throws a cancellation error for an aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();
      await expect(engine.chunk(owls(3), {}, controller.signal)).rejects.toBeInstanceOf(ChunkingCancelledError);
    });

    it('detects the language unless one is given', async () => {
      const [korean] = await engine.chunk('안녕하세요. 반갑습니다.');
      const [forced] = await engine.chunk('안녕하세요. 반갑습니다.', { languageCode: 'ja' });

      expect(korean?.metadata.languageCode).toBe('ko');
      expect(forced?.metadata.languageCode).toBe('ja');
    });
  });

  describe('chunkStream', () => {
    const options = { strategy: ChunkingStrategy.Sentence, targetChunkSize: 8, minChunkSize: 4, maxChunkSize: 8, overlapSize: 0 };

    it('yields the same chunks as a batch call', async () => {
      const batch = await engine.chunk(owls(6), options);
      const streamed = await collect(engine.chunkStream(owls(6), options));

      expect(streamed.map((c) => c.content)).toEqual(batch.map((c) => c.content));
      expect(streamed.map((c) => c.id)).toEqual(batch.map((c) => c.id));
    });

    it('reports the running count as totalChunks', async () => {
      const streamed = await collect(engine.chunkStream(owls(6), options));
      expect(streamed.map((c) => c.totalChunks)).toEqual([1, 2, 3]);
    });

    it('yields nothing for blank text', async () => {
      expect(await collect(engine.chunkStream(''))).toEqual([]);
    });

    it('rejects invalid options on the first pull', async () => {
      await expect(collect(engine.chunkStream('Text.', { maxChunkSize: 10 }))).rejects.toThrow(ConfigError);
    });
  });

  describe('estimateChunkCount', () => {
    it('returns 0 for blank text', () => {
      expect(engine.estimateChunkCount('')).toBe(0);
    });

    it('returns 1 when the text fits in one chunk', () => {
      expect(engine.estimateChunkCount(owls(6))).toBe(1);
    });

    it('divides the tokens by the effective chunk size', () => {
      expect(engine.estimateChunkCount(owls(6), { targetChunkSize: 8, minChunkSize: 4, maxChunkSize: 8, overlapSize: 0 })).toBe(3);
    });
  });

  describe('languages', () => {
    it('detects and resolves language codes', () => {
      expect(engine.detectLanguage('Привет мир')).toBe('ru');
      expect(engine.resolveLanguage('안녕하세요')).toBe('ko');
      expect(engine.resolveLanguage('안녕하세요', 'fr')).toBe('fr');
    });
  });
});
