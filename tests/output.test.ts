import { describe, it, expect, vi, afterEach } from 'vitest';
import stripAnsi from 'strip-ansi';
import { JsonFormatter, VERSION, type Result } from '../src/output/json-formatter';
import { formatLineRange, previewContent, printGlobalSummary } from '../src/output/reporter';
import { ChunkingStrategy, type Chunk } from '../src/chunking/types';

function chunkAt(startLine: number, endLine: number): Chunk {
  return {
    id: 'abc',
    index: 0,
    totalChunks: 1,
    content: 'Some content.',
    metadata: {
      estimatedTokenCount: 3,
      strategy: ChunkingStrategy.Sentence,
      languageCode: 'en',
      startsAtSentenceBoundary: true,
      endsAtSentenceBoundary: true,
      containsSectionHeader: false,
    },
    location: { startPosition: 0, endPosition: 13, startLine, endLine, sectionPath: '' },
  };
}

describe('JsonFormatter', () => {
  it('collects files and a summary', () => {
    const formatter = new JsonFormatter();
    formatter.addFile('docs/a.md', { language: 'en', strategy: ChunkingStrategy.Sentence, chunks: [chunkAt(1, 1)] });
    formatter.addFile('docs/b.md', { language: 'ko', strategy: null, chunks: [] });
    formatter.addFailure();

    const result: Result = JSON.parse(formatter.toJson());

    expect(result.summary).toEqual({ files: 2, chunks: 1, failures: 1 });
    expect(result.files['docs/a.md']?.chunks[0]?.content).toBe('Some content.');
    expect(result.files['docs/b.md']?.language).toBe('ko');
    expect(result.metadata.version).toBe(VERSION);
  });

  it('reads the version from the package manifest', () => {
    expect(VERSION).toBe('0.3.0');
  });
});

describe('Reporter helpers', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('flattens whitespace in previews', () => {
    expect(previewContent('a\n\nb   c')).toBe('a b c');
  });

  it('cuts long previews with an ellipsis', () => {
    expect(previewContent('x'.repeat(70), 10)).toBe(`${'x'.repeat(9)}…`);
    expect(previewContent('x'.repeat(10), 10)).toBe('x'.repeat(10));
  });

  it('formats single and multi-line ranges', () => {
    expect(formatLineRange(chunkAt(3, 3))).toBe('3');
    expect(formatLineRange(chunkAt(3, 5))).toBe('3-5');
  });

  it('prints the global summary', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    printGlobalSummary(1, 3, 2);

    expect(log.mock.calls.map((call) => stripAnsi(String(call[0])))).toEqual([
      '✖ 3 chunks from 1 file.',
      '✖ 2 files failed',
    ]);
  });
});
