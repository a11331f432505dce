import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { Command } from 'commander';
import { parseCliOptions } from '../src/boundaries/cli-parser';
import { loadConfig } from '../src/boundaries/config-loader';
import { parseEnvironment } from '../src/boundaries/env-parser';
import { resolveChunkOptions } from '../src/boundaries/options-parser';
import { ChunkingStrategy } from '../src/chunking/types';
import { registerChunkCommand } from '../src/cli/chunk-command';
import { chunkDocuments } from '../src/cli/chunk-runner';
import { buildRunContext, createEngine, mergeChunkOptions, readInputs } from '../src/cli/run-context';
import { OutputFormat, type RunContext } from '../src/cli/types';
import { DEFAULT_CONFIG_FILENAME } from '../src/config/constants';
import { ChunkingEngine } from '../src/engine/chunking-engine';
import { ConfigError, MissingDependencyError, ProcessingError } from '../src/errors/index';
import { isSilentMode, setSilentMode, setVerbose } from '../src/output/logger';

describe('mergeChunkOptions', () => {
  it('lets flags override the preset and the preset override the config', () => {
    const options = mergeChunkOptions(
      { targetChunkSize: 300, overlapSize: 10, strategy: ChunkingStrategy.Token },
      { targetChunkSize: 400, strategy: ChunkingStrategy.Paragraph, enableChunkBalancing: true },
      parseCliOptions({ strategy: 'sentence', balance: false })
    );

    expect(options.strategy).toBe(ChunkingStrategy.Sentence);
    expect(options.targetChunkSize).toBe(400);
    expect(options.overlapSize).toBe(10);
    expect(options.enableChunkBalancing).toBe(false);
  });

  it('keeps the preset balancing choice when no balance flag is given', () => {
    const options = mergeChunkOptions({}, { enableChunkBalancing: true }, parseCliOptions({}));
    expect(options.enableChunkBalancing).toBe(true);
  });

  it('maps numeric flags onto chunk sizes', () => {
    const options = mergeChunkOptions({}, {}, parseCliOptions({ target: '100', min: '20', max: '200', overlap: '5' }));

    expect(options.targetChunkSize).toBe(100);
    expect(options.minChunkSize).toBe(20);
    expect(options.maxChunkSize).toBe(200);
    expect(options.overlapSize).toBe(5);
  });
});

describe('createEngine', () => {
  it('builds an engine without an oracle for non-semantic strategies', () => {
    const engine = createEngine(resolveChunkOptions({}), parseEnvironment({}));
    expect(engine.hasSimilarityOracle).toBe(false);
  });

  it('requires an API key for semantic chunking', () => {
    const options = resolveChunkOptions({ strategy: ChunkingStrategy.Semantic });

    expect(() => createEngine(options, parseEnvironment({}))).toThrow(MissingDependencyError);
    expect(() => createEngine(options, parseEnvironment({}))).toThrow(
      'Semantic chunking needs an embedding provider'
    );
  });

  it('wires the OpenAI oracle when a key is present', () => {
    const options = resolveChunkOptions({ strategy: ChunkingStrategy.Semantic });
    const engine = createEngine(options, parseEnvironment({ OPENAI_API_KEY: 'test-secret' }));
    expect(engine.hasSimilarityOracle).toBe(true);
  });
});

describe('run context and inputs', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'chunkline-cli-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    setSilentMode(false);
    setVerbose(false);
  });

  it('merges the config file with the flags', () => {
    writeFileSync(
      path.join(tempDir, DEFAULT_CONFIG_FILENAME),
      '[Chunking]\nTargetChunkSize=256\nMinChunkSize=50\n'
    );

    const context = buildRunContext({ output: 'JSON', concurrency: '64', overlap: '8' }, tempDir);

    expect(context.outputFormat).toBe(OutputFormat.Json);
    expect(context.concurrency).toBe(32);
    expect(context.options.targetChunkSize).toBe(256);
    expect(context.options.minChunkSize).toBe(50);
    expect(context.options.overlapSize).toBe(8);
    expect(context.engine.hasSimilarityOracle).toBe(false);
    expect(isSilentMode()).toBe(true);
  });

  it('applies a built-in preset', () => {
    const context = buildRunContext({ preset: 'fixed-512' }, tempDir);

    expect(context.outputFormat).toBe(OutputFormat.Line);
    expect(context.options.targetChunkSize).toBe(512);
    expect(isSilentMode()).toBe(false);
  });

  it('rejects an unknown preset', () => {
    expect(() => buildRunContext({ preset: 'nope' }, tempDir)).toThrow(ConfigError);
    expect(() => buildRunContext({ preset: 'nope' }, tempDir)).toThrow('Unknown preset: nope');
  });

  it('reads matching files relative to the working directory', async () => {
    mkdirSync(path.join(tempDir, 'docs'));
    writeFileSync(path.join(tempDir, 'docs', 'a.md'), 'Alpha.');
    writeFileSync(path.join(tempDir, 'docs', 'b.txt'), 'Beta.');
    writeFileSync(path.join(tempDir, 'docs', 'c.json'), '{}');

    const inputs = await readInputs(['docs'], tempDir);

    expect(inputs).toEqual([
      { name: path.join('docs', 'a.md'), text: 'Alpha.' },
      { name: path.join('docs', 'b.txt'), text: 'Beta.' },
    ]);
  });

  it('fails when nothing matches', async () => {
    const call = readInputs(['nowhere/*.md'], tempDir);
    await expect(call).rejects.toBeInstanceOf(ProcessingError);
    await expect(call).rejects.toThrow('No .md, .txt or .mdx files matched: nowhere/*.md');
  });

  describe('chunkDocuments', () => {
    function contextFor(options: RunContext['options']): RunContext {
      return {
        engine: new ChunkingEngine(),
        options,
        config: loadConfig(tempDir),
        concurrency: 2,
        outputFormat: OutputFormat.Line,
        verbose: false,
      };
    }

    it('reports language, strategy and stats per document', async () => {
      const outcomes = await chunkDocuments(
        [
          { name: 'one.md', text: 'Hello world. This is a test.' },
          { name: 'blank.md', text: '   ' },
        ],
        contextFor(resolveChunkOptions({}))
      );

      const [one, blank] = outcomes;
      expect(one?.ok && one.strategy).toBe(ChunkingStrategy.Sentence);
      expect(one?.ok && one.language).toBe('en');
      expect(one?.ok && one.chunks.map((c) => c.content)).toEqual(['Hello world. This is a test.']);
      expect(one?.ok && one.stats.chunkCount).toBe(1);
      expect(blank?.ok && blank.strategy).toBeNull();
      expect(blank?.ok && blank.chunks).toEqual([]);
    });

    it('records a failing document in its own slot', async () => {
      const outcomes = await chunkDocuments(
        [
          { name: 'a.md', text: 'Cats purr.' },
          { name: 'b.md', text: 'Dogs bark.' },
        ],
        contextFor(resolveChunkOptions({ strategy: ChunkingStrategy.Semantic }))
      );

      expect(outcomes.map((o) => o.name)).toEqual(['a.md', 'b.md']);
      expect(outcomes.every((o) => !o.ok)).toBe(true);
      const [first] = outcomes;
      expect(first?.ok === false && first.error.message).toBe(
        'Semantic chunking requires a similarity oracle, but none is configured'
      );
    });
  });
});

describe('chunk command', () => {
  let tempDir: string;
  let originalCwd: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'chunkline-chunk-'));
    originalCwd = process.cwd();
    process.chdir(tempDir);
  });

  afterEach(() => {
    process.chdir(originalCwd);
    rmSync(tempDir, { recursive: true, force: true });
    setSilentMode(false);
    vi.restoreAllMocks();
  });

  it('prints the chunks of every file as JSON', async () => {
    writeFileSync(path.join(tempDir, 'doc.md'), 'Hello world. This is a test.');
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const program = new Command();
    registerChunkCommand(program);
    await program.parseAsync(['node', 'chunkline', 'chunk', 'doc.md', '--output', 'json']);

    expect(logSpy).toHaveBeenCalledTimes(1);
    const printed: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({
      summary: { files: 1, chunks: 1, failures: 0 },
      files: { 'doc.md': { language: 'en', strategy: 'sentence' } },
    });
  });
});
