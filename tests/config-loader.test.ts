import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { loadConfig } from '../src/boundaries/config-loader';
import { DEFAULT_CONFIG_FILENAME } from '../src/config/constants';
import { ConfigError, ValidationError } from '../src/errors/index';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'chunkline-config-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function writeIni(content: string, name = DEFAULT_CONFIG_FILENAME): void {
    writeFileSync(path.join(tempDir, name), content);
  }

  it('returns defaults when no config file exists', () => {
    expect(loadConfig(tempDir)).toEqual({
      configDir: path.resolve(tempDir),
      concurrency: 4,
      chunking: {},
    });
  });

  it('throws when an explicitly named file is missing', () => {
    expect(() => loadConfig(tempDir, 'missing.ini')).toThrow(ConfigError);
    expect(() => loadConfig(tempDir, 'missing.ini')).toThrow(/Missing configuration file at/);
  });

  it('reads global keys and the [chunking] section', () => {
    writeIni(`# comment
Concurrency=8
PresetsPath=presets.yaml

[Chunking]
Strategy=Paragraph
TargetChunkSize=256
MinChunkSize=50
MaxChunkSize=512
OverlapSize=0
Language="ko"
SimilarityThreshold=0.7
PreserveSentences=no
EnableChunkBalancing=yes
`);

    const config = loadConfig(tempDir);

    expect(config.concurrency).toBe(8);
    expect(config.presetsPath).toBe(path.resolve(tempDir, 'presets.yaml'));
    expect(config.chunking).toEqual({
      strategy: 'paragraph',
      targetChunkSize: 256,
      minChunkSize: 50,
      maxChunkSize: 512,
      overlapSize: 0,
      languageCode: 'ko',
      semanticSimilarityThreshold: 0.7,
      preserveSentences: false,
      enableChunkBalancing: true,
    });
  });

  it('resolves the presets path against the config file directory', () => {
    mkdirSync(path.join(tempDir, 'conf'));
    writeIni('PresetsPath=../shared/presets.yaml\n', path.join('conf', 'custom.ini'));

    const config = loadConfig(tempDir, 'conf/custom.ini');

    expect(config.configDir).toBe(path.join(tempDir, 'conf'));
    expect(config.presetsPath).toBe(path.resolve(tempDir, 'shared/presets.yaml'));
  });

  it('ignores unknown sections', () => {
    writeIni('[other]\nAnything=1\n');
    expect(loadConfig(tempDir).chunking).toEqual({});
  });

  it('rejects unknown [chunking] keys', () => {
    writeIni('[chunking]\nFoo=1\n');
    expect(() => loadConfig(tempDir)).toThrow('Unknown key in [chunking]: Foo');
  });

  it('rejects malformed values', () => {
    writeIni('[chunking]\nPreserveSentences=maybe\n');
    expect(() => loadConfig(tempDir)).toThrow('Invalid PreserveSentences value: maybe');

    writeIni('Concurrency=lots\n');
    expect(() => loadConfig(tempDir)).toThrow('Invalid Concurrency value: lots');
  });

  it('rejects values the option schema does not accept', () => {
    writeIni('[chunking]\nStrategy=fuzzy\n');
    expect(() => loadConfig(tempDir)).toThrow(ValidationError);
    expect(() => loadConfig(tempDir)).toThrow(/Invalid configuration: chunking\.strategy/);
  });
});
