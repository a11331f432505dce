import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { CONFIG_SCHEMA, type Config } from '../schemas/config-schemas';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import { DEFAULT_CONFIG_FILENAME } from '../config/constants';
import { formatZodIssues } from './options-parser';

enum ConfigKey {
  CONCURRENCY = 'Concurrency',
  PRESETS_PATH = 'PresetsPath',
}

const CHUNKING_SECTION = 'chunking';

type OptionKind = 'string' | 'int' | 'number' | 'boolean' | 'strategy';

// [chunking] keys and the ChunkOptions field each one sets
const CHUNKING_KEYS: Record<string, { field: string; kind: OptionKind }> = {
  Strategy: { field: 'strategy', kind: 'strategy' },
  TargetChunkSize: { field: 'targetChunkSize', kind: 'int' },
  MinChunkSize: { field: 'minChunkSize', kind: 'int' },
  MaxChunkSize: { field: 'maxChunkSize', kind: 'int' },
  OverlapSize: { field: 'overlapSize', kind: 'int' },
  Language: { field: 'languageCode', kind: 'string' },
  SimilarityThreshold: { field: 'semanticSimilarityThreshold', kind: 'number' },
  PreserveSentences: { field: 'preserveSentences', kind: 'boolean' },
  PreserveParagraphs: { field: 'preserveParagraphs', kind: 'boolean' },
  PreserveSectionHeaders: { field: 'preserveSectionHeaders', kind: 'boolean' },
  NormalizeWhitespace: { field: 'normalizeWhitespace', kind: 'boolean' },
  EnableChunkBalancing: { field: 'enableChunkBalancing', kind: 'boolean' },
};

const stripQuotes = (str: string): string =>
  str.trim().replace(/^"|"$/g, '').replace(/^'|'$/g, '');

function convertValue(key: string, raw: string, kind: OptionKind): string | number | boolean {
  const value = stripQuotes(raw);
  switch (kind) {
    case 'int':
    case 'number': {
      const parsed = kind === 'int' ? Number.parseInt(value, 10) : Number.parseFloat(value);
      if (Number.isNaN(parsed)) {
        throw new ConfigError(`Invalid ${key} value: ${raw}`);
      }
      return parsed;
    }
    case 'boolean': {
      const lower = value.toLowerCase();
      if (lower === 'true' || lower === 'yes' || lower === '1') return true;
      if (lower === 'false' || lower === 'no' || lower === '0') return false;
      throw new ConfigError(`Invalid ${key} value: ${raw}`);
    }
    case 'strategy':
      return value.toLowerCase();
    default:
      return value;
  }
}

/**
 * Load and validate configuration from chunkline.ini. The default file is
 * optional; an explicitly named one must exist.
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): Config {
  const iniPath = configPath
    ? path.resolve(cwd, configPath)
    : path.resolve(cwd, DEFAULT_CONFIG_FILENAME);

  if (!existsSync(iniPath)) {
    if (configPath) {
      throw new ConfigError(`Missing configuration file at ${iniPath}`);
    }
    return validate({ configDir: path.resolve(cwd) });
  }

  const configDir = path.dirname(iniPath);

  let concurrencyRaw: number | undefined;
  let presetsPathRaw: string | undefined;
  const chunking: Record<string, unknown> = {};

  try {
    const raw = readFileSync(iniPath, 'utf-8');
    let currentSection: string | null = null;

    for (const rawLine of raw.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line || line.startsWith('#') || line.startsWith(';')) continue;

      // Section header
      const sectionMatch = line.match(/^\[(.*)\]$/);
      if (sectionMatch && sectionMatch[1] !== undefined) {
        currentSection = sectionMatch[1].trim().toLowerCase();
        continue;
      }

      const m = line.match(/^([A-Za-z0-9_.-]+)\s*=\s*(.*)$/);
      if (!m || !m[1]) continue;

      const key = m[1];
      const val = m[2] || '';

      if (currentSection === CHUNKING_SECTION) {
        const entry = CHUNKING_KEYS[key];
        if (!entry) {
          throw new ConfigError(`Unknown key in [chunking]: ${key}`);
        }
        chunking[entry.field] = convertValue(key, val, entry.kind);
      } else if (currentSection === null) {
        // Global property - process config keys
        switch (key) {
          case ConfigKey.CONCURRENCY: {
            const parsed = parseInt(val, 10);
            if (Number.isNaN(parsed)) {
              throw new ConfigError(`Invalid Concurrency value: ${val}`);
            }
            concurrencyRaw = parsed;
            break;
          }
          case ConfigKey.PRESETS_PATH:
            presetsPathRaw = stripQuotes(val);
            break;
        }
      }
    }
  } catch (e: unknown) {
    if (e instanceof ConfigError) throw e;
    const err = handleUnknownError(e, 'Reading config file');
    throw new ConfigError(`Failed to read config file: ${err.message}`);
  }

  // Resolve paths
  const presetsPath = presetsPathRaw
    ? path.isAbsolute(presetsPathRaw)
      ? presetsPathRaw
      : path.resolve(configDir, presetsPathRaw)
    : undefined;

  return validate({
    configDir,
    chunking,
    ...(concurrencyRaw !== undefined ? { concurrency: concurrencyRaw } : {}),
    ...(presetsPath !== undefined ? { presetsPath } : {}),
  });
}

function validate(configData: Record<string, unknown>): Config {
  try {
    return CONFIG_SCHEMA.parse(configData);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid configuration: ${formatZodIssues(e)}`);
    }
    const err = handleUnknownError(e, 'Config validation');
    throw new ConfigError(`Configuration validation failed: ${err.message}`);
  }
}
