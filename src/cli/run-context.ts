import type { Command } from 'commander';
import { readFileSync } from 'fs';
import * as path from 'path';
import { loadConfig } from '../boundaries/config-loader';
import { parseCliOptions } from '../boundaries/cli-parser';
import { parseEnvironment } from '../boundaries/env-parser';
import { resolveChunkOptions } from '../boundaries/options-parser';
import { ChunkingStrategy, type ChunkOptions } from '../chunking/types';
import { PresetLoader } from '../config/preset-loader';
import { ChunkingEngine } from '../engine/chunking-engine';
import { clampConcurrency } from '../engine/batch-processor';
import { ConfigError, MissingDependencyError, ProcessingError, handleUnknownError } from '../errors/index';
import { setSilentMode, setVerbose } from '../output/logger';
import { OpenAIEmbeddingOracle } from '../providers/openai-embedding-oracle';
import type { CliOptions } from '../schemas/cli-schemas';
import type { EnvConfig } from '../schemas/env-schemas';
import { resolveTargets } from '../scan/file-resolver';
import { OutputFormat, type InputDocument, type RunContext } from './types';

/*
 * Adds the chunking flags shared by the chunk and stats commands.
 */
export function addChunkingOptions(command: Command): Command {
  return command
    .option('-s, --strategy <name>', 'auto, sentence, paragraph, token, semantic or hierarchical')
    .option('--target <tokens>', 'Target chunk size in estimated tokens')
    .option('--min <tokens>', 'Minimum chunk size in estimated tokens')
    .option('--max <tokens>', 'Maximum chunk size in estimated tokens')
    .option('--overlap <tokens>', 'Tokens carried over into the next chunk')
    .option('-l, --language <code>', 'Language code; detected from the text when omitted')
    .option('--threshold <value>', 'Semantic similarity threshold in [-1, 1]')
    .option('-p, --preset <name>', 'Start from a named preset')
    .option('--balance', 'Rebalance chunk sizes after chunking')
    .option('--no-balance', 'Never rebalance chunk sizes')
    .option('--normalize-whitespace', 'Collapse whitespace runs in chunk content')
    .option('--output <format>', 'Output format: line (default) or json', 'line')
    .option('--config <path>', 'Path to a custom chunkline.ini config file')
    .option('--concurrency <n>', 'Files chunked at the same time (1-32)')
    .option('-v, --verbose', 'Enable verbose logging');
}

// Flags override the preset, which overrides the [chunking] section of the config
export function mergeChunkOptions(
  configOptions: Partial<ChunkOptions>,
  presetOptions: Partial<ChunkOptions>,
  cli: CliOptions
): ChunkOptions {
  const fromCli: Partial<ChunkOptions> = {
    ...(cli.strategy !== undefined && { strategy: cli.strategy }),
    ...(cli.target !== undefined && { targetChunkSize: cli.target }),
    ...(cli.min !== undefined && { minChunkSize: cli.min }),
    ...(cli.max !== undefined && { maxChunkSize: cli.max }),
    ...(cli.overlap !== undefined && { overlapSize: cli.overlap }),
    ...(cli.language !== undefined && { languageCode: cli.language }),
    ...(cli.threshold !== undefined && { semanticSimilarityThreshold: cli.threshold }),
    ...(cli.balance !== undefined && { enableChunkBalancing: cli.balance }),
    ...(cli.normalizeWhitespace && { normalizeWhitespace: true }),
  };
  return resolveChunkOptions({ ...configOptions, ...presetOptions, ...fromCli });
}

export function createEngine(options: ChunkOptions, env: EnvConfig): ChunkingEngine {
  if (options.strategy !== ChunkingStrategy.Semantic) {
    return new ChunkingEngine();
  }
  if (!env.OPENAI_API_KEY) {
    throw new MissingDependencyError(
      'Semantic chunking needs an embedding provider',
      'OPENAI_API_KEY',
      'Set OPENAI_API_KEY in your environment or .env file, or pick another strategy.'
    );
  }
  return new ChunkingEngine({
    similarityOracle: new OpenAIEmbeddingOracle({
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_EMBEDDING_MODEL,
      ...(env.OPENAI_BASE_URL !== undefined && { baseURL: env.OPENAI_BASE_URL }),
    }),
  });
}

export function buildRunContext(rawOptions: unknown, cwd: string = process.cwd()): RunContext {
  const cli = parseCliOptions(rawOptions);
  const outputFormat = cli.output.toLowerCase() === 'json' ? OutputFormat.Json : OutputFormat.Line;

  setVerbose(cli.verbose);
  setSilentMode(outputFormat === OutputFormat.Json);

  const env = parseEnvironment();
  const config = loadConfig(cwd, cli.config ?? env.CHUNKLINE_CONFIG);

  let presetOptions: Partial<ChunkOptions> = {};
  if (cli.preset) {
    const preset = new PresetLoader(config.presetsPath).getPreset(cli.preset);
    if (!preset) {
      throw new ConfigError(`Unknown preset: ${cli.preset}`);
    }
    presetOptions = preset.options;
  }

  const options = mergeChunkOptions(config.chunking, presetOptions, cli);
  return {
    engine: createEngine(options, env),
    options,
    config,
    concurrency: clampConcurrency(cli.concurrency ?? config.concurrency),
    outputFormat,
    verbose: cli.verbose,
  };
}

/*
 * Reads the documents named on the command line, or standard input when no
 * path is given.
 */
export async function readInputs(paths: string[], cwd: string = process.cwd()): Promise<InputDocument[]> {
  if (paths.length === 0) {
    return [{ name: '<stdin>', text: await readStdin() }];
  }

  const files = resolveTargets({ cliArgs: paths, cwd });
  if (files.length === 0) {
    throw new ProcessingError(`No .md, .txt or .mdx files matched: ${paths.join(', ')}`);
  }
  return files.map((file) => {
    try {
      return { name: path.relative(cwd, file) || file, text: readFileSync(file, 'utf-8') };
    } catch (e: unknown) {
      const err = handleUnknownError(e, `Reading ${file}`);
      throw new ProcessingError(`Failed to read ${file}: ${err.message}`);
    }
  });
}

async function readStdin(): Promise<string> {
  const parts: Buffer[] = [];
  for await (const part of process.stdin) {
    parts.push(Buffer.isBuffer(part) ? part : Buffer.from(String(part)));
  }
  return Buffer.concat(parts).toString('utf-8');
}

/*
 * Prints a failure the way every command does and exits with status 1.
 */
export function exitWithError(e: unknown, context: string): never {
  const err = handleUnknownError(e, context);
  console.error(`Error: ${err.message}`);
  if (err instanceof MissingDependencyError && err.hint) {
    console.error(`Hint: ${err.hint}`);
  }
  process.exit(1);
}
