#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync, existsSync } from 'fs';
import * as path from 'path';
import { handleUnknownError } from './errors/index';
import { registerChunkCommand } from './cli/chunk-command';
import { registerStatsCommand } from './cli/stats-command';
import { registerDetectCommand } from './cli/detect-command';
import { registerPresetsCommand } from './cli/presets-command';
import { registerInitCommand } from './cli/init-command';
import { warn } from './output/logger';
import { VERSION } from './output/json-formatter';

/*
 * Best-effort .env loader without external dependencies.
 * Loads environment variables from .env or .env.local files.
 */
function loadDotEnv(): void {
  const candidates = ['.env', '.env.local'];
  for (const filename of candidates) {
    const full = path.resolve(process.cwd(), filename);
    if (!existsSync(full)) continue;
    try {
      const content = readFileSync(full, 'utf-8');
      for (const rawLine of content.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line || line.startsWith('#')) continue;
        const match = line.match(/^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/);
        if (!match || !match[1] || !match[2]) continue;
        const key = match[1];
        let value = match[2];
        if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
          value = value.slice(1, -1);
        } else {
          const hashAt = value.indexOf(' #');
          if (hashAt !== -1) value = value.slice(0, hashAt).trim();
        }
        if (process.env[key] === undefined) {
          process.env[key] = value;
        }
      }
      break; // stop after first found
    } catch (e: unknown) {
      // Parse errors leave the existing environment in place
      const err = handleUnknownError(e, 'Loading .env file');
      warn(err.message);
    }
  }
}

// Load environment variables at startup
loadDotEnv();

// Set up Commander program
program
  .name('chunkline')
  .description('Language-aware text chunking for retrieval-augmented generation')
  .version(VERSION);

registerChunkCommand(program);
registerStatsCommand(program);
registerDetectCommand(program);
registerPresetsCommand(program);
registerInitCommand(program);

program.parseAsync(process.argv).catch((e: unknown) => {
  const err = handleUnknownError(e, 'Running chunkline');
  console.error(`Error: ${err.message}`);
  process.exit(1);
});
