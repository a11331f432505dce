import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Chunk, ChunkBalanceStats, ConcreteStrategy } from '../chunking/types';
import type { LanguageCode } from '../languages/types';

const PACKAGE_JSON_SCHEMA = z.object({
  name: z.string(),
  version: z.string(),
});

// The sources and the bundle sit at different depths below package.json
function readPackageVersion(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 4; depth++) {
    const candidate = path.join(dir, 'package.json');
    if (existsSync(candidate)) {
      const parsed = PACKAGE_JSON_SCHEMA.safeParse(JSON.parse(readFileSync(candidate, 'utf-8')));
      if (parsed.success && parsed.data.name === 'chunkline') return parsed.data.version;
    }
    dir = path.dirname(dir);
  }
  return '0.0.0';
}

export const VERSION = readPackageVersion();

export interface FileResult {
  language: LanguageCode;
  strategy: ConcreteStrategy | null;
  chunks: Chunk[];
  stats?: ChunkBalanceStats;
}

export interface Result {
  files: Record<string, FileResult>;
  summary: {
    files: number;
    chunks: number;
    failures: number;
  };
  metadata: {
    version: string;
    timestamp: string;
  };
}

export class JsonFormatter {
  private files: Record<string, FileResult> = {};
  private failureCount = 0;

  addFile(file: string, result: FileResult): void {
    this.files[file] = result;
  }

  addFailure(): void {
    this.failureCount++;
  }

  toJson(): string {
    const chunks = Object.values(this.files).reduce((sum, f) => sum + f.chunks.length, 0);
    const result: Result = {
      files: this.files,
      summary: {
        files: Object.keys(this.files).length,
        chunks,
        failures: this.failureCount,
      },
      metadata: {
        version: VERSION,
        timestamp: new Date().toISOString(),
      },
    };
    return JSON.stringify(result, null, 2);
  }
}
