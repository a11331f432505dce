import { z } from 'zod';
import { CHUNK_OPTIONS_SCHEMA } from '../schemas/chunk-options-schemas';
import type { ChunkOptions } from '../chunking/types';
import { ConfigError, handleUnknownError } from '../errors/index';

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/*
 * Fills defaults and validates chunk options. Every violation, including
 * min > target and target > max, surfaces as a ConfigError before any chunking work.
 */
export function resolveChunkOptions(input: Partial<ChunkOptions> = {}): ChunkOptions {
  try {
    return Object.freeze(CHUNK_OPTIONS_SCHEMA.parse(input));
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ConfigError(`Invalid chunk options: ${formatZodIssues(e)}`);
    }
    const err = handleUnknownError(e, 'Chunk option validation');
    throw new ConfigError(`Chunk option validation failed: ${err.message}`);
  }
}

export const DEFAULT_CHUNK_OPTIONS: Readonly<ChunkOptions> = resolveChunkOptions();
