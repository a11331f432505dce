import { z } from 'zod';
import { ChunkingStrategy } from '../chunking/types';

// Commander hands numeric options over as strings
const INT_OPTION = z.coerce.number().int().nonnegative();

// CLI options schema for command line argument validation
export const CLI_OPTIONS_SCHEMA = z.object({
  strategy: z.nativeEnum(ChunkingStrategy).optional(),
  target: INT_OPTION.optional(),
  min: INT_OPTION.optional(),
  max: INT_OPTION.optional(),
  overlap: INT_OPTION.optional(),
  language: z.string().min(1).optional(),
  threshold: z.coerce.number().min(-1).max(1).optional(),
  preset: z.string().min(1).optional(),
  balance: z.boolean().optional(),
  normalizeWhitespace: z.boolean().default(false),
  output: z.enum(['line', 'json', 'JSON']).default('line'),
  config: z.string().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  verbose: z.boolean().default(false),
});

// Inferred types
export type CliOptions = z.infer<typeof CLI_OPTIONS_SCHEMA>;
