import { z } from 'zod';
import { CHUNK_OPTIONS_SCHEMA } from './chunk-options-schemas';
import { DEFAULT_CONCURRENCY } from '../config/constants';

// Configuration file schema for chunkline.ini validation
export const CONFIG_SCHEMA = z.object({
  configDir: z.string().min(1),
  concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
  presetsPath: z.string().min(1).optional(),
  chunking: CHUNK_OPTIONS_SCHEMA.innerType().partial().default({}),
});

// Inferred types
export type Config = z.infer<typeof CONFIG_SCHEMA>;
