import { z } from 'zod';
import { DEFAULT_EMBEDDING_MODEL } from '../config/constants';

// Environment variables read by the CLI; the embedding oracle is optional
export const ENV_SCHEMA = z.object({
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_EMBEDDING_MODEL: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
  OPENAI_BASE_URL: z.string().url().optional(),
  CHUNKLINE_CONFIG: z.string().min(1).optional(),
});

// Inferred types
export type EnvConfig = z.infer<typeof ENV_SCHEMA>;
