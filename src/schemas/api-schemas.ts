import { z } from 'zod';

// OpenAI embeddings API response schemas
export const OPENAI_EMBEDDING_SCHEMA = z.object({
  index: z.number().int().nonnegative(),
  embedding: z.array(z.number()),
});

export const OPENAI_EMBEDDING_USAGE_SCHEMA = z.object({
  prompt_tokens: z.number(),
  total_tokens: z.number(),
});

export const OPENAI_EMBEDDING_RESPONSE_SCHEMA = z.object({
  data: z.array(OPENAI_EMBEDDING_SCHEMA),
  model: z.string().optional(),
  usage: OPENAI_EMBEDDING_USAGE_SCHEMA.optional(),
});

// Inferred types
export type OpenAIEmbeddingResponse = z.infer<typeof OPENAI_EMBEDDING_RESPONSE_SCHEMA>;
