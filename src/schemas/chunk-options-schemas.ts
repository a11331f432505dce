import { z } from 'zod';
import { ChunkingStrategy } from '../chunking/types';

// Chunk option schema; sizes are estimated token counts
export const CHUNK_OPTIONS_SCHEMA = z
  .object({
    strategy: z.nativeEnum(ChunkingStrategy).default(ChunkingStrategy.Auto),
    targetChunkSize: z.number().int().positive().default(512),
    minChunkSize: z.number().int().nonnegative().default(100),
    maxChunkSize: z.number().int().positive().default(1024),
    overlapSize: z.number().int().nonnegative().default(50),
    languageCode: z.string().min(1).nullable().default(null),
    preserveSentences: z.boolean().default(true),
    preserveParagraphs: z.boolean().default(true),
    preserveSectionHeaders: z.boolean().default(true),
    semanticSimilarityThreshold: z.number().min(-1).max(1).default(0.5),
    normalizeWhitespace: z.boolean().default(false),
    enableChunkBalancing: z.boolean().default(false),
  })
  .strict()
  .superRefine((options, ctx) => {
    if (options.minChunkSize > options.targetChunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minChunkSize'],
        message: `minChunkSize (${options.minChunkSize}) must not exceed targetChunkSize (${options.targetChunkSize})`,
      });
    }
    if (options.targetChunkSize > options.maxChunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['targetChunkSize'],
        message: `targetChunkSize (${options.targetChunkSize}) must not exceed maxChunkSize (${options.maxChunkSize})`,
      });
    }
  });

// Named presets declared in a YAML file; every field optional, validated again once merged
export const PRESET_FILE_SCHEMA = z.object({
  presets: z.record(
    z.string(),
    z.object({
      description: z.string().optional(),
      options: CHUNK_OPTIONS_SCHEMA.innerType().partial(),
    })
  ),
});

export type ChunkOptionsInput = z.input<typeof CHUNK_OPTIONS_SCHEMA>;
export type PresetFile = z.infer<typeof PRESET_FILE_SCHEMA>;
