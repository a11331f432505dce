import OpenAI from 'openai';
import { z } from 'zod';
import { DEFAULT_EMBEDDING_MODEL } from '../config/constants';
import { OPENAI_EMBEDDING_RESPONSE_SCHEMA, type OpenAIEmbeddingResponse } from '../schemas/api-schemas';
import { ProcessingError, ValidationError, handleUnknownError, throwIfCancelled } from '../errors/index';
import { cosineSimilarity, type SimilarityOracle } from '../similarity/similarity-oracle';
import { CONSOLE_LOGGER, type Logger } from '../output/logger';

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  model?: string;
  baseURL?: string;
  dimensions?: number;
  logger?: Logger;
}

export const OpenAIEmbeddingDefaultConfig = {
  model: DEFAULT_EMBEDDING_MODEL,
};

/*
 * Similarity oracle backed by the OpenAI embeddings endpoint. Similarity itself
 * is computed locally as cosine similarity.
 */
export class OpenAIEmbeddingOracle implements SimilarityOracle {
  private client: OpenAI;
  private model: string;
  private dimensions: number | undefined;
  private logger: Logger;

  constructor(config: OpenAIEmbeddingConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      maxRetries: 2,
      ...(config.baseURL !== undefined && { baseURL: config.baseURL }),
    });
    this.model = config.model ?? OpenAIEmbeddingDefaultConfig.model;
    this.dimensions = config.dimensions;
    this.logger = config.logger ?? CONSOLE_LOGGER;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embedBatch([text], signal);
    if (!vector) {
      throw new ProcessingError('Empty response from OpenAI embeddings API (no data).');
    }
    return vector;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    throwIfCancelled(signal);

    this.logger.debug(`requesting ${texts.length} embeddings from ${this.model}`);

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.embeddings.create(
        {
          model: this.model,
          input: texts,
          ...(this.dimensions !== undefined && { dimensions: this.dimensions }),
        },
        signal ? { signal } : undefined
      );
    } catch (e: unknown) {
      throwIfCancelled(signal);
      // Handle specific OpenAI SDK errors - check more specific errors first
      if (e instanceof OpenAI.RateLimitError) {
        throw new ProcessingError(`OpenAI rate limit exceeded: ${e.message}`);
      }
      if (e instanceof OpenAI.AuthenticationError) {
        throw new ProcessingError(`OpenAI authentication failed: ${e.message}`);
      }
      if (e instanceof OpenAI.APIError) {
        throw new ProcessingError(`OpenAI API error (${e.status}): ${e.message}`);
      }

      const err = handleUnknownError(e, 'OpenAI embeddings call');
      throw new ProcessingError(`OpenAI embeddings call failed: ${err.message}`);
    }

    const response = this.validateResponse(rawResponse);
    if (response.usage) {
      this.logger.debug('embedding usage:', response.usage);
    }

    if (response.data.length !== texts.length) {
      throw new ProcessingError(
        `OpenAI returned ${response.data.length} embeddings for ${texts.length} inputs`
      );
    }
    return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }

  similarity(a: readonly number[], b: readonly number[]): number {
    return cosineSimilarity(a, b);
  }

  private validateResponse(response: unknown): OpenAIEmbeddingResponse {
    try {
      return OPENAI_EMBEDDING_RESPONSE_SCHEMA.parse(response);
    } catch (e: unknown) {
      if (e instanceof z.ZodError) {
        throw new ValidationError(`Invalid OpenAI embeddings response structure: ${e.message}`);
      }
      const err = handleUnknownError(e, 'OpenAI response validation');
      throw new ValidationError(`OpenAI response validation failed: ${err.message}`);
    }
  }
}
