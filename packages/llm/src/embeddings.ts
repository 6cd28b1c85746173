/**
 * Embedding client for OpenAI-compatible /embeddings endpoints
 */

import { z } from 'zod';
import { MalformedResponseError } from './errors.js';
import { createFetch, postJson, type HttpClientConfig } from './http.js';
import type { Metered } from './invoker.js';

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    })
  ),
  usage: z
    .object({
      total_tokens: z.number().optional(),
    })
    .optional(),
});

/** Inputs per embeddings request */
export const MAX_EMBEDDING_BATCH_SIZE = 100;

export interface EmbeddingClientConfig extends HttpClientConfig {
  model?: string;
  batchSize?: number;
}

export interface EmbeddingClient {
  readonly model: string;
  readonly batchSize: number;
  /** One vector per input, in input order */
  embed(texts: readonly string[], signal?: AbortSignal): Promise<Metered<number[][]>>;
}

export function createEmbeddingClient(config: EmbeddingClientConfig): EmbeddingClient {
  const model = config.model ?? 'text-embedding-3-small';
  const batchSize = Math.min(config.batchSize ?? MAX_EMBEDDING_BATCH_SIZE, MAX_EMBEDDING_BATCH_SIZE);

  if (!config.apiKey || config.apiKey.trim().length === 0) {
    throw new Error('Embedding client requires an API key (EMBEDDING_API_KEY)');
  }
  if (batchSize < 1) {
    throw new Error(`Embedding batch size must be at least 1, got ${batchSize}`);
  }

  const fetchFn = config.fetch ?? createFetch();

  return {
    model,
    batchSize,
    async embed(texts: readonly string[], signal?: AbortSignal): Promise<Metered<number[][]>> {
      if (texts.length === 0) {
        return { value: [], tokens: 0 };
      }

      const response = await postJson(
        config,
        fetchFn,
        '/embeddings',
        { model, input: texts },
        EmbeddingResponseSchema,
        signal
      );

      if (response.data.length !== texts.length) {
        throw new MalformedResponseError(
          `Embedding count mismatch: sent ${texts.length} inputs, received ${response.data.length} vectors`
        );
      }

      const vectors = [...response.data].sort((a, b) => a.index - b.index).map((row) => row.embedding);

      return {
        value: vectors,
        tokens: response.usage?.total_tokens,
      };
    },
  };
}
