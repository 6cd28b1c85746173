/**
 * Embedding similarity index
 *
 * Encodes claim texts through a remote embedding provider, in batches, and
 * pairs them by cosine similarity.
 */

import { pino } from 'pino';
import type { EncodedClaim, SimilarityPair } from '@digest/core';
import {
  MalformedResponseError,
  estimateTokens,
  type BudgetAwareInvoker,
  type EmbeddingClient,
} from '@digest/llm';
import { findSimilarPairs } from './similarity.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface Encoder {
  /** One vector per text, in input order */
  encode(texts: readonly string[]): Promise<number[][]>;
}

export interface EmbeddingIndexOptions {
  /** Route every provider call through the run's invoker */
  invoker?: BudgetAwareInvoker;
  /** Overrides the client's batch size when smaller */
  batchSize?: number;
}

export class EmbeddingSimilarityIndex implements Encoder {
  private readonly batchSize: number;

  constructor(private readonly client: EmbeddingClient, private readonly options: EmbeddingIndexOptions = {}) {
    this.batchSize = Math.min(options.batchSize ?? client.batchSize, client.batchSize);
    if (this.batchSize < 1) {
      throw new Error(`Embedding batch size must be at least 1, got ${this.batchSize}`);
    }
  }

  async encode(texts: readonly string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    const totalBatches = Math.ceil(texts.length / this.batchSize);

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      const batchIndex = start / this.batchSize;
      const embedded = await this.embedBatch(batch, batchIndex);

      if (embedded.length !== batch.length) {
        throw new MalformedResponseError(
          `Embedding count mismatch: sent ${batch.length} texts, received ${embedded.length} vectors`
        );
      }
      vectors.push(...embedded);

      logger.debug(
        { event: 'grouping.embed.batch', batch: batchIndex + 1, totalBatches, size: batch.length },
        `Embedded batch ${batchIndex + 1}/${totalBatches}`
      );
    }

    logger.info(
      { event: 'grouping.embed.success', texts: texts.length, model: this.client.model },
      `Embedded ${texts.length} texts`
    );

    return vectors;
  }

  findSimilarPairs(encoded: readonly EncodedClaim[], threshold: number): SimilarityPair[] {
    return findSimilarPairs(encoded, threshold);
  }

  private async embedBatch(batch: string[], batchIndex: number): Promise<number[][]> {
    const { invoker } = this.options;
    if (!invoker) {
      return (await this.client.embed(batch)).value;
    }
    return invoker.invoke(
      {
        label: `embed:${batchIndex}`,
        estimatedTokens: batch.reduce((sum, text) => sum + estimateTokens(text), 0),
      },
      (signal) => this.client.embed(batch, signal)
    );
  }
}
