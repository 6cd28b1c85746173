/**
 * Batched summarization of source chunks
 */

import { pino } from 'pino';
import {
  attemptGeneration,
  createBatches,
  type BudgetAwareInvoker,
  type GenerationClient,
} from '@digest/llm';
import { valueOrDegrade } from './outcome.js';
import { buildSummaryPrompt } from './prompts.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

/** Batches shorter than this (in words) are their own summary */
export const SUMMARY_PASSTHROUGH_WORDS = 30;

/** Characters kept from a batch when summarization fails */
export const SUMMARY_FALLBACK_CHARS = 500;

export interface SummarizerOptions {
  maxBatchChars: number;
}

function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export class Summarizer {
  constructor(
    private readonly client: GenerationClient,
    private readonly invoker: BudgetAwareInvoker,
    private readonly options: SummarizerOptions
  ) {}

  /**
   * Summarize chunks batch by batch; summaries are joined with blank lines
   *
   * @throws InvocationError when the run must stop (rate limit exhausted, fatal failure)
   */
  async summarizeChunks(chunks: readonly string[], sourceId: string): Promise<string> {
    if (chunks.length === 0) {
      return '';
    }

    const batches = createBatches(chunks, this.options.maxBatchChars);
    logger.info(
      { event: 'synthesis.summary.start', sourceId, chunks: chunks.length, batches: batches.length },
      `Summarizing ${chunks.length} chunks in ${batches.length} batches`
    );

    const summaries: string[] = [];
    for (const [index, batch] of batches.entries()) {
      summaries.push(await this.summarizeBatch(batch, `summarize:${sourceId}#${index}`));
    }

    return summaries.join('\n\n');
  }

  private async summarizeBatch(text: string, label: string): Promise<string> {
    if (countWords(text) < SUMMARY_PASSTHROUGH_WORDS) {
      return text;
    }

    const outcome = await attemptGeneration(this.invoker, this.client, {
      label,
      prompt: buildSummaryPrompt(text),
      parse: (completion) => completion,
    });

    const summary = valueOrDegrade(outcome);
    if (summary === undefined) {
      logger.warn(
        { event: 'synthesis.summary.fallback', label, attempts: outcome.attempts },
        `Summarization failed for ${label}; keeping the first ${SUMMARY_FALLBACK_CHARS} characters`
      );
      return text.slice(0, SUMMARY_FALLBACK_CHARS);
    }
    return summary;
  }
}
