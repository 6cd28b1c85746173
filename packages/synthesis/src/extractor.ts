/**
 * Claim extraction from source text
 */

import { pino } from 'pino';
import { z } from 'zod';
import { buildClaimId, type Claim } from '@digest/core';
import { chunkText } from '@digest/ingestion';
import {
  MalformedResponseError,
  attemptGeneration,
  type BudgetAwareInvoker,
  type GenerationClient,
} from '@digest/llm';
import { valueOrDegrade } from './outcome.js';
import { buildExtractionPrompt } from './prompts.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const ExtractedClaimSchema = z.object({
  claim: z.string().default(''),
  supporting_quote: z.string().default(''),
});

const ExtractedClaimsSchema = z.array(ExtractedClaimSchema);

export interface ExtractedClaim {
  text: string;
  supportingQuote: string;
}

export interface ExtractionSource {
  sourceId: string;
  cleanedText: string;
  title?: string;
}

export interface ClaimExtractorOptions {
  maxBatchChars: number;
}

/**
 * Parse a model answer into claims
 *
 * Accepts a bare JSON array, one wrapped in a code fence, or one embedded in
 * surrounding prose. Items without claim text or quote are dropped.
 *
 * @throws MalformedResponseError when no valid array can be read
 */
export function parseClaimsResponse(raw: string): ExtractedClaim[] {
  let cleaned = raw.trim();
  if (cleaned.startsWith('```')) {
    const firstNewline = cleaned.indexOf('\n');
    cleaned = firstNewline === -1 ? '' : cleaned.slice(firstNewline + 1);
    const closingFence = cleaned.lastIndexOf('```');
    if (closingFence !== -1) {
      cleaned = cleaned.slice(0, closingFence);
    }
  }

  const arrayMatch = cleaned.match(/\[[\s\S]*\]/);
  if (arrayMatch) {
    cleaned = arrayMatch[0];
  }

  let data: unknown;
  try {
    data = JSON.parse(cleaned);
  } catch (error: unknown) {
    throw new MalformedResponseError('Claim extraction answer is not valid JSON', { cause: error });
  }

  const parsed = ExtractedClaimsSchema.safeParse(data);
  if (!parsed.success) {
    throw new MalformedResponseError(
      `Claim extraction answer is not a claim array: ${parsed.error.issues[0]?.message ?? 'invalid'}`
    );
  }

  return parsed.data
    .map((item) => ({ text: item.claim.trim(), supportingQuote: item.supporting_quote.trim() }))
    .filter((item) => item.text.length > 0 && item.supportingQuote.length > 0);
}

/**
 * Pack the text into batches of at most `maxChars`. Paragraphs are kept whole
 * where they fit; longer ones are split at sentence ends.
 */
export function buildExtractionBatches(text: string, maxChars: number): string[] {
  return chunkText(text, { chunkSize: maxChars, chunkOverlap: 0 });
}

export class ClaimExtractor {
  constructor(
    private readonly client: GenerationClient,
    private readonly invoker: BudgetAwareInvoker,
    private readonly options: ClaimExtractorOptions
  ) {}

  /**
   * Extract claims from every batch of a source's cleaned text.
   * A batch whose answers stay malformed is skipped; the others still count.
   *
   * @throws InvocationError when the run must stop (rate limit exhausted, fatal failure)
   */
  async extractClaims(source: ExtractionSource): Promise<Claim[]> {
    const batches = buildExtractionBatches(source.cleanedText, this.options.maxBatchChars);
    const claims: Claim[] = [];

    for (const [index, batch] of batches.entries()) {
      const label = `extract:${source.sourceId}#${index}`;
      const outcome = await attemptGeneration(this.invoker, this.client, {
        label,
        prompt: buildExtractionPrompt(batch),
        parse: parseClaimsResponse,
      });

      const extracted = valueOrDegrade(outcome);
      if (extracted === undefined) {
        logger.warn(
          { event: 'synthesis.extract.skip', label, attempts: outcome.attempts },
          `Claim extraction abandoned for ${label}`
        );
        continue;
      }

      for (const item of extracted) {
        claims.push({
          id: buildClaimId(source.sourceId, claims.length),
          text: item.text,
          supportingQuote: item.supportingQuote,
          sourceId: source.sourceId,
          sourceTitle: source.title,
        });
      }
    }

    logger.info(
      { event: 'synthesis.extract.success', sourceId: source.sourceId, batches: batches.length, claims: claims.length },
      `Extracted ${claims.length} claims from ${source.sourceId}`
    );

    return claims;
  }
}
