/**
 * Grounded-claim validation
 *
 * A claim survives only when its supporting quote appears verbatim (after
 * normalization) in the text of the source it cites. Rejections are logged
 * and returned, never thrown.
 */

import { pino } from 'pino';
import type { Claim } from '@digest/core';
import { normalizeForMatch, stripWrappingQuotes } from './normalize.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export type RejectionReason = 'ungrounded' | 'empty_quote' | 'unknown_source';

export interface RejectedClaim {
  claim: Claim;
  reason: RejectionReason;
}

export interface ValidationResult {
  grounded: Claim[];
  rejected: RejectedClaim[];
}

function normalizeQuote(quote: string): string {
  return stripWrappingQuotes(normalizeForMatch(quote));
}

/**
 * Check that a claim's quote is a contiguous substring of the source text
 */
export function isGrounded(claim: Pick<Claim, 'supportingQuote'>, sourceText: string): boolean {
  const quote = normalizeQuote(claim.supportingQuote);
  if (quote.length === 0) {
    return false;
  }
  return normalizeForMatch(sourceText).includes(quote);
}

/**
 * Split claims into grounded and rejected, preserving input order
 */
export function validateClaims(claims: readonly Claim[], sourceTextById: ReadonlyMap<string, string>): ValidationResult {
  const grounded: Claim[] = [];
  const rejected: RejectedClaim[] = [];
  const normalizedSources = new Map<string, string>();

  const reject = (claim: Claim, reason: RejectionReason): void => {
    rejected.push({ claim, reason });
    logger.warn(
      {
        event: 'grounding.claim.reject',
        claimId: claim.id,
        sourceId: claim.sourceId,
        reason,
        quote: claim.supportingQuote.substring(0, 80),
      },
      `Dropped claim ${claim.id}: ${reason}`
    );
  };

  for (const claim of claims) {
    const quote = normalizeQuote(claim.supportingQuote);
    if (quote.length === 0) {
      reject(claim, 'empty_quote');
      continue;
    }

    const sourceText = sourceTextById.get(claim.sourceId);
    if (sourceText === undefined) {
      reject(claim, 'unknown_source');
      continue;
    }

    let normalizedSource = normalizedSources.get(claim.sourceId);
    if (normalizedSource === undefined) {
      normalizedSource = normalizeForMatch(sourceText);
      normalizedSources.set(claim.sourceId, normalizedSource);
    }

    if (normalizedSource.includes(quote)) {
      grounded.push(claim);
    } else {
      reject(claim, 'ungrounded');
    }
  }

  logger.info(
    {
      event: 'grounding.validate.success',
      total: claims.length,
      grounded: grounded.length,
      rejected: rejected.length,
    },
    `Validated ${claims.length} claims (${rejected.length} rejected)`
  );

  return { grounded, rejected };
}
