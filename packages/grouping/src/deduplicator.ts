/**
 * Claim deduplication and grouping
 */

import { pino } from 'pino';
import type { Claim, ClaimGroup, EncodedClaim, SimilarityPair } from '@digest/core';
import { buildClusters, materializeGroups } from './clusters.js';
import type { Encoder } from './embedding-index.js';
import { findSimilarPairs } from './similarity.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

/**
 * Group claims from a precomputed list of similar pairs
 */
export function groupClaims(claims: readonly Claim[], pairs: readonly SimilarityPair[]): ClaimGroup[] {
  const assignment = buildClusters(
    claims.map((claim) => claim.id),
    pairs
  );
  return materializeGroups(claims, assignment);
}

export class ClaimDeduplicator {
  constructor(private readonly encoder: Encoder, private readonly threshold: number) {
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new Error(`Similarity threshold must be within [0, 1], got ${threshold}`);
    }
  }

  /**
   * Encode claims, pair them by similarity and return conflict-flagged groups,
   * largest first. Every input claim lands in exactly one group.
   */
  async deduplicateAndGroup(claims: readonly Claim[]): Promise<ClaimGroup[]> {
    if (claims.length === 0) {
      return [];
    }

    const startTime = Date.now();
    const vectors = await this.encoder.encode(claims.map((claim) => claim.text));

    const encoded: EncodedClaim[] = claims.map((claim, index) => ({
      claimId: claim.id,
      vector: vectors[index] ?? [],
    }));

    const pairs = findSimilarPairs(encoded, this.threshold);
    const groups = groupClaims(claims, pairs);

    logger.info(
      {
        event: 'grouping.cluster.success',
        claims: claims.length,
        pairs: pairs.length,
        groups: groups.length,
        conflicting: groups.filter((group) => group.conflicting).length,
        durationMs: Date.now() - startTime,
      },
      `Grouped ${claims.length} claims into ${groups.length} groups`
    );

    return groups;
  }
}
