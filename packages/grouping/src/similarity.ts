/**
 * Pairwise cosine similarity over claim embeddings
 */

import { pino } from 'pino';
import type { EncodedClaim, SimilarityPair } from '@digest/core';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

/** Rounding tolerance so a cosine that equals the threshold is kept */
export const SCORE_EPSILON = 1e-9;

/**
 * Scale a vector to unit length; a zero vector stays zero
 */
export function normalizeVector(vector: readonly number[]): number[] {
  let sumOfSquares = 0;
  for (const value of vector) {
    sumOfSquares += value * value;
  }
  const norm = Math.sqrt(sumOfSquares);
  if (norm === 0) {
    return vector.map(() => 0);
  }
  return vector.map((value) => value / norm);
}

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

/**
 * Cosine similarity clamped to [0, 1]
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimensions differ: ${a.length} vs ${b.length}`);
  }
  return clampScore(dot(normalizeVector(a), normalizeVector(b)));
}

function clampScore(score: number): number {
  return Math.min(1, Math.max(0, score));
}

/**
 * Most common length among non-empty finite vectors; ties go to the one seen first
 */
function dominantDimension(encoded: readonly EncodedClaim[]): number {
  const counts = new Map<number, number>();
  let best = 0;
  let bestCount = 0;
  for (const item of encoded) {
    const length = item.vector.length;
    if (length === 0 || !item.vector.every(Number.isFinite)) continue;
    const count = (counts.get(length) ?? 0) + 1;
    counts.set(length, count);
    if (count > bestCount) {
      best = length;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Every pair of distinct claims whose cosine similarity reaches the threshold.
 *
 * Pairs are emitted for i < j in input order, so each unordered pair appears once
 * and no claim is paired with itself. Vectors whose length differs from the
 * most common one, or with non-finite components, are left out and end up as
 * singletons.
 */
export function findSimilarPairs(encoded: readonly EncodedClaim[], threshold: number): SimilarityPair[] {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new Error(`Similarity threshold must be within [0, 1], got ${threshold}`);
  }
  if (encoded.length < 2) {
    return [];
  }

  const dimension = dominantDimension(encoded);
  const usable: Array<{ claimId: string; unit: number[] }> = [];

  for (const item of encoded) {
    if (item.vector.length !== dimension || dimension === 0) {
      logger.warn(
        { event: 'grouping.similarity.skip', claimId: item.claimId, dimension: item.vector.length, expected: dimension },
        `Skipping claim ${item.claimId}: vector dimension mismatch`
      );
      continue;
    }
    if (!item.vector.every(Number.isFinite)) {
      logger.warn(
        { event: 'grouping.similarity.skip', claimId: item.claimId, reason: 'non_finite' },
        `Skipping claim ${item.claimId}: vector has non-finite values`
      );
      continue;
    }
    usable.push({ claimId: item.claimId, unit: normalizeVector(item.vector) });
  }

  const pairs: SimilarityPair[] = [];
  for (let i = 0; i < usable.length; i++) {
    const a = usable[i];
    if (!a) continue;
    for (let j = i + 1; j < usable.length; j++) {
      const b = usable[j];
      if (!b) continue;
      const score = dot(a.unit, b.unit);
      if (score >= threshold - SCORE_EPSILON) {
        pairs.push({ claimIdA: a.claimId, claimIdB: b.claimId, score: clampScore(score) });
      }
    }
  }

  logger.debug(
    { event: 'grouping.similarity.success', vectors: usable.length, pairs: pairs.length, threshold },
    `Found ${pairs.length} similar pairs`
  );

  return pairs;
}
