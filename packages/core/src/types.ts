/**
 * Shared data model for the claim digest pipeline
 */

/**
 * An atomic assertion extracted from a source document, with a verbatim supporting quote
 */
export interface Claim {
  readonly id: string;
  readonly text: string;
  readonly supportingQuote: string;
  readonly sourceId: string;
  readonly sourceTitle?: string;
}

export interface EncodedClaim {
  readonly claimId: string;
  readonly vector: readonly number[];
}

/**
 * Cosine similarity between two distinct claims, only materialized at or above the threshold
 */
export interface SimilarityPair {
  readonly claimIdA: string;
  readonly claimIdB: string;
  readonly score: number;
}

/**
 * A cluster of claims judged equivalent by embedding similarity.
 * `claimIds` and `sourceIds` are sorted and duplicate-free.
 */
export interface ClaimGroup {
  readonly groupId: string;
  readonly theme: string;
  readonly claimIds: readonly string[];
  readonly claims: readonly Claim[];
  readonly sourceIds: readonly string[];
  readonly conflicting: boolean;
}

export type SourceType = 'file' | 'url';

export type SourceStatus = 'success' | 'error' | 'empty';

export interface SourceDocument {
  sourceId: string;
  sourceType: SourceType;
  location: string;
  title?: string;
  rawText: string;
  cleanedText: string;
  summary: string;
  status: SourceStatus;
  errorMessage?: string;
  claims: Claim[];
}
