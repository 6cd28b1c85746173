/**
 * Identifier helpers
 */

import { createHash } from 'crypto';

/**
 * Build a claim id unique within a run
 * Format: ${sourceId}__c${index}
 * Uses double underscore (__) as separator so the source id stays readable
 */
export function buildClaimId(sourceId: string, index: number): string {
  if (!Number.isInteger(index) || index < 0) {
    throw new Error(`Claim index must be a non-negative integer, got ${index}`);
  }
  return `${sourceId}__c${index}`;
}

/**
 * Build a stable source id from its location (path or URL)
 * First 10 hex characters of the MD5 digest
 */
export function buildSourceId(location: string): string {
  return createHash('md5').update(location, 'utf8').digest('hex').substring(0, 10);
}

/**
 * Ordinal string comparison, independent of locale
 */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
