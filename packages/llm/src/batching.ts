/**
 * Payload batching and token estimation
 */

export const BATCH_SEPARATOR = '\n\n';

/**
 * Rough token count: four characters per token
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Group units of work into as few payloads as possible.
 *
 * Units are joined with a blank line; a batch never grows past `maxChars`
 * (separators included). A unit longer than `maxChars` is sent alone, never split.
 * Order is preserved and empty units are skipped.
 */
export function createBatches(units: readonly string[], maxChars: number): string[] {
  if (maxChars < 1) {
    throw new Error(`maxChars must be positive, got ${maxChars}`);
  }

  const batches: string[] = [];
  let current: string[] = [];
  let currentSize = 0;

  for (const unit of units) {
    if (unit.trim().length === 0) continue;

    if (current.length > 0 && currentSize + BATCH_SEPARATOR.length + unit.length > maxChars) {
      batches.push(current.join(BATCH_SEPARATOR));
      current = [];
      currentSize = 0;
    }

    currentSize = current.length === 0 ? unit.length : currentSize + BATCH_SEPARATOR.length + unit.length;
    current.push(unit);
  }

  if (current.length > 0) {
    batches.push(current.join(BATCH_SEPARATOR));
  }

  return batches;
}
