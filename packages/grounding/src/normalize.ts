/**
 * Text normalization for quote matching
 *
 * Both sides of a grounding check go through the same function, so a quote
 * copied out of a source still matches after the model re-types its
 * punctuation or spacing.
 */

const ZERO_WIDTH_PATTERN = /[\u200B-\u200D\u2060\uFEFF]/g;

/**
 * Typographic characters mapped to their ASCII form
 */
const CHARACTER_REPLACEMENTS: Array<[RegExp, string]> = [
  [/[\u2018\u2019\u201A\u201B\u2032]/g, "'"],
  [/[\u201C\u201D\u201E\u201F\u2033]/g, '"'],
  [/\u2026/g, '...'],
];

const WRAPPING_QUOTES = new Set(['"', "'"]);

/**
 * Normalize text for exact substring comparison
 */
export function normalizeForMatch(text: string): string {
  let normalized = text.replace(ZERO_WIDTH_PATTERN, '');
  for (const [pattern, replacement] of CHARACTER_REPLACEMENTS) {
    normalized = normalized.replace(pattern, replacement);
  }
  return normalized.replace(/\s+/g, ' ').trim();
}

/**
 * Remove one pair of matching quotes around an already normalized quote
 */
export function stripWrappingQuotes(quote: string): string {
  if (quote.length >= 2) {
    const first = quote[0];
    const last = quote[quote.length - 1];
    if (first !== undefined && first === last && WRAPPING_QUOTES.has(first)) {
      return quote.slice(1, -1).trim();
    }
  }
  return quote;
}
