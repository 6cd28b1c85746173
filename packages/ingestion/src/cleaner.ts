/**
 * Noise removal for extracted source text
 */

const ZERO_WIDTH_PATTERN = /[\u200B\u200C\u200D\uFEFF]/g;

const PUNCTUATION_REPLACEMENTS: Array<[RegExp, string]> = [
  [/[\u2018\u2019]/g, "'"],
  [/[\u201C\u201D]/g, '"'],
  [/\u2026/g, '...'],
];

/** Lines shorter than this (in words) are menu items, captions and similar debris */
export const MIN_LINE_WORDS = 3;

function collapseBlankLines(lines: string[]): string[] {
  const result: string[] = [];
  let previousBlank = false;
  for (const line of lines) {
    const blank = line.trim().length === 0;
    if (blank && previousBlank) continue;
    result.push(blank ? '' : line);
    previousBlank = blank;
  }
  return result;
}

function countWords(line: string): number {
  return line.split(/\s+/).filter(Boolean).length;
}

/**
 * Clean raw text for summarization and grounding
 *
 * Removes zero-width characters, maps typographic quotes and ellipses to
 * ASCII, collapses runs of blank lines and of spaces, and drops non-blank
 * lines with fewer than `minWords` words.
 */
export function cleanText(text: string, minWords = MIN_LINE_WORDS): string {
  if (!text) {
    return '';
  }

  let cleaned = text.replace(ZERO_WIDTH_PATTERN, '');
  for (const [pattern, replacement] of PUNCTUATION_REPLACEMENTS) {
    cleaned = cleaned.replace(pattern, replacement);
  }

  const lines = collapseBlankLines(cleaned.split(/\r?\n/))
    .map((line) => line.split(/\s+/).filter(Boolean).join(' '))
    .filter((line) => line.length === 0 || countWords(line) >= minWords);

  return collapseBlankLines(lines).join('\n').trim();
}
