import type { ClaimGroup } from '@digest/core';

export const CONFLICT_NOTE = '*Note: This group contains potentially conflicting viewpoints.*';

export const NO_CLAIMS_NOTE = '_No grounded claims were found in the sources._';

/**
 * Deterministic markdown digest built from the groups alone.
 * Used when the generation service cannot write the digest.
 */
export function formatFallbackDigest(groups: readonly ClaimGroup[]): string {
  if (groups.length === 0) {
    return `${NO_CLAIMS_NOTE}\n`;
  }

  const sections = groups.map((group) => {
    const lines = [`## ${group.theme}\n`];

    for (const claim of group.claims) {
      lines.push(`- **${claim.text}**`);
      lines.push(`  > "${claim.supportingQuote}"`);
      lines.push(`  \u2014 *${claim.sourceTitle || claim.sourceId}*\n`);
    }

    if (group.conflicting) {
      lines.push(`${CONFLICT_NOTE}\n`);
    }

    return lines.join('\n');
  });

  return sections.join('\n\n');
}
