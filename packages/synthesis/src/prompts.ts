/**
 * Prompt construction for the generation stages
 */

import type { ChatPrompt } from '@digest/llm';

const SUMMARY_SYSTEM =
  'You are a careful research assistant. Summarize text faithfully and never add information that is not in it.';

const EXTRACTION_SYSTEM =
  'You are a research analyst. You extract key claims from text. ' +
  'Every claim must be grounded in the source. Never invent facts. ' +
  'Return only valid JSON with no extra text.';

const DIGEST_SYSTEM =
  'You are a research analyst writing a structured research brief. ' +
  'Organize findings by thematic sections. Reference sources clearly. ' +
  'Preserve conflicting viewpoints with attribution. Never invent facts.';

export function buildSummaryPrompt(text: string): ChatPrompt {
  return {
    system: SUMMARY_SYSTEM,
    user: `Summarize the following text concisely. Keep only key facts and claims.
Do not add any information not present in the text.

Text:
---
${text}
---

Concise summary:`,
  };
}

export function buildExtractionPrompt(text: string): ChatPrompt {
  return {
    system: EXTRACTION_SYSTEM,
    user: `Extract 3-7 key claims from this text.
For each claim provide a direct supporting quote, copied word for word from the text.

Return ONLY a JSON array with no additional text:
[{"claim": "...", "supporting_quote": "..."}]

Text:
---
${text}
---`,
  };
}

export interface DigestPromptGroup {
  theme: string;
  is_conflicting: boolean;
  claims: Array<{ claim: string; supporting_quote: string; source: string }>;
  sources: readonly string[];
}

export interface DigestPromptSource {
  id: string;
  title: string;
  type: string;
}

export function buildDigestPrompt(groups: readonly DigestPromptGroup[], sources: readonly DigestPromptSource[]): ChatPrompt {
  const parts: string[] = [];

  parts.push('Generate a markdown research digest from these grouped claims.');
  parts.push(`\n## Grouped Claims\n${JSON.stringify(groups, null, 2)}`);
  parts.push(`\n## Sources\n${JSON.stringify(sources, null, 2)}`);
  parts.push(`\n## Task
Write the digest with themed sections and source references.
Groups marked is_conflicting combine claims from several sources: present each viewpoint with its source.
Do not add a title or summary statistics; they are added separately.`);

  return { system: DIGEST_SYSTEM, user: parts.join('\n') };
}
