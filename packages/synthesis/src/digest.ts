/**
 * Digest synthesis: header plus a generated narrative, or the template fallback
 */

import { pino } from 'pino';
import type { ClaimGroup, SourceDocument } from '@digest/core';
import { attemptGeneration, type BudgetAwareInvoker, type GenerationClient } from '@digest/llm';
import { formatFallbackDigest } from './fallback.js';
import { buildDigestPrompt, type DigestPromptGroup, type DigestPromptSource } from './prompts.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface DigestResult {
  markdown: string;
  usedFallback: boolean;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYY-MM-DD HH:mm:ss
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function buildDigestHeader(
  sources: readonly SourceDocument[],
  groups: readonly ClaimGroup[],
  generatedAt: Date
): string {
  const analysed = sources.filter((source) => source.status === 'success').length;
  const totalClaims = groups.reduce((total, group) => total + group.claims.length, 0);

  return (
    '# Research Digest\n\n' +
    `**Generated:** ${formatTimestamp(generatedAt)}\n` +
    `**Sources Analyzed:** ${analysed}\n` +
    `**Total Claims:** ${totalClaims}\n` +
    `**Claim Groups:** ${groups.length}\n\n---\n\n`
  );
}

function toPromptGroups(groups: readonly ClaimGroup[]): DigestPromptGroup[] {
  return groups.map((group) => ({
    theme: group.theme,
    is_conflicting: group.conflicting,
    claims: group.claims.map((claim) => ({
      claim: claim.text,
      supporting_quote: claim.supportingQuote,
      source: claim.sourceTitle || claim.sourceId,
    })),
    sources: group.sourceIds,
  }));
}

function toPromptSources(sources: readonly SourceDocument[]): DigestPromptSource[] {
  return sources
    .filter((source) => source.status === 'success')
    .map((source) => ({
      id: source.sourceId,
      title: source.title || source.location,
      type: source.sourceType,
    }));
}

export class DigestSynthesizer {
  /**
   * Without a client or invoker every digest comes from the template formatter
   */
  constructor(
    private readonly client: GenerationClient | null,
    private readonly invoker: BudgetAwareInvoker | null
  ) {}

  /**
   * Never throws for service failures: any unsuccessful outcome falls back to the template
   */
  async synthesize(
    groups: readonly ClaimGroup[],
    sources: readonly SourceDocument[],
    generatedAt: Date = new Date()
  ): Promise<DigestResult> {
    const header = buildDigestHeader(sources, groups, generatedAt);
    const body = await this.generateBody(groups, sources);

    if (body !== undefined) {
      return { markdown: `${header}${body}\n`, usedFallback: false };
    }
    return { markdown: `${header}${formatFallbackDigest(groups)}`, usedFallback: true };
  }

  private async generateBody(
    groups: readonly ClaimGroup[],
    sources: readonly SourceDocument[]
  ): Promise<string | undefined> {
    if (!this.client || !this.invoker || groups.length === 0) {
      return undefined;
    }

    const outcome = await attemptGeneration(this.invoker, this.client, {
      label: 'digest',
      prompt: buildDigestPrompt(toPromptGroups(groups), toPromptSources(sources)),
      parse: (completion) => completion,
    });

    if (outcome.status === 'success') {
      logger.info({ event: 'synthesis.digest.success', groups: groups.length }, 'Digest generated');
      return outcome.value;
    }

    logger.error(
      { event: 'synthesis.digest.fallback', status: outcome.status, error: outcome.error.message },
      'Digest generation failed; using template digest'
    );
    return undefined;
  }
}
