/**
 * Output files: digest.md and sources.json
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { pino } from 'pino';
import type { SourceDocument, SourceStatus, SourceType } from '@digest/core';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const DIGEST_FILE = 'digest.md';
export const SOURCES_FILE = 'sources.json';

export interface SourcesReport {
  metadata: {
    generatedAt: string;
    totalSources: number;
    successfulSources: number;
    totalClaims: number;
  };
  sources: Array<{
    sourceId: string;
    title: string | null;
    sourceType: SourceType;
    location: string;
    status: SourceStatus;
    charLength: number;
    error: string | null;
    claims: Array<{ id: string; claim: string; supportingQuote: string }>;
  }>;
}

export interface WrittenOutputs {
  digestPath: string;
  sourcesPath: string;
}

export function buildSourcesReport(sources: readonly SourceDocument[], generatedAt: Date): SourcesReport {
  return {
    metadata: {
      generatedAt: generatedAt.toISOString(),
      totalSources: sources.length,
      successfulSources: sources.filter((source) => source.status === 'success').length,
      totalClaims: sources.reduce((total, source) => total + source.claims.length, 0),
    },
    sources: sources.map((source) => ({
      sourceId: source.sourceId,
      title: source.title ?? null,
      sourceType: source.sourceType,
      location: source.location,
      status: source.status,
      charLength: source.rawText.length,
      error: source.errorMessage ?? null,
      claims: source.claims.map((claim) => ({
        id: claim.id,
        claim: claim.text,
        supportingQuote: claim.supportingQuote,
      })),
    })),
  };
}

/**
 * Write both output files, creating the directory when needed
 */
export async function writeDigestOutputs(
  outputDir: string,
  markdown: string,
  report: SourcesReport
): Promise<WrittenOutputs> {
  await mkdir(outputDir, { recursive: true });

  const digestPath = join(outputDir, DIGEST_FILE);
  const sourcesPath = join(outputDir, SOURCES_FILE);

  await writeFile(digestPath, markdown, 'utf-8');
  await writeFile(sourcesPath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');

  logger.info({ event: 'synthesis.output.written', digestPath, sourcesPath }, `Wrote outputs to ${outputDir}`);

  return { digestPath, sourcesPath };
}
