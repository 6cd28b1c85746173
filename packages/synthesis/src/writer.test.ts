import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { SourceDocument } from '@digest/core';
import { DIGEST_FILE, SOURCES_FILE, buildSourcesReport, writeDigestOutputs } from './writer.js';

const sources: SourceDocument[] = [
  {
    sourceId: 'aaa',
    sourceType: 'url',
    location: 'https://news.test/a',
    title: 'Page A',
    rawText: 'Some raw text',
    cleanedText: 'Some raw text',
    summary: 'Short',
    status: 'success',
    claims: [{ id: 'aaa__c0', text: 'A claim', supportingQuote: 'raw text', sourceId: 'aaa' }],
  },
  {
    sourceId: 'bbb',
    sourceType: 'file',
    location: '/tmp/b.txt',
    rawText: '',
    cleanedText: '',
    summary: '',
    status: 'error',
    errorMessage: 'File not found',
    claims: [],
  },
];

describe('buildSourcesReport', () => {
  it('summarizes every source with its claims', () => {
    const report = buildSourcesReport(sources, new Date('2024-03-01T12:00:00.000Z'));

    expect(report.metadata).toEqual({
      generatedAt: '2024-03-01T12:00:00.000Z',
      totalSources: 2,
      successfulSources: 1,
      totalClaims: 1,
    });
    expect(report.sources[0]).toEqual({
      sourceId: 'aaa',
      title: 'Page A',
      sourceType: 'url',
      location: 'https://news.test/a',
      status: 'success',
      charLength: 13,
      error: null,
      claims: [{ id: 'aaa__c0', claim: 'A claim', supportingQuote: 'raw text' }],
    });
    expect(report.sources[1]).toMatchObject({ title: null, status: 'error', error: 'File not found' });
  });
});

describe('writeDigestOutputs', () => {
  let folder: string;

  beforeEach(async () => {
    folder = await mkdtemp(join(tmpdir(), 'digest-writer-'));
  });

  afterEach(async () => {
    await rm(folder, { recursive: true, force: true });
  });

  it('writes both files into a new directory', async () => {
    const outputDir = join(folder, 'out');
    const report = buildSourcesReport(sources, new Date('2024-03-01T12:00:00.000Z'));

    const written = await writeDigestOutputs(outputDir, '# Research Digest\n', report);

    expect(written).toEqual({ digestPath: join(outputDir, DIGEST_FILE), sourcesPath: join(outputDir, SOURCES_FILE) });
    expect(await readFile(written.digestPath, 'utf-8')).toBe('# Research Digest\n');
    expect(JSON.parse(await readFile(written.sourcesPath, 'utf-8'))).toEqual(report);
  });
});
