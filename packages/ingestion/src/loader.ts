/**
 * Source acquisition from local files and URLs
 *
 * A source that cannot be read is returned with `status: 'error'` and the
 * reason, so one bad input never stops the run.
 */

import { readFile, readdir, stat } from 'fs/promises';
import { basename, extname, join, resolve } from 'path';
import { pino } from 'pino';
import { buildSourceId, type SourceDocument, type SourceType } from '@digest/core';
import { extractHtml } from './html.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const SUPPORTED_EXTENSIONS: readonly string[] = ['.txt', '.md', '.html', '.htm'];

const HTML_EXTENSIONS = new Set(['.html', '.htm']);

export interface PageResponse {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type PageFetchFn = (
  url: string,
  init: { signal: AbortSignal; headers: Record<string, string> }
) => Promise<PageResponse>;

export interface SourceLoaderOptions {
  fetch?: PageFetchFn;
  /** Per-URL timeout (default 15s) */
  timeoutMs?: number;
  userAgent?: string;
}

function emptySource(sourceType: SourceType, location: string): SourceDocument {
  return {
    sourceId: buildSourceId(location),
    sourceType,
    location,
    rawText: '',
    cleanedText: '',
    summary: '',
    status: 'success',
    claims: [],
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function looksLikeHtml(contentType: string, body: string): boolean {
  return contentType.includes('html') || /^\s*</.test(body);
}

/**
 * List the supported files directly inside a folder, sorted by path
 */
export async function collectSourceFiles(folder: string): Promise<string[]> {
  const folderStat = await stat(folder).catch(() => null);
  if (!folderStat?.isDirectory()) {
    throw new Error(`Folder not found: ${folder}`);
  }

  const entries = await readdir(folder, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && SUPPORTED_EXTENSIONS.includes(extname(entry.name).toLowerCase()))
    .map((entry) => join(folder, entry.name))
    .sort();
}

export class SourceLoader {
  private readonly fetchFn: PageFetchFn;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: SourceLoaderOptions = {}) {
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.userAgent = options.userAgent ?? 'ResearchDigest/0.1 (claim digest)';
  }

  /**
   * Load URLs then files, skipping repeated locations
   */
  async loadAll(urls: readonly string[], paths: readonly string[]): Promise<SourceDocument[]> {
    const seen = new Set<string>();
    const sources: SourceDocument[] = [];

    for (const url of urls) {
      if (seen.has(url)) continue;
      seen.add(url);
      sources.push(await this.loadUrl(url));
    }

    for (const path of paths) {
      const absolutePath = resolve(path);
      if (seen.has(absolutePath)) continue;
      seen.add(absolutePath);
      sources.push(await this.loadFile(absolutePath));
    }

    logger.info(
      {
        event: 'ingestion.load.success',
        total: sources.length,
        failed: sources.filter((source) => source.status === 'error').length,
      },
      `Loaded ${sources.length} sources`
    );

    return sources;
  }

  async loadFile(path: string): Promise<SourceDocument> {
    const absolutePath = resolve(path);
    const source = emptySource('file', absolutePath);
    const extension = extname(absolutePath).toLowerCase();

    try {
      if (!SUPPORTED_EXTENSIONS.includes(extension)) {
        throw new Error(`Unsupported file type: ${extension || '(none)'}`);
      }

      const content = await readFile(absolutePath, 'utf-8');
      if (HTML_EXTENSIONS.has(extension)) {
        const extracted = extractHtml(content);
        source.rawText = extracted.text;
        source.title = extracted.title ?? basename(absolutePath);
      } else {
        source.rawText = content;
        source.title = basename(absolutePath);
      }

      if (source.rawText.trim().length === 0) {
        source.status = 'empty';
      }

      logger.info(
        { event: 'ingestion.file.read', sourceId: source.sourceId, path: absolutePath, chars: source.rawText.length },
        `Read file ${absolutePath}`
      );
    } catch (error: unknown) {
      source.status = 'error';
      source.errorMessage = errorMessage(error);
      logger.error(
        { event: 'ingestion.file.fail', sourceId: source.sourceId, path: absolutePath, error: source.errorMessage },
        `Failed to read ${absolutePath}`
      );
    }

    return source;
  }

  async loadUrl(url: string): Promise<SourceDocument> {
    const source = emptySource('url', url);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const startTime = Date.now();

    try {
      const response = await this.fetchFn(url, {
        signal: controller.signal,
        headers: {
          'User-Agent': this.userAgent,
          'Accept': 'text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8',
        },
      });

      if (!response.ok) {
        throw new Error(`Fetch failed: ${response.status}`);
      }

      const body = await response.text();
      const contentType = response.headers.get('content-type') ?? '';

      if (looksLikeHtml(contentType, body)) {
        const extracted = extractHtml(body);
        source.rawText = extracted.text;
        source.title = extracted.title ?? new URL(url).hostname;
      } else {
        source.rawText = body;
        source.title = new URL(url).hostname;
      }

      if (source.rawText.trim().length === 0) {
        source.status = 'empty';
      }

      logger.info(
        {
          event: 'ingestion.fetch.success',
          sourceId: source.sourceId,
          url,
          status: response.status,
          chars: source.rawText.length,
          durationMs: Date.now() - startTime,
        },
        `Fetched ${url}`
      );
    } catch (error: unknown) {
      source.status = 'error';
      source.errorMessage = controller.signal.aborted ? `Timed out after ${this.timeoutMs}ms` : errorMessage(error);
      logger.error(
        { event: 'ingestion.fetch.fail', sourceId: source.sourceId, url, error: source.errorMessage },
        `Failed to fetch ${url}`
      );
    } finally {
      clearTimeout(timeout);
    }

    return source;
  }
}
