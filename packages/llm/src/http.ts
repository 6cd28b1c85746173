/**
 * JSON-over-HTTP transport shared by the generation and embedding clients
 *
 * Maps HTTP outcomes onto the failure taxonomy. Retrying is the invoker's
 * job, so every request here is a single send.
 */

import { pino } from 'pino';
import { ProxyAgent, fetch as undiciFetch } from 'undici';
import type { z } from 'zod';
import { FatalError, MalformedResponseError, RateLimitedError, TransientError } from './errors.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface HttpRequestInit {
  method: 'POST';
  headers: Record<string, string>;
  body: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type FetchFn = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export interface HttpClientConfig {
  baseUrl: string;
  apiKey: string;
  /** Injected transport; defaults to global fetch or a proxied undici fetch */
  fetch?: FetchFn;
}

function resolveProxyUrl(): string | undefined {
  return process.env.HTTPS_PROXY || process.env.https_proxy || process.env.HTTP_PROXY || process.env.http_proxy;
}

/**
 * Create fetch with optional proxy support
 */
export function createFetch(): FetchFn {
  const proxyUrl = resolveProxyUrl();

  if (!proxyUrl) {
    return (url, init) => fetch(url, init);
  }

  logger.info(
    {
      event: 'llm.proxy.enabled',
      proxyUrl: `${proxyUrl.substring(0, 20)}...`,
    },
    'Using proxy for model API requests'
  );

  const agent = new ProxyAgent(proxyUrl);
  return (url, init) => undiciFetch(url, { ...init, dispatcher: agent });
}

/**
 * Parse a Retry-After header given in seconds
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = Number.parseInt(value, 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * POST a JSON body and validate the JSON answer against a schema
 *
 * @throws RateLimitedError on 429, TransientError on 5xx or network faults,
 *   FatalError on auth and other client errors, MalformedResponseError when
 *   the body does not match the schema
 */
export async function postJson<T>(
  config: HttpClientConfig,
  fetchFn: FetchFn,
  path: string,
  body: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  signal?: AbortSignal
): Promise<T> {
  const url = `${config.baseUrl.replace(/\/+$/, '')}${path}`;
  const startTime = Date.now();

  logger.debug({ event: 'llm.request.start', path }, 'Starting model API request');

  let response: HttpResponse;
  try {
    response = await fetchFn(url, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${config.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
      signal,
    });
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(
      { event: 'llm.request.fail', path, errorType: 'network', durationMs: Date.now() - startTime, error: message },
      'Model API request failed before a response'
    );
    throw new TransientError(`Network error calling ${path}: ${message}`, { cause: error });
  }

  if (response.status === 429) {
    await response.text().catch(() => ''); // Consume response
    throw new RateLimitedError(
      `Model API rate limited: 429 ${response.statusText}`,
      parseRetryAfter(response.headers.get('Retry-After'))
    );
  }

  if (response.status >= 500 && response.status < 600) {
    await response.text().catch(() => '');
    throw new TransientError(`Model API server error: ${response.status} ${response.statusText}`);
  }

  if (response.status === 401 || response.status === 403) {
    await response.text().catch(() => '');
    throw new FatalError(`Model API authentication error: ${response.status} ${response.statusText}`);
  }

  if (!response.ok) {
    await response.text().catch(() => '');
    throw new FatalError(`Model API error: ${response.status} ${response.statusText}`);
  }

  let data: unknown;
  try {
    data = await response.json();
  } catch (error: unknown) {
    throw new MalformedResponseError(`Invalid JSON response from ${path}`, { cause: error });
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new MalformedResponseError(`Unexpected response shape from ${path}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  logger.debug(
    { event: 'llm.request.success', path, durationMs: Date.now() - startTime },
    'Model API request succeeded'
  );

  return parsed.data;
}
