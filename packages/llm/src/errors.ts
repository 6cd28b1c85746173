/**
 * Failure taxonomy for calls to external model services
 */

export type FailureKind = 'rate_limited' | 'transient' | 'fatal';

export class InvocationError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvocationError';
    this.kind = kind;
  }
}

/**
 * The service rejected the call for exceeding its quota (HTTP 429)
 */
export class RateLimitedError extends InvocationError {
  readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number, options?: { cause?: unknown }) {
    super('rate_limited', message, options);
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Network fault, server error or call timeout; safe to resend
 */
export class TransientError extends InvocationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transient', message, options);
    this.name = 'TransientError';
  }
}

/**
 * The service answered but the payload could not be used; resending re-prompts the model
 */
export class MalformedResponseError extends TransientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedResponseError';
  }
}

/**
 * Unrecoverable for the current run (auth, quota, aborted run)
 */
export class FatalError extends InvocationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('fatal', message, options);
    this.name = 'FatalError';
  }
}

export class BudgetExhaustedError extends FatalError {
  constructor(message: string) {
    super(message);
    this.name = 'BudgetExhaustedError';
  }
}

/** Message patterns indicating provider rate limiting */
const RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /\b429\b/,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
];

/** Message patterns indicating a fault that a resend may clear */
const TRANSIENT_PATTERNS = [
  /timeout/i,
  /timed?\s*out/i,
  /ETIMEDOUT/,
  /ECONNRESET/,
  /ECONNREFUSED/,
  /EAI_AGAIN/,
  /socket hang up/i,
  /fetch failed/i,
  /network/i,
  /status\s*(?:code\s*)?5\d\d/i,
  /overloaded/i,
];

/**
 * Map any thrown value onto the failure taxonomy.
 * Errors already typed are returned unchanged.
 */
export function classifyFailure(error: unknown): InvocationError {
  if (error instanceof InvocationError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new TransientError(`Call aborted: ${message}`, { cause: error });
  }

  if (RATE_LIMIT_PATTERNS.some((pattern) => pattern.test(message))) {
    return new RateLimitedError(message, undefined, { cause: error });
  }

  if (TRANSIENT_PATTERNS.some((pattern) => pattern.test(message))) {
    return new TransientError(message, { cause: error });
  }

  return new FatalError(message, { cause: error });
}
