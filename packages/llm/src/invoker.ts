/**
 * Budget-aware invocation of external model services
 *
 * Each call runs through a bounded state machine:
 *
 *   PENDING -> (PACE_WAIT) -> SENT -> SUCCESS
 *                              |-> RATE_LIMITED -> BACKOFF_WAIT -> (PACE_WAIT) -> SENT
 *                              |-> TRANSIENT_FAILURE -> (PACE_WAIT) -> SENT
 *                              '-> FATAL
 *
 * The number of sends per call is capped by the two attempt limits, so the
 * loop terminates whatever the service does. Only one call is in flight at a
 * time; concurrent callers are queued.
 */

import { pino } from 'pino';
import { RateBudget, systemClock, type Clock, type RateBudgetState, type RateLimits } from './budget.js';
import {
  BudgetExhaustedError,
  FatalError,
  RateLimitedError,
  TransientError,
  classifyFailure,
  type FailureKind,
  type InvocationError,
} from './errors.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export type InvocationState =
  | 'PENDING'
  | 'PACE_WAIT'
  | 'SENT'
  | 'BACKOFF_WAIT'
  | 'SUCCESS'
  | 'RATE_LIMITED'
  | 'TRANSIENT_FAILURE'
  | 'FATAL';

export interface InvocationRequest {
  /** Stage and unit name used in logs, e.g. "extract:3f2a9c01d4#0" */
  label: string;
  estimatedTokens: number;
}

/**
 * Result of one send, with the token cost the service reported
 */
export interface Metered<T> {
  value: T;
  tokens?: number;
}

export type Operation<T> = (signal: AbortSignal) => Promise<Metered<T>>;

export type InvocationOutcome<T> =
  | { status: 'success'; value: T; attempts: number; tokens: number }
  | { status: FailureKind; error: InvocationError; attempts: number };

export interface InvokerOptions {
  limits: RateLimits;
  /** Wait after a rate-limit signal (default 60s) */
  cooldownMs?: number;
  /** Minimum gap between two sends (default 22s) */
  callDelayMs?: number;
  /** Sends allowed while the service keeps rate limiting (default 4) */
  rateLimitMaxAttempts?: number;
  /** Sends allowed while failures are transient or malformed (default 3) */
  transientMaxAttempts?: number;
  /** Upper bound on a single send (default 120s) */
  callTimeoutMs?: number;
  clock?: Clock;
  /** Run-level cancellation */
  signal?: AbortSignal;
  onTransition?: (label: string, state: InvocationState) => void;
}

export class BudgetAwareInvoker {
  private readonly budget: RateBudget;
  private readonly clock: Clock;
  private readonly cooldownMs: number;
  private readonly callDelayMs: number;
  private readonly rateLimitMaxAttempts: number;
  private readonly transientMaxAttempts: number;
  private readonly callTimeoutMs: number;
  private readonly signal?: AbortSignal;
  private readonly onTransition?: (label: string, state: InvocationState) => void;

  private lastSentAt: number | null = null;
  private haltReason: InvocationError | null = null;
  private queue: Promise<void> = Promise.resolve();
  private sends = 0;

  constructor(options: InvokerOptions) {
    this.clock = options.clock ?? systemClock;
    this.budget = new RateBudget(options.limits, this.clock.now());
    this.cooldownMs = options.cooldownMs ?? 60_000;
    this.callDelayMs = options.callDelayMs ?? 22_000;
    this.rateLimitMaxAttempts = options.rateLimitMaxAttempts ?? 4;
    this.transientMaxAttempts = options.transientMaxAttempts ?? 3;
    this.callTimeoutMs = options.callTimeoutMs ?? 120_000;
    this.signal = options.signal;
    this.onTransition = options.onTransition;

    if (this.rateLimitMaxAttempts < 1 || this.transientMaxAttempts < 1) {
      throw new Error('Attempt limits must be at least 1');
    }
  }

  /** Total sends issued by this invoker */
  get sendCount(): number {
    return this.sends;
  }

  get halted(): boolean {
    return this.haltReason !== null || this.signal?.aborted === true;
  }

  budgetState(): Readonly<RateBudgetState> {
    return this.budget.snapshot();
  }

  /**
   * Stop the run: every later call fails fast as fatal
   */
  abort(reason: string): void {
    if (!this.haltReason) {
      this.haltReason = new FatalError(`Run aborted: ${reason}`);
      logger.warn({ event: 'llm.invoke.halt', reason }, 'Invoker halted; further calls will fail fast');
    }
  }

  /**
   * Run an operation under the budget. Never throws; the outcome says how it ended.
   */
  attempt<T>(request: InvocationRequest, operation: Operation<T>): Promise<InvocationOutcome<T>> {
    const run = this.queue.then(() => this.run(request, operation));
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Run an operation under the budget and return its value
   *
   * @throws InvocationError subclass matching the terminal outcome
   */
  async invoke<T>(request: InvocationRequest, operation: Operation<T>): Promise<T> {
    const outcome = await this.attempt(request, operation);
    if (outcome.status === 'success') {
      return outcome.value;
    }
    throw outcome.error;
  }

  private transition(label: string, state: InvocationState): void {
    this.onTransition?.(label, state);
  }

  private preflight(estimatedTokens: number): InvocationError | null {
    if (this.haltReason) {
      return this.haltReason;
    }
    if (this.signal?.aborted) {
      return new FatalError('Run aborted by caller');
    }

    const size = this.budget.checkCallSize(estimatedTokens);
    if (!size.allowed) {
      return new FatalError(size.reason);
    }

    const daily = this.budget.checkDaily(estimatedTokens, this.clock.now());
    if (!daily.allowed) {
      this.haltReason = new BudgetExhaustedError(daily.reason);
      logger.error({ event: 'llm.budget.exhausted', reason: daily.reason }, 'Daily budget exhausted');
      return this.haltReason;
    }
    return null;
  }

  private async pace(label: string, estimatedTokens: number): Promise<void> {
    const now = this.clock.now();
    const sinceLast = this.lastSentAt === null ? Number.POSITIVE_INFINITY : now - this.lastSentAt;
    const paceMs = Math.max(0, this.callDelayMs - sinceLast);
    const windowMs = this.budget.msUntilWindowFits(estimatedTokens, now);
    const waitMs = Math.max(paceMs, windowMs);

    if (waitMs > 0) {
      this.transition(label, 'PACE_WAIT');
      logger.info(
        {
          event: 'llm.invoke.pace',
          label,
          waitMs,
          reason: windowMs >= paceMs ? 'window' : 'call_delay',
        },
        `Pacing ${label} for ${waitMs}ms`
      );
      await this.clock.sleep(waitMs, this.signal);
    }
  }

  private async sendWithTimeout<T>(label: string, operation: Operation<T>): Promise<Metered<T>> {
    const controller = new AbortController();
    const runSignal = this.signal;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    let onRunAbort: (() => void) | undefined;

    // Each rejects before aborting so the race settles with it, not the operation's abort error
    const interrupted = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        reject(new TransientError(`Call ${label} timed out after ${this.callTimeoutMs}ms`));
        controller.abort();
      }, this.callTimeoutMs);

      if (runSignal) {
        onRunAbort = () => {
          reject(new FatalError('Run aborted by caller'));
          controller.abort();
        };
        runSignal.addEventListener('abort', onRunAbort, { once: true });
      }
    });

    try {
      return await Promise.race([operation(controller.signal), interrupted]);
    } finally {
      clearTimeout(timeoutId);
      if (runSignal && onRunAbort) {
        runSignal.removeEventListener('abort', onRunAbort);
      }
    }
  }

  private async run<T>(request: InvocationRequest, operation: Operation<T>): Promise<InvocationOutcome<T>> {
    const { label } = request;
    const estimatedTokens = Math.max(0, Math.ceil(request.estimatedTokens));
    const maxSends = this.rateLimitMaxAttempts + this.transientMaxAttempts - 1;
    let rateLimitedSends = 0;
    let transientSends = 0;
    let lastFailure: InvocationError = new FatalError(`No send made for ${label}`);

    this.transition(label, 'PENDING');

    for (let send = 1; send <= maxSends; send++) {
      let blocked = this.preflight(estimatedTokens);
      if (!blocked) {
        await this.pace(label, estimatedTokens);
        blocked = this.haltReason ?? (this.signal?.aborted ? new FatalError('Run aborted by caller') : null);
      }
      if (blocked) {
        this.transition(label, 'FATAL');
        return { status: 'fatal', error: blocked, attempts: send - 1 };
      }

      const sentAt = this.clock.now();
      const reservation = this.budget.reserve(estimatedTokens, sentAt);
      this.lastSentAt = sentAt;
      this.sends += 1;
      this.transition(label, 'SENT');

      try {
        const result = await this.sendWithTimeout(label, operation);
        const tokens = result.tokens ?? estimatedTokens;
        this.budget.settle(reservation, tokens);
        this.transition(label, 'SUCCESS');
        logger.debug({ event: 'llm.invoke.success', label, attempt: send, tokens }, `${label} succeeded`);
        return { status: 'success', value: result.value, attempts: send, tokens };
      } catch (error: unknown) {
        const failure = classifyFailure(error);
        lastFailure = failure;

        if (failure.kind === 'fatal') {
          this.transition(label, 'FATAL');
          logger.error(
            { event: 'llm.invoke.fail', label, attempt: send, errorType: failure.kind, error: failure.message },
            `${label} failed fatally`
          );
          return { status: 'fatal', error: failure, attempts: send };
        }

        if (failure.kind === 'rate_limited') {
          rateLimitedSends += 1;
          this.transition(label, 'RATE_LIMITED');
          if (rateLimitedSends >= this.rateLimitMaxAttempts) {
            logger.error(
              { event: 'llm.invoke.fail', label, attempt: send, errorType: failure.kind },
              `${label} still rate limited after ${rateLimitedSends} attempts`
            );
            return { status: 'rate_limited', error: failure, attempts: send };
          }

          const retryAfterMs = failure instanceof RateLimitedError ? failure.retryAfterMs ?? 0 : 0;
          const waitMs = Math.max(this.cooldownMs, retryAfterMs);
          this.transition(label, 'BACKOFF_WAIT');
          logger.warn(
            { event: 'llm.invoke.retry', label, attempt: send, reason: 'rate_limit', waitMs },
            `Rate limited, retrying ${label} in ${waitMs}ms`
          );
          await this.clock.sleep(waitMs, this.signal);
          continue;
        }

        transientSends += 1;
        this.transition(label, 'TRANSIENT_FAILURE');
        if (transientSends >= this.transientMaxAttempts) {
          logger.error(
            { event: 'llm.invoke.fail', label, attempt: send, errorType: failure.kind, error: failure.message },
            `${label} failed after ${transientSends} transient failures`
          );
          return { status: 'transient', error: failure, attempts: send };
        }
        logger.warn(
          { event: 'llm.invoke.retry', label, attempt: send, reason: failure.name, error: failure.message },
          `Transient failure, retrying ${label}`
        );
      }
    }

    return { status: lastFailure.kind, error: lastFailure, attempts: maxSends };
  }
}
