/**
 * Rate budget accounting for one run.
 *
 * Two fixed windows roll independently: a one-minute window for request and
 * token caps, and a one-day window for the daily quota. Counters reset when
 * their window has fully elapsed.
 */

export const MINUTE_MS = 60_000;
export const DAY_MS = 86_400_000;

export interface RateLimits {
  requestsPerMinute: number;
  tokensPerMinute: number;
  requestsPerDay: number;
  tokensPerDay: number;
}

export interface RateBudgetState {
  windowStart: number;
  requestsInWindow: number;
  tokensInWindow: number;
  dayStart: number;
  requestsToday: number;
  tokensToday: number;
}

export interface Clock {
  now(): number;
  /** Resolves after `ms`, or as soon as `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const done = (): void => {
        clearTimeout(timeoutId);
        signal?.removeEventListener('abort', done);
        resolve();
      };
      const timeoutId = setTimeout(done, ms);
      signal?.addEventListener('abort', done, { once: true });
    }),
};

export type BudgetCheck =
  | { allowed: true }
  | { allowed: false; reason: string };

export interface Reservation {
  readonly estimatedTokens: number;
  readonly windowStart: number;
  readonly dayStart: number;
}

export class RateBudget {
  private readonly state: RateBudgetState;

  constructor(private readonly limits: RateLimits, startedAt: number) {
    for (const [key, value] of Object.entries(limits)) {
      if (!Number.isFinite(value) || value < 1) {
        throw new Error(`Rate limit ${key} must be at least 1, got ${value}`);
      }
    }
    this.state = {
      windowStart: startedAt,
      requestsInWindow: 0,
      tokensInWindow: 0,
      dayStart: startedAt,
      requestsToday: 0,
      tokensToday: 0,
    };
  }

  snapshot(): Readonly<RateBudgetState> {
    return { ...this.state };
  }

  /**
   * Reset any window that has fully elapsed at `now`
   */
  roll(now: number): void {
    if (now - this.state.windowStart >= MINUTE_MS) {
      this.state.windowStart = now;
      this.state.requestsInWindow = 0;
      this.state.tokensInWindow = 0;
    }
    if (now - this.state.dayStart >= DAY_MS) {
      this.state.dayStart = now;
      this.state.requestsToday = 0;
      this.state.tokensToday = 0;
    }
  }

  /**
   * A call larger than the per-minute token cap can never be paced into a window
   */
  checkCallSize(estimatedTokens: number): BudgetCheck {
    if (estimatedTokens > this.limits.tokensPerMinute) {
      return {
        allowed: false,
        reason: `Single call exceeds per-minute token cap: ${estimatedTokens} > ${this.limits.tokensPerMinute}`,
      };
    }
    return { allowed: true };
  }

  checkDaily(estimatedTokens: number, now: number): BudgetCheck {
    this.roll(now);
    if (this.state.requestsToday + 1 > this.limits.requestsPerDay) {
      return {
        allowed: false,
        reason: `Daily request budget exhausted: ${this.state.requestsToday} of ${this.limits.requestsPerDay} used`,
      };
    }
    if (this.state.tokensToday + estimatedTokens > this.limits.tokensPerDay) {
      return {
        allowed: false,
        reason: `Daily token budget exhausted: ${this.state.tokensToday} + ${estimatedTokens} > ${this.limits.tokensPerDay}`,
      };
    }
    return { allowed: true };
  }

  /**
   * Milliseconds until a call with this estimate fits the per-minute caps (0 when it fits now)
   */
  msUntilWindowFits(estimatedTokens: number, now: number): number {
    this.roll(now);
    const requestsFit = this.state.requestsInWindow + 1 <= this.limits.requestsPerMinute;
    const tokensFit = this.state.tokensInWindow + estimatedTokens <= this.limits.tokensPerMinute;
    if (requestsFit && tokensFit) {
      return 0;
    }
    return Math.max(0, this.state.windowStart + MINUTE_MS - now);
  }

  /**
   * Count a request about to be sent, holding its estimated tokens
   */
  reserve(estimatedTokens: number, now: number): Reservation {
    this.roll(now);
    this.state.requestsInWindow += 1;
    this.state.tokensInWindow += estimatedTokens;
    this.state.requestsToday += 1;
    this.state.tokensToday += estimatedTokens;
    return {
      estimatedTokens,
      windowStart: this.state.windowStart,
      dayStart: this.state.dayStart,
    };
  }

  /**
   * Replace the held estimate with the actual cost, in the windows it was reserved in
   */
  settle(reservation: Reservation, actualTokens: number): void {
    const delta = actualTokens - reservation.estimatedTokens;
    if (delta === 0) return;
    if (this.state.windowStart === reservation.windowStart) {
      this.state.tokensInWindow = Math.max(0, this.state.tokensInWindow + delta);
    }
    if (this.state.dayStart === reservation.dayStart) {
      this.state.tokensToday = Math.max(0, this.state.tokensToday + delta);
    }
  }
}
