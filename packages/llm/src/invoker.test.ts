import { describe, it, expect } from 'vitest';
import type { Clock, RateLimits } from './budget.js';
import { BudgetExhaustedError, FatalError, MalformedResponseError, RateLimitedError, TransientError } from './errors.js';
import { BudgetAwareInvoker, type InvocationState, type InvokerOptions } from './invoker.js';

class FakeClock implements Clock {
  t = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.t;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.t += ms;
  }
}

const roomyLimits: RateLimits = {
  requestsPerMinute: 1000,
  tokensPerMinute: 100000,
  requestsPerDay: 10000,
  tokensPerDay: 1000000,
};

function createInvoker(clock: FakeClock, options: Partial<InvokerOptions> = {}): BudgetAwareInvoker {
  return new BudgetAwareInvoker({
    limits: roomyLimits,
    callDelayMs: 0,
    cooldownMs: 1000,
    clock,
    ...options,
  });
}

describe('BudgetAwareInvoker pacing', () => {
  it('holds calls until the request window resets', async () => {
    const clock = new FakeClock();
    const invoker = createInvoker(clock, {
      limits: { ...roomyLimits, requestsPerMinute: 2, tokensPerMinute: 1000 },
    });
    const sentAt: number[] = [];

    for (let i = 0; i < 5; i++) {
      await invoker.invoke({ label: `call-${i}`, estimatedTokens: 400 }, async () => {
        sentAt.push(clock.now());
        return { value: i };
      });
    }

    expect(sentAt).toEqual([0, 0, 60000, 60000, 120000]);
  });

  it('holds calls until the token window has room', async () => {
    const clock = new FakeClock();
    const invoker = createInvoker(clock, {
      limits: { ...roomyLimits, tokensPerMinute: 1000 },
    });
    const sentAt: number[] = [];

    for (let i = 0; i < 3; i++) {
      await invoker.invoke({ label: `call-${i}`, estimatedTokens: 600 }, async () => {
        sentAt.push(clock.now());
        return { value: i };
      });
    }

    expect(sentAt).toEqual([0, 60000, 120000]);
  });

  it('spaces consecutive sends by the call delay', async () => {
    const clock = new FakeClock();
    const invoker = createInvoker(clock, { callDelayMs: 22000 });
    const sentAt: number[] = [];

    for (let i = 0; i < 3; i++) {
      await invoker.invoke({ label: `call-${i}`, estimatedTokens: 10 }, async () => {
        sentAt.push(clock.now());
        clock.t += 2000;
        return { value: i };
      });
    }

    expect(sentAt).toEqual([0, 22000, 44000]);
  });

  it('settles the window to the reported token cost', async () => {
    const clock = new FakeClock();
    const invoker = createInvoker(clock);

    await invoker.invoke({ label: 'metered', estimatedTokens: 400 }, async () => ({ value: 'ok', tokens: 120 }));

    expect(invoker.budgetState()).toMatchObject({ requestsInWindow: 1, tokensInWindow: 120, tokensToday: 120 });
  });
});

describe('BudgetAwareInvoker retries', () => {
  it('stops after the rate limit attempt bound', async () => {
    const clock = new FakeClock();
    const invoker = createInvoker(clock, { rateLimitMaxAttempts: 3 });
    let sends = 0;

    const outcome = await invoker.attempt({ label: 'limited', estimatedTokens: 10 }, async () => {
      sends += 1;
      throw new RateLimitedError('429 Too Many Requests');
    });

    expect(outcome.status).toBe('rate_limited');
    expect(outcome.attempts).toBe(3);
    expect(sends).toBe(3);
    expect(invoker.sendCount).toBe(3);
    expect(clock.sleeps).toEqual([1000, 1000]);
  });

  it('honours a Retry-After longer than the cooldown', async () => {
    const clock = new FakeClock();
    const invoker = createInvoker(clock);
    let sends = 0;

    const value = await invoker.invoke({ label: 'retry-after', estimatedTokens: 10 }, async () => {
      sends += 1;
      if (sends === 1) {
        throw new RateLimitedError('429', 5000);
      }
      return { value: 'done' };
    });

    expect(value).toBe('done');
    expect(clock.sleeps).toEqual([5000]);
  });

  it('re-sends after a malformed response', async () => {
    const clock = new FakeClock();
    const invoker = createInvoker(clock);
    let sends = 0;

    const outcome = await invoker.attempt({ label: 'malformed', estimatedTokens: 10 }, async () => {
      sends += 1;
      if (sends === 1) {
        throw new MalformedResponseError('not a JSON array');
      }
      return { value: ['claim'] };
    });

    expect(outcome).toEqual({ status: 'success', value: ['claim'], attempts: 2, tokens: 10 });
  });

  it('gives up after the transient attempt bound', async () => {
    const clock = new FakeClock();
    const invoker = createInvoker(clock, { transientMaxAttempts: 2 });

    const outcome = await invoker.attempt({ label: 'flaky', estimatedTokens: 10 }, async () => {
      throw new Error('socket hang up');
    });

    expect(outcome.status).toBe('transient');
    expect(outcome.attempts).toBe(2);
  });

  it('does not retry fatal failures', async () => {
    const clock = new FakeClock();
    const invoker = createInvoker(clock);

    const outcome = await invoker.attempt({ label: 'auth', estimatedTokens: 10 }, async () => {
      throw new Error('Invalid API key');
    });

    expect(outcome.status).toBe('fatal');
    expect(outcome.attempts).toBe(1);
    expect(invoker.sendCount).toBe(1);
  });

  it('times out a hung call and retries it', async () => {
    const clock = new FakeClock();
    const invoker = createInvoker(clock, { callTimeoutMs: 20, transientMaxAttempts: 2 });
    let aborts = 0;

    const outcome = await invoker.attempt<string>(
      { label: 'hung', estimatedTokens: 10 },
      (signal) =>
        new Promise((_, reject) => {
          signal.addEventListener('abort', () => {
            aborts += 1;
            reject(new Error('aborted'));
          });
        })
    );

    expect(outcome.status).toBe('transient');
    expect(outcome.attempts).toBe(2);
    expect(aborts).toBe(2);
    if (outcome.status !== 'success') {
      expect(outcome.error).toBeInstanceOf(TransientError);
    }
  });

  it('reports state transitions', async () => {
    const clock = new FakeClock();
    const states: InvocationState[] = [];
    const invoker = createInvoker(clock, { onTransition: (_, state) => states.push(state) });
    let sends = 0;

    await invoker.invoke({ label: 'traced', estimatedTokens: 10 }, async () => {
      sends += 1;
      if (sends === 1) {
        throw new RateLimitedError('429');
      }
      return { value: true };
    });

    expect(states).toEqual(['PENDING', 'SENT', 'RATE_LIMITED', 'BACKOFF_WAIT', 'SENT', 'SUCCESS']);
  });
});

describe('BudgetAwareInvoker budget refusal', () => {
  it('latches once the daily budget is exhausted', async () => {
    const clock = new FakeClock();
    const invoker = createInvoker(clock, { limits: { ...roomyLimits, requestsPerDay: 2 } });
    const operation = async () => ({ value: 'ok' });

    await invoker.invoke({ label: 'a', estimatedTokens: 10 }, operation);
    await invoker.invoke({ label: 'b', estimatedTokens: 10 }, operation);
    const third = await invoker.attempt({ label: 'c', estimatedTokens: 10 }, operation);
    const fourth = await invoker.attempt({ label: 'd', estimatedTokens: 10 }, operation);

    expect(third.status).toBe('fatal');
    expect(third.attempts).toBe(0);
    if (third.status !== 'success') {
      expect(third.error).toBeInstanceOf(BudgetExhaustedError);
    }
    expect(fourth.status).toBe('fatal');
    expect(invoker.halted).toBe(true);
    expect(invoker.sendCount).toBe(2);
  });

  it('refuses a call larger than the per-minute token cap without halting', async () => {
    const clock = new FakeClock();
    const invoker = createInvoker(clock, { limits: { ...roomyLimits, tokensPerMinute: 1000 } });
    let sends = 0;

    const outcome = await invoker.attempt({ label: 'huge', estimatedTokens: 2000 }, async () => {
      sends += 1;
      return { value: 'never' };
    });

    expect(outcome.status).toBe('fatal');
    expect(outcome.attempts).toBe(0);
    expect(sends).toBe(0);
    expect(invoker.halted).toBe(false);
  });

  it('fails fast after abort', async () => {
    const clock = new FakeClock();
    const invoker = createInvoker(clock);
    invoker.abort('rate limit exhausted');

    await expect(
      invoker.invoke({ label: 'late', estimatedTokens: 10 }, async () => ({ value: 1 }))
    ).rejects.toThrow('Run aborted: rate limit exhausted');
    expect(invoker.sendCount).toBe(0);
  });

  it('fails fast when the run signal is aborted', async () => {
    const clock = new FakeClock();
    const controller = new AbortController();
    const invoker = createInvoker(clock, { signal: controller.signal });
    controller.abort();

    await expect(
      invoker.invoke({ label: 'cancelled', estimatedTokens: 10 }, async () => ({ value: 1 }))
    ).rejects.toBeInstanceOf(FatalError);
  });

  it('stops a call in flight when the run signal aborts', async () => {
    const clock = new FakeClock();
    const controller = new AbortController();
    const invoker = createInvoker(clock, { signal: controller.signal });
    let operationAborted = false;

    const outcome = await invoker.attempt<string>({ label: 'in-flight', estimatedTokens: 10 }, (signal) => {
      setTimeout(() => controller.abort(), 5);
      return new Promise((_, reject) => {
        signal.addEventListener('abort', () => {
          operationAborted = true;
          reject(new Error('aborted'));
        });
      });
    });

    expect(outcome.status).toBe('fatal');
    expect(outcome.attempts).toBe(1);
    expect(operationAborted).toBe(true);
    if (outcome.status !== 'success') {
      expect(outcome.error.message).toBe('Run aborted by caller');
    }
  });

  it('passes the run signal to the backoff wait and stops once it aborts', async () => {
    const controller = new AbortController();
    const waitedWith: Array<AbortSignal | undefined> = [];
    let t = 0;
    const clock: Clock = {
      now: () => t,
      sleep: async (ms, signal) => {
        waitedWith.push(signal);
        controller.abort();
        t += ms;
      },
    };
    const invoker = new BudgetAwareInvoker({
      limits: roomyLimits,
      callDelayMs: 0,
      cooldownMs: 60000,
      clock,
      signal: controller.signal,
    });

    const outcome = await invoker.attempt({ label: 'limited', estimatedTokens: 10 }, async () => {
      throw new RateLimitedError('429');
    });

    expect(outcome.status).toBe('fatal');
    expect(outcome.attempts).toBe(1);
    expect(invoker.sendCount).toBe(1);
    expect(waitedWith).toHaveLength(1);
    expect(waitedWith[0]).toBe(controller.signal);
  });
});

describe('BudgetAwareInvoker serialization', () => {
  it('runs one call at a time', async () => {
    const clock = new FakeClock();
    const invoker = createInvoker(clock);
    const events: string[] = [];

    const first = invoker.invoke({ label: 'first', estimatedTokens: 10 }, async () => {
      events.push('first:start');
      await Promise.resolve();
      await Promise.resolve();
      events.push('first:end');
      return { value: 1 };
    });
    const second = invoker.invoke({ label: 'second', estimatedTokens: 10 }, async () => {
      events.push('second:start');
      return { value: 2 };
    });

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });
});
