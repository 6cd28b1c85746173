import type { InvocationOutcome } from '@digest/llm';

/**
 * Value of a successful outcome, or undefined when the call failed transiently
 * and the stage can degrade. Rate-limit exhaustion and fatal failures are
 * rethrown: they end the run.
 */
export function valueOrDegrade<T>(outcome: InvocationOutcome<T>): T | undefined {
  switch (outcome.status) {
    case 'success':
      return outcome.value;
    case 'transient':
      return undefined;
    case 'rate_limited':
    case 'fatal':
      throw outcome.error;
  }
}
