/**
 * Relay session helpers
 */

import { isTransientRelayFailure } from '$types';
import { describeError } from '@logging';
import type { Logger } from '@logging';

/**
 * Retry policy for one relay step
 */
export interface RetryPolicy {
  maxAttempts: number;
  delayMs: number;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Run a relay step up to `maxAttempts` times, one attempt at a time
 *
 * An attempt fails when it resolves false or throws a transient relay
 * failure. Any other error ends the step immediately.
 *
 * @param label - Step name for log lines
 * @param attempt - One attempt
 * @param policy - Attempt budget, delay and wait function
 * @param logger - Logger
 * @param signal - Abort signal; an abort during a delay rejects with its reason
 * @returns True once an attempt succeeds, false when the budget is spent
 */
export async function runWithRetries(
  label: string,
  attempt: () => Promise<boolean>,
  policy: RetryPolicy,
  logger: Logger,
  signal?: AbortSignal
): Promise<boolean> {
  for (let n = 1; n <= policy.maxAttempts; n++) {
    try {
      if (await attempt()) {
        return true;
      }
      logger.debug('[Relay] ' + label + ' attempt ' + n + '/' + policy.maxAttempts + ' not acknowledged');
    } catch (err) {
      if (!isTransientRelayFailure(err)) {
        throw err;
      }
      logger.debug('[Relay] ' + label + ' attempt ' + n + '/' + policy.maxAttempts + ' failed: ' + describeError(err));
    }

    if (n < policy.maxAttempts) {
      await policy.sleep(policy.delayMs, signal);
    }
  }

  return false;
}
