/**
 * Retry Logic
 *
 * Attempt-N-times wrapper with exponential backoff. The attempt reports
 * success as a boolean; a thrown error counts as a failed attempt.
 */

import { sleep as defaultSleep } from './time.js';

export interface RetryOptions {
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  sleep?: (ms: number) => Promise<void>;
  // Called before the wait that precedes attempt `nextAttempt`
  onRetry?: (nextAttempt: number, delayMs: number) => void;
  onError?: (error: unknown, attempt: number) => void;
}

export interface RetryOutcome {
  succeeded: boolean;
  attempts: number;
}

const defaultOptions: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

/**
 * Backoff delay before attempt `attempt` (1-indexed). The first attempt never waits.
 */
export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'initialDelay' | 'maxDelay' | 'backoffMultiplier'> = defaultOptions
): number {
  if (attempt <= 1) {
    return 0;
  }
  const delay = options.initialDelay * Math.pow(options.backoffMultiplier, attempt - 2);
  return Math.min(delay, options.maxDelay);
}

/**
 * Run `attempt` until it reports success or the attempt budget is spent
 */
export async function retryWithBackoff(
  attempt: (attemptNumber: number) => Promise<boolean>,
  options: Partial<RetryOptions> = {}
): Promise<RetryOutcome> {
  const opts = { ...defaultOptions, ...options };
  const wait = opts.sleep ?? defaultSleep;

  let attempts = 0;

  for (let n = 1; n <= opts.maxAttempts; n++) {
    if (n > 1) {
      const delay = backoffDelay(n, opts);
      opts.onRetry?.(n, delay);
      await wait(delay);
    }

    attempts = n;
    let succeeded = false;
    try {
      succeeded = await attempt(n);
    } catch (error) {
      opts.onError?.(error, n);
    }

    if (succeeded) {
      return { succeeded: true, attempts };
    }
  }

  return { succeeded: false, attempts };
}
