/**
 * Errors raised by the run loop.
 */

import type { TransientReason } from '../types/index.js';
import { HarnessError } from '../utils/errors.js';

/**
 * A known, retryable failure of the subscription backend seen in the log.
 * Recovered by the run loop; only surfaced as the cause of RunExhaustedError.
 */
export class TransientBackendError extends HarnessError {
  readonly reason: TransientReason;
  readonly attempt: number;
  readonly backoffMs: number;

  constructor(reason: TransientReason, attempt: number, backoffMs: number) {
    super(
      reason === 'rate_limited'
        ? `Subscription backend rate limited the agent (status=429) on attempt ${attempt + 1}`
        : `Subscription backend returned status 500 on attempt ${attempt + 1}`
    );
    this.name = 'TransientBackendError';
    this.reason = reason;
    this.attempt = attempt;
    this.backoffMs = backoffMs;
  }
}

/**
 * Every launch attempt ended in a transient backend failure.
 */
export class RunExhaustedError extends HarnessError {
  readonly attempts: number;
  readonly lastReason: TransientReason | null;

  constructor(attempts: number, lastError: TransientBackendError | null) {
    super(
      `Failed to run virt-who after ${attempts} attempts`,
      lastError ? { cause: lastError } : undefined
    );
    this.name = 'RunExhaustedError';
    this.attempts = attempts;
    this.lastReason = lastError?.reason ?? null;
  }
}

/**
 * A second run was started while one was still in flight on the same runner.
 */
export class RunInProgressError extends HarnessError {
  constructor(readonly host: string) {
    super(`A virt-who run is already in progress against ${host}`);
    this.name = 'RunInProgressError';
  }
}
