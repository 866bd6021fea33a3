/**
 * Retry policy for known transient failures of the subscription backend.
 *
 * Throttling backs off longer on every attempt (3, 4, 5... times the base);
 * a server error always waits the base delay.
 */

import type { TransientReason } from '../types/index.js';
import { messageSearch } from '../analyzer/message-search.js';
import { LOG_MARKERS } from '../analyzer/patterns.js';

export interface RetryPolicy {
  /** Launch attempts before giving up */
  maxAttempts: number;
  /** Base backoff in milliseconds */
  backoffBaseMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  backoffBaseMs: 60000,
};

/**
 * Retryable condition present in a log snapshot, rate limiting first.
 */
export function classifyTransient(log: string): TransientReason | null {
  if (messageSearch(log, LOG_MARKERS.RATE_LIMITED)) {
    return 'rate_limited';
  }
  if (messageSearch(log, LOG_MARKERS.SERVER_ERROR)) {
    return 'server_error';
  }
  return null;
}

/**
 * Delay before the next attempt.
 *
 * @param attempt - Zero-based index of the attempt that just failed
 */
export function backoffMs(
  reason: TransientReason,
  attempt: number,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): number {
  return reason === 'rate_limited'
    ? policy.backoffBaseMs * (attempt + 3)
    : policy.backoffBaseMs;
}
