/**
 * Retry rules for failed task outcomes
 */

import type { ErrorCode } from '../errors.js';
import type { RetryPolicy } from '../config/HostConfig.js';
import type { TaskOutcome } from '../plugin-engine/types.js';
import { calculateBackoff } from '../utils/TimeoutWrapper.js';

export const RETRYABLE_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
    'UpstreamUnavailable',
    'Timeout',
    'InternalFault',
]);

/**
 * Whether an outcome may be retried under the policy
 */
export function shouldRetry(outcome: TaskOutcome, policy: RetryPolicy): boolean {
    if (outcome.attempt >= policy.maxAttempts) return false;
    if (outcome.status !== 'failed' && outcome.status !== 'timed_out') return false;
    return outcome.error !== undefined && RETRYABLE_CODES.has(outcome.error.code);
}

/**
 * Delay before the next attempt after the given one failed
 */
export function retryDelay(failedAttempt: number, policy: RetryPolicy): number {
    return calculateBackoff(failedAttempt - 1, {
        baseMs: policy.backoffMs,
        multiplier: policy.multiplier,
        maxMs: policy.maxBackoffMs,
    });
}
