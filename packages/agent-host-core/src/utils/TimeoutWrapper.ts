/**
 * Timeout Wrapper Utility
 *
 * Bounds calls into plugins with a timeout and computes retry backoff delays.
 */

import { PluginTimeoutError } from '../errors.js';

export interface BackoffConfig {
    /** Delay before the first retry in milliseconds */
    baseMs: number;
    /** Delay multiplier for each further retry */
    multiplier: number;
    /** Upper bound for any single delay */
    maxMs: number;
}

/**
 * Calculate the delay before a retry
 * @param retryCount - Number of retries already made (0 for the first retry)
 */
export function calculateBackoff(retryCount: number, config: BackoffConfig): number {
    const delay = config.baseMs * Math.pow(config.multiplier, retryCount);
    return Math.min(delay, config.maxMs);
}

/**
 * Execute a function with a timeout
 * @param fn - Function to execute; a synchronous throw rejects like an async one
 * @param timeoutMs - Timeout in milliseconds
 * @param label - Label for error messages
 * @param onTimeout - Called once when the timeout fires, before the rejection
 * @returns Promise that rejects with PluginTimeoutError if the timeout is exceeded
 */
export async function withTimeout<T>(
    fn: () => Promise<T> | T,
    timeoutMs: number,
    label: string = 'Operation',
    onTimeout?: () => void
): Promise<T> {
    let timeoutHandle: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutHandle = setTimeout(() => {
            onTimeout?.();
            reject(new PluginTimeoutError(`${label} timed out after ${timeoutMs}ms`));
        }, timeoutMs);
    });

    try {
        return await Promise.race([Promise.resolve().then(fn), timeoutPromise]);
    } finally {
        clearTimeout(timeoutHandle);
    }
}

/**
 * Resolve after `ms` milliseconds
 */
export function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
