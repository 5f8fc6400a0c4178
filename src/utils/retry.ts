/**
 * Retry Utility
 *
 * Re-runs an async operation with a fixed or exponential delay between
 * attempts. The delay is abortable, so an outer deadline always wins over a
 * pending retry.
 *
 * Usage:
 *   await retry(attempt => runChecks(attempt), { retries: 3, baseDelay: 1000, backoff: 'fixed', signal });
 */

import type { Logger } from '../types/index.js';
import { toError } from '../core/errors.js';
import { sleep } from './throttle.js';

/**
 * Retry configuration options
 */
export interface RetryOptions {
    /** Number of retry attempts after the first (default: 3) */
    retries?: number;
    /** Delay in ms between attempts, or the base for exponential backoff (default: 1000) */
    baseDelay?: number;
    /** Maximum delay in ms (default: 30000) */
    maxDelay?: number;
    /** Delay growth between attempts (default: 'exponential') */
    backoff?: 'fixed' | 'exponential';
    /** Jitter factor 0-1 to add randomness (default: 0) */
    jitter?: number;
    /** Cancels the pending delay; the abort error is thrown as-is */
    signal?: AbortSignal;
    /** Optional logger for debug output */
    logger?: Logger;
    /** Function to determine if error is retryable (default: all errors) */
    shouldRetry?: (error: Error, attempt: number) => boolean;
    /** Callback before each retry */
    onRetry?: (error: Error, attempt: number) => void;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'signal' | 'logger' | 'onRetry'>> = {
    retries: 3,
    baseDelay: 1000,
    maxDelay: 30000,
    backoff: 'exponential',
    jitter: 0,
    shouldRetry: () => true,
};

/**
 * Calculate the delay before the next attempt
 */
export function calculateDelay(
    attempt: number,
    baseDelay: number,
    maxDelay: number,
    backoff: 'fixed' | 'exponential',
    jitter: number
): number {
    const rawDelay = backoff === 'fixed' ? baseDelay : baseDelay * Math.pow(2, attempt - 1);
    const cappedDelay = Math.min(rawDelay, maxDelay);

    // Random value between -jitter% and +jitter%
    const jitterAmount = cappedDelay * jitter * (Math.random() * 2 - 1);

    return Math.max(0, Math.floor(cappedDelay + jitterAmount));
}

/**
 * Retry an async operation
 *
 * @param fn - Operation to run; receives the 1-based attempt number
 * @returns Result of the first successful attempt
 * @throws Last error if all retries fail, or the abort error if `signal` fires during a delay
 */
export async function retry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const retries = options.retries ?? DEFAULT_OPTIONS.retries;
    const baseDelay = options.baseDelay ?? DEFAULT_OPTIONS.baseDelay;
    const maxDelay = options.maxDelay ?? DEFAULT_OPTIONS.maxDelay;
    const backoff = options.backoff ?? DEFAULT_OPTIONS.backoff;
    const jitter = options.jitter ?? DEFAULT_OPTIONS.jitter;
    const shouldRetry = options.shouldRetry ?? DEFAULT_OPTIONS.shouldRetry;
    const { signal, logger, onRetry } = options;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            const lastError = toError(error);

            if (attempt > retries) {
                logger?.warn(`Retry exhausted after ${retries} retries: ${lastError.message}`);
                throw lastError;
            }

            if (signal?.aborted || !shouldRetry(lastError, attempt)) {
                logger?.debug(`Error not retryable: ${lastError.message}`);
                throw lastError;
            }

            const delay = calculateDelay(attempt, baseDelay, maxDelay, backoff, jitter);

            logger?.debug(
                `Attempt ${attempt}/${retries + 1} failed: ${lastError.message}. ` +
                `Retrying in ${delay}ms...`
            );

            onRetry?.(lastError, attempt);

            await sleep(delay, signal, 'retry delay');
        }
    }
}
