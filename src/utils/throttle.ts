/**
 * Timing Utilities
 */

import { WaitAbortedError } from '../core/errors.js';

/**
 * Sleep for the specified milliseconds.
 * Rejects with WaitAbortedError as soon as the signal fires.
 */
export function sleep(ms: number, signal?: AbortSignal, description: string = 'delay'): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new WaitAbortedError(description));
            return;
        }

        const onAbort = (): void => {
            clearTimeout(timer);
            reject(new WaitAbortedError(description));
        };

        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Combine an optional caller signal with a deadline.
 * `dispose` must be called once the guarded work ends so the timer is released.
 */
export function withDeadline(timeoutMs: number, signal?: AbortSignal): {
    signal: AbortSignal;
    deadline: AbortSignal;
    dispose: () => void;
} {
    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(), timeoutMs);
    const combined = signal ? AbortSignal.any([deadline.signal, signal]) : deadline.signal;

    return {
        signal: combined,
        deadline: deadline.signal,
        dispose: () => clearTimeout(timer),
    };
}
