/**
 * Wait Utilities
 *
 * Deadline-bounded predicate waits. A probe returns a value once satisfied and
 * `undefined` otherwise; it is re-run on a fallback interval and on every
 * notification of the watched change topics.
 */

import type { ChangeNotifier, ChangeTopic } from '../core/ChangeNotifier.js';
import { WaitAbortedError, WaitTimeoutError, toError } from '../core/errors.js';

export const DEFAULT_POLL_INTERVAL_MS = 100;

export type Probe<T> = () => T | undefined | Promise<T | undefined>;

export interface PollOptions {
    /** Human-readable condition, used in timeout and abort errors */
    description: string;
    timeoutMs: number;
    intervalMs?: number;
    signal?: AbortSignal;
    wakeOn?: {
        notifier: ChangeNotifier;
        topics: readonly ChangeTopic[];
    };
}

/**
 * Resolve with the first non-undefined probe result.
 *
 * @throws WaitTimeoutError when `timeoutMs` elapses first
 * @throws WaitAbortedError when `signal` fires first
 * @throws whatever the probe throws
 */
export function pollUntil<T>(probe: Probe<T>, options: PollOptions): Promise<T> {
    const { description, timeoutMs, signal, wakeOn } = options;
    const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;

    return new Promise<T>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new WaitAbortedError(description));
            return;
        }

        let settled = false;
        let running = false;
        let rerun = false;
        const cleanups: Array<() => void> = [];

        const finish = (settle: () => void): void => {
            if (settled) return;
            settled = true;
            for (const cleanup of cleanups) cleanup();
            settle();
        };

        // Probes never overlap; a wake-up during a run schedules one more run.
        const check = (): void => {
            if (settled) return;
            if (running) {
                rerun = true;
                return;
            }
            running = true;
            void Promise.resolve()
                .then(probe)
                .then(
                    result => {
                        running = false;
                        if (result !== undefined) {
                            finish(() => resolve(result));
                        } else if (rerun) {
                            rerun = false;
                            check();
                        }
                    },
                    (error: unknown) => {
                        running = false;
                        finish(() => reject(toError(error)));
                    }
                );
        };

        const timer = setTimeout(
            () => finish(() => reject(new WaitTimeoutError(description, timeoutMs))),
            timeoutMs
        );
        cleanups.push(() => clearTimeout(timer));

        const ticker = setInterval(check, intervalMs);
        cleanups.push(() => clearInterval(ticker));

        if (signal) {
            const onAbort = (): void => finish(() => reject(new WaitAbortedError(description)));
            signal.addEventListener('abort', onAbort, { once: true });
            cleanups.push(() => signal.removeEventListener('abort', onAbort));
        }

        if (wakeOn) {
            cleanups.push(wakeOn.notifier.watch(wakeOn.topics, check));
        }

        check();
    });
}

/**
 * Resolve once `isQuiet` has held continuously for `quietMs`.
 * Any observed non-quiet evaluation restarts the clock and runs `onBusy`.
 */
export function waitForQuiet(
    isQuiet: () => boolean,
    quietMs: number,
    options: PollOptions & { onBusy?: () => void; onQuietStart?: () => void }
): Promise<void> {
    let quietSince: number | undefined;

    return pollUntil<true>(() => {
        const now = Date.now();
        if (!isQuiet()) {
            quietSince = undefined;
            options.onBusy?.();
            return undefined;
        }
        if (quietSince === undefined) {
            quietSince = now;
            options.onQuietStart?.();
        }
        return now - quietSince >= quietMs ? true : undefined;
    }, options).then(() => undefined);
}

/**
 * Settle with `work`, or reject when `timeoutMs` elapses or `signal` fires.
 * `work` keeps running after a timeout; its late result is discarded.
 */
export function raceDeadline<T>(
    work: Promise<T>,
    options: Pick<PollOptions, 'description' | 'timeoutMs' | 'signal'>
): Promise<T> {
    const { description, timeoutMs, signal } = options;

    return new Promise<T>((resolve, reject) => {
        let settled = false;
        const cleanups: Array<() => void> = [];

        const finish = (settle: () => void): void => {
            if (settled) return;
            settled = true;
            for (const cleanup of cleanups) cleanup();
            settle();
        };

        void work.then(
            value => finish(() => resolve(value)),
            (error: unknown) => finish(() => reject(toError(error)))
        );

        if (signal?.aborted) {
            finish(() => reject(new WaitAbortedError(description)));
            return;
        }

        const timer = setTimeout(
            () => finish(() => reject(new WaitTimeoutError(description, timeoutMs))),
            timeoutMs
        );
        cleanups.push(() => clearTimeout(timer));

        if (signal) {
            const onAbort = (): void => finish(() => reject(new WaitAbortedError(description)));
            signal.addEventListener('abort', onAbort, { once: true });
            cleanups.push(() => signal.removeEventListener('abort', onAbort));
        }
    });
}
