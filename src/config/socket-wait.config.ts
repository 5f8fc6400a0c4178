/**
 * Socket wait options
 */

import { z } from 'zod';
import { getConfig } from './env.js';

export type SocketDirection = 'sent' | 'received';

export interface SocketWaitOptions {
    /** `*` or empty matches every connection URL */
    urlPattern: string;
    /** Exact text or regular expression a frame payload must match */
    messagePattern: string;
    /** Second payload pattern; a frame must satisfy both when both are set */
    dataPattern: string;
    /** Matching frames required before a frame condition is met */
    messageCount: number;
    /** Empty string accepts both directions */
    direction: SocketDirection | '';
    timeoutMs: number;
    pollIntervalMs: number;
    caseSensitive: boolean;
    signal?: AbortSignal;
}

export type SocketWaitOption = (options: SocketWaitOptions) => void;

const SocketWaitOptionsSchema = z.object({
    urlPattern: z.string(),
    messagePattern: z.string(),
    dataPattern: z.string(),
    messageCount: z.number().int().positive(),
    direction: z.enum(['sent', 'received', '']),
    timeoutMs: z.number().int().positive(),
    pollIntervalMs: z.number().int().positive(),
    caseSensitive: z.boolean(),
});

export function defaultSocketWaitOptions(): SocketWaitOptions {
    const env = getConfig();
    return {
        urlPattern: '*',
        messagePattern: '',
        dataPattern: '',
        messageCount: 1,
        direction: '',
        timeoutMs: env.SOCKET_WAIT_TIMEOUT_MS,
        pollIntervalMs: env.SOCKET_POLL_INTERVAL_MS,
        caseSensitive: true,
    };
}

/**
 * Apply options over the defaults and validate the result
 * @throws Error listing every invalid field
 */
export function buildSocketWaitOptions(options: SocketWaitOption[]): SocketWaitOptions {
    const resolved = defaultSocketWaitOptions();
    for (const option of options) {
        option(resolved);
    }

    const result = SocketWaitOptionsSchema.safeParse(resolved);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`[CONFIG ERROR] Invalid socket wait options: ${issues}`);
    }

    return resolved;
}

// ═══════════════════════════════════════════════════════════════════════════════
// FUNCTIONAL OPTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function withURLPattern(pattern: string): SocketWaitOption {
    return options => { options.urlPattern = pattern; };
}

export function withMessagePattern(pattern: string): SocketWaitOption {
    return options => { options.messagePattern = pattern; };
}

export function withDataPattern(pattern: string): SocketWaitOption {
    return options => { options.dataPattern = pattern; };
}

export function withMessageCount(count: number): SocketWaitOption {
    return options => { options.messageCount = count; };
}

export function withDirection(direction: SocketDirection | ''): SocketWaitOption {
    return options => { options.direction = direction; };
}

export function withWaitTimeout(timeoutMs: number): SocketWaitOption {
    return options => { options.timeoutMs = timeoutMs; };
}

export function withWaitPollInterval(intervalMs: number): SocketWaitOption {
    return options => { options.pollIntervalMs = intervalMs; };
}

export function withCaseSensitive(caseSensitive: boolean): SocketWaitOption {
    return options => { options.caseSensitive = caseSensitive; };
}

export function withWaitSignal(signal: AbortSignal): SocketWaitOption {
    return options => { options.signal = signal; };
}
