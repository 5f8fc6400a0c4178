/**
 * Redaction utilities for logs and captured traffic
 */

import type { HeaderMap } from '../types/protocol.js';

const KEY_PATTERNS: RegExp[] = [
    /AKIA[0-9A-Z]{16}/g, // AWS Access Key ID
    /ghp_[A-Za-z0-9]{36}/g, // GitHub token
    /sk_(?:live|test)_[A-Za-z0-9]{24,}/g, // Stripe
    /AIza[0-9A-Za-z\-_]{35}/g, // Google API key
    /xox[baprs]-[A-Za-z0-9-]{10,48}/g, // Slack token
    /eyJ[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/g, // JWT
];

const EMAIL_PATTERN = /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi;

// Compared lower-cased
const SENSITIVE_KEYS = new Set([
    'password',
    'pass',
    'token',
    'authorization',
    'proxy-authorization',
    'apikey',
    'x-api-key',
    'secret',
    'cookie',
    'set-cookie',
    'session',
    'sec-websocket-key',
    'sec-websocket-accept',
]);

export function isSensitiveKey(key: string): boolean {
    return SENSITIVE_KEYS.has(key.toLowerCase());
}

export function redactString(value: string): string {
    let redacted = value;
    for (const pattern of KEY_PATTERNS) {
        redacted = redacted.replace(pattern, '[REDACTED]');
    }
    redacted = redacted.replace(EMAIL_PATTERN, '[REDACTED_EMAIL]');
    return redacted;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function redactObject(value: unknown): unknown {
    if (value === null || value === undefined) return value;
    if (typeof value === 'string') return redactString(value);
    if (value instanceof Error) return value;

    if (Array.isArray(value)) {
        return value.map(item => redactObject(item));
    }

    if (!isRecord(value)) return value;

    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
        result[key] = isSensitiveKey(key) ? '[REDACTED]' : redactObject(val);
    }
    return result;
}

/**
 * Copy of a header map with credential-bearing values masked
 */
export function redactHeaders(headers: HeaderMap): HeaderMap {
    const result: HeaderMap = {};
    for (const [name, value] of Object.entries(headers)) {
        result[name] = isSensitiveKey(name) ? '[REDACTED]' : redactString(value);
    }
    return result;
}
