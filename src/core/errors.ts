/**
 * Observer Error Taxonomy
 *
 * Every failure raised by the library is an ObserverError subclass so callers
 * can branch with `instanceof` instead of matching message text.
 *
 * - timeout:   a wait exceeded its deadline (safe to retry)
 * - protocol:  a protocol command failed
 * - state:     operation on a resolved request or an unknown connection
 * - pattern:   a caller-supplied regular expression does not compile
 * - stability: one or more stability checks did not settle
 */

export type ObserverErrorKind = 'timeout' | 'aborted' | 'protocol' | 'state' | 'pattern' | 'stability';

export class ObserverError extends Error {
    readonly kind: ObserverErrorKind;

    constructor(kind: ObserverErrorKind, message: string) {
        super(message);
        this.name = 'ObserverError';
        this.kind = kind;
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// WAITS
// ═══════════════════════════════════════════════════════════════════════════════

export class WaitTimeoutError extends ObserverError {
    readonly condition: string;
    readonly timeoutMs: number;

    constructor(condition: string, timeoutMs: number) {
        super('timeout', `Timed out after ${timeoutMs}ms waiting for ${condition}`);
        this.name = 'WaitTimeoutError';
        this.condition = condition;
        this.timeoutMs = timeoutMs;
    }
}

export class WaitAbortedError extends ObserverError {
    readonly condition: string;

    constructor(condition: string) {
        super('aborted', `Wait for ${condition} was aborted`);
        this.name = 'WaitAbortedError';
        this.condition = condition;
    }
}

export class SocketSequenceError extends ObserverError {
    readonly condition: string;
    readonly index: number;
    readonly failure: ObserverError;

    constructor(condition: string, index: number, cause: ObserverError) {
        super(cause.kind, `Socket sequence failed at condition ${index} (${condition}): ${cause.message}`);
        this.name = 'SocketSequenceError';
        this.condition = condition;
        this.index = index;
        this.failure = cause;
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROTOCOL / STATE / PATTERN
// ═══════════════════════════════════════════════════════════════════════════════

export class ProtocolCommandError extends ObserverError {
    readonly method: string;

    constructor(method: string, reason: string) {
        super('protocol', `Protocol command ${method} failed: ${reason}`);
        this.name = 'ProtocolCommandError';
        this.method = method;
    }
}

export class RequestNotInterceptedError extends ObserverError {
    readonly requestId: string;

    constructor(requestId: string) {
        super('state', `Request ${requestId} is not intercepted (never paused or already resolved)`);
        this.name = 'RequestNotInterceptedError';
        this.requestId = requestId;
    }
}

export class ConnectionNotFoundError extends ObserverError {
    readonly connectionId: string;

    constructor(connectionId: string) {
        super('state', `Socket connection not found: ${connectionId}`);
        this.name = 'ConnectionNotFoundError';
        this.connectionId = connectionId;
    }
}

export class InvalidPatternError extends ObserverError {
    readonly pattern: string;

    constructor(pattern: string, reason: string) {
        super('pattern', `Invalid pattern "${pattern}": ${reason}`);
        this.name = 'InvalidPatternError';
        this.pattern = pattern;
    }
}

export class SessionNotInitializedError extends ObserverError {
    constructor() {
        super('state', 'PageSession not initialized. Call initialize() first.');
        this.name = 'SessionNotInitializedError';
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// STABILITY
// ═══════════════════════════════════════════════════════════════════════════════

export class StabilityCheckError extends ObserverError {
    readonly check: string;
    readonly timedOut: boolean;

    constructor(check: string, reason: string, timedOut: boolean) {
        super('stability', `Stability check "${check}" failed: ${reason}`);
        this.name = 'StabilityCheckError';
        this.check = check;
        this.timedOut = timedOut;
    }
}

export class StabilityError extends ObserverError {
    readonly failures: StabilityCheckError[];
    readonly attempts: number;

    constructor(message: string, failures: StabilityCheckError[], attempts: number) {
        const detail = failures.map(f => f.check).join(', ');
        super('stability', detail ? `${message} (failed checks: ${detail})` : message);
        this.name = 'StabilityError';
        this.failures = failures;
        this.attempts = attempts;
    }

    /** Names of the checks that failed on the last attempt */
    get failedChecks(): string[] {
        return this.failures.map(f => f.check);
    }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
