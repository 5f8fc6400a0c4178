/**
 * Shared type definitions
 */

export * from './protocol.js';

/**
 * Minimal logger contract accepted by utilities.
 * The winston logger from utils/logger satisfies it.
 */
export interface Logger {
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
    debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Options accepted by every blocking operation.
 */
export interface WaitOptions {
    /** Deadline for the wait in milliseconds */
    timeoutMs?: number;
    /** Cancels the wait early */
    signal?: AbortSignal;
}

/**
 * Page lifecycle states accepted by PageSession.waitForLoadState
 */
export type LoadState = 'load' | 'domcontentloaded' | 'networkidle' | 'networkidle0' | 'networkidle2';
