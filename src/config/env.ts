/**
 * Environment Configuration Manager
 * Loads and validates the optional environment overrides for observer defaults
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

// Load .env file from project root
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

/**
 * Application configuration interface
 */
export interface EnvConfig {
    /** winston log level */
    LOG_LEVEL: string;
    /** Directory for log files */
    LOG_DIR: string;
    /** Write app.log / error.log in addition to the console */
    LOG_TO_FILE: boolean;
    /** Outer deadline for waitForStability (ms) */
    STABILITY_MAX_WAIT_MS: number;
    /** Retries after the first failed stability attempt */
    STABILITY_RETRY_ATTEMPTS: number;
    /** Fixed delay between stability attempts (ms) */
    STABILITY_RETRY_DELAY_MS: number;
    /** Log every stability check at info level */
    STABILITY_VERBOSE: boolean;
    /** Default deadline for socket waits (ms) */
    SOCKET_WAIT_TIMEOUT_MS: number;
    /** Fallback poll interval for socket waits (ms) */
    SOCKET_POLL_INTERVAL_MS: number;
    /** Maximum route handlers running at once */
    ROUTE_HANDLER_CONCURRENCY: number;
    /** Requests/responses kept for waitForRequest and waitForResponse */
    REQUEST_HISTORY_LIMIT: number;
}

/**
 * Get an optional environment variable with a default value
 * @param key - Environment variable name
 * @param defaultValue - Default value if not set
 */
function getOptional(key: string, defaultValue: string): string {
    const value = process.env[key];
    return (value !== undefined && value.trim() !== '')
        ? value.trim()
        : defaultValue;
}

/**
 * Get a numeric environment variable
 * @throws Error if value is not a valid non-negative integer
 */
function getNumber(key: string, defaultValue: number): number {
    const value = process.env[key];

    if (value === undefined || value.trim() === '') {
        return defaultValue;
    }

    const parsed = parseInt(value.trim(), 10);

    if (isNaN(parsed) || parsed < 0) {
        throw new Error(
            `[CONFIG ERROR] Invalid numeric value for ${key}: "${value}"\n` +
            `Expected a non-negative integer.`
        );
    }

    return parsed;
}

function getBoolean(key: string, defaultValue: boolean): boolean {
    return getOptional(key, String(defaultValue)).toLowerCase() === 'true';
}

/**
 * Load and validate all environment configuration
 * @throws Error if any value is invalid
 */
export function loadEnvConfig(): EnvConfig {
    const config: EnvConfig = {
        LOG_LEVEL: getOptional('LOG_LEVEL', 'info'),
        LOG_DIR: getOptional('LOG_DIR', './logs'),
        LOG_TO_FILE: getBoolean('LOG_TO_FILE', true),
        STABILITY_MAX_WAIT_MS: getNumber('STABILITY_MAX_WAIT_MS', 30000),
        STABILITY_RETRY_ATTEMPTS: getNumber('STABILITY_RETRY_ATTEMPTS', 3),
        STABILITY_RETRY_DELAY_MS: getNumber('STABILITY_RETRY_DELAY_MS', 1000),
        STABILITY_VERBOSE: getBoolean('STABILITY_VERBOSE', false),
        SOCKET_WAIT_TIMEOUT_MS: getNumber('SOCKET_WAIT_TIMEOUT_MS', 30000),
        SOCKET_POLL_INTERVAL_MS: getNumber('SOCKET_POLL_INTERVAL_MS', 100),
        ROUTE_HANDLER_CONCURRENCY: getNumber('ROUTE_HANDLER_CONCURRENCY', 8),
        REQUEST_HISTORY_LIMIT: getNumber('REQUEST_HISTORY_LIMIT', 1000),
    };

    if (config.ROUTE_HANDLER_CONCURRENCY < 1) {
        throw new Error(
            `[CONFIG ERROR] ROUTE_HANDLER_CONCURRENCY (${config.ROUTE_HANDLER_CONCURRENCY}) must be >= 1`
        );
    }

    if (config.SOCKET_POLL_INTERVAL_MS < 1) {
        throw new Error(
            `[CONFIG ERROR] SOCKET_POLL_INTERVAL_MS (${config.SOCKET_POLL_INTERVAL_MS}) must be >= 1`
        );
    }

    return config;
}

/**
 * Singleton configuration instance
 * Loads configuration on first access
 */
let configInstance: EnvConfig | null = null;

/**
 * Get the configuration singleton
 * @throws Error if configuration is invalid
 */
export function getConfig(): EnvConfig {
    if (!configInstance) {
        configInstance = loadEnvConfig();
    }
    return configInstance;
}

/**
 * Reset configuration (for testing purposes)
 */
export function resetConfig(): void {
    configInstance = null;
}

export default getConfig;
