/**
 * Winston Logger Configuration
 * Logs to the console and, unless LOG_TO_FILE=false, to LOG_DIR/app.log
 */

import winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { getConfig } from '../config/env.js';
import { redactObject, redactString } from './redaction.js';

const config = getConfig();

const { combine, timestamp, printf, colorize, errors } = winston.format;
const redactionEnabled = process.env.REDACTION_ENABLED?.toLowerCase() !== 'false';

const redactFormat = winston.format(info => {
    if (!redactionEnabled) return info;
    for (const [key, val] of Object.entries(info)) {
        if (key === 'level' || key === 'timestamp') continue;
        info[key] = typeof val === 'string' ? redactString(val) : redactObject(val);
    }
    return info;
});

const consoleFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    const stackStr = stack ? `\n${String(stack)}` : '';
    return `${String(timestamp)} [${level}] ${String(message)}${metaStr}${stackStr}`;
});

const fileFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    const stackStr = stack ? `\n${String(stack)}` : '';
    return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${metaStr}${stackStr}`;
});

type LogTransport = winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance;

function buildTransports(): LogTransport[] {
    const transports: LogTransport[] = [
        new winston.transports.Console({
            format: combine(
                colorize({ all: true }),
                timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                consoleFormat
            ),
        }),
    ];

    if (!config.LOG_TO_FILE) {
        return transports;
    }

    const logsDir = path.resolve(process.cwd(), config.LOG_DIR);
    if (!fs.existsSync(logsDir)) {
        fs.mkdirSync(logsDir, { recursive: true });
    }

    transports.push(
        new winston.transports.File({
            filename: path.join(logsDir, 'app.log'),
            format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), fileFormat),
            maxsize: 5242880, // 5MB
            maxFiles: 5,
        }),
        new winston.transports.File({
            filename: path.join(logsDir, 'error.log'),
            level: 'error',
            format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), fileFormat),
            maxsize: 5242880, // 5MB
            maxFiles: 5,
        })
    );

    return transports;
}

/**
 * Winston logger instance
 * - Console: Colorized output with timestamps
 * - File: Plain text output (optional)
 */
const logger = winston.createLogger({
    level: config.LOG_LEVEL,
    format: combine(
        errors({ stack: true }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        redactFormat()
    ),
    transports: buildTransports(),
});

/**
 * Log a section header for visual separation
 */
export function logSection(title: string): void {
    const separator = '═'.repeat(60);
    logger.info(separator);
    logger.info(`  ${title.toUpperCase()}`);
    logger.info(separator);
}

/**
 * Log a success message with checkmark
 */
export function logSuccess(message: string): void {
    logger.info(`✓ ${message}`);
}

/**
 * Log a failure message with X
 */
export function logFailure(message: string): void {
    logger.error(`✗ ${message}`);
}

/**
 * Log a warning message
 */
export function logWarning(message: string): void {
    logger.warn(`⚠ ${message}`);
}

/**
 * Create a child logger with additional metadata
 */
export function createChildLogger(meta: Record<string, unknown>): winston.Logger {
    return logger.child(meta);
}

export { logger };
export default logger;
