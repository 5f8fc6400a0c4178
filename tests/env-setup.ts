/**
 * Jest Environment Setup
 * Sets environment variables before tests run
 */

process.env.LOG_LEVEL = 'error';
process.env.LOG_TO_FILE = 'false';
process.env.STABILITY_MAX_WAIT_MS = '5000';
process.env.STABILITY_RETRY_ATTEMPTS = '0';
process.env.STABILITY_RETRY_DELAY_MS = '10';
process.env.SOCKET_WAIT_TIMEOUT_MS = '2000';
process.env.SOCKET_POLL_INTERVAL_MS = '20';
