/**
 * Utils Module Index
 */

export {
    logger,
    logSection,
    logSuccess,
    logFailure,
    logWarning,
    createChildLogger
} from './logger.js';

export { sleep, withDeadline } from './throttle.js';

export { retry, calculateDelay } from './retry.js';
export type { RetryOptions } from './retry.js';

export { pollUntil, waitForQuiet, raceDeadline, DEFAULT_POLL_INTERVAL_MS } from './wait.js';
export type { Probe, PollOptions } from './wait.js';

export { compilePattern, tryCompilePattern, testPattern, matchesUrl, matchesMessage } from './pattern.js';

export { isSensitiveKey, redactString, redactObject, redactHeaders } from './redaction.js';
