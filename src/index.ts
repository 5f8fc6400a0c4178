/**
 * devtools-observer
 * Main Entry Point
 *
 * Observes a Chromium page over the DevTools Protocol:
 * 1. Stability detection (network, DOM, resources, scripts, custom checks)
 * 2. Request interception through URL routes
 * 3. WebSocket monitoring with declarative wait conditions
 */

export * from './types/index.js';
export * from './core/index.js';
export * from './services/index.js';

export * from './config/stability.config.js';
export * from './config/socket-wait.config.js';
export { getConfig, loadEnvConfig, resetConfig } from './config/env.js';
export type { EnvConfig } from './config/env.js';

export { logger, createChildLogger } from './utils/logger.js';
export { redactHeaders, redactObject } from './utils/redaction.js';
