/**
 * Stability Detector Configuration
 *
 * Defaults come from the environment (see env.ts); callers adjust them with
 * functional options, and the assembled config is validated before use.
 */

import { z } from 'zod';
import { getConfig } from './env.js';

/**
 * Caller-supplied page predicate polled until it returns a truthy value
 */
export interface CustomCheck {
    name: string;
    /** JavaScript expression evaluated in the page; may return a promise */
    expression: string;
    timeoutMs: number;
}

export interface StabilityConfig {
    // Network idle
    checkNetworkIdle: boolean;
    /** Pending requests tolerated while considered idle */
    networkIdleThreshold: number;
    /** Quiet period the threshold must hold for (ms) */
    networkIdleTimeout: number;
    networkIdleWatchWindow: number;

    // DOM stability
    checkDOMStability: boolean;
    domStableThreshold: number;
    domStableTimeout: number;
    domWatchWindow: number;

    // Resource loading
    waitForImages: boolean;
    waitForFonts: boolean;
    waitForStylesheets: boolean;
    waitForScripts: boolean;
    resourceTimeout: number;

    // Script execution
    waitForAnimationFrame: boolean;
    waitForIdleCallback: boolean;
    jsExecutionTimeout: number;

    // Overall
    maxStabilityWait: number;
    retryAttempts: number;
    retryDelay: number;
    customChecks: CustomCheck[];
    verbose: boolean;
    /** Fallback poll interval for every check (ms) */
    pollInterval: number;
}

export type StabilityOption = (config: StabilityConfig) => void;

const CustomCheckSchema = z.object({
    name: z.string().min(1),
    expression: z.string().min(1),
    timeoutMs: z.number().int().positive(),
});

const StabilityConfigSchema = z.object({
    checkNetworkIdle: z.boolean(),
    networkIdleThreshold: z.number().int().nonnegative(),
    networkIdleTimeout: z.number().int().nonnegative(),
    networkIdleWatchWindow: z.number().int().positive(),
    checkDOMStability: z.boolean(),
    domStableThreshold: z.number().int().nonnegative(),
    domStableTimeout: z.number().int().nonnegative(),
    domWatchWindow: z.number().int().positive(),
    waitForImages: z.boolean(),
    waitForFonts: z.boolean(),
    waitForStylesheets: z.boolean(),
    waitForScripts: z.boolean(),
    resourceTimeout: z.number().int().positive(),
    waitForAnimationFrame: z.boolean(),
    waitForIdleCallback: z.boolean(),
    jsExecutionTimeout: z.number().int().positive(),
    maxStabilityWait: z.number().int().positive(),
    retryAttempts: z.number().int().nonnegative(),
    retryDelay: z.number().int().nonnegative(),
    customChecks: z.array(CustomCheckSchema).refine(
        checks => new Set(checks.map(c => c.name)).size === checks.length,
        { message: 'custom check names must be unique' }
    ),
    verbose: z.boolean(),
    pollInterval: z.number().int().positive(),
});

/**
 * Default configuration, seeded from the environment
 */
export function defaultStabilityConfig(): StabilityConfig {
    const env = getConfig();
    return {
        checkNetworkIdle: true,
        networkIdleThreshold: 0,
        networkIdleTimeout: 500,
        networkIdleWatchWindow: 5000,
        checkDOMStability: true,
        domStableThreshold: 0,
        domStableTimeout: 500,
        domWatchWindow: 3000,
        waitForImages: true,
        waitForFonts: true,
        waitForStylesheets: true,
        waitForScripts: true,
        resourceTimeout: 10000,
        waitForAnimationFrame: true,
        waitForIdleCallback: true,
        jsExecutionTimeout: 5000,
        maxStabilityWait: env.STABILITY_MAX_WAIT_MS,
        retryAttempts: env.STABILITY_RETRY_ATTEMPTS,
        retryDelay: env.STABILITY_RETRY_DELAY_MS,
        customChecks: [],
        verbose: env.STABILITY_VERBOSE,
        pollInterval: 100,
    };
}

/**
 * Validate an assembled configuration
 * @throws Error listing every invalid field
 */
export function validateStabilityConfig(config: StabilityConfig): StabilityConfig {
    const result = StabilityConfigSchema.safeParse(config);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
            .join('; ');
        throw new Error(`[CONFIG ERROR] Invalid stability configuration: ${issues}`);
    }
    return result.data;
}

/**
 * Apply options to `base` (the defaults when omitted) and validate the result.
 * The base is copied, never mutated.
 */
export function buildStabilityConfig(
    options: StabilityOption[] = [],
    base: StabilityConfig = defaultStabilityConfig()
): StabilityConfig {
    const config: StabilityConfig = { ...base, customChecks: [...base.customChecks] };
    for (const option of options) {
        option(config);
    }
    return validateStabilityConfig(config);
}

/**
 * Network-only configuration used for network-idle load states
 */
export function networkIdleOnlyConfig(threshold: number, maxWaitMs: number): StabilityConfig {
    return buildStabilityConfig([
        withNetworkIdleThreshold(threshold),
        withNetworkIdleWatchWindow(maxWaitMs),
        withDOMStabilityCheck(false),
        withResourceWaiting(false, false, false, false),
        withJSExecutionWaiting(false, false),
        withMaxStabilityWait(maxWaitMs),
        withRetry(0, 0),
    ]);
}

// ═══════════════════════════════════════════════════════════════════════════════
// FUNCTIONAL OPTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function withNetworkIdleCheck(enabled: boolean): StabilityOption {
    return config => { config.checkNetworkIdle = enabled; };
}

export function withNetworkIdleThreshold(threshold: number): StabilityOption {
    return config => { config.networkIdleThreshold = threshold; };
}

export function withNetworkIdleTimeout(timeoutMs: number): StabilityOption {
    return config => { config.networkIdleTimeout = timeoutMs; };
}

export function withNetworkIdleWatchWindow(windowMs: number): StabilityOption {
    return config => { config.networkIdleWatchWindow = windowMs; };
}

export function withDOMStabilityCheck(enabled: boolean): StabilityOption {
    return config => { config.checkDOMStability = enabled; };
}

export function withDOMStableThreshold(threshold: number): StabilityOption {
    return config => { config.domStableThreshold = threshold; };
}

export function withDOMStableTimeout(timeoutMs: number): StabilityOption {
    return config => { config.domStableTimeout = timeoutMs; };
}

export function withDOMWatchWindow(windowMs: number): StabilityOption {
    return config => { config.domWatchWindow = windowMs; };
}

export function withResourceWaiting(
    images: boolean,
    fonts: boolean,
    stylesheets: boolean,
    scripts: boolean
): StabilityOption {
    return config => {
        config.waitForImages = images;
        config.waitForFonts = fonts;
        config.waitForStylesheets = stylesheets;
        config.waitForScripts = scripts;
    };
}

export function withResourceTimeout(timeoutMs: number): StabilityOption {
    return config => { config.resourceTimeout = timeoutMs; };
}

export function withJSExecutionWaiting(animationFrame: boolean, idleCallback: boolean): StabilityOption {
    return config => {
        config.waitForAnimationFrame = animationFrame;
        config.waitForIdleCallback = idleCallback;
    };
}

export function withJSExecutionTimeout(timeoutMs: number): StabilityOption {
    return config => { config.jsExecutionTimeout = timeoutMs; };
}

export function withMaxStabilityWait(timeoutMs: number): StabilityOption {
    return config => { config.maxStabilityWait = timeoutMs; };
}

export function withRetry(attempts: number, delayMs: number): StabilityOption {
    return config => {
        config.retryAttempts = attempts;
        config.retryDelay = delayMs;
    };
}

export function withCustomCheck(name: string, expression: string, timeoutMs: number): StabilityOption {
    return config => { config.customChecks.push({ name, expression, timeoutMs }); };
}

export function withVerboseLogging(verbose: boolean): StabilityOption {
    return config => { config.verbose = verbose; };
}

export function withPollInterval(intervalMs: number): StabilityOption {
    return config => { config.pollInterval = intervalMs; };
}
