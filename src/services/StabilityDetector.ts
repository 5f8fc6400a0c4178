/**
 * StabilityDetector Service
 *
 * Decides when a navigated page has settled by running independent checks
 * concurrently against the same deadline:
 *
 * - Network idle: pending requests at or below a threshold for a quiet period
 * - DOM stability: injected MutationObserver reports no activity for a quiet period
 * - Resource loading: images, stylesheets, fonts and scripts each report loaded
 * - Script execution: one animation frame and one idle callback fire
 * - Custom checks: caller expressions evaluate truthy
 *
 * An attempt fails when any check fails; failures of every check are collected
 * before the attempt reports. Attempts are retried with a fixed delay inside
 * the overall maxStabilityWait deadline.
 *
 * Implements IEventSubscriber for dispatcher-based event delivery.
 */

import pLimit from 'p-limit';
import type { IEventSubscriber } from '../core/EventDispatcher.js';
import { ChangeNotifier } from '../core/ChangeNotifier.js';
import {
    ObserverError,
    StabilityCheckError,
    StabilityError,
    WaitAbortedError,
    WaitTimeoutError,
    toError,
} from '../core/errors.js';
import {
    buildStabilityConfig,
    defaultStabilityConfig,
    type CustomCheck,
    type StabilityConfig,
    type StabilityOption,
} from '../config/stability.config.js';
import { assertNever, type ProtocolClient, type ProtocolEvent } from '../types/protocol.js';
import type { WaitOptions } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { retry } from '../utils/retry.js';
import { withDeadline } from '../utils/throttle.js';
import { pollUntil, raceDeadline, waitForQuiet } from '../utils/wait.js';
import {
    ANIMATION_FRAME_SCRIPT,
    DOM_MUTATION_SIGNAL,
    IDLE_CALLBACK_SCRIPT,
    MUTATION_OBSERVER_SCRIPT,
    RESOURCE_CLASSES,
    RESOURCE_SCRIPTS,
    type ResourceClass,
} from './page-scripts.js';

const log = createChildLogger({ module: 'StabilityDetector' });

export type StabilityState =
    | { phase: 'notStarted' }
    | { phase: 'running'; attempt: number }
    | { phase: 'stable'; attempts: number }
    | { phase: 'failed'; attempts: number; error: ObserverError };

export interface StabilityMetrics {
    /** Requests seen since the detector started */
    totalRequests: number;
    /** In-flight request ids with their start time (epoch ms) */
    pendingRequests: Map<string, number>;
    /** Mutation batches reported during the current attempt */
    domModifications: number;
    lastDOMModification: number | null;
    resourcesLoaded: Record<ResourceClass, boolean>;
    customChecks: Record<string, boolean>;
}

export interface StabilityWaitOptions extends Pick<WaitOptions, 'signal'> {
    /** Configuration for this wait only; defaults to the detector's */
    config?: StabilityConfig;
}

interface StabilityCheck {
    name: string;
    run: (signal: AbortSignal) => Promise<void>;
}

function emptyResources(): Record<ResourceClass, boolean> {
    return { images: false, stylesheets: false, fonts: false, scripts: false };
}

export class StabilityDetector implements IEventSubscriber {
    readonly name = 'StabilityDetector';
    readonly kinds = [
        'requestWillBeSent',
        'responseReceived',
        'loadingFinished',
        'loadingFailed',
        'consoleApiCalled',
        'executionContextsCleared',
    ] as const;

    private config: StabilityConfig;
    private started = false;
    /** Events are tracked from the moment start() begins enabling domains */
    private tracking = false;
    private startPromise: Promise<void> | null = null;
    private state: StabilityState = { phase: 'notStarted' };
    private readonly waitQueue = pLimit(1);
    private readonly notifier: ChangeNotifier;

    private pendingRequests: Map<string, number> = new Map();
    private totalRequests = 0;
    private domModifications = 0;
    private lastDOMModification: number | null = null;
    private resourcesLoaded = emptyResources();
    private customCheckResults: Map<string, boolean> = new Map();

    constructor(
        private readonly client: ProtocolClient,
        options: { config?: StabilityConfig; notifier?: ChangeNotifier } = {}
    ) {
        this.config = options.config ?? defaultStabilityConfig();
        this.notifier = options.notifier ?? new ChangeNotifier();
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // IEventSubscriber Lifecycle Hooks
    // ═══════════════════════════════════════════════════════════════════════════

    async onAttach(): Promise<void> {
        await this.start();
    }

    onEvent(event: ProtocolEvent): void {
        if (!this.tracking) return;

        switch (event.kind) {
            case 'requestWillBeSent':
                this.pendingRequests.set(event.requestId, Date.now());
                this.totalRequests++;
                this.notifier.notify('network');
                return;
            case 'responseReceived':
            case 'loadingFinished':
            case 'loadingFailed':
                if (this.pendingRequests.delete(event.requestId)) {
                    this.notifier.notify('network');
                }
                return;
            case 'consoleApiCalled':
                if (event.args[0] === DOM_MUTATION_SIGNAL) {
                    this.domModifications++;
                    this.lastDOMModification = Date.now();
                    this.notifier.notify('dom');
                }
                return;
            case 'executionContextsCleared':
                // The next DOM check re-injects the observer into the new document
                log.debug('Execution contexts cleared');
                return;
            case 'requestPaused':
            case 'socketCreated':
            case 'socketHandshakeRequest':
            case 'socketHandshakeResponse':
            case 'socketFrameSent':
            case 'socketFrameReceived':
            case 'socketFrameError':
            case 'socketClosed':
                return;
            default:
                assertNever(event);
        }
    }

    onClose(): void {
        this.stop();
    }

    clear(): void {
        this.pendingRequests.clear();
        this.totalRequests = 0;
        this.resetAttemptMetrics();
        this.lastDOMModification = null;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // Public API
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Enable the protocol domains and inject the mutation observer.
     * Safe to call repeatedly; protocol failures propagate.
     */
    async start(): Promise<void> {
        if (this.started) return;
        if (!this.startPromise) {
            this.startPromise = this.enableDomains().finally(() => {
                this.startPromise = null;
            });
        }
        await this.startPromise;
    }

    /**
     * Stop consuming events. In-flight tracking is discarded.
     */
    stop(): void {
        this.started = false;
        this.tracking = false;
        this.pendingRequests.clear();
    }

    get isStarted(): boolean {
        return this.started;
    }

    getState(): StabilityState {
        return { ...this.state };
    }

    getConfig(): StabilityConfig {
        return { ...this.config, customChecks: this.config.customChecks.map(c => ({ ...c })) };
    }

    /**
     * Replace the configuration with the defaults plus `options`.
     */
    configure(...options: StabilityOption[]): void {
        this.config = buildStabilityConfig(options);
    }

    setConfig(config: StabilityConfig): void {
        this.config = buildStabilityConfig([], config);
    }

    getMetrics(): StabilityMetrics {
        return {
            totalRequests: this.totalRequests,
            pendingRequests: new Map(this.pendingRequests),
            domModifications: this.domModifications,
            lastDOMModification: this.lastDOMModification,
            resourcesLoaded: { ...this.resourcesLoaded },
            customChecks: Object.fromEntries(this.customCheckResults),
        };
    }

    /**
     * Wait until every enabled check passes in the same attempt.
     * Concurrent calls run one after another.
     *
     * @throws StabilityError when retries are exhausted or maxStabilityWait elapses
     * @throws WaitAbortedError when the caller's signal fires
     * @throws ProtocolCommandError when the protocol domains cannot be enabled
     */
    waitForStability(options: StabilityWaitOptions = {}): Promise<void> {
        return this.waitQueue(() =>
            this.runStabilityWait(options.config ?? this.config, options.signal)
        );
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // Attempt loop
    // ═══════════════════════════════════════════════════════════════════════════

    private async runStabilityWait(config: StabilityConfig, callerSignal?: AbortSignal): Promise<void> {
        await this.start();

        const { signal, deadline, dispose } = withDeadline(config.maxStabilityWait, callerSignal);
        let attempts = 0;
        let lastFailure: StabilityError | undefined;

        try {
            await retry(
                async attempt => {
                    attempts = attempt;
                    this.state = { phase: 'running', attempt };
                    try {
                        await this.runAttempt(attempt, config, signal);
                    } catch (error) {
                        if (error instanceof StabilityError) lastFailure = error;
                        throw error;
                    }
                },
                {
                    retries: config.retryAttempts,
                    baseDelay: config.retryDelay,
                    backoff: 'fixed',
                    signal,
                    logger: log,
                    shouldRetry: error => error instanceof StabilityError,
                    onRetry: (_error, attempt) => this.trace(`Stability attempt ${attempt} failed, retrying in ${config.retryDelay}ms`),
                }
            );
            this.state = { phase: 'stable', attempts };
            this.trace(`Page stable after ${attempts} attempt(s)`);
        } catch (error) {
            const failure = this.toFailure(error, {
                callerAborted: callerSignal?.aborted === true,
                deadlineExpired: deadline.aborted,
                maxWait: config.maxStabilityWait,
                attempts,
                lastFailure,
            });
            this.state = { phase: 'failed', attempts, error: failure };
            log.warn(failure.message);
            throw failure;
        } finally {
            dispose();
        }
    }

    private toFailure(
        error: unknown,
        context: {
            callerAborted: boolean;
            deadlineExpired: boolean;
            maxWait: number;
            attempts: number;
            lastFailure: StabilityError | undefined;
        }
    ): ObserverError {
        if (context.callerAborted) {
            return new WaitAbortedError('page stability');
        }
        const failures = context.lastFailure?.failures ?? [];
        if (context.deadlineExpired) {
            return new StabilityError(
                `Page did not stabilize within ${context.maxWait}ms`,
                failures,
                context.attempts
            );
        }
        if (error instanceof StabilityError) {
            return new StabilityError(
                `Page did not stabilize after ${context.attempts} attempt(s)`,
                error.failures,
                context.attempts
            );
        }
        if (error instanceof ObserverError) {
            return error;
        }
        return new StabilityError(`Stability wait failed: ${toError(error).message}`, failures, context.attempts);
    }

    private async runAttempt(attempt: number, config: StabilityConfig, signal: AbortSignal): Promise<void> {
        this.resetAttemptMetrics();

        const checks = this.buildChecks(config);
        this.trace(`Stability attempt ${attempt}: running ${checks.length} checks`);

        const results = await Promise.allSettled(checks.map(check => this.runCheck(check, config, signal)));

        const failures: StabilityCheckError[] = [];
        results.forEach((result, index) => {
            if (result.status === 'rejected') {
                failures.push(this.toCheckError(checks[index].name, result.reason));
            }
        });

        if (failures.length > 0) {
            throw new StabilityError(`Stability attempt ${attempt} failed`, failures, attempt);
        }
    }

    private buildChecks(config: StabilityConfig): StabilityCheck[] {
        const checks: StabilityCheck[] = [];

        if (config.checkNetworkIdle) {
            checks.push({ name: 'network-idle', run: signal => this.waitForNetworkIdle(config, signal) });
        }
        if (config.checkDOMStability) {
            checks.push({ name: 'dom-stability', run: signal => this.waitForDOMStability(config, signal) });
        }

        const enabledResources: Record<ResourceClass, boolean> = {
            images: config.waitForImages,
            stylesheets: config.waitForStylesheets,
            fonts: config.waitForFonts,
            scripts: config.waitForScripts,
        };
        for (const resource of RESOURCE_CLASSES) {
            if (enabledResources[resource]) {
                checks.push({ name: `resources:${resource}`, run: signal => this.waitForResource(resource, config, signal) });
            }
        }

        if (config.waitForAnimationFrame || config.waitForIdleCallback) {
            checks.push({ name: 'js-execution', run: signal => this.waitForJSExecution(config, signal) });
        }

        for (const custom of config.customChecks) {
            checks.push({ name: `custom:${custom.name}`, run: signal => this.runCustomCheck(custom, config, signal) });
        }

        return checks;
    }

    private async runCheck(check: StabilityCheck, config: StabilityConfig, signal: AbortSignal): Promise<void> {
        const started = Date.now();
        this.trace(`Check ${check.name}: started`, config);
        try {
            await check.run(signal);
            this.trace(`Check ${check.name}: passed in ${Date.now() - started}ms`, config);
        } catch (error) {
            this.trace(`Check ${check.name}: failed after ${Date.now() - started}ms (${toError(error).message})`, config);
            throw error;
        }
    }

    private toCheckError(name: string, reason: unknown): StabilityCheckError {
        if (reason instanceof StabilityCheckError) return reason;
        if (reason instanceof WaitTimeoutError) {
            return new StabilityCheckError(name, reason.message, true);
        }
        if (reason instanceof WaitAbortedError) {
            return new StabilityCheckError(name, 'interrupted before completion', false);
        }
        return new StabilityCheckError(name, toError(reason).message, false);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // Checks
    // ═══════════════════════════════════════════════════════════════════════════

    private waitForNetworkIdle(config: StabilityConfig, signal: AbortSignal): Promise<void> {
        return waitForQuiet(
            () => this.pendingRequests.size <= config.networkIdleThreshold,
            config.networkIdleTimeout,
            {
                description: 'network idle',
                timeoutMs: config.networkIdleWatchWindow,
                intervalMs: config.pollInterval,
                signal,
                wakeOn: { notifier: this.notifier, topics: ['network'] },
                onQuietStart: () => this.trace(
                    `Network idle detected, waiting ${config.networkIdleTimeout}ms for stability`,
                    config
                ),
            }
        );
    }

    private async waitForDOMStability(config: StabilityConfig, signal: AbortSignal): Promise<void> {
        // A navigation may have dropped the observer; the page-side guard keeps this idempotent
        await this.injectMutationObserver();
        this.domModifications = 0;

        await waitForQuiet(
            () => {
                const sinceLast = this.lastDOMModification === null
                    ? Number.POSITIVE_INFINITY
                    : Date.now() - this.lastDOMModification;
                return this.domModifications <= config.domStableThreshold || sinceLast >= config.domStableTimeout;
            },
            config.domStableTimeout,
            {
                description: 'DOM stability',
                timeoutMs: config.domWatchWindow,
                intervalMs: config.pollInterval,
                signal,
                wakeOn: { notifier: this.notifier, topics: ['dom'] },
                onBusy: () => {
                    this.domModifications = 0;
                },
            }
        );
    }

    private async waitForResource(resource: ResourceClass, config: StabilityConfig, signal: AbortSignal): Promise<void> {
        await pollUntil<true>(
            async () => {
                const loaded = await this.client.evaluate(RESOURCE_SCRIPTS[resource], {
                    awaitPromise: true,
                    timeoutMs: config.resourceTimeout,
                });
                return loaded === true ? true : undefined;
            },
            {
                description: `${resource} to load`,
                timeoutMs: config.resourceTimeout,
                intervalMs: config.pollInterval,
                signal,
            }
        );
        this.resourcesLoaded[resource] = true;
    }

    private async waitForJSExecution(config: StabilityConfig, signal: AbortSignal): Promise<void> {
        const work = async (): Promise<void> => {
            if (config.waitForAnimationFrame) {
                await this.client.evaluate(ANIMATION_FRAME_SCRIPT, {
                    awaitPromise: true,
                    timeoutMs: config.jsExecutionTimeout,
                });
            }
            if (config.waitForIdleCallback) {
                await this.client.evaluate(IDLE_CALLBACK_SCRIPT, {
                    awaitPromise: true,
                    timeoutMs: config.jsExecutionTimeout,
                });
            }
        };

        await raceDeadline(work(), {
            description: 'script execution',
            timeoutMs: config.jsExecutionTimeout,
            signal,
        });
    }

    private async runCustomCheck(check: CustomCheck, config: StabilityConfig, signal: AbortSignal): Promise<void> {
        this.customCheckResults.set(check.name, false);
        await pollUntil<true>(
            async () => {
                const value = await this.client.evaluate(check.expression, {
                    awaitPromise: true,
                    timeoutMs: check.timeoutMs,
                });
                return value ? true : undefined;
            },
            {
                description: `custom check "${check.name}"`,
                timeoutMs: check.timeoutMs,
                intervalMs: config.pollInterval,
                signal,
            }
        );
        this.customCheckResults.set(check.name, true);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // Internals
    // ═══════════════════════════════════════════════════════════════════════════

    private async enableDomains(): Promise<void> {
        this.tracking = true;
        try {
            await this.client.enable('Network');
            await this.client.enable('DOM');
            await this.client.enable('Page');
            await this.client.enable('Runtime');
        } catch (error) {
            this.tracking = false;
            throw error;
        }
        this.started = true;
        await this.injectMutationObserver();
        log.debug('Stability detector started');
    }

    private async injectMutationObserver(): Promise<void> {
        const installed = await this.client.evaluate(MUTATION_OBSERVER_SCRIPT);
        if (installed === true) {
            log.debug('DOM mutation observer installed');
        }
    }

    private resetAttemptMetrics(): void {
        this.domModifications = 0;
        this.resourcesLoaded = emptyResources();
        this.customCheckResults.clear();
    }

    private trace(message: string, config: StabilityConfig = this.config): void {
        if (config.verbose) {
            log.info(message);
        } else {
            log.debug(message);
        }
    }
}

export default StabilityDetector;
