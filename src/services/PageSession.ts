/**
 * PageSession
 *
 * Facade over one attached page. Owns the protocol client, the event
 * dispatcher and the three observers that share its event stream:
 * StabilityDetector, NetworkInterceptor and SocketMonitor (with its
 * SocketWaiter).
 *
 * Usage:
 *   const session = await PageSession.fromPlaywrightPage(page);
 *   await session.initialize();
 *   await session.route(/\.png$/, request => request.abort('failed'));
 *   await page.goto(url);
 *   await session.waitForStability();
 *   await session.close();
 */

import type { Page } from 'playwright';
import { ChangeNotifier } from '../core/ChangeNotifier.js';
import { EventDispatcher, type SubscriberStats } from '../core/EventDispatcher.js';
import { SessionNotInitializedError } from '../core/errors.js';
import {
    buildStabilityConfig,
    networkIdleOnlyConfig,
    type StabilityOption,
} from '../config/stability.config.js';
import type { SocketWaitOption } from '../config/socket-wait.config.js';
import type { LoadState, WaitOptions } from '../types/index.js';
import type { ProtocolClient } from '../types/protocol.js';
import { createChildLogger } from '../utils/logger.js';
import { pollUntil } from '../utils/wait.js';
import {
    NetworkInterceptor,
    type ObservedRequest,
    type ObservedResponse,
    type RouteError,
    type RouteHandler,
} from './NetworkInterceptor.js';
import { READY_STATE_SCRIPT } from './page-scripts.js';
import { PlaywrightProtocolClient } from './PlaywrightProtocolClient.js';
import {
    SocketMonitor,
    type SocketActivityListener,
    type SocketConnection,
    type SocketFrame,
    type SocketStats,
} from './SocketMonitor.js';
import { SocketWaiter, type SocketCondition, type SocketEventWaiter } from './SocketWaiter.js';
import { StabilityDetector, type StabilityMetrics } from './StabilityDetector.js';

const log = createChildLogger({ module: 'PageSession' });

export const DEFAULT_LOAD_STATE_TIMEOUT_MS = 30000;

export interface PageSessionOptions {
    /** Applied over the default stability configuration */
    stability?: StabilityOption[];
    /** Route handlers allowed to run at once */
    handlerConcurrency?: number;
    /** Observed requests and responses kept for waitForRequest/waitForResponse */
    historyLimit?: number;
}

export class PageSession {
    private readonly notifier = new ChangeNotifier();
    private readonly dispatcher: EventDispatcher;
    private readonly detector: StabilityDetector;
    private readonly interceptor: NetworkInterceptor;
    private readonly monitor: SocketMonitor;
    private readonly waiter: SocketWaiter;

    private isInitialized = false;
    private isClosed = false;

    constructor(private readonly client: ProtocolClient, options: PageSessionOptions = {}) {
        this.dispatcher = new EventDispatcher(client);
        this.detector = new StabilityDetector(client, {
            config: buildStabilityConfig(options.stability ?? []),
            notifier: this.notifier,
        });
        this.interceptor = new NetworkInterceptor(client, {
            notifier: this.notifier,
            handlerConcurrency: options.handlerConcurrency,
            historyLimit: options.historyLimit,
        });
        this.monitor = new SocketMonitor(client, { notifier: this.notifier });
        this.waiter = new SocketWaiter(this.monitor, this.notifier);
    }

    /**
     * Create a session over a Chromium page's CDP session.
     * Call initialize() before use.
     */
    static async fromPlaywrightPage(page: Page, options: PageSessionOptions = {}): Promise<PageSession> {
        const client = await PlaywrightProtocolClient.fromPage(page);
        return new PageSession(client, options);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // LIFECYCLE
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Register the observers, enable their protocol domains and start
     * consuming events.
     */
    async initialize(): Promise<void> {
        if (this.isInitialized) return;

        this.dispatcher.register(this.detector);
        this.dispatcher.register(this.interceptor);
        this.dispatcher.register(this.monitor);
        await this.dispatcher.attach();

        this.isInitialized = true;
        log.info(`Page session initialized (${this.dispatcher.count} observers)`);
    }

    /**
     * Drain pending deliveries, stop the observers, disable interception
     * and detach from the page.
     */
    async close(): Promise<void> {
        if (!this.isInitialized || this.isClosed) return;
        this.isClosed = true;

        await this.dispatcher.close();
        try {
            await this.interceptor.disable();
        } finally {
            await this.client.detach();
            log.info('Page session closed');
        }
    }

    get initialized(): boolean {
        return this.isInitialized && !this.isClosed;
    }

    getDispatcherStats(): SubscriberStats[] {
        return this.dispatcher.getStats();
    }

    private ensureInitialized(): void {
        if (!this.isInitialized || this.isClosed) {
            throw new SessionNotInitializedError();
        }
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // STABILITY
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Wait for the page to settle. `options` apply to this call only, over
     * the session's stability configuration.
     */
    async waitForStability(options: StabilityOption[] = [], wait: Pick<WaitOptions, 'signal'> = {}): Promise<void> {
        this.ensureInitialized();
        const config = options.length > 0
            ? buildStabilityConfig(options, this.detector.getConfig())
            : undefined;
        await this.detector.waitForStability({ config, signal: wait.signal });
    }

    /**
     * Replace the session's stability configuration with defaults plus `options`.
     */
    configureStability(...options: StabilityOption[]): void {
        this.ensureInitialized();
        this.detector.configure(...options);
    }

    getStabilityMetrics(): StabilityMetrics {
        this.ensureInitialized();
        return this.detector.getMetrics();
    }

    /**
     * Wait for a page lifecycle state. The network idle states allow zero
     * (`networkidle`, `networkidle0`) or two (`networkidle2`) requests in flight.
     */
    async waitForLoadState(state: LoadState, timeoutMs = DEFAULT_LOAD_STATE_TIMEOUT_MS): Promise<void> {
        this.ensureInitialized();

        switch (state) {
            case 'load':
            case 'domcontentloaded': {
                const accepted = state === 'load' ? ['complete'] : ['interactive', 'complete'];
                await pollUntil(
                    async () => {
                        const readyState = await this.client.evaluate(READY_STATE_SCRIPT);
                        return typeof readyState === 'string' && accepted.includes(readyState) ? true : undefined;
                    },
                    { description: `load state "${state}"`, timeoutMs }
                );
                return;
            }
            case 'networkidle':
            case 'networkidle0':
                await this.detector.waitForStability({ config: networkIdleOnlyConfig(0, timeoutMs) });
                return;
            case 'networkidle2':
                await this.detector.waitForStability({ config: networkIdleOnlyConfig(2, timeoutMs) });
                return;
        }
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // NETWORK
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Intercept requests whose URL matches `pattern`. Routes are tried in
     * registration order and only the first match runs.
     */
    async route(pattern: string | RegExp, handler: RouteHandler): Promise<void> {
        this.ensureInitialized();
        await this.interceptor.addRoute(pattern, handler);
    }

    waitForRequest(pattern: string | RegExp, options: WaitOptions = {}): Promise<ObservedRequest> {
        this.ensureInitialized();
        return this.interceptor.waitForRequest(pattern, options);
    }

    waitForResponse(pattern: string | RegExp, options: WaitOptions = {}): Promise<ObservedResponse> {
        this.ensureInitialized();
        return this.interceptor.waitForResponse(pattern, options);
    }

    getRouteErrors(): RouteError[] {
        this.ensureInitialized();
        return this.interceptor.getRouteErrors();
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // WEBSOCKETS
    // ═══════════════════════════════════════════════════════════════════════════

    /** Snapshot of live socket connections keyed by id */
    getSocketConnections(): Map<string, SocketConnection> {
        this.ensureInitialized();
        return this.monitor.getConnections();
    }

    getSocketConnection(id: string): SocketConnection | undefined {
        this.ensureInitialized();
        return this.monitor.getConnection(id);
    }

    getSocketStats(): SocketStats {
        this.ensureInitialized();
        return this.monitor.getStats();
    }

    waitForSocket(condition: SocketCondition, ...options: SocketWaitOption[]): Promise<SocketConnection> {
        this.ensureInitialized();
        return this.waiter.waitFor(condition, ...options);
    }

    waitForSocketMessages(count: number, ...options: SocketWaitOption[]): Promise<SocketFrame[]> {
        this.ensureInitialized();
        return this.waiter.waitForMessages(count, ...options);
    }

    waitForSocketData(pattern: string, ...options: SocketWaitOption[]): Promise<SocketFrame> {
        this.ensureInitialized();
        return this.waiter.waitForData(pattern, ...options);
    }

    waitForSocketIdle(idleMs: number, ...options: SocketWaitOption[]): Promise<void> {
        this.ensureInitialized();
        return this.waiter.waitForIdle(idleMs, ...options);
    }

    createSocketEventWaiter(...options: SocketWaitOption[]): SocketEventWaiter {
        this.ensureInitialized();
        return this.waiter.createEventWaiter(...options);
    }

    /**
     * @returns function that removes the listener
     */
    onSocketActivity(listener: SocketActivityListener): () => void {
        this.ensureInitialized();
        return this.monitor.subscribe(listener);
    }
}

export default PageSession;
