/**
 * NetworkInterceptor Service
 *
 * Pauses requests, matches them against an ordered route list and drives the
 * first matching handler's decision back through the protocol client.
 *
 * Handler policy:
 * - Only the first matching route runs, once per request
 * - A handler that returns without deciding leaves the request to continue unmodified
 * - A handler that throws while the request is undecided aborts it with `failed`;
 *   the error is logged and kept in getRouteErrors()
 * - Unmatched requests continue unmodified
 *
 * Also keeps bounded request and response tables for waitForRequest and
 * waitForResponse.
 *
 * Implements IEventSubscriber for dispatcher-based event delivery.
 */

import pLimit from 'p-limit';
import type { IEventSubscriber } from '../core/EventDispatcher.js';
import { ChangeNotifier } from '../core/ChangeNotifier.js';
import { RequestNotInterceptedError, toError } from '../core/errors.js';
import { getConfig } from '../config/env.js';
import {
    assertNever,
    type HeaderMap,
    type ProtocolClient,
    type ProtocolEvent,
    type RequestPausedEvent,
} from '../types/protocol.js';
import type { WaitOptions } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { compilePattern, testPattern } from '../utils/pattern.js';
import { redactHeaders } from '../utils/redaction.js';
import { pollUntil } from '../utils/wait.js';
import {
    InterceptedRequest,
    toNetworkErrorReason,
    type AbortReason,
    type ContinueOverrides,
    type FulfillResponse,
    type RequestResolver,
    type Resolution,
} from './InterceptedRequest.js';

const log = createChildLogger({ module: 'NetworkInterceptor' });

export const DEFAULT_REQUEST_WAIT_TIMEOUT_MS = 30000;

export type RouteHandler = (request: InterceptedRequest) => void | Promise<void>;

interface Route {
    pattern: RegExp;
    handler: RouteHandler;
}

export interface RouteError {
    pattern: string;
    requestId: string;
    url: string;
    error: Error;
    timestamp: number;
}

export interface ObservedRequest {
    requestId: string;
    url: string;
    method: string;
    headers: HeaderMap;
    resourceType?: string;
    postData?: string;
    timestamp: number;
}

export interface ObservedResponse {
    requestId: string;
    url: string;
    status: number;
    statusText: string;
    headers: HeaderMap;
    mimeType: string;
    timestamp: number;
}

export interface NetworkInterceptorOptions {
    notifier?: ChangeNotifier;
    handlerConcurrency?: number;
    historyLimit?: number;
}

export class NetworkInterceptor implements IEventSubscriber, RequestResolver {
    readonly name = 'NetworkInterceptor';
    readonly kinds = ['requestWillBeSent', 'requestPaused', 'responseReceived'] as const;

    private routes: Route[] = [];
    private pending: Map<string, InterceptedRequest> = new Map();
    private requests: ObservedRequest[] = [];
    private responses: ObservedResponse[] = [];
    private routeErrors: RouteError[] = [];
    private interceptionEnabled = false;
    private enablePromise: Promise<void> | null = null;
    private inflight: Set<Promise<void>> = new Set();

    private readonly notifier: ChangeNotifier;
    private readonly handlerLimiter: ReturnType<typeof pLimit>;
    private readonly historyLimit: number;

    constructor(private readonly client: ProtocolClient, options: NetworkInterceptorOptions = {}) {
        const env = getConfig();
        this.notifier = options.notifier ?? new ChangeNotifier();
        this.handlerLimiter = pLimit(options.handlerConcurrency ?? env.ROUTE_HANDLER_CONCURRENCY);
        this.historyLimit = options.historyLimit ?? env.REQUEST_HISTORY_LIMIT;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // IEventSubscriber Lifecycle Hooks
    // ═══════════════════════════════════════════════════════════════════════════

    async onAttach(): Promise<void> {
        await this.client.enable('Network');
    }

    async onEvent(event: ProtocolEvent): Promise<void> {
        switch (event.kind) {
            case 'requestWillBeSent':
                this.recordRequest({
                    requestId: event.requestId,
                    url: event.url,
                    method: event.method,
                    headers: { ...event.headers },
                    resourceType: event.resourceType,
                    timestamp: Date.now(),
                });
                return;
            case 'requestPaused':
                await this.handleRequestPaused(event);
                return;
            case 'responseReceived':
                this.recordResponse({
                    requestId: event.requestId,
                    url: event.url,
                    status: event.status,
                    statusText: event.statusText,
                    headers: { ...event.headers },
                    mimeType: event.mimeType,
                    timestamp: Date.now(),
                });
                return;
            case 'loadingFinished':
            case 'loadingFailed':
            case 'consoleApiCalled':
            case 'executionContextsCleared':
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

    async onClose(): Promise<void> {
        await this.drain();
        log.debug(`NetworkInterceptor: ${this.routeErrors.length} route errors recorded`);
    }

    clear(): void {
        this.requests = [];
        this.responses = [];
        this.routeErrors = [];
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // Routes
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Append a route. The first route turns on request interception.
     * @throws InvalidPatternError if `pattern` is not a valid regular expression
     */
    async addRoute(pattern: string | RegExp, handler: RouteHandler): Promise<void> {
        const compiled = compilePattern(pattern);
        this.routes.push({ pattern: compiled, handler });
        log.debug(`Route added: ${compiled.source}`);
        await this.enable();
    }

    get routeCount(): number {
        return this.routes.length;
    }

    /**
     * Turn interception on when at least one route exists.
     */
    async enable(): Promise<void> {
        if (this.interceptionEnabled || this.routes.length === 0) return;
        if (!this.enablePromise) {
            this.enablePromise = this.enableInterception().finally(() => {
                this.enablePromise = null;
            });
        }
        await this.enablePromise;
    }

    /**
     * Stop pausing requests. Routes are kept and apply again after enable().
     */
    async disable(): Promise<void> {
        if (!this.interceptionEnabled) return;
        this.interceptionEnabled = false;
        await this.client.disableInterception();
        log.debug('Request interception disabled');
    }

    get isInterceptionEnabled(): boolean {
        return this.interceptionEnabled;
    }

    getRouteErrors(): RouteError[] {
        return this.routeErrors.map(entry => ({ ...entry }));
    }

    /** Paused requests still awaiting a decision */
    getPendingRequestIds(): string[] {
        return Array.from(this.pending.keys());
    }

    /**
     * Resolve once every running route handler has finished.
     */
    async drain(): Promise<void> {
        while (this.inflight.size > 0) {
            await Promise.all(Array.from(this.inflight));
        }
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // RequestResolver
    // ═══════════════════════════════════════════════════════════════════════════

    async continueRequest(request: InterceptedRequest, overrides: ContinueOverrides = {}): Promise<void> {
        await this.settle(request, 'continued', () => this.client.continueRequest({
            requestId: request.id,
            url: overrides.url,
            method: overrides.method,
            headers: overrides.headers,
            postData: overrides.postData,
        }));
    }

    async abortRequest(request: InterceptedRequest, reason: AbortReason | string = 'aborted'): Promise<void> {
        await this.settle(request, 'aborted', () => this.client.failRequest(request.id, toNetworkErrorReason(reason)));
    }

    async fulfillRequest(request: InterceptedRequest, response: FulfillResponse = {}): Promise<void> {
        const headers: HeaderMap = { ...(response.headers ?? {}) };
        if (response.contentType) {
            headers['Content-Type'] = response.contentType;
        }

        const body = response.body ?? '';
        const encoded = typeof body === 'string'
            ? Buffer.from(body, 'utf8').toString('base64')
            : Buffer.from(body).toString('base64');

        await this.settle(request, 'fulfilled', () => this.client.fulfillRequest({
            requestId: request.id,
            status: response.status ?? 200,
            statusText: response.statusText,
            headers,
            body: encoded,
        }));
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // Observation tables
    // ═══════════════════════════════════════════════════════════════════════════

    getRequests(): ObservedRequest[] {
        return this.requests.map(entry => ({ ...entry, headers: { ...entry.headers } }));
    }

    getResponses(): ObservedResponse[] {
        return this.responses.map(entry => ({ ...entry, headers: { ...entry.headers } }));
    }

    /**
     * Wait for a request whose URL matches `pattern`; requests observed before
     * the call count, and the most recent match is returned.
     *
     * @throws InvalidPatternError for an invalid pattern
     * @throws WaitTimeoutError when nothing matches in time
     */
    waitForRequest(
        pattern: string | RegExp,
        options: WaitOptions = {}
    ): Promise<ObservedRequest> {
        const regex = compilePattern(pattern);
        return pollUntil(
            () => {
                const match = this.findLast(this.requests, entry => testPattern(regex, entry.url));
                return match ? { ...match, headers: { ...match.headers } } : undefined;
            },
            {
                description: `request matching ${regex.source}`,
                timeoutMs: options.timeoutMs ?? DEFAULT_REQUEST_WAIT_TIMEOUT_MS,
                signal: options.signal,
                wakeOn: { notifier: this.notifier, topics: ['request'] },
            }
        );
    }

    /**
     * Wait for a response whose URL matches `pattern`.
     *
     * @throws InvalidPatternError for an invalid pattern
     * @throws WaitTimeoutError when nothing matches in time
     */
    waitForResponse(
        pattern: string | RegExp,
        options: WaitOptions = {}
    ): Promise<ObservedResponse> {
        const regex = compilePattern(pattern);
        return pollUntil(
            () => {
                const match = this.findLast(this.responses, entry => testPattern(regex, entry.url));
                return match ? { ...match, headers: { ...match.headers } } : undefined;
            },
            {
                description: `response matching ${regex.source}`,
                timeoutMs: options.timeoutMs ?? DEFAULT_REQUEST_WAIT_TIMEOUT_MS,
                signal: options.signal,
                wakeOn: { notifier: this.notifier, topics: ['response'] },
            }
        );
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // Core Logic
    // ═══════════════════════════════════════════════════════════════════════════

    private async enableInterception(): Promise<void> {
        await this.client.enable('Network');
        await this.client.enableInterception(['*']);
        this.interceptionEnabled = true;
        log.debug('Request interception enabled');
    }

    private async handleRequestPaused(event: RequestPausedEvent): Promise<void> {
        const request = new InterceptedRequest(event, this);
        this.pending.set(request.id, request);
        this.recordRequest({
            requestId: event.requestId,
            url: event.url,
            method: event.method,
            headers: { ...event.headers },
            resourceType: event.resourceType,
            postData: event.postData,
            timestamp: request.pausedAt,
        });

        const route = this.routes.find(candidate => testPattern(candidate.pattern, request.url));
        if (!route) {
            await this.settleQuietly(request, () => this.continueRequest(request));
            return;
        }

        const execution = this.handlerLimiter(() => this.runHandler(route, request));
        this.inflight.add(execution);
        void execution.finally(() => this.inflight.delete(execution));
    }

    private async runHandler(route: Route, request: InterceptedRequest): Promise<void> {
        try {
            await route.handler(request);
        } catch (error) {
            const err = toError(error);
            this.routeErrors.push({
                pattern: route.pattern.source,
                requestId: request.id,
                url: request.url,
                error: err,
                timestamp: Date.now(),
            });
            log.error(`Route handler for ${route.pattern.source} failed on ${request.method} ${request.url}: ${err.message}`, {
                headers: redactHeaders(request.headers),
            });
            if (!request.isResolved) {
                await this.settleQuietly(request, () => this.abortRequest(request, 'failed'));
            }
            return;
        }

        if (!request.isResolved) {
            log.debug(`Route ${route.pattern.source} declined ${request.url}; continuing`);
            await this.settleQuietly(request, () => this.continueRequest(request));
        }
    }

    /**
     * Issue a default decision; a command failure (e.g. the page navigated
     * away) is logged and the request dropped from the pending table.
     */
    private async settleQuietly(request: InterceptedRequest, decide: () => Promise<void>): Promise<void> {
        try {
            await decide();
        } catch (error) {
            this.pending.delete(request.id);
            log.warn(`Could not resolve request ${request.id} (${request.url}): ${toError(error).message}`);
        }
    }

    /**
     * Claim the decision, then send its command. A command that fails hands
     * the request back to the pending table before the error propagates.
     * @throws RequestNotInterceptedError if the request is unknown or already decided
     */
    private async settle(request: InterceptedRequest, resolution: Resolution, send: () => Promise<void>): Promise<void> {
        if (request.isResolved || this.pending.get(request.id) !== request) {
            throw new RequestNotInterceptedError(request.id);
        }
        this.pending.delete(request.id);
        request.markResolved(resolution);

        try {
            await send();
        } catch (error) {
            request.markResolved(null);
            this.pending.set(request.id, request);
            throw error;
        }
    }

    private recordRequest(entry: ObservedRequest): void {
        this.requests.push(entry);
        if (this.requests.length > this.historyLimit) {
            this.requests.splice(0, this.requests.length - this.historyLimit);
        }
        this.notifier.notify('request');
    }

    private recordResponse(entry: ObservedResponse): void {
        this.responses.push(entry);
        if (this.responses.length > this.historyLimit) {
            this.responses.splice(0, this.responses.length - this.historyLimit);
        }
        this.notifier.notify('response');
    }

    private findLast<T>(entries: T[], predicate: (entry: T) => boolean): T | undefined {
        for (let i = entries.length - 1; i >= 0; i--) {
            if (predicate(entries[i])) return entries[i];
        }
        return undefined;
    }
}

export default NetworkInterceptor;
