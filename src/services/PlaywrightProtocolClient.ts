/**
 * PlaywrightProtocolClient
 *
 * ProtocolClient backed by a Playwright CDP session (Chromium only). Raw
 * DevTools events are translated into ProtocolEvent variants and fanned out
 * to subscribers; commands are wrapped so every failure surfaces as a
 * ProtocolCommandError naming the method.
 */

import type { CDPSession, Page } from 'playwright';
import { ProtocolCommandError, toError } from '../core/errors.js';
import type {
    ContinueRequestParams,
    EvaluateOptions,
    FulfillRequestParams,
    HeaderMap,
    NetworkErrorReason,
    ProtocolClient,
    ProtocolDomain,
    ProtocolEvent,
    ProtocolEventListener,
} from '../types/protocol.js';
import { createChildLogger } from '../utils/logger.js';

const log = createChildLogger({ module: 'PlaywrightProtocolClient' });

interface HeaderEntry {
    name: string;
    value: string;
}

function toHeaderMap(headers: Readonly<Record<string, string>> | undefined): HeaderMap {
    return headers ? { ...headers } : {};
}

function toHeaderEntries(headers: HeaderMap): HeaderEntry[] {
    return Object.entries(headers).map(([name, value]) => ({ name, value }));
}

/**
 * Join the base64 chunks of a paused request body.
 */
export function decodePostDataBytes(entries: ReadonlyArray<{ bytes?: string }> | undefined): Buffer | undefined {
    if (!entries || entries.length === 0) return undefined;
    return Buffer.concat(entries.map(entry => Buffer.from(entry.bytes ?? '', 'base64')));
}

/**
 * Join the base64 chunks of a paused request body into text.
 */
export function decodePostDataEntries(entries: ReadonlyArray<{ bytes?: string }> | undefined): string | undefined {
    return decodePostDataBytes(entries)?.toString('utf8');
}

export class PlaywrightProtocolClient implements ProtocolClient {
    private listeners: Set<ProtocolEventListener> = new Set();
    private detached = false;

    constructor(private readonly session: CDPSession) {
        this.bindEvents();
    }

    /**
     * Open a CDP session for a Chromium page.
     */
    static async fromPage(page: Page): Promise<PlaywrightProtocolClient> {
        const session = await page.context().newCDPSession(page);
        return new PlaywrightProtocolClient(session);
    }

    subscribe(listener: ProtocolEventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // Commands
    // ═══════════════════════════════════════════════════════════════════════════

    async enable(domain: ProtocolDomain): Promise<void> {
        switch (domain) {
            case 'Network':
                await this.command('Network.enable', () => this.session.send('Network.enable'));
                return;
            case 'Runtime':
                await this.command('Runtime.enable', () => this.session.send('Runtime.enable'));
                return;
            case 'Page':
                await this.command('Page.enable', () => this.session.send('Page.enable'));
                return;
            case 'DOM':
                await this.command('DOM.enable', () => this.session.send('DOM.enable'));
                return;
        }
    }

    async disable(domain: ProtocolDomain): Promise<void> {
        switch (domain) {
            case 'Network':
                await this.command('Network.disable', () => this.session.send('Network.disable'));
                return;
            case 'Runtime':
                await this.command('Runtime.disable', () => this.session.send('Runtime.disable'));
                return;
            case 'Page':
                await this.command('Page.disable', () => this.session.send('Page.disable'));
                return;
            case 'DOM':
                await this.command('DOM.disable', () => this.session.send('DOM.disable'));
                return;
        }
    }

    async enableInterception(patterns: string[]): Promise<void> {
        await this.command('Fetch.enable', () =>
            this.session.send('Fetch.enable', {
                patterns: patterns.map(urlPattern => ({ urlPattern })),
            })
        );
    }

    async disableInterception(): Promise<void> {
        await this.command('Fetch.disable', () => this.session.send('Fetch.disable'));
    }

    async continueRequest(params: ContinueRequestParams): Promise<void> {
        await this.command('Fetch.continueRequest', () =>
            this.session.send('Fetch.continueRequest', {
                requestId: params.requestId,
                url: params.url,
                method: params.method,
                headers: params.headers ? toHeaderEntries(params.headers) : undefined,
                postData:
                    params.postData !== undefined
                        ? Buffer.from(params.postData, 'utf8').toString('base64')
                        : undefined,
            })
        );
    }

    async failRequest(requestId: string, reason: NetworkErrorReason): Promise<void> {
        await this.command('Fetch.failRequest', () =>
            this.session.send('Fetch.failRequest', { requestId, errorReason: reason })
        );
    }

    async fulfillRequest(params: FulfillRequestParams): Promise<void> {
        await this.command('Fetch.fulfillRequest', () =>
            this.session.send('Fetch.fulfillRequest', {
                requestId: params.requestId,
                responseCode: params.status,
                responseHeaders: toHeaderEntries(params.headers),
                body: params.body,
                responsePhrase: params.statusText,
            })
        );
    }

    async evaluate(expression: string, options: EvaluateOptions = {}): Promise<unknown> {
        const response = await this.command('Runtime.evaluate', () =>
            this.session.send('Runtime.evaluate', {
                expression,
                returnByValue: true,
                awaitPromise: options.awaitPromise ?? false,
                timeout: options.timeoutMs,
            })
        );

        if (response.exceptionDetails) {
            const details = response.exceptionDetails;
            throw new ProtocolCommandError(
                'Runtime.evaluate',
                details.exception?.description ?? details.text
            );
        }

        const value: unknown = response.result.value;
        return value;
    }

    async detach(): Promise<void> {
        if (this.detached) return;
        this.detached = true;
        this.listeners.clear();
        await this.command('detach', () => this.session.detach());
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // Event translation
    // ═══════════════════════════════════════════════════════════════════════════

    private bindEvents(): void {
        const session = this.session;

        session.on('Network.requestWillBeSent', params => {
            this.emit({
                kind: 'requestWillBeSent',
                requestId: params.requestId,
                url: params.request.url,
                method: params.request.method,
                headers: toHeaderMap(params.request.headers),
                resourceType: params.type,
            });
        });

        session.on('Fetch.requestPaused', params => {
            const body = decodePostDataBytes(params.request.postDataEntries)
                ?? (params.request.postData !== undefined ? Buffer.from(params.request.postData, 'utf8') : undefined);
            this.emit({
                kind: 'requestPaused',
                requestId: params.requestId,
                url: params.request.url,
                method: params.request.method,
                headers: toHeaderMap(params.request.headers),
                postData: body?.toString('utf8'),
                postDataBase64: body?.toString('base64'),
                resourceType: params.resourceType,
            });
        });

        session.on('Network.responseReceived', params => {
            this.emit({
                kind: 'responseReceived',
                requestId: params.requestId,
                url: params.response.url,
                status: params.response.status,
                statusText: params.response.statusText,
                headers: toHeaderMap(params.response.headers),
                mimeType: params.response.mimeType,
            });
        });

        session.on('Network.loadingFinished', params => {
            this.emit({ kind: 'loadingFinished', requestId: params.requestId });
        });

        session.on('Network.loadingFailed', params => {
            this.emit({
                kind: 'loadingFailed',
                requestId: params.requestId,
                errorText: params.errorText,
                canceled: params.canceled ?? false,
            });
        });

        session.on('Runtime.consoleAPICalled', params => {
            this.emit({
                kind: 'consoleApiCalled',
                type: params.type,
                args: params.args.map(arg => {
                    const value: unknown = arg.value;
                    return value;
                }),
            });
        });

        session.on('Runtime.executionContextsCleared', () => {
            this.emit({ kind: 'executionContextsCleared' });
        });

        session.on('Network.webSocketCreated', params => {
            this.emit({ kind: 'socketCreated', requestId: params.requestId, url: params.url });
        });

        session.on('Network.webSocketWillSendHandshakeRequest', params => {
            this.emit({
                kind: 'socketHandshakeRequest',
                requestId: params.requestId,
                headers: toHeaderMap(params.request.headers),
            });
        });

        session.on('Network.webSocketHandshakeResponseReceived', params => {
            this.emit({
                kind: 'socketHandshakeResponse',
                requestId: params.requestId,
                status: params.response.status,
                statusText: params.response.statusText,
                headers: toHeaderMap(params.response.headers),
            });
        });

        session.on('Network.webSocketFrameSent', params => {
            this.emit({
                kind: 'socketFrameSent',
                requestId: params.requestId,
                frame: {
                    opcode: params.response.opcode,
                    mask: params.response.mask,
                    payloadData: params.response.payloadData,
                },
            });
        });

        session.on('Network.webSocketFrameReceived', params => {
            this.emit({
                kind: 'socketFrameReceived',
                requestId: params.requestId,
                frame: {
                    opcode: params.response.opcode,
                    mask: params.response.mask,
                    payloadData: params.response.payloadData,
                },
            });
        });

        session.on('Network.webSocketFrameError', params => {
            this.emit({
                kind: 'socketFrameError',
                requestId: params.requestId,
                errorMessage: params.errorMessage,
            });
        });

        session.on('Network.webSocketClosed', params => {
            this.emit({ kind: 'socketClosed', requestId: params.requestId });
        });
    }

    private emit(event: ProtocolEvent): void {
        for (const listener of this.listeners) {
            try {
                listener(event);
            } catch (error) {
                log.error(`Protocol listener failed on ${event.kind}: ${toError(error).message}`);
            }
        }
    }

    private async command<T>(method: string, run: () => Promise<T>): Promise<T> {
        try {
            return await run();
        } catch (error) {
            throw new ProtocolCommandError(method, toError(error).message);
        }
    }
}

export default PlaywrightProtocolClient;
