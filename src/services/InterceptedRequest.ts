/**
 * InterceptedRequest
 *
 * A request paused by the browser and waiting for a decision. Exactly one of
 * continue(), abort() or fulfill() may succeed; any later call rejects with
 * RequestNotInterceptedError.
 */

import type { HeaderMap, NetworkErrorReason, RequestPausedEvent } from '../types/protocol.js';

export type Resolution = 'continued' | 'aborted' | 'fulfilled';

export type AbortReason =
    | 'failed'
    | 'aborted'
    | 'timedout'
    | 'accessdenied'
    | 'connectionclosed'
    | 'connectionreset'
    | 'connectionrefused'
    | 'connectionaborted'
    | 'connectionfailed'
    | 'namenotresolved'
    | 'internetdisconnected'
    | 'addressunreachable'
    | 'blockedbyclient'
    | 'blockedbyresponse';

const ERROR_REASONS: ReadonlyMap<string, NetworkErrorReason> = new Map<string, NetworkErrorReason>([
    ['failed', 'Failed'],
    ['aborted', 'Aborted'],
    ['timedout', 'TimedOut'],
    ['accessdenied', 'AccessDenied'],
    ['connectionclosed', 'ConnectionClosed'],
    ['connectionreset', 'ConnectionReset'],
    ['connectionrefused', 'ConnectionRefused'],
    ['connectionaborted', 'ConnectionAborted'],
    ['connectionfailed', 'ConnectionFailed'],
    ['namenotresolved', 'NameNotResolved'],
    ['internetdisconnected', 'InternetDisconnected'],
    ['addressunreachable', 'AddressUnreachable'],
    ['blockedbyclient', 'BlockedByClient'],
    ['blockedbyresponse', 'BlockedByResponse'],
]);

/**
 * Map a caller reason to the protocol error code; unknown reasons become `Aborted`.
 */
export function toNetworkErrorReason(reason: string): NetworkErrorReason {
    return ERROR_REASONS.get(reason.toLowerCase()) ?? 'Aborted';
}

export interface ContinueOverrides {
    url?: string;
    method?: string;
    /** Replaces every request header when given */
    headers?: HeaderMap;
    postData?: string;
}

export interface FulfillResponse {
    /** Default 200 */
    status?: number;
    statusText?: string;
    headers?: HeaderMap;
    body?: string | Uint8Array;
    /** Sets the Content-Type header */
    contentType?: string;
}

/**
 * Issues the protocol command for a decision and enforces exactly-once resolution.
 */
export interface RequestResolver {
    continueRequest(request: InterceptedRequest, overrides?: ContinueOverrides): Promise<void>;
    abortRequest(request: InterceptedRequest, reason?: AbortReason | string): Promise<void>;
    fulfillRequest(request: InterceptedRequest, response?: FulfillResponse): Promise<void>;
}

export class InterceptedRequest {
    readonly id: string;
    readonly url: string;
    readonly method: string;
    readonly headers: Readonly<HeaderMap>;
    /** Body as UTF-8 text; bytes that are not valid UTF-8 are replaced */
    readonly postData: string | undefined;
    /** Exact body bytes, base64-encoded */
    readonly postDataBase64: string | undefined;
    readonly resourceType: string;
    readonly pausedAt: number;

    private resolvedAs: Resolution | null = null;

    constructor(event: RequestPausedEvent, private readonly resolver: RequestResolver) {
        this.id = event.requestId;
        this.url = event.url;
        this.method = event.method;
        this.headers = { ...event.headers };
        this.postData = event.postData;
        this.postDataBase64 = event.postDataBase64;
        this.resourceType = event.resourceType;
        this.pausedAt = Date.now();
    }

    get isResolved(): boolean {
        return this.resolvedAs !== null;
    }

    get resolution(): Resolution | null {
        return this.resolvedAs;
    }

    postDataBuffer(): Buffer | undefined {
        return this.postDataBase64 !== undefined ? Buffer.from(this.postDataBase64, 'base64') : undefined;
    }

    /**
     * Let the request proceed. Fields not overridden go out as the browser
     * paused them, body bytes included.
     */
    continue(overrides: ContinueOverrides = {}): Promise<void> {
        return this.resolver.continueRequest(this, overrides);
    }

    /**
     * Fail the request with a network error (`aborted` by default).
     */
    abort(reason: AbortReason | string = 'aborted'): Promise<void> {
        return this.resolver.abortRequest(this, reason);
    }

    /**
     * Answer the request with a synthetic response.
     */
    fulfill(response: FulfillResponse = {}): Promise<void> {
        return this.resolver.fulfillRequest(this, response);
    }

    /**
     * Called by the resolver once it has claimed the request, and with null
     * when the decision's command failed.
     * @internal
     */
    markResolved(resolution: Resolution | null): void {
        this.resolvedAs = resolution;
    }
}
