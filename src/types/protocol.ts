/**
 * Protocol Event Model
 *
 * Closed union of the DevTools Protocol events the observers consume, and the
 * command surface they issue back. The browser adapter translates raw protocol
 * payloads into these variants; everything downstream dispatches on `kind`.
 */

export type HeaderMap = Record<string, string>;

export type ProtocolDomain = 'Network' | 'Runtime' | 'Page' | 'DOM';

// ═══════════════════════════════════════════════════════════════════════════════
// EVENTS
// ═══════════════════════════════════════════════════════════════════════════════

export interface RequestWillBeSentEvent {
    kind: 'requestWillBeSent';
    requestId: string;
    url: string;
    method: string;
    headers: HeaderMap;
    resourceType?: string;
}

export interface RequestPausedEvent {
    kind: 'requestPaused';
    requestId: string;
    url: string;
    method: string;
    headers: HeaderMap;
    /** Request body as UTF-8 text, decoded from the protocol's chunked entries */
    postData?: string;
    /** The same body's exact bytes, base64-encoded */
    postDataBase64?: string;
    resourceType: string;
}

export interface ResponseReceivedEvent {
    kind: 'responseReceived';
    requestId: string;
    url: string;
    status: number;
    statusText: string;
    headers: HeaderMap;
    mimeType: string;
}

export interface LoadingFinishedEvent {
    kind: 'loadingFinished';
    requestId: string;
}

export interface LoadingFailedEvent {
    kind: 'loadingFailed';
    requestId: string;
    errorText: string;
    canceled: boolean;
}

export interface ConsoleApiCalledEvent {
    kind: 'consoleApiCalled';
    type: string;
    /** Primitive argument values; non-primitive arguments are omitted */
    args: unknown[];
}

export interface ExecutionContextsClearedEvent {
    kind: 'executionContextsCleared';
}

export interface SocketCreatedEvent {
    kind: 'socketCreated';
    requestId: string;
    url: string;
}

export interface SocketHandshakeRequestEvent {
    kind: 'socketHandshakeRequest';
    requestId: string;
    headers: HeaderMap;
}

export interface SocketHandshakeResponseEvent {
    kind: 'socketHandshakeResponse';
    requestId: string;
    status: number;
    statusText: string;
    headers: HeaderMap;
}

export interface SocketFramePayload {
    opcode: number;
    mask: boolean;
    /** Text for text frames, base64 for everything else */
    payloadData: string;
}

export interface SocketFrameSentEvent {
    kind: 'socketFrameSent';
    requestId: string;
    frame: SocketFramePayload;
}

export interface SocketFrameReceivedEvent {
    kind: 'socketFrameReceived';
    requestId: string;
    frame: SocketFramePayload;
}

export interface SocketFrameErrorEvent {
    kind: 'socketFrameError';
    requestId: string;
    errorMessage: string;
}

export interface SocketClosedEvent {
    kind: 'socketClosed';
    requestId: string;
}

export type ProtocolEvent =
    | RequestWillBeSentEvent
    | RequestPausedEvent
    | ResponseReceivedEvent
    | LoadingFinishedEvent
    | LoadingFailedEvent
    | ConsoleApiCalledEvent
    | ExecutionContextsClearedEvent
    | SocketCreatedEvent
    | SocketHandshakeRequestEvent
    | SocketHandshakeResponseEvent
    | SocketFrameSentEvent
    | SocketFrameReceivedEvent
    | SocketFrameErrorEvent
    | SocketClosedEvent;

export type ProtocolEventKind = ProtocolEvent['kind'];

export type ProtocolEventListener = (event: ProtocolEvent) => void;

// ═══════════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

/** Protocol-level network error codes accepted by failRequest */
export type NetworkErrorReason =
    | 'Failed'
    | 'Aborted'
    | 'TimedOut'
    | 'AccessDenied'
    | 'ConnectionClosed'
    | 'ConnectionReset'
    | 'ConnectionRefused'
    | 'ConnectionAborted'
    | 'ConnectionFailed'
    | 'NameNotResolved'
    | 'InternetDisconnected'
    | 'AddressUnreachable'
    | 'BlockedByClient'
    | 'BlockedByResponse';

export interface ContinueRequestParams {
    requestId: string;
    url?: string;
    method?: string;
    headers?: HeaderMap;
    /** Replacement body as text; when omitted the browser sends the original bytes */
    postData?: string;
}

export interface FulfillRequestParams {
    requestId: string;
    status: number;
    headers: HeaderMap;
    /** Base64-encoded body */
    body: string;
    statusText?: string;
}

export interface EvaluateOptions {
    awaitPromise?: boolean;
    timeoutMs?: number;
}

/**
 * The command/event surface of one attached page.
 */
export interface ProtocolClient {
    /** Register a listener for every event; returns the unsubscribe function */
    subscribe(listener: ProtocolEventListener): () => void;
    enable(domain: ProtocolDomain): Promise<void>;
    disable(domain: ProtocolDomain): Promise<void>;
    /** Pause every request whose URL matches one of the glob patterns */
    enableInterception(patterns: string[]): Promise<void>;
    disableInterception(): Promise<void>;
    continueRequest(params: ContinueRequestParams): Promise<void>;
    failRequest(requestId: string, reason: NetworkErrorReason): Promise<void>;
    fulfillRequest(params: FulfillRequestParams): Promise<void>;
    /** Evaluate an expression in the page and return its JSON value */
    evaluate(expression: string, options?: EvaluateOptions): Promise<unknown>;
    detach(): Promise<void>;
}

/**
 * Compile-time exhaustiveness guard for switch statements over unions.
 */
export function assertNever(value: never): never {
    throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
