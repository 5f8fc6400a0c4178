/**
 * SocketMonitor Service
 *
 * Tracks WebSocket connections seen by the page: lifecycle state, handshake
 * metadata, ordered frame history and byte/message counters.
 *
 * - Connections live in the live index until closed, then move to history
 * - A closed connection id is never tracked again
 * - Frames keep receipt order with non-decreasing timestamps
 * - Callers get snapshots; wait evaluators get a read-only view
 *
 * Implements IEventSubscriber for dispatcher-based event delivery.
 */

import type { IEventSubscriber } from '../core/EventDispatcher.js';
import { ChangeNotifier } from '../core/ChangeNotifier.js';
import { ConnectionNotFoundError } from '../core/errors.js';
import type { SocketDirection } from '../config/socket-wait.config.js';
import {
    assertNever,
    type HeaderMap,
    type ProtocolClient,
    type ProtocolEvent,
    type SocketFramePayload,
} from '../types/protocol.js';
import { createChildLogger } from '../utils/logger.js';

const log = createChildLogger({ module: 'SocketMonitor' });

export type SocketState = 'connecting' | 'open' | 'closing' | 'closed';

export type FrameType = 'text' | 'binary' | 'close' | 'ping' | 'pong' | 'unknown';

export interface SocketFrame {
    readonly type: FrameType;
    readonly direction: SocketDirection;
    /** Text for text frames, base64 for everything else */
    readonly payload: string;
    /** Payload length in bytes */
    readonly size: number;
    /** Receipt time (epoch ms), non-decreasing within a connection */
    readonly timestamp: number;
    readonly opcode: number;
}

export interface SocketFrameError {
    readonly message: string;
    readonly timestamp: number;
}

export interface SocketConnection {
    id: string;
    url: string;
    state: SocketState;
    /** Negotiated Sec-WebSocket-Protocol */
    protocol: string;
    /** Negotiated Sec-WebSocket-Extensions */
    extensions: string[];
    connectedAt: number;
    openedAt: number | null;
    disconnectedAt: number | null;
    frames: SocketFrame[];
    errors: SocketFrameError[];
    requestHeaders: HeaderMap;
    responseHeaders: HeaderMap;
    closeCode: number | null;
    closeReason: string;
    bytesSent: number;
    bytesReceived: number;
    messagesSent: number;
    messagesReceived: number;
    /** Time from creation to handshake response (ms) */
    connectionLatency: number | null;
}

/** Connection metadata without its frame and error history */
export interface SocketConnectionSummary extends Omit<SocketConnection, 'frames' | 'errors'> {
    frameCount: number;
    errorCount: number;
}

/**
 * Per-frame and per-error activity carries a summary; lifecycle activity
 * carries the full record.
 */
export type SocketActivity =
    | { type: 'connect'; connection: SocketConnection }
    | { type: 'open'; connection: SocketConnection }
    | { type: 'frame'; connection: SocketConnectionSummary; frame: SocketFrame }
    | { type: 'error'; connection: SocketConnectionSummary; message: string }
    | { type: 'disconnect'; connection: SocketConnection };

export type SocketActivityListener = (activity: SocketActivity) => void;

export interface SocketStats {
    activeConnections: number;
    totalBytesSent: number;
    totalBytesReceived: number;
    totalMessagesSent: number;
    totalMessagesReceived: number;
}

export interface SocketMonitorOptions {
    notifier?: ChangeNotifier;
}

/**
 * Decode a protocol opcode into a frame type
 */
export function frameTypeForOpcode(opcode: number): FrameType {
    switch (opcode) {
        case 0x1:
            return 'text';
        case 0x2:
            return 'binary';
        case 0x8:
            return 'close';
        case 0x9:
            return 'ping';
        case 0xa:
            return 'pong';
        default:
            return 'unknown';
    }
}

/**
 * Byte length of a frame payload: UTF-8 for text, decoded base64 otherwise
 */
export function payloadSize(frame: SocketFramePayload): number {
    return frame.opcode === 0x1
        ? Buffer.byteLength(frame.payloadData, 'utf8')
        : Buffer.from(frame.payloadData, 'base64').length;
}

/**
 * Close code and reason carried by a close frame's base64 payload
 */
export function parseClosePayload(payloadData: string): { code: number | null; reason: string } {
    const bytes = Buffer.from(payloadData, 'base64');
    if (bytes.length < 2) {
        return { code: null, reason: '' };
    }
    return { code: bytes.readUInt16BE(0), reason: bytes.subarray(2).toString('utf8') };
}

function headerValue(headers: HeaderMap, name: string): string | undefined {
    const wanted = name.toLowerCase();
    for (const [key, value] of Object.entries(headers)) {
        if (key.toLowerCase() === wanted) return value;
    }
    return undefined;
}

/**
 * Independent copy of a connection record
 */
export function snapshotConnection(connection: Readonly<SocketConnection>): SocketConnection {
    return {
        ...connection,
        extensions: [...connection.extensions],
        frames: [...connection.frames],
        errors: [...connection.errors],
        requestHeaders: { ...connection.requestHeaders },
        responseHeaders: { ...connection.responseHeaders },
    };
}

export function summarizeConnection(connection: Readonly<SocketConnection>): SocketConnectionSummary {
    const { frames, errors, ...metadata } = connection;
    return {
        ...metadata,
        extensions: [...connection.extensions],
        requestHeaders: { ...connection.requestHeaders },
        responseHeaders: { ...connection.responseHeaders },
        frameCount: frames.length,
        errorCount: errors.length,
    };
}

export class SocketMonitor implements IEventSubscriber {
    readonly name = 'SocketMonitor';
    readonly kinds = [
        'socketCreated',
        'socketHandshakeRequest',
        'socketHandshakeResponse',
        'socketFrameSent',
        'socketFrameReceived',
        'socketFrameError',
        'socketClosed',
    ] as const;

    private live: Map<string, SocketConnection> = new Map();
    private closed: Map<string, SocketConnection> = new Map();
    private listeners: Set<SocketActivityListener> = new Set();
    private enabled = false;

    private readonly notifier: ChangeNotifier;

    constructor(private readonly client: ProtocolClient, options: SocketMonitorOptions = {}) {
        this.notifier = options.notifier ?? new ChangeNotifier();
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // IEventSubscriber Lifecycle Hooks
    // ═══════════════════════════════════════════════════════════════════════════

    async onAttach(): Promise<void> {
        await this.enable();
    }

    onEvent(event: ProtocolEvent): void {
        switch (event.kind) {
            case 'socketCreated':
                this.handleCreated(event.requestId, event.url);
                return;
            case 'socketHandshakeRequest':
                this.withLive(event.requestId, connection => {
                    connection.requestHeaders = { ...event.headers };
                });
                return;
            case 'socketHandshakeResponse':
                this.handleHandshakeResponse(event.requestId, event.headers);
                return;
            case 'socketFrameSent':
                this.handleFrame(event.requestId, 'sent', event.frame);
                return;
            case 'socketFrameReceived':
                this.handleFrame(event.requestId, 'received', event.frame);
                return;
            case 'socketFrameError':
                this.handleFrameError(event.requestId, event.errorMessage);
                return;
            case 'socketClosed':
                this.handleClosed(event.requestId);
                return;
            case 'requestWillBeSent':
            case 'requestPaused':
            case 'responseReceived':
            case 'loadingFinished':
            case 'loadingFailed':
            case 'consoleApiCalled':
            case 'executionContextsCleared':
                return;
            default:
                assertNever(event);
        }
    }

    onClose(): void {
        log.debug(`SocketMonitor: ${this.live.size} live, ${this.closed.size} closed connections`);
        this.listeners.clear();
    }

    clear(): void {
        this.live.clear();
        this.closed.clear();
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // Public API
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Enable the Network domain, which carries WebSocket events.
     */
    async enable(): Promise<void> {
        if (this.enabled) return;
        await this.client.enable('Network');
        this.enabled = true;
        log.debug('WebSocket monitoring enabled');
    }

    get isEnabled(): boolean {
        return this.enabled;
    }

    /**
     * Snapshot of live (not yet closed) connections keyed by id
     */
    getConnections(): Map<string, SocketConnection> {
        const result = new Map<string, SocketConnection>();
        for (const [id, connection] of this.live) {
            result.set(id, snapshotConnection(connection));
        }
        return result;
    }

    /**
     * Snapshot of one connection, live or closed
     */
    getConnection(id: string): SocketConnection | undefined {
        const connection = this.live.get(id) ?? this.closed.get(id);
        return connection ? snapshotConnection(connection) : undefined;
    }

    /**
     * @throws ConnectionNotFoundError if the id was never seen
     */
    requireConnection(id: string): SocketConnection {
        const connection = this.getConnection(id);
        if (!connection) {
            throw new ConnectionNotFoundError(id);
        }
        return connection;
    }

    /**
     * Snapshots of every connection seen, closed ones included
     */
    getAllConnections(): SocketConnection[] {
        return this.view().map(snapshotConnection);
    }

    /**
     * Read-only view of live and closed records for wait evaluators.
     * Must not be retained or mutated.
     */
    view(): ReadonlyArray<Readonly<SocketConnection>> {
        return [...this.live.values(), ...this.closed.values()];
    }

    hasConnection(id: string): boolean {
        return this.live.has(id) || this.closed.has(id);
    }

    getStats(): SocketStats {
        const stats: SocketStats = {
            activeConnections: this.live.size,
            totalBytesSent: 0,
            totalBytesReceived: 0,
            totalMessagesSent: 0,
            totalMessagesReceived: 0,
        };
        for (const connection of this.live.values()) {
            stats.totalBytesSent += connection.bytesSent;
            stats.totalBytesReceived += connection.bytesReceived;
            stats.totalMessagesSent += connection.messagesSent;
            stats.totalMessagesReceived += connection.messagesReceived;
        }
        return stats;
    }

    /**
     * Receive activity records as events are ingested.
     * @returns function that removes the listener
     */
    subscribe(listener: SocketActivityListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // Core Logic
    // ═══════════════════════════════════════════════════════════════════════════

    private handleCreated(id: string, url: string): void {
        if (this.closed.has(id)) {
            log.debug(`Ignoring creation of closed connection ${id}`);
            return;
        }
        if (this.live.has(id)) return;

        const connection: SocketConnection = {
            id,
            url,
            state: 'connecting',
            protocol: '',
            extensions: [],
            connectedAt: Date.now(),
            openedAt: null,
            disconnectedAt: null,
            frames: [],
            errors: [],
            requestHeaders: {},
            responseHeaders: {},
            closeCode: null,
            closeReason: '',
            bytesSent: 0,
            bytesReceived: 0,
            messagesSent: 0,
            messagesReceived: 0,
            connectionLatency: null,
        };

        this.live.set(id, connection);
        log.debug(`WebSocket created: ${url}`);
        this.notifier.notify('connection');
        this.emit(() => ({ type: 'connect', connection: snapshotConnection(connection) }));
    }

    private handleHandshakeResponse(id: string, headers: HeaderMap): void {
        this.withLive(id, connection => {
            connection.responseHeaders = { ...headers };
            connection.protocol = headerValue(headers, 'Sec-WebSocket-Protocol') ?? '';
            connection.extensions = (headerValue(headers, 'Sec-WebSocket-Extensions') ?? '')
                .split(',')
                .map(extension => extension.trim())
                .filter(extension => extension.length > 0);
            this.markOpen(connection);
        });
    }

    private handleFrame(id: string, direction: SocketDirection, payload: SocketFramePayload): void {
        this.withLive(id, connection => {
            // Frames prove the handshake completed even if its event was missed
            if (connection.state === 'connecting') {
                this.markOpen(connection);
            }

            const last = connection.frames[connection.frames.length - 1];
            const frame: SocketFrame = Object.freeze({
                type: frameTypeForOpcode(payload.opcode),
                direction,
                payload: payload.payloadData,
                size: payloadSize(payload),
                timestamp: last ? Math.max(Date.now(), last.timestamp) : Date.now(),
                opcode: payload.opcode,
            });

            connection.frames.push(frame);
            if (direction === 'sent') {
                connection.bytesSent += frame.size;
                connection.messagesSent++;
            } else {
                connection.bytesReceived += frame.size;
                connection.messagesReceived++;
            }

            if (frame.type === 'close') {
                const { code, reason } = parseClosePayload(payload.payloadData);
                connection.closeCode = code;
                connection.closeReason = reason;
                if (connection.state === 'open') {
                    connection.state = 'closing';
                    this.notifier.notify('connection');
                }
            }

            this.notifier.notify('frame');
            this.emit(() => ({ type: 'frame', connection: summarizeConnection(connection), frame }));
        });
    }

    private handleFrameError(id: string, message: string): void {
        this.withLive(id, connection => {
            connection.errors.push(Object.freeze({ message, timestamp: Date.now() }));
            log.debug(`WebSocket frame error on ${connection.url}: ${message}`);
            this.notifier.notify('frame');
            this.emit(() => ({ type: 'error', connection: summarizeConnection(connection), message }));
        });
    }

    private handleClosed(id: string): void {
        const connection = this.live.get(id);
        if (!connection) return;

        this.live.delete(id);
        connection.state = 'closed';
        connection.disconnectedAt = Date.now();
        this.closed.set(id, connection);

        log.debug(`WebSocket closed: ${connection.url}`);
        this.notifier.notify('connection');
        this.emit(() => ({ type: 'disconnect', connection: snapshotConnection(connection) }));
    }

    private markOpen(connection: SocketConnection): void {
        if (connection.state !== 'connecting') return;
        const now = Date.now();
        connection.state = 'open';
        connection.openedAt = now;
        connection.connectionLatency = now - connection.connectedAt;
        this.notifier.notify('connection');
        this.emit(() => ({ type: 'open', connection: snapshotConnection(connection) }));
    }

    private withLive(id: string, mutate: (connection: SocketConnection) => void): void {
        const connection = this.live.get(id);
        if (!connection) return;
        mutate(connection);
    }

    /**
     * Deliver an activity record; built lazily so idle monitors copy nothing.
     */
    private emit(build: () => SocketActivity): void {
        if (this.listeners.size === 0) return;
        const activity = build();
        for (const listener of this.listeners) {
            try {
                listener(activity);
            } catch (error) {
                log.error(`Socket activity listener failed on ${activity.type}: ${String(error)}`);
            }
        }
    }
}

export default SocketMonitor;
