/**
 * SocketWaiter Service
 *
 * Declarative waits over the SocketMonitor's connection view. Each wait
 * re-evaluates its condition whenever the monitor reports a connection or
 * frame change, and on the poll interval otherwise, until it holds or the
 * timeout elapses.
 */

import type { ChangeNotifier, ChangeTopic } from '../core/ChangeNotifier.js';
import { ConnectionNotFoundError, ObserverError, SocketSequenceError, toError } from '../core/errors.js';
import {
    buildSocketWaitOptions,
    withDataPattern,
    withMessageCount,
    type SocketWaitOption,
    type SocketWaitOptions,
} from '../config/socket-wait.config.js';
import { assertNever } from '../types/protocol.js';
import { matchesMessage, matchesUrl } from '../utils/pattern.js';
import { pollUntil, type Probe } from '../utils/wait.js';
import { createChildLogger } from '../utils/logger.js';
import {
    snapshotConnection,
    type FrameType,
    type SocketActivity,
    type SocketConnection,
    type SocketConnectionSummary,
    type SocketFrame,
    type SocketMonitor,
    type SocketState,
} from './SocketMonitor.js';

const log = createChildLogger({ module: 'SocketWaiter' });

export type FrameCondition = 'text_frame' | 'binary_frame' | 'close_frame' | 'ping_frame' | 'pong_frame';

export type SocketCondition =
    | SocketState
    | FrameCondition
    | 'message'
    | 'first_message'
    | 'last_message'
    | 'error';

export type FrameCallback = (connection: SocketConnectionSummary, frame: SocketFrame) => void;

const WAKE_TOPICS: readonly ChangeTopic[] = ['connection', 'frame'];

const FRAME_CONDITIONS: Readonly<Record<FrameCondition, FrameType>> = {
    text_frame: 'text',
    binary_frame: 'binary',
    close_frame: 'close',
    ping_frame: 'ping',
    pong_frame: 'pong',
};

const STATE_ORDER: Readonly<Record<SocketState, number>> = {
    connecting: 0,
    open: 1,
    closing: 2,
    closed: 3,
};

type ConnectionView = Readonly<SocketConnection>;

/**
 * Direction and payload filters shared by every frame-based condition.
 * Message and data patterns must both match when both are set.
 */
export function frameMatches(frame: SocketFrame, options: SocketWaitOptions): boolean {
    if (options.direction !== '' && frame.direction !== options.direction) {
        return false;
    }
    return payloadMatches(frame.payload, options);
}

function payloadMatches(payload: string, options: SocketWaitOptions): boolean {
    return (
        matchesMessage(payload, options.dataPattern, options.caseSensitive) &&
        matchesMessage(payload, options.messagePattern, options.caseSensitive)
    );
}

function countAtLeast(frames: readonly SocketFrame[], required: number, accept: (frame: SocketFrame) => boolean): boolean {
    let matched = 0;
    for (const frame of frames) {
        if (accept(frame) && ++matched >= required) return true;
    }
    return false;
}

/**
 * Whether one connection satisfies a condition under the given options.
 */
export function connectionSatisfies(
    connection: ConnectionView,
    condition: SocketCondition,
    options: SocketWaitOptions
): boolean {
    switch (condition) {
        case 'connecting':
        case 'open':
        case 'closing':
        case 'closed':
            return connection.state === condition;
        case 'text_frame':
        case 'binary_frame':
        case 'close_frame':
        case 'ping_frame':
        case 'pong_frame': {
            const type = FRAME_CONDITIONS[condition];
            return countAtLeast(
                connection.frames,
                options.messageCount,
                frame => frame.type === type && frameMatches(frame, options)
            );
        }
        case 'message':
            return countAtLeast(connection.frames, options.messageCount, frame => frameMatches(frame, options));
        case 'first_message':
            return connection.frames.some(
                frame => frame.direction === 'received' && frameMatches(frame, options)
            );
        case 'last_message': {
            if (connection.state !== 'closed') return false;
            const received = connection.frames.filter(frame => frame.direction === 'received');
            const last = received[received.length - 1];
            return last !== undefined && payloadMatches(last.payload, options);
        }
        case 'error':
            return connection.errors.some(error => payloadMatches(error.message, options));
        default:
            return assertNever(condition);
    }
}

export class SocketWaiter {
    constructor(
        private readonly monitor: SocketMonitor,
        private readonly notifier: ChangeNotifier
    ) {}

    /**
     * Wait until any connection whose URL matches satisfies the condition.
     * @returns snapshot of the first satisfying connection
     */
    async waitFor(condition: SocketCondition, ...options: SocketWaitOption[]): Promise<SocketConnection> {
        const resolved = buildSocketWaitOptions(options);
        await this.monitor.enable();

        return this.poll(resolved, `socket condition "${condition}" (url ${resolved.urlPattern || '*'})`, () => {
            for (const connection of this.monitor.view()) {
                if (
                    matchesUrl(connection.url, resolved.urlPattern) &&
                    connectionSatisfies(connection, condition, resolved)
                ) {
                    return snapshotConnection(connection);
                }
            }
            return undefined;
        });
    }

    /**
     * Wait until a specific connection has reached `state` (or a later one).
     * @throws ConnectionNotFoundError if the id has never been seen
     */
    async waitForConnection(
        id: string,
        state: SocketState,
        ...options: SocketWaitOption[]
    ): Promise<SocketConnection> {
        const resolved = buildSocketWaitOptions(options);
        if (!this.monitor.hasConnection(id)) {
            throw new ConnectionNotFoundError(id);
        }

        return this.poll(resolved, `socket ${id} to reach "${state}"`, () => {
            const connection = this.monitor.view().find(candidate => candidate.id === id);
            if (connection && STATE_ORDER[connection.state] >= STATE_ORDER[state]) {
                return snapshotConnection(connection);
            }
            return undefined;
        });
    }

    /**
     * Wait until `count` frames match the filters.
     * @returns the first `count` matching frames in receipt order
     */
    async waitForMessages(count: number, ...options: SocketWaitOption[]): Promise<SocketFrame[]> {
        const resolved = buildSocketWaitOptions([withMessageCount(count), ...options]);
        await this.monitor.enable();

        return this.poll(resolved, `${resolved.messageCount} socket message(s)`, () => {
            const frames = this.matchingFrames(resolved);
            return frames.length >= resolved.messageCount
                ? frames.slice(0, resolved.messageCount)
                : undefined;
        });
    }

    /**
     * Wait for the first frame whose payload matches `pattern`.
     */
    async waitForData(pattern: string, ...options: SocketWaitOption[]): Promise<SocketFrame> {
        const resolved = buildSocketWaitOptions([withDataPattern(pattern), ...options]);
        await this.monitor.enable();

        return this.poll(resolved, `socket data matching "${resolved.dataPattern}"`, () => {
            return this.matchingFrames(resolved)[0];
        });
    }

    /**
     * Resolve once no matching frame has arrived for `idleMs`. The idle clock
     * starts at the call and restarts on every matching frame.
     */
    async waitForIdle(idleMs: number, ...options: SocketWaitOption[]): Promise<void> {
        const resolved = buildSocketWaitOptions(options);
        await this.monitor.enable();
        const startedAt = Date.now();

        await this.poll(resolved, `socket idle for ${idleMs}ms`, () => {
            let lastActivity = startedAt;
            for (const frame of this.matchingFrames(resolved)) {
                if (frame.timestamp > lastActivity) lastActivity = frame.timestamp;
            }
            return Date.now() - lastActivity >= idleMs ? true : undefined;
        });
    }

    /**
     * Waiter that applies the same options to a series of conditions.
     */
    createEventWaiter(...options: SocketWaitOption[]): SocketEventWaiter {
        // Fail fast on invalid options
        buildSocketWaitOptions(options);
        return new SocketEventWaiter(this, this.monitor, options);
    }

    private matchingFrames(options: SocketWaitOptions): SocketFrame[] {
        const frames: SocketFrame[] = [];
        for (const connection of this.monitor.view()) {
            if (!matchesUrl(connection.url, options.urlPattern)) continue;
            for (const frame of connection.frames) {
                if (frameMatches(frame, options)) frames.push(frame);
            }
        }
        return frames;
    }

    private poll<T>(options: SocketWaitOptions, description: string, probe: Probe<T>): Promise<T> {
        log.debug(`Waiting for ${description}`);
        return pollUntil(probe, {
            description,
            timeoutMs: options.timeoutMs,
            intervalMs: options.pollIntervalMs,
            signal: options.signal,
            wakeOn: { notifier: this.notifier, topics: WAKE_TOPICS },
        });
    }
}

export class SocketEventWaiter {
    constructor(
        private readonly waiter: SocketWaiter,
        private readonly monitor: SocketMonitor,
        private readonly options: readonly SocketWaitOption[]
    ) {}

    waitForEvent(condition: SocketCondition): Promise<SocketConnection> {
        return this.waiter.waitFor(condition, ...this.options);
    }

    /**
     * Wait for each condition in turn; the first failure propagates as is.
     */
    async waitForMultipleEvents(conditions: readonly SocketCondition[]): Promise<SocketConnection[]> {
        const results: SocketConnection[] = [];
        for (const condition of conditions) {
            results.push(await this.waitForEvent(condition));
        }
        return results;
    }

    /**
     * Wait for each condition in turn.
     * @throws SocketSequenceError naming the condition and its position
     */
    async waitForSequence(conditions: readonly SocketCondition[]): Promise<SocketConnection[]> {
        const results: SocketConnection[] = [];
        for (const [index, condition] of conditions.entries()) {
            try {
                results.push(await this.waitForEvent(condition));
            } catch (error) {
                if (error instanceof ObserverError) {
                    throw new SocketSequenceError(condition, index, error);
                }
                throw toError(error);
            }
        }
        return results;
    }

    /**
     * Invoke `callback` for every frame until the condition holds, then detach.
     */
    async waitWithCallback(condition: SocketCondition, callback: FrameCallback): Promise<SocketConnection> {
        const unsubscribe = this.monitor.subscribe((activity: SocketActivity) => {
            if (activity.type === 'frame') {
                callback(activity.connection, activity.frame);
            }
        });
        try {
            return await this.waitForEvent(condition);
        } finally {
            unsubscribe();
        }
    }
}

export default SocketWaiter;
