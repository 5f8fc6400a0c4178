/**
 * EventDispatcher - single ingestion path, per-subscriber fan-out
 *
 * Subscribes to the protocol client exactly once and hands each event to
 * every registered subscriber through that subscriber's own serial queue:
 *
 * - Events reach a subscriber in arrival order
 * - A slow subscriber never delays another one
 * - The ingestion callback returns immediately and never awaits a subscriber
 */

import pLimit from 'p-limit';
import type { ProtocolClient, ProtocolEvent, ProtocolEventKind } from '../types/protocol.js';
import { createChildLogger } from '../utils/logger.js';

const log = createChildLogger({ module: 'EventDispatcher' });

// ═══════════════════════════════════════════════════════════════════════════════
// SUBSCRIBER INTERFACE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * IEventSubscriber Interface
 *
 * Components that consume protocol events implement this interface.
 * Only `name` and `onEvent` are required.
 */
export interface IEventSubscriber {
    /** Unique identifier for the subscriber */
    readonly name: string;

    /** Event kinds this subscriber consumes; every kind when omitted */
    readonly kinds?: readonly ProtocolEventKind[];

    /**
     * Called once when the dispatcher attaches to the client.
     * Use for enabling the protocol domains the subscriber needs.
     */
    onAttach?(client: ProtocolClient): void | Promise<void>;

    /**
     * Called for each accepted event, one at a time, in arrival order.
     */
    onEvent(event: ProtocolEvent): void | Promise<void>;

    /**
     * Called when the dispatcher closes, after every queued event is delivered.
     */
    onClose?(): void | Promise<void>;

    /**
     * Clear/reset subscriber state.
     */
    clear?(): void;
}

interface SubscriberEntry {
    subscriber: IEventSubscriber;
    accepts: ReadonlySet<ProtocolEventKind> | null;
    queue: ReturnType<typeof pLimit>;
    delivered: number;
    failed: number;
}

export interface SubscriberStats {
    name: string;
    delivered: number;
    failed: number;
    queued: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DISPATCHER CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class EventDispatcher {
    private subscribers: Map<string, SubscriberEntry> = new Map();
    private pending: Set<Promise<void>> = new Set();
    private unsubscribe: (() => void) | null = null;

    constructor(private readonly client: ProtocolClient) {}

    /**
     * Register a subscriber. Duplicate names are skipped.
     */
    register(subscriber: IEventSubscriber): void {
        if (this.subscribers.has(subscriber.name)) {
            log.warn(`Subscriber "${subscriber.name}" is already registered. Skipping.`);
            return;
        }

        this.subscribers.set(subscriber.name, {
            subscriber,
            accepts: subscriber.kinds ? new Set(subscriber.kinds) : null,
            queue: pLimit(1),
            delivered: 0,
            failed: 0,
        });
        log.debug(`Subscriber registered: ${subscriber.name}`);
    }

    /**
     * Unregister a subscriber by name. Events already queued for it are still delivered.
     */
    unregister(name: string): boolean {
        const removed = this.subscribers.delete(name);
        if (removed) {
            log.debug(`Subscriber unregistered: ${name}`);
        }
        return removed;
    }

    getSubscriber(name: string): IEventSubscriber | undefined {
        return this.subscribers.get(name)?.subscriber;
    }

    getSubscriberNames(): string[] {
        return Array.from(this.subscribers.keys());
    }

    get count(): number {
        return this.subscribers.size;
    }

    get isAttached(): boolean {
        return this.unsubscribe !== null;
    }

    /** Deliveries queued or running across all subscribers */
    get pendingCount(): number {
        return this.pending.size;
    }

    getStats(): SubscriberStats[] {
        return Array.from(this.subscribers.values()).map(entry => ({
            name: entry.subscriber.name,
            delivered: entry.delivered,
            failed: entry.failed,
            queued: entry.queue.pendingCount + entry.queue.activeCount,
        }));
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // LIFECYCLE
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Subscribe to the client, then run every subscriber's onAttach.
     * Events sent while the hooks run are queued like any other.
     * A failing onAttach propagates; the dispatcher is left detached.
     */
    async attach(): Promise<void> {
        if (this.unsubscribe) return;

        const unsubscribe = this.client.subscribe(event => this.ingest(event));
        this.unsubscribe = unsubscribe;

        try {
            for (const { subscriber } of this.subscribers.values()) {
                await subscriber.onAttach?.(this.client);
            }
        } catch (error) {
            unsubscribe();
            this.unsubscribe = null;
            throw error;
        }

        log.debug(`Dispatcher attached with ${this.count} subscribers`);
    }

    /**
     * Resolve once every queued delivery has finished, including deliveries
     * queued while draining.
     */
    async drain(): Promise<void> {
        while (this.pending.size > 0) {
            await Promise.all(Array.from(this.pending));
        }
    }

    /**
     * Stop ingesting, deliver what is queued, then run onClose hooks.
     */
    async close(): Promise<void> {
        this.unsubscribe?.();
        this.unsubscribe = null;

        await this.drain();

        for (const [name, { subscriber }] of this.subscribers) {
            try {
                await subscriber.onClose?.();
            } catch (error) {
                log.error(`Subscriber "${name}" error in onClose: ${String(error)}`);
            }
        }
        log.debug(`Dispatched onClose to ${this.count} subscribers`);
    }

    /**
     * Clear all subscriber states.
     */
    clearAll(): void {
        for (const { subscriber } of this.subscribers.values()) {
            subscriber.clear?.();
        }
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // INGESTION
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Enqueue one event for every subscriber that accepts its kind.
     * Public so adapters and tests can push events without a live client.
     */
    ingest(event: ProtocolEvent): void {
        for (const entry of this.subscribers.values()) {
            if (entry.accepts && !entry.accepts.has(event.kind)) continue;

            const delivery = entry.queue(async () => {
                try {
                    await entry.subscriber.onEvent(event);
                    entry.delivered++;
                } catch (error) {
                    entry.failed++;
                    log.error(`Subscriber "${entry.subscriber.name}" error handling ${event.kind}: ${String(error)}`);
                }
            });

            this.pending.add(delivery);
            void delivery.finally(() => this.pending.delete(delivery));
        }
    }
}

export default EventDispatcher;
