/**
 * Unit Tests for EventDispatcher (single ingestion, per-subscriber queues)
 */

import { EventDispatcher, IEventSubscriber } from '../../src/core/EventDispatcher.js';
import type { ProtocolEvent, ProtocolEventKind } from '../../src/types/protocol.js';
import { FakeProtocolClient, flush } from '../helpers/FakeProtocolClient.js';

class RecordingSubscriber implements IEventSubscriber {
    readonly received: ProtocolEvent[] = [];
    attachCalled = false;
    closeCalled = false;
    cleared = false;

    constructor(readonly name: string, readonly kinds?: readonly ProtocolEventKind[]) {}

    onAttach(): void {
        this.attachCalled = true;
    }

    onEvent(event: ProtocolEvent): void {
        this.received.push(event);
    }

    onClose(): void {
        this.closeCalled = true;
    }

    clear(): void {
        this.cleared = true;
    }
}

function finished(requestId: string): ProtocolEvent {
    return { kind: 'loadingFinished', requestId };
}

describe('EventDispatcher', () => {
    let client: FakeProtocolClient;
    let dispatcher: EventDispatcher;

    beforeEach(() => {
        client = new FakeProtocolClient();
        dispatcher = new EventDispatcher(client);
    });

    describe('registration', () => {
        it('should register a subscriber', () => {
            dispatcher.register(new RecordingSubscriber('A'));

            expect(dispatcher.count).toBe(1);
            expect(dispatcher.getSubscriberNames()).toEqual(['A']);
        });

        it('should skip duplicate names', () => {
            const first = new RecordingSubscriber('A');
            dispatcher.register(first);
            dispatcher.register(new RecordingSubscriber('A'));

            expect(dispatcher.count).toBe(1);
            expect(dispatcher.getSubscriber('A')).toBe(first);
        });

        it('should unregister by name', () => {
            dispatcher.register(new RecordingSubscriber('A'));

            expect(dispatcher.unregister('A')).toBe(true);
            expect(dispatcher.unregister('A')).toBe(false);
            expect(dispatcher.count).toBe(0);
        });
    });

    describe('attach', () => {
        it('should run onAttach hooks and subscribe exactly once', async () => {
            const subscriber = new RecordingSubscriber('A');
            dispatcher.register(subscriber);

            await dispatcher.attach();
            await dispatcher.attach();

            expect(subscriber.attachCalled).toBe(true);
            expect(client.listenerCount).toBe(1);
            expect(dispatcher.isAttached).toBe(true);
        });

        it('should deliver events sent while onAttach hooks run', async () => {
            const subscriber = new RecordingSubscriber('A');
            subscriber.onAttach = async () => {
                client.emit(finished('early'));
            };
            dispatcher.register(subscriber);

            await dispatcher.attach();
            await flush();

            expect(subscriber.received).toEqual([finished('early')]);
        });

        it('should unsubscribe again when an onAttach hook fails', async () => {
            const subscriber = new RecordingSubscriber('A');
            subscriber.onAttach = async () => {
                throw new Error('enable rejected');
            };
            dispatcher.register(subscriber);

            await expect(dispatcher.attach()).rejects.toThrow('enable rejected');

            expect(client.listenerCount).toBe(0);
            expect(dispatcher.isAttached).toBe(false);
        });
    });

    describe('delivery', () => {
        it('should deliver events to each subscriber in arrival order', async () => {
            const a = new RecordingSubscriber('A');
            const b = new RecordingSubscriber('B');
            dispatcher.register(a);
            dispatcher.register(b);
            await dispatcher.attach();

            client.emit(finished('1'));
            client.emit(finished('2'));
            client.emit(finished('3'));
            await dispatcher.drain();

            const ids = (events: ProtocolEvent[]) =>
                events.map(event => (event.kind === 'loadingFinished' ? event.requestId : ''));
            expect(ids(a.received)).toEqual(['1', '2', '3']);
            expect(ids(b.received)).toEqual(['1', '2', '3']);
        });

        it('should only deliver accepted kinds', async () => {
            const sockets = new RecordingSubscriber('Sockets', ['socketClosed']);
            dispatcher.register(sockets);
            await dispatcher.attach();

            client.emit(finished('1'));
            client.emit({ kind: 'socketClosed', requestId: 'ws-1' });
            await dispatcher.drain();

            expect(sockets.received).toEqual([{ kind: 'socketClosed', requestId: 'ws-1' }]);
        });

        it('should not let a slow subscriber delay another', async () => {
            let release: () => void = () => undefined;
            const gate = new Promise<void>(resolve => {
                release = resolve;
            });
            const slow: IEventSubscriber = {
                name: 'Slow',
                onEvent: () => gate,
            };
            const fast = new RecordingSubscriber('Fast');
            dispatcher.register(slow);
            dispatcher.register(fast);
            await dispatcher.attach();

            client.emit(finished('1'));
            client.emit(finished('2'));
            await flush();

            expect(fast.received).toHaveLength(2);
            expect(dispatcher.pendingCount).toBeGreaterThan(0);

            release();
            await dispatcher.drain();
            expect(dispatcher.pendingCount).toBe(0);
        });

        it('should count subscriber failures without stopping delivery', async () => {
            let calls = 0;
            dispatcher.register({
                name: 'Flaky',
                onEvent: () => {
                    calls++;
                    if (calls === 1) throw new Error('boom');
                },
            });
            await dispatcher.attach();

            client.emit(finished('1'));
            client.emit(finished('2'));
            await dispatcher.drain();

            expect(dispatcher.getStats()).toEqual([
                { name: 'Flaky', delivered: 1, failed: 1, queued: 0 },
            ]);
        });
    });

    describe('close', () => {
        it('should unsubscribe, drain and run onClose hooks', async () => {
            const subscriber = new RecordingSubscriber('A');
            dispatcher.register(subscriber);
            await dispatcher.attach();

            client.emit(finished('1'));
            await dispatcher.close();

            expect(subscriber.received).toHaveLength(1);
            expect(subscriber.closeCalled).toBe(true);
            expect(client.listenerCount).toBe(0);
            expect(dispatcher.isAttached).toBe(false);
        });

        it('should keep closing when an onClose hook throws', async () => {
            const after = new RecordingSubscriber('After');
            dispatcher.register({
                name: 'Broken',
                onEvent: () => undefined,
                onClose: () => {
                    throw new Error('close failed');
                },
            });
            dispatcher.register(after);
            await dispatcher.attach();

            await expect(dispatcher.close()).resolves.toBeUndefined();
            expect(after.closeCalled).toBe(true);
        });
    });

    it('should clear every subscriber', () => {
        const subscriber = new RecordingSubscriber('A');
        dispatcher.register(subscriber);

        dispatcher.clearAll();

        expect(subscriber.cleared).toBe(true);
    });
});
