/**
 * Unit Tests for PlaywrightProtocolClient
 *
 * A plain EventEmitter stands in for the Playwright CDP session.
 */

import { EventEmitter } from 'node:events';
import type { CDPSession } from 'playwright';
import { ProtocolCommandError } from '../../src/core/errors.js';
import { PlaywrightProtocolClient, decodePostDataEntries } from '../../src/services/PlaywrightProtocolClient.js';
import { NetworkInterceptor } from '../../src/services/NetworkInterceptor.js';
import type { ProtocolEvent } from '../../src/types/protocol.js';

class FakeCDPSession extends EventEmitter {
    responses: Map<string, unknown> = new Map();
    failures: Map<string, Error> = new Map();
    send = jest.fn(async (method: string, _params?: unknown): Promise<unknown> => {
        const failure = this.failures.get(method);
        if (failure) throw failure;
        return this.responses.get(method) ?? {};
    });
    detach = jest.fn(async (): Promise<void> => undefined);
}

function base64(text: string): string {
    return Buffer.from(text, 'utf8').toString('base64');
}

describe('PlaywrightProtocolClient', () => {
    let session: FakeCDPSession;
    let client: PlaywrightProtocolClient;
    let events: ProtocolEvent[];

    beforeEach(() => {
        session = new FakeCDPSession();
        client = new PlaywrightProtocolClient(session as unknown as CDPSession);
        events = [];
        client.subscribe(event => events.push(event));
    });

    describe('decodePostDataEntries', () => {
        it('should join base64 chunks into text', () => {
            expect(decodePostDataEntries([{ bytes: base64('a=1&') }, { bytes: base64('b=2') }])).toBe('a=1&b=2');
        });

        it('should return undefined without entries', () => {
            expect(decodePostDataEntries(undefined)).toBeUndefined();
            expect(decodePostDataEntries([])).toBeUndefined();
        });
    });

    describe('event translation', () => {
        it('should translate a paused request with its body', () => {
            session.emit('Fetch.requestPaused', {
                requestId: 'f1',
                resourceType: 'XHR',
                request: {
                    url: 'https://a.test/api',
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json' },
                    postDataEntries: [{ bytes: base64('{"a":1}') }],
                },
            });

            expect(events).toEqual([{
                kind: 'requestPaused',
                requestId: 'f1',
                url: 'https://a.test/api',
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                postData: '{"a":1}',
                postDataBase64: base64('{"a":1}'),
                resourceType: 'XHR',
            }]);
        });

        it('should translate WebSocket frames and closes', () => {
            session.emit('Network.webSocketCreated', { requestId: 'ws1', url: 'wss://a.test/' });
            session.emit('Network.webSocketFrameReceived', {
                requestId: 'ws1',
                timestamp: 1,
                response: { opcode: 1, mask: false, payloadData: 'hi' },
            });
            session.emit('Network.webSocketClosed', { requestId: 'ws1', timestamp: 2 });

            expect(events).toEqual([
                { kind: 'socketCreated', requestId: 'ws1', url: 'wss://a.test/' },
                { kind: 'socketFrameReceived', requestId: 'ws1', frame: { opcode: 1, mask: false, payloadData: 'hi' } },
                { kind: 'socketClosed', requestId: 'ws1' },
            ]);
        });

        it('should keep primitive console arguments', () => {
            session.emit('Runtime.consoleAPICalled', {
                type: 'log',
                args: [{ type: 'string', value: 'marker' }, { type: 'object' }],
            });

            expect(events).toEqual([{ kind: 'consoleApiCalled', type: 'log', args: ['marker', undefined] }]);
        });

        it('should keep delivering when a listener throws', () => {
            client.subscribe(() => {
                throw new Error('listener broke');
            });
            const later: ProtocolEvent[] = [];
            client.subscribe(event => later.push(event));

            session.emit('Network.loadingFinished', { requestId: 'r1' });

            expect(later).toEqual([{ kind: 'loadingFinished', requestId: 'r1' }]);
        });
    });

    describe('paused request bodies', () => {
        const bytes = Buffer.from([0xff, 0x00, 0x80, 0xc3, 0x28]);

        it('should keep the exact bytes of a body that is not UTF-8', () => {
            session.emit('Fetch.requestPaused', {
                requestId: 'f1',
                resourceType: 'Fetch',
                request: { url: 'https://a.test/upload', method: 'POST', headers: {}, postDataEntries: [{ bytes: '/wCAwyg=' }] },
            });

            expect(events).toHaveLength(1);
            expect(events[0]).toMatchObject({ kind: 'requestPaused', postDataBase64: '/wCAwyg=' });
        });

        it('should continue an unmatched binary upload without resending its body', async () => {
            const interceptor = new NetworkInterceptor(client);
            const deliveries: Array<Promise<void>> = [];
            client.subscribe(event => {
                deliveries.push(interceptor.onEvent(event));
            });
            await interceptor.addRoute('\\.png$', () => undefined);

            session.emit('Fetch.requestPaused', {
                requestId: 'f1',
                resourceType: 'Fetch',
                request: {
                    url: 'https://a.test/upload',
                    method: 'POST',
                    headers: { 'Content-Type': 'application/octet-stream' },
                    postDataEntries: [{ bytes: bytes.toString('base64') }],
                },
            });
            await Promise.all(deliveries);
            await interceptor.drain();

            expect(session.send).toHaveBeenCalledWith('Fetch.continueRequest', {
                requestId: 'f1',
                url: undefined,
                method: undefined,
                headers: undefined,
                postData: undefined,
            });
        });
    });

    describe('commands', () => {
        it('should send header entries and a base64 body on continue', async () => {
            await client.continueRequest({
                requestId: 'f1',
                method: 'PUT',
                headers: { 'X-Test': '1' },
                postData: 'body',
            });

            expect(session.send).toHaveBeenCalledWith('Fetch.continueRequest', {
                requestId: 'f1',
                url: undefined,
                method: 'PUT',
                headers: [{ name: 'X-Test', value: '1' }],
                postData: 'Ym9keQ==',
            });
        });

        it('should pass the error reason on fail', async () => {
            await client.failRequest('f1', 'BlockedByClient');

            expect(session.send).toHaveBeenCalledWith('Fetch.failRequest', { requestId: 'f1', errorReason: 'BlockedByClient' });
        });

        it('should wrap a failed command with its method name', async () => {
            session.failures.set('Fetch.failRequest', new Error('Target closed'));

            await expect(client.failRequest('f1', 'Failed')).rejects.toThrow(
                new ProtocolCommandError('Fetch.failRequest', 'Target closed')
            );
        });

        it('should return evaluated values', async () => {
            session.responses.set('Runtime.evaluate', { result: { type: 'string', value: 'complete' } });

            await expect(client.evaluate('document.readyState')).resolves.toBe('complete');
            expect(session.send).toHaveBeenCalledWith('Runtime.evaluate', {
                expression: 'document.readyState',
                returnByValue: true,
                awaitPromise: false,
                timeout: undefined,
            });
        });

        it('should turn a page exception into a ProtocolCommandError', async () => {
            session.responses.set('Runtime.evaluate', {
                result: { type: 'object' },
                exceptionDetails: { text: 'Uncaught', exception: { type: 'object', description: 'ReferenceError: x is not defined' } },
            });

            await expect(client.evaluate('x')).rejects.toThrow(
                'Protocol command Runtime.evaluate failed: ReferenceError: x is not defined'
            );
        });

        it('should detach once and stop delivering events', async () => {
            await client.detach();
            await client.detach();
            session.emit('Network.loadingFinished', { requestId: 'r1' });

            expect(session.detach).toHaveBeenCalledTimes(1);
            expect(events).toEqual([]);
        });
    });
});
