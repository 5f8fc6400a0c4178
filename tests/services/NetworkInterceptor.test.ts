/**
 * Unit Tests for NetworkInterceptor
 *
 * Tests route matching, the handler policy and exactly-once resolution.
 */

import { InvalidPatternError, ProtocolCommandError, RequestNotInterceptedError, WaitTimeoutError } from '../../src/core/errors.js';
import type { InterceptedRequest } from '../../src/services/InterceptedRequest.js';
import { NetworkInterceptor } from '../../src/services/NetworkInterceptor.js';
import type { RequestPausedEvent } from '../../src/types/protocol.js';
import { FakeProtocolClient, delay } from '../helpers/FakeProtocolClient.js';

function paused(requestId: string, url: string, overrides: Partial<RequestPausedEvent> = {}): RequestPausedEvent {
    return {
        kind: 'requestPaused',
        requestId,
        url,
        method: 'GET',
        headers: { Accept: '*/*' },
        resourceType: 'Image',
        ...overrides,
    };
}

describe('NetworkInterceptor', () => {
    let client: FakeProtocolClient;
    let interceptor: NetworkInterceptor;

    beforeEach(() => {
        client = new FakeProtocolClient();
        interceptor = new NetworkInterceptor(client);
    });

    async function pause(event: RequestPausedEvent): Promise<void> {
        await interceptor.onEvent(event);
        await interceptor.drain();
    }

    describe('routes', () => {
        it('should enable interception once when routes are added', async () => {
            await interceptor.addRoute('.*\\.png', () => undefined);
            await interceptor.addRoute('.*\\.css', () => undefined);

            expect(client.commandsOf('enableInterception')).toEqual([
                { method: 'enableInterception', patterns: ['*'] },
            ]);
            expect(interceptor.isInterceptionEnabled).toBe(true);
            expect(interceptor.routeCount).toBe(2);
        });

        it('should reject an invalid pattern', async () => {
            await expect(interceptor.addRoute('([', () => undefined)).rejects.toBeInstanceOf(InvalidPatternError);
            expect(interceptor.routeCount).toBe(0);
        });

        it('should run only the first matching route', async () => {
            const first = jest.fn(async (request: InterceptedRequest) => {
                await request.fulfill({ body: 'first' });
            });
            const second = jest.fn();
            await interceptor.addRoute('.*\\.png', first);
            await interceptor.addRoute('logo', second);

            await pause(paused('r1', 'https://cdn.test/logo.png'));

            expect(first).toHaveBeenCalledTimes(1);
            expect(second).not.toHaveBeenCalled();
        });

        it('should fail a .png request aborted with "failed"', async () => {
            await interceptor.addRoute('.*\\.png', request => request.abort('failed'));

            await pause(paused('r1', 'https://cdn.test/logo.png'));

            expect(client.commandsOf('failRequest')).toEqual([
                { method: 'failRequest', requestId: 'r1', reason: 'Failed' },
            ]);
        });

        it('should continue unmatched requests without overriding any field', async () => {
            await interceptor.addRoute('.*\\.png', () => undefined);

            await pause(paused('r1', 'https://cdn.test/app.js', { method: 'POST', postData: 'a=1' }));

            expect(client.commandsOf('continueRequest')).toEqual([
                {
                    method: 'continueRequest',
                    params: { requestId: 'r1', url: undefined, method: undefined, headers: undefined, postData: undefined },
                },
            ]);
        });
    });

    describe('handler policy', () => {
        it('should continue a request the handler left undecided', async () => {
            await interceptor.addRoute('.*', () => undefined);

            await pause(paused('r1', 'https://a.test/'));

            expect(client.commandsOf('continueRequest')).toHaveLength(1);
            expect(interceptor.getPendingRequestIds()).toEqual([]);
        });

        it('should abort with "Failed" and record the error when the handler throws', async () => {
            await interceptor.addRoute('api', () => {
                throw new Error('handler broke');
            });

            await pause(paused('r1', 'https://a.test/api/users'));

            expect(client.commandsOf('failRequest')).toEqual([
                { method: 'failRequest', requestId: 'r1', reason: 'Failed' },
            ]);
            const errors = interceptor.getRouteErrors();
            expect(errors).toHaveLength(1);
            expect(errors[0].pattern).toBe('api');
            expect(errors[0].url).toBe('https://a.test/api/users');
            expect(errors[0].error.message).toBe('handler broke');
        });

        it('should keep the decision a handler made before throwing', async () => {
            await interceptor.addRoute('api', async request => {
                await request.fulfill({ status: 204 });
                throw new Error('late failure');
            });

            await pause(paused('r1', 'https://a.test/api'));

            expect(client.commandsOf('fulfillRequest')).toHaveLength(1);
            expect(client.commandsOf('failRequest')).toHaveLength(0);
            expect(interceptor.getRouteErrors()).toHaveLength(1);
        });

        it('should limit how many handlers run at once', async () => {
            interceptor = new NetworkInterceptor(client, { handlerConcurrency: 1 });
            let running = 0;
            let maxRunning = 0;
            await interceptor.addRoute('.*', async request => {
                running++;
                maxRunning = Math.max(maxRunning, running);
                await delay(10);
                running--;
                await request.continue();
            });

            await interceptor.onEvent(paused('r1', 'https://a.test/1'));
            await interceptor.onEvent(paused('r2', 'https://a.test/2'));
            await interceptor.drain();

            expect(maxRunning).toBe(1);
            expect(client.commandsOf('continueRequest')).toHaveLength(2);
        });
    });

    describe('exactly-once resolution', () => {
        it('should reject every decision after the first', async () => {
            let captured: InterceptedRequest | undefined;
            const outcomes: unknown[] = [];
            await interceptor.addRoute('.*', async request => {
                captured = request;
                await request.continue();
                outcomes.push(await request.abort().then(() => 'resolved', (error: unknown) => error));
                outcomes.push(await request.fulfill().then(() => 'resolved', (error: unknown) => error));
            });

            await pause(paused('r1', 'https://a.test/'));

            expect(outcomes).toHaveLength(2);
            expect(outcomes[0]).toBeInstanceOf(RequestNotInterceptedError);
            expect(outcomes[1]).toBeInstanceOf(RequestNotInterceptedError);
            expect(captured?.resolution).toBe('continued');
            expect(client.commandsOf('continueRequest')).toHaveLength(1);
            expect(client.commandsOf('failRequest')).toHaveLength(0);
            expect(client.commandsOf('fulfillRequest')).toHaveLength(0);
        });

        it('should let only one of two racing decisions through', async () => {
            await interceptor.addRoute('.*', async request => {
                const results = await Promise.allSettled([request.continue(), request.abort()]);
                expect(results.map(result => result.status)).toEqual(['fulfilled', 'rejected']);
            });

            await pause(paused('r1', 'https://a.test/'));

            expect(client.commandsOf('continueRequest')).toHaveLength(1);
            expect(client.commandsOf('failRequest')).toHaveLength(0);
            expect(interceptor.getRouteErrors()).toEqual([]);
        });
    });

    describe('decisions', () => {
        it('should send overridden url and headers on continue', async () => {
            await interceptor.addRoute('.*', request =>
                request.continue({ url: 'https://b.test/', headers: { 'X-Test': '1' } })
            );

            await pause(paused('r1', 'https://a.test/'));

            expect(client.commandsOf('continueRequest')[0].params).toEqual({
                requestId: 'r1',
                url: 'https://b.test/',
                method: undefined,
                headers: { 'X-Test': '1' },
                postData: undefined,
            });
        });

        it('should send a replacement body only when one is given', async () => {
            await interceptor.addRoute('.*', request => request.continue({ method: 'PUT', postData: 'b=2' }));

            await pause(paused('r1', 'https://a.test/', { method: 'POST', postData: 'a=1' }));

            expect(client.commandsOf('continueRequest')[0].params).toMatchObject({ method: 'PUT', postData: 'b=2' });
        });

        it('should release a request whose command failed so it can be resolved again', async () => {
            client.failingCommands.add('continueRequest');
            const outcomes: string[] = [];
            await interceptor.addRoute('.*', async request => {
                await request.continue().catch((error: unknown) => {
                    outcomes.push(error instanceof ProtocolCommandError ? 'continue failed' : 'unexpected');
                });
                outcomes.push(request.isResolved ? 'resolved' : 'pending');
                await request.abort();
                outcomes.push(request.resolution ?? 'none');
            });

            await pause(paused('r1', 'https://a.test/'));

            expect(outcomes).toEqual(['continue failed', 'pending', 'aborted']);
            expect(client.commandsOf('failRequest')).toEqual([
                { method: 'failRequest', requestId: 'r1', reason: 'Aborted' },
            ]);
            expect(interceptor.getRouteErrors()).toEqual([]);
        });

        it('should encode a fulfilled body and set its content type', async () => {
            await interceptor.addRoute('.*', request =>
                request.fulfill({ body: 'hello', contentType: 'text/plain' })
            );

            await pause(paused('r1', 'https://a.test/'));

            expect(client.commandsOf('fulfillRequest')[0].params).toEqual({
                requestId: 'r1',
                status: 200,
                statusText: undefined,
                headers: { 'Content-Type': 'text/plain' },
                body: 'aGVsbG8=',
            });
        });

        it('should map unknown abort reasons to Aborted', async () => {
            await interceptor.addRoute('.*', request => request.abort('gone fishing'));

            await pause(paused('r1', 'https://a.test/'));

            expect(client.commandsOf('failRequest')[0].reason).toBe('Aborted');
        });

        it('should drop a request whose default continue failed', async () => {
            client.failingCommands.add('continueRequest');

            await pause(paused('r1', 'https://a.test/'));

            expect(client.commandsOf('continueRequest')).toHaveLength(1);
            expect(interceptor.getPendingRequestIds()).toEqual([]);
        });

        it('should expose the exact body bytes to handlers', async () => {
            const bodies: Array<Buffer | undefined> = [];
            await interceptor.addRoute('.*', request => {
                bodies.push(request.postDataBuffer());
            });

            await pause(paused('r1', 'https://a.test/upload', { method: 'POST', postData: '\uFFFD\u0000', postDataBase64: '/wCAwyg=' }));

            expect(bodies).toEqual([Buffer.from([0xff, 0x00, 0x80, 0xc3, 0x28])]);
        });
    });

    describe('request and response tables', () => {
        it('should return the most recent matching request, history included', async () => {
            await interceptor.onEvent({ kind: 'requestWillBeSent', requestId: 'r1', url: 'https://a.test/api/1', method: 'GET', headers: {} });
            await interceptor.onEvent({ kind: 'requestWillBeSent', requestId: 'r2', url: 'https://a.test/api/2', method: 'GET', headers: {} });

            const match = await interceptor.waitForRequest(/api/, { timeoutMs: 500 });

            expect(match.requestId).toBe('r2');
        });

        it('should resolve when a matching response arrives later', async () => {
            const wait = interceptor.waitForResponse('data\\.json', { timeoutMs: 1000 });
            setTimeout(() => {
                void interceptor.onEvent({
                    kind: 'responseReceived',
                    requestId: 'r1',
                    url: 'https://a.test/data.json',
                    status: 200,
                    statusText: 'OK',
                    headers: {},
                    mimeType: 'application/json',
                });
            }, 20);

            await expect(wait).resolves.toMatchObject({ requestId: 'r1', status: 200 });
        });

        it('should time out when nothing matches', async () => {
            await expect(interceptor.waitForRequest('never', { timeoutMs: 30 })).rejects.toBeInstanceOf(WaitTimeoutError);
        });

        it('should throw at once for an invalid pattern', () => {
            expect(() => interceptor.waitForRequest('([')).toThrow(InvalidPatternError);
        });

        it('should keep only the newest entries past the history limit', async () => {
            interceptor = new NetworkInterceptor(client, { historyLimit: 2 });
            for (const id of ['r1', 'r2', 'r3']) {
                await interceptor.onEvent({ kind: 'requestWillBeSent', requestId: id, url: `https://a.test/${id}`, method: 'GET', headers: {} });
            }

            expect(interceptor.getRequests().map(entry => entry.requestId)).toEqual(['r2', 'r3']);
        });
    });
});
