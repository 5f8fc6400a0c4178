/**
 * Builders for WebSocket protocol events
 */

import type { HeaderMap, ProtocolEvent } from '../../src/types/protocol.js';

export function created(requestId: string, url: string): ProtocolEvent {
    return { kind: 'socketCreated', requestId, url };
}

export function handshake(requestId: string, headers: HeaderMap = {}): ProtocolEvent {
    return { kind: 'socketHandshakeResponse', requestId, status: 101, statusText: 'Switching Protocols', headers };
}

export function received(requestId: string, payloadData: string, opcode = 1): ProtocolEvent {
    return { kind: 'socketFrameReceived', requestId, frame: { opcode, mask: false, payloadData } };
}

export function sent(requestId: string, payloadData: string, opcode = 1): ProtocolEvent {
    return { kind: 'socketFrameSent', requestId, frame: { opcode, mask: true, payloadData } };
}

export function frameError(requestId: string, errorMessage: string): ProtocolEvent {
    return { kind: 'socketFrameError', requestId, errorMessage };
}

export function closed(requestId: string): ProtocolEvent {
    return { kind: 'socketClosed', requestId };
}

/** Base64 close-frame payload: big-endian code followed by the UTF-8 reason */
export function closePayload(code: number, reason: string): string {
    const reasonBytes = Buffer.from(reason, 'utf8');
    const bytes = Buffer.alloc(2 + reasonBytes.length);
    bytes.writeUInt16BE(code, 0);
    reasonBytes.copy(bytes, 2);
    return bytes.toString('base64');
}
