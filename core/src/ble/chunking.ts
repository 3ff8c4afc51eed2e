// core/src/ble/chunking.ts
/**
 * Chunking codec for the attribute-size-limited characteristic exchange.
 *
 * Every chunk is one marker byte followed by a payload slice:
 *
 *   0x01 | payload   more chunks follow
 *   0x00 | payload   last chunk of the message
 *
 * A zero-length message is reserved as the shutdown sentinel and travels as the
 * single byte 0x00. The socket path does not chunk; it frames each message with
 * a 4-byte big-endian length prefix instead.
 */

import { BLE_CONFIG } from './types';
import { MdocError, MdocErrorCode, type Result, ok, err } from '../types/errors';
import { concatBytes, readUint32BE, writeUint32BE } from '../utils/bytes';

export const CHUNK_MARKER = {
    LAST: 0x00,
    MORE: 0x01
} as const;

export const SHUTDOWN_CHUNK: Uint8Array = Uint8Array.of(CHUNK_MARKER.LAST);

export type ChunkDecodeOutput =
    | { type: 'pending' }
    | { type: 'message'; message: Uint8Array }
    | { type: 'shutdown' };

export interface ReassemblyStep {
    buffered: Uint8Array;
    output: ChunkDecodeOutput;
}

/**
 * Usable attribute value size for a negotiated MTU
 */
export function attributeSizeForMtu(mtu: number): number {
    const effective = Math.max(mtu, BLE_CONFIG.DEFAULT_MTU);
    return Math.min(effective - BLE_CONFIG.ATT_HEADER_SIZE, BLE_CONFIG.MAX_ATTRIBUTE_SIZE);
}

/**
 * Split a message into marker-prefixed chunks of at most `maxPayload` payload bytes
 */
export function encodeChunks(message: Uint8Array, maxPayload: number): Uint8Array[] {
    if (!Number.isInteger(maxPayload) || maxPayload < 1) {
        throw MdocError.precondition(
            MdocErrorCode.INVALID_INPUT,
            `Chunk payload size must be a positive integer, got ${maxPayload}`
        );
    }

    if (message.length === 0) {
        return [SHUTDOWN_CHUNK.slice()];
    }

    const chunks: Uint8Array[] = [];
    for (let offset = 0; offset < message.length; offset += maxPayload) {
        const end = Math.min(offset + maxPayload, message.length);
        const chunk = new Uint8Array(1 + end - offset);
        chunk[0] = end < message.length ? CHUNK_MARKER.MORE : CHUNK_MARKER.LAST;
        chunk.set(message.subarray(offset, end), 1);
        chunks.push(chunk);
    }
    return chunks;
}

/**
 * Pure reassembly step: append one received chunk to the buffered payload
 */
export function appendChunk(buffered: Uint8Array, chunk: Uint8Array): Result<ReassemblyStep> {
    if (chunk.length === 0) {
        return err(MdocError.protocol(MdocErrorCode.INVALID_CHUNK, 'Received empty chunk, expected a marker byte'));
    }

    const marker = chunk[0];
    const payload = chunk.subarray(1);

    switch (marker) {
        case CHUNK_MARKER.MORE:
            return ok({ buffered: concatBytes(buffered, payload), output: { type: 'pending' } });

        case CHUNK_MARKER.LAST: {
            if (buffered.length === 0 && payload.length === 0) {
                return ok({ buffered: new Uint8Array(0), output: { type: 'shutdown' } });
            }
            const message = concatBytes(buffered, payload);
            return ok({ buffered: new Uint8Array(0), output: { type: 'message', message } });
        }

        default:
            return err(MdocError.protocol(
                MdocErrorCode.INVALID_CHUNK_MARKER,
                `Invalid chunk marker 0x${marker.toString(16).padStart(2, '0')}`
            ));
    }
}

/**
 * Stateful wrapper around appendChunk(). After a framing error the decoder is
 * poisoned and rejects all further input.
 */
export class ChunkDecoder {
    private buffered: Uint8Array = new Uint8Array(0);
    private failure: MdocError | null = null;

    push(chunk: Uint8Array): Result<ChunkDecodeOutput> {
        if (this.failure) {
            return err(this.failure);
        }
        const step = appendChunk(this.buffered, chunk);
        if (!step.ok) {
            this.failure = step.error;
            this.buffered = new Uint8Array(0);
            return step;
        }
        this.buffered = step.value.buffered;
        return ok(step.value.output);
    }

    get bufferedLength(): number {
        return this.buffered.length;
    }

    reset(): void {
        this.buffered = new Uint8Array(0);
        this.failure = null;
    }
}

// ===== SOCKET FRAMING =====

export function frameSocketMessage(message: Uint8Array): Uint8Array {
    return concatBytes(writeUint32BE(message.length), message);
}

/**
 * Reassembles length-prefixed messages from arbitrary socket read boundaries
 */
export class SocketFrameReader {
    private pending: Uint8Array = new Uint8Array(0);

    push(bytes: Uint8Array): Uint8Array[] {
        this.pending = concatBytes(this.pending, bytes);
        const messages: Uint8Array[] = [];

        while (this.pending.length >= BLE_CONFIG.SOCKET_LENGTH_PREFIX) {
            const length = readUint32BE(this.pending);
            const total = BLE_CONFIG.SOCKET_LENGTH_PREFIX + length;
            if (this.pending.length < total) break;
            messages.push(this.pending.slice(BLE_CONFIG.SOCKET_LENGTH_PREFIX, total));
            this.pending = this.pending.slice(total);
        }
        return messages;
    }

    get pendingLength(): number {
        return this.pending.length;
    }
}
