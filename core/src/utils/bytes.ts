// core/src/utils/bytes.ts
// Byte helpers shared by the codecs and the session engine

import { bytesToHex, concatBytes, hexToBytes, utf8ToBytes } from '@noble/hashes/utils';

export { bytesToHex, concatBytes, hexToBytes, utf8ToBytes };

export function equalBytes(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) return false;
    let diff = 0;
    for (let i = 0; i < a.length; i++) {
        diff |= a[i] ^ b[i];
    }
    return diff === 0;
}

export function writeUint32BE(value: number): Uint8Array {
    const out = new Uint8Array(4);
    new DataView(out.buffer).setUint32(0, value, false);
    return out;
}

export function readUint32BE(bytes: Uint8Array, offset: number = 0): number {
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(offset, false);
}

/**
 * Big-endian unsigned value of up to four bytes, left-padded with zeroes
 */
export function readUintBE(bytes: Uint8Array): number {
    let value = 0;
    for (const byte of bytes) {
        value = value * 256 + byte;
    }
    return value;
}

