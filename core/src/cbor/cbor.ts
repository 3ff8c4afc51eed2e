// core/src/cbor/cbor.ts
// ================================================================================================
// CBOR Frame Codec
// ================================================================================================
//
// Thin layer over @levischuck/tiny-cbor for engagement structures, session envelopes, COSE
// objects and transcripts. Maps are written in insertion order; callers that need a
// canonical order build the Map in it. Library failures surface as MdocError so that the
// codec reports through the same taxonomy as the rest of the core.

import { decodePartialCBOR, encodeCBOR } from '@levischuck/tiny-cbor';
import { type CborKey, type CborMap, type CborValue, CborTagged, CBOR_TAGS } from './types';
import { MdocError, MdocErrorCode, type Result, attempt, describeError } from '../types/errors';

function framingError(message: string, details?: unknown): MdocError {
    return MdocError.protocol(MdocErrorCode.INVALID_FORMAT, message, details);
}

// ===== ENCODE / DECODE =====

/**
 * Encode one data item. Values the library cannot represent are a caller error.
 */
export function encodeCbor(value: CborValue): Uint8Array {
    try {
        return encodeCBOR(value);
    } catch (cause) {
        throw MdocError.precondition(MdocErrorCode.INVALID_INPUT, 'Value cannot be encoded as CBOR', describeError(cause));
    }
}

/**
 * Decode exactly one data item, throwing MdocError(INVALID_FORMAT) on malformed input
 * or trailing bytes.
 */
export function parseCbor(bytes: Uint8Array): CborValue {
    // decode from a fresh buffer so the item starts at offset 0
    const input = bytes.slice();
    let decoded: [CborValue, number];
    try {
        decoded = decodePartialCBOR(input, 0);
    } catch (cause) {
        throw framingError('Malformed CBOR', describeError(cause));
    }

    const [value, consumed] = decoded;
    if (consumed !== input.length) {
        throw framingError(`CBOR item spans ${consumed} bytes, input has ${input.length}`);
    }
    return value;
}

/**
 * Decode exactly one data item
 */
export function decodeCbor(bytes: Uint8Array): Result<CborValue> {
    return attempt(
        () => parseCbor(bytes),
        cause => framingError('CBOR decoding failed', describeError(cause))
    );
}

// ===== EMBEDDED CBOR (TAG 24) =====

/**
 * #6.24(bstr .cbor value)
 */
export function encodeEmbedded(value: CborValue): CborTagged {
    return new CborTagged(CBOR_TAGS.ENCODED_CBOR, encodeCbor(value));
}

/**
 * Wrap already-encoded bytes as #6.24(bstr)
 */
export function tagEncoded(encoded: Uint8Array): CborTagged {
    return new CborTagged(CBOR_TAGS.ENCODED_CBOR, encoded);
}

/**
 * Returns the inner encoded bytes of a tag-24 item
 */
export function embeddedBytes(value: CborValue): Uint8Array {
    if (!(value instanceof CborTagged) || value.tag !== CBOR_TAGS.ENCODED_CBOR) {
        throw framingError('Expected tag 24 wrapping a byte string');
    }
    const inner = value.value;
    if (!(inner instanceof Uint8Array)) {
        throw framingError('Expected tag 24 wrapping a byte string');
    }
    return inner;
}

export function decodeEmbedded(value: CborValue): CborValue {
    return parseCbor(embeddedBytes(value));
}

// ===== TYPED ACCESSORS =====

export function asMap(value: CborValue, what: string): CborMap {
    if (!(value instanceof Map)) throw framingError(`${what} is not a map`);
    return value;
}

export function asArray(value: CborValue, what: string): CborValue[] {
    if (!Array.isArray(value)) throw framingError(`${what} is not an array`);
    return value;
}

export function asBytes(value: CborValue, what: string): Uint8Array {
    if (!(value instanceof Uint8Array)) throw framingError(`${what} is not a byte string`);
    return value;
}

export function asText(value: CborValue, what: string): string {
    if (typeof value !== 'string') throw framingError(`${what} is not a text string`);
    return value;
}

export function asInt(value: CborValue, what: string): number {
    if (typeof value !== 'number' || !Number.isInteger(value)) throw framingError(`${what} is not an integer`);
    return value;
}

export function getRequired(map: CborMap, key: CborKey, what: string): CborValue {
    const value = map.get(key);
    if (value === undefined) throw framingError(`${what} is missing`);
    return value;
}
