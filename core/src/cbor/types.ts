// core/src/cbor/types.ts
// CBOR data model (RFC 8949), as produced and consumed by @levischuck/tiny-cbor

import { CBORTag, type CBORType } from '@levischuck/tiny-cbor';

/**
 * A tagged data item, major type 6
 */
export { CBORTag as CborTagged };

/**
 * Byte strings are Uint8Array, text strings are string, maps are Map
 */
export type CborValue = CBORType;

/** Map keys used by the protocol: integer labels (COSE) and text labels (session messages) */
export type CborKey = string | number;

export type CborMap = Map<CborKey, CborValue>;

export const CBOR_TAGS = {
    ENCODED_CBOR: 24
} as const;
