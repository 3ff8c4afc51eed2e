// core/src/crypto/transcript.ts
// Session transcript, DeviceAuthentication and BLE Ident construction

import { hkdf } from '@noble/hashes/hkdf';
import { sha256 } from '@noble/hashes/sha2';
import type { CborValue } from '../cbor/types';
import { encodeCbor, parseCbor, tagEncoded } from '../cbor/cbor';
import { EcPublicKey } from './keypair';
import { ENCRYPTION_CONFIG } from '../types/crypto';
import { utf8ToBytes } from '../utils/bytes';

/**
 * SessionTranscript = [DeviceEngagementBytes, EReaderKeyBytes, Handover]
 *
 * Both byte inputs are the plain encodings; they are wrapped in tag 24 here.
 * `handover` is null for QR engagement.
 */
export function buildSessionTranscript(
    deviceEngagement: Uint8Array,
    eReaderKey: Uint8Array,
    handover: CborValue
): Uint8Array {
    return encodeCbor([tagEncoded(deviceEngagement), tagEncoded(eReaderKey), handover]);
}

/**
 * EDeviceKeyBytes = #6.24(bstr .cbor COSE_Key)
 */
export function encodeKeyBytes(key: EcPublicKey): Uint8Array {
    return encodeCbor(tagEncoded(key.encodeCoseKey()));
}

/**
 * Expected value of the Ident characteristic for a given EDeviceKey
 */
export function deriveBleIdent(eDeviceKey: EcPublicKey): Uint8Array {
    return hkdf(
        sha256,
        encodeKeyBytes(eDeviceKey),
        new Uint8Array(0),
        utf8ToBytes(ENCRYPTION_CONFIG.INFO_BLE_IDENT),
        ENCRYPTION_CONFIG.IDENT_SIZE
    );
}

/**
 * SHA-256 over #6.24(bstr .cbor SessionTranscript); the HKDF salt for all session keys
 */
export function transcriptSalt(sessionTranscript: Uint8Array): Uint8Array {
    return sha256(encodeCbor(tagEncoded(sessionTranscript)));
}

/**
 * DeviceAuthenticationBytes = #6.24(bstr .cbor
 *     ["DeviceAuthentication", SessionTranscript, DocType, DeviceNameSpacesBytes])
 *
 * `deviceNameSpaces` is the plain encoding of the DeviceNameSpaces map.
 */
export function buildDeviceAuthenticationBytes(
    sessionTranscript: Uint8Array,
    docType: string,
    deviceNameSpaces: Uint8Array
): Uint8Array {
    const deviceAuthentication = encodeCbor([
        'DeviceAuthentication',
        parseCbor(sessionTranscript),
        docType,
        tagEncoded(deviceNameSpaces)
    ]);
    return encodeCbor(tagEncoded(deviceAuthentication));
}
