// core/src/crypto/cose.ts
// ================================================================================================
// COSE_Sign1 and COSE_Mac0 (RFC 9052)
// ================================================================================================
//
// Signatures travel in the fixed-width r || s form (each half zero-left-padded to the curve's
// coordinate size). Signers in this package and in platform key stores produce DER, so both
// directions of the conversion live here.

import { DER } from '@noble/curves/abstract/weierstrass';
import { bytesToNumberBE, numberToBytesBE } from '@noble/curves/abstract/utils';
import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha2';
import { type CborKey, type CborMap, CborTagged, type CborValue } from '../cbor/types';
import { encodeCbor, parseCbor, asArray, asBytes, asMap, asInt } from '../cbor/cbor';
import { EcKeyPair, EcPublicKey, curveInfo, hashForAlgorithm } from './keypair';
import { CoseAlgorithm, EcCurve } from '../types/crypto';
import { MdocError, MdocErrorCode, type Result, attempt, describeError } from '../types/errors';
import { equalBytes, hexToBytes } from '../utils/bytes';

export const COSE_HEADER = {
    ALG: 1,
    X5CHAIN: 33
} as const;

export const COSE_TAG = {
    SIGN1: 18,
    MAC0: 17
} as const;

export interface CoseSign1 {
    /** Encoded protected header map, as signed */
    protectedHeaders: Uint8Array;
    unprotectedHeaders: CborMap;
    /** null when the payload is detached */
    payload: Uint8Array | null;
    /** r || s, fixed width */
    signature: Uint8Array;
}

export interface CoseMac0 {
    protectedHeaders: Uint8Array;
    unprotectedHeaders: CborMap;
    payload: Uint8Array | null;
    tag: Uint8Array;
}

export interface CoseSign1Options {
    /** Leave the payload out of the structure; the verifier supplies it */
    detached?: boolean;
    /** DER certificates, leaf first, placed under x5chain */
    certificateChain?: Uint8Array[];
}

function curveForAlgorithm(algorithm: number): EcCurve | undefined {
    switch (algorithm) {
        case CoseAlgorithm.ES256: return EcCurve.P256;
        case CoseAlgorithm.ES384: return EcCurve.P384;
        case CoseAlgorithm.ES512: return EcCurve.P521;
        default: return undefined;
    }
}

function invalidInput(message: string): MdocError {
    return MdocError.crypto(MdocErrorCode.INVALID_INPUT, message);
}

// ===== SIGNATURE FORMAT CONVERSION =====

/**
 * DER ECDSA-Sig-Value to fixed-width r || s
 */
export function signatureDerToRaw(der: Uint8Array, coordinateSize: number): Uint8Array {
    let parsed: { r: bigint; s: bigint };
    try {
        parsed = DER.toSig(der);
    } catch (cause) {
        throw MdocError.crypto(MdocErrorCode.INVALID_SIGNATURE, 'Malformed DER signature', describeError(cause));
    }
    const raw = new Uint8Array(coordinateSize * 2);
    raw.set(numberToBytesBE(parsed.r, coordinateSize), 0);
    raw.set(numberToBytesBE(parsed.s, coordinateSize), coordinateSize);
    return raw;
}

/**
 * Fixed-width r || s to DER ECDSA-Sig-Value
 */
export function signatureRawToDer(raw: Uint8Array): Uint8Array {
    if (raw.length === 0 || raw.length % 2 !== 0) {
        throw MdocError.crypto(MdocErrorCode.INVALID_SIGNATURE, `Raw signature length ${raw.length} is not even`);
    }
    const half = raw.length / 2;
    const r = bytesToNumberBE(raw.subarray(0, half));
    const s = bytesToNumberBE(raw.subarray(half));
    return hexToBytes(DER.hexFromSig({ r, s }));
}

// ===== TO-BE-SIGNED STRUCTURES =====

export function buildSigStructure(
    protectedHeaders: Uint8Array,
    payload: Uint8Array,
    externalAad: Uint8Array = new Uint8Array(0)
): Uint8Array {
    return encodeCbor(['Signature1', protectedHeaders, externalAad, payload]);
}

export function buildMacStructure(
    protectedHeaders: Uint8Array,
    payload: Uint8Array,
    externalAad: Uint8Array = new Uint8Array(0)
): Uint8Array {
    return encodeCbor(['MAC0', protectedHeaders, externalAad, payload]);
}

function encodeProtectedHeaders(algorithm: CoseAlgorithm): Uint8Array {
    return encodeCbor(new Map<CborKey, CborValue>([[COSE_HEADER.ALG, algorithm]]));
}

function readAlgorithm(protectedHeaders: Uint8Array): number {
    if (protectedHeaders.length === 0) {
        throw MdocError.crypto(MdocErrorCode.UNSUPPORTED_ALGORITHM, 'Protected headers carry no algorithm');
    }
    const headers = asMap(parseCbor(protectedHeaders), 'protected headers');
    const alg = headers.get(COSE_HEADER.ALG);
    if (alg === undefined) {
        throw MdocError.crypto(MdocErrorCode.UNSUPPORTED_ALGORITHM, 'Protected headers carry no algorithm');
    }
    return asInt(alg, 'alg');
}

/**
 * Exactly one of the embedded payload and the detached content must be present
 */
function selectPayload(embedded: Uint8Array | null, detachedContent: Uint8Array | undefined): Uint8Array {
    if (embedded !== null && detachedContent !== undefined) {
        throw invalidInput('Both an embedded payload and detached content were supplied');
    }
    if (embedded === null && detachedContent === undefined) {
        throw invalidInput('Neither an embedded payload nor detached content was supplied');
    }
    return embedded ?? detachedContent ?? new Uint8Array(0);
}

// ===== COSE_Sign1 =====

export function coseSign1Sign(
    key: EcKeyPair,
    data: Uint8Array,
    options: CoseSign1Options = {}
): CoseSign1 {
    const info = curveInfo(key.curve);
    const protectedHeaders = encodeProtectedHeaders(info.signatureAlgorithm);

    const unprotectedHeaders: CborMap = new Map();
    if (options.certificateChain && options.certificateChain.length > 0) {
        const chain = options.certificateChain;
        unprotectedHeaders.set(COSE_HEADER.X5CHAIN, chain.length === 1 ? chain[0] : [...chain]);
    }

    const toBeSigned = buildSigStructure(protectedHeaders, data);
    const signature = signatureDerToRaw(key.signDer(toBeSigned, info.signatureAlgorithm), info.coordinateSize);

    return {
        protectedHeaders,
        unprotectedHeaders,
        payload: options.detached ? null : data,
        signature
    };
}

/**
 * Verify a COSE_Sign1. Returns ok(false) for a signature that does not verify and
 * an error for structures that cannot be checked at all.
 */
export function coseSign1Verify(
    sign1: CoseSign1,
    publicKey: EcPublicKey,
    detachedContent?: Uint8Array
): Result<boolean> {
    return attempt(() => {
        const payload = selectPayload(sign1.payload, detachedContent);
        const algorithm = readAlgorithm(sign1.protectedHeaders);
        const curve = curveForAlgorithm(algorithm);
        if (curve === undefined) {
            throw MdocError.crypto(MdocErrorCode.UNSUPPORTED_ALGORITHM, `Unsupported signature algorithm ${algorithm}`);
        }
        if (curve !== publicKey.curve) {
            throw MdocError.crypto(
                MdocErrorCode.UNSUPPORTED_ALGORITHM,
                `Algorithm ${algorithm} does not match a ${curveInfo(publicKey.curve).name} key`
            );
        }

        const { coordinateSize, signatureAlgorithm } = curveInfo(curve);
        if (sign1.signature.length !== coordinateSize * 2) {
            throw MdocError.crypto(
                MdocErrorCode.INVALID_SIGNATURE,
                `Signature is ${sign1.signature.length} bytes, expected ${coordinateSize * 2}`
            );
        }

        const toBeSigned = buildSigStructure(sign1.protectedHeaders, payload);
        const digest = hashForAlgorithm(signatureAlgorithm, toBeSigned);
        return publicKey.verifyDigest(digest, signatureRawToDer(sign1.signature));
    }, cause => MdocError.crypto(MdocErrorCode.INVALID_SIGNATURE, 'COSE_Sign1 verification failed', describeError(cause)));
}

export function encodeCoseSign1(sign1: CoseSign1): CborValue[] {
    return [sign1.protectedHeaders, sign1.unprotectedHeaders, sign1.payload, sign1.signature];
}

/**
 * Accepts the bare four-element array or the same wrapped in tag 18
 */
export function decodeCoseSign1(value: CborValue): Result<CoseSign1> {
    return attempt(() => {
        const inner = value instanceof CborTagged && value.tag === COSE_TAG.SIGN1 ? value.value : value;
        const items = asArray(inner, 'COSE_Sign1');
        if (items.length !== 4) {
            throw MdocError.protocol(MdocErrorCode.INVALID_FORMAT, `COSE_Sign1 has ${items.length} elements, expected 4`);
        }
        return {
            protectedHeaders: asBytes(items[0], 'COSE_Sign1 protected'),
            unprotectedHeaders: asMap(items[1], 'COSE_Sign1 unprotected'),
            payload: items[2] === null ? null : asBytes(items[2], 'COSE_Sign1 payload'),
            signature: asBytes(items[3], 'COSE_Sign1 signature')
        };
    }, cause => MdocError.protocol(MdocErrorCode.INVALID_FORMAT, 'Malformed COSE_Sign1', describeError(cause)));
}

/**
 * Certificates from the x5chain header, leaf first
 */
export function certificateChainOf(sign1: CoseSign1): Uint8Array[] {
    const chain = sign1.unprotectedHeaders.get(COSE_HEADER.X5CHAIN);
    if (chain === undefined) return [];
    if (chain instanceof Uint8Array) return [chain];
    return asArray(chain, 'x5chain').map(cert => asBytes(cert, 'x5chain certificate'));
}

// ===== COSE_Mac0 =====

export function coseMac0(key: Uint8Array, data: Uint8Array, detached: boolean = false): CoseMac0 {
    const protectedHeaders = encodeProtectedHeaders(CoseAlgorithm.HMAC_256_256);
    const tag = hmac(sha256, key, buildMacStructure(protectedHeaders, data));
    return {
        protectedHeaders,
        unprotectedHeaders: new Map(),
        payload: detached ? null : data,
        tag
    };
}

export function coseMac0Verify(
    mac0: CoseMac0,
    key: Uint8Array,
    detachedContent?: Uint8Array
): Result<boolean> {
    return attempt(() => {
        const payload = selectPayload(mac0.payload, detachedContent);
        const algorithm = readAlgorithm(mac0.protectedHeaders);
        if (algorithm !== CoseAlgorithm.HMAC_256_256) {
            throw MdocError.crypto(MdocErrorCode.UNSUPPORTED_ALGORITHM, `Unsupported MAC algorithm ${algorithm}`);
        }
        const expected = hmac(sha256, key, buildMacStructure(mac0.protectedHeaders, payload));
        return equalBytes(expected, mac0.tag);
    }, cause => MdocError.crypto(MdocErrorCode.INVALID_SIGNATURE, 'COSE_Mac0 verification failed', describeError(cause)));
}

export function encodeCoseMac0(mac0: CoseMac0): CborValue[] {
    return [mac0.protectedHeaders, mac0.unprotectedHeaders, mac0.payload, mac0.tag];
}

export function decodeCoseMac0(value: CborValue): Result<CoseMac0> {
    return attempt(() => {
        const inner = value instanceof CborTagged && value.tag === COSE_TAG.MAC0 ? value.value : value;
        const items = asArray(inner, 'COSE_Mac0');
        if (items.length !== 4) {
            throw MdocError.protocol(MdocErrorCode.INVALID_FORMAT, `COSE_Mac0 has ${items.length} elements, expected 4`);
        }
        return {
            protectedHeaders: asBytes(items[0], 'COSE_Mac0 protected'),
            unprotectedHeaders: asMap(items[1], 'COSE_Mac0 unprotected'),
            payload: items[2] === null ? null : asBytes(items[2], 'COSE_Mac0 payload'),
            tag: asBytes(items[3], 'COSE_Mac0 tag')
        };
    }, cause => MdocError.protocol(MdocErrorCode.INVALID_FORMAT, 'Malformed COSE_Mac0', describeError(cause)));
}
