// core/src/crypto/keypair.ts
/**
 * Elliptic-curve key material for mdoc sessions.
 *
 * Provides ephemeral key generation on P-256, P-384 and P-521, ECDH key agreement,
 * ECDSA signing in the DER form platform signers produce, and COSE_Key
 * (RFC 9052 section 7, EC2 key type) encoding and decoding.
 *
 * Usage:
 * ```typescript
 * const eDeviceKey = EcKeyPair.generate(EcCurve.P256);
 * const coseKey = eDeviceKey.publicKey.encodeCoseKey();
 *
 * const peer = EcPublicKey.decodeCoseKey(readerKeyBytes);
 * if (peer.ok) {
 *     const sharedSecret = eDeviceKey.keyAgreement(peer.value);
 * }
 * ```
 *
 * Call destroy() on a key pair once the session ends; the private scalar is zeroed.
 */

import { p256 } from '@noble/curves/p256';
import { p384 } from '@noble/curves/p384';
import { p521 } from '@noble/curves/p521';
import type { CurveFn } from '@noble/curves/abstract/weierstrass';
import { sha256, sha384, sha512 } from '@noble/hashes/sha2';
import type {
    CborKey,
    CborMap,
    CborValue
} from '../cbor/types';
import { encodeCbor, parseCbor, asMap, asBytes, asInt, getRequired } from '../cbor/cbor';
import {
    EcCurve,
    CoseAlgorithm,
    type CurveInfo,
    type EcPublicKeyCoordinates
} from '../types/crypto';
import { MdocError, MdocErrorCode, type Result, attempt, describeError } from '../types/errors';
import { concatBytes, equalBytes } from '../utils/bytes';
import { debugCrypto } from '../utils/debug';

// ===== CURVE TABLE =====

interface CurveImplementation {
    info: CurveInfo;
    curve: CurveFn;
}

const CURVES: Record<EcCurve, CurveImplementation> = {
    [EcCurve.P256]: {
        info: { curve: EcCurve.P256, name: 'P-256', coordinateSize: 32, signatureAlgorithm: CoseAlgorithm.ES256 },
        curve: p256
    },
    [EcCurve.P384]: {
        info: { curve: EcCurve.P384, name: 'P-384', coordinateSize: 48, signatureAlgorithm: CoseAlgorithm.ES384 },
        curve: p384
    },
    [EcCurve.P521]: {
        info: { curve: EcCurve.P521, name: 'P-521', coordinateSize: 66, signatureAlgorithm: CoseAlgorithm.ES512 },
        curve: p521
    }
};

/**
 * COSE_Key labels (RFC 9052 / RFC 9053)
 */
export const COSE_KEY = {
    KTY: 1,
    CRV: -1,
    X: -2,
    Y: -3,
    D: -4,
    KTY_EC2: 2
} as const;

export function isSupportedCurve(value: number): value is EcCurve {
    return value === EcCurve.P256 || value === EcCurve.P384 || value === EcCurve.P521;
}

export function curveInfo(curve: EcCurve): CurveInfo {
    return CURVES[curve].info;
}

function curveImpl(curve: EcCurve): CurveFn {
    return CURVES[curve].curve;
}

/**
 * Digest used with an ECDSA algorithm
 */
export function hashForAlgorithm(algorithm: CoseAlgorithm, data: Uint8Array): Uint8Array {
    switch (algorithm) {
        case CoseAlgorithm.ES256:
            return sha256(data);
        case CoseAlgorithm.ES384:
            return sha384(data);
        case CoseAlgorithm.ES512:
            return sha512(data);
        default:
            throw MdocError.crypto(MdocErrorCode.UNSUPPORTED_ALGORITHM, `Algorithm ${algorithm} is not an ECDSA algorithm`);
    }
}

function invalidKey(message: string, cause?: unknown): MdocError {
    return MdocError.crypto(MdocErrorCode.INVALID_KEY, message, cause === undefined ? undefined : describeError(cause));
}

// ===== PUBLIC KEY =====

export class EcPublicKey {
    private constructor(
        readonly curve: EcCurve,
        private readonly uncompressed: Uint8Array
    ) {}

    /**
     * Accepts a SEC1 encoded point (compressed or uncompressed) and checks it is on the curve
     */
    static fromEncodedPoint(curve: EcCurve, encoded: Uint8Array): EcPublicKey {
        try {
            const point = curveImpl(curve).ProjectivePoint.fromHex(encoded);
            point.assertValidity();
            return new EcPublicKey(curve, point.toRawBytes(false));
        } catch (cause) {
            throw invalidKey(`Invalid ${curveInfo(curve).name} public key`, cause);
        }
    }

    static fromCoordinates(coordinates: EcPublicKeyCoordinates): EcPublicKey {
        const size = curveInfo(coordinates.curve).coordinateSize;
        if (coordinates.x.length !== size || coordinates.y.length !== size) {
            throw invalidKey(`${curveInfo(coordinates.curve).name} coordinates must be ${size} bytes`);
        }
        return EcPublicKey.fromEncodedPoint(
            coordinates.curve,
            concatBytes(Uint8Array.of(0x04), coordinates.x, coordinates.y)
        );
    }

    /**
     * Parse a COSE_Key map. Throws MdocError on malformed or unsupported keys.
     */
    static fromCoseKey(value: CborValue): EcPublicKey {
        const map = asMap(value, 'COSE_Key');
        const kty = asInt(getRequired(map, COSE_KEY.KTY, 'COSE_Key kty'), 'COSE_Key kty');
        if (kty !== COSE_KEY.KTY_EC2) {
            throw invalidKey(`Unsupported COSE key type ${kty}`);
        }
        const crv = asInt(getRequired(map, COSE_KEY.CRV, 'COSE_Key crv'), 'COSE_Key crv');
        if (!isSupportedCurve(crv)) {
            throw invalidKey(`Unsupported COSE curve ${crv}`);
        }
        return EcPublicKey.fromCoordinates({
            curve: crv,
            x: asBytes(getRequired(map, COSE_KEY.X, 'COSE_Key x'), 'COSE_Key x'),
            y: asBytes(getRequired(map, COSE_KEY.Y, 'COSE_Key y'), 'COSE_Key y')
        });
    }

    static decodeCoseKey(encoded: Uint8Array): Result<EcPublicKey> {
        return attempt(
            () => EcPublicKey.fromCoseKey(parseCbor(encoded)),
            cause => invalidKey('COSE_Key decoding failed', cause)
        );
    }

    get x(): Uint8Array {
        const size = curveInfo(this.curve).coordinateSize;
        return this.uncompressed.slice(1, 1 + size);
    }

    get y(): Uint8Array {
        const size = curveInfo(this.curve).coordinateSize;
        return this.uncompressed.slice(1 + size);
    }

    toUncompressed(): Uint8Array {
        return this.uncompressed.slice();
    }

    toCoseKey(): CborMap {
        return new Map<CborKey, CborValue>([
            [COSE_KEY.KTY, COSE_KEY.KTY_EC2],
            [COSE_KEY.CRV, this.curve],
            [COSE_KEY.X, this.x],
            [COSE_KEY.Y, this.y]
        ]);
    }

    encodeCoseKey(): Uint8Array {
        return encodeCbor(this.toCoseKey());
    }

    /**
     * Verify a DER encoded ECDSA signature over an already computed digest
     */
    verifyDigest(digest: Uint8Array, derSignature: Uint8Array): boolean {
        const curve = curveImpl(this.curve);
        const signature = curve.Signature.fromDER(derSignature);
        return curve.verify(signature, digest, this.uncompressed);
    }

    equals(other: EcPublicKey): boolean {
        return this.curve === other.curve && equalBytes(this.uncompressed, other.uncompressed);
    }
}

// ===== KEY PAIR =====

export class EcKeyPair {
    private privateKey: Uint8Array;
    private destroyed = false;
    readonly publicKey: EcPublicKey;

    private constructor(readonly curve: EcCurve, privateKey: Uint8Array) {
        const impl = curveImpl(curve);
        if (!impl.utils.isValidPrivateKey(privateKey)) {
            throw invalidKey(`Invalid ${curveInfo(curve).name} private key`);
        }
        this.privateKey = privateKey.slice();
        this.publicKey = EcPublicKey.fromEncodedPoint(curve, impl.getPublicKey(this.privateKey, false));
    }

    static generate(curve: EcCurve): EcKeyPair {
        const keyPair = new EcKeyPair(curve, curveImpl(curve).utils.randomPrivateKey());
        debugCrypto.keyGeneration(curveInfo(curve).name);
        return keyPair;
    }

    static fromPrivateKey(curve: EcCurve, privateKey: Uint8Array): EcKeyPair {
        return new EcKeyPair(curve, privateKey);
    }

    /**
     * Parse a COSE_Key that carries the private scalar `d`
     */
    static fromCoseKey(value: CborValue): EcKeyPair {
        const map = asMap(value, 'COSE_Key');
        const publicKey = EcPublicKey.fromCoseKey(map);
        const d = asBytes(getRequired(map, COSE_KEY.D, 'COSE_Key d'), 'COSE_Key d');
        const keyPair = new EcKeyPair(publicKey.curve, d);
        if (!keyPair.publicKey.equals(publicKey)) {
            throw invalidKey('COSE_Key d does not match x/y');
        }
        return keyPair;
    }

    private assertUsable(): void {
        if (this.destroyed) {
            throw MdocError.precondition(MdocErrorCode.SESSION_DESTROYED, 'Key pair has been destroyed');
        }
    }

    /**
     * ECDH: the x-coordinate of the shared point, coordinateSize bytes
     */
    keyAgreement(peer: EcPublicKey): Uint8Array {
        this.assertUsable();
        if (peer.curve !== this.curve) {
            throw MdocError.crypto(
                MdocErrorCode.KEY_AGREEMENT_FAILED,
                `Peer key is on ${curveInfo(peer.curve).name}, expected ${curveInfo(this.curve).name}`
            );
        }
        try {
            return curveImpl(this.curve).getSharedSecret(this.privateKey, peer.toUncompressed(), true).slice(1);
        } catch (cause) {
            throw MdocError.crypto(MdocErrorCode.KEY_AGREEMENT_FAILED, 'ECDH failed', describeError(cause));
        }
    }

    /**
     * ECDSA over `data` hashed with the algorithm's digest. Returns the DER encoding.
     */
    signDer(data: Uint8Array, algorithm: CoseAlgorithm = curveInfo(this.curve).signatureAlgorithm): Uint8Array {
        this.assertUsable();
        if (algorithm !== curveInfo(this.curve).signatureAlgorithm) {
            throw MdocError.crypto(
                MdocErrorCode.UNSUPPORTED_ALGORITHM,
                `Algorithm ${algorithm} cannot be used with ${curveInfo(this.curve).name}`
            );
        }
        const digest = hashForAlgorithm(algorithm, data);
        return curveImpl(this.curve).sign(digest, this.privateKey).toDERRawBytes();
    }

    toCoseKey(): CborMap {
        this.assertUsable();
        const map = this.publicKey.toCoseKey();
        map.set(COSE_KEY.D, this.privateKey.slice());
        return map;
    }

    destroy(): void {
        this.privateKey.fill(0);
        this.destroyed = true;
    }
}
