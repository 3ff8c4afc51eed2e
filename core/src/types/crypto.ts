// core/src/types/crypto.ts
/**
 * Type definitions for the mdoc session cryptography layer.
 *
 * Covers the supported NIST curves, COSE algorithm identifiers, session roles and
 * the session engine's key-agreement state machine, together with the status codes
 * carried in SessionData messages.
 */

/**
 * Supported elliptic curves. Values are the COSE `crv` labels.
 */
export enum EcCurve {
    P256 = 1,
    P384 = 2,
    P521 = 3
}

/**
 * COSE algorithm identifiers used by this layer
 */
export enum CoseAlgorithm {
    ES256 = -7,
    ES384 = -35,
    ES512 = -36,
    HMAC_256_256 = 5
}

export enum SessionRole {
    /** The credential holder's device; encrypts with SKDevice */
    MDOC = 'MDOC',
    /** The verifier; encrypts with SKReader */
    MDOC_READER = 'MDOC_READER'
}

export enum SessionCryptoState {
    NO_KEYS = 'NO_KEYS',
    SHARED_SECRET_COMPUTED = 'SHARED_SECRET_COMPUTED',
    KEYS_DERIVED = 'KEYS_DERIVED',
    DESTROYED = 'DESTROYED'
}

/**
 * SessionData status codes
 */
export enum SessionStatus {
    ERROR_SESSION_ENCRYPTION = 10,
    ERROR_CBOR_DECODING = 11,
    SESSION_TERMINATION = 20
}

export const ENCRYPTION_CONFIG = {
    INFO_SK_DEVICE: 'SKDevice',
    INFO_SK_READER: 'SKReader',
    INFO_EMAC_KEY: 'EMacKey',
    INFO_BLE_IDENT: 'BLEIdent',
    SESSION_KEY_SIZE: 32,
    IDENT_SIZE: 16,
    NONCE_SIZE: 12,
    TAG_SIZE: 16,
    /** Nonce identifier for messages encrypted by the mdoc */
    IDENTIFIER_DEVICE: 0x00000001,
    /** Nonce identifier for messages encrypted by the reader */
    IDENTIFIER_READER: 0x00000000,
    INITIAL_COUNTER: 1,
    MAX_COUNTER: 0xffffffff
} as const;

/**
 * Per-curve parameters
 */
export interface CurveInfo {
    curve: EcCurve;
    name: string;
    /** Byte length of one field element / coordinate */
    coordinateSize: number;
    signatureAlgorithm: CoseAlgorithm;
}

/**
 * EC2 public key coordinates as carried in a COSE_Key
 */
export interface EcPublicKeyCoordinates {
    curve: EcCurve;
    x: Uint8Array;
    y: Uint8Array;
}

/**
 * Result of decoding an inbound session message
 */
export interface DecryptedSessionMessage {
    /** Decrypted payload, absent for status-only messages */
    data?: Uint8Array;
    status?: SessionStatus | number;
}

export interface SessionEncryptionStatistics {
    role: SessionRole;
    state: SessionCryptoState;
    messagesEncrypted: number;
    messagesDecrypted: number;
    decryptionFailures: number;
}
