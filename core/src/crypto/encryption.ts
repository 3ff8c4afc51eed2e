// core/src/crypto/encryption.ts
/**
 * Session encryption for mdoc proximity presentation.
 *
 * One SessionEncryption instance protects one session, from one side. It walks
 * through three states:
 *
 *   NO_KEYS                 local ephemeral key known, peer key not yet
 *   SHARED_SECRET_COMPUTED  ECDH done, waiting for the session transcript
 *   KEYS_DERIVED            SKDevice and SKReader derived, counters at 1
 *
 * Keys are derived lazily on the first operation that needs them:
 *
 *   salt     = SHA-256(#6.24(bstr .cbor SessionTranscript))
 *   SKDevice = HKDF-SHA256(sharedSecret, salt, "SKDevice", 32)
 *   SKReader = HKDF-SHA256(sharedSecret, salt, "SKReader", 32)
 *
 * Messages are sealed with AES-256-GCM under a 12-byte nonce
 *
 *   00 00 00 00 | identifier (4 bytes) | counter (4 bytes, big-endian)
 *
 * where the identifier is 0x00000001 for messages the mdoc encrypts and
 * 0x00000000 for messages the reader encrypts. Each direction keeps its own
 * counter. A counter that would pass 0xFFFFFFFF ends the session with
 * SESSION_EXHAUSTED rather than wrapping.
 *
 * Using keys before their inputs exist, or fixing the transcript twice, throws
 * an MdocError of kind PRECONDITION. Runtime failures come back as a Result.
 */

import { gcm } from '@noble/ciphers/aes';
import { hkdf } from '@noble/hashes/hkdf';
import { sha256 } from '@noble/hashes/sha2';
import type { CborKey, CborMap, CborValue } from '../cbor/types';
import {
    encodeCbor,
    parseCbor,
    tagEncoded,
    asMap,
    asBytes,
    asInt,
    embeddedBytes,
    getRequired
} from '../cbor/cbor';
import { EcKeyPair, EcPublicKey } from './keypair';
import {
    coseSign1Sign,
    coseSign1Verify,
    coseMac0,
    coseMac0Verify,
    type CoseSign1,
    type CoseMac0
} from './cose';
import { buildDeviceAuthenticationBytes, transcriptSalt } from './transcript';
import {
    SessionRole,
    SessionCryptoState,
    SessionStatus,
    ENCRYPTION_CONFIG,
    type DecryptedSessionMessage,
    type SessionEncryptionStatistics
} from '../types/crypto';
import { MdocError, MdocErrorCode, type Result, ok, err, attempt, describeError } from '../types/errors';
import { utf8ToBytes, writeUint32BE, concatBytes } from '../utils/bytes';
import { debugCrypto } from '../utils/debug';

/**
 * Keys derived for one session
 */
export interface SessionKeys {
    skDevice: Uint8Array;
    skReader: Uint8Array;
}

/**
 * Fields of a SessionEstablishment message
 */
export interface SessionEstablishment {
    /** Plain encoding of the reader's COSE_Key, as used in the session transcript */
    eReaderKeyBytes: Uint8Array;
    eReaderKey: EcPublicKey;
    data: Uint8Array;
}

const MESSAGE_KEYS = {
    E_READER_KEY: 'eReaderKey',
    DATA: 'data',
    STATUS: 'status'
} as const;

/**
 * Pure key schedule. Identical inputs always give identical keys.
 */
export function deriveSessionKeys(sharedSecret: Uint8Array, sessionTranscript: Uint8Array): SessionKeys {
    const salt = transcriptSalt(sessionTranscript);
    return {
        skDevice: hkdf(sha256, sharedSecret, salt, utf8ToBytes(ENCRYPTION_CONFIG.INFO_SK_DEVICE), ENCRYPTION_CONFIG.SESSION_KEY_SIZE),
        skReader: hkdf(sha256, sharedSecret, salt, utf8ToBytes(ENCRYPTION_CONFIG.INFO_SK_READER), ENCRYPTION_CONFIG.SESSION_KEY_SIZE)
    };
}

export function buildNonce(identifier: number, counter: number): Uint8Array {
    return concatBytes(new Uint8Array(4), writeUint32BE(identifier), writeUint32BE(counter));
}

/**
 * Parse a SessionEstablishment without decrypting it, so the caller can build
 * the session transcript from eReaderKeyBytes first.
 */
export function parseSessionEstablishment(message: Uint8Array): Result<SessionEstablishment> {
    return attempt(() => {
        const map = asMap(parseCbor(message), 'SessionEstablishment');
        const keyItem = map.get(MESSAGE_KEYS.E_READER_KEY);
        if (keyItem === undefined) {
            throw MdocError.protocol(MdocErrorCode.INVALID_FORMAT, 'SessionEstablishment has no eReaderKey');
        }
        const eReaderKeyBytes = embeddedBytes(keyItem);
        return {
            eReaderKeyBytes,
            eReaderKey: EcPublicKey.fromCoseKey(parseCbor(eReaderKeyBytes)),
            data: asBytes(getRequired(map, MESSAGE_KEYS.DATA, 'SessionEstablishment data'), 'SessionEstablishment data')
        };
    }, cause => MdocError.protocol(MdocErrorCode.INVALID_FORMAT, 'Malformed SessionEstablishment', describeError(cause)));
}

/**
 * Status-only SessionData, e.g. { status: 20 } for session termination
 */
export function encodeSessionStatus(status: SessionStatus): Uint8Array {
    return encodeCbor(new Map<CborKey, CborValue>([[MESSAGE_KEYS.STATUS, status]]));
}

// ===== SESSION ENCRYPTION ENGINE =====

export class SessionEncryption {
    readonly role: SessionRole;
    private localKey: EcKeyPair;
    private peerKey: EcPublicKey | null = null;
    private sharedSecret: Uint8Array | null = null;
    private sessionTranscript: Uint8Array | null = null;
    private keys: SessionKeys | null = null;
    private destroyed = false;
    private establishmentSent = false;

    // Per-direction message counters, next value to use
    protected encryptCounter: number = ENCRYPTION_CONFIG.INITIAL_COUNTER;
    protected decryptCounter: number = ENCRYPTION_CONFIG.INITIAL_COUNTER;

    private statistics = {
        messagesEncrypted: 0,
        messagesDecrypted: 0,
        decryptionFailures: 0
    };

    constructor(role: SessionRole, localKey: EcKeyPair, peerKey?: EcPublicKey, sessionTranscript?: Uint8Array) {
        this.role = role;
        this.localKey = localKey;
        if (peerKey) {
            this.setPeerKey(peerKey);
        }
        if (sessionTranscript) {
            this.setSessionTranscript(sessionTranscript);
        }
    }

    // ===== STATE =====

    get state(): SessionCryptoState {
        if (this.destroyed) return SessionCryptoState.DESTROYED;
        if (this.keys) return SessionCryptoState.KEYS_DERIVED;
        if (this.sharedSecret) return SessionCryptoState.SHARED_SECRET_COMPUTED;
        return SessionCryptoState.NO_KEYS;
    }

    get localPublicKey(): EcPublicKey {
        return this.localKey.publicKey;
    }

    get peerPublicKey(): EcPublicKey | null {
        return this.peerKey;
    }

    get hasSessionTranscript(): boolean {
        return this.sessionTranscript !== null;
    }

    /**
     * Counter values the next encrypt and decrypt will use
     */
    get counters(): { encrypt: number; decrypt: number } {
        return { encrypt: this.encryptCounter, decrypt: this.decryptCounter };
    }

    private assertAlive(): void {
        if (this.destroyed) {
            throw MdocError.precondition(MdocErrorCode.SESSION_DESTROYED, 'Session has been destroyed');
        }
    }

    private assertRole(role: SessionRole, operation: string): void {
        if (this.role !== role) {
            throw MdocError.precondition(
                MdocErrorCode.INVALID_OPERATION,
                `${operation} is only available to the ${role} role, this session is ${this.role}`
            );
        }
    }

    /**
     * Supply the peer's ephemeral public key; computes the ECDH shared secret
     */
    setPeerKey(peerKey: EcPublicKey): void {
        this.assertAlive();
        if (this.peerKey) {
            if (this.peerKey.equals(peerKey)) return;
            throw MdocError.precondition(MdocErrorCode.INVALID_OPERATION, 'Peer key is already set to a different key');
        }
        this.sharedSecret = this.localKey.keyAgreement(peerKey);
        this.peerKey = peerKey;
    }

    /**
     * Fix the session transcript. May only happen once.
     */
    setSessionTranscript(sessionTranscript: Uint8Array): void {
        this.assertAlive();
        if (this.sessionTranscript) {
            throw MdocError.precondition(MdocErrorCode.TRANSCRIPT_ALREADY_SET, 'Session transcript is already set');
        }
        this.sessionTranscript = sessionTranscript.slice();
    }

    /**
     * Derive (once) and return the session keys
     */
    deriveKeys(): SessionKeys {
        this.assertAlive();
        if (!this.keys) {
            if (!this.sharedSecret) {
                throw MdocError.precondition(MdocErrorCode.KEYS_NOT_DERIVED, 'Peer ephemeral key has not been supplied');
            }
            if (!this.sessionTranscript) {
                throw MdocError.precondition(MdocErrorCode.KEYS_NOT_DERIVED, 'Session transcript has not been set');
            }
            this.keys = deriveSessionKeys(this.sharedSecret, this.sessionTranscript);
            debugCrypto.keysDerived(this.role);
        }
        return { skDevice: this.keys.skDevice.slice(), skReader: this.keys.skReader.slice() };
    }

    private requireKeys(): SessionKeys {
        this.deriveKeys();
        if (!this.keys) {
            throw MdocError.precondition(MdocErrorCode.KEYS_NOT_DERIVED, 'Session keys are not available');
        }
        return this.keys;
    }

    private requireTranscript(): Uint8Array {
        this.requireKeys();
        if (!this.sessionTranscript) {
            throw MdocError.precondition(MdocErrorCode.KEYS_NOT_DERIVED, 'Session transcript has not been set');
        }
        return this.sessionTranscript;
    }

    // ===== ENCRYPTION =====

    private get sendingIdentifier(): number {
        return this.role === SessionRole.MDOC
            ? ENCRYPTION_CONFIG.IDENTIFIER_DEVICE
            : ENCRYPTION_CONFIG.IDENTIFIER_READER;
    }

    private get receivingIdentifier(): number {
        return this.role === SessionRole.MDOC
            ? ENCRYPTION_CONFIG.IDENTIFIER_READER
            : ENCRYPTION_CONFIG.IDENTIFIER_DEVICE;
    }

    private exhausted(direction: string): MdocError {
        return MdocError.crypto(
            MdocErrorCode.SESSION_EXHAUSTED,
            `${direction} message counter exhausted, the session must be restarted`
        );
    }

    /**
     * Encrypt with this side's sending key
     */
    encrypt(plaintext: Uint8Array): Result<Uint8Array> {
        const keys = this.requireKeys();
        if (this.encryptCounter > ENCRYPTION_CONFIG.MAX_COUNTER) {
            return err(this.exhausted('Outbound'));
        }
        const key = this.role === SessionRole.MDOC ? keys.skDevice : keys.skReader;
        const nonce = buildNonce(this.sendingIdentifier, this.encryptCounter);
        const ciphertext = gcm(key, nonce).encrypt(plaintext);
        this.encryptCounter++;
        this.statistics.messagesEncrypted++;
        return ok(ciphertext);
    }

    /**
     * Decrypt with the peer's sending key. The counter only advances on success.
     */
    decrypt(ciphertext: Uint8Array): Result<Uint8Array> {
        const keys = this.requireKeys();
        if (this.decryptCounter > ENCRYPTION_CONFIG.MAX_COUNTER) {
            return err(this.exhausted('Inbound'));
        }
        const key = this.role === SessionRole.MDOC ? keys.skReader : keys.skDevice;
        const nonce = buildNonce(this.receivingIdentifier, this.decryptCounter);
        try {
            const plaintext = gcm(key, nonce).decrypt(ciphertext);
            this.decryptCounter++;
            this.statistics.messagesDecrypted++;
            return ok(plaintext);
        } catch (cause) {
            this.statistics.decryptionFailures++;
            debugCrypto.error('decrypt', describeError(cause));
            return err(MdocError.crypto(
                MdocErrorCode.DECRYPTION_FAILED,
                'Message authentication failed',
                { counter: this.decryptCounter }
            ));
        }
    }

    encryptToReader(plaintext: Uint8Array): Result<Uint8Array> {
        this.assertRole(SessionRole.MDOC, 'encryptToReader');
        return this.encrypt(plaintext);
    }

    decryptFromReader(ciphertext: Uint8Array): Result<Uint8Array> {
        this.assertRole(SessionRole.MDOC, 'decryptFromReader');
        return this.decrypt(ciphertext);
    }

    encryptToDevice(plaintext: Uint8Array): Result<Uint8Array> {
        this.assertRole(SessionRole.MDOC_READER, 'encryptToDevice');
        return this.encrypt(plaintext);
    }

    decryptFromDevice(ciphertext: Uint8Array): Result<Uint8Array> {
        this.assertRole(SessionRole.MDOC_READER, 'decryptFromDevice');
        return this.decrypt(ciphertext);
    }

    // ===== SESSION MESSAGES =====

    /**
     * Build the next outbound session message. The reader's first message is a
     * SessionEstablishment carrying its ephemeral key; every other message is
     * SessionData. Pass null as `data` for a status-only message.
     */
    encryptMessage(data: Uint8Array | null, status?: SessionStatus): Result<Uint8Array> {
        const map: CborMap = new Map();
        const firstReaderMessage = this.role === SessionRole.MDOC_READER && !this.establishmentSent;

        if (firstReaderMessage) {
            if (data === null) {
                throw MdocError.precondition(MdocErrorCode.INVALID_INPUT, 'SessionEstablishment must carry data');
            }
            map.set(MESSAGE_KEYS.E_READER_KEY, tagEncoded(this.localKey.publicKey.encodeCoseKey()));
        }

        if (data !== null) {
            const sealed = this.encrypt(data);
            if (!sealed.ok) return sealed;
            map.set(MESSAGE_KEYS.DATA, sealed.value);
        }
        if (status !== undefined) {
            map.set(MESSAGE_KEYS.STATUS, status);
        }
        if (firstReaderMessage) {
            this.establishmentSent = true;
        }
        return ok(encodeCbor(map));
    }

    /**
     * Decode and decrypt an inbound SessionEstablishment or SessionData
     */
    decryptMessage(message: Uint8Array): Result<DecryptedSessionMessage> {
        let map: CborMap;
        try {
            map = asMap(parseCbor(message), 'session message');
        } catch (cause) {
            return err(cause instanceof MdocError
                ? cause
                : MdocError.protocol(MdocErrorCode.INVALID_FORMAT, 'Malformed session message', describeError(cause)));
        }

        if (map.has(MESSAGE_KEYS.E_READER_KEY)) {
            if (this.role !== SessionRole.MDOC) {
                return err(MdocError.protocol(MdocErrorCode.INVALID_FORMAT, 'Reader received a SessionEstablishment'));
            }
            const establishment = parseSessionEstablishment(message);
            if (!establishment.ok) return establishment;
            if (this.peerKey && !this.peerKey.equals(establishment.value.eReaderKey)) {
                return err(MdocError.crypto(MdocErrorCode.INVALID_KEY, 'SessionEstablishment carries an unexpected reader key'));
            }
            const eReaderKey = establishment.value.eReaderKey;
            const agreed = attempt(
                () => this.setPeerKey(eReaderKey),
                cause => MdocError.crypto(MdocErrorCode.KEY_AGREEMENT_FAILED, 'Key agreement failed', describeError(cause))
            );
            if (!agreed.ok) return agreed;
        }

        const result: DecryptedSessionMessage = {};

        const statusItem = map.get(MESSAGE_KEYS.STATUS);
        if (statusItem !== undefined) {
            const status = attempt(
                () => asInt(statusItem, 'status'),
                cause => MdocError.protocol(MdocErrorCode.INVALID_FORMAT, 'Malformed status', describeError(cause))
            );
            if (!status.ok) return status;
            result.status = status.value;
        }

        const dataItem = map.get(MESSAGE_KEYS.DATA);
        if (dataItem !== undefined) {
            if (!(dataItem instanceof Uint8Array)) {
                return err(MdocError.protocol(MdocErrorCode.INVALID_FORMAT, 'Session message data is not a byte string'));
            }
            const opened = this.decrypt(dataItem);
            if (!opened.ok) return opened;
            result.data = opened.value;
        }

        if (result.data === undefined && result.status === undefined) {
            return err(MdocError.protocol(MdocErrorCode.INVALID_FORMAT, 'Session message has neither data nor status'));
        }
        return ok(result);
    }

    // ===== DEVICE AUTHENTICATION =====

    deviceAuthenticationBytes(docType: string, deviceNameSpaces: Uint8Array): Uint8Array {
        return buildDeviceAuthenticationBytes(this.requireTranscript(), docType, deviceNameSpaces);
    }

    /**
     * DeviceSignature: COSE_Sign1 over DeviceAuthenticationBytes, detached
     */
    signDeviceAuthentication(deviceKey: EcKeyPair, docType: string, deviceNameSpaces: Uint8Array): CoseSign1 {
        this.assertRole(SessionRole.MDOC, 'signDeviceAuthentication');
        const payload = this.deviceAuthenticationBytes(docType, deviceNameSpaces);
        return coseSign1Sign(deviceKey, payload, { detached: true });
    }

    verifyDeviceAuthentication(
        signature: CoseSign1,
        devicePublicKey: EcPublicKey,
        docType: string,
        deviceNameSpaces: Uint8Array
    ): Result<boolean> {
        return coseSign1Verify(signature, devicePublicKey, this.deviceAuthenticationBytes(docType, deviceNameSpaces));
    }

    /**
     * EMacKey = HKDF-SHA256(ECDH(static key, peer ephemeral key), salt, "EMacKey", 32)
     *
     * On the mdoc side `staticKey` is SDeviceKey and the peer is EReaderKey; the
     * reader passes its EReaderKey pair and the peer's SDeviceKey instead.
     */
    private deriveMacKey(staticKey: EcKeyPair, peerKey: EcPublicKey): Uint8Array {
        const salt = transcriptSalt(this.requireTranscript());
        const zab = staticKey.keyAgreement(peerKey);
        return hkdf(sha256, zab, salt, utf8ToBytes(ENCRYPTION_CONFIG.INFO_EMAC_KEY), ENCRYPTION_CONFIG.SESSION_KEY_SIZE);
    }

    /**
     * DeviceMac: COSE_Mac0 over DeviceAuthenticationBytes, detached
     */
    macDeviceAuthentication(deviceKey: EcKeyPair, docType: string, deviceNameSpaces: Uint8Array): CoseMac0 {
        this.assertRole(SessionRole.MDOC, 'macDeviceAuthentication');
        const payload = this.deviceAuthenticationBytes(docType, deviceNameSpaces);
        if (!this.peerKey) {
            throw MdocError.precondition(MdocErrorCode.KEYS_NOT_DERIVED, 'Reader key has not been supplied');
        }
        return coseMac0(this.deriveMacKey(deviceKey, this.peerKey), payload, true);
    }

    verifyDeviceMac(
        mac: CoseMac0,
        devicePublicKey: EcPublicKey,
        docType: string,
        deviceNameSpaces: Uint8Array
    ): Result<boolean> {
        this.assertRole(SessionRole.MDOC_READER, 'verifyDeviceMac');
        const payload = this.deviceAuthenticationBytes(docType, deviceNameSpaces);
        return coseMac0Verify(mac, this.deriveMacKey(this.localKey, devicePublicKey), payload);
    }

    // ===== LIFECYCLE =====

    getStatistics(): SessionEncryptionStatistics {
        return {
            role: this.role,
            state: this.state,
            ...this.statistics
        };
    }

    /**
     * Zero all key material. Any later use throws.
     */
    destroy(): void {
        if (this.destroyed) return;
        this.keys?.skDevice.fill(0);
        this.keys?.skReader.fill(0);
        this.sharedSecret?.fill(0);
        this.localKey.destroy();
        this.keys = null;
        this.sharedSecret = null;
        this.destroyed = true;
    }
}
