import { describe, it, expect } from 'vitest';
import { gcm } from '@noble/ciphers/aes';
import { hkdf } from '@noble/hashes/hkdf';
import { sha256 } from '@noble/hashes/sha2';
import {
  SessionEncryption,
  buildNonce,
  deriveSessionKeys,
  encodeSessionStatus,
  parseSessionEstablishment,
} from '../src/crypto/encryption';
import { EcKeyPair } from '../src/crypto/keypair';
import { buildSessionTranscript, transcriptSalt } from '../src/crypto/transcript';
import { encodeCbor, parseCbor, asMap } from '../src/cbor/cbor';
import type { CborKey, CborValue } from '../src/cbor/types';
import { EcCurve, ENCRYPTION_CONFIG, SessionCryptoState, SessionRole, SessionStatus } from '../src/types/crypto';
import { ErrorKind, MdocError, MdocErrorCode } from '../src/types/errors';
import { bytesToHex, hexToBytes, utf8ToBytes } from '../src/utils/bytes';

const DEVICE_ENGAGEMENT = hexToBytes('a20063312e30');
const DOC_TYPE = 'org.iso.18013.5.1.mDL';
const NAME_SPACES = hexToBytes('a0');

interface Parties {
  device: SessionEncryption;
  reader: SessionEncryption;
  deviceKey: EcKeyPair;
  readerKey: EcKeyPair;
  transcript: Uint8Array;
}

/** Reader knows the device key from engagement; the device learns the reader key from the first message */
function parties(curve: EcCurve = EcCurve.P256): Parties {
  const deviceKey = EcKeyPair.generate(curve);
  const readerKey = EcKeyPair.generate(curve);
  const transcript = buildSessionTranscript(DEVICE_ENGAGEMENT, readerKey.publicKey.encodeCoseKey(), null);
  return {
    device: new SessionEncryption(SessionRole.MDOC, deviceKey),
    reader: new SessionEncryption(SessionRole.MDOC_READER, readerKey, deviceKey.publicKey, transcript),
    deviceKey,
    readerKey,
    transcript,
  };
}

/** Run the SessionEstablishment exchange; returns the decrypted request */
function establish(p: Parties, request = 'request'): Uint8Array {
  const establishment = p.reader.encryptMessage(utf8ToBytes(request));
  if (!establishment.ok) throw establishment.error;

  const parsed = parseSessionEstablishment(establishment.value);
  if (!parsed.ok) throw parsed.error;
  p.device.setSessionTranscript(
    buildSessionTranscript(DEVICE_ENGAGEMENT, parsed.value.eReaderKeyBytes, null),
  );

  const opened = p.device.decryptMessage(establishment.value);
  if (!opened.ok || opened.value.data === undefined) throw new Error('establishment did not decrypt');
  return opened.value.data;
}

function text(bytes: Uint8Array | undefined): string | undefined {
  return bytes === undefined ? undefined : new TextDecoder().decode(bytes);
}

function expectPrecondition(fn: () => unknown, code: MdocErrorCode): void {
  try {
    fn();
    expect.unreachable();
  } catch (error) {
    expect(error).toBeInstanceOf(MdocError);
    if (error instanceof MdocError) {
      expect(error.kind).toBe(ErrorKind.PRECONDITION);
      expect(error.code).toBe(code);
    }
  }
}

class SessionNearExhaustion extends SessionEncryption {
  jumpEncryptCounter(value: number): void {
    this.encryptCounter = value;
  }

  jumpDecryptCounter(value: number): void {
    this.decryptCounter = value;
  }
}

// ─── Key schedule ────────────────────────────────────────────────────────────

describe('deriveSessionKeys', () => {
  it('derives SKDevice and SKReader with HKDF-SHA256 over the transcript salt', () => {
    const sharedSecret = new Uint8Array(32).fill(7);
    const transcript = hexToBytes('83d8184101d8184102f6');
    const keys = deriveSessionKeys(sharedSecret, transcript);
    const salt = transcriptSalt(transcript);

    expect(bytesToHex(keys.skDevice)).toBe(bytesToHex(hkdf(sha256, sharedSecret, salt, utf8ToBytes('SKDevice'), 32)));
    expect(bytesToHex(keys.skReader)).toBe(bytesToHex(hkdf(sha256, sharedSecret, salt, utf8ToBytes('SKReader'), 32)));
    expect(bytesToHex(keys.skDevice)).not.toBe(bytesToHex(keys.skReader));
  });

  it('is deterministic', () => {
    const sharedSecret = new Uint8Array(32).fill(9);
    const transcript = hexToBytes('80');
    expect(deriveSessionKeys(sharedSecret, transcript)).toEqual(deriveSessionKeys(sharedSecret, transcript));
  });
});

describe('buildNonce', () => {
  it('lays out zero, identifier and counter big-endian', () => {
    expect(bytesToHex(buildNonce(ENCRYPTION_CONFIG.IDENTIFIER_DEVICE, 1))).toBe('000000000000000100000001');
    expect(bytesToHex(buildNonce(ENCRYPTION_CONFIG.IDENTIFIER_READER, 0xffffffff))).toBe('0000000000000000ffffffff');
  });
});

// ─── Session messages ────────────────────────────────────────────────────────

describe('SessionEncryption message exchange', () => {
  it.each([EcCurve.P256, EcCurve.P384, EcCurve.P521])('round trips on curve %i', curve => {
    const p = parties(curve);
    expect(text(establish(p, 'hello-mdoc'))).toBe('hello-mdoc');
    expect(p.device.state).toBe(SessionCryptoState.KEYS_DERIVED);

    const response = p.device.encryptMessage(utf8ToBytes('response'));
    expect(response.ok).toBe(true);
    if (!response.ok) return;

    const opened = p.reader.decryptMessage(response.value);
    expect(opened.ok && text(opened.value.data)).toBe('response');
  });

  it('derives the same keys on both sides', () => {
    const p = parties();
    establish(p);
    expect(p.device.deriveKeys()).toEqual(p.reader.deriveKeys());
  });

  it('puts the reader key only in the first reader message', () => {
    const p = parties();
    const first = p.reader.encryptMessage(utf8ToBytes('one'));
    const second = p.reader.encryptMessage(utf8ToBytes('two'));
    if (!first.ok || !second.ok) throw new Error('encryption failed');

    expect(asMap(parseCbor(first.value), 'first').has('eReaderKey')).toBe(true);
    expect(asMap(parseCbor(second.value), 'second').has('eReaderKey')).toBe(false);
  });

  it('seals with SKDevice under the device nonce', () => {
    const p = parties();
    establish(p);
    const sealed = p.device.encrypt(utf8ToBytes('abc'));
    expect(sealed.ok).toBe(true);
    if (!sealed.ok) return;

    expect(sealed.value).toHaveLength(3 + 16);
    const { skDevice } = p.device.deriveKeys();
    const expected = gcm(skDevice, buildNonce(ENCRYPTION_CONFIG.IDENTIFIER_DEVICE, 1)).encrypt(utf8ToBytes('abc'));
    expect(bytesToHex(sealed.value)).toBe(bytesToHex(expected));
  });

  it('carries status codes with and without data', () => {
    const p = parties();
    establish(p);

    const statusOnly = p.device.encryptMessage(null, SessionStatus.SESSION_TERMINATION);
    expect(statusOnly.ok && bytesToHex(statusOnly.value)).toBe(bytesToHex(encodeSessionStatus(SessionStatus.SESSION_TERMINATION)));
    if (!statusOnly.ok) return;
    expect(p.reader.decryptMessage(statusOnly.value)).toEqual({ ok: true, value: { status: 20 } });

    const both = p.device.encryptMessage(utf8ToBytes('last'), SessionStatus.SESSION_TERMINATION);
    if (!both.ok) throw both.error;
    const opened = p.reader.decryptMessage(both.value);
    expect(opened.ok && opened.value.status).toBe(20);
    expect(opened.ok && text(opened.value.data)).toBe('last');
  });

  it('encodes the termination status', () => {
    expect(bytesToHex(encodeSessionStatus(SessionStatus.SESSION_TERMINATION))).toBe('a16673746174757314');
  });

  it('does not advance the counter on a failed decryption', () => {
    const p = parties();
    establish(p);
    const response = p.device.encrypt(utf8ToBytes('response'));
    if (!response.ok) throw response.error;

    const tampered = response.value.slice();
    tampered[0] ^= 0xff;
    const failed = p.reader.decrypt(tampered);
    expect(!failed.ok && failed.error.code).toBe(MdocErrorCode.DECRYPTION_FAILED);
    expect(p.reader.counters.decrypt).toBe(1);

    expect(p.reader.decrypt(response.value).ok).toBe(true);
    expect(p.reader.counters.decrypt).toBe(2);
    expect(p.reader.getStatistics()).toMatchObject({ messagesDecrypted: 1, decryptionFailures: 1 });
  });

  it('uses a distinct nonce for every outbound message', () => {
    const p = parties();
    establish(p);
    const { skDevice } = p.device.deriveKeys();
    const nonces = new Set<string>();
    const count = 64;

    for (let i = 0; i < count; i++) {
      const sealed = p.device.encrypt(utf8ToBytes('same plaintext'));
      if (!sealed.ok) throw sealed.error;
      const nonce = buildNonce(ENCRYPTION_CONFIG.IDENTIFIER_DEVICE, i + 1);
      expect(text(gcm(skDevice, nonce).decrypt(sealed.value))).toBe('same plaintext');
      nonces.add(bytesToHex(nonce));
    }

    expect(nonces.size).toBe(count);
    expect(p.device.counters.encrypt).toBe(count + 1);
  });

  it('rejects every single-byte modification of ciphertext and tag', () => {
    const p = parties();
    establish(p);
    const response = p.device.encrypt(utf8ToBytes('response'));
    if (!response.ok) throw response.error;
    expect(response.value).toHaveLength(8 + 16);

    for (let index = 0; index < response.value.length; index++) {
      const tampered = response.value.slice();
      tampered[index] ^= 0x01;
      const failed = p.reader.decrypt(tampered);
      expect(!failed.ok && failed.error.code).toBe(MdocErrorCode.DECRYPTION_FAILED);
      expect(p.reader.counters.decrypt).toBe(1);
    }

    const opened = p.reader.decrypt(response.value);
    expect(opened.ok && text(opened.value)).toBe('response');
    expect(p.reader.getStatistics()).toMatchObject({ messagesDecrypted: 1, decryptionFailures: 24 });
  });

  it('rejects a replayed message', () => {
    const p = parties();
    establish(p);
    const response = p.device.encrypt(utf8ToBytes('response'));
    if (!response.ok) throw response.error;

    expect(p.reader.decrypt(response.value).ok).toBe(true);
    expect(p.reader.decrypt(response.value).ok).toBe(false);
  });

  it('ends the session instead of wrapping the counter', () => {
    const deviceKey = EcKeyPair.generate(EcCurve.P256);
    const readerKey = EcKeyPair.generate(EcCurve.P256);
    const transcript = buildSessionTranscript(DEVICE_ENGAGEMENT, readerKey.publicKey.encodeCoseKey(), null);
    const device = new SessionNearExhaustion(SessionRole.MDOC, deviceKey, readerKey.publicKey, transcript);
    const reader = new SessionNearExhaustion(SessionRole.MDOC_READER, readerKey, deviceKey.publicKey, transcript);

    device.jumpEncryptCounter(ENCRYPTION_CONFIG.MAX_COUNTER);
    reader.jumpDecryptCounter(ENCRYPTION_CONFIG.MAX_COUNTER);

    const last = device.encrypt(utf8ToBytes('last'));
    if (!last.ok) throw last.error;
    const opened = reader.decrypt(last.value);
    expect(opened.ok && text(opened.value)).toBe('last');

    const exhausted = device.encrypt(utf8ToBytes('one more'));
    expect(exhausted.ok).toBe(false);
    if (!exhausted.ok) {
      expect(exhausted.error.code).toBe(MdocErrorCode.SESSION_EXHAUSTED);
      expect(exhausted.error.kind).toBe(ErrorKind.CRYPTO);
      expect(exhausted.error.message).toBe('Outbound message counter exhausted, the session must be restarted');
    }

    const inbound = reader.decrypt(last.value);
    expect(!inbound.ok && inbound.error.code).toBe(MdocErrorCode.SESSION_EXHAUSTED);
  });
});

// ─── Malformed messages ──────────────────────────────────────────────────────

describe('SessionEncryption malformed input', () => {
  function established(): Parties {
    const p = parties();
    establish(p);
    return p;
  }

  it('rejects undecodable CBOR', () => {
    const result = established().device.decryptMessage(hexToBytes('ff'));
    expect(!result.ok && result.error.code).toBe(MdocErrorCode.INVALID_FORMAT);
  });

  it('rejects messages with neither data nor status', () => {
    const result = established().device.decryptMessage(encodeCbor(new Map<CborKey, CborValue>([['other', 1]])));
    expect(!result.ok && result.error.message).toBe('Session message has neither data nor status');
  });

  it('rejects data that is not a byte string', () => {
    const result = established().device.decryptMessage(encodeCbor(new Map<CborKey, CborValue>([['data', 'text']])));
    expect(!result.ok && result.error.message).toBe('Session message data is not a byte string');
  });

  it('rejects a SessionEstablishment sent to the reader', () => {
    const p = parties();
    const stray = new SessionEncryption(SessionRole.MDOC_READER, EcKeyPair.generate(EcCurve.P256), p.deviceKey.publicKey, p.transcript);
    const establishment = stray.encryptMessage(utf8ToBytes('x'));
    if (!establishment.ok) throw establishment.error;

    const result = p.reader.decryptMessage(establishment.value);
    expect(!result.ok && result.error.message).toBe('Reader received a SessionEstablishment');
  });

  it('rejects a second SessionEstablishment with another reader key', () => {
    const p = established();
    const intruderKey = EcKeyPair.generate(EcCurve.P256);
    const intruder = new SessionEncryption(SessionRole.MDOC_READER, intruderKey, p.deviceKey.publicKey, p.transcript);
    const establishment = intruder.encryptMessage(utf8ToBytes('x'));
    if (!establishment.ok) throw establishment.error;

    const result = p.device.decryptMessage(establishment.value);
    expect(!result.ok && result.error.code).toBe(MdocErrorCode.INVALID_KEY);
  });
});

describe('parseSessionEstablishment', () => {
  it('returns the plain key bytes used in the transcript', () => {
    const p = parties();
    const establishment = p.reader.encryptMessage(utf8ToBytes('request'));
    if (!establishment.ok) throw establishment.error;

    const parsed = parseSessionEstablishment(establishment.value);
    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(bytesToHex(parsed.value.eReaderKeyBytes)).toBe(bytesToHex(p.readerKey.publicKey.encodeCoseKey()));
      expect(parsed.value.eReaderKey.equals(p.readerKey.publicKey)).toBe(true);
      expect(parsed.value.data).toHaveLength(7 + 16);
    }
  });

  it('rejects a message without eReaderKey', () => {
    const result = parseSessionEstablishment(encodeCbor(new Map<CborKey, CborValue>([['data', new Uint8Array(4)]])));
    expect(!result.ok && result.error.code).toBe(MdocErrorCode.INVALID_FORMAT);
  });
});

// ─── Contract ────────────────────────────────────────────────────────────────

describe('SessionEncryption preconditions', () => {
  it('needs the peer key and transcript before encrypting', () => {
    const device = new SessionEncryption(SessionRole.MDOC, EcKeyPair.generate(EcCurve.P256));
    expect(device.state).toBe(SessionCryptoState.NO_KEYS);
    expectPrecondition(() => device.encrypt(utf8ToBytes('x')), MdocErrorCode.KEYS_NOT_DERIVED);

    device.setPeerKey(EcKeyPair.generate(EcCurve.P256).publicKey);
    expect(device.state).toBe(SessionCryptoState.SHARED_SECRET_COMPUTED);
    expectPrecondition(() => device.encrypt(utf8ToBytes('x')), MdocErrorCode.KEYS_NOT_DERIVED);
  });

  it('fixes the transcript only once', () => {
    const p = parties();
    expectPrecondition(() => p.reader.setSessionTranscript(p.transcript), MdocErrorCode.TRANSCRIPT_ALREADY_SET);
  });

  it('refuses to swap the peer key', () => {
    const p = parties();
    p.reader.setPeerKey(p.deviceKey.publicKey);
    expectPrecondition(
      () => p.reader.setPeerKey(EcKeyPair.generate(EcCurve.P256).publicKey),
      MdocErrorCode.INVALID_OPERATION,
    );
  });

  it('keeps role-specific helpers to their role', () => {
    const p = parties();
    establish(p);
    expect(p.device.encryptToReader(utf8ToBytes('x')).ok).toBe(true);
    expectPrecondition(() => p.reader.encryptToReader(utf8ToBytes('x')), MdocErrorCode.INVALID_OPERATION);
    expectPrecondition(() => p.device.decryptFromDevice(utf8ToBytes('x')), MdocErrorCode.INVALID_OPERATION);
  });

  it('zeroes and refuses everything after destroy()', () => {
    const p = parties();
    establish(p);
    p.device.destroy();
    expect(p.device.state).toBe(SessionCryptoState.DESTROYED);
    expectPrecondition(() => p.device.encrypt(utf8ToBytes('x')), MdocErrorCode.SESSION_DESTROYED);
    expectPrecondition(() => p.device.deriveKeys(), MdocErrorCode.SESSION_DESTROYED);
  });
});

// ─── Device authentication ───────────────────────────────────────────────────

describe('device authentication', () => {
  it('signs DeviceAuthenticationBytes for the reader to verify', () => {
    const p = parties();
    establish(p);
    const staticKey = EcKeyPair.generate(EcCurve.P256);

    const signature = p.device.signDeviceAuthentication(staticKey, DOC_TYPE, NAME_SPACES);
    expect(signature.payload).toBeNull();
    expect(p.reader.verifyDeviceAuthentication(signature, staticKey.publicKey, DOC_TYPE, NAME_SPACES))
      .toEqual({ ok: true, value: true });
    expect(p.reader.verifyDeviceAuthentication(signature, staticKey.publicKey, 'org.example.other', NAME_SPACES))
      .toEqual({ ok: true, value: false });
  });

  it('MACs DeviceAuthenticationBytes with the EMacKey both sides derive', () => {
    const p = parties();
    establish(p);
    const staticKey = EcKeyPair.generate(EcCurve.P256);

    const mac = p.device.macDeviceAuthentication(staticKey, DOC_TYPE, NAME_SPACES);
    expect(mac.payload).toBeNull();
    expect(p.reader.verifyDeviceMac(mac, staticKey.publicKey, DOC_TYPE, NAME_SPACES)).toEqual({ ok: true, value: true });

    const otherKey = EcKeyPair.generate(EcCurve.P256);
    expect(p.reader.verifyDeviceMac(mac, otherKey.publicKey, DOC_TYPE, NAME_SPACES)).toEqual({ ok: true, value: false });
  });

  it('agrees on DeviceAuthenticationBytes', () => {
    const p = parties();
    establish(p);
    expect(bytesToHex(p.device.deviceAuthenticationBytes(DOC_TYPE, NAME_SPACES)))
      .toBe(bytesToHex(p.reader.deviceAuthenticationBytes(DOC_TYPE, NAME_SPACES)));
  });
});
