import { describe, it, expect } from 'vitest';
import {
  COSE_HEADER,
  COSE_TAG,
  buildMacStructure,
  buildSigStructure,
  certificateChainOf,
  coseMac0,
  coseMac0Verify,
  coseSign1Sign,
  coseSign1Verify,
  decodeCoseMac0,
  decodeCoseSign1,
  encodeCoseMac0,
  encodeCoseSign1,
  signatureDerToRaw,
  signatureRawToDer,
} from '../src/crypto/cose';
import { EcKeyPair, curveInfo } from '../src/crypto/keypair';
import { encodeCbor, parseCbor } from '../src/cbor/cbor';
import { CborTagged } from '../src/cbor/types';
import { EcCurve } from '../src/types/crypto';
import { MdocError, MdocErrorCode } from '../src/types/errors';
import { bytesToHex, concatBytes, hexToBytes, utf8ToBytes } from '../src/utils/bytes';

const PAYLOAD = utf8ToBytes('device authentication');
const MAC_KEY = utf8ToBytes('test-secret-test-secret-32-bytes');

// ─── Structures ──────────────────────────────────────────────────────────────

describe('to-be-signed structures', () => {
  it('builds Sig_structure', () => {
    expect(bytesToHex(buildSigStructure(hexToBytes('a10126'), hexToBytes('01'))))
      .toBe('846a5369676e61747572653143a10126404101');
  });

  it('builds MAC_structure', () => {
    expect(bytesToHex(buildMacStructure(hexToBytes('a10105'), new Uint8Array(0))))
      .toBe('84644d414330' + '43a10105' + '4040');
  });
});

// ─── Signature format ────────────────────────────────────────────────────────

describe('signature conversion', () => {
  it('converts fixed-width r || s to DER', () => {
    const raw = new Uint8Array(64);
    raw[31] = 1;
    raw[63] = 2;
    expect(bytesToHex(signatureRawToDer(raw))).toBe('3006020101020102');
  });

  it('adds a sign byte for high-bit integers', () => {
    const raw = new Uint8Array(64);
    raw[31] = 0x80;
    raw[63] = 1;
    expect(bytesToHex(signatureRawToDer(raw))).toBe('300702020080020101');
  });

  it('pads DER integers back to the coordinate size', () => {
    const raw = signatureDerToRaw(hexToBytes('300702020080020101'), 32);
    expect(raw).toHaveLength(64);
    expect(raw[31]).toBe(0x80);
    expect(raw[63]).toBe(1);
    expect(raw.slice(0, 31).every(byte => byte === 0)).toBe(true);
  });

  it('rejects malformed input', () => {
    expect(() => signatureDerToRaw(hexToBytes('3003020101'), 32)).toThrow(MdocError);
    expect(() => signatureRawToDer(new Uint8Array(63))).toThrow(/not even/);
  });
});

// ─── COSE_Sign1 ──────────────────────────────────────────────────────────────

describe('COSE_Sign1', () => {
  it.each([
    [EcCurve.P256, 'a10126'],
    [EcCurve.P384, 'a1013822'],
    [EcCurve.P521, 'a1013823'],
  ])('signs and verifies on curve %i', (curve, protectedHex) => {
    const key = EcKeyPair.generate(curve);
    const sign1 = coseSign1Sign(key, PAYLOAD);

    expect(bytesToHex(sign1.protectedHeaders)).toBe(protectedHex);
    expect(sign1.signature).toHaveLength(2 * curveInfo(curve).coordinateSize);
    expect(sign1.payload).toEqual(PAYLOAD);
    expect(coseSign1Verify(sign1, key.publicKey)).toEqual({ ok: true, value: true });
  });

  it('returns false for a signature over different content', () => {
    const key = EcKeyPair.generate(EcCurve.P256);
    const sign1 = coseSign1Sign(key, PAYLOAD, { detached: true });
    expect(sign1.payload).toBeNull();
    expect(coseSign1Verify(sign1, key.publicKey, PAYLOAD)).toEqual({ ok: true, value: true });
    expect(coseSign1Verify(sign1, key.publicKey, utf8ToBytes('tampered'))).toEqual({ ok: true, value: false });
  });

  it('returns false for another signer', () => {
    const sign1 = coseSign1Sign(EcKeyPair.generate(EcCurve.P256), PAYLOAD);
    const other = EcKeyPair.generate(EcCurve.P256);
    expect(coseSign1Verify(sign1, other.publicKey)).toEqual({ ok: true, value: false });
  });

  it('needs exactly one of embedded and detached content', () => {
    const key = EcKeyPair.generate(EcCurve.P256);
    const embedded = coseSign1Sign(key, PAYLOAD);
    const detached = coseSign1Sign(key, PAYLOAD, { detached: true });

    const both = coseSign1Verify(embedded, key.publicKey, PAYLOAD);
    expect(!both.ok && both.error.code).toBe(MdocErrorCode.INVALID_INPUT);

    const neither = coseSign1Verify(detached, key.publicKey);
    expect(!neither.ok && neither.error.code).toBe(MdocErrorCode.INVALID_INPUT);
  });

  it('rejects a key on another curve', () => {
    const sign1 = coseSign1Sign(EcKeyPair.generate(EcCurve.P256), PAYLOAD);
    const result = coseSign1Verify(sign1, EcKeyPair.generate(EcCurve.P384).publicKey);
    expect(!result.ok && result.error.code).toBe(MdocErrorCode.UNSUPPORTED_ALGORITHM);
  });

  it('rejects a signature of the wrong length', () => {
    const key = EcKeyPair.generate(EcCurve.P256);
    const sign1 = { ...coseSign1Sign(key, PAYLOAD), signature: new Uint8Array(63) };
    const result = coseSign1Verify(sign1, key.publicKey);
    expect(!result.ok && result.error.code).toBe(MdocErrorCode.INVALID_SIGNATURE);
    expect(!result.ok && result.error.message).toBe('Signature is 63 bytes, expected 64');
  });

  it('rejects an algorithm it cannot verify', () => {
    const key = EcKeyPair.generate(EcCurve.P256);
    const sign1 = { ...coseSign1Sign(key, PAYLOAD), protectedHeaders: hexToBytes('a10127') };
    const result = coseSign1Verify(sign1, key.publicKey);
    expect(!result.ok && result.error.code).toBe(MdocErrorCode.UNSUPPORTED_ALGORITHM);
    expect(!result.ok && result.error.message).toBe('Unsupported signature algorithm -8');
  });

  it('survives encoding with tag 18', () => {
    const key = EcKeyPair.generate(EcCurve.P256);
    const encoded = encodeCbor(new CborTagged(COSE_TAG.SIGN1, encodeCoseSign1(coseSign1Sign(key, PAYLOAD))));
    expect(bytesToHex(encoded.subarray(0, 2))).toBe('d284');

    const decoded = decodeCoseSign1(parseCbor(encoded));
    expect(decoded.ok).toBe(true);
    if (decoded.ok) {
      expect(coseSign1Verify(decoded.value, key.publicKey)).toEqual({ ok: true, value: true });
    }
  });

  it('rejects structures with the wrong arity', () => {
    const decoded = decodeCoseSign1([new Uint8Array(0), new Map(), null]);
    expect(!decoded.ok && decoded.error.code).toBe(MdocErrorCode.INVALID_FORMAT);
  });

  it('carries a certificate chain under x5chain', () => {
    const key = EcKeyPair.generate(EcCurve.P256);
    const leaf = hexToBytes('3082aa');
    const root = hexToBytes('3082bb');

    const single = coseSign1Sign(key, PAYLOAD, { certificateChain: [leaf] });
    expect(single.unprotectedHeaders.get(COSE_HEADER.X5CHAIN)).toEqual(leaf);
    expect(certificateChainOf(single)).toEqual([leaf]);

    const chain = coseSign1Sign(key, PAYLOAD, { certificateChain: [leaf, root] });
    expect(certificateChainOf(chain)).toEqual([leaf, root]);
    expect(certificateChainOf(coseSign1Sign(key, PAYLOAD))).toEqual([]);
  });
});

// ─── COSE_Mac0 ───────────────────────────────────────────────────────────────

describe('COSE_Mac0', () => {
  it('tags with HMAC 256/256 and verifies', () => {
    const mac0 = coseMac0(MAC_KEY, PAYLOAD);
    expect(bytesToHex(mac0.protectedHeaders)).toBe('a10105');
    expect(mac0.tag).toHaveLength(32);
    expect(coseMac0Verify(mac0, MAC_KEY)).toEqual({ ok: true, value: true });
  });

  it('returns false under another key', () => {
    const mac0 = coseMac0(MAC_KEY, PAYLOAD, true);
    expect(coseMac0Verify(mac0, utf8ToBytes('another-test-secret'), PAYLOAD)).toEqual({ ok: true, value: false });
  });

  it('produces the same tag for embedded and detached payloads', () => {
    const embedded = coseMac0(MAC_KEY, PAYLOAD);
    const detached = coseMac0(MAC_KEY, PAYLOAD, true);
    expect(bytesToHex(detached.tag)).toBe(bytesToHex(embedded.tag));
    expect(detached.payload).toBeNull();
  });

  it('rejects a different algorithm in the protected headers', () => {
    const mac0 = { ...coseMac0(MAC_KEY, PAYLOAD), protectedHeaders: hexToBytes('a10126') };
    const result = coseMac0Verify(mac0, MAC_KEY);
    expect(!result.ok && result.error.code).toBe(MdocErrorCode.UNSUPPORTED_ALGORITHM);
  });

  it('survives encoding with tag 17', () => {
    const mac0 = coseMac0(MAC_KEY, PAYLOAD, true);
    const encoded = encodeCbor(new CborTagged(COSE_TAG.MAC0, encodeCoseMac0(mac0)));
    const decoded = decodeCoseMac0(parseCbor(encoded));
    expect(decoded.ok).toBe(true);
    if (decoded.ok) {
      expect(decoded.value.payload).toBeNull();
      expect(coseMac0Verify(decoded.value, MAC_KEY, PAYLOAD)).toEqual({ ok: true, value: true });
    }
  });

  it('detects a flipped tag bit', () => {
    const mac0 = coseMac0(MAC_KEY, PAYLOAD);
    const flipped = concatBytes(Uint8Array.of(mac0.tag[0] ^ 1), mac0.tag.subarray(1));
    expect(coseMac0Verify({ ...mac0, tag: flipped }, MAC_KEY)).toEqual({ ok: true, value: false });
  });
});
