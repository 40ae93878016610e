/**
 * Tests for the @noble/curves backed signature engines
 */

import { p256 } from '@noble/curves/p256';
import { sha256 } from '@noble/hashes/sha2';
import { createSignatureEngine } from '../engines';
import { InvalidKeyError, NoSuchAlgorithmError, SignatureError } from '../errors';
import { generateKeyPair } from '../keys';
import { secureRandom } from '../random';
import { NamedCurve, PrivateKey, SignatureEngine } from '../types';
import { hexToBytes } from '../utils';

const encoder = new TextEncoder();

function signParts(engine: SignatureEngine, key: PrivateKey, parts: string[]): Uint8Array {
  engine.initSign(key, secureRandom);
  for (const part of parts) {
    engine.update(encoder.encode(part));
  }
  return engine.sign();
}

describe('Signature Engines', () => {
  describe('createSignatureEngine', () => {
    it.each(['SHA1withECDSA', 'SHA224withECDSA', 'SHA256withECDSA', 'SHA384withECDSA', 'SHA512withECDSA', 'Ed25519', 'Ed448'])(
      'should create %s',
      name => {
        expect(createSignatureEngine(name).algorithm).toBe(name);
      }
    );

    it('should reject unsupported algorithms', () => {
      expect(() => createSignatureEngine('SHA256withRSA')).toThrow(NoSuchAlgorithmError);
      expect(() => createSignatureEngine('SHA256withRSA')).toThrow('SHA256withRSA is not supported');
    });
  });

  describe('ECDSA', () => {
    it.each<[string, NamedCurve]>([
      ['SHA256withECDSA', 'secp256r1'],
      ['SHA384withECDSA', 'secp384r1'],
      ['SHA512withECDSA', 'secp521r1'],
      ['SHA256withECDSA', 'secp256k1'],
    ])('should sign and verify with %s on %s', (name, curve) => {
      const engine = createSignatureEngine(name);
      const { privateKey, publicKey } = generateKeyPair('EC', curve);

      const signature = signParts(engine, privateKey, ['hello', 'world']);

      engine.initVerify(publicKey);
      engine.update(encoder.encode('helloworld'));
      expect(engine.verify(signature)).toBe(true);
    });

    it('should produce DER signatures over the digest of all updates', () => {
      const engine = createSignatureEngine('SHA256withECDSA');
      const { privateKey, publicKey } = generateKeyPair('EC', 'secp256r1');

      const signature = signParts(engine, privateKey, ['first', 'second']);

      const digest = sha256(encoder.encode('firstsecond'));
      expect(signature[0]).toBe(0x30);
      expect(p256.verify(signature, digest, publicKey.encoded)).toBe(true);
    });

    it('should reject a signature over different data', () => {
      const engine = createSignatureEngine('SHA256withECDSA');
      const { privateKey, publicKey } = generateKeyPair('EC');
      const signature = signParts(engine, privateKey, ['expected']);

      engine.initVerify(publicKey);
      engine.update(encoder.encode('tampered'));

      expect(engine.verify(signature)).toBe(false);
    });

    it('should raise a SignatureError for malformed signatures', () => {
      const engine = createSignatureEngine('SHA256withECDSA');
      const { publicKey } = generateKeyPair('EC');

      engine.initVerify(publicKey);
      engine.update(encoder.encode('data'));

      expect(() => engine.verify(new Uint8Array([1, 2, 3]))).toThrow(SignatureError);
    });

    it('should accept high-S signatures from peers', () => {
      const engine = createSignatureEngine('SHA256withECDSA');
      const { privateKey, publicKey } = generateKeyPair('EC');
      const lowS = p256.Signature.fromDER(signParts(engine, privateKey, ['data']));
      const highS = p256.Signature.fromCompact(
        lowS.r.toString(16).padStart(64, '0') + (p256.CURVE.n - lowS.s).toString(16).padStart(64, '0')
      );

      engine.initVerify(publicKey);
      engine.update(encoder.encode('data'));

      expect(highS.hasHighS()).toBe(true);
      expect(engine.verify(highS.toDERRawBytes())).toBe(true);
    });

    it('should refuse EdDSA keys', () => {
      const engine = createSignatureEngine('SHA256withECDSA');
      const { privateKey } = generateKeyPair('Ed25519');

      expect(() => engine.initSign(privateKey, secureRandom)).toThrow(InvalidKeyError);
    });

    it('should refuse non-raw EC keys', () => {
      const engine = createSignatureEngine('SHA256withECDSA');
      const { privateKey } = generateKeyPair('EC');

      expect(() => engine.initSign({ ...privateKey, format: 'pkcs8' }, secureRandom)).toThrow(
        'SHA256withECDSA cannot use pkcs8 encoded keys'
      );
    });

    it('should refuse an invalid public point', () => {
      const engine = createSignatureEngine('SHA256withECDSA');
      const { publicKey } = generateKeyPair('EC');
      const broken = publicKey.encoded.slice();
      broken[1] ^= 0xff;

      expect(() => engine.initVerify({ ...publicKey, encoded: broken })).toThrow(InvalidKeyError);
    });

    it('should mix the secure random source into each signature', () => {
      const engine = createSignatureEngine('SHA256withECDSA');
      const { privateKey } = generateKeyPair('EC');
      const random = { nextBytes: jest.fn((length: number) => new Uint8Array(length).fill(1)) };

      engine.initSign(privateKey, random);
      engine.update(encoder.encode('data'));
      engine.sign();

      expect(random.nextBytes).toHaveBeenCalledWith(32);
    });
  });

  describe('EdDSA', () => {
    it.each<'Ed25519' | 'Ed448'>(['Ed25519', 'Ed448'])('should sign and verify with %s', name => {
      const engine = createSignatureEngine(name);
      const { privateKey, publicKey } = generateKeyPair(name);

      const signature = signParts(engine, privateKey, ['a', 'b', 'c']);

      engine.initVerify(publicKey);
      engine.update(encoder.encode('abc'));
      expect(engine.verify(signature)).toBe(true);
    });

    it('should be deterministic', () => {
      const engine = createSignatureEngine('Ed25519');
      const { privateKey } = generateKeyPair('Ed25519');

      expect(signParts(engine, privateKey, ['x'])).toEqual(signParts(engine, privateKey, ['x']));
    });

    it('should refuse keys announced under another name', () => {
      const engine = createSignatureEngine('Ed25519');
      const { privateKey } = generateKeyPair('Ed25519');

      expect(() => engine.initSign({ ...privateKey, algorithm: 'EdDSA' }, secureRandom)).toThrow(
        'Ed25519 cannot use EdDSA keys'
      );
    });

    it('should refuse keys of the wrong length', () => {
      const engine = createSignatureEngine('Ed448');
      const { privateKey } = generateKeyPair('Ed25519');

      expect(() => engine.initSign({ ...privateKey, algorithm: 'Ed448' }, secureRandom)).toThrow(
        'Ed448 requires a raw 57 byte key, got raw (32 bytes)'
      );
    });

    it('should raise a SignatureError for signatures of the wrong length', () => {
      const engine = createSignatureEngine('Ed25519');
      const { publicKey } = generateKeyPair('Ed25519');

      engine.initVerify(publicKey);

      expect(() => engine.verify(new Uint8Array(10))).toThrow('Ed25519 signature must be 64 bytes, got 10');
    });

    it.each<['Ed25519' | 'Ed448', number]>([
      ['Ed25519', 32],
      ['Ed448', 57],
    ])('should refuse the %s identity point as public key', (name, length) => {
      const engine = createSignatureEngine(name);
      const identity = new Uint8Array(length);
      identity[0] = 1;

      expect(() => engine.initVerify({ type: 'public', algorithm: name, format: 'raw', encoded: identity })).toThrow(
        `${name} public key has small order`
      );
    });

    it('should refuse non-canonical public key encodings', () => {
      const engine = createSignatureEngine('Ed25519');
      // y = 2^255 - 19, the field prime itself
      const encoded = hexToBytes('ed' + 'ff'.repeat(30) + '7f');

      expect(() => engine.initVerify({ type: 'public', algorithm: 'Ed25519', format: 'raw', encoded })).toThrow(
        InvalidKeyError
      );
    });
  });

  describe('engine state', () => {
    it('should refuse updates before initialization', () => {
      const engine = createSignatureEngine('SHA256withECDSA');

      expect(() => engine.update(new Uint8Array([1]))).toThrow('SHA256withECDSA engine not initialized');
    });

    it('should refuse to sign after initVerify', () => {
      const engine = createSignatureEngine('Ed25519');
      const { publicKey } = generateKeyPair('Ed25519');

      engine.initVerify(publicKey);

      expect(() => engine.sign()).toThrow('Ed25519 engine not initialized for signing');
    });

    it('should drop earlier updates on re-initialization', () => {
      const engine = createSignatureEngine('SHA256withECDSA');
      const { privateKey, publicKey } = generateKeyPair('EC');

      engine.initSign(privateKey, secureRandom);
      engine.update(encoder.encode('stale'));
      const signature = signParts(engine, privateKey, ['fresh']);

      engine.initVerify(publicKey);
      engine.update(encoder.encode('fresh'));
      expect(engine.verify(signature)).toBe(true);
    });
  });
});
