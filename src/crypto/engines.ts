/**
 * Signature engines backed by @noble/curves
 *
 * - ECDSA over secp256r1, secp384r1, secp521r1 and secp256k1, with the
 *   transcript digested incrementally by the engine's hash (DER signatures)
 * - Ed25519 and Ed448 (PureEdDSA), buffering the transcript until finish
 */

import { p256 } from '@noble/curves/p256';
import { p384 } from '@noble/curves/p384';
import { p521 } from '@noble/curves/p521';
import { secp256k1 } from '@noble/curves/secp256k1';
import { ed25519 } from '@noble/curves/ed25519';
import { ed448 } from '@noble/curves/ed448';
import type { CurveFn as WeierstrassCurve } from '@noble/curves/abstract/weierstrass';
import type { CurveFn as EdwardsCurve } from '@noble/curves/abstract/edwards';
import { sha1 } from '@noble/hashes/sha1';
import { sha224, sha256, sha384, sha512 } from '@noble/hashes/sha2';
import { InvalidKeyError, NoSuchAlgorithmError, SignatureError, getErrorMessage } from './errors';
import { NamedCurve, PrivateKey, PublicKey, SecureRandom, SignatureEngine } from './types';
import { concatBytes } from './utils';

interface Digest {
  update(data: Uint8Array): unknown;
  digest(): Uint8Array;
}

type DigestFactory = () => Digest;

const DIGESTS: Record<string, DigestFactory> = {
  SHA1: () => sha1.create(),
  SHA224: () => sha224.create(),
  SHA256: () => sha256.create(),
  SHA384: () => sha384.create(),
  SHA512: () => sha512.create(),
};

export const CURVES: Record<NamedCurve, WeierstrassCurve> = {
  secp256r1: p256,
  secp384r1: p384,
  secp521r1: p521,
  secp256k1: secp256k1,
};

/** Entropy mixed into each ECDSA signature (hedged signing) */
const EXTRA_ENTROPY_BYTES = 32;

type Mode = 'none' | 'sign' | 'verify';

function isEcKey(key: PrivateKey | PublicKey): boolean {
  const name = key.algorithm.toUpperCase();
  return name === 'EC' || name === 'ECDSA';
}

class EcdsaSignatureEngine implements SignatureEngine {
  private mode: Mode = 'none';
  private digest?: Digest;
  private curve?: WeierstrassCurve;
  private privateScalar?: Uint8Array;
  private publicPoint?: Uint8Array;
  private random?: SecureRandom;

  constructor(
    public readonly algorithm: string,
    private readonly newDigest: DigestFactory
  ) {}

  initSign(key: PrivateKey, random: SecureRandom): void {
    this.reset();
    const curve = this.curveFor(key);
    if (key.type !== 'private' || !curve.utils.isValidPrivateKey(key.encoded)) {
      throw new InvalidKeyError(`${this.algorithm} requires a valid raw ${key.curve} private scalar`);
    }
    this.curve = curve;
    this.privateScalar = key.encoded;
    this.random = random;
    this.digest = this.newDigest();
    this.mode = 'sign';
  }

  initVerify(key: PublicKey): void {
    this.reset();
    const curve = this.curveFor(key);
    try {
      curve.ProjectivePoint.fromHex(key.encoded).assertValidity();
    } catch (error) {
      throw new InvalidKeyError(`Invalid ${key.curve} public point: ${getErrorMessage(error)}`, { cause: error });
    }
    this.curve = curve;
    this.publicPoint = key.encoded;
    this.digest = this.newDigest();
    this.mode = 'verify';
  }

  update(data: Uint8Array): void {
    if (this.mode === 'none' || !this.digest) {
      throw new SignatureError(`${this.algorithm} engine not initialized`);
    }
    this.digest.update(data);
  }

  sign(): Uint8Array {
    if (this.mode !== 'sign' || !this.digest || !this.curve || !this.privateScalar || !this.random) {
      throw new SignatureError(`${this.algorithm} engine not initialized for signing`);
    }
    const messageHash = this.digest.digest();
    this.digest = this.newDigest();
    try {
      const signature = this.curve.sign(messageHash, this.privateScalar, {
        lowS: true,
        extraEntropy: this.random.nextBytes(EXTRA_ENTROPY_BYTES),
      });
      return signature.toDERRawBytes();
    } catch (error) {
      throw new SignatureError(`${this.algorithm} signing failed: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  verify(signature: Uint8Array): boolean {
    if (this.mode !== 'verify' || !this.digest || !this.curve || !this.publicPoint) {
      throw new SignatureError(`${this.algorithm} engine not initialized for verification`);
    }
    const messageHash = this.digest.digest();
    this.digest = this.newDigest();

    this.checkSignature(this.curve, signature);
    // peers are not required to produce low-S signatures
    return this.curve.verify(signature, messageHash, this.publicPoint, { lowS: false, format: 'der' });
  }

  private checkSignature(curve: WeierstrassCurve, signature: Uint8Array): void {
    try {
      curve.Signature.fromDER(signature);
    } catch (error) {
      throw new SignatureError(`Malformed ${this.algorithm} signature: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  private curveFor(key: PrivateKey | PublicKey): WeierstrassCurve {
    if (!isEcKey(key)) {
      throw new InvalidKeyError(`${this.algorithm} cannot use ${key.algorithm} keys`);
    }
    if (key.format !== 'raw') {
      throw new InvalidKeyError(`${this.algorithm} cannot use ${key.format} encoded keys`);
    }
    if (!key.curve) {
      throw new InvalidKeyError('EC key without named curve');
    }
    return CURVES[key.curve];
  }

  private reset(): void {
    this.mode = 'none';
    this.digest = undefined;
    this.curve = undefined;
    this.privateScalar = undefined;
    this.publicPoint = undefined;
    this.random = undefined;
  }
}

interface EdDsaParameters {
  curve: EdwardsCurve;
  keyLength: number;
  signatureLength: number;
}

export const EDDSA_PARAMETERS: Record<'Ed25519' | 'Ed448', EdDsaParameters> = {
  Ed25519: { curve: ed25519, keyLength: 32, signatureLength: 64 },
  Ed448: { curve: ed448, keyLength: 57, signatureLength: 114 },
};

class EdDsaSignatureEngine implements SignatureEngine {
  private mode: Mode = 'none';
  private chunks: Uint8Array[] = [];
  private key?: Uint8Array;

  constructor(
    public readonly algorithm: 'Ed25519' | 'Ed448',
    private readonly params: EdDsaParameters
  ) {}

  initSign(key: PrivateKey): void {
    this.start(undefined, 'none');
    this.checkKey(key, 'private');
    this.start(key.encoded, 'sign');
  }

  initVerify(key: PublicKey): void {
    this.start(undefined, 'none');
    this.checkKey(key, 'public');
    this.checkPoint(key.encoded);
    this.start(key.encoded, 'verify');
  }

  update(data: Uint8Array): void {
    if (this.mode === 'none') {
      throw new SignatureError(`${this.algorithm} engine not initialized`);
    }
    // callers may reuse their buffers
    this.chunks.push(data.slice());
  }

  sign(): Uint8Array {
    if (this.mode !== 'sign' || !this.key) {
      throw new SignatureError(`${this.algorithm} engine not initialized for signing`);
    }
    const message = this.takeMessage();
    try {
      return this.params.curve.sign(message, this.key);
    } catch (error) {
      throw new SignatureError(`${this.algorithm} signing failed: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  verify(signature: Uint8Array): boolean {
    if (this.mode !== 'verify' || !this.key) {
      throw new SignatureError(`${this.algorithm} engine not initialized for verification`);
    }
    const message = this.takeMessage();
    if (signature.length !== this.params.signatureLength) {
      throw new SignatureError(
        `${this.algorithm} signature must be ${this.params.signatureLength} bytes, got ${signature.length}`
      );
    }
    // RFC 8032 rules: canonical encodings only
    return this.params.curve.verify(signature, message, this.key, { zip215: false });
  }

  /** Small order keys verify forged signatures for every message */
  private checkPoint(encoded: Uint8Array): void {
    let smallOrder: boolean;
    try {
      smallOrder = this.params.curve.ExtendedPoint.fromHex(encoded).isSmallOrder();
    } catch (error) {
      throw new InvalidKeyError(`Invalid ${this.algorithm} public key: ${getErrorMessage(error)}`, { cause: error });
    }
    if (smallOrder) {
      throw new InvalidKeyError(`${this.algorithm} public key has small order`);
    }
  }

  private checkKey(key: PrivateKey | PublicKey, type: 'private' | 'public'): void {
    if (key.type !== type) {
      throw new InvalidKeyError(`${this.algorithm} expected a ${type} key`);
    }
    if (key.algorithm.toLowerCase() !== this.algorithm.toLowerCase()) {
      throw new InvalidKeyError(`${this.algorithm} cannot use ${key.algorithm} keys`);
    }
    if (key.format !== 'raw' || key.encoded.length !== this.params.keyLength) {
      throw new InvalidKeyError(
        `${this.algorithm} requires a raw ${this.params.keyLength} byte key, got ${key.format} (${key.encoded.length} bytes)`
      );
    }
  }

  private start(key: Uint8Array | undefined, mode: Mode): void {
    this.key = key;
    this.chunks = [];
    this.mode = mode;
  }

  private takeMessage(): Uint8Array {
    const message = concatBytes(...this.chunks);
    this.chunks = [];
    return message;
  }
}

const ECDSA_NAME = /^(SHA1|SHA224|SHA256|SHA384|SHA512)withECDSA$/;

/**
 * Create a new signature engine for a JCA style algorithm name
 *
 * @throws NoSuchAlgorithmError if no engine implements the name
 */
export function createSignatureEngine(algorithm: string): SignatureEngine {
  const ecdsa = ECDSA_NAME.exec(algorithm);
  if (ecdsa) {
    return new EcdsaSignatureEngine(algorithm, DIGESTS[ecdsa[1]]);
  }
  if (algorithm === 'Ed25519' || algorithm === 'Ed448') {
    return new EdDsaSignatureEngine(algorithm, EDDSA_PARAMETERS[algorithm]);
  }
  throw new NoSuchAlgorithmError(algorithm);
}
