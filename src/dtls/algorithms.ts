/**
 * Signature and hash algorithm registry (RFC 5246 section 7.4.1.4.1, RFC 8422)
 *
 * Maps the on-the-wire (hash, signature) code pair to the name of the
 * signature engine that implements it.
 */

import { getEdDsaStandardAlgorithmName } from '../crypto/der';
import { PublicKey } from '../crypto/types';

export enum HashAlgorithm {
  NONE = 0,
  MD5 = 1,
  SHA1 = 2,
  SHA224 = 3,
  SHA256 = 4,
  SHA384 = 5,
  SHA512 = 6,
  /** The signature algorithm hashes internally (EdDSA) */
  INTRINSIC = 8,
}

export enum SignatureAlgorithm {
  ANONYMOUS = 0,
  RSA = 1,
  DSA = 2,
  ECDSA = 3,
  ED25519 = 7,
  ED448 = 8,
}

/** Largest code a single byte can carry */
const MAX_CODE = 0xff;

const HASH_NAMES: ReadonlyMap<number, string> = new Map([
  [HashAlgorithm.SHA1, 'SHA1'],
  [HashAlgorithm.SHA224, 'SHA224'],
  [HashAlgorithm.SHA256, 'SHA256'],
  [HashAlgorithm.SHA384, 'SHA384'],
  [HashAlgorithm.SHA512, 'SHA512'],
]);

const SIGNATURE_NAMES: ReadonlyMap<number, string> = new Map([
  [SignatureAlgorithm.ECDSA, 'ECDSA'],
  [SignatureAlgorithm.RSA, 'RSA'],
]);

function codeFor(names: ReadonlyMap<number, string>, name: string): number | undefined {
  for (const [code, candidate] of names) {
    if (candidate === name.toUpperCase()) {
      return code;
    }
  }
  return undefined;
}

function hex(code: number): string {
  return `0x${code.toString(16).padStart(2, '0')}`;
}

/**
 * The (hash, signature) pair agreed for a digitally-signed struct.
 *
 * Any pair of byte codes can be represented, so unknown pairs received from a
 * peer survive decoding; they just do not resolve to an engine.
 */
export class SignatureAndHashAlgorithm {
  constructor(
    public readonly hash: number,
    public readonly signature: number
  ) {
    for (const code of [hash, signature]) {
      if (!Number.isInteger(code) || code < 0 || code > MAX_CODE) {
        throw new RangeError(`Algorithm code ${code} does not fit into one byte`);
      }
    }
  }

  /**
   * Name of the engine implementing this pair, e.g. "SHA256withECDSA" or
   * "Ed25519"; undefined for pairs without a known engine name.
   */
  resolveEngineName(): string | undefined {
    if (this.hash === HashAlgorithm.INTRINSIC) {
      if (this.signature === SignatureAlgorithm.ED25519) return 'Ed25519';
      if (this.signature === SignatureAlgorithm.ED448) return 'Ed448';
      return undefined;
    }
    const hash = HASH_NAMES.get(this.hash);
    const signature = SIGNATURE_NAMES.get(this.signature);
    return hash && signature ? `${hash}with${signature}` : undefined;
  }

  /**
   * Whether `publicKey` belongs to the key family this pair signs with
   */
  isSupported(publicKey: PublicKey): boolean {
    if (!this.resolveEngineName()) {
      return false;
    }
    switch (this.signature) {
      case SignatureAlgorithm.ECDSA:
        return ['EC', 'ECDSA'].includes(publicKey.algorithm.toUpperCase());
      case SignatureAlgorithm.ED25519:
        return getEdDsaStandardAlgorithmName(publicKey.algorithm) === 'Ed25519';
      case SignatureAlgorithm.ED448:
        return getEdDsaStandardAlgorithmName(publicKey.algorithm) === 'Ed448';
      default:
        return false;
    }
  }

  equals(other: SignatureAndHashAlgorithm): boolean {
    return this.hash === other.hash && this.signature === other.signature;
  }

  toString(): string {
    return this.resolveEngineName() ?? `${hex(this.hash)}/${hex(this.signature)}`;
  }

  /**
   * Parse a JCA style name ("SHA256withECDSA", "Ed25519")
   *
   * @returns undefined for unknown names
   */
  static valueOf(name: string): SignatureAndHashAlgorithm | undefined {
    const edDsa = getEdDsaStandardAlgorithmName(name);
    if (edDsa === 'Ed25519') {
      return new SignatureAndHashAlgorithm(HashAlgorithm.INTRINSIC, SignatureAlgorithm.ED25519);
    }
    if (edDsa === 'Ed448') {
      return new SignatureAndHashAlgorithm(HashAlgorithm.INTRINSIC, SignatureAlgorithm.ED448);
    }

    const match = /^(\w+)with(\w+)$/i.exec(name.trim());
    if (!match) {
      return undefined;
    }
    const hash = codeFor(HASH_NAMES, match[1]);
    const signature = codeFor(SIGNATURE_NAMES, match[2]);
    if (hash === undefined || signature === undefined) {
      return undefined;
    }
    return new SignatureAndHashAlgorithm(hash, signature);
  }
}

/**
 * Resolve a code pair to an engine name
 */
export function resolve(hash: number, signature: number): string | undefined {
  return new SignatureAndHashAlgorithm(hash, signature).resolveEngineName();
}

/**
 * Pairs offered by default, EdDSA first
 */
export const DEFAULT_SIGNATURE_AND_HASH_ALGORITHMS: readonly SignatureAndHashAlgorithm[] = [
  new SignatureAndHashAlgorithm(HashAlgorithm.INTRINSIC, SignatureAlgorithm.ED25519),
  new SignatureAndHashAlgorithm(HashAlgorithm.INTRINSIC, SignatureAlgorithm.ED448),
  new SignatureAndHashAlgorithm(HashAlgorithm.SHA256, SignatureAlgorithm.ECDSA),
  new SignatureAndHashAlgorithm(HashAlgorithm.SHA384, SignatureAlgorithm.ECDSA),
  new SignatureAndHashAlgorithm(HashAlgorithm.SHA512, SignatureAlgorithm.ECDSA),
];
