/**
 * Core key and engine types shared by the signature engines
 */

/** Named curves the ECDSA engines understand */
export type NamedCurve = 'secp256r1' | 'secp384r1' | 'secp521r1' | 'secp256k1';

/**
 * How the `encoded` bytes of a key are laid out.
 * - raw: scalar/seed for private keys, point/public bytes for public keys
 * - pkcs8: DER PrivateKeyInfo (RFC 5958)
 * - spki: DER SubjectPublicKeyInfo (RFC 5280)
 */
export type KeyFormat = 'raw' | 'pkcs8' | 'spki';

interface KeyBase {
  /**
   * Native algorithm identifier as handed over by whoever produced the key,
   * e.g. "EC", "Ed25519", or a provider specific "EdDSA" / "1.3.101.112".
   */
  readonly algorithm: string;
  readonly format: KeyFormat;
  readonly encoded: Uint8Array;
  /** Only set for EC keys */
  readonly curve?: NamedCurve;
}

export interface PrivateKey extends KeyBase {
  readonly type: 'private';
}

export interface PublicKey extends KeyBase {
  readonly type: 'public';
}

export interface KeyPair {
  privateKey: PrivateKey;
  publicKey: PublicKey;
}

/**
 * Source of cryptographically secure random bytes.
 * Implementations must be usable from any caller at any time.
 */
export interface SecureRandom {
  nextBytes(length: number): Uint8Array;
}

/**
 * A stateful signature engine for one algorithm.
 *
 * Usage mirrors the classic init/update/finish pattern: `initSign` or
 * `initVerify` resets the engine, `update` feeds data in order, then
 * `sign` or `verify` consumes everything fed since the last init.
 */
export interface SignatureEngine {
  readonly algorithm: string;
  initSign(key: PrivateKey, random: SecureRandom): void;
  initVerify(key: PublicKey): void;
  update(data: Uint8Array): void;
  sign(): Uint8Array;
  verify(signature: Uint8Array): boolean;
}

/** Key specification accepted by a key factory */
export type KeySpec =
  | { kind: 'pkcs8'; encoded: Uint8Array }
  | { kind: 'raw-public'; encoded: Uint8Array };

/**
 * Builds standard key objects of one algorithm family from key specifications.
 */
export interface KeyFactory {
  readonly algorithm: string;
  generatePrivate(spec: KeySpec): PrivateKey;
  generatePublic(spec: KeySpec): PublicKey;
}
