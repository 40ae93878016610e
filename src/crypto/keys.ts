/**
 * Key generation and export
 */

import { ED25519, ED448, EdDsaVariant, encodePrivateKeyInfo, getEdDsaStandardAlgorithmName, oidForEdDsaName } from './der';
import { CURVES, EDDSA_PARAMETERS } from './engines';
import { InvalidKeySpecError } from './errors';
import { KeyPair, NamedCurve, PrivateKey } from './types';

export type KeyAlgorithm = 'EC' | EdDsaVariant;

/**
 * Generate a fresh key pair with raw encoded keys.
 *
 * EC public keys are uncompressed SEC1 points.
 */
export function generateKeyPair(algorithm: KeyAlgorithm, curve: NamedCurve = 'secp256r1'): KeyPair {
  if (algorithm === 'EC') {
    const ec = CURVES[curve];
    const secret = ec.utils.randomPrivateKey();
    return {
      privateKey: { type: 'private', algorithm: 'EC', format: 'raw', encoded: secret, curve },
      publicKey: { type: 'public', algorithm: 'EC', format: 'raw', encoded: ec.getPublicKey(secret, false), curve },
    };
  }

  const { curve: ed } = EDDSA_PARAMETERS[algorithm];
  const seed = ed.utils.randomPrivateKey();
  return {
    privateKey: { type: 'private', algorithm, format: 'raw', encoded: seed },
    publicKey: { type: 'public', algorithm, format: 'raw', encoded: ed.getPublicKey(seed) },
  };
}

/**
 * Export an EdDSA private key as PKCS#8 PrivateKeyInfo
 *
 * @throws InvalidKeySpecError for keys that are not EdDSA or whose variant is unknown
 */
export function exportPkcs8(key: PrivateKey): Uint8Array {
  if (key.format === 'pkcs8') {
    return key.encoded.slice();
  }
  const name = getEdDsaStandardAlgorithmName(key.algorithm);
  const variant = name === ED25519 || name === ED448 ? name : variantForSeedLength(key.encoded.length);
  const oid = variant && oidForEdDsaName(variant);
  if (key.format !== 'raw' || !name || !oid) {
    throw new InvalidKeySpecError(`Cannot export ${key.algorithm} (${key.format}) key as PKCS#8`);
  }
  return encodePrivateKeyInfo({ algorithm: oid, privateKey: key.encoded });
}

function variantForSeedLength(length: number): EdDsaVariant | undefined {
  if (length === EDDSA_PARAMETERS.Ed25519.keyLength) return ED25519;
  if (length === EDDSA_PARAMETERS.Ed448.keyLength) return ED448;
  return undefined;
}
