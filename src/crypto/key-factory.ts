/**
 * Key factories turning key specifications into engine ready keys
 */

import { DerError, EDDSA, ED25519, ED448, EdDsaVariant, PrivateKeyInfo, decodePrivateKeyInfo, edDsaNameForOid } from './der';
import { EDDSA_PARAMETERS } from './engines';
import { InvalidKeySpecError, NoSuchAlgorithmError, getErrorMessage } from './errors';
import { KeyFactory, KeySpec, PrivateKey, PublicKey } from './types';

const EDDSA_NAMES: EdDsaVariant[] = [ED25519, ED448];

function isEdDsaVariant(name: string): name is EdDsaVariant {
  return name === ED25519 || name === ED448;
}

function parsePkcs8(encoded: Uint8Array): PrivateKeyInfo {
  try {
    return decodePrivateKeyInfo(encoded);
  } catch (error) {
    if (error instanceof DerError) {
      throw new InvalidKeySpecError(`Malformed PKCS#8 key: ${getErrorMessage(error)}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Factory for EdDSA keys. The generic "EdDSA" factory accepts both
 * variants and takes the variant from the key's OID (private) or length (public).
 */
class EdDsaKeyFactory implements KeyFactory {
  constructor(public readonly algorithm: 'EdDSA' | EdDsaVariant) {}

  generatePrivate(spec: KeySpec): PrivateKey {
    if (spec.kind !== 'pkcs8') {
      throw new InvalidKeySpecError(`${this.algorithm} private keys need a PKCS#8 spec, got ${spec.kind}`);
    }

    const info = parsePkcs8(spec.encoded);
    const name = edDsaNameForOid(info.algorithm);
    if (!name) {
      throw new InvalidKeySpecError(`OID ${info.algorithm} is not an EdDSA algorithm`);
    }
    this.checkVariant(name);

    const { keyLength } = EDDSA_PARAMETERS[name];
    if (info.privateKey.length !== keyLength) {
      throw new InvalidKeySpecError(`${name} private key must be ${keyLength} bytes, got ${info.privateKey.length}`);
    }
    return { type: 'private', algorithm: name, format: 'raw', encoded: info.privateKey };
  }

  generatePublic(spec: KeySpec): PublicKey {
    if (spec.kind !== 'raw-public') {
      throw new InvalidKeySpecError(`${this.algorithm} public keys need a raw public spec, got ${spec.kind}`);
    }
    const name = this.variantForLength(spec.encoded.length);
    try {
      EDDSA_PARAMETERS[name].curve.ExtendedPoint.fromHex(spec.encoded);
    } catch (error) {
      throw new InvalidKeySpecError(`Invalid ${name} public key: ${getErrorMessage(error)}`, { cause: error });
    }
    return { type: 'public', algorithm: name, format: 'raw', encoded: spec.encoded.slice() };
  }

  private checkVariant(name: EdDsaVariant): void {
    if (this.algorithm !== EDDSA && this.algorithm !== name) {
      throw new InvalidKeySpecError(`${this.algorithm} factory cannot build ${name} keys`);
    }
  }

  private variantForLength(length: number): EdDsaVariant {
    const name = EDDSA_NAMES.find(
      variant => EDDSA_PARAMETERS[variant].keyLength === length
    );
    if (!name) {
      throw new InvalidKeySpecError(`No EdDSA variant uses ${length} byte public keys`);
    }
    this.checkVariant(name);
    return name;
  }
}

/**
 * Create a key factory for a standard algorithm name
 *
 * @throws NoSuchAlgorithmError if no factory exists for the name
 */
export function createKeyFactory(algorithm: string): KeyFactory {
  if (algorithm === EDDSA || isEdDsaVariant(algorithm)) {
    return new EdDsaKeyFactory(algorithm);
  }
  throw new NoSuchAlgorithmError(algorithm);
}
