/**
 * Private key re-encoding strategies.
 *
 * Certificate stacks hand over EdDSA keys under provider specific names and
 * encodings ("EdDSA", bare OIDs, PKCS#8 blobs) that a signature engine
 * refuses even though the algorithm family matches. A strategy, looked up
 * by the key's native algorithm identifier, rebuilds the key through the
 * standard key factory so the engine accepts it.
 */

import { CryptoMap } from './crypto-map';
import { ED25519, ED448, EDDSA, OID_ED25519, OID_ED448, getEdDsaStandardAlgorithmName } from './der';
import { exportPkcs8 } from './keys';
import { KeyFactory, PrivateKey } from './types';

export interface KeyReencoder {
  /** Standard algorithm name whose key factory performs the re-encoding */
  readonly standardName: string;
  reencode(key: PrivateKey, factory: KeyFactory): PrivateKey;
}

/**
 * Re-encodes through the key's PKCS#8 export
 */
export function pkcs8Reencoder(standardName: string): KeyReencoder {
  return {
    standardName,
    reencode(key: PrivateKey, factory: KeyFactory): PrivateKey {
      return factory.generatePrivate({ kind: 'pkcs8', encoded: exportPkcs8(key) });
    },
  };
}

export class KeyReencoderRegistry {
  private readonly strategies = new Map<string, KeyReencoder>();

  /**
   * Register a strategy for a native algorithm identifier (case-insensitive)
   */
  register(nativeAlgorithm: string, strategy: KeyReencoder): this {
    this.strategies.set(nativeAlgorithm.trim().toLowerCase(), strategy);
    return this;
  }

  find(nativeAlgorithm: string): KeyReencoder | undefined {
    return this.strategies.get(nativeAlgorithm.trim().toLowerCase());
  }

  /**
   * Re-encode `key` with the strategy registered for its algorithm.
   *
   * @returns the re-encoded key, or undefined when no strategy applies
   * @throws whatever the key factory or the export raises
   */
  reencode(key: PrivateKey, factories: CryptoMap<KeyFactory>): PrivateKey | undefined {
    const strategy = this.find(key.algorithm);
    if (!strategy) {
      return undefined;
    }
    return strategy.reencode(key, factories.get(strategy.standardName));
  }
}

const EDDSA_IDENTIFIERS = [
  EDDSA,
  ED25519,
  ED448,
  OID_ED25519,
  `OID.${OID_ED25519}`,
  OID_ED448,
  `OID.${OID_ED448}`,
];

/**
 * Registry covering every identifier EdDSA keys are known to travel under
 */
export function createDefaultKeyReencoders(): KeyReencoderRegistry {
  const registry = new KeyReencoderRegistry();
  for (const identifier of EDDSA_IDENTIFIERS) {
    const standardName = getEdDsaStandardAlgorithmName(identifier);
    if (standardName) {
      registry.register(identifier, pkcs8Reencoder(standardName));
    }
  }
  return registry;
}
