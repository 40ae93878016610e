/**
 * Lazily populated cache of expensive crypto objects, one per algorithm name.
 *
 * Module state lives per JavaScript realm: every worker thread loads its own
 * copy of this module and therefore owns its own instances. Within a realm
 * sign/verify run synchronously from init to finish, so an engine taken from
 * the cache is never interleaved between two callers.
 */

import { createKeyFactory } from './key-factory';
import { createSignatureEngine } from './engines';
import { KeyFactory, SignatureEngine } from './types';

export type CryptoFactory<T> = (algorithm: string) => T;

export class CryptoMap<T> {
  private readonly instances = new Map<string, T>();

  constructor(private readonly factory: CryptoFactory<T>) {}

  /**
   * Get the instance for `algorithm`, creating it on first use.
   * Factory errors propagate and nothing is cached for that name.
   */
  get(algorithm: string): T {
    const cached = this.instances.get(algorithm);
    if (cached !== undefined) {
      return cached;
    }
    const created = this.factory(algorithm);
    this.instances.set(algorithm, created);
    return created;
  }

  has(algorithm: string): boolean {
    return this.instances.has(algorithm);
  }

  get size(): number {
    return this.instances.size;
  }

  /** Drop every cached instance */
  clear(): void {
    this.instances.clear();
  }
}

export const SIGNATURE_ENGINES = new CryptoMap<SignatureEngine>(createSignatureEngine);

export const KEY_FACTORIES = new CryptoMap<KeyFactory>(createKeyFactory);
