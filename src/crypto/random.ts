/**
 * Process wide secure random source.
 *
 * Backed by the platform CSPRNG through @noble/hashes; stateless, so any
 * number of callers can share it.
 */

import { randomBytes } from '@noble/hashes/utils';
import { SecureRandom } from './types';

export const secureRandom: SecureRandom = {
  nextBytes(length: number): Uint8Array {
    return randomBytes(length);
  },
};
