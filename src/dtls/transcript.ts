/**
 * Shared pieces of transcript signing and verification
 */

import { SignatureEngine } from '../crypto/types';
import { Logger } from '../logging';
import { AuthenticationFailure, SigningFailure } from './errors';
import { TranscriptEntry, describeEntry } from './handshake';

/** The signature length field is 16 bits wide */
export const MAX_SIGNATURE_LENGTH = 0xffff;

export type SigningResult =
  | { ok: true; signature: Uint8Array }
  | { ok: false; failure: SigningFailure };

export type VerificationOutcome =
  | { valid: true }
  | { valid: false; failure: AuthenticationFailure };

/**
 * Feed each entry's canonical bytes to the engine, strictly in order
 */
export function feedTranscript(
  engine: SignatureEngine,
  transcript: Iterable<TranscriptEntry>,
  logger: Logger
): number {
  let index = 0;
  for (const entry of transcript) {
    engine.update(entry.canonicalBytes());
    logger.trace(`  [${index}] - ${describeEntry(entry)}`);
    ++index;
  }
  return index;
}
