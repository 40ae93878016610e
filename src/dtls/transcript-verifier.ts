/**
 * Verifies a peer's transcript signature with its certificate public key
 */

import { CertificateVerifyConfig, resolveConfig } from '../config';
import { CryptoMap, SIGNATURE_ENGINES } from '../crypto/crypto-map';
import { NoSuchAlgorithmError, getErrorMessage } from '../crypto/errors';
import { PublicKey, SignatureEngine } from '../crypto/types';
import { SignatureAndHashAlgorithm } from './algorithms';
import { AuthenticationFailure } from './errors';
import { TranscriptEntry } from './handshake';
import { PeerAddress, formatPeer } from './peer';
import { VerificationOutcome, feedTranscript } from './transcript';

export class TranscriptVerifier {
  private readonly config: CertificateVerifyConfig;

  constructor(
    config: Partial<CertificateVerifyConfig> = {},
    private readonly engines: CryptoMap<SignatureEngine> = SIGNATURE_ENGINES
  ) {
    this.config = resolveConfig(config);
  }

  /**
   * Check `signature` over the canonical bytes of `transcript`.
   *
   * Public keys are used as given. Any failure, including engine errors, is
   * an AuthenticationFailure carrying a fatal handshake_failure alert.
   */
  verify(
    publicKey: PublicKey,
    algorithm: SignatureAndHashAlgorithm,
    signature: Uint8Array,
    transcript: Iterable<TranscriptEntry>,
    peer?: PeerAddress
  ): VerificationOutcome {
    const { logger } = this.config;
    let reason = 'signature mismatch';
    let cause: unknown;
    try {
      const name = algorithm.resolveEngineName();
      if (!name) {
        throw new NoSuchAlgorithmError(algorithm.toString());
      }
      const engine = this.engines.get(name);
      engine.initVerify(publicKey);
      feedTranscript(engine, transcript, logger);
      if (engine.verify(signature)) {
        return { valid: true };
      }
    } catch (error) {
      reason = getErrorMessage(error);
      cause = error;
    }

    logger.error(`Could not verify the signature of ${formatPeer(peer)}: ${reason}`);
    const failure = new AuthenticationFailure(
      `The peer's CertificateVerify message could not be verified: ${reason}`,
      peer,
      { cause }
    );
    return { valid: false, failure };
  }
}
