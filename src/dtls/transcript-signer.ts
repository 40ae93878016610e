/**
 * Signs the handshake transcript with the local private key
 */

import { CertificateVerifyConfig, resolveConfig } from '../config';
import { CryptoMap, KEY_FACTORIES, SIGNATURE_ENGINES } from '../crypto/crypto-map';
import { InvalidKeyError, NoSuchAlgorithmError, getErrorMessage } from '../crypto/errors';
import { KeyFactory, PrivateKey, SignatureEngine } from '../crypto/types';
import { SignatureAndHashAlgorithm } from './algorithms';
import { SigningFailure } from './errors';
import { TranscriptEntry } from './handshake';
import { PeerAddress } from './peer';
import { MAX_SIGNATURE_LENGTH, SigningResult, feedTranscript } from './transcript';

export class TranscriptSigner {
  private readonly config: CertificateVerifyConfig;

  constructor(
    config: Partial<CertificateVerifyConfig> = {},
    private readonly engines: CryptoMap<SignatureEngine> = SIGNATURE_ENGINES,
    private readonly keyFactories: CryptoMap<KeyFactory> = KEY_FACTORIES
  ) {
    this.config = resolveConfig(config);
  }

  /**
   * Sign the canonical bytes of `transcript`, in order, with `privateKey`.
   *
   * Never throws: every failure is returned as a SigningFailure.
   */
  sign(
    privateKey: PrivateKey,
    algorithm: SignatureAndHashAlgorithm,
    transcript: Iterable<TranscriptEntry>,
    peer?: PeerAddress
  ): SigningResult {
    const { logger } = this.config;
    try {
      const name = algorithm.resolveEngineName();
      if (!name) {
        throw new NoSuchAlgorithmError(algorithm.toString());
      }
      const engine = this.engines.get(name);
      this.initSign(engine, privateKey);

      const count = feedTranscript(engine, transcript, logger);
      const signature = engine.sign();
      if (signature.length > MAX_SIGNATURE_LENGTH) {
        throw new SigningFailure(`${name} signature of ${signature.length} bytes exceeds ${MAX_SIGNATURE_LENGTH}`, peer);
      }

      logger.debug(`Signed ${count} handshake messages with ${name}`);
      return { ok: true, signature };
    } catch (error) {
      const failure =
        error instanceof SigningFailure
          ? error
          : new SigningFailure(
              `Could not create ${algorithm} signature with ${privateKey.algorithm} key: ${getErrorMessage(error)}`,
              peer,
              { cause: error }
            );
      logger.error(failure.message);
      return { ok: false, failure };
    }
  }

  /**
   * Initialize for signing, retrying once with a re-encoded key when the
   * engine rejects the key object itself.
   */
  private initSign(engine: SignatureEngine, privateKey: PrivateKey): void {
    const { random, reencoders, keyReencoding, logger } = this.config;
    try {
      engine.initSign(privateKey, random);
    } catch (error) {
      if (!(error instanceof InvalidKeyError) || !keyReencoding) {
        throw error;
      }
      const reencoded = reencoders.reencode(privateKey, this.keyFactories);
      if (!reencoded) {
        throw error;
      }
      logger.debug(`Re-encoded ${privateKey.algorithm} private key as ${reencoded.algorithm} for ${engine.algorithm}`);
      engine.initSign(reencoded, random);
    }
  }
}
