/**
 * CertificateVerify handshake message (RFC 5246 section 7.4.8)
 *
 * Proves possession of the private key of the certificate sent earlier by
 * signing every handshake message exchanged so far. It immediately follows
 * the ClientKeyExchange message.
 *
 * Wire layout:
 *   hash algorithm (8) | signature algorithm (8) | length (16) | signature
 */

import { PrivateKey, PublicKey } from '../crypto/types';
import { equalBytes } from '../crypto/utils';
import { SignatureAndHashAlgorithm } from './algorithms';
import { DatagramReader, DatagramWriter } from './datagram';
import { DecodeError, SigningFailure } from './errors';
import { HandshakeMessage, HandshakeType, TranscriptEntry } from './handshake';
import { PeerAddress } from './peer';
import { MAX_SIGNATURE_LENGTH, VerificationOutcome } from './transcript';
import { TranscriptSigner } from './transcript-signer';
import { TranscriptVerifier } from './transcript-verifier';

const HASH_ALGORITHM_BITS = 8;
const SIGNATURE_ALGORITHM_BITS = 8;
const SIGNATURE_LENGTH_BITS = 16;

/** algorithm pair (2 bytes) + signature length field (2 bytes) */
const FIXED_LENGTH = 4;

export type CertificateVerifyResult =
  | { ok: true; message: CertificateVerify }
  | { ok: false; failure: SigningFailure };

let sharedSigner: TranscriptSigner | undefined;
let sharedVerifier: TranscriptVerifier | undefined;

function defaultSigner(): TranscriptSigner {
  return (sharedSigner ??= new TranscriptSigner());
}

function defaultVerifier(): TranscriptVerifier {
  return (sharedVerifier ??= new TranscriptVerifier());
}

export class CertificateVerify extends HandshakeMessage {
  private readonly signatureBytes: Uint8Array;

  private constructor(
    public readonly algorithm: SignatureAndHashAlgorithm,
    signature: Uint8Array,
    peer?: PeerAddress
  ) {
    super(peer);
    if (signature.length > MAX_SIGNATURE_LENGTH) {
      throw new RangeError(`Signature of ${signature.length} bytes exceeds ${MAX_SIGNATURE_LENGTH}`);
    }
    this.signatureBytes = signature.slice();
  }

  /**
   * Sign the handshake messages exchanged so far with the local private key.
   *
   * @param transcript handshake messages in the order they were sent/received
   * @param peer the peer the message will be sent to
   */
  static create(
    algorithm: SignatureAndHashAlgorithm,
    privateKey: PrivateKey,
    transcript: Iterable<TranscriptEntry>,
    peer?: PeerAddress,
    signer: TranscriptSigner = defaultSigner()
  ): CertificateVerifyResult {
    const result = signer.sign(privateKey, algorithm, transcript, peer);
    if (!result.ok) {
      return result;
    }
    return { ok: true, message: new CertificateVerify(algorithm, result.signature, peer) };
  }

  /**
   * Read the message body. Algorithm codes are taken as they come; whether
   * they are usable is decided when verifying.
   *
   * @throws DecodeError if the header or the announced signature is truncated
   */
  static fromReader(reader: DatagramReader, peer?: PeerAddress): CertificateVerify {
    const hash = reader.read(HASH_ALGORITHM_BITS);
    const signatureAlgorithm = reader.read(SIGNATURE_ALGORITHM_BITS);
    const algorithm = new SignatureAndHashAlgorithm(hash, signatureAlgorithm);

    const length = reader.read(SIGNATURE_LENGTH_BITS);
    const signature = reader.readBytes(length);

    return new CertificateVerify(algorithm, signature, peer);
  }

  /**
   * Decode a complete message body; trailing bytes are rejected.
   *
   * @throws DecodeError
   */
  static fromByteArray(fragment: Uint8Array, peer?: PeerAddress): CertificateVerify {
    const reader = new DatagramReader(fragment, peer);
    const message = CertificateVerify.fromReader(reader, peer);
    if (reader.bytesAvailable() > 0) {
      throw new DecodeError(`${reader.bytesAvailable()} unexpected bytes after CertificateVerify`, peer);
    }
    return message;
  }

  getMessageType(): HandshakeType {
    return HandshakeType.CERTIFICATE_VERIFY;
  }

  getMessageLength(): number {
    return FIXED_LENGTH + this.signatureBytes.length;
  }

  fragmentToByteArray(): Uint8Array {
    return new DatagramWriter()
      .write(this.algorithm.hash, HASH_ALGORITHM_BITS)
      .write(this.algorithm.signature, SIGNATURE_ALGORITHM_BITS)
      .write(this.signatureBytes.length, SIGNATURE_LENGTH_BITS)
      .writeBytes(this.signatureBytes)
      .toByteArray();
  }

  get signature(): Uint8Array {
    return this.signatureBytes.slice();
  }

  /**
   * Verify the peer's signature over the handshake messages exchanged so far.
   * A failed outcome must abort the handshake with the carried alert.
   */
  verifySignature(
    publicKey: PublicKey,
    transcript: Iterable<TranscriptEntry>,
    verifier: TranscriptVerifier = defaultVerifier()
  ): VerificationOutcome {
    return verifier.verify(publicKey, this.algorithm, this.signatureBytes, transcript, this.peer);
  }

  /**
   * Like verifySignature, but throws the AuthenticationFailure
   */
  assertValid(
    publicKey: PublicKey,
    transcript: Iterable<TranscriptEntry>,
    verifier: TranscriptVerifier = defaultVerifier()
  ): void {
    const outcome = this.verifySignature(publicKey, transcript, verifier);
    if (!outcome.valid) {
      throw outcome.failure;
    }
  }

  equals(other: CertificateVerify): boolean {
    return this.algorithm.equals(other.algorithm) && equalBytes(this.signatureBytes, other.signatureBytes);
  }

  toString(): string {
    return `CertificateVerify(${this.algorithm}, ${this.signatureBytes.length} byte signature)`;
  }
}

export function encode(message: CertificateVerify): Uint8Array {
  return message.fragmentToByteArray();
}

export function decode(reader: DatagramReader, peer?: PeerAddress): CertificateVerify {
  return CertificateVerify.fromReader(reader, peer);
}

export function messageLength(message: CertificateVerify): number {
  return message.getMessageLength();
}
