/**
 * Handshake errors. Each carries the alert to send before the
 * connection is torn down.
 */

import { AlertDescription, AlertMessage } from './alert';
import { PeerAddress } from './peer';

export class HandshakeError extends Error {
  constructor(
    message: string,
    public readonly alert: AlertMessage,
    options?: { cause?: unknown }
  ) {
    super(message);
    this.name = 'HandshakeError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed or truncated wire bytes */
export class DecodeError extends HandshakeError {
  constructor(message: string, peer?: PeerAddress) {
    super(message, AlertMessage.fatal(AlertDescription.DECODE_ERROR, peer));
    this.name = 'DecodeError';
  }
}

/**
 * The private key could not produce a signature. The alert is only used if
 * the caller chooses to abort the handshake it was setting up.
 */
export class SigningFailure extends HandshakeError {
  constructor(message: string, peer?: PeerAddress, options?: { cause?: unknown }) {
    super(message, AlertMessage.fatal(AlertDescription.INTERNAL_ERROR, peer), options);
    this.name = 'SigningFailure';
  }
}

/** The peer did not prove possession of its certificate's private key */
export class AuthenticationFailure extends HandshakeError {
  constructor(message: string, peer?: PeerAddress, options?: { cause?: unknown }) {
    super(message, AlertMessage.fatal(AlertDescription.HANDSHAKE_FAILURE, peer), options);
    this.name = 'AuthenticationFailure';
  }
}
