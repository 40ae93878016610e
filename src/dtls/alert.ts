/**
 * Alert protocol values (RFC 5246, section 7.2)
 */

import { PeerAddress, formatPeer } from './peer';

export enum AlertLevel {
  WARNING = 1,
  FATAL = 2,
}

export enum AlertDescription {
  CLOSE_NOTIFY = 0,
  UNEXPECTED_MESSAGE = 10,
  BAD_RECORD_MAC = 20,
  DECRYPTION_FAILED_RESERVED = 21,
  RECORD_OVERFLOW = 22,
  DECOMPRESSION_FAILURE = 30,
  HANDSHAKE_FAILURE = 40,
  NO_CERTIFICATE_RESERVED = 41,
  BAD_CERTIFICATE = 42,
  UNSUPPORTED_CERTIFICATE = 43,
  CERTIFICATE_REVOKED = 44,
  CERTIFICATE_EXPIRED = 45,
  CERTIFICATE_UNKNOWN = 46,
  ILLEGAL_PARAMETER = 47,
  UNKNOWN_CA = 48,
  ACCESS_DENIED = 49,
  DECODE_ERROR = 50,
  DECRYPT_ERROR = 51,
  EXPORT_RESTRICTION_RESERVED = 60,
  PROTOCOL_VERSION = 70,
  INSUFFICIENT_SECURITY = 71,
  INTERNAL_ERROR = 80,
  USER_CANCELED = 90,
  NO_RENEGOTIATION = 100,
  UNSUPPORTED_EXTENSION = 110,
}

export class AlertMessage {
  constructor(
    public readonly level: AlertLevel,
    public readonly description: AlertDescription,
    public readonly peer?: PeerAddress
  ) {}

  static fatal(description: AlertDescription, peer?: PeerAddress): AlertMessage {
    return new AlertMessage(AlertLevel.FATAL, description, peer);
  }

  get isFatal(): boolean {
    return this.level === AlertLevel.FATAL;
  }

  /** Alert record body: level (8 bits) || description (8 bits) */
  toByteArray(): Uint8Array {
    return Uint8Array.of(this.level, this.description);
  }

  toString(): string {
    return `Alert(${AlertLevel[this.level]}, ${AlertDescription[this.description]}) for ${formatPeer(this.peer)}`;
  }
}
