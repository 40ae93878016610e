/**
 * Handshake messages and the transcript they form
 */

import { DatagramWriter } from './datagram';
import { PeerAddress } from './peer';

export enum HandshakeType {
  HELLO_REQUEST = 0,
  CLIENT_HELLO = 1,
  SERVER_HELLO = 2,
  HELLO_VERIFY_REQUEST = 3,
  NEW_SESSION_TICKET = 4,
  CERTIFICATE = 11,
  SERVER_KEY_EXCHANGE = 12,
  CERTIFICATE_REQUEST = 13,
  SERVER_HELLO_DONE = 14,
  CERTIFICATE_VERIFY = 15,
  CLIENT_KEY_EXCHANGE = 16,
  FINISHED = 20,
}

/**
 * One prior handshake message as it enters a signature.
 * `canonicalBytes` must be deterministic.
 */
export interface TranscriptEntry {
  canonicalBytes(): Uint8Array;
  /** Short label for trace logs */
  describe?(): string;
}

const MESSAGE_TYPE_BITS = 8;
const MESSAGE_LENGTH_BITS = 24;
const MESSAGE_SEQ_BITS = 16;
const FRAGMENT_OFFSET_BITS = 24;
const FRAGMENT_LENGTH_BITS = 24;

/** type + length + message_seq + fragment_offset + fragment_length */
export const HANDSHAKE_HEADER_LENGTH = 12;

export abstract class HandshakeMessage implements TranscriptEntry {
  private messageSeq = 0;

  protected constructor(public readonly peer?: PeerAddress) {}

  abstract getMessageType(): HandshakeType;

  /** Length of the message body in bytes */
  abstract getMessageLength(): number;

  /** The message body */
  abstract fragmentToByteArray(): Uint8Array;

  getMessageSeq(): number {
    return this.messageSeq;
  }

  setMessageSeq(messageSeq: number): void {
    if (!Number.isInteger(messageSeq) || messageSeq < 0 || messageSeq > 0xffff) {
      throw new RangeError(`message_seq ${messageSeq} out of range`);
    }
    this.messageSeq = messageSeq;
  }

  /**
   * The complete, unfragmented message: 12 byte DTLS handshake header
   * followed by the body.
   */
  toByteArray(): Uint8Array {
    const fragment = this.fragmentToByteArray();
    const length = this.getMessageLength();
    if (fragment.length !== length) {
      throw new Error(`${this.describe()} body is ${fragment.length} bytes, header announces ${length}`);
    }

    return new DatagramWriter()
      .write(this.getMessageType(), MESSAGE_TYPE_BITS)
      .write(length, MESSAGE_LENGTH_BITS)
      .write(this.messageSeq, MESSAGE_SEQ_BITS)
      .write(0, FRAGMENT_OFFSET_BITS)
      .write(length, FRAGMENT_LENGTH_BITS)
      .writeBytes(fragment)
      .toByteArray();
  }

  canonicalBytes(): Uint8Array {
    return this.toByteArray();
  }

  describe(): string {
    const type = this.getMessageType();
    return HandshakeType[type] ?? `UNKNOWN(${type})`;
  }
}

/**
 * A handshake message this package does not interpret, kept as opaque body bytes
 */
export class GenericHandshakeMessage extends HandshakeMessage {
  private readonly body: Uint8Array;

  constructor(
    private readonly type: HandshakeType,
    body: Uint8Array,
    peer?: PeerAddress
  ) {
    super(peer);
    this.body = body.slice();
  }

  getMessageType(): HandshakeType {
    return this.type;
  }

  getMessageLength(): number {
    return this.body.length;
  }

  fragmentToByteArray(): Uint8Array {
    return this.body.slice();
  }
}

/**
 * Ordered record of the handshake messages exchanged so far
 */
export class HandshakeTranscript implements Iterable<TranscriptEntry> {
  private readonly messages: TranscriptEntry[] = [];

  add(entry: TranscriptEntry): this {
    this.messages.push(entry);
    return this;
  }

  get entries(): readonly TranscriptEntry[] {
    return this.messages;
  }

  get size(): number {
    return this.messages.length;
  }

  [Symbol.iterator](): Iterator<TranscriptEntry> {
    return this.messages[Symbol.iterator]();
  }
}

export function describeEntry(entry: TranscriptEntry): string {
  return entry.describe ? entry.describe() : 'entry';
}
