/**
 * Big-endian readers and writers for handshake message bodies
 */

import { DecodeError } from './errors';
import { PeerAddress } from './peer';

const MAX_BITS = 32;

function checkBits(bits: number): void {
  if (!Number.isInteger(bits) || bits <= 0 || bits > MAX_BITS || bits % 8 !== 0) {
    throw new RangeError(`Field width must be a multiple of 8 up to ${MAX_BITS} bits, got ${bits}`);
  }
}

export class DatagramWriter {
  private readonly chunks: number[] = [];

  /**
   * Write `value` as an unsigned big-endian field of `bits` bits
   */
  write(value: number, bits: number): this {
    checkBits(bits);
    if (!Number.isInteger(value) || value < 0 || value >= 2 ** bits) {
      throw new RangeError(`Value ${value} does not fit into ${bits} bits`);
    }
    for (let shift = bits - 8; shift >= 0; shift -= 8) {
      this.chunks.push(Math.floor(value / 2 ** shift) & 0xff);
    }
    return this;
  }

  writeBytes(bytes: Uint8Array): this {
    for (const byte of bytes) {
      this.chunks.push(byte);
    }
    return this;
  }

  get length(): number {
    return this.chunks.length;
  }

  toByteArray(): Uint8Array {
    return Uint8Array.from(this.chunks);
  }
}

export class DatagramReader {
  private offset = 0;

  /**
   * @param peer only used to address the alert of a DecodeError
   */
  constructor(
    private readonly bytes: Uint8Array,
    private readonly peer?: PeerAddress
  ) {}

  /**
   * Read an unsigned big-endian field of `bits` bits
   *
   * @throws DecodeError if the input ends first
   */
  read(bits: number): number {
    checkBits(bits);
    const count = bits / 8;
    this.ensure(count);
    let value = 0;
    for (let i = 0; i < count; i++) {
      value = value * 256 + this.bytes[this.offset + i];
    }
    this.offset += count;
    return value;
  }

  /**
   * Read exactly `count` bytes (copied)
   *
   * @throws DecodeError if fewer bytes remain
   */
  readBytes(count: number): Uint8Array {
    this.ensure(count);
    const result = this.bytes.slice(this.offset, this.offset + count);
    this.offset += count;
    return result;
  }

  bytesAvailable(): number {
    return this.bytes.length - this.offset;
  }

  bitsLeft(): number {
    return this.bytesAvailable() * 8;
  }

  private ensure(count: number): void {
    const available = this.bytesAvailable();
    if (count > available) {
      throw new DecodeError(`Requested ${count} bytes, but only ${available} bytes are available`, this.peer);
    }
  }
}
