/**
 * Minimal DER support for PrivateKeyInfo structures (RFC 5958 / RFC 8410)
 *
 * Only what the EdDSA key factories need: TLV walking, OIDs, and the
 * encoding of an EdDSA PrivateKeyInfo.
 */

import { concatBytes } from './utils';

export const TAG_INTEGER = 0x02;
export const TAG_OCTET_STRING = 0x04;
export const TAG_OID = 0x06;
export const TAG_SEQUENCE = 0x30;

export const OID_ED25519 = '1.3.101.112';
export const OID_ED448 = '1.3.101.113';

export const EDDSA = 'EdDSA';
export const ED25519 = 'Ed25519';
export const ED448 = 'Ed448';

export type EdDsaVariant = typeof ED25519 | typeof ED448;

export interface DerElement {
  tag: number;
  /** Content octets */
  value: Uint8Array;
  /** Offset just past this element */
  end: number;
}

export class DerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DerError';
    Object.setPrototypeOf(this, DerError.prototype);
  }
}

/**
 * Read one TLV element starting at `offset`
 */
export function readElement(der: Uint8Array, offset = 0): DerElement {
  if (offset + 2 > der.length) {
    throw new DerError(`DER element truncated at offset ${offset}`);
  }
  const tag = der[offset];
  let length = der[offset + 1];
  let start = offset + 2;

  if (length & 0x80) {
    const count = length & 0x7f;
    // indefinite lengths are BER only
    if (count === 0 || count > 3) {
      throw new DerError(`Unsupported DER length encoding 0x${length.toString(16)}`);
    }
    if (start + count > der.length) {
      throw new DerError('DER length truncated');
    }
    length = 0;
    for (let i = 0; i < count; i++) {
      length = (length << 8) | der[start + i];
    }
    start += count;
  }

  const end = start + length;
  if (end > der.length) {
    throw new DerError(`DER element exceeds input: needs ${length} bytes, ${der.length - start} left`);
  }
  return { tag, value: der.subarray(start, end), end };
}

/**
 * Read an element and check its tag
 */
export function expectElement(der: Uint8Array, offset: number, tag: number): DerElement {
  const element = readElement(der, offset);
  if (element.tag !== tag) {
    throw new DerError(
      `Expected DER tag 0x${tag.toString(16)} at offset ${offset}, found 0x${element.tag.toString(16)}`
    );
  }
  return element;
}

export function encodeLength(length: number): Uint8Array {
  if (length < 0x80) {
    return Uint8Array.of(length);
  }
  if (length <= 0xff) {
    return Uint8Array.of(0x81, length);
  }
  if (length <= 0xffff) {
    return Uint8Array.of(0x82, length >> 8, length & 0xff);
  }
  return Uint8Array.of(0x83, (length >> 16) & 0xff, (length >> 8) & 0xff, length & 0xff);
}

export function encodeElement(tag: number, value: Uint8Array): Uint8Array {
  return concatBytes(Uint8Array.of(tag), encodeLength(value.length), value);
}

export function decodeOid(value: Uint8Array): string {
  if (value.length === 0) {
    throw new DerError('Empty OID');
  }
  const first = value[0];
  if (first & 0x80) {
    throw new DerError('Multi-byte leading OID arcs are not supported');
  }
  const top = Math.min(Math.floor(first / 40), 2);
  const arcs: number[] = [top, first - top * 40];
  let arc = 0;
  for (let i = 1; i < value.length; i++) {
    arc = arc * 128 + (value[i] & 0x7f);
    if ((value[i] & 0x80) === 0) {
      arcs.push(arc);
      arc = 0;
    } else if (i === value.length - 1) {
      throw new DerError('OID ends inside an arc');
    }
  }
  return arcs.join('.');
}

export function encodeOid(oid: string): Uint8Array {
  const arcs = oid.split('.').map(part => Number(part));
  if (arcs.length < 2 || arcs.some(arc => !Number.isInteger(arc) || arc < 0)) {
    throw new DerError(`Invalid OID ${oid}`);
  }
  const bytes: number[] = [arcs[0] * 40 + arcs[1]];
  for (const arc of arcs.slice(2)) {
    const chunk: number[] = [arc & 0x7f];
    let rest = Math.floor(arc / 128);
    while (rest > 0) {
      chunk.unshift((rest & 0x7f) | 0x80);
      rest = Math.floor(rest / 128);
    }
    bytes.push(...chunk);
  }
  return Uint8Array.from(bytes);
}

export interface PrivateKeyInfo {
  /** Dotted algorithm OID */
  algorithm: string;
  /** Inner private key octets, for EdDSA the raw seed */
  privateKey: Uint8Array;
}

/**
 * Decode an EdDSA PrivateKeyInfo.
 *
 * Accepts version 0 and 1 (OneAsymmetricKey); attributes and the optional
 * public key that may follow the private key are ignored.
 */
export function decodePrivateKeyInfo(der: Uint8Array): PrivateKeyInfo {
  const outer = expectElement(der, 0, TAG_SEQUENCE);
  if (outer.end !== der.length) {
    throw new DerError('Trailing bytes after PrivateKeyInfo');
  }
  const body = outer.value;

  const version = expectElement(body, 0, TAG_INTEGER);
  if (version.value.length !== 1 || version.value[0] > 1) {
    throw new DerError('Unsupported PrivateKeyInfo version');
  }

  const algorithmIdentifier = expectElement(body, version.end, TAG_SEQUENCE);
  const oid = expectElement(algorithmIdentifier.value, 0, TAG_OID);

  const wrapped = expectElement(body, algorithmIdentifier.end, TAG_OCTET_STRING);
  // RFC 8410: CurvePrivateKey ::= OCTET STRING, wrapped in the outer OCTET STRING
  const inner = expectElement(wrapped.value, 0, TAG_OCTET_STRING);
  if (inner.end !== wrapped.value.length) {
    throw new DerError('Trailing bytes after CurvePrivateKey');
  }

  return {
    algorithm: decodeOid(oid.value),
    privateKey: inner.value.slice(),
  };
}

/**
 * Encode an EdDSA PrivateKeyInfo (version 0, no attributes)
 */
export function encodePrivateKeyInfo(info: PrivateKeyInfo): Uint8Array {
  return encodeElement(
    TAG_SEQUENCE,
    concatBytes(
      encodeElement(TAG_INTEGER, Uint8Array.of(0)),
      encodeElement(TAG_SEQUENCE, encodeElement(TAG_OID, encodeOid(info.algorithm))),
      encodeElement(TAG_OCTET_STRING, encodeElement(TAG_OCTET_STRING, info.privateKey))
    )
  );
}

/**
 * Map the many names EdDSA keys travel under to a standard algorithm name.
 *
 * @returns "EdDSA", "Ed25519", "Ed448" or undefined when the name is not EdDSA
 */
export function getEdDsaStandardAlgorithmName(algorithm: string): string | undefined {
  const name = algorithm.trim();
  const lower = name.toLowerCase();
  if (lower === EDDSA.toLowerCase()) {
    return EDDSA;
  }
  if (lower === ED25519.toLowerCase() || name === OID_ED25519 || lower === `oid.${OID_ED25519}`) {
    return ED25519;
  }
  if (lower === ED448.toLowerCase() || name === OID_ED448 || lower === `oid.${OID_ED448}`) {
    return ED448;
  }
  return undefined;
}

/**
 * Standard name of the EdDSA variant an OID denotes
 */
export function edDsaNameForOid(oid: string): EdDsaVariant | undefined {
  if (oid === OID_ED25519) return ED25519;
  if (oid === OID_ED448) return ED448;
  return undefined;
}

export function oidForEdDsaName(name: string): string | undefined {
  if (name === ED25519) return OID_ED25519;
  if (name === ED448) return OID_ED448;
  return undefined;
}
