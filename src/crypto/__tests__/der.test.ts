/**
 * Tests for PrivateKeyInfo DER handling
 */

import * as der from '../der';
import { bytesToHex, hexToBytes } from '../utils';

const ED25519_PKCS8_PREFIX = '302e020100300506032b657004220420';
const ED448_PKCS8_PREFIX = '3047020100300506032b6571043b0439';

describe('DER', () => {
  describe('OIDs', () => {
    it('should encode the Ed25519 OID', () => {
      expect(bytesToHex(der.encodeOid(der.OID_ED25519))).toBe('2b6570');
    });

    it('should decode multi-byte arcs', () => {
      // 1.2.840.10045.2.1 (id-ecPublicKey)
      expect(der.decodeOid(hexToBytes('2a8648ce3d0201'))).toBe('1.2.840.10045.2.1');
    });

    it('should round trip multi-byte arcs', () => {
      expect(bytesToHex(der.encodeOid('1.2.840.10045.2.1'))).toBe('2a8648ce3d0201');
    });

    it('should reject an OID ending inside an arc', () => {
      expect(() => der.decodeOid(hexToBytes('2a86'))).toThrow('OID ends inside an arc');
    });
  });

  describe('encodePrivateKeyInfo', () => {
    it('should produce the RFC 8410 layout for Ed25519', () => {
      const seed = new Uint8Array(32).fill(7);
      const encoded = der.encodePrivateKeyInfo({ algorithm: der.OID_ED25519, privateKey: seed });

      expect(bytesToHex(encoded)).toBe(ED25519_PKCS8_PREFIX + '07'.repeat(32));
    });

    it('should produce the RFC 8410 layout for Ed448', () => {
      const seed = new Uint8Array(57).fill(1);
      const encoded = der.encodePrivateKeyInfo({ algorithm: der.OID_ED448, privateKey: seed });

      expect(bytesToHex(encoded)).toBe(ED448_PKCS8_PREFIX + '01'.repeat(57));
    });
  });

  describe('decodePrivateKeyInfo', () => {
    it('should extract OID and seed', () => {
      const info = der.decodePrivateKeyInfo(hexToBytes(ED25519_PKCS8_PREFIX + '09'.repeat(32)));

      expect(info.algorithm).toBe(der.OID_ED25519);
      expect(info.privateKey).toEqual(new Uint8Array(32).fill(9));
    });

    it('should ignore a trailing public key of a version 1 structure', () => {
      // OneAsymmetricKey: version 1, [1] publicKey BIT STRING with 32 zero bytes
      const publicKey = '8121' + '00' + '00'.repeat(32);
      const body = '020101' + '300506032b6570' + '0422' + '0420' + '05'.repeat(32) + publicKey;
      const encoded = hexToBytes('30' + (body.length / 2).toString(16) + body);

      const info = der.decodePrivateKeyInfo(encoded);

      expect(info.privateKey).toEqual(new Uint8Array(32).fill(5));
    });

    it('should reject truncated input', () => {
      const encoded = hexToBytes(ED25519_PKCS8_PREFIX + '09'.repeat(31));

      expect(() => der.decodePrivateKeyInfo(encoded)).toThrow(der.DerError);
    });

    it('should reject trailing bytes', () => {
      const encoded = hexToBytes(ED25519_PKCS8_PREFIX + '09'.repeat(32) + '00');

      expect(() => der.decodePrivateKeyInfo(encoded)).toThrow('Trailing bytes after PrivateKeyInfo');
    });

    it('should reject unexpected tags', () => {
      expect(() => der.decodePrivateKeyInfo(hexToBytes('0400'))).toThrow('Expected DER tag 0x30 at offset 0, found 0x4');
    });
  });

  describe('getEdDsaStandardAlgorithmName', () => {
    it.each([
      ['EdDSA', 'EdDSA'],
      ['eddsa', 'EdDSA'],
      ['Ed25519', 'Ed25519'],
      ['ED25519', 'Ed25519'],
      ['1.3.101.112', 'Ed25519'],
      ['OID.1.3.101.112', 'Ed25519'],
      ['Ed448', 'Ed448'],
      ['1.3.101.113', 'Ed448'],
      ['oid.1.3.101.113', 'Ed448'],
    ])('should map %s to %s', (name, expected) => {
      expect(der.getEdDsaStandardAlgorithmName(name)).toBe(expected);
    });

    it('should not map other algorithms', () => {
      expect(der.getEdDsaStandardAlgorithmName('EC')).toBeUndefined();
      expect(der.getEdDsaStandardAlgorithmName('1.2.840.10045.2.1')).toBeUndefined();
    });
  });
});
