/**
 * Tests for handshake message framing and transcripts
 */

import { bytesToHex, hexToBytes } from '../../crypto/utils';
import {
  GenericHandshakeMessage,
  HANDSHAKE_HEADER_LENGTH,
  HandshakeTranscript,
  HandshakeType,
  describeEntry,
} from '../handshake';

describe('Handshake', () => {
  describe('GenericHandshakeMessage', () => {
    it('should prefix the body with the DTLS handshake header', () => {
      const message = new GenericHandshakeMessage(HandshakeType.CLIENT_KEY_EXCHANGE, hexToBytes('aabb'));
      message.setMessageSeq(3);

      expect(bytesToHex(message.toByteArray())).toBe('10' + '000002' + '0003' + '000000' + '000002' + 'aabb');
      expect(message.canonicalBytes()).toEqual(message.toByteArray());
      expect(message.toByteArray().length).toBe(HANDSHAKE_HEADER_LENGTH + 2);
    });

    it('should copy its body', () => {
      const body = hexToBytes('01');
      const message = new GenericHandshakeMessage(HandshakeType.FINISHED, body);

      body[0] = 0xff;

      expect(bytesToHex(message.fragmentToByteArray())).toBe('01');
    });

    it('should describe itself by type name', () => {
      expect(new GenericHandshakeMessage(HandshakeType.SERVER_HELLO_DONE, new Uint8Array(0)).describe()).toBe(
        'SERVER_HELLO_DONE'
      );
      const unassigned: number = 99;
      expect(new GenericHandshakeMessage(unassigned, new Uint8Array(0)).describe()).toBe('UNKNOWN(99)');
    });

    it('should refuse sequence numbers outside 16 bits', () => {
      const message = new GenericHandshakeMessage(HandshakeType.CLIENT_HELLO, new Uint8Array(0));

      expect(() => message.setMessageSeq(0x10000)).toThrow('message_seq 65536 out of range');
      expect(message.getMessageSeq()).toBe(0);
    });
  });

  describe('HandshakeTranscript', () => {
    it('should keep entries in insertion order', () => {
      const hello = new GenericHandshakeMessage(HandshakeType.CLIENT_HELLO, hexToBytes('01'));
      const serverHello = new GenericHandshakeMessage(HandshakeType.SERVER_HELLO, hexToBytes('02'));

      const transcript = new HandshakeTranscript().add(hello).add(serverHello);

      expect(transcript.size).toBe(2);
      expect([...transcript]).toEqual([hello, serverHello]);
      expect(transcript.entries.map(describeEntry)).toEqual(['CLIENT_HELLO', 'SERVER_HELLO']);
    });

    it('should describe plain entries generically', () => {
      expect(describeEntry({ canonicalBytes: () => new Uint8Array(0) })).toBe('entry');
    });
  });
});
