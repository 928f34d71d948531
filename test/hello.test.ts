import { describe, it } from 'node:test';
import assert from 'node:assert';
import { HandshakeError } from '../src/errors.js';
import {
  HEADER_SIZE,
  HELLO_SIZE,
  MessageType,
  decodeHeader,
  decodeHello,
  describeHelloOutcome,
  encodeHello,
} from '../src/protocol/hello.js';

describe('Hello codec', () => {
  describe('encodeHello', () => {
    it('should write a big-endian header, two padding bytes and the version', () => {
      const bytes = encodeHello();

      assert.strictEqual(bytes.length, 12);
      assert.strictEqual(bytes.toString('hex'), '000000000004000000000001');
    });

    it('should carry the requested version', () => {
      const bytes = encodeHello(258);
      assert.deepStrictEqual([...bytes.subarray(HEADER_SIZE)], [0, 0, 1, 2]);
    });
  });

  describe('decodeHeader', () => {
    it('should read type and payload length', () => {
      const bytes = Buffer.from([0, 0, 0, 9, 0, 12, 0, 0]);
      assert.deepStrictEqual(decodeHeader(bytes), { type: 9, len: 12 });
    });

    it('should refuse fewer than eight bytes', () => {
      assert.throws(
        () => decodeHeader(Buffer.from([0, 0, 0, 0, 0, 4])),
        (err: unknown) => {
          assert.ok(err instanceof HandshakeError);
          assert.strictEqual(err.message, 'Malformed handshake: got 6 bytes, header needs 8');
          return true;
        }
      );
    });

    it('should read from a view into a larger buffer', () => {
      const backing = Buffer.from([0xff, 0xff, 0, 0, 0, 0, 0, 4, 0, 0, 0, 0, 0, 1]);
      const view = new Uint8Array(backing.buffer, backing.byteOffset + 2, HELLO_SIZE);
      assert.deepStrictEqual(decodeHeader(view), { type: MessageType.HELLO, len: 4 });
    });
  });

  describe('decodeHello', () => {
    it('should report a match for our version', () => {
      assert.deepStrictEqual(decodeHello(encodeHello()), { kind: 'match', version: 1 });
    });

    it('should read the version after the header padding', () => {
      const bytes = Buffer.from('000000000004000000000001', 'hex');
      assert.deepStrictEqual(decodeHello(bytes), { kind: 'match', version: 1 });
    });

    it('should not take the padding for part of the version', () => {
      const bytes = Buffer.from('000000000004ffff00000001', 'hex');
      assert.deepStrictEqual(decodeHello(bytes), { kind: 'match', version: 1 });
    });

    it('should report a different version', () => {
      assert.deepStrictEqual(decodeHello(encodeHello(2)), { kind: 'version-mismatch', version: 2 });
    });

    it('should report a message that is not a HELLO', () => {
      const bytes = encodeHello();
      bytes.writeUInt32BE(7, 0);
      assert.deepStrictEqual(decodeHello(bytes), { kind: 'type-mismatch', type: 7 });
    });

    it('should refuse an unexpected payload length', () => {
      const bytes = encodeHello();
      bytes.writeUInt16BE(8, 4);
      assert.throws(
        () => decodeHello(bytes),
        /^HandshakeError: Malformed handshake: HELLO payload length is 8, expected 4$/
      );
    });

    it('should refuse a truncated payload', () => {
      assert.throws(
        () => decodeHello(encodeHello().subarray(0, 10)),
        /^HandshakeError: Malformed handshake: payload truncated at 2 of 4 bytes$/
      );
    });

    it('should ignore bytes after the message', () => {
      const bytes = Buffer.concat([encodeHello(), Buffer.from('extra')]);
      assert.deepStrictEqual(decodeHello(bytes), { kind: 'match', version: 1 });
    });
  });

  describe('describeHelloOutcome', () => {
    it('should describe each outcome', () => {
      assert.strictEqual(
        describeHelloOutcome({ kind: 'match', version: 1 }),
        'Server connected to protocol v1'
      );
      assert.strictEqual(
        describeHelloOutcome({ kind: 'version-mismatch', version: 3 }),
        'Protocol version mismatch: server speaks v3, expected v1'
      );
      assert.strictEqual(
        describeHelloOutcome({ kind: 'type-mismatch', type: 5 }),
        'Protocol mismatch: unexpected message type 5'
      );
    });
  });
});
