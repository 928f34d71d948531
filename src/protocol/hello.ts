import { PROTOCOL_VERSION } from '../constants.js';
import { HandshakeError } from '../errors.js';

/**
 * Message types of the handshake protocol.
 */
export const MessageType = {
  HELLO: 0,
} as const;

/**
 * Header: u32 type at 0, u16 payload length at 4, then two zero bytes of
 * padding so the payload starts on a 4-byte boundary (big-endian).
 */
export const HEADER_SIZE = 8;

/** Payload of a HELLO: i32 protocol version. */
export const HELLO_PAYLOAD_SIZE = 4;

/** Bytes of a complete HELLO message: 12. */
export const HELLO_SIZE = HEADER_SIZE + HELLO_PAYLOAD_SIZE;

export interface MessageHeader {
  type: number;
  len: number;
}

/**
 * How a received HELLO compares with what this side speaks.
 */
export type HelloOutcome =
  | { kind: 'match'; version: number }
  | { kind: 'version-mismatch'; version: number }
  | { kind: 'type-mismatch'; type: number };

/**
 * Encode a HELLO carrying `version`.
 */
export function encodeHello(version: number = PROTOCOL_VERSION): Buffer {
  const bytes = Buffer.alloc(HELLO_SIZE);
  bytes.writeUInt32BE(MessageType.HELLO, 0);
  bytes.writeUInt16BE(HELLO_PAYLOAD_SIZE, 4);
  // bytes 6-7 stay zero
  bytes.writeInt32BE(version, HEADER_SIZE);
  return bytes;
}

function asBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Decode the message header.
 * @throws HandshakeError when fewer than HEADER_SIZE bytes are given
 */
export function decodeHeader(bytes: Uint8Array): MessageHeader {
  if (bytes.length < HEADER_SIZE) {
    throw new HandshakeError(
      `Malformed handshake: got ${bytes.length} bytes, header needs ${HEADER_SIZE}`
    );
  }
  const view = asBuffer(bytes);
  return {
    type: view.readUInt32BE(0),
    len: view.readUInt16BE(4),
  };
}

/**
 * Decode a received HELLO and compare it with PROTOCOL_VERSION.
 * A wrong type or version is an outcome; a truncated or inconsistent
 * message throws HandshakeError.
 */
export function decodeHello(bytes: Uint8Array): HelloOutcome {
  const header = decodeHeader(bytes);
  if (header.type !== MessageType.HELLO) {
    return { kind: 'type-mismatch', type: header.type };
  }
  if (header.len !== HELLO_PAYLOAD_SIZE) {
    throw new HandshakeError(
      `Malformed handshake: HELLO payload length is ${header.len}, expected ${HELLO_PAYLOAD_SIZE}`
    );
  }
  if (bytes.length < HEADER_SIZE + header.len) {
    throw new HandshakeError(
      `Malformed handshake: payload truncated at ${bytes.length - HEADER_SIZE} of ${header.len} bytes`
    );
  }

  const version = asBuffer(bytes).readInt32BE(HEADER_SIZE);
  if (version !== PROTOCOL_VERSION) {
    return { kind: 'version-mismatch', version };
  }
  return { kind: 'match', version };
}

/**
 * One-line, human-readable form of an outcome.
 */
export function describeHelloOutcome(outcome: HelloOutcome): string {
  switch (outcome.kind) {
    case 'match':
      return `Server connected to protocol v${outcome.version}`;
    case 'version-mismatch':
      return `Protocol version mismatch: server speaks v${outcome.version}, expected v${PROTOCOL_VERSION}`;
    case 'type-mismatch':
      return `Protocol mismatch: unexpected message type ${outcome.type}`;
  }
}
