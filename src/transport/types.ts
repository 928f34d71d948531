/**
 * Transport-side abstractions the multiplexer works against. The TCP
 * implementation lives in tcp.ts; tests substitute in-memory sockets.
 */

/** Numeric identifier of an open socket. */
export type Handle = number;

/**
 * Anything the readiness multiplexer can watch.
 */
export interface Watchable {
  readonly handle: Handle;
  /** True when a read or accept would return without waiting. */
  isReadable(): boolean;
}

/**
 * Result of a single non-blocking read.
 */
export type ReadResult =
  | { kind: 'data'; bytes: Buffer }
  | { kind: 'eof' }
  | { kind: 'error'; error: Error }
  | { kind: 'would-block' };

/**
 * A connected peer socket.
 */
export interface PeerSocket extends Watchable {
  /** `host:port` of the remote end. */
  readonly remoteAddress: string;
  /** Read at most `maxBytes` of what has arrived. */
  read(maxBytes: number): ReadResult;
  /** Close the socket and give its handle back. */
  close(): void;
}

/**
 * Result of a single accept call.
 */
export type AcceptResult =
  | { ok: true; peer: PeerSocket }
  | { ok: false; error: Error };

/**
 * A listening socket.
 */
export interface ListenerSocket extends Watchable {
  accept(): AcceptResult;
}
