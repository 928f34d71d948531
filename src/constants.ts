/** Maximum number of peers the connection table holds at once. */
export const MAX_CLIENTS = 256;

/** TCP port of the multiplexed server. */
export const MUX_PORT = 8080;

/** Pending-connection backlog passed to listen(). */
export const LISTEN_BACKLOG = 10;

/** Size of each slot's receive buffer in bytes. */
export const BUFFER_SIZE = 4096;

/** TCP port of the handshake server. */
export const HELLO_PORT = 5555;

export const HELLO_BACKLOG = 5;

/** The only protocol version the handshake accepts. */
export const PROTOCOL_VERSION = 1;

/** Handle value of a slot that holds no live connection. */
export const FREE_HANDLE = -1;

/** Milliseconds the handshake client waits for the server's hello. */
export const HELLO_TIMEOUT_MS = 5000;
