import type { Logger } from '../logger.js';
import type { ListenerSocket } from '../transport/types.js';
import type { ConnectionTable } from './connection-table.js';

/**
 * What a single accept did to the table.
 */
export type AcceptOutcome =
  | { kind: 'admitted'; index: number; handle: number; remoteAddress: string }
  | { kind: 'rejected'; remoteAddress: string }
  | { kind: 'failed'; error: Error };

/**
 * Accept one pending connection from a ready listener. The new socket takes
 * the first free slot; when the table is full it is closed straight away.
 * A failed accept is logged and reported, never thrown.
 */
export function handleAccept(
  listener: ListenerSocket,
  table: ConnectionTable,
  logger: Logger
): AcceptOutcome {
  const result = listener.accept();
  if (!result.ok) {
    logger.warn(`Accept failed: ${result.error.message}`);
    return { kind: 'failed', error: result.error };
  }

  const peer = result.peer;
  logger.info(`New connection from ${peer.remoteAddress}`);

  const index = table.findFreeSlot();
  if (index === null) {
    logger.info(`Server full, closing new connection from ${peer.remoteAddress}`);
    peer.close();
    return { kind: 'rejected', remoteAddress: peer.remoteAddress };
  }

  table.occupy(index, peer);
  logger.info(`Assigned ${peer.remoteAddress} to slot ${index}`);
  return { kind: 'admitted', index, handle: peer.handle, remoteAddress: peer.remoteAddress };
}
