import type { Logger } from '../logger.js';
import type { ConnectionTable } from './connection-table.js';

/**
 * What a single read did to a slot.
 */
export type PeerIoOutcome =
  | { kind: 'data'; index: number; bytes: Buffer }
  | { kind: 'closed'; index: number; reason: 'eof' }
  | { kind: 'closed'; index: number; reason: 'error'; error: Error }
  | { kind: 'idle'; index: number };

/**
 * Service one ready peer with exactly one read of up to the slot buffer's
 * capacity. Bytes overwrite the slot buffer; end of stream or a read error
 * closes the socket and frees the slot.
 */
export function handlePeerIo(
  table: ConnectionTable,
  index: number,
  logger: Logger
): PeerIoOutcome {
  const slot = table.slot(index);
  if (!slot.peer) {
    throw new Error(`Slot ${index} has no peer to read from`);
  }

  const result = slot.peer.read(table.bufferSize);
  switch (result.kind) {
    case 'would-block':
      return { kind: 'idle', index };
    case 'data':
      if (result.bytes.length > 0) {
        const bytes = table.store(index, result.bytes);
        logger.info(`Received data from slot ${index}: ${bytes.toString('utf8')}`);
        return { kind: 'data', index, bytes: Buffer.from(bytes) };
      }
      table.release(index);
      logger.info(`Client in slot ${index} disconnected`);
      return { kind: 'closed', index, reason: 'eof' };
    case 'eof':
      table.release(index);
      logger.info(`Client in slot ${index} disconnected`);
      return { kind: 'closed', index, reason: 'eof' };
    case 'error':
      table.release(index);
      logger.warn(`Client in slot ${index} read error: ${result.error.message}`);
      return { kind: 'closed', index, reason: 'error', error: result.error };
  }
}
