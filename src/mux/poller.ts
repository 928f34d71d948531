import { MultiplexerError, errorMessage } from '../errors.js';
import type { Handle, PeerSocket, Watchable } from '../transport/types.js';
import type { ConnectionTable } from './connection-table.js';

/**
 * An occupied slot as it was when the watch set was built.
 */
export interface WatchedPeer {
  index: number;
  handle: Handle;
  peer: PeerSocket;
}

/**
 * Everything one readiness wait watches.
 */
export interface WatchSet {
  listener: Watchable;
  peers: WatchedPeer[];
  /** Highest handle in the set */
  maxHandle: Handle;
}

/**
 * Handles reported ready by a wait.
 */
export interface ReadySet {
  readonly maxHandle: Handle;
  readonly count: number;
  isReady(handle: Handle): boolean;
}

/**
 * Watch the listener plus every occupied slot of the table.
 */
export function buildWatchSet(listener: Watchable, table: ConnectionTable): WatchSet {
  let maxHandle = listener.handle;
  const peers: WatchedPeer[] = [];
  for (const slot of table.occupied()) {
    if (!slot.peer) continue;
    peers.push({ index: slot.index, handle: slot.handle, peer: slot.peer });
    if (slot.handle > maxHandle) {
      maxHandle = slot.handle;
    }
  }
  return { listener, peers, maxHandle };
}

function readySet(maxHandle: Handle, ready: Set<Handle>): ReadySet {
  return {
    maxHandle,
    count: ready.size,
    isReady: (handle) => ready.has(handle),
  };
}

/**
 * Event-queue backed readiness multiplexer.
 *
 * Transports call wake() whenever one of their sockets sees an event.
 * wait() checks every watched item's readiness and, when nothing is ready,
 * sleeps until the next wake() and checks again. Readiness is level
 * triggered: an item stays ready until its queued input has been consumed.
 */
export class EventPoller {
  private waiter: { resolve: () => void } | null = null;
  private failure: Error | null = null;
  private closed = false;

  /** Wake a pending wait(). Safe to pass around unbound. */
  readonly wake = (): void => {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.resolve();
  };

  /**
   * Block until at least one watched item is ready. Resolves null once the
   * poller has been closed; rejects with MultiplexerError after fail().
   */
  async wait(watch: WatchSet): Promise<ReadySet | null> {
    for (;;) {
      if (this.failure) {
        throw new MultiplexerError(`Readiness wait failed: ${errorMessage(this.failure)}`);
      }
      if (this.closed) {
        return null;
      }

      const ready = new Set<Handle>();
      if (watch.listener.isReadable()) {
        ready.add(watch.listener.handle);
      }
      for (const { handle, peer } of watch.peers) {
        if (peer.isReadable()) {
          ready.add(handle);
        }
      }
      if (ready.size > 0) {
        return readySet(watch.maxHandle, ready);
      }

      await new Promise<void>((resolve) => {
        this.waiter = { resolve };
      });
    }
  }

  /**
   * Make the current and all later waits reject.
   */
  fail(error: Error): void {
    if (!this.failure) {
      this.failure = error;
    }
    this.wake();
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
