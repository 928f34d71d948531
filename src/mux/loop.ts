import { EventEmitter } from 'node:events';
import type { Logger } from '../logger.js';
import type { ListenerSocket } from '../transport/types.js';
import { handleAccept, type AcceptOutcome } from './accept.js';
import { ConnectionTable, type PeerSlot, type SlotSummary } from './connection-table.js';
import { handlePeerIo, type PeerIoOutcome } from './peer-io.js';
import { buildWatchSet, type EventPoller, type ReadySet, type WatchSet } from './poller.js';

/**
 * Counters kept across iterations
 */
export interface LoopStats {
  iterations: number;
  accepted: number;
  rejected: number;
  acceptFailures: number;
  reads: number;
  disconnected: number;
}

/**
 * Events emitted by ControlLoop
 */
export interface ControlLoopEvents {
  'accepted': (index: number, remoteAddress: string) => void;
  'rejected': (remoteAddress: string) => void;
  'accept-failed': (error: Error) => void;
  'data': (index: number, bytes: Buffer) => void;
  'disconnected': (index: number, error?: Error) => void;
}

export interface ControlLoopOptions {
  listener: ListenerSocket;
  poller: EventPoller;
  logger: Logger;
  capacity: number;
  bufferSize: number;
}

/**
 * Single-threaded readiness loop. Owns the connection table: the accept and
 * peer handlers only ever see it through this loop.
 *
 * Each iteration rebuilds the watch set, waits for readiness, services the
 * listener first and then every ready peer in slot order, once each.
 */
export class ControlLoop extends EventEmitter {
  private readonly table: ConnectionTable;
  private readonly listener: ListenerSocket;
  private readonly poller: EventPoller;
  private readonly logger: Logger;
  private running = false;
  private stats: LoopStats = {
    iterations: 0,
    accepted: 0,
    rejected: 0,
    acceptFailures: 0,
    reads: 0,
    disconnected: 0,
  };

  constructor(options: ControlLoopOptions) {
    super();
    this.listener = options.listener;
    this.poller = options.poller;
    this.logger = options.logger;
    this.table = new ConnectionTable(options.capacity, options.bufferSize);
  }

  /**
   * Run until stop(). Rejects with MultiplexerError when the readiness wait
   * fails.
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error('Control loop already running');
    }
    this.table.init();
    this.running = true;

    try {
      while (this.running) {
        const watch = buildWatchSet(this.listener, this.table);
        const ready = await this.poller.wait(watch);
        if (!ready) break;
        this.dispatch(watch, ready);
      }
    } finally {
      this.running = false;
    }
  }

  /**
   * Stop the loop and close every connected peer.
   */
  stop(): void {
    this.running = false;
    this.poller.close();
    for (const slot of this.table.occupied()) {
      this.table.release(slot.index);
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  get capacity(): number {
    return this.table.capacity;
  }

  get occupiedCount(): number {
    return this.table.size;
  }

  getStats(): LoopStats {
    return { ...this.stats };
  }

  getSlots(): SlotSummary[] {
    return this.table.snapshot();
  }

  getSlot(index: number): Readonly<PeerSlot> {
    return this.table.slot(index);
  }

  private dispatch(watch: WatchSet, ready: ReadySet): void {
    this.stats.iterations++;

    if (ready.isReady(this.listener.handle)) {
      this.onAccept(handleAccept(this.listener, this.table, this.logger));
    }

    for (const watched of watch.peers) {
      if (!ready.isReady(watched.handle)) continue;
      // A slot freed or refilled since the watch set was built is not the
      // socket that was reported ready.
      if (this.table.slot(watched.index).handle !== watched.handle) continue;
      this.onPeerIo(handlePeerIo(this.table, watched.index, this.logger));
    }
  }

  private onAccept(outcome: AcceptOutcome): void {
    switch (outcome.kind) {
      case 'admitted':
        this.stats.accepted++;
        this.emit('accepted', outcome.index, outcome.remoteAddress);
        break;
      case 'rejected':
        this.stats.rejected++;
        this.emit('rejected', outcome.remoteAddress);
        break;
      case 'failed':
        this.stats.acceptFailures++;
        this.emit('accept-failed', outcome.error);
        break;
    }
  }

  private onPeerIo(outcome: PeerIoOutcome): void {
    switch (outcome.kind) {
      case 'data':
        this.stats.reads++;
        this.emit('data', outcome.index, outcome.bytes);
        break;
      case 'closed':
        this.stats.disconnected++;
        this.emit('disconnected', outcome.index, outcome.reason === 'error' ? outcome.error : undefined);
        break;
      case 'idle':
        break;
    }
  }
}
