import { FREE_HANDLE } from '../constants.js';
import type { Handle, PeerSocket } from '../transport/types.js';

/**
 * Lifecycle marker of a slot. `free` means never used since init();
 * `disconnected` is left behind by release().
 */
export type SlotState = 'free' | 'connected' | 'disconnected';

/**
 * One fixed position in the connection table.
 */
export interface PeerSlot {
  readonly index: number;
  /** FREE_HANDLE when no live socket occupies the slot */
  handle: Handle;
  state: SlotState;
  peer: PeerSocket | null;
  remoteAddress: string | null;
  /** Output of the most recent read; only the first `length` bytes are valid */
  readonly buffer: Buffer;
  length: number;
}

/**
 * Plain view of an occupied slot, safe to serialize.
 */
export interface SlotSummary {
  index: number;
  handle: Handle;
  state: SlotState;
  remoteAddress: string | null;
  lastReadBytes: number;
}

/**
 * Fixed-capacity registry of peer connections. Slots never move; a slot's
 * index is its identity and free slots are found by first-fit scan.
 */
export class ConnectionTable {
  private slots: PeerSlot[];
  private initialized = false;
  readonly bufferSize: number;

  constructor(capacity: number, bufferSize: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Table capacity must be a positive integer, got ${capacity}`);
    }
    if (!Number.isInteger(bufferSize) || bufferSize <= 0) {
      throw new RangeError(`Buffer size must be a positive integer, got ${bufferSize}`);
    }
    this.bufferSize = bufferSize;
    this.slots = Array.from({ length: capacity }, (_, index): PeerSlot => ({
      index,
      handle: FREE_HANDLE,
      state: 'free',
      peer: null,
      remoteAddress: null,
      buffer: Buffer.alloc(bufferSize),
      length: 0,
    }));
  }

  get capacity(): number {
    return this.slots.length;
  }

  /** Number of occupied slots. */
  get size(): number {
    let count = 0;
    for (const slot of this.slots) {
      if (slot.handle !== FREE_HANDLE) count++;
    }
    return count;
  }

  /**
   * Reset every slot to free with a zeroed buffer. Runs once, before the
   * control loop starts.
   */
  init(): void {
    if (this.initialized) {
      throw new Error('Connection table already initialized');
    }
    for (const slot of this.slots) {
      slot.handle = FREE_HANDLE;
      slot.state = 'free';
      slot.peer = null;
      slot.remoteAddress = null;
      slot.buffer.fill(0);
      slot.length = 0;
    }
    this.initialized = true;
  }

  /**
   * Index of the first free slot, or null when the table is full.
   */
  findFreeSlot(): number | null {
    for (const slot of this.slots) {
      if (slot.handle === FREE_HANDLE) {
        return slot.index;
      }
    }
    return null;
  }

  isFull(): boolean {
    return this.findFreeSlot() === null;
  }

  slot(index: number): Readonly<PeerSlot> {
    return this.at(index);
  }

  /**
   * Occupied slots in index order.
   */
  occupied(): Array<Readonly<PeerSlot>> {
    return this.slots.filter((slot) => slot.handle !== FREE_HANDLE);
  }

  /**
   * Place a newly accepted socket into a free slot.
   */
  occupy(index: number, peer: PeerSocket): Readonly<PeerSlot> {
    const slot = this.at(index);
    if (slot.handle !== FREE_HANDLE) {
      throw new Error(`Slot ${index} is already occupied by handle ${slot.handle}`);
    }
    slot.handle = peer.handle;
    slot.state = 'connected';
    slot.peer = peer;
    slot.remoteAddress = peer.remoteAddress;
    slot.length = 0;
    return slot;
  }

  /**
   * Overwrite the slot buffer with the bytes of the latest read, truncated
   * to the buffer size. Returns the stored bytes.
   */
  store(index: number, bytes: Uint8Array): Buffer {
    const slot = this.occupiedAt(index);
    const length = Math.min(bytes.length, slot.buffer.length);
    slot.buffer.set(bytes.subarray(0, length));
    slot.length = length;
    return slot.buffer.subarray(0, length);
  }

  /**
   * Close the slot's socket and free the slot for the next accept.
   */
  release(index: number): void {
    const slot = this.occupiedAt(index);
    const peer = slot.peer;
    slot.state = 'disconnected';
    slot.handle = FREE_HANDLE;
    slot.peer = null;
    slot.remoteAddress = null;
    slot.length = 0;
    peer?.close();
  }

  snapshot(): SlotSummary[] {
    return this.occupied().map((slot) => summarize(slot));
  }

  private at(index: number): PeerSlot {
    const slot = this.slots[index];
    if (!slot) {
      throw new RangeError(`Slot index ${index} out of range (capacity ${this.capacity})`);
    }
    return slot;
  }

  private occupiedAt(index: number): PeerSlot {
    const slot = this.at(index);
    if (slot.handle === FREE_HANDLE) {
      throw new Error(`Slot ${index} is free`);
    }
    return slot;
  }
}

export function summarize(slot: Readonly<PeerSlot>): SlotSummary {
  return {
    index: slot.index,
    handle: slot.handle,
    state: slot.state,
    remoteAddress: slot.remoteAddress,
    lastReadBytes: slot.length,
  };
}
