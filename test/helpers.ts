import net from 'node:net';
import type { Logger } from '../src/logger.js';
import type {
  AcceptResult,
  Handle,
  ListenerSocket,
  PeerSocket,
  ReadResult,
} from '../src/transport/types.js';

export interface LogEntry {
  level: 'info' | 'warn' | 'error';
  message: string;
}

export type MemoryLogger = Logger & {
  entries: LogEntry[];
  messages(level?: LogEntry['level']): string[];
};

/**
 * Logger that keeps every message in memory
 */
export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  return {
    entries,
    info(message: string) {
      entries.push({ level: 'info', message });
    },
    warn(message: string) {
      entries.push({ level: 'warn', message });
    },
    error(message: string) {
      entries.push({ level: 'error', message });
    },
    messages(level?: LogEntry['level']) {
      return entries.filter((e) => !level || e.level === level).map((e) => e.message);
    },
  };
}

/**
 * In-memory peer socket fed by the test
 */
export class FakePeer implements PeerSocket {
  readonly handle: Handle;
  readonly remoteAddress: string;
  closed = false;
  reads = 0;
  lastMaxBytes = 0;
  private queue: ReadResult[] = [];
  private wake: () => void;

  constructor(handle: Handle, wake: () => void = () => undefined) {
    this.handle = handle;
    this.remoteAddress = `10.0.0.${handle}:4000`;
    this.wake = wake;
  }

  push(result: ReadResult): void {
    this.queue.push(result);
    this.wake();
  }

  pushData(text: string): void {
    this.push({ kind: 'data', bytes: Buffer.from(text) });
  }

  isReadable(): boolean {
    return this.queue.length > 0;
  }

  read(maxBytes: number): ReadResult {
    this.reads++;
    this.lastMaxBytes = maxBytes;
    return this.queue.shift() ?? { kind: 'would-block' };
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * In-memory listener whose accept queue is filled by the test
 */
export class FakeListener implements ListenerSocket {
  readonly handle: Handle;
  acceptCalls = 0;
  private pending: AcceptResult[] = [];
  private wake: () => void;

  constructor(handle: Handle = 0, wake: () => void = () => undefined) {
    this.handle = handle;
    this.wake = wake;
  }

  queuePeer(peer: PeerSocket): void {
    this.pending.push({ ok: true, peer });
    this.wake();
  }

  queueFailure(error: Error): void {
    this.pending.push({ ok: false, error });
    this.wake();
  }

  isReadable(): boolean {
    return this.pending.length > 0;
  }

  accept(): AcceptResult {
    this.acceptCalls++;
    return this.pending.shift() ?? { ok: false, error: new Error('no pending connection') };
  }
}

/**
 * Poll until `predicate` holds or fail after `timeoutMs`
 */
export async function waitFor(
  predicate: () => boolean,
  timeoutMs = 2000,
  label = 'condition'
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Timed out waiting for ${label}`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/**
 * Open a TCP connection to 127.0.0.1:port
 */
export function connectClient(port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host: '127.0.0.1', port }, () => {
      socket.off('error', reject);
      // The server may reset the connection (e.g. when it is full)
      socket.on('error', () => socket.destroy());
      resolve(socket);
    });
    socket.once('error', reject);
  });
}

/**
 * Resolve once the socket has fully closed
 */
export function closed(socket: net.Socket): Promise<void> {
  return new Promise((resolve) => {
    if (socket.destroyed) {
      resolve();
      return;
    }
    socket.once('close', () => resolve());
  });
}
