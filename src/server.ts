import { EventEmitter } from 'node:events';
import net from 'node:net';
import { BUFFER_SIZE, LISTEN_BACKLOG, MAX_CLIENTS, MUX_PORT } from './constants.js';
import type { Logger } from './logger.js';
import { createConsoleLogger } from './logger.js';
import type { SlotSummary } from './mux/connection-table.js';
import { HandleAllocator } from './mux/handles.js';
import { ControlLoop, type LoopStats } from './mux/loop.js';
import { EventPoller } from './mux/poller.js';
import { TcpListener } from './transport/tcp.js';

export interface MuxServerOptions {
  host?: string;
  port?: number;
  backlog?: number;
  /** Maximum concurrent peers */
  capacity?: number;
  /** Bytes per slot receive buffer */
  bufferSize?: number;
  /** Listen with this server instead of creating one */
  server?: net.Server;
  logger?: Logger;
}

/**
 * Events emitted by MuxServer
 */
export interface MuxServerEvents {
  'peer-connected': (index: number, remoteAddress: string) => void;
  'peer-rejected': (remoteAddress: string) => void;
  'peer-data': (index: number, bytes: Buffer) => void;
  'peer-disconnected': (index: number, error?: Error) => void;
  'accept-failed': (error: Error) => void;
}

/**
 * Server statistics reported by getStats()
 */
export interface ServerStats extends LoopStats {
  capacity: number;
  occupied: number;
  free: number;
}

/**
 * Multiplexed TCP server: one listening socket and up to `capacity` peers
 * served by a single readiness loop.
 *
 * ```ts
 * const server = new MuxServer({ port: 8080 });
 * await server.listen();
 * await server.serve(); // resolves after stop()
 * ```
 */
export class MuxServer extends EventEmitter {
  private readonly host: string;
  private readonly requestedPort: number;
  private readonly backlog: number;
  private readonly capacity: number;
  private readonly bufferSize: number;
  private readonly logger: Logger;
  private readonly server: net.Server | undefined;
  private readonly handles = new HandleAllocator();
  private listener: TcpListener | null = null;
  private loop: ControlLoop | null = null;

  constructor(options: MuxServerOptions = {}) {
    super();
    this.host = options.host ?? '0.0.0.0';
    this.requestedPort = options.port ?? MUX_PORT;
    this.backlog = options.backlog ?? LISTEN_BACKLOG;
    this.capacity = options.capacity ?? MAX_CLIENTS;
    this.bufferSize = options.bufferSize ?? BUFFER_SIZE;
    this.logger = options.logger ?? createConsoleLogger();
    this.server = options.server;
  }

  /**
   * Bind and listen. Rejects with SetupError when that fails.
   */
  async listen(): Promise<void> {
    if (this.listener) {
      throw new Error('Server already listening');
    }

    const poller = new EventPoller();
    const listener = await TcpListener.listenOn(
      this.server ?? net.createServer({ pauseOnConnect: true }),
      { host: this.host, port: this.requestedPort, backlog: this.backlog },
      {
        handles: this.handles,
        wake: poller.wake,
        fail: (error) => poller.fail(error),
      },
      this.bufferSize * 4
    );

    const loop = new ControlLoop({
      listener,
      poller,
      logger: this.logger,
      capacity: this.capacity,
      bufferSize: this.bufferSize,
    });

    // Forward loop events
    loop.on('accepted', (index: number, remoteAddress: string) => {
      this.emit('peer-connected', index, remoteAddress);
    });
    loop.on('rejected', (remoteAddress: string) => {
      this.emit('peer-rejected', remoteAddress);
    });
    loop.on('data', (index: number, bytes: Buffer) => {
      this.emit('peer-data', index, bytes);
    });
    loop.on('disconnected', (index: number, error?: Error) => {
      this.emit('peer-disconnected', index, error);
    });
    loop.on('accept-failed', (error: Error) => {
      this.emit('accept-failed', error);
    });

    this.listener = listener;
    this.loop = loop;
    this.logger.info(`Server listening on ${this.host}:${listener.port}`);
  }

  /**
   * Run the control loop. Resolves once stop() has been called; rejects
   * with MultiplexerError when readiness can no longer be waited for.
   */
  async serve(): Promise<void> {
    if (!this.loop) {
      throw new Error('Server is not listening');
    }
    await this.loop.run();
  }

  /**
   * Close every peer and the listening socket.
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    const listener = this.listener;
    this.loop = null;
    this.listener = null;

    loop?.stop();
    if (listener) {
      await listener.close();
    }
  }

  /** Bound port, or the configured one before listen(). */
  get port(): number {
    return this.listener ? this.listener.port : this.requestedPort;
  }

  get isListening(): boolean {
    return this.listener !== null;
  }

  getSlots(): SlotSummary[] {
    return this.loop ? this.loop.getSlots() : [];
  }

  getStats(): ServerStats {
    if (!this.loop) {
      return {
        iterations: 0,
        accepted: 0,
        rejected: 0,
        acceptFailures: 0,
        reads: 0,
        disconnected: 0,
        capacity: this.capacity,
        occupied: 0,
        free: this.capacity,
      };
    }
    const occupied = this.loop.occupiedCount;
    return {
      ...this.loop.getStats(),
      capacity: this.loop.capacity,
      occupied,
      free: this.loop.capacity - occupied,
    };
  }
}
