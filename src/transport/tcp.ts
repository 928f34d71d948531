import net from 'node:net';
import { MultiplexerError, SetupError } from '../errors.js';
import type { HandleAllocator } from '../mux/handles.js';
import type {
  AcceptResult,
  Handle,
  ListenerSocket,
  PeerSocket,
  ReadResult,
} from './types.js';

/**
 * Where a listener binds.
 */
export interface ListenOptions {
  host: string;
  port: number;
  backlog: number;
}

/**
 * Hooks shared by a listener and the peers it accepts.
 */
export interface TcpContext {
  handles: HandleAllocator;
  /** Called on every socket event so the poller re-checks readiness */
  wake: () => void;
  /** Called when the listening socket goes away without close() */
  fail: (error: Error) => void;
}

function formatAddress(host: string | undefined, port: number | undefined): string {
  return `${host ?? 'unknown'}:${port ?? 0}`;
}

/**
 * A connected TCP socket whose input is queued as it arrives and handed out
 * by read(). Reading from the socket stops while more than `highWaterMark`
 * bytes sit unread.
 */
export class TcpPeer implements PeerSocket {
  readonly handle: Handle;
  readonly remoteAddress: string;
  private socket: net.Socket;
  private inbox: Buffer[] = [];
  private queued = 0;
  private ended = false;
  private failure: Error | null = null;
  private closed = false;
  private paused = false;
  private highWaterMark: number;
  private onClose: (handle: Handle) => void;

  constructor(
    handle: Handle,
    socket: net.Socket,
    wake: () => void,
    onClose: (handle: Handle) => void,
    options: { highWaterMark: number; earlyError?: Error }
  ) {
    this.handle = handle;
    this.socket = socket;
    this.onClose = onClose;
    this.highWaterMark = options.highWaterMark;
    this.remoteAddress = formatAddress(socket.remoteAddress, socket.remotePort);
    this.failure = options.earlyError ?? null;
    if (socket.destroyed) {
      this.ended = true;
    }

    socket.on('data', (chunk: Buffer) => {
      this.inbox.push(chunk);
      this.queued += chunk.length;
      if (this.queued >= this.highWaterMark && !this.paused) {
        this.paused = true;
        socket.pause();
      }
      wake();
    });

    socket.on('end', () => {
      this.ended = true;
      wake();
    });

    socket.on('error', (error: Error) => {
      this.failure = error;
      wake();
    });

    socket.on('close', () => {
      this.ended = true;
      wake();
    });

    socket.resume();
  }

  isReadable(): boolean {
    return this.queued > 0 || this.ended || this.failure !== null;
  }

  /**
   * Hand out up to `maxBytes` of queued input. Queued bytes are delivered
   * before end of stream or an error is reported.
   */
  read(maxBytes: number): ReadResult {
    if (this.queued > 0) {
      const bytes = this.take(maxBytes);
      if (this.paused && this.queued < this.highWaterMark && !this.closed) {
        this.paused = false;
        this.socket.resume();
      }
      return { kind: 'data', bytes };
    }
    if (this.failure) {
      return { kind: 'error', error: this.failure };
    }
    if (this.ended) {
      return { kind: 'eof' };
    }
    return { kind: 'would-block' };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.inbox = [];
    this.queued = 0;
    this.socket.destroy();
    this.onClose(this.handle);
  }

  private take(maxBytes: number): Buffer {
    const parts: Buffer[] = [];
    let remaining = maxBytes;
    while (remaining > 0 && this.inbox.length > 0) {
      const head = this.inbox[0];
      if (head.length <= remaining) {
        parts.push(head);
        remaining -= head.length;
        this.inbox.shift();
      } else {
        parts.push(head.subarray(0, remaining));
        this.inbox[0] = head.subarray(remaining);
        remaining = 0;
      }
    }
    const bytes = Buffer.concat(parts);
    this.queued -= bytes.length;
    return bytes;
  }
}

/**
 * A listening TCP socket. Connections the kernel has completed wait in a
 * queue, paused, until accept() hands them to the caller as a TcpPeer.
 */
export class TcpListener implements ListenerSocket {
  readonly handle: Handle;
  private server: net.Server;
  private context: TcpContext;
  private highWaterMark: number;
  private pending: Array<net.Socket | Error> = [];
  private pendingErrors = new WeakMap<net.Socket, Error>();
  private closing = false;

  private constructor(server: net.Server, context: TcpContext, highWaterMark: number) {
    this.server = server;
    this.context = context;
    this.highWaterMark = highWaterMark;
    this.handle = context.handles.allocate();
  }

  /**
   * Bind and listen. Rejects with SetupError when the address cannot be used.
   */
  static listen(
    options: ListenOptions,
    context: TcpContext,
    highWaterMark: number
  ): Promise<TcpListener> {
    return TcpListener.listenOn(net.createServer({ pauseOnConnect: true }), options, context, highWaterMark);
  }

  /**
   * Bind and listen with a server the caller created. Closing that server
   * from outside fails the poller through `context.fail`.
   */
  static listenOn(
    server: net.Server,
    options: ListenOptions,
    context: TcpContext,
    highWaterMark: number
  ): Promise<TcpListener> {
    return new Promise((resolve, reject) => {
      const onSetupError = (error: NodeJS.ErrnoException): void => {
        reject(new SetupError(`listen on ${options.host}:${options.port} failed: ${error.message}`, error.code));
      };
      server.once('error', onSetupError);

      server.listen({ host: options.host, port: options.port, backlog: options.backlog }, () => {
        server.off('error', onSetupError);
        resolve(new TcpListener(server, context, highWaterMark).attach());
      });
    });
  }

  /** Port actually bound (differs from the requested one when that was 0). */
  get port(): number {
    const address = this.server.address();
    return typeof address === 'object' && address !== null ? address.port : 0;
  }

  isReadable(): boolean {
    return this.pending.length > 0;
  }

  accept(): AcceptResult {
    const next = this.pending.shift();
    if (next === undefined) {
      return { ok: false, error: new Error('no pending connection') };
    }
    if (next instanceof Error) {
      return { ok: false, error: next };
    }

    const handle = this.context.handles.allocate();
    const peer = new TcpPeer(
      handle,
      next,
      this.context.wake,
      (closed) => this.context.handles.release(closed),
      { highWaterMark: this.highWaterMark, earlyError: this.pendingErrors.get(next) }
    );
    return { ok: true, peer };
  }

  /**
   * Stop listening and drop connections that were never accepted.
   */
  close(): Promise<void> {
    this.closing = true;
    for (const entry of this.pending) {
      if (!(entry instanceof Error)) {
        entry.destroy();
      }
    }
    this.pending = [];

    return new Promise((resolve, reject) => {
      if (!this.server.listening) {
        this.context.handles.release(this.handle);
        resolve();
        return;
      }
      this.server.close((err) => {
        this.context.handles.release(this.handle);
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  private attach(): this {
    this.server.on('connection', (socket: net.Socket) => {
      socket.on('error', (error: Error) => {
        this.pendingErrors.set(socket, error);
        this.context.wake();
      });
      this.pending.push(socket);
      this.context.wake();
    });

    // Errors after listen() succeeded are accept failures.
    this.server.on('error', (error: Error) => {
      this.pending.push(error);
      this.context.wake();
    });

    this.server.on('close', () => {
      if (!this.closing) {
        this.context.fail(new MultiplexerError('listening socket closed unexpectedly'));
      }
    });

    return this;
  }
}
