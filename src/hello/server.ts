import net from 'node:net';
import { HELLO_BACKLOG, HELLO_PORT, PROTOCOL_VERSION } from '../constants.js';
import { SetupError } from '../errors.js';
import type { Logger } from '../logger.js';
import { createConsoleLogger } from '../logger.js';
import { encodeHello } from '../protocol/hello.js';

export interface HelloServerOptions {
  host?: string;
  port?: number;
  backlog?: number;
  /** Version announced to clients */
  version?: number;
  logger?: Logger;
}

/**
 * Writes one HELLO to every client that connects, then ends the connection.
 */
export class HelloServer {
  private server: net.Server | null = null;
  private readonly host: string;
  private readonly requestedPort: number;
  private readonly backlog: number;
  private readonly version: number;
  private readonly logger: Logger;
  private greeted = 0;

  constructor(options: HelloServerOptions = {}) {
    this.host = options.host ?? '0.0.0.0';
    this.requestedPort = options.port ?? HELLO_PORT;
    this.backlog = options.backlog ?? HELLO_BACKLOG;
    this.version = options.version ?? PROTOCOL_VERSION;
    this.logger = options.logger ?? createConsoleLogger();
  }

  /**
   * Start listening. Rejects with SetupError when the port cannot be bound.
   */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.server) {
        reject(new Error('Hello server already started'));
        return;
      }

      const server = net.createServer((socket) => this.greet(socket));

      const onSetupError = (error: NodeJS.ErrnoException): void => {
        reject(new SetupError(`listen on ${this.host}:${this.requestedPort} failed: ${error.message}`, error.code));
      };
      server.once('error', onSetupError);

      server.listen({ host: this.host, port: this.requestedPort, backlog: this.backlog }, () => {
        server.off('error', onSetupError);
        server.on('error', (error) => {
          this.logger.warn(`Accept failed: ${error.message}`);
        });
        this.server = server;
        this.logger.info(`Hello server listening on ${this.host}:${this.port}`);
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }
      this.server = null;
      server.close((err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  get port(): number {
    const address = this.server?.address();
    return typeof address === 'object' && address !== null ? address.port : this.requestedPort;
  }

  /** Number of clients greeted so far. */
  get greetedCount(): number {
    return this.greeted;
  }

  private greet(socket: net.Socket): void {
    const remote = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    socket.on('error', (error) => {
      this.logger.warn(`Hello to ${remote} failed: ${error.message}`);
    });
    socket.end(encodeHello(this.version), () => {
      this.greeted++;
      this.logger.info(`Sent hello v${this.version} to ${remote}`);
    });
  }
}
