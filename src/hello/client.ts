import net from 'node:net';
import { HELLO_TIMEOUT_MS } from '../constants.js';
import { HandshakeError } from '../errors.js';
import { HELLO_SIZE, decodeHello, type HelloOutcome } from '../protocol/hello.js';

export interface HelloRequestOptions {
  /** Give up when no complete hello arrived in this many ms */
  timeoutMs?: number;
}

/**
 * Connect to a hello server, read its single HELLO and compare versions.
 *
 * Rejects with the socket error when the connection fails and with
 * HandshakeError when the server sends too little or nothing in time.
 */
export function requestHello(
  host: string,
  port: number,
  options: HelloRequestOptions = {}
): Promise<HelloOutcome> {
  const timeoutMs = options.timeoutMs ?? HELLO_TIMEOUT_MS;

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    let settled = false;

    const socket = net.createConnection({ host, port });
    socket.setTimeout(timeoutMs);

    const finish = (): void => {
      if (settled) return;
      settled = true;
      socket.destroy();
      try {
        resolve(decodeHello(Buffer.concat(chunks).subarray(0, HELLO_SIZE)));
      } catch (error) {
        reject(error);
      }
    };

    const fail = (error: Error): void => {
      if (settled) return;
      settled = true;
      socket.destroy();
      reject(error);
    };

    socket.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
      received += chunk.length;
      if (received >= HELLO_SIZE) {
        finish();
      }
    });

    socket.on('end', finish);

    socket.on('timeout', () => {
      fail(new HandshakeError(`No hello from ${host}:${port} within ${timeoutMs}ms`));
    });

    socket.on('error', fail);
  });
}
