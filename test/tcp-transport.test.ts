import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import net from 'node:net';
import { MultiplexerError, SetupError } from '../src/errors.js';
import { HandleAllocator } from '../src/mux/handles.js';
import { TcpListener, type TcpContext } from '../src/transport/tcp.js';
import type { PeerSocket } from '../src/transport/types.js';
import { closed, connectClient, waitFor } from './helpers.js';

describe('TCP transport', () => {
  let handles: HandleAllocator;
  let context: TcpContext;
  let wakes: number;
  let failures: Error[];
  let listener: TcpListener;
  let clients: net.Socket[];

  beforeEach(async () => {
    handles = new HandleAllocator();
    wakes = 0;
    context = {
      handles,
      wake: () => {
        wakes++;
      },
      fail: (error) => {
        failures.push(error);
      },
    };
    failures = [];
    listener = await TcpListener.listen({ host: '127.0.0.1', port: 0, backlog: 10 }, context, 1024);
    clients = [];
  });

  afterEach(async () => {
    for (const client of clients) {
      client.destroy();
    }
    await listener.close();
  });

  async function acceptOne(): Promise<{ client: net.Socket; peer: PeerSocket }> {
    const client = await connectClient(listener.port);
    clients.push(client);
    await waitFor(() => listener.isReadable(), 2000, 'pending connection');
    const result = listener.accept();
    assert.ok(result.ok);
    return { client, peer: result.peer };
  }

  function drain(peer: PeerSocket, maxBytes: number, into: Buffer[]): void {
    for (;;) {
      const result = peer.read(maxBytes);
      if (result.kind !== 'data') return;
      assert.ok(result.bytes.length <= maxBytes);
      into.push(result.bytes);
    }
  }

  it('should take the first handle for the listener', () => {
    assert.strictEqual(listener.handle, 0);
    assert.ok(listener.port > 0);
    assert.strictEqual(listener.isReadable(), false);
  });

  it('should hand out accepted connections with the next handle', async () => {
    const { peer } = await acceptOne();

    assert.strictEqual(peer.handle, 1);
    assert.match(peer.remoteAddress, /^127\.0\.0\.1:\d+$/);
    assert.strictEqual(listener.isReadable(), false);
    assert.ok(wakes > 0);
  });

  it('should report failure when nothing is pending', () => {
    const result = listener.accept();
    assert.strictEqual(result.ok, false);
  });

  it('should deliver bytes the client sends', async () => {
    const { client, peer } = await acceptOne();
    assert.deepStrictEqual(peer.read(16), { kind: 'would-block' });

    client.write('hello');
    const received: Buffer[] = [];
    await waitFor(() => {
      drain(peer, 16, received);
      return Buffer.concat(received).length === 5;
    });

    assert.strictEqual(Buffer.concat(received).toString(), 'hello');
  });

  it('should never hand out more than maxBytes per read', async () => {
    const { client, peer } = await acceptOne();

    client.write('abcdefgh');
    const received: Buffer[] = [];
    await waitFor(() => {
      drain(peer, 3, received);
      return Buffer.concat(received).length === 8;
    });

    assert.strictEqual(Buffer.concat(received).toString(), 'abcdefgh');
    assert.ok(received.every((chunk) => chunk.length <= 3));
  });

  it('should deliver queued bytes before end of stream', async () => {
    const { client, peer } = await acceptOne();

    client.end('bye');
    const received: Buffer[] = [];
    await waitFor(() => {
      drain(peer, 16, received);
      return peer.read(16).kind === 'eof';
    });

    assert.strictEqual(Buffer.concat(received).toString(), 'bye');
    assert.deepStrictEqual(peer.read(16), { kind: 'eof' });
  });

  it('should hand out a stream many times the high-water mark in order', async () => {
    const { client, peer } = await acceptOne();
    const payload = Buffer.alloc(200_000);
    for (let i = 0; i < payload.length; i++) {
      payload[i] = i % 251;
    }

    client.end(payload);
    const received: Buffer[] = [];
    await waitFor(
      () => {
        drain(peer, 16, received);
        return peer.read(16).kind === 'eof';
      },
      10_000,
      'end of stream'
    );

    assert.strictEqual(Buffer.concat(received).length, payload.length);
    assert.ok(Buffer.concat(received).equals(payload));
  });

  it('should give the handle back when a peer is closed', async () => {
    const { client, peer } = await acceptOne();
    assert.strictEqual(handles.has(1), true);

    peer.close();
    await closed(client);

    assert.strictEqual(handles.has(1), false);
    const next = await acceptOne();
    assert.strictEqual(next.peer.handle, 1);
  });

  it('should drop connections that were never accepted on close', async () => {
    const client = await connectClient(listener.port);
    clients.push(client);
    await waitFor(() => listener.isReadable());

    await listener.close();
    await closed(client);

    assert.strictEqual(listener.isReadable(), false);
    assert.strictEqual(handles.has(0), false);
    assert.deepStrictEqual(failures, []);
  });

  it('should fail the poller when its server is closed from outside', async () => {
    const server = net.createServer({ pauseOnConnect: true });
    const own = await TcpListener.listenOn(server, { host: '127.0.0.1', port: 0, backlog: 10 }, context, 1024);
    assert.strictEqual(own.handle, 1);

    await new Promise<void>((resolve) => server.close(() => resolve()));

    assert.strictEqual(failures.length, 1);
    const [failure] = failures;
    assert.ok(failure instanceof MultiplexerError);
    assert.strictEqual(failure.message, 'listening socket closed unexpectedly');

    await own.close();
    assert.strictEqual(failures.length, 1);
    assert.strictEqual(handles.has(1), false);
  });

  it('should reject with SetupError when the port is taken', async () => {
    const other = new HandleAllocator();
    await assert.rejects(
      TcpListener.listen(
        { host: '127.0.0.1', port: listener.port, backlog: 10 },
        { handles: other, wake: () => undefined, fail: () => undefined },
        1024
      ),
      (err: unknown) => {
        assert.ok(err instanceof SetupError);
        assert.strictEqual(err.code, 'EADDRINUSE');
        return true;
      }
    );
    assert.strictEqual(other.size, 0);
  });
});
