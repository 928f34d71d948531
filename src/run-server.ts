/**
 * Start the multiplexed server and, when configured, the status API next to it.
 *
 * Environment variables (read through loadConfig):
 *   SLOTMUX_PORT        Multiplexed server port (default: 8080)
 *   SLOTMUX_STATUS_PORT Status API port; the API is off when unset
 */

import http from 'node:http';
import express from 'express';
import type { MuxConfig, StatusConfig } from './config.js';
import { SetupError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { MuxServer } from './server.js';
import { createStatusRouter, type StatusSource } from './status/status-api.js';

export interface RunServerOptions {
  mux: MuxConfig;
  status?: StatusConfig;
  logger: Logger;
}

/**
 * Create the Express app serving the status API for `source`.
 */
export function createStatusApp(source: StatusSource): express.Express {
  const app = express();
  app.use(createStatusRouter(source));
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  return app;
}

/**
 * Bind the multiplexed server and optional status API.
 * Returns { server, httpServer } where httpServer is set only when the
 * status API is enabled. The caller runs server.serve().
 */
export async function runServer(options: RunServerOptions): Promise<{
  server: MuxServer;
  httpServer?: http.Server;
}> {
  const server = new MuxServer({ ...options.mux, logger: options.logger });
  await server.listen();

  const status = options.status;
  if (!status) {
    return { server };
  }

  const httpServer = http.createServer(createStatusApp(server));
  try {
    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(status.port, status.host, () => {
        httpServer.off('error', reject);
        resolve();
      });
    });
  } catch (error) {
    await server.stop();
    throw new SetupError(`status API on ${status.host}:${status.port} failed: ${errorMessage(error)}`);
  }

  const address = httpServer.address();
  const port = typeof address === 'object' && address !== null ? address.port : status.port;
  options.logger.info(`Status API listening on ${status.host}:${port}`);
  return { server, httpServer };
}
