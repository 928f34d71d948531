/**
 * Read-only Express router exposing the multiplexed server's connection table.
 *
 * Endpoints:
 *   GET /v1/health       Liveness and bound port
 *   GET /v1/stats        Loop counters and table occupancy
 *   GET /v1/slots        Occupied slots
 *   GET /v1/slots/:index One occupied slot
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { rateLimit } from 'express-rate-limit';
import type { SlotSummary } from '../mux/connection-table.js';
import type { ServerStats } from '../server.js';

const statusRateLimit = rateLimit({
  windowMs: 60_000,
  limit: 120,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Too many requests, try again later' },
});

/**
 * Minimal interface of the server that the status API reads from.
 */
export interface StatusSource {
  readonly port: number;
  readonly isListening: boolean;
  getSlots(): SlotSummary[];
  getStats(): ServerStats;
}

/**
 * Create the status API router.
 */
export function createStatusRouter(source: StatusSource): Router {
  const router = Router();
  router.use(statusRateLimit);

  router.get('/v1/health', (_req: Request, res: Response) => {
    res.json({ ok: source.isListening, listening: source.port });
  });

  router.get('/v1/stats', (_req: Request, res: Response) => {
    res.json(source.getStats());
  });

  router.get('/v1/slots', (_req: Request, res: Response) => {
    res.json({ slots: source.getSlots() });
  });

  router.get('/v1/slots/:index', (req: Request, res: Response) => {
    const raw = req.params.index;
    const index = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
    const capacity = source.getStats().capacity;
    if (Number.isNaN(index) || index >= capacity) {
      res.status(400).json({ error: `index must be an integer between 0 and ${capacity - 1}` });
      return;
    }

    const slot = source.getSlots().find((s) => s.index === index);
    if (!slot) {
      res.status(404).json({ error: `Slot ${index} is free` });
      return;
    }
    res.json(slot);
  });

  return router;
}
