import { Router } from 'express';
import type { TicketStore } from '../database/ticketStore.js';
import { isReady, isShuttingDown } from '../config/lifecycle.js';

// Build-time metadata, injected via env or falling back to runtime values.
const BUILD_SHA = process.env.GIT_SHA || 'unknown';
const BUILD_TIME = process.env.BUILD_TIME || new Date().toISOString();

export function healthRoutes(tickets: TicketStore): Router {
  const router = Router();

  // Liveness: no I/O, cannot hang.
  router.get('/health/live', (_req, res) => {
    res.status(200).json({ status: 'alive' });
  });

  // Readiness: startup finished and the database answers.
  router.get('/health/ready', async (_req, res) => {
    const dbOk = isReady && (await tickets.ping());
    res.status(dbOk ? 200 : 503).json({
      status: dbOk ? 'ready' : 'not_ready',
      checks: {
        server: isShuttingDown ? 'stopping' : isReady ? 'up' : 'starting',
        database: dbOk ? 'connected' : 'disconnected',
      },
    });
  });

  router.get('/health', async (req, res) => {
    const dbOk = await tickets.ping();
    const mem = process.memoryUsage();

    const base = {
      status: dbOk ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      database: { status: dbOk ? 'connected' : 'disconnected' },
    };

    // Process details only for local callers.
    const isLocal = req.ip === '127.0.0.1' || req.ip === '::1' || req.ip === '::ffff:127.0.0.1';
    if (!isLocal) {
      res.status(dbOk ? 200 : 503).json(base);
      return;
    }

    res.status(dbOk ? 200 : 503).json({
      ...base,
      version: BUILD_SHA,
      buildTime: BUILD_TIME,
      uptime: Math.floor(process.uptime()),
      memoryMB: Math.round(mem.rss / 1024 / 1024),
      heapUsedMB: Math.round(mem.heapUsed / 1024 / 1024),
      pid: process.pid,
      nodeVersion: process.version,
    });
  });

  return router;
}
