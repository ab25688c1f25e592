import { Router, type Response } from 'express';
import type { Env } from '../config/env.js';
import type { MemberStore } from '../database/ticketStore.js';
import { requireAuth } from '../middleware/auth.js';
import { realtimeListenerCount, subscribeRealtime } from '../services/realtimeHub.js';
import { realtimeLog } from '../config/logger.js';
import { logAccessEvent, logPerformance } from '../config/appLogs.js';
import { errorMessage } from '../utils/guards.js';
import { requestIdOf } from '../utils/http.js';

const PING_INTERVAL_MS = 25_000;
// Forces clients to reconnect so no stream lives forever.
const MAX_STREAM_LIFETIME_MS = 4 * 60 * 60 * 1000;

function writeSse(res: Response, evt: { event: string; data?: unknown }): boolean {
  // Never throw from a realtime emitter callback.
  if (res.writableEnded || res.destroyed) return false;
  try {
    res.write(`event: ${evt.event}\n`);
    if (evt.data !== undefined) {
      // Single-line JSON keeps one `data:` field per event.
      res.write(`data: ${typeof evt.data === 'string' ? evt.data : JSON.stringify(evt.data)}\n`);
    }
    res.write('\n');
    return true;
  } catch (err) {
    realtimeLog.debug('SSE write failed', { error: errorMessage(err) });
    return false;
  }
}

export function realtimeRoutes(env: Env, members: MemberStore): Router {
  const r = Router();

  // Does not require auth and does not open a long-lived stream.
  r.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', transport: 'sse', subscribers: realtimeListenerCount() });
  });

  r.get('/stream', requireAuth(env, members), (req, res) => {
    const requestId = requestIdOf(res);
    const auth = req.auth;
    if (!auth) {
      res.status(401).end();
      return;
    }
    const { memberId, role } = auth;

    // Long-lived connection: disable socket idle timeouts.
    req.socket.setNoDelay(true);
    req.socket.setTimeout(0);

    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
    res.setHeader('Cache-Control', 'no-cache, no-transform');
    res.setHeader('Connection', 'keep-alive');
    // Some proxies buffer by default.
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    realtimeLog.info('SSE stream opened', { requestId, memberId, role });
    logAccessEvent('RESOURCE_ACCESS', {
      userId: memberId,
      roles: [role],
      ip: req.ip,
      resource: 'SSE_STREAM',
      requestId,
      metadata: { action: 'connect' },
    });

    let cleaned = false;
    let eventsDelivered = 0;
    const streamStart = Date.now();
    let unsubscribe: (() => void) | undefined;
    let ping: ReturnType<typeof setInterval> | undefined;
    let maxLifetimeTimer: ReturnType<typeof setTimeout> | undefined;

    const cleanup = () => {
      if (cleaned) return;
      cleaned = true;
      clearInterval(ping);
      clearTimeout(maxLifetimeTimer);
      unsubscribe?.();
      if (!res.writableEnded) res.end();
      realtimeLog.info('SSE stream closed', { requestId, memberId, eventsDelivered });
      logPerformance({
        operation: 'sse-stream',
        durationMs: Date.now() - streamStart,
        metadata: { memberId, eventsDelivered, requestId },
      });
    };

    if (!writeSse(res, { event: 'ready', data: { ts: new Date().toISOString() } })) {
      cleanup();
      return;
    }

    unsubscribe = subscribeRealtime((evt) => {
      if (writeSse(res, { event: evt.type, data: { ts: evt.ts, payload: evt.payload } })) {
        eventsDelivered++;
      } else {
        cleanup();
      }
    });

    // Keepalive so intermediaries don't close idle connections.
    ping = setInterval(() => {
      if (!writeSse(res, { event: 'ping', data: { ts: new Date().toISOString() } })) cleanup();
    }, PING_INTERVAL_MS);
    maxLifetimeTimer = setTimeout(() => {
      writeSse(res, { event: 'reconnect', data: { reason: 'max_lifetime' } });
      cleanup();
    }, MAX_STREAM_LIFETIME_MS);
    maxLifetimeTimer.unref();

    req.on('close', cleanup);
    res.on('close', cleanup);
    res.on('error', cleanup);
  });

  return r;
}
