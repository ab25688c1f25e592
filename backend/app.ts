import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import crypto from 'node:crypto';

import type { Env } from './config/env.js';
import { parseCorsOrigins } from './config/env.js';
import { httpLog, logEvent } from './config/logger.js';
import { logSecurityIncident } from './config/appLogs.js';
import { MongoMemberStore, MongoTicketStore } from './database/mongoStores.js';
import { createWebhookDispatcher } from './services/webhookDispatcher.js';
import type { AppDeps } from './types/deps.js';
import { healthRoutes } from './routes/healthRoutes.js';
import { authRoutes } from './routes/authRoutes.js';
import { ticketsRoutes } from './routes/ticketsRoutes.js';
import { webhookRoutes } from './routes/webhookRoutes.js';
import { realtimeRoutes } from './routes/realtimeRoutes.js';
import { errorHandler, notFoundHandler } from './middleware/errors.js';
import { securityAuditMiddleware } from './middleware/security.js';
import { requestIdOf } from './utils/http.js';
import { escapeRegex } from './utils/guards.js';

export function isOriginAllowed(origin: string, allowed: string[]): boolean {
  if (!origin) return true;
  if (!allowed.length) return true;
  if (allowed.includes('*')) return true;

  let originUrl: URL;
  try {
    originUrl = new URL(origin);
  } catch {
    // If Origin is not a valid URL, fail closed.
    return false;
  }

  const originHost = originUrl.hostname;

  return allowed.some((entryRaw) => {
    const entry = entryRaw.trim();
    if (!entry) return false;

    // Exact match (full origin string).
    if (!entry.includes('*') && (entry.startsWith('http://') || entry.startsWith('https://'))) {
      return entry === origin;
    }

    // Wildcards: `https://*.example.com` or `*.example.com`.
    if (entry.includes('*')) {
      const re = new RegExp(`^${escapeRegex(entry).replace(/\\\*/g, '.*')}$`);
      return re.test(origin) || re.test(originHost);
    }

    // Hostname-only entry, or `.example.com` as a suffix.
    if (entry.startsWith('.')) return originHost.endsWith(entry);
    return originHost === entry;
  });
}

function defaultDeps(env: Env): AppDeps {
  return {
    tickets: new MongoTicketStore(),
    members: new MongoMemberStore(),
    dispatcher: createWebhookDispatcher(env),
  };
}

const STREAM_PREFIX = '/api/realtime/';

export function createApp(env: Env, deps: AppDeps = defaultDeps(env)) {
  const app = express();

  app.disable('x-powered-by');

  // Ensure every response carries a request identifier for log correlation.
  // Validate format to prevent log injection / CRLF attacks.
  const REQUEST_ID_PATTERN = /^[a-zA-Z0-9._-]{1,128}$/;
  app.use((req, res, next) => {
    const provided = String(req.header('x-request-id') || '').trim();
    const requestId = provided && REQUEST_ID_PATTERN.test(provided) ? provided : crypto.randomUUID();
    res.setHeader('x-request-id', requestId);
    res.locals.requestId = requestId;
    next();
  });

  // Deployments run behind a reverse proxy; keeps `req.ip` and rate limits honest.
  app.set('trust proxy', 1);

  const SLOW_REQUEST_THRESHOLD_MS = 3000;
  app.use((req, res, next) => {
    const start = Date.now();
    const requestId = requestIdOf(res);
    const provided = String(req.header('x-correlation-id') || '').trim();
    const correlationId = provided && REQUEST_ID_PATTERN.test(provided) ? provided : requestId;
    res.locals.correlationId = correlationId;
    res.setHeader('x-correlation-id', correlationId);

    res.on('finish', () => {
      const ms = Date.now() - start;
      const status = res.statusCode;
      const level = status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info';

      logEvent(level, `${req.method} ${req.originalUrl} -> ${status}`, {
        domain: 'http',
        eventName: 'REQUEST_COMPLETED',
        requestId,
        correlationId,
        method: req.method,
        route: req.originalUrl,
        statusCode: status,
        duration: ms,
        ip: req.ip,
        userId: req.auth?.memberId,
        metadata: {
          userAgent: req.get('user-agent'),
          contentLength: res.get('content-length'),
        },
      });

      if (ms > SLOW_REQUEST_THRESHOLD_MS) {
        httpLog.warn(`Slow request detected: ${req.method} ${req.originalUrl} took ${ms}ms`, {
          requestId,
          correlationId,
          durationMs: ms,
          threshold: SLOW_REQUEST_THRESHOLD_MS,
        });
      }
    });
    next();
  });

  // API service: no CSP (no HTML is served), HSTS only in production.
  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
      hsts: env.NODE_ENV === 'production' ? { maxAge: 31_536_000, includeSubDomains: true, preload: true } : false,
      referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    })
  );
  app.use((_req, res, next) => {
    res.setHeader('Permissions-Policy', 'camera=(), microphone=(), geolocation=()');
    // Ticket data is personal; intermediaries must not store it.
    res.setHeader('Cache-Control', 'no-store, no-cache, must-revalidate, private');
    res.setHeader('Pragma', 'no-cache');
    next();
  });

  // Safety net against hung handlers. SSE streams are exempt.
  app.use((req, res, next) => {
    if (req.path.startsWith(STREAM_PREFIX)) return next();
    const timer = setTimeout(() => {
      if (!res.headersSent) {
        httpLog.warn('Request timeout', {
          method: req.method,
          path: req.originalUrl,
          timeoutMs: env.REQUEST_TIMEOUT_MS,
          ip: req.ip,
        });
        res.status(504).json({
          error: { code: 'GATEWAY_TIMEOUT', message: 'The request took too long. Please try again.' },
        });
      }
    }, env.REQUEST_TIMEOUT_MS);
    // Don't prevent process exit.
    timer.unref();
    res.on('close', () => clearTimeout(timer));
    next();
  });

  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: env.NODE_ENV === 'production' ? 300 : 10_000,
      standardHeaders: true,
      legacyHeaders: false,
      // A stream is one long-lived connection.
      skip: (req) => req.path.startsWith(STREAM_PREFIX),
      handler: (req, res) => {
        httpLog.warn('Rate limit exceeded', { ip: req.ip });
        logSecurityIncident('RATE_LIMIT_HIT', {
          severity: 'medium',
          ip: req.ip,
          route: req.originalUrl,
          method: req.method,
          requestId: requestIdOf(res),
        });
        res.setHeader('Retry-After', '60');
        res.status(429).json({
          error: { code: 'RATE_LIMITED', message: 'Too many requests. Please wait a moment and try again.' },
        });
      },
    })
  );

  const corsOrigins = parseCorsOrigins(env.CORS_ORIGINS);

  // A request with a disallowed Origin is refused outright, not just left without CORS headers.
  app.use((req, res, next) => {
    const origin = req.header('origin');
    if (origin && !isOriginAllowed(origin, corsOrigins)) {
      logSecurityIncident('CORS_VIOLATION', {
        severity: 'medium',
        ip: req.ip,
        route: req.originalUrl,
        method: req.method,
        requestId: requestIdOf(res),
        metadata: { origin },
      });
      res.status(403).json({
        error: { code: 'ORIGIN_NOT_ALLOWED', message: 'Origin not allowed' },
      });
      return;
    }
    next();
  });
  app.use(
    cors({
      origin: (origin, cb) => cb(null, isOriginAllowed(origin ?? '', corsOrigins)),
      credentials: true,
      optionsSuccessStatus: 204,
    })
  );

  // SSE streams carry no body; parsers only get in the way of long-lived connections.
  const jsonParser = express.json({ limit: env.REQUEST_BODY_LIMIT });
  const formParser = express.urlencoded({ extended: false, limit: env.REQUEST_BODY_LIMIT });
  app.use((req, res, next) => (req.path.startsWith(STREAM_PREFIX) ? next() : jsonParser(req, res, next)));
  app.use((req, res, next) => (req.path.startsWith(STREAM_PREFIX) ? next() : formParser(req, res, next)));

  // Inbound mail bodies are free customer text and are checked by their own schemas.
  app.use(securityAuditMiddleware({ trustedBodyPrefixes: ['/api/webhook/'] }));

  app.use('/api', healthRoutes(deps.tickets));
  app.use('/api/auth', authRoutes(env, deps.members));
  app.use('/api', ticketsRoutes(env, deps));
  app.use('/api', webhookRoutes(env, deps));
  app.use('/api/realtime', realtimeRoutes(env, deps.members));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
