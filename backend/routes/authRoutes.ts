import { Router } from 'express';
import rateLimit from 'express-rate-limit';
import type { Env } from '../config/env.js';
import { logSecurityIncident } from '../config/appLogs.js';
import type { MemberStore } from '../database/ticketStore.js';
import { makeAuthController } from '../controllers/authController.js';
import { requireAuth } from '../middleware/auth.js';
import { isRecord } from '../utils/guards.js';

export function authRoutes(env: Env, members: MemberStore): Router {
  const router = Router();
  const controller = makeAuthController(env, members);

  // Auth responses contain credentials/tokens; they must not be cached.
  router.use((_req, res, next) => {
    res.setHeader('Cache-Control', 'no-store');
    next();
  });

  const authLimiter = rateLimit({
    windowMs: 15 * 60_000,
    limit: env.NODE_ENV === 'production' ? 60 : 10_000,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req) => {
      const body: unknown = req.body;
      const email = isRecord(body) && typeof body.email === 'string' ? body.email : 'anon';
      return `${req.ip ?? 'unknown'}:${email.toLowerCase().trim()}`;
    },
    handler: (req, res) => {
      logSecurityIncident('RATE_LIMIT_HIT', { severity: 'medium', ip: req.ip, route: req.originalUrl, method: req.method });
      res.status(429).json({
        error: { code: 'RATE_LIMITED', message: 'Too many requests. Please wait a few minutes and try again.' },
      });
    },
  });

  router.post('/login', authLimiter, controller.login);
  router.get('/me', requireAuth(env, members), controller.me);

  return router;
}
