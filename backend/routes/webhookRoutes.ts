import { Router } from 'express';
import rateLimit from 'express-rate-limit';
import type { Env } from '../config/env.js';
import { requireAuth, requireRoles, requireWebhookSecret } from '../middleware/auth.js';
import { makeWebhookController } from '../controllers/webhookController.js';
import type { AppDeps } from '../types/deps.js';

export function webhookRoutes(env: Env, deps: AppDeps): Router {
  const router = Router();
  const webhook = makeWebhookController(deps);
  const auth = requireAuth(env, deps.members);
  const automation = requireWebhookSecret(env);

  // Mail automation bursts are bounded per source address.
  const inboundLimiter = rateLimit({
    windowMs: 60_000,
    limit: env.NODE_ENV === 'production' ? 300 : 10_000,
    standardHeaders: true,
    legacyHeaders: false,
  });

  router.post('/webhook/tech-director/:code', auth, webhook.referToTechDirector);
  router.get('/webhook/status/:code', auth, webhook.getStatus);
  router.get('/webhook/health', webhook.health);
  router.post('/webhook/cleanup', auth, requireRoles('admin'), webhook.cleanup);
  router.post('/webhook/test', auth, requireRoles('admin'), webhook.sendTest);

  router.post('/webhook/inbound', inboundLimiter, automation, webhook.inbound);
  router.post('/webhook/reply', inboundLimiter, automation, webhook.reply);

  return router;
}
