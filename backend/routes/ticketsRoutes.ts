import { Router } from 'express';
import rateLimit from 'express-rate-limit';
import type { Env } from '../config/env.js';
import { requireAuth, requireRoles } from '../middleware/auth.js';
import { makeTicketsController } from '../controllers/ticketsController.js';
import { makeClaimDocumentsController } from '../controllers/claimDocumentsController.js';
import type { AppDeps } from '../types/deps.js';

export function ticketsRoutes(env: Env, deps: AppDeps): Router {
  const router = Router();
  const tickets = makeTicketsController(deps);
  const claimDocuments = makeClaimDocumentsController(deps);
  const auth = requireAuth(env, deps.members);

  // Rate-limit ticket write operations to prevent spam.
  const ticketWriteLimiter = rateLimit({
    windowMs: 60_000,
    limit: env.NODE_ENV === 'production' ? 60 : 1000,
    standardHeaders: true,
    legacyHeaders: false,
  });

  // Fixed paths first so they are not captured by `:code`.
  router.get('/tickets', auth, tickets.listTickets);
  router.get('/tickets/stats', auth, tickets.stats);
  router.get('/tickets/search', auth, tickets.search);
  router.get('/tickets/referred', auth, tickets.listReferred);
  router.post('/tickets', auth, ticketWriteLimiter, tickets.createTicket);

  router.get('/tickets/:code', auth, tickets.getTicket);
  router.patch('/tickets/:code', auth, ticketWriteLimiter, tickets.updateTicket);
  router.put('/tickets/:code/status', auth, ticketWriteLimiter, tickets.updateStatus);
  router.patch('/tickets/:code/status', auth, ticketWriteLimiter, tickets.updateStatus);
  router.post('/tickets/:code/close', auth, ticketWriteLimiter, tickets.closeTicket);
  router.post('/tickets/:code/read', auth, tickets.markRead);
  router.get('/tickets/:code/attachments/:index', auth, tickets.downloadTicketAttachment);
  router.put('/tickets/:code/vehicle-info', auth, ticketWriteLimiter, tickets.updateVehicleInfo);

  router.get('/tickets/:code/claim-documents', auth, claimDocuments.listDocuments);
  router.post('/tickets/:code/claim-documents', auth, ticketWriteLimiter, claimDocuments.uploadDocument);
  router.get('/tickets/:code/claim-documents/:documentId/download', auth, claimDocuments.downloadDocument);
  router.delete('/tickets/:code/claim-documents/:documentId', auth, ticketWriteLimiter, claimDocuments.deleteDocument);

  router.post('/tickets/:code/replies', auth, ticketWriteLimiter, tickets.createReply);
  router.get('/tickets/:code/replies/:replyId/attachments/:index', auth, tickets.downloadReplyAttachment);
  router.delete('/tickets/:code/replies/:replyId', auth, requireRoles('admin'), tickets.deleteReply);

  router.delete('/tickets/:code', auth, requireRoles('admin'), ticketWriteLimiter, tickets.deleteTicket);

  return router;
}
