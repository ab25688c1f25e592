import type { NextFunction, Request, Response } from 'express';
import { webhookLog } from '../config/logger.js';
import { logAccessEvent, logChangeEvent } from '../config/appLogs.js';
import { TicketStatus, type TicketChanges } from '../database/ticketStore.js';
import { AppError } from '../middleware/errors.js';
import { publishTicketEvent } from '../services/realtimeHub.js';
import { reconcileInbound, replyPreview } from '../services/reconciliation.js';
import { normalizeTicketCode } from '../services/ticketCodes.js';
import type { AppDeps } from '../types/deps.js';
import { requestIdOf, ticketCodeParam } from '../utils/http.js';
import { toUiReply, toUiTicket } from '../utils/uiMappers.js';
import { inboundEmailSchema, webhookReplySchema } from '../validations/webhook.js';

export function makeWebhookController(deps: AppDeps) {
  const { tickets, dispatcher } = deps;

  return {
    referToTechDirector: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const code = ticketCodeParam(req);
        const actor = req.auth?.member;
        if (!actor) throw new AppError(401, 'UNAUTHENTICATED', 'Missing auth context');

        // The automation receives the ticket as it was before the referral.
        const snapshot = await tickets.findTicketByCode(code);
        if (!snapshot) throw new AppError(404, 'TICKET_NOT_FOUND', 'Ticket not found');

        const updated = await tickets.updateTicket(code, {
          status: TicketStatus.Referred,
          referredAt: new Date(),
          referredBy: actor.id,
        });
        if (!updated) throw new AppError(404, 'TICKET_NOT_FOUND', 'Ticket not found');

        dispatcher.dispatch(code, snapshot, 'referral', actor.name);

        publishTicketEvent('ticket.updated', { ticketCode: code, status: updated.status });
        webhookLog.info('Ticket referred to Tech Director', { ticketCode: code, by: actor.name });
        logChangeEvent({
          actorUserId: actor.id,
          actorRoles: [actor.role],
          entityType: 'Ticket',
          entityId: code,
          action: 'TICKET_REFERRED',
          changedFields: ['status', 'referredAt', 'referredBy'],
          before: { status: snapshot.status },
          after: { status: updated.status },
          requestId: requestIdOf(res),
        });

        res.json({
          success: true,
          message: 'Ticket referred to Technical Director',
          ticketId: code,
          webhook: dispatcher.getStatus(code),
        });
      } catch (err) {
        next(err);
      }
    },

    getStatus: (req: Request, res: Response, next: NextFunction) => {
      try {
        const code = ticketCodeParam(req);
        res.json({
          success: true,
          ticketId: code,
          webhook: dispatcher.getStatus(code) ?? { status: 'unknown', message: 'No webhook data found' },
        });
      } catch (err) {
        next(err);
      }
    },

    health: (_req: Request, res: Response) => {
      res.json({ success: true, ...dispatcher.health() });
    },

    cleanup: (req: Request, res: Response) => {
      const count = dispatcher.clear();
      webhookLog.info('Webhook status entries cleared', { count });
      logChangeEvent({
        actorUserId: req.auth?.memberId,
        entityType: 'WebhookStatus',
        action: 'WEBHOOK_STATUS_CLEARED',
        requestId: requestIdOf(res),
        metadata: { count },
      });
      res.json({ success: true, cleared: count, message: `Cleared ${count} webhook status entries` });
    },

    sendTest: async (req: Request, res: Response, next: NextFunction) => {
      try {
        if (!dispatcher.configured) {
          throw new AppError(503, 'WEBHOOK_NOT_CONFIGURED', 'Webhook URL is not configured');
        }
        logAccessEvent('ADMIN_ACTION', {
          userId: req.auth?.memberId,
          roles: req.auth ? [req.auth.role] : [],
          ip: req.ip,
          resource: 'webhook',
          requestId: requestIdOf(res),
          metadata: { action: 'sent test webhook to' },
        });

        const result = await dispatcher.sendTest();
        if (result.statusCode === undefined) {
          res.status(result.timedOut ? 504 : 502).json({ success: false, error: result.error ?? 'Webhook unreachable' });
          return;
        }
        res.json({ success: result.success, webhookStatus: result.statusCode, webhookResponse: result.response || null });
      } catch (err) {
        next(err);
      }
    },

    inbound: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const input = inboundEmailSchema.parse(req.body);
        const result = await reconcileInbound(tickets, input);

        if (result.outcome === 'duplicate') {
          res.status(200).json({ success: true, duplicate: true, message: 'Ticket already exists', ticketId: result.ticketCode });
          return;
        }

        if (result.outcome === 'created') {
          publishTicketEvent('ticket.created', { ticketCode: result.ticketCode });
          logChangeEvent({
            entityType: 'Ticket',
            entityId: result.ticketCode,
            action: 'TICKET_CREATED',
            after: { status: result.ticket.status, creationMethod: result.ticket.creationMethod },
            requestId: requestIdOf(res),
          });
        } else if (result.replyId) {
          publishTicketEvent('reply.created', { ticketCode: result.ticketCode, replyId: result.replyId, senderType: 'customer' });
        } else {
          publishTicketEvent('ticket.updated', { ticketCode: result.ticketCode, status: result.ticket.status });
        }

        res.status(result.created ? 201 : 200).json({
          success: true,
          outcome: result.outcome,
          ticketId: result.ticketCode,
          created: result.created,
          ...(result.matchedBy ? { matchedBy: result.matchedBy } : {}),
          ...(result.replyId ? { replyId: result.replyId } : {}),
          ticket: toUiTicket(result.ticket),
        });
      } catch (err) {
        next(err);
      }
    },

    reply: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = webhookReplySchema.parse(req.body);
        const code = normalizeTicketCode(body.ticketCode);
        const ticket = await tickets.findTicketByCode(code);
        if (!ticket) throw new AppError(404, 'TICKET_NOT_FOUND', 'Ticket not found');

        // Mail replies carry the customer's address; anything else is the automation itself.
        const senderType = body.email ? 'customer' : 'webhook';
        const reply = await tickets.insertReply({
          ticketCode: code,
          message: body.message,
          senderName: body.name ?? body.email ?? 'External System',
          senderEmail: body.email,
          senderType,
          attachments: body.attachments,
        });

        const changes: TicketChanges = {
          hasUnreadReply: true,
          lastReplyAt: reply.createdAt,
          lastReplyPreview: replyPreview(reply.message),
          lastReplySender: senderType,
        };
        if (senderType === 'customer') changes.status = TicketStatus.CustomerReplied;
        const updated = await tickets.updateTicket(code, changes);
        if (!updated) throw new AppError(404, 'TICKET_NOT_FOUND', 'Ticket not found');

        publishTicketEvent('reply.created', { ticketCode: code, replyId: reply.id, senderType });
        webhookLog.info('Webhook reply added', { ticketCode: code, senderType });
        logChangeEvent({
          entityType: 'Reply',
          entityId: reply.id,
          action: 'REPLY_CREATED',
          requestId: requestIdOf(res),
          metadata: { ticketCode: code, senderType },
        });

        res.status(201).json({
          success: true,
          message: 'Reply added successfully',
          replyId: reply.id,
          ticketId: code,
          reply: toUiReply(reply),
        });
      } catch (err) {
        next(err);
      }
    },
  };
}
