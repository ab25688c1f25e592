import type { NextFunction, Request, Response } from 'express';
import { ticketLog } from '../config/logger.js';
import { logAccessEvent, logChangeEvent } from '../config/appLogs.js';
import {
  TicketStatus,
  type Attachment,
  type TicketChanges,
  type TicketRecord,
  type VehicleInfo,
} from '../database/ticketStore.js';
import { AppError } from '../middleware/errors.js';
import { publishTicketEvent } from '../services/realtimeHub.js';
import { replyPreview } from '../services/reconciliation.js';
import { insertWithFreshCode } from '../services/ticketCodes.js';
import type { AppDeps } from '../types/deps.js';
import { requestIdOf, sendBase64File, ticketCodeParam } from '../utils/http.js';
import { paginatedResponse, parsePagination } from '../utils/pagination.js';
import { toUiReply, toUiTicket } from '../utils/uiMappers.js';
import {
  createReplySchema,
  createTicketSchema,
  listTicketsQuerySchema,
  searchTicketsQuerySchema,
  updateStatusSchema,
  updateTicketSchema,
  vehicleInfoSchema,
} from '../validations/tickets.js';

const SEARCH_LIMIT = 100;

function actorOf(req: Request) {
  const member = req.auth?.member;
  if (!member) throw new AppError(401, 'UNAUTHENTICATED', 'Missing auth context');
  return member;
}

function sendAttachment(res: Response, attachment: Attachment | undefined): void {
  if (!attachment) throw new AppError(404, 'ATTACHMENT_NOT_FOUND', 'Attachment not found');
  sendBase64File(res, attachment);
}

/** Supplied fields replace stored ones; omitted fields keep their value. */
function mergeVehicle(prev: VehicleInfo = {}, patch: VehicleInfo): VehicleInfo {
  return {
    registration: patch.registration ?? prev.registration,
    serviceDate: patch.serviceDate ?? prev.serviceDate,
    claimDate: patch.claimDate ?? prev.claimDate,
    typeOfClaim: patch.typeOfClaim ?? prev.typeOfClaim,
    technician: patch.technician ?? prev.technician,
    vhcLink: patch.vhcLink ?? prev.vhcLink,
    daysBetweenServiceClaim: patch.daysBetweenServiceClaim ?? prev.daysBetweenServiceClaim,
    advisoriesFollowed: patch.advisoriesFollowed ?? prev.advisoriesFollowed,
    withinWarranty: patch.withinWarranty ?? prev.withinWarranty,
    newFaultCodes: patch.newFaultCodes ?? prev.newFaultCodes,
    dpfLightOn: patch.dpfLightOn ?? prev.dpfLightOn,
    emlLightOn: patch.emlLightOn ?? prev.emlLightOn,
  };
}

function attachmentIndex(req: Request): number {
  const index = Number(req.params.index);
  if (!Number.isInteger(index) || index < 0) throw new AppError(400, 'INVALID_ATTACHMENT_INDEX', 'Invalid attachment index');
  return index;
}

export function makeTicketsController(deps: AppDeps) {
  const { tickets, dispatcher } = deps;

  async function loadTicket(code: string): Promise<TicketRecord> {
    const ticket = await tickets.findTicketByCode(code);
    if (!ticket) throw new AppError(404, 'TICKET_NOT_FOUND', 'Ticket not found');
    return ticket;
  }

  async function applyChanges(code: string, changes: TicketChanges): Promise<TicketRecord> {
    const updated = await tickets.updateTicket(code, changes);
    if (!updated) throw new AppError(404, 'TICKET_NOT_FOUND', 'Ticket not found');
    publishTicketEvent('ticket.updated', { ticketCode: updated.ticketCode, status: updated.status });
    return updated;
  }

  return {
    listTickets: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const query = listTicketsQuerySchema.parse(req.query);
        const page = parsePagination(query);
        const filter = {
          status: query.status,
          priority: query.priority,
          classification: query.classification,
          search: query.search,
        };
        const [rows, total] = await Promise.all([tickets.listTickets(filter, page), tickets.countTickets(filter)]);
        res.json(paginatedResponse(rows.map(toUiTicket), total, page));
      } catch (err) {
        next(err);
      }
    },

    stats: async (_req: Request, res: Response, next: NextFunction) => {
      try {
        res.json(await tickets.ticketStats());
      } catch (err) {
        next(err);
      }
    },

    search: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { q } = searchTicketsQuerySchema.parse(req.query);
        const rows = await tickets.listTickets({ search: q }, { skip: 0, limit: SEARCH_LIMIT });
        res.json({ data: rows.map(toUiTicket), count: rows.length, query: q });
      } catch (err) {
        next(err);
      }
    },

    listReferred: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const page = parsePagination(listTicketsQuerySchema.parse(req.query));
        const filter = { statusContains: 'Referred' };
        const [rows, total] = await Promise.all([tickets.listTickets(filter, page), tickets.countTickets(filter)]);
        res.json(paginatedResponse(rows.map(toUiTicket), total, page));
      } catch (err) {
        next(err);
      }
    },

    createTicket: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = createTicketSchema.parse(req.body);
        const actor = actorOf(req);

        const ticket = await insertWithFreshCode(tickets, {
          status: TicketStatus.New,
          priority: body.priority,
          classification: body.classification,
          email: body.email,
          name: body.name,
          phone: body.phone,
          subject: body.subject,
          body: body.body,
          assignedTo: body.assignedTo,
          vehicle: body.vehicle,
          attachments: body.attachments,
          creationMethod: 'manual',
          createdBy: actor.id,
        });

        publishTicketEvent('ticket.created', { ticketCode: ticket.ticketCode });
        ticketLog.info('Ticket created', { ticketCode: ticket.ticketCode, createdBy: actor.id });
        logChangeEvent({
          actorUserId: actor.id,
          actorRoles: [actor.role],
          entityType: 'Ticket',
          entityId: ticket.ticketCode,
          action: 'TICKET_CREATED',
          after: { status: ticket.status, priority: ticket.priority },
          requestId: requestIdOf(res),
        });

        res.status(201).json(toUiTicket(ticket));
      } catch (err) {
        next(err);
      }
    },

    getTicket: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const ticket = await loadTicket(ticketCodeParam(req));
        const replies = await tickets.listReplies(ticket.ticketCode);
        logAccessEvent('RESOURCE_ACCESS', {
          userId: req.auth?.memberId,
          roles: req.auth ? [req.auth.role] : [],
          ip: req.ip,
          resource: 'Ticket',
          requestId: requestIdOf(res),
          metadata: { action: 'TICKET_VIEWED', ticketCode: ticket.ticketCode },
        });
        res.json({ ticket: toUiTicket(ticket), replies: replies.map(toUiReply) });
      } catch (err) {
        next(err);
      }
    },

    updateTicket: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const code = ticketCodeParam(req);
        const body = updateTicketSchema.parse(req.body);
        const before = await loadTicket(code);
        const updated = await applyChanges(code, body);

        logChangeEvent({
          actorUserId: req.auth?.memberId,
          entityType: 'Ticket',
          entityId: code,
          action: 'TICKET_UPDATED',
          changedFields: Object.entries(body)
            .filter(([, value]) => value !== undefined)
            .map(([key]) => key),
          before: { priority: before.priority, classification: before.classification, assignedTo: before.assignedTo },
          after: { priority: updated.priority, classification: updated.classification, assignedTo: updated.assignedTo },
          requestId: requestIdOf(res),
        });

        res.json(toUiTicket(updated));
      } catch (err) {
        next(err);
      }
    },

    updateVehicleInfo: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const code = ticketCodeParam(req);
        const body = vehicleInfoSchema.parse(req.body);
        const before = await loadTicket(code);
        const updated = await applyChanges(code, { vehicle: mergeVehicle(before.vehicle, body) });

        logChangeEvent({
          actorUserId: req.auth?.memberId,
          entityType: 'Ticket',
          entityId: code,
          action: 'TICKET_VEHICLE_UPDATED',
          changedFields: Object.entries(body)
            .filter(([, value]) => value !== undefined)
            .map(([key]) => key),
          requestId: requestIdOf(res),
        });

        res.json({ success: true, message: 'Vehicle information updated', ticket: toUiTicket(updated) });
      } catch (err) {
        next(err);
      }
    },

    updateStatus: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const code = ticketCodeParam(req);
        const { status } = updateStatusSchema.parse(req.body);
        const actor = actorOf(req);
        const before = await loadTicket(code);

        const changes: TicketChanges = { status };
        if (status === TicketStatus.Closed && before.status !== TicketStatus.Closed) {
          changes.closedAt = new Date();
          changes.closedBy = actor.id;
        }
        const updated = await applyChanges(code, changes);

        ticketLog.info('Ticket status updated', { ticketCode: code, from: before.status, to: status, by: actor.name });
        logChangeEvent({
          actorUserId: actor.id,
          entityType: 'Ticket',
          entityId: code,
          action: 'TICKET_STATUS_CHANGE',
          changedFields: ['status'],
          before: { status: before.status },
          after: { status: updated.status },
          requestId: requestIdOf(res),
        });

        res.json({ success: true, message: `Status updated to ${status}`, ticket: toUiTicket(updated) });
      } catch (err) {
        next(err);
      }
    },

    closeTicket: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const code = ticketCodeParam(req);
        const actor = actorOf(req);
        const before = await loadTicket(code);
        const updated = await applyChanges(code, {
          status: TicketStatus.Closed,
          closedAt: new Date(),
          closedBy: actor.id,
        });

        logChangeEvent({
          actorUserId: actor.id,
          entityType: 'Ticket',
          entityId: code,
          action: 'TICKET_CLOSED',
          changedFields: ['status', 'closedAt', 'closedBy'],
          before: { status: before.status },
          after: { status: updated.status },
          requestId: requestIdOf(res),
        });

        res.json({ success: true, message: 'Ticket closed', ticket: toUiTicket(updated) });
      } catch (err) {
        next(err);
      }
    },

    markRead: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const updated = await applyChanges(ticketCodeParam(req), { hasUnreadReply: false });
        res.json(toUiTicket(updated));
      } catch (err) {
        next(err);
      }
    },

    createReply: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const code = ticketCodeParam(req);
        const body = createReplySchema.parse(req.body);
        const actor = actorOf(req);
        await loadTicket(code);

        const reply = await tickets.insertReply({
          ticketCode: code,
          message: body.message,
          senderName: actor.name,
          senderEmail: actor.email,
          senderType: 'agent',
          attachments: body.attachments,
        });
        const updated = await applyChanges(code, {
          hasUnreadReply: false,
          lastReplyAt: reply.createdAt,
          lastReplyPreview: replyPreview(reply.message),
          lastReplySender: 'agent',
        });

        // The automation emails agent replies out to the customer.
        dispatcher.dispatch(code, updated, 'reply', actor.name, reply);
        publishTicketEvent('reply.created', { ticketCode: code, replyId: reply.id, senderType: reply.senderType });
        logChangeEvent({
          actorUserId: actor.id,
          entityType: 'Reply',
          entityId: reply.id,
          action: 'REPLY_CREATED',
          requestId: requestIdOf(res),
          metadata: { ticketCode: code, senderType: 'agent' },
        });

        res.status(201).json({ reply: toUiReply(reply), webhook: dispatcher.getStatus(code) });
      } catch (err) {
        next(err);
      }
    },

    deleteReply: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const code = ticketCodeParam(req);
        const replyId = String(req.params.replyId ?? '');
        const deleted = await tickets.softDeleteReply(code, replyId, new Date());
        if (!deleted) throw new AppError(404, 'REPLY_NOT_FOUND', 'Reply not found');

        logChangeEvent({
          actorUserId: req.auth?.memberId,
          entityType: 'Reply',
          entityId: replyId,
          action: 'REPLY_DELETED',
          changedFields: ['deletedAt'],
          requestId: requestIdOf(res),
          metadata: { ticketCode: code },
        });
        res.json({ ok: true });
      } catch (err) {
        next(err);
      }
    },

    downloadTicketAttachment: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const ticket = await loadTicket(ticketCodeParam(req));
        sendAttachment(res, ticket.attachments[attachmentIndex(req)]);
      } catch (err) {
        next(err);
      }
    },

    downloadReplyAttachment: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const code = ticketCodeParam(req);
        const reply = await tickets.findReply(code, String(req.params.replyId ?? ''));
        if (!reply) throw new AppError(404, 'REPLY_NOT_FOUND', 'Reply not found');
        sendAttachment(res, reply.attachments[attachmentIndex(req)]);
      } catch (err) {
        next(err);
      }
    },

    deleteTicket: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const code = ticketCodeParam(req);
        const before = await loadTicket(code);
        await tickets.deleteTicket(code);

        publishTicketEvent('ticket.updated', { ticketCode: code, deleted: true });
        logChangeEvent({
          actorUserId: req.auth?.memberId,
          entityType: 'Ticket',
          entityId: code,
          action: 'TICKET_DELETED',
          before: { status: before.status },
          after: { deleted: true },
          requestId: requestIdOf(res),
        });
        res.json({ ok: true });
      } catch (err) {
        next(err);
      }
    },
  };
}
