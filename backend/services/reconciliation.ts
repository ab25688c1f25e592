import { ticketLog } from '../config/logger.js';
import {
  DuplicateThreadError,
  TicketStatus,
  type Attachment,
  type NewTicket,
  type TicketRecord,
  type TicketStore,
} from '../database/ticketStore.js';
import { AppError } from '../middleware/errors.js';
import type { InboundEmail } from '../validations/webhook.js';
import { extractTicketCode, generateTicketCode, insertWithFreshCode, normalizeTicketCode } from './ticketCodes.js';

export type MatchRule = 'extracted' | 'claimed' | 'email';

export interface ReconcileResult {
  outcome: 'created' | 'updated' | 'duplicate';
  ticketCode: string;
  created: boolean;
  matchedBy?: MatchRule;
  replyId?: string;
  ticket: TicketRecord;
}

export const REPLY_PREVIEW_LENGTH = 120;

export function replyPreview(message: string): string {
  const flat = message.replace(/\s+/g, ' ').trim();
  return flat.length > REPLY_PREVIEW_LENGTH ? `${flat.slice(0, REPLY_PREVIEW_LENGTH)}...` : flat;
}

async function resolveExisting(
  store: TicketStore,
  input: InboundEmail
): Promise<{ ticket: TicketRecord; matchedBy: MatchRule } | undefined> {
  const extracted = extractTicketCode(input.body, input.subject, input.message);
  if (extracted) {
    const ticket = await store.findTicketByCode(extracted);
    if (ticket) return { ticket, matchedBy: 'extracted' };
  }

  if (input.ticketCode) {
    const ticket = await store.findTicketByCode(normalizeTicketCode(input.ticketCode));
    if (ticket) return { ticket, matchedBy: 'claimed' };
  }

  if (!input.email) return undefined;
  const ticket = await store.findLatestTicketByEmail(input.email);
  return ticket ? { ticket, matchedBy: 'email' } : undefined;
}

/** A customer message worth recording as a reply: present and not just the draft echoed back. */
function customerMessage(input: InboundEmail): string | undefined {
  const message = input.message?.trim();
  if (!message) return undefined;
  if (input.draft && message === input.draft.trim()) return undefined;
  return message;
}

async function createTicket(store: TicketStore, input: InboundEmail, attachments: Attachment[]): Promise<TicketRecord> {
  const draft: Omit<NewTicket, 'ticketCode'> = {
    status: TicketStatus.New,
    priority: input.priority ?? 'Medium',
    classification: input.classification,
    email: input.email,
    name: input.name,
    phone: input.phone,
    threadId: input.threadId,
    subject: input.subject,
    body: input.body ?? input.message,
    draftResponse: input.draft,
    attachments,
    creationMethod: 'webhook',
  };
  if (input.ticketCode) {
    return store.insertTicket({ ...draft, ticketCode: normalizeTicketCode(input.ticketCode) });
  }
  return insertWithFreshCode(store, draft, generateTicketCode);
}

/**
 * Maps one inbound email onto a ticket: an existing one found by code
 * mentioned in the text, by the claimed code, or by sender email; otherwise
 * a new ticket. A repeated thread id resolves to the ticket that owns it.
 */
export async function reconcileInbound(store: TicketStore, input: InboundEmail): Promise<ReconcileResult> {
  const attachments: Attachment[] = input.attachments.map((a) => ({ ...a }));
  const match = await resolveExisting(store, input);

  if (!match) {
    try {
      const ticket = await createTicket(store, input, attachments);
      ticketLog.info('Ticket created from inbound email', { ticketCode: ticket.ticketCode, threadId: input.threadId });
      return { outcome: 'created', ticketCode: ticket.ticketCode, created: true, ticket };
    } catch (err) {
      if (!(err instanceof DuplicateThreadError)) throw err;
      const owner = await store.findTicketByThread(err.threadId);
      if (!owner) throw err;
      ticketLog.info('Inbound email repeats a known thread', { ticketCode: owner.ticketCode, threadId: err.threadId });
      return { outcome: 'duplicate', ticketCode: owner.ticketCode, created: false, ticket: owner };
    }
  }

  const { ticket, matchedBy } = match;
  const message = customerMessage(input);

  if (!message) {
    const updated = await store.updateTicket(ticket.ticketCode, {
      ...(input.draft !== undefined ? { draftResponse: input.draft } : {}),
    });
    if (!updated) throw new AppError(404, 'TICKET_NOT_FOUND', 'Ticket not found');
    return { outcome: 'updated', ticketCode: updated.ticketCode, created: false, matchedBy, ticket: updated };
  }

  // The reply goes in first; the ticket's last-reply cache then points at a row that exists.
  const reply = await store.insertReply({
    ticketCode: ticket.ticketCode,
    message,
    senderName: input.name ?? ticket.name,
    senderEmail: input.email,
    senderType: 'customer',
    attachments,
  });

  const updated = await store.updateTicket(ticket.ticketCode, {
    status: TicketStatus.CustomerReplied,
    hasUnreadReply: true,
    lastReplyAt: reply.createdAt,
    lastReplyPreview: replyPreview(message),
    lastReplySender: 'customer',
    ...(input.draft !== undefined ? { draftResponse: input.draft } : {}),
  });
  if (!updated) throw new AppError(404, 'TICKET_NOT_FOUND', 'Ticket not found');

  ticketLog.info('Customer reply reconciled', { ticketCode: updated.ticketCode, matchedBy, replyId: reply.id });
  return {
    outcome: 'updated',
    ticketCode: updated.ticketCode,
    created: false,
    matchedBy,
    replyId: reply.id,
    ticket: updated,
  };
}
