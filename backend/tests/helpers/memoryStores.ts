import {
  DuplicateThreadError,
  DuplicateTicketCodeError,
  isTicketPriority,
  summarizeStats,
  type ClaimDocumentRecord,
  type MemberRecord,
  type MemberStore,
  type NewClaimDocument,
  type NewMember,
  type NewReply,
  type NewTicket,
  type PageRequest,
  type ReplyRecord,
  type TicketChanges,
  type TicketFilter,
  type TicketPriority,
  type TicketRecord,
  type TicketStats,
  type TicketStore,
} from '../../database/ticketStore.js';
import { definedOnly } from '../../utils/guards.js';

export type StoreOp =
  | { op: 'insertTicket'; ticketCode: string }
  | { op: 'updateTicket'; ticketCode: string; changes: TicketChanges }
  | { op: 'insertReply'; ticketCode: string; replyId: string };

function cloneTicket(t: TicketRecord): TicketRecord {
  return {
    ...t,
    attachments: t.attachments.map((a) => ({ ...a })),
    ...(t.vehicle ? { vehicle: { ...t.vehicle } } : {}),
  };
}

function cloneReply(r: ReplyRecord): ReplyRecord {
  return { ...r, attachments: r.attachments.map((a) => ({ ...a })) };
}

function matches(t: TicketRecord, filter: TicketFilter): boolean {
  if (filter.status && t.status !== filter.status) return false;
  if (filter.statusContains && !t.status.toLowerCase().includes(filter.statusContains.toLowerCase())) return false;
  if (filter.priority && t.priority !== filter.priority) return false;
  if (filter.classification && t.classification !== filter.classification) return false;
  if (filter.search) {
    const needle = filter.search.trim().toLowerCase();
    const fields = [t.ticketCode, t.subject, t.email, t.name, t.body];
    if (!fields.some((f) => f?.toLowerCase().includes(needle))) return false;
  }
  return true;
}

/** Map-backed TicketStore with the same uniqueness rules as the Mongo indexes. */
export class MemoryTicketStore implements TicketStore {
  readonly tickets = new Map<string, TicketRecord>();
  readonly replies: ReplyRecord[] = [];
  readonly claimDocuments: ClaimDocumentRecord[] = [];
  readonly ops: StoreOp[] = [];
  healthy = true;
  private seq = 0;
  // Insertion order breaks ties between tickets created in the same millisecond.
  private readonly order = new Map<string, number>();

  private newestFirst(rows: TicketRecord[]): TicketRecord[] {
    return rows.sort(
      (a, b) =>
        b.createdAt.getTime() - a.createdAt.getTime() ||
        (this.order.get(b.ticketCode) ?? 0) - (this.order.get(a.ticketCode) ?? 0)
    );
  }

  async findTicketByCode(ticketCode: string): Promise<TicketRecord | undefined> {
    const t = this.tickets.get(ticketCode.toUpperCase());
    return t ? cloneTicket(t) : undefined;
  }

  async findTicketByThread(threadId: string): Promise<TicketRecord | undefined> {
    const t = [...this.tickets.values()].find((row) => row.threadId === threadId);
    return t ? cloneTicket(t) : undefined;
  }

  async findLatestTicketByEmail(email: string): Promise<TicketRecord | undefined> {
    const [t] = this.newestFirst([...this.tickets.values()].filter((row) => row.email === email));
    return t ? cloneTicket(t) : undefined;
  }

  async insertTicket(ticket: NewTicket): Promise<TicketRecord> {
    const code = ticket.ticketCode.toUpperCase();
    if (this.tickets.has(code)) throw new DuplicateTicketCodeError(code);
    if (ticket.threadId && [...this.tickets.values()].some((row) => row.threadId === ticket.threadId)) {
      throw new DuplicateThreadError(ticket.threadId);
    }
    const now = new Date();
    const record: TicketRecord = {
      ...ticket,
      id: `t${++this.seq}`,
      ticketCode: code,
      attachments: (ticket.attachments ?? []).map((a) => ({ ...a })),
      hasUnreadReply: ticket.hasUnreadReply ?? false,
      createdAt: now,
      updatedAt: now,
    };
    this.tickets.set(code, record);
    this.order.set(code, this.seq);
    this.ops.push({ op: 'insertTicket', ticketCode: code });
    return cloneTicket(record);
  }

  async updateTicket(ticketCode: string, changes: TicketChanges): Promise<TicketRecord | undefined> {
    const code = ticketCode.toUpperCase();
    const existing = this.tickets.get(code);
    if (!existing) return undefined;
    const next: TicketRecord = { ...existing, updatedAt: new Date() };
    // Same as `$set` over defined fields.
    Object.assign(next, definedOnly(changes));
    this.tickets.set(code, next);
    this.ops.push({ op: 'updateTicket', ticketCode: code, changes: { ...changes } });
    return cloneTicket(next);
  }

  async deleteTicket(ticketCode: string): Promise<boolean> {
    return this.tickets.delete(ticketCode.toUpperCase());
  }

  async listTickets(filter: TicketFilter, page: PageRequest): Promise<TicketRecord[]> {
    const rows = this.newestFirst([...this.tickets.values()].filter((t) => matches(t, filter)));
    return rows.slice(page.skip, page.skip + page.limit).map(cloneTicket);
  }

  async countTickets(filter: TicketFilter): Promise<number> {
    return [...this.tickets.values()].filter((t) => matches(t, filter)).length;
  }

  async ticketStats(): Promise<TicketStats> {
    const byStatus: Record<string, number> = {};
    const byPriority: Partial<Record<TicketPriority, number>> = {};
    let unread = 0;
    for (const t of this.tickets.values()) {
      byStatus[t.status] = (byStatus[t.status] ?? 0) + 1;
      if (isTicketPriority(t.priority)) byPriority[t.priority] = (byPriority[t.priority] ?? 0) + 1;
      if (t.hasUnreadReply) unread++;
    }
    return summarizeStats(byStatus, byPriority, unread);
  }

  async insertReply(reply: NewReply): Promise<ReplyRecord> {
    const record: ReplyRecord = {
      ...reply,
      id: `r${++this.seq}`,
      ticketCode: reply.ticketCode.toUpperCase(),
      attachments: (reply.attachments ?? []).map((a) => ({ ...a })),
      createdAt: new Date(),
    };
    this.replies.push(record);
    this.ops.push({ op: 'insertReply', ticketCode: record.ticketCode, replyId: record.id });
    return cloneReply(record);
  }

  async listReplies(ticketCode: string): Promise<ReplyRecord[]> {
    const code = ticketCode.toUpperCase();
    return this.replies.filter((r) => r.ticketCode === code && !r.deletedAt).map(cloneReply);
  }

  async findReply(ticketCode: string, replyId: string): Promise<ReplyRecord | undefined> {
    const code = ticketCode.toUpperCase();
    const r = this.replies.find((row) => row.id === replyId && row.ticketCode === code && !row.deletedAt);
    return r ? cloneReply(r) : undefined;
  }

  async softDeleteReply(ticketCode: string, replyId: string, at: Date): Promise<boolean> {
    const code = ticketCode.toUpperCase();
    const r = this.replies.find((row) => row.id === replyId && row.ticketCode === code && !row.deletedAt);
    if (!r) return false;
    r.deletedAt = at;
    return true;
  }

  async insertClaimDocument(doc: NewClaimDocument): Promise<ClaimDocumentRecord> {
    const record: ClaimDocumentRecord = {
      ...doc,
      id: `d${++this.seq}`,
      ticketCode: doc.ticketCode.toUpperCase(),
      uploadedAt: new Date(),
    };
    this.claimDocuments.push(record);
    return { ...record };
  }

  async listClaimDocuments(ticketCode: string): Promise<ClaimDocumentRecord[]> {
    const code = ticketCode.toUpperCase();
    return this.claimDocuments.filter((d) => d.ticketCode === code && !d.deletedAt).map((d) => ({ ...d }));
  }

  async findClaimDocument(ticketCode: string, documentId: string): Promise<ClaimDocumentRecord | undefined> {
    const code = ticketCode.toUpperCase();
    const d = this.claimDocuments.find((row) => row.id === documentId && row.ticketCode === code && !row.deletedAt);
    return d ? { ...d } : undefined;
  }

  async softDeleteClaimDocument(ticketCode: string, documentId: string, at: Date): Promise<boolean> {
    const code = ticketCode.toUpperCase();
    const d = this.claimDocuments.find((row) => row.id === documentId && row.ticketCode === code && !row.deletedAt);
    if (!d) return false;
    d.deletedAt = at;
    return true;
  }

  async ping(): Promise<boolean> {
    return this.healthy;
  }
}

export class MemoryMemberStore implements MemberStore {
  readonly members = new Map<string, MemberRecord>();
  private seq = 0;

  async findMemberByEmail(email: string): Promise<MemberRecord | undefined> {
    const needle = email.trim().toLowerCase();
    const m = [...this.members.values()].find((row) => row.email === needle);
    return m ? { ...m } : undefined;
  }

  async findMemberById(id: string): Promise<MemberRecord | undefined> {
    const m = this.members.get(id);
    return m ? { ...m } : undefined;
  }

  async insertMember(member: NewMember): Promise<MemberRecord> {
    const record: MemberRecord = { ...member, id: `m${++this.seq}`, createdAt: new Date() };
    this.members.set(record.id, record);
    return { ...record };
  }

  async touchLastLogin(id: string, at: Date): Promise<void> {
    const m = this.members.get(id);
    if (m) m.lastLoginAt = at;
  }
}
