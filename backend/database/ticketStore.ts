/**
 * Persistence contract for tickets, replies, claim documents and members.
 *
 * Controllers and services depend on these interfaces only; `mongoStores.ts`
 * implements them over Mongoose and the test suite uses in-memory fakes.
 */

export const TicketPriorities = ['Urgent', 'Fast', 'High', 'Medium', 'Low'] as const;
export type TicketPriority = (typeof TicketPriorities)[number];

export const SenderTypes = ['customer', 'agent', 'webhook'] as const;
export type SenderType = (typeof SenderTypes)[number];

export const CreationMethods = ['manual', 'api', 'webhook'] as const;
export type CreationMethod = (typeof CreationMethods)[number];

export const MemberRoles = ['admin', 'tech_director', 'agent'] as const;
export type MemberRole = (typeof MemberRoles)[number];

export const MemberStatuses = ['active', 'disabled'] as const;
export type MemberStatus = (typeof MemberStatuses)[number];

/** Well-known statuses. The field itself is open: automations may set others. */
export const TicketStatus = {
  New: 'New',
  Open: 'Open',
  InProgress: 'In Progress',
  WaitingForCustomer: 'Waiting for Customer',
  Referred: 'Referred to Tech Director',
  CustomerReplied: 'Customer Replied',
  Resolved: 'Resolved',
  Closed: 'Closed',
} as const;

export interface Attachment {
  filename: string;
  contentType: string;
  /** Base64 payload. */
  data: string;
}

/** Claim details recorded against a ticket; every field is optional. */
export interface VehicleInfo {
  registration?: string;
  /** `YYYY-MM-DD`. */
  serviceDate?: string;
  /** `YYYY-MM-DD`. */
  claimDate?: string;
  typeOfClaim?: string;
  technician?: string;
  vhcLink?: string;
  daysBetweenServiceClaim?: number;
  advisoriesFollowed?: boolean;
  withinWarranty?: boolean;
  newFaultCodes?: boolean;
  dpfLightOn?: boolean;
  emlLightOn?: boolean;
}

export interface TicketRecord {
  id: string;
  ticketCode: string;
  status: string;
  priority: TicketPriority;
  classification?: string;
  email?: string;
  name?: string;
  phone?: string;
  threadId?: string;
  subject?: string;
  body?: string;
  draftResponse?: string;
  assignedTo?: string;
  vehicle?: VehicleInfo;
  attachments: Attachment[];
  hasUnreadReply: boolean;
  lastReplyAt?: Date;
  lastReplyPreview?: string;
  lastReplySender?: SenderType;
  creationMethod: CreationMethod;
  createdBy?: string;
  referredBy?: string;
  referredAt?: Date;
  closedBy?: string;
  closedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export type NewTicket = Omit<TicketRecord, 'id' | 'createdAt' | 'updatedAt' | 'attachments' | 'hasUnreadReply'> & {
  attachments?: Attachment[];
  hasUnreadReply?: boolean;
};

export type TicketChanges = Partial<Omit<TicketRecord, 'id' | 'ticketCode' | 'createdAt' | 'updatedAt'>>;

export interface ReplyRecord {
  id: string;
  ticketCode: string;
  message: string;
  senderName?: string;
  senderEmail?: string;
  senderType: SenderType;
  attachments: Attachment[];
  createdAt: Date;
  deletedAt?: Date;
}

export type NewReply = Omit<ReplyRecord, 'id' | 'createdAt' | 'deletedAt' | 'attachments'> & {
  attachments?: Attachment[];
};

export interface ClaimDocumentRecord {
  id: string;
  ticketCode: string;
  fileName: string;
  fileType: string;
  /** Decoded size in bytes. */
  fileSize: number;
  /** Base64 payload. */
  data: string;
  description?: string;
  uploadedBy?: string;
  uploadedAt: Date;
  deletedAt?: Date;
}

export type NewClaimDocument = Omit<ClaimDocumentRecord, 'id' | 'uploadedAt' | 'deletedAt'>;

export interface MemberRecord {
  id: string;
  name: string;
  email: string;
  passwordHash: string;
  role: MemberRole;
  status: MemberStatus;
  lastLoginAt?: Date;
  createdAt: Date;
}

export type NewMember = Omit<MemberRecord, 'id' | 'createdAt' | 'lastLoginAt'>;

export interface TicketFilter {
  /** Exact status. */
  status?: string;
  /** Case-insensitive substring of the status, e.g. `Referred`. */
  statusContains?: string;
  priority?: TicketPriority;
  classification?: string;
  /** Case-insensitive match on code, subject, email, name or body. */
  search?: string;
}

export interface PageRequest {
  skip: number;
  limit: number;
}

export interface TicketStats {
  total: number;
  byStatus: Record<string, number>;
  byPriority: Record<TicketPriority, number>;
  open: number;
  waiting: number;
  resolved: number;
  unread: number;
}

export class DuplicateThreadError extends Error {
  public readonly threadId: string;

  constructor(threadId: string) {
    super(`A ticket already exists for thread ${threadId}`);
    this.name = 'DuplicateThreadError';
    this.threadId = threadId;
  }
}

export class DuplicateTicketCodeError extends Error {
  public readonly ticketCode: string;

  constructor(ticketCode: string) {
    super(`Ticket code ${ticketCode} is already taken`);
    this.name = 'DuplicateTicketCodeError';
    this.ticketCode = ticketCode;
  }
}

export interface TicketStore {
  findTicketByCode(ticketCode: string): Promise<TicketRecord | undefined>;
  findTicketByThread(threadId: string): Promise<TicketRecord | undefined>;
  /** Most recently created ticket whose email equals `email` exactly. */
  findLatestTicketByEmail(email: string): Promise<TicketRecord | undefined>;
  /** @throws DuplicateThreadError | DuplicateTicketCodeError */
  insertTicket(ticket: NewTicket): Promise<TicketRecord>;
  updateTicket(ticketCode: string, changes: TicketChanges): Promise<TicketRecord | undefined>;
  deleteTicket(ticketCode: string): Promise<boolean>;
  listTickets(filter: TicketFilter, page: PageRequest): Promise<TicketRecord[]>;
  countTickets(filter: TicketFilter): Promise<number>;
  ticketStats(): Promise<TicketStats>;

  insertReply(reply: NewReply): Promise<ReplyRecord>;
  /** Non-deleted replies, oldest first. */
  listReplies(ticketCode: string): Promise<ReplyRecord[]>;
  findReply(ticketCode: string, replyId: string): Promise<ReplyRecord | undefined>;
  softDeleteReply(ticketCode: string, replyId: string, at: Date): Promise<boolean>;

  insertClaimDocument(doc: NewClaimDocument): Promise<ClaimDocumentRecord>;
  /** Non-deleted documents, oldest first. */
  listClaimDocuments(ticketCode: string): Promise<ClaimDocumentRecord[]>;
  findClaimDocument(ticketCode: string, documentId: string): Promise<ClaimDocumentRecord | undefined>;
  softDeleteClaimDocument(ticketCode: string, documentId: string, at: Date): Promise<boolean>;

  ping(): Promise<boolean>;
}

export interface MemberStore {
  findMemberByEmail(email: string): Promise<MemberRecord | undefined>;
  findMemberById(id: string): Promise<MemberRecord | undefined>;
  insertMember(member: NewMember): Promise<MemberRecord>;
  touchLastLogin(id: string, at: Date): Promise<void>;
}

export function isTicketPriority(value: unknown): value is TicketPriority {
  return TicketPriorities.some((p) => p === value);
}

export function isSenderType(value: unknown): value is SenderType {
  return SenderTypes.some((s) => s === value);
}

export function isCreationMethod(value: unknown): value is CreationMethod {
  return CreationMethods.some((m) => m === value);
}

export function isMemberRole(value: unknown): value is MemberRole {
  return MemberRoles.some((r) => r === value);
}

/**
 * Derives dashboard totals from per-status counts.
 * open: New/Open, waiting: any status containing "Waiting", resolved: Resolved/Closed.
 */
export function summarizeStats(
  byStatus: Record<string, number>,
  byPriorityCounts: Partial<Record<TicketPriority, number>>,
  unread: number
): TicketStats {
  let total = 0;
  let open = 0;
  let waiting = 0;
  let resolved = 0;
  for (const [status, count] of Object.entries(byStatus)) {
    total += count;
    if (status === TicketStatus.New || status === TicketStatus.Open) open += count;
    if (status.includes('Waiting')) waiting += count;
    if (status === TicketStatus.Resolved || status === TicketStatus.Closed) resolved += count;
  }

  const byPriority: Record<TicketPriority, number> = { Urgent: 0, Fast: 0, High: 0, Medium: 0, Low: 0 };
  for (const p of TicketPriorities) byPriority[p] = byPriorityCounts[p] ?? 0;

  return { total, byStatus, byPriority, open, waiting, resolved, unread };
}
