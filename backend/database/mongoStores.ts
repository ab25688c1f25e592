import mongoose, { type FilterQuery, type Types } from 'mongoose';
import { TicketModel, type TicketDoc } from '../models/Ticket.js';
import { ReplyModel } from '../models/Reply.js';
import { MemberModel } from '../models/Member.js';
import { ClaimDocumentModel } from '../models/ClaimDocument.js';
import { dbLog } from '../config/logger.js';
import { definedOnly, escapeRegex, isRecord } from '../utils/guards.js';
import {
  DuplicateThreadError,
  DuplicateTicketCodeError,
  isCreationMethod,
  isMemberRole,
  isSenderType,
  isTicketPriority,
  summarizeStats,
  type Attachment,
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
  type VehicleInfo,
} from './ticketStore.js';

// Lean row shapes as read back from MongoDB; optional fields may come back null.
type Maybe<T> = T | null | undefined;

interface AttachmentRow {
  filename?: Maybe<string>;
  contentType?: Maybe<string>;
  data?: Maybe<string>;
}

interface VehicleRow {
  registration?: Maybe<string>;
  serviceDate?: Maybe<string>;
  claimDate?: Maybe<string>;
  typeOfClaim?: Maybe<string>;
  technician?: Maybe<string>;
  vhcLink?: Maybe<string>;
  daysBetweenServiceClaim?: Maybe<number>;
  advisoriesFollowed?: Maybe<boolean>;
  withinWarranty?: Maybe<boolean>;
  newFaultCodes?: Maybe<boolean>;
  dpfLightOn?: Maybe<boolean>;
  emlLightOn?: Maybe<boolean>;
}

interface TicketRow {
  _id: Types.ObjectId;
  ticketCode: string;
  status: string;
  priority?: Maybe<string>;
  classification?: Maybe<string>;
  email?: Maybe<string>;
  name?: Maybe<string>;
  phone?: Maybe<string>;
  threadId?: Maybe<string>;
  subject?: Maybe<string>;
  body?: Maybe<string>;
  draftResponse?: Maybe<string>;
  assignedTo?: Maybe<string>;
  vehicle?: Maybe<VehicleRow>;
  attachments?: Maybe<AttachmentRow[]>;
  hasUnreadReply?: Maybe<boolean>;
  lastReplyAt?: Maybe<Date>;
  lastReplyPreview?: Maybe<string>;
  lastReplySender?: Maybe<string>;
  creationMethod?: Maybe<string>;
  createdBy?: Maybe<string>;
  referredBy?: Maybe<string>;
  referredAt?: Maybe<Date>;
  closedBy?: Maybe<string>;
  closedAt?: Maybe<Date>;
  createdAt: Date;
  updatedAt: Date;
}

interface ReplyRow {
  _id: Types.ObjectId;
  ticketCode: string;
  message: string;
  senderName?: Maybe<string>;
  senderEmail?: Maybe<string>;
  senderType?: Maybe<string>;
  attachments?: Maybe<AttachmentRow[]>;
  createdAt: Date;
  deletedAt?: Maybe<Date>;
}

interface ClaimDocumentRow {
  _id: Types.ObjectId;
  ticketCode: string;
  fileName: string;
  fileType?: Maybe<string>;
  fileSize?: Maybe<number>;
  data: string;
  description?: Maybe<string>;
  uploadedBy?: Maybe<string>;
  uploadedAt: Date;
  deletedAt?: Maybe<Date>;
}

interface MemberRow {
  _id: Types.ObjectId;
  name: string;
  email: string;
  passwordHash: string;
  role?: Maybe<string>;
  status?: Maybe<string>;
  lastLoginAt?: Maybe<Date>;
  createdAt: Date;
}

function toAttachments(rows: Maybe<AttachmentRow[]>): Attachment[] {
  return (rows ?? []).map((a) => ({
    filename: a.filename ?? 'attachment',
    contentType: a.contentType ?? 'application/octet-stream',
    data: a.data ?? '',
  }));
}

function toVehicle(row: Maybe<VehicleRow>): VehicleInfo | undefined {
  if (!row) return undefined;
  const vehicle: VehicleInfo = {
    registration: row.registration ?? undefined,
    serviceDate: row.serviceDate ?? undefined,
    claimDate: row.claimDate ?? undefined,
    typeOfClaim: row.typeOfClaim ?? undefined,
    technician: row.technician ?? undefined,
    vhcLink: row.vhcLink ?? undefined,
    daysBetweenServiceClaim: row.daysBetweenServiceClaim ?? undefined,
    advisoriesFollowed: row.advisoriesFollowed ?? undefined,
    withinWarranty: row.withinWarranty ?? undefined,
    newFaultCodes: row.newFaultCodes ?? undefined,
    dpfLightOn: row.dpfLightOn ?? undefined,
    emlLightOn: row.emlLightOn ?? undefined,
  };
  return Object.values(vehicle).some((v) => v !== undefined) ? vehicle : undefined;
}

function toTicketRecord(row: TicketRow): TicketRecord {
  return {
    id: String(row._id),
    ticketCode: row.ticketCode,
    status: row.status,
    priority: isTicketPriority(row.priority) ? row.priority : 'Medium',
    classification: row.classification ?? undefined,
    email: row.email ?? undefined,
    name: row.name ?? undefined,
    phone: row.phone ?? undefined,
    threadId: row.threadId ?? undefined,
    subject: row.subject ?? undefined,
    body: row.body ?? undefined,
    draftResponse: row.draftResponse ?? undefined,
    assignedTo: row.assignedTo ?? undefined,
    vehicle: toVehicle(row.vehicle),
    attachments: toAttachments(row.attachments),
    hasUnreadReply: Boolean(row.hasUnreadReply),
    lastReplyAt: row.lastReplyAt ?? undefined,
    lastReplyPreview: row.lastReplyPreview ?? undefined,
    lastReplySender: isSenderType(row.lastReplySender) ? row.lastReplySender : undefined,
    creationMethod: isCreationMethod(row.creationMethod) ? row.creationMethod : 'manual',
    createdBy: row.createdBy ?? undefined,
    referredBy: row.referredBy ?? undefined,
    referredAt: row.referredAt ?? undefined,
    closedBy: row.closedBy ?? undefined,
    closedAt: row.closedAt ?? undefined,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toReplyRecord(row: ReplyRow): ReplyRecord {
  return {
    id: String(row._id),
    ticketCode: row.ticketCode,
    message: row.message,
    senderName: row.senderName ?? undefined,
    senderEmail: row.senderEmail ?? undefined,
    senderType: isSenderType(row.senderType) ? row.senderType : 'webhook',
    attachments: toAttachments(row.attachments),
    createdAt: row.createdAt,
    deletedAt: row.deletedAt ?? undefined,
  };
}

function toClaimDocumentRecord(row: ClaimDocumentRow): ClaimDocumentRecord {
  return {
    id: String(row._id),
    ticketCode: row.ticketCode,
    fileName: row.fileName,
    fileType: row.fileType ?? 'application/octet-stream',
    fileSize: row.fileSize ?? 0,
    data: row.data,
    description: row.description ?? undefined,
    uploadedBy: row.uploadedBy ?? undefined,
    uploadedAt: row.uploadedAt,
    deletedAt: row.deletedAt ?? undefined,
  };
}

function toMemberRecord(row: MemberRow): MemberRecord {
  return {
    id: String(row._id),
    name: row.name,
    email: row.email,
    passwordHash: row.passwordHash,
    // Unknown roles get the least privilege.
    role: isMemberRole(row.role) ? row.role : 'agent',
    status: row.status === 'active' ? 'active' : 'disabled',
    lastLoginAt: row.lastLoginAt ?? undefined,
    createdAt: row.createdAt,
  };
}

/** Field name of a MongoDB duplicate-key (E11000) error, if `err` is one. */
function duplicateKeyField(err: unknown): string | undefined {
  if (!isRecord(err) || err.code !== 11000) return undefined;
  const pattern = isRecord(err.keyPattern) ? err.keyPattern : isRecord(err.keyValue) ? err.keyValue : {};
  return Object.keys(pattern)[0] ?? '';
}

function toTicketQuery(filter: TicketFilter): FilterQuery<TicketDoc> {
  const query: FilterQuery<TicketDoc> = {};
  if (filter.status) {
    query.status = filter.status;
  } else if (filter.statusContains) {
    query.status = new RegExp(escapeRegex(filter.statusContains), 'i');
  }
  if (filter.priority) query.priority = filter.priority;
  if (filter.classification) query.classification = filter.classification;
  if (filter.search) {
    const re = new RegExp(escapeRegex(filter.search.trim()), 'i');
    query.$or = [{ ticketCode: re }, { subject: re }, { email: re }, { name: re }, { body: re }];
  }
  return query;
}

export class MongoTicketStore implements TicketStore {
  async findTicketByCode(ticketCode: string): Promise<TicketRecord | undefined> {
    const row = await TicketModel.findOne({ ticketCode: ticketCode.toUpperCase() }).lean<TicketRow>();
    return row ? toTicketRecord(row) : undefined;
  }

  async findTicketByThread(threadId: string): Promise<TicketRecord | undefined> {
    const row = await TicketModel.findOne({ threadId }).lean<TicketRow>();
    return row ? toTicketRecord(row) : undefined;
  }

  async findLatestTicketByEmail(email: string): Promise<TicketRecord | undefined> {
    const row = await TicketModel.findOne({ email }).sort({ createdAt: -1 }).lean<TicketRow>();
    return row ? toTicketRecord(row) : undefined;
  }

  async insertTicket(ticket: NewTicket): Promise<TicketRecord> {
    try {
      const created = await TicketModel.create(definedOnly(ticket));
      return toTicketRecord(created.toObject<TicketRow>());
    } catch (err) {
      const field = duplicateKeyField(err);
      if (field === 'threadId' && ticket.threadId) throw new DuplicateThreadError(ticket.threadId);
      if (field === 'ticketCode') throw new DuplicateTicketCodeError(ticket.ticketCode);
      throw err;
    }
  }

  async updateTicket(ticketCode: string, changes: TicketChanges): Promise<TicketRecord | undefined> {
    const row = await TicketModel.findOneAndUpdate(
      { ticketCode: ticketCode.toUpperCase() },
      { $set: definedOnly(changes) },
      { new: true }
    ).lean<TicketRow>();
    return row ? toTicketRecord(row) : undefined;
  }

  async deleteTicket(ticketCode: string): Promise<boolean> {
    const res = await TicketModel.deleteOne({ ticketCode: ticketCode.toUpperCase() });
    return res.deletedCount > 0;
  }

  async listTickets(filter: TicketFilter, page: PageRequest): Promise<TicketRecord[]> {
    const rows = await TicketModel.find(toTicketQuery(filter))
      .sort({ createdAt: -1 })
      .skip(page.skip)
      .limit(page.limit)
      .lean<TicketRow[]>();
    return rows.map(toTicketRecord);
  }

  async countTickets(filter: TicketFilter): Promise<number> {
    return TicketModel.countDocuments(toTicketQuery(filter));
  }

  async ticketStats(): Promise<TicketStats> {
    type GroupRow = { _id: string | null; count: number };
    const [statusRows, priorityRows, unread] = await Promise.all([
      TicketModel.aggregate<GroupRow>([{ $group: { _id: '$status', count: { $sum: 1 } } }]),
      TicketModel.aggregate<GroupRow>([{ $group: { _id: '$priority', count: { $sum: 1 } } }]),
      TicketModel.countDocuments({ hasUnreadReply: true }),
    ]);

    const byStatus: Record<string, number> = {};
    for (const row of statusRows) byStatus[row._id ?? 'Unknown'] = row.count;

    const byPriority: Partial<Record<TicketPriority, number>> = {};
    for (const row of priorityRows) {
      if (isTicketPriority(row._id)) byPriority[row._id] = row.count;
    }
    return summarizeStats(byStatus, byPriority, unread);
  }

  async insertReply(reply: NewReply): Promise<ReplyRecord> {
    const created = await ReplyModel.create({ ...definedOnly(reply), ticketCode: reply.ticketCode.toUpperCase() });
    return toReplyRecord(created.toObject<ReplyRow>());
  }

  async listReplies(ticketCode: string): Promise<ReplyRecord[]> {
    const rows = await ReplyModel.find({ ticketCode: ticketCode.toUpperCase(), deletedAt: null })
      .sort({ createdAt: 1 })
      .lean<ReplyRow[]>();
    return rows.map(toReplyRecord);
  }

  async findReply(ticketCode: string, replyId: string): Promise<ReplyRecord | undefined> {
    if (!mongoose.isValidObjectId(replyId)) return undefined;
    const row = await ReplyModel.findOne({
      _id: replyId,
      ticketCode: ticketCode.toUpperCase(),
      deletedAt: null,
    }).lean<ReplyRow>();
    return row ? toReplyRecord(row) : undefined;
  }

  async softDeleteReply(ticketCode: string, replyId: string, at: Date): Promise<boolean> {
    if (!mongoose.isValidObjectId(replyId)) return false;
    const res = await ReplyModel.updateOne(
      { _id: replyId, ticketCode: ticketCode.toUpperCase(), deletedAt: null },
      { $set: { deletedAt: at } }
    );
    return res.modifiedCount > 0;
  }

  async insertClaimDocument(doc: NewClaimDocument): Promise<ClaimDocumentRecord> {
    const created = await ClaimDocumentModel.create({ ...definedOnly(doc), ticketCode: doc.ticketCode.toUpperCase() });
    return toClaimDocumentRecord(created.toObject<ClaimDocumentRow>());
  }

  async listClaimDocuments(ticketCode: string): Promise<ClaimDocumentRecord[]> {
    const rows = await ClaimDocumentModel.find({ ticketCode: ticketCode.toUpperCase(), deletedAt: null })
      .sort({ uploadedAt: 1 })
      .lean<ClaimDocumentRow[]>();
    return rows.map(toClaimDocumentRecord);
  }

  async findClaimDocument(ticketCode: string, documentId: string): Promise<ClaimDocumentRecord | undefined> {
    if (!mongoose.isValidObjectId(documentId)) return undefined;
    const row = await ClaimDocumentModel.findOne({
      _id: documentId,
      ticketCode: ticketCode.toUpperCase(),
      deletedAt: null,
    }).lean<ClaimDocumentRow>();
    return row ? toClaimDocumentRecord(row) : undefined;
  }

  async softDeleteClaimDocument(ticketCode: string, documentId: string, at: Date): Promise<boolean> {
    if (!mongoose.isValidObjectId(documentId)) return false;
    const res = await ClaimDocumentModel.updateOne(
      { _id: documentId, ticketCode: ticketCode.toUpperCase(), deletedAt: null },
      { $set: { deletedAt: at } }
    );
    return res.modifiedCount > 0;
  }

  async ping(): Promise<boolean> {
    const db = mongoose.connection.db;
    if (mongoose.connection.readyState !== 1 || !db) return false;
    try {
      await db.admin().ping();
      return true;
    } catch (err) {
      dbLog.warn('MongoDB ping failed', { error: err });
      return false;
    }
  }
}

export class MongoMemberStore implements MemberStore {
  async findMemberByEmail(email: string): Promise<MemberRecord | undefined> {
    const row = await MemberModel.findOne({ email: email.trim().toLowerCase() }).lean<MemberRow>();
    return row ? toMemberRecord(row) : undefined;
  }

  async findMemberById(id: string): Promise<MemberRecord | undefined> {
    if (!mongoose.isValidObjectId(id)) return undefined;
    const row = await MemberModel.findById(id).lean<MemberRow>();
    return row ? toMemberRecord(row) : undefined;
  }

  async insertMember(member: NewMember): Promise<MemberRecord> {
    const created = await MemberModel.create(member);
    return toMemberRecord(created.toObject<MemberRow>());
  }

  async touchLastLogin(id: string, at: Date): Promise<void> {
    await MemberModel.updateOne({ _id: id }, { $set: { lastLoginAt: at } });
  }
}
