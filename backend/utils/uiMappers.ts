import type {
  Attachment,
  ClaimDocumentRecord,
  MemberRecord,
  ReplyRecord,
  TicketRecord,
} from '../database/ticketStore.js';

/** Safely convert a value to ISO string, returning undefined for invalid dates. */
export function safeIso(val: Date | string | number | null | undefined): string | undefined {
  if (val === null || val === undefined || val === '') return undefined;
  const d = val instanceof Date ? val : new Date(val);
  return Number.isNaN(d.getTime()) ? undefined : d.toISOString();
}

// Lists and detail views carry attachment metadata only; bytes are fetched per attachment.
function toUiAttachments(attachments: Attachment[]) {
  return attachments.map((a, index) => ({
    index,
    filename: a.filename,
    contentType: a.contentType,
    size: Buffer.byteLength(a.data, 'base64'),
  }));
}

export function toUiTicket(t: TicketRecord) {
  return {
    id: t.id,
    ticketCode: t.ticketCode,
    status: t.status,
    priority: t.priority,
    classification: t.classification,
    email: t.email,
    name: t.name,
    phone: t.phone,
    threadId: t.threadId,
    subject: t.subject,
    body: t.body,
    draftResponse: t.draftResponse,
    assignedTo: t.assignedTo,
    vehicle: t.vehicle ?? {},
    attachments: toUiAttachments(t.attachments),
    hasUnreadReply: t.hasUnreadReply,
    lastReplyAt: safeIso(t.lastReplyAt),
    lastReplyPreview: t.lastReplyPreview,
    lastReplySender: t.lastReplySender,
    creationMethod: t.creationMethod,
    createdBy: t.createdBy,
    referredBy: t.referredBy,
    referredAt: safeIso(t.referredAt),
    closedBy: t.closedBy,
    closedAt: safeIso(t.closedAt),
    createdAt: safeIso(t.createdAt),
    updatedAt: safeIso(t.updatedAt),
  };
}

export function toUiReply(r: ReplyRecord) {
  return {
    id: r.id,
    ticketCode: r.ticketCode,
    message: r.message,
    senderName: r.senderName,
    senderEmail: r.senderEmail,
    senderType: r.senderType,
    attachments: toUiAttachments(r.attachments),
    createdAt: safeIso(r.createdAt),
  };
}

// Metadata only; bytes come from the download route.
export function toUiClaimDocument(d: ClaimDocumentRecord) {
  return {
    id: d.id,
    ticketCode: d.ticketCode,
    fileName: d.fileName,
    fileType: d.fileType,
    fileSize: d.fileSize,
    description: d.description ?? '',
    uploadedBy: d.uploadedBy,
    uploadedAt: safeIso(d.uploadedAt),
  };
}

// Never includes passwordHash.
export function toUiMember(m: MemberRecord) {
  return {
    id: m.id,
    name: m.name,
    email: m.email,
    role: m.role,
    status: m.status,
    lastLoginAt: safeIso(m.lastLoginAt),
  };
}
