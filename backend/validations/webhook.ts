import { z } from 'zod';
import { TicketPriorities } from '../database/ticketStore.js';
import { isRecord } from '../utils/guards.js';

// The automation has shipped several field spellings over time; each canonical
// field lists the keys it may arrive under, first one present wins.
const INBOUND_ALIASES = {
  ticketCode: ['ticket_id', 'ticketId', 'ticket_code', 'ticketCode'],
  email: ['from', 'customer_email', 'email', 'sender_email'],
  name: ['name', 'sender_name', 'customer_name'],
  phone: ['phone', 'customer_phone'],
  subject: ['subject', 'email_subject'],
  body: ['body', 'email_body', 'text'],
  message: ['message', 'customer_message'],
  draft: ['draft', 'ai_response', 'ai_draft', 'draft_response'],
  threadId: ['thread_id', 'threadId', 'message_id', 'email_id'],
  priority: ['priority'],
  classification: ['classification', 'category'],
  attachments: ['attachments'],
} as const;

const REPLY_ALIASES = {
  ticketCode: ['ticket_id', 'ticketId', 'ticket_code'],
  message: ['message', 'response', 'reply', 'content'],
  email: ['customer_email', 'from', 'email'],
  name: ['sender_name', 'name'],
  attachments: ['attachments'],
} as const;

function present(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  return !(typeof value === 'string' && value.trim() === '');
}

function canonicalize(aliases: Record<string, readonly string[]>) {
  return (raw: unknown): unknown => {
    if (!isRecord(raw)) return raw;
    const out: Record<string, unknown> = {};
    for (const [field, keys] of Object.entries(aliases)) {
      const key = keys.find((k) => present(raw[k]));
      if (key !== undefined) out[field] = raw[key];
    }
    return out;
  };
}

/** `Jane Doe <jane@example.com>` → display name and address. */
export function parseMailbox(value: string): { name?: string; address: string } {
  const match = /^\s*"?([^"<]*?)"?\s*<([^>]+)>\s*$/.exec(value);
  if (!match) return { address: value.trim().toLowerCase() };
  const name = match[1]?.trim();
  return { ...(name ? { name } : {}), address: (match[2] ?? '').trim().toLowerCase() };
}

const text = (max: number) => z.string().trim().min(1).max(max);

const FALLBACK_CONTENT_TYPE = 'application/octet-stream';
// type/subtype with optional `; key=value` parameters; nothing that could break a header line.
const MIME_TYPE_PATTERN = /^[\w!#$&^.+-]+\/[\w!#$&^.+-]+(?:[ \t]*;[ \t]*[\w!#$&^.+-]+=(?:"[\x20\x21\x23-\x7e]*"|[\w!#$&^.+-]+))*$/;

/** `value` when it is a well-formed MIME type, else the generic binary type. */
export function safeContentType(value: string | undefined): string {
  const trimmed = value?.trim() ?? '';
  return trimmed.length <= 255 && MIME_TYPE_PATTERN.test(trimmed) ? trimmed : FALLBACK_CONTENT_TYPE;
}

export const attachmentInputSchema = z.preprocess(
  (raw) => {
    if (!isRecord(raw)) return raw;
    return {
      filename: raw.filename ?? raw.name,
      contentType: raw.contentType ?? raw.content_type ?? raw.mimeType,
      data: raw.data ?? raw.content,
    };
  },
  z.object({
    filename: text(255),
    // Mail clients send odd values; anything unusable is stored as the generic binary type.
    contentType: z.unknown().transform((value) => safeContentType(typeof value === 'string' ? value : undefined)),
    data: z.string().min(1),
  })
);

const inboundFields = z.object({
  ticketCode: text(32).optional(),
  email: z.string().trim().min(1).max(320).optional(),
  name: text(200).optional(),
  phone: text(64).optional(),
  subject: text(998).optional(),
  body: z.string().max(1_000_000).optional(),
  message: z.string().max(1_000_000).optional(),
  draft: z.string().max(1_000_000).optional(),
  threadId: text(998).optional(),
  // Automations occasionally invent priorities; unknown ones fall back to the default.
  priority: z.enum(TicketPriorities).optional().catch(undefined),
  classification: text(200).optional(),
  attachments: z.array(attachmentInputSchema).max(50).default([]),
});

/** Canonical inbound email as produced by the mail automation. */
export const inboundEmailSchema = z.preprocess(
  canonicalize(INBOUND_ALIASES),
  inboundFields
    .refine((value) => Boolean(value.email || value.ticketCode || value.body?.trim() || value.message?.trim()), {
      message: 'Provide a sender, a ticket reference or message content',
    })
    .transform((value) => {
      if (!value.email) return value;
      const mailbox = parseMailbox(value.email);
      return { ...value, email: mailbox.address, name: value.name ?? mailbox.name };
    })
);

export type InboundEmail = z.infer<typeof inboundEmailSchema>;

export const webhookReplySchema = z.preprocess(
  canonicalize(REPLY_ALIASES),
  z
    .object({
      ticketCode: text(32),
      message: z.string().trim().min(1).max(1_000_000),
      email: z.string().trim().min(1).max(320).optional(),
      name: text(200).optional(),
      attachments: z.array(attachmentInputSchema).max(50).default([]),
    })
    .transform((value) => {
      if (!value.email) return value;
      const mailbox = parseMailbox(value.email);
      return { ...value, email: mailbox.address, name: value.name ?? mailbox.name };
    })
);

export type WebhookReplyInput = z.infer<typeof webhookReplySchema>;
