import { z } from 'zod';
import { TicketPriorities } from '../database/ticketStore.js';
import { isRecord } from '../utils/guards.js';
import { attachmentInputSchema, safeContentType } from './webhook.js';

function emptyStringToUndefined(value: unknown) {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

function optionalNonEmptyString(max: number) {
  return z.preprocess(emptyStringToUndefined, z.string().trim().min(1).max(max).optional());
}

const statusSchema = z.string().trim().min(1).max(100);

export const listTicketsQuerySchema = z.object({
  status: optionalNonEmptyString(100),
  priority: z.preprocess(emptyStringToUndefined, z.enum(TicketPriorities).optional()),
  classification: optionalNonEmptyString(200),
  search: optionalNonEmptyString(200),
  page: z.unknown().optional(),
  limit: z.unknown().optional(),
});

export const searchTicketsQuerySchema = z.object({
  q: z.string().trim().min(1).max(200),
});

const isoDate = z.string().trim().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

export const vehicleInfoSchema = z
  .object({
    registration: z.preprocess(emptyStringToUndefined, z.string().trim().toUpperCase().min(1).max(20).optional()),
    serviceDate: isoDate.optional(),
    claimDate: isoDate.optional(),
    typeOfClaim: optionalNonEmptyString(200),
    technician: optionalNonEmptyString(200),
    vhcLink: z.preprocess(emptyStringToUndefined, z.string().trim().url().max(2000).optional()),
    daysBetweenServiceClaim: z.number().int().min(0).max(36_500).optional(),
    advisoriesFollowed: z.boolean().optional(),
    withinWarranty: z.boolean().optional(),
    newFaultCodes: z.boolean().optional(),
    dpfLightOn: z.boolean().optional(),
    emlLightOn: z.boolean().optional(),
  })
  .refine((v) => Object.values(v).some((field) => field !== undefined), {
    message: 'Provide at least one vehicle field',
  });

export const createTicketSchema = z.object({
  subject: z.string().trim().min(1).max(998),
  body: z.string().trim().min(1).max(1_000_000),
  email: z.preprocess(emptyStringToUndefined, z.string().trim().toLowerCase().email().optional()),
  name: optionalNonEmptyString(200),
  phone: optionalNonEmptyString(64),
  priority: z.enum(TicketPriorities).default('Medium'),
  classification: optionalNonEmptyString(200),
  assignedTo: optionalNonEmptyString(200),
  vehicle: vehicleInfoSchema.optional(),
  attachments: z.array(attachmentInputSchema).max(50).default([]),
});

export const updateTicketSchema = z
  .object({
    priority: z.enum(TicketPriorities).optional(),
    classification: optionalNonEmptyString(200),
    assignedTo: optionalNonEmptyString(200),
    draftResponse: z.string().max(1_000_000).optional(),
  })
  .refine((v) => Object.values(v).some((field) => field !== undefined), {
    message: 'Provide at least one field to update',
  });

export const updateStatusSchema = z.object({
  status: statusSchema,
});

export const createReplySchema = z.object({
  message: z.string().trim().min(1).max(1_000_000),
  attachments: z.array(attachmentInputSchema).max(50).default([]),
});

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export const uploadClaimDocumentSchema = z.preprocess(
  (raw) => {
    if (!isRecord(raw)) return raw;
    return {
      fileName: raw.fileName ?? raw.file_name ?? raw.filename,
      fileType: raw.fileType ?? raw.file_type ?? raw.contentType,
      data: raw.data ?? raw.file_data ?? raw.content,
      description: raw.description,
    };
  },
  z.object({
    fileName: z.string().trim().min(1).max(255),
    fileType: z.unknown().transform((value) => safeContentType(typeof value === 'string' ? value : undefined)),
    data: z
      .string()
      .transform((value) => value.replace(/\s+/g, ''))
      .pipe(z.string().min(1).regex(BASE64_PATTERN, 'Expected base64 file data')),
    description: optionalNonEmptyString(2000),
  })
);
