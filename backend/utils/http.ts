import type { Request, Response } from 'express';
import { AppError } from '../middleware/errors.js';
import { normalizeTicketCode } from '../services/ticketCodes.js';
import { safeContentType } from '../validations/webhook.js';

export function requestIdOf(res: Response): string {
  const id: unknown = res.locals.requestId;
  return typeof id === 'string' ? id : '';
}

/** Upper-cased `:code` route param. */
export function ticketCodeParam(req: Request): string {
  const code = normalizeTicketCode(String(req.params.code ?? ''));
  if (!code || code.length > 32) throw new AppError(400, 'INVALID_TICKET_CODE', 'Invalid ticket code');
  return code;
}

/** Decodes a stored base64 file and sends it as a download. */
export function sendBase64File(res: Response, file: { filename: string; contentType: string; data: string }): void {
  const bytes = Buffer.from(file.data, 'base64');
  // Keep the header value to safe characters.
  const filename = file.filename.replace(/[^\w.\- ]+/g, '_');
  res.setHeader('Content-Type', safeContentType(file.contentType));
  res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
  res.setHeader('Content-Length', String(bytes.length));
  res.status(200).end(bytes);
}
