import type { NextFunction, Request, Response } from 'express';
import { ticketLog } from '../config/logger.js';
import { logChangeEvent } from '../config/appLogs.js';
import { AppError } from '../middleware/errors.js';
import { publishTicketEvent } from '../services/realtimeHub.js';
import type { AppDeps } from '../types/deps.js';
import { requestIdOf, sendBase64File, ticketCodeParam } from '../utils/http.js';
import { toUiClaimDocument } from '../utils/uiMappers.js';
import { uploadClaimDocumentSchema } from '../validations/tickets.js';

function documentIdParam(req: Request): string {
  return String(req.params.documentId ?? '');
}

export function makeClaimDocumentsController(deps: AppDeps) {
  const { tickets } = deps;

  return {
    listDocuments: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const code = ticketCodeParam(req);
        const docs = await tickets.listClaimDocuments(code);
        res.json({ success: true, documents: docs.map(toUiClaimDocument), count: docs.length });
      } catch (err) {
        next(err);
      }
    },

    uploadDocument: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const code = ticketCodeParam(req);
        const body = uploadClaimDocumentSchema.parse(req.body);
        const ticket = await tickets.findTicketByCode(code);
        if (!ticket) throw new AppError(404, 'TICKET_NOT_FOUND', 'Ticket not found');

        const doc = await tickets.insertClaimDocument({
          ticketCode: ticket.ticketCode,
          fileName: body.fileName,
          fileType: body.fileType,
          fileSize: Buffer.byteLength(body.data, 'base64'),
          data: body.data,
          description: body.description,
          uploadedBy: req.auth?.memberId,
        });

        publishTicketEvent('ticket.updated', { ticketCode: ticket.ticketCode, claimDocumentId: doc.id });
        ticketLog.info('Claim document uploaded', { ticketCode: ticket.ticketCode, documentId: doc.id, fileSize: doc.fileSize });
        logChangeEvent({
          actorUserId: req.auth?.memberId,
          entityType: 'ClaimDocument',
          entityId: doc.id,
          action: 'CLAIM_DOCUMENT_UPLOADED',
          after: { fileName: doc.fileName, fileType: doc.fileType, fileSize: doc.fileSize },
          requestId: requestIdOf(res),
          metadata: { ticketCode: ticket.ticketCode },
        });

        res.status(201).json({ success: true, message: 'Document uploaded successfully', document: toUiClaimDocument(doc) });
      } catch (err) {
        next(err);
      }
    },

    deleteDocument: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const code = ticketCodeParam(req);
        const documentId = documentIdParam(req);
        const deleted = await tickets.softDeleteClaimDocument(code, documentId, new Date());
        if (!deleted) throw new AppError(404, 'CLAIM_DOCUMENT_NOT_FOUND', 'Document not found');

        publishTicketEvent('ticket.updated', { ticketCode: code, claimDocumentId: documentId, deleted: true });
        logChangeEvent({
          actorUserId: req.auth?.memberId,
          entityType: 'ClaimDocument',
          entityId: documentId,
          action: 'CLAIM_DOCUMENT_DELETED',
          changedFields: ['deletedAt'],
          requestId: requestIdOf(res),
          metadata: { ticketCode: code },
        });
        res.json({ success: true, message: 'Document deleted successfully' });
      } catch (err) {
        next(err);
      }
    },

    downloadDocument: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const doc = await tickets.findClaimDocument(ticketCodeParam(req), documentIdParam(req));
        if (!doc) throw new AppError(404, 'CLAIM_DOCUMENT_NOT_FOUND', 'Document not found');
        sendBase64File(res, { filename: doc.fileName, contentType: doc.fileType, data: doc.data });
      } catch (err) {
        next(err);
      }
    },
  };
}
