import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import jwt from 'jsonwebtoken';
import logger, { securityLog } from '../config/logger.js';
import { logErrorEvent, logSecurityIncident, type ErrorEventPayload } from '../config/appLogs.js';
import { DuplicateThreadError, DuplicateTicketCodeError } from '../database/ticketStore.js';
import { errorCode, errorMessage, isRecord } from '../utils/guards.js';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;
  public readonly isOperational: boolean;

  constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.isOperational = true; // Distinguishes expected errors from programming bugs
  }
}

export function notFoundHandler(req: Request, res: Response): void {
  // Don't leak internal route paths in production; only expose the HTTP method.
  const isProd = process.env.NODE_ENV === 'production';
  res.status(404).json({
    error: {
      code: 'NOT_FOUND',
      message: isProd ? 'The requested endpoint does not exist.' : `Route not found: ${req.method} ${req.path}`,
    },
  });
}

const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN']);

function bodyParserType(err: unknown): string | undefined {
  return isRecord(err) && typeof err.type === 'string' ? err.type : undefined;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const localId: unknown = res.locals.requestId;
  const requestId = typeof localId === 'string' ? localId : String(req.header('x-request-id') ?? '').trim();
  const isProd = process.env.NODE_ENV === 'production';

  // Guard: if headers already sent (e.g. during SSE streaming), we can't write another response.
  if (res.headersSent) {
    logger.error('Error after headers sent; cannot respond', {
      requestId,
      method: req.method,
      route: req.originalUrl,
      error: errorMessage(err),
    });
    return;
  }

  const context = {
    operation: `${req.method} ${req.originalUrl}`,
    requestId,
    userId: req.auth?.memberId,
    ip: req.ip,
    method: req.method,
    route: req.originalUrl,
    userFacing: true,
  } satisfies Partial<ErrorEventPayload>;

  const send = (status: number, code: string, message: string, details?: unknown) => {
    res.status(status).json({
      error: {
        code,
        message,
        ...(details !== undefined ? { details } : {}),
        ...(requestId ? { requestId } : {}),
      },
    });
  };

  if (err instanceof AppError) {
    const severity = err.statusCode >= 500 ? 'high' : err.statusCode === 403 ? 'medium' : 'low';
    logErrorEvent({
      ...context,
      category: err.statusCode === 401 || err.statusCode === 403 ? 'AUTHORIZATION' : 'BUSINESS_LOGIC',
      severity,
      error: err,
      message: `AppError ${err.statusCode}: ${err.code}: ${err.message}`,
      errorCode: err.code,
      retryable: err.statusCode === 503 || err.statusCode === 429,
    });
    send(err.statusCode, err.code, err.message, err.details);
    return;
  }

  // Validation errors should never be 500s.
  if (err instanceof z.ZodError) {
    logErrorEvent({
      ...context,
      category: 'VALIDATION',
      severity: 'low',
      error: err,
      message: `Validation failed: ${err.issues.map((i) => i.path.join('.')).join(', ')}`,
      errorCode: 'ZOD_VALIDATION',
      retryable: false,
    });
    send(
      400,
      'BAD_REQUEST',
      'Please check your input and try again.',
      isProd ? err.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) : err.issues
    );
    return;
  }

  // Malformed JSON from express.json() arrives as a SyntaxError with type='entity.parse.failed'.
  const parserType = bodyParserType(err);
  if (parserType === 'entity.parse.failed') {
    logErrorEvent({
      ...context,
      category: 'VALIDATION',
      severity: 'low',
      error: err,
      message: 'Malformed JSON in request body',
      errorCode: 'BAD_JSON',
      retryable: false,
    });
    send(400, 'BAD_JSON', 'The request body contains invalid JSON. Please check and try again.');
    return;
  }

  if (parserType === 'entity.too.large') {
    logErrorEvent({
      ...context,
      category: 'VALIDATION',
      severity: 'medium',
      error: err,
      message: `Payload too large: ${req.method} ${req.originalUrl}`,
      errorCode: 'PAYLOAD_TOO_LARGE',
      retryable: false,
    });
    send(413, 'PAYLOAD_TOO_LARGE', 'The request body is too large. Reduce attachment sizes and try again.');
    return;
  }

  if (err instanceof DuplicateThreadError || err instanceof DuplicateTicketCodeError) {
    const code = err instanceof DuplicateThreadError ? 'DUPLICATE_THREAD' : 'DUPLICATE_TICKET_CODE';
    logErrorEvent({
      ...context,
      category: 'DATABASE',
      severity: 'low',
      error: err,
      message: err.message,
      errorCode: code,
      retryable: false,
    });
    send(409, code, err.message);
    return;
  }

  // JWT-specific errors for better client-side handling.
  if (err instanceof jwt.TokenExpiredError) {
    logErrorEvent({
      ...context,
      category: 'AUTHENTICATION',
      severity: 'low',
      error: err,
      message: 'JWT token expired',
      errorCode: 'TOKEN_EXPIRED',
      retryable: false,
    });
    send(401, 'TOKEN_EXPIRED', 'Your session has expired. Please log in again.');
    return;
  }
  if (err instanceof jwt.JsonWebTokenError) {
    securityLog.warn('Invalid JWT token attempt', { requestId, ip: req.ip, error: err.message });
    logSecurityIncident('INVALID_TOKEN', {
      severity: 'medium',
      ip: req.ip,
      route: req.originalUrl,
      method: req.method,
      requestId,
    });
    send(401, 'INVALID_TOKEN', 'Your session is invalid. Please log in again.');
    return;
  }

  // Network/connectivity errors surface as 503 so clients know to retry.
  const code = errorCode(err);
  if (code && NETWORK_CODES.has(code)) {
    logErrorEvent({
      ...context,
      category: 'NETWORK',
      severity: 'high',
      error: err,
      message: `Network error: ${code}`,
      errorCode: code,
      retryable: true,
    });
    res.setHeader('Retry-After', '10');
    send(503, 'SERVICE_UNAVAILABLE', 'A downstream service is temporarily unreachable. Please try again shortly.');
    return;
  }

  logErrorEvent({
    ...context,
    category: 'SYSTEM',
    severity: 'critical',
    error: err instanceof Error ? err : new Error(String(err)),
    message: `Unhandled error: ${errorMessage(err)}`,
    errorCode: code ?? 'UNHANDLED',
    retryable: false,
  });

  const message = isProd
    ? 'Something went wrong. Please try again later.'
    : errorMessage(err) || 'Something went wrong. Please try again later.';
  send(500, 'INTERNAL_SERVER_ERROR', message);
}
