/**
 * Application log layer on top of `logEvent()`.
 *
 *   1. Access / authentication / authorization
 *   2. Change logs (ticket and reply mutations)
 *   3. Error logs (categorized, severity-classified)
 *   4. Availability (startup, shutdown, database connectivity)
 *   5. Security incidents
 *
 * No extra Winston instances; everything goes through logger.ts.
 */
import { logEvent, getSystemMetrics, sanitize, type LogDomain } from './logger.js';

// ═══════════════════════════════════════════════════════════════════════════════
//  1.  ACCESS / AUTHENTICATION / AUTHORIZATION
// ═══════════════════════════════════════════════════════════════════════════════

export type AuthEventType = 'LOGIN_SUCCESS' | 'LOGIN_FAILURE' | 'SESSION_EXPIRED';

export interface AuthEventPayload {
  userId?: string;
  roles?: string[];
  ip?: string;
  /** Email used to sign in. */
  identifier?: string;
  route?: string;
  requestId?: string;
  reason?: string;
  userAgent?: string;
  metadata?: Record<string, unknown>;
}

export function logAuthEvent(type: AuthEventType, payload: AuthEventPayload): void {
  const isFailure = type !== 'LOGIN_SUCCESS';
  const who = payload.identifier || payload.userId || 'unknown';
  const message =
    type === 'LOGIN_SUCCESS'
      ? `Member ${who} logged in successfully`
      : type === 'LOGIN_FAILURE'
        ? `Login failed for ${who}: ${payload.reason || 'invalid credentials'}`
        : `Session rejected for member ${who}: ${payload.reason || 'expired'}`;

  logEvent(isFailure ? 'warn' : 'info', message, {
    domain: 'auth',
    eventCategory: 'authentication',
    eventName: type,
    userId: payload.userId,
    role: payload.roles?.join(','),
    ip: payload.ip,
    route: payload.route,
    requestId: payload.requestId,
    metadata: {
      identifierEmail: payload.identifier,
      userAgent: payload.userAgent,
      ...payload.metadata,
    },
  });
}

export type AccessEventType = 'RESOURCE_ACCESS' | 'RESOURCE_DENIED' | 'ADMIN_ACTION';

export interface AccessEventPayload {
  userId?: string;
  roles?: string[];
  ip?: string;
  method?: string;
  route?: string;
  resource?: string;
  requestId?: string;
  metadata?: Record<string, unknown>;
}

export function logAccessEvent(type: AccessEventType, payload: AccessEventPayload): void {
  const isDenied = type === 'RESOURCE_DENIED';
  const who = payload.userId?.slice(0, 8) || 'anonymous';
  const role = payload.roles?.[0] || 'unknown';
  const resource = payload.resource || payload.route || 'unknown';
  const action = typeof payload.metadata?.action === 'string' ? payload.metadata.action : 'access';

  const message = isDenied
    ? `Access DENIED for ${role} ${who} on ${resource}`
    : type === 'ADMIN_ACTION'
      ? `Admin ${who} performed ${action} on ${resource}`
      : `${role} ${who} ${action} ${resource}`;

  logEvent(isDenied ? 'warn' : 'info', message, {
    domain: isDenied ? 'security' : 'http',
    eventCategory: 'authorization',
    eventName: type,
    userId: payload.userId,
    role: payload.roles?.join(','),
    ip: payload.ip,
    method: payload.method,
    route: payload.route,
    requestId: payload.requestId,
    metadata: { resource: payload.resource, ...payload.metadata },
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
//  2.  CHANGE LOGS
// ═══════════════════════════════════════════════════════════════════════════════

export type ChangeAction =
  | 'TICKET_CREATED'
  | 'TICKET_UPDATED'
  | 'TICKET_VEHICLE_UPDATED'
  | 'TICKET_STATUS_CHANGE'
  | 'TICKET_REFERRED'
  | 'TICKET_CLOSED'
  | 'TICKET_DELETED'
  | 'REPLY_CREATED'
  | 'REPLY_DELETED'
  | 'CLAIM_DOCUMENT_UPLOADED'
  | 'CLAIM_DOCUMENT_DELETED'
  | 'WEBHOOK_STATUS_CLEARED';

export interface ChangeEventPayload {
  actorUserId?: string;
  actorRoles?: string[];
  actorIp?: string;
  entityType: 'Ticket' | 'Reply' | 'ClaimDocument' | 'WebhookStatus';
  entityId?: string;
  action: ChangeAction;
  before?: Record<string, unknown>;
  after?: Record<string, unknown>;
  changedFields?: string[];
  requestId?: string;
  metadata?: Record<string, unknown>;
}

function formatChangeMessage(p: ChangeEventPayload): string {
  const who = p.actorUserId?.slice(0, 8) || 'automation';
  const eid = p.entityId || '';
  switch (p.action) {
    case 'TICKET_CREATED':
      return `${who} created ticket #${eid}`;
    case 'TICKET_UPDATED':
      return `${who} updated ticket #${eid} [${p.changedFields?.join(', ') || 'fields'}]`;
    case 'TICKET_VEHICLE_UPDATED':
      return `${who} updated vehicle details on ticket #${eid} [${p.changedFields?.join(', ') || 'fields'}]`;
    case 'TICKET_STATUS_CHANGE':
      return `${who} changed ticket #${eid} status${typeof p.after?.status === 'string' ? ` → ${p.after.status}` : ''}`;
    case 'TICKET_REFERRED':
      return `${who} referred ticket #${eid} to the Technical Director`;
    case 'TICKET_CLOSED':
      return `${who} closed ticket #${eid}`;
    case 'TICKET_DELETED':
      return `${who} DELETED ticket #${eid}`;
    case 'REPLY_CREATED':
      return `${who} added reply ${eid}`;
    case 'REPLY_DELETED':
      return `${who} deleted reply ${eid}`;
    case 'CLAIM_DOCUMENT_UPLOADED':
      return `${who} uploaded claim document ${eid}`;
    case 'CLAIM_DOCUMENT_DELETED':
      return `${who} deleted claim document ${eid}`;
    case 'WEBHOOK_STATUS_CLEARED':
      return `${who} cleared webhook delivery statuses`;
    default:
      return `${who} performed ${String(p.action)} on ${p.entityType}`;
  }
}

export function logChangeEvent(payload: ChangeEventPayload): void {
  const isSensitive = payload.action === 'TICKET_DELETED' || payload.action === 'WEBHOOK_STATUS_CLEARED';

  logEvent(isSensitive ? 'warn' : 'info', formatChangeMessage(payload), {
    domain: 'business',
    eventCategory: 'change',
    eventName: `CHANGE_${payload.action}`,
    userId: payload.actorUserId,
    role: payload.actorRoles?.join(','),
    ip: payload.actorIp,
    requestId: payload.requestId,
    metadata: {
      entityType: payload.entityType,
      entityId: payload.entityId,
      action: payload.action,
      changedFields: payload.changedFields,
      before: payload.before ? sanitize(payload.before) : undefined,
      after: payload.after ? sanitize(payload.after) : undefined,
      ...payload.metadata,
    },
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
//  3.  ERROR LOGS
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  | 'VALIDATION'
  | 'DATABASE'
  | 'NETWORK'
  | 'AUTHENTICATION'
  | 'AUTHORIZATION'
  | 'BUSINESS_LOGIC'
  | 'EXTERNAL_SERVICE'
  | 'SYSTEM';

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface ErrorEventPayload {
  category: ErrorCategory;
  severity: ErrorSeverity;
  error?: unknown;
  message: string;
  errorCode?: string;
  /** What was being attempted, e.g. `POST /api/webhook/inbound`. */
  operation?: string;
  requestId?: string;
  userId?: string;
  ip?: string;
  method?: string;
  route?: string;
  userFacing?: boolean;
  retryable?: boolean;
  metadata?: Record<string, unknown>;
}

function mapErrorCategoryToDomain(category: ErrorCategory): LogDomain {
  switch (category) {
    case 'DATABASE':
      return 'db';
    case 'AUTHENTICATION':
    case 'AUTHORIZATION':
      return 'security';
    case 'EXTERNAL_SERVICE':
      return 'webhook';
    case 'BUSINESS_LOGIC':
    case 'VALIDATION':
      return 'business';
    default:
      return 'system';
  }
}

export function logErrorEvent(payload: ErrorEventPayload): void {
  const level = payload.severity === 'critical' || payload.severity === 'high' ? 'error' : 'warn';
  const err = payload.error instanceof Error ? payload.error : undefined;
  const code = err && 'code' in err && typeof err.code === 'string' ? err.code : undefined;

  logEvent(level, payload.message, {
    domain: mapErrorCategoryToDomain(payload.category),
    eventCategory: 'error',
    eventName: `ERROR_${payload.category}`,
    errorCode: payload.errorCode || code,
    stack: err?.stack,
    userId: payload.userId,
    ip: payload.ip,
    method: payload.method,
    route: payload.route,
    requestId: payload.requestId,
    metadata: {
      category: payload.category,
      severity: payload.severity,
      operation: payload.operation,
      errorName: err?.name,
      userFacing: payload.userFacing,
      retryable: payload.retryable,
      ...payload.metadata,
    },
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
//  4.  AVAILABILITY
// ═══════════════════════════════════════════════════════════════════════════════

export type AvailabilityEventType =
  | 'APPLICATION_STARTING'
  | 'APPLICATION_READY'
  | 'APPLICATION_SHUTDOWN_START'
  | 'APPLICATION_SHUTDOWN_COMPLETE'
  | 'DATABASE_CONNECTED'
  | 'DATABASE_DISCONNECTED'
  | 'DATABASE_ERROR';

export interface AvailabilityEventPayload {
  component?: string;
  status?: 'up' | 'down' | 'degraded' | 'starting' | 'stopping';
  responseTimeMs?: number;
  metadata?: Record<string, unknown>;
}

function formatAvailabilityMessage(type: AvailabilityEventType, p: AvailabilityEventPayload): string {
  const component = p.component || 'application';
  switch (type) {
    case 'APPLICATION_STARTING':
      return `${component} starting…`;
    case 'APPLICATION_READY':
      return `${component} is ready and accepting traffic`;
    case 'APPLICATION_SHUTDOWN_START':
      return `${component} shutting down…`;
    case 'APPLICATION_SHUTDOWN_COMPLETE':
      return `${component} shutdown complete`;
    case 'DATABASE_CONNECTED':
      return `Database connected (${p.responseTimeMs ?? '?'}ms)`;
    case 'DATABASE_DISCONNECTED':
      return `Database disconnected (${p.status || 'down'})`;
    case 'DATABASE_ERROR':
      return `Database error: ${component}`;
    default:
      return `Availability event: ${String(type)}`;
  }
}

export function logAvailabilityEvent(type: AvailabilityEventType, payload: AvailabilityEventPayload = {}): void {
  const isError = type === 'DATABASE_ERROR' || type === 'DATABASE_DISCONNECTED';

  logEvent(isError ? 'error' : 'info', formatAvailabilityMessage(type, payload), {
    domain: 'system',
    eventCategory: 'availability',
    eventName: type,
    metadata: {
      component: payload.component,
      status: payload.status,
      responseTimeMs: payload.responseTimeMs,
      uptimeSeconds: Math.floor(process.uptime()),
      ...getSystemMetrics(),
      ...payload.metadata,
    },
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
//  5.  SECURITY INCIDENTS
// ═══════════════════════════════════════════════════════════════════════════════

export type SecurityEventType =
  | 'RATE_LIMIT_HIT'
  | 'INVALID_TOKEN'
  | 'CORS_VIOLATION'
  | 'INVALID_WEBHOOK_SECRET'
  | 'MALICIOUS_PAYLOAD';

export interface SecurityEventPayload {
  severity: 'low' | 'medium' | 'high' | 'critical';
  ip?: string;
  userId?: string;
  route?: string;
  method?: string;
  requestId?: string;
  pattern?: string;
  location?: string;
  userAgent?: string;
  metadata?: Record<string, unknown>;
}

export function logSecurityIncident(type: SecurityEventType, payload: SecurityEventPayload): void {
  const level = payload.severity === 'critical' || payload.severity === 'high' ? 'error' : 'warn';

  logEvent(level, `SECURITY: ${type} from ${payload.ip || 'unknown'}`, {
    domain: 'security',
    eventCategory: 'security_incident',
    eventName: type,
    userId: payload.userId,
    ip: payload.ip,
    method: payload.method,
    route: payload.route,
    requestId: payload.requestId,
    metadata: {
      severity: payload.severity,
      pattern: payload.pattern,
      location: payload.location,
      userAgent: payload.userAgent,
      ...payload.metadata,
    },
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
//  6.  PERFORMANCE
// ═══════════════════════════════════════════════════════════════════════════════

export interface PerformanceLogPayload {
  operation: string;
  durationMs: number;
  metadata?: Record<string, unknown>;
}

export function logPerformance(payload: PerformanceLogPayload): void {
  logEvent(payload.durationMs > 5_000 ? 'warn' : 'debug', `${payload.operation} took ${payload.durationMs}ms`, {
    domain: 'system',
    eventCategory: 'performance',
    eventName: 'PERFORMANCE',
    duration: payload.durationMs,
    metadata: { operation: payload.operation, ...payload.metadata },
  });
}
