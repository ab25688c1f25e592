import { timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import jwt from 'jsonwebtoken';
import type { Env } from '../config/env.js';
import { AppError } from './errors.js';
import { logAccessEvent, logAuthEvent, logSecurityIncident } from '../config/appLogs.js';
import type { MemberRecord, MemberRole, MemberStore } from '../database/ticketStore.js';
import { isRecord } from '../utils/guards.js';
import { requestIdOf } from '../utils/http.js';

export type Role = MemberRole;

export type AuthContext = {
  memberId: string;
  role: Role;
  member: MemberRecord;
};

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      auth?: AuthContext;
    }
  }
}

function bearerToken(req: Request): string {
  const header = req.header('authorization') || '';
  return header.toLowerCase().startsWith('bearer ') ? header.slice(7).trim() : '';
}

/** Schema-validate the JWT payload so malformed-but-signed tokens never reach the store. */
function subjectOf(decoded: unknown): string {
  if (!isRecord(decoded)) throw new AppError(401, 'UNAUTHENTICATED', 'Invalid token payload');
  const sub = typeof decoded.sub === 'string' ? decoded.sub : '';
  if (!sub) throw new AppError(401, 'UNAUTHENTICATED', 'Invalid token: missing subject');
  if (decoded.typ !== 'access') throw new AppError(401, 'UNAUTHENTICATED', 'Invalid token type');
  return sub;
}

async function resolveAuthFromToken(token: string, env: Env, members: MemberStore): Promise<AuthContext> {
  const memberId = subjectOf(jwt.verify(token, env.JWT_ACCESS_SECRET, { algorithms: ['HS256'] }));

  // Role and status come from the store, not the token, so disabling a member takes effect immediately.
  const member = await members.findMemberById(memberId);
  if (!member) {
    logAuthEvent('SESSION_EXPIRED', { userId: memberId, reason: 'Member not found' });
    throw new AppError(401, 'UNAUTHENTICATED', 'Member not found');
  }
  if (member.status !== 'active') {
    logAuthEvent('SESSION_EXPIRED', { userId: memberId, reason: `Member status: ${member.status}` });
    throw new AppError(403, 'MEMBER_NOT_ACTIVE', 'Member is not active');
  }

  return { memberId: member.id, role: member.role, member };
}

export function requireAuth(env: Env, members: MemberStore) {
  return async (req: Request, res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!token) {
      return next(new AppError(401, 'UNAUTHENTICATED', 'Missing bearer token'));
    }

    try {
      req.auth = await resolveAuthFromToken(token, env, members);
      next();
    } catch (err) {
      if (err instanceof AppError) return next(err);
      if (err instanceof jwt.JsonWebTokenError) {
        logSecurityIncident('INVALID_TOKEN', {
          severity: 'low',
          ip: req.ip,
          route: req.originalUrl,
          method: req.method,
          requestId: requestIdOf(res),
          userAgent: req.get('user-agent'),
        });
        return next(new AppError(401, 'UNAUTHENTICATED', 'Invalid or expired token'));
      }
      next(err);
    }
  };
}

export function requireRoles(...required: Role[]) {
  return (req: Request, res: Response, next: NextFunction) => {
    const role = req.auth?.role;
    if (!role || !required.includes(role)) {
      logAccessEvent('RESOURCE_DENIED', {
        userId: req.auth?.memberId,
        roles: role ? [role] : [],
        ip: req.ip,
        method: req.method,
        route: req.originalUrl,
        resource: req.originalUrl,
        requestId: requestIdOf(res),
        metadata: { requiredRoles: required, actualRole: role },
      });
      return next(new AppError(403, 'FORBIDDEN', 'Insufficient role'));
    }
    next();
  };
}

function secretsMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Guards automation callbacks. With no WEBHOOK_INBOUND_SECRET configured the
 * endpoints stay open; otherwise `x-webhook-secret` must match.
 */
export function requireWebhookSecret(env: Env) {
  return (req: Request, res: Response, next: NextFunction) => {
    const expected = env.WEBHOOK_INBOUND_SECRET;
    if (!expected) return next();

    const given = req.header('x-webhook-secret') ?? '';
    if (!secretsMatch(given, expected)) {
      logSecurityIncident('INVALID_WEBHOOK_SECRET', {
        severity: 'high',
        ip: req.ip,
        route: req.originalUrl,
        method: req.method,
        requestId: requestIdOf(res),
        userAgent: req.get('user-agent'),
      });
      return next(new AppError(401, 'INVALID_WEBHOOK_SECRET', 'Invalid webhook secret'));
    }
    next();
  };
}
