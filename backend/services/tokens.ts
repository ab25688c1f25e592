import jwt from 'jsonwebtoken';
import type { Env } from '../config/env.js';
import type { MemberRole } from '../database/ticketStore.js';

/**
 * Short-lived access token. The role is informational only; `requireAuth`
 * reloads the member on every request.
 */
export function signAccessToken(env: Env, memberId: string, role: MemberRole): string {
  return jwt.sign({ role, typ: 'access' }, env.JWT_ACCESS_SECRET, {
    subject: memberId,
    algorithm: 'HS256',
    expiresIn: env.JWT_ACCESS_TTL_SECONDS,
  });
}
