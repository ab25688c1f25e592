import type { NextFunction, Request, Response } from 'express';
import type { Env } from '../config/env.js';
import { authLog } from '../config/logger.js';
import { logAuthEvent } from '../config/appLogs.js';
import type { MemberStore } from '../database/ticketStore.js';
import { AppError } from '../middleware/errors.js';
import { verifyPassword } from '../services/passwords.js';
import { signAccessToken } from '../services/tokens.js';
import { toUiMember } from '../utils/uiMappers.js';
import { loginSchema } from '../validations/auth.js';

export function makeAuthController(env: Env, members: MemberStore) {
  return {
    login: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = loginSchema.parse(req.body);
        const audit = { identifier: body.email, ip: req.ip, route: req.originalUrl, userAgent: req.get('user-agent') };

        const member = await members.findMemberByEmail(body.email);
        // Same answer for unknown email and wrong password.
        if (!member || !(await verifyPassword(body.password, member.passwordHash))) {
          logAuthEvent('LOGIN_FAILURE', { ...audit, reason: member ? 'invalid_password' : 'member_not_found' });
          throw new AppError(401, 'INVALID_CREDENTIALS', 'Invalid credentials');
        }
        if (member.status !== 'active') {
          logAuthEvent('LOGIN_FAILURE', { ...audit, userId: member.id, reason: `member_${member.status}` });
          throw new AppError(403, 'MEMBER_NOT_ACTIVE', 'Member is not active');
        }

        const accessToken = signAccessToken(env, member.id, member.role);
        await members.touchLastLogin(member.id, new Date());

        logAuthEvent('LOGIN_SUCCESS', { ...audit, userId: member.id, roles: [member.role] });
        authLog.info('Member signed in', { memberId: member.id, role: member.role });

        res.json({
          member: toUiMember(member),
          tokens: { accessToken, expiresIn: env.JWT_ACCESS_TTL_SECONDS },
        });
      } catch (err) {
        next(err);
      }
    },

    me: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const member = req.auth?.member;
        if (!member) throw new AppError(401, 'UNAUTHENTICATED', 'Missing auth context');
        res.json({ member: toUiMember(member) });
      } catch (err) {
        next(err);
      }
    },
  };
}
