import type { Env } from '../config/env.js';
import { seedLog } from '../config/logger.js';
import type { MemberRecord, MemberStore } from '../database/ticketStore.js';
import { hashPassword } from '../services/passwords.js';

export type SeedAdminResult = { created: boolean; member: MemberRecord } | { skipped: true };

/**
 * Creates the first admin from SEED_ADMIN_* when configured. Idempotent: an
 * existing member with that email is left untouched, password included.
 */
export async function seedAdmin(env: Env, members: MemberStore, rounds?: number): Promise<SeedAdminResult> {
  const email = env.SEED_ADMIN_EMAIL?.trim().toLowerCase();
  const password = env.SEED_ADMIN_PASSWORD;
  if (!email || !password) return { skipped: true };

  const existing = await members.findMemberByEmail(email);
  if (existing) {
    seedLog.debug('Admin seed skipped; member exists', { memberId: existing.id, role: existing.role });
    return { created: false, member: existing };
  }

  const member = await members.insertMember({
    name: env.SEED_ADMIN_NAME,
    email,
    passwordHash: await hashPassword(password, rounds),
    role: 'admin',
    status: 'active',
  });
  seedLog.info('Seeded admin member', { memberId: member.id, email });
  return { created: true, member };
}
