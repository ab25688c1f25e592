import bcrypt from 'bcryptjs';
import { createHash } from 'node:crypto';

export const DEFAULT_BCRYPT_ROUNDS = 12;
const BCRYPT_MAX_BYTES = 72;

// bcrypt silently truncates at 72 bytes; longer passwords are pre-hashed so they stay distinct.
function normalizePassword(plaintext: string): string {
  if (Buffer.byteLength(plaintext, 'utf-8') > BCRYPT_MAX_BYTES) {
    return createHash('sha256').update(plaintext).digest('base64');
  }
  return plaintext;
}

export async function hashPassword(plaintext: string, rounds: number = DEFAULT_BCRYPT_ROUNDS): Promise<string> {
  return bcrypt.hash(normalizePassword(plaintext), rounds);
}

export async function verifyPassword(plaintext: string, hash: string): Promise<boolean> {
  return bcrypt.compare(normalizePassword(plaintext), hash);
}
