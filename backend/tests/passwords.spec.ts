import { hashPassword, verifyPassword } from '../services/passwords.js';

describe('passwords', () => {
  it('verifies the right password and rejects others', async () => {
    const hash = await hashPassword('test-password', 4);

    expect(hash).not.toBe('test-password');
    await expect(verifyPassword('test-password', hash)).resolves.toBe(true);
    await expect(verifyPassword('test-passwore', hash)).resolves.toBe(false);
  });

  it('keeps passwords distinct beyond the 72-byte bcrypt limit', async () => {
    const base = 'x'.repeat(80);
    const hash = await hashPassword(`${base}-one`, 4);

    await expect(verifyPassword(`${base}-one`, hash)).resolves.toBe(true);
    await expect(verifyPassword(`${base}-two`, hash)).resolves.toBe(false);
  });
});
