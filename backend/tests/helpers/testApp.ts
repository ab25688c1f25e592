import { createApp } from '../../app.js';
import { loadEnv, type Env } from '../../config/env.js';
import type { MemberRecord, MemberRole } from '../../database/ticketStore.js';
import { hashPassword } from '../../services/passwords.js';
import { signAccessToken } from '../../services/tokens.js';
import { WebhookDispatcher, type WebhookFetch } from '../../services/webhookDispatcher.js';
import { MemoryMemberStore, MemoryTicketStore } from './memoryStores.js';

export const TEST_PASSWORD = 'test-password';
export const TEST_WEBHOOK_URL = 'https://automation.test/hooks/helpdesk';

export interface FetchCall {
  url: string;
  body: unknown;
}

/** A webhook endpoint that answers with the queued statuses, then 200s. */
export function fakeWebhook(statuses: number[] = []) {
  const calls: FetchCall[] = [];
  const queue = [...statuses];
  const fetch: WebhookFetch = async (url, init) => {
    calls.push({ url, body: JSON.parse(init.body) });
    const status = queue.shift() ?? 200;
    return { status, text: async () => (status === 200 ? 'ok' : 'error') };
  };
  return { calls, fetch };
}

export function testEnv(overrides: Record<string, string> = {}): Env {
  return loadEnv({
    NODE_ENV: 'test',
    MONGODB_URI: 'mongodb://127.0.0.1:27017/helpdesk-test',
    JWT_ACCESS_SECRET: 'test-secret-for-helpdesk-tests',
    WEBHOOK_URL: TEST_WEBHOOK_URL,
    ...overrides,
  });
}

export async function buildTestApp(options: { env?: Record<string, string>; webhookStatuses?: number[] } = {}) {
  const env = testEnv(options.env);
  const tickets = new MemoryTicketStore();
  const members = new MemoryMemberStore();
  const webhook = fakeWebhook(options.webhookStatuses);
  const dispatcher = new WebhookDispatcher({
    url: env.WEBHOOK_URL,
    fetch: webhook.fetch,
    sleep: async () => undefined,
  });
  const app = createApp(env, { tickets, members, dispatcher });

  const addMember = async (role: MemberRole, email: string, status: MemberRecord['status'] = 'active') => {
    const member = await members.insertMember({
      name: `${role} tester`,
      email,
      passwordHash: await hashPassword(TEST_PASSWORD, 4),
      role,
      status,
    });
    return { member, token: signAccessToken(env, member.id, member.role) };
  };

  return { env, app, tickets, members, dispatcher, webhook, addMember };
}
