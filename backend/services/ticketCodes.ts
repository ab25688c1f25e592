import { randomUUID } from 'node:crypto';
import {
  DuplicateTicketCodeError,
  type NewTicket,
  type TicketRecord,
  type TicketStore,
} from '../database/ticketStore.js';

// Letter-digit codes (AB1234) or generated ones (M + 5 hex, e.g. M3F9A2).
const CODE = String.raw`[a-z]{1,3}\d{3,6}|m[0-9a-f]{5}`;

const PREFIXED_CODE_RE = new RegExp(String.raw`\bticket(?:\s+(?:id|no\.?|number|ref))?\s*[:#]?\s*#?\s*(${CODE})\b`, 'i');
const HASHED_CODE_RE = new RegExp(String.raw`#\s*(${CODE})\b`, 'i');
// Bare mentions only count for letter-digit codes; hex codes look too much like ordinary words.
const BARE_CODE_RE = /\b([a-z]{1,3}\d{3,6})\b/i;

const EXTRACTORS = [PREFIXED_CODE_RE, HASHED_CODE_RE, BARE_CODE_RE];

export function normalizeTicketCode(code: string): string {
  return code.trim().toUpperCase();
}

/** `M` followed by five upper-case hex characters. */
export function generateTicketCode(): string {
  return `M${randomUUID().slice(0, 5).toUpperCase()}`;
}

/**
 * Finds a ticket code mentioned in free text. Explicit `ticket …` mentions win
 * over `#CODE`, which wins over a bare code; earlier texts win within a tier.
 */
export function extractTicketCode(...texts: Array<string | undefined>): string | undefined {
  const candidates = texts.filter((t): t is string => typeof t === 'string' && t.length > 0);
  for (const re of EXTRACTORS) {
    for (const text of candidates) {
      const match = re.exec(text);
      if (match?.[1]) return normalizeTicketCode(match[1]);
    }
  }
  return undefined;
}

const MAX_CODE_ATTEMPTS = 5;

/** Inserts `ticket` under a freshly generated code, retrying on the rare collision. */
export async function insertWithFreshCode(
  store: TicketStore,
  ticket: Omit<NewTicket, 'ticketCode'>,
  generate: () => string = generateTicketCode
): Promise<TicketRecord> {
  let lastError: DuplicateTicketCodeError | undefined;
  for (let attempt = 0; attempt < MAX_CODE_ATTEMPTS; attempt++) {
    try {
      return await store.insertTicket({ ...ticket, ticketCode: generate() });
    } catch (err) {
      if (!(err instanceof DuplicateTicketCodeError)) throw err;
      lastError = err;
    }
  }
  throw lastError ?? new Error('Could not allocate a ticket code');
}
