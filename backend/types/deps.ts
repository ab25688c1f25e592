import type { MemberStore, TicketStore } from '../database/ticketStore.js';
import type { WebhookDispatcher } from '../services/webhookDispatcher.js';

/** Collaborators `createApp` wires into routes; tests pass in-memory stores and a fake-fetch dispatcher. */
export interface AppDeps {
  tickets: TicketStore;
  members: MemberStore;
  dispatcher: WebhookDispatcher;
}
