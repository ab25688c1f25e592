import { EventEmitter } from 'node:events';

export type RealtimeEventType = 'ticket.created' | 'ticket.updated' | 'reply.created';

export type RealtimeEvent = {
  type: RealtimeEventType;
  ts: string;
  payload?: Record<string, unknown>;
};

type Listener = (evt: RealtimeEvent) => void;

const emitter = new EventEmitter();
// Allow many SSE clients but cap to prevent resource exhaustion.
emitter.setMaxListeners(500);

export function publishRealtime(evt: RealtimeEvent): void {
  emitter.emit('event', evt);
}

/** Every signed-in member sees ticket traffic; the helpdesk has no per-member inboxes. */
export function publishTicketEvent(type: RealtimeEventType, payload: Record<string, unknown>): void {
  publishRealtime({ type, ts: new Date().toISOString(), payload });
}

export function subscribeRealtime(listener: Listener): () => void {
  emitter.on('event', listener);
  return () => {
    emitter.off('event', listener);
  };
}

export function realtimeListenerCount(): number {
  return emitter.listenerCount('event');
}
