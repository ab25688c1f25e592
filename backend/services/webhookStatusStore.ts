export type WebhookState = 'pending' | 'success' | 'failed';

export interface WebhookStatusEntry {
  status: WebhookState;
  /** ISO-8601 time of the transition. */
  timestamp: string;
  attempts: number;
  /** Dispatch tag, e.g. `referral` or `reply`. */
  method: string;
  lastError?: string;
}

/**
 * `last-writer-wins`: whichever dispatch lands last owns the entry.
 * `discard-stale`: writes from a dispatch superseded by a newer one for the same ticket are dropped.
 */
export type StaleWritePolicy = 'last-writer-wins' | 'discard-stale';

/**
 * In-process delivery status per ticket code. Never persisted; lost on restart.
 *
 * Every method runs to completion synchronously, so each call is one critical
 * section on the event loop and no read-modify-write ever spans an `await`.
 */
export class WebhookStatusStore {
  private readonly entries = new Map<string, WebhookStatusEntry>();
  private readonly generations = new Map<string, number>();

  constructor(private readonly policy: StaleWritePolicy = 'last-writer-wins') {}

  /** Records a new dispatch as pending and returns its generation. */
  begin(ticketCode: string, method: string, at: Date = new Date()): number {
    const generation = (this.generations.get(ticketCode) ?? 0) + 1;
    this.generations.set(ticketCode, generation);
    this.entries.set(ticketCode, { status: 'pending', timestamp: at.toISOString(), attempts: 0, method });
    return generation;
  }

  /** Returns false when the write was discarded as stale. */
  record(ticketCode: string, generation: number, entry: WebhookStatusEntry): boolean {
    if (this.policy === 'discard-stale' && this.generations.get(ticketCode) !== generation) {
      return false;
    }
    this.entries.set(ticketCode, { ...entry });
    return true;
  }

  get(ticketCode: string): WebhookStatusEntry | undefined {
    const entry = this.entries.get(ticketCode);
    return entry ? { ...entry } : undefined;
  }

  get size(): number {
    return this.entries.size;
  }

  pendingCount(): number {
    let count = 0;
    for (const entry of this.entries.values()) if (entry.status === 'pending') count++;
    return count;
  }

  /** Empties the map and reports how many entries were removed. */
  clear(): number {
    const removed = this.entries.size;
    this.entries.clear();
    this.generations.clear();
    return removed;
  }
}
