import { setTimeout as delay } from 'node:timers/promises';
import type { Env } from '../config/env.js';
import { webhookLog } from '../config/logger.js';
import { logErrorEvent, logPerformance } from '../config/appLogs.js';
import type { Attachment, ReplyRecord, TicketRecord, VehicleInfo } from '../database/ticketStore.js';
import { errorMessage } from '../utils/guards.js';
import { WebhookStatusStore, type StaleWritePolicy, type WebhookStatusEntry } from './webhookStatusStore.js';

export interface WebhookResponse {
  status: number;
  text(): Promise<string>;
}

export type WebhookFetch = (
  url: string,
  init: { method: 'POST'; headers: Record<string, string>; body: string; signal: AbortSignal }
) => Promise<WebhookResponse>;

export interface WebhookDispatcherOptions {
  url?: string;
  timeoutMs?: number;
  retryDelayMs?: number;
  maxAttempts?: number;
  staleWrites?: StaleWritePolicy;
  /** Budget for the admin test request, body included. */
  testTimeoutMs?: number;
  fetch?: WebhookFetch;
  sleep?: (ms: number) => Promise<unknown>;
  store?: WebhookStatusStore;
}

export interface WebhookHealth {
  status: 'operational';
  webhookUrl: string;
  trackedWebhooks: number;
  inFlight: number;
  timestamp: string;
}

export interface WebhookTestResult {
  success: boolean;
  statusCode?: number;
  response?: string;
  error?: string;
  timedOut?: boolean;
}

/** Outbound body. The ticket snapshot is JSON-safe and frozen at trigger time. */
export interface WebhookPayload {
  ticket_id: string;
  ticket_data: Record<string, unknown>;
  assignment_method: string;
  referred_by: string;
  timestamp: string;
}

/** One failed delivery attempt. Retried and recorded, never surfaced to callers. */
export class WebhookDeliveryError extends Error {
  constructor(
    message: string,
    public readonly timedOut: boolean,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'WebhookDeliveryError';
  }
}

function serializeAttachments(attachments: Attachment[]) {
  return attachments.map((a) => ({ filename: a.filename, content_type: a.contentType, data: a.data }));
}

function serializeVehicle(v: VehicleInfo) {
  return {
    vehicle_registration: v.registration ?? null,
    service_date: v.serviceDate ?? null,
    claim_date: v.claimDate ?? null,
    type_of_claim: v.typeOfClaim ?? null,
    technician: v.technician ?? null,
    vhc_link: v.vhcLink ?? null,
    days_between_service_claim: v.daysBetweenServiceClaim ?? null,
    advisories_followed: v.advisoriesFollowed ?? null,
    within_warranty: v.withinWarranty ?? null,
    new_fault_codes: v.newFaultCodes ?? null,
    dpf_light_on: v.dpfLightOn ?? null,
    eml_light_on: v.emlLightOn ?? null,
  };
}

function iso(value: Date | undefined): string | null {
  return value ? value.toISOString() : null;
}

export function serializeTicket(ticket: TicketRecord, reply?: ReplyRecord): Record<string, unknown> {
  const data: Record<string, unknown> = {
    id: ticket.id,
    ticket_id: ticket.ticketCode,
    status: ticket.status,
    priority: ticket.priority,
    classification: ticket.classification ?? null,
    email: ticket.email ?? null,
    name: ticket.name ?? null,
    phone: ticket.phone ?? null,
    thread_id: ticket.threadId ?? null,
    subject: ticket.subject ?? null,
    body: ticket.body ?? null,
    draft_response: ticket.draftResponse ?? null,
    assigned_to: ticket.assignedTo ?? null,
    vehicle: ticket.vehicle ? serializeVehicle(ticket.vehicle) : null,
    attachments: serializeAttachments(ticket.attachments),
    creation_method: ticket.creationMethod,
    created_by: ticket.createdBy ?? null,
    referred_by: ticket.referredBy ?? null,
    referred_at: iso(ticket.referredAt),
    closed_by: ticket.closedBy ?? null,
    closed_at: iso(ticket.closedAt),
    created_at: iso(ticket.createdAt),
    updated_at: iso(ticket.updatedAt),
  };
  if (reply) {
    data.reply = {
      id: reply.id,
      message: reply.message,
      sender_name: reply.senderName ?? null,
      sender_email: reply.senderEmail ?? null,
      sender_type: reply.senderType,
      attachments: serializeAttachments(reply.attachments),
      created_at: iso(reply.createdAt),
    };
  }
  return data;
}

/**
 * Fire-and-forget delivery of ticket snapshots to the workflow automation.
 *
 * Each `dispatch` runs as a detached task tracked in `inFlight`; `drain()`
 * waits for all of them. Outcomes land in the status store only.
 */
export class WebhookDispatcher {
  readonly store: WebhookStatusStore;
  private readonly url?: string;
  private readonly timeoutMs: number;
  private readonly testTimeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly maxAttempts: number;
  private readonly fetchImpl: WebhookFetch;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: WebhookDispatcherOptions = {}) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.testTimeoutMs = options.testTimeoutMs ?? 10_000;
    this.retryDelayMs = options.retryDelayMs ?? 2_000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.store = options.store ?? new WebhookStatusStore(options.staleWrites);
  }

  /** Records `pending` synchronously, then delivers in the background. */
  dispatch(ticketCode: string, ticket: TicketRecord, method: string, actor: string, reply?: ReplyRecord): void {
    const payload: WebhookPayload = {
      ticket_id: ticketCode,
      ticket_data: serializeTicket(ticket, reply),
      assignment_method: method,
      referred_by: actor,
      timestamp: new Date().toISOString(),
    };
    const generation = this.store.begin(ticketCode, method);

    const task = this.deliver(ticketCode, generation, payload).catch((err: unknown) => {
      logErrorEvent({
        category: 'EXTERNAL_SERVICE',
        severity: 'high',
        message: 'Webhook task crashed',
        error: err,
        operation: 'webhook.dispatch',
        metadata: { ticketCode, method },
      });
    });
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
  }

  getStatus(ticketCode: string): WebhookStatusEntry | undefined {
    return this.store.get(ticketCode);
  }

  clear(): number {
    return this.store.clear();
  }

  get configured(): boolean {
    return Boolean(this.url);
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /** Resolves once every dispatch started so far has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  health(): WebhookHealth {
    const url = this.url ?? 'not configured';
    return {
      status: 'operational',
      webhookUrl: url.length > 50 ? `${url.slice(0, 50)}...` : url,
      trackedWebhooks: this.store.size,
      inFlight: this.inFlight.size,
      timestamp: new Date().toISOString(),
    };
  }

  async sendTest(): Promise<WebhookTestResult> {
    if (!this.url) return { success: false, error: 'Webhook URL is not configured' };
    const body = JSON.stringify({
      test: true,
      timestamp: new Date().toISOString(),
      message: 'Test webhook from helpdesk backend',
    });
    try {
      const res = await this.post(this.url, body, this.testTimeoutMs);
      return { success: res.status === 200, statusCode: res.status, response: res.text.slice(0, 500) };
    } catch (err) {
      return { success: false, error: errorMessage(err), timedOut: err instanceof WebhookDeliveryError && err.timedOut };
    }
  }

  private async deliver(ticketCode: string, generation: number, payload: WebhookPayload): Promise<void> {
    const { assignment_method: method } = payload;
    const record = (entry: Omit<WebhookStatusEntry, 'timestamp' | 'method'>) => {
      const written = this.store.record(ticketCode, generation, {
        ...entry,
        method,
        timestamp: new Date().toISOString(),
      });
      if (!written) webhookLog.debug('Dropped stale webhook status write', { ticketCode, generation });
    };

    if (!this.url) {
      webhookLog.warn('WEBHOOK_URL not configured; webhook not sent', { ticketCode, method });
      record({ status: 'failed', attempts: 0, lastError: 'Webhook URL is not configured' });
      return;
    }

    const body = JSON.stringify(payload);
    const started = Date.now();
    let lastError = '';

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const res = await this.post(this.url, body, this.timeoutMs);
        if (res.status === 200) {
          record({ status: 'success', attempts: attempt });
          webhookLog.info('Webhook delivered', { ticketCode, method, attempt });
          logPerformance({ operation: 'webhook.deliver', durationMs: Date.now() - started, metadata: { ticketCode, attempts: attempt } });
          return;
        }
        throw new WebhookDeliveryError(`Webhook answered HTTP ${res.status}`, false, res.status);
      } catch (err) {
        lastError = errorMessage(err);
        webhookLog.warn('Webhook attempt failed', { ticketCode, method, attempt, maxAttempts: this.maxAttempts, error: lastError });
      }

      if (attempt < this.maxAttempts) {
        record({ status: 'pending', attempts: attempt, lastError });
        await this.sleep(this.retryDelayMs);
      }
    }

    record({ status: 'failed', attempts: this.maxAttempts, lastError });
    logErrorEvent({
      category: 'EXTERNAL_SERVICE',
      severity: 'medium',
      message: `Webhook delivery failed after ${this.maxAttempts} attempts`,
      operation: 'webhook.deliver',
      retryable: true,
      metadata: { ticketCode, method, lastError },
    });
  }

  /** One POST; the response body is consumed within the same timeout so the connection is released. */
  private async post(url: string, body: string, timeoutMs: number): Promise<{ status: number; text: string }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
        signal: controller.signal,
      });
      return { status: res.status, text: await res.text() };
    } catch (err) {
      if (controller.signal.aborted) {
        throw new WebhookDeliveryError(`Webhook timed out after ${timeoutMs}ms`, true);
      }
      throw new WebhookDeliveryError(errorMessage(err), false);
    } finally {
      clearTimeout(timer);
    }
  }
}

export function createWebhookDispatcher(env: Env): WebhookDispatcher {
  return new WebhookDispatcher({
    url: env.WEBHOOK_URL,
    timeoutMs: env.WEBHOOK_TIMEOUT_MS,
    retryDelayMs: env.WEBHOOK_RETRY_DELAY_MS,
    maxAttempts: env.WEBHOOK_MAX_ATTEMPTS,
    staleWrites: env.WEBHOOK_STALE_WRITES,
  });
}
