import { loadDotenv } from './config/dotenvLoader.js';

loadDotenv();
import type { Server } from 'node:http';
import { loadEnv } from './config/env.js';
import { connectMongo, disconnectMongo } from './database/mongo.js';
import { MongoMemberStore, MongoTicketStore } from './database/mongoStores.js';
import { createWebhookDispatcher } from './services/webhookDispatcher.js';
import { seedAdmin } from './seeds/admin.js';
import { createApp } from './app.js';
import { startupLog, logEvent, getSystemMetrics } from './config/logger.js';
import { logAvailabilityEvent } from './config/appLogs.js';
import { setReady, setShuttingDown } from './config/lifecycle.js';
import { errorCode } from './utils/guards.js';
import type { AppDeps } from './types/deps.js';

// ── Lifecycle state ──────────────────────────────────────────────────
let server: Server | null = null;
let deps: AppDeps | null = null;
let shuttingDown = false;
const shutdownTimeoutMs = Number(process.env.SHUTDOWN_TIMEOUT_MS) || 30_000;

// ── In-flight request tracking ───────────────────────────────────────
let inFlightRequests = 0;
let drainResolve: (() => void) | null = null;

function onRequestStart() {
  inFlightRequests++;
}
function onRequestEnd() {
  inFlightRequests--;
  if (inFlightRequests <= 0 && drainResolve) drainResolve();
}

function waitForDrain(timeoutMs: number): Promise<void> {
  if (inFlightRequests <= 0) return Promise.resolve();
  return new Promise<void>((resolve) => {
    drainResolve = resolve;
    setTimeout(resolve, timeoutMs).unref();
  });
}

function withTimeout(work: Promise<void>, timeoutMs: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(resolve, timeoutMs);
    timer.unref();
    work.then(resolve, reject).finally(() => clearTimeout(timer));
  });
}

// ── Graceful shutdown ────────────────────────────────────────────────
async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  setShuttingDown(true);
  setReady(false); // readiness checks stop routing traffic here

  logAvailabilityEvent('APPLICATION_SHUTDOWN_START', { metadata: { signal, inFlightRequests, shutdownTimeoutMs } });

  const forceTimer = setTimeout(() => {
    startupLog.error('Force shutdown after timeout', { inFlightRequests });
    process.exit(1);
  }, shutdownTimeoutMs);
  forceTimer.unref();

  try {
    // 1. Stop accepting new connections
    await new Promise<void>((resolve) => {
      if (!server) return resolve();
      server.close(() => resolve());
    });

    // 2. Let in-flight requests finish
    const drainBudget = Math.floor(shutdownTimeoutMs * 0.4);
    if (inFlightRequests > 0) {
      startupLog.info(`Draining ${inFlightRequests} in-flight request(s)…`, { drainBudget });
      await waitForDrain(drainBudget);
    }

    // 3. Give pending webhook deliveries their chance; unfinished ones are abandoned.
    if (deps && deps.dispatcher.inFlightCount > 0) {
      startupLog.info(`Waiting for ${deps.dispatcher.inFlightCount} webhook delivery task(s)…`);
      await withTimeout(deps.dispatcher.drain(), drainBudget);
    }
  } catch (err) {
    startupLog.error('Error while closing HTTP server', { error: err });
  }

  try {
    await disconnectMongo();
  } catch (err) {
    startupLog.error('Error while disconnecting MongoDB', { error: err });
  } finally {
    clearTimeout(forceTimer);
    logAvailabilityEvent('APPLICATION_SHUTDOWN_COMPLETE');
  }
}

// ── Main ─────────────────────────────────────────────────────────────
async function main() {
  const env = loadEnv();
  logAvailabilityEvent('APPLICATION_STARTING', { metadata: { nodeEnv: env.NODE_ENV, port: env.PORT } });

  await connectMongo(env);

  const appDeps: AppDeps = {
    tickets: new MongoTicketStore(),
    members: new MongoMemberStore(),
    dispatcher: createWebhookDispatcher(env),
  };
  deps = appDeps;

  const seeded = await seedAdmin(env, appDeps.members);
  if ('created' in seeded && seeded.created) startupLog.info('Initial admin account created');
  if (!env.WEBHOOK_URL) startupLog.warn('WEBHOOK_URL is not set; ticket webhooks will be recorded as failed');

  const app = createApp(env, appDeps);

  const listening = app.listen(env.PORT, () => {
    // Outlast typical load-balancer idle timeouts (60s).
    listening.keepAliveTimeout = 65_000;
    listening.headersTimeout = 66_000; // must exceed keepAliveTimeout

    setReady(true);
    logAvailabilityEvent('APPLICATION_READY', {
      status: 'up',
      metadata: {
        nodeEnv: env.NODE_ENV,
        port: env.PORT,
        nodeVersion: process.version,
        pid: process.pid,
        shutdownTimeoutMs,
        ...getSystemMetrics(),
      },
    });
  });
  // Counted at the server so every request is tracked, matched route or not.
  listening.on('request', (_req, res) => {
    onRequestStart();
    res.on('close', onRequestEnd);
  });
  server = listening;
}

// ── Process event handlers ───────────────────────────────────────────
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('unhandledRejection', (reason) => {
  logEvent('error', 'Unhandled promise rejection', {
    domain: 'system',
    eventName: 'UNHANDLED_REJECTION',
    stack: reason instanceof Error ? reason.stack : String(reason),
    metadata: { reason: String(reason), ...getSystemMetrics() },
  });
  process.exitCode = 1;
  void shutdown('unhandledRejection');
});
process.on('uncaughtException', (err) => {
  logEvent('error', `Uncaught exception: ${err.message}`, {
    domain: 'system',
    eventName: 'UNCAUGHT_EXCEPTION',
    errorCode: errorCode(err),
    stack: err.stack,
    metadata: { name: err.name, ...getSystemMetrics() },
  });
  process.exitCode = 1;
  void shutdown('uncaughtException');
});
main().catch((err: unknown) => {
  logEvent('error', `Fatal startup error: ${err instanceof Error ? err.message : String(err)}`, {
    domain: 'system',
    eventName: 'STARTUP_FATAL',
    stack: err instanceof Error ? err.stack : undefined,
    metadata: { ...getSystemMetrics() },
  });
  process.exitCode = 1;
});
