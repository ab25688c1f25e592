import mongoose from 'mongoose';
import type { Env } from '../config/env.js';
import { dbLog } from '../config/logger.js';
import { logAvailabilityEvent } from '../config/appLogs.js';

/**
 * Used when neither MONGODB_DBNAME nor the URI names a database, so Mongoose
 * does not silently fall back to "test".
 */
const DEFAULT_DBNAME = 'helpdesk';

let isIntentionalDisconnect = false;
let connectInFlight: Promise<void> | null = null;
let handlersAttached = false;

const onMongoError = (err: unknown) => {
  logAvailabilityEvent('DATABASE_ERROR', { component: 'mongodb', metadata: { error: err } });
};

const onMongoDisconnected = () => {
  if (isIntentionalDisconnect) return;
  logAvailabilityEvent('DATABASE_DISCONNECTED', { component: 'mongodb', status: 'down' });
  dbLog.warn('MongoDB disconnected. Attempting reconnection...');
};

const onMongoReconnected = () => {
  dbLog.info('MongoDB reconnected');
};

function resolveDbName(env: Env): string | undefined {
  if (env.MONGODB_DBNAME) return env.MONGODB_DBNAME;
  try {
    const dbFromUri = new URL(env.MONGODB_URI).pathname.replace(/^\//, '').split('/')[0];
    if (dbFromUri && dbFromUri !== 'test') return undefined;
  } catch {
    // Non-URL connection strings fall through to the default.
  }
  return DEFAULT_DBNAME;
}

export async function connectMongo(env: Env): Promise<void> {
  if (mongoose.connection.readyState >= 1) return;
  if (connectInFlight) return connectInFlight;

  connectInFlight = (async () => {
    isIntentionalDisconnect = false;
    mongoose.set('strictQuery', true);

    // connectMongo() may be called more than once; attach handlers a single time.
    if (!handlersAttached) {
      mongoose.connection.on('error', onMongoError);
      mongoose.connection.on('disconnected', onMongoDisconnected);
      mongoose.connection.on('reconnected', onMongoReconnected);
      handlersAttached = true;
    }

    const dbName = resolveDbName(env);
    dbLog.info(`MongoDB: connecting to db "${dbName ?? '(from URI)'}"`);

    const started = Date.now();
    await mongoose.connect(env.MONGODB_URI, {
      // Unique indexes on ticketCode/threadId back the duplicate-thread policy.
      autoIndex: true,
      ...(dbName ? { dbName } : {}),
      maxPoolSize: 20,
      minPoolSize: 2,
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: 45000,
      family: 4,
    });
    logAvailabilityEvent('DATABASE_CONNECTED', { component: 'mongodb', status: 'up', responseTimeMs: Date.now() - started });
  })().finally(() => {
    connectInFlight = null;
  });

  return connectInFlight;
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  isIntentionalDisconnect = true;
  await mongoose.disconnect();
}
