/**
 * Structured Winston logging for the helpdesk backend.
 *
 * - JSON lines with service metadata in production, colourful console in development
 * - Daily-rotated combined/error files in production (winston-daily-rotate-file)
 * - Redaction of credentials, shared secrets and attachment payloads
 * - Throttling of repeated warn/error messages
 * - Silent under NODE_ENV=test
 *
 * Domains: http | auth | db | business | system | security | webhook | realtime
 */
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';

const { combine, timestamp, printf, errors, json, metadata } = winston.format;

const SERVICE_NAME = 'helpdesk-backend';
const SERVICE_VERSION = process.env.npm_package_version || '0.1.0';
const HOSTNAME = os.hostname();
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const LOG_DIR = process.env.LOG_DIR || path.resolve(__dirname, '..', 'logs');
const nodeEnv = process.env.NODE_ENV || 'development';
const isTest = nodeEnv === 'test';
const isProd = nodeEnv === 'production';

const MAX_PAYLOAD_SIZE = 4096;
const MAX_SERIALIZE_DEPTH = 6;

if (isProd) {
  try {
    fs.mkdirSync(LOG_DIR, { recursive: true });
  } catch (err) {
    // Console transport still works without the directory.
    process.stderr.write(`[logger] cannot create ${LOG_DIR}: ${String(err)}\n`);
  }
}

// ─── Redaction ───────────────────────────────────────────────────────────────
const REDACTED = '[REDACTED]';
const SENSITIVE_KEYS = new Set([
  'password', 'passwd', 'passwordhash', 'secret', 'token', 'accesstoken',
  'authorization', 'cookie', 'setcookie', 'apikey', 'jwt', 'jwtaccesssecret',
  'privatekey', 'mongodburi', 'webhookinboundsecret', 'xwebhooksecret',
  'seedadminpassword',
]);

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase().replace(/[-_]/g, ''));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** jo***@example.com */
function maskEmail(email: string): string {
  const atIdx = email.indexOf('@');
  if (atIdx <= 2) return `***${email.slice(atIdx)}`;
  return `${email.slice(0, 2)}***${email.slice(atIdx)}`;
}

/** Attachments keep their name and size; base64 bodies never reach a log line. */
function summarizeAttachment(value: unknown): unknown {
  if (!isRecord(value)) return value;
  const data = typeof value.data === 'string' ? value.data : '';
  return {
    filename: value.filename,
    contentType: value.contentType ?? value.content_type,
    bytes: Math.floor((data.length * 3) / 4),
  };
}

/**
 * Deep-clone and redact sensitive fields. Guards against cycles, depth and size.
 */
function sanitize(obj: unknown, depth = 0, seen = new WeakSet<object>()): unknown {
  if (depth > MAX_SERIALIZE_DEPTH) return '[MAX_DEPTH]';
  if (obj === null || obj === undefined) return obj;

  if (typeof obj === 'string') {
    if (obj.length > MAX_PAYLOAD_SIZE) {
      return obj.slice(0, MAX_PAYLOAD_SIZE) + `...[truncated ${obj.length - MAX_PAYLOAD_SIZE} chars]`;
    }
    return obj;
  }

  if (typeof obj !== 'object') return obj;

  if (seen.has(obj)) return '[CIRCULAR]';
  seen.add(obj);

  if (Array.isArray(obj)) {
    const items = obj.slice(0, 100).map((item) => sanitize(item, depth + 1, seen));
    if (obj.length > 100) items.push(`...[${obj.length - 100} more items]`);
    return items;
  }

  if (obj instanceof Error) {
    return {
      name: obj.name,
      message: obj.message,
      stack: obj.stack,
      ...('code' in obj && obj.code !== undefined ? { code: obj.code } : {}),
    };
  }

  if (obj instanceof Date) return obj.toISOString();

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key)) {
      result[key] = REDACTED;
      continue;
    }
    if (key === 'attachments' && Array.isArray(value)) {
      result[key] = value.map(summarizeAttachment);
      continue;
    }
    if (typeof value === 'string' && key.toLowerCase().includes('email') && value.includes('@')) {
      result[key] = maskEmail(value);
      continue;
    }
    result[key] = sanitize(value, depth + 1, seen);
  }
  return result;
}

function getSystemMetrics() {
  const mem = process.memoryUsage();
  return {
    memoryMB: Math.round(mem.rss / 1024 / 1024),
    heapUsedMB: Math.round(mem.heapUsed / 1024 / 1024),
    heapTotalMB: Math.round(mem.heapTotal / 1024 / 1024),
  };
}

// ─── Log explosion prevention ────────────────────────────────────────────────
const errorThrottleMap = new Map<string, { count: number; lastLogged: number }>();
const THROTTLE_WINDOW_MS = 60_000;
const THROTTLE_MAX_PER_WINDOW = 10;

function shouldThrottleError(message: string): { throttled: boolean; suppressed: number } {
  const now = Date.now();
  const key = message.slice(0, 200);
  const entry = errorThrottleMap.get(key);

  if (!entry || now - entry.lastLogged > THROTTLE_WINDOW_MS) {
    errorThrottleMap.set(key, { count: 1, lastLogged: now });
    return { throttled: false, suppressed: 0 };
  }

  entry.count++;
  if (entry.count <= THROTTLE_MAX_PER_WINDOW) {
    entry.lastLogged = now;
    return { throttled: false, suppressed: 0 };
  }
  return { throttled: true, suppressed: entry.count - THROTTLE_MAX_PER_WINDOW };
}

const throttleCleanup = setInterval(() => {
  const now = Date.now();
  for (const [key, entry] of errorThrottleMap) {
    if (now - entry.lastLogged > THROTTLE_WINDOW_MS * 2) errorThrottleMap.delete(key);
  }
}, 5 * 60_000);
throttleCleanup.unref();

// ─── Formats ─────────────────────────────────────────────────────────────────
const redactFormat = winston.format((info) => {
  if (isRecord(info.metadata)) info.metadata = sanitize(info.metadata);
  if (isRecord(info.error)) info.error = sanitize(info.error);
  return info;
});

const structuredEnrich = winston.format((info) => {
  info.serviceName = SERVICE_NAME;
  info.environment = nodeEnv;
  info.version = SERVICE_VERSION;
  info.hostname = HOSTNAME;
  info.pid = process.pid;

  const meta = isRecord(info.metadata) ? info.metadata : {};
  if (!info.correlationId) info.correlationId = meta.correlationId || meta.requestId || undefined;
  if (!info.requestId) info.requestId = meta.requestId || info.correlationId || undefined;
  return info;
});

const throttleFormat = winston.format((info) => {
  if (info.level !== 'error' && info.level !== 'warn') return info;
  const { throttled, suppressed } = shouldThrottleError(String(info.message));
  if (!throttled) return info;
  if (suppressed % 100 === 0) {
    info.message = `[THROTTLED x${suppressed}] ${String(info.message)}`;
    return info;
  }
  return false;
});

const levelColors: Record<string, string> = {
  error: '\x1b[31m',
  warn: '\x1b[33m',
  info: '\x1b[36m',
  http: '\x1b[35m',
  debug: '\x1b[90m',
};
const reset = '\x1b[0m';
const bold = '\x1b[1m';
const dim = '\x1b[2m';

const HIDDEN_DEV_KEYS = ['module', 'requestId', 'durationMs', 'domain', 'eventName', 'correlationId', 'service', 'pid'];

const devFormat = printf((info) => {
  const level = String(info.level);
  const color = levelColors[level] || '';
  const mod = typeof info.module === 'string' ? `${dim}[${info.module}]${reset} ` : '';
  const reqId = typeof info.requestId === 'string' ? `${dim}(${info.requestId.slice(0, 8)})${reset} ` : '';
  const dur = typeof info.durationMs === 'number' ? ` ${dim}${info.durationMs}ms${reset}` : '';
  const evt = typeof info.eventName === 'string' ? ` ${dim}«${info.eventName}»${reset}` : '';
  const dom = typeof info.domain === 'string' ? `${dim}{${info.domain}}${reset} ` : '';

  const meta: Record<string, unknown> = isRecord(info.metadata) ? { ...info.metadata } : {};
  for (const k of HIDDEN_DEV_KEYS) delete meta[k];
  const extra = Object.keys(meta).length
    ? `\n  ${dim}${JSON.stringify(meta, null, 2).replace(/\n/g, '\n  ')}${reset}`
    : '';

  return `${dim}${String(info.timestamp)}${reset} ${color}${bold}${level.toUpperCase().padEnd(5)}${reset} ${dom}${mod}${reqId}${String(info.message)}${evt}${dur}${extra}`;
});

const prodJsonFormat = combine(
  timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  errors({ stack: true }),
  metadata({ fillExcept: ['message', 'level', 'timestamp', 'serviceName', 'environment', 'version', 'hostname', 'pid', 'correlationId', 'requestId'] }),
  structuredEnrich(),
  redactFormat(),
  throttleFormat(),
  json()
);

const devConsoleFormat = combine(
  timestamp({ format: 'HH:mm:ss.SSS' }),
  errors({ stack: true }),
  metadata({ fillExcept: ['message', 'level', 'timestamp', 'module', 'requestId', 'durationMs', 'domain', 'eventName'] }),
  redactFormat(),
  devFormat
);

// ─── Transports ──────────────────────────────────────────────────────────────
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: isProd ? prodJsonFormat : devConsoleFormat,
  }),
];

if (isProd) {
  transports.push(
    new DailyRotateFile({
      dirname: LOG_DIR,
      filename: 'combined-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      format: prodJsonFormat,
      zippedArchive: true,
    }),
    new DailyRotateFile({
      dirname: LOG_DIR,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: '90d',
      format: prodJsonFormat,
      zippedArchive: true,
    })
  );
}

const logger = winston.createLogger({
  level: isProd ? 'info' : 'debug',
  silent: isTest,
  defaultMeta: { service: SERVICE_NAME, pid: process.pid },
  transports,
  exitOnError: false,
});

export default logger;

// ─── Structured event logger ─────────────────────────────────────────────────

export type LogDomain = 'http' | 'auth' | 'db' | 'business' | 'system' | 'security' | 'webhook' | 'realtime';

export interface LogEvent {
  domain: LogDomain;
  eventCategory?: string;
  eventName: string;
  correlationId?: string;
  requestId?: string;
  userId?: string;
  role?: string;
  ip?: string;
  method?: string;
  route?: string;
  statusCode?: number;
  duration?: number;
  errorCode?: string;
  stack?: string;
  metadata?: Record<string, unknown>;
}

export function logEvent(level: 'debug' | 'info' | 'warn' | 'error', message: string, event: LogEvent): void {
  const metrics = level === 'error' || level === 'warn' ? getSystemMetrics() : undefined;
  logger.log(level, message, {
    domain: event.domain,
    eventCategory: event.eventCategory,
    eventName: event.eventName,
    correlationId: event.correlationId,
    requestId: event.requestId,
    userId: event.userId,
    role: event.role,
    ip: event.ip,
    method: event.method,
    route: event.route,
    statusCode: event.statusCode,
    durationMs: event.duration,
    errorCode: event.errorCode,
    stack: event.stack,
    ...(metrics ? { memoryMB: metrics.memoryMB, heapUsedMB: metrics.heapUsedMB } : {}),
    ...event.metadata,
  });
}

// ─── Module-scoped child loggers ─────────────────────────────────────────────

export const httpLog = logger.child({ module: 'http' });
export const authLog = logger.child({ module: 'auth' });
export const dbLog = logger.child({ module: 'db' });
export const ticketLog = logger.child({ module: 'tickets' });
export const webhookLog = logger.child({ module: 'webhook' });
export const realtimeLog = logger.child({ module: 'realtime' });
export const seedLog = logger.child({ module: 'seed' });
export const startupLog = logger.child({ module: 'startup' });
export const securityLog = logger.child({ module: 'security' });

export { sanitize, getSystemMetrics, maskEmail };
