import { z } from 'zod';
import crypto from 'node:crypto';

function emptyStringToUndefined(value: unknown) {
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

const optionalString = (schema: z.ZodString) => z.preprocess(emptyStringToUndefined, schema.optional());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),

  // Express body parser limits (`bytes` syntax). Inbound emails carry base64 attachments.
  REQUEST_BODY_LIMIT: z.string().trim().min(1).default('25mb'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  MONGODB_URI: z.string().min(1),
  MONGODB_DBNAME: optionalString(z.string().trim().min(1)),

  JWT_ACCESS_SECRET: z.string().optional(),
  JWT_ACCESS_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60 * 12),

  CORS_ORIGINS: z.string().default(''),

  // Outbound workflow automation endpoint.
  WEBHOOK_URL: optionalString(z.string().trim().url()),
  WEBHOOK_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  WEBHOOK_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),
  WEBHOOK_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  WEBHOOK_STALE_WRITES: z.enum(['last-writer-wins', 'discard-stale']).default('last-writer-wins'),

  // Shared secret the automation sends as `x-webhook-secret` on inbound calls.
  WEBHOOK_INBOUND_SECRET: optionalString(z.string().min(1)),

  // Idempotent admin seed on startup.
  SEED_ADMIN_EMAIL: optionalString(z.string().trim().email()),
  SEED_ADMIN_PASSWORD: optionalString(z.string().min(8).max(200)),
  SEED_ADMIN_NAME: z.string().trim().min(2).max(120).default('Administrator'),
});

type EnvSchema = z.infer<typeof envSchema>;

export type Env = Omit<EnvSchema, 'JWT_ACCESS_SECRET'> & {
  JWT_ACCESS_SECRET: string;
};

function looksPlaceholder(value: string | undefined) {
  if (!value) return true;
  const v = value.trim();
  if (!v) return true;
  if (v.includes('REPLACE_ME')) return true;
  if (v.startsWith('<') && v.endsWith('>')) return true;
  return false;
}

function invalid(name: string, message: string): Error {
  return new Error(`Invalid environment configuration:\n${name}: ${message}`);
}

export function loadEnv(processEnv: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(processEnv);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${message}`);
  }

  const data = parsed.data;
  const isProd = data.NODE_ENV === 'production';

  const ensureSecret = (name: 'JWT_ACCESS_SECRET', value: string | undefined) => {
    if (isProd) {
      if (!value || value.length < 20 || looksPlaceholder(value)) {
        throw invalid(name, 'must be set to a secure random string (>= 20 chars) in production');
      }
      return value;
    }
    // Dev/test: keep a provided value so sessions survive restarts.
    if (value && !looksPlaceholder(value)) return value;
    return crypto.randomBytes(32).toString('hex');
  };

  const env: Env = {
    ...data,
    JWT_ACCESS_SECRET: ensureSecret('JWT_ACCESS_SECRET', data.JWT_ACCESS_SECRET),
  };

  if (isProd && looksPlaceholder(env.MONGODB_URI)) {
    throw invalid('MONGODB_URI', 'must be set to a real MongoDB connection string in production');
  }

  if (isProd && !env.WEBHOOK_URL) {
    throw invalid('WEBHOOK_URL', 'must be set in production so ticket notifications can be delivered');
  }

  if (isProd && !parseCorsOrigins(env.CORS_ORIGINS).length) {
    throw invalid('CORS_ORIGINS', 'must be set to a comma-separated list of allowed origins/hosts in production');
  }

  if (Boolean(env.SEED_ADMIN_EMAIL) !== Boolean(env.SEED_ADMIN_PASSWORD)) {
    throw invalid('SEED_ADMIN_EMAIL', 'SEED_ADMIN_EMAIL and SEED_ADMIN_PASSWORD must be set together');
  }

  return env;
}

export function parseCorsOrigins(raw: string): string[] {
  const stripOuterQuotes = (value: string) => {
    const v = value.trim();
    if ((v.startsWith('"') && v.endsWith('"')) || (v.startsWith("'") && v.endsWith("'"))) {
      return v.slice(1, -1).trim();
    }
    return v;
  };

  const normalizeEntry = (value: string): string | null => {
    let v = stripOuterQuotes(value).replace(/\/+$/, '');
    if (!v) return null;

    // Concrete URLs collapse to their origin.
    if ((v.startsWith('http://') || v.startsWith('https://')) && !v.includes('*')) {
      try {
        const url = new URL(v);
        return `${url.protocol}//${url.host}`;
      } catch {
        return null;
      }
    }

    // Wildcard / hostname forms: drop any accidental path segment.
    const slashIdx = v.indexOf('/');
    if (slashIdx !== -1) v = v.slice(0, slashIdx);
    return v.trim() || null;
  };

  return raw
    .split(',')
    .map((s) => normalizeEntry(s))
    .filter((s): s is string => Boolean(s));
}
