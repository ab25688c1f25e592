/**
 * Request hardening beyond Helmet.
 *
 * Unambiguous attacks (path traversal, control characters) are blocked;
 * injection-looking input is only written to the security audit trail.
 */
import type { NextFunction, Request, Response } from 'express';
import { securityLog } from '../config/logger.js';
import { logSecurityIncident } from '../config/appLogs.js';
import { isRecord } from '../utils/guards.js';
import { requestIdOf } from '../utils/http.js';

// Logged, not blocked: ticket text legitimately quotes code and SQL.
const SUSPICIOUS_PATTERNS = [
  /(\$where|\$gt|\$lt|\$ne|\$regex|\$in|\$nin|\$or|\$and|\$not)/i, // NoSQL injection
  /(<script[^>]*>|javascript:|on\w+\s*=)/i, // XSS vectors
  /(union\s+select|insert\s+into|drop\s+table|delete\s+from)/i, // SQL injection
];

const BLOCK_PATTERNS = [
  /(\.\.[/\\]){2,}/, // Path traversal (../../ etc.)
  /(\x00|\x1a|\x7f)/, // Null bytes / control characters
];

const MAX_DEPTH = 5;

function firstMatch(patterns: RegExp[], value: string): string | null {
  for (const pattern of patterns) {
    if (pattern.test(value)) return pattern.source;
  }
  return null;
}

type Hit = { pattern: string; location: string };

function scan(value: unknown, patterns: RegExp[], location: string, hits: Hit[], depth = 0): void {
  if (depth > MAX_DEPTH) return;
  if (typeof value === 'string') {
    const pattern = firstMatch(patterns, value);
    if (pattern) hits.push({ pattern, location });
    return;
  }
  if (Array.isArray(value)) {
    value.forEach((item, i) => scan(item, patterns, `${location}[${i}]`, hits, depth + 1));
    return;
  }
  if (!isRecord(value)) return;
  for (const [key, inner] of Object.entries(value)) {
    const keyPattern = firstMatch(patterns, key);
    if (keyPattern) hits.push({ pattern: keyPattern, location: `${location}.${key}` });
    scan(inner, patterns, `${location}.${key}`, hits, depth + 1);
  }
}

export interface SecurityAuditOptions {
  /**
   * Path prefixes whose bodies are skipped. Inbound email payloads carry
   * arbitrary customer text and are validated by their own schemas.
   */
  trustedBodyPrefixes?: string[];
}

export function securityAuditMiddleware(options: SecurityAuditOptions = {}) {
  const trusted = options.trustedBodyPrefixes ?? [];

  return (req: Request, res: Response, next: NextFunction) => {
    const requestId = requestIdOf(res);
    const skipBody = trusted.some((prefix) => req.originalUrl.startsWith(prefix));

    const sources: Array<{ data: unknown; label: string }> = [
      { data: req.query, label: 'query' },
      { data: req.params, label: 'params' },
    ];
    if (!skipBody) sources.push({ data: req.body, label: 'body' });

    const blocked: Hit[] = [];
    for (const source of sources) scan(source.data, BLOCK_PATTERNS, source.label, blocked);
    const [block] = blocked;
    if (block) {
      logSecurityIncident('MALICIOUS_PAYLOAD', {
        severity: 'medium',
        ip: req.ip,
        method: req.method,
        route: req.originalUrl,
        requestId,
        pattern: block.pattern,
        location: block.location,
        userAgent: req.get('user-agent'),
      });
      res.status(400).json({
        error: {
          code: 'BAD_REQUEST',
          message: 'The request contains invalid characters.',
        },
      });
      return;
    }

    const suspicious: Hit[] = [];
    for (const source of sources) scan(source.data, SUSPICIOUS_PATTERNS, source.label, suspicious);
    for (const hit of suspicious) {
      securityLog.warn('Suspicious pattern in request', {
        requestId,
        pattern: hit.pattern,
        location: hit.location,
        ip: req.ip,
        method: req.method,
        url: req.originalUrl,
      });
    }

    next();
  };
}
