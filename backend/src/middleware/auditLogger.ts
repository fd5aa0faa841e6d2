/**
 * Request audit logger.
 * Fire-and-forget request/response audit records; the body is stored as a hash only.
 */
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { createHash } from 'crypto';
import type { AuditRecorder } from '../services/auditService.js';
import { roleOf } from './auth.js';

declare module 'fastify' {
  interface FastifyRequest {
    auditStart: number;
  }
}

export interface AuditLoggerOptions {
  audit: AuditRecorder;
  /** URL prefixes that are never audited. */
  excludedPrefixes?: string[];
}

// Worker traffic is heartbeat-rate; its decisions are audited by the coordinator.
const DEFAULT_EXCLUDED = ['/health', '/api/worker/'];

const SENSITIVE_KEYS = new Set(['password', 'token', 'apikey', 'api_key', 'secret', 'authorization']);

// ── Helpers ────────────────────────────────────────────────────────────────
export function hashBody(body: unknown): string | null {
  if (body === undefined || body === null || body === '') return null;
  const str = typeof body === 'string' ? body : JSON.stringify(body);
  return createHash('sha256').update(str).digest('hex');
}

/**
 * Recursively redact sensitive fields. Returns a new value, never mutates the input.
 */
export function sanitise(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (Array.isArray(value)) return value.map(sanitise);
  if (typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? '[REDACTED]' : sanitise(inner);
    }
    return out;
  }
  return value;
}

function paramId(params: unknown): string | null {
  if (typeof params === 'object' && params !== null && 'id' in params && typeof params.id === 'string') {
    return params.id;
  }
  return null;
}

// ── Plugin ─────────────────────────────────────────────────────────────────
async function auditLoggerPlugin(app: FastifyInstance, options: AuditLoggerOptions): Promise<void> {
  const excluded = options.excludedPrefixes ?? DEFAULT_EXCLUDED;
  app.decorateRequest('auditStart', 0);

  app.addHook('onRequest', async (request: FastifyRequest) => {
    request.auditStart = Date.now();
  });

  app.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    if (excluded.some((prefix) => request.url.startsWith(prefix))) return;

    const contentLength = Number(reply.getHeader('content-length'));
    const user: { sub?: string } | undefined = request.user;
    void options.audit.record({
      actor: user?.sub ?? null,
      action: `${request.method} ${request.routeOptions.url ?? request.url}`,
      resourceId: paramId(request.params),
      details: {
        url: request.url,
        statusCode: reply.statusCode,
        durationMs: Date.now() - request.auditStart,
        role: roleOf(request),
        query: sanitise(request.query),
        ip: request.ip,
        userAgent: request.headers['user-agent'] ?? null,
        bodyHash: hashBody(request.body),
        responseBytes: Number.isFinite(contentLength) ? contentLength : null,
      },
    });
  });
}

export default fp(auditLoggerPlugin, {
  name: 'audit-logger',
  fastify: '4.x',
});
