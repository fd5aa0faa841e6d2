/**
 * Audit routes — admin-only, rate limited.
 */
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { requireAdmin } from '../middleware/auth.js';
import type { AuditService } from '../services/auditService.js';
import { AuditQuerySchema } from '../types/protocol.js';
import { parse, sendError } from './http.js';

export interface AuditRoutesOptions {
  audit: AuditService;
  /** Requests per minute per IP. */
  rateLimit?: number;
}

const RATE_LIMIT_WINDOW_MS = 60_000;

export default async function auditRoutes(app: FastifyInstance, opts: AuditRoutesOptions): Promise<void> {
  const max = opts.rateLimit ?? 30;
  const windows = new Map<string, { count: number; resetAt: number }>();

  const sweep = setInterval(() => {
    const now = Date.now();
    for (const [ip, entry] of windows) {
      if (now > entry.resetAt) windows.delete(ip);
    }
  }, RATE_LIMIT_WINDOW_MS);
  sweep.unref();
  app.addHook('onClose', async () => clearInterval(sweep));

  // Rate limit before the token is even checked.
  app.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    const now = Date.now();
    const entry = windows.get(request.ip);
    if (!entry || now > entry.resetAt) {
      windows.set(request.ip, { count: 1, resetAt: now + RATE_LIMIT_WINDOW_MS });
      return undefined;
    }
    if (entry.count >= max) {
      return reply.status(429).send({ success: false, error: 'Too many requests. Try again later.', code: 'RATE_LIMITED' });
    }
    entry.count++;
    return undefined;
  });
  app.addHook('onRequest', requireAdmin);

  // GET /api/audit/logs — paginated, filterable, newest first
  app.get('/api/audit/logs', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const q = parse(AuditQuerySchema, request.query);
      const page = q.page ?? 1;
      const limit = q.limit ?? 50;
      const logs = await opts.audit.query({ ...q, page, limit });
      return reply.send({ success: true, data: logs, page, limit });
    } catch (err: unknown) {
      return sendError(reply, err);
    }
  });
}
