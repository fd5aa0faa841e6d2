/**
 * Fastify server: plugins, audit logging and routes.
 */
import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import fastifyJwt from '@fastify/jwt';
import websocket from '@fastify/websocket';
import type { Controller } from './controller.js';
import { logger } from './lib/logger.js';
import auditLogger from './middleware/auditLogger.js';
import auditRoutes from './routes/audit.js';
import jobRoutes from './routes/jobs.js';
import logStreamRoutes from './routes/logs.js';
import walletRoutes from './routes/wallets.js';
import workerRoutes from './routes/worker.js';

// Base64 inputs of up to 50 MB plus JSON framing.
const BODY_LIMIT = 70 * 1024 * 1024;

/** Bearer header first, then `?token=` (browsers cannot set headers on a WebSocket). */
export function extractToken(request: FastifyRequest): string | undefined {
  const header = request.headers.authorization;
  if (header?.startsWith('Bearer ')) return header.slice('Bearer '.length);
  const query: unknown = request.query;
  if (typeof query === 'object' && query !== null && 'token' in query && typeof query.token === 'string') {
    return query.token;
  }
  return undefined;
}

export async function buildServer(controller: Controller): Promise<FastifyInstance> {
  const app = Fastify({ logger: { level: logger.level, name: 'gpumeter-http' }, bodyLimit: BODY_LIMIT });
  const { config } = controller;

  // ── Plugins ──────────────────────────────────────────────────────────────
  await app.register(fastifyJwt, {
    secret: config.jwtSecret,
    verify: { extractToken },
  });
  await app.register(websocket);

  // Audit logging (must be registered before routes)
  await app.register(auditLogger, { audit: controller.audit });

  // ── Routes ───────────────────────────────────────────────────────────────
  await app.register(jobRoutes, { jobs: controller.jobs });
  await app.register(logStreamRoutes, { jobs: controller.jobs, relay: controller.relay });
  await app.register(walletRoutes, { ledger: controller.ledger });
  await app.register(auditRoutes, { audit: controller.audit });
  await app.register(workerRoutes, { gateway: controller.gateway, workerSecret: config.workerSecret });

  // Health check (excluded from audit logs)
  app.get('/health', async () => ({ status: 'ok' }));

  app.addHook('onClose', async () => controller.close());
  return app;
}
