/**
 * Worker protocol routes. Authenticated with the shared worker secret; each route is a
 * thin wrapper around WorkerGateway.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ValidationError } from '../errors.js';
import { requireWorker } from '../middleware/auth.js';
import type { WorkerGateway } from '../services/worker-gateway.js';
import {
  AcceptBodySchema,
  BlobBodySchema,
  ExitReportSchema,
  HeartbeatSchema,
  KillAckSchema,
  LogsBodySchema,
  ReleaseBodySchema,
  StartedBodySchema,
} from '../types/protocol.js';
import { parse, sendError } from './http.js';

export interface WorkerRoutesOptions {
  gateway: WorkerGateway;
  workerSecret: string;
}

interface IdParams {
  id: string;
}

type IdRequest = FastifyRequest<{ Params: IdParams }>;

/** The job id in the path wins over one in the body. */
function withJobId(req: IdRequest): Record<string, unknown> {
  const body: unknown = req.body;
  const fields = typeof body === 'object' && body !== null ? body : {};
  return { ...fields, jobId: req.params.id };
}

export default async function workerRoutes(app: FastifyInstance, opts: WorkerRoutesOptions): Promise<void> {
  const { gateway } = opts;
  app.addHook('onRequest', requireWorker(opts.workerSecret));

  // ── Dispatch queue ─────────────────────────────────────────────────────

  app.post('/api/worker/dispatch/claim', async (req: FastifyRequest, reply: FastifyReply) => {
    try {
      const { workerId } = parse(AcceptBodySchema, req.body);
      const message = await gateway.claimDispatch(workerId);
      return reply.send({ message });
    } catch (err: unknown) {
      return sendError(reply, err);
    }
  });

  app.post('/api/worker/dispatch/:id/ack', async (req: IdRequest, reply: FastifyReply) => {
    try {
      await gateway.ackDispatch(req.params.id);
      return reply.send({ success: true });
    } catch (err: unknown) {
      return sendError(reply, err);
    }
  });

  app.post('/api/worker/dispatch/:id/release', async (req: IdRequest, reply: FastifyReply) => {
    try {
      const { delayMs } = parse(ReleaseBodySchema, req.body);
      await gateway.releaseDispatch(req.params.id, delayMs);
      return reply.send({ success: true });
    } catch (err: unknown) {
      return sendError(reply, err);
    }
  });

  // ── Job lifecycle ──────────────────────────────────────────────────────

  app.post('/api/worker/jobs/:id/accept', async (req: IdRequest, reply: FastifyReply) => {
    try {
      const { workerId } = parse(AcceptBodySchema, req.body);
      return reply.send(await gateway.acceptDispatch(req.params.id, workerId));
    } catch (err: unknown) {
      return sendError(reply, err);
    }
  });

  app.post('/api/worker/jobs/:id/started', async (req: IdRequest, reply: FastifyReply) => {
    try {
      const { sandboxId } = parse(StartedBodySchema, req.body);
      return reply.send(await gateway.reportStarted(req.params.id, sandboxId));
    } catch (err: unknown) {
      return sendError(reply, err);
    }
  });

  app.post('/api/worker/jobs/:id/heartbeat', async (req: IdRequest, reply: FastifyReply) => {
    try {
      const heartbeat = parse(HeartbeatSchema, withJobId(req));
      return reply.send(await gateway.sendHeartbeat(heartbeat));
    } catch (err: unknown) {
      return sendError(reply, err);
    }
  });

  app.get('/api/worker/jobs/:id/commands', async (req: IdRequest, reply: FastifyReply) => {
    try {
      return reply.send({ commands: await gateway.pollCommands(req.params.id) });
    } catch (err: unknown) {
      return sendError(reply, err);
    }
  });

  app.post('/api/worker/jobs/:id/kill-ack', async (req: IdRequest, reply: FastifyReply) => {
    try {
      await gateway.ackKill(parse(KillAckSchema, withJobId(req)));
      return reply.send({ success: true });
    } catch (err: unknown) {
      return sendError(reply, err);
    }
  });

  app.post('/api/worker/jobs/:id/exited', async (req: IdRequest, reply: FastifyReply) => {
    try {
      await gateway.reportExit(parse(ExitReportSchema, withJobId(req)));
      return reply.send({ success: true });
    } catch (err: unknown) {
      return sendError(reply, err);
    }
  });

  // ── Logs and blobs ─────────────────────────────────────────────────────

  app.post('/api/worker/jobs/:id/logs', async (req: IdRequest, reply: FastifyReply) => {
    try {
      const { lines } = parse(LogsBodySchema, req.body);
      await gateway.publishLogs(req.params.id, lines);
      return reply.send({ success: true });
    } catch (err: unknown) {
      return sendError(reply, err);
    }
  });

  app.get(
    '/api/worker/jobs/:id/inputs',
    async (req: FastifyRequest<{ Params: IdParams; Querystring: { path?: string } }>, reply: FastifyReply) => {
      try {
        const path = req.query.path;
        if (!path) throw new ValidationError('path query parameter is required');
        const content = await gateway.fetchInput(req.params.id, path);
        return reply.send({ content: content.toString('base64') });
      } catch (err: unknown) {
        return sendError(reply, err);
      }
    },
  );

  app.post('/api/worker/jobs/:id/blobs', async (req: IdRequest, reply: FastifyReply) => {
    try {
      const { path, content } = parse(BlobBodySchema, req.body);
      await gateway.uploadBlob(req.params.id, path, Buffer.from(content, 'base64'));
      return reply.send({ success: true });
    } catch (err: unknown) {
      return sendError(reply, err);
    }
  });
}
