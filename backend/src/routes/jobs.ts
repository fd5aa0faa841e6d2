/**
 * Job routes: submission, status, cancellation, logs and outputs.
 * Every route acts on the caller's own jobs.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { BlobNotFoundError } from '../errors.js';
import { requireUser } from '../middleware/auth.js';
import type { JobService } from '../services/job-pipeline.js';
import { ListJobsQuerySchema, SubmitJobBodySchema } from '../types/protocol.js';
import { jobView, parse, sendError } from './http.js';

export interface JobRoutesOptions {
  jobs: JobService;
}

interface JobIdParams {
  id: string;
}

export default async function jobRoutes(app: FastifyInstance, opts: JobRoutesOptions): Promise<void> {
  const { jobs } = opts;
  app.addHook('onRequest', requireUser);

  /** POST /api/jobs — Submit a job; the first tick is reserved up front */
  app.post('/api/jobs', async (req: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = parse(SubmitJobBodySchema, req.body);
      const job = await jobs.submit({
        ownerId: req.user.sub,
        dockerImage: body.dockerImage,
        entrypoint: body.entrypoint,
        resourceConfig: body.resourceConfig,
        inputs: body.inputs.map((input) => ({ path: input.path, content: Buffer.from(input.content, 'base64') })),
      });
      return reply.status(201).send({ success: true, job: jobView(job) });
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  /** GET /api/jobs — Caller's jobs, newest first */
  app.get('/api/jobs', async (req: FastifyRequest, reply: FastifyReply) => {
    try {
      const query = parse(ListJobsQuerySchema, req.query);
      const list = await jobs.list(req.user.sub, query);
      return reply.send({ success: true, jobs: list.map(jobView) });
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  /** GET /api/jobs/:id — Status, ticks billed and cost */
  app.get('/api/jobs/:id', async (req: FastifyRequest<{ Params: JobIdParams }>, reply: FastifyReply) => {
    try {
      const job = await jobs.get(req.params.id, req.user.sub);
      return reply.send({ success: true, job: jobView(job) });
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  /** POST /api/jobs/:id/cancel — Request cancellation; final once the worker confirms */
  app.post('/api/jobs/:id/cancel', async (req: FastifyRequest<{ Params: JobIdParams }>, reply: FastifyReply) => {
    try {
      const result = await jobs.cancel(req.params.id, req.user.sub);
      return reply.status(202).send({ success: true, ...result });
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  /** GET /api/jobs/:id/logs — Full log as plain text */
  app.get('/api/jobs/:id/logs', async (req: FastifyRequest<{ Params: JobIdParams }>, reply: FastifyReply) => {
    try {
      const text = await jobs.readLogs(req.params.id, req.user.sub);
      return reply.type('text/plain; charset=utf-8').send(text);
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  /** GET /api/jobs/:id/outputs — Output file paths */
  app.get('/api/jobs/:id/outputs', async (req: FastifyRequest<{ Params: JobIdParams }>, reply: FastifyReply) => {
    try {
      const files = await jobs.listOutputs(req.params.id, req.user.sub);
      return reply.send({ success: true, files });
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  /** GET /api/jobs/:id/outputs/* — Download one output file */
  app.get(
    '/api/jobs/:id/outputs/*',
    async (req: FastifyRequest<{ Params: JobIdParams & { '*': string } }>, reply: FastifyReply) => {
      try {
        const outputPath = req.params['*'];
        const content = await jobs.readOutput(req.params.id, outputPath, req.user.sub);
        if (!content) throw new BlobNotFoundError(req.params.id, `output/${outputPath}`);
        return reply.type('application/octet-stream').send(content);
      } catch (error: unknown) {
        return sendError(reply, error);
      }
    },
  );
}
