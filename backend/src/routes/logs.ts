/**
 * Live log stream over WebSocket.
 *
 * GET /api/jobs/:id/logs/stream?token=<jwt>&after=<seq>
 * Replays buffered events after `after`, then tails the job. The server closes the
 * socket after the final status event. A finished job whose buffer has expired gets
 * just its final status.
 */

import type { FastifyInstance } from 'fastify';
import type { SocketStream } from '@fastify/websocket';
import { errorMessage, httpStatusFor } from '../errors.js';
import { requireUser } from '../middleware/auth.js';
import type { JobService } from '../services/job-pipeline.js';
import { isTerminal } from '../services/job-state.js';
import type { LogRelay } from '../services/log-relay.js';
import type { JobRecord, RelayEvent } from '../types/jobs.js';
import { StreamQuerySchema } from '../types/protocol.js';
import { parse } from './http.js';

export interface LogStreamRoutesOptions {
  jobs: JobService;
  relay: LogRelay;
}

const CLOSE_NORMAL = 1000;
const CLOSE_POLICY = 1008;
const CLOSE_ERROR = 1011;

export default async function logStreamRoutes(app: FastifyInstance, opts: LogStreamRoutesOptions): Promise<void> {
  const { jobs, relay } = opts;

  app.get<{ Params: { id: string } }>(
    '/api/jobs/:id/logs/stream',
    { websocket: true, onRequest: requireUser },
    async (connection: SocketStream, req) => {
      const socket = connection.socket;
      const send = (event: RelayEvent): Promise<void> =>
        new Promise((resolve, reject) => {
          socket.send(JSON.stringify(event), (err) => (err ? reject(err) : resolve()));
        });

      let after: number;
      let job: JobRecord;
      try {
        after = parse(StreamQuerySchema, req.query).after ?? 0;
        job = await jobs.get(req.params.id, req.user.sub);
      } catch (err: unknown) {
        socket.close(httpStatusFor(err) >= 500 ? CLOSE_ERROR : CLOSE_POLICY, errorMessage(err).slice(0, 120));
        return;
      }

      if (isTerminal(job.status) && !relay.has(job.id)) {
        try {
          await send({
            type: 'status',
            jobId: job.id,
            seq: after + 1,
            status: job.status,
            final: true,
            exitReason: job.exitReason,
            at: job.endedAt ?? new Date().toISOString(),
          });
        } catch (err: unknown) {
          req.log.debug({ jobId: job.id, err: errorMessage(err) }, 'final status not delivered');
        }
        socket.close(CLOSE_NORMAL, 'job finished');
        return;
      }

      const subscription = relay.subscribe(job.id, after, send, () => {
        if (socket.readyState === socket.OPEN) socket.close(CLOSE_NORMAL, 'stream ended');
      });
      socket.on('close', () => subscription.close());
      req.log.debug({ jobId: job.id, after }, 'log stream attached');
    },
  );
}
