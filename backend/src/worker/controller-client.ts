/**
 * Worker → controller protocol.
 * The controller's WorkerGateway implements this interface in-process; the worker
 * process talks to it through HttpControllerClient.
 */

import type { z } from 'zod';
import { TransientInfraError, errorMessage } from '../errors.js';
import { DEFAULT_BACKOFF, retryWithBackoff, type BackoffPolicy } from '../lib/backoff.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import type {
  AcceptReply,
  ControlReply,
  DispatchMessage,
  ExitReport,
  Heartbeat,
  HeartbeatReply,
  KillAck,
  KillCommand,
} from '../types/jobs.js';
import {
  AcceptReplySchema,
  BlobReplySchema,
  ClaimReplySchema,
  CommandsReplySchema,
  ControlReplySchema,
  HeartbeatReplySchema,
} from '../types/protocol.js';

export interface ControllerClient {
  claimDispatch(workerId: string): Promise<DispatchMessage | null>;
  ackDispatch(messageId: string): Promise<void>;
  releaseDispatch(messageId: string, delayMs: number): Promise<void>;
  acceptDispatch(jobId: string, workerId: string): Promise<AcceptReply>;
  reportStarted(jobId: string, sandboxId: string): Promise<ControlReply>;
  sendHeartbeat(heartbeat: Heartbeat): Promise<HeartbeatReply>;
  pollCommands(jobId: string): Promise<KillCommand[]>;
  ackKill(ack: KillAck): Promise<void>;
  reportExit(report: ExitReport): Promise<void>;
  publishLogs(jobId: string, lines: string[]): Promise<void>;
  fetchInput(jobId: string, path: string): Promise<Buffer>;
  /** Paths under output/ or logs/ only. */
  uploadBlob(jobId: string, path: string, content: Buffer): Promise<void>;
}

/** Non-retryable rejection from the controller (4xx). */
export class ControllerRejectedError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'ControllerRejectedError';
  }
}

export interface HttpClientOptions {
  baseUrl: string;
  workerSecret: string;
  retry?: BackoffPolicy;
  logger?: Logger;
}

export class HttpControllerClient implements ControllerClient {
  private readonly retry: BackoffPolicy;
  private readonly log: Logger;

  constructor(private readonly options: HttpClientOptions) {
    this.retry = options.retry ?? DEFAULT_BACKOFF;
    this.log = options.logger ?? componentLogger('controller-client');
  }

  async claimDispatch(workerId: string): Promise<DispatchMessage | null> {
    const reply = await this.call('POST', '/api/worker/dispatch/claim', { workerId }, ClaimReplySchema);
    return reply.message;
  }

  async ackDispatch(messageId: string): Promise<void> {
    await this.call('POST', `/api/worker/dispatch/${enc(messageId)}/ack`, {});
  }

  async releaseDispatch(messageId: string, delayMs: number): Promise<void> {
    await this.call('POST', `/api/worker/dispatch/${enc(messageId)}/release`, { delayMs });
  }

  async acceptDispatch(jobId: string, workerId: string): Promise<AcceptReply> {
    return this.call('POST', `/api/worker/jobs/${enc(jobId)}/accept`, { workerId }, AcceptReplySchema);
  }

  async reportStarted(jobId: string, sandboxId: string): Promise<ControlReply> {
    return this.call('POST', `/api/worker/jobs/${enc(jobId)}/started`, { sandboxId }, ControlReplySchema);
  }

  async sendHeartbeat(heartbeat: Heartbeat): Promise<HeartbeatReply> {
    return this.call('POST', `/api/worker/jobs/${enc(heartbeat.jobId)}/heartbeat`, heartbeat, HeartbeatReplySchema);
  }

  async pollCommands(jobId: string): Promise<KillCommand[]> {
    const reply = await this.call('GET', `/api/worker/jobs/${enc(jobId)}/commands`, undefined, CommandsReplySchema);
    return reply.commands;
  }

  async ackKill(ack: KillAck): Promise<void> {
    await this.call('POST', `/api/worker/jobs/${enc(ack.jobId)}/kill-ack`, ack);
  }

  async reportExit(report: ExitReport): Promise<void> {
    await this.call('POST', `/api/worker/jobs/${enc(report.jobId)}/exited`, report);
  }

  async publishLogs(jobId: string, lines: string[]): Promise<void> {
    await this.call('POST', `/api/worker/jobs/${enc(jobId)}/logs`, { lines });
  }

  async fetchInput(jobId: string, path: string): Promise<Buffer> {
    const reply = await this.call(
      'GET',
      `/api/worker/jobs/${enc(jobId)}/inputs?path=${enc(path)}`,
      undefined,
      BlobReplySchema,
    );
    return Buffer.from(reply.content, 'base64');
  }

  async uploadBlob(jobId: string, path: string, content: Buffer): Promise<void> {
    await this.call('POST', `/api/worker/jobs/${enc(jobId)}/blobs`, { path, content: content.toString('base64') });
  }

  // ── Transport ──

  private async call(method: 'GET' | 'POST', path: string, body: unknown): Promise<unknown>;
  private async call<T>(method: 'GET' | 'POST', path: string, body: unknown, schema: z.ZodType<T>): Promise<T>;
  private async call<T>(method: 'GET' | 'POST', path: string, body: unknown, schema?: z.ZodType<T>): Promise<T | unknown> {
    const payload = await retryWithBackoff(() => this.send(method, path, body), {
      ...this.retry,
      isRetryable: (err) => err instanceof TransientInfraError,
      onRetry: (err, attempt, delayMs) =>
        this.log.warn({ path, attempt, delayMs, err: errorMessage(err) }, 'controller request failed, retrying'),
    });
    if (!schema) return payload;
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ControllerRejectedError(502, `Malformed reply from ${path}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async send(method: 'GET' | 'POST', path: string, body: unknown): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(`${this.options.baseUrl}${path}`, {
        method,
        headers: {
          'x-worker-secret': this.options.workerSecret,
          ...(body === undefined ? {} : { 'Content-Type': 'application/json' }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (err: unknown) {
      throw new TransientInfraError(`Controller unreachable: ${errorMessage(err)}`);
    }

    const text = await res.text();
    let json: unknown = null;
    try {
      json = text ? JSON.parse(text) : null;
    } catch {
      json = text;
    }
    if (res.status >= 500 || res.status === 429) {
      throw new TransientInfraError(`Controller ${method} ${path} → ${res.status}`, json);
    }
    if (!res.ok) {
      throw new ControllerRejectedError(res.status, `Controller ${method} ${path} → ${res.status}: ${describe(json)}`);
    }
    return json;
  }
}

function enc(value: string): string {
  return encodeURIComponent(value);
}

function describe(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return JSON.stringify(body);
}
