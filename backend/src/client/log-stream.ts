/**
 * Reconnecting log stream consumer.
 *
 * Follows /api/jobs/:id/logs/stream. After a dropped connection it reconnects with
 * bounded backoff and resumes after the last sequence number it saw, so replayed events
 * are not emitted twice. The stream ends with the job's final status event, or with
 * `null` once reconnect attempts are exhausted or the server refuses the stream.
 *
 * Events: 'log' (event), 'gap' (event), 'status' (event), 'end' (final status | null),
 *         'error' (Error)
 */

import { EventEmitter } from 'events';
import WebSocket from 'ws';
import { errorMessage } from '../errors.js';
import { DEFAULT_BACKOFF, backoffDelay, type BackoffPolicy } from '../lib/backoff.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import type { RelayEvent } from '../types/jobs.js';
import { RelayEventSchema } from '../types/protocol.js';

const CLOSE_POLICY = 1008;

export interface StreamSocket {
  on(event: 'open' | 'message' | 'close' | 'error', listener: (...args: never[]) => void): unknown;
  close(code?: number): void;
}

export type Connect = (url: string) => StreamSocket;

export interface LogStreamOptions {
  /** Controller base URL, http(s) or ws(s). */
  baseUrl: string;
  jobId: string;
  token: string;
  /** `maxAttempts` counts consecutive connections that closed without a new event. */
  reconnect?: BackoffPolicy;
  connect?: Connect;
  logger?: Logger;
}

export type FinalStatus = Extract<RelayEvent, { type: 'status' }>;

export class LogStreamClient extends EventEmitter {
  private readonly policy: BackoffPolicy;
  private readonly connect: Connect;
  private readonly log: Logger;
  private socket: StreamSocket | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private failures = 0;
  private seq = 0;
  private ended = false;
  private readonly finished: Promise<FinalStatus | null>;

  constructor(private readonly options: LogStreamOptions) {
    super();
    this.policy = options.reconnect ?? DEFAULT_BACKOFF;
    this.connect = options.connect ?? ((url) => new WebSocket(url));
    this.log = options.logger ?? componentLogger('log-stream');
    this.finished = new Promise((resolve) => this.once('end', resolve));
  }

  /** Highest sequence number received. */
  get lastSeq(): number {
    return this.seq;
  }

  start(): this {
    this.open();
    return this;
  }

  stop(): void {
    this.finish(null);
  }

  /** Resolves with the final status event, or null if the stream was abandoned. */
  done(): Promise<FinalStatus | null> {
    return this.finished;
  }

  url(): string {
    const base = this.options.baseUrl.replace(/^http/, 'ws').replace(/\/+$/, '');
    const params = new URLSearchParams({ token: this.options.token, after: String(this.seq) });
    return `${base}/api/jobs/${encodeURIComponent(this.options.jobId)}/logs/stream?${params.toString()}`;
  }

  private open(): void {
    if (this.ended) return;
    const socket = this.connect(this.url());
    this.socket = socket;

    socket.on('open', () => {
      this.log.debug({ jobId: this.options.jobId, after: this.seq }, 'log stream connected');
    });
    socket.on('message', (data: unknown) => this.receive(data));
    socket.on('error', (err: Error) => {
      this.log.debug({ jobId: this.options.jobId, err: err.message }, 'log stream socket error');
    });
    socket.on('close', (code: number) => {
      if (this.socket === socket) this.socket = null;
      this.onClose(code);
    });
  }

  private receive(data: unknown): void {
    let event: RelayEvent;
    try {
      const parsed = RelayEventSchema.safeParse(JSON.parse(decode(data)));
      if (!parsed.success) throw new Error(parsed.error.message);
      event = parsed.data;
    } catch (err: unknown) {
      this.fail(new Error(`Malformed stream event: ${errorMessage(err)}`));
      return;
    }

    if (event.type === 'gap') {
      if (event.seq > this.seq) this.failures = 0;
      this.seq = Math.max(this.seq, event.seq);
      this.emit('gap', event);
      return;
    }
    // Replay after a reconnect overlaps what we already have.
    if (event.seq <= this.seq) return;
    this.seq = event.seq;
    this.failures = 0;

    if (event.type === 'log') {
      this.emit('log', event);
      return;
    }
    this.emit('status', event);
    if (event.final) this.finish(event);
  }

  private onClose(code: number): void {
    if (this.ended) return;
    if (code === CLOSE_POLICY) {
      this.log.warn({ jobId: this.options.jobId }, 'log stream refused by server');
      this.finish(null);
      return;
    }
    this.failures += 1;
    if (this.failures >= this.policy.maxAttempts) {
      this.fail(new Error(`Log stream for ${this.options.jobId} lost after ${this.failures} attempts`));
      this.finish(null);
      return;
    }
    const delayMs = backoffDelay(this.failures, this.policy);
    this.log.debug({ jobId: this.options.jobId, attempt: this.failures, delayMs }, 'log stream reconnecting');
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.open();
    }, delayMs);
  }

  /** 'error' is only emitted to a listener; an unhandled one would throw. */
  private fail(err: Error): void {
    if (this.listenerCount('error') > 0) this.emit('error', err);
    else this.log.warn({ jobId: this.options.jobId, err: err.message }, 'log stream error');
  }

  private finish(final: FinalStatus | null): void {
    if (this.ended) return;
    this.ended = true;
    if (this.retryTimer) clearTimeout(this.retryTimer);
    this.retryTimer = null;
    const socket = this.socket;
    this.socket = null;
    socket?.close();
    this.emit('end', final);
  }
}

function decode(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) {
    return Buffer.concat(data.filter((part): part is Buffer => Buffer.isBuffer(part))).toString('utf8');
  }
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return String(data);
}
