/**
 * Heartbeat emitter: one billing tick per interval, driven by a timer, never by log output.
 * Unacknowledged ticks are re-sent in order before newer ones.
 */

import { EventEmitter } from 'events';
import { errorMessage } from '../errors.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import type { HeartbeatReply } from '../types/jobs.js';
import type { ControllerClient } from './controller-client.js';

export interface HeartbeatEmitterOptions {
  jobId: string;
  tickSeconds: number;
  client: ControllerClient;
  /** Sampled when a tick closes. */
  isAlive: () => boolean;
  logger?: Logger;
}

/**
 * Events:
 *   'billed' (reply)  a tick was accepted (or already had been)
 *   'halt'   (reply)  controller answered continue=false; the sandbox must die
 */
export class HeartbeatEmitter extends EventEmitter {
  private readonly log: Logger;
  private interval: NodeJS.Timeout | null = null;
  private lastTick = 0;
  private pending: number[] = [];
  private lastSentAt = Date.now();
  private flushing: Promise<void> | null = null;
  private halted = false;

  constructor(private readonly options: HeartbeatEmitterOptions) {
    super();
    this.log = options.logger ?? componentLogger('heartbeat');
  }

  start(): void {
    if (this.interval) {
      this.log.warn({ jobId: this.options.jobId }, 'heartbeat emitter already running');
      return;
    }
    this.lastSentAt = Date.now();
    this.interval = setInterval(() => this.closeTick(), this.options.tickSeconds * 1000);
    this.log.debug({ jobId: this.options.jobId, tickSeconds: this.options.tickSeconds }, 'heartbeat emitter started');
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }

  get ticksClosed(): number {
    return this.lastTick;
  }

  get unacknowledged(): readonly number[] {
    return this.pending;
  }

  /** Resolves when no send is in flight. */
  async idle(): Promise<void> {
    while (this.flushing) await this.flushing;
  }

  private closeTick(): void {
    if (this.halted) return;
    this.lastTick += 1;
    this.pending.push(this.lastTick);
    this.flush();
  }

  private flush(): void {
    if (this.flushing) return;
    this.flushing = this.sendPending()
      .catch((err: unknown) => {
        this.log.warn({ jobId: this.options.jobId, err: errorMessage(err) }, 'heartbeat failed, will resend');
      })
      .finally(() => {
        this.flushing = null;
      });
  }

  private async sendPending(): Promise<void> {
    while (!this.halted) {
      const tickSeq = this.pending[0];
      if (tickSeq === undefined) return;

      const now = Date.now();
      const reply = await this.options.client.sendHeartbeat({
        jobId: this.options.jobId,
        tickSeq,
        workerTimestamp: new Date(now).toISOString(),
        elapsedSecondsSinceLastHeartbeat: Math.round((now - this.lastSentAt) / 1000),
        sandboxAlive: this.options.isAlive(),
      });
      this.lastSentAt = now;

      if (!reply.continue) {
        this.halted = true;
        this.stop();
        this.log.info({ jobId: this.options.jobId, tickSeq, status: reply.status }, 'controller halted the job');
        this.emit('halt', reply);
        return;
      }
      if (!this.settle(tickSeq, reply)) return;
    }
  }

  /** Drops acknowledged ticks. False means: stop sending until the next tick closes. */
  private settle(tickSeq: number, reply: HeartbeatReply): boolean {
    switch (reply.status) {
      case 'billed':
      case 'duplicate':
        this.pending = this.pending.filter((t) => t > tickSeq);
        this.emit('billed', reply);
        return true;
      case 'out_of_order':
        // Controller already has everything below expectedSeq.
        this.pending = this.pending.filter((t) => t >= reply.expectedSeq);
        if (reply.expectedSeq < tickSeq) {
          this.log.error({ jobId: this.options.jobId, tickSeq, expectedSeq: reply.expectedSeq }, 'controller is behind the worker');
          return false;
        }
        return true;
      case 'ahead_of_clock':
      case 'dropped':
      case 'insufficient_funds':
        return false;
      default: {
        const unreachable: never = reply.status;
        return unreachable;
      }
    }
  }
}
