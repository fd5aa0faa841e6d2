/**
 * Log/event relay.
 * Keeps a bounded ring of recent events per job, replays it to late subscribers and
 * fans live events out through per-subscriber queues. Publishing never waits on a
 * subscriber: a full queue drops its oldest event and the subscriber gets a `gap`.
 */

import { componentLogger, type Logger } from '../lib/logger.js';
import { errorMessage } from '../errors.js';
import type { ExitReason, JobStatus, RelayEvent } from '../types/jobs.js';

export type DeliverFn = (event: RelayEvent) => void | Promise<void>;

export interface RelayOptions {
  bufferLines: number;
  queueLimit: number;
  /** How long a finished job's buffer stays available for replay. */
  retentionMs: number;
}

export interface Subscription {
  close(): void;
}

interface Subscriber {
  jobId: string;
  deliver: DeliverFn;
  onEnd: () => void;
  queue: RelayEvent[];
  dropped: number;
  lastDroppedSeq: number;
  draining: boolean;
  closed: boolean;
}

interface JobChannel {
  buffer: RelayEvent[];
  seq: number;
  subscribers: Set<Subscriber>;
  final: boolean;
  cleanup: NodeJS.Timeout | null;
}

export class LogRelay {
  private readonly channels = new Map<string, JobChannel>();

  constructor(
    private readonly options: RelayOptions,
    private readonly log: Logger = componentLogger('log-relay'),
  ) {}

  has(jobId: string): boolean {
    return this.channels.has(jobId);
  }

  /** Buffered events with seq greater than `afterSeq`. */
  snapshot(jobId: string, afterSeq = 0): RelayEvent[] {
    return (this.channels.get(jobId)?.buffer ?? []).filter((e) => e.seq > afterSeq);
  }

  lastSeq(jobId: string): number {
    return this.channels.get(jobId)?.seq ?? 0;
  }

  appendLogs(jobId: string, lines: string[]): void {
    const channel = this.channel(jobId);
    if (channel.final) return;
    const at = new Date().toISOString();
    for (const line of lines) {
      channel.seq += 1;
      this.publish(channel, { type: 'log', jobId, seq: channel.seq, line, at });
    }
  }

  publishStatus(jobId: string, status: JobStatus, final: boolean, exitReason: ExitReason | null): void {
    const channel = this.channel(jobId);
    if (channel.final) return;
    channel.seq += 1;
    this.publish(channel, {
      type: 'status',
      jobId,
      seq: channel.seq,
      status,
      final,
      exitReason,
      at: new Date().toISOString(),
    });
    if (final) {
      channel.final = true;
      channel.cleanup = setTimeout(() => this.drop(jobId), this.options.retentionMs);
      channel.cleanup.unref();
    }
  }

  /**
   * Replays buffered events after `afterSeq`, then tails live events. `onEnd` fires once
   * the final status event was delivered.
   */
  subscribe(jobId: string, afterSeq: number, deliver: DeliverFn, onEnd: () => void = () => {}): Subscription {
    const channel = this.channel(jobId);
    const sub: Subscriber = {
      jobId,
      deliver,
      onEnd,
      queue: channel.buffer.filter((e) => e.seq > afterSeq),
      dropped: 0,
      lastDroppedSeq: 0,
      draining: false,
      closed: false,
    };
    channel.subscribers.add(sub);
    this.schedule(channel, sub);
    return {
      close: () => {
        sub.closed = true;
        channel.subscribers.delete(sub);
      },
    };
  }

  subscriberCount(jobId: string): number {
    return this.channels.get(jobId)?.subscribers.size ?? 0;
  }

  /** Drop every channel and its timers. */
  close(): void {
    for (const jobId of [...this.channels.keys()]) this.drop(jobId);
  }

  private channel(jobId: string): JobChannel {
    let channel = this.channels.get(jobId);
    if (!channel) {
      channel = { buffer: [], seq: 0, subscribers: new Set(), final: false, cleanup: null };
      this.channels.set(jobId, channel);
    }
    return channel;
  }

  private drop(jobId: string): void {
    const channel = this.channels.get(jobId);
    if (!channel) return;
    if (channel.cleanup) clearTimeout(channel.cleanup);
    for (const sub of channel.subscribers) {
      sub.closed = true;
      sub.onEnd();
    }
    this.channels.delete(jobId);
  }

  private publish(channel: JobChannel, event: RelayEvent): void {
    channel.buffer.push(event);
    if (channel.buffer.length > this.options.bufferLines) channel.buffer.shift();
    for (const sub of channel.subscribers) {
      sub.queue.push(event);
      if (sub.queue.length > this.options.queueLimit) {
        const lost = sub.queue.shift();
        sub.dropped += 1;
        if (lost) sub.lastDroppedSeq = lost.seq;
      }
      this.schedule(channel, sub);
    }
  }

  private schedule(channel: JobChannel, sub: Subscriber): void {
    if (sub.draining || sub.closed) return;
    sub.draining = true;
    setImmediate(() => {
      this.drain(channel, sub).catch((err: unknown) => {
        this.log.warn({ err: errorMessage(err) }, 'subscriber drain failed');
      });
    });
  }

  private async drain(channel: JobChannel, sub: Subscriber): Promise<void> {
    try {
      while (!sub.closed) {
        if (sub.dropped > 0) {
          const gap: RelayEvent = {
            type: 'gap',
            jobId: sub.jobId,
            seq: sub.lastDroppedSeq,
            dropped: sub.dropped,
            at: new Date().toISOString(),
          };
          sub.dropped = 0;
          await sub.deliver(gap);
          continue;
        }
        const event = sub.queue.shift();
        if (!event) break;
        await sub.deliver(event);
        if (event.type === 'status' && event.final) {
          sub.closed = true;
          channel.subscribers.delete(sub);
          sub.onEnd();
        }
      }
    } catch (err: unknown) {
      // A subscriber that cannot take events is detached; the job is unaffected.
      this.log.debug({ err: errorMessage(err) }, 'subscriber detached');
      sub.closed = true;
      channel.subscribers.delete(sub);
      sub.onEnd();
    } finally {
      sub.draining = false;
    }
  }
}
