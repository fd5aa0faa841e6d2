/**
 * Durable controller → worker work queue.
 * A claimed message stays invisible for the visibility timeout; unless acked it is
 * delivered again, so the worker acks only after the job was accepted (late ack).
 */

import crypto from 'crypto';
import type { DispatchMessage } from '../types/jobs.js';

export interface DispatchQueue {
  enqueue(jobId: string): Promise<DispatchMessage>;
  claim(workerId: string, visibilityMs: number): Promise<DispatchMessage | null>;
  ack(messageId: string): Promise<void>;
  /** Put a claimed message back, visible again after `delayMs`. */
  release(messageId: string, delayMs: number): Promise<void>;
  depth(): Promise<number>;
  /** True while the job has a message that is not done. */
  hasOpen(jobId: string): Promise<boolean>;
}

interface QueuedMessage extends DispatchMessage {
  status: 'queued' | 'claimed' | 'done';
  visibleAt: number;
  claimedBy: string | null;
}

export class InMemoryDispatchQueue implements DispatchQueue {
  private readonly messages: QueuedMessage[] = [];

  async enqueue(jobId: string): Promise<DispatchMessage> {
    const msg: QueuedMessage = {
      id: crypto.randomUUID(),
      jobId,
      deliveryCount: 0,
      enqueuedAt: new Date().toISOString(),
      status: 'queued',
      visibleAt: Date.now(),
      claimedBy: null,
    };
    this.messages.push(msg);
    return toMessage(msg);
  }

  async claim(workerId: string, visibilityMs: number): Promise<DispatchMessage | null> {
    const now = Date.now();
    const msg = this.messages.find((m) => m.status !== 'done' && m.visibleAt <= now);
    if (!msg) return null;
    msg.status = 'claimed';
    msg.claimedBy = workerId;
    msg.deliveryCount += 1;
    msg.visibleAt = now + visibilityMs;
    return toMessage(msg);
  }

  async ack(messageId: string): Promise<void> {
    const msg = this.messages.find((m) => m.id === messageId);
    if (msg) msg.status = 'done';
  }

  async release(messageId: string, delayMs: number): Promise<void> {
    const msg = this.messages.find((m) => m.id === messageId);
    if (!msg || msg.status === 'done') return;
    msg.status = 'queued';
    msg.claimedBy = null;
    msg.visibleAt = Date.now() + delayMs;
  }

  async depth(): Promise<number> {
    return this.messages.filter((m) => m.status !== 'done').length;
  }

  async hasOpen(jobId: string): Promise<boolean> {
    return this.messages.some((m) => m.jobId === jobId && m.status !== 'done');
  }
}

function toMessage(m: QueuedMessage): DispatchMessage {
  return { id: m.id, jobId: m.jobId, deliveryCount: m.deliveryCount, enqueuedAt: m.enqueuedAt };
}
