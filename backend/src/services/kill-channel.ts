/**
 * Controller → worker kill commands. Delivery is at-least-once: a command stays
 * pending and is handed out on every poll until the worker acknowledges it.
 * Best-effort kills go to jobs the controller has already closed; they expire after
 * `bestEffortTtlMs` whether or not a worker ever picks them up.
 */

import crypto from 'crypto';
import type { KillCommand, TerminationKind } from '../types/jobs.js';

export interface KillChannelOptions {
  bestEffortTtlMs?: number;
}

interface PendingKill {
  command: KillCommand;
  expiresAt: number | null;
}

export class KillChannel {
  private readonly pending = new Map<string, PendingKill[]>();
  private readonly bestEffortTtlMs: number;

  constructor(options: KillChannelOptions = {}) {
    this.bestEffortTtlMs = options.bestEffortTtlMs ?? 180_000;
  }

  /** Queue a kill. Issuing an already pending `commandId` returns the existing command. */
  issue(jobId: string, kind: TerminationKind | 'best_effort', commandId: string = crypto.randomUUID()): KillCommand {
    this.prune();
    const queue = this.pending.get(jobId) ?? [];
    const existing = queue.find((p) => p.command.commandId === commandId);
    if (existing) return existing.command;
    const now = Date.now();
    const command: KillCommand = { commandId, jobId, kind, issuedAt: new Date(now).toISOString() };
    queue.push({ command, expiresAt: kind === 'best_effort' ? now + this.bestEffortTtlMs : null });
    this.pending.set(jobId, queue);
    return command;
  }

  commandsFor(jobId: string): KillCommand[] {
    this.prune();
    return (this.pending.get(jobId) ?? []).map((p) => p.command);
  }

  /** True when the command was pending. */
  ack(jobId: string, commandId: string): boolean {
    const queue = this.pending.get(jobId);
    if (!queue) return false;
    const remaining = queue.filter((p) => p.command.commandId !== commandId);
    if (remaining.length === 0) this.pending.delete(jobId);
    else this.pending.set(jobId, remaining);
    return remaining.length !== queue.length;
  }

  clear(jobId: string): void {
    this.pending.delete(jobId);
  }

  /** Jobs with at least one live command. */
  size(): number {
    this.prune();
    return this.pending.size;
  }

  private prune(): void {
    const now = Date.now();
    for (const [jobId, queue] of this.pending) {
      const live = queue.filter((p) => p.expiresAt === null || p.expiresAt > now);
      if (live.length === 0) this.pending.delete(jobId);
      else if (live.length !== queue.length) this.pending.set(jobId, live);
    }
  }
}
