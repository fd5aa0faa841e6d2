/**
 * Billing heartbeat coordinator — the authoritative metering clock.
 *
 * Per running job it bills one tick per heartbeat, in strict tick order, and owns the
 * watchdogs that force every job to a terminal status in bounded time:
 *   heartbeat   T + grace without a billed tick  → failed / heartbeat_timeout
 *   prepare     setup takes too long             → failed / prepare_timeout
 *   runtime     job exceeds timeout_seconds      → termination 'timeout'
 *   kill ack    worker never confirms a kill     → termination outcome, escalated
 *
 * Termination tie-break: the first request durably written on the job record wins
 * (its `seq` is the record version at that write). A later cancel reports the pending
 * outcome instead of replacing it.
 */

import crypto from 'crypto';
import type { BillingConfig } from '../config.js';
import {
  AlreadyTerminalError,
  InsufficientFundsError,
  LedgerHaltedError,
  LedgerIntegrityError,
  NotOwnerError,
  errorMessage,
} from '../errors.js';
import { KeyedMutex } from '../lib/keyed-mutex.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import { tickCost } from '../lib/money.js';
import type {
  AcceptReply,
  CancelResult,
  ControlReply,
  ExitReason,
  ExitReport,
  Heartbeat,
  HeartbeatReply,
  JobRecord,
  KillAck,
  TerminalStatus,
  TerminationKind,
} from '../types/jobs.js';
import type { AuditRecorder } from './auditService.js';
import { exitOutcome, exitReasonOf, isTerminal, outcomeOf } from './job-state.js';
import type { JobStore } from './job-store.js';
import type { KillChannel } from './kill-channel.js';
import type { WalletLedger } from './wallet.js';

type WatchKind = 'heartbeat' | 'prepare' | 'runtime' | 'killAck';

export interface CoordinatorDeps {
  jobs: JobStore;
  ledger: WalletLedger;
  kills: KillChannel;
  audit: AuditRecorder;
  billing: BillingConfig;
  logger?: Logger;
}

export interface TerminationResult {
  job: JobRecord;
  outcome: TerminalStatus;
  /** False when an earlier request was already pending (or the job already ended). */
  recorded: boolean;
}

interface FinalizeOptions {
  exitCode?: number | null;
  errorMessage?: string | null;
}

export class BillingCoordinator {
  private readonly jobs: JobStore;
  private readonly ledger: WalletLedger;
  private readonly kills: KillChannel;
  private readonly audit: AuditRecorder;
  private readonly billing: BillingConfig;
  private readonly log: Logger;

  private readonly locks = new KeyedMutex();
  private readonly timers = new Map<string, Map<WatchKind, NodeJS.Timeout>>();
  private readonly inflight = new Set<Promise<void>>();
  private stopped = false;

  constructor(deps: CoordinatorDeps) {
    this.jobs = deps.jobs;
    this.ledger = deps.ledger;
    this.kills = deps.kills;
    this.audit = deps.audit;
    this.billing = deps.billing;
    this.log = deps.logger ?? componentLogger('billing');
  }

  // ── Dispatch and start ─────────────────────────────────────────────────

  /** Worker took the dispatch message: pending → preparing. */
  async accept(jobId: string, workerId: string): Promise<AcceptReply> {
    return this.locks.run(jobId, async () => {
      const job = await this.jobs.get(jobId);
      if (!job) return { accepted: false, reason: 'unknown job' };
      if (job.status !== 'pending') return { accepted: false, reason: `job is ${job.status}` };

      const { job: prepared } = await this.jobs.mutate(jobId, (cur) =>
        cur.status === 'pending' ? { ...cur, status: 'preparing', workerId } : null,
      );
      if (prepared.status !== 'preparing') return { accepted: false, reason: `job is ${prepared.status}` };

      this.arm(jobId, 'prepare', this.billing.prepareTimeoutSeconds, () => this.onPrepareTimeout(jobId));
      this.log.info({ jobId, workerId }, 'job accepted by worker');
      return {
        accepted: true,
        spec: {
          jobId,
          dockerImage: prepared.dockerImage,
          entrypoint: prepared.entrypoint,
          resourceConfig: prepared.resourceConfig,
          inputPaths: prepared.inputPaths,
          tickSeconds: prepared.tickSeconds,
        },
      };
    });
  }

  /** Sandbox process is up: preparing → running, metering starts now. */
  async markRunning(jobId: string, sandboxId: string): Promise<ControlReply> {
    return this.locks.run(jobId, async () => {
      const job = await this.jobs.require(jobId);
      if (job.status !== 'preparing' || job.termination) {
        this.log.warn({ jobId, status: job.status }, 'start report for a job that must not run');
        return { continue: false };
      }
      const { job: running } = await this.jobs.mutate(jobId, (cur) => ({
        ...cur,
        status: 'running',
        sandboxId,
        startedAt: new Date().toISOString(),
      }));
      this.disarm(jobId, 'prepare');
      this.armHeartbeat(jobId, running);
      this.arm(jobId, 'runtime', running.resourceConfig.timeoutSeconds, () =>
        this.terminateFromTimer(jobId, 'timeout'),
      );
      this.log.info({ jobId, sandboxId }, 'job running');
      return { continue: true };
    });
  }

  // ── Metering ───────────────────────────────────────────────────────────

  async heartbeat(hb: Heartbeat): Promise<HeartbeatReply> {
    return this.locks.run(hb.jobId, async () => {
      const job = await this.jobs.require(hb.jobId);
      const expectedSeq = job.ticksBilled + 1;

      if (isTerminal(job.status) || job.termination) {
        this.log.debug({ jobId: job.id, tickSeq: hb.tickSeq, status: job.status }, 'heartbeat dropped');
        return { status: 'dropped', expectedSeq, continue: false };
      }
      if (job.status !== 'running') {
        return { status: 'dropped', expectedSeq, continue: true };
      }
      if (!hb.sandboxAlive) {
        this.log.info({ jobId: job.id, tickSeq: hb.tickSeq }, 'heartbeat reports dead sandbox, not billed');
        return { status: 'dropped', expectedSeq, continue: false };
      }
      if (hb.tickSeq < expectedSeq) return { status: 'duplicate', expectedSeq, continue: true };
      if (hb.tickSeq > expectedSeq) {
        this.log.warn({ jobId: job.id, tickSeq: hb.tickSeq, expectedSeq }, 'out-of-order heartbeat rejected');
        return { status: 'out_of_order', expectedSeq, continue: true };
      }

      const startedAt = job.startedAt ? Date.parse(job.startedAt) : Date.now();
      const elapsedMs = Date.now() - startedAt;
      if (hb.tickSeq * job.tickSeconds * 1000 > elapsedMs + this.billing.heartbeatGraceSeconds * 1000) {
        this.log.warn({ jobId: job.id, tickSeq: hb.tickSeq, elapsedMs }, 'heartbeat ahead of the clock');
        return { status: 'ahead_of_clock', expectedSeq, continue: true };
      }

      const cost = tickCost(job.ratePerMinute, job.tickSeconds);
      try {
        const debit = await this.ledger.debit(job.ownerId, cost, job.id, hb.tickSeq, cost);
        const { job: billed } = await this.jobs.mutate(job.id, (cur) => ({
          ...cur,
          ticksBilled: hb.tickSeq,
          totalCost: hb.tickSeq * cost,
          runtimeSeconds: hb.tickSeq * cur.tickSeconds,
        }));
        this.armHeartbeat(job.id, billed);
        this.log.debug({ jobId: job.id, tickSeq: hb.tickSeq, balance: debit.balanceAfter }, 'tick billed');
        return {
          status: 'billed',
          expectedSeq: hb.tickSeq + 1,
          continue: true,
          balance: debit.balanceAfter,
          totalCost: billed.totalCost,
        };
      } catch (err: unknown) {
        if (err instanceof InsufficientFundsError) {
          this.log.info({ jobId: job.id, tickSeq: hb.tickSeq }, 'funds exhausted, killing job');
          await this.recordTermination(job.id, 'insufficient_credits', 'billing');
          return { status: 'insufficient_funds', expectedSeq, continue: false };
        }
        if (err instanceof LedgerHaltedError || err instanceof LedgerIntegrityError) {
          this.log.fatal({ jobId: job.id, tickSeq: hb.tickSeq, err: err.message }, 'billing halted for job');
          await this.recordTermination(job.id, 'billing_halted', 'billing');
          return { status: 'dropped', expectedSeq, continue: false };
        }
        throw err;
      }
    });
  }

  // ── Termination ────────────────────────────────────────────────────────

  async cancel(jobId: string, requesterId: string): Promise<CancelResult> {
    return this.locks.run(jobId, async () => {
      const job = await this.jobs.require(jobId);
      if (job.ownerId !== requesterId) throw new NotOwnerError(jobId);
      if (isTerminal(job.status)) throw new AlreadyTerminalError(jobId, job.status);
      const result = await this.recordTermination(jobId, 'cancel', requesterId);
      return { jobId, accepted: true, outcome: result.outcome, status: result.job.status };
    });
  }

  async requestTermination(jobId: string, kind: TerminationKind, actor: string): Promise<TerminationResult> {
    return this.locks.run(jobId, () => this.recordTermination(jobId, kind, actor));
  }

  async onKillAck(ack: KillAck): Promise<void> {
    await this.locks.run(ack.jobId, async () => {
      this.kills.ack(ack.jobId, ack.commandId);
      const job = await this.jobs.get(ack.jobId);
      if (!job || isTerminal(job.status) || !job.termination) return;
      await this.finalize(job, outcomeOf(job.termination.kind), exitReasonOf(job.termination.kind), {
        exitCode: ack.exitCode,
      });
    });
  }

  async onExit(report: ExitReport): Promise<void> {
    await this.locks.run(report.jobId, async () => {
      const job = await this.jobs.require(report.jobId);
      this.kills.clear(job.id);
      if (isTerminal(job.status)) {
        this.log.info({ jobId: job.id, status: job.status, reason: report.reason }, 'exit report for finished job');
        return;
      }
      const extra = { exitCode: report.exitCode, errorMessage: report.error ?? null };
      if (job.termination) {
        await this.finalize(job, outcomeOf(job.termination.kind), exitReasonOf(job.termination.kind), extra);
        return;
      }
      let { status, exitReason } = exitOutcome(report.reason, report.exitCode);
      // A process never reported as started cannot complete.
      if (job.status !== 'running' && status === 'completed') {
        status = 'failed';
        exitReason = 'setup_error';
      }
      await this.finalize(job, status, exitReason, extra);
    });
  }

  /** Pending job that never reached a worker (dispatch budget spent). */
  async failPending(jobId: string, exitReason: ExitReason, message: string): Promise<JobRecord> {
    return this.locks.run(jobId, async () => {
      const job = await this.jobs.require(jobId);
      if (job.status !== 'pending') return job;
      return this.finalize(job, 'failed', exitReason, { errorMessage: message });
    });
  }

  // ── Recovery and lifecycle ─────────────────────────────────────────────

  /**
   * Re-arm watchdogs after a controller restart and reconcile billed ticks from the
   * ledger, which is authoritative when a job write was lost after its debit.
   */
  async recover(): Promise<number> {
    const active = await this.jobs.listByStatus(['preparing', 'running']);
    for (const stale of active) {
      await this.locks.run(stale.id, async () => {
        const job = await this.reconcileTicks(stale);
        if (job.termination) {
          this.kills.issue(job.id, job.termination.kind, job.termination.commandId);
          this.arm(job.id, 'killAck', this.billing.killAckTimeoutSeconds, () => this.onKillAckTimeout(job.id));
        } else if (job.status === 'preparing') {
          this.arm(job.id, 'prepare', this.billing.prepareTimeoutSeconds, () => this.onPrepareTimeout(job.id));
        } else {
          this.armHeartbeat(job.id, job);
          const startedAt = job.startedAt ? Date.parse(job.startedAt) : Date.now();
          const remaining = Math.max(0, job.resourceConfig.timeoutSeconds - (Date.now() - startedAt) / 1000);
          this.arm(job.id, 'runtime', remaining, () => this.terminateFromTimer(job.id, 'timeout'));
        }
      });
    }
    if (active.length > 0) this.log.info({ count: active.length }, 'recovered active jobs');
    return active.length;
  }

  /** Resolves once no timer-driven work is running. */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  async stop(): Promise<void> {
    this.stopped = true;
    for (const jobId of [...this.timers.keys()]) this.disarmAll(jobId);
    await this.idle();
  }

  armedWatchdogs(jobId: string): WatchKind[] {
    return [...(this.timers.get(jobId)?.keys() ?? [])];
  }

  // ── Internals ──────────────────────────────────────────────────────────

  /** Caller holds the job lock. */
  private async recordTermination(jobId: string, kind: TerminationKind, actor: string): Promise<TerminationResult> {
    const job = await this.jobs.require(jobId);
    if (isTerminal(job.status)) {
      return { job, outcome: job.status, recorded: false };
    }
    if (job.termination) {
      return { job, outcome: outcomeOf(job.termination.kind), recorded: false };
    }

    // Nothing runs yet: cancel is final immediately.
    if (job.status === 'pending') {
      const ended = await this.finalize(job, outcomeOf(kind), exitReasonOf(kind));
      return { job: ended, outcome: outcomeOf(kind), recorded: true };
    }

    const commandId = crypto.randomUUID();
    const { job: marked } = await this.jobs.mutate(jobId, (cur) =>
      cur.termination || isTerminal(cur.status)
        ? null
        : {
            ...cur,
            termination: { kind, seq: cur.version, requestedAt: new Date().toISOString(), commandId },
          },
    );
    const winner = marked.termination;
    if (!winner || winner.commandId !== commandId) {
      return { job: marked, outcome: winner ? outcomeOf(winner.kind) : outcomeOf(kind), recorded: false };
    }

    this.disarm(jobId, 'heartbeat');
    this.disarm(jobId, 'runtime');
    this.disarm(jobId, 'prepare');
    this.kills.issue(jobId, kind, commandId);
    this.arm(jobId, 'killAck', this.billing.killAckTimeoutSeconds, () => this.onKillAckTimeout(jobId));
    await this.releaseReservation(marked);

    this.log.info({ jobId, kind, seq: winner.seq, actor }, 'kill command issued');
    void this.audit.record({ actor, action: 'job.kill_issued', resourceId: jobId, details: { kind, seq: winner.seq } });
    return { job: marked, outcome: outcomeOf(kind), recorded: true };
  }

  /** Caller holds the job lock. */
  private async finalize(
    job: JobRecord,
    status: TerminalStatus,
    exitReason: ExitReason,
    opts: FinalizeOptions = {},
  ): Promise<JobRecord> {
    this.disarmAll(job.id);
    const endedAt = new Date();
    const { job: ended } = await this.jobs.mutate(job.id, (cur) => {
      if (isTerminal(cur.status)) return null;
      const startedMs = cur.startedAt ? Date.parse(cur.startedAt) : null;
      return {
        ...cur,
        status,
        exitReason,
        endedAt: endedAt.toISOString(),
        runtimeSeconds: startedMs === null ? 0 : Math.max(0, Math.floor((endedAt.getTime() - startedMs) / 1000)),
        exitCode: opts.exitCode ?? cur.exitCode,
        errorMessage: opts.errorMessage ?? cur.errorMessage,
      };
    });
    await this.releaseReservation(ended);
    this.log.info(
      { jobId: ended.id, status: ended.status, exitReason: ended.exitReason, ticks: ended.ticksBilled },
      'job finished',
    );
    return ended;
  }

  private async releaseReservation(job: JobRecord): Promise<void> {
    try {
      const released = await this.ledger.releaseForJob(job.id);
      if (released > 0) this.log.debug({ jobId: job.id, released }, 'reservation returned');
    } catch (err: unknown) {
      // Frozen wallet: the hold stays until an operator reconciles it.
      this.log.error({ jobId: job.id, err: errorMessage(err) }, 'reservation release failed');
      void this.audit.record({
        action: 'ledger.release_failed',
        resourceId: job.ownerId,
        details: { jobId: job.id, error: errorMessage(err) },
      });
    }
  }

  private async reconcileTicks(job: JobRecord): Promise<JobRecord> {
    const debits = await this.ledger.jobDebits(job.id);
    let ticks = 0;
    let total = 0;
    for (const d of debits) {
      if (d.tickSeq !== ticks + 1) break;
      ticks = d.tickSeq;
      total += d.amount;
    }
    if (ticks <= job.ticksBilled) return job;
    this.log.warn({ jobId: job.id, recorded: job.ticksBilled, ledger: ticks }, 'reconciled billed ticks from ledger');
    const { job: fixed } = await this.jobs.mutate(job.id, (cur) => ({
      ...cur,
      ticksBilled: ticks,
      totalCost: total,
      runtimeSeconds: ticks * cur.tickSeconds,
    }));
    return fixed;
  }

  private async onHeartbeatTimeout(jobId: string): Promise<void> {
    await this.locks.run(jobId, async () => {
      const job = await this.jobs.get(jobId);
      if (!job || job.status !== 'running' || job.termination) return;
      this.kills.issue(jobId, 'best_effort');
      await this.finalize(job, 'failed', 'heartbeat_timeout', {
        errorMessage: `no heartbeat within ${job.tickSeconds + this.billing.heartbeatGraceSeconds}s`,
      });
      this.log.warn({ jobId, ticks: job.ticksBilled }, 'heartbeat timeout, job failed');
      void this.audit.record({ action: 'job.heartbeat_timeout', resourceId: jobId, details: { ticksBilled: job.ticksBilled } });
    });
  }

  private async onPrepareTimeout(jobId: string): Promise<void> {
    await this.locks.run(jobId, async () => {
      const job = await this.jobs.get(jobId);
      if (!job || job.status !== 'preparing' || job.termination) return;
      this.kills.issue(jobId, 'best_effort');
      await this.finalize(job, 'failed', 'prepare_timeout', {
        errorMessage: `sandbox not started within ${this.billing.prepareTimeoutSeconds}s`,
      });
      void this.audit.record({ action: 'job.prepare_timeout', resourceId: jobId });
    });
  }

  private async onKillAckTimeout(jobId: string): Promise<void> {
    await this.locks.run(jobId, async () => {
      const job = await this.jobs.get(jobId);
      if (!job || isTerminal(job.status) || !job.termination) return;
      const { kind } = job.termination;
      // The worker is presumed gone; stop offering it the command.
      this.kills.clear(jobId);
      await this.finalize(job, outcomeOf(kind), exitReasonOf(kind), {
        errorMessage: `kill not acknowledged within ${this.billing.killAckTimeoutSeconds}s`,
      });
      this.log.warn({ jobId, kind }, 'kill acknowledgment timed out, job closed by controller');
      void this.audit.record({ action: 'job.kill_escalated', resourceId: jobId, details: { kind } });
    });
  }

  private async terminateFromTimer(jobId: string, kind: TerminationKind): Promise<void> {
    await this.requestTermination(jobId, kind, 'controller');
  }

  private armHeartbeat(jobId: string, job: JobRecord): void {
    this.arm(jobId, 'heartbeat', job.tickSeconds + this.billing.heartbeatGraceSeconds, () =>
      this.onHeartbeatTimeout(jobId),
    );
  }

  private arm(jobId: string, kind: WatchKind, seconds: number, fire: () => Promise<void>): void {
    if (this.stopped) return;
    this.disarm(jobId, kind);
    const timer = setTimeout(() => {
      this.timers.get(jobId)?.delete(kind);
      this.track(fire());
    }, seconds * 1000);
    timer.unref();
    let perJob = this.timers.get(jobId);
    if (!perJob) {
      perJob = new Map();
      this.timers.set(jobId, perJob);
    }
    perJob.set(kind, timer);
  }

  private disarm(jobId: string, kind: WatchKind): void {
    const perJob = this.timers.get(jobId);
    const timer = perJob?.get(kind);
    if (timer) clearTimeout(timer);
    perJob?.delete(kind);
    if (perJob && perJob.size === 0) this.timers.delete(jobId);
  }

  private disarmAll(jobId: string): void {
    const perJob = this.timers.get(jobId);
    if (!perJob) return;
    for (const timer of perJob.values()) clearTimeout(timer);
    this.timers.delete(jobId);
  }

  private track(work: Promise<void>): void {
    const tracked = work.catch((err: unknown) => {
      this.log.error({ err: errorMessage(err) }, 'watchdog handler failed');
    });
    this.inflight.add(tracked);
    void tracked.finally(() => this.inflight.delete(tracked));
  }
}
