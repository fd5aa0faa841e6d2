import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AlreadyTerminalError, NotOwnerError } from '../errors.js';
import { BillingCoordinator } from '../services/billing.js';
import { KillChannel } from '../services/kill-channel.js';
import type { HeartbeatReply, JobRecord, KillCommand } from '../types/jobs.js';
import {
  BILLING,
  createBillingHarness,
  heartbeat,
  makeJob,
  startRunningJob,
  type BillingHarness,
} from './setup.js';

const USER = 'user-001';

function elapse(seconds: number): Promise<void> {
  return vi.advanceTimersByTimeAsync(seconds * 1000).then(() => undefined);
}

function onlyCommand(commands: KillCommand[]): KillCommand {
  const [command] = commands;
  if (!command || commands.length !== 1) throw new Error(`expected one kill command, got ${commands.length}`);
  return command;
}

describe('Billing Coordinator', () => {
  let h: BillingHarness;

  /** One tick of wall time, then that tick's heartbeat. */
  async function bill(jobId: string, tickSeq: number) {
    await elapse(60);
    return h.coordinator.heartbeat(heartbeat(jobId, tickSeq));
  }

  async function createPendingJob(overrides: Partial<JobRecord> = {}): Promise<JobRecord> {
    const id = overrides.id ?? 'job-001';
    await h.ledger.credit(USER, 500, `topup-${id}`);
    const token = await h.ledger.reserve(USER, 100, id);
    return h.store.create(makeJob({ id, reservationId: token.reservationId, ...overrides }));
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
    h = createBillingHarness();
  });

  afterEach(async () => {
    await h.coordinator.stop();
    vi.useRealTimers();
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Metering
  // ═══════════════════════════════════════════════════════════════════════════
  describe('heartbeat metering', () => {
    it('should bill four ticks and kill the job when the fifth cannot be paid', async () => {
      const job = await startRunningJob(h, { funds: 500, reserve: 100 });

      const replies: HeartbeatReply[] = [];
      for (let tick = 1; tick <= 4; tick++) replies.push(await bill(job.id, tick));

      expect(replies.map((r) => r.status)).toEqual(['billed', 'billed', 'billed', 'billed']);
      expect(replies.map((r) => r.balance)).toEqual([400, 300, 200, 100]);
      expect(await h.store.require(job.id)).toMatchObject({ status: 'running', ticksBilled: 4, totalCost: 400 });

      const fifth = await bill(job.id, 5);

      expect(fifth).toEqual({ status: 'insufficient_funds', expectedSeq: 5, continue: false });
      expect(await h.ledger.getBalance(USER)).toMatchObject({ balance: 100, reserved: 0, available: 100 });
      const command = onlyCommand(h.kills.commandsFor(job.id));
      expect(command.kind).toBe('insufficient_credits');

      await h.coordinator.onKillAck({ jobId: job.id, commandId: command.commandId, exitCode: 137 });

      expect(await h.store.require(job.id)).toMatchObject({
        status: 'killed_no_credits',
        exitReason: 'insufficient_credits',
        exitCode: 137,
        ticksBilled: 4,
        totalCost: 400,
      });
      expect(h.kills.commandsFor(job.id)).toEqual([]);
    });

    it('should return the unused hold when a job completes naturally', async () => {
      const job = await startRunningJob(h, { funds: 500, reserve: 200 });

      const reply = await bill(job.id, 1);
      await h.coordinator.onExit({ jobId: job.id, exitCode: 0, reason: 'exited' });

      expect(reply).toMatchObject({ status: 'billed', expectedSeq: 2, balance: 400, totalCost: 100 });
      expect(await h.store.require(job.id)).toMatchObject({
        status: 'completed',
        exitReason: 'exit_success',
        ticksBilled: 1,
        totalCost: 100,
      });
      const txs = await h.ledger.transactions(USER, { limit: 10 });
      expect(txs.map((t) => `${t.type}:${t.amount}`)).toEqual(['release:100', 'debit:100', 'reservation:200', 'credit:500']);
      expect(await h.ledger.getBalance(USER)).toMatchObject({ balance: 400, reserved: 0 });
    });

    it('should answer a replayed tick as a duplicate without charging again', async () => {
      const job = await startRunningJob(h);
      await bill(job.id, 1);

      const replay = await h.coordinator.heartbeat(heartbeat(job.id, 1));

      expect(replay).toEqual({ status: 'duplicate', expectedSeq: 2, continue: true });
      expect((await h.ledger.getBalance(USER)).balance).toBe(400);
    });

    it('should reject a tick that skips ahead of the expected sequence', async () => {
      const job = await startRunningJob(h);
      await elapse(120);

      const reply = await h.coordinator.heartbeat(heartbeat(job.id, 2));

      expect(reply).toEqual({ status: 'out_of_order', expectedSeq: 1, continue: true });
      expect((await h.store.require(job.id)).ticksBilled).toBe(0);
    });

    it('should not bill a tick before its interval has elapsed', async () => {
      const job = await startRunningJob(h);

      const reply = await h.coordinator.heartbeat(heartbeat(job.id, 1));

      expect(reply).toEqual({ status: 'ahead_of_clock', expectedSeq: 1, continue: true });
    });

    it('should not bill a heartbeat that reports a dead sandbox', async () => {
      const job = await startRunningJob(h);
      await elapse(60);

      const reply = await h.coordinator.heartbeat(heartbeat(job.id, 1, false));

      expect(reply).toEqual({ status: 'dropped', expectedSeq: 1, continue: false });
      expect((await h.ledger.getBalance(USER)).balance).toBe(500);
    });

    it('should ignore heartbeats for a job that is still preparing', async () => {
      const job = await createPendingJob();
      await h.coordinator.accept(job.id, 'worker-1');

      const reply = await h.coordinator.heartbeat(heartbeat(job.id, 1));

      expect(reply).toEqual({ status: 'dropped', expectedSeq: 1, continue: true });
    });

    it('should halt billing when the wallet is frozen', async () => {
      const job = await startRunningJob(h);
      await h.ledger.freeze(USER, 'manual review');

      const reply = await bill(job.id, 1);

      expect(reply).toEqual({ status: 'dropped', expectedSeq: 1, continue: false });
      expect((await h.store.require(job.id)).termination?.kind).toBe('billing_halted');
      expect(onlyCommand(h.kills.commandsFor(job.id)).kind).toBe('billing_halted');
      expect(h.audit.actions()).toContain('ledger.release_failed');
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Dispatch and start
  // ═══════════════════════════════════════════════════════════════════════════
  describe('accept / markRunning', () => {
    it('should hand the worker the job spec and move the job to preparing', async () => {
      const job = await createPendingJob();

      const reply = await h.coordinator.accept(job.id, 'worker-1');

      expect(reply).toEqual({
        accepted: true,
        spec: {
          jobId: job.id,
          dockerImage: 'python:3.11-slim',
          entrypoint: 'main.py',
          resourceConfig: job.resourceConfig,
          inputPaths: ['main.py'],
          tickSeconds: 60,
        },
      });
      expect(await h.store.require(job.id)).toMatchObject({ status: 'preparing', workerId: 'worker-1' });
      expect(h.coordinator.armedWatchdogs(job.id)).toEqual(['prepare']);
    });

    it('should refuse a second accept and unknown jobs', async () => {
      const job = await createPendingJob();
      await h.coordinator.accept(job.id, 'worker-1');

      expect(await h.coordinator.accept(job.id, 'worker-2')).toEqual({ accepted: false, reason: 'job is preparing' });
      expect(await h.coordinator.accept('job-missing', 'worker-1')).toEqual({ accepted: false, reason: 'unknown job' });
    });

    it('should tell the worker to stop a sandbox whose job was cancelled during setup', async () => {
      const job = await createPendingJob();
      await h.coordinator.accept(job.id, 'worker-1');
      await h.coordinator.cancel(job.id, USER);

      const reply = await h.coordinator.markRunning(job.id, 'sandbox-1');

      expect(reply).toEqual({ continue: false });
      expect((await h.store.require(job.id)).status).toBe('preparing');
    });

    it('should fail a job that exits before it was reported running', async () => {
      const job = await createPendingJob();
      await h.coordinator.accept(job.id, 'worker-1');

      await h.coordinator.onExit({ jobId: job.id, exitCode: 0, reason: 'exited' });

      expect(await h.store.require(job.id)).toMatchObject({ status: 'failed', exitReason: 'setup_error' });
    });

    it('should map an OOM kill to failed', async () => {
      const job = await startRunningJob(h);

      await h.coordinator.onExit({ jobId: job.id, exitCode: 137, reason: 'oom_killed' });

      expect(await h.store.require(job.id)).toMatchObject({ status: 'failed', exitReason: 'oom_killed', exitCode: 137 });
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Cancellation and tie-break
  // ═══════════════════════════════════════════════════════════════════════════
  describe('cancel', () => {
    it('should cancel a pending job immediately and release its hold', async () => {
      const job = await createPendingJob();

      const result = await h.coordinator.cancel(job.id, USER);

      expect(result).toEqual({ jobId: job.id, accepted: true, outcome: 'cancelled', status: 'cancelled' });
      expect(h.kills.commandsFor(job.id)).toEqual([]);
      expect((await h.ledger.getBalance(USER)).reserved).toBe(0);
    });

    it('should keep a running job running until the worker acknowledges the kill', async () => {
      const job = await startRunningJob(h);

      const result = await h.coordinator.cancel(job.id, USER);

      expect(result).toEqual({ jobId: job.id, accepted: true, outcome: 'cancelled', status: 'running' });
      const command = onlyCommand(h.kills.commandsFor(job.id));
      expect(command.kind).toBe('cancel');
      expect(await h.coordinator.heartbeat(heartbeat(job.id, 1))).toMatchObject({ status: 'dropped', continue: false });

      await h.coordinator.onKillAck({ jobId: job.id, commandId: command.commandId, exitCode: 143 });

      expect(await h.store.require(job.id)).toMatchObject({ status: 'cancelled', exitReason: 'user_cancelled' });
    });

    it('should let exhaustion win over a later cancel', async () => {
      const job = await startRunningJob(h, { funds: 100, reserve: 100 });
      expect((await bill(job.id, 1)).status).toBe('insufficient_funds');

      const result = await h.coordinator.cancel(job.id, USER);

      expect(result.outcome).toBe('killed_no_credits');
      const command = onlyCommand(h.kills.commandsFor(job.id));
      await h.coordinator.onKillAck({ jobId: job.id, commandId: command.commandId, exitCode: 137 });
      expect((await h.store.require(job.id)).status).toBe('killed_no_credits');
    });

    it('should let an earlier cancel win over exhaustion', async () => {
      const job = await startRunningJob(h, { funds: 100, reserve: 100 });
      await h.coordinator.cancel(job.id, USER);

      const reply = await bill(job.id, 1);

      expect(reply.status).toBe('dropped');
      const command = onlyCommand(h.kills.commandsFor(job.id));
      expect(command.kind).toBe('cancel');
      await h.coordinator.onKillAck({ jobId: job.id, commandId: command.commandId, exitCode: 143 });
      expect((await h.store.require(job.id)).status).toBe('cancelled');
    });

    it('should resolve an exit during a pending cancel as cancelled', async () => {
      const job = await startRunningJob(h);
      await h.coordinator.cancel(job.id, USER);

      await h.coordinator.onExit({ jobId: job.id, exitCode: 0, reason: 'exited' });

      expect(await h.store.require(job.id)).toMatchObject({ status: 'cancelled', exitReason: 'user_cancelled', exitCode: 0 });
    });

    it('should reject cancellation by another user and of a finished job', async () => {
      const job = await startRunningJob(h);
      await expect(h.coordinator.cancel(job.id, 'user-002')).rejects.toThrow(NotOwnerError);

      await h.coordinator.onExit({ jobId: job.id, exitCode: 1, reason: 'exited' });

      expect((await h.store.require(job.id)).exitReason).toBe('non_zero_exit');
      await expect(h.coordinator.cancel(job.id, USER)).rejects.toThrow(AlreadyTerminalError);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Watchdogs
  // ═══════════════════════════════════════════════════════════════════════════
  describe('watchdogs', () => {
    it('should fail a job whose heartbeats stop', async () => {
      const job = await startRunningJob(h);
      await bill(job.id, 1);

      await elapse(74);
      expect((await h.store.require(job.id)).status).toBe('running');

      await elapse(1);
      await h.coordinator.idle();

      expect(await h.store.require(job.id)).toMatchObject({
        status: 'failed',
        exitReason: 'heartbeat_timeout',
        errorMessage: 'no heartbeat within 75s',
        ticksBilled: 1,
      });
      expect(onlyCommand(h.kills.commandsFor(job.id)).kind).toBe('best_effort');
      expect((await h.ledger.getBalance(USER)).reserved).toBe(0);
      expect(h.audit.actions()).toContain('job.heartbeat_timeout');
    });

    it('should expire a best-effort kill that no worker picks up', async () => {
      const job = await startRunningJob(h);
      await elapse(75);
      await h.coordinator.idle();
      expect(h.kills.size()).toBe(1);

      await elapse(179);
      expect(onlyCommand(h.kills.commandsFor(job.id)).kind).toBe('best_effort');

      await elapse(1);
      expect(h.kills.commandsFor(job.id)).toEqual([]);
      expect(h.kills.size()).toBe(0);
    });

    it('should fail a job that never starts', async () => {
      const job = await createPendingJob();
      await h.coordinator.accept(job.id, 'worker-1');

      await elapse(600);
      await h.coordinator.idle();

      expect(await h.store.require(job.id)).toMatchObject({ status: 'failed', exitReason: 'prepare_timeout' });
    });

    it('should request termination once the job outlives its timeout', async () => {
      const job = await startRunningJob(h, { timeoutSeconds: 90 });
      await bill(job.id, 1);

      await elapse(30);
      await h.coordinator.idle();

      const command = onlyCommand(h.kills.commandsFor(job.id));
      expect(command.kind).toBe('timeout');
      expect(h.coordinator.armedWatchdogs(job.id)).toEqual(['killAck']);

      await h.coordinator.onKillAck({ jobId: job.id, commandId: command.commandId, exitCode: 143 });
      expect(await h.store.require(job.id)).toMatchObject({ status: 'failed', exitReason: 'timeout' });
    });

    it('should close a job whose kill is never acknowledged', async () => {
      const job = await startRunningJob(h);
      await h.coordinator.cancel(job.id, USER);

      await elapse(180);
      await h.coordinator.idle();

      expect(await h.store.require(job.id)).toMatchObject({
        status: 'cancelled',
        exitReason: 'user_cancelled',
        errorMessage: 'kill not acknowledged within 180s',
      });
      expect(h.audit.actions()).toContain('job.kill_escalated');
      expect(h.kills.commandsFor(job.id)).toEqual([]);
      expect(h.kills.size()).toBe(0);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Recovery
  // ═══════════════════════════════════════════════════════════════════════════
  describe('recover', () => {
    it('should take billed ticks from the ledger after a lost job write', async () => {
      const job = await startRunningJob(h);
      await elapse(60);
      await h.ledger.debit(USER, 100, job.id, 1, 100);
      await h.coordinator.stop();

      const restarted = new BillingCoordinator({ jobs: h.store, ledger: h.ledger, kills: h.kills, audit: h.audit, billing: BILLING });
      expect(await restarted.recover()).toBe(1);

      expect(await h.store.require(job.id)).toMatchObject({ ticksBilled: 1, totalCost: 100 });
      expect(restarted.armedWatchdogs(job.id).sort()).toEqual(['heartbeat', 'runtime']);
      expect(await restarted.heartbeat(heartbeat(job.id, 1))).toMatchObject({ status: 'duplicate', expectedSeq: 2 });
      await restarted.stop();
    });

    it('should re-issue a pending kill to a fresh kill channel', async () => {
      const job = await startRunningJob(h);
      await h.coordinator.cancel(job.id, USER);
      const issued = onlyCommand(h.kills.commandsFor(job.id));
      await h.coordinator.stop();

      const kills = new KillChannel();
      const restarted = new BillingCoordinator({ jobs: h.store, ledger: h.ledger, kills, audit: h.audit, billing: BILLING });
      await restarted.recover();

      expect(onlyCommand(kills.commandsFor(job.id))).toMatchObject({ commandId: issued.commandId, kind: 'cancel' });
      expect(restarted.armedWatchdogs(job.id)).toEqual(['killAck']);
      await restarted.stop();
    });
  });
});
