import { describe, it, expect, beforeEach } from 'vitest';
import { InvalidTransitionError, JobNotFoundError } from '../errors.js';
import { InMemoryJobRepository } from '../repositories/job-repository.js';
import {
  assertTransition,
  canTransition,
  exitOutcome,
  exitReasonOf,
  isTerminal,
  outcomeOf,
} from '../services/job-state.js';
import { JobStore, type StatusChange } from '../services/job-store.js';
import { KillChannel } from '../services/kill-channel.js';
import { makeJob } from './setup.js';

describe('Job State Machine', () => {
  // ═══════════════════════════════════════════════════════════════════════════
  // Transitions
  // ═══════════════════════════════════════════════════════════════════════════
  describe('transitions', () => {
    it('should follow pending → preparing → running → terminal', () => {
      expect(canTransition('pending', 'preparing')).toBe(true);
      expect(canTransition('preparing', 'running')).toBe(true);
      expect(canTransition('running', 'completed')).toBe(true);
      expect(canTransition('running', 'killed_no_credits')).toBe(true);
    });

    it('should only allow credit exhaustion from running', () => {
      expect(canTransition('pending', 'killed_no_credits')).toBe(false);
      expect(canTransition('preparing', 'killed_no_credits')).toBe(false);
    });

    it('should never leave a terminal status', () => {
      for (const status of ['completed', 'failed', 'cancelled', 'killed_no_credits'] as const) {
        expect(isTerminal(status)).toBe(true);
        expect(canTransition(status, 'running')).toBe(false);
      }
      expect(() => assertTransition('job-001', 'completed', 'running')).toThrow(InvalidTransitionError);
    });

    it('should not skip preparing', () => {
      expect(canTransition('pending', 'running')).toBe(false);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Outcomes
  // ═══════════════════════════════════════════════════════════════════════════
  describe('outcomes', () => {
    it('should map termination kinds to final statuses', () => {
      expect(outcomeOf('cancel')).toBe('cancelled');
      expect(outcomeOf('insufficient_credits')).toBe('killed_no_credits');
      expect(outcomeOf('timeout')).toBe('failed');
      expect(outcomeOf('billing_halted')).toBe('failed');
      expect(exitReasonOf('cancel')).toBe('user_cancelled');
      expect(exitReasonOf('billing_halted')).toBe('billing_halted');
    });

    it('should map natural exits by exit code and reason', () => {
      expect(exitOutcome('exited', 0)).toEqual({ status: 'completed', exitReason: 'exit_success' });
      expect(exitOutcome('exited', 2)).toEqual({ status: 'failed', exitReason: 'non_zero_exit' });
      expect(exitOutcome('exited', null)).toEqual({ status: 'failed', exitReason: 'non_zero_exit' });
      expect(exitOutcome('oom_killed', 137)).toEqual({ status: 'failed', exitReason: 'oom_killed' });
      expect(exitOutcome('sandbox_error', null)).toEqual({ status: 'failed', exitReason: 'sandbox_error' });
    });
  });
});

describe('Job Store', () => {
  let store: JobStore;

  beforeEach(async () => {
    store = new JobStore(new InMemoryJobRepository());
    await store.create(makeJob());
  });

  it('should bump the version on every write', async () => {
    const { job, changed } = await store.mutate('job-001', (cur) => ({ ...cur, status: 'preparing' }));

    expect(changed).toBe(true);
    expect(job.version).toBe(1);
    expect((await store.require('job-001')).status).toBe('preparing');
  });

  it('should leave the record untouched when the mutation returns null', async () => {
    const { job, changed } = await store.mutate('job-001', () => null);

    expect(changed).toBe(false);
    expect(job.version).toBe(0);
  });

  it('should refuse an illegal status change', async () => {
    await expect(store.mutate('job-001', (cur) => ({ ...cur, status: 'completed' }))).rejects.toThrow(
      InvalidTransitionError,
    );
    expect((await store.require('job-001')).status).toBe('pending');
  });

  it('should announce status changes but not other writes', async () => {
    const changes: StatusChange[] = [];
    const unsubscribe = store.onStatus((change) => changes.push(change));

    await store.mutate('job-001', (cur) => ({ ...cur, workerId: 'worker-1' }));
    await store.mutate('job-001', (cur) => ({ ...cur, status: 'preparing' }));
    unsubscribe();
    await store.mutate('job-001', (cur) => ({ ...cur, status: 'running' }));

    expect(changes.map((c) => `${c.from}→${c.job.status}`)).toEqual(['pending→preparing']);
  });

  it('should serialize concurrent writers without losing updates', async () => {
    await Promise.all(
      Array.from({ length: 5 }, () => store.mutate('job-001', (cur) => ({ ...cur, ticksBilled: cur.ticksBilled + 1 }))),
    );

    expect(await store.require('job-001')).toMatchObject({ ticksBilled: 5, version: 5 });
  });

  it('should throw JobNotFound for an unknown id', async () => {
    await expect(store.require('job-missing')).rejects.toThrow(JobNotFoundError);
    expect(await store.get('job-missing')).toBeNull();
  });

  it('should list by owner newest first', async () => {
    await store.create(makeJob({ id: 'job-002', createdAt: new Date(Date.now() + 60_000).toISOString() }));
    await store.create(makeJob({ id: 'job-003', ownerId: 'user-002' }));

    const jobs = await store.listByOwner('user-001', { limit: 10, offset: 0 });

    expect(jobs.map((j) => j.id)).toEqual(['job-002', 'job-001']);
  });
});

describe('Kill Channel', () => {
  it('should hand out a command on every poll until acknowledged', () => {
    const kills = new KillChannel();
    const command = kills.issue('job-001', 'cancel', 'cmd-1');

    expect(kills.commandsFor('job-001')).toEqual([command]);
    expect(kills.commandsFor('job-001')).toEqual([command]);
    expect(kills.ack('job-001', 'cmd-1')).toBe(true);
    expect(kills.commandsFor('job-001')).toEqual([]);
    expect(kills.ack('job-001', 'cmd-1')).toBe(false);
  });

  it('should not duplicate a re-issued command id', () => {
    const kills = new KillChannel();
    const first = kills.issue('job-001', 'cancel', 'cmd-1');
    const again = kills.issue('job-001', 'cancel', 'cmd-1');

    expect(again).toBe(first);
    expect(kills.commandsFor('job-001')).toHaveLength(1);
  });
});
