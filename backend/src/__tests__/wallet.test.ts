import { describe, it, expect, beforeEach } from 'vitest';
import {
  ConcurrentModificationError,
  InsufficientFundsError,
  LedgerHaltedError,
  LedgerIntegrityError,
  ValidationError,
} from '../errors.js';
import { InMemoryLedgerRepository, type LedgerCommit } from '../repositories/ledger-repository.js';
import { WalletLedger } from '../services/wallet.js';
import { RecordingAudit } from './setup.js';

const USER = 'user-001';
const JOB = 'job-001';

/** Deterministic PRNG (mulberry32) so a failing sequence can be replayed from its seed. */
function seeded(seed: number): (max: number) => number {
  let state = seed;
  return (max) => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return Math.floor((((t ^ (t >>> 14)) >>> 0) / 4294967296) * max);
  };
}

/** Loses the optimistic race on its first `conflicts` commits. */
class ConflictingLedgerRepository extends InMemoryLedgerRepository {
  constructor(private conflicts: number) {
    super();
  }

  async commit(commit: LedgerCommit): Promise<void> {
    if (this.conflicts > 0) {
      this.conflicts -= 1;
      throw new ConcurrentModificationError('wallet', commit.userId);
    }
    return super.commit(commit);
  }
}

describe('Wallet Ledger', () => {
  let repo: InMemoryLedgerRepository;
  let audit: RecordingAudit;
  let ledger: WalletLedger;

  beforeEach(() => {
    repo = new InMemoryLedgerRepository();
    audit = new RecordingAudit();
    ledger = new WalletLedger(repo, audit);
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // credit / refund
  // ═══════════════════════════════════════════════════════════════════════════
  describe('credit', () => {
    it('should add funds and record a credit transaction', async () => {
      const result = await ledger.credit(USER, 500, 'pay-1', 'top-up');

      expect(result.duplicate).toBe(false);
      expect(result.balance).toEqual({ userId: USER, balance: 500, reserved: 0, available: 500, frozen: false });
      expect(result.transaction).toMatchObject({ type: 'credit', amount: 500, balanceAfter: 500, sequence: 1 });
      expect(audit.actions()).toContain('wallet.credit');
    });

    it('should be idempotent per external reference', async () => {
      const first = await ledger.credit(USER, 500, 'pay-1');
      const second = await ledger.credit(USER, 500, 'pay-1');

      expect(second.duplicate).toBe(true);
      expect(second.transaction.id).toBe(first.transaction.id);
      expect((await ledger.getBalance(USER)).balance).toBe(500);
    });

    it('should reject a reused reference with a different amount', async () => {
      await ledger.credit(USER, 500, 'pay-1');
      await expect(ledger.credit(USER, 700, 'pay-1')).rejects.toThrow(ValidationError);
    });

    it('should record operator refunds against a job', async () => {
      const result = await ledger.refund(USER, 100, JOB, 'refund-1', 'sandbox crashed');

      expect(result.transaction).toMatchObject({ type: 'refund', amount: 100, jobId: JOB, description: 'sandbox crashed' });
      expect(result.balance.balance).toBe(100);
    });

    it('should retry a commit that lost an optimistic race', async () => {
      const flaky = new WalletLedger(new ConflictingLedgerRepository(1), audit);

      const result = await flaky.credit(USER, 500, 'pay-1');

      expect(result.balance.balance).toBe(500);
      expect(result.transaction.sequence).toBe(1);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // reserve
  // ═══════════════════════════════════════════════════════════════════════════
  describe('reserve', () => {
    it('should hold funds without changing the balance', async () => {
      await ledger.credit(USER, 500, 'pay-1');

      const token = await ledger.reserve(USER, 100, JOB);

      expect(token).toMatchObject({ userId: USER, jobId: JOB, amount: 100 });
      expect(await ledger.getBalance(USER)).toMatchObject({ balance: 500, reserved: 100, available: 400 });
    });

    it('should fail with InsufficientFunds and write nothing', async () => {
      await ledger.credit(USER, 50, 'pay-1');

      await expect(ledger.reserve(USER, 100, JOB)).rejects.toThrow(InsufficientFundsError);
      expect(await repo.allTransactions(USER)).toHaveLength(1);
    });

    it('should return the existing hold for a job that already has one', async () => {
      await ledger.credit(USER, 500, 'pay-1');
      const first = await ledger.reserve(USER, 100, JOB);
      const second = await ledger.reserve(USER, 100, JOB);

      expect(second.reservationId).toBe(first.reservationId);
      expect((await ledger.getBalance(USER)).reserved).toBe(100);
    });

    it('should never over-commit funds under concurrent reservations', async () => {
      await ledger.credit(USER, 200, 'pay-1');

      const results = await Promise.allSettled([
        ledger.reserve(USER, 100, 'job-a'),
        ledger.reserve(USER, 100, 'job-b'),
        ledger.reserve(USER, 100, 'job-c'),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(2);
      expect(results.filter((r) => r.status === 'rejected')).toHaveLength(1);
      expect(await ledger.getBalance(USER)).toMatchObject({ balance: 200, reserved: 200, available: 0 });
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // debit
  // ═══════════════════════════════════════════════════════════════════════════
  describe('debit', () => {
    it('should bill from the reservation and keep one tick held', async () => {
      await ledger.credit(USER, 500, 'pay-1');
      await ledger.reserve(USER, 100, JOB);

      const balances: number[] = [];
      for (let tick = 1; tick <= 4; tick++) {
        const result = await ledger.debit(USER, 100, JOB, tick, 100);
        expect(result.reservedAfter).toBe(100);
        balances.push(result.balanceAfter);
      }

      expect(balances).toEqual([400, 300, 200, 100]);
      await expect(ledger.debit(USER, 100, JOB, 5, 100)).rejects.toThrow(InsufficientFundsError);
      expect(await ledger.getBalance(USER)).toMatchObject({ balance: 100, reserved: 100 });
    });

    it('should charge each (job, tick) exactly once', async () => {
      await ledger.credit(USER, 500, 'pay-1');
      await ledger.reserve(USER, 100, JOB);

      const first = await ledger.debit(USER, 100, JOB, 1, 100);
      const replay = await ledger.debit(USER, 100, JOB, 1, 100);

      expect(replay.duplicate).toBe(true);
      expect(replay.transactionId).toBe(first.transactionId);
      expect(replay.balanceAfter).toBe(400);
      expect(await ledger.jobDebits(JOB)).toHaveLength(1);
    });

    it('should freeze the wallet when a tick is re-billed with another amount', async () => {
      await ledger.credit(USER, 500, 'pay-1');
      await ledger.debit(USER, 100, JOB, 1, 100);

      await expect(ledger.debit(USER, 150, JOB, 1, 100)).rejects.toThrow(LedgerIntegrityError);
      expect((await ledger.getBalance(USER)).frozen).toBe(true);
      await expect(ledger.credit(USER, 100, 'pay-2')).rejects.toThrow(LedgerHaltedError);
      expect(audit.actions()).toContain('ledger.frozen');
    });

    it('should open a hold from free funds when the job has none', async () => {
      await ledger.credit(USER, 300, 'pay-1');

      const result = await ledger.debit(USER, 100, JOB, 1, 100);

      expect(result).toMatchObject({ balanceAfter: 200, reservedAfter: 100, duplicate: false });
      expect(await ledger.releaseForJob(JOB)).toBe(100);
      expect((await ledger.getBalance(USER)).reserved).toBe(0);
    });

    it('should reject a non-positive tick number', async () => {
      await expect(ledger.debit(USER, 100, JOB, 0)).rejects.toThrow(ValidationError);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // release
  // ═══════════════════════════════════════════════════════════════════════════
  describe('release', () => {
    it('should return the unused part of the reservation', async () => {
      await ledger.credit(USER, 500, 'pay-1');
      const token = await ledger.reserve(USER, 200, JOB);
      await ledger.debit(USER, 100, JOB, 1, 100);

      const released = await ledger.release(token);

      expect(released).toBe(100);
      expect(await ledger.getBalance(USER)).toMatchObject({ balance: 400, reserved: 0, available: 400 });
    });

    it('should be a no-op the second time', async () => {
      await ledger.credit(USER, 500, 'pay-1');
      const token = await ledger.reserve(USER, 100, JOB);

      expect(await ledger.release(token)).toBe(100);
      expect(await ledger.release(token)).toBe(0);
      expect((await ledger.getBalance(USER)).reserved).toBe(0);
    });

    it('should report nothing to release for a job without a hold', async () => {
      expect(await ledger.releaseForJob('job-unknown')).toBe(0);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // verify / freeze
  // ═══════════════════════════════════════════════════════════════════════════
  describe('verify', () => {
    it('should reproduce the projection from the transaction log', async () => {
      await ledger.credit(USER, 500, 'pay-1');
      await ledger.reserve(USER, 100, JOB);
      await ledger.debit(USER, 100, JOB, 1, 100);
      await ledger.releaseForJob(JOB);

      const result = await ledger.verify(USER);

      expect(result).toEqual({
        userId: USER,
        valid: true,
        transactionCount: 5,
        expectedBalance: 400,
        expectedReserved: 0,
        actualBalance: 400,
        actualReserved: 0,
        discrepancies: [],
      });
    });

    it('should freeze a wallet whose row disagrees with its log', async () => {
      await ledger.credit(USER, 500, 'pay-1');
      repo.tamper(USER, { balance: 999 });

      const result = await ledger.verify(USER);

      expect(result.valid).toBe(false);
      expect(result.discrepancies).toContain('balance 999 != replayed 500');
      expect((await ledger.getBalance(USER)).frozen).toBe(true);
    });

    it('should allow an operator to unfreeze', async () => {
      await ledger.credit(USER, 500, 'pay-1');
      await ledger.freeze(USER, 'manual review');

      const balance = await ledger.unfreeze(USER, 'admin-001');

      expect(balance.frozen).toBe(false);
      await expect(ledger.credit(USER, 100, 'pay-2')).resolves.toMatchObject({ duplicate: false });
      expect(audit.actions()).toEqual(expect.arrayContaining(['ledger.frozen', 'ledger.unfrozen']));
    });
  });

  describe('transactions', () => {
    it('should page newest first', async () => {
      await ledger.credit(USER, 100, 'pay-1');
      await ledger.credit(USER, 200, 'pay-2');
      await ledger.credit(USER, 300, 'pay-3');

      const page = await ledger.transactions(USER, { limit: 2 });
      const older = await ledger.transactions(USER, { limit: 2, before: 2 });

      expect(page.map((t) => t.sequence)).toEqual([3, 2]);
      expect(older.map((t) => t.externalRef)).toEqual(['pay-1']);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Generated sequences
  // ═══════════════════════════════════════════════════════════════════════════
  describe('generated sequences', () => {
    const JOBS = ['job-a', 'job-b', 'job-c'];

    it.each([1, 7, 42, 2026])('should keep the wallet consistent after every operation (seed %i)', async (seed) => {
      const rand = seeded(seed);
      const ticks = new Map<string, number>(JOBS.map((job) => [job, 0]));

      for (let step = 0; step < 150; step++) {
        const job = JOBS[rand(JOBS.length)] ?? 'job-a';
        const op = rand(5);
        try {
          if (op === 0) {
            await ledger.credit(USER, 1 + rand(300), `pay-${seed}-${step}`);
          } else if (op === 1) {
            await ledger.refund(USER, 1 + rand(50), null, `refund-${seed}-${step}`, 'service credit');
          } else if (op === 2) {
            await ledger.reserve(USER, 1 + rand(200), job);
          } else if (op === 3) {
            const tickSeq = (ticks.get(job) ?? 0) + 1;
            await ledger.debit(USER, 1 + rand(100), job, tickSeq, rand(101));
            ticks.set(job, tickSeq);
          } else {
            await ledger.releaseForJob(job);
          }
        } catch (err: unknown) {
          if (!(err instanceof InsufficientFundsError)) throw err;
        }

        const { balance, reserved, available } = await ledger.getBalance(USER);
        expect(balance).toBeGreaterThanOrEqual(0);
        expect(reserved).toBeGreaterThanOrEqual(0);
        expect(reserved).toBeLessThanOrEqual(balance);
        expect(available).toBe(balance - reserved);
        expect((await ledger.verify(USER)).valid).toBe(true);
      }
    });
  });
});
