/**
 * Wallet ledger.
 * All internal amounts in CENTS (1 credit = 100 cents) to avoid floating point.
 *
 * Every mutation runs under a per-user lock, appends immutable transactions and
 * rewrites the wallet projection in one repository commit. Replaying the log must
 * reproduce `balance` and `reserved` exactly (see `verify`).
 */

import crypto from 'crypto';
import {
  ConcurrentModificationError,
  InsufficientFundsError,
  LedgerHaltedError,
  LedgerIntegrityError,
  ValidationError,
} from '../errors.js';
import { KeyedMutex } from '../lib/keyed-mutex.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import { assertPositiveCents, formatCredits, type Cents } from '../lib/money.js';
import type { LedgerRepository } from '../repositories/ledger-repository.js';
import type {
  DebitResult,
  LedgerAudit,
  LedgerTransaction,
  Reservation,
  ReservationToken,
  TransactionType,
  Wallet,
  WalletBalance,
} from '../types/ledger.js';
import type { AuditRecorder } from './auditService.js';

const COMMIT_ATTEMPTS = 3;

export interface FundsResult {
  balance: WalletBalance;
  transaction: LedgerTransaction;
  /** True when the external reference was already applied. */
  duplicate: boolean;
}

interface TxDraft {
  type: TransactionType;
  amount: Cents;
  jobId?: string | null;
  reservedConsumed?: Cents;
  tickSeq?: number | null;
  externalRef?: string | null;
  reservationId?: string | null;
  description?: string | null;
}

export function toBalance(wallet: Wallet): WalletBalance {
  return {
    userId: wallet.userId,
    balance: wallet.balance,
    reserved: wallet.reserved,
    available: wallet.balance - wallet.reserved,
    frozen: wallet.frozen,
  };
}

export class WalletLedger {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly repo: LedgerRepository,
    private readonly audit: AuditRecorder,
    private readonly log: Logger = componentLogger('ledger'),
  ) {}

  // ── Reads ──────────────────────────────────────────────────────────────

  async getBalance(userId: string): Promise<WalletBalance> {
    return toBalance(await this.repo.ensureWallet(userId));
  }

  async transactions(userId: string, opts: { limit?: number; before?: number } = {}): Promise<LedgerTransaction[]> {
    const limit = Math.min(Math.max(opts.limit ?? 50, 1), 500);
    return this.repo.listTransactions(userId, { limit, beforeSequence: opts.before });
  }

  async jobDebits(jobId: string): Promise<LedgerTransaction[]> {
    return this.repo.jobDebits(jobId);
  }

  async heldReservations(): Promise<Reservation[]> {
    return this.repo.listHeldReservations();
  }

  // ── Mutations ──────────────────────────────────────────────────────────

  /**
   * Hold `amount` of free funds for a job. A second call for a job that already holds a
   * reservation returns the existing token.
   */
  async reserve(userId: string, amount: Cents, jobId: string): Promise<ReservationToken> {
    assertPositiveCents(amount, 'reservation');
    return this.serialized(userId, async () => {
      const existing = await this.repo.findHeldReservation(jobId);
      if (existing) return toToken(existing);

      const wallet = await this.loadWritable(userId);
      const available = wallet.balance - wallet.reserved;
      if (available < amount) throw new InsufficientFundsError(userId, amount, available);

      const now = new Date().toISOString();
      const reservation: Reservation = {
        id: crypto.randomUUID(),
        userId,
        jobId,
        amount,
        remaining: amount,
        status: 'held',
        createdAt: now,
        releasedAt: null,
      };
      const next = { ...wallet, reserved: wallet.reserved + amount };
      await this.commit(wallet, next, [
        { type: 'reservation', amount, jobId, reservationId: reservation.id },
      ], [reservation]);

      this.log.debug({ userId, jobId, amount }, 'reserved');
      return toToken(reservation);
    });
  }

  /**
   * Bill one tick. Idempotent per (jobId, tickSeq): a repeat with the same amount returns
   * the prior result, a repeat with a different amount freezes the wallet.
   *
   * The charge comes out of the job's reservation first and free funds second; afterwards
   * the reservation is topped back up to `holdNext`. If the charge plus the top-up exceed
   * free funds nothing is written and InsufficientFunds is thrown.
   */
  async debit(userId: string, amount: Cents, jobId: string, tickSeq: number, holdNext: Cents = 0): Promise<DebitResult> {
    assertPositiveCents(amount, 'debit');
    if (!Number.isSafeInteger(tickSeq) || tickSeq < 1) {
      throw new ValidationError(`tickSeq must be a positive integer, got ${tickSeq}`);
    }
    if (!Number.isSafeInteger(holdNext) || holdNext < 0) {
      throw new ValidationError(`holdNext must be a non-negative integer, got ${holdNext}`);
    }

    return this.serialized(userId, async () => {
      const prior = await this.repo.findDebit(jobId, tickSeq);
      if (prior) {
        if (prior.amount !== amount || prior.userId !== userId) {
          const reason = `tick ${tickSeq} of job ${jobId} re-billed with ${amount} (recorded ${prior.amount})`;
          await this.freezeLocked(userId, reason);
          throw new LedgerIntegrityError(userId, reason, { jobId, tickSeq, recorded: prior.amount, requested: amount });
        }
        return {
          transactionId: prior.id,
          tickSeq,
          balanceAfter: prior.balanceAfter,
          reservedAfter: prior.reservedAfter,
          duplicate: true,
        };
      }

      const wallet = await this.loadWritable(userId);
      const held = await this.repo.findHeldReservation(jobId);
      const standing = held?.remaining ?? 0;
      const fromReserve = Math.min(standing, amount);
      const fromFree = amount - fromReserve;
      const topUp = Math.max(0, holdNext - (standing - fromReserve));
      const available = wallet.balance - wallet.reserved;
      if (fromFree + topUp > available) {
        throw new InsufficientFundsError(userId, fromFree + topUp, available);
      }

      const now = new Date().toISOString();
      const reservations: Reservation[] = [];
      let reservationId: string | null = held?.id ?? null;
      if (held) {
        reservations.push({ ...held, remaining: standing - fromReserve + topUp, amount: held.amount + topUp });
      } else if (topUp > 0) {
        reservationId = crypto.randomUUID();
        reservations.push({
          id: reservationId,
          userId,
          jobId,
          amount: topUp,
          remaining: topUp,
          status: 'held',
          createdAt: now,
          releasedAt: null,
        });
      }

      const drafts: TxDraft[] = [
        { type: 'debit', amount, jobId, tickSeq, reservedConsumed: fromReserve, reservationId },
      ];
      if (topUp > 0) drafts.push({ type: 'reservation', amount: topUp, jobId, reservationId });

      const next = {
        ...wallet,
        balance: wallet.balance - amount,
        reserved: wallet.reserved - fromReserve + topUp,
      };
      const [debitTx] = await this.commit(wallet, next, drafts, reservations);
      if (!debitTx) throw new LedgerIntegrityError(userId, 'debit commit produced no transaction');

      return {
        transactionId: debitTx.id,
        tickSeq,
        balanceAfter: debitTx.balanceAfter,
        reservedAfter: debitTx.reservedAfter,
        duplicate: false,
      };
    });
  }

  /** Return the unused part of a reservation to free funds. Releasing twice is a no-op. */
  async release(token: ReservationToken | string): Promise<Cents> {
    const reservationId = typeof token === 'string' ? token : token.reservationId;
    const found = await this.repo.getReservation(reservationId);
    if (!found) throw new ValidationError(`Reservation ${reservationId} not found`);

    return this.serialized(found.userId, async () => {
      const reservation = await this.repo.getReservation(reservationId);
      if (!reservation || reservation.status === 'released') return 0;

      const wallet = await this.loadWritable(reservation.userId);
      const amount = reservation.remaining;
      const closed: Reservation = {
        ...reservation,
        remaining: 0,
        status: 'released',
        releasedAt: new Date().toISOString(),
      };
      const drafts: TxDraft[] =
        amount > 0 ? [{ type: 'release', amount, jobId: reservation.jobId, reservationId }] : [];
      await this.commit(wallet, { ...wallet, reserved: wallet.reserved - amount }, drafts, [closed]);

      this.log.debug({ userId: reservation.userId, jobId: reservation.jobId, amount }, 'reservation released');
      return amount;
    });
  }

  async releaseForJob(jobId: string): Promise<Cents> {
    const held = await this.repo.findHeldReservation(jobId);
    return held ? this.release(held.id) : 0;
  }

  /** Top-up. Idempotent per `externalRef`. */
  async credit(userId: string, amount: Cents, externalRef: string, description?: string): Promise<FundsResult> {
    return this.addFunds('credit', userId, amount, externalRef, null, description ?? null);
  }

  /** Operator refund, e.g. after a system error. Idempotent per `externalRef`. */
  async refund(userId: string, amount: Cents, jobId: string | null, externalRef: string, reason: string): Promise<FundsResult> {
    return this.addFunds('refund', userId, amount, externalRef, jobId, reason);
  }

  // ── Integrity ──────────────────────────────────────────────────────────

  /**
   * Rebuild the projection from the transaction log and compare it with the wallet row.
   * Any mismatch freezes the wallet.
   */
  async verify(userId: string): Promise<LedgerAudit> {
    return this.serialized(userId, async () => {
      const wallet = await this.repo.ensureWallet(userId);
      const txs = await this.repo.allTransactions(userId);
      const discrepancies: string[] = [];

      let balance = 0;
      let reserved = 0;
      let expectedSeq = 1;
      for (const tx of txs) {
        if (tx.sequence !== expectedSeq) {
          discrepancies.push(`sequence gap: expected ${expectedSeq}, found ${tx.sequence}`);
        }
        expectedSeq = tx.sequence + 1;
        switch (tx.type) {
          case 'credit':
          case 'refund':
            balance += tx.amount;
            break;
          case 'debit':
            balance -= tx.amount;
            reserved -= tx.reservedConsumed;
            break;
          case 'reservation':
            reserved += tx.amount;
            break;
          case 'release':
            reserved -= tx.amount;
            break;
          default: {
            const unknownType: never = tx.type;
            discrepancies.push(`unknown transaction type ${String(unknownType)}`);
          }
        }
        if (balance !== tx.balanceAfter || reserved !== tx.reservedAfter) {
          discrepancies.push(
            `tx ${tx.sequence} (${tx.type}) records ${tx.balanceAfter}/${tx.reservedAfter}, replay gives ${balance}/${reserved}`,
          );
        }
        if (balance < 0) discrepancies.push(`balance negative after tx ${tx.sequence}`);
      }
      if (balance !== wallet.balance) discrepancies.push(`balance ${wallet.balance} != replayed ${balance}`);
      if (reserved !== wallet.reserved) discrepancies.push(`reserved ${wallet.reserved} != replayed ${reserved}`);
      if (wallet.lastSequence !== txs.length) {
        discrepancies.push(`last sequence ${wallet.lastSequence} != ${txs.length} transactions`);
      }

      const valid = discrepancies.length === 0;
      if (!valid && !wallet.frozen) {
        await this.freezeLocked(userId, `verification failed: ${discrepancies[0] ?? 'mismatch'}`);
      }
      return {
        userId,
        valid,
        transactionCount: txs.length,
        expectedBalance: balance,
        expectedReserved: reserved,
        actualBalance: wallet.balance,
        actualReserved: wallet.reserved,
        discrepancies,
      };
    });
  }

  async freeze(userId: string, reason: string): Promise<void> {
    await this.serialized(userId, () => this.freezeLocked(userId, reason));
  }

  async unfreeze(userId: string, actor: string): Promise<WalletBalance> {
    return this.serialized(userId, async () => {
      const wallet = await this.repo.ensureWallet(userId);
      if (!wallet.frozen) return toBalance(wallet);
      const next = { ...wallet, frozen: false, frozenReason: null };
      await this.commit(wallet, next, [], []);
      this.log.warn({ userId, actor, reason: wallet.frozenReason }, 'wallet unfrozen');
      void this.audit.record({ actor, action: 'ledger.unfrozen', resourceId: userId, details: { reason: wallet.frozenReason } });
      return toBalance({ ...next, version: wallet.version + 1 });
    });
  }

  // ── Internals ──────────────────────────────────────────────────────────

  private async addFunds(
    type: 'credit' | 'refund',
    userId: string,
    amount: Cents,
    externalRef: string,
    jobId: string | null,
    description: string | null,
  ): Promise<FundsResult> {
    assertPositiveCents(amount, type);
    if (!externalRef.trim()) throw new ValidationError('externalRef is required');

    return this.serialized(userId, async () => {
      const prior = await this.repo.findByExternalRef(userId, externalRef);
      if (prior) {
        if (prior.type !== type || prior.amount !== amount) {
          throw new ValidationError(`externalRef ${externalRef} was already used for a different ${prior.type}`);
        }
        return { balance: toBalance(await this.repo.ensureWallet(userId)), transaction: prior, duplicate: true };
      }

      const wallet = await this.loadWritable(userId);
      const next = { ...wallet, balance: wallet.balance + amount };
      const [tx] = await this.commit(wallet, next, [{ type, amount, jobId, externalRef, description }], []);
      if (!tx) throw new LedgerIntegrityError(userId, `${type} commit produced no transaction`);

      this.log.info({ userId, amount: formatCredits(amount), externalRef }, type);
      void this.audit.record({
        action: `wallet.${type}`,
        resourceId: userId,
        details: { amount, externalRef, jobId, description },
      });
      return { balance: toBalance({ ...next, version: wallet.version + 1 }), transaction: tx, duplicate: false };
    });
  }

  private async freezeLocked(userId: string, reason: string): Promise<void> {
    const wallet = await this.repo.ensureWallet(userId);
    if (wallet.frozen) return;
    await this.commit(wallet, { ...wallet, frozen: true, frozenReason: reason }, [], []);
    this.log.fatal({ userId, reason }, 'ledger integrity violation, wallet frozen');
    void this.audit.record({ action: 'ledger.frozen', resourceId: userId, details: { reason } });
  }

  private async loadWritable(userId: string): Promise<Wallet> {
    const wallet = await this.repo.ensureWallet(userId);
    if (wallet.frozen) throw new LedgerHaltedError(userId, wallet.frozenReason);
    return wallet;
  }

  /**
   * Runs under the user's lock; a commit that lost an optimistic race against another
   * controller process is retried from a fresh read.
   */
  private async serialized<T>(userId: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.run(userId, async () => {
      for (let attempt = 1; ; attempt++) {
        try {
          return await fn();
        } catch (err: unknown) {
          if (!(err instanceof ConcurrentModificationError) || attempt >= COMMIT_ATTEMPTS) throw err;
          this.log.warn({ userId, attempt }, 'ledger commit conflict, retrying');
        }
      }
    });
  }

  /** Assigns sequences and after-values, then writes everything in one commit. */
  private async commit(
    before: Wallet,
    after: Wallet,
    drafts: TxDraft[],
    reservations: Reservation[],
  ): Promise<LedgerTransaction[]> {
    if (after.balance < 0 || after.reserved < 0 || after.reserved > after.balance) {
      throw new LedgerIntegrityError(before.userId, 'commit would break wallet invariants', {
        balance: after.balance,
        reserved: after.reserved,
      });
    }

    const now = new Date().toISOString();
    let balance = before.balance;
    let reserved = before.reserved;
    let sequence = before.lastSequence;
    const transactions = drafts.map((d): LedgerTransaction => {
      switch (d.type) {
        case 'credit':
        case 'refund':
          balance += d.amount;
          break;
        case 'debit':
          balance -= d.amount;
          reserved -= d.reservedConsumed ?? 0;
          break;
        case 'reservation':
          reserved += d.amount;
          break;
        case 'release':
          reserved -= d.amount;
          break;
      }
      sequence += 1;
      return {
        id: crypto.randomUUID(),
        userId: before.userId,
        jobId: d.jobId ?? null,
        type: d.type,
        amount: d.amount,
        balanceAfter: balance,
        reservedAfter: reserved,
        reservedConsumed: d.reservedConsumed ?? 0,
        tickSeq: d.tickSeq ?? null,
        externalRef: d.externalRef ?? null,
        reservationId: d.reservationId ?? null,
        description: d.description ?? null,
        sequence,
        createdAt: now,
      };
    });

    if (balance !== after.balance || reserved !== after.reserved) {
      throw new LedgerIntegrityError(before.userId, 'transactions do not reproduce the new projection');
    }

    await this.repo.commit({
      userId: before.userId,
      expectedVersion: before.version,
      wallet: { ...after, version: before.version + 1, lastSequence: sequence, updatedAt: now },
      transactions,
      reservations,
    });
    return transactions;
  }
}

function toToken(res: Reservation): ReservationToken {
  return { reservationId: res.id, userId: res.userId, jobId: res.jobId, amount: res.remaining };
}
