/**
 * Wallet ledger types. Amounts are integer cents.
 */

import type { Cents } from '../lib/money.js';

export type TransactionType = 'credit' | 'debit' | 'reservation' | 'release' | 'refund';

export interface Wallet {
  userId: string;
  /** Total funds, reserved portion included. Never negative. */
  balance: Cents;
  /** Portion of `balance` held for active jobs. */
  reserved: Cents;
  /** Bumped by every committed mutation; guards concurrent writers. */
  version: number;
  /** Sequence number of the last transaction written for this user. */
  lastSequence: number;
  frozen: boolean;
  frozenReason: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface WalletBalance {
  userId: string;
  balance: Cents;
  reserved: Cents;
  available: Cents;
  frozen: boolean;
}

export interface LedgerTransaction {
  id: string;
  userId: string;
  jobId: string | null;
  type: TransactionType;
  /** Always positive; the type gives the direction. */
  amount: Cents;
  balanceAfter: Cents;
  reservedAfter: Cents;
  /** Debits only: part of the amount taken out of the job's standing reservation. */
  reservedConsumed: Cents;
  /** Debits only: billing tick this debit pays for. */
  tickSeq: number | null;
  /** Credits and refunds: caller-supplied idempotency reference. */
  externalRef: string | null;
  reservationId: string | null;
  description: string | null;
  /** Per-user total order. */
  sequence: number;
  createdAt: string;
}

export type ReservationStatus = 'held' | 'released';

export interface Reservation {
  id: string;
  userId: string;
  jobId: string;
  /** Total amount ever held on this reservation (initial hold plus top-ups). */
  amount: Cents;
  /** Amount still held. */
  remaining: Cents;
  status: ReservationStatus;
  createdAt: string;
  releasedAt: string | null;
}

export interface ReservationToken {
  reservationId: string;
  userId: string;
  jobId: string;
  amount: Cents;
}

export interface DebitResult {
  transactionId: string;
  tickSeq: number;
  balanceAfter: Cents;
  reservedAfter: Cents;
  /** True when this (jobId, tickSeq) was already billed and the prior result is returned. */
  duplicate: boolean;
}

export interface LedgerAudit {
  userId: string;
  valid: boolean;
  transactionCount: number;
  expectedBalance: Cents;
  expectedReserved: Cents;
  actualBalance: Cents;
  actualReserved: Cents;
  discrepancies: string[];
}
