/**
 * Ledger persistence.
 * The WalletLedger computes every mutation; a repository only has to apply a commit
 * atomically and reject it when the wallet moved underneath (optimistic version check).
 */

import { ConcurrentModificationError } from '../errors.js';
import type { LedgerTransaction, Reservation, Wallet } from '../types/ledger.js';

/** One atomic ledger write: new wallet projection, appended transactions, reservation upserts. */
export interface LedgerCommit {
  userId: string;
  expectedVersion: number;
  wallet: Wallet;
  transactions: LedgerTransaction[];
  reservations: Reservation[];
}

export interface TransactionPage {
  limit: number;
  /** Only transactions with a smaller sequence. */
  beforeSequence?: number;
}

export interface LedgerRepository {
  getWallet(userId: string): Promise<Wallet | null>;
  /** Insert a zero wallet unless one exists; returns the stored wallet either way. */
  ensureWallet(userId: string): Promise<Wallet>;
  commit(commit: LedgerCommit): Promise<void>;
  findDebit(jobId: string, tickSeq: number): Promise<LedgerTransaction | null>;
  findByExternalRef(userId: string, externalRef: string): Promise<LedgerTransaction | null>;
  getReservation(id: string): Promise<Reservation | null>;
  findHeldReservation(jobId: string): Promise<Reservation | null>;
  listHeldReservations(): Promise<Reservation[]>;
  /** Newest first. */
  listTransactions(userId: string, page: TransactionPage): Promise<LedgerTransaction[]>;
  /** Oldest first; used to rebuild projections. */
  allTransactions(userId: string): Promise<LedgerTransaction[]>;
  /** Debit transactions of one job, by tick. */
  jobDebits(jobId: string): Promise<LedgerTransaction[]>;
}

// ── In-memory implementation ──

export class InMemoryLedgerRepository implements LedgerRepository {
  private readonly wallets = new Map<string, Wallet>();
  private readonly transactions = new Map<string, LedgerTransaction[]>();
  private readonly reservations = new Map<string, Reservation>();
  private readonly debitIndex = new Map<string, LedgerTransaction>();

  async getWallet(userId: string): Promise<Wallet | null> {
    const wallet = this.wallets.get(userId);
    return wallet ? { ...wallet } : null;
  }

  async ensureWallet(userId: string): Promise<Wallet> {
    let wallet = this.wallets.get(userId);
    if (!wallet) {
      const now = new Date().toISOString();
      wallet = {
        userId,
        balance: 0,
        reserved: 0,
        version: 0,
        lastSequence: 0,
        frozen: false,
        frozenReason: null,
        createdAt: now,
        updatedAt: now,
      };
      this.wallets.set(userId, wallet);
      this.transactions.set(userId, []);
    }
    return { ...wallet };
  }

  async commit(commit: LedgerCommit): Promise<void> {
    const current = this.wallets.get(commit.userId);
    if (!current || current.version !== commit.expectedVersion) {
      throw new ConcurrentModificationError('wallet', commit.userId);
    }
    for (const tx of commit.transactions) {
      if (tx.type === 'debit' && tx.jobId && tx.tickSeq !== null && this.debitIndex.has(debitKey(tx.jobId, tx.tickSeq))) {
        throw new ConcurrentModificationError('debit', debitKey(tx.jobId, tx.tickSeq));
      }
    }

    this.wallets.set(commit.userId, { ...commit.wallet });
    const log = this.transactions.get(commit.userId) ?? [];
    for (const tx of commit.transactions) {
      log.push({ ...tx });
      if (tx.type === 'debit' && tx.jobId && tx.tickSeq !== null) {
        this.debitIndex.set(debitKey(tx.jobId, tx.tickSeq), { ...tx });
      }
    }
    this.transactions.set(commit.userId, log);
    for (const res of commit.reservations) this.reservations.set(res.id, { ...res });
  }

  async findDebit(jobId: string, tickSeq: number): Promise<LedgerTransaction | null> {
    const tx = this.debitIndex.get(debitKey(jobId, tickSeq));
    return tx ? { ...tx } : null;
  }

  async findByExternalRef(userId: string, externalRef: string): Promise<LedgerTransaction | null> {
    const tx = (this.transactions.get(userId) ?? []).find((t) => t.externalRef === externalRef);
    return tx ? { ...tx } : null;
  }

  async getReservation(id: string): Promise<Reservation | null> {
    const res = this.reservations.get(id);
    return res ? { ...res } : null;
  }

  async findHeldReservation(jobId: string): Promise<Reservation | null> {
    for (const res of this.reservations.values()) {
      if (res.jobId === jobId && res.status === 'held') return { ...res };
    }
    return null;
  }

  async listHeldReservations(): Promise<Reservation[]> {
    return [...this.reservations.values()].filter((res) => res.status === 'held').map((res) => ({ ...res }));
  }

  async listTransactions(userId: string, page: TransactionPage): Promise<LedgerTransaction[]> {
    const before = page.beforeSequence;
    return (this.transactions.get(userId) ?? [])
      .filter((t) => before === undefined || t.sequence < before)
      .sort((a, b) => b.sequence - a.sequence)
      .slice(0, page.limit)
      .map((t) => ({ ...t }));
  }

  async allTransactions(userId: string): Promise<LedgerTransaction[]> {
    return (this.transactions.get(userId) ?? []).map((t) => ({ ...t }));
  }

  async jobDebits(jobId: string): Promise<LedgerTransaction[]> {
    return [...this.debitIndex.values()]
      .filter((t) => t.jobId === jobId)
      .sort((a, b) => (a.tickSeq ?? 0) - (b.tickSeq ?? 0))
      .map((t) => ({ ...t }));
  }

  /** Test hook: overwrite a wallet row as if someone wrote the table directly. */
  tamper(userId: string, patch: Partial<Pick<Wallet, 'balance' | 'reserved'>>): void {
    const wallet = this.wallets.get(userId);
    if (wallet) this.wallets.set(userId, { ...wallet, ...patch });
  }
}

function debitKey(jobId: string, tickSeq: number): string {
  return `${jobId}#${tickSeq}`;
}
