/**
 * Supabase ledger repository.
 * Commits go through the `ledger_commit` PL/pgSQL function, which locks the wallet row
 * (SELECT ... FOR UPDATE), checks the version and writes wallet, transactions and
 * reservations in one database transaction.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { ConcurrentModificationError, TransientInfraError } from '../errors.js';
import type { DbLedgerTransaction, DbReservation, DbWallet } from '../types/db.js';
import type { LedgerTransaction, Reservation, Wallet } from '../types/ledger.js';
import type { LedgerCommit, LedgerRepository, TransactionPage } from './ledger-repository.js';
import { mapReservation, mapTx, mapWallet, reservationToRow, txToRow } from './mappers.js';

interface PostgrestErrorLike {
  code?: string;
  message: string;
}

function isConflict(error: PostgrestErrorLike): boolean {
  return error.code === '23505' || error.message.includes('version_conflict');
}

export class SupabaseLedgerRepository implements LedgerRepository {
  constructor(private readonly db: SupabaseClient) {}

  async getWallet(userId: string): Promise<Wallet | null> {
    const { data, error } = await this.db.from('wallets').select('*').eq('user_id', userId).maybeSingle();
    if (error) throw new TransientInfraError(`Wallet lookup failed: ${error.message}`);
    const row: DbWallet | null = data;
    return row ? mapWallet(row) : null;
  }

  async ensureWallet(userId: string): Promise<Wallet> {
    const { error } = await this.db
      .from('wallets')
      .upsert({ user_id: userId }, { onConflict: 'user_id', ignoreDuplicates: true });
    if (error) throw new TransientInfraError(`Wallet creation failed: ${error.message}`);
    const wallet = await this.getWallet(userId);
    if (!wallet) throw new TransientInfraError(`Wallet ${userId} missing after upsert`);
    return wallet;
  }

  async commit(commit: LedgerCommit): Promise<void> {
    const { error } = await this.db.rpc('ledger_commit', {
      p_user_id: commit.userId,
      p_expected_version: commit.expectedVersion,
      p_balance_cents: commit.wallet.balance,
      p_reserved_cents: commit.wallet.reserved,
      p_last_sequence: commit.wallet.lastSequence,
      p_frozen: commit.wallet.frozen,
      p_frozen_reason: commit.wallet.frozenReason,
      p_transactions: commit.transactions.map(txToRow),
      p_reservations: commit.reservations.map(reservationToRow),
    });
    if (error) {
      if (isConflict(error)) throw new ConcurrentModificationError('wallet', commit.userId);
      throw new TransientInfraError(`Ledger commit failed: ${error.message}`);
    }
  }

  async findDebit(jobId: string, tickSeq: number): Promise<LedgerTransaction | null> {
    const { data, error } = await this.db
      .from('ledger_transactions')
      .select('*')
      .eq('job_id', jobId)
      .eq('type', 'debit')
      .eq('tick_seq', tickSeq)
      .maybeSingle();
    if (error) throw new TransientInfraError(`Debit lookup failed: ${error.message}`);
    const row: DbLedgerTransaction | null = data;
    return row ? mapTx(row) : null;
  }

  async findByExternalRef(userId: string, externalRef: string): Promise<LedgerTransaction | null> {
    const { data, error } = await this.db
      .from('ledger_transactions')
      .select('*')
      .eq('user_id', userId)
      .eq('external_ref', externalRef)
      .maybeSingle();
    if (error) throw new TransientInfraError(`Transaction lookup failed: ${error.message}`);
    const row: DbLedgerTransaction | null = data;
    return row ? mapTx(row) : null;
  }

  async getReservation(id: string): Promise<Reservation | null> {
    const { data, error } = await this.db.from('reservations').select('*').eq('id', id).maybeSingle();
    if (error) throw new TransientInfraError(`Reservation lookup failed: ${error.message}`);
    const row: DbReservation | null = data;
    return row ? mapReservation(row) : null;
  }

  async findHeldReservation(jobId: string): Promise<Reservation | null> {
    const { data, error } = await this.db
      .from('reservations')
      .select('*')
      .eq('job_id', jobId)
      .eq('status', 'held')
      .maybeSingle();
    if (error) throw new TransientInfraError(`Reservation lookup failed: ${error.message}`);
    const row: DbReservation | null = data;
    return row ? mapReservation(row) : null;
  }

  async listHeldReservations(): Promise<Reservation[]> {
    const { data, error } = await this.db.from('reservations').select('*').eq('status', 'held');
    if (error) throw new TransientInfraError(`Reservation listing failed: ${error.message}`);
    const rows: DbReservation[] = data ?? [];
    return rows.map(mapReservation);
  }

  async listTransactions(userId: string, page: TransactionPage): Promise<LedgerTransaction[]> {
    let query = this.db.from('ledger_transactions').select('*').eq('user_id', userId);
    if (page.beforeSequence !== undefined) query = query.lt('sequence', page.beforeSequence);
    const { data, error } = await query.order('sequence', { ascending: false }).limit(page.limit);
    if (error) throw new TransientInfraError(`Transaction history failed: ${error.message}`);
    const rows: DbLedgerTransaction[] = data ?? [];
    return rows.map(mapTx);
  }

  async allTransactions(userId: string): Promise<LedgerTransaction[]> {
    const { data, error } = await this.db
      .from('ledger_transactions')
      .select('*')
      .eq('user_id', userId)
      .order('sequence', { ascending: true });
    if (error) throw new TransientInfraError(`Transaction history failed: ${error.message}`);
    const rows: DbLedgerTransaction[] = data ?? [];
    return rows.map(mapTx);
  }

  async jobDebits(jobId: string): Promise<LedgerTransaction[]> {
    const { data, error } = await this.db
      .from('ledger_transactions')
      .select('*')
      .eq('job_id', jobId)
      .eq('type', 'debit')
      .order('tick_seq', { ascending: true });
    if (error) throw new TransientInfraError(`Job debit lookup failed: ${error.message}`);
    const rows: DbLedgerTransaction[] = data ?? [];
    return rows.map(mapTx);
  }
}
