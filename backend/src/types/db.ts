// Database (Supabase) row types
// One interface per table, snake_case matching PostgreSQL columns (supabase/migrations)

import type { ExitReason, JobStatus, TerminationKind } from './jobs.js';
import type { ReservationStatus, TransactionType } from './ledger.js';

export interface DbWallet {
  user_id: string;                  // PK
  balance_cents: number;
  reserved_cents: number;
  version: number;
  last_sequence: number;
  frozen: boolean;
  frozen_reason: string | null;
  created_at: string;               // timestamptz
  updated_at: string;
}

export interface DbLedgerTransaction {
  id: string;                       // uuid, PK
  user_id: string;                  // FK → wallets.user_id
  job_id: string | null;
  type: TransactionType;
  amount_cents: number;
  balance_after_cents: number;
  reserved_after_cents: number;
  reserved_consumed_cents: number;
  tick_seq: number | null;          // unique (job_id, tick_seq) where type = 'debit'
  external_ref: string | null;      // unique (user_id, external_ref)
  reservation_id: string | null;
  description: string | null;
  sequence: number;                 // unique (user_id, sequence)
  created_at: string;
}

export interface DbReservation {
  id: string;                       // uuid, PK
  user_id: string;
  job_id: string;                   // one held reservation per job
  amount_cents: number;
  remaining_cents: number;
  status: ReservationStatus;
  created_at: string;
  released_at: string | null;
}

export interface DbTermination {
  kind: TerminationKind;
  seq: number;
  requested_at: string;
  command_id: string;
}

export interface DbJob {
  id: string;                       // uuid, PK
  owner_id: string;
  status: JobStatus;
  docker_image: string;
  entrypoint: string;
  resource_config: {
    memory_limit: string;
    cpu_count: number;
    gpu_count: number;
    timeout_seconds: number;
  };
  input_paths: string[];
  rate_per_minute_cents: number;
  tick_seconds: number;
  reservation_id: string | null;
  created_at: string;
  started_at: string | null;
  ended_at: string | null;
  runtime_seconds: number;
  ticks_billed: number;
  total_cost_cents: number;
  exit_reason: ExitReason | null;
  exit_code: number | null;
  error_message: string | null;
  sandbox_id: string | null;
  worker_id: string | null;
  termination: DbTermination | null; // jsonb
  version: number;
}

export interface DbDispatchMessage {
  id: string;                       // uuid, PK
  job_id: string;
  status: 'queued' | 'claimed' | 'done';
  delivery_count: number;
  visible_at: string;
  claimed_by: string | null;
  enqueued_at: string;
}

export interface DbAuditLog {
  id: string;
  actor: string | null;
  action: string;
  resource_id: string | null;
  details: Record<string, unknown> | null;
  timestamp: string;
}
