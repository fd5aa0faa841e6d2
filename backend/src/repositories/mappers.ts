/** Row ↔ domain mapping for the Supabase repositories. */

import type { DbDispatchMessage, DbJob, DbLedgerTransaction, DbReservation, DbWallet } from '../types/db.js';
import type { DispatchMessage, JobRecord } from '../types/jobs.js';
import type { LedgerTransaction, Reservation, Wallet } from '../types/ledger.js';

export function mapWallet(row: DbWallet): Wallet {
  return {
    userId: row.user_id,
    balance: row.balance_cents,
    reserved: row.reserved_cents,
    version: row.version,
    lastSequence: row.last_sequence,
    frozen: row.frozen,
    frozenReason: row.frozen_reason,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function mapTx(row: DbLedgerTransaction): LedgerTransaction {
  return {
    id: row.id,
    userId: row.user_id,
    jobId: row.job_id,
    type: row.type,
    amount: row.amount_cents,
    balanceAfter: row.balance_after_cents,
    reservedAfter: row.reserved_after_cents,
    reservedConsumed: row.reserved_consumed_cents,
    tickSeq: row.tick_seq,
    externalRef: row.external_ref,
    reservationId: row.reservation_id,
    description: row.description,
    sequence: row.sequence,
    createdAt: row.created_at,
  };
}

export function txToRow(tx: LedgerTransaction): DbLedgerTransaction {
  return {
    id: tx.id,
    user_id: tx.userId,
    job_id: tx.jobId,
    type: tx.type,
    amount_cents: tx.amount,
    balance_after_cents: tx.balanceAfter,
    reserved_after_cents: tx.reservedAfter,
    reserved_consumed_cents: tx.reservedConsumed,
    tick_seq: tx.tickSeq,
    external_ref: tx.externalRef,
    reservation_id: tx.reservationId,
    description: tx.description,
    sequence: tx.sequence,
    created_at: tx.createdAt,
  };
}

export function mapReservation(row: DbReservation): Reservation {
  return {
    id: row.id,
    userId: row.user_id,
    jobId: row.job_id,
    amount: row.amount_cents,
    remaining: row.remaining_cents,
    status: row.status,
    createdAt: row.created_at,
    releasedAt: row.released_at,
  };
}

export function reservationToRow(res: Reservation): DbReservation {
  return {
    id: res.id,
    user_id: res.userId,
    job_id: res.jobId,
    amount_cents: res.amount,
    remaining_cents: res.remaining,
    status: res.status,
    created_at: res.createdAt,
    released_at: res.releasedAt,
  };
}

export function mapJob(row: DbJob): JobRecord {
  return {
    id: row.id,
    ownerId: row.owner_id,
    status: row.status,
    dockerImage: row.docker_image,
    entrypoint: row.entrypoint,
    resourceConfig: {
      memoryLimit: row.resource_config.memory_limit,
      cpuCount: row.resource_config.cpu_count,
      gpuCount: row.resource_config.gpu_count,
      timeoutSeconds: row.resource_config.timeout_seconds,
    },
    inputPaths: row.input_paths,
    ratePerMinute: row.rate_per_minute_cents,
    tickSeconds: row.tick_seconds,
    reservationId: row.reservation_id,
    createdAt: row.created_at,
    startedAt: row.started_at,
    endedAt: row.ended_at,
    runtimeSeconds: row.runtime_seconds,
    ticksBilled: row.ticks_billed,
    totalCost: row.total_cost_cents,
    exitReason: row.exit_reason,
    exitCode: row.exit_code,
    errorMessage: row.error_message,
    sandboxId: row.sandbox_id,
    workerId: row.worker_id,
    termination: row.termination
      ? {
          kind: row.termination.kind,
          seq: row.termination.seq,
          requestedAt: row.termination.requested_at,
          commandId: row.termination.command_id,
        }
      : null,
    version: row.version,
  };
}

export function jobToRow(job: JobRecord): DbJob {
  return {
    id: job.id,
    owner_id: job.ownerId,
    status: job.status,
    docker_image: job.dockerImage,
    entrypoint: job.entrypoint,
    resource_config: {
      memory_limit: job.resourceConfig.memoryLimit,
      cpu_count: job.resourceConfig.cpuCount,
      gpu_count: job.resourceConfig.gpuCount,
      timeout_seconds: job.resourceConfig.timeoutSeconds,
    },
    input_paths: job.inputPaths,
    rate_per_minute_cents: job.ratePerMinute,
    tick_seconds: job.tickSeconds,
    reservation_id: job.reservationId,
    created_at: job.createdAt,
    started_at: job.startedAt,
    ended_at: job.endedAt,
    runtime_seconds: job.runtimeSeconds,
    ticks_billed: job.ticksBilled,
    total_cost_cents: job.totalCost,
    exit_reason: job.exitReason,
    exit_code: job.exitCode,
    error_message: job.errorMessage,
    sandbox_id: job.sandboxId,
    worker_id: job.workerId,
    termination: job.termination
      ? {
          kind: job.termination.kind,
          seq: job.termination.seq,
          requested_at: job.termination.requestedAt,
          command_id: job.termination.commandId,
        }
      : null,
    version: job.version,
  };
}

export function mapDispatch(row: DbDispatchMessage): DispatchMessage {
  return {
    id: row.id,
    jobId: row.job_id,
    deliveryCount: row.delivery_count,
    enqueuedAt: row.enqueued_at,
  };
}
