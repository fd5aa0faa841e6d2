/**
 * Broker error taxonomy.
 * Every error carries a stable machine-readable code; routes map codes to HTTP status.
 */

export type BrokerErrorCode =
  | 'VALIDATION_ERROR'
  | 'INSUFFICIENT_FUNDS'
  | 'NOT_OWNER'
  | 'JOB_NOT_FOUND'
  | 'BLOB_NOT_FOUND'
  | 'ALREADY_TERMINAL'
  | 'INVALID_TRANSITION'
  | 'WORKER_BUSY'
  | 'SANDBOX_CREATION_FAILED'
  | 'CONCURRENT_MODIFICATION'
  | 'TRANSIENT_INFRA'
  | 'LEDGER_INTEGRITY'
  | 'LEDGER_HALTED'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN';

export class BrokerError extends Error {
  readonly code: BrokerErrorCode;
  readonly details?: unknown;

  constructor(code: BrokerErrorCode, message: string, details?: unknown) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = 'BrokerError';
  }
}

export class ValidationError extends BrokerError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

/** Expected outcome, not a fault: it drives the kill-switch path. */
export class InsufficientFundsError extends BrokerError {
  constructor(userId: string, requested: number, available: number) {
    super('INSUFFICIENT_FUNDS', `Insufficient funds for ${userId}: requested ${requested}, available ${available}`, {
      userId,
      requested,
      available,
    });
    this.name = 'InsufficientFundsError';
  }
}

export class NotOwnerError extends BrokerError {
  constructor(jobId: string) {
    super('NOT_OWNER', `Job ${jobId} belongs to another user`);
    this.name = 'NotOwnerError';
  }
}

export class JobNotFoundError extends BrokerError {
  constructor(jobId: string) {
    super('JOB_NOT_FOUND', `Job ${jobId} not found`);
    this.name = 'JobNotFoundError';
  }
}

export class BlobNotFoundError extends BrokerError {
  constructor(jobId: string, blobPath: string) {
    super('BLOB_NOT_FOUND', `No blob ${blobPath} for job ${jobId}`);
    this.name = 'BlobNotFoundError';
  }
}

export class AlreadyTerminalError extends BrokerError {
  constructor(jobId: string, status: string) {
    super('ALREADY_TERMINAL', `Job ${jobId} is already ${status}`, { status });
    this.name = 'AlreadyTerminalError';
  }
}

export class InvalidTransitionError extends BrokerError {
  constructor(jobId: string, from: string, to: string) {
    super('INVALID_TRANSITION', `Job ${jobId}: illegal transition ${from} → ${to}`, { from, to });
    this.name = 'InvalidTransitionError';
  }
}

export class WorkerBusyError extends BrokerError {
  constructor(activeJobId: string, rejectedJobId: string) {
    super('WORKER_BUSY', `Worker busy with ${activeJobId}; dispatch of ${rejectedJobId} rejected`, {
      activeJobId,
      rejectedJobId,
    });
    this.name = 'WorkerBusyError';
  }
}

export class SandboxCreationError extends BrokerError {
  constructor(jobId: string, cause: string) {
    super('SANDBOX_CREATION_FAILED', `Sandbox creation failed for job ${jobId}: ${cause}`);
    this.name = 'SandboxCreationError';
  }
}

export class ConcurrentModificationError extends BrokerError {
  constructor(entity: string, id: string) {
    super('CONCURRENT_MODIFICATION', `${entity} ${id} was modified concurrently`);
    this.name = 'ConcurrentModificationError';
  }
}

/** Blob store / queue / network failure that is worth retrying. */
export class TransientInfraError extends BrokerError {
  constructor(message: string, details?: unknown) {
    super('TRANSIENT_INFRA', message, details);
    this.name = 'TransientInfraError';
  }
}

/** Money-correctness violation. Never swallowed; the wallet is frozen when raised. */
export class LedgerIntegrityError extends BrokerError {
  constructor(userId: string, message: string, details?: unknown) {
    super('LEDGER_INTEGRITY', `Ledger integrity violation for ${userId}: ${message}`, details);
    this.name = 'LedgerIntegrityError';
  }
}

export class LedgerHaltedError extends BrokerError {
  constructor(userId: string, reason: string | null) {
    super('LEDGER_HALTED', `Wallet ${userId} is frozen pending reconciliation${reason ? `: ${reason}` : ''}`);
    this.name = 'LedgerHaltedError';
  }
}

export class UnauthorizedError extends BrokerError {
  constructor(message = 'Unauthorized') {
    super('UNAUTHORIZED', message);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends BrokerError {
  constructor(message = 'Forbidden') {
    super('FORBIDDEN', message);
    this.name = 'ForbiddenError';
  }
}

const STATUS_BY_CODE: Record<BrokerErrorCode, number> = {
  VALIDATION_ERROR: 400,
  INSUFFICIENT_FUNDS: 402,
  NOT_OWNER: 403,
  JOB_NOT_FOUND: 404,
  BLOB_NOT_FOUND: 404,
  ALREADY_TERMINAL: 409,
  INVALID_TRANSITION: 409,
  WORKER_BUSY: 409,
  SANDBOX_CREATION_FAILED: 500,
  CONCURRENT_MODIFICATION: 409,
  TRANSIENT_INFRA: 503,
  LEDGER_INTEGRITY: 500,
  LEDGER_HALTED: 423,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
};

export function httpStatusFor(err: unknown): number {
  return err instanceof BrokerError ? STATUS_BY_CODE[err.code] : 500;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
