/**
 * Shared route helpers: body parsing, error replies and response views.
 */
import type { FastifyReply } from 'fastify';
import type { z } from 'zod';
import { BrokerError, ValidationError, errorMessage, httpStatusFor } from '../errors.js';
import { formatCredits } from '../lib/money.js';
import type { JobRecord } from '../types/jobs.js';
import type { LedgerTransaction, WalletBalance } from '../types/ledger.js';

export function parse<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
    throw new ValidationError(`Invalid request: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

export function sendError(reply: FastifyReply, err: unknown): FastifyReply {
  const status = httpStatusFor(err);
  if (status >= 500) reply.log.error({ err: errorMessage(err) }, 'request failed');
  const code = err instanceof BrokerError ? err.code : 'INTERNAL';
  return reply.status(status).send({ success: false, error: errorMessage(err), code });
}

// ── Views ──────────────────────────────────────────────────────────────────

export function jobView(job: JobRecord) {
  return {
    id: job.id,
    status: job.status,
    dockerImage: job.dockerImage,
    entrypoint: job.entrypoint,
    resourceConfig: job.resourceConfig,
    inputPaths: job.inputPaths,
    ratePerMinute: formatCredits(job.ratePerMinute),
    tickSeconds: job.tickSeconds,
    createdAt: job.createdAt,
    startedAt: job.startedAt,
    endedAt: job.endedAt,
    runtimeSeconds: job.runtimeSeconds,
    ticksBilled: job.ticksBilled,
    totalCost: formatCredits(job.totalCost),
    exitReason: job.exitReason,
    exitCode: job.exitCode,
    errorMessage: job.errorMessage,
    pendingTermination: job.termination?.kind ?? null,
  };
}

export function balanceView(balance: WalletBalance) {
  return {
    userId: balance.userId,
    balance: formatCredits(balance.balance),
    reserved: formatCredits(balance.reserved),
    available: formatCredits(balance.available),
    frozen: balance.frozen,
    raw: { balanceCents: balance.balance, reservedCents: balance.reserved, availableCents: balance.available },
  };
}

export function transactionView(tx: LedgerTransaction) {
  return {
    id: tx.id,
    sequence: tx.sequence,
    type: tx.type,
    amount: formatCredits(tx.amount),
    balanceAfter: formatCredits(tx.balanceAfter),
    reservedAfter: formatCredits(tx.reservedAfter),
    jobId: tx.jobId,
    tickSeq: tx.tickSeq,
    externalRef: tx.externalRef,
    description: tx.description,
    createdAt: tx.createdAt,
  };
}
