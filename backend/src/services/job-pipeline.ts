/**
 * Job submission pipeline
 * validate → reserve → record (pending) → store inputs → enqueue
 *
 * Blob and queue failures are retried with backoff; once the budget is spent the job
 * fails with `dispatch_failed` and its reservation is returned.
 */

import crypto from 'crypto';
import type { ControllerConfig } from '../config.js';
import { NotOwnerError, ValidationError, errorMessage } from '../errors.js';
import { retryWithBackoff } from '../lib/backoff.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import { tickCost } from '../lib/money.js';
import type { DispatchQueue } from '../repositories/dispatch-queue.js';
import type { CancelResult, JobRecord, JobStatus, ResourceConfig, SubmitJobRequest } from '../types/jobs.js';
import type { AuditRecorder } from './auditService.js';
import type { BillingCoordinator } from './billing.js';
import { normalizeBlobPath, type BlobStore } from './blob-store.js';
import type { JobStore } from './job-store.js';
import type { LogRelay } from './log-relay.js';
import type { WalletLedger } from './wallet.js';

export const LOG_BLOB = 'logs/output.log';

const MEMORY_RE = /^\d+[bkmg]?$/i;
const IMAGE_RE = /^[a-z0-9]+(?:[._/:@-][A-Za-z0-9_.-]+)*$/;
const MAX_INPUT_BYTES = 50 * 1024 * 1024;

export type JobServiceConfig = Pick<
  ControllerConfig,
  'billing' | 'defaultResources' | 'defaultImage' | 'defaultEntrypoint' | 'maxTimeoutSeconds' | 'dispatchRetry'
>;

export interface JobServiceDeps {
  jobs: JobStore;
  ledger: WalletLedger;
  coordinator: BillingCoordinator;
  queue: DispatchQueue;
  blobs: BlobStore;
  relay: LogRelay;
  audit: AuditRecorder;
  config: JobServiceConfig;
  logger?: Logger;
}

// ── Validation ──

export function resolveResources(
  requested: Partial<ResourceConfig> | undefined,
  defaults: ResourceConfig,
  maxTimeoutSeconds: number,
): ResourceConfig {
  const merged: ResourceConfig = { ...defaults, ...requested };
  if (!MEMORY_RE.test(merged.memoryLimit)) {
    throw new ValidationError(`Invalid memory limit "${merged.memoryLimit}"`);
  }
  if (!Number.isInteger(merged.cpuCount) || merged.cpuCount < 1) {
    throw new ValidationError(`cpuCount must be a positive integer`);
  }
  if (!Number.isInteger(merged.gpuCount) || merged.gpuCount < -1) {
    throw new ValidationError(`gpuCount must be -1 (all), 0 or a device count`);
  }
  if (!Number.isInteger(merged.timeoutSeconds) || merged.timeoutSeconds < 1 || merged.timeoutSeconds > maxTimeoutSeconds) {
    throw new ValidationError(`timeoutSeconds must be between 1 and ${maxTimeoutSeconds}`);
  }
  return merged;
}

// ── Service ──

export interface RecoveryReport {
  /** Preparing and running jobs handed back to the coordinator. */
  active: number;
  /** Pending jobs failed because their dispatch message was never written. */
  failedPending: number;
  /** Holds returned because their job record was never written. */
  orphanHolds: number;
}

export class JobService {
  private readonly log: Logger;

  constructor(private readonly deps: JobServiceDeps) {
    this.log = deps.logger ?? componentLogger('jobs');
  }

  /**
   * Submit a job. Fails with InsufficientFunds (and creates nothing) when the upfront
   * reservation cannot be made.
   */
  async submit(request: SubmitJobRequest): Promise<JobRecord> {
    const { config, ledger, jobs } = this.deps;
    const dockerImage = request.dockerImage ?? config.defaultImage;
    if (!IMAGE_RE.test(dockerImage)) throw new ValidationError(`Invalid docker image "${dockerImage}"`);
    const entrypoint = normalizeBlobPath(request.entrypoint ?? config.defaultEntrypoint);
    const resourceConfig = resolveResources(request.resourceConfig, config.defaultResources, config.maxTimeoutSeconds);

    const inputs = request.inputs.map((input) => ({ path: normalizeBlobPath(input.path), content: input.content }));
    const inputPaths = inputs.map((i) => i.path);
    if (new Set(inputPaths).size !== inputPaths.length) throw new ValidationError('Duplicate input paths');
    if (!inputPaths.includes(entrypoint)) {
      throw new ValidationError(`Entrypoint "${entrypoint}" is not among the inputs`);
    }
    const totalBytes = inputs.reduce((sum, i) => sum + i.content.length, 0);
    if (totalBytes > MAX_INPUT_BYTES) throw new ValidationError(`Inputs exceed ${MAX_INPUT_BYTES} bytes`);

    const { ratePerMinute, tickSeconds, minReserveTicks } = config.billing;
    const reserveAmount = tickCost(ratePerMinute, tickSeconds) * Math.max(1, minReserveTicks);

    const jobId = crypto.randomUUID();
    const token = await ledger.reserve(request.ownerId, reserveAmount, jobId);

    const now = new Date().toISOString();
    const record: JobRecord = {
      id: jobId,
      ownerId: request.ownerId,
      status: 'pending',
      dockerImage,
      entrypoint,
      resourceConfig,
      inputPaths,
      ratePerMinute,
      tickSeconds,
      reservationId: token.reservationId,
      createdAt: now,
      startedAt: null,
      endedAt: null,
      runtimeSeconds: 0,
      ticksBilled: 0,
      totalCost: 0,
      exitReason: null,
      exitCode: null,
      errorMessage: null,
      sandboxId: null,
      workerId: null,
      termination: null,
      version: 0,
    };

    let created: JobRecord;
    try {
      created = await jobs.create(record);
    } catch (err: unknown) {
      await ledger.release(token);
      throw err;
    }
    this.log.info({ jobId, ownerId: request.ownerId, reserved: reserveAmount }, 'job submitted');
    void this.deps.audit.record({ actor: request.ownerId, action: 'job.submitted', resourceId: jobId, details: { dockerImage } });

    try {
      for (const input of inputs) {
        await this.withRetry(`store input ${input.path}`, () =>
          this.deps.blobs.write(jobId, `input/${input.path}`, input.content),
        );
      }
      await this.withRetry('enqueue', () => this.deps.queue.enqueue(jobId));
    } catch (err: unknown) {
      this.log.error({ jobId, err: errorMessage(err) }, 'dispatch failed');
      return this.deps.coordinator.failPending(jobId, 'dispatch_failed', errorMessage(err));
    }
    return created;
  }

  async get(jobId: string, requesterId?: string): Promise<JobRecord> {
    const job = await this.deps.jobs.require(jobId);
    if (requesterId !== undefined && job.ownerId !== requesterId) throw new NotOwnerError(jobId);
    return job;
  }

  async list(ownerId: string, opts: { status?: JobStatus; limit?: number; offset?: number } = {}): Promise<JobRecord[]> {
    const limit = Math.min(Math.max(opts.limit ?? 20, 1), 100);
    return this.deps.jobs.listByOwner(ownerId, { status: opts.status, limit, offset: Math.max(opts.offset ?? 0, 0) });
  }

  async cancel(jobId: string, requesterId: string): Promise<CancelResult> {
    const result = await this.deps.coordinator.cancel(jobId, requesterId);
    this.log.info({ jobId, requesterId, outcome: result.outcome }, 'cancel accepted');
    return result;
  }

  /**
   * Restart recovery. Runs before the server takes requests, so no submission is in
   * flight between its reserve and its create.
   */
  async recover(): Promise<RecoveryReport> {
    const { coordinator, jobs, ledger, queue } = this.deps;
    const active = await coordinator.recover();

    let failedPending = 0;
    for (const job of await jobs.listByStatus(['pending'])) {
      if (await queue.hasOpen(job.id)) continue;
      await coordinator.failPending(job.id, 'dispatch_failed', 'dispatch interrupted by a controller restart');
      failedPending += 1;
    }

    let orphanHolds = 0;
    for (const held of await ledger.heldReservations()) {
      if (await jobs.get(held.jobId)) continue;
      await ledger.release(held.id);
      orphanHolds += 1;
    }

    if (failedPending + orphanHolds > 0) {
      this.log.warn({ failedPending, orphanHolds }, 'cleaned up submissions interrupted by a restart');
    }
    return { active, failedPending, orphanHolds };
  }

  /** Stored log once the worker uploaded it, otherwise the relay buffer. */
  async readLogs(jobId: string, requesterId?: string): Promise<string> {
    await this.get(jobId, requesterId);
    const stored = await this.deps.blobs.read(jobId, LOG_BLOB);
    if (stored) return stored.toString('utf8');
    return this.deps.relay
      .snapshot(jobId)
      .flatMap((e) => (e.type === 'log' ? [e.line] : []))
      .join('\n');
  }

  async listOutputs(jobId: string, requesterId?: string): Promise<string[]> {
    await this.get(jobId, requesterId);
    return this.deps.blobs.list(jobId, 'output');
  }

  async readOutput(jobId: string, outputPath: string, requesterId?: string): Promise<Buffer | null> {
    await this.get(jobId, requesterId);
    return this.deps.blobs.read(jobId, `output/${normalizeBlobPath(outputPath)}`);
  }

  private async withRetry<T>(what: string, fn: () => Promise<T>): Promise<T> {
    return retryWithBackoff(() => fn(), {
      ...this.deps.config.dispatchRetry,
      isRetryable: (err) => !(err instanceof ValidationError),
      onRetry: (err, attempt, delayMs) =>
        this.log.warn({ what, attempt, delayMs, err: errorMessage(err) }, 'transient failure, retrying'),
    });
  }
}
