/**
 * Controller side of the worker protocol.
 * The /api/worker routes delegate here; integration tests hand it to the worker
 * components directly in place of HttpControllerClient.
 */

import { BlobNotFoundError, ValidationError } from '../errors.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import type { DispatchQueue } from '../repositories/dispatch-queue.js';
import type {
  AcceptReply,
  ControlReply,
  DispatchMessage,
  ExitReport,
  Heartbeat,
  HeartbeatReply,
  KillAck,
  KillCommand,
} from '../types/jobs.js';
import type { ControllerClient } from '../worker/controller-client.js';
import type { BillingCoordinator } from './billing.js';
import { normalizeBlobPath, type BlobStore } from './blob-store.js';
import { isTerminal } from './job-state.js';
import type { JobStore } from './job-store.js';
import type { KillChannel } from './kill-channel.js';
import type { LogRelay } from './log-relay.js';

const WRITABLE_ROOTS = new Set(['output', 'logs']);

export interface WorkerGatewayDeps {
  jobs: JobStore;
  queue: DispatchQueue;
  coordinator: BillingCoordinator;
  kills: KillChannel;
  relay: LogRelay;
  blobs: BlobStore;
  visibilityMs: number;
  logger?: Logger;
}

export class WorkerGateway implements ControllerClient {
  private readonly log: Logger;

  constructor(private readonly deps: WorkerGatewayDeps) {
    this.log = deps.logger ?? componentLogger('worker-gateway');
  }

  async claimDispatch(workerId: string): Promise<DispatchMessage | null> {
    const message = await this.deps.queue.claim(workerId, this.deps.visibilityMs);
    if (message) this.log.debug({ workerId, jobId: message.jobId, delivery: message.deliveryCount }, 'dispatch claimed');
    return message;
  }

  async ackDispatch(messageId: string): Promise<void> {
    await this.deps.queue.ack(messageId);
  }

  async releaseDispatch(messageId: string, delayMs: number): Promise<void> {
    await this.deps.queue.release(messageId, delayMs);
  }

  acceptDispatch(jobId: string, workerId: string): Promise<AcceptReply> {
    return this.deps.coordinator.accept(jobId, workerId);
  }

  reportStarted(jobId: string, sandboxId: string): Promise<ControlReply> {
    return this.deps.coordinator.markRunning(jobId, sandboxId);
  }

  sendHeartbeat(heartbeat: Heartbeat): Promise<HeartbeatReply> {
    return this.deps.coordinator.heartbeat(heartbeat);
  }

  async pollCommands(jobId: string): Promise<KillCommand[]> {
    return this.deps.kills.commandsFor(jobId);
  }

  ackKill(ack: KillAck): Promise<void> {
    return this.deps.coordinator.onKillAck(ack);
  }

  reportExit(report: ExitReport): Promise<void> {
    return this.deps.coordinator.onExit(report);
  }

  /** Lines for a finished job are discarded. */
  async publishLogs(jobId: string, lines: string[]): Promise<void> {
    const job = await this.deps.jobs.require(jobId);
    if (isTerminal(job.status)) return;
    this.deps.relay.appendLogs(jobId, lines);
  }

  async fetchInput(jobId: string, path: string): Promise<Buffer> {
    const blobPath = `input/${normalizeBlobPath(path)}`;
    const content = await this.deps.blobs.read(jobId, blobPath);
    if (!content) throw new BlobNotFoundError(jobId, blobPath);
    return content;
  }

  async uploadBlob(jobId: string, path: string, content: Buffer): Promise<void> {
    const blobPath = normalizeBlobPath(path);
    const root = blobPath.split('/')[0] ?? '';
    if (!WRITABLE_ROOTS.has(root) || !blobPath.includes('/')) {
      throw new ValidationError(`Workers may only write under output/ or logs/, got "${path}"`);
    }
    await this.deps.jobs.require(jobId);
    await this.deps.blobs.write(jobId, blobPath, content);
  }
}
