/**
 * Controller composition root: builds the storage backends and services from config.
 * Tests pass repositories of their own through `overrides`.
 */

import type { ControllerConfig } from './config.js';
import { ValidationError } from './errors.js';
import { componentLogger } from './lib/logger.js';
import { createServiceClient, type SupabaseClient } from './lib/supabase.js';
import { InMemoryDispatchQueue, type DispatchQueue } from './repositories/dispatch-queue.js';
import { InMemoryJobRepository, type JobRepository } from './repositories/job-repository.js';
import { InMemoryLedgerRepository, type LedgerRepository } from './repositories/ledger-repository.js';
import { SupabaseDispatchQueue } from './repositories/supabase-dispatch-queue.js';
import { SupabaseJobRepository } from './repositories/supabase-job-repository.js';
import { SupabaseLedgerRepository } from './repositories/supabase-ledger-repository.js';
import { AuditService } from './services/auditService.js';
import { BillingCoordinator } from './services/billing.js';
import { FsBlobStore, SupabaseBlobStore, type BlobStore } from './services/blob-store.js';
import { JobService } from './services/job-pipeline.js';
import { isTerminal } from './services/job-state.js';
import { JobStore } from './services/job-store.js';
import { KillChannel } from './services/kill-channel.js';
import { LogRelay } from './services/log-relay.js';
import { WalletLedger } from './services/wallet.js';
import { WorkerGateway } from './services/worker-gateway.js';

export interface Backends {
  ledgerRepo: LedgerRepository;
  jobRepo: JobRepository;
  queue: DispatchQueue;
  blobs: BlobStore;
  db: SupabaseClient | null;
}

export interface Controller {
  config: ControllerConfig;
  audit: AuditService;
  ledger: WalletLedger;
  store: JobStore;
  kills: KillChannel;
  relay: LogRelay;
  coordinator: BillingCoordinator;
  jobs: JobService;
  gateway: WorkerGateway;
  queue: DispatchQueue;
  blobs: BlobStore;
  /** Stops watchdogs and drops relay state. */
  close(): Promise<void>;
}

export function createBackends(config: ControllerConfig): Backends {
  const needsDb = config.storageBackend === 'supabase' || config.blobBackend === 'supabase';
  let db: SupabaseClient | null = null;
  if (needsDb) {
    if (!config.supabaseUrl || !config.supabaseServiceKey) {
      throw new ValidationError('Supabase backend selected without SUPABASE_URL / SUPABASE_SERVICE_KEY');
    }
    db = createServiceClient(config.supabaseUrl, config.supabaseServiceKey);
  }

  const blobs: BlobStore = db && config.blobBackend === 'supabase'
    ? new SupabaseBlobStore(db, config.blobBucket)
    : new FsBlobStore(config.blobRoot);

  if (db && config.storageBackend === 'supabase') {
    return {
      ledgerRepo: new SupabaseLedgerRepository(db),
      jobRepo: new SupabaseJobRepository(db),
      queue: new SupabaseDispatchQueue(db),
      blobs,
      db,
    };
  }
  return {
    ledgerRepo: new InMemoryLedgerRepository(),
    jobRepo: new InMemoryJobRepository(),
    queue: new InMemoryDispatchQueue(),
    blobs,
    db,
  };
}

export function createController(config: ControllerConfig, overrides: Partial<Backends> = {}): Controller {
  const backends: Backends = { ...createBackends(config), ...overrides };
  const audit = new AuditService(backends.db);
  const ledger = new WalletLedger(backends.ledgerRepo, audit);
  const store = new JobStore(backends.jobRepo);
  const kills = new KillChannel({ bestEffortTtlMs: config.billing.killAckTimeoutSeconds * 1000 });
  const relay = new LogRelay({
    bufferLines: config.logBufferLines,
    queueLimit: config.subscriberQueueLimit,
    retentionMs: config.logRetentionSeconds * 1000,
  });
  const coordinator = new BillingCoordinator({ jobs: store, ledger, kills, audit, billing: config.billing });
  const jobs = new JobService({
    jobs: store,
    ledger,
    coordinator,
    queue: backends.queue,
    blobs: backends.blobs,
    relay,
    audit,
    config,
  });
  const gateway = new WorkerGateway({
    jobs: store,
    queue: backends.queue,
    coordinator,
    kills,
    relay,
    blobs: backends.blobs,
    visibilityMs: config.dispatchVisibilityMs,
  });

  // Every status change reaches live subscribers; terminal ones close their streams.
  const log = componentLogger('controller');
  const unsubscribe = store.onStatus(({ job, from }) => {
    relay.publishStatus(job.id, job.status, isTerminal(job.status), job.exitReason);
    log.debug({ jobId: job.id, from, to: job.status }, 'status changed');
  });

  return {
    config,
    audit,
    ledger,
    store,
    kills,
    relay,
    coordinator,
    jobs,
    gateway,
    queue: backends.queue,
    blobs: backends.blobs,
    close: async () => {
      unsubscribe();
      await coordinator.stop();
      relay.close();
    },
  };
}
