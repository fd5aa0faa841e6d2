/**
 * Job record store.
 * Writes are serialized per job and applied with an optimistic version check, so the
 * coordinator and API handlers can race on one record without losing updates.
 */

import { EventEmitter } from 'events';
import { ConcurrentModificationError, JobNotFoundError } from '../errors.js';
import { KeyedMutex } from '../lib/keyed-mutex.js';
import type { JobListQuery, JobRepository } from '../repositories/job-repository.js';
import type { JobRecord, JobStatus } from '../types/jobs.js';
import { assertTransition } from './job-state.js';

const UPDATE_ATTEMPTS = 3;

export interface StatusChange {
  job: JobRecord;
  from: JobStatus;
}

/** Return the next record, or null to leave the stored one untouched. */
export type JobMutation = (current: JobRecord) => JobRecord | null;

export interface MutationResult {
  job: JobRecord;
  changed: boolean;
}

export class JobStore extends EventEmitter {
  private readonly locks = new KeyedMutex();

  constructor(private readonly repo: JobRepository) {
    super();
  }

  async create(job: JobRecord): Promise<JobRecord> {
    return this.repo.insert(job);
  }

  async get(id: string): Promise<JobRecord | null> {
    return this.repo.get(id);
  }

  async require(id: string): Promise<JobRecord> {
    const job = await this.repo.get(id);
    if (!job) throw new JobNotFoundError(id);
    return job;
  }

  async listByOwner(ownerId: string, query: JobListQuery): Promise<JobRecord[]> {
    return this.repo.listByOwner(ownerId, query);
  }

  async listByStatus(statuses: JobStatus[]): Promise<JobRecord[]> {
    return this.repo.listByStatus(statuses);
  }

  /**
   * Apply `fn` to the latest stored copy. Status changes are checked against the
   * transition table and announced with a `status` event after the write.
   */
  async mutate(id: string, fn: JobMutation): Promise<MutationResult> {
    const result = await this.locks.run(id, async () => {
      for (let attempt = 1; ; attempt++) {
        const current = await this.require(id);
        const next = fn(current);
        if (!next) return { job: current, changed: false, from: current.status };
        if (next.status !== current.status) assertTransition(id, current.status, next.status);
        try {
          const saved = await this.repo.update({ ...next, version: current.version });
          return { job: saved, changed: true, from: current.status };
        } catch (err: unknown) {
          if (!(err instanceof ConcurrentModificationError) || attempt >= UPDATE_ATTEMPTS) throw err;
        }
      }
    });

    if (result.changed && result.job.status !== result.from) {
      const change: StatusChange = { job: result.job, from: result.from };
      this.emit('status', change);
    }
    return { job: result.job, changed: result.changed };
  }

  onStatus(listener: (change: StatusChange) => void): () => void {
    this.on('status', listener);
    return () => this.off('status', listener);
  }
}
