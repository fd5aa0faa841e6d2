/**
 * Job record persistence with optimistic versioning.
 * `update` writes `version + 1` only if the stored version still equals the caller's copy.
 */

import { ConcurrentModificationError } from '../errors.js';
import type { JobRecord, JobStatus } from '../types/jobs.js';

export interface JobListQuery {
  status?: JobStatus;
  limit: number;
  offset: number;
}

export interface JobRepository {
  insert(job: JobRecord): Promise<JobRecord>;
  get(id: string): Promise<JobRecord | null>;
  /** Persist `next` if the stored version is `next.version`; returns the row with the bumped version. */
  update(next: JobRecord): Promise<JobRecord>;
  /** Newest first. */
  listByOwner(ownerId: string, query: JobListQuery): Promise<JobRecord[]>;
  listByStatus(statuses: JobStatus[]): Promise<JobRecord[]>;
}

export class InMemoryJobRepository implements JobRepository {
  private readonly jobs = new Map<string, JobRecord>();

  async insert(job: JobRecord): Promise<JobRecord> {
    if (this.jobs.has(job.id)) throw new ConcurrentModificationError('job', job.id);
    this.jobs.set(job.id, structuredClone(job));
    return structuredClone(job);
  }

  async get(id: string): Promise<JobRecord | null> {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : null;
  }

  async update(next: JobRecord): Promise<JobRecord> {
    const current = this.jobs.get(next.id);
    if (!current || current.version !== next.version) {
      throw new ConcurrentModificationError('job', next.id);
    }
    const stored: JobRecord = { ...structuredClone(next), version: next.version + 1 };
    this.jobs.set(next.id, stored);
    return structuredClone(stored);
  }

  async listByOwner(ownerId: string, query: JobListQuery): Promise<JobRecord[]> {
    return [...this.jobs.values()]
      .filter((j) => j.ownerId === ownerId && (!query.status || j.status === query.status))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(query.offset, query.offset + query.limit)
      .map((j) => structuredClone(j));
  }

  async listByStatus(statuses: JobStatus[]): Promise<JobRecord[]> {
    return [...this.jobs.values()].filter((j) => statuses.includes(j.status)).map((j) => structuredClone(j));
  }
}
