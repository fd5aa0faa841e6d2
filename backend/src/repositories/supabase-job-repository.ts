import type { SupabaseClient } from '@supabase/supabase-js';
import { ConcurrentModificationError, TransientInfraError } from '../errors.js';
import type { DbJob } from '../types/db.js';
import type { JobRecord, JobStatus } from '../types/jobs.js';
import type { JobListQuery, JobRepository } from './job-repository.js';
import { jobToRow, mapJob } from './mappers.js';

export class SupabaseJobRepository implements JobRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(job: JobRecord): Promise<JobRecord> {
    const { data, error } = await this.db.from('jobs').insert(jobToRow(job)).select().single();
    if (error) {
      if (error.code === '23505') throw new ConcurrentModificationError('job', job.id);
      throw new TransientInfraError(`Job insert failed: ${error.message}`);
    }
    const row: DbJob = data;
    return mapJob(row);
  }

  async get(id: string): Promise<JobRecord | null> {
    const { data, error } = await this.db.from('jobs').select('*').eq('id', id).maybeSingle();
    if (error) throw new TransientInfraError(`Job lookup failed: ${error.message}`);
    const row: DbJob | null = data;
    return row ? mapJob(row) : null;
  }

  // Compare-and-set on version: zero rows updated means someone else won.
  async update(next: JobRecord): Promise<JobRecord> {
    const row = { ...jobToRow(next), version: next.version + 1 };
    const { data, error } = await this.db
      .from('jobs')
      .update(row)
      .eq('id', next.id)
      .eq('version', next.version)
      .select()
      .maybeSingle();
    if (error) throw new TransientInfraError(`Job update failed: ${error.message}`);
    const updated: DbJob | null = data;
    if (!updated) throw new ConcurrentModificationError('job', next.id);
    return mapJob(updated);
  }

  async listByOwner(ownerId: string, query: JobListQuery): Promise<JobRecord[]> {
    let q = this.db.from('jobs').select('*').eq('owner_id', ownerId);
    if (query.status) q = q.eq('status', query.status);
    const { data, error } = await q
      .order('created_at', { ascending: false })
      .range(query.offset, query.offset + query.limit - 1);
    if (error) throw new TransientInfraError(`Job list failed: ${error.message}`);
    const rows: DbJob[] = data ?? [];
    return rows.map(mapJob);
  }

  async listByStatus(statuses: JobStatus[]): Promise<JobRecord[]> {
    const { data, error } = await this.db.from('jobs').select('*').in('status', statuses);
    if (error) throw new TransientInfraError(`Job list failed: ${error.message}`);
    const rows: DbJob[] = data ?? [];
    return rows.map(mapJob);
  }
}
