/**
 * Dispatch queue on a Postgres table. `claim_dispatch` picks the oldest visible message
 * with FOR UPDATE SKIP LOCKED and pushes its visibility forward in one statement.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { TransientInfraError } from '../errors.js';
import type { DbDispatchMessage } from '../types/db.js';
import type { DispatchMessage } from '../types/jobs.js';
import type { DispatchQueue } from './dispatch-queue.js';
import { mapDispatch } from './mappers.js';

export class SupabaseDispatchQueue implements DispatchQueue {
  constructor(private readonly db: SupabaseClient) {}

  async enqueue(jobId: string): Promise<DispatchMessage> {
    const { data, error } = await this.db
      .from('dispatch_queue')
      .insert({ job_id: jobId, status: 'queued', delivery_count: 0 })
      .select()
      .single();
    if (error) throw new TransientInfraError(`Enqueue failed: ${error.message}`);
    const row: DbDispatchMessage = data;
    return mapDispatch(row);
  }

  async claim(workerId: string, visibilityMs: number): Promise<DispatchMessage | null> {
    const { data, error } = await this.db.rpc('claim_dispatch', {
      p_worker_id: workerId,
      p_visibility_ms: visibilityMs,
    });
    if (error) throw new TransientInfraError(`Claim failed: ${error.message}`);
    const rows: DbDispatchMessage[] = data ?? [];
    const row = rows[0];
    return row ? mapDispatch(row) : null;
  }

  async ack(messageId: string): Promise<void> {
    const { error } = await this.db.from('dispatch_queue').update({ status: 'done' }).eq('id', messageId);
    if (error) throw new TransientInfraError(`Ack failed: ${error.message}`);
  }

  async release(messageId: string, delayMs: number): Promise<void> {
    const { error } = await this.db
      .from('dispatch_queue')
      .update({
        status: 'queued',
        claimed_by: null,
        visible_at: new Date(Date.now() + delayMs).toISOString(),
      })
      .eq('id', messageId)
      .neq('status', 'done');
    if (error) throw new TransientInfraError(`Release failed: ${error.message}`);
  }

  async depth(): Promise<number> {
    const { count, error } = await this.db
      .from('dispatch_queue')
      .select('id', { count: 'exact', head: true })
      .neq('status', 'done');
    if (error) throw new TransientInfraError(`Queue depth failed: ${error.message}`);
    return count ?? 0;
  }

  async hasOpen(jobId: string): Promise<boolean> {
    const { count, error } = await this.db
      .from('dispatch_queue')
      .select('id', { count: 'exact', head: true })
      .eq('job_id', jobId)
      .neq('status', 'done');
    if (error) throw new TransientInfraError(`Dispatch lookup failed: ${error.message}`);
    return (count ?? 0) > 0;
  }
}
