/**
 * Audit trail for billing and lifecycle decisions and for API requests.
 * Fire-and-forget: a failed insert is logged and never reaches the caller.
 * Every event is mirrored to the structured log.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { errorMessage } from '../errors.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import type { DbAuditLog } from '../types/db.js';

// ── Types ────────────────────────────────────────────────────────────────────

export interface AuditEvent {
  actor?: string | null;
  action: string;
  resourceId?: string | null;
  details?: Record<string, unknown> | null;
}

export interface AuditRecord {
  id: string;
  actor: string | null;
  action: string;
  resourceId: string | null;
  details: Record<string, unknown> | null;
  timestamp: string;
}

export interface AuditFilters {
  actor?: string;
  action?: string;
  resourceId?: string;
  from?: string;   // ISO date
  to?: string;     // ISO date
  page?: number;
  limit?: number;
}

export interface AuditRecorder {
  record(event: AuditEvent): Promise<void>;
}

const MEMORY_LIMIT = 5000;

// ── Service ──────────────────────────────────────────────────────────────────

/**
 * Writes to the Supabase `audit_logs` table when a client is given, otherwise keeps
 * the most recent records in memory.
 */
export class AuditService implements AuditRecorder {
  private readonly memory: AuditRecord[] = [];
  private counter = 0;

  constructor(
    private readonly db: SupabaseClient | null,
    private readonly log: Logger = componentLogger('audit'),
  ) {}

  /** Never rejects. */
  async record(event: AuditEvent): Promise<void> {
    const row = {
      actor: event.actor ?? null,
      action: event.action,
      resource_id: event.resourceId ?? null,
      details: event.details ?? null,
      timestamp: new Date().toISOString(),
    };
    this.log.info({ audit: row }, event.action);

    if (!this.db) {
      this.counter += 1;
      this.memory.push({
        id: String(this.counter),
        actor: row.actor,
        action: row.action,
        resourceId: row.resource_id,
        details: row.details,
        timestamp: row.timestamp,
      });
      if (this.memory.length > MEMORY_LIMIT) this.memory.shift();
      return;
    }

    try {
      const { error } = await this.db.from('audit_logs').insert(row);
      if (error) this.log.warn({ err: error.message, action: event.action }, 'audit insert failed');
    } catch (err: unknown) {
      this.log.warn({ err: errorMessage(err), action: event.action }, 'audit insert failed');
    }
  }

  /** Newest first. */
  async query(filters: AuditFilters): Promise<AuditRecord[]> {
    const page = filters.page ?? 1;
    const limit = filters.limit ?? 50;
    const offset = (page - 1) * limit;

    if (!this.db) {
      return this.memory
        .filter(
          (r) =>
            (!filters.actor || r.actor === filters.actor) &&
            (!filters.action || r.action === filters.action) &&
            (!filters.resourceId || r.resourceId === filters.resourceId) &&
            (!filters.from || r.timestamp >= filters.from) &&
            (!filters.to || r.timestamp <= filters.to),
        )
        .reverse()
        .slice(offset, offset + limit);
    }

    let query = this.db
      .from('audit_logs')
      .select('id, actor, action, resource_id, details, timestamp')
      .order('timestamp', { ascending: false })
      .range(offset, offset + limit - 1);

    if (filters.actor) query = query.eq('actor', filters.actor);
    if (filters.action) query = query.eq('action', filters.action);
    if (filters.resourceId) query = query.eq('resource_id', filters.resourceId);
    if (filters.from) query = query.gte('timestamp', filters.from);
    if (filters.to) query = query.lte('timestamp', filters.to);

    const { data, error } = await query;
    if (error) throw new Error(`Audit query failed: ${error.message}`);
    const rows: DbAuditLog[] = data ?? [];
    return rows.map(mapAudit);
  }
}

function mapAudit(row: DbAuditLog): AuditRecord {
  return {
    id: row.id,
    actor: row.actor,
    action: row.action,
    resourceId: row.resource_id,
    details: row.details,
    timestamp: row.timestamp,
  };
}
