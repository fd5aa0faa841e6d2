import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { hashBody, sanitise } from '../middleware/auditLogger.js';
import { AuditService } from '../services/auditService.js';

describe('Audit Service', () => {
  let audit: AuditService;

  beforeEach(async () => {
    vi.useFakeTimers();
    audit = new AuditService(null);

    vi.setSystemTime(new Date('2026-01-01T10:00:00Z'));
    await audit.record({ actor: 'user-001', action: 'job.submitted', resourceId: 'job-001' });
    vi.setSystemTime(new Date('2026-01-01T11:00:00Z'));
    await audit.record({ actor: 'user-001', action: 'wallet.credit', resourceId: 'user-001', details: { amount: 500 } });
    vi.setSystemTime(new Date('2026-01-01T12:00:00Z'));
    await audit.record({ action: 'job.kill_issued', resourceId: 'job-001', details: { kind: 'cancel' } });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // query (in-memory)
  // ═══════════════════════════════════════════════════════════════════════════
  it('should return records newest first', async () => {
    const records = await audit.query({});

    expect(records.map((r) => r.action)).toEqual(['job.kill_issued', 'wallet.credit', 'job.submitted']);
    expect(records[0]).toEqual({
      id: '3',
      actor: null,
      action: 'job.kill_issued',
      resourceId: 'job-001',
      details: { kind: 'cancel' },
      timestamp: '2026-01-01T12:00:00.000Z',
    });
  });

  it('should filter by actor, action and resource', async () => {
    expect((await audit.query({ actor: 'user-001' })).map((r) => r.id)).toEqual(['2', '1']);
    expect((await audit.query({ action: 'wallet.credit' })).map((r) => r.id)).toEqual(['2']);
    expect((await audit.query({ resourceId: 'job-001' })).map((r) => r.id)).toEqual(['3', '1']);
  });

  it('should filter by time window', async () => {
    const records = await audit.query({ from: '2026-01-01T10:30:00.000Z', to: '2026-01-01T11:30:00.000Z' });

    expect(records.map((r) => r.action)).toEqual(['wallet.credit']);
  });

  it('should page results', async () => {
    expect((await audit.query({ limit: 2, page: 1 })).map((r) => r.id)).toEqual(['3', '2']);
    expect((await audit.query({ limit: 2, page: 2 })).map((r) => r.id)).toEqual(['1']);
  });
});

describe('Audit Logger helpers', () => {
  it('should redact sensitive keys at any depth', () => {
    expect(
      sanitise({
        jobId: 'job-001',
        token: 'test-token',
        nested: { apiKey: 'test-key', list: [{ Password: 'test-password', keep: 1 }] },
      }),
    ).toEqual({
      jobId: 'job-001',
      token: '[REDACTED]',
      nested: { apiKey: '[REDACTED]', list: [{ Password: '[REDACTED]', keep: 1 }] },
    });
  });

  it('should pass scalars through', () => {
    expect(sanitise('plain')).toBe('plain');
    expect(sanitise(null)).toBeNull();
  });

  it('should hash bodies with sha256 and skip empty ones', () => {
    expect(hashBody('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    expect(hashBody({ a: 1 })).toBe(hashBody('{"a":1}'));
    expect(hashBody(undefined)).toBeNull();
    expect(hashBody('')).toBeNull();
  });
});
