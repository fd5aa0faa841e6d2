import { describe, it, expect, vi, afterEach } from 'vitest';
import { LogRelay, type RelayOptions } from '../services/log-relay.js';
import type { RelayEvent } from '../types/jobs.js';

const JOB = 'job-001';

function describeEvent(e: RelayEvent): string {
  switch (e.type) {
    case 'log':
      return `log:${e.seq}:${e.line}`;
    case 'status':
      return `status:${e.seq}:${e.status}${e.final ? ':final' : ''}`;
    case 'gap':
      return `gap:${e.seq}:${e.dropped}`;
  }
}

describe('Log Relay', () => {
  let relay: LogRelay;

  function createRelay(overrides: Partial<RelayOptions> = {}): LogRelay {
    relay = new LogRelay({ bufferLines: 100, queueLimit: 100, retentionMs: 60_000, ...overrides });
    return relay;
  }

  afterEach(() => {
    relay.close();
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Buffer
  // ═══════════════════════════════════════════════════════════════════════════
  describe('buffer', () => {
    it('should number events per job in publish order', () => {
      createRelay();
      relay.appendLogs(JOB, ['one', 'two']);
      relay.publishStatus(JOB, 'running', false, null);
      relay.appendLogs('job-002', ['other']);

      expect(relay.snapshot(JOB).map(describeEvent)).toEqual(['log:1:one', 'log:2:two', 'status:3:running']);
      expect(relay.snapshot(JOB, 2).map(describeEvent)).toEqual(['status:3:running']);
      expect(relay.lastSeq('job-002')).toBe(1);
    });

    it('should keep only the most recent events', () => {
      createRelay({ bufferLines: 3 });
      relay.appendLogs(JOB, ['a', 'b', 'c', 'd', 'e']);

      expect(relay.snapshot(JOB).map((e) => e.seq)).toEqual([3, 4, 5]);
    });

    it('should ignore events after the final status', () => {
      createRelay();
      relay.publishStatus(JOB, 'completed', true, 'exit_success');
      relay.appendLogs(JOB, ['late line']);
      relay.publishStatus(JOB, 'failed', true, 'sandbox_error');

      expect(relay.snapshot(JOB).map(describeEvent)).toEqual(['status:1:completed:final']);
    });

    it('should drop a finished job after the retention period', async () => {
      createRelay({ retentionMs: 10 });
      relay.publishStatus(JOB, 'completed', true, 'exit_success');
      expect(relay.has(JOB)).toBe(true);

      await vi.waitFor(() => expect(relay.has(JOB)).toBe(false));
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Subscriptions
  // ═══════════════════════════════════════════════════════════════════════════
  describe('subscribe', () => {
    it('should replay buffered events after the cursor, then tail live ones', async () => {
      createRelay();
      relay.appendLogs(JOB, ['one', 'two', 'three']);
      const seen: string[] = [];

      relay.subscribe(JOB, 1, (e) => {
        seen.push(describeEvent(e));
      });
      relay.appendLogs(JOB, ['four']);

      await vi.waitFor(() => expect(seen).toEqual(['log:2:two', 'log:3:three', 'log:4:four']));
    });

    it('should end the subscription after the final status', async () => {
      createRelay();
      const seen: string[] = [];
      const onEnd = vi.fn();

      relay.subscribe(JOB, 0, (e) => {
        seen.push(describeEvent(e));
      }, onEnd);
      relay.appendLogs(JOB, ['done']);
      relay.publishStatus(JOB, 'completed', true, 'exit_success');

      await vi.waitFor(() => expect(onEnd).toHaveBeenCalledTimes(1));
      expect(seen).toEqual(['log:1:done', 'status:2:completed:final']);
      expect(relay.subscriberCount(JOB)).toBe(0);
    });

    it('should drop the oldest queued events for a slow subscriber and report the gap', async () => {
      createRelay({ queueLimit: 2 });
      const seen: string[] = [];
      let unblock: () => void = () => {};
      const blocked = new Promise<void>((resolve) => {
        unblock = resolve;
      });

      relay.subscribe(JOB, 0, async (e) => {
        seen.push(describeEvent(e));
        if (e.seq === 1 && e.type === 'log') await blocked;
      });
      relay.appendLogs(JOB, ['a']);
      await vi.waitFor(() => expect(seen).toEqual(['log:1:a']));

      // Publishing does not wait on the stuck subscriber.
      relay.appendLogs(JOB, ['b', 'c', 'd', 'e']);
      expect(relay.lastSeq(JOB)).toBe(5);

      unblock();
      await vi.waitFor(() => expect(seen).toEqual(['log:1:a', 'gap:3:2', 'log:4:d', 'log:5:e']));
    });

    it('should keep fast subscribers complete while a slow one lags', async () => {
      createRelay({ queueLimit: 1 });
      const fast: number[] = [];
      relay.subscribe(JOB, 0, (e) => {
        fast.push(e.seq);
      });
      relay.subscribe(JOB, 0, () => new Promise<void>(() => {}));

      relay.appendLogs(JOB, ['a']);
      await vi.waitFor(() => expect(fast).toEqual([1]));
      relay.appendLogs(JOB, ['b']);
      await vi.waitFor(() => expect(fast).toEqual([1, 2]));
    });

    it('should detach a subscriber whose delivery fails', async () => {
      createRelay();
      const onEnd = vi.fn();

      relay.subscribe(JOB, 0, () => {
        throw new Error('socket closed');
      }, onEnd);
      relay.appendLogs(JOB, ['a']);

      await vi.waitFor(() => expect(onEnd).toHaveBeenCalledTimes(1));
      expect(relay.subscriberCount(JOB)).toBe(0);
    });

    it('should stop delivering once closed', async () => {
      createRelay();
      const seen: number[] = [];
      const sub = relay.subscribe(JOB, 0, (e) => {
        seen.push(e.seq);
      });

      relay.appendLogs(JOB, ['a']);
      await vi.waitFor(() => expect(seen).toEqual([1]));
      sub.close();
      relay.appendLogs(JOB, ['b']);
      await new Promise((resolve) => setImmediate(resolve));

      expect(seen).toEqual([1]);
      expect(relay.subscriberCount(JOB)).toBe(0);
    });
  });
});
