import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { HeartbeatReply } from '../types/jobs.js';
import { HeartbeatEmitter } from '../worker/heartbeat-emitter.js';
import { createFakeClient, type FakeClient } from './setup.js';

describe('Heartbeat Emitter', () => {
  let client: FakeClient;
  let alive: boolean;
  let emitter: HeartbeatEmitter;

  beforeEach(() => {
    vi.useFakeTimers();
    client = createFakeClient();
    alive = true;
    emitter = new HeartbeatEmitter({ jobId: 'job-001', tickSeconds: 60, client, isAlive: () => alive });
  });

  afterEach(() => {
    emitter.stop();
    vi.useRealTimers();
  });

  async function elapse(seconds: number): Promise<void> {
    await vi.advanceTimersByTimeAsync(seconds * 1000);
    await emitter.idle();
  }

  function sentTicks(): number[] {
    return client.sendHeartbeat.mock.calls.map(([hb]) => hb.tickSeq);
  }

  it('should close one tick per interval', async () => {
    const billed: HeartbeatReply[] = [];
    emitter.on('billed', (reply: HeartbeatReply) => billed.push(reply));
    emitter.start();

    await elapse(59);
    expect(sentTicks()).toEqual([]);

    await elapse(1);
    await elapse(60);

    expect(sentTicks()).toEqual([1, 2]);
    expect(billed.map((r) => r.expectedSeq)).toEqual([2, 3]);
    expect(emitter.ticksClosed).toBe(2);
    expect(client.sendHeartbeat.mock.calls[0]?.[0]).toMatchObject({
      jobId: 'job-001',
      elapsedSecondsSinceLastHeartbeat: 60,
      sandboxAlive: true,
    });
  });

  it('should resend an unacknowledged tick before the next one', async () => {
    client.sendHeartbeat.mockRejectedValueOnce(new Error('connection refused'));
    emitter.start();

    await elapse(60);
    expect(emitter.unacknowledged).toEqual([1]);

    await elapse(60);
    expect(sentTicks()).toEqual([1, 1, 2]);
    expect(emitter.unacknowledged).toEqual([]);
  });

  it('should report the sandbox state sampled when the tick closes', async () => {
    emitter.start();
    alive = false;

    await elapse(60);

    expect(client.sendHeartbeat.mock.calls[0]?.[0].sandboxAlive).toBe(false);
  });

  it('should stop ticking once the controller halts the job', async () => {
    client.sendHeartbeat.mockResolvedValueOnce({ status: 'insufficient_funds', expectedSeq: 1, continue: false });
    const halted = vi.fn();
    emitter.on('halt', halted);
    emitter.start();

    await elapse(60);
    await elapse(180);

    expect(halted).toHaveBeenCalledWith({ status: 'insufficient_funds', expectedSeq: 1, continue: false });
    expect(sentTicks()).toEqual([1]);
  });

  it('should keep a tick the controller has not reached yet', async () => {
    client.sendHeartbeat.mockResolvedValueOnce({ status: 'ahead_of_clock', expectedSeq: 1, continue: true });
    emitter.start();

    await elapse(60);
    expect(emitter.unacknowledged).toEqual([1]);

    await elapse(60);
    expect(sentTicks()).toEqual([1, 1, 2]);
  });

  it('should skip ticks the controller already billed', async () => {
    client.sendHeartbeat
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce({ status: 'out_of_order', expectedSeq: 2, continue: true });
    emitter.start();

    await elapse(60);
    await elapse(60);

    // tick 1 is answered out_of_order (already billed), tick 2 goes out next
    expect(sentTicks()).toEqual([1, 1, 2]);
    expect(emitter.unacknowledged).toEqual([]);
  });
});
