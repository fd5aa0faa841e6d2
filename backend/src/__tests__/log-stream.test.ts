import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventEmitter } from 'events';
import { LogStreamClient, type FinalStatus, type LogStreamOptions } from '../client/log-stream.js';
import type { RelayEvent } from '../types/jobs.js';

const AT = '2026-01-01T00:00:00.000Z';

class FakeSocket extends EventEmitter {
  closed = false;

  constructor(readonly url: string) {
    super();
  }

  close(): void {
    this.closed = true;
  }

  send(event: RelayEvent): void {
    this.emit('message', Buffer.from(JSON.stringify(event)));
  }
}

function log(seq: number, line: string): RelayEvent {
  return { type: 'log', jobId: 'job-001', seq, line, at: AT };
}

function finalStatus(seq: number): FinalStatus {
  return { type: 'status', jobId: 'job-001', seq, status: 'completed', final: true, exitReason: 'exit_success', at: AT };
}

describe('Log Stream Client', () => {
  let sockets: FakeSocket[];
  let client: LogStreamClient;

  function createClient(overrides: Partial<LogStreamOptions> = {}): LogStreamClient {
    client = new LogStreamClient({
      baseUrl: 'http://localhost:3001/',
      jobId: 'job-001',
      token: 'test-token',
      reconnect: { baseMs: 1, maxMs: 1, maxAttempts: 3 },
      connect: (url) => {
        const socket = new FakeSocket(url);
        sockets.push(socket);
        return socket;
      },
      ...overrides,
    });
    return client;
  }

  function socket(index: number): FakeSocket {
    const found = sockets[index];
    if (!found) throw new Error(`no socket #${index}`);
    return found;
  }

  beforeEach(() => {
    sockets = [];
  });

  afterEach(() => {
    client.stop();
  });

  it('should build the stream url from the http base', () => {
    createClient();

    expect(client.url()).toBe('ws://localhost:3001/api/jobs/job-001/logs/stream?token=test-token&after=0');
  });

  it('should emit logs and resolve with the final status', async () => {
    const lines: string[] = [];
    createClient().on('log', (e: RelayEvent) => {
      if (e.type === 'log') lines.push(e.line);
    });
    client.start();

    socket(0).emit('open');
    socket(0).send(log(1, 'loading data'));
    socket(0).send(log(2, 'training'));
    socket(0).send(finalStatus(3));

    expect(await client.done()).toEqual(finalStatus(3));
    expect(lines).toEqual(['loading data', 'training']);
    expect(socket(0).closed).toBe(true);
  });

  it('should resume after the last seen event and skip the replayed overlap', async () => {
    const seqs: number[] = [];
    createClient().on('log', (e: RelayEvent) => seqs.push(e.seq));
    client.start();

    socket(0).send(log(1, 'a'));
    socket(0).send(log(2, 'b'));
    socket(0).emit('close', 1006);

    await vi.waitFor(() => expect(sockets).toHaveLength(2));
    expect(socket(1).url).toBe('ws://localhost:3001/api/jobs/job-001/logs/stream?token=test-token&after=2');

    socket(1).send(log(2, 'b'));
    socket(1).send(log(3, 'c'));

    expect(seqs).toEqual([1, 2, 3]);
    expect(client.lastSeq).toBe(3);
  });

  it('should pass gaps through and move the cursor past them', () => {
    const gaps = vi.fn();
    createClient().on('gap', gaps);
    client.start();

    socket(0).send({ type: 'gap', jobId: 'job-001', seq: 40, dropped: 12, at: AT });

    expect(gaps).toHaveBeenCalledWith({ type: 'gap', jobId: 'job-001', seq: 40, dropped: 12, at: AT });
    expect(client.lastSeq).toBe(40);
  });

  it('should give up when the server refuses the stream', async () => {
    createClient().start();

    socket(0).emit('close', 1008);

    expect(await client.done()).toBeNull();
    expect(sockets).toHaveLength(1);
  });

  it('should give up after the reconnect budget is spent', async () => {
    const errors: string[] = [];
    createClient({ reconnect: { baseMs: 1, maxMs: 1, maxAttempts: 2 } }).on('error', (err: Error) =>
      errors.push(err.message),
    );
    client.start();

    socket(0).emit('close', 1006);
    await vi.waitFor(() => expect(sockets).toHaveLength(2));
    socket(1).emit('close', 1006);

    expect(await client.done()).toBeNull();
    expect(errors).toEqual(['Log stream for job-001 lost after 2 attempts']);
  });

  it('should count connections that open and close without progress against the budget', async () => {
    const errors: string[] = [];
    createClient().on('error', (err: Error) => errors.push(err.message));
    client.start();

    for (let i = 0; i < 3; i++) {
      await vi.waitFor(() => expect(sockets).toHaveLength(i + 1));
      socket(i).emit('open');
      socket(i).emit('close', 1011);
    }

    expect(await client.done()).toBeNull();
    expect(sockets).toHaveLength(3);
    expect(errors).toEqual(['Log stream for job-001 lost after 3 attempts']);
  });

  it('should restore the reconnect budget once a connection delivers new events', async () => {
    createClient({ reconnect: { baseMs: 1, maxMs: 1, maxAttempts: 2 } }).start();

    for (let i = 0; i < 3; i++) {
      await vi.waitFor(() => expect(sockets).toHaveLength(i + 1));
      socket(i).emit('open');
      socket(i).send(log(i + 1, `line ${i + 1}`));
      socket(i).emit('close', 1006);
    }

    await vi.waitFor(() => expect(sockets).toHaveLength(4));
    expect(client.lastSeq).toBe(3);
  });

  it('should report malformed events without ending the stream', () => {
    const errors: string[] = [];
    createClient().on('error', (err: Error) => errors.push(err.message));
    client.start();

    socket(0).emit('message', 'not json');
    socket(0).send(log(1, 'still here'));

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/^Malformed stream event: /);
    expect(client.lastSeq).toBe(1);
  });
});
