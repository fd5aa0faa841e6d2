/**
 * Execution supervisor — owns the single sandbox slot on this worker.
 *
 * A dispatch while the slot is taken is rejected with WorkerBusyError; nothing is
 * queued in-process. While the sandbox lives, the supervisor emits timer-driven
 * heartbeats, ships log lines in batches and polls the controller's kill channel.
 * kill(): SIGTERM, wait up to the grace period, SIGKILL; logs are flushed before the
 * kill is acknowledged.
 *
 * Events: 'started' (jobId), 'finished' (JobOutcome)
 */

import { EventEmitter } from 'events';
import { SandboxCreationError, WorkerBusyError, errorMessage } from '../errors.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import type { JobSpec, WorkerExitReason } from '../types/jobs.js';
import type { ControllerClient } from './controller-client.js';
import type { ProcessHandle, SandboxExit, SandboxRuntime } from './docker-manager.js';
import { HeartbeatEmitter } from './heartbeat-emitter.js';
import type { Workspace } from './workspace.js';

const LOG_DRAIN_MS = 5_000;
const DEFAULT_MAX_LOG_BYTES = 10 * 1024 * 1024;

export type JobWorkspace = Pick<Workspace, 'prepare' | 'outputs' | 'readOutput' | 'cleanup'>;

export interface SupervisorOptions {
  runtime: SandboxRuntime;
  client: ControllerClient;
  workspace: JobWorkspace;
  killGraceSeconds: number;
  commandPollMs: number;
  logFlushMs: number;
  maxLogBytes?: number;
  logger?: Logger;
}

export interface JobOutcome {
  jobId: string;
  exitCode: number | null;
  reason: WorkerExitReason;
  /** Kill commands acknowledged on exit. */
  acknowledged: string[];
  error?: string;
}

interface ActiveJob {
  spec: JobSpec;
  handle: ProcessHandle | null;
  alive: boolean;
  exited: Promise<SandboxExit> | null;
  heartbeat: HeartbeatEmitter | null;
  killing: Promise<void> | null;
  killRequested: string | null;
  killCommands: Set<string>;
  timedOut: boolean;
  timers: NodeJS.Timeout[];
  batch: string[];
  shipping: Promise<void>;
  fullLog: string[];
  logBytes: number;
}

export class ExecutionSupervisor extends EventEmitter {
  private slot: ActiveJob | null = null;
  private readonly inflight = new Set<Promise<void>>();
  private readonly log: Logger;
  private readonly maxLogBytes: number;

  constructor(private readonly options: SupervisorOptions) {
    super();
    this.log = options.logger ?? componentLogger('supervisor');
    this.maxLogBytes = options.maxLogBytes ?? DEFAULT_MAX_LOG_BYTES;
  }

  get busy(): boolean {
    return this.slot !== null;
  }

  get activeJobId(): string | null {
    return this.slot?.spec.jobId ?? null;
  }

  /**
   * Prepare inputs, start the sandbox and report it upstream. Setup failures are
   * reported as the job's exit and rethrown.
   */
  async launch(spec: JobSpec): Promise<ProcessHandle> {
    if (this.slot) throw new WorkerBusyError(this.slot.spec.jobId, spec.jobId);
    const job: ActiveJob = {
      spec,
      handle: null,
      alive: false,
      exited: null,
      heartbeat: null,
      killing: null,
      killRequested: null,
      killCommands: new Set(),
      timedOut: false,
      timers: [],
      batch: [],
      shipping: Promise.resolve(),
      fullLog: [],
      logBytes: 0,
    };
    this.slot = job;
    this.startCommandPoller(job);

    let handle: ProcessHandle;
    try {
      const dirs = await this.options.workspace.prepare(spec.jobId, spec.inputPaths);
      handle = await this.options.runtime.create({
        jobId: spec.jobId,
        image: spec.dockerImage,
        entrypoint: spec.entrypoint,
        memoryLimit: spec.resourceConfig.memoryLimit,
        cpuCount: spec.resourceConfig.cpuCount,
        gpuCount: spec.resourceConfig.gpuCount,
        inputDir: dirs.inputDir,
        outputDir: dirs.outputDir,
      });
    } catch (err: unknown) {
      const reason: WorkerExitReason = err instanceof SandboxCreationError ? 'sandbox_error' : 'setup_error';
      await this.finishWithoutSandbox(job, reason, errorMessage(err));
      throw err;
    }

    job.handle = handle;
    job.alive = true;
    job.exited = this.options.runtime.wait(handle);
    this.track(this.run(job, handle));
    this.emit('started', spec.jobId);

    if (job.killRequested) {
      this.track(this.kill(spec.jobId, job.killRequested));
      return handle;
    }

    try {
      const reply = await this.options.client.reportStarted(spec.jobId, handle.id);
      if (!reply.continue) {
        this.track(this.kill(spec.jobId, 'controller refused start'));
        return handle;
      }
    } catch (err: unknown) {
      this.log.error({ jobId: spec.jobId, err: errorMessage(err) }, 'start report failed, stopping sandbox');
      this.track(this.kill(spec.jobId, 'start report failed'));
      return handle;
    }

    this.startHeartbeat(job);
    const timeout = setTimeout(() => {
      job.timedOut = true;
      this.track(this.kill(spec.jobId, 'timeout'));
    }, spec.resourceConfig.timeoutSeconds * 1000);
    job.timers.push(timeout);
    return handle;
  }

  /**
   * Stop the sandbox. Idempotent: concurrent calls share one termination. A command id
   * is acknowledged to the controller once the process is gone.
   */
  async kill(jobId: string, reason: string, commandId?: string): Promise<void> {
    const job = this.slot;
    if (!job || job.spec.jobId !== jobId) return;
    if (commandId) job.killCommands.add(commandId);
    if (!job.handle) {
      job.killRequested ??= reason;
      return;
    }
    if (!job.killing) job.killing = this.terminate(job, job.handle, reason);
    return job.killing;
  }

  /** Resolves when no supervisor work is in flight. */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  // ── Run ──

  private async run(job: ActiveJob, handle: ProcessHandle): Promise<void> {
    const pump = this.pumpLogs(job, handle);
    const flusher = setInterval(() => this.shipLogs(job), this.options.logFlushMs);
    job.timers.push(flusher);

    let exitCode: number | null = null;
    let reason: WorkerExitReason = 'exited';
    let error: string | undefined;
    try {
      const exit = await (job.exited ?? this.options.runtime.wait(handle));
      exitCode = exit.exitCode;
      if (exit.oomKilled) reason = 'oom_killed';
      else if (job.timedOut) reason = 'timeout';
    } catch (err: unknown) {
      reason = 'sandbox_error';
      error = errorMessage(err);
    }
    job.alive = false;
    this.stopTimers(job);
    job.heartbeat?.stop();

    await Promise.race([pump, delay(LOG_DRAIN_MS)]);
    this.shipLogs(job);
    await job.shipping;
    await job.heartbeat?.idle();
    await this.persistResults(job);

    const acknowledged = [...job.killCommands];
    await this.report(job, exitCode, reason, error);
    await this.release(job, handle);

    const outcome: JobOutcome = { jobId: job.spec.jobId, exitCode, reason, acknowledged, error };
    this.log.info({ ...outcome }, 'job finished on worker');
    this.emit('finished', outcome);
  }

  private async terminate(job: ActiveJob, handle: ProcessHandle, reason: string): Promise<void> {
    this.log.info({ jobId: job.spec.jobId, reason }, 'stopping sandbox');
    job.heartbeat?.stop();
    await this.options.runtime.signal(handle, 'SIGTERM');

    let graceTimer: NodeJS.Timeout | undefined;
    const grace = new Promise<'grace'>((resolve) => {
      graceTimer = setTimeout(() => resolve('grace'), this.options.killGraceSeconds * 1000);
    });
    const exited = (job.exited ?? Promise.resolve(null)).then(
      () => 'exited' as const,
      () => 'exited' as const,
    );
    const first = await Promise.race([exited, grace]);
    clearTimeout(graceTimer);
    if (first === 'grace') {
      this.log.warn({ jobId: job.spec.jobId }, 'grace period over, force killing');
      await this.options.runtime.signal(handle, 'SIGKILL');
    }
  }

  private async report(job: ActiveJob, exitCode: number | null, reason: WorkerExitReason, error?: string): Promise<void> {
    const { client } = this.options;
    const jobId = job.spec.jobId;
    try {
      if (job.killCommands.size > 0) {
        for (const commandId of job.killCommands) await client.ackKill({ jobId, commandId, exitCode });
      } else {
        await client.reportExit({ jobId, exitCode, reason, error });
      }
    } catch (err: unknown) {
      // The controller's watchdogs close the job without us.
      this.log.error({ jobId, err: errorMessage(err) }, 'exit report failed');
    }
  }

  private async finishWithoutSandbox(job: ActiveJob, reason: WorkerExitReason, error: string): Promise<void> {
    this.stopTimers(job);
    this.log.error({ jobId: job.spec.jobId, reason, error }, 'sandbox setup failed');
    const acknowledged = [...job.killCommands];
    await this.report(job, null, reason, error);
    await this.cleanupWorkspace(job.spec.jobId);
    this.slot = null;
    this.emit('finished', { jobId: job.spec.jobId, exitCode: null, reason, acknowledged, error });
  }

  private async release(job: ActiveJob, handle: ProcessHandle): Promise<void> {
    try {
      await this.options.runtime.remove(handle);
    } catch (err: unknown) {
      this.log.warn({ jobId: job.spec.jobId, err: errorMessage(err) }, 'container removal failed');
    }
    await this.cleanupWorkspace(job.spec.jobId);
    if (this.slot === job) this.slot = null;
  }

  private async cleanupWorkspace(jobId: string): Promise<void> {
    try {
      await this.options.workspace.cleanup(jobId);
    } catch (err: unknown) {
      this.log.warn({ jobId, err: errorMessage(err) }, 'workspace cleanup failed');
    }
  }

  // ── Heartbeats and commands ──

  private startHeartbeat(job: ActiveJob): void {
    const heartbeat = new HeartbeatEmitter({
      jobId: job.spec.jobId,
      tickSeconds: job.spec.tickSeconds,
      client: this.options.client,
      isAlive: () => job.alive,
      logger: this.log,
    });
    heartbeat.on('halt', () => {
      this.track(this.kill(job.spec.jobId, 'halted by controller'));
    });
    job.heartbeat = heartbeat;
    heartbeat.start();
  }

  private startCommandPoller(job: ActiveJob): void {
    let polling = false;
    const poll = async (): Promise<void> => {
      if (polling) return;
      polling = true;
      try {
        const commands = await this.options.client.pollCommands(job.spec.jobId);
        for (const command of commands) {
          this.log.info({ jobId: job.spec.jobId, kind: command.kind }, 'kill command received');
          this.track(this.kill(job.spec.jobId, command.kind, command.commandId));
        }
      } catch (err: unknown) {
        this.log.warn({ jobId: job.spec.jobId, err: errorMessage(err) }, 'command poll failed');
      } finally {
        polling = false;
      }
    };
    const timer = setInterval(() => this.track(poll()), this.options.commandPollMs);
    job.timers.push(timer);
  }

  // ── Logs and results ──

  private async pumpLogs(job: ActiveJob, handle: ProcessHandle): Promise<void> {
    try {
      for await (const line of this.options.runtime.streamStdout(handle)) {
        job.batch.push(line);
        if (job.logBytes < this.maxLogBytes) {
          job.fullLog.push(line);
          job.logBytes += Buffer.byteLength(line) + 1;
        }
      }
    } catch (err: unknown) {
      this.log.warn({ jobId: job.spec.jobId, err: errorMessage(err) }, 'log stream ended with error');
    }
  }

  /** Batches are sent one after another; a failed batch is dropped. */
  private shipLogs(job: ActiveJob): void {
    if (job.batch.length === 0) return;
    const lines = job.batch.splice(0);
    job.shipping = job.shipping.then(async () => {
      try {
        await this.options.client.publishLogs(job.spec.jobId, lines);
      } catch (err: unknown) {
        this.log.warn({ jobId: job.spec.jobId, lines: lines.length, err: errorMessage(err) }, 'log batch dropped');
      }
    });
  }

  private async persistResults(job: ActiveJob): Promise<void> {
    const { client, workspace } = this.options;
    const jobId = job.spec.jobId;
    try {
      await client.uploadBlob(jobId, 'logs/output.log', Buffer.from(job.fullLog.join('\n'), 'utf8'));
      for (const rel of await workspace.outputs(jobId)) {
        await client.uploadBlob(jobId, `output/${rel}`, await workspace.readOutput(jobId, rel));
      }
    } catch (err: unknown) {
      this.log.error({ jobId, err: errorMessage(err) }, 'result upload failed');
    }
  }

  private stopTimers(job: ActiveJob): void {
    for (const timer of job.timers) clearTimeout(timer);
    job.timers = [];
  }

  private track(work: Promise<void>): void {
    const tracked = work.catch((err: unknown) => {
      this.log.error({ err: errorMessage(err) }, 'supervisor task failed');
    });
    this.inflight.add(tracked);
    void tracked.finally(() => this.inflight.delete(tracked));
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, ms);
    timer.unref();
  });
}
