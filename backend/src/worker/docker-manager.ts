/**
 * Docker sandbox runtime.
 * One container per job: no network, memory/CPU/PID caps, all capabilities dropped,
 * input mounted read-only, output writable, GPUs via device requests.
 */

import Docker from 'dockerode';
import readline from 'readline';
import { SandboxCreationError, errorMessage } from '../errors.js';
import { componentLogger, type Logger } from '../lib/logger.js';

const MANAGED_LABEL = 'gpumeter.managed_by';
const MANAGED_BY = 'gpumeter-worker';
const PIDS_LIMIT = 256;

export const INPUT_MOUNT = '/workspace/input';
export const OUTPUT_MOUNT = '/workspace/output';

export type SandboxSignal = 'SIGTERM' | 'SIGKILL';

export interface SandboxSpec {
  jobId: string;
  image: string;
  entrypoint: string;
  memoryLimit: string;
  cpuCount: number;
  gpuCount: number;
  /** Host directories. */
  inputDir: string;
  outputDir: string;
}

export interface ProcessHandle {
  id: string;
  jobId: string;
}

export interface SandboxExit {
  exitCode: number;
  oomKilled: boolean;
}

export interface SandboxRuntime {
  /** Create and start the sandbox. Throws SandboxCreationError. */
  create(spec: SandboxSpec): Promise<ProcessHandle>;
  signal(handle: ProcessHandle, signal: SandboxSignal): Promise<void>;
  wait(handle: ProcessHandle): Promise<SandboxExit>;
  streamStdout(handle: ProcessHandle): AsyncIterable<string>;
  remove(handle: ProcessHandle): Promise<void>;
}

// ── Helpers ──

/** "8g" → bytes. Plain numbers are bytes. */
export function parseMemoryLimit(limit: string): number {
  const match = /^(\d+)([bkmg]?)$/i.exec(limit.trim());
  if (!match) throw new Error(`Invalid memory limit "${limit}"`);
  const value = Number(match[1]);
  const unit = (match[2] ?? '').toLowerCase();
  const scale = unit === 'g' ? 1024 ** 3 : unit === 'm' ? 1024 ** 2 : unit === 'k' ? 1024 : 1;
  return value * scale;
}

function gpuRequests(gpuCount: number): Docker.DeviceRequest[] | undefined {
  if (gpuCount === 0) return undefined;
  return [{ Driver: 'nvidia', Count: gpuCount, Capabilities: [['gpu']], Options: {} }];
}

function statusCodeOf(err: unknown): number | null {
  if (err instanceof Error && 'statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  return null;
}

// ── Runtime ──

export class DockerSandboxRuntime implements SandboxRuntime {
  constructor(
    private readonly docker: Docker,
    private readonly log: Logger = componentLogger('docker'),
  ) {}

  async create(spec: SandboxSpec): Promise<ProcessHandle> {
    try {
      if (!(await this.imageExists(spec.image))) {
        this.log.info({ jobId: spec.jobId, image: spec.image }, 'pulling image');
        await this.pullImage(spec.image);
      }

      const memory = parseMemoryLimit(spec.memoryLimit);
      const container = await this.docker.createContainer({
        name: `gpumeter-job-${spec.jobId}`,
        Image: spec.image,
        Cmd: ['python3', `${INPUT_MOUNT}/${spec.entrypoint}`],
        WorkingDir: '/workspace',
        Tty: true,
        Env: [`JOB_ID=${spec.jobId}`, `OUTPUT_DIR=${OUTPUT_MOUNT}`, 'PYTHONUNBUFFERED=1'],
        HostConfig: {
          NetworkMode: 'none',
          Memory: memory,
          MemorySwap: memory,
          NanoCpus: spec.cpuCount * 1e9,
          PidsLimit: PIDS_LIMIT,
          CapDrop: ['ALL'],
          SecurityOpt: ['no-new-privileges'],
          DeviceRequests: gpuRequests(spec.gpuCount),
          Binds: [`${spec.inputDir}:${INPUT_MOUNT}:ro`, `${spec.outputDir}:${OUTPUT_MOUNT}:rw`],
          AutoRemove: false,
        },
        Labels: {
          'gpumeter.job_id': spec.jobId,
          [MANAGED_LABEL]: MANAGED_BY,
        },
      });
      await container.start();
      this.log.info({ jobId: spec.jobId, containerId: container.id.slice(0, 12) }, 'container started');
      return { id: container.id, jobId: spec.jobId };
    } catch (err: unknown) {
      throw new SandboxCreationError(spec.jobId, errorMessage(err));
    }
  }

  async signal(handle: ProcessHandle, signal: SandboxSignal): Promise<void> {
    try {
      await this.docker.getContainer(handle.id).kill({ signal });
    } catch (err: unknown) {
      // 404: gone, 409: not running. Either way there is nothing left to signal.
      const code = statusCodeOf(err);
      if (code === 404 || code === 409) return;
      throw err;
    }
  }

  async wait(handle: ProcessHandle): Promise<SandboxExit> {
    const container = this.docker.getContainer(handle.id);
    const result: { StatusCode: number } = await container.wait();
    const info = await container.inspect();
    return { exitCode: result.StatusCode, oomKilled: info.State.OOMKilled };
  }

  async *streamStdout(handle: ProcessHandle): AsyncIterable<string> {
    const stream = await this.docker.getContainer(handle.id).logs({
      follow: true,
      stdout: true,
      stderr: true,
    });
    // Tty containers emit a raw stream, no multiplexing headers.
    const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
    for await (const line of lines) yield line;
  }

  async remove(handle: ProcessHandle): Promise<void> {
    try {
      await this.docker.getContainer(handle.id).remove({ v: true, force: true });
    } catch (err: unknown) {
      if (statusCodeOf(err) === 404) return;
      throw err;
    }
  }

  /** Containers left behind by a previous worker process. */
  async removeOrphans(): Promise<number> {
    const containers = await this.docker.listContainers({
      all: true,
      filters: { label: [`${MANAGED_LABEL}=${MANAGED_BY}`] },
    });
    for (const info of containers) {
      await this.remove({ id: info.Id, jobId: info.Labels['gpumeter.job_id'] ?? 'unknown' });
    }
    if (containers.length > 0) this.log.warn({ count: containers.length }, 'removed orphaned containers');
    return containers.length;
  }

  private async imageExists(image: string): Promise<boolean> {
    try {
      await this.docker.getImage(image).inspect();
      return true;
    } catch {
      return false;
    }
  }

  private async pullImage(image: string): Promise<void> {
    const stream: NodeJS.ReadableStream = await this.docker.pull(image);
    return new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null) => {
        if (err) return reject(err);
        resolve();
      });
    });
  }
}
