/**
 * Worker process entry point.
 * One worker drives one GPU host and runs at most one sandbox at a time.
 */
import Docker from 'dockerode';
import { loadWorkerConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { componentLogger } from '../lib/logger.js';
import { DispatchAgent } from './agent.js';
import { HttpControllerClient } from './controller-client.js';
import { DockerSandboxRuntime } from './docker-manager.js';
import { ExecutionSupervisor } from './supervisor.js';
import { Workspace } from './workspace.js';

const log = componentLogger('worker');

const start = async (): Promise<void> => {
  const config = loadWorkerConfig();
  const docker = new Docker({ socketPath: config.dockerSocket });
  const runtime = new DockerSandboxRuntime(docker);
  await runtime.removeOrphans();

  const client = new HttpControllerClient({
    baseUrl: config.controllerUrl,
    workerSecret: config.workerSecret,
    retry: config.requestRetry,
  });
  const supervisor = new ExecutionSupervisor({
    runtime,
    client,
    workspace: new Workspace(config.workDir, client),
    killGraceSeconds: config.killGraceSeconds,
    commandPollMs: config.commandPollMs,
    logFlushMs: config.logFlushMs,
  });
  const agent = new DispatchAgent({
    workerId: config.workerId,
    client,
    supervisor,
    pollIntervalMs: config.pollIntervalMs,
    requeueBackoff: config.requestRetry,
  });
  agent.start();
  log.info({ workerId: config.workerId, controller: config.controllerUrl }, 'worker ready');

  const shutdown = async (signal: string): Promise<void> => {
    log.info({ signal }, 'shutting down');
    await agent.stop();
    const active = supervisor.activeJobId;
    if (active) await supervisor.kill(active, 'worker shutdown');
    await supervisor.idle();
    process.exit(0);
  };
  process.once('SIGTERM', (signal) => void shutdown(signal));
  process.once('SIGINT', (signal) => void shutdown(signal));
};

start().catch((err: unknown) => {
  log.fatal({ err: errorMessage(err) }, 'worker failed to start');
  process.exit(1);
});
