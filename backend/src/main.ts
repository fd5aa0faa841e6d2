/**
 * Controller entry point.
 * Startup: validate config, build backends, recover jobs and holds left by a restart,
 * then listen.
 */
import { loadControllerConfig } from './config.js';
import { createController } from './controller.js';
import { errorMessage } from './errors.js';
import { componentLogger } from './lib/logger.js';
import { buildServer } from './server.js';

const log = componentLogger('main');

const start = async (): Promise<void> => {
  const config = loadControllerConfig();
  const controller = createController(config);
  const recovered = await controller.jobs.recover();
  const app = await buildServer(controller);

  await app.listen({ port: config.port, host: config.host });
  log.info({ port: config.port, storage: config.storageBackend, recovered }, 'controller listening');

  const shutdown = async (signal: string): Promise<void> => {
    log.info({ signal }, 'shutting down');
    await app.close();
    process.exit(0);
  };
  process.once('SIGTERM', (signal) => void shutdown(signal));
  process.once('SIGINT', (signal) => void shutdown(signal));
};

start().catch((err: unknown) => {
  log.fatal({ err: errorMessage(err) }, 'controller failed to start');
  process.exit(1);
});
