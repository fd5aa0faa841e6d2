import pino from 'pino';

export type Logger = pino.Logger;

export const logger: Logger = pino({
  name: 'gpumeter',
  level: process.env.LOG_LEVEL || 'info',
  base: { pid: process.pid },
});

/** Child logger tagged with the component name. */
export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
