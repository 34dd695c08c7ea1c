import pino, { type Logger } from 'pino';

const logLevel = (typeof process !== 'undefined' && process.env && process.env.LOG_LEVEL) || 'info';

export const logger: Logger = pino({
  level: logLevel,
  base: { lib: 'aeroquery' },
});

export type { Logger };

/**
 * Child logger tagged with the component name.
 */
export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
