import pino, { Logger } from 'pino';

import { config } from '../config';
import { getLogContext } from './log-context';

/**
 * Pino logger configuration
 * - Production: JSON logs at info level
 * - Development: Pretty printed logs at debug level
 * - Test: Disabled for cleaner test output
 */
export const logger = pino({
  level: config.logging.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  // Correlation and job ids of the current request or job
  mixin: () => ({ ...getLogContext() }),
  base: {
    service: 'finance-manager',
    env: config.nodeEnv,
  },
  ...(config.logging.prettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

// Child logger factory for component-specific logging
export const createServiceLogger = (serviceName: string): Logger => {
  return logger.child({ component: serviceName });
};
