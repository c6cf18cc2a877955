/**
 * Structured Logger
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: {
    service: 'marketplace-core',
    environment: process.env.NODE_ENV ?? 'development',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
  },
});
