// src/utils/logger.ts

import winston from 'winston';

/**
 * Module-scoped winston logger. Console output is silenced under Jest so test
 * runs only print assertion failures.
 */
export function createLogger(service: string): winston.Logger {
  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    defaultMeta: { service },
    transports: [
      new winston.transports.Console({ silent: process.env.NODE_ENV === 'test' }),
    ],
  });
}
