import pino, { type Logger } from 'pino';

// stdout carries the report; logs go to stderr.
export const logger = pino(
  {
    name: 'worktime',
    level: process.env.WORKTIME_LOG_LEVEL || 'warn',
  },
  pino.destination(2),
);

export type { Logger };

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
