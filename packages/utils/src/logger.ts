/**
 * Logger
 *
 * Pino-based structured logger for all packages. Logs go to stderr so
 * that command output on stdout stays clean; encoder output never goes
 * through here, it is handed to the caller's line sink.
 */

import pino, { type LoggerOptions } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

const STDERR = 2;

const options: LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'ytp-forge',
    env: NODE_ENV,
    pid: process.pid,
  },
};

export const logger = NODE_ENV === 'development'
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: STDERR,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname,service,env',
        },
      },
    })
  : pino(options, pino.destination(STDERR));

export type Logger = typeof logger;

/**
 * Create a child logger scoped to a module, e.g. { module: 'compiler' }
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
