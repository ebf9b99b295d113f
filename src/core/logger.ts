/**
 * Structured logger.
 * Everything goes to stderr: stdout belongs to CLI output and MCP frames.
 */

import pino from 'pino';

export type Logger = pino.Logger;

export const logger: Logger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    transport: process.env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: 2,
          },
        }
      : undefined,
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: 'fo-toolkit',
      version: process.env.npm_package_version || '0.1.0',
    },
  },
  process.env.NODE_ENV === 'development' ? undefined : pino.destination(2),
);

// Child logger per module
export function createLogger(module: string): Logger {
  return logger.child({ module });
}

export default logger;
