/**
 * Structured logging for Waypost
 */

import pino from 'pino';
import type { RetrievalResource } from '../types/index.js';

export interface LogContext {
  requestId?: string;
  resource?: RetrievalResource;
}

const pretty = process.env.NODE_ENV === 'development';

// Logs go to stderr so command output on stdout stays clean
const baseLogger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2,
          },
        }
      : undefined,
    base: {
      service: 'waypost',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  },
  pretty ? undefined : pino.destination(2)
);

export function createLogger(name: string, context?: LogContext) {
  return baseLogger.child({ component: name, ...context });
}

export function createFetchLogger(requestId: string, resource: RetrievalResource) {
  return baseLogger.child({ component: 'fetch', requestId, resource });
}

export { baseLogger as logger };

export type Logger = pino.Logger;
