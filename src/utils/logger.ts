/**
 * Structured Logger
 *
 * Pino-based JSON logging.
 * - Local: pretty-printed, colorized (pino-pretty)
 * - Test: silent unless LOG_LEVEL says otherwise
 * - Production: JSON lines
 *
 * Usage:
 *   const logger = serviceLogger.child({ module: 'SyncReconciler' });
 *   logger.info({ recordId, employeeId }, 'Record synced');
 */

import pino from 'pino';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isTest = nodeEnv === 'test';
const isLocal = nodeEnv === 'development' || nodeEnv === 'local';

export const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : isLocal ? 'debug' : 'info'),

  redact: {
    paths: ['pin', '*.pin', 'evidence.pin', 'token', 'apiToken', 'authorization', 'headers.authorization'],
    censor: '[REDACTED]',
  },

  base: {
    service: 'attendance-engine',
    env: nodeEnv,
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  transport: isLocal && !isTest
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,service,env',
        },
      }
    : undefined,
});

export const serviceLogger = logger.child({ layer: 'service' });
export const syncLogger = logger.child({ layer: 'sync' });
export const storageLogger = logger.child({ layer: 'storage' });

export function createLogger(module: string): pino.Logger {
  return serviceLogger.child({ module });
}
