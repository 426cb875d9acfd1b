/**
 * Structured Logger with Pino
 */
import pino, { type Logger as PinoLogger } from 'pino';
import { getOperation } from './operation-context.js';

export interface LogContext {
  operationId?: string;
  actor?: string;
  customerId?: string;
  invoiceId?: string;
  [key: string]: unknown;
}

const isDev = process.env.NODE_ENV === 'development';

export const logger: PinoLogger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  base: {
    service: 'weighbill',
    env: process.env.NODE_ENV || 'development',
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createChildLogger(context: LogContext): PinoLogger {
  return logger.child(context);
}

/**
 * Logger bound to the operation currently running, if any, so store and
 * ledger lines share the orchestrator call's operationId.
 */
export function operationLogger(context: LogContext = {}): PinoLogger {
  const operation = getOperation();
  if (!operation) {
    return Object.keys(context).length > 0 ? logger.child(context) : logger;
  }
  return logger.child({
    operationId: operation.operationId,
    actor: operation.actor,
    ...context,
  });
}

export type { PinoLogger as Logger };
