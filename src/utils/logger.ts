// src/utils/logger.ts
import pino from 'pino';
import type { Logger } from 'pino';
import { loadConfig } from '../config';

const { logLevel, production } = loadConfig();

const baseConfig: pino.LoggerOptions = {
  level: logLevel,

  ...(production ? {
    timestamp: pino.stdTimeFunctions.isoTime,
  } : {}),

  base: {
    pid: process.pid,
    service: 'radix-spellcheck',
  },

  serializers: {
    err: pino.stdSerializers.err,
  },
};

// stdout carries the spell-check report, so logs go to stderr
export const logger = pino(baseConfig, pino.destination(2));

export const createLogger = (component: string, context?: Record<string, unknown>): Logger => {
  return logger.child({ component, ...context });
};

export const dictionaryLogger = createLogger('dictionary');
export const checkerLogger = createLogger('spell-checker');
export const cliLogger = createLogger('cli');

// Helper to log performance metrics
export const logPerformance = (
  logger: Logger,
  operation: string,
  startTime: number,
  metadata?: Record<string, unknown>
) => {
  const duration = Date.now() - startTime;
  logger.info({
    operation,
    duration,
    ...metadata,
  }, `${operation} completed in ${duration}ms`);
};

// Helper for structured error logging
export const logError = (
  logger: Logger,
  error: Error | unknown,
  context?: Record<string, unknown>
) => {
  if (error instanceof Error) {
    logger.error({
      err: error,
      ...context,
    }, error.message);
  } else {
    logger.error({
      error: String(error),
      ...context,
    }, 'Unknown error occurred');
  }
};

export type { Logger };
