/**
 * Logger
 *
 * Winston logger creation and management
 */

import * as winston from 'winston';
import type { LoggerMeta } from './types.js';
import { createDevFormat, createProdFormat } from './formatting.js';

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;

  switch (env.NODE_ENV) {
    case 'production':
      return 'info';
    case 'test':
      return 'warn';
    default:
      return 'debug';
  }
}

/**
 * Create a Winston logger instance
 */
export function createLogger(moduleName: string, options: Partial<LoggerMeta> = {}): winston.Logger {
  const meta: LoggerMeta = {
    module: moduleName,
    env: process.env.NODE_ENV || 'development',
    version: process.env.npm_package_version,
    ...options,
  };

  const isDevelopment = (process.env.NODE_ENV || 'development') === 'development';

  return winston.createLogger({
    level: resolveLogLevel(),
    defaultMeta: meta,
    format: isDevelopment ? createDevFormat() : createProdFormat(),
    transports: [new winston.transports.Console()],
  });
}

const loggers = new Map<string, winston.Logger>();

/**
 * Get or create a logger
 */
export function getLogger(moduleName: string): winston.Logger {
  let logger = loggers.get(moduleName);
  if (!logger) {
    logger = createLogger(moduleName);
    loggers.set(moduleName, logger);
  }
  return logger;
}
