/**
 * Logging Types
 *
 * Interfaces and types for logging functionality
 */

// Re-export winston types for convenience
export type { Logger } from 'winston';

export interface LoggerMeta {
  module: string;
  env: string;
  version?: string;
}
