/**
 * SDK Core - provider registry and service preferences
 *
 * - Service descriptors and the built-in service catalog
 * - Providers, provider composition and discovery
 * - Per-service preference store
 * - Structured logging, error types and environment configuration
 */

export * from './auth/index.js';
export * from './bootstrap/index.js';
export * from './config/index.js';
export * from './descriptors/index.js';
export * from './discovery/index.js';
export * from './error-handling/index.js';
export * from './logging/index.js';
export * from './preferences/index.js';
export * from './providers/index.js';

export const SDK_CORE_VERSION = '0.1.0';
