/**
 * Shared contracts for the cloud SDK
 *
 * Types and schemas shared by every SDK package.
 * Packages should import from @cloud-sdk/shared-contracts instead of defining local duplicates
 */

export * from './services/index.js';

export * from './providers/index.js';

export * from './config/index.js';
