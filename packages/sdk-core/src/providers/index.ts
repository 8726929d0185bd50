export * from './types.js';
export * from './provider.js';
export * from './multi-provider.js';
export * from './builtin.js';
