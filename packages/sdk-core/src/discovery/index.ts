export * from './types.js';
export * from './static-registry.js';
export * from './composite-registry.js';
export * from './manifest-registry.js';
export * from './resolver.js';
