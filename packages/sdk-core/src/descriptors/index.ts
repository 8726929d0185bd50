export * from './service-descriptor.js';
export * from './catalog.js';
