export * from './errors.js';
export * from './sdk-errors.js';
