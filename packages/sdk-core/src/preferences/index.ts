export * from './preference-store.js';
