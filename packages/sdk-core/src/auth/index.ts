export * from './auth-plugins.js';
