export * from './preference-bootstrap.js';
