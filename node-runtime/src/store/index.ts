export * from './workflow-store.js';
export * from './run-store.js';
