export * from './step.js';
export type * from './step-result.js';
export * from './errors.js';
