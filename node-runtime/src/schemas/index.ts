export * from './step.schema.js';
export * from './workflow.schema.js';
export * from './raw-event.schema.js';
