export type * from './raw-event.js';
export * from './session.js';
export * from './normalizer.js';
export * from './record.js';
export * from './jsonl-capture-source.js';
