export * from './steps.js';
export * from './describe.js';
export * from './draft.js';
export * from './cursor.js';
