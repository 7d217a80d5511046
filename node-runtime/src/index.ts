export * from './types/index.js';
export * from './schemas/index.js';
export * from './config/index.js';
export * from './model/index.js';
export * from './store/index.js';
export * from './recipe/loader.js';
export * from './recorder/index.js';
export * from './runner/run-signal.js';
export * from './runner/step-executor.js';
export * from './runner/workflow-engine.js';
export * from './runner/run-controller.js';
export type * from './engines/automation-driver.js';
export * from './engines/xdotool-driver.js';
export * from './engines/dry-run-driver.js';
export * from './engines/cv-engine.js';
export * from './exception/classifier.js';
export * from './logging/run-logger.js';
