export * from './selector.js';
export * from './step.js';
export * from './outcome.js';
export * from './sequence.js';
export * from './config.js';
