export * from './process-controller.js';
export * from './errors.js';
