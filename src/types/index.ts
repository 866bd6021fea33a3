export * from './mode.js';
export * from './run.js';
export * from './analysis.js';
