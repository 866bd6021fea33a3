export * from './executor.js';
export * from './errors.js';
export * from './ssh-executor.js';
