export * from './command-builder.js';
export * from './errors.js';
export * from './factory.js';
export * from './log-poller.js';
export * from './retry-policy.js';
export * from './run-loop.js';
export * from './state-machine.js';
