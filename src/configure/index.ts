export * from './hypervisor-config.js';
export * from './global-config.js';
