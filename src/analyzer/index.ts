export * from './analyzer.js';
export * from './json-block.js';
export * from './loop-info.js';
export * from './mappings.js';
export * from './message-search.js';
export * from './patterns.js';
export * from './send-count.js';
