export * from './conversation/index.js';
export * from './compaction/index.js';
export * from './router/index.js';
export * from './security/index.js';
export * from './session/index.js';
export * from './logging/index.js';
