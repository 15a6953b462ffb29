// Re-export all protocol types

export * from './common.js';
export * from './entities.js';
export * from './graphs.js';
export * from './references.js';
export * from './registry.js';
