// @lineage/protocol - shared types and validation

export * from './types/index.js';
export * from './validation/index.js';
