// Validation exports

export * from './config.js';
export * from './fields.js';
