// @lineage/repositories
// Storage contract and implementations for versioned entity graphs.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - Stored graphs are write-once; a commit is swapped in through a transaction
// - The in-memory implementation backs the registry by default and in tests

export * from './interfaces/index.js';
export * from './in-memory/index.js';
