// @lineage/runtime
// Graph building, diffing, versioning and reference resolution

// Error types
export {
  RuntimeError,
  ValidationError,
  EntityValidationError,
  ConfigValidationError,
  CircularReferenceError,
  MultipleRootsError,
  NotARootError,
  AlreadyRegisteredError,
  LineageNotFoundError,
  LineageMismatchError,
  RegistryBusyError,
  EntityNotFoundError,
  ReferenceResolutionError,
  MalformedReferenceError,
  FieldNotFoundError,
  IndexError,
  KeyNotFoundError,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createConsoleLogger,
  createCapturingLogger,
  withLogContext,
  type RegistryLogger,
  type ConsoleLoggerOptions,
  type LogLevel,
  type LogData,
  type LogEntry,
} from './logging.js';

// Entity lifecycle and provenance
export {
  defineEntityType,
  createEntity,
  isRootEntity,
  isMarkedRoot,
  type CreateEntityOptions,
} from './entities/lifecycle.js';
export { syncProvenance, recordProvenance, borrowAttribute } from './entities/provenance.js';

// Graphs
export { buildGraph, type BuildGraphOptions } from './graph/builder.js';
export { diffGraphs, findChanged } from './graph/diff.js';
export { deepEqual } from './graph/equality.js';
export { renderGraphMermaid } from './graph/mermaid.js';

// Registry
export {
  Registry,
  createRegistry,
  type RegistryOptions,
  type CommitOptions,
} from './registry/registry.js';

// References
export { parseReference, isReference } from './references/parser.js';
export {
  ReferenceResolver,
  createReferenceResolver,
  type EntityLookup,
} from './references/resolver.js';
