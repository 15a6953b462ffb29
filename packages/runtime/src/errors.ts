// Runtime error types

import type { ConfigIssue, FieldValidationIssue, Id } from '@lineage/protocol';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when entity fields do not match their type definition.
 */
export class EntityValidationError extends ValidationError {
  readonly entityType: string;
  readonly issues: FieldValidationIssue[];

  constructor(entityType: string, issues: FieldValidationIssue[], entityId?: Id) {
    const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
    super(`Invalid ${entityType}${entityId ? ` ${entityId}` : ''}: ${summary}`, {
      field: issues[0]?.path,
      details: { entityType, entityId, issues },
    });
    this.name = 'EntityValidationError';
    this.entityType = entityType;
    this.issues = issues;
  }
}

/**
 * Error when registry configuration fails its schema.
 */
export class ConfigValidationError extends ValidationError {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    const summary = issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join('; ');
    super(`Invalid registry config: ${summary}`, { details: { issues } });
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

// --- Graph errors ---

/**
 * Error when an entity tree contains a cycle.
 */
export class CircularReferenceError extends RuntimeError {
  readonly nodeId: Id;
  readonly path: Id[];

  constructor(nodeId: Id, path: Id[] = []) {
    const cycle = path.length > 0 ? `: ${path.join(' -> ')}` : '';
    super('CIRCULAR_REFERENCE', `Circular reference at entity ${nodeId}${cycle}`);
    this.name = 'CircularReferenceError';
    this.nodeId = nodeId;
    this.path = path;
  }
}

/**
 * Error when a tree reaches an entity that is the root of another tree.
 */
export class MultipleRootsError extends RuntimeError {
  readonly rootIds: Id[];

  constructor(rootIds: Id[]) {
    super('MULTIPLE_ROOTS', `Entity tree has more than one root: ${rootIds.join(', ')}`);
    this.name = 'MultipleRootsError';
    this.rootIds = rootIds;
  }
}

// --- Registry errors ---

export class NotARootError extends RuntimeError {
  readonly entityId: Id;
  readonly rootPermanentId?: Id;

  constructor(entityId: Id, rootPermanentId?: Id) {
    super(
      'NOT_A_ROOT',
      `Entity ${entityId} is embedded in tree ${rootPermanentId ?? '(unknown)'} and is not a root`
    );
    this.name = 'NotARootError';
    this.entityId = entityId;
    this.rootPermanentId = rootPermanentId;
  }
}

export class AlreadyRegisteredError extends RuntimeError {
  readonly rootPermanentId: Id;

  constructor(rootPermanentId: Id) {
    super('ALREADY_REGISTERED', `A tree is already stored under root ${rootPermanentId}`);
    this.name = 'AlreadyRegisteredError';
    this.rootPermanentId = rootPermanentId;
  }
}

/**
 * Error when the tree an entity belongs to is not known to the registry.
 */
export class LineageNotFoundError extends RuntimeError {
  readonly entityId: Id;
  readonly lineageId: Id;

  constructor(entityId: Id, lineageId: Id, reason: string) {
    super('LINEAGE_NOT_FOUND', `No stored tree for entity ${entityId} (lineage ${lineageId}): ${reason}`);
    this.name = 'LineageNotFoundError';
    this.entityId = entityId;
    this.lineageId = lineageId;
  }
}

export class LineageMismatchError extends RuntimeError {
  readonly expected: Id;
  readonly actual: Id;

  constructor(expected: Id, actual: Id) {
    super('LINEAGE_MISMATCH', `Cannot compare lineage ${expected} with lineage ${actual}`);
    this.name = 'LineageMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Error when a mutator is called while another one is running.
 */
export class RegistryBusyError extends RuntimeError {
  readonly operation: string;
  readonly activeOperation: string;

  constructor(operation: string, activeOperation: string) {
    super('REGISTRY_BUSY', `Cannot ${operation} while ${activeOperation} is in progress`);
    this.name = 'RegistryBusyError';
    this.operation = operation;
    this.activeOperation = activeOperation;
  }
}

export class EntityNotFoundError extends RuntimeError {
  readonly entityId: Id;
  readonly pointer?: string;

  constructor(entityId: Id, pointer?: string) {
    super(
      'ENTITY_NOT_FOUND',
      pointer ? `Entity not found: ${entityId} (in ${pointer})` : `Entity not found: ${entityId}`
    );
    this.name = 'EntityNotFoundError';
    this.entityId = entityId;
    this.pointer = pointer;
  }
}

// --- Reference errors ---

/**
 * Base class for pointer parsing and resolution failures.
 * segment is the part of the pointer where resolution stopped.
 */
export class ReferenceResolutionError extends RuntimeError {
  readonly pointer: string;
  readonly segment: string;

  constructor(code: string, pointer: string, segment: string, message: string) {
    super(code, `${message} (in ${pointer})`);
    this.name = 'ReferenceResolutionError';
    this.pointer = pointer;
    this.segment = segment;
  }
}

export class MalformedReferenceError extends ReferenceResolutionError {
  readonly position: number;

  constructor(pointer: string, position: number, reason: string) {
    super('MALFORMED_REFERENCE', pointer, pointer.slice(position), `Malformed reference at ${position}: ${reason}`);
    this.name = 'MalformedReferenceError';
    this.position = position;
  }
}

export class FieldNotFoundError extends ReferenceResolutionError {
  readonly field: string;

  constructor(pointer: string, segment: string, field: string) {
    super('FIELD_NOT_FOUND', pointer, segment, `Field not found: ${field}`);
    this.name = 'FieldNotFoundError';
    this.field = field;
  }
}

export class IndexError extends ReferenceResolutionError {
  readonly index: number;
  readonly length: number | null;

  constructor(pointer: string, segment: string, index: number, length: number | null) {
    super(
      'INDEX_ERROR',
      pointer,
      segment,
      length === null
        ? `Value is not indexable by ${index}`
        : `Index ${index} out of range for length ${length}`
    );
    this.name = 'IndexError';
    this.index = index;
    this.length = length;
  }
}

export class KeyNotFoundError extends ReferenceResolutionError {
  readonly key: string;

  constructor(pointer: string, segment: string, key: string) {
    super('KEY_NOT_FOUND', pointer, segment, `Key not found: ${key}`);
    this.name = 'KeyNotFoundError';
    this.key = key;
  }
}
