// Reference types - string pointers into stored entity versions

import type { Id } from './common.js';

/**
 * One step of a pointer path.
 * raw keeps the segment as written, for error reporting.
 */
export type ReferenceSegment =
  | { type: 'field'; name: string; raw: string }
  | { type: 'index'; index: number; raw: string }
  | { type: 'key'; key: string; raw: string };

/**
 * A parsed "@<permanentId>.<field>..." pointer.
 */
export type ParsedReference = {
  pointer: string;
  entityId: Id;
  segments: ReferenceSegment[];
};

/**
 * The value a pointer addresses, with every entity walked through on the way.
 */
export type ResolvedReference = {
  value: unknown;
  entityIds: Id[];
};

/**
 * Result of resolving every pointer inside a data structure.
 */
export type ResolvedData<T = unknown> = {
  value: T;

  /**
   * Every entity id used by any pointer, first-seen order
   */
  entityIds: Id[];

  /**
   * Pointer string to the entity it addresses
   */
  references: Record<string, Id>;
};
