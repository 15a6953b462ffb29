// Graph types - the explicit structure of an entity tree

import type { Id } from './common.js';
import type { Entity } from './entities.js';

/**
 * How a parent holds a child.
 */
export type EdgeKind = 'direct' | 'list_member' | 'tuple_member' | 'set_member' | 'map_member';

/**
 * Edges are keyed by "<sourceId>-><targetId>".
 */
export type EdgeKey = `${Id}->${Id}`;

export function edgeKey(sourceId: Id, targetId: Id): EdgeKey {
  return `${sourceId}->${targetId}`;
}

/**
 * A parent-to-child relationship discovered through a field.
 */
export type GraphEdge = {
  sourceId: Id;
  targetId: Id;
  kind: EdgeKind;
  fieldName: string;

  /**
   * Index for list, tuple and set members; key for map members
   */
  containerKey?: number | string;

  /**
   * Whether this edge carries the child's ancestry path
   */
  isPrimary: boolean;
};

/**
 * A rooted DAG of entities.
 */
export type EntityGraph = {
  rootPermanentId: Id;
  rootEphemeralId: Id;
  lineageId: Id;

  nodes: Map<Id, Entity>;
  edges: Map<EdgeKey, GraphEdge>;

  /**
   * Source ids of every edge pointing at a node
   */
  incoming: Map<Id, Set<Id>>;

  /**
   * Ids from the root down to and including each node
   */
  ancestryPaths: Map<Id, Id[]>;

  /**
   * Every node, parents before children
   */
  topologicalOrder: Id[];
};

/**
 * Result of comparing two versions of the same tree.
 */
export type GraphDiff = {
  /**
   * New-graph ids that must be re-versioned
   */
  changed: Set<Id>;

  /**
   * Ids present only in the new graph
   */
  added: Id[];

  /**
   * Ids present only in the old graph
   */
  removed: Id[];

  /**
   * Ids whose set of parents changed
   */
  moved: Id[];
};
