// Snapshots of entity trees

import type { EdgeKey, Entity, EntityGraph, GraphEdge, Id } from '@lineage/protocol';
import { ValidationError } from '../errors.js';
import { newId } from './ids.js';

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Structured clone of a payload value.
 */
export function cloneValue<T>(value: T): T {
  try {
    return structuredClone(value);
  } catch (error) {
    throw new ValidationError('Field value cannot be copied', { details: { reason: reasonOf(error) } });
  }
}

/**
 * Independent copy of everything reachable from root.
 * Shared children stay shared within the copy.
 */
export function cloneTree(root: Entity): Entity {
  try {
    return structuredClone(root);
  } catch (error) {
    throw new ValidationError(`Entity tree ${root.permanentId} holds a value that cannot be copied`, {
      details: { reason: reasonOf(error) },
    });
  }
}

function rejectWrite(): never {
  throw new TypeError('Cannot modify a stored snapshot');
}

/**
 * Freeze a Map or Set by shadowing its mutators on the instance.
 */
function freezeCollection(collection: Map<unknown, unknown> | Set<unknown>): void {
  for (const method of ['set', 'add', 'delete', 'clear']) {
    if (method in collection) {
      Object.defineProperty(collection, method, { value: rejectWrite });
    }
  }
  Object.freeze(collection);
}

/**
 * Freeze everything reachable from value, Map and Set containers included.
 */
export function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null) return;
  if (Object.isFrozen(value)) return;

  if (value instanceof Map) {
    freezeCollection(value);
    for (const [key, item] of value) {
      deepFreeze(key);
      deepFreeze(item);
    }
    return;
  }
  if (value instanceof Set) {
    freezeCollection(value);
    for (const item of value) deepFreeze(item);
    return;
  }

  Object.freeze(value);
  for (const child of Object.values(value)) deepFreeze(child);
}

/**
 * Freeze a stored graph: its nodes and its own maps, edges and paths.
 */
export function freezeGraph(graph: EntityGraph): void {
  for (const node of graph.nodes.values()) deepFreeze(node);
  deepFreeze(graph);
}

/**
 * A graph with its own maps, edges and paths over the same node objects.
 */
export function copyGraph(graph: EntityGraph): EntityGraph {
  return {
    rootPermanentId: graph.rootPermanentId,
    rootEphemeralId: graph.rootEphemeralId,
    lineageId: graph.lineageId,
    nodes: new Map(graph.nodes),
    edges: new Map([...graph.edges].map(([key, edge]): [EdgeKey, GraphEdge] => [key, { ...edge }])),
    incoming: new Map([...graph.incoming].map(([id, sources]): [Id, Set<Id>] => [id, new Set(sources)])),
    ancestryPaths: new Map([...graph.ancestryPaths].map(([id, path]): [Id, Id[]] => [id, [...path]])),
    topologicalOrder: [...graph.topologicalOrder],
  };
}

/**
 * Give every node a new ephemeral handle, re-pointing root markers at the
 * root's new handle.
 */
export function refreshEphemeralIds(graph: EntityGraph): void {
  for (const node of graph.nodes.values()) {
    node.ephemeralId = newId();
  }
  const root = graph.nodes.get(graph.rootPermanentId);
  if (!root) return;
  for (const node of graph.nodes.values()) {
    node.rootEphemeralId = root.ephemeralId;
  }
  graph.rootEphemeralId = root.ephemeralId;
}
