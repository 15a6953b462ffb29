// Graph Builder
//
// Breadth-first discovery of every entity reachable from a root.
// The first edge to reach a child is its primary edge and fixes its ancestry
// path; a later edge offering a strictly shorter path takes both over.

import type { EdgeKey, Entity, EntityGraph, GraphEdge, Id } from '@lineage/protocol';
import { edgeKey } from '@lineage/protocol';
import { CircularReferenceError, MultipleRootsError, ValidationError } from '../errors.js';
import { isMarkedRoot } from '../entities/lifecycle.js';
import { collectEntitySlots } from './slots.js';

export type BuildGraphOptions = {
  /** Reject trees with more nodes than this */
  maxNodes?: number;
};

/**
 * Build the graph of everything reachable from root.
 *
 * @throws CircularReferenceError when the entities do not form a DAG
 * @throws MultipleRootsError when another tree's root is reachable
 */
export function buildGraph(root: Entity, options: BuildGraphOptions = {}): EntityGraph {
  const rootId = root.permanentId;
  const nodes = new Map<Id, Entity>([[rootId, root]]);
  const edges = new Map<EdgeKey, GraphEdge>();
  const incoming = new Map<Id, Set<Id>>([[rootId, new Set()]]);
  const ancestryPaths = new Map<Id, Id[]>([[rootId, [rootId]]]);
  const primaryEdges = new Map<Id, EdgeKey>();

  const queue: Entity[] = [root];
  for (let head = 0; head < queue.length; head++) {
    const parent = queue[head];
    const parentId = parent.permanentId;
    const parentPath = ancestryPaths.get(parentId) ?? [parentId];

    for (const slot of collectEntitySlots(parent)) {
      const child = slot.entity;
      const childId = child.permanentId;

      if (parentPath.includes(childId)) {
        throw new CircularReferenceError(childId, [...parentPath.slice(parentPath.indexOf(childId)), childId]);
      }

      const known = nodes.get(childId);
      if (known !== undefined && known !== child) {
        throw new ValidationError(`Two different objects share permanentId ${childId}`, {
          details: { permanentId: childId },
        });
      }

      const key = edgeKey(parentId, childId);
      if (edges.has(key)) continue;

      let isPrimary = false;
      if (known === undefined) {
        if (isMarkedRoot(child)) {
          throw new MultipleRootsError([rootId, childId]);
        }
        nodes.set(childId, child);
        if (options.maxNodes !== undefined && nodes.size > options.maxNodes) {
          throw new ValidationError(`Entity tree exceeds ${options.maxNodes} nodes`, {
            details: { rootPermanentId: rootId, maxNodes: options.maxNodes },
          });
        }
        incoming.set(childId, new Set());
        queue.push(child);
        isPrimary = true;
      } else {
        const currentPath = ancestryPaths.get(childId) ?? [];
        if (parentPath.length + 1 < currentPath.length) {
          const previousKey = primaryEdges.get(childId);
          const previous = previousKey ? edges.get(previousKey) : undefined;
          if (previousKey && previous) {
            edges.set(previousKey, { ...previous, isPrimary: false });
          }
          isPrimary = true;
        }
      }

      if (isPrimary) {
        ancestryPaths.set(childId, [...parentPath, childId]);
        primaryEdges.set(childId, key);
      }

      edges.set(key, {
        sourceId: parentId,
        targetId: childId,
        kind: slot.kind,
        fieldName: slot.fieldName,
        ...(slot.containerKey !== undefined ? { containerKey: slot.containerKey } : {}),
        isPrimary,
      });
      incoming.get(childId)?.add(parentId);
    }
  }

  return {
    rootPermanentId: rootId,
    rootEphemeralId: root.ephemeralId,
    lineageId: root.lineageId,
    nodes,
    edges,
    incoming,
    ancestryPaths,
    topologicalOrder: topologicalSort(rootId, nodes, edges),
  };
}

/**
 * Kahn's algorithm over the finished edge set, parents first.
 * Catches cycles that close through non-primary edges.
 */
function topologicalSort(rootId: Id, nodes: Map<Id, Entity>, edges: Map<EdgeKey, GraphEdge>): Id[] {
  const indegree = new Map<Id, number>();
  const children = new Map<Id, Id[]>();
  for (const id of nodes.keys()) {
    indegree.set(id, 0);
    children.set(id, []);
  }
  for (const edge of edges.values()) {
    indegree.set(edge.targetId, (indegree.get(edge.targetId) ?? 0) + 1);
    children.get(edge.sourceId)?.push(edge.targetId);
  }

  const order: Id[] = [];
  const ready = [...nodes.keys()].filter((id) => indegree.get(id) === 0);
  for (let head = 0; head < ready.length; head++) {
    const id = ready[head];
    order.push(id);
    for (const childId of children.get(id) ?? []) {
      const remaining = (indegree.get(childId) ?? 0) - 1;
      indegree.set(childId, remaining);
      if (remaining === 0) ready.push(childId);
    }
  }

  if (order.length < nodes.size) {
    const stuck = new Set([...nodes.keys()].filter((id) => !order.includes(id)));
    const cycle = findCycle(stuck, edges);
    throw new CircularReferenceError(cycle[0] ?? rootId, cycle);
  }

  return order;
}

/**
 * Every unordered node has an unordered parent, so walking parents from any
 * of them must revisit a node. Returns the cycle in edge direction.
 */
function findCycle(stuck: Set<Id>, edges: Map<EdgeKey, GraphEdge>): Id[] {
  const parents = new Map<Id, Id>();
  for (const edge of edges.values()) {
    if (stuck.has(edge.sourceId) && stuck.has(edge.targetId) && !parents.has(edge.targetId)) {
      parents.set(edge.targetId, edge.sourceId);
    }
  }

  const walked: Id[] = [];
  let current: Id | undefined = [...stuck][0];
  while (current !== undefined && !walked.includes(current)) {
    walked.push(current);
    current = parents.get(current);
  }
  if (current === undefined) return walked.reverse();
  const cycle = walked.slice(walked.indexOf(current)).reverse();
  return [current, ...cycle];
}
