// Diff Engine
//
// Compares two graphs of the same lineage and finds every node that must be
// re-versioned. A node is changed when it was added, moved, rewired or had
// its payload edited; every change also marks the node's whole ancestry path,
// so the root changes whenever anything beneath it did.

import type { Entity, EntityGraph, GraphDiff, Id } from '@lineage/protocol';
import { LineageMismatchError } from '../errors.js';
import { deepEqual } from './equality.js';
import { collectEntitySlots, projectPayload } from './slots.js';

/**
 * Compare two versions of a tree.
 *
 * @param oldGraph - The stored version
 * @param newGraph - The live version about to be committed
 * @throws LineageMismatchError when the graphs belong to different lineages
 */
export function diffGraphs(oldGraph: EntityGraph, newGraph: EntityGraph): GraphDiff {
  if (oldGraph.lineageId !== newGraph.lineageId) {
    throw new LineageMismatchError(oldGraph.lineageId, newGraph.lineageId);
  }

  const changed = new Set<Id>();
  const markWithAncestors = (id: Id) => {
    for (const ancestorId of newGraph.ancestryPaths.get(id) ?? [id]) {
      changed.add(ancestorId);
    }
  };

  // Additions
  const added: Id[] = [];
  for (const id of newGraph.nodes.keys()) {
    if (!oldGraph.nodes.has(id)) {
      added.push(id);
      markWithAncestors(id);
    }
  }

  // Moves: a new edge into a known node whose parents changed
  const moved: Id[] = [];
  for (const [key, edge] of newGraph.edges) {
    if (oldGraph.edges.has(key)) continue;
    const targetId = edge.targetId;
    if (!oldGraph.nodes.has(targetId) || moved.includes(targetId)) continue;
    if (!sameMembers(oldGraph.incoming.get(targetId), newGraph.incoming.get(targetId))) {
      moved.push(targetId);
      markWithAncestors(targetId);
    }
  }

  // Removals, and surviving parents whose child slots no longer match
  const removed = [...oldGraph.nodes.keys()].filter((id) => !newGraph.nodes.has(id));
  for (const [id, node] of newGraph.nodes) {
    if (changed.has(id)) continue;
    const previous = oldGraph.nodes.get(id);
    if (previous && !sameChildSlots(previous, node)) {
      markWithAncestors(id);
    }
  }

  // Payload edits, deepest first
  const remaining = [...newGraph.nodes.keys()]
    .filter((id) => !changed.has(id) && oldGraph.nodes.has(id))
    .sort((a, b) => pathLength(newGraph, b) - pathLength(newGraph, a));
  for (const id of remaining) {
    if (changed.has(id)) continue;
    const previous = oldGraph.nodes.get(id);
    const current = newGraph.nodes.get(id);
    if (previous && current && !deepEqual(projectPayload(previous), projectPayload(current))) {
      markWithAncestors(id);
    }
  }

  return { changed, added, removed, moved };
}

/**
 * Ids of every node in newGraph that must be re-versioned.
 */
export function findChanged(oldGraph: EntityGraph, newGraph: EntityGraph): Set<Id> {
  return diffGraphs(oldGraph, newGraph).changed;
}

function pathLength(graph: EntityGraph, id: Id): number {
  return graph.ancestryPaths.get(id)?.length ?? 0;
}

function sameMembers(a: Set<Id> | undefined, b: Set<Id> | undefined): boolean {
  const left = a ?? new Set<Id>();
  const right = b ?? new Set<Id>();
  if (left.size !== right.size) return false;
  for (const id of left) {
    if (!right.has(id)) return false;
  }
  return true;
}

function childSlotSignature(entity: Entity): string[] {
  return collectEntitySlots(entity).map((slot) =>
    JSON.stringify([slot.fieldName, slot.keyType ?? null, slot.containerKey ?? null, slot.entity.permanentId])
  );
}

function sameChildSlots(previous: Entity, current: Entity): boolean {
  const before = childSlotSignature(previous);
  const after = childSlotSignature(current);
  return before.length === after.length && before.every((signature, i) => signature === after[i]);
}
