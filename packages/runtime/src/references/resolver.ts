// Reference Resolver
//
// Resolves pointers against stored entity versions. Resolution only reads:
// the value returned is the stored value itself, never a copy or a default.

import type {
  Entity,
  Id,
  ReferenceSegment,
  ResolvedData,
  ResolvedReference,
} from '@lineage/protocol';
import { isEntity, isPlainRecord } from '@lineage/protocol';
import { EntityNotFoundError, FieldNotFoundError, IndexError, KeyNotFoundError } from '../errors.js';
import { isReference, parseReference } from './parser.js';

/**
 * Source of stored versions by permanentId. A Registry satisfies this.
 */
export type EntityLookup = {
  get(permanentId: Id): Entity | null;
};

export class ReferenceResolver {
  private entities: EntityLookup;

  constructor(entities: EntityLookup) {
    this.entities = entities;
  }

  /**
   * Resolve one pointer.
   *
   * @returns The addressed value and every entity walked through, starting
   * with the addressed one
   */
  resolve(pointer: string): ResolvedReference {
    const parsed = parseReference(pointer);
    const entity = this.entities.get(parsed.entityId);
    if (!entity) {
      throw new EntityNotFoundError(parsed.entityId, pointer);
    }

    let current: unknown = entity;
    const entityIds: Id[] = [entity.permanentId];
    for (const segment of parsed.segments) {
      current = this.step(current, segment, pointer);
      if (isEntity(current)) entityIds.push(current.permanentId);
    }

    return { value: current, entityIds };
  }

  resolveMany(pointers: string[]): Map<string, ResolvedReference> {
    const results = new Map<string, ResolvedReference>();
    for (const pointer of pointers) {
      if (!results.has(pointer)) results.set(pointer, this.resolve(pointer));
    }
    return results;
  }

  /**
   * Replace every pointer string inside arrays, plain objects and Maps with
   * the value it addresses. The input is left untouched.
   */
  resolveReferences(data: unknown): ResolvedData {
    const entityIds = new Set<Id>();
    const references: Record<string, Id> = {};

    const walk = (value: unknown): unknown => {
      if (isReference(value)) {
        const resolved = this.resolve(value);
        for (const id of resolved.entityIds) entityIds.add(id);
        references[value] = resolved.entityIds[0];
        return resolved.value;
      }
      if (Array.isArray(value)) return value.map(walk);
      if (value instanceof Map) {
        return new Map([...value].map(([key, item]: [unknown, unknown]): [unknown, unknown] => [key, walk(item)]));
      }
      if (isPlainRecord(value) && !isEntity(value)) {
        return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, walk(item)]));
      }
      return value;
    };

    return { value: walk(data), entityIds: [...entityIds], references };
  }

  private step(current: unknown, segment: ReferenceSegment, pointer: string): unknown {
    switch (segment.type) {
      case 'field': {
        if (isEntity(current)) {
          if (Object.hasOwn(current.fieldKinds, segment.name)) return current.fields[segment.name];
        } else if (isPlainRecord(current) && Object.hasOwn(current, segment.name)) {
          return current[segment.name];
        }
        throw new FieldNotFoundError(pointer, segment.raw, segment.name);
      }

      case 'index': {
        // Maps keyed by numbers are addressed by integer brackets
        if (current instanceof Map) {
          if (current.has(segment.index)) return current.get(segment.index);
          throw new KeyNotFoundError(pointer, segment.raw, String(segment.index));
        }
        const items = Array.isArray(current) ? current : current instanceof Set ? [...current] : null;
        if (items === null) {
          throw new IndexError(pointer, segment.raw, segment.index, null);
        }
        if (segment.index >= items.length) {
          throw new IndexError(pointer, segment.raw, segment.index, items.length);
        }
        return items[segment.index];
      }

      case 'key': {
        if (current instanceof Map) {
          if (current.has(segment.key)) return current.get(segment.key);
        } else if (isPlainRecord(current) && !isEntity(current) && Object.hasOwn(current, segment.key)) {
          return current[segment.key];
        }
        throw new KeyNotFoundError(pointer, segment.raw, segment.key);
      }
    }
  }
}

export function createReferenceResolver(entities: EntityLookup): ReferenceResolver {
  return new ReferenceResolver(entities);
}
