// Entity slots: where a field value holds a child entity

import type { EdgeKind, Entity, FieldKind } from '@lineage/protocol';
import { isEntity, isPlainRecord } from '@lineage/protocol';

export type EntitySlot = {
  fieldName: string;
  kind: EdgeKind;
  containerKey?: number | string;
  /** typeof the original Map key, so 1 and "1" stay distinct */
  keyType?: string;
  entity: Entity;
};

function mapKeyOf(key: unknown): number | string {
  return typeof key === 'number' || typeof key === 'string' ? key : String(key);
}

/**
 * Every child entity held by an entity's fields, in field then slot order.
 * Reference fields are never traversed; non-entity slots are skipped.
 */
export function collectEntitySlots(entity: Entity): EntitySlot[] {
  const slots: EntitySlot[] = [];

  for (const [fieldName, fieldKind] of Object.entries(entity.fieldKinds)) {
    if (fieldKind === 'reference') continue;
    const value = entity.fields[fieldName];

    if (isEntity(value)) {
      slots.push({ fieldName, kind: 'direct', entity: value });
    } else if (Array.isArray(value)) {
      const kind: EdgeKind = fieldKind === 'tuple' ? 'tuple_member' : 'list_member';
      value.forEach((item: unknown, index) => {
        if (isEntity(item)) slots.push({ fieldName, kind, containerKey: index, entity: item });
      });
    } else if (value instanceof Set) {
      let index = 0;
      for (const item of value) {
        if (isEntity(item)) slots.push({ fieldName, kind: 'set_member', containerKey: index, entity: item });
        index++;
      }
    } else if (value instanceof Map) {
      for (const [key, item] of value) {
        if (isEntity(item)) {
          slots.push({
            fieldName,
            kind: 'map_member',
            containerKey: mapKeyOf(key),
            keyType: typeof key,
            entity: item,
          });
        }
      }
    } else if (isPlainRecord(value)) {
      for (const [key, item] of Object.entries(value)) {
        if (isEntity(item)) slots.push({ fieldName, kind: 'map_member', containerKey: key, entity: item });
      }
    }
  }

  return slots;
}

/**
 * Marker standing in for a child entity in payload comparisons.
 */
export const ENTITY_SLOT = Symbol('entity-slot');

function projectValue(value: unknown, kind: FieldKind): unknown {
  if (kind === 'reference') return value;
  if (isEntity(value)) return ENTITY_SLOT;
  if (Array.isArray(value)) {
    return value.map((item: unknown) => (isEntity(item) ? ENTITY_SLOT : item));
  }
  if (value instanceof Set) {
    return new Set([...value].map((item: unknown) => (isEntity(item) ? ENTITY_SLOT : item)));
  }
  if (value instanceof Map) {
    return new Map(
      [...value].map(([key, item]: [unknown, unknown]): [unknown, unknown] => [key, isEntity(item) ? ENTITY_SLOT : item])
    );
  }
  if (isPlainRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, isEntity(item) ? ENTITY_SLOT : item])
    );
  }
  return value;
}

/**
 * An entity's field values with child entities replaced by ENTITY_SLOT.
 * Structure is compared separately through edges.
 */
export function projectPayload(entity: Entity): Record<string, unknown> {
  const projection: Record<string, unknown> = {};
  for (const [fieldName, kind] of Object.entries(entity.fieldKinds)) {
    projection[fieldName] = projectValue(entity.fields[fieldName], kind);
  }
  return projection;
}
