// Attribute provenance
//
// Every declared field carries the id of the entity its value was borrowed
// from (or null). Container fields carry one source per slot, so the entry's
// shape has to follow the value whenever slots are added or removed.

import type {
  AttributeProvenance,
  Entity,
  FieldKind,
  Id,
  ProvenanceEntry,
  ProvenanceSource,
} from '@lineage/protocol';
import { isEntity, isPlainRecord } from '@lineage/protocol';
import { ValidationError } from '../errors.js';
import { cloneValue } from './snapshot.js';

function sourceOf(value: unknown): ProvenanceSource {
  return typeof value === 'string' ? value : null;
}

function shapeEntry(kind: FieldKind, value: unknown, existing: ProvenanceEntry | undefined): ProvenanceEntry {
  if (kind === 'list' || kind === 'tuple' || kind === 'set') {
    const size = Array.isArray(value) ? value.length : value instanceof Set ? value.size : 0;
    const previous = Array.isArray(existing) ? existing : [];
    return Array.from({ length: size }, (_, index) => sourceOf(previous[index]));
  }

  if (kind === 'map') {
    const keys =
      value instanceof Map
        ? [...value.keys()].map((key) => String(key))
        : isPlainRecord(value)
          ? Object.keys(value)
          : [];
    const previous: Record<string, ProvenanceSource> =
      existing !== null && typeof existing === 'object' && !Array.isArray(existing) ? existing : {};
    return Object.fromEntries(
      keys.map((key) => [key, Object.hasOwn(previous, key) ? sourceOf(previous[key]) : null])
    );
  }

  return sourceOf(existing);
}

/**
 * Provenance for a freshly created entity: every slot originates here.
 */
export function createProvenance(entity: Entity): AttributeProvenance {
  const provenance: AttributeProvenance = {};
  for (const [field, kind] of Object.entries(entity.fieldKinds)) {
    provenance[field] = shapeEntry(kind, entity.fields[field], undefined);
  }
  return provenance;
}

/**
 * Reshape provenance to match the entity's current field values.
 * Sources of slots that still exist are kept.
 */
export function syncProvenance(entity: Entity): Entity {
  const synced: AttributeProvenance = {};
  for (const [field, kind] of Object.entries(entity.fieldKinds)) {
    synced[field] = shapeEntry(kind, entity.fields[field], entity.attributeProvenance[field]);
  }
  entity.attributeProvenance = synced;
  return entity;
}

/**
 * Record where a field (or one slot of it) came from.
 *
 * @param slot - List/tuple/set index or map key; omit to set every slot
 */
export function recordProvenance(entity: Entity, field: string, sourceId: Id, slot?: number | string): void {
  if (!(field in entity.fieldKinds)) {
    throw new ValidationError(`Field "${field}" is not declared on type "${entity.type}"`, { field });
  }

  syncProvenance(entity);
  const entry = entity.attributeProvenance[field];

  if (slot === undefined) {
    entity.attributeProvenance[field] = Array.isArray(entry)
      ? entry.map(() => sourceId)
      : entry !== null && typeof entry === 'object'
        ? Object.fromEntries(Object.keys(entry).map((key) => [key, sourceId]))
        : sourceId;
    return;
  }

  if (typeof slot === 'number') {
    if (!Array.isArray(entry) || !Number.isInteger(slot) || slot < 0 || slot >= entry.length) {
      throw new ValidationError(`Field "${field}" has no slot ${slot}`, { field });
    }
    entry[slot] = sourceId;
    return;
  }

  if (entry === null || typeof entry !== 'object' || Array.isArray(entry) || !Object.hasOwn(entry, slot)) {
    throw new ValidationError(`Field "${field}" has no key "${slot}"`, { field });
  }
  entry[slot] = sourceId;
}

function copyFieldValue(value: unknown): unknown {
  // Entities are shared, never duplicated: a copy would carry the same ids
  if (isEntity(value)) return value;
  if (Array.isArray(value)) return value.map(copyFieldValue);
  if (value instanceof Set) return new Set([...value].map(copyFieldValue));
  if (value instanceof Map) {
    return new Map([...value].map(([key, item]): [unknown, unknown] => [key, copyFieldValue(item)]));
  }
  if (isPlainRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, copyFieldValue(item)]));
  }
  return cloneValue(value);
}

/**
 * Copy a field value from another entity and record it as the source.
 */
export function borrowAttribute(target: Entity, targetField: string, source: Entity, sourceField: string): void {
  if (!(sourceField in source.fieldKinds)) {
    throw new ValidationError(`Field "${sourceField}" is not declared on type "${source.type}"`, {
      field: sourceField,
    });
  }
  if (!(targetField in target.fieldKinds)) {
    throw new ValidationError(`Field "${targetField}" is not declared on type "${target.type}"`, {
      field: targetField,
    });
  }

  target.fields[targetField] = copyFieldValue(source.fields[sourceField]);
  recordProvenance(target, targetField, source.permanentId);
}
