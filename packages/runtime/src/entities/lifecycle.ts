// Entity lifecycle
//
// Type definitions, construction, re-versioning and root bookkeeping.
// Functions here mutate the live entity they are given; stored versions are
// never passed in.

import type { Entity, EntityTypeDefinition, FieldKind, Id, Timestamp } from '@lineage/protocol';
import { validateEntityFields } from '@lineage/protocol';
import { EntityValidationError, ValidationError } from '../errors.js';
import { newId, now } from './ids.js';
import { createProvenance } from './provenance.js';

const FIELD_NAME_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

const RESERVED_FIELD_NAMES = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Validate and return an entity type definition.
 * Field names must be identifiers so pointers can address them.
 */
export function defineEntityType(definition: EntityTypeDefinition): EntityTypeDefinition {
  if (definition.name.trim() === '') {
    throw new ValidationError('Entity type name is required', { field: 'name' });
  }

  for (const name of Object.keys(definition.fields)) {
    if (!FIELD_NAME_PATTERN.test(name) || RESERVED_FIELD_NAMES.has(name)) {
      throw new ValidationError(`Invalid field name "${name}" on type "${definition.name}"`, {
        field: name,
        details: { entityType: definition.name },
      });
    }
  }

  return definition;
}

export type CreateEntityOptions = {
  /** Use a known permanentId instead of minting one */
  permanentId?: Id;
  /** Join an existing lineage instead of starting a new one */
  lineageId?: Id;
  ephemeralId?: Id;
  createdAt?: Timestamp;
};

/**
 * Construct a new live entity of the given type.
 *
 * Missing container fields default to empty containers, other missing fields
 * to null. Every schema issue is collected into one EntityValidationError.
 */
export function createEntity(
  definition: EntityTypeDefinition,
  fields: Record<string, unknown> = {},
  options: CreateEntityOptions = {}
): Entity {
  const values: Record<string, unknown> = {};
  const fieldKinds: Record<string, FieldKind> = {};

  for (const [name, spec] of Object.entries(definition.fields)) {
    fieldKinds[name] = spec.kind;
    values[name] = name in fields ? fields[name] : defaultValue(spec.kind);
  }

  // Undeclared names from fields, defaults filled in from values
  const result = validateEntityFields(definition, { ...fields, ...values });
  if (!result.valid) {
    throw new EntityValidationError(definition.name, result.issues);
  }

  const entity: Entity = {
    type: definition.name,
    permanentId: options.permanentId ?? newId(),
    lineageId: options.lineageId ?? newId(),
    ephemeralId: options.ephemeralId ?? newId(),
    history: [],
    createdAt: options.createdAt ?? now(),
    fieldKinds,
    fields: values,
    attributeProvenance: {},
  };
  entity.attributeProvenance = createProvenance(entity);
  return entity;
}

function defaultValue(kind: FieldKind): unknown {
  switch (kind) {
    case 'list':
    case 'tuple':
      return [];
    case 'set':
      return new Set();
    case 'map':
      return new Map();
    default:
      return null;
  }
}

/**
 * A root has no root markers, or markers pointing at itself.
 */
export function isRootEntity(entity: Entity): boolean {
  return entity.rootPermanentId === undefined || entity.rootPermanentId === entity.permanentId;
}

/**
 * A marked root is the registered root of some tree.
 */
export function isMarkedRoot(entity: Entity): boolean {
  return entity.rootPermanentId === entity.permanentId;
}

/**
 * Re-version an entity in place: new permanentId, same lineage.
 */
export function forkEntity(entity: Entity, permanentId: Id, forkedAt: Timestamp): void {
  entity.history.push(entity.permanentId);
  entity.predecessorId = entity.permanentId;
  entity.permanentId = permanentId;
  entity.forkedAt = forkedAt;
}

export function markRoot(entity: Entity, root: Entity): void {
  entity.rootPermanentId = root.permanentId;
  entity.rootEphemeralId = root.ephemeralId;
}

export function clearRoot(entity: Entity): void {
  delete entity.rootPermanentId;
  delete entity.rootEphemeralId;
}
