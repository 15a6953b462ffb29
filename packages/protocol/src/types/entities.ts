// Entity types - versioned records with a stable lineage

import type { ZodTypeAny } from 'zod';
import type { Id, Timestamp } from './common.js';

/**
 * How a declared field holds its value.
 *
 * - value: opaque payload (primitives, plain objects, dates)
 * - entity: a single owned child entity (or null)
 * - list / tuple: ordered slots; tuple is a fixed-shape list
 * - set: unordered slots, iterated in insertion order
 * - map: keyed slots (Map or plain record)
 * - reference: a non-owning permanentId string, never traversed
 */
export type FieldKind = 'value' | 'entity' | 'list' | 'tuple' | 'set' | 'map' | 'reference';

/**
 * Declaration of a single entity field.
 */
export type FieldSpec = {
  kind: FieldKind;
  /**
   * Optional schema applied to the whole field value
   */
  schema?: ZodTypeAny;
  description?: string;
};

/**
 * A named entity type with its declared fields.
 */
export type EntityTypeDefinition = {
  name: string;
  description?: string;
  fields: Record<string, FieldSpec>;
};

/**
 * The entity a field value was borrowed from, or null when it originated here.
 */
export type ProvenanceSource = Id | null;

/**
 * Provenance for one field. Its shape mirrors the field's container:
 * a single source for scalars, one source per slot for lists, tuples and sets,
 * one source per key for maps.
 */
export type ProvenanceEntry = ProvenanceSource | ProvenanceSource[] | Record<string, ProvenanceSource>;

export type AttributeProvenance = Record<string, ProvenanceEntry>;

/**
 * A versioned record.
 *
 * permanentId identifies this exact version and changes whenever the entity is
 * re-versioned. lineageId is stable across every version. ephemeralId is a
 * per-process handle for the live object.
 */
export type Entity = {
  type: string;
  permanentId: Id;
  lineageId: Id;
  ephemeralId: Id;

  /**
   * Current root version of the tree this entity lives in.
   * Unset, or equal to permanentId, on a root.
   */
  rootPermanentId?: Id;
  rootEphemeralId?: Id;

  /**
   * The version this one superseded
   */
  predecessorId?: Id;

  /**
   * Every prior permanentId, oldest first
   */
  history: Id[];

  createdAt: Timestamp;
  forkedAt?: Timestamp;

  /**
   * Declared fields and their kinds, copied from the type definition
   */
  fieldKinds: Record<string, FieldKind>;

  fields: Record<string, unknown>;

  attributeProvenance: AttributeProvenance;
};

/**
 * Structural check for entity-shaped values found inside field payloads.
 */
export function isEntity(value: unknown): value is Entity {
  return (
    typeof value === 'object' &&
    value !== null &&
    'permanentId' in value &&
    typeof value.permanentId === 'string' &&
    'lineageId' in value &&
    typeof value.lineageId === 'string' &&
    'ephemeralId' in value &&
    typeof value.ephemeralId === 'string' &&
    'fieldKinds' in value &&
    typeof value.fieldKinds === 'object' &&
    value.fieldKinds !== null &&
    'fields' in value &&
    typeof value.fields === 'object' &&
    value.fields !== null
  );
}

/**
 * Container kinds hold slots and default to an empty container.
 */
export function isContainerKind(kind: FieldKind): boolean {
  return kind === 'list' || kind === 'tuple' || kind === 'set' || kind === 'map';
}
