// Tests for entity construction and lifecycle helpers

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import type { EntityTypeDefinition } from '@lineage/protocol';
import { EntityValidationError, ValidationError } from '../errors.js';
import {
  clearRoot,
  createEntity,
  defineEntityType,
  forkEntity,
  isMarkedRoot,
  isRootEntity,
  markRoot,
} from './lifecycle.js';

// --- Test Fixtures ---

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function createStudentType(): EntityTypeDefinition {
  return defineEntityType({
    name: 'Student',
    fields: {
      name: { kind: 'value', schema: z.string().nullable() },
      mentor: { kind: 'entity' },
      grades: { kind: 'list' },
      coords: { kind: 'tuple' },
      clubs: { kind: 'set' },
      scores: { kind: 'map' },
      advisor: { kind: 'reference' },
    },
  });
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

// --- Tests ---

describe('defineEntityType', () => {
  it('returns a valid definition unchanged', () => {
    const definition: EntityTypeDefinition = { name: 'Room', fields: { code: { kind: 'value' } } };

    expect(defineEntityType(definition)).toBe(definition);
  });

  it('rejects an empty type name', () => {
    expect(() => defineEntityType({ name: ' ', fields: {} })).toThrow(ValidationError);
  });

  it('rejects field names pointers cannot address', () => {
    expect(() =>
      defineEntityType({ name: 'Room', fields: { 'floor-number': { kind: 'value' } } })
    ).toThrow('Invalid field name "floor-number" on type "Room"');
  });
});

describe('createEntity', () => {
  it('fills missing fields with empty containers and null', () => {
    const student = createEntity(createStudentType(), { name: 'Ada' });

    expect(student.type).toBe('Student');
    expect(student.fields.name).toBe('Ada');
    expect(student.fields.mentor).toBeNull();
    expect(student.fields.grades).toEqual([]);
    expect(student.fields.coords).toEqual([]);
    expect(student.fields.clubs).toEqual(new Set());
    expect(student.fields.scores).toEqual(new Map());
    expect(student.fields.advisor).toBeNull();
  });

  it('mints distinct ids for identity, lineage and handle', () => {
    const student = createEntity(createStudentType());

    expect(student.permanentId).toMatch(UUID);
    expect(student.lineageId).toMatch(UUID);
    expect(student.ephemeralId).toMatch(UUID);
    expect(new Set([student.permanentId, student.lineageId, student.ephemeralId]).size).toBe(3);
    expect(student.history).toEqual([]);
    expect(student.predecessorId).toBeUndefined();
  });

  it('never reuses ids across entities', () => {
    const type = createStudentType();
    const ids = new Set(Array.from({ length: 20 }, () => createEntity(type).permanentId));

    expect(ids.size).toBe(20);
  });

  it('honours explicit ids', () => {
    const student = createEntity(createStudentType(), {}, {
      permanentId: '11111111-1111-4111-8111-111111111111',
      lineageId: '22222222-2222-4222-8222-222222222222',
      createdAt: '2024-01-01T00:00:00.000Z',
    });

    expect(student.permanentId).toBe('11111111-1111-4111-8111-111111111111');
    expect(student.lineageId).toBe('22222222-2222-4222-8222-222222222222');
    expect(student.createdAt).toBe('2024-01-01T00:00:00.000Z');
  });

  it('copies field kinds from the definition', () => {
    const student = createEntity(createStudentType());

    expect(student.fieldKinds).toEqual({
      name: 'value',
      mentor: 'entity',
      grades: 'list',
      coords: 'tuple',
      clubs: 'set',
      scores: 'map',
      advisor: 'reference',
    });
  });

  it('initialises provenance for every field in the shape of its value', () => {
    const student = createEntity(createStudentType(), {
      grades: [90, 85],
      clubs: new Set(['chess']),
      scores: new Map([['math', 1]]),
    });

    expect(student.attributeProvenance).toEqual({
      name: null,
      mentor: null,
      grades: [null, null],
      coords: [],
      clubs: [null],
      scores: { math: null },
      advisor: null,
    });
  });

  it('rejects undeclared fields', () => {
    expect(() => createEntity(createStudentType(), { nickname: 'A' })).toThrow(EntityValidationError);
  });

  it('collects every schema issue into one error', () => {
    const type = defineEntityType({
      name: 'Exam',
      fields: {
        title: { kind: 'value', schema: z.string() },
        score: { kind: 'value', schema: z.number().max(100) },
      },
    });

    const error = captureError(() => createEntity(type, { title: 42, score: 120 }));

    expect(error).toBeInstanceOf(EntityValidationError);
    if (error instanceof EntityValidationError) {
      expect(error.entityType).toBe('Exam');
      expect(error.issues.map((issue) => issue.path)).toEqual(['title', 'score']);
    }
  });

  it('runs schemas against defaulted fields', () => {
    const type = defineEntityType({
      name: 'Exam',
      fields: { title: { kind: 'value', schema: z.string() } },
    });

    expect(() => createEntity(type)).toThrow(EntityValidationError);
  });
});

describe('root bookkeeping', () => {
  it('treats an unmarked entity as a root that is not yet marked', () => {
    const student = createEntity(createStudentType());

    expect(isRootEntity(student)).toBe(true);
    expect(isMarkedRoot(student)).toBe(false);
  });

  it('marks and clears root ownership', () => {
    const type = createStudentType();
    const root = createEntity(type);
    const child = createEntity(type);

    markRoot(root, root);
    markRoot(child, root);

    expect(isMarkedRoot(root)).toBe(true);
    expect(isRootEntity(child)).toBe(false);
    expect(child.rootEphemeralId).toBe(root.ephemeralId);

    clearRoot(child);
    expect(child.rootPermanentId).toBeUndefined();
    expect(isRootEntity(child)).toBe(true);
  });
});

describe('forkEntity', () => {
  it('moves the current id into history and keeps the lineage', () => {
    const student = createEntity(createStudentType());
    const firstId = student.permanentId;
    const lineageId = student.lineageId;

    forkEntity(student, 'next-id', '2024-02-01T00:00:00.000Z');

    expect(student.permanentId).toBe('next-id');
    expect(student.predecessorId).toBe(firstId);
    expect(student.history).toEqual([firstId]);
    expect(student.lineageId).toBe(lineageId);
    expect(student.forkedAt).toBe('2024-02-01T00:00:00.000Z');
  });
});
