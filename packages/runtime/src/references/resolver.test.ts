// Tests for the Reference Resolver

import { describe, it, expect, beforeEach } from 'vitest';
import type { Entity } from '@lineage/protocol';
import {
  EntityNotFoundError,
  FieldNotFoundError,
  IndexError,
  KeyNotFoundError,
  MalformedReferenceError,
} from '../errors.js';
import { createEntity, defineEntityType } from '../entities/lifecycle.js';
import { createRegistry, type Registry } from '../registry/registry.js';
import { createReferenceResolver, type ReferenceResolver } from './resolver.js';

// --- Test Fixtures ---

const Section = defineEntityType({
  name: 'Section',
  fields: { name: { kind: 'value' } },
});

const Course = defineEntityType({
  name: 'Course',
  fields: {
    title: { kind: 'value' },
    sections: { kind: 'list' },
    tags: { kind: 'set' },
    rooms: { kind: 'map' },
    meta: { kind: 'value' },
    previous: { kind: 'reference' },
  },
});

const MISSING_ID = '00000000-0000-4000-8000-000000000000';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

// --- Tests ---

describe('ReferenceResolver', () => {
  let registry: Registry;
  let resolver: ReferenceResolver;
  let course: Entity;
  let section: Entity;

  beforeEach(() => {
    registry = createRegistry({ types: [Section, Course] });
    section = createEntity(Section, { name: 'Intro' });
    course = createEntity(Course, {
      title: 'Algebra',
      sections: [section],
      tags: new Set(['core', 'math']),
      rooms: new Map([['mon', 'A1']]),
      meta: { level: { code: 'L1' }, weeks: [1, 2] },
    });
    registry.register(course);
    resolver = createReferenceResolver(registry);
  });

  describe('resolve', () => {
    it('reads a field of the addressed entity', () => {
      expect(resolver.resolve(`@${course.permanentId}.title`)).toEqual({
        value: 'Algebra',
        entityIds: [course.permanentId],
      });
    });

    it('walks into child entities and lists them', () => {
      const result = resolver.resolve(`@${course.permanentId}.sections[0].name`);

      expect(result.value).toBe('Intro');
      expect(result.entityIds).toEqual([course.permanentId, section.permanentId]);
    });

    it('returns the stored version, not the live object', () => {
      const result = resolver.resolve(`@${course.permanentId}.sections[0]`);

      expect(result.value).toBe(registry.get(section.permanentId));
      expect(result.value).not.toBe(section);
    });

    it('reads plain object properties by field or key', () => {
      expect(resolver.resolve(`@${course.permanentId}.meta.level.code`).value).toBe('L1');
      expect(resolver.resolve(`@${course.permanentId}.meta["level"]`).value).toEqual({ code: 'L1' });
      expect(resolver.resolve(`@${course.permanentId}.meta.weeks[1]`).value).toBe(2);
    });

    it('reads map entries by key and set members by position', () => {
      expect(resolver.resolve(`@${course.permanentId}.rooms['mon']`).value).toBe('A1');
      expect(resolver.resolve(`@${course.permanentId}.tags[1]`).value).toBe('math');
    });

    it('resolves every declared field to its stored value', () => {
      const stored = registry.get(course.permanentId);

      for (const field of Object.keys(Course.fields)) {
        expect(resolver.resolve(`@${course.permanentId}.${field}`).value).toBe(stored?.fields[field]);
      }
    });

    it('keeps resolving superseded versions', () => {
      const oldId = course.permanentId;
      course.fields.title = 'Algebra II';
      registry.commit(course);

      expect(resolver.resolve(`@${oldId}.title`).value).toBe('Algebra');
      expect(resolver.resolve(`@${course.permanentId}.title`).value).toBe('Algebra II');
    });

    it('fails for unknown entities', () => {
      expect(() => resolver.resolve(`@${MISSING_ID}.title`)).toThrow(EntityNotFoundError);
    });

    it('fails for malformed pointers', () => {
      expect(() => resolver.resolve('title')).toThrow(MalformedReferenceError);
    });

    it('fails for undeclared fields with the failing segment', () => {
      const error = captureError(() => resolver.resolve(`@${course.permanentId}.sections[0].title`));

      expect(error).toBeInstanceOf(FieldNotFoundError);
      expect(error).toMatchObject({ field: 'title', segment: '.title' });
    });

    it('fails for fields of non-objects', () => {
      expect(() => resolver.resolve(`@${course.permanentId}.title.length`)).toThrow(FieldNotFoundError);
    });

    it('fails for indexes out of range or on non-sequences', () => {
      const outOfRange = captureError(() => resolver.resolve(`@${course.permanentId}.sections[3]`));
      const notIndexable = captureError(() => resolver.resolve(`@${course.permanentId}.title[0]`));

      expect(outOfRange).toBeInstanceOf(IndexError);
      expect(outOfRange).toMatchObject({ index: 3, length: 1 });
      expect(notIndexable).toBeInstanceOf(IndexError);
      expect(notIndexable).toMatchObject({ index: 0, length: null });
    });

    it('fails for missing keys', () => {
      const error = captureError(() => resolver.resolve(`@${course.permanentId}.rooms["tue"]`));

      expect(error).toBeInstanceOf(KeyNotFoundError);
      expect(error).toMatchObject({ key: 'tue', segment: '["tue"]' });
    });

    it('reads numeric map keys through integer brackets', () => {
      const schedule = createEntity(Course, {
        rooms: new Map<unknown, string>([
          [1, 'one'],
          ['1', 'string-one'],
        ]),
      });
      registry.register(schedule);

      expect(resolver.resolve(`@${schedule.permanentId}.rooms[1]`).value).toBe('one');
      expect(resolver.resolve(`@${schedule.permanentId}.rooms["1"]`).value).toBe('string-one');

      const missing = captureError(() => resolver.resolve(`@${schedule.permanentId}.rooms[2]`));
      expect(missing).toBeInstanceOf(KeyNotFoundError);
      expect(missing).toMatchObject({ key: '2', segment: '[2]' });
    });

    it('never reads entity fields through key brackets', () => {
      expect(() => resolver.resolve(`@${course.permanentId}.sections[0]["name"]`)).toThrow(KeyNotFoundError);
    });
  });

  describe('resolveMany', () => {
    it('resolves each distinct pointer once', () => {
      const title = `@${course.permanentId}.title`;
      const name = `@${course.permanentId}.sections[0].name`;

      const results = resolver.resolveMany([title, name, title]);

      expect([...results.keys()]).toEqual([title, name]);
      expect(results.get(name)?.value).toBe('Intro');
    });
  });

  describe('resolveReferences', () => {
    it('replaces pointers inside nested data and tracks dependencies', () => {
      const title = `@${course.permanentId}.title`;
      const name = `@${course.permanentId}.sections[0].name`;
      const input = {
        heading: title,
        rows: [name, 'plain text'],
        lookup: new Map([['room', `@${course.permanentId}.rooms["mon"]`]]),
        count: 3,
      };

      const result = resolver.resolveReferences(input);

      expect(result.value).toEqual({
        heading: 'Algebra',
        rows: ['Intro', 'plain text'],
        lookup: new Map([['room', 'A1']]),
        count: 3,
      });
      expect(result.entityIds).toEqual([course.permanentId, section.permanentId]);
      expect(result.references).toEqual({
        [title]: course.permanentId,
        [name]: course.permanentId,
        [`@${course.permanentId}.rooms["mon"]`]: course.permanentId,
      });
      expect(input.heading).toBe(title);
    });

    it('passes data without pointers through unchanged', () => {
      expect(resolver.resolveReferences(['a', 1, null]).value).toEqual(['a', 1, null]);
    });
  });
});
