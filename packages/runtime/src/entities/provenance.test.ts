// Tests for attribute provenance

import { describe, it, expect } from 'vitest';
import type { EntityTypeDefinition } from '@lineage/protocol';
import { ValidationError } from '../errors.js';
import { createEntity, defineEntityType } from './lifecycle.js';
import { borrowAttribute, recordProvenance, syncProvenance } from './provenance.js';

// --- Test Fixtures ---

function createNoteType(): EntityTypeDefinition {
  return defineEntityType({
    name: 'Note',
    fields: {
      title: { kind: 'value' },
      lines: { kind: 'list' },
      labels: { kind: 'map' },
      attachment: { kind: 'entity' },
    },
  });
}

// --- Tests ---

describe('syncProvenance', () => {
  it('grows list entries with null slots', () => {
    const note = createEntity(createNoteType(), { lines: ['a'] });
    const lines = note.fields.lines;
    if (Array.isArray(lines)) lines.push('b', 'c');

    syncProvenance(note);

    expect(note.attributeProvenance.lines).toEqual([null, null, null]);
  });

  it('keeps sources of slots that still exist', () => {
    const note = createEntity(createNoteType(), { lines: ['a', 'b'] });
    recordProvenance(note, 'lines', 'source-1', 0);
    const lines = note.fields.lines;
    if (Array.isArray(lines)) lines.pop();

    syncProvenance(note);

    expect(note.attributeProvenance.lines).toEqual(['source-1']);
  });

  it('follows map keys', () => {
    const note = createEntity(createNoteType(), { labels: new Map([['color', 'red']]) });
    recordProvenance(note, 'labels', 'source-1', 'color');
    const labels = note.fields.labels;
    if (labels instanceof Map) labels.set('size', 'large');

    syncProvenance(note);

    expect(note.attributeProvenance.labels).toEqual({ color: 'source-1', size: null });
  });

  it('drops entries for fields no longer declared', () => {
    const note = createEntity(createNoteType());
    note.attributeProvenance.stale = 'source-1';

    syncProvenance(note);

    expect(Object.keys(note.attributeProvenance)).toEqual(['title', 'lines', 'labels', 'attachment']);
  });
});

describe('recordProvenance', () => {
  it('sets a scalar field source', () => {
    const note = createEntity(createNoteType(), { title: 'Plan' });

    recordProvenance(note, 'title', 'source-1');

    expect(note.attributeProvenance.title).toBe('source-1');
  });

  it('sets every slot when no slot is given', () => {
    const note = createEntity(createNoteType(), { lines: ['a', 'b'] });

    recordProvenance(note, 'lines', 'source-1');

    expect(note.attributeProvenance.lines).toEqual(['source-1', 'source-1']);
  });

  it('sets a single slot', () => {
    const note = createEntity(createNoteType(), { lines: ['a', 'b'] });

    recordProvenance(note, 'lines', 'source-1', 0);

    expect(note.attributeProvenance.lines).toEqual(['source-1', null]);
  });

  it('rejects missing slots and undeclared fields', () => {
    const note = createEntity(createNoteType(), { lines: ['a'] });

    expect(() => recordProvenance(note, 'lines', 'source-1', 3)).toThrow('Field "lines" has no slot 3');
    expect(() => recordProvenance(note, 'labels', 'source-1', 'missing')).toThrow(
      'Field "labels" has no key "missing"'
    );
    expect(() => recordProvenance(note, 'body', 'source-1')).toThrow(ValidationError);
  });
});

describe('borrowAttribute', () => {
  it('copies the value and records the source entity', () => {
    const type = createNoteType();
    const source = createEntity(type, { lines: [{ text: 'a' }] });
    const target = createEntity(type);

    borrowAttribute(target, 'lines', source, 'lines');

    expect(target.fields.lines).toEqual([{ text: 'a' }]);
    expect(target.fields.lines).not.toBe(source.fields.lines);
    expect(target.attributeProvenance.lines).toEqual([source.permanentId]);
  });

  it('shares child entities instead of copying them', () => {
    const type = createNoteType();
    const attachment = createEntity(type, { title: 'scan' });
    const source = createEntity(type, { attachment });
    const target = createEntity(type);

    borrowAttribute(target, 'attachment', source, 'attachment');

    expect(target.fields.attachment).toBe(attachment);
    expect(target.attributeProvenance.attachment).toBe(source.permanentId);
  });

  it('rejects fields the source does not declare', () => {
    const type = createNoteType();

    expect(() => borrowAttribute(createEntity(type), 'title', createEntity(type), 'body')).toThrow(
      'Field "body" is not declared on type "Note"'
    );
  });

  it('rejects values that cannot be copied', () => {
    const type = createNoteType();
    const source = createEntity(type, { title: () => 'not data' });

    expect(() => borrowAttribute(createEntity(type), 'title', source, 'title')).toThrow(
      'Field value cannot be copied'
    );
  });
});
