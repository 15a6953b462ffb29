// Tests for Mermaid rendering

import { describe, it, expect } from 'vitest';
import { createEntity, defineEntityType } from '../entities/lifecycle.js';
import { buildGraph } from './builder.js';
import { renderGraphMermaid } from './mermaid.js';

// --- Test Fixtures ---

const Folder = defineEntityType({
  name: 'Folder',
  fields: { main: { kind: 'entity' }, items: { kind: 'list' }, byName: { kind: 'map' } },
});
const Note = defineEntityType({ name: 'Note', fields: { ref: { kind: 'entity' } } });
const Doc = defineEntityType({ name: 'Doc', fields: { title: { kind: 'value' } } });

const FOLDER_ID = 'aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa';
const DOC_ID = 'bbbbbbbb-bbbb-4bbb-8bbb-bbbbbbbbbbbb';
const NOTE_ID = 'cccccccc-cccc-4ccc-8ccc-cccccccccccc';

// --- Tests ---

describe('renderGraphMermaid', () => {
  it('renders nodes in topological order and dots non-primary edges', () => {
    const doc = createEntity(Doc, { title: 'spec' }, { permanentId: DOC_ID });
    const note = createEntity(Note, { ref: doc }, { permanentId: NOTE_ID });
    const root = createEntity(Folder, { main: doc, items: [note] }, { permanentId: FOLDER_ID });

    expect(renderGraphMermaid(buildGraph(root))).toBe(
      [
        'graph TD',
        '  n0["Folder aaaaaaaa"]',
        '  n1["Note cccccccc"]',
        '  n2["Doc bbbbbbbb"]',
        '  n0 -->|"main"| n2',
        '  n0 -->|"items[0]"| n1',
        '  n1 -.->|"ref"| n2',
      ].join('\n')
    );
  });

  it('escapes quotes in map keys', () => {
    const doc = createEntity(Doc, {}, { permanentId: DOC_ID });
    const root = createEntity(Folder, { byName: new Map([['say "hi"', doc]]) }, { permanentId: FOLDER_ID });

    const lines = renderGraphMermaid(buildGraph(root)).split('\n');

    expect(lines[3]).toBe('  n0 -->|"byName[say #quot;hi#quot;]"| n1');
  });
});
