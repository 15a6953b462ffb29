// Reference pointers
//
//   @<permanentId>.<field>(.<field> | [<int>] | ["key"] | ['key'])*
//
// Quoted keys may escape their quote character or a backslash with "\".

import type { ParsedReference, ReferenceSegment } from '@lineage/protocol';
import { isUuid } from '@lineage/protocol';
import { MalformedReferenceError } from '../errors.js';

const ID_LENGTH = 36;
const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*/;
const DIGITS = /^\d+$/;

function readQuotedKey(
  pointer: string,
  quoteAt: number
): { key: string; end: number } | MalformedReferenceError {
  const quote = pointer[quoteAt];
  let key = '';
  let position = quoteAt + 1;

  while (position < pointer.length) {
    const char = pointer[position];
    if (char === '\\' && position + 1 < pointer.length) {
      key += pointer[position + 1];
      position += 2;
      continue;
    }
    if (char === quote) {
      return { key, end: position + 1 };
    }
    key += char;
    position++;
  }

  return new MalformedReferenceError(pointer, quoteAt, 'unterminated quoted key');
}

function scanReference(pointer: string): ParsedReference | MalformedReferenceError {
  if (!pointer.startsWith('@')) {
    return new MalformedReferenceError(pointer, 0, 'expected "@"');
  }

  const entityId = pointer.slice(1, 1 + ID_LENGTH);
  if (!isUuid(entityId)) {
    return new MalformedReferenceError(pointer, 1, 'expected a permanentId');
  }

  let position = 1 + ID_LENGTH;
  if (pointer[position] !== '.') {
    return new MalformedReferenceError(pointer, position, 'expected "." and a field name');
  }

  const segments: ReferenceSegment[] = [];
  while (position < pointer.length) {
    const start = position;
    const char = pointer[position];

    if (char === '.') {
      const match = IDENTIFIER.exec(pointer.slice(position + 1));
      if (!match) {
        return new MalformedReferenceError(pointer, position + 1, 'expected a field name');
      }
      position += 1 + match[0].length;
      segments.push({ type: 'field', name: match[0], raw: pointer.slice(start, position) });
      continue;
    }

    if (char === '[') {
      const next = pointer[position + 1];
      if (next === '"' || next === "'") {
        const quoted = readQuotedKey(pointer, position + 1);
        if (quoted instanceof MalformedReferenceError) return quoted;
        if (pointer[quoted.end] !== ']') {
          return new MalformedReferenceError(pointer, quoted.end, 'expected "]"');
        }
        position = quoted.end + 1;
        segments.push({ type: 'key', key: quoted.key, raw: pointer.slice(start, position) });
        continue;
      }

      const close = pointer.indexOf(']', position);
      if (close === -1) {
        return new MalformedReferenceError(pointer, position, 'unterminated "["');
      }
      const digits = pointer.slice(position + 1, close);
      if (!DIGITS.test(digits)) {
        return new MalformedReferenceError(pointer, position + 1, 'expected an integer index or a quoted key');
      }
      position = close + 1;
      segments.push({ type: 'index', index: Number(digits), raw: pointer.slice(start, position) });
      continue;
    }

    return new MalformedReferenceError(pointer, position, `unexpected "${char}"`);
  }

  return { pointer, entityId, segments };
}

/**
 * Parse a pointer string.
 *
 * @throws MalformedReferenceError with the position of the first syntax error
 */
export function parseReference(pointer: string): ParsedReference {
  const result = scanReference(pointer);
  if (result instanceof MalformedReferenceError) throw result;
  return result;
}

/**
 * True for strings that parse as pointers.
 */
export function isReference(value: unknown): value is string {
  return typeof value === 'string' && !(scanReference(value) instanceof MalformedReferenceError);
}
