// Structural equality over payload values

function isObjectKey(key: unknown): boolean {
  return (typeof key === 'object' && key !== null) || typeof key === 'function';
}

function bytesEqual(a: ArrayBufferView, b: ArrayBufferView): boolean {
  if (a.byteLength !== b.byteLength) return false;
  const left = new Uint8Array(a.buffer, a.byteOffset, a.byteLength);
  const right = new Uint8Array(b.buffer, b.byteOffset, b.byteLength);
  return left.every((byte, i) => byte === right[i]);
}

/**
 * Deep equality for primitives, arrays, objects, Maps, Sets and Dates.
 * Set members and object Map keys are matched structurally, in any order.
 * Objects compare by their own enumerable properties, whatever their prototype.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (a === null || b === null) return false;
  if (typeof a !== typeof b) return false;

  if (typeof a !== 'object' || typeof b !== 'object') return false;

  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && Object.is(a.getTime(), b.getTime());
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }

  if (a instanceof Map || b instanceof Map) {
    if (!(a instanceof Map) || !(b instanceof Map)) return false;
    if (a.size !== b.size) return false;
    const unmatched: [unknown, unknown][] = [];
    for (const [key, item] of b) {
      if (isObjectKey(key)) unmatched.push([key, item]);
    }
    for (const [key, item] of a) {
      if (!isObjectKey(key)) {
        if (!b.has(key) || !deepEqual(item, b.get(key))) return false;
        continue;
      }
      const index = unmatched.findIndex(
        ([otherKey, otherItem]) => deepEqual(key, otherKey) && deepEqual(item, otherItem)
      );
      if (index === -1) return false;
      unmatched.splice(index, 1);
    }
    return unmatched.length === 0;
  }

  if (a instanceof Set || b instanceof Set) {
    if (!(a instanceof Set) || !(b instanceof Set)) return false;
    if (a.size !== b.size) return false;
    const unmatched = [...b];
    for (const item of a) {
      const index = unmatched.findIndex((candidate) => deepEqual(item, candidate));
      if (index === -1) return false;
      unmatched.splice(index, 1);
    }
    return true;
  }

  if (a instanceof RegExp || b instanceof RegExp) {
    return a instanceof RegExp && b instanceof RegExp && a.source === b.source && a.flags === b.flags;
  }

  if (ArrayBuffer.isView(a) || ArrayBuffer.isView(b)) {
    if (!ArrayBuffer.isView(a) || !ArrayBuffer.isView(b)) return false;
    return a.constructor === b.constructor && bytesEqual(a, b);
  }

  // Class instances lose their prototype when stored, so every other object
  // compares by its own enumerable properties.
  const aEntries = Object.entries(a);
  const bValues = new Map(Object.entries(b));

  if (aEntries.length !== bValues.size) return false;

  return aEntries.every(([key, item]) => bValues.has(key) && deepEqual(item, bValues.get(key)));
}
