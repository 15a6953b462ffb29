// Identifier and clock helpers

import { randomUUID } from 'node:crypto';
import type { Id, Timestamp } from '@lineage/protocol';

export function newId(): Id {
  return randomUUID();
}

export function now(): Timestamp {
  return new Date().toISOString();
}
