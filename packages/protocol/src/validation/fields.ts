// Entity field validation
//
// Checks a field payload against its entity type definition:
// declared names, container shapes, reference ids and field schemas.

import { isPlainRecord, isUuid } from '../types/common.js';
import type { EntityTypeDefinition, FieldKind } from '../types/entities.js';
import { isEntity } from '../types/entities.js';

/**
 * Result of validating entity fields
 */
export type FieldValidationResult = {
  valid: boolean;
  issues: FieldValidationIssue[];
};

export type FieldValidationIssue = {
  path: string;
  message: string;
  code: FieldValidationErrorCode;
};

export type FieldValidationErrorCode =
  | 'UNDECLARED_FIELD'
  | 'INVALID_CONTAINER'
  | 'INVALID_ENTITY'
  | 'INVALID_REFERENCE'
  | 'SCHEMA_MISMATCH';

/**
 * Validate field values against a type definition.
 * Missing declared fields are not reported; callers fill defaults first.
 */
export function validateEntityFields(
  definition: EntityTypeDefinition,
  fields: Record<string, unknown>
): FieldValidationResult {
  const issues: FieldValidationIssue[] = [];

  for (const name of Object.keys(fields)) {
    if (!(name in definition.fields)) {
      issues.push({
        path: name,
        message: `Field "${name}" is not declared on type "${definition.name}"`,
        code: 'UNDECLARED_FIELD',
      });
    }
  }

  for (const [name, spec] of Object.entries(definition.fields)) {
    if (!(name in fields)) continue;
    const value = fields[name];

    const shapeIssue = checkShape(spec.kind, value);
    if (shapeIssue) {
      issues.push({ path: name, ...shapeIssue });
      continue;
    }

    if (spec.schema) {
      const result = spec.schema.safeParse(value);
      if (!result.success) {
        for (const issue of result.error.issues) {
          issues.push({
            path: [name, ...issue.path].join('.'),
            message: issue.message,
            code: 'SCHEMA_MISMATCH',
          });
        }
      }
    }
  }

  return { valid: issues.length === 0, issues };
}

function checkShape(
  kind: FieldKind,
  value: unknown
): { message: string; code: FieldValidationErrorCode } | null {
  if (value === null || value === undefined) return null;

  switch (kind) {
    case 'entity':
      return isEntity(value) ? null : { message: 'Expected an entity or null', code: 'INVALID_ENTITY' };
    case 'list':
    case 'tuple':
      return Array.isArray(value) ? null : { message: `Expected an array for ${kind} field`, code: 'INVALID_CONTAINER' };
    case 'set':
      return value instanceof Set ? null : { message: 'Expected a Set', code: 'INVALID_CONTAINER' };
    case 'map':
      return value instanceof Map || isPlainRecord(value)
        ? null
        : { message: 'Expected a Map or plain object', code: 'INVALID_CONTAINER' };
    case 'reference':
      return typeof value === 'string' && isUuid(value)
        ? null
        : { message: 'Expected a permanentId string or null', code: 'INVALID_REFERENCE' };
    case 'value':
      return null;
  }
}
