import type { RecordLike } from '../types';

/**
 * Check if a value exposes the record capability the engine reads through.
 */
export function isRecordLike(value: unknown): value is RecordLike {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'schema' in value &&
    'isLoaded' in value && typeof value.isLoaded === 'function' &&
    'get' in value && typeof value.get === 'function' &&
    'populatedFields' in value && typeof value.populatedFields === 'function'
  );
}

/**
 * Short human-readable description of a value's runtime type, for error messages.
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'invalid Date' : 'Date';
  if (Array.isArray(value)) return 'array';
  if (isRecordLike(value)) return `record of ${value.schema.name}`;
  if (typeof value === 'object') {
    const ctorName = value.constructor?.name;
    return ctorName && ctorName !== 'Object' ? ctorName : 'object';
  }
  return typeof value;
}
