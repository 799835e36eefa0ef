import { FieldNotLoadedError, FieldTypeMismatchError } from '../errors';
import type { FieldInput, FieldRef, RecordLike, ResolvedValue } from '../types';
import { describeValue, isRecordLike } from './guards';

/**
 * Normalize a field input to a `FieldRef`.
 * Strings containing `.` become relation paths: `'Parent.Name'` walks the
 * `Parent` reference before reading `Name`.
 */
export function fieldRef(input: FieldInput): FieldRef {
  if (typeof input !== 'string') {
    assertSegments(segmentsOf(input), formatFieldRef(input));
    return input;
  }

  const segments = input.split('.');
  assertSegments(segments, input);

  return segments.length === 1
    ? { kind: 'direct', field: segments[0] }
    : { kind: 'path', segments };
}

function assertSegments(segments: readonly string[], path: string): void {
  if (segments.length === 0 || segments.some((segment) => segment.trim() === '')) {
    throw new Error(`Invalid field path "${path}": segments must not be empty`);
  }
}

export function segmentsOf(ref: FieldRef): readonly string[] {
  return ref.kind === 'direct' ? [ref.field] : ref.segments;
}

/**
 * String form of a field reference, e.g. `Parent.Name`.
 */
export function formatFieldRef(ref: FieldInput): string {
  if (typeof ref === 'string') return ref;
  return segmentsOf(ref).join('.');
}

/**
 * Resolve a field against a record.
 *
 * Each relation on the path must be loaded. A relation that is loaded but
 * null ends the walk with an absent value (`{ value: null, type: undefined }`);
 * only a field that was never loaded is an error.
 */
export function resolveField(record: RecordLike, input: FieldInput): ResolvedValue {
  const ref = fieldRef(input);
  const segments = segmentsOf(ref);
  const path = formatFieldRef(ref);

  let current = record;
  for (let i = 0; i < segments.length - 1; i++) {
    const segment = segments[i];
    assertLoaded(current, segment, path);

    const related = current.get(segment);
    if (related === null || related === undefined) {
      return { value: null, type: undefined };
    }
    if (!isRecordLike(related)) {
      throw new FieldTypeMismatchError(segment, 'reference', describeValue(related));
    }
    current = related;
  }

  const terminal = segments[segments.length - 1];
  assertLoaded(current, terminal, path);

  const value = current.get(terminal);
  return {
    value: value === undefined ? null : value,
    type: current.schema.typeOf(terminal),
  };
}

function assertLoaded(record: RecordLike, field: string, path: string): void {
  // A field the schema does not know can never have been loaded
  if (record.schema.typeOf(field) === undefined || !record.isLoaded(field)) {
    throw new FieldNotLoadedError(record.schema.name, field, path);
  }
}
