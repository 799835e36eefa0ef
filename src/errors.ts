import type { Comparator, FieldType } from './types';

/**
 * A field (or a relation on the way to it) was never populated on the record
 * being inspected. Load the field before filtering, grouping or plucking on it.
 */
export class FieldNotLoadedError extends Error {
  override readonly name = 'FieldNotLoadedError';

  constructor(
    readonly schema: string,
    readonly field: string,
    readonly path?: string,
  ) {
    super(
      path !== undefined && path !== field
        ? `Field "${field}" is not loaded on ${schema} (resolving "${path}")`
        : `Field "${field}" is not loaded on ${schema}`,
    );
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedComparisonTypeError extends Error {
  override readonly name = 'UnsupportedComparisonTypeError';

  constructor(
    readonly comparator: Comparator,
    readonly detail: string,
  ) {
    super(`Unsupported ${comparator} comparison: ${detail}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SchemaAssignabilityError extends Error {
  override readonly name = 'SchemaAssignabilityError';

  constructor(
    readonly expected: string,
    readonly actual: string,
    message?: string,
  ) {
    super(message ?? `Record of schema ${actual} is not assignable to ${expected}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A value does not fit the type declared for its field, or a caller asked
 * for a value kind the field cannot produce.
 */
export class FieldTypeMismatchError extends Error {
  override readonly name = 'FieldTypeMismatchError';

  constructor(
    readonly field: string,
    readonly expected: FieldType | string,
    readonly actual: string,
  ) {
    super(`Field "${field}" expected ${expected}, got ${actual}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
