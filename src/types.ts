/**
 * Primitive value kinds a field can hold.
 * These are the kinds that can be compared, plucked and grouped.
 */
export type ValueKind = 'boolean' | 'date' | 'datetime' | 'number' | 'id' | 'string';

/**
 * Declared type of a field on a schema.
 * `reference` fields hold another record (or null).
 */
export type FieldType = ValueKind | 'reference';

/**
 * Runtime value produced for each value kind once coerced.
 */
export interface ValueKindMap {
  boolean: boolean;
  date: Date;
  datetime: Date;
  number: number;
  id: string;
  string: string;
}

export type ValueOf<K extends ValueKind> = ValueKindMap[K];

/**
 * Scalar values that can be used as comparison targets.
 * Includes null for explicit null checks.
 */
export type Scalar = string | number | boolean | Date | null;

/**
 * Value returned by pluck/groupBy when no kind is requested.
 * Reference fields yield the related record itself.
 */
export type FieldValue = string | number | boolean | Date | RecordLike | null;

/**
 * Schema metadata as the engine sees it.
 * Only the name and the declared type of a field are needed.
 */
export interface SchemaRef {
  readonly name: string;
  /** Declared type of `field`, or undefined if the schema has no such field. */
  typeOf(field: string): FieldType | undefined;
}

/**
 * Capability a host record exposes to the engine.
 *
 * A record may be partially loaded: `isLoaded` distinguishes a field that was
 * never populated from one that was populated with null.
 */
export interface RecordLike {
  readonly schema: SchemaRef;
  isLoaded(field: string): boolean;
  get(field: string): unknown;
  /** Names of the fields currently populated on this record, in schema order. */
  populatedFields(): readonly string[];
}

/**
 * A record that can produce a copy of itself with only some fields populated.
 * Required by `RecordView.pick`.
 */
export interface Projectable<R> extends RecordLike {
  pick(fields: readonly string[]): R;
}

/**
 * Reference to a field: either a field on the record itself or a path
 * through one or more reference fields (e.g. `Parent.Name`).
 */
export type FieldRef =
  | { readonly kind: 'direct'; readonly field: string }
  | { readonly kind: 'path'; readonly segments: readonly string[] };

/**
 * Anything the public API accepts as a field: a `FieldRef` or its string form.
 */
export type FieldInput = FieldRef | string;

/**
 * A field value resolved against a record, tagged with its declared type.
 * `type` is undefined when a relation on the path was null.
 */
export interface ResolvedValue {
  value: unknown;
  type: FieldType | undefined;
}

export type OrderingComparator =
  | 'lessThan'
  | 'lessThanOrEquals'
  | 'greaterThan'
  | 'greaterThanOrEquals';

export type Comparator =
  | 'equals'
  | 'notEquals'
  | OrderingComparator
  | 'isIn'
  | 'isNotIn'
  | 'hasValue';

/**
 * Set of values for `isIn`/`isNotIn`.
 */
export type ValueSet = ReadonlySet<unknown> | readonly unknown[];

/**
 * A single field condition. Conditions are value objects and never change
 * after construction.
 */
export type Condition =
  | { readonly field: FieldRef; readonly comparator: 'hasValue' }
  | {
    readonly field: FieldRef;
    readonly comparator: 'isIn' | 'isNotIn';
    readonly values: readonly unknown[];
  }
  | {
    readonly field: FieldRef;
    readonly comparator: 'equals' | 'notEquals';
    readonly value: unknown;
  }
  | {
    readonly field: FieldRef;
    readonly comparator: OrderingComparator;
    readonly value: unknown;
  };

/**
 * Definition of a single field when declaring a schema.
 */
export interface FieldDefinition {
  type: FieldType;
}

/**
 * Explicit schema configuration: field name → definition or bare type.
 */
export type SchemaFieldsConfig = Record<string, FieldDefinition | FieldType>;

/**
 * Simple, ergonomic configuration for building a view straight from plain
 * rows. Types are inferred from the data unless given.
 *
 * @example
 * ```ts
 * const view = createView(rows, {
 *   schema: 'Account',
 *   types: { AccountNumber: 'id' },
 * });
 * ```
 */
export interface SimpleViewConfig {
  /** Schema name for the rows. Nested objects get a schema named after their field. */
  schema: string;
  /** Explicit field types; these win over inference. */
  types?: Record<string, FieldType>;
  /**
   * How aggressively to infer field types.
   * - 'runtime': Inspect actual values in the data (default)
   * - 'none': Default all non-nested fields to 'string' type
   */
  inferTypes?: 'none' | 'runtime';
}
