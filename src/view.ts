import { SchemaAssignabilityError } from './errors';
import { evaluate, match, type Predicate } from './match';
import type { DataRecord } from './record';
import { Schema, type SchemaGuard } from './schema';
import type {
  FieldInput,
  FieldValue,
  Projectable,
  RecordLike,
  SimpleViewConfig,
  ValueKind,
  ValueOf,
} from './types';
import { fieldRef, formatFieldRef, resolveField } from './utils/field-path';
import { fromRows } from './utils/type-inference';
import { extractAs, extractValue, groupKey } from './utils/value-kinds';


/**
 * Create a view from plain rows.
 *
 * Overloads:
 * - Explicit schema: every row is created through `schema.create`.
 * - Simple config: `SimpleViewConfig` that infers the schema from the data.
 */

// Explicit schema overload
export function createView<N extends string>(
  rows: readonly Readonly<Record<string, unknown>>[],
  schema: Schema<N>,
): RecordView<DataRecord<N>>;

// Simple config overload
export function createView(
  rows: readonly Readonly<Record<string, unknown>>[],
  config: SimpleViewConfig,
): RecordView<DataRecord>;

// Implementation
export function createView(
  rows: readonly Readonly<Record<string, unknown>>[],
  config: Schema | SimpleViewConfig,
): RecordView<DataRecord> {
  if (config instanceof Schema) {
    const schema = config;
    return RecordView.of(rows.map((row) => schema.create(row)), schema);
  }

  const { schema, records } = fromRows(rows, config);
  return RecordView.of(records, schema);
}

/**
 * Immutable view over a sequence of records.
 *
 * Every operation returns a new view (or a plain collection) built from this
 * view's records; the backing sequence is never modified. Records themselves
 * are shared between views, not copied, except by `pick` and the transforms
 * passed to `mapAll`/`mapSome`.
 */
export class RecordView<R extends RecordLike> implements Iterable<R> {
  private readonly records: readonly R[];
  private readonly schema: SchemaGuard<R> | undefined;

  private constructor(records: readonly R[], schema: SchemaGuard<R> | undefined) {
    this.records = records;
    this.schema = schema;
  }

  /**
   * Build a view from an array, set or any other iterable of records.
   * The input is copied; later changes to it do not affect the view.
   * When `schema` is given every record must belong to it.
   */
  static of<R extends RecordLike>(records: Iterable<R>, schema?: SchemaGuard<R>): RecordView<R> {
    const copied = Array.from(records);
    if (schema) {
      for (const record of copied) assertOwned(schema, record);
    }
    return new RecordView(copied, schema);
  }

  get size(): number {
    return this.records.length;
  }

  isEmpty(): boolean {
    return this.records.length === 0;
  }

  [Symbol.iterator](): Iterator<R> {
    return this.records[Symbol.iterator]();
  }

  // Filtering
  // ==============================

  /**
   * Keep the records the predicate matches, in order.
   */
  filter(predicate: Predicate): RecordView<R> {
    return new RecordView(
      this.records.filter((record) => evaluate(predicate, record)),
      this.schema,
    );
  }

  /**
   * Keep the records the predicate does not match, in order.
   */
  remove(predicate: Predicate): RecordView<R> {
    return this.filter(match.not(predicate));
  }

  /**
   * First record the predicate matches, if any.
   */
  find(predicate: Predicate): R | undefined {
    return this.records.find((record) => evaluate(predicate, record));
  }

  // Transforms
  // ==============================

  /**
   * Apply `transform` to every record.
   * On a view with a declared schema the results must belong to it.
   */
  mapAll(transform: (record: R) => R): RecordView<R> {
    return new RecordView(
      this.records.map((record) => this.checked(transform(record))),
      this.schema,
    );
  }

  /**
   * Apply `transform` to the records the predicate matches; the others pass
   * through unchanged. Order and size are preserved.
   */
  mapSome(predicate: Predicate, transform: (record: R) => R): RecordView<R> {
    return new RecordView(
      this.records.map((record) =>
        evaluate(predicate, record) ? this.checked(transform(record)) : record,
      ),
      this.schema,
    );
  }

  /**
   * Copy every record with only `fields` populated. The other fields of a
   * picked record are unloaded, so it cannot overwrite them if it is
   * written back. Only direct fields can be picked.
   */
  pick<P extends Projectable<P>>(this: RecordView<P>, fields: Iterable<FieldInput>): RecordView<P> {
    const names = new Set<string>();
    for (const field of fields) {
      const ref = fieldRef(field);
      if (ref.kind !== 'direct') {
        throw new Error(`pick accepts direct fields only, got path "${formatFieldRef(ref)}"`);
      }
      names.add(ref.field);
    }

    if (names.size === 0) {
      // eslint-disable-next-line no-console
      console.warn('pick called with an empty field set. Picked records will have no populated fields.');
    }

    const picked = Array.from(names);
    return new RecordView(
      this.records.map((record) => record.pick(picked)),
      this.schema,
    );
  }

  // Extraction
  // ==============================

  /**
   * Partition records by the value of `field`. Groups appear in first-seen
   * order and keep the records' relative order; null is a valid key.
   * With `kind`, keys are coerced to that value kind.
   */
  groupBy(field: FieldInput): Map<FieldValue, R[]>;
  groupBy<K extends ValueKind>(field: FieldInput, kind: K): Map<ValueOf<K> | null, R[]>;
  groupBy(field: FieldInput, kind?: ValueKind): Map<FieldValue, R[]> {
    const ref = fieldRef(field);
    const label = formatFieldRef(ref);

    const groups = new Map<FieldValue, R[]>();
    const byKey = new Map<unknown, R[]>();

    for (const record of this.records) {
      const resolved = resolveField(record, ref);
      const value = kind ? extractAs(resolved, kind, label) : extractValue(resolved, label);
      const key = groupKey(value);

      let bucket = byKey.get(key);
      if (!bucket) {
        bucket = [];
        byKey.set(key, bucket);
        groups.set(value, bucket);
      }
      bucket.push(record);
    }

    return groups;
  }

  /**
   * Value of `field` for every record, in order, nulls included.
   * With `kind`, values are coerced to that value kind.
   */
  pluck(field: FieldInput): FieldValue[];
  pluck<K extends ValueKind>(field: FieldInput, kind: K): Array<ValueOf<K> | null>;
  pluck(field: FieldInput, kind?: ValueKind): FieldValue[] {
    const ref = fieldRef(field);
    const label = formatFieldRef(ref);

    return this.records.map((record) => {
      const resolved = resolveField(record, ref);
      return kind ? extractAs(resolved, kind, label) : extractValue(resolved, label);
    });
  }

  // Materialization
  // ==============================

  /**
   * Records as a new array. With `schema`, every record must belong to it and
   * the array is typed accordingly.
   */
  asList(): R[];
  asList<T extends R>(schema: SchemaGuard<T>): T[];
  asList(schema?: SchemaGuard<R>): R[] {
    if (!schema) return [...this.records];
    const guard = schema;
    return this.records.map((record) => assertOwned(guard, record));
  }

  /**
   * Records as a set, deduplicated by identity, in first-seen order.
   */
  asSet(): Set<R>;
  asSet<T extends R>(schema: SchemaGuard<T>): Set<T>;
  asSet(schema?: SchemaGuard<R>): Set<R> {
    return new Set(schema ? this.asList(schema) : this.records);
  }

  private checked(record: R): R {
    return this.schema ? assertOwned(this.schema, record) : record;
  }
}

function assertOwned<T extends RecordLike>(schema: SchemaGuard<T>, record: RecordLike): T {
  if (!schema.owns(record)) {
    throw new SchemaAssignabilityError(schema.name, record.schema.name);
  }
  return record;
}
