import { FieldTypeMismatchError } from './errors';
import { DataRecord } from './record';
import type { FieldType, RecordLike, SchemaFieldsConfig, SchemaRef } from './types';
import { buildFieldTypes } from './utils/builders';
import { describeValue, isRecordLike } from './utils/guards';
import { coerceValue, isValueKind } from './utils/value-kinds';

/**
 * A schema that can tell whether a record belongs to it.
 * Used to narrow views and their materialized collections.
 */
export interface SchemaGuard<T extends RecordLike> {
  readonly name: string;
  owns(record: RecordLike): record is T;
}

/**
 * Declare a schema.
 *
 * @example
 * ```ts
 * const Account = defineSchema('Account', {
 *   Name: 'string',
 *   AnnualRevenue: { type: 'number' },
 *   Parent: 'reference',
 * });
 * ```
 */
export function defineSchema<N extends string>(name: N, fields: SchemaFieldsConfig): Schema<N> {
  return new Schema(name, buildFieldTypes(name, fields));
}

/**
 * In-memory schema: a name plus an ordered set of typed fields. Also the
 * factory for its records.
 */
export class Schema<N extends string = string> implements SchemaRef, SchemaGuard<DataRecord<N>> {
  private readonly fieldTypes: ReadonlyMap<string, FieldType>;

  constructor(readonly name: N, fieldTypes: ReadonlyMap<string, FieldType>) {
    this.fieldTypes = new Map(fieldTypes);
  }

  typeOf(field: string): FieldType | undefined {
    return this.fieldTypes.get(field);
  }

  get fieldNames(): string[] {
    return Array.from(this.fieldTypes.keys());
  }

  owns(record: RecordLike): record is DataRecord<N> {
    return record instanceof DataRecord && record.schema === this;
  }

  /**
   * Create a record with the given fields populated.
   *
   * Keys that are absent (or `undefined`) stay unloaded; `null` is a loaded,
   * empty value. Reference fields take another record or null.
   */
  create(values: Readonly<Record<string, unknown>>): DataRecord<N> {
    const populated = new Map<string, unknown>();

    for (const [field, value] of Object.entries(values)) {
      if (value === undefined) continue;
      populated.set(field, this.checkValue(field, value));
    }

    return new DataRecord(this, populated);
  }

  /**
   * Validate a value against the declared type of `field`.
   * @internal
   */
  checkValue(field: string, value: unknown): unknown {
    const type = this.typeOf(field);
    if (type === undefined) {
      throw new Error(`Unknown field "${field}" on schema ${this.name}`);
    }
    if (value === null) return null;

    if (!isValueKind(type)) {
      if (!isRecordLike(value)) {
        throw new FieldTypeMismatchError(field, type, describeValue(value));
      }
      return value;
    }

    if (coerceValue(type, value) === undefined) {
      throw new FieldTypeMismatchError(field, type, describeValue(value));
    }
    return value;
  }

  /**
   * Return the field → type map describing this schema.
   */
  describe(): Record<string, FieldType> {
    return Object.fromEntries(this.fieldTypes);
  }
}
