import { FieldNotLoadedError } from './errors';
import type { Schema } from './schema';
import type { Projectable } from './types';

/**
 * Immutable in-memory record of a `Schema`.
 *
 * Only populated fields are stored. A field that was never populated reports
 * `isLoaded(field) === false` and reading it throws `FieldNotLoadedError`.
 * Records are created through `Schema.create`; `with` and `pick` return new
 * records and never modify this one.
 */
export class DataRecord<N extends string = string> implements Projectable<DataRecord<N>> {
  private readonly values: ReadonlyMap<string, unknown>;

  constructor(readonly schema: Schema<N>, values: ReadonlyMap<string, unknown>) {
    this.values = new Map(values);
  }

  isLoaded(field: string): boolean {
    return this.values.has(field);
  }

  get(field: string): unknown {
    if (!this.values.has(field)) {
      throw new FieldNotLoadedError(this.schema.name, field);
    }
    return this.values.get(field) ?? null;
  }

  populatedFields(): string[] {
    return this.schema.fieldNames.filter((field) => this.values.has(field));
  }

  /**
   * New record of the same schema with only `fields` populated.
   * Every picked field must be loaded here.
   */
  pick(fields: readonly string[]): DataRecord<N> {
    const picked = new Map<string, unknown>();
    for (const field of fields) {
      if (!this.values.has(field)) {
        throw new FieldNotLoadedError(this.schema.name, field);
      }
      picked.set(field, this.values.get(field));
    }
    return new DataRecord(this.schema, picked);
  }

  /**
   * New record with `changes` applied on top of this record's fields.
   */
  with(changes: Readonly<Record<string, unknown>>): DataRecord<N> {
    const next = new Map(this.values);
    for (const [field, value] of Object.entries(changes)) {
      if (value === undefined) continue;
      next.set(field, this.schema.checkValue(field, value));
    }
    return new DataRecord(this.schema, next);
  }

  /**
   * Plain object of the populated fields. Related records are converted too.
   */
  toObject(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const field of this.populatedFields()) {
      const value = this.values.get(field);
      result[field] = value instanceof DataRecord ? value.toObject() : value;
    }
    return result;
  }
}
