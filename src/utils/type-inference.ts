import type { DataRecord } from '../record';
import { Schema } from '../schema';
import type { FieldType, SimpleViewConfig } from '../types';
import { isRecordLike } from './guards';

type Row = Readonly<Record<string, unknown>>;

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATETIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Check if a value is a simple primitive (or a Date).
 * Used to determine if a field can be carried as a typed value.
 */
export function isSimpleValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (value instanceof Date) return true;

  const valueType = typeof value;
  return valueType === 'string' || valueType === 'number' || valueType === 'boolean';
}

/**
 * Check if a value is a plain nested row (a related record in row form).
 */
export function isNestedRow(value: unknown): value is Row {
  if (typeof value !== 'object' || value === null) return false;
  if (Array.isArray(value) || value instanceof Date || isRecordLike(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Infer the field type from actual values in the rows.
 * The first non-null value decides. Returns undefined when the field holds
 * values that cannot be carried (arrays, functions, class instances).
 * @internal
 */
export function inferFieldType(
  rows: readonly Row[],
  field: string,
  mode: 'none' | 'runtime',
): FieldType | undefined {
  for (const row of rows) {
    const value = row[field];
    if (value === null || value === undefined) continue;

    if (isNestedRow(value) || isRecordLike(value)) return 'reference';
    if (!isSimpleValue(value)) return undefined;
    if (mode === 'none') return 'string';

    if (value instanceof Date) return 'datetime';
    if (typeof value === 'number') return 'number';
    if (typeof value === 'boolean') return 'boolean';
    if (typeof value === 'string') {
      if (DATE_ONLY.test(value)) return 'date';
      if (ISO_DATETIME.test(value)) return 'datetime';
    }
    return 'string';
  }

  // No values found; default to string
  return 'string';
}

/**
 * String form of a simple value for fields typed without inference.
 */
function toText(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return value;
}

/**
 * Build a schema and its records from plain rows.
 *
 * Handles type inference, nested rows (as references with a child schema
 * named after the field) and unloaded fields: a key missing from a row, or
 * set to `undefined`, stays unloaded on that row's record.
 * @internal
 */
export function fromRows(
  rows: readonly Row[],
  cfg: SimpleViewConfig,
): { schema: Schema; records: DataRecord[] } {
  const inferMode = cfg.inferTypes ?? 'runtime';

  // 1. Field names, in first-seen order across all rows
  const allKeys = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) allKeys.add(key);
  }

  // 2. Types: explicit first, then inferred; skip what cannot be carried
  const fieldTypes = new Map<string, FieldType>();
  const asText = new Set<string>();
  for (const key of allKeys) {
    const explicit = cfg.types?.[key];
    const type = explicit ?? inferFieldType(rows, key, inferMode);
    if (explicit === undefined && inferMode === 'none' && type === 'string') asText.add(key);

    if (type === undefined) {
      // eslint-disable-next-line no-console
      console.warn(
        `Field "${key}" on ${cfg.schema} holds values that are not simple or nested rows. It will be ignored.`,
      );
      continue;
    }
    fieldTypes.set(key, type);
  }

  if (fieldTypes.size === 0 && rows.length > 0) {
    throw new Error(`Cannot build schema ${cfg.schema}: no usable fields found in rows`);
  }

  // 3. Nested rows become records of a child schema
  const related = new Map<Row, DataRecord>();
  for (const [key, type] of fieldTypes) {
    if (type !== 'reference') continue;

    const nestedRows = rows
      .map((row) => row[key])
      .filter((value): value is Row => isNestedRow(value));
    if (nestedRows.length === 0) continue;

    const child = fromRows(nestedRows, { schema: key, inferTypes: inferMode });
    nestedRows.forEach((nestedRow, index) => related.set(nestedRow, child.records[index]));
  }

  const schema = new Schema(cfg.schema, fieldTypes);
  const records = rows.map((row) => {
    const values: Record<string, unknown> = {};
    for (const key of fieldTypes.keys()) {
      const value = row[key];
      if (isNestedRow(value)) values[key] = related.get(value);
      else values[key] = asText.has(key) ? toText(value) : value;
    }
    return schema.create(values);
  });

  return { schema, records };
}
