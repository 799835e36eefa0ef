import { FieldTypeMismatchError } from '../errors';
import type { FieldType, FieldValue, ResolvedValue, ValueKind, ValueOf } from '../types';
import { describeValue, isRecordLike } from './guards';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const ZONELESS_ISO = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Canonical key a value is compared and grouped by.
 */
export type ValueKey = string | number | boolean;

interface KindRule<K extends ValueKind> {
  /** Convert a raw value to the kind's runtime value, or undefined if it does not fit. */
  coerce(raw: unknown): ValueOf<K> | undefined;
  key(value: ValueOf<K>): ValueKey;
  orderable: boolean;
}

/**
 * Convert a raw value to epoch milliseconds.
 * Accepts Date instances, epoch numbers and anything `Date.parse` understands;
 * ISO timestamps without an offset are read as UTC.
 * @internal
 */
function toEpochMillis(raw: unknown): number | undefined {
  if (raw instanceof Date) {
    const time = raw.getTime();
    return Number.isNaN(time) ? undefined : time;
  }

  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : undefined;
  }

  if (typeof raw === 'string') {
    const parsed = Date.parse(ZONELESS_ISO.test(raw) ? `${raw}Z` : raw);
    return Number.isNaN(parsed) ? undefined : parsed;
  }

  return undefined;
}

// Kind Table
// ==============================

/**
 * Coercion and comparison rules per value kind.
 *
 * - `date` values are truncated to UTC midnight
 * - `number` accepts numeric strings, as range filters do
 * - `id` must be a non-empty string
 */
export const VALUE_KINDS: { readonly [K in ValueKind]: KindRule<K> } = {
  boolean: {
    coerce: (raw) => (typeof raw === 'boolean' ? raw : undefined),
    key: (value) => value,
    orderable: false,
  },
  number: {
    coerce: (raw) => {
      if (typeof raw === 'number') return Number.isNaN(raw) ? undefined : raw;
      if (typeof raw === 'string' && raw.trim() !== '') {
        const parsed = Number(raw);
        return Number.isNaN(parsed) ? undefined : parsed;
      }
      return undefined;
    },
    key: (value) => value,
    orderable: true,
  },
  date: {
    coerce: (raw) => {
      const millis = toEpochMillis(raw);
      if (millis === undefined) return undefined;
      return new Date(Math.floor(millis / MS_PER_DAY) * MS_PER_DAY);
    },
    key: (value) => value.getTime(),
    orderable: true,
  },
  datetime: {
    coerce: (raw) => {
      const millis = toEpochMillis(raw);
      return millis === undefined ? undefined : new Date(millis);
    },
    key: (value) => value.getTime(),
    orderable: true,
  },
  id: {
    coerce: (raw) => (typeof raw === 'string' && raw !== '' ? raw : undefined),
    key: (value) => value,
    orderable: false,
  },
  string: {
    coerce: (raw) => (typeof raw === 'string' ? raw : undefined),
    key: (value) => value,
    orderable: true,
  },
};

/**
 * Declared field types each requested extraction kind accepts.
 */
const KIND_ACCEPTS: { readonly [K in ValueKind]: readonly FieldType[] } = {
  boolean: ['boolean'],
  number: ['number'],
  date: ['date', 'datetime'],
  datetime: ['datetime', 'date'],
  id: ['id'],
  string: ['string', 'id'],
};

export function isValueKind(type: FieldType): type is ValueKind {
  return type !== 'reference';
}

export function isOrderable(type: FieldType): boolean {
  return isValueKind(type) && VALUE_KINDS[type].orderable;
}

/**
 * Coerce a raw value to the runtime value of `kind`.
 * Returns undefined when the value does not fit the kind.
 */
export function coerceValue<K extends ValueKind>(kind: K, raw: unknown): ValueOf<K> | undefined {
  return VALUE_KINDS[kind].coerce(raw);
}

/**
 * Canonical comparison key for a raw value, or undefined if it does not fit `kind`.
 */
export function keyOf<K extends ValueKind>(kind: K, raw: unknown): ValueKey | undefined {
  const rule = VALUE_KINDS[kind];
  const value = rule.coerce(raw);
  return value === undefined ? undefined : rule.key(value);
}

/**
 * Canonical key for a value read from a record.
 * A stored value that does not fit its declared kind is a host data error.
 */
export function recordKey(kind: ValueKind, raw: unknown, field: string): ValueKey {
  const key = keyOf(kind, raw);
  if (key === undefined) {
    throw new FieldTypeMismatchError(field, kind, describeValue(raw));
  }
  return key;
}

// Extractors
// ==============================

/**
 * Typed value of a resolved field, coerced by its declared type.
 * Reference fields yield the related record.
 */
export function extractValue(resolved: ResolvedValue, field: string): FieldValue {
  const { value, type } = resolved;
  if (value === null || value === undefined || type === undefined) return null;

  if (!isValueKind(type)) {
    if (!isRecordLike(value)) {
      throw new FieldTypeMismatchError(field, 'reference', describeValue(value));
    }
    return value;
  }

  const coerced = coerceValue(type, value);
  if (coerced === undefined) {
    throw new FieldTypeMismatchError(field, type, describeValue(value));
  }
  return coerced;
}

/**
 * Value of a resolved field as the requested `kind`.
 * The field's declared type must be compatible with `kind`.
 */
export function extractAs<K extends ValueKind>(
  resolved: ResolvedValue,
  kind: K,
  field: string,
): ValueOf<K> | null {
  const { value, type } = resolved;

  if (type !== undefined && !KIND_ACCEPTS[kind].includes(type)) {
    throw new FieldTypeMismatchError(field, kind, `field declared as ${type}`);
  }

  if (value === null || value === undefined) return null;

  const coerced = coerceValue(kind, value);
  if (coerced === undefined) {
    throw new FieldTypeMismatchError(field, kind, describeValue(value));
  }
  return coerced;
}

/**
 * Key a value is grouped under. Dates group by instant; everything else by
 * value (primitives) or identity (records).
 */
export function groupKey(value: FieldValue): unknown {
  return value instanceof Date ? value.getTime() : value;
}
