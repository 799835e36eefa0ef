import { UnsupportedComparisonTypeError } from '../errors';
import type {
  Comparator,
  Condition,
  OrderingComparator,
  ResolvedValue,
  ValueKind,
} from '../types';
import { formatFieldRef } from './field-path';
import { describeValue } from './guards';
import { isOrderable, keyOf, recordKey, type ValueKey } from './value-kinds';

const ORDERING: Record<OrderingComparator, (order: number) => boolean> = {
  lessThan: (order) => order < 0,
  lessThanOrEquals: (order) => order <= 0,
  greaterThan: (order) => order > 0,
  greaterThanOrEquals: (order) => order >= 0,
};

/**
 * Evaluate a condition against a value already resolved from a record.
 *
 * Comparison rules:
 * - `equals`/`notEquals`: null equals null; otherwise compared by the
 *   declared type's canonical key (reference fields by identity)
 * - ordering: only for number, date, datetime and string fields; null on
 *   either side never matches
 * - `isIn`/`isNotIn`: every set element must be null, boolean, number,
 *   string or Date; checked here, at evaluation time
 * - `hasValue`: value is not null
 */
export function compareValue(resolved: ResolvedValue, condition: Condition): boolean {
  const field = formatFieldRef(condition.field);

  switch (condition.comparator) {
    case 'hasValue':
      return resolved.value !== null && resolved.value !== undefined;
    case 'equals':
      return valuesEqual(resolved, condition.value, condition.comparator, field);
    case 'notEquals':
      return !valuesEqual(resolved, condition.value, condition.comparator, field);
    case 'isIn':
      return isMember(resolved, condition.values, condition.comparator, field);
    case 'isNotIn':
      return !isMember(resolved, condition.values, condition.comparator, field);
    default:
      return compareOrder(resolved, condition.value, condition.comparator, field);
  }
}

// Utilities
// ==============================

function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Canonical key for a comparison target. A target that does not fit the
 * field's kind is a usage error, not a silent mismatch.
 * @internal
 */
function targetKey(
  kind: ValueKind,
  target: unknown,
  comparator: Comparator,
  field: string,
): ValueKey {
  const key = keyOf(kind, target);
  if (key === undefined) {
    throw new UnsupportedComparisonTypeError(
      comparator,
      `${describeValue(target)} cannot be compared with ${kind} field "${field}"`,
    );
  }
  return key;
}

function valuesEqual(
  resolved: ResolvedValue,
  target: unknown,
  comparator: Comparator,
  field: string,
): boolean {
  const { value, type } = resolved;
  if (isAbsent(value) || isAbsent(target)) {
    return isAbsent(value) && isAbsent(target);
  }
  if (type === undefined) return false;

  if (type === 'reference') return value === target;

  return recordKey(type, value, field) === targetKey(type, target, comparator, field);
}

function compareKeys(left: ValueKey, right: ValueKey): number {
  if (typeof left === 'number' && typeof right === 'number') {
    if (left < right) return -1;
    if (left > right) return 1;
    return 0;
  }
  const leftString = String(left);
  const rightString = String(right);
  if (leftString < rightString) return -1;
  if (leftString > rightString) return 1;
  return 0;
}

function compareOrder(
  resolved: ResolvedValue,
  target: unknown,
  comparator: OrderingComparator,
  field: string,
): boolean {
  const { value, type } = resolved;
  if (type !== undefined && !isOrderable(type)) {
    throw new UnsupportedComparisonTypeError(
      comparator,
      `field "${field}" of type ${type} is not orderable`,
    );
  }

  if (isAbsent(value) || isAbsent(target) || type === undefined || type === 'reference') {
    return false;
  }

  const order = compareKeys(
    recordKey(type, value, field),
    targetKey(type, target, comparator, field),
  );
  return ORDERING[comparator](order);
}

function isSupportedElement(element: unknown): boolean {
  if (element === null) return true;
  if (element instanceof Date) return true;
  const elementType = typeof element;
  return elementType === 'string' || elementType === 'number' || elementType === 'boolean';
}

function isMember(
  resolved: ResolvedValue,
  values: readonly unknown[],
  comparator: 'isIn' | 'isNotIn',
  field: string,
): boolean {
  for (const element of values) {
    if (!isSupportedElement(element)) {
      throw new UnsupportedComparisonTypeError(
        comparator,
        `set element of type ${describeValue(element)} is not supported for field "${field}"`,
      );
    }
  }

  const { value, type } = resolved;
  if (isAbsent(value)) return values.includes(null);
  if (type === undefined) return false;

  if (type === 'reference') {
    throw new UnsupportedComparisonTypeError(comparator, `field "${field}" is a reference`);
  }

  const keys = values
    .filter((element) => element !== null)
    .map((element) => targetKey(type, element, comparator, field));
  return keys.includes(recordKey(type, value, field));
}
