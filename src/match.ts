import { FieldNotLoadedError } from './errors';
import type {
  Condition,
  FieldInput,
  FieldRef,
  FieldType,
  RecordLike,
  Scalar,
  ValueSet,
} from './types';
import { compareValue } from './utils/comparators';
import { fieldRef, resolveField } from './utils/field-path';
import { isRecordLike } from './utils/guards';
import { isValueKind, recordKey } from './utils/value-kinds';

/**
 * Anything a view can filter by. Closed set of variants, evaluated by `evaluate`.
 */
export type Predicate = FieldsMatch | RecordMatch | NotMatch;

/**
 * Entry point for the predicate DSL.
 *
 * @example
 * match.field('Name').equals('Acme')
 *   .also('AnnualRevenue').greaterThan(1000)
 *   .also('Parent.Industry').isIn(['Energy', 'Mining'])
 */
export const match = {
  /** Start a field-condition conjunction on the given field. */
  field(field: FieldInput): IncompleteFieldsMatch {
    return new IncompleteFieldsMatch([], fieldRef(field));
  },

  /** Match records whose values equal every populated field of `prototype`. */
  record(prototype: RecordLike): RecordMatch {
    if (prototype.populatedFields().length === 0) {
      // eslint-disable-next-line no-console
      console.warn(
        `Record match built from a ${prototype.schema.name} prototype with no populated fields. It will match every record.`,
      );
    }
    return new RecordMatch(prototype);
  },

  /** Negate a predicate. */
  not(predicate: Predicate): NotMatch {
    return new NotMatch(predicate);
  },
};

/**
 * Evaluate a predicate against a record.
 */
export function evaluate(predicate: Predicate, record: RecordLike): boolean {
  switch (predicate.kind) {
    case 'fields':
      return predicate.conditions.every((condition) =>
        compareValue(resolveField(record, condition.field), condition),
      );
    case 'record':
      return prototypeMatches(predicate.prototype, record);
    case 'not':
      return !evaluate(predicate.predicate, record);
    default: {
      const unreachable: never = predicate;
      throw new Error(`Unknown predicate: ${String(unreachable)}`);
    }
  }
}

// Field Conditions
// ==============================

/**
 * Builder step that holds a pending field and awaits its comparator.
 * Cannot be evaluated; supplying a comparator returns a `FieldsMatch`.
 */
export class IncompleteFieldsMatch {
  constructor(
    private readonly conditions: readonly Condition[],
    private readonly pending: FieldRef,
  ) {}

  equals(value: Scalar | RecordLike): FieldsMatch {
    return this.complete({ field: this.pending, comparator: 'equals', value });
  }

  notEquals(value: Scalar | RecordLike): FieldsMatch {
    return this.complete({ field: this.pending, comparator: 'notEquals', value });
  }

  lessThan(value: Scalar): FieldsMatch {
    return this.complete({ field: this.pending, comparator: 'lessThan', value });
  }

  lessThanOrEquals(value: Scalar): FieldsMatch {
    return this.complete({ field: this.pending, comparator: 'lessThanOrEquals', value });
  }

  greaterThan(value: Scalar): FieldsMatch {
    return this.complete({ field: this.pending, comparator: 'greaterThan', value });
  }

  greaterThanOrEquals(value: Scalar): FieldsMatch {
    return this.complete({ field: this.pending, comparator: 'greaterThanOrEquals', value });
  }

  /**
   * Field value is one of `values`. Elements must be null, boolean, number,
   * string or Date; anything else fails when the match is evaluated.
   */
  isIn(values: ValueSet): FieldsMatch {
    return this.complete({ field: this.pending, comparator: 'isIn', values: [...values] });
  }

  isNotIn(values: ValueSet): FieldsMatch {
    return this.complete({ field: this.pending, comparator: 'isNotIn', values: [...values] });
  }

  hasValue(): FieldsMatch {
    return this.complete({ field: this.pending, comparator: 'hasValue' });
  }

  // Aliases
  // ==============================

  eq(value: Scalar | RecordLike): FieldsMatch {
    return this.equals(value);
  }

  ne(value: Scalar | RecordLike): FieldsMatch {
    return this.notEquals(value);
  }

  lt(value: Scalar): FieldsMatch {
    return this.lessThan(value);
  }

  le(value: Scalar): FieldsMatch {
    return this.lessThanOrEquals(value);
  }

  gt(value: Scalar): FieldsMatch {
    return this.greaterThan(value);
  }

  ge(value: Scalar): FieldsMatch {
    return this.greaterThanOrEquals(value);
  }

  notIn(values: ValueSet): FieldsMatch {
    return this.isNotIn(values);
  }

  private complete(condition: Condition): FieldsMatch {
    return new FieldsMatch([...this.conditions, condition]);
  }
}

/**
 * Ordered conjunction of field conditions. Immutable: `also` returns a new
 * builder step and leaves this match untouched.
 */
export class FieldsMatch {
  readonly kind = 'fields';

  readonly conditions: readonly Condition[];

  constructor(conditions: readonly Condition[]) {
    if (conditions.length === 0) {
      throw new Error('A field match needs at least one condition');
    }
    this.conditions = Object.freeze([...conditions]);
  }

  /** Add a condition on another field (AND). */
  also(field: FieldInput): IncompleteFieldsMatch {
    return new IncompleteFieldsMatch(this.conditions, fieldRef(field));
  }

  /** Alias for `also`. */
  field(field: FieldInput): IncompleteFieldsMatch {
    return this.also(field);
  }

  matches(record: RecordLike): boolean {
    return evaluate(this, record);
  }
}

// Prototype Match
// ==============================

/**
 * Matches records that agree with a prototype on every field populated on
 * the prototype. Unpopulated prototype fields impose no constraint.
 */
export class RecordMatch {
  readonly kind = 'record';

  constructor(readonly prototype: RecordLike) {}

  matches(record: RecordLike): boolean {
    return evaluate(this, record);
  }
}

export class NotMatch {
  readonly kind = 'not';

  constructor(readonly predicate: Predicate) {}

  matches(record: RecordLike): boolean {
    return evaluate(this, record);
  }
}

function prototypeMatches(prototype: RecordLike, record: RecordLike): boolean {
  for (const field of prototype.populatedFields()) {
    if (!record.isLoaded(field)) {
      throw new FieldNotLoadedError(record.schema.name, field);
    }
    const type = prototype.schema.typeOf(field);
    if (!fieldValuesEqual(type, prototype.get(field), record.get(field), field)) {
      return false;
    }
  }
  return true;
}

function fieldValuesEqual(
  type: FieldType | undefined,
  expected: unknown,
  actual: unknown,
  field: string,
): boolean {
  const expectedAbsent = expected === null || expected === undefined;
  const actualAbsent = actual === null || actual === undefined;
  if (expectedAbsent || actualAbsent) return expectedAbsent && actualAbsent;

  if (type === undefined) return expected === actual;

  if (!isValueKind(type)) {
    // Related records match by the same rule, applied to the related prototype
    return isRecordLike(expected) && isRecordLike(actual) && prototypeMatches(expected, actual);
  }

  return recordKey(type, expected, field) === recordKey(type, actual, field);
}
