export { createView, RecordView } from './view';

// Predicates
// ==============================
export {
  evaluate,
  FieldsMatch,
  IncompleteFieldsMatch,
  match,
  NotMatch,
  RecordMatch,
  type Predicate,
} from './match';

// Schemas and Records
// ==============================
export { defineSchema, Schema, type SchemaGuard } from './schema';
export { DataRecord } from './record';

// Field Access
// ==============================
export { fieldRef, formatFieldRef, resolveField } from './utils/field-path';
export { compareValue } from './utils/comparators';

// Errors
// ==============================
export {
  FieldNotLoadedError,
  FieldTypeMismatchError,
  SchemaAssignabilityError,
  UnsupportedComparisonTypeError,
} from './errors';

// Types
// ==============================
export type {
  Comparator,
  Condition,
  FieldDefinition,
  FieldInput,
  FieldRef,
  FieldType,
  FieldValue,
  OrderingComparator,
  Projectable,
  RecordLike,
  ResolvedValue,
  Scalar,
  SchemaFieldsConfig,
  SchemaRef,
  SimpleViewConfig,
  ValueKind,
  ValueOf,
  ValueSet,
} from './types';
