import { describe, it, expect } from 'vitest';
import {
  FieldNotLoadedError,
  FieldTypeMismatchError,
  SchemaAssignabilityError,
  UnsupportedComparisonTypeError,
} from '../src';

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

describe('FieldNotLoadedError', () => {
  it('names the field and schema', () => {
    const error = new FieldNotLoadedError('Account', 'Industry');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(FieldNotLoadedError);
    expect(error.name).toBe('FieldNotLoadedError');
    expect(error.message).toBe('Field "Industry" is not loaded on Account');
    expect(error.path).toBeUndefined();
  });

  it('mentions the path being resolved when it differs from the field', () => {
    expect(new FieldNotLoadedError('Account', 'Parent', 'Parent.Name').message).toBe(
      'Field "Parent" is not loaded on Account (resolving "Parent.Name")',
    );
    expect(new FieldNotLoadedError('Account', 'Name', 'Name').message).toBe(
      'Field "Name" is not loaded on Account',
    );
  });
});

describe('UnsupportedComparisonTypeError', () => {
  it('carries the comparator and detail', () => {
    const error = new UnsupportedComparisonTypeError('isIn', 'field "Parent" is a reference');

    expect(error).toBeInstanceOf(UnsupportedComparisonTypeError);
    expect(error.name).toBe('UnsupportedComparisonTypeError');
    expect(error.comparator).toBe('isIn');
    expect(error.message).toBe('Unsupported isIn comparison: field "Parent" is a reference');
  });
});

describe('SchemaAssignabilityError', () => {
  it('builds a default message from the schema names', () => {
    const error = new SchemaAssignabilityError('Account', 'Contact');

    expect(error).toBeInstanceOf(SchemaAssignabilityError);
    expect(error.name).toBe('SchemaAssignabilityError');
    expect(error.expected).toBe('Account');
    expect(error.actual).toBe('Contact');
    expect(error.message).toBe('Record of schema Contact is not assignable to Account');
  });

  it('accepts a custom message', () => {
    expect(new SchemaAssignabilityError('Account', 'Contact', 'wrong schema').message).toBe('wrong schema');
  });
});

describe('FieldTypeMismatchError', () => {
  it('describes the expected and actual types', () => {
    const error = new FieldTypeMismatchError('AnnualRevenue', 'number', 'string');

    expect(error).toBeInstanceOf(FieldTypeMismatchError);
    expect(error.name).toBe('FieldTypeMismatchError');
    expect(error.field).toBe('AnnualRevenue');
    expect(error.message).toBe('Field "AnnualRevenue" expected number, got string');
  });
});
