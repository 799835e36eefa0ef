import type { FieldType, SchemaFieldsConfig } from '../types';

const VALID_TYPES: readonly FieldType[] = [
  'boolean',
  'date',
  'datetime',
  'number',
  'id',
  'string',
  'reference',
];

function isFieldType(value: unknown): value is FieldType {
  return VALID_TYPES.some((type) => type === value);
}

// Implementation
// ==============================

/**
 * Build the field → type map for a schema from its configuration.
 * Field order follows the configuration.
 * @internal
 */
export function buildFieldTypes(
  schemaName: string,
  config: SchemaFieldsConfig,
): Map<string, FieldType> {
  if (schemaName.trim() === '') {
    throw new Error('Invalid schema: name must not be empty');
  }

  const fieldTypes = new Map<string, FieldType>();

  for (const [name, cfg] of Object.entries(config)) {
    if (name.trim() === '' || name.includes('.')) {
      throw new Error(
        `Invalid field name "${name}" on schema ${schemaName}. Names must be non-empty and must not contain "."`,
      );
    }

    const type: unknown = typeof cfg === 'string' ? cfg : cfg?.type;

    // Validate type
    if (!isFieldType(type)) {
      throw new Error(
        `Invalid field type "${String(type)}" for field "${name}". Must be one of: ${VALID_TYPES.join(', ')}`,
      );
    }

    fieldTypes.set(name, type);
  }

  // Validate that at least one field is defined
  if (fieldTypes.size === 0) {
    throw new Error(`Invalid schema ${schemaName}: fields must not be empty`);
  }

  return fieldTypes;
}
