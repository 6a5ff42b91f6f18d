/**
 * Field-schema validation for records read from data files.
 * Collects every field error rather than stopping at the first one.
 */

export type FieldType = 'string' | 'number' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  /** Reject empty strings and empty arrays. */
  nonEmpty?: boolean;
  /** Element type for arrays. */
  items?: 'string';
}

export type RecordSchema = Record<string, FieldSchema>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateFields(
  record: Record<string, unknown>,
  schema: RecordSchema
): string[] {
  const errors: string[] = [];

  for (const [field, fieldSchema] of Object.entries(schema)) {
    const value = record[field];

    if (value === undefined || value === null) {
      if (fieldSchema.required) errors.push(`${field} is required`);
      continue;
    }

    const typeError = checkType(field, value, fieldSchema);
    if (typeError) {
      errors.push(typeError);
      continue;
    }

    errors.push(...checkConstraints(field, value, fieldSchema));
  }

  return errors;
}

function checkType(
  field: string,
  value: unknown,
  schema: FieldSchema
): string | null {
  switch (schema.type) {
    case 'string':
      if (typeof value !== 'string') return `${field} must be a string`;
      break;
    case 'number':
      if (typeof value !== 'number' || Number.isNaN(value))
        return `${field} must be a number`;
      break;
    case 'array':
      if (!Array.isArray(value)) return `${field} must be an array`;
      break;
    case 'object':
      if (!isRecord(value)) return `${field} must be an object`;
      break;
  }
  return null;
}

function checkConstraints(
  field: string,
  value: unknown,
  schema: FieldSchema
): string[] {
  const errors: string[] = [];

  if (typeof value === 'string' && schema.nonEmpty && value.trim() === '') {
    errors.push(`${field} must not be empty`);
  }

  if (Array.isArray(value)) {
    if (schema.nonEmpty && value.length === 0) {
      errors.push(`${field} must not be empty`);
    }
    if (schema.items === 'string' && value.some((v) => typeof v !== 'string')) {
      errors.push(`${field} must contain only strings`);
    }
  }

  return errors;
}
