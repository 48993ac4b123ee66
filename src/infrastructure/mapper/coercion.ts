import { MappingException } from '../../core/exceptions/custom-exceptions';
import { FieldMetadata } from '../../core/metadata/field-metadata';
import { isAbsent } from '../../core/metadata/value-type';

/**
 * Brings a converted column value into the field's value type. Drivers return
 * numeric and bigint columns as text and booleans as 0/1, so those forms are
 * accepted; anything that cannot represent the type raises MappingException.
 */
export function coerceToField(value: unknown, field: FieldMetadata): unknown {
  if (isAbsent(value)) {
    return null;
  }

  switch (field.valueType) {
    case 'string':
      return coerceString(value, field);
    case 'number':
      return coerceNumber(value, field);
    case 'boolean':
      return coerceBoolean(value, field);
    case 'date':
      return coerceDate(value, field);
    case 'bigint':
      return coerceBigInt(value, field);
    case 'json':
      if (typeof value === 'function' || typeof value === 'symbol') {
        throw new MappingException(field.fieldName, 'json', value);
      }
      return value;
    default:
      return value;
  }
}

function coerceString(value: unknown, field: FieldMetadata): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value);
  if (value instanceof Date && !Number.isNaN(value.getTime())) return value.toISOString();
  throw new MappingException(field.fieldName, 'string', value);
}

function coerceNumber(value: unknown, field: FieldMetadata): number {
  if (typeof value === 'number') {
    if (Number.isNaN(value)) throw new MappingException(field.fieldName, 'number', value, 'value is NaN');
    return value;
  }
  if (typeof value === 'bigint') {
    const num = Number(value);
    if (!Number.isSafeInteger(num)) {
      throw new MappingException(field.fieldName, 'number', value, 'outside the safe integer range');
    }
    return num;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const num = Number(value);
    if (!Number.isNaN(num)) return num;
  }
  throw new MappingException(field.fieldName, 'number', value);
}

function coerceBoolean(value: unknown, field: FieldMetadata): boolean {
  if (typeof value === 'boolean') return value;
  if (value === 0 || value === 1) return value === 1;
  if (typeof value === 'string') {
    const text = value.trim().toLowerCase();
    if (text === 'true' || text === 't' || text === '1') return true;
    if (text === 'false' || text === 'f' || text === '0') return false;
  }
  throw new MappingException(field.fieldName, 'boolean', value);
}

function coerceDate(value: unknown, field: FieldMetadata): Date {
  const date =
    value instanceof Date ? value : typeof value === 'string' || typeof value === 'number' ? new Date(value) : null;
  if (date === null || value === '' || Number.isNaN(date.getTime())) {
    throw new MappingException(field.fieldName, 'date', value);
  }
  return date;
}

function coerceBigInt(value: unknown, field: FieldMetadata): bigint {
  if (typeof value === 'bigint') return value;
  if ((typeof value === 'number' && Number.isInteger(value)) || (typeof value === 'string' && /^-?\d+$/.test(value.trim()))) {
    return BigInt(typeof value === 'string' ? value.trim() : value);
  }
  throw new MappingException(field.fieldName, 'bigint', value);
}
