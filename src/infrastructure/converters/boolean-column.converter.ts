import { MappingException } from '../../core/exceptions/custom-exceptions';
import { FieldMetadata } from '../../core/metadata/field-metadata';
import { TypeConverter } from '../registry/interfaces/type-converter.interface';

const TRUE_TEXT = new Set(['1', 'true', 't', 'y', 'yes']);
const FALSE_TEXT = new Set(['0', 'false', 'f', 'n', 'no']);

/** For databases without a boolean type: stores 1/0. */
export class BooleanColumnConverter implements TypeConverter<void> {
  toDatabase(value: unknown, field: FieldMetadata): unknown {
    return toBoolean(value, field) ? 1 : 0;
  }

  fromDatabase(value: unknown, field: FieldMetadata): unknown {
    return toBoolean(value, field);
  }
}

export class NativeBooleanConverter implements TypeConverter<void> {
  toDatabase(value: unknown, field: FieldMetadata): unknown {
    return toBoolean(value, field);
  }

  fromDatabase(value: unknown, field: FieldMetadata): unknown {
    return toBoolean(value, field);
  }
}

function toBoolean(value: unknown, field: FieldMetadata): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return Number(value) !== 0;
  if (typeof value === 'string') {
    const text = value.trim().toLowerCase();
    if (TRUE_TEXT.has(text)) return true;
    if (FALSE_TEXT.has(text)) return false;
  }
  throw new MappingException(field.fieldName, 'boolean', value);
}
