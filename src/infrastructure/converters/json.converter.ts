import { MappingException } from '../../core/exceptions/custom-exceptions';
import { FieldMetadata } from '../../core/metadata/field-metadata';
import { TypeConverter } from '../registry/interfaces/type-converter.interface';

/**
 * Serializes on write. On read, text is parsed and anything else is passed
 * through, since drivers such as pg already decode json/jsonb columns.
 */
export class JsonConverter implements TypeConverter<void> {
  toDatabase(value: unknown): unknown {
    return JSON.stringify(value);
  }

  fromDatabase(value: unknown, field: FieldMetadata): unknown {
    if (typeof value !== 'string') {
      return value;
    }
    try {
      return JSON.parse(value);
    } catch (error) {
      throw new MappingException(field.fieldName, 'json', value, error instanceof Error ? error.message : String(error));
    }
  }
}
