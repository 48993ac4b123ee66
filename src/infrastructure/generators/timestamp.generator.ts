import { FieldMetadata } from '../../core/metadata/field-metadata';
import { ValueGenerator } from '../registry/interfaces/value-generator.interface';

/** Current time in the shape of the field: Date, epoch millis, bigint millis or ISO text. */
export class TimestampGenerator implements ValueGenerator {
  generate(_entity: object, field: FieldMetadata): unknown {
    const now = new Date();
    switch (field.valueType) {
      case 'date':
      case 'unknown':
        return now;
      case 'number':
        return now.getTime();
      case 'bigint':
        return BigInt(now.getTime());
      case 'string':
        return now.toISOString();
      default:
        throw new Error(`timestamp generator does not support ${field.valueType} fields`);
    }
  }
}
