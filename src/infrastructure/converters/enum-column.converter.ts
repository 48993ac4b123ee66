import { MappingException } from '../../core/exceptions/custom-exceptions';
import { FieldMetadata } from '../../core/metadata/field-metadata';
import { EnumColumnOptions } from '../../shared/decorators/converter.decorators';
import { TypeConverter } from '../registry/interfaces/type-converter.interface';

export class EnumColumnConverter implements TypeConverter<EnumColumnOptions> {
  toDatabase(value: unknown, field: FieldMetadata, options: EnumColumnOptions): unknown {
    const index = typeof value === 'string' ? options.values.indexOf(value) : -1;
    if (index < 0) {
      throw new MappingException(field.fieldName, this.describe(options), value, 'not a member');
    }
    return options.storage === 'ordinal' ? index : value;
  }

  fromDatabase(value: unknown, field: FieldMetadata, options: EnumColumnOptions): unknown {
    const member =
      options.storage === 'ordinal'
        ? options.values[Number(value)]
        : options.values.find((candidate) => candidate === String(value));
    if (member === undefined) {
      throw new MappingException(field.fieldName, this.describe(options), value, 'not a member');
    }
    return member;
  }

  private describe(options: EnumColumnOptions): string {
    return `enum(${options.values.join('|')})`;
  }
}
