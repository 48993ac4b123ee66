import { FieldMetadata } from '../../core/metadata/field-metadata';
import { TagType } from '../../core/metadata/tags/tag-type';
import { BooleanColumnTag, EnumColumnTag, JsonTag } from '../../shared/decorators/converter.decorators';
import { BooleanColumnConverter, NativeBooleanConverter } from '../converters/boolean-column.converter';
import { EnumColumnConverter } from '../converters/enum-column.converter';
import { JsonConverter } from '../converters/json.converter';
import { Dialect } from '../sql/dialect';
import { TypeConverter } from './interfaces/type-converter.interface';

export interface BoundConverter {
  converter: TypeConverter;
  options: unknown;
}

export class TypeConverterRegistry {
  private readonly generic = new Map<TagType<unknown>, TypeConverter>();
  private readonly byDialect = new Map<Dialect, Map<TagType<unknown>, TypeConverter>>();

  static withDefaults(): TypeConverterRegistry {
    return new TypeConverterRegistry()
      .register(JsonTag, new JsonConverter())
      .register(EnumColumnTag, new EnumColumnConverter())
      .register(BooleanColumnTag, new BooleanColumnConverter())
      .register(BooleanColumnTag, new NativeBooleanConverter(), Dialect.POSTGRES);
  }

  /** Registers for every dialect, or only for `dialect` when given. */
  register<TOptions>(tagType: TagType<TOptions>, converter: TypeConverter<TOptions>, dialect?: Dialect): this {
    if (!dialect) {
      this.generic.set(tagType, converter);
      return this;
    }
    const scoped = this.byDialect.get(dialect) ?? new Map<TagType<unknown>, TypeConverter>();
    scoped.set(tagType, converter);
    this.byDialect.set(dialect, scoped);
    return this;
  }

  /** Dialect-specific entry first, then the generic one. */
  find(tagType: TagType<unknown>, dialect?: Dialect): TypeConverter | undefined {
    return (dialect && this.byDialect.get(dialect)?.get(tagType)) || this.generic.get(tagType);
  }

  has(tagType: TagType<unknown>, dialect?: Dialect): boolean {
    return this.find(tagType, dialect) !== undefined;
  }

  /** Converters applying to a field, in tag order. */
  convertersFor(field: FieldMetadata, dialect?: Dialect): BoundConverter[] {
    const bound: BoundConverter[] = [];
    for (const tag of field.tags) {
      const converter = this.find(tag.type, dialect);
      if (converter) {
        bound.push({ converter, options: tag.options });
      }
    }
    return bound;
  }
}
