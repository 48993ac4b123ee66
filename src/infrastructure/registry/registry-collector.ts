import { TagType } from '../../core/metadata/tags/tag-type';
import { Dialect } from '../sql/dialect';
import { SqlGenerator } from '../sql/interfaces/sql-generator.interface';
import { FieldValidator } from './interfaces/field-validator.interface';
import { TypeConverter } from './interfaces/type-converter.interface';
import { ValueGenerator } from './interfaces/value-generator.interface';
import { SqlGeneratorRegistry } from './sql-generator.registry';
import { TypeConverterRegistry } from './type-converter.registry';
import { ValidatorRegistry } from './validator.registry';
import { ValueGeneratorRegistry } from './value-generator.registry';

/** The four registries handed to plugins while the mapper is being built. */
export class RegistryCollector {
  constructor(
    readonly converters: TypeConverterRegistry = TypeConverterRegistry.withDefaults(),
    readonly validators: ValidatorRegistry = ValidatorRegistry.withDefaults(),
    readonly generators: ValueGeneratorRegistry = ValueGeneratorRegistry.withDefaults(),
    readonly sqlGenerators: SqlGeneratorRegistry = SqlGeneratorRegistry.withDefaults(),
  ) {}

  registerConverter<TOptions>(tagType: TagType<TOptions>, converter: TypeConverter<TOptions>, dialect?: Dialect): this {
    this.converters.register(tagType, converter, dialect);
    return this;
  }

  registerValidator<TOptions>(tagType: TagType<TOptions>, validator: FieldValidator<TOptions>): this {
    this.validators.register(tagType, validator);
    return this;
  }

  registerGenerator(name: string, generator: ValueGenerator | ValueGenerator['generate']): this {
    this.generators.register(name, generator);
    return this;
  }

  registerSqlGenerator(dialect: Dialect, generator: SqlGenerator): this {
    this.sqlGenerators.register(dialect, generator);
    return this;
  }
}
