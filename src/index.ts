import 'reflect-metadata';

export * from './core/exceptions/custom-exceptions';
export { QueryLogger } from './core/exceptions/services/query-logger.service';
export { TagType, TagInstance, isTagOf, resolveTags } from './core/metadata/tags/tag-type';
export { tagClass, tagProperty } from './core/metadata/tags/tag-storage';
export { ValueType } from './core/metadata/value-type';
export { FieldMetadata } from './core/metadata/field-metadata';
export { EntityMetadata, EntityType } from './core/metadata/entity-metadata';
export { DecoratorIntrospector } from './core/metadata/decorator-introspector';
export { MetadataCache, MetadataCacheOptions } from './core/metadata/metadata-cache';

export * from './shared/decorators/table.decorator';
export * from './shared/decorators/query-only.decorator';
export * from './shared/decorators/column.decorator';
export * from './shared/decorators/id.decorator';
export * from './shared/decorators/transient.decorator';
export * from './shared/decorators/default-value.decorator';
export * from './shared/decorators/generated.decorator';
export * from './shared/decorators/validation.decorators';
export * from './shared/decorators/converter.decorators';
export { PageResult } from './shared/types/page-result';
export { DEFAULT_GENERATORS, PAGINATION_PARAMS } from './shared/utils/constant';

export * from './infrastructure/executor/interfaces/sql-executor.interface';
export { KnexSqlExecutor, KnexSqlHandle } from './infrastructure/knex/knex-sql-executor';
export { DatabaseSettings, DatabaseType, buildKnexConfig, createKnex, readDatabaseSettings } from './infrastructure/knex/knex.factory';
export { Dialect } from './infrastructure/sql/dialect';
export { SqlGenerator } from './infrastructure/sql/interfaces/sql-generator.interface';
export { AnsiSqlGenerator } from './infrastructure/sql/generators/ansi-sql.generator';
export { PostgresSqlGenerator } from './infrastructure/sql/generators/postgres-sql.generator';
export { MySqlSqlGenerator } from './infrastructure/sql/generators/mysql-sql.generator';
export { SqliteSqlGenerator } from './infrastructure/sql/generators/sqlite-sql.generator';
export { MsSqlSqlGenerator } from './infrastructure/sql/generators/mssql-sql.generator';
export { TypeConverter } from './infrastructure/registry/interfaces/type-converter.interface';
export { FieldValidator } from './infrastructure/registry/interfaces/field-validator.interface';
export {
  GenerationContext,
  ValueGenerator,
  WriteOperation,
} from './infrastructure/registry/interfaces/value-generator.interface';
export { MapperPlugin } from './infrastructure/registry/interfaces/mapper-plugin.interface';
export { TypeConverterRegistry } from './infrastructure/registry/type-converter.registry';
export { ValidatorRegistry } from './infrastructure/registry/validator.registry';
export { ValueGeneratorRegistry } from './infrastructure/registry/value-generator.registry';
export { SqlGeneratorRegistry } from './infrastructure/registry/sql-generator.registry';
export { RegistryCollector } from './infrastructure/registry/registry-collector';
export { RowMapper } from './infrastructure/mapper/row-mapper';

export { DataMapper, DataMapperConfig } from './modules/data-mapper/data-mapper';
export { DataMapperBuilder } from './modules/data-mapper/data-mapper.builder';
export { DataMapperModule } from './modules/data-mapper/data-mapper.module';
export { DataMapperService } from './modules/data-mapper/services/data-mapper.service';
export { EntityRepository } from './modules/data-mapper/repositories/entity.repository';
export {
  DataMapperAsyncOptions,
  DataMapperOptions,
} from './modules/data-mapper/interfaces/data-mapper-options.interface';
