import { Logger } from '@nestjs/common';
import { Knex } from 'knex';
import { ConfigurationException } from '../../core/exceptions/custom-exceptions';
import { QueryLogger } from '../../core/exceptions/services/query-logger.service';
import { DecoratorIntrospector } from '../../core/metadata/decorator-introspector';
import { MetadataCache } from '../../core/metadata/metadata-cache';
import { TagType } from '../../core/metadata/tags/tag-type';
import { SqlExecutor } from '../../infrastructure/executor/interfaces/sql-executor.interface';
import { KnexSqlExecutor } from '../../infrastructure/knex/knex-sql-executor';
import { FieldValidator } from '../../infrastructure/registry/interfaces/field-validator.interface';
import { MapperPlugin } from '../../infrastructure/registry/interfaces/mapper-plugin.interface';
import { TypeConverter } from '../../infrastructure/registry/interfaces/type-converter.interface';
import { ValueGenerator } from '../../infrastructure/registry/interfaces/value-generator.interface';
import { RegistryCollector } from '../../infrastructure/registry/registry-collector';
import { Dialect } from '../../infrastructure/sql/dialect';
import { SqlGenerator } from '../../infrastructure/sql/interfaces/sql-generator.interface';
import { DataMapper } from './data-mapper';
import { DataMapperOptions } from './interfaces/data-mapper-options.interface';

type Registration = (registries: RegistryCollector) => void;

/**
 * Collects configuration and checks it once, in {@link build}.
 * Plugins are installed in order; direct registrations are applied after
 * every plugin, so they override plugin entries for the same key.
 */
export class DataMapperBuilder {
  private readonly logger = new Logger(DataMapperBuilder.name);
  private knex?: Knex;
  private executor?: SqlExecutor;
  private dialect?: Dialect;
  private logSql = false;
  private defaultSchema?: string;
  private introspector?: DecoratorIntrospector;
  private readonly plugins: MapperPlugin[] = [];
  private readonly registrations: Registration[] = [];

  withKnex(knex: Knex): this {
    this.knex = knex;
    return this;
  }

  withExecutor(executor: SqlExecutor): this {
    this.executor = executor;
    return this;
  }

  withDialect(dialect: Dialect): this {
    this.dialect = dialect;
    return this;
  }

  withLogSql(logSql: boolean): this {
    this.logSql = logSql;
    return this;
  }

  withDefaultSchema(schema: string | undefined): this {
    this.defaultSchema = schema;
    return this;
  }

  withIntrospector(introspector: DecoratorIntrospector): this {
    this.introspector = introspector;
    return this;
  }

  withOptions(options: DataMapperOptions): this {
    if (options.knex) this.withKnex(options.knex);
    if (options.executor) this.withExecutor(options.executor);
    if (options.dialect) this.withDialect(options.dialect);
    if (options.logSql !== undefined) this.withLogSql(options.logSql);
    if (options.defaultSchema !== undefined) this.withDefaultSchema(options.defaultSchema);
    for (const plugin of options.plugins ?? []) {
      this.installPlugin(plugin);
    }
    return this;
  }

  installPlugin(plugin: MapperPlugin): this {
    this.plugins.push(plugin);
    return this;
  }

  registerConverter<TOptions>(tagType: TagType<TOptions>, converter: TypeConverter<TOptions>, dialect?: Dialect): this {
    this.registrations.push((registries) => registries.registerConverter(tagType, converter, dialect));
    return this;
  }

  registerValidator<TOptions>(tagType: TagType<TOptions>, validator: FieldValidator<TOptions>): this {
    this.registrations.push((registries) => registries.registerValidator(tagType, validator));
    return this;
  }

  registerGenerator(name: string, generator: ValueGenerator | ValueGenerator['generate']): this {
    this.registrations.push((registries) => registries.registerGenerator(name, generator));
    return this;
  }

  registerSqlGenerator(dialect: Dialect, generator: SqlGenerator): this {
    this.registrations.push((registries) => registries.registerSqlGenerator(dialect, generator));
    return this;
  }

  build(): DataMapper {
    const executor = this.resolveExecutor();
    const dialect = this.dialect ?? Dialect.fromClient(executor.client);
    const registries = new RegistryCollector();

    const installed = new Set<string>();
    for (const plugin of this.plugins) {
      if (installed.has(plugin.name)) {
        throw new ConfigurationException(`Plugin '${plugin.name}' is installed twice`, 'plugins');
      }
      installed.add(plugin.name);
      plugin.configure(registries);
      this.logger.log(`Installed plugin ${plugin.name}`);
    }
    for (const register of this.registrations) {
      register(registries);
    }

    return new DataMapper({
      executor,
      dialect,
      registries,
      metadataCache: new MetadataCache(this.introspector, { defaultSchema: this.defaultSchema }),
      queryLogger: new QueryLogger(this.logSql),
    });
  }

  private resolveExecutor(): SqlExecutor {
    if (this.knex && this.executor) {
      throw new ConfigurationException('Configure either a knex instance or an executor, not both', 'executor');
    }
    if (this.executor) {
      return this.executor;
    }
    if (this.knex) {
      return new KnexSqlExecutor(this.knex);
    }
    throw new ConfigurationException('A knex instance or an executor is required', 'executor');
  }
}
