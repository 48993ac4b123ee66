import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { Knex } from 'knex';
import { SqlExecutor } from '../../../infrastructure/executor/interfaces/sql-executor.interface';
import { MapperPlugin } from '../../../infrastructure/registry/interfaces/mapper-plugin.interface';
import { Dialect } from '../../../infrastructure/sql/dialect';

export interface DataMapperOptions {
  /** Use this knex instance instead of building one from DB_* settings. */
  knex?: Knex;
  /** Use this executor instead of knex altogether. */
  executor?: SqlExecutor;
  dialect?: Dialect;
  plugins?: MapperPlugin[];
  /** Include statement text in query logs. Falls back to MAPPER_LOG_SQL. */
  logSql?: boolean;
  /** Schema for classes whose `@Table` names none. Falls back to DB_SCHEMA. */
  defaultSchema?: string;
}

export interface DataMapperAsyncOptions extends Pick<ModuleMetadata, 'imports'> {
  useFactory: FactoryProvider<DataMapperOptions>['useFactory'];
  inject?: FactoryProvider['inject'];
}
