import { Logger } from '@nestjs/common';
import {
  BatchItemValidationFailure,
  BatchValidationException,
  InvalidPageRequestException,
  MappingException,
  MetadataException,
  MissingIdException,
  QueryOnlyEntityException,
  ValidationException,
} from '../../core/exceptions/custom-exceptions';
import { QueryLogger } from '../../core/exceptions/services/query-logger.service';
import { EntityMetadata, EntityType } from '../../core/metadata/entity-metadata';
import { FieldMetadata } from '../../core/metadata/field-metadata';
import { MetadataCache } from '../../core/metadata/metadata-cache';
import { isAbsent } from '../../core/metadata/value-type';
import {
  ResultSet,
  Row,
  SqlExecutor,
  SqlHandle,
  SqlParams,
} from '../../infrastructure/executor/interfaces/sql-executor.interface';
import { ParameterBinder } from '../../infrastructure/mapper/parameter-binder';
import { RowMapper, readColumnValue } from '../../infrastructure/mapper/row-mapper';
import { ValidationStage } from '../../infrastructure/pipeline/validation.stage';
import { ValueGenerationStage } from '../../infrastructure/pipeline/value-generation.stage';
import { RegistryCollector } from '../../infrastructure/registry/registry-collector';
import { Dialect } from '../../infrastructure/sql/dialect';
import { SqlGenerator } from '../../infrastructure/sql/interfaces/sql-generator.interface';
import { PageResult } from '../../shared/types/page-result';
import { PAGINATION_PARAMS } from '../../shared/utils/constant';
import { DataMapperBuilder } from './data-mapper.builder';
import { EntityRepository } from './repositories/entity.repository';

export interface DataMapperConfig {
  executor: SqlExecutor;
  dialect: Dialect;
  registries: RegistryCollector;
  metadataCache: MetadataCache;
  queryLogger: QueryLogger;
}

interface PreparedWrite {
  metadata: EntityMetadata;
  sql: string;
  params: SqlParams;
}

/**
 * Maps decorated classes onto tables and runs their CRUD statements through
 * an external {@link SqlExecutor}.
 *
 * Every write is prepared in full (value generation, validation, SQL, binding)
 * before any statement runs. Batch operations prepare every item first and
 * then execute inside one transaction, so a validation failure on any item
 * means nothing is executed.
 */
export class DataMapper {
  private readonly logger = new Logger(DataMapper.name);
  private readonly executor: SqlExecutor;
  private readonly registries: RegistryCollector;
  private readonly metadataCache: MetadataCache;
  private readonly queryLogger: QueryLogger;
  private readonly sqlGenerator: SqlGenerator;
  private readonly binder: ParameterBinder;
  private readonly valueGeneration: ValueGenerationStage;
  private readonly validation: ValidationStage;
  private readonly rowMappers = new Map<Function, RowMapper<object>>();

  readonly dialect: Dialect;

  constructor(config: DataMapperConfig) {
    this.executor = config.executor;
    this.dialect = config.dialect;
    this.registries = config.registries;
    this.metadataCache = config.metadataCache;
    this.queryLogger = config.queryLogger;
    this.sqlGenerator = config.registries.sqlGenerators.resolve(config.dialect);
    this.binder = new ParameterBinder(config.registries.converters, config.dialect);
    this.valueGeneration = new ValueGenerationStage(config.registries.generators);
    this.validation = new ValidationStage(config.registries.validators);
    this.logger.log(`Data mapper ready (dialect ${this.dialect.name})`);
  }

  static builder(): DataMapperBuilder {
    return new DataMapperBuilder();
  }

  // ---- writes ------------------------------------------------------------

  async insert<T extends object>(entity: T): Promise<T> {
    const prepared = this.prepareInsert(entity);
    await this.executor.withHandle((handle) => this.runInsert(handle, entity, prepared));
    return entity;
  }

  async insertAll<T extends object>(entities: readonly T[]): Promise<T[]> {
    const prepared = this.prepareBatch(entities, (entity) => this.prepareInsert(entity));
    if (prepared.length > 0) {
      await this.executor.inTransaction(async (handle) => {
        for (const [index, entity] of entities.entries()) {
          await this.runInsert(handle, entity, prepared[index]);
        }
      });
    }
    return [...entities];
  }

  /** Resolves to the number of rows the UPDATE touched. */
  async update<T extends object>(entity: T): Promise<number> {
    const prepared = this.prepareUpdate(entity);
    return this.executor.withHandle((handle) => this.track(handle, 'update', prepared));
  }

  async updateAll<T extends object>(entities: readonly T[]): Promise<number> {
    const prepared = this.prepareBatch(entities, (entity) => this.prepareUpdate(entity));
    return this.runBatch('update', prepared);
  }

  /** Inserts when the id is absent (or the class has no id field), updates otherwise. */
  async save<T extends object>(entity: T): Promise<T> {
    const metadata = this.metadataCache.getMetadata(entity.constructor);
    const id = metadata.idField;
    if (!id || isAbsent(id.getValue(entity))) {
      return this.insert(entity);
    }
    await this.update(entity);
    return entity;
  }

  async delete<T extends object>(entity: T): Promise<number> {
    const prepared = this.prepareDelete(entity);
    return this.executor.withHandle((handle) => this.track(handle, 'delete', prepared));
  }

  async deleteAll<T extends object>(entities: readonly T[]): Promise<number> {
    return this.runBatch(
      'delete',
      entities.map((entity) => this.prepareDelete(entity)),
    );
  }

  async deleteById(type: EntityType, id: unknown): Promise<number> {
    const prepared = this.prepareDeleteById(type, id);
    return this.executor.withHandle((handle) => this.track(handle, 'delete', prepared));
  }

  async deleteByIds(type: EntityType, ids: readonly unknown[]): Promise<number> {
    return this.runBatch(
      'delete',
      ids.map((id) => this.prepareDeleteById(type, id)),
    );
  }

  // ---- reads -------------------------------------------------------------

  /** Without a limit every row is returned; `offset` defaults to 0. */
  async findAll<T extends object>(type: EntityType<T>, limit?: number, offset = 0): Promise<T[]> {
    const metadata = this.getMetadata(type);
    const select = this.sqlGenerator.generateSelect(metadata);
    if (limit === undefined) {
      return this.query(type, select);
    }
    if (!Number.isInteger(limit) || !Number.isInteger(offset) || limit < 0 || offset < 0) {
      throw new InvalidPageRequestException('limit and offset must be non-negative integers', { limit, offset });
    }
    return this.query(type, this.sqlGenerator.generatePaginated(select), this.pageParams(limit, offset));
  }

  async findAllPaged<T extends object>(type: EntityType<T>, page: number, size: number): Promise<PageResult<T>> {
    const metadata = this.getMetadata(type);
    return this.queryPage(type, this.sqlGenerator.generateSelect(metadata), page, size);
  }

  /** Resolves to null when no row has this id. */
  async findById<T extends object>(type: EntityType<T>, id: unknown): Promise<T | null> {
    const metadata = this.getMetadata(type);
    this.requireIdField(metadata, 'find by id');
    return this.queryOne(type, this.sqlGenerator.generateSelectById(metadata), this.binder.bindId(metadata, id));
  }

  async findAllByIds<T extends object>(type: EntityType<T>, ids: readonly unknown[]): Promise<T[]> {
    const metadata = this.getMetadata(type);
    this.requireIdField(metadata, 'find by ids');
    if (ids.length === 0) {
      return [];
    }
    return this.query(
      type,
      this.sqlGenerator.generateSelectByIds(metadata, ids.length),
      this.binder.bindIds(metadata, ids),
    );
  }

  async findFirst<T extends object>(type: EntityType<T>): Promise<T | null> {
    const [first] = await this.findAll(type, 1, 0);
    return first ?? null;
  }

  async exists(type: EntityType, id: unknown): Promise<boolean> {
    const metadata = this.getMetadata(type);
    this.requireIdField(metadata, 'check existence of');
    const sql = this.sqlGenerator.generateExistsById(metadata);
    return (await this.queryForNumber(sql, this.binder.bindId(metadata, id))) > 0;
  }

  async count(type: EntityType): Promise<number> {
    const metadata = this.getMetadata(type);
    this.requireWritable(metadata, 'count');
    return this.queryForNumber(this.sqlGenerator.generateCount(metadata));
  }

  // ---- raw SQL -----------------------------------------------------------

  /** Runs `sql` verbatim and maps every row into `type`. */
  async query<T extends object>(type: EntityType<T>, sql: string, params: SqlParams = {}): Promise<T[]> {
    const mapper = this.getRowMapper(type);
    const result = await this.runQuery(type.name, sql, params);
    return mapper.mapAll(result.rows);
  }

  async queryOne<T extends object>(type: EntityType<T>, sql: string, params: SqlParams = {}): Promise<T | null> {
    const [first] = await this.query(type, sql, params);
    return first ?? null;
  }

  /**
   * Maps rows into `type` one at a time as the driver reads them. Leaving the
   * loop early releases the connection.
   */
  async *queryStream<T extends object>(type: EntityType<T>, sql: string, params: SqlParams = {}): AsyncIterable<T> {
    const mapper = this.getRowMapper(type);
    const startedAt = Date.now();
    let error: unknown;
    try {
      for await (const row of this.executor.stream(sql, params)) {
        yield mapper.map(row);
      }
    } catch (caught) {
      error = caught;
      throw caught;
    } finally {
      this.queryLogger.logStatement({
        operation: 'stream',
        table: type.name,
        sql,
        duration: Date.now() - startedAt,
        success: error === undefined,
        error,
      });
    }
  }

  async queryForMaps(sql: string, params: SqlParams = {}): Promise<Row[]> {
    return (await this.runQuery('raw', sql, params)).rows;
  }

  async queryForMap(sql: string, params: SqlParams = {}): Promise<Row | null> {
    const [first] = await this.queryForMaps(sql, params);
    return first ?? null;
  }

  /** First column of the first row, or null when there is no row. */
  async queryForObject(sql: string, params: SqlParams = {}): Promise<unknown> {
    const [first] = await this.queryForList(sql, params);
    return first ?? null;
  }

  /** First column of every row. */
  async queryForList(sql: string, params: SqlParams = {}): Promise<unknown[]> {
    const result = await this.runQuery('raw', sql, params);
    return result.rows.map((row) => firstColumn(result, row));
  }

  /** Numeric scalar; 0 when the query returns no row or a null value. */
  async queryForNumber(sql: string, params: SqlParams = {}): Promise<number> {
    const value = await this.queryForObject(sql, params);
    if (isAbsent(value)) {
      return 0;
    }
    const numeric = Number(value);
    if (Number.isNaN(numeric)) {
      throw new MappingException('(scalar)', 'number', value);
    }
    return numeric;
  }

  async queryForString(sql: string, params: SqlParams = {}): Promise<string | null> {
    const value = await this.queryForObject(sql, params);
    return isAbsent(value) ? null : String(value);
  }

  async queryPage<T extends object>(
    type: EntityType<T>,
    sql: string,
    page: number,
    size: number,
    params: SqlParams = {},
  ): Promise<PageResult<T>> {
    const mapper = this.getRowMapper(type);
    const { rows, total } = await this.fetchPage(type.name, sql, page, size, params);
    return new PageResult(mapper.mapAll(rows), page, size, total);
  }

  async queryPageForMaps(sql: string, page: number, size: number, params: SqlParams = {}): Promise<PageResult<Row>> {
    const { rows, total } = await this.fetchPage('raw', sql, page, size, params);
    return new PageResult(rows, page, size, total);
  }

  /** Runs one statement in its own transaction and returns the affected row count. */
  async executeUpdate(sql: string, params: SqlParams = {}): Promise<number> {
    return this.executor.inTransaction((handle) =>
      this.queryLogger.track('execute', 'raw', sql, () => handle.execute(sql, params)),
    );
  }

  /** Runs `sql` once per parameter set, all in one transaction. */
  async executeBatch(sql: string, batchParams: readonly SqlParams[]): Promise<number[]> {
    return this.executor.inTransaction(async (handle) => {
      const counts: number[] = [];
      for (const params of batchParams) {
        counts.push(await this.queryLogger.track('execute', 'raw', sql, () => handle.execute(sql, params)));
      }
      return counts;
    });
  }

  // ---- escape hatches ----------------------------------------------------

  withHandle<R>(work: (handle: SqlHandle) => Promise<R>): Promise<R> {
    return this.executor.withHandle(work);
  }

  inTransaction<R>(work: (handle: SqlHandle) => Promise<R>): Promise<R> {
    return this.executor.inTransaction(work);
  }

  getRowMapper<T extends object>(type: EntityType<T>): RowMapper<T> {
    const cached = this.rowMappers.get(type);
    if (cached && isMapperFor(cached, type)) {
      return cached;
    }
    const mapper = new RowMapper(type, this.getMetadata(type), this.registries.converters, this.dialect);
    this.rowMappers.set(type, mapper);
    return mapper;
  }

  repository<T extends object>(type: EntityType<T>): EntityRepository<T> {
    return new EntityRepository(this, type);
  }

  getMetadata(type: Function): EntityMetadata {
    return this.metadataCache.getMetadata(type);
  }

  getExecutor(): SqlExecutor {
    return this.executor;
  }

  // ---- preparation -------------------------------------------------------

  private prepareInsert(entity: object): PreparedWrite {
    const metadata = this.getMetadata(entity.constructor);
    this.requireWritable(metadata, 'insert');
    this.valueGeneration.apply(entity, metadata, { operation: 'insert', dialect: this.dialect });
    this.validation.assertValid(entity, metadata);

    const fields = metadata.getInsertableFields();
    return {
      metadata,
      sql: this.sqlGenerator.generateInsert(metadata, fields),
      params: this.binder.bind(entity, fields),
    };
  }

  private prepareUpdate(entity: object): PreparedWrite {
    const metadata = this.getMetadata(entity.constructor);
    this.requireWritable(metadata, 'update');
    const id = this.requireIdValue(metadata, entity, 'update');
    this.valueGeneration.apply(entity, metadata, { operation: 'update', dialect: this.dialect });
    this.validation.assertValid(entity, metadata);

    const fields = metadata.getNonIdFields();
    if (fields.length === 0) {
      throw new MetadataException(metadata.entityName, 'no columns to update besides the id');
    }
    return {
      metadata,
      sql: this.sqlGenerator.generateUpdate(metadata, fields),
      params: { ...this.binder.bind(entity, fields), ...this.binder.bind(entity, [id]) },
    };
  }

  private prepareDelete(entity: object): PreparedWrite {
    const metadata = this.getMetadata(entity.constructor);
    this.requireWritable(metadata, 'delete');
    const id = this.requireIdValue(metadata, entity, 'delete');
    return {
      metadata,
      sql: this.sqlGenerator.generateDelete(metadata),
      params: this.binder.bind(entity, [id]),
    };
  }

  private prepareDeleteById(type: EntityType, id: unknown): PreparedWrite {
    const metadata = this.getMetadata(type);
    this.requireWritable(metadata, 'delete');
    this.requireIdField(metadata, 'delete');
    return {
      metadata,
      sql: this.sqlGenerator.generateDelete(metadata),
      params: this.binder.bindId(metadata, id),
    };
  }

  /**
   * Prepares every item even after one fails validation, so the caller sees
   * all failing items at once. Any other error aborts immediately.
   */
  private prepareBatch<T>(items: readonly T[], prepare: (item: T) => PreparedWrite): PreparedWrite[] {
    const prepared: PreparedWrite[] = [];
    const failures: BatchItemValidationFailure[] = [];

    items.forEach((item, index) => {
      try {
        prepared.push(prepare(item));
      } catch (error) {
        if (!(error instanceof ValidationException)) {
          throw error;
        }
        failures.push({ index, exception: error });
      }
    });

    if (failures.length > 0) {
      throw new BatchValidationException(failures);
    }
    return prepared;
  }

  // ---- execution ---------------------------------------------------------

  private async runInsert(handle: SqlHandle, entity: object, prepared: PreparedWrite): Promise<void> {
    const { metadata, sql, params } = prepared;
    const id = metadata.idField;

    if (!id?.isGenerated) {
      await this.track(handle, 'insert', prepared);
      return;
    }

    const key = await this.queryLogger.track('insert', metadata.fullTableName, sql, () =>
      handle.executeAndReturnGeneratedKey(sql, params, id.columnName),
    );
    if (isAbsent(key)) {
      this.logger.warn(`No generated key returned for ${metadata.entityName}.${id.fieldName}`);
      return;
    }
    id.setValue(entity, readColumnValue(key, id, this.registries.converters, this.dialect));
  }

  private async runBatch(operation: string, prepared: readonly PreparedWrite[]): Promise<number> {
    if (prepared.length === 0) {
      return 0;
    }
    return this.executor.inTransaction(async (handle) => {
      let affected = 0;
      for (const statement of prepared) {
        affected += await this.track(handle, operation, statement);
      }
      return affected;
    });
  }

  private track(handle: SqlHandle, operation: string, prepared: PreparedWrite): Promise<number> {
    const { metadata, sql, params } = prepared;
    return this.queryLogger.track(operation, metadata.fullTableName, sql, () => handle.execute(sql, params));
  }

  private runQuery(target: string, sql: string, params: SqlParams): Promise<ResultSet> {
    return this.executor.withHandle((handle) =>
      this.queryLogger.track('select', target, sql, () => handle.query(sql, params)),
    );
  }

  private async fetchPage(
    target: string,
    sql: string,
    page: number,
    size: number,
    params: SqlParams,
  ): Promise<{ rows: Row[]; total: number }> {
    if (!Number.isInteger(page) || !Number.isInteger(size) || page < 1 || size < 1) {
      throw new InvalidPageRequestException('page starts at 1 and size must be a positive integer', { page, size });
    }
    const total = await this.queryForNumber(this.sqlGenerator.generateCountWrapper(sql), params);
    const paged = this.sqlGenerator.generatePaginated(sql);
    const result = await this.runQuery(target, paged, { ...params, ...this.pageParams(size, (page - 1) * size) });
    return { rows: result.rows, total };
  }

  private pageParams(limit: number, offset: number): SqlParams {
    return { [PAGINATION_PARAMS.LIMIT]: limit, [PAGINATION_PARAMS.OFFSET]: offset };
  }

  // ---- preconditions -----------------------------------------------------

  private requireWritable(metadata: EntityMetadata, operation: string): void {
    if (metadata.isQueryOnly) {
      throw new QueryOnlyEntityException(metadata.entityName, operation);
    }
  }

  private requireIdField(metadata: EntityMetadata, operation: string): FieldMetadata {
    const id = metadata.idField;
    if (!id) {
      throw new MissingIdException(metadata.entityName, operation);
    }
    return id;
  }

  private requireIdValue(metadata: EntityMetadata, entity: object, operation: string): FieldMetadata {
    const id = this.requireIdField(metadata, operation);
    if (isAbsent(id.getValue(entity))) {
      throw new MissingIdException(metadata.entityName, operation, `has no value in id field '${id.fieldName}'`);
    }
    return id;
  }
}

function firstColumn(result: ResultSet, row: Row): unknown {
  const column = result.columns[0] ?? Object.keys(row)[0];
  return column === undefined ? null : row[column];
}

function isMapperFor<T extends object>(mapper: RowMapper<object>, type: EntityType<T>): mapper is RowMapper<T> {
  return mapper.type === type;
}
