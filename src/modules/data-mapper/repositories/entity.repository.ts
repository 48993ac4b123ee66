import type { EntityMetadata, EntityType } from '../../../core/metadata/entity-metadata';
import type { SqlParams } from '../../../infrastructure/executor/interfaces/sql-executor.interface';
import type { PageResult } from '../../../shared/types/page-result';
import type { DataMapper } from '../data-mapper';

/** The mapper's operations bound to one class. */
export class EntityRepository<T extends object> {
  constructor(
    private readonly mapper: DataMapper,
    readonly type: EntityType<T>,
  ) {}

  insert(entity: T): Promise<T> {
    return this.mapper.insert(entity);
  }

  insertAll(entities: readonly T[]): Promise<T[]> {
    return this.mapper.insertAll(entities);
  }

  update(entity: T): Promise<number> {
    return this.mapper.update(entity);
  }

  updateAll(entities: readonly T[]): Promise<number> {
    return this.mapper.updateAll(entities);
  }

  save(entity: T): Promise<T> {
    return this.mapper.save(entity);
  }

  delete(entity: T): Promise<number> {
    return this.mapper.delete(entity);
  }

  deleteAll(entities: readonly T[]): Promise<number> {
    return this.mapper.deleteAll(entities);
  }

  deleteById(id: unknown): Promise<number> {
    return this.mapper.deleteById(this.type, id);
  }

  deleteByIds(ids: readonly unknown[]): Promise<number> {
    return this.mapper.deleteByIds(this.type, ids);
  }

  findAll(limit?: number, offset?: number): Promise<T[]> {
    return this.mapper.findAll(this.type, limit, offset);
  }

  findAllPaged(page: number, size: number): Promise<PageResult<T>> {
    return this.mapper.findAllPaged(this.type, page, size);
  }

  findById(id: unknown): Promise<T | null> {
    return this.mapper.findById(this.type, id);
  }

  findAllByIds(ids: readonly unknown[]): Promise<T[]> {
    return this.mapper.findAllByIds(this.type, ids);
  }

  findFirst(): Promise<T | null> {
    return this.mapper.findFirst(this.type);
  }

  exists(id: unknown): Promise<boolean> {
    return this.mapper.exists(this.type, id);
  }

  count(): Promise<number> {
    return this.mapper.count(this.type);
  }

  query(sql: string, params?: SqlParams): Promise<T[]> {
    return this.mapper.query(this.type, sql, params);
  }

  queryOne(sql: string, params?: SqlParams): Promise<T | null> {
    return this.mapper.queryOne(this.type, sql, params);
  }

  queryPage(sql: string, page: number, size: number, params?: SqlParams): Promise<PageResult<T>> {
    return this.mapper.queryPage(this.type, sql, page, size, params);
  }

  getMetadata(): EntityMetadata {
    return this.mapper.getMetadata(this.type);
  }
}
