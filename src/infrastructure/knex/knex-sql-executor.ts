import { Logger } from '@nestjs/common';
import { Knex } from 'knex';
import { MappingException } from '../../core/exceptions/custom-exceptions';
import {
  ResultSet,
  Row,
  SqlExecutor,
  SqlHandle,
  SqlParams,
} from '../executor/interfaces/sql-executor.interface';
import { isRecord, normalizeRawResult } from './utils/raw-result';

/**
 * Runs statements through `knex.raw` with named `:column` bindings.
 * A handle holds one pooled connection, or one transaction, until its unit of work settles.
 */
export class KnexSqlExecutor implements SqlExecutor {
  private readonly logger = new Logger(KnexSqlExecutor.name);

  constructor(private readonly knex: Knex) {}

  get client(): string | undefined {
    const client: unknown = this.knex.client.config.client;
    return typeof client === 'string' ? client : undefined;
  }

  getKnex(): Knex {
    return this.knex;
  }

  async withHandle<R>(work: (handle: SqlHandle) => Promise<R>): Promise<R> {
    const connection: unknown = await this.knex.client.acquireConnection();
    try {
      return await work(new KnexSqlHandle(this.knex, this.client, connection));
    } finally {
      await this.knex.client.releaseConnection(connection);
    }
  }

  async inTransaction<R>(work: (handle: SqlHandle) => Promise<R>): Promise<R> {
    try {
      return await this.knex.transaction((trx) => work(new KnexSqlHandle(trx, this.client)));
    } catch (error) {
      this.logger.warn(`Transaction rolled back: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
  }

  /** Rows are pulled from the driver as the caller iterates; the connection is held until the loop ends. */
  async *stream(sql: string, params: SqlParams = {}): AsyncIterable<Row> {
    const connection: unknown = await this.knex.client.acquireConnection();
    try {
      const rows = this.knex.raw(sql, toBindings(params)).connection(connection).stream();
      for await (const row of rows) {
        const value: unknown = row;
        if (!isRecord(value)) {
          throw new MappingException('(row)', 'result row', value, 'is not a column map');
        }
        yield value;
      }
    } finally {
      await this.knex.client.releaseConnection(connection);
    }
  }
}

export class KnexSqlHandle implements SqlHandle {
  /** `connection` pins every statement to one pooled connection; a transaction is already pinned. */
  constructor(
    private readonly knex: Knex,
    private readonly client: string | undefined,
    private readonly connection?: unknown,
  ) {}

  async execute(sql: string, params: SqlParams = {}): Promise<number> {
    const raw: unknown = await this.raw(sql, params);
    return normalizeRawResult(this.client, raw).affectedRows;
  }

  async executeAndReturnGeneratedKey(sql: string, params: SqlParams, keyColumn: string): Promise<unknown> {
    const raw: unknown = await this.raw(sql, params);
    const result = normalizeRawResult(this.client, raw);
    const returned = result.rows[0];
    if (returned) {
      const key = Object.keys(returned).find((column) => column.toLowerCase() === keyColumn.toLowerCase());
      if (key !== undefined) {
        return returned[key];
      }
    }
    return result.insertId;
  }

  async query(sql: string, params: SqlParams = {}): Promise<ResultSet> {
    const raw: unknown = await this.raw(sql, params);
    const { columns, rows } = normalizeRawResult(this.client, raw);
    return { columns, rows };
  }

  private raw(sql: string, params: SqlParams): Knex.Raw {
    const statement = this.knex.raw(sql, toBindings(params));
    return this.connection === undefined ? statement : statement.connection(this.connection);
  }
}

export function toBindings(params: SqlParams): Knex.ValueDict {
  const bindings: Knex.ValueDict = {};
  for (const [name, value] of Object.entries(params)) {
    bindings[name] = toKnexValue(name, value);
  }
  return bindings;
}

function toKnexValue(name: string, value: unknown): Knex.Value {
  switch (typeof value) {
    case 'undefined':
      return null;
    case 'string':
    case 'number':
    case 'boolean':
      return value;
    case 'bigint':
      return value.toString();
  }
  if (value === null || value instanceof Date || Buffer.isBuffer(value) || Array.isArray(value)) {
    return value;
  }
  if (isRecord(value)) {
    return value;
  }
  throw new MappingException(name, 'SQL parameter', value, 'cannot be bound');
}
