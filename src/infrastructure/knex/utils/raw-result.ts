import { Row } from '../../executor/interfaces/sql-executor.interface';
import { Dialect } from '../../sql/dialect';

export interface NormalizedResult {
  rows: Row[];
  columns: string[];
  affectedRows: number;
  /** Driver-reported key of the last inserted row (MySQL insertId, SQLite lastInsertRowid). */
  insertId?: unknown;
}

/**
 * `knex.raw` hands back the driver's own result object, whose shape depends
 * on the client:
 *   pg            { rows, fields, rowCount }
 *   mysql2        [rows, fields] or [ResultSetHeader]
 *   better-sqlite3 rows, or { changes, lastInsertRowid }
 *   mssql         rows, or { recordset, rowsAffected }
 */
export function normalizeRawResult(client: string | undefined, raw: unknown): NormalizedResult {
  const dialect = Dialect.fromClient(client);

  if (dialect === Dialect.POSTGRES) {
    return fromPg(Array.isArray(raw) ? raw[raw.length - 1] : raw);
  }
  if (dialect === Dialect.MYSQL && Array.isArray(raw)) {
    return fromMysql(raw[0], raw[1]);
  }
  if (Array.isArray(raw)) {
    return withRows(toRows(raw), []);
  }
  if (!isRecord(raw)) {
    return { rows: [], columns: [], affectedRows: 0 };
  }
  if ('changes' in raw) {
    return { rows: [], columns: [], affectedRows: toCount(raw.changes), insertId: raw.lastInsertRowid };
  }
  if ('recordset' in raw) {
    const affected = Array.isArray(raw.rowsAffected) ? raw.rowsAffected.reduce(sumCounts, 0) : 0;
    return { ...withRows(toRows(raw.recordset), []), affectedRows: affected };
  }
  return fromPg(raw);
}

function fromPg(result: unknown): NormalizedResult {
  if (!isRecord(result)) {
    return { rows: [], columns: [], affectedRows: 0 };
  }
  const rows = toRows(result.rows);
  const normalized = withRows(rows, fieldNames(result.fields));
  return typeof result.rowCount === 'number' ? { ...normalized, affectedRows: result.rowCount } : normalized;
}

function fromMysql(first: unknown, fields: unknown): NormalizedResult {
  if (Array.isArray(first)) {
    return withRows(toRows(first), fieldNames(fields));
  }
  if (isRecord(first)) {
    return { rows: [], columns: [], affectedRows: toCount(first.affectedRows), insertId: first.insertId };
  }
  return { rows: [], columns: [], affectedRows: 0 };
}

function withRows(rows: Row[], columns: string[]): NormalizedResult {
  return {
    rows,
    columns: columns.length > 0 ? columns : Object.keys(rows[0] ?? {}),
    affectedRows: rows.length,
  };
}

function toRows(value: unknown): Row[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function fieldNames(fields: unknown): string[] {
  if (!Array.isArray(fields)) return [];
  return fields.flatMap((field) => (isRecord(field) && typeof field.name === 'string' ? [field.name] : []));
}

function toCount(value: unknown): number {
  return typeof value === 'number' || typeof value === 'bigint' ? Number(value) : 0;
}

function sumCounts(total: number, value: unknown): number {
  return total + toCount(value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
