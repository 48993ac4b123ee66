export type Row = Record<string, unknown>;

/** Named parameters, keyed by placeholder name without the leading colon. */
export type SqlParams = Record<string, unknown>;

export interface ResultSet {
  /** Column names in result order; empty when the driver reports none and no row came back. */
  columns: string[];
  rows: Row[];
}

/** One connection, or one transaction, for the duration of a unit of work. */
export interface SqlHandle {
  /** Runs a statement and returns the affected row count. */
  execute(sql: string, params?: SqlParams): Promise<number>;
  /**
   * Runs an INSERT and returns the value of `keyColumn` assigned by the database,
   * or undefined when the driver reports none.
   */
  executeAndReturnGeneratedKey(sql: string, params: SqlParams, keyColumn: string): Promise<unknown>;
  query(sql: string, params?: SqlParams): Promise<ResultSet>;
}

export interface SqlExecutor {
  /** Name of the underlying client, used to infer the dialect. */
  readonly client?: string;
  withHandle<R>(work: (handle: SqlHandle) => Promise<R>): Promise<R>;
  /** Commits when `work` resolves, rolls back and rethrows when it rejects. */
  inTransaction<R>(work: (handle: SqlHandle) => Promise<R>): Promise<R>;
  /**
   * Yields result rows as the driver produces them. The connection is held
   * until iteration completes, throws or is abandoned with `break`.
   */
  stream(sql: string, params?: SqlParams): AsyncIterable<Row>;
}
