import { Logger } from '@nestjs/common';

export interface StatementLogEntry {
  operation: string;
  table: string;
  duration: number;
  success: boolean;
  sql?: string;
  error?: unknown;
}

/** One debug line per statement, one error line per failed statement. SQL text only when `logSql` is on. */
export class QueryLogger {
  private readonly logger = new Logger(QueryLogger.name);

  constructor(private readonly logSql = false) {}

  logStatement(entry: StatementLogEntry): void {
    const logData: Record<string, unknown> = {
      operation: entry.operation,
      table: entry.table,
      duration: `${entry.duration}ms`,
      success: entry.success,
    };

    if (this.logSql && entry.sql) {
      logData.sql = entry.sql;
    }

    if (entry.error) {
      logData.error = entry.error instanceof Error ? entry.error.message : entry.error;
    }

    const message = {
      message: entry.success ? 'Database Operation' : 'Database Operation Failed',
      timestamp: new Date().toISOString(),
      data: logData,
    };
    if (entry.success) {
      this.logger.debug(message);
    } else {
      this.logger.error(message);
    }
  }

  async track<R>(operation: string, table: string, sql: string, work: () => Promise<R>): Promise<R> {
    const startedAt = Date.now();
    try {
      const result = await work();
      this.logStatement({ operation, table, sql, duration: Date.now() - startedAt, success: true });
      return result;
    } catch (error) {
      this.logStatement({ operation, table, sql, duration: Date.now() - startedAt, success: false, error });
      throw error;
    }
  }
}
