import { EntityMetadata } from '../../../core/metadata/entity-metadata';
import { AnsiSqlGenerator } from './ansi-sql.generator';

export class SqliteSqlGenerator extends AnsiSqlGenerator {
  quoteIdentifier(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
  }

  // SQLite 3.35+
  protected getReturningClause(metadata: EntityMetadata): string {
    const id = metadata.idField;
    return id?.isGenerated ? `RETURNING ${this.quoteIdentifier(id.columnName)}` : '';
  }
}
