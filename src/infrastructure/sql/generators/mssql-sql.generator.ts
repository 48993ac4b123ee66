import { EntityMetadata } from '../../../core/metadata/entity-metadata';
import { PAGINATION_PARAMS } from '../../../shared/utils/constant';
import { AnsiSqlGenerator } from './ansi-sql.generator';

const ORDER_BY = /\border\s+by\b/i;
const TRAILING_ORDER_BY = /\s+order\s+by\s+[^)]*$/i;

export class MsSqlSqlGenerator extends AnsiSqlGenerator {
  quoteIdentifier(identifier: string): string {
    return `[${identifier.replace(/]/g, ']]')}]`;
  }

  generateCountWrapper(sql: string): string {
    // ORDER BY is not allowed in a derived table without OFFSET/TOP
    return super.generateCountWrapper(sql.trim().replace(TRAILING_ORDER_BY, ''));
  }

  protected getOutputClause(metadata: EntityMetadata): string {
    const id = metadata.idField;
    return id?.isGenerated ? `OUTPUT INSERTED.${this.quoteIdentifier(id.columnName)}` : '';
  }

  protected getPaginationClause(sql: string): string {
    const fetch = `OFFSET :${PAGINATION_PARAMS.OFFSET} ROWS FETCH NEXT :${PAGINATION_PARAMS.LIMIT} ROWS ONLY`;
    return ORDER_BY.test(sql) ? fetch : `ORDER BY (SELECT NULL) ${fetch}`;
  }
}
