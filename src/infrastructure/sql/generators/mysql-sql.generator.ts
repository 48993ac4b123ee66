import { AnsiSqlGenerator } from './ansi-sql.generator';

/** No RETURNING: generated keys come back as the driver's insertId. */
export class MySqlSqlGenerator extends AnsiSqlGenerator {
  quoteIdentifier(identifier: string): string {
    return `\`${identifier.replace(/`/g, '``')}\``;
  }
}
