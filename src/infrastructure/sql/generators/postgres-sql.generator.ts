import { EntityMetadata } from '../../../core/metadata/entity-metadata';
import { FieldMetadata } from '../../../core/metadata/field-metadata';
import { AnsiSqlGenerator } from './ansi-sql.generator';

export class PostgresSqlGenerator extends AnsiSqlGenerator {
  quoteIdentifier(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
  }

  getPlaceholder(field: FieldMetadata): string {
    const placeholder = super.getPlaceholder(field);
    return field.valueType === 'json' ? `CAST(${placeholder} AS jsonb)` : placeholder;
  }

  protected getReturningClause(metadata: EntityMetadata): string {
    const id = metadata.idField;
    return id?.isGenerated ? `RETURNING ${this.quoteIdentifier(id.columnName)}` : '';
  }
}
