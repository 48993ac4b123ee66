import { EntityMetadata } from '../../../core/metadata/entity-metadata';
import { FieldMetadata } from '../../../core/metadata/field-metadata';
import { MissingIdException } from '../../../core/exceptions/custom-exceptions';
import { PAGINATION_PARAMS } from '../../../shared/utils/constant';
import { SqlGenerator } from '../interfaces/sql-generator.interface';

/**
 * Generic SQL. Dialects override the hook methods (quoting, placeholder,
 * RETURNING/OUTPUT, pagination); every statement is assembled from them.
 */
export class AnsiSqlGenerator implements SqlGenerator {
  generateInsert(metadata: EntityMetadata, fields: readonly FieldMetadata[]): string {
    const columns = fields.map((field) => this.quoteIdentifier(field.columnName)).join(', ');
    const values = fields.map((field) => this.getPlaceholder(field)).join(', ');
    const output = this.getOutputClause(metadata);
    const returning = this.getReturningClause(metadata);

    return [
      `INSERT INTO ${this.tableRef(metadata)} (${columns})`,
      output,
      `VALUES (${values})`,
      returning,
    ]
      .filter(Boolean)
      .join(' ');
  }

  generateUpdate(metadata: EntityMetadata, fields: readonly FieldMetadata[]): string {
    const assignments = fields
      .map((field) => `${this.quoteIdentifier(field.columnName)} = ${this.getPlaceholder(field)}`)
      .join(', ');
    return `UPDATE ${this.tableRef(metadata)} SET ${assignments} ${this.whereId(metadata, 'update')}`;
  }

  generateDelete(metadata: EntityMetadata): string {
    return `DELETE FROM ${this.tableRef(metadata)} ${this.whereId(metadata, 'delete')}`;
  }

  generateSelect(metadata: EntityMetadata): string {
    return `SELECT * FROM ${this.tableRef(metadata)}`;
  }

  generateSelectById(metadata: EntityMetadata): string {
    return `${this.generateSelect(metadata)} ${this.whereId(metadata, 'find by id')}`;
  }

  generateSelectByIds(metadata: EntityMetadata, count: number): string {
    const id = this.requireId(metadata, 'find by ids');
    const placeholders = Array.from({ length: count }, (_, index) =>
      this.getPlaceholder(id).replace(`:${id.parameterName}`, `:${indexedParameter(id.parameterName, index)}`),
    );
    return `${this.generateSelect(metadata)} WHERE ${this.quoteIdentifier(id.columnName)} IN (${placeholders.join(', ')})`;
  }

  generateCount(metadata: EntityMetadata): string {
    return `SELECT COUNT(*) FROM ${this.tableRef(metadata)}`;
  }

  generateExistsById(metadata: EntityMetadata): string {
    return `${this.generateCount(metadata)} ${this.whereId(metadata, 'check existence of')}`;
  }

  generatePaginated(sql: string): string {
    return `${sql.trim()} ${this.getPaginationClause(sql)}`;
  }

  generateCountWrapper(sql: string): string {
    return `SELECT COUNT(*) FROM (${sql.trim()}) AS count_query`;
  }

  getPlaceholder(field: FieldMetadata): string {
    return `:${field.parameterName}`;
  }

  quoteIdentifier(identifier: string): string {
    return identifier;
  }

  protected getReturningClause(_metadata: EntityMetadata): string {
    return '';
  }

  protected getOutputClause(_metadata: EntityMetadata): string {
    return '';
  }

  protected getPaginationClause(_sql: string): string {
    return `LIMIT :${PAGINATION_PARAMS.LIMIT} OFFSET :${PAGINATION_PARAMS.OFFSET}`;
  }

  protected tableRef(metadata: EntityMetadata): string {
    const table = this.quoteIdentifier(metadata.tableName);
    return metadata.schema ? `${this.quoteIdentifier(metadata.schema)}.${table}` : table;
  }

  protected whereId(metadata: EntityMetadata, operation: string): string {
    const id = this.requireId(metadata, operation);
    return `WHERE ${this.quoteIdentifier(id.columnName)} = ${this.getPlaceholder(id)}`;
  }

  private requireId(metadata: EntityMetadata, operation: string): FieldMetadata {
    const id = metadata.idField;
    if (!id) {
      throw new MissingIdException(metadata.entityName, operation);
    }
    return id;
  }
}

export function indexedParameter(parameterName: string, index: number): string {
  return `${parameterName}_${index}`;
}
