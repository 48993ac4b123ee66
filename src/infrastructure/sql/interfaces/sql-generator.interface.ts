import { EntityMetadata } from '../../../core/metadata/entity-metadata';
import { FieldMetadata } from '../../../core/metadata/field-metadata';

/**
 * Renders statement text with named `:name` placeholders. Binding names are
 * always `FieldMetadata.parameterName`; only the placeholder token around them varies.
 */
export interface SqlGenerator {
  generateInsert(metadata: EntityMetadata, fields: readonly FieldMetadata[]): string;
  /** SET over `fields`, id in WHERE. */
  generateUpdate(metadata: EntityMetadata, fields: readonly FieldMetadata[]): string;
  generateDelete(metadata: EntityMetadata): string;
  generateSelect(metadata: EntityMetadata): string;
  generateSelectById(metadata: EntityMetadata): string;
  /** `WHERE id IN (...)` with one placeholder per id, named `<parameterName>_<index>`. */
  generateSelectByIds(metadata: EntityMetadata, count: number): string;
  generateCount(metadata: EntityMetadata): string;
  generateExistsById(metadata: EntityMetadata): string;
  /** Appends limit/offset placeholders to an arbitrary SELECT. */
  generatePaginated(sql: string): string;
  generateCountWrapper(sql: string): string;
  getPlaceholder(field: FieldMetadata): string;
  quoteIdentifier(identifier: string): string;
}
