import { FieldMetadata } from '../../../core/metadata/field-metadata';

/**
 * Bridges the in-memory value of a tagged field and its stored form.
 * Neither direction is called for null or undefined.
 */
export interface TypeConverter<TOptions = unknown> {
  toDatabase(value: unknown, field: FieldMetadata, options: TOptions): unknown;
  fromDatabase(value: unknown, field: FieldMetadata, options: TOptions): unknown;
}
