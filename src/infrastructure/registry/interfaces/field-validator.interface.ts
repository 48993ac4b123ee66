import { FieldMetadata } from '../../../core/metadata/field-metadata';

export interface FieldValidator<TOptions = unknown> {
  /** Returns every violation found; an empty list means the value is valid. */
  validate(value: unknown, field: FieldMetadata, options: TOptions): string[];
}
