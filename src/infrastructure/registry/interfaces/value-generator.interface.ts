import { FieldMetadata } from '../../../core/metadata/field-metadata';
import { Dialect } from '../../sql/dialect';

export type WriteOperation = 'insert' | 'update';

export interface GenerationContext {
  operation: WriteOperation;
  dialect: Dialect;
}

export interface ValueGenerator {
  /** Receives the whole instance, so values can be derived from other fields. */
  generate(entity: object, field: FieldMetadata, context: GenerationContext): unknown;
  /** When set to false, `@Generated` fields never call this generator on insert. */
  appliesOnInsert?: boolean;
  appliesOnUpdate?: boolean;
}
