import { EntityMetadata } from '../../core/metadata/entity-metadata';
import { FieldMetadata } from '../../core/metadata/field-metadata';
import { isAbsent } from '../../core/metadata/value-type';
import { SqlParams } from '../executor/interfaces/sql-executor.interface';
import { TypeConverterRegistry } from '../registry/type-converter.registry';
import { Dialect } from '../sql/dialect';
import { indexedParameter } from '../sql/generators/ansi-sql.generator';

/**
 * Builds the named parameters of a write. Each field binds under its parameter
 * name after its write converters have run; absent values bind as null.
 */
export class ParameterBinder {
  constructor(
    private readonly converters: TypeConverterRegistry,
    private readonly dialect: Dialect,
  ) {}

  bind(instance: object, fields: readonly FieldMetadata[]): SqlParams {
    const params: SqlParams = {};
    for (const field of fields) {
      params[field.parameterName] = this.writeValue(field.getValue(instance), field);
    }
    return params;
  }

  /** Parameters for `WHERE id = :id`; `id` is the raw in-memory value. */
  bindId(metadata: EntityMetadata, id: unknown): SqlParams {
    const field = metadata.idField;
    return field ? { [field.parameterName]: this.writeValue(id, field) } : {};
  }

  bindIds(metadata: EntityMetadata, ids: readonly unknown[]): SqlParams {
    const field = metadata.idField;
    const params: SqlParams = {};
    if (field) {
      ids.forEach((id, index) => {
        params[indexedParameter(field.parameterName, index)] = this.writeValue(id, field);
      });
    }
    return params;
  }

  writeValue(value: unknown, field: FieldMetadata): unknown {
    let converted = value;
    for (const { converter, options } of this.converters.convertersFor(field, this.dialect)) {
      if (isAbsent(converted)) break;
      converted = converter.toDatabase(converted, field, options);
    }
    return converted === undefined ? null : converted;
  }
}
