import { EntityMetadata, EntityType } from '../../core/metadata/entity-metadata';
import { FieldMetadata } from '../../core/metadata/field-metadata';
import { isAbsent } from '../../core/metadata/value-type';
import { Row } from '../executor/interfaces/sql-executor.interface';
import { TypeConverterRegistry } from '../registry/type-converter.registry';
import { Dialect } from '../sql/dialect';
import { coerceToField } from './coercion';

/**
 * Turns result rows into instances of one mapped class. Column names match
 * case-insensitively; unmapped columns are ignored and mapped columns missing
 * from the row keep whatever the constructor assigned.
 */
export class RowMapper<T extends object> {
  constructor(
    readonly type: EntityType<T>,
    private readonly metadata: EntityMetadata,
    private readonly converters: TypeConverterRegistry,
    private readonly dialect: Dialect,
  ) {}

  map(row: Row): T {
    const instance = new this.type();
    for (const [column, raw] of Object.entries(row)) {
      const field = this.metadata.findFieldByColumn(column);
      if (field) {
        field.setValue(instance, this.readValue(raw, field));
      }
    }
    return instance;
  }

  mapAll(rows: readonly Row[]): T[] {
    return rows.map((row) => this.map(row));
  }

  readValue(raw: unknown, field: FieldMetadata): unknown {
    return readColumnValue(raw, field, this.converters, this.dialect);
  }
}

/** Read converters in tag order, then coercion into the field's value type. */
export function readColumnValue(
  raw: unknown,
  field: FieldMetadata,
  converters: TypeConverterRegistry,
  dialect: Dialect,
): unknown {
  let value = raw;
  for (const { converter, options } of converters.convertersFor(field, dialect)) {
    if (isAbsent(value)) break;
    value = converter.fromDatabase(value, field, options);
  }
  return coerceToField(value, field);
}
