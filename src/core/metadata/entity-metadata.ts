import { FieldMetadata } from './field-metadata';

/** A class the mapper can instantiate for every result row. */
export type EntityType<T extends object = object> = new () => T;

export interface EntityMetadataInit {
  entityClass: Function;
  tableName: string;
  schema?: string;
  fields: readonly FieldMetadata[];
  transientFields: readonly string[];
  isQueryOnly: boolean;
}

export class EntityMetadata {
  readonly entityClass: Function;
  readonly tableName: string;
  readonly schema?: string;
  readonly fields: readonly FieldMetadata[];
  readonly transientFields: readonly string[];
  readonly isQueryOnly: boolean;
  readonly idField?: FieldMetadata;
  private readonly byColumn: ReadonlyMap<string, FieldMetadata>;

  constructor(init: EntityMetadataInit) {
    this.entityClass = init.entityClass;
    this.tableName = init.tableName;
    this.schema = init.schema;
    this.fields = init.fields;
    this.transientFields = init.transientFields;
    this.isQueryOnly = init.isQueryOnly;
    this.idField = init.fields.find((field) => field.isId);
    this.byColumn = new Map(init.fields.map((field) => [field.columnName.toLowerCase(), field]));
  }

  get entityName(): string {
    return this.entityClass.name;
  }

  get fullTableName(): string {
    return this.schema ? `${this.schema}.${this.tableName}` : this.tableName;
  }

  hasIdField(): boolean {
    return this.idField !== undefined;
  }

  hasGeneratedId(): boolean {
    return this.idField?.isGenerated ?? false;
  }

  getNonIdFields(): FieldMetadata[] {
    return this.fields.filter((field) => !field.isId);
  }

  /** Every field except an id the database assigns. */
  getInsertableFields(): FieldMetadata[] {
    return this.fields.filter((field) => !(field.isId && field.isGenerated));
  }

  findFieldByColumn(columnName: string): FieldMetadata | undefined {
    return this.byColumn.get(columnName.toLowerCase());
  }
}
