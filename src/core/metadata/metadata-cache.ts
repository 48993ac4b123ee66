import { Logger } from '@nestjs/common';
import { MetadataException } from '../exceptions/custom-exceptions';
import { ColumnOptions, ColumnTag } from '../../shared/decorators/column.decorator';
import { DefaultValueTag } from '../../shared/decorators/default-value.decorator';
import { GeneratedTag } from '../../shared/decorators/generated.decorator';
import { IdTag } from '../../shared/decorators/id.decorator';
import { QueryOnlyTag } from '../../shared/decorators/query-only.decorator';
import { TableOptions, TableTag } from '../../shared/decorators/table.decorator';
import { TransientTag } from '../../shared/decorators/transient.decorator';
import { JsonTag } from '../../shared/decorators/converter.decorators';
import { DecoratorIntrospector, IntrospectedProperty } from './decorator-introspector';
import { EntityMetadata } from './entity-metadata';
import { FieldMetadata } from './field-metadata';
import { resolveTags, isTagOf, TagInstance, TagType } from './tags/tag-type';
import { ValueType, parseLiteral, valueTypeFromDesignType } from './value-type';

export interface MetadataCacheOptions {
  /** Schema used when `@Table` names none. */
  defaultSchema?: string;
}

/**
 * Builds metadata once per class and keeps it for the life of the process.
 * The build is synchronous, so two callers can never race on the same class.
 */
export class MetadataCache {
  private readonly logger = new Logger(MetadataCache.name);
  private readonly cache = new Map<Function, EntityMetadata>();

  constructor(
    private readonly introspector: DecoratorIntrospector = new DecoratorIntrospector(),
    private readonly options: MetadataCacheOptions = {},
  ) {}

  getMetadata(type: Function): EntityMetadata {
    const cached = this.cache.get(type);
    if (cached) {
      return cached;
    }

    const metadata = this.build(type);
    this.cache.set(type, metadata);
    this.logger.debug(
      `Mapped ${metadata.entityName} to ${metadata.fullTableName} (${metadata.fields.length} fields)`,
    );
    return metadata;
  }

  has(type: Function): boolean {
    return this.cache.has(type);
  }

  get size(): number {
    return this.cache.size;
  }

  private build(type: Function): EntityMetadata {
    const introspected = this.introspector.introspect(type);
    const entityName = introspected.name;
    const classTags = resolveTags(introspected.classTags);
    const table: TableOptions = findTag(classTags, TableTag)?.options ?? {};

    const fields: FieldMetadata[] = [];
    const transientFields: string[] = [];
    const parameterNames = new Set<string>();
    for (const property of introspected.properties) {
      const tags = resolveTags(property.tags);
      if (findTag(tags, TransientTag)) {
        if (findTag(tags, IdTag)) {
          throw new MetadataException(entityName, `id field '${property.propertyKey}' cannot be transient`);
        }
        transientFields.push(property.propertyKey);
        continue;
      }
      fields.push(this.buildField(entityName, property, tags, parameterNames));
    }

    if (fields.length === 0) {
      throw new MetadataException(entityName, 'no mapped fields; decorate at least one property');
    }
    this.assertSingleId(entityName, fields);
    this.assertUniqueColumns(entityName, fields);

    return new EntityMetadata({
      entityClass: type,
      tableName: table.name || entityName,
      schema: table.schema || this.options.defaultSchema,
      fields,
      transientFields,
      isQueryOnly: findTag(classTags, QueryOnlyTag) !== undefined,
    });
  }

  private buildField(
    entityName: string,
    property: IntrospectedProperty,
    tags: TagInstance[],
    parameterNames: Set<string>,
  ): FieldMetadata {
    const fieldName = property.propertyKey;
    const column: ColumnOptions = findTag(tags, ColumnTag)?.options ?? {};
    if (column.name !== undefined && column.name.trim() === '') {
      throw new MetadataException(entityName, `column name of '${fieldName}' is empty`);
    }

    const valueType: ValueType =
      column.type ?? (findTag(tags, JsonTag) ? 'json' : valueTypeFromDesignType(property.designType));
    const id = findTag(tags, IdTag)?.options;
    const defaultValue = findTag(tags, DefaultValueTag)?.options;

    if (defaultValue) {
      const hasLiteral = defaultValue.value !== undefined;
      const hasGenerator = defaultValue.generator !== undefined;
      if (hasLiteral === hasGenerator) {
        throw new MetadataException(
          entityName,
          `@DefaultValue on '${fieldName}' must set exactly one of a literal value or a generator`,
          { field: fieldName },
        );
      }
      if (defaultValue.value !== undefined) {
        const parsed = parseLiteral(defaultValue.value, valueType);
        if (!parsed.ok) {
          throw new MetadataException(entityName, `default of '${fieldName}': ${parsed.reason}`, {
            field: fieldName,
          });
        }
      }
    }

    const columnName = column.name ?? fieldName;
    const parameterName = toParameterName(columnName, parameterNames);
    parameterNames.add(parameterName);

    return new FieldMetadata({
      entityName,
      fieldName,
      columnName,
      parameterName,
      valueType,
      isId: id !== undefined,
      isGenerated: id?.generated ?? false,
      tags,
      defaultValue,
      generated: findTag(tags, GeneratedTag)?.options,
    });
  }

  private assertSingleId(entityName: string, fields: FieldMetadata[]): void {
    const ids = fields.filter((field) => field.isId);
    if (ids.length > 1) {
      throw new MetadataException(
        entityName,
        `more than one @Id field (${ids.map((field) => field.fieldName).join(', ')})`,
      );
    }
  }

  private assertUniqueColumns(entityName: string, fields: FieldMetadata[]): void {
    const seen = new Map<string, string>();
    for (const field of fields) {
      const key = field.columnName.toLowerCase();
      const owner = seen.get(key);
      if (owner !== undefined) {
        throw new MetadataException(
          entityName,
          `column '${field.columnName}' is mapped by both '${owner}' and '${field.fieldName}'`,
        );
      }
      seen.set(key, field.fieldName);
    }
  }
}

/**
 * knex only recognises `:\w+` as a named binding, so other characters become
 * `_`; a name already taken in the same entity gets a numeric suffix.
 */
export function toParameterName(columnName: string, taken: ReadonlySet<string>): string {
  const base = columnName.replace(/\W/g, '_');
  let candidate = base;
  for (let suffix = 2; taken.has(candidate); suffix++) {
    candidate = `${base}_${suffix}`;
  }
  return candidate;
}

function findTag<TOptions>(tags: readonly TagInstance[], type: TagType<TOptions>): TagInstance<TOptions> | undefined {
  return tags.find((tag): tag is TagInstance<TOptions> => isTagOf(tag, type));
}
