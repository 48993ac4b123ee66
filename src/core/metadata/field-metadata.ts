import { MetadataException } from '../exceptions/custom-exceptions';
import { DefaultValueOptions } from '../../shared/decorators/default-value.decorator';
import { GeneratedOptions } from '../../shared/decorators/generated.decorator';
import { TagInstance, TagType, isTagOf } from './tags/tag-type';
import { ValueType, parseLiteral } from './value-type';

export interface FieldMetadataInit {
  entityName: string;
  fieldName: string;
  columnName: string;
  parameterName: string;
  valueType: ValueType;
  isId: boolean;
  isGenerated: boolean;
  tags: readonly TagInstance[];
  defaultValue?: DefaultValueOptions;
  generated?: GeneratedOptions;
}

/**
 * One persisted property of a mapped class. Values are read and written by
 * property name on whatever instance is passed in; no reference to an instance
 * is ever held.
 */
export class FieldMetadata {
  readonly entityName: string;
  readonly fieldName: string;
  readonly columnName: string;
  /** Name of this column's `:name` binding; the column name when it is a bare word. */
  readonly parameterName: string;
  readonly valueType: ValueType;
  readonly isId: boolean;
  /** Id whose value the database assigns. */
  readonly isGenerated: boolean;
  readonly isTransient = false;
  /** Direct and composed tags, in declaration order. */
  readonly tags: readonly TagInstance[];
  readonly defaultValue?: DefaultValueOptions;
  readonly generated?: GeneratedOptions;

  constructor(init: FieldMetadataInit) {
    this.entityName = init.entityName;
    this.fieldName = init.fieldName;
    this.columnName = init.columnName;
    this.parameterName = init.parameterName;
    this.valueType = init.valueType;
    this.isId = init.isId;
    this.isGenerated = init.isGenerated;
    this.tags = init.tags;
    this.defaultValue = init.defaultValue;
    this.generated = init.generated;
  }

  hasTag(type: TagType<unknown>): boolean {
    return this.tags.some((tag) => tag.type === type);
  }

  getTag<TOptions>(type: TagType<TOptions>): TagInstance<TOptions> | undefined {
    return this.tags.find((tag): tag is TagInstance<TOptions> => isTagOf(tag, type));
  }

  getValue(instance: object): unknown {
    return Reflect.get(instance, this.fieldName);
  }

  setValue(instance: object, value: unknown): void {
    Reflect.set(instance, this.fieldName, value);
  }

  /**
   * Parses the literal default into a fresh value, so mutable defaults
   * (dates, JSON) are never shared between instances.
   */
  resolveLiteralDefault(): unknown {
    const literal = this.defaultValue?.value;
    if (literal === undefined) {
      return undefined;
    }
    const parsed = parseLiteral(literal, this.valueType);
    if (!parsed.ok) {
      throw new MetadataException(this.entityName, `default of '${this.fieldName}': ${parsed.reason}`, {
        field: this.fieldName,
      });
    }
    return parsed.value;
  }

  toString(): string {
    return `${this.entityName}.${this.fieldName} -> ${this.columnName}`;
  }
}
