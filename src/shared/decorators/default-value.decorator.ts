import { TagType } from '../../core/metadata/tags/tag-type';
import { tagProperty } from '../../core/metadata/tags/tag-storage';

export interface DefaultValueOptions {
  /** Literal, parsed into the field's value type. */
  value?: string;
  /** Name of a registered value generator. */
  generator?: string;
}

export const DefaultValueTag = new TagType<DefaultValueOptions>('DefaultValue');

/**
 * Fills an absent field on INSERT. Exactly one of `value` or `generator` must be set;
 * the check runs when metadata for the class is built.
 */
export function DefaultValue(valueOrOptions: string | DefaultValueOptions): PropertyDecorator {
  const options = typeof valueOrOptions === 'string' ? { value: valueOrOptions } : valueOrOptions;
  return tagProperty(DefaultValueTag.of(options));
}
