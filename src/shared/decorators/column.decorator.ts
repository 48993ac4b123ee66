import { TagType } from '../../core/metadata/tags/tag-type';
import { tagProperty } from '../../core/metadata/tags/tag-storage';
import { ValueType } from '../../core/metadata/value-type';

export interface ColumnOptions {
  name?: string;
  type?: ValueType;
}

export const ColumnTag = new TagType<ColumnOptions>('Column');

export function Column(nameOrOptions?: string | ColumnOptions): PropertyDecorator {
  const options = typeof nameOrOptions === 'string' ? { name: nameOrOptions } : (nameOrOptions ?? {});
  return tagProperty(ColumnTag.of(options));
}
