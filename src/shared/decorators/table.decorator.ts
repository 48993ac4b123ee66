import { TagType } from '../../core/metadata/tags/tag-type';
import { tagClass } from '../../core/metadata/tags/tag-storage';

export interface TableOptions {
  name?: string;
  schema?: string;
}

export const TableTag = new TagType<TableOptions>('Table');

/**
 * Maps a class onto a table. Without a name the class name is used.
 */
export function Table(nameOrOptions?: string | TableOptions): ClassDecorator {
  const options = typeof nameOrOptions === 'string' ? { name: nameOrOptions } : (nameOrOptions ?? {});
  return tagClass(TableTag.of(options));
}
