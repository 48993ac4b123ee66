import { TagType } from '../../core/metadata/tags/tag-type';
import { tagProperty } from '../../core/metadata/tags/tag-storage';

export interface IdOptions {
  /** Value is assigned by the database and read back after INSERT. */
  generated: boolean;
}

export const IdTag = new TagType<IdOptions>('Id');

export function Id(options: Partial<IdOptions> = {}): PropertyDecorator {
  return tagProperty(IdTag.of({ generated: options.generated ?? false }));
}

export const GeneratedId = (): PropertyDecorator => Id({ generated: true });
