import { TagType } from '../../core/metadata/tags/tag-type';
import { tagProperty } from '../../core/metadata/tags/tag-storage';
import { DEFAULT_GENERATORS } from '../utils/constant';

export interface GeneratedOptions {
  generator: string;
  onInsert: boolean;
  onUpdate: boolean;
}

export const GeneratedTag = new TagType<GeneratedOptions>('Generated');

/**
 * Overwrites the field with the named generator's output on every matching write.
 */
export function Generated(
  generator: string,
  options: Partial<Omit<GeneratedOptions, 'generator'>> = {},
): PropertyDecorator {
  return tagProperty(
    GeneratedTag.of({
      generator,
      onInsert: options.onInsert ?? true,
      onUpdate: options.onUpdate ?? false,
    }),
  );
}

export const CreatedAtTag = new TagType('CreatedAt').composedOf(
  GeneratedTag.of({ generator: DEFAULT_GENERATORS.TIMESTAMP, onInsert: true, onUpdate: false }),
);

export const UpdatedAtTag = new TagType('UpdatedAt').composedOf(
  GeneratedTag.of({ generator: DEFAULT_GENERATORS.TIMESTAMP, onInsert: true, onUpdate: true }),
);

export const CreatedAt = (): PropertyDecorator => tagProperty(CreatedAtTag.of());

export const UpdatedAt = (): PropertyDecorator => tagProperty(UpdatedAtTag.of());
