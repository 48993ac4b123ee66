import { TagType } from '../../core/metadata/tags/tag-type';
import { tagProperty } from '../../core/metadata/tags/tag-storage';

export const TransientTag = new TagType('Transient');

export const Transient = (): PropertyDecorator => tagProperty(TransientTag.of());
