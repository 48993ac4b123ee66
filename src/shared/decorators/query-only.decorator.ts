import { TagType } from '../../core/metadata/tags/tag-type';
import { tagClass } from '../../core/metadata/tags/tag-storage';

export const QueryOnlyTag = new TagType('QueryOnly');

/**
 * Marks a projection: rows can be mapped into it but it is never written or counted.
 */
export const QueryOnly = (): ClassDecorator => tagClass(QueryOnlyTag.of());
