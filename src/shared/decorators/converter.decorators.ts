import { TagType } from '../../core/metadata/tags/tag-type';
import { tagProperty } from '../../core/metadata/tags/tag-storage';

export type EnumStorage = 'string' | 'ordinal';

export interface EnumColumnOptions {
  values: readonly string[];
  storage: EnumStorage;
}

export const JsonTag = new TagType('Json');
export const EnumColumnTag = new TagType<EnumColumnOptions>('EnumColumn');
export const BooleanColumnTag = new TagType('BooleanColumn');

/** Stores the field as serialized JSON text and parses it back on read. */
export const Json = (): PropertyDecorator => tagProperty(JsonTag.of());

/**
 * Accepts a string-valued TypeScript enum or a list of members.
 * `ordinal` stores the member's position in that list.
 */
export function EnumColumn(
  members: Record<string, string> | readonly string[],
  storage: EnumStorage = 'string',
): PropertyDecorator {
  const values = isMemberList(members) ? [...members] : Object.values(members);
  return tagProperty(EnumColumnTag.of({ values, storage }));
}

function isMemberList(members: Record<string, string> | readonly string[]): members is readonly string[] {
  return Array.isArray(members);
}

/** Stores booleans as 1/0 and reads back any truthy number or string. */
export const BooleanColumn = (): PropertyDecorator => tagProperty(BooleanColumnTag.of());
