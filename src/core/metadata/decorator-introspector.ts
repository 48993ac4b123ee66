import { TagInstance } from './tags/tag-type';
import { readDesignType, readOwnClassTags, readOwnPropertyKeys, readOwnPropertyTags } from './tags/tag-storage';

export interface IntrospectedProperty {
  propertyKey: string;
  designType: unknown;
  /** Tags attached directly, before composition is expanded. */
  tags: TagInstance[];
}

export interface IntrospectedType {
  name: string;
  classTags: TagInstance[];
  properties: IntrospectedProperty[];
}

/**
 * Reads what the decorators recorded on a class and its ancestors.
 * Base class properties come first; a subclass re-decorating a property
 * replaces its tags but keeps its position.
 */
export class DecoratorIntrospector {
  introspect(type: Function): IntrospectedType {
    const properties = new Map<string, IntrospectedProperty>();
    const lineage = this.lineageOf(type);

    for (const ctor of [...lineage].reverse()) {
      for (const key of readOwnPropertyKeys(ctor)) {
        if (typeof key !== 'string') continue;
        properties.set(key, {
          propertyKey: key,
          designType: readDesignType(ctor.prototype, key),
          tags: readOwnPropertyTags(ctor.prototype, key),
        });
      }
    }

    return {
      name: type.name,
      classTags: lineage.flatMap((ctor) => readOwnClassTags(ctor)),
      properties: [...properties.values()],
    };
  }

  /** The class first, then each ancestor up to (not including) Function.prototype. */
  private lineageOf(type: Function): Function[] {
    const lineage: Function[] = [];
    let current: unknown = type;
    while (typeof current === 'function' && current !== Function.prototype) {
      lineage.push(current);
      current = Object.getPrototypeOf(current);
    }
    return lineage;
  }
}
