import 'reflect-metadata';
import {
  CLASS_TAGS_KEY,
  DESIGN_TYPE_KEY,
  PROPERTY_KEYS_KEY,
  PROPERTY_TAGS_KEY,
} from '../../../shared/utils/constant';
import { TagInstance } from './tag-type';

/**
 * Decorator-side storage. Decorators only record what they were given; every
 * check on tag combinations happens later, when metadata for the type is built.
 *
 * Stacked decorators are applied bottom-up, so tags are prepended to keep the
 * order in which they appear in source.
 */
export function tagProperty(...instances: TagInstance[]): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    const ctor = target.constructor;
    const keys: Array<string | symbol> = Reflect.getOwnMetadata(PROPERTY_KEYS_KEY, ctor) ?? [];
    if (!keys.includes(propertyKey)) {
      Reflect.defineMetadata(PROPERTY_KEYS_KEY, [...keys, propertyKey], ctor);
    }

    const tags: TagInstance[] = Reflect.getOwnMetadata(PROPERTY_TAGS_KEY, target, propertyKey) ?? [];
    Reflect.defineMetadata(PROPERTY_TAGS_KEY, [...instances, ...tags], target, propertyKey);
  };
}

export function tagClass(...instances: TagInstance[]): ClassDecorator {
  return (target: Function) => {
    const tags: TagInstance[] = Reflect.getOwnMetadata(CLASS_TAGS_KEY, target) ?? [];
    Reflect.defineMetadata(CLASS_TAGS_KEY, [...instances, ...tags], target);
  };
}

export function readOwnPropertyKeys(ctor: Function): Array<string | symbol> {
  return Reflect.getOwnMetadata(PROPERTY_KEYS_KEY, ctor) ?? [];
}

export function readOwnPropertyTags(prototype: object, propertyKey: string | symbol): TagInstance[] {
  return Reflect.getOwnMetadata(PROPERTY_TAGS_KEY, prototype, propertyKey) ?? [];
}

export function readOwnClassTags(ctor: Function): TagInstance[] {
  return Reflect.getOwnMetadata(CLASS_TAGS_KEY, ctor) ?? [];
}

export function readDesignType(prototype: object, propertyKey: string | symbol): unknown {
  return Reflect.getOwnMetadata(DESIGN_TYPE_KEY, prototype, propertyKey);
}
