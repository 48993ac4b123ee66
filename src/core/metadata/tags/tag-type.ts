/**
 * A declarative tag attached to a property or class.
 *
 * Tag types are identities: registries key validators and converters by the
 * `TagType` object, never by name. A tag type may itself carry other tags
 * (`composedOf`), which are resolved transitively when metadata is built.
 *
 * @example
 * const Audited = new TagType('Audited').composedOf(
 *   GeneratedTag.of({ generator: 'timestamp', onInsert: true, onUpdate: true }),
 * );
 */
export class TagType<TOptions = void> {
  private readonly composition: TagInstance[] = [];

  constructor(public readonly name: string) {}

  of(options: TOptions): TagInstance<TOptions> {
    return { type: this, options };
  }

  composedOf(...instances: TagInstance[]): this {
    this.composition.push(...instances);
    return this;
  }

  get composes(): readonly TagInstance[] {
    return this.composition;
  }

  toString(): string {
    return `@${this.name}`;
  }
}

export interface TagInstance<TOptions = unknown> {
  readonly type: TagType<TOptions>;
  readonly options: TOptions;
}

export function isTagOf<TOptions>(
  instance: TagInstance,
  type: TagType<TOptions>,
): instance is TagInstance<TOptions> {
  return instance.type === type;
}

/**
 * Depth-first expansion of directly attached tags through their composed tags.
 * Each tag type is visited once: the first occurrence wins and self-referencing
 * compositions terminate.
 */
export function resolveTags(direct: readonly TagInstance[]): TagInstance[] {
  const resolved: TagInstance[] = [];
  const visited = new Set<TagType<unknown>>();

  const walk = (instances: readonly TagInstance[]): void => {
    for (const instance of instances) {
      if (visited.has(instance.type)) continue;
      visited.add(instance.type);
      resolved.push(instance);
      walk(instance.type.composes);
    }
  };

  walk(direct);
  return resolved;
}
