import { GeneratorException } from '../../core/exceptions/custom-exceptions';
import { DEFAULT_GENERATORS } from '../../shared/utils/constant';
import { TimestampGenerator } from '../generators/timestamp.generator';
import { Uuid7Generator, UuidGenerator } from '../generators/uuid.generator';
import { ValueGenerator } from './interfaces/value-generator.interface';

export class ValueGeneratorRegistry {
  private readonly generators = new Map<string, ValueGenerator>();

  static withDefaults(): ValueGeneratorRegistry {
    return new ValueGeneratorRegistry()
      .register(DEFAULT_GENERATORS.TIMESTAMP, new TimestampGenerator())
      .register(DEFAULT_GENERATORS.UUID, new UuidGenerator())
      .register(DEFAULT_GENERATORS.UUID_V7, new Uuid7Generator());
  }

  /** A plain function is wrapped as a generator applying on insert and update. */
  register(name: string, generator: ValueGenerator | ValueGenerator['generate']): this {
    this.generators.set(name, typeof generator === 'function' ? { generate: generator } : generator);
    return this;
  }

  find(name: string): ValueGenerator | undefined {
    return this.generators.get(name);
  }

  get(name: string, fieldName?: string): ValueGenerator {
    const generator = this.generators.get(name);
    if (!generator) {
      throw new GeneratorException(`No value generator registered under '${name}'`, name, fieldName);
    }
    return generator;
  }

  has(name: string): boolean {
    return this.generators.has(name);
  }
}
