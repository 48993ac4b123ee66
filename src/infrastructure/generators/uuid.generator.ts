import { v4 as uuidv4, v7 as uuidv7 } from 'uuid';
import { ValueGenerator } from '../registry/interfaces/value-generator.interface';

export class UuidGenerator implements ValueGenerator {
  generate(): string {
    return uuidv4();
  }
}

/** Time-ordered, so ids sort by creation. */
export class Uuid7Generator implements ValueGenerator {
  generate(): string {
    return uuidv7();
  }
}
