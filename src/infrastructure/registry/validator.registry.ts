import { FieldMetadata } from '../../core/metadata/field-metadata';
import { TagType } from '../../core/metadata/tags/tag-type';
import {
  EmailTag,
  LengthTag,
  MaxTag,
  MinTag,
  NotBlankTag,
  NotNullTag,
  PatternTag,
} from '../../shared/decorators/validation.decorators';
import {
  EmailValidator,
  LengthValidator,
  MaxValidator,
  MinValidator,
  NotBlankValidator,
  NotNullValidator,
  PatternValidator,
} from '../validators/builtin.validators';
import { FieldValidator } from './interfaces/field-validator.interface';

export interface BoundValidator {
  tagType: TagType<unknown>;
  validator: FieldValidator;
  options: unknown;
}

export class ValidatorRegistry {
  private readonly validators = new Map<TagType<unknown>, FieldValidator>();

  static withDefaults(): ValidatorRegistry {
    return new ValidatorRegistry()
      .register(NotNullTag, new NotNullValidator())
      .register(NotBlankTag, new NotBlankValidator())
      .register(MinTag, new MinValidator())
      .register(MaxTag, new MaxValidator())
      .register(LengthTag, new LengthValidator())
      .register(EmailTag, new EmailValidator())
      .register(PatternTag, new PatternValidator());
  }

  register<TOptions>(tagType: TagType<TOptions>, validator: FieldValidator<TOptions>): this {
    this.validators.set(tagType, validator);
    return this;
  }

  find(tagType: TagType<unknown>): FieldValidator | undefined {
    return this.validators.get(tagType);
  }

  has(tagType: TagType<unknown>): boolean {
    return this.validators.has(tagType);
  }

  validatorsFor(field: FieldMetadata): BoundValidator[] {
    const bound: BoundValidator[] = [];
    for (const tag of field.tags) {
      const validator = this.validators.get(tag.type);
      if (validator) {
        bound.push({ tagType: tag.type, validator, options: tag.options });
      }
    }
    return bound;
  }
}
