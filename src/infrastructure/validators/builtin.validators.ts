import { isDefined, isEmail, isNotEmpty, matches, max, maxLength, min, minLength } from 'class-validator';
import { FieldMetadata } from '../../core/metadata/field-metadata';
import { isAbsent } from '../../core/metadata/value-type';
import {
  BoundOptions,
  LengthOptions,
  MessageOptions,
  PatternOptions,
} from '../../shared/decorators/validation.decorators';
import { FieldValidator } from '../registry/interfaces/field-validator.interface';

// Absent values pass every validator except NotNull.

export class NotNullValidator implements FieldValidator<MessageOptions> {
  validate(value: unknown, field: FieldMetadata, options: MessageOptions): string[] {
    return isDefined(value) ? [] : [options.message ?? `${field.fieldName} cannot be null`];
  }
}

export class NotBlankValidator implements FieldValidator<MessageOptions> {
  validate(value: unknown, field: FieldMetadata, options: MessageOptions): string[] {
    if (isAbsent(value) || isNotEmpty(String(value).trim())) return [];
    return [options.message ?? `${field.fieldName} cannot be blank`];
  }
}

export class MinValidator implements FieldValidator<BoundOptions> {
  validate(value: unknown, field: FieldMetadata, options: BoundOptions): string[] {
    if (isAbsent(value) || min(toNumber(value), options.value)) return [];
    return [options.message ?? `${field.fieldName} must be at least ${options.value}`];
  }
}

export class MaxValidator implements FieldValidator<BoundOptions> {
  validate(value: unknown, field: FieldMetadata, options: BoundOptions): string[] {
    if (isAbsent(value) || max(toNumber(value), options.value)) return [];
    return [options.message ?? `${field.fieldName} must be at most ${options.value}`];
  }
}

export class LengthValidator implements FieldValidator<LengthOptions> {
  validate(value: unknown, field: FieldMetadata, options: LengthOptions): string[] {
    if (isAbsent(value)) return [];
    const text = String(value);
    const tooShort = options.min !== undefined && !minLength(text, options.min);
    const tooLong = options.max !== undefined && !maxLength(text, options.max);
    if (!tooShort && !tooLong) return [];
    if (options.message) return [options.message];

    if (options.min !== undefined && options.max !== undefined) {
      return [`${field.fieldName} length must be between ${options.min} and ${options.max}`];
    }
    return tooShort
      ? [`${field.fieldName} length must be at least ${options.min}`]
      : [`${field.fieldName} length must be at most ${options.max}`];
  }
}

export class EmailValidator implements FieldValidator<MessageOptions> {
  validate(value: unknown, field: FieldMetadata, options: MessageOptions): string[] {
    if (isAbsent(value) || isEmail(value)) return [];
    return [options.message ?? `${field.fieldName} must be a valid email address`];
  }
}

export class PatternValidator implements FieldValidator<PatternOptions> {
  validate(value: unknown, field: FieldMetadata, options: PatternOptions): string[] {
    if (isAbsent(value) || matches(String(value), new RegExp(options.regexp, options.flags))) return [];
    return [options.message ?? `${field.fieldName} must match pattern /${options.regexp}/`];
  }
}

function toNumber(value: unknown): unknown {
  return typeof value === 'bigint' || typeof value === 'string' ? Number(value) : value;
}
