import 'reflect-metadata';
import { ValidationError, ValidationException } from '../../../src/core/exceptions/custom-exceptions';
import { MetadataCache } from '../../../src/core/metadata/metadata-cache';
import { TagType } from '../../../src/core/metadata/tags/tag-type';
import { tagProperty } from '../../../src/core/metadata/tags/tag-storage';
import { ValidationStage } from '../../../src/infrastructure/pipeline/validation.stage';
import { ValidatorRegistry } from '../../../src/infrastructure/registry/validator.registry';
import { Column } from '../../../src/shared/decorators/column.decorator';
import { Id } from '../../../src/shared/decorators/id.decorator';
import {
  Email,
  Length,
  Max,
  Min,
  NotBlank,
  NotNull,
  Pattern,
} from '../../../src/shared/decorators/validation.decorators';

const EvenTag = new TagType('Even');
const Even = (): PropertyDecorator => tagProperty(EvenTag.of());
const NestedTag = new TagType('Nested');
const Nested = (): PropertyDecorator => tagProperty(NestedTag.of());
const BrokenTag = new TagType('Broken');
const Broken = (): PropertyDecorator => tagProperty(BrokenTag.of());

class Product {
  @Id()
  id?: number;

  @NotNull()
  @NotBlank()
  name?: string;

  @Min(0)
  @Max(1000)
  price?: number;

  @Email()
  contact?: string;

  @Length({ min: 3, max: 5 })
  code?: string;

  @Pattern(/^[A-Z]+$/)
  sku?: string;
}

class Account {
  @Id()
  id?: number;

  @Length({ min: 5 })
  @Pattern(/^\d+$/)
  pin?: string;

  @NotNull({ message: 'a title is required' })
  title?: string;

  @Even()
  slots?: number;
}

class Audited {
  @Nested()
  reference?: string;

  @Column()
  @Broken()
  other?: string;
}

function product(values: Partial<Product>): Product {
  return Object.assign(new Product(), values);
}

describe('ValidationStage', () => {
  const cache = new MetadataCache();
  let validators: ValidatorRegistry;
  let stage: ValidationStage;

  beforeEach(() => {
    validators = ValidatorRegistry.withDefaults().register(EvenTag, {
      validate: (value, field) =>
        typeof value === 'number' && value % 2 !== 0 ? [`${field.fieldName} must be even`] : [],
    });
    stage = new ValidationStage(validators);
  });

  it('should report every violation in field order', () => {
    const invalid = product({ name: '  ', price: -5, contact: 'nope', code: 'ab', sku: 'abc' });

    const errors = stage.collect(invalid, cache.getMetadata(Product));

    expect(errors.map((error) => error.toString())).toEqual([
      'name: name cannot be blank',
      'price: price must be at least 0',
      'contact: contact must be a valid email address',
      'code: code length must be between 3 and 5',
      'sku: sku must match pattern /^[A-Z]+$/',
    ]);
  });

  it('should accept a valid instance', () => {
    const valid = product({ name: 'Lamp', price: 1000, contact: 'buyer@example.com', code: 'LMP', sku: 'LAMP' });

    expect(stage.collect(valid, cache.getMetadata(Product))).toEqual([]);
    expect(() => stage.assertValid(valid, cache.getMetadata(Product))).not.toThrow();
  });

  it('should only let NotNull fail on absent values', () => {
    const errors = stage.collect(product({}), cache.getMetadata(Product));

    expect(errors).toEqual([new ValidationError('name', 'name cannot be null')]);
  });

  it('should run every validator of one field', () => {
    const account = Object.assign(new Account(), { pin: 'ab', title: 'Main', slots: 3 });

    const errors = stage.collect(account, cache.getMetadata(Account));

    expect(errors.map((error) => error.message)).toEqual([
      'pin length must be at least 5',
      'pin must match pattern /^\\d+$/',
      'slots must be even',
    ]);
  });

  it('should prefer a custom message', () => {
    const account = Object.assign(new Account(), { pin: '12345' });

    expect(stage.collect(account, cache.getMetadata(Account))).toEqual([
      new ValidationError('title', 'a title is required'),
    ]);
  });

  it('should ignore tags without a registered validator', () => {
    const account = Object.assign(new Account(), { pin: '12345', title: 'Main', slots: 3 });

    expect(new ValidationStage(ValidatorRegistry.withDefaults()).collect(account, cache.getMetadata(Account))).toEqual(
      [],
    );
  });

  it('should throw one aggregate exception', () => {
    const invalid = product({ name: '', price: 2000 });

    expect(() => stage.assertValid(invalid, cache.getMetadata(Product))).toThrow(
      'Validation failed: name: name cannot be blank; price: price must be at most 1000',
    );
  });

  describe('validators that throw', () => {
    it('should merge a thrown ValidationException into the result', () => {
      validators.register(NestedTag, {
        validate: () => {
          throw new ValidationException([new ValidationError(null, 'reference is unknown')]);
        },
      });

      const errors = stage.collect(new Audited(), cache.getMetadata(Audited));

      expect(errors).toEqual([new ValidationError('reference', 'reference is unknown')]);
    });

    it('should propagate any other error', () => {
      validators.register(BrokenTag, {
        validate: () => {
          throw new TypeError('validator crashed');
        },
      });

      expect(() => stage.collect(new Audited(), cache.getMetadata(Audited))).toThrow(TypeError);
    });
  });
});
