import { ValidationError, ValidationException } from '../../core/exceptions/custom-exceptions';
import { EntityMetadata } from '../../core/metadata/entity-metadata';
import { ValidatorRegistry } from '../registry/validator.registry';

/**
 * Runs every registered validator on every field and reports all violations
 * at once. Nothing short-circuits: not validators on one field, not fields.
 */
export class ValidationStage {
  constructor(private readonly validators: ValidatorRegistry) {}

  collect(instance: object, metadata: EntityMetadata): ValidationError[] {
    const errors: ValidationError[] = [];

    for (const field of metadata.fields) {
      const value = field.getValue(instance);
      for (const { validator, options } of this.validators.validatorsFor(field)) {
        try {
          for (const message of validator.validate(value, field, options)) {
            errors.push(new ValidationError(field.fieldName, message));
          }
        } catch (error) {
          if (!(error instanceof ValidationException)) {
            throw error;
          }
          for (const nested of error.getErrors()) {
            errors.push(new ValidationError(nested.fieldName ?? field.fieldName, nested.message));
          }
        }
      }
    }

    return errors;
  }

  assertValid(instance: object, metadata: EntityMetadata): void {
    const errors = this.collect(instance, metadata);
    if (errors.length > 0) {
      throw new ValidationException(errors);
    }
  }
}
