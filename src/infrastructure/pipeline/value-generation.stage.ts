import { GeneratorException } from '../../core/exceptions/custom-exceptions';
import { EntityMetadata } from '../../core/metadata/entity-metadata';
import { FieldMetadata } from '../../core/metadata/field-metadata';
import { isAbsent } from '../../core/metadata/value-type';
import { GenerationContext } from '../registry/interfaces/value-generator.interface';
import { ValueGeneratorRegistry } from '../registry/value-generator.registry';

/**
 * Fills fields before a write. All `@DefaultValue` rules run first (insert only,
 * absent values only), then every `@Generated` rule whose flag matches the
 * operation overwrites its field.
 */
export class ValueGenerationStage {
  constructor(private readonly generators: ValueGeneratorRegistry) {}

  apply(instance: object, metadata: EntityMetadata, context: GenerationContext): void {
    if (context.operation === 'insert') {
      for (const field of metadata.fields) {
        this.applyDefault(instance, field, context);
      }
    }
    for (const field of metadata.fields) {
      this.applyGenerated(instance, field, context);
    }
  }

  private applyDefault(instance: object, field: FieldMetadata, context: GenerationContext): void {
    const rule = field.defaultValue;
    if (!rule || !isAbsent(field.getValue(instance))) {
      return;
    }
    const value =
      rule.generator !== undefined
        ? this.invoke(rule.generator, instance, field, context)
        : field.resolveLiteralDefault();
    field.setValue(instance, value);
  }

  private applyGenerated(instance: object, field: FieldMetadata, context: GenerationContext): void {
    const rule = field.generated;
    if (!rule) {
      return;
    }
    const generator = this.generators.get(rule.generator, field.fieldName);
    const applies =
      context.operation === 'insert'
        ? rule.onInsert && generator.appliesOnInsert !== false
        : rule.onUpdate && generator.appliesOnUpdate !== false;
    if (applies) {
      field.setValue(instance, this.invoke(rule.generator, instance, field, context));
    }
  }

  private invoke(name: string, instance: object, field: FieldMetadata, context: GenerationContext): unknown {
    const generator = this.generators.get(name, field.fieldName);
    try {
      return generator.generate(instance, field, context);
    } catch (error) {
      if (error instanceof GeneratorException) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new GeneratorException(
        `Generator '${name}' failed for ${field.entityName}.${field.fieldName}: ${reason}`,
        name,
        field.fieldName,
      );
    }
  }
}
