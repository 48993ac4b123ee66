import { HttpException, HttpStatus } from '@nestjs/common';

// Base custom exception class
export abstract class CustomException extends HttpException {
  constructor(
    message: string,
    statusCode: HttpStatus,
    public readonly errorCode: string,
    public readonly details?: unknown,
  ) {
    super(
      {
        message,
        errorCode,
        details,
      },
      statusCode,
    );
  }
}

// Metadata & Configuration Exceptions
export class MetadataException extends CustomException {
  constructor(entityName: string, message: string, details?: unknown) {
    super(
      `Invalid mapping on ${entityName}: ${message}`,
      HttpStatus.INTERNAL_SERVER_ERROR,
      'METADATA_ERROR',
      { entity: entityName, ...toDetailRecord(details) },
    );
  }
}

export class ConfigurationException extends CustomException {
  constructor(message: string, configKey?: string) {
    super(
      `Configuration error: ${message}`,
      HttpStatus.INTERNAL_SERVER_ERROR,
      'CONFIGURATION_ERROR',
      { configKey },
    );
  }
}

// Validation Exceptions
export class ValidationError {
  constructor(
    public readonly fieldName: string | null,
    public readonly message: string,
  ) {}

  toString(): string {
    return this.fieldName !== null ? `${this.fieldName}: ${this.message}` : this.message;
  }
}

export class ValidationException extends CustomException {
  private readonly errors: ValidationError[];

  constructor(errors: ValidationError[] | string) {
    const list = typeof errors === 'string' ? [new ValidationError(null, errors)] : [...errors];
    super(
      `Validation failed: ${list.map((error) => error.toString()).join('; ')}`,
      HttpStatus.UNPROCESSABLE_ENTITY,
      'VALIDATION_ERROR',
      list.map((error) => ({ field: error.fieldName, message: error.message })),
    );
    this.errors = list;
  }

  getErrors(): ValidationError[] {
    return [...this.errors];
  }
}

export interface BatchItemValidationFailure {
  index: number;
  exception: ValidationException;
}

export class BatchValidationException extends ValidationException {
  constructor(public readonly failures: BatchItemValidationFailure[]) {
    super(
      failures.flatMap(({ index, exception }) =>
        exception
          .getErrors()
          .map((error) => new ValidationError(error.fieldName, `[item ${index}] ${error.message}`)),
      ),
    );
  }

  getFailedIndexes(): number[] {
    return this.failures.map((failure) => failure.index);
  }
}

// Pipeline Exceptions
export class GeneratorException extends CustomException {
  constructor(message: string, generatorName?: string, fieldName?: string) {
    super(message, HttpStatus.INTERNAL_SERVER_ERROR, 'GENERATOR_ERROR', {
      generator: generatorName,
      field: fieldName,
    });
  }
}

export class MappingException extends CustomException {
  constructor(
    public readonly fieldName: string,
    public readonly declaredType: string,
    public readonly value: unknown,
    reason?: string,
  ) {
    const actualType = describeRuntimeType(value);
    super(
      `Cannot assign ${formatValue(value)} (${actualType}) to field '${fieldName}' of type ${declaredType}${reason ? `: ${reason}` : ''}`,
      HttpStatus.INTERNAL_SERVER_ERROR,
      'MAPPING_ERROR',
      { field: fieldName, declaredType, value, actualType },
    );
  }
}

// Precondition Exceptions
export class QueryOnlyEntityException extends CustomException {
  constructor(entityName: string, operation: string) {
    super(
      `Cannot ${operation} query-only entity ${entityName}`,
      HttpStatus.BAD_REQUEST,
      'QUERY_ONLY_ENTITY',
      { entity: entityName, operation },
    );
  }
}

export class MissingIdException extends CustomException {
  constructor(entityName: string, operation: string, reason = 'has no @Id field') {
    super(
      `Cannot ${operation} ${entityName}: entity ${reason}`,
      HttpStatus.BAD_REQUEST,
      'MISSING_ID',
      { entity: entityName, operation },
    );
  }
}

export class InvalidPageRequestException extends CustomException {
  constructor(problem: string, details: Record<string, number>) {
    super(`Invalid page request: ${problem}`, HttpStatus.BAD_REQUEST, 'INVALID_PAGE_REQUEST', details);
  }
}

export function describeRuntimeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'Date';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return `"${value}"`;
  if (typeof value === 'bigint') return `${value}n`;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  if (value !== null && typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[object]';
    }
  }
  return String(value);
}

function toDetailRecord(details: unknown): Record<string, unknown> {
  return details !== null && typeof details === 'object' ? { ...details } : {};
}
