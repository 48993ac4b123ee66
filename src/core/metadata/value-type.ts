export type ValueType = 'string' | 'number' | 'boolean' | 'date' | 'bigint' | 'json' | 'unknown';

/**
 * Maps the constructor emitted as `design:type` onto a value type.
 * Unions, interfaces and arrays are emitted as `Object`/`Array` and stay `unknown`.
 */
export function valueTypeFromDesignType(designType: unknown): ValueType {
  switch (designType) {
    case String:
      return 'string';
    case Number:
      return 'number';
    case Boolean:
      return 'boolean';
    case Date:
      return 'date';
    case BigInt:
      return 'bigint';
    default:
      return 'unknown';
  }
}

export type LiteralParseResult = { ok: true; value: unknown } | { ok: false; reason: string };

export function parseLiteral(literal: string, valueType: ValueType): LiteralParseResult {
  switch (valueType) {
    case 'number': {
      const parsed = Number(literal);
      return literal.trim() === '' || Number.isNaN(parsed)
        ? { ok: false, reason: `'${literal}' is not a number` }
        : { ok: true, value: parsed };
    }
    case 'boolean':
      return { ok: true, value: literal.trim().toLowerCase() === 'true' };
    case 'date': {
      const parsed = new Date(literal);
      return Number.isNaN(parsed.getTime())
        ? { ok: false, reason: `'${literal}' is not a valid date` }
        : { ok: true, value: parsed };
    }
    case 'bigint':
      try {
        return { ok: true, value: BigInt(literal) };
      } catch {
        return { ok: false, reason: `'${literal}' is not an integer` };
      }
    case 'json':
      try {
        return { ok: true, value: JSON.parse(literal) };
      } catch {
        return { ok: false, reason: `'${literal}' is not valid JSON` };
      }
    default:
      return { ok: true, value: literal };
  }
}

export function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}
