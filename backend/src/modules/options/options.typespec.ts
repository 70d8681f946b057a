/**
 * OPTIONS — Type Specs
 * ====================
 *
 * Structural validation of type specs and conversion of raw query strings
 * into typed values.
 */

import { OptionValueError, SchemaError, errorMessage } from '../../common/errors.js';
import { TYPE_TAGS, type OptionValue, type TypeSpec, type TypeTag } from './options.types.js';

const INT_PATTERN = /^[+-]?\d+$/;
const COLOR_PATTERN = /^(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isTypeTag(tag: string): tag is TypeTag {
  return TYPE_TAGS.some((t) => t === tag);
}

function rejectExtraParams(tag: TypeTag, spec: Record<string, unknown>, allowed: readonly string[]) {
  const extra = Object.keys(spec).filter((k) => k !== 'type' && !allowed.includes(k));
  if (extra.length === 0) return;

  if (allowed.length === 0) {
    throw new SchemaError(`${tag} type does not accept parameters (got ${extra.join(', ')})`);
  }
  throw new SchemaError(`Unexpected parameter for ${tag} type: ${extra.join(', ')}`);
}

function checkBound(name: 'min' | 'max', value: unknown): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw new SchemaError(`int ${name} must be an integer`);
  }
  return value;
}

// ═══════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════

/**
 * Check that a type spec is well formed. Only the shape is checked; no
 * value is evaluated. Throws SchemaError otherwise.
 */
export function validateTypeSpec(spec: unknown): asserts spec is TypeSpec {
  if (!isRecord(spec)) {
    throw new SchemaError('Type spec must be an object');
  }

  const tag = spec.type;
  if (typeof tag !== 'string') {
    throw new SchemaError('Type spec must have a string "type" tag');
  }
  if (!isTypeTag(tag)) {
    throw new SchemaError(`Unknown type "${tag}"`);
  }

  switch (tag) {
    case 'string':
    case 'bool':
    case 'url':
    case 'color':
      rejectExtraParams(tag, spec, []);
      return;

    case 'int': {
      rejectExtraParams(tag, spec, ['min', 'max']);
      const min = checkBound('min', spec.min);
      const max = checkBound('max', spec.max);
      if (min !== undefined && max !== undefined && min > max) {
        throw new SchemaError(`int min (${min}) is greater than max (${max})`);
      }
      return;
    }

    case 'enum': {
      rejectExtraParams(tag, spec, ['values']);
      const values = spec.values;
      if (!Array.isArray(values) || values.length === 0) {
        throw new SchemaError('enum type requires a non-empty list of string values');
      }
      const seen = new Set<string>();
      for (const v of values) {
        if (typeof v !== 'string' || v.length === 0) {
          throw new SchemaError('enum values must be non-empty strings');
        }
        if (seen.has(v)) {
          throw new SchemaError(`Duplicate enum value "${v}"`);
        }
        seen.add(v);
      }
      return;
    }

    case 'list':
      rejectExtraParams(tag, spec, ['of']);
      try {
        validateTypeSpec(spec.of);
      } catch (err) {
        throw new SchemaError(`Invalid type spec for list: ${errorMessage(err)}`);
      }
      return;

    default: {
      const unreachable: never = tag;
      throw new SchemaError(`Unknown type "${String(unreachable)}"`);
    }
  }
}

// ═══════════════════════════════════════════════════════════════
// CONVERSION
// ═══════════════════════════════════════════════════════════════

function convertInt(raw: string, min?: number, max?: number): number {
  if (!INT_PATTERN.test(raw)) {
    throw new OptionValueError(`Invalid integer: ${raw}`);
  }
  const n = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(n)) {
    throw new OptionValueError(`Integer out of range: ${raw}`);
  }
  if (min !== undefined && n < min) {
    throw new OptionValueError(`Value ${n} is below the minimum of ${min}`);
  }
  if (max !== undefined && n > max) {
    throw new OptionValueError(`Value ${n} is above the maximum of ${max}`);
  }
  return n;
}

function convertBool(raw: string): boolean {
  const lower = raw.toLowerCase();
  if (lower === 'true') return true;
  if (lower === '' || lower === 'false') return false;
  throw new OptionValueError(`Invalid boolean: ${raw}`);
}

function convertColor(raw: string): string {
  if (raw.length === 0) {
    throw new OptionValueError('Invalid color: empty value');
  }
  if (!COLOR_PATTERN.test(raw)) {
    throw new OptionValueError(`Invalid color: ${raw} (expected 3 or 6 hex digits without "#")`);
  }
  const hex = raw.toLowerCase();
  if (hex.length === 3) {
    return '#' + hex.split('').map((d) => d + d).join('');
  }
  return '#' + hex;
}

/**
 * Convert a raw string into the value described by `spec`. The spec must
 * already have passed validateTypeSpec. Throws OptionValueError.
 */
export function convertValue(raw: string, spec: TypeSpec): OptionValue {
  switch (spec.type) {
    case 'string':
    case 'url':
      return raw;

    case 'int':
      return convertInt(raw, spec.min, spec.max);

    case 'bool':
      return convertBool(raw);

    case 'color':
      return convertColor(raw);

    case 'enum':
      if (!spec.values.includes(raw)) {
        throw new OptionValueError(`Invalid value ${raw}, must be one of: ${spec.values.join(', ')}`);
      }
      return raw;

    case 'list':
      if (raw === '') return [];
      return raw.split(',').map((item) => convertValue(item.trim(), spec.of));

    default: {
      const unreachable: never = spec;
      throw new OptionValueError(`Unsupported type spec ${JSON.stringify(unreachable)}`);
    }
  }
}
