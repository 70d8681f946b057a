/**
 * OPTIONS — Schema & Parser
 * =========================
 *
 * A schema is built once at startup and shared read-only by every request.
 * Building it validates every type spec and every default; the first bad
 * entry aborts construction.
 */

import { OptionValueError, SchemaError, errorMessage } from '../../common/errors.js';
import { convertValue, validateTypeSpec } from './options.typespec.js';
import type {
  Configuration,
  OptionDefinition,
  OptionDefinitions,
  OptionValue,
  ParseResult,
  RawParams,
} from './options.types.js';

export class OptionSchema {
  private readonly definitions: ReadonlyMap<string, Readonly<OptionDefinition>>;
  private readonly defaults: Configuration;

  private constructor(definitions: Map<string, Readonly<OptionDefinition>>) {
    this.definitions = definitions;
    this.defaults = Object.freeze(this.resolve({}));
  }

  /**
   * Validate definitions and build the schema. Throws SchemaError.
   */
  static build(definitions: OptionDefinitions): OptionSchema {
    const entries = new Map<string, Readonly<OptionDefinition>>();

    for (const [name, source] of Object.entries(definitions)) {
      // Own copy: later edits to the caller's object must not reach a validated schema.
      const def = deepFreeze(structuredClone(source));
      try {
        validateTypeSpec(def.type);
      } catch (err) {
        throw new SchemaError(`Invalid type spec for ${name}: ${errorMessage(err)}`);
      }

      if (def.default !== undefined) {
        try {
          convertValue(def.default, def.type);
        } catch (err) {
          throw new SchemaError(`Invalid default value for ${name}: ${errorMessage(err)}`);
        }
      }

      entries.set(name, def);
    }

    return new OptionSchema(entries);
  }

  get names(): string[] {
    return Array.from(this.definitions.keys());
  }

  get size(): number {
    return this.definitions.size;
  }

  definition(name: string): Readonly<OptionDefinition> | undefined {
    return this.definitions.get(name);
  }

  /**
   * Parse raw request arguments. Validation failures come back as a result,
   * never as a thrown error.
   */
  parse(raw: RawParams): ParseResult {
    const values: Record<string, string> = {};

    for (const [name, value] of Object.entries(raw)) {
      if (value === undefined) continue;
      if (!this.definitions.has(name)) {
        return { ok: false, error: `Unknown option ${name}` };
      }
      if (Array.isArray(value)) {
        return { ok: false, error: `Option ${name} was given more than once` };
      }
      values[name] = value;
    }

    try {
      return { ok: true, config: this.resolve(values) };
    } catch (err) {
      if (err instanceof OptionValueError) {
        return { ok: false, error: err.message };
      }
      throw err;
    }
  }

  /**
   * The all-default configuration, used to seed client-side UI state.
   */
  getDefaults(): Configuration {
    return structuredClone(this.defaults);
  }

  private resolve(values: Record<string, string>): Record<string, OptionValue | null> {
    const out: Record<string, OptionValue | null> = {};

    for (const [name, def] of this.definitions) {
      const raw = values[name] ?? def.default;
      if (raw === undefined) {
        out[name] = null;
        continue;
      }
      try {
        out[name] = convertValue(raw, def.type);
      } catch (err) {
        throw new OptionValueError(`Invalid value for ${name}: ${errorMessage(err)}`);
      }
    }

    return out;
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export function buildSchema(definitions: OptionDefinitions): OptionSchema {
  return OptionSchema.build(definitions);
}
