/**
 * OPTIONS — Types
 * ===============
 *
 * Declarative description of the display options an embed accepts as URL
 * query arguments.
 */

// ═══════════════════════════════════════════════════════════════
// TYPE SPECS
// ═══════════════════════════════════════════════════════════════

export interface StringSpec {
  type: 'string';
}

export interface IntSpec {
  type: 'int';
  min?: number;
  max?: number;
}

export interface BoolSpec {
  type: 'bool';
}

export interface UrlSpec {
  type: 'url';
}

/** Hex triplet or sextuplet without `#`; converted to `#rrggbb`. */
export interface ColorSpec {
  type: 'color';
}

export interface EnumSpec {
  type: 'enum';
  values: readonly string[];
}

export interface ListSpec {
  type: 'list';
  of: TypeSpec;
}

export type TypeSpec =
  | StringSpec
  | IntSpec
  | BoolSpec
  | UrlSpec
  | ColorSpec
  | EnumSpec
  | ListSpec;

export type TypeTag = TypeSpec['type'];

export const TYPE_TAGS: readonly TypeTag[] = ['string', 'int', 'bool', 'url', 'color', 'enum', 'list'];

// ═══════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════

export type OptionValue = string | number | boolean | OptionValue[];

/** Option name → converted value, or null when absent without default. */
export type Configuration = Readonly<Record<string, OptionValue | null>>;

// ═══════════════════════════════════════════════════════════════
// DEFINITIONS
// ═══════════════════════════════════════════════════════════════

export interface OptionDefinition {
  type: TypeSpec;
  /** Raw string form, converted like a request value. */
  default?: string;
  description?: string;
}

export type OptionDefinitions = Record<string, OptionDefinition>;

/** One raw value per name; arrays come from repeated query keys. */
export type RawParams = Record<string, string | string[] | undefined>;

export type ParseResult =
  | { ok: true; config: Configuration }
  | { ok: false; error: string };
