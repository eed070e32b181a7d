/**
 * TypeScript types for the block catalog format.
 *
 * These types are aligned with block-catalog.schema.json: the JSON Schema
 * is the source of truth. When updating, change the schema first, then
 * update these types to match.
 */

// ---------------------------------------------------------------------------
// Parameter types
// ---------------------------------------------------------------------------

/**
 * The value types a block parameter can declare.
 *
 * - `string`, `int`, `float`, `bool`, `bytes`: scalar values
 * - `enum`: one token out of the parameter's `enumValues`
 * - `list`: an ordered list of strings
 * - `dict`: a string → string mapping
 */
export type ParameterType =
  | "string"
  | "int"
  | "float"
  | "bool"
  | "enum"
  | "bytes"
  | "list"
  | "dict";

/** What a function block hands back to the script. `void` means nothing. */
export type ReturnType = Exclude<ParameterType, "enum"> | "void";

/**
 * How a parameter's `default` is interpreted.
 *
 * - `fixed` (default): a literal of the parameter's type
 * - `variable`: the name of a variable to read
 * - `interpolated`: a template string with `<variable>` placeholders
 */
export type DefaultMode = "fixed" | "variable" | "interpolated";

/**
 * A literal default value as written in a catalog file.
 * Bytes are written as base64 strings, dicts as plain string maps.
 */
export type CatalogFixedDefault =
  | string
  | number
  | boolean
  | readonly string[]
  | Readonly<Record<string, string>>;

/** A single parameter of a catalog block. */
export interface CatalogParameter {
  /** Parameter name, a valid identifier. Setting lines use it as the key. */
  readonly name: string;
  readonly type: ParameterType;
  /** Default value. Absent means the zero value of `type`. */
  readonly default?: CatalogFixedDefault;
  readonly defaultMode?: DefaultMode;
  /** Allowed tokens. Required when `type` is `enum`. */
  readonly enumValues?: readonly string[];
  readonly description?: string;
}

// ---------------------------------------------------------------------------
// Blocks
// ---------------------------------------------------------------------------

/**
 * The block families the compiler knows how to handle.
 * Every catalog block belongs to exactly one family, which fixes its
 * text grammar and how it is turned into code.
 */
export type BlockFamily = "parse" | "function" | "condition" | "request" | "code";

/**
 * A block descriptor as written in a catalog file.
 *
 * @example
 * ```json
 * {
 *   "id": "HashString",
 *   "family": "function",
 *   "name": "Hash String",
 *   "callee": "hashString",
 *   "returnType": "string",
 *   "parameters": [
 *     { "name": "input", "type": "string" },
 *     { "name": "hashFunction", "type": "enum", "enumValues": ["MD5", "SHA256"] }
 *   ]
 * }
 * ```
 */
export interface CatalogBlock {
  /** Stable kind id, used in `BLOCK:<id>` headers. */
  readonly id: string;
  readonly family: BlockFamily;
  /** Human-readable name. Also the default label of new instances. */
  readonly name: string;
  readonly category?: string;
  readonly description?: string;
  /** Runtime function called by `function` blocks. */
  readonly callee?: string;
  /** Value produced by `function` blocks. */
  readonly returnType?: ReturnType;
  /** Whether the callee returns a promise that must be awaited. */
  readonly async?: boolean;
  /** Parameters, in the order they are written and passed. */
  readonly parameters: readonly CatalogParameter[];
}

// ---------------------------------------------------------------------------
// Top-level catalog
// ---------------------------------------------------------------------------

/**
 * A block catalog file: the top-level structure of a `*.blocks.json` file.
 */
export interface BlockCatalog {
  readonly $schema?: string;
  /** Format version. Only `1` exists. */
  readonly version: 1;
  readonly blocks: readonly CatalogBlock[];
}
