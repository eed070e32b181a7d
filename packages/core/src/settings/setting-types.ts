/**
 * The setting value model: the current value bound to one block parameter.
 *
 * A value is kept symbolic until code generation: a fixed literal, a
 * variable reference, an interpolated template, or a list / dict of those.
 */

import type { ParameterType } from "@blockscript/schema";

/** Parameter types whose fixed values are single literals. */
export type ScalarType = Exclude<ParameterType, "list" | "dict">;

/** A literal of a scalar parameter type. */
export type FixedSettingValue =
  | { readonly kind: "fixed"; readonly type: "string" | "enum"; readonly value: string }
  | { readonly kind: "fixed"; readonly type: "int" | "float"; readonly value: number }
  | { readonly kind: "fixed"; readonly type: "bool"; readonly value: boolean }
  | { readonly kind: "fixed"; readonly type: "bytes"; readonly value: Uint8Array };

/** A read of a variable, e.g. `@data.source` or `@globals.token`. */
export interface VariableSettingValue {
  readonly kind: "variable";
  readonly name: string;
}

/** A string template whose `<name>` placeholders are replaced by variables. */
export interface InterpolatedSettingValue {
  readonly kind: "interpolated";
  readonly template: string;
}

/** An ordered list of string-like values. */
export interface ListSettingValue {
  readonly kind: "list";
  readonly items: readonly SettingValue[];
}

/** An ordered string-keyed mapping of string-like values. */
export interface DictSettingValue {
  readonly kind: "dict";
  readonly entries: readonly (readonly [string, SettingValue])[];
}

/**
 * A setting value: discriminated union on `kind`.
 *
 * - `"fixed"` → {@link FixedSettingValue}
 * - `"variable"` → {@link VariableSettingValue}
 * - `"interpolated"` → {@link InterpolatedSettingValue}
 * - `"list"` / `"dict"` → collections of the above
 */
export type SettingValue =
  | FixedSettingValue
  | VariableSettingValue
  | InterpolatedSettingValue
  | ListSettingValue
  | DictSettingValue;

/** A parameter name bound to its current value on one block instance. */
export interface BlockSetting {
  readonly name: string;
  value: SettingValue;
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function fixedString(value: string): FixedSettingValue {
  return { kind: "fixed", type: "string", value };
}

export function fixedEnum(value: string): FixedSettingValue {
  return { kind: "fixed", type: "enum", value };
}

export function fixedInt(value: number): FixedSettingValue {
  return { kind: "fixed", type: "int", value };
}

export function fixedFloat(value: number): FixedSettingValue {
  return { kind: "fixed", type: "float", value };
}

export function fixedBool(value: boolean): FixedSettingValue {
  return { kind: "fixed", type: "bool", value };
}

export function fixedBytes(value: Uint8Array): FixedSettingValue {
  return { kind: "fixed", type: "bytes", value };
}

export function variable(name: string): VariableSettingValue {
  return { kind: "variable", name };
}

export function interpolated(template: string): InterpolatedSettingValue {
  return { kind: "interpolated", template };
}

export function listOf(items: readonly SettingValue[]): ListSettingValue {
  return { kind: "list", items };
}

export function dictOf(entries: readonly (readonly [string, SettingValue])[]): DictSettingValue {
  return { kind: "dict", entries };
}

// ---------------------------------------------------------------------------
// Comparison
// ---------------------------------------------------------------------------

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

/** Structural equality of two setting values. */
export function settingValuesEqual(a: SettingValue, b: SettingValue): boolean {
  switch (a.kind) {
    case "fixed":
      if (b.kind !== "fixed" || a.type !== b.type) return false;
      if (a.value instanceof Uint8Array || b.value instanceof Uint8Array) {
        return a.value instanceof Uint8Array && b.value instanceof Uint8Array && bytesEqual(a.value, b.value);
      }
      return a.value === b.value;
    case "variable":
      return b.kind === "variable" && a.name === b.name;
    case "interpolated":
      return b.kind === "interpolated" && a.template === b.template;
    case "list":
      return (
        b.kind === "list" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => {
          const other = b.items[i];
          return other !== undefined && settingValuesEqual(item, other);
        })
      );
    case "dict":
      return (
        b.kind === "dict" &&
        a.entries.length === b.entries.length &&
        a.entries.every(([key, value], i) => {
          const other = b.entries[i];
          return other !== undefined && other[0] === key && settingValuesEqual(value, other[1]);
        })
      );
    default: {
      const _exhaustive: never = a;
      return _exhaustive;
    }
  }
}
