/**
 * Conversion of catalog defaults into setting values.
 */

import type { CatalogParameter } from "@blockscript/schema";
import { RegistryError } from "../errors.js";
import { decodeBase64, isBase64 } from "./base64.js";
import type { SettingValue } from "./setting-types.js";
import {
  dictOf,
  fixedBool,
  fixedBytes,
  fixedEnum,
  fixedFloat,
  fixedInt,
  fixedString,
  interpolated,
  listOf,
  variable,
} from "./setting-types.js";

function isStringArray(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isStringRecord(value: unknown): value is Readonly<Record<string, string>> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((item) => typeof item === "string")
  );
}

/**
 * The default value of a catalog parameter.
 * An absent default is the zero value of the parameter's type.
 *
 * @param owner - Block id, used in error messages
 * @throws RegistryError if the default does not fit the declared type
 */
export function defaultSettingValue(param: CatalogParameter, owner: string): SettingValue {
  const fail = (): never => {
    throw new RegistryError(
      `Default of ${owner}.${param.name} does not match its type ${param.type}: ${JSON.stringify(param.default)}`,
    );
  };
  const raw = param.default;
  const mode = param.defaultMode ?? "fixed";

  if (mode !== "fixed") {
    if (typeof raw !== "string") return fail();
    return mode === "variable" ? variable(raw) : interpolated(raw);
  }

  switch (param.type) {
    case "string":
      if (raw === undefined) return fixedString("");
      return typeof raw === "string" ? fixedString(raw) : fail();
    case "int":
      if (raw === undefined) return fixedInt(0);
      return typeof raw === "number" && Number.isSafeInteger(raw) ? fixedInt(raw) : fail();
    case "float":
      if (raw === undefined) return fixedFloat(0);
      return typeof raw === "number" && Number.isFinite(raw) ? fixedFloat(raw) : fail();
    case "bool":
      if (raw === undefined) return fixedBool(false);
      return typeof raw === "boolean" ? fixedBool(raw) : fail();
    case "enum": {
      const values = param.enumValues ?? [];
      const token = raw === undefined ? values[0] : raw;
      return typeof token === "string" && values.includes(token) ? fixedEnum(token) : fail();
    }
    case "bytes":
      if (raw === undefined) return fixedBytes(new Uint8Array(0));
      return typeof raw === "string" && isBase64(raw) ? fixedBytes(decodeBase64(raw)) : fail();
    case "list":
      if (raw === undefined) return listOf([]);
      return isStringArray(raw) ? listOf(raw.map(fixedString)) : fail();
    case "dict":
      if (raw === undefined) return dictOf([]);
      return isStringRecord(raw)
        ? dictOf(Object.entries(raw).map(([key, value]) => [key, fixedString(value)] as const))
        : fail();
    default: {
      const _exhaustive: never = param.type;
      return _exhaustive;
    }
  }
}
