/**
 * Setting resolver: turns setting values into JavaScript expressions.
 *
 * Resolution happens only at generation time and never fails for a value
 * that passed decoding: type checks live in the notation parser.
 *
 * @example
 * ```ts
 * resolveValue(fixedString("hello"));          // "\"hello\""
 * resolveValue(variable("globals.token"));     // "globals[\"token\"]"
 * resolveValue(interpolated("Bearer <token>")); // "`Bearer ${token}`"
 * ```
 */

import { encodeBase64 } from "./base64.js";
import type { BlockSetting, FixedSettingValue, SettingValue } from "./setting-types.js";
import { variableExpression } from "./variable-names.js";

/** A `<name>` placeholder inside an interpolated template. */
const PLACEHOLDER_PATTERN = /<([A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*)>/g;

function escapeTemplateText(text: string): string {
  return text
    .replace(/\\/g, "\\\\")
    .replace(/`/g, "\\`")
    .replace(/\$\{/g, "\\${")
    .replace(/\r/g, "\\r")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

/** Build a template literal from an interpolated template. */
function resolveTemplate(template: string): string {
  let result = "";
  let last = 0;
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const index = match.index ?? 0;
    result += escapeTemplateText(template.slice(last, index));
    result += `\${${variableExpression(match[1] ?? "")}}`;
    last = index + match[0].length;
  }
  result += escapeTemplateText(template.slice(last));
  return `\`${result}\``;
}

function resolveFixed(value: FixedSettingValue): string {
  switch (value.type) {
    case "string":
    case "enum":
      return JSON.stringify(value.value);
    case "int":
    case "float":
      return String(value.value);
    case "bool":
      return value.value ? "true" : "false";
    case "bytes":
      return `Buffer.from(${JSON.stringify(encodeBase64(value.value))}, "base64")`;
    default: {
      const _exhaustive: never = value;
      return _exhaustive;
    }
  }
}

/** Resolve a setting value to a JavaScript expression. */
export function resolveValue(value: SettingValue): string {
  switch (value.kind) {
    case "fixed":
      return resolveFixed(value);
    case "variable":
      return variableExpression(value.name);
    case "interpolated":
      return resolveTemplate(value.template);
    case "list":
      return `[${value.items.map(resolveValue).join(", ")}]`;
    case "dict":
      if (value.entries.length === 0) {
        return "{}";
      }
      return `{ ${value.entries
        .map(([key, item]) => `${JSON.stringify(key)}: ${resolveValue(item)}`)
        .join(", ")} }`;
    default: {
      const _exhaustive: never = value;
      return _exhaustive;
    }
  }
}

/** Resolve a block setting to the expression passed as its argument. */
export function resolveSetting(setting: BlockSetting): string {
  return resolveValue(setting.value);
}
