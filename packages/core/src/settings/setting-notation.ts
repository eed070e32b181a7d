/**
 * Textual notation of settings inside a block body.
 *
 * A setting line is `<name> = <value>`, where the value is read against the
 * parameter's declared type:
 *
 * ```
 * input = @data.source
 * leftDelim = "<title>"
 * caseSensitive = false
 * hashFunction = SHA256
 * key = "c2VjcmV0"                      (bytes, base64)
 * url = $"https://host/<path>?q=<q>"
 * tags = ["a", @tag, $"<x>-b"]
 * customHeaders = {("Accept", "text/html"), ("Cookie", @cookie)}
 * ```
 */

import type { ParamSchema } from "../registry/descriptor.js";
import { decodeBase64, encodeBase64, isBase64 } from "./base64.js";
import type { BlockSetting, FixedSettingValue, SettingValue } from "./setting-types.js";
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

/** Raised for a setting line that does not follow the notation. */
export class NotationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotationError";
  }
}

/** Anything that can look up a parameter schema by name. */
export interface ParameterLookup {
  readonly id: string;
  readonly parameters: ReadonlyMap<string, ParamSchema>;
}

const SETTING_LINE_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;
const VARIABLE_PATTERN = /[A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*/y;
const INT_PATTERN = /-?\d+/y;
const FLOAT_PATTERN = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const WORD_PATTERN = /[A-Za-z_][A-Za-z0-9_]*/y;

const ESCAPES: Readonly<Record<string, string>> = {
  "\"": "\"",
  "\\": "\\",
  n: "\n",
  r: "\r",
  t: "\t",
};

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

/** Cursor over the value part of a setting line. */
class ValueReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  get atEnd(): boolean {
    this.skipWhitespace();
    return this.pos >= this.text.length;
  }

  peek(length = 1): string {
    this.skipWhitespace();
    return this.text.slice(this.pos, this.pos + length);
  }

  expect(token: string): void {
    if (this.peek(token.length) !== token) {
      throw new NotationError(`Expected '${token}' at column ${this.pos + 1}`);
    }
    this.pos += token.length;
  }

  /** Consume `token` if it comes next. */
  accept(token: string): boolean {
    if (this.peek(token.length) === token) {
      this.pos += token.length;
      return true;
    }
    return false;
  }

  match(pattern: RegExp, what: string): string {
    this.skipWhitespace();
    pattern.lastIndex = this.pos;
    const match = pattern.exec(this.text);
    if (match === null) {
      throw new NotationError(`Expected ${what} at column ${this.pos + 1}`);
    }
    this.pos += match[0].length;
    return match[0];
  }

  quoted(): string {
    this.expect("\"");
    let result = "";
    while (this.pos < this.text.length) {
      const ch = this.text.charAt(this.pos++);
      if (ch === "\"") {
        return result;
      }
      if (ch === "\\") {
        const escaped = ESCAPES[this.text.charAt(this.pos)];
        if (escaped === undefined) {
          throw new NotationError(`Unknown escape sequence at column ${this.pos}`);
        }
        result += escaped;
        this.pos++;
      } else {
        result += ch;
      }
    }
    throw new NotationError("Unterminated string literal");
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** A list item or dict value: a string literal, a variable or a template. */
function readElement(reader: ValueReader): SettingValue {
  if (reader.accept("@")) {
    return variable(reader.match(VARIABLE_PATTERN, "a variable name"));
  }
  if (reader.accept("$")) {
    return interpolated(reader.quoted());
  }
  return fixedString(reader.quoted());
}

function readList(reader: ValueReader): SettingValue {
  reader.expect("[");
  const items: SettingValue[] = [];
  if (!reader.accept("]")) {
    do {
      items.push(readElement(reader));
    } while (reader.accept(","));
    reader.expect("]");
  }
  return listOf(items);
}

function readDict(reader: ValueReader): SettingValue {
  reader.expect("{");
  const entries: (readonly [string, SettingValue])[] = [];
  if (!reader.accept("}")) {
    do {
      reader.expect("(");
      const key = reader.quoted();
      reader.expect(",");
      const value = readElement(reader);
      reader.expect(")");
      entries.push([key, value]);
    } while (reader.accept(","));
    reader.expect("}");
  }
  return dictOf(entries);
}

function readValue(reader: ValueReader, param: ParamSchema): SettingValue {
  if (reader.accept("@")) {
    return variable(reader.match(VARIABLE_PATTERN, "a variable name"));
  }
  if (reader.peek() === "$") {
    if (param.type !== "string") {
      throw new NotationError(`Interpolated values are only allowed for string parameters, ${param.name} is ${param.type}`);
    }
    reader.expect("$");
    return interpolated(reader.quoted());
  }

  switch (param.type) {
    case "string":
      return fixedString(reader.quoted());
    case "bytes": {
      const text = reader.quoted();
      if (!isBase64(text)) {
        throw new NotationError(`Expected base64 bytes for ${param.name}`);
      }
      return fixedBytes(decodeBase64(text));
    }
    case "int": {
      const value = Number(reader.match(INT_PATTERN, `an integer for ${param.name}`));
      if (!Number.isSafeInteger(value)) {
        throw new NotationError(`Integer out of range for ${param.name}`);
      }
      return fixedInt(value);
    }
    case "float": {
      const value = Number(reader.match(FLOAT_PATTERN, `a number for ${param.name}`));
      if (!Number.isFinite(value)) {
        throw new NotationError(`Number out of range for ${param.name}`);
      }
      return fixedFloat(value);
    }
    case "bool": {
      const word = reader.match(WORD_PATTERN, `true or false for ${param.name}`).toLowerCase();
      if (word !== "true" && word !== "false") {
        throw new NotationError(`Expected true or false for ${param.name}`);
      }
      return fixedBool(word === "true");
    }
    case "enum": {
      const token = reader.match(WORD_PATTERN, `one of ${(param.enumValues ?? []).join(", ")}`);
      if (!(param.enumValues ?? []).includes(token)) {
        throw new NotationError(`"${token}" is not one of ${(param.enumValues ?? []).join(", ")}`);
      }
      return fixedEnum(token);
    }
    case "list":
      return readList(reader);
    case "dict":
      return readDict(reader);
    default: {
      const _exhaustive: never = param.type;
      throw new NotationError(`Unsupported parameter type ${String(_exhaustive)}`);
    }
  }
}

/**
 * Parse the value part of a setting line against its parameter schema.
 *
 * @throws NotationError if the text is not a value of the declared type
 */
export function parseSettingValue(text: string, param: ParamSchema): SettingValue {
  const reader = new ValueReader(text);
  const value = readValue(reader, param);
  if (!reader.atEnd) {
    throw new NotationError(`Unexpected text after the value of ${param.name}`);
  }
  return value;
}

/**
 * Parse a full `<name> = <value>` line.
 *
 * @throws NotationError if the line is malformed or names an unknown parameter
 */
export function parseSettingLine(line: string, descriptor: ParameterLookup): BlockSetting {
  const match = SETTING_LINE_PATTERN.exec(line.trim());
  if (match === null) {
    throw new NotationError("Expected <name> = <value>");
  }
  const [, name = "", valueText = ""] = match;
  const param = descriptor.parameters.get(name);
  if (param === undefined) {
    throw new NotationError(`${descriptor.id} has no parameter named ${name}`);
  }
  return { name, value: parseSettingValue(valueText, param) };
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/** Quote a string the way {@link ValueReader.quoted} reads it back. */
export function quoteString(text: string): string {
  const escaped = text
    .replace(/\\/g, "\\\\")
    .replace(/"/g, "\\\"")
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
  return `"${escaped}"`;
}

function formatFixedValue(value: FixedSettingValue): string {
  switch (value.type) {
    case "string":
      return quoteString(value.value);
    case "enum":
      return value.value;
    case "int":
    case "float":
      return String(value.value);
    case "bool":
      return value.value ? "true" : "false";
    case "bytes":
      return quoteString(encodeBase64(value.value));
    default: {
      const _exhaustive: never = value;
      return _exhaustive;
    }
  }
}

/** Write a setting value in the notation {@link parseSettingValue} accepts. */
export function formatSettingValue(value: SettingValue): string {
  switch (value.kind) {
    case "fixed":
      return formatFixedValue(value);
    case "variable":
      return `@${value.name}`;
    case "interpolated":
      return `$${quoteString(value.template)}`;
    case "list":
      return `[${value.items.map(formatSettingValue).join(", ")}]`;
    case "dict":
      return `{${value.entries
        .map(([key, item]) => `(${quoteString(key)}, ${formatSettingValue(item)})`)
        .join(", ")}}`;
    default: {
      const _exhaustive: never = value;
      return _exhaustive;
    }
  }
}

/** Write a full setting line, without indentation. */
export function formatSettingLine(setting: BlockSetting): string {
  return `${setting.name} = ${formatSettingValue(setting.value)}`;
}
