/**
 * Variable naming rules shared by the notation, the resolver and the
 * output-producing blocks.
 *
 * Names under `globals.` live in the runtime's persistent store instead of
 * the generated program's local scope. They are never declared and are read
 * and written through the store accessor.
 */

/** Prefix that marks a variable as living in the persistent global store. */
export const GLOBALS_PREFIX = "globals.";

const RESERVED_WORDS = new Set([
  "await", "break", "case", "catch", "class", "const", "continue", "debugger",
  "default", "delete", "do", "else", "enum", "export", "extends", "false",
  "finally", "for", "function", "if", "implements", "import", "in",
  "instanceof", "interface", "let", "new", "null", "package", "private",
  "protected", "public", "return", "static", "super", "switch", "this",
  "throw", "true", "try", "typeof", "var", "void", "while", "with", "yield",
]);

/** Names the runtime template declares around the generated program. */
const RUNTIME_NAMES = new Set(["data", "globals"]);

/** Pattern of a variable reference: a dotted path of identifiers. */
export const VARIABLE_PATH_PATTERN = /^[A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*$/;

/** Check whether a variable name refers to the persistent global store. */
export function isGlobalVariable(name: string): boolean {
  return name.startsWith(GLOBALS_PREFIX);
}

function makeValidIdentifier(name: string): string {
  let identifier = name.replace(/[^\w$]/g, "_");
  if (identifier === "") {
    return "_";
  }
  if (/^\d/.test(identifier) || RESERVED_WORDS.has(identifier)) {
    identifier = `_${identifier}`;
  }
  return identifier;
}

/**
 * Turn arbitrary user input into a name that can be declared in the
 * generated program.
 *
 * @example
 * ```ts
 * makeValidVariableName("my var");      // "my_var"
 * makeValidVariableName("1st");         // "_1st"
 * makeValidVariableName("globals.a-b"); // "globals.a_b"
 * makeValidVariableName("data");        // "_data"
 * ```
 */
export function makeValidVariableName(name: string): string {
  const trimmed = name.trim();
  if (isGlobalVariable(trimmed)) {
    return GLOBALS_PREFIX + makeValidIdentifier(trimmed.slice(GLOBALS_PREFIX.length));
  }
  const identifier = makeValidIdentifier(trimmed);
  return RUNTIME_NAMES.has(identifier) ? `_${identifier}` : identifier;
}

/**
 * The expression that reads (or is assigned to) a variable.
 *
 * - `"token"` → `token`
 * - `"data.source"` → `data.source`
 * - `"globals.session.id"` → `globals["session"].id`
 */
export function variableExpression(name: string): string {
  if (!isGlobalVariable(name)) {
    return name;
  }
  const [head = "", ...tail] = name.slice(GLOBALS_PREFIX.length).split(".");
  return `globals[${JSON.stringify(head)}]${tail.map((part) => `.${part}`).join("")}`;
}
