/**
 * Error types raised by the block script codec, registry and generator.
 *
 * Every error carries a stable `type` string so that callers (server,
 * CLI, editors) can report it without `instanceof` checks across package
 * boundaries.
 */

/** Longest excerpt of an offending line kept in a diagnostic. */
export const EXCERPT_MAX_LENGTH = 50;

/** Stable discriminator of every block script error. */
export type BlockScriptErrorType =
  | "UnknownKindError"
  | "ParseError"
  | "InvalidSettingError"
  | "UnsupportedOperationError"
  | "RegistryError";

/**
 * Shorten a source line for diagnostics.
 * Lines longer than {@link EXCERPT_MAX_LENGTH} end in `...`.
 */
export function truncateExcerpt(text: string, maxLength = EXCERPT_MAX_LENGTH): string {
  const trimmed = text.trim();
  if (trimmed.length <= maxLength) {
    return trimmed;
  }
  return `${trimmed.slice(0, maxLength - 3)}...`;
}

/** Base class of every error thrown by this package. */
export class BlockScriptError extends Error {
  constructor(
    readonly type: BlockScriptErrorType,
    message: string,
  ) {
    super(message);
    this.name = type;
  }
}

/** A `BLOCK:<id>` header (or a registry lookup) names a kind nobody registered. */
export class UnknownKindError extends BlockScriptError {
  readonly excerpt: string | undefined;

  constructor(
    readonly kindId: string,
    readonly lineNumber?: number,
    lineText?: string,
  ) {
    const excerpt = lineText === undefined ? undefined : truncateExcerpt(lineText);
    super(
      "UnknownKindError",
      lineNumber === undefined
        ? `Unknown block kind "${kindId}"`
        : `Line ${lineNumber}: Unknown block kind "${kindId}": ${excerpt ?? ""}`,
    );
    this.excerpt = excerpt;
  }
}

/**
 * Malformed script text. Always tagged with the 1-based line number where
 * the offending text began and an excerpt of that line.
 */
export class ParseError extends BlockScriptError {
  readonly excerpt: string;

  constructor(
    readonly lineNumber: number,
    lineText: string,
    readonly reason: string,
  ) {
    const excerpt = truncateExcerpt(lineText);
    super("ParseError", `Line ${lineNumber}: ${reason}: ${excerpt}`);
    this.excerpt = excerpt;
  }
}

/**
 * A block holds a setting its descriptor does not declare, or lacks one
 * that code generation needs.
 */
export class InvalidSettingError extends BlockScriptError {
  constructor(
    readonly blockId: string,
    readonly settingName: string,
    readonly problem: "unknown" | "missing" = "unknown",
  ) {
    super(
      "InvalidSettingError",
      problem === "unknown"
        ? `Setting "${settingName}" is not a valid parameter of block ${blockId}`
        : `Block ${blockId} has no value for setting "${settingName}"`,
    );
  }
}

/** Code generation was asked for a mode or kind it has no mapping for. */
export class UnsupportedOperationError extends BlockScriptError {
  constructor(
    readonly blockId: string,
    readonly operation: string,
  ) {
    super("UnsupportedOperationError", `Block ${blockId} does not support ${operation}`);
  }
}

/** Misuse of the descriptor registry or an inconsistent catalog entry. */
export class RegistryError extends BlockScriptError {
  constructor(message: string) {
    super("RegistryError", message);
  }
}
