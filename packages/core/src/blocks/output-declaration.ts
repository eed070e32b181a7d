/**
 * The `=> CAP @name` / `=> VAR @name` line of output-producing blocks.
 */

import { ParseError } from "../errors.js";
import type { SourceLine } from "./block-instance.js";

const OUTPUT_DECLARATION_PATTERN = /^=>\s*([A-Za-z]+)\s+@(.+)$/;

export interface OutputDeclaration {
  readonly isCapture: boolean;
  readonly variable: string;
}

/** Whether a trimmed body line is an output declaration. */
export function isOutputDeclaration(text: string): boolean {
  return text.startsWith("=>");
}

/**
 * Read an output declaration.
 *
 * @throws ParseError if the line is malformed or the kind is neither CAP nor VAR
 */
export function parseOutputDeclaration(line: SourceLine): OutputDeclaration {
  const match = OUTPUT_DECLARATION_PATTERN.exec(line.text.trim());
  const kind = match?.[1]?.toUpperCase();
  const variable = match?.[2]?.trim();
  if ((kind !== "CAP" && kind !== "VAR") || variable === undefined || variable === "") {
    throw new ParseError(line.lineNumber, line.text, "The output variable declaration is in the wrong format");
  }
  return { isCapture: kind === "CAP", variable };
}

export function formatOutputDeclaration(declaration: OutputDeclaration): string {
  return `=> ${declaration.isCapture ? "CAP" : "VAR"} @${declaration.variable}`;
}
