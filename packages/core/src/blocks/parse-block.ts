/**
 * Parse blocks: extract a value from a string by delimiters, a CSS
 * selector, a JSON token or a regular expression.
 *
 * ```
 * BLOCK:Parse
 * RECURSIVE
 * MODE:LR
 *   input = @data.source
 *   leftDelim = "<title>"
 *   rightDelim = "</title>"
 * => CAP @title
 * ```
 */

import { ParseError, UnsupportedOperationError } from "../errors.js";
import type { GenerationContext } from "../generator/generation-context.js";
import { captureStatement, outputTarget } from "../generator/generation-context.js";
import type { ParseDescriptor } from "../registry/descriptor.js";
import { makeValidVariableName } from "../settings/variable-names.js";
import { BlockInstanceBase } from "./block-instance.js";
import type { SerializeOptions, SourceLine } from "./block-instance.js";
import {
  formatOutputDeclaration,
  isOutputDeclaration,
  parseOutputDeclaration,
} from "./output-declaration.js";

/** How a parse block extracts its value. */
export type ParseMode = "LR" | "CSS" | "Json" | "Regex";

/** Runtime function and mode-specific parameters of each parse mode. */
export interface ParseModeEntry {
  readonly callee: string;
  readonly parameters: readonly string[];
}

export const PARSE_MODES: Readonly<Record<ParseMode, ParseModeEntry>> = {
  LR: { callee: "parseBetweenStrings", parameters: ["leftDelim", "rightDelim", "caseSensitive"] },
  CSS: { callee: "queryCssSelector", parameters: ["cssSelector", "attributeName"] },
  Json: { callee: "queryJsonToken", parameters: ["jToken"] },
  Regex: { callee: "matchRegexGroups", parameters: ["pattern", "outputFormat"] },
};

function isParseMode(value: string): value is ParseMode {
  return Object.prototype.hasOwnProperty.call(PARSE_MODES, value);
}

const MODE_PATTERN = /^MODE:([A-Za-z]+)$/;
const RECURSIVE_LINE = "RECURSIVE";

export class ParseBlockInstance extends BlockInstanceBase<ParseDescriptor> {
  readonly family = "parse";
  mode: ParseMode = "LR";
  /** Return every match instead of the first one. */
  recursive = false;
  isCapture = false;
  private _outputVariable = "parseOutput";

  /** Name the result is stored in. Always a valid variable name. */
  get outputVariable(): string {
    return this._outputVariable;
  }

  set outputVariable(name: string) {
    this._outputVariable = makeValidVariableName(name);
  }

  protected serializeBody(options: SerializeOptions): string[] {
    const lines: string[] = [];
    if (this.recursive) {
      lines.push(RECURSIVE_LINE);
    }
    lines.push(`MODE:${this.mode}`);
    lines.push(...this.serializeSettings(options));
    lines.push(formatOutputDeclaration({ isCapture: this.isCapture, variable: this.outputVariable }));
    return lines;
  }

  protected deserializeBody(lines: readonly SourceLine[]): void {
    for (const line of lines) {
      const text = line.text.trim();
      if (text === "") continue;

      if (text === RECURSIVE_LINE) {
        this.recursive = true;
      } else if (text.startsWith("MODE:")) {
        const mode = MODE_PATTERN.exec(text)?.[1];
        if (mode === undefined || !isParseMode(mode)) {
          throw new ParseError(line.lineNumber, line.text, "Could not understand the parsing mode");
        }
        this.mode = mode;
      } else if (isOutputDeclaration(text)) {
        const declaration = parseOutputDeclaration(line);
        this.isCapture = declaration.isCapture;
        this.outputVariable = declaration.variable;
      } else {
        this.readSettingLine(line);
      }
    }
  }

  protected generateBody(context: GenerationContext): string {
    const entry = PARSE_MODES[this.mode];
    if (entry === undefined) {
      throw new UnsupportedOperationError(this.id, `parse mode ${String(this.mode)}`);
    }
    const args = [
      "data",
      this.argument("input"),
      ...entry.parameters.map((name) => this.argument(name)),
      this.argument("prefix"),
      this.argument("suffix"),
    ];
    const callee = this.recursive ? `${entry.callee}Recursive` : entry.callee;
    const name = this.outputVariable;

    let code = `${outputTarget(context, name, this.disabled)}${callee}(${args.join(", ")});\n`;
    if (this.isCapture) {
      code += captureStatement(name);
    }
    return code;
  }
}
