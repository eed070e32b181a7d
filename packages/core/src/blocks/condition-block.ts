/**
 * Condition blocks: compare two values and, when the comparison holds,
 * set the bot status and stop the script.
 *
 * ```
 * BLOCK:Condition
 *   left = @data.source
 *   comparison = Contains
 *   right = "Welcome back"
 * => SUCCESS
 * ```
 */

import { ParseError } from "../errors.js";
import type { GenerationContext } from "../generator/generation-context.js";
import type { ConditionDescriptor } from "../registry/descriptor.js";
import { BlockInstanceBase } from "./block-instance.js";
import type { SerializeOptions, SourceLine } from "./block-instance.js";
import { isOutputDeclaration } from "./output-declaration.js";

const STATUS_PATTERN = /^=>\s*([A-Z][A-Z0-9_]*)$/;
const STATUS_WORD_PATTERN = /^[A-Z][A-Z0-9_]*$/;

export class ConditionBlockInstance extends BlockInstanceBase<ConditionDescriptor> {
  readonly family = "condition";
  private _status = "SUCCESS";

  /** Status the bot ends with when the condition holds. An upper-case word. */
  get status(): string {
    return this._status;
  }

  set status(value: string) {
    const status = value.trim().toUpperCase();
    if (!STATUS_WORD_PATTERN.test(status)) {
      throw new RangeError(`Invalid status "${value}"`);
    }
    this._status = status;
  }

  protected serializeBody(options: SerializeOptions): string[] {
    return [...this.serializeSettings(options), `=> ${this.status}`];
  }

  protected deserializeBody(lines: readonly SourceLine[]): void {
    for (const line of lines) {
      const text = line.text.trim();
      if (text === "") continue;

      if (isOutputDeclaration(text)) {
        const status = STATUS_PATTERN.exec(text)?.[1];
        if (status === undefined) {
          throw new ParseError(line.lineNumber, line.text, "The status declaration is in the wrong format");
        }
        this._status = status;
      } else {
        this.readSettingLine(line);
      }
    }
  }

  protected generateBody(_context: GenerationContext): string {
    const left = this.argument("left");
    const comparison = this.argument("comparison");
    const right = this.argument("right");
    return `if (checkCondition(data, ${left}, ${comparison}, ${right})) { data.status = ${JSON.stringify(this.status)}; return; }\n`;
  }
}
