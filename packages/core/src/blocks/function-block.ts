/**
 * Function blocks: one call to a runtime function, with the parameters
 * passed in descriptor order and the result optionally stored.
 */

import { ParseError } from "../errors.js";
import type { GenerationContext } from "../generator/generation-context.js";
import { captureStatement, outputTarget } from "../generator/generation-context.js";
import type { FunctionDescriptor } from "../registry/descriptor.js";
import { makeValidVariableName } from "../settings/variable-names.js";
import { BlockInstanceBase } from "./block-instance.js";
import type { SerializeOptions, SourceLine } from "./block-instance.js";
import {
  formatOutputDeclaration,
  isOutputDeclaration,
  parseOutputDeclaration,
} from "./output-declaration.js";

export class FunctionBlockInstance extends BlockInstanceBase<FunctionDescriptor> {
  readonly family = "function";
  isCapture = false;
  private _outputVariable: string;

  constructor(descriptor: FunctionDescriptor) {
    super(descriptor);
    this._outputVariable = makeValidVariableName(`${descriptor.callee}Output`);
  }

  /** Whether the block stores a result at all. */
  get hasOutput(): boolean {
    return this.descriptor.returnType !== "void";
  }

  get outputVariable(): string {
    return this._outputVariable;
  }

  set outputVariable(name: string) {
    this._outputVariable = makeValidVariableName(name);
  }

  protected serializeBody(options: SerializeOptions): string[] {
    const lines = this.serializeSettings(options);
    if (this.hasOutput) {
      lines.push(formatOutputDeclaration({ isCapture: this.isCapture, variable: this.outputVariable }));
    }
    return lines;
  }

  protected deserializeBody(lines: readonly SourceLine[]): void {
    for (const line of lines) {
      const text = line.text.trim();
      if (text === "") continue;

      if (isOutputDeclaration(text)) {
        if (!this.hasOutput) {
          throw new ParseError(line.lineNumber, line.text, `${this.id} does not return a value`);
        }
        const declaration = parseOutputDeclaration(line);
        this.isCapture = declaration.isCapture;
        this.outputVariable = declaration.variable;
      } else {
        this.readSettingLine(line);
      }
    }
  }

  protected generateBody(context: GenerationContext): string {
    const args = ["data", ...[...this.descriptor.parameters.keys()].map((name) => this.argument(name))];
    const call = `${this.descriptor.async ? "await " : ""}${this.descriptor.callee}(${args.join(", ")});\n`;
    if (!this.hasOutput) {
      return call;
    }

    const name = this.outputVariable;
    let code = outputTarget(context, name, this.disabled) + call;
    if (this.isCapture) {
      code += captureStatement(name);
    }
    return code;
  }
}
