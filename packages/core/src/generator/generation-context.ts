/**
 * Generation context: the state one script's code generation threads
 * through its blocks.
 */

import { isGlobalVariable, variableExpression } from "../settings/variable-names.js";

/** State shared by the blocks of one script while generating code. */
export interface GenerationContext {
  /**
   * Output variables already declared by earlier blocks, in order of
   * declaration. A later block writing the same name assigns instead of
   * declaring again.
   */
  readonly definedVariables: Set<string>;
}

/** Create an empty context. Use one per script. */
export function createGenerationContext(): GenerationContext {
  return { definedVariables: new Set() };
}

/**
 * The left-hand side of the statement that stores a block's output.
 *
 * Returns `var name = ` for the first write of a local variable and
 * `name = ` afterwards. Globals are always assigned through the store.
 * A disabled block never adds its name to the context.
 */
export function outputTarget(context: GenerationContext, name: string, disabled: boolean): string {
  if (isGlobalVariable(name) || context.definedVariables.has(name)) {
    return `${variableExpression(name)} = `;
  }
  if (!disabled) {
    context.definedVariables.add(name);
  }
  return `var ${name} = `;
}

/** The statement that marks a variable for capture by the runtime. */
export function captureStatement(name: string): string {
  return `data.markForCapture(${JSON.stringify(name)});\n`;
}
