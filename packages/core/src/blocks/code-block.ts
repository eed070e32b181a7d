/**
 * Code blocks: raw JavaScript copied into the generated program.
 */

import type { GenerationContext } from "../generator/generation-context.js";
import type { CodeDescriptor } from "../registry/descriptor.js";
import { BlockInstanceBase, SETTING_INDENT } from "./block-instance.js";
import type { SerializeOptions, SourceLine } from "./block-instance.js";

function stripIndent(text: string): string {
  return text.startsWith(SETTING_INDENT)
    ? text.slice(SETTING_INDENT.length)
    : text.replace(/^ /, "");
}

export class CodeBlockInstance extends BlockInstanceBase<CodeDescriptor> {
  readonly family = "code";
  lines: string[] = [];

  protected serializeBody(_options: SerializeOptions): string[] {
    return this.lines.map((line) => (line.trim() === "" ? "" : SETTING_INDENT + line));
  }

  // Indented lines are code, even when they read like DISABLED or LABEL:.
  protected headerText(line: SourceLine): string | undefined {
    return /^\s/.test(line.text) ? undefined : line.text.trim();
  }

  protected deserializeBody(lines: readonly SourceLine[]): void {
    const body = lines.map((line) => stripIndent(line.text.trimEnd()));
    while (body.length > 0 && body[0] === "") body.shift();
    while (body.length > 0 && body[body.length - 1] === "") body.pop();
    this.lines = body;
  }

  protected generateBody(_context: GenerationContext): string {
    return this.lines.length === 0 ? "" : `${this.lines.join("\n")}\n`;
  }
}
