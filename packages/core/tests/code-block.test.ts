import { describe, it, expect } from "vitest";
import { CodeBlockInstance } from "../src/blocks/code-block.js";
import type { SourceLine } from "../src/blocks/block-instance.js";
import { createGenerationContext } from "../src/generator/generation-context.js";
import { createBuiltinRegistry } from "../src/registry/builtin-registry.js";

const registry = createBuiltinRegistry();

function newCodeBlock(): CodeBlockInstance {
  const descriptor = registry.get("Code");
  if (descriptor.family !== "code") throw new Error("Code is not a code block");
  return new CodeBlockInstance(descriptor);
}

function body(...texts: string[]): SourceLine[] {
  return texts.map((text, i) => ({ text, lineNumber: i + 2 }));
}

describe("CodeBlockInstance", () => {
  it("strips the writer's indent and surrounding blank lines", () => {
    const block = newCodeBlock();
    block.deserialize(body("", "  const total = a + b;", "  if (total > 3) {", "    log(total);   ", "  }", ""));
    expect(block.lines).toEqual(["const total = a + b;", "if (total > 3) {", "  log(total);", "}"]);
  });

  it("indents lines when serializing", () => {
    const block = newCodeBlock();
    block.lines = ["const x = 1;", "", "  x++;"];
    expect(block.serialize()).toEqual(["  const x = 1;", "", "    x++;"]);
  });

  it("emits the lines unchanged", () => {
    const block = newCodeBlock();
    block.lines = ["const x = 1;", "  x++;"];
    expect(block.generate(createGenerationContext())).toBe("const x = 1;\n  x++;\n");
  });

  it("emits nothing for an empty body", () => {
    expect(newCodeBlock().generate(createGenerationContext())).toBe("");
  });

  it("keeps the disabled flag and label", () => {
    const block = newCodeBlock();
    block.deserialize(body("DISABLED", "LABEL:Setup", "  let n = 0;"));
    expect(block.disabled).toBe(true);
    expect(block.label).toBe("Setup");
    expect(block.lines).toEqual(["let n = 0;"]);
  });

  it("keeps indented lines that read like header lines as code", () => {
    const block = newCodeBlock();
    block.deserialize(body("  DISABLED", "  LABEL: while (true) {", "    break LABEL;", "  }"));
    expect(block.disabled).toBe(false);
    expect(block.label).toBe("Script");
    expect(block.lines).toEqual(["DISABLED", "LABEL: while (true) {", "  break LABEL;", "}"]);
  });
});
