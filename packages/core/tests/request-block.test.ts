import { describe, it, expect } from "vitest";
import { RequestBlockInstance } from "../src/blocks/request-block.js";
import type { SourceLine } from "../src/blocks/block-instance.js";
import { ParseError } from "../src/errors.js";
import { createGenerationContext } from "../src/generator/generation-context.js";
import { createBuiltinRegistry } from "../src/registry/builtin-registry.js";

const registry = createBuiltinRegistry();

function newRequestBlock(): RequestBlockInstance {
  const descriptor = registry.get("HttpRequest");
  if (descriptor.family !== "request") throw new Error("HttpRequest is not a request block");
  return new RequestBlockInstance(descriptor);
}

function body(...texts: string[]): SourceLine[] {
  return texts.map((text, i) => ({ text, lineNumber: i + 2 }));
}

describe("RequestBlockInstance", () => {
  it("writes the request type before the settings", () => {
    const block = newRequestBlock();
    expect(block.serialize({ omitDefaults: true })).toEqual(["TYPE:Standard"]);
    expect(block.serialize()).toContain('  customHeaders = {("Accept", "*/*")}');
  });

  it("reads the request type and settings", () => {
    const block = newRequestBlock();
    block.deserialize(body("TYPE:Raw", '  rawContent = "qrvM"', "  method = PUT"));
    expect(block.requestType).toBe("Raw");
    expect(block.serialize({ omitDefaults: true })).toEqual([
      "TYPE:Raw",
      "  method = PUT",
      '  rawContent = "qrvM"',
    ]);
  });

  it("rejects unknown request types", () => {
    expect(() => newRequestBlock().deserialize(body("TYPE:Soap"))).toThrow(ParseError);
    expect(() => newRequestBlock().deserialize(body("TYPE:Soap"))).toThrow(
      "Line 2: Could not understand the request type: TYPE:Soap",
    );
  });

  it("emits a standard request", () => {
    const block = newRequestBlock();
    block.deserialize(
      body('  url = $"https://example.com/login?user=<user>"', "  method = POST", '  content = "a=1"'),
    );
    expect(block.generate(createGenerationContext())).toBe(
      'await httpRequestStandard(data, `https://example.com/login?user=${user}`, "POST", true, { "Accept": "*/*" }, {}, 10000, "a=1", "application/x-www-form-urlencoded");\n',
    );
  });

  it("emits a raw request", () => {
    const block = newRequestBlock();
    block.deserialize(body("TYPE:Raw", '  rawContent = "qrvM"', '  contentType = "application/octet-stream"'));
    expect(block.generate(createGenerationContext())).toBe(
      'await httpRequestRaw(data, "https://example.com/", "GET", true, { "Accept": "*/*" }, {}, 10000, Buffer.from("qrvM", "base64"), "application/octet-stream");\n',
    );
  });
});
