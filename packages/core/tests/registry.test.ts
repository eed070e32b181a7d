import { describe, it, expect } from "vitest";
import { CatalogValidationError } from "@blockscript/schema";
import type { BlockCatalog, CatalogBlock } from "@blockscript/schema";
import { RegistryError, UnknownKindError } from "../src/errors.js";
import { createBuiltinRegistry, loadBuiltinCatalog } from "../src/registry/builtin-registry.js";
import { descriptorFromCatalog } from "../src/registry/descriptor.js";
import { DescriptorRegistry } from "../src/registry/descriptor-registry.js";
import { fixedBool, fixedEnum, fixedString, variable } from "../src/settings/setting-types.js";

const logBlock: CatalogBlock = {
  id: "Log",
  family: "function",
  name: "Log",
  category: "Utility",
  callee: "log",
  returnType: "void",
  async: true,
  parameters: [{ name: "message", type: "string" }],
};

const extraCatalog: BlockCatalog = { version: 1, blocks: [logBlock] };

describe("createBuiltinRegistry", () => {
  it("holds the built-in blocks and is frozen", () => {
    const registry = createBuiltinRegistry();
    expect(registry.isFrozen).toBe(true);
    for (const id of ["Parse", "Condition", "HttpRequest", "Code", "HashString", "JwtEncode", "UrlEncode"]) {
      expect(registry.has(id)).toBe(true);
    }
    expect(registry.list()).toHaveLength(loadBuiltinCatalog().blocks.length);
  });

  it("lists categories in order of first appearance", () => {
    expect(createBuiltinRegistry().categories()).toEqual([
      "Parsing",
      "Conditions",
      "Requests",
      "Scripting",
      "Crypto",
      "Conversion",
    ]);
  });

  it("adds extra catalogs after the built-in blocks", () => {
    const registry = createBuiltinRegistry([extraCatalog]);
    const ids = registry.list().map((descriptor) => descriptor.id);
    expect(ids[ids.length - 1]).toBe("Log");
    expect(registry.listByCategory("Utility").map((descriptor) => descriptor.id)).toEqual(["Log"]);
  });

  it("validates extra catalogs against the schema", () => {
    const signBlock: CatalogBlock = {
      id: "Sign",
      family: "function",
      name: "Sign",
      callee: "sign",
      returnType: "string",
      parameters: [{ name: "alg", type: "enum", enumValues: ["SHA-256", "MD5"], default: "SHA-256" }],
    };
    let caught: unknown;
    try {
      createBuiltinRegistry([{ version: 1, blocks: [signBlock] }]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CatalogValidationError);
    expect(caught instanceof CatalogValidationError ? caught.issues : []).toContain(
      '/blocks/0/parameters/0/enumValues/0 must match pattern "^[A-Za-z_][A-Za-z0-9_]*$"',
    );
  });

  it("rejects extra catalogs that reuse a built-in id", () => {
    const clash: BlockCatalog = { version: 1, blocks: [{ ...logBlock, id: "Parse" }] };
    expect(() => createBuiltinRegistry([clash])).toThrow("Block kind Parse is already registered");
  });
});

describe("DescriptorRegistry", () => {
  it("throws UnknownKindError from get and returns undefined from find", () => {
    const registry = createBuiltinRegistry();
    expect(() => registry.get("Nope")).toThrow(UnknownKindError);
    expect(registry.find("Nope")).toBeUndefined();
  });

  it("refuses to register once frozen", () => {
    const registry = new DescriptorRegistry().freeze();
    expect(() => registry.register(descriptorFromCatalog(logBlock))).toThrow(RegistryError);
  });

  it("refuses duplicate ids", () => {
    const registry = new DescriptorRegistry();
    registry.registerCatalog(extraCatalog);
    expect(() => registry.registerCatalog(extraCatalog)).toThrow("Block kind Log is already registered");
  });
});

describe("descriptorFromCatalog", () => {
  it("builds function descriptors", () => {
    const descriptor = createBuiltinRegistry().get("HashString");
    expect(descriptor.family).toBe("function");
    if (descriptor.family !== "function") return;
    expect(descriptor.callee).toBe("hashString");
    expect(descriptor.returnType).toBe("string");
    expect(descriptor.async).toBe(false);
    expect([...descriptor.parameters.keys()]).toEqual(["input", "hashFunction"]);
    expect(descriptor.parameters.get("hashFunction")?.default).toEqual(fixedEnum("MD5"));
  });

  it("converts defaults of the parse block", () => {
    const parameters = createBuiltinRegistry().get("Parse").parameters;
    expect(parameters.get("input")?.default).toEqual(variable("data.source"));
    expect(parameters.get("caseSensitive")?.default).toEqual(fixedBool(true));
    expect(parameters.get("prefix")?.default).toEqual(fixedString(""));
  });

  it("defaults the category", () => {
    const { category: _category, ...block } = logBlock;
    expect(descriptorFromCatalog(block).category).toBe("General");
  });

  it("rejects an enum default outside enumValues", () => {
    const block: CatalogBlock = {
      ...logBlock,
      parameters: [{ name: "level", type: "enum", default: "Trace", enumValues: ["Info", "Error"] }],
    };
    expect(() => descriptorFromCatalog(block)).toThrow(RegistryError);
  });

  it("rejects a default of the wrong type", () => {
    const block: CatalogBlock = { ...logBlock, parameters: [{ name: "count", type: "int", default: "three" }] };
    expect(() => descriptorFromCatalog(block)).toThrow('Default of Log.count does not match its type int: "three"');
  });

  it("rejects a float default that is not finite", () => {
    const block: CatalogBlock = {
      ...logBlock,
      parameters: [{ name: "ratio", type: "float", default: Number.POSITIVE_INFINITY }],
    };
    expect(() => descriptorFromCatalog(block)).toThrow("Default of Log.ratio does not match its type float: null");
  });

  it("rejects function blocks without a callee", () => {
    const { callee: _callee, ...block } = logBlock;
    expect(() => descriptorFromCatalog(block)).toThrow("Function block Log needs a callee and a returnType");
  });

  it("rejects duplicate parameters", () => {
    const block: CatalogBlock = {
      ...logBlock,
      parameters: [
        { name: "message", type: "string" },
        { name: "message", type: "string" },
      ],
    };
    expect(() => descriptorFromCatalog(block)).toThrow("Block Log declares parameter message twice");
  });
});
