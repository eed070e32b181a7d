/**
 * Tests for the block catalog JSON Schema and its validator.
 *
 * Compiles block-catalog.schema.json with ajv directly, then checks
 * validateCatalog / readCatalogFile on top of it.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { Ajv2020 } from "ajv/dist/2020.js";
import type { ValidateFunction } from "ajv";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import {
  CATALOG_SCHEMA_PATH,
  CatalogValidationError,
  readCatalogFile,
  validateCatalog,
} from "../src/index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const hashBlock = {
  id: "HashString",
  family: "function",
  name: "Hash String",
  category: "Crypto",
  callee: "hashString",
  returnType: "string",
  parameters: [
    { name: "input", type: "string" },
    { name: "hashFunction", type: "enum", default: "MD5", enumValues: ["MD5", "SHA256"] },
  ],
};

describe("block-catalog.schema.json", () => {
  let validate: ValidateFunction;

  beforeAll(() => {
    const schemaPath = resolve(__dirname, "../src/block-catalog.schema.json");
    const schema = JSON.parse(readFileSync(schemaPath, "utf-8"));
    const ajv = new Ajv2020({ allErrors: true, strictTypes: false });
    validate = ajv.compile(schema);
  });

  it("is the file CATALOG_SCHEMA_PATH points at", () => {
    expect(CATALOG_SCHEMA_PATH).toBe(resolve(__dirname, "../src/block-catalog.schema.json"));
  });

  it("accepts a catalog with a function block", () => {
    expect(validate({ version: 1, blocks: [hashBlock] })).toBe(true);
  });

  it("accepts every default shape", () => {
    const catalog = {
      version: 1,
      blocks: [
        {
          id: "Everything",
          family: "parse",
          name: "Everything",
          parameters: [
            { name: "s", type: "string", default: "x" },
            { name: "i", type: "int", default: 3 },
            { name: "f", type: "float", default: 1.5 },
            { name: "b", type: "bool", default: true },
            { name: "raw", type: "bytes", default: "qrvM" },
            { name: "tags", type: "list", default: ["a", "b"] },
            { name: "headers", type: "dict", default: { Accept: "*/*" } },
            { name: "source", type: "string", default: "data.source", defaultMode: "variable" },
          ],
        },
      ],
    };
    expect(validate(catalog)).toBe(true);
  });

  it("accepts an empty catalog", () => {
    expect(validate({ version: 1, blocks: [] })).toBe(true);
  });

  it("rejects an unknown version", () => {
    expect(validate({ version: 2, blocks: [] })).toBe(false);
  });

  it("rejects a function block without a callee", () => {
    const { callee: _callee, ...withoutCallee } = hashBlock;
    expect(validate({ version: 1, blocks: [withoutCallee] })).toBe(false);
  });

  it("rejects an enum parameter without enumValues", () => {
    const block = { ...hashBlock, parameters: [{ name: "mode", type: "enum" }] };
    expect(validate({ version: 1, blocks: [block] })).toBe(false);
  });

  it("rejects a variable default that is not a string", () => {
    const block = {
      ...hashBlock,
      parameters: [{ name: "count", type: "int", default: 3, defaultMode: "variable" }],
    };
    expect(validate({ version: 1, blocks: [block] })).toBe(false);
  });

  it("rejects ids that are not identifiers", () => {
    expect(validate({ version: 1, blocks: [{ ...hashBlock, id: "Hash String" }] })).toBe(false);
  });

  it("rejects unknown families and unknown properties", () => {
    expect(validate({ version: 1, blocks: [{ ...hashBlock, family: "loop" }] })).toBe(false);
    expect(validate({ version: 1, blocks: [{ ...hashBlock, color: "#fff" }] })).toBe(false);
  });
});

describe("validateCatalog", () => {
  it("returns the catalog when it is valid", () => {
    const catalog = { version: 1, blocks: [hashBlock] };
    expect(validateCatalog(catalog)).toBe(catalog);
  });

  it("lists every issue with its path", () => {
    let caught: unknown;
    try {
      validateCatalog({ blocks: [] }, "test.json");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CatalogValidationError);
    if (!(caught instanceof CatalogValidationError)) return;
    expect(caught.source).toBe("test.json");
    expect(caught.issues).toEqual(["/ must have required property 'version'"]);
    expect(caught.message).toBe(
      "Invalid block catalog (test.json): / must have required property 'version'",
    );
  });
});

describe("readCatalogFile", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "blockscript-catalog-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads and validates a catalog file", async () => {
    const path = join(dir, "extra.blocks.json");
    writeFileSync(path, JSON.stringify({ version: 1, blocks: [hashBlock] }));
    const catalog = await readCatalogFile(path);
    expect(catalog.blocks.map((block) => block.id)).toEqual(["HashString"]);
  });

  it("reports files that are not JSON", async () => {
    const path = join(dir, "broken.blocks.json");
    writeFileSync(path, "{ version: 1");
    await expect(readCatalogFile(path)).rejects.toBeInstanceOf(CatalogValidationError);
  });
});
