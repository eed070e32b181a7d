/**
 * Integration test: catalog file → registry → script text → program
 *
 * Runs the whole pipeline the way a user does: an extra catalog on disk,
 * a script that threads variables through three block families, then
 * formatting and compiling through the CLI entry point.
 */

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { compileScript, decodeScript, encodeScript, loadRegistry } from "@blockscript/core";
import type { BlockCatalog } from "@blockscript/schema";
import { cliMain } from "@blockscript/cli";
import type { CommandIO } from "@blockscript/cli";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const utilityCatalog: BlockCatalog = {
  version: 1,
  blocks: [
    {
      id: "Log",
      family: "function",
      name: "Log",
      category: "Utility",
      callee: "log",
      returnType: "void",
      async: true,
      parameters: [{ name: "message", type: "string" }],
    },
  ],
};

const SCRIPT = [
  "BLOCK:Parse",
  "MODE:LR",
  '  leftDelim = "<b>"',
  '  rightDelim = "</b>"',
  "=> VAR @token",
  "",
  "BLOCK:HashString",
  "  input = @token",
  "  hashFunction = SHA256",
  "=> CAP @digest",
  "",
  "BLOCK:Log",
  '  message = "done"',
  "",
].join("\n");

const PROGRAM =
  'var token = parseBetweenStrings(data, data.source, "<b>", "</b>", true, "", "");\n' +
  'var digest = hashString(data, token, "SHA256");\n' +
  'data.markForCapture("digest");\n' +
  'await log(data, "done");\n';

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Integration: catalog → script → program", () => {
  let dir = "";
  let catalogPath = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "blockscript-pipeline-"));
    catalogPath = join(dir, "utility.blocks.json");
    await writeFile(catalogPath, JSON.stringify(utilityCatalog), "utf8");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("decodes, re-encodes and compiles a script using an extra catalog", async () => {
    const registry = await loadRegistry([catalogPath]);
    const blocks = decodeScript(SCRIPT, registry);

    expect(blocks.map((block) => block.family)).toEqual(["parse", "function", "function"]);
    expect(encodeScript(blocks, { omitDefaults: true })).toBe(SCRIPT);
    expect(compileScript(SCRIPT, registry)).toBe(PROGRAM);
  });

  it("formats a file in place and compiles it through the CLI", async () => {
    const scriptPath = join(dir, "login.blocks");
    const outPath = join(dir, "login.js");
    // Same script with CRLF endings, blank lines around it and every default spelled out.
    const registry = await loadRegistry([catalogPath]);
    const verbose = encodeScript(decodeScript(SCRIPT, registry)).replace(/\n/g, "\r\n");
    await writeFile(scriptPath, `\r\n${verbose}\r\n\r\n`, "utf8");

    const logs: string[] = [];
    const io: CommandIO = {
      readInput: (path) => readFile(path ?? "", "utf8"),
      writeOutput: (path, text) => writeFile(path ?? "", text, "utf8"),
      log: (message) => {
        logs.push(message);
      },
    };
    const env = { BLOCKSCRIPT_CATALOG: catalogPath };

    expect(await cliMain(["node", "blockscript", "format", scriptPath, "--write", "--omit-defaults"], io, env)).toBe(0);
    expect(await readFile(scriptPath, "utf8")).toBe(SCRIPT);

    expect(await cliMain(["node", "blockscript", "compile", scriptPath, "--out", outPath], io, env)).toBe(0);
    expect(await readFile(outPath, "utf8")).toBe(PROGRAM);
    expect(logs).toEqual([`[blockscript] Formatted ${scriptPath}`]);
  });

  it("fails without the extra catalog", async () => {
    const registry = await loadRegistry();
    expect(() => compileScript(SCRIPT, registry)).toThrow('Unknown block kind "Log"');
  });
});
