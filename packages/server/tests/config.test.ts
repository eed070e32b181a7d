import { describe, it, expect } from "vitest";
import { DEFAULT_PORT, parseServerConfig } from "../src/config.js";

const argv = (...args: string[]): string[] => ["node", "blockscript-server", ...args];

describe("parseServerConfig", () => {
  it("defaults to stdio", () => {
    expect(parseServerConfig(argv(), {})).toEqual({ mode: "stdio", port: DEFAULT_PORT, catalogPaths: [] });
  });

  it("reads --http with and without a port", () => {
    expect(parseServerConfig(argv("--http"), {})).toEqual({ mode: "http", port: 3000, catalogPaths: [] });
    expect(parseServerConfig(argv("--http", "8080"), {}).port).toBe(8080);
  });

  it("does not take the next flag as a port", () => {
    expect(parseServerConfig(argv("--http", "--catalog", "a.json"), {})).toEqual({
      mode: "http",
      port: 3000,
      catalogPaths: ["a.json"],
    });
  });

  it("falls back to BLOCKSCRIPT_PORT", () => {
    expect(parseServerConfig(argv("--http"), { BLOCKSCRIPT_PORT: "4100" }).port).toBe(4100);
    expect(parseServerConfig(argv("--http", "5000"), { BLOCKSCRIPT_PORT: "4100" }).port).toBe(5000);
    expect(parseServerConfig(argv("--http"), { BLOCKSCRIPT_PORT: "many" }).port).toBe(3000);
  });

  it("puts BLOCKSCRIPT_CATALOG before --catalog flags", () => {
    const config = parseServerConfig(argv("--catalog", "b.json", "--catalog", "c.json"), {
      BLOCKSCRIPT_CATALOG: "a.json",
    });
    expect(config.catalogPaths).toEqual(["a.json", "b.json", "c.json"]);
  });
});
