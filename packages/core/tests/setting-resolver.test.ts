import { describe, it, expect } from "vitest";
import { resolveSetting, resolveValue } from "../src/settings/setting-resolver.js";
import {
  dictOf,
  fixedBool,
  fixedBytes,
  fixedEnum,
  fixedFloat,
  fixedInt,
  fixedString,
  interpolated,
  listOf,
  variable,
} from "../src/settings/setting-types.js";

describe("resolveValue", () => {
  it("resolves fixed literals", () => {
    expect(resolveValue(fixedString('he said "hi"'))).toBe('"he said \\"hi\\""');
    expect(resolveValue(fixedInt(42))).toBe("42");
    expect(resolveValue(fixedFloat(0.5))).toBe("0.5");
    expect(resolveValue(fixedBool(false))).toBe("false");
    expect(resolveValue(fixedEnum("SHA256"))).toBe('"SHA256"');
  });

  it("resolves bytes to a buffer expression", () => {
    expect(resolveValue(fixedBytes(new Uint8Array([0xaa, 0xbb, 0xcc])))).toBe('Buffer.from("qrvM", "base64")');
    expect(resolveValue(fixedBytes(new Uint8Array(0)))).toBe('Buffer.from("", "base64")');
  });

  it("resolves variables", () => {
    expect(resolveValue(variable("password"))).toBe("password");
    expect(resolveValue(variable("data.source"))).toBe("data.source");
  });

  it("reads globals through the store", () => {
    expect(resolveValue(variable("globals.token"))).toBe('globals["token"]');
    expect(resolveValue(variable("globals.session.id"))).toBe('globals["session"].id');
  });

  it("turns templates into template literals", () => {
    expect(resolveValue(interpolated("Bearer <token>"))).toBe("`Bearer ${token}`");
    expect(resolveValue(interpolated("<user>:<globals.pass>"))).toBe('`${user}:${globals["pass"]}`');
  });

  it("escapes template syntax in literal text", () => {
    expect(resolveValue(interpolated("`${x}` <n>"))).toBe("`\\`\\${x}\\` ${n}`");
    expect(resolveValue(interpolated("a\\b"))).toBe("`a\\\\b`");
  });

  it("keeps carriage returns and line separators in templates", () => {
    const expression = resolveValue(interpolated("a\r\n<x>\u2028"));
    expect(expression).toBe("`a\\r\n${x}\\u2028`");
    const evaluate = new Function("x", `return ${expression};`);
    expect(evaluate("X")).toBe("a\r\nX\u2028");
  });

  it("leaves text that is not a placeholder alone", () => {
    expect(resolveValue(interpolated("<a b> < 3"))).toBe("`<a b> < 3`");
  });

  it("resolves lists and dicts", () => {
    expect(resolveValue(listOf([fixedString("a"), variable("b")]))).toBe('["a", b]');
    expect(resolveValue(listOf([]))).toBe("[]");
    expect(resolveValue(dictOf([]))).toBe("{}");
    expect(
      resolveValue(
        dictOf([
          ["Accept", fixedString("*/*")],
          ["Cookie", variable("cookie")],
        ]),
      ),
    ).toBe('{ "Accept": "*/*", "Cookie": cookie }');
  });
});

describe("resolveSetting", () => {
  it("resolves the setting's value", () => {
    expect(resolveSetting({ name: "input", value: variable("data.source") })).toBe("data.source");
  });
});
