/**
 * compile_script tool: generate the JavaScript statements of a script.
 */

import { z } from "zod";
import { compileScript } from "@blockscript/core";
import type { DescriptorRegistry } from "@blockscript/core";
import { errorResult, textResult } from "./tool-result.js";
import type { ToolResult } from "./tool-result.js";

/** Tool name. */
export const name = "compile_script";

/** Tool description shown to the AI agent. */
export const description =
  "Compile a block script to JavaScript statements. Disabled blocks are " +
  "skipped. The statements expect `data`, `globals` and the runtime " +
  "functions (parseBetweenStrings, httpRequestStandard, hashString, ...) in scope.";

/** Input schema. */
export const inputSchema = {
  script: z.string().describe("Block script text."),
};

/** Tool handler. */
export async function handler(
  registry: DescriptorRegistry,
  params: z.infer<z.ZodObject<typeof inputSchema>>,
): Promise<ToolResult> {
  try {
    return textResult(compileScript(params.script, registry));
  } catch (err) {
    return errorResult(err);
  }
}
