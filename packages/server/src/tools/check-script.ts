/**
 * check_script tool: decode a script and report its blocks or the first
 * error, with its line number.
 */

import { z } from "zod";
import { decodeScript } from "@blockscript/core";
import type { DescriptorRegistry } from "@blockscript/core";
import { errorResult, jsonResult } from "./tool-result.js";
import type { ToolResult } from "./tool-result.js";

/** Tool name. */
export const name = "check_script";

/** Tool description shown to the AI agent. */
export const description =
  "Check that a block script decodes. Returns the kind and label of every " +
  "block, or the first error with its line number and an excerpt of the line.";

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
    const blocks = decodeScript(params.script, registry);
    return jsonResult({
      valid: true,
      blocks: blocks.map((block) => ({ id: block.id, label: block.label, disabled: block.disabled })),
    });
  } catch (err) {
    return errorResult(err);
  }
}
