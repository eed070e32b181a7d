/**
 * format_script tool: rewrite a script in canonical form.
 */

import { z } from "zod";
import { decodeScript, encodeScript } from "@blockscript/core";
import type { DescriptorRegistry } from "@blockscript/core";
import { errorResult, textResult } from "./tool-result.js";
import type { ToolResult } from "./tool-result.js";

/** Tool name. */
export const name = "format_script";

/** Tool description shown to the AI agent. */
export const description =
  "Rewrite a block script in canonical form: settings in parameter order, " +
  "two-space indentation, one blank line between blocks. Set omitDefaults " +
  "to drop settings that equal their default.";

/** Input schema. */
export const inputSchema = {
  script: z.string().describe("Block script text."),
  omitDefaults: z.boolean().optional().describe("Drop settings equal to their default value."),
};

/** Tool handler. */
export async function handler(
  registry: DescriptorRegistry,
  params: z.infer<z.ZodObject<typeof inputSchema>>,
): Promise<ToolResult> {
  try {
    const blocks = decodeScript(params.script, registry);
    return textResult(encodeScript(blocks, { omitDefaults: params.omitDefaults }));
  } catch (err) {
    return errorResult(err);
  }
}
