/**
 * describe_block tool: one block kind in detail, with a sample of how it
 * is written in a script.
 */

import { z } from "zod";
import { createBlockInstance, encodeScript } from "@blockscript/core";
import type { DescriptorRegistry } from "@blockscript/core";
import { summarizeDescriptor } from "../summaries.js";
import { errorResult, jsonResult } from "./tool-result.js";
import type { ToolResult } from "./tool-result.js";

/** Tool name. */
export const name = "describe_block";

/** Tool description shown to the AI agent. */
export const description =
  "Describe one block kind: its family, parameters and defaults, and the " +
  "script text of a new block of that kind with every setting written out.";

/** Input schema. */
export const inputSchema = {
  id: z.string().describe("Block kind id, as written in BLOCK:<id> headers."),
};

/** Tool handler. */
export async function handler(
  registry: DescriptorRegistry,
  params: z.infer<z.ZodObject<typeof inputSchema>>,
): Promise<ToolResult> {
  try {
    const descriptor = registry.get(params.id);
    return jsonResult({
      block: summarizeDescriptor(descriptor),
      example: encodeScript([createBlockInstance(descriptor)]),
    });
  } catch (err) {
    return errorResult(err);
  }
}
