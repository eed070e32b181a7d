/**
 * list_blocks tool: the block kinds a script may use.
 */

import { z } from "zod";
import type { DescriptorRegistry } from "@blockscript/core";
import { summarizeDescriptor } from "../summaries.js";
import { jsonResult } from "./tool-result.js";
import type { ToolResult } from "./tool-result.js";

/** Tool name. */
export const name = "list_blocks";

/** Tool description shown to the AI agent. */
export const description =
  "List the block kinds available to block scripts, with their parameters, " +
  "parameter types and defaults. Optionally filter by category " +
  "(for example Parsing, Requests or Crypto).";

/** Input schema. */
export const inputSchema = {
  category: z.string().optional().describe("Only list blocks of this category."),
};

/** Tool handler. */
export async function handler(
  registry: DescriptorRegistry,
  params: z.infer<z.ZodObject<typeof inputSchema>>,
): Promise<ToolResult> {
  const descriptors =
    params.category === undefined ? registry.list() : registry.listByCategory(params.category);
  return jsonResult({
    categories: registry.categories(),
    blocks: descriptors.map(summarizeDescriptor),
  });
}
