/**
 * Result helpers shared by the MCP tools.
 */

import { BlockScriptError } from "@blockscript/core";
import { describeError } from "../errors.js";

/** A tool result: text content, flagged when it reports an error. */
export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

/** A successful result carrying a JSON payload. */
export function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] };
}

/** A successful result carrying plain text. */
export function textResult(text: string): ToolResult {
  return { content: [{ type: "text" as const, text }] };
}

/**
 * Turn a block script error into an error result the agent can read.
 * Other errors are rethrown for the SDK to report.
 */
export function errorResult(err: unknown): ToolResult {
  if (!(err instanceof BlockScriptError)) {
    throw err;
  }
  return {
    content: [{ type: "text" as const, text: JSON.stringify(describeError(err).body.error, null, 2) }],
    isError: true,
  };
}
