/**
 * MCP server setup: creates the McpServer instance and registers all tools.
 *
 * Each tool is a separate module in `./tools/`, with a handler that takes
 * the registry the server was created with.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DescriptorRegistry } from "@blockscript/core";

import * as listBlocksTool from "./tools/list-blocks.js";
import * as describeBlockTool from "./tools/describe-block.js";
import * as checkScriptTool from "./tools/check-script.js";
import * as formatScriptTool from "./tools/format-script.js";
import * as compileScriptTool from "./tools/compile-script.js";

/**
 * Create the block script MCP server with all tools registered.
 */
export function createServer(registry: DescriptorRegistry): McpServer {
  const server = new McpServer({
    name: "blockscript",
    version: "0.1.0",
  });

  server.registerTool(
    listBlocksTool.name,
    {
      description: listBlocksTool.description,
      inputSchema: listBlocksTool.inputSchema,
    },
    (params) => listBlocksTool.handler(registry, params),
  );

  server.registerTool(
    describeBlockTool.name,
    {
      description: describeBlockTool.description,
      inputSchema: describeBlockTool.inputSchema,
    },
    (params) => describeBlockTool.handler(registry, params),
  );

  server.registerTool(
    checkScriptTool.name,
    {
      description: checkScriptTool.description,
      inputSchema: checkScriptTool.inputSchema,
    },
    (params) => checkScriptTool.handler(registry, params),
  );

  server.registerTool(
    formatScriptTool.name,
    {
      description: formatScriptTool.description,
      inputSchema: formatScriptTool.inputSchema,
    },
    (params) => formatScriptTool.handler(registry, params),
  );

  server.registerTool(
    compileScriptTool.name,
    {
      description: compileScriptTool.description,
      inputSchema: compileScriptTool.inputSchema,
    },
    (params) => compileScriptTool.handler(registry, params),
  );

  return server;
}
