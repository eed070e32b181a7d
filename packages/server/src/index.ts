#!/usr/bin/env node
/**
 * Block script server entry point: stdio (MCP) or HTTP mode.
 *
 * Usage:
 *   blockscript-server                                  stdio transport (default)
 *   blockscript-server --http                           HTTP server on port 3000
 *   blockscript-server --http 8080 --catalog my.blocks.json
 *
 * In HTTP mode the server provides:
 *   - REST API on /api/*
 *   - MCP Streamable HTTP on /mcp
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadRegistry } from "@blockscript/core";
import { createApp } from "./app.js";
import { parseServerConfig } from "./config.js";
import { createServer } from "./server.js";

async function main(): Promise<void> {
  const config = parseServerConfig(process.argv);
  const registry = await loadRegistry(config.catalogPaths);
  const blockCount = registry.list().length;

  if (config.mode === "stdio") {
    // stdout is reserved for MCP JSON-RPC
    const server = createServer(registry);
    await server.connect(new StdioServerTransport());
    process.stderr.write(`[blockscript-server] Server started (stdio mode, ${blockCount} blocks)\n`);
    return;
  }

  const app = createApp(registry, { mcp: true });

  const httpServer = app.listen(config.port, () => {
    process.stderr.write(`[blockscript-server] Server started on http://localhost:${config.port}\n`);
    process.stderr.write(`[blockscript-server]   REST API: http://localhost:${config.port}/api/*\n`);
    process.stderr.write(`[blockscript-server]   MCP:      http://localhost:${config.port}/mcp\n`);
  });

  const shutdown = (): void => {
    httpServer.close();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  process.stderr.write(
    `[blockscript-server] Fatal error: ${error instanceof Error ? error.message : String(error)}\n`,
  );
  process.exit(1);
});
