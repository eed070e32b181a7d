/**
 * MCP Streamable HTTP transport: mounts on /mcp for remote agents.
 *
 * Creates a per-session StreamableHTTPServerTransport, each connected to a
 * fresh McpServer. Coexists with the REST routes on the same router.
 */

import { randomUUID } from "node:crypto";
import type { IRouter } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

/** Active transports keyed by session ID. */
const transports = new Map<string, StreamableHTTPServerTransport>();

/**
 * Mount the MCP Streamable HTTP endpoint.
 *
 * Handles POST (JSON-RPC), GET (SSE stream) and DELETE (session close).
 */
export function mountMcpTransport(
  router: IRouter,
  serverFactory: () => McpServer,
  path = "/mcp",
): void {
  router.all(path, async (req, res, next) => {
    try {
      const sessionId = req.header("mcp-session-id");
      const existing = sessionId === undefined ? undefined : transports.get(sessionId);

      if (existing !== undefined) {
        await existing.handleRequest(req, res, req.body);
        return;
      }

      if (req.method === "POST") {
        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (id) => {
            transports.set(id, transport);
          },
        });

        transport.onclose = () => {
          if (transport.sessionId !== undefined) {
            transports.delete(transport.sessionId);
          }
        };

        const server = serverFactory();
        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
        return;
      }

      res.status(400).json({
        jsonrpc: "2.0",
        error: { code: -32000, message: "No valid session. Send a POST to initialize." },
        id: null,
      });
    } catch (err) {
      next(err);
    }
  });
}
