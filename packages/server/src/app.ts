/**
 * Express application: mounts the block and script routes.
 *
 * Used both by the standalone server (--http flag) and as a router that
 * a host application mounts under its own prefix.
 */

import express from "express";
import type { IRouter, Request, Response, NextFunction } from "express";
import type { DescriptorRegistry } from "@blockscript/core";
import { describeError } from "./errors.js";
import { mountMcpTransport } from "./mcp/transport.js";
import { createBlockRoutes } from "./routes/blocks.js";
import { createScriptRoutes } from "./routes/scripts.js";
import { createServer } from "./server.js";

/** Simple CORS middleware: allows all origins. */
function corsMiddleware(req: Request, res: Response, next: NextFunction): void {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization, Mcp-Session-Id");
  res.setHeader("Access-Control-Max-Age", "86400");

  if (req.method === "OPTIONS") {
    res.status(204).end();
    return;
  }
  next();
}

/** Turn anything a route throws into a JSON error response. */
function errorMiddleware(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  const { status, body } = describeError(err);
  if (status === 500) {
    process.stderr.write(`[blockscript-server] ${body.error.message}\n`);
  }
  res.status(status).json(body);
}

function mountRoutes(target: IRouter, registry: DescriptorRegistry): void {
  target.use(corsMiddleware);
  target.use(express.json({ limit: "1mb" }));
  target.use(createBlockRoutes(registry));
  target.use(createScriptRoutes(registry));
}

export interface AppOptions {
  /** Also serve MCP Streamable HTTP on /mcp. */
  mcp?: boolean;
}

/** Create the Express app with the REST routes mounted. */
export function createApp(registry: DescriptorRegistry, options: AppOptions = {}): express.Express {
  const app = express();
  mountRoutes(app, registry);
  if (options.mcp === true) {
    mountMcpTransport(app, () => createServer(registry));
  }
  app.use(errorMiddleware);
  return app;
}

/**
 * Create a Router with the REST routes and the MCP Streamable HTTP
 * endpoint, for use as middleware in another application.
 *
 * ```ts
 * app.use("/blockscript", createBlockScriptRouter(createBuiltinRegistry()));
 * ```
 */
export function createBlockScriptRouter(registry: DescriptorRegistry): express.Router {
  const router = express.Router();
  mountRoutes(router, registry);
  mountMcpTransport(router, () => createServer(registry), "/mcp");
  router.use(errorMiddleware);
  return router;
}

export { createServer } from "./server.js";
export { describeError } from "./errors.js";
export type { ErrorBody, DescribedError } from "./errors.js";
export { parseServerConfig } from "./config.js";
export type { ServerConfig } from "./config.js";
export { summarizeBlock, summarizeDescriptor } from "./summaries.js";
export type { BlockSummary, DescriptorSummary, ParameterSummary } from "./summaries.js";
