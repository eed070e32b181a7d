/**
 * Command-line and environment configuration of the block script server.
 *
 * Supports:
 *   blockscript-server                          stdio MCP transport
 *   blockscript-server --http                   HTTP on port 3000
 *   blockscript-server --http 8080 --catalog extra.blocks.json
 */

/** Parsed server configuration. */
export interface ServerConfig {
  /** `stdio` serves MCP over stdin/stdout, `http` serves the REST API and MCP on /mcp. */
  mode: "stdio" | "http";
  port: number;
  /** Extra catalog files registered after the built-in blocks. */
  catalogPaths: readonly string[];
}

/** Default HTTP port. */
export const DEFAULT_PORT = 3000;

function parsePort(text: string | undefined): number | undefined {
  if (text === undefined || !/^\d+$/.test(text)) return undefined;
  const port = parseInt(text, 10);
  return port > 0 && port < 65536 ? port : undefined;
}

/**
 * Parses process.argv into a ServerConfig.
 *
 * `BLOCKSCRIPT_PORT` sets the port when `--http` has none, and
 * `BLOCKSCRIPT_CATALOG` adds a catalog file before any `--catalog` flag.
 *
 * @param argv - The full process.argv array
 */
export function parseServerConfig(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const args = argv.slice(2);
  let mode: ServerConfig["mode"] = "stdio";
  let port: number | undefined;
  const catalogPaths: string[] = [];

  const envCatalog = env["BLOCKSCRIPT_CATALOG"];
  if (envCatalog !== undefined && envCatalog !== "") {
    catalogPaths.push(envCatalog);
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--http") {
      mode = "http";
      const next = parsePort(args[i + 1]);
      if (next !== undefined) {
        port = next;
        i++;
      }
    } else if (arg === "--catalog") {
      const path = args[i + 1];
      if (path !== undefined) {
        catalogPaths.push(path);
        i++;
      }
    }
  }

  return {
    mode,
    port: port ?? parsePort(env["BLOCKSCRIPT_PORT"]) ?? DEFAULT_PORT,
    catalogPaths,
  };
}
