#!/usr/bin/env node
/**
 * blockscript: check, format and compile block scripts.
 *
 * Diagnostics go to stderr tagged `[blockscript]`; results go to stdout
 * unless --out is given. Any error exits with code 1.
 */

import { readFile, writeFile } from "node:fs/promises";
import { loadRegistry } from "@blockscript/core";
import { CliUsageError, USAGE, parseCliConfig } from "./config/config.js";
import { LOG_PREFIX, runCommand } from "./commands/run-command.js";
import type { CommandIO } from "./commands/run-command.js";

export { CliUsageError, USAGE, parseCliConfig } from "./config/config.js";
export type { CliCommand, CliConfig } from "./config/config.js";
export { LOG_PREFIX, formatBlockList, runCommand } from "./commands/run-command.js";
export type { CommandIO } from "./commands/run-command.js";

/** Reads all data from stdin and returns it as a string. */
function readStdin(): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    let data = "";
    process.stdin.setEncoding("utf8");
    process.stdin.on("data", (chunk: string) => {
      data += chunk;
    });
    process.stdin.on("end", () => {
      resolve(data);
    });
    process.stdin.on("error", reject);
  });
}

/** IO bound to the file system and the process streams. */
export const processIO: CommandIO = {
  readInput: (path) => (path === undefined ? readStdin() : readFile(path, "utf8")),
  writeOutput: async (path, text) => {
    if (path === undefined) {
      process.stdout.write(text);
    } else {
      await writeFile(path, text, "utf8");
    }
  },
  log: (message) => {
    process.stderr.write(`${message}\n`);
  },
};

/**
 * Entry point of the CLI.
 *
 * @returns The exit code
 */
export async function cliMain(
  argv: readonly string[],
  io: CommandIO = processIO,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  try {
    const config = parseCliConfig(argv, env);
    const registry = await loadRegistry(config.catalogPaths);
    await runCommand(config, registry, io);
    return 0;
  } catch (err) {
    io.log(`${LOG_PREFIX} ${err instanceof Error ? err.message : String(err)}`);
    if (err instanceof CliUsageError) {
      io.log(USAGE);
    }
    return 1;
  }
}

// Run if executed directly
const isDirectExecution =
  process.argv[1]?.endsWith("cli.ts") === true || process.argv[1]?.endsWith("cli.js") === true;
if (isDirectExecution) {
  cliMain(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${LOG_PREFIX} Fatal error: ${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = 1;
    },
  );
}
