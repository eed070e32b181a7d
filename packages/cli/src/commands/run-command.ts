/**
 * The CLI commands, run against injected input and output so that they can
 * be tested without touching the process.
 */

import { compileScript, decodeScript, encodeScript } from "@blockscript/core";
import type { DescriptorRegistry } from "@blockscript/core";
import type { CliConfig } from "../config/config.js";

/** Where a command reads scripts and writes results. */
export interface CommandIO {
  /** Read a script file, or stdin when no path is given. */
  readInput(path: string | undefined): Promise<string>;
  /** Write a result to a file, or stdout when no path is given. */
  writeOutput(path: string | undefined, text: string): Promise<void>;
  /** Diagnostic output. */
  log(message: string): void;
}

/** Tag of every diagnostic line. */
export const LOG_PREFIX = "[blockscript]";

function describeInput(config: CliConfig): string {
  return config.file ?? "<stdin>";
}

/** One line per descriptor: id, family, category and name, in columns. */
export function formatBlockList(registry: DescriptorRegistry): string {
  const rows = registry.list().map((descriptor) => [
    descriptor.id,
    descriptor.family,
    descriptor.category,
    descriptor.name,
  ]);
  const widths = [0, 1, 2].map((column) => Math.max(...rows.map((row) => (row[column] ?? "").length)));
  return rows
    .map((row) =>
      row
        .map((cell, column) => cell.padEnd(widths[column] ?? 0))
        .join("  ")
        .trimEnd(),
    )
    .join("\n")
    .concat("\n");
}

/**
 * Run one command.
 *
 * Errors propagate to the caller, which reports them and sets the exit code.
 */
export async function runCommand(
  config: CliConfig,
  registry: DescriptorRegistry,
  io: CommandIO,
): Promise<void> {
  switch (config.command) {
    case "blocks":
      await io.writeOutput(config.out, formatBlockList(registry));
      return;

    case "check": {
      const blocks = decodeScript(await io.readInput(config.file), registry);
      io.log(`${LOG_PREFIX} ${describeInput(config)}: OK (${blocks.length} blocks)`);
      return;
    }

    case "format": {
      const blocks = decodeScript(await io.readInput(config.file), registry);
      const text = encodeScript(blocks, { omitDefaults: config.omitDefaults });
      await io.writeOutput(config.write ? config.file : config.out, text);
      if (config.write) {
        io.log(`${LOG_PREFIX} Formatted ${describeInput(config)}`);
      }
      return;
    }

    case "compile": {
      const source = compileScript(await io.readInput(config.file), registry);
      await io.writeOutput(config.out, source);
      return;
    }

    default: {
      const _exhaustive: never = config.command;
      throw new Error(`Unknown command ${String(_exhaustive)}`);
    }
  }
}
