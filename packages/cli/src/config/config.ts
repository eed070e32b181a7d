/**
 * CLI argument parsing for the blockscript command.
 *
 * Supports:
 *   blockscript check login.blocks
 *   blockscript format --write --omit-defaults login.blocks
 *   blockscript compile login.blocks --out login.js
 *   blockscript blocks --catalog extra.blocks.json
 *   cat login.blocks | blockscript compile
 */

/** The subcommands of the CLI. */
export type CliCommand = "check" | "format" | "compile" | "blocks";

const COMMANDS: readonly CliCommand[] = ["check", "format", "compile", "blocks"];

/** Parsed configuration for one CLI run. */
export interface CliConfig {
  command: CliCommand;
  /** Script file to read. Absent means stdin. */
  file?: string;
  /** Where to write the result. Absent means stdout. */
  out?: string;
  /** `format` only: rewrite the input file in place. */
  write: boolean;
  /** `format` only: drop settings equal to their default. */
  omitDefaults: boolean;
  /** Extra catalog files registered after the built-in blocks. */
  catalogPaths: readonly string[];
}

/** Thrown for arguments the CLI does not understand. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = [
  "Usage: blockscript <check|format|compile|blocks> [file] [options]",
  "",
  "Options:",
  "  --catalog <path>   register the blocks of an extra catalog file (repeatable)",
  "  --out <path>       write the result to a file instead of stdout",
  "  --write            format: rewrite the input file in place",
  "  --omit-defaults    format: drop settings equal to their default",
  "",
  "Environment:",
  "  BLOCKSCRIPT_CATALOG   extra catalog file, registered before --catalog files",
].join("\n");

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parses process.argv into a CliConfig.
 *
 * @param argv - The full process.argv array
 * @throws CliUsageError for a missing or unknown command, an unknown flag or a flag without its value
 */
export function parseCliConfig(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): CliConfig {
  const args = argv.slice(2); // skip node + script
  const positional: string[] = [];
  const catalogPaths: string[] = [];
  let out: string | undefined;
  let write = false;
  let omitDefaults = false;

  const envCatalog = env["BLOCKSCRIPT_CATALOG"];
  if (envCatalog !== undefined && envCatalog !== "") {
    catalogPaths.push(envCatalog);
  }

  const valueOf = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined || value.startsWith("--")) {
      throw new CliUsageError(`${flag} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) break;

    if (arg === "--catalog") {
      catalogPaths.push(valueOf(arg, ++i));
    } else if (arg === "--out") {
      out = valueOf(arg, ++i);
    } else if (arg === "--write") {
      write = true;
    } else if (arg === "--omit-defaults") {
      omitDefaults = true;
    } else if (arg.startsWith("--")) {
      throw new CliUsageError(`Unknown option ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [command, file, ...extra] = positional;
  if (command === undefined) {
    throw new CliUsageError("Missing command");
  }
  if (!isCommand(command)) {
    throw new CliUsageError(`Unknown command ${command}`);
  }
  if (extra.length > 0) {
    throw new CliUsageError(`Unexpected argument ${extra.join(" ")}`);
  }
  if (write && (command !== "format" || file === undefined)) {
    throw new CliUsageError("--write needs the format command and a file");
  }

  return { command, file, out, write, omitDefaults, catalogPaths };
}
