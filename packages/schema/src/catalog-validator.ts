/**
 * Block catalog validation against block-catalog.schema.json.
 *
 * The schema is compiled once, on first use, and shared by every call.
 */

import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { Ajv2020 } from "ajv/dist/2020.js";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import type { BlockCatalog } from "./catalog-types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Absolute path of the catalog JSON Schema shipped with this package. */
export const CATALOG_SCHEMA_PATH = resolve(__dirname, "block-catalog.schema.json");

/** Thrown when a catalog does not conform to the schema. */
export class CatalogValidationError extends Error {
  readonly type = "CatalogValidationError";

  constructor(
    readonly source: string,
    readonly issues: readonly string[],
  ) {
    super(`Invalid block catalog (${source}): ${issues.join("; ")}`);
    this.name = "CatalogValidationError";
  }
}

let compiled: ValidateFunction<BlockCatalog> | null = null;

function getValidator(): ValidateFunction<BlockCatalog> {
  if (compiled === null) {
    const schema: SchemaObject = JSON.parse(readFileSync(CATALOG_SCHEMA_PATH, "utf-8"));
    const ajv = new Ajv2020({ allErrors: true, strictTypes: false });
    compiled = ajv.compile<BlockCatalog>(schema);
  }
  return compiled;
}

/** Render one ajv error as `<path> <message>`, e.g. `/blocks/0 must have required property 'id'`. */
function formatIssue(error: ErrorObject): string {
  const path = error.instancePath === "" ? "/" : error.instancePath;
  return `${path} ${error.message ?? "is invalid"}`;
}

/**
 * Check a parsed JSON value against the catalog schema.
 *
 * @param source - Where the value came from, used in the error message
 * @returns The same value, typed as a catalog
 * @throws CatalogValidationError listing every schema violation
 */
export function validateCatalog(input: unknown, source = "<inline>"): BlockCatalog {
  const validate = getValidator();
  if (validate(input)) {
    return input;
  }
  throw new CatalogValidationError(source, (validate.errors ?? []).map(formatIssue));
}

/**
 * Read and validate a catalog file.
 *
 * @throws CatalogValidationError if the file is not valid JSON or not a valid catalog
 */
export async function readCatalogFile(path: string): Promise<BlockCatalog> {
  const text = await readFile(path, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CatalogValidationError(path, [`not valid JSON: ${reason}`]);
  }
  return validateCatalog(parsed, path);
}
