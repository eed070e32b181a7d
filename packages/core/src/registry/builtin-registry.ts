/**
 * The built-in block catalog and the default registry built from it.
 */

import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { readCatalogFile, validateCatalog } from "@blockscript/schema";
import type { BlockCatalog } from "@blockscript/schema";
import { DescriptorRegistry } from "./descriptor-registry.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Path of the built-in catalog shipped with this package. */
export const BUILTIN_CATALOG_PATH = resolve(__dirname, "builtin-blocks.json");

let builtinCatalog: BlockCatalog | null = null;

/** Read and validate the built-in catalog. The result is cached. */
export function loadBuiltinCatalog(): BlockCatalog {
  if (builtinCatalog === null) {
    const parsed: unknown = JSON.parse(readFileSync(BUILTIN_CATALOG_PATH, "utf-8"));
    builtinCatalog = validateCatalog(parsed, BUILTIN_CATALOG_PATH);
  }
  return builtinCatalog;
}

/**
 * Create a frozen registry holding the built-in blocks, followed by the
 * blocks of `extraCatalogs` in order.
 *
 * @throws CatalogValidationError if an extra catalog does not conform to the schema
 * @throws RegistryError if an extra catalog reuses a built-in id
 */
export function createBuiltinRegistry(
  extraCatalogs: readonly BlockCatalog[] = [],
): DescriptorRegistry {
  const registry = new DescriptorRegistry();
  registry.registerCatalog(loadBuiltinCatalog());
  extraCatalogs.forEach((catalog, index) => {
    registry.registerCatalog(validateCatalog(catalog, `extra catalog #${index + 1}`));
  });
  return registry.freeze();
}

/**
 * Read extra catalog files and build a frozen registry from the built-in
 * blocks plus theirs, in the order given.
 *
 * @throws CatalogValidationError if a file is not valid JSON or not a catalog
 */
export async function loadRegistry(catalogPaths: readonly string[] = []): Promise<DescriptorRegistry> {
  const catalogs: BlockCatalog[] = [];
  for (const path of catalogPaths) {
    catalogs.push(await readCatalogFile(path));
  }
  return createBuiltinRegistry(catalogs);
}
