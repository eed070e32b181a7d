/**
 * @blockscript/schema: JSON Schema and TypeScript types for block catalogs.
 *
 * This package is the shared contract between the compiler core, the
 * server and the CLI. The schema is the source of truth; TypeScript types
 * are aligned with it.
 */

export type {
  BlockCatalog,
  CatalogBlock,
  CatalogParameter,
  CatalogFixedDefault,
  BlockFamily,
  DefaultMode,
  ParameterType,
  ReturnType,
} from "./catalog-types.js";

export {
  CATALOG_SCHEMA_PATH,
  CatalogValidationError,
  validateCatalog,
  readCatalogFile,
} from "./catalog-validator.js";
