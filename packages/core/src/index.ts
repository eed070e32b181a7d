/**
 * @blockscript/core: block registry, script text codec and code generator.
 *
 * Pure and synchronous apart from loading the built-in catalog once.
 */

// Errors
export {
  BlockScriptError,
  UnknownKindError,
  ParseError,
  InvalidSettingError,
  UnsupportedOperationError,
  RegistryError,
  EXCERPT_MAX_LENGTH,
  truncateExcerpt,
} from "./errors.js";
export type { BlockScriptErrorType } from "./errors.js";

// Settings
export {
  fixedString,
  fixedEnum,
  fixedInt,
  fixedFloat,
  fixedBool,
  fixedBytes,
  variable,
  interpolated,
  listOf,
  dictOf,
  settingValuesEqual,
} from "./settings/setting-types.js";
export type {
  SettingValue,
  FixedSettingValue,
  VariableSettingValue,
  InterpolatedSettingValue,
  ListSettingValue,
  DictSettingValue,
  BlockSetting,
  ScalarType,
} from "./settings/setting-types.js";
export {
  NotationError,
  parseSettingValue,
  parseSettingLine,
  formatSettingValue,
  formatSettingLine,
  quoteString,
} from "./settings/setting-notation.js";
export { resolveValue, resolveSetting } from "./settings/setting-resolver.js";
export {
  GLOBALS_PREFIX,
  isGlobalVariable,
  makeValidVariableName,
  variableExpression,
} from "./settings/variable-names.js";

// Registry
export { descriptorFromCatalog } from "./registry/descriptor.js";
export type {
  ParamSchema,
  BlockDescriptor,
  ParseDescriptor,
  FunctionDescriptor,
  ConditionDescriptor,
  RequestDescriptor,
  CodeDescriptor,
} from "./registry/descriptor.js";
export { DescriptorRegistry } from "./registry/descriptor-registry.js";
export type { DescriptorLookup } from "./registry/descriptor-registry.js";
export {
  BUILTIN_CATALOG_PATH,
  loadBuiltinCatalog,
  createBuiltinRegistry,
  loadRegistry,
} from "./registry/builtin-registry.js";

// Blocks
export { BlockInstanceBase, SETTING_INDENT } from "./blocks/block-instance.js";
export type { SourceLine, SerializeOptions } from "./blocks/block-instance.js";
export { ParseBlockInstance, PARSE_MODES } from "./blocks/parse-block.js";
export type { ParseMode, ParseModeEntry } from "./blocks/parse-block.js";
export { FunctionBlockInstance } from "./blocks/function-block.js";
export { ConditionBlockInstance } from "./blocks/condition-block.js";
export { RequestBlockInstance, REQUEST_TYPES } from "./blocks/request-block.js";
export type { RequestType } from "./blocks/request-block.js";
export { CodeBlockInstance } from "./blocks/code-block.js";
export { createBlockInstance } from "./blocks/create-block.js";
export type { BlockInstance } from "./blocks/create-block.js";

// Codec
export { decodeScript, splitLines } from "./codec/script-decoder.js";
export { encodeScript } from "./codec/script-encoder.js";

// Generator
export {
  createGenerationContext,
  outputTarget,
  captureStatement,
} from "./generator/generation-context.js";
export type { GenerationContext } from "./generator/generation-context.js";
export { generateScript, compileScript } from "./generator/script-generator.js";
