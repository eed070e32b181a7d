/**
 * Block descriptors: the immutable schema of a block kind.
 *
 * Descriptors are built from catalog entries once, at registry load time,
 * and are shared read-only by every block instance of that kind.
 */

import type {
  BlockFamily,
  CatalogBlock,
  ParameterType,
  ReturnType,
} from "@blockscript/schema";
import { RegistryError } from "../errors.js";
import { defaultSettingValue } from "../settings/setting-defaults.js";
import type { SettingValue } from "../settings/setting-types.js";

/** Schema of a single block parameter. */
export interface ParamSchema {
  readonly name: string;
  readonly type: ParameterType;
  /** Value new instances start with. */
  readonly default: SettingValue;
  /** Allowed tokens for `enum` parameters. */
  readonly enumValues?: readonly string[];
  readonly description?: string;
}

/** Fields shared by every descriptor. */
interface DescriptorBase<F extends BlockFamily> {
  /** Stable kind id, written in `BLOCK:<id>` headers. */
  readonly id: string;
  readonly family: F;
  /** Human-readable name, also the default label of new instances. */
  readonly name: string;
  readonly category: string;
  readonly description: string;
  /** Parameters in declaration order. */
  readonly parameters: ReadonlyMap<string, ParamSchema>;
}

export type ParseDescriptor = DescriptorBase<"parse">;
export type ConditionDescriptor = DescriptorBase<"condition">;
export type RequestDescriptor = DescriptorBase<"request">;
export type CodeDescriptor = DescriptorBase<"code">;

/** A block that calls one runtime function and may store its result. */
export interface FunctionDescriptor extends DescriptorBase<"function"> {
  /** Name of the runtime function the generated code calls. */
  readonly callee: string;
  readonly returnType: ReturnType;
  /** Whether the call must be awaited. */
  readonly async: boolean;
}

/**
 * A block descriptor: discriminated union on `family`.
 */
export type BlockDescriptor =
  | ParseDescriptor
  | FunctionDescriptor
  | ConditionDescriptor
  | RequestDescriptor
  | CodeDescriptor;

/**
 * Build a descriptor from a validated catalog entry.
 *
 * @throws RegistryError for duplicate parameters or defaults that do not fit their type
 */
export function descriptorFromCatalog(block: CatalogBlock): BlockDescriptor {
  const parameters = new Map<string, ParamSchema>();
  for (const param of block.parameters) {
    if (parameters.has(param.name)) {
      throw new RegistryError(`Block ${block.id} declares parameter ${param.name} twice`);
    }
    parameters.set(param.name, {
      name: param.name,
      type: param.type,
      default: defaultSettingValue(param, block.id),
      enumValues: param.enumValues,
      description: param.description,
    });
  }

  const base = {
    id: block.id,
    name: block.name,
    category: block.category ?? "General",
    description: block.description ?? "",
    parameters,
  };

  switch (block.family) {
    case "parse":
      return { ...base, family: "parse" };
    case "condition":
      return { ...base, family: "condition" };
    case "request":
      return { ...base, family: "request" };
    case "code":
      return { ...base, family: "code" };
    case "function":
      if (block.callee === undefined || block.returnType === undefined) {
        throw new RegistryError(`Function block ${block.id} needs a callee and a returnType`);
      }
      return {
        ...base,
        family: "function",
        callee: block.callee,
        returnType: block.returnType,
        async: block.async ?? false,
      };
    default: {
      const _exhaustive: never = block.family;
      throw new RegistryError(`Unknown block family ${String(_exhaustive)}`);
    }
  }
}
