/**
 * Block instance union and factory.
 */

import type { BlockDescriptor } from "../registry/descriptor.js";
import { CodeBlockInstance } from "./code-block.js";
import { ConditionBlockInstance } from "./condition-block.js";
import { FunctionBlockInstance } from "./function-block.js";
import { ParseBlockInstance } from "./parse-block.js";
import { RequestBlockInstance } from "./request-block.js";

/**
 * A block instance: discriminated union on `family`.
 */
export type BlockInstance =
  | ParseBlockInstance
  | FunctionBlockInstance
  | ConditionBlockInstance
  | RequestBlockInstance
  | CodeBlockInstance;

/** Create an instance of a descriptor, with every setting at its default. */
export function createBlockInstance(descriptor: BlockDescriptor): BlockInstance {
  switch (descriptor.family) {
    case "parse":
      return new ParseBlockInstance(descriptor);
    case "function":
      return new FunctionBlockInstance(descriptor);
    case "condition":
      return new ConditionBlockInstance(descriptor);
    case "request":
      return new RequestBlockInstance(descriptor);
    case "code":
      return new CodeBlockInstance(descriptor);
    default: {
      const _exhaustive: never = descriptor;
      return _exhaustive;
    }
  }
}
