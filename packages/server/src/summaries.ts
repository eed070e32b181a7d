/**
 * JSON views of descriptors and block instances, shared by the REST
 * routes and the MCP tools.
 */

import { formatSettingValue } from "@blockscript/core";
import type { BlockDescriptor, BlockInstance } from "@blockscript/core";

export interface ParameterSummary {
  name: string;
  type: string;
  /** Default value in setting notation, e.g. `@data.source` or `"innerText"`. */
  default: string;
  enumValues?: readonly string[];
  description?: string;
}

export interface DescriptorSummary {
  id: string;
  family: BlockDescriptor["family"];
  name: string;
  category: string;
  description: string;
  callee?: string;
  returnType?: string;
  async?: boolean;
  parameters: ParameterSummary[];
}

export interface BlockSummary {
  id: string;
  family: BlockInstance["family"];
  label: string;
  disabled: boolean;
  /** Settings in setting notation, keyed by parameter name. */
  settings: Record<string, string>;
  mode?: string;
  recursive?: boolean;
  requestType?: string;
  status?: string;
  outputVariable?: string;
  isCapture?: boolean;
  lines?: string[];
}

export function summarizeDescriptor(descriptor: BlockDescriptor): DescriptorSummary {
  const summary: DescriptorSummary = {
    id: descriptor.id,
    family: descriptor.family,
    name: descriptor.name,
    category: descriptor.category,
    description: descriptor.description,
    parameters: [...descriptor.parameters.values()].map((param) => ({
      name: param.name,
      type: param.type,
      default: formatSettingValue(param.default),
      ...(param.enumValues !== undefined ? { enumValues: param.enumValues } : {}),
      ...(param.description !== undefined ? { description: param.description } : {}),
    })),
  };
  if (descriptor.family === "function") {
    summary.callee = descriptor.callee;
    summary.returnType = descriptor.returnType;
    summary.async = descriptor.async;
  }
  return summary;
}

export function summarizeBlock(block: BlockInstance): BlockSummary {
  const settings: Record<string, string> = {};
  for (const setting of block.settings.values()) {
    settings[setting.name] = formatSettingValue(setting.value);
  }
  const summary: BlockSummary = {
    id: block.id,
    family: block.family,
    label: block.label,
    disabled: block.disabled,
    settings,
  };

  switch (block.family) {
    case "parse":
      return {
        ...summary,
        mode: block.mode,
        recursive: block.recursive,
        outputVariable: block.outputVariable,
        isCapture: block.isCapture,
      };
    case "function":
      return block.hasOutput
        ? { ...summary, outputVariable: block.outputVariable, isCapture: block.isCapture }
        : summary;
    case "condition":
      return { ...summary, status: block.status };
    case "request":
      return { ...summary, requestType: block.requestType };
    case "code":
      return { ...summary, lines: [...block.lines] };
  }
}
