/**
 * Request blocks: perform an HTTP request through the runtime.
 */

import { ParseError, UnsupportedOperationError } from "../errors.js";
import type { GenerationContext } from "../generator/generation-context.js";
import type { RequestDescriptor } from "../registry/descriptor.js";
import { BlockInstanceBase } from "./block-instance.js";
import type { SerializeOptions, SourceLine } from "./block-instance.js";

/** How the request body is given. */
export type RequestType = "Standard" | "Raw";

interface RequestTypeEntry {
  readonly callee: string;
  /** Body parameters, passed after the common ones. */
  readonly parameters: readonly string[];
}

const COMMON_PARAMETERS = [
  "url",
  "method",
  "autoRedirect",
  "customHeaders",
  "customCookies",
  "timeoutMilliseconds",
] as const;

export const REQUEST_TYPES: Readonly<Record<RequestType, RequestTypeEntry>> = {
  Standard: { callee: "httpRequestStandard", parameters: ["content", "contentType"] },
  Raw: { callee: "httpRequestRaw", parameters: ["rawContent", "contentType"] },
};

function isRequestType(value: string): value is RequestType {
  return Object.prototype.hasOwnProperty.call(REQUEST_TYPES, value);
}

const TYPE_PATTERN = /^TYPE:([A-Za-z]+)$/;

export class RequestBlockInstance extends BlockInstanceBase<RequestDescriptor> {
  readonly family = "request";
  requestType: RequestType = "Standard";

  protected serializeBody(options: SerializeOptions): string[] {
    return [`TYPE:${this.requestType}`, ...this.serializeSettings(options)];
  }

  protected deserializeBody(lines: readonly SourceLine[]): void {
    for (const line of lines) {
      const text = line.text.trim();
      if (text === "") continue;

      if (text.startsWith("TYPE:")) {
        const type = TYPE_PATTERN.exec(text)?.[1];
        if (type === undefined || !isRequestType(type)) {
          throw new ParseError(line.lineNumber, line.text, "Could not understand the request type");
        }
        this.requestType = type;
      } else {
        this.readSettingLine(line);
      }
    }
  }

  protected generateBody(_context: GenerationContext): string {
    const entry = REQUEST_TYPES[this.requestType];
    if (entry === undefined) {
      throw new UnsupportedOperationError(this.id, `request type ${String(this.requestType)}`);
    }
    const args = [
      "data",
      ...COMMON_PARAMETERS.map((name) => this.argument(name)),
      ...entry.parameters.map((name) => this.argument(name)),
    ];
    return `await ${entry.callee}(${args.join(", ")});\n`;
  }
}
