/**
 * Mapping of thrown errors to JSON error responses.
 */

import { BlockScriptError, ParseError, UnknownKindError } from "@blockscript/core";
import { ZodError } from "zod";

export interface ErrorBody {
  error: {
    type: string;
    message: string;
    lineNumber?: number;
    excerpt?: string;
  };
}

export interface DescribedError {
  status: number;
  body: ErrorBody;
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Describe an error as an HTTP status and body.
 *
 * - invalid request bodies → 400 `BadRequest`
 * - block script errors → 422 with their type, plus line and excerpt when known
 * - anything else → 500 `InternalError`
 */
export function describeError(err: unknown): DescribedError {
  if (err instanceof ZodError) {
    return { status: 400, body: { error: { type: "BadRequest", message: formatZodError(err) } } };
  }
  if (err instanceof SyntaxError) {
    return { status: 400, body: { error: { type: "BadRequest", message: "Malformed JSON body" } } };
  }
  if (err instanceof BlockScriptError) {
    const body: ErrorBody = { error: { type: err.type, message: err.message } };
    if (err instanceof ParseError) {
      body.error.lineNumber = err.lineNumber;
      body.error.excerpt = err.excerpt;
    } else if (err instanceof UnknownKindError && err.lineNumber !== undefined) {
      body.error.lineNumber = err.lineNumber;
      body.error.excerpt = err.excerpt;
    }
    return { status: 422, body };
  }
  return {
    status: 500,
    body: { error: { type: "InternalError", message: err instanceof Error ? err.message : String(err) } },
  };
}
