/**
 * Script decoder: text to block instances.
 *
 * A script is a sequence of blocks, each starting with a `BLOCK:<id>`
 * header line. A block's body runs up to the next header. Headers may be
 * indented, except inside a Code block body, where only a header at
 * column 0 ends the body.
 */

import type { SourceLine } from "../blocks/block-instance.js";
import { createBlockInstance } from "../blocks/create-block.js";
import type { BlockInstance } from "../blocks/create-block.js";
import { ParseError, UnknownKindError } from "../errors.js";
import type { DescriptorLookup } from "../registry/descriptor-registry.js";

const HEADER_PATTERN = /^BLOCK:(.*)$/;

/** Split text into numbered lines. CRLF and CR line endings are normalized. */
export function splitLines(text: string): SourceLine[] {
  return text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line, i) => ({ text: line, lineNumber: i + 1 }));
}

function headerKind(line: SourceLine, allowIndent = true): string | undefined {
  const text = allowIndent ? line.text.trim() : line.text.trimEnd();
  return HEADER_PATTERN.exec(text)?.[1]?.trim();
}

/**
 * Decode a script into block instances, in script order.
 *
 * @throws ParseError for text before the first header or a malformed body line
 * @throws UnknownKindError for a header naming an unregistered kind
 */
export function decodeScript(text: string, registry: DescriptorLookup): BlockInstance[] {
  const lines = splitLines(text);
  const blocks: BlockInstance[] = [];
  let index = 0;

  while (index < lines.length) {
    const line = lines[index];
    if (line === undefined) break;
    const kindId = headerKind(line);
    if (kindId === undefined) {
      if (line.text.trim() !== "") {
        throw new ParseError(line.lineNumber, line.text, "Expected a BLOCK:<id> header");
      }
      index++;
      continue;
    }

    const descriptor = registry.find(kindId);
    if (descriptor === undefined) {
      throw new UnknownKindError(kindId, line.lineNumber, line.text);
    }

    const allowIndent = descriptor.family !== "code";
    let end = index + 1;
    while (end < lines.length) {
      const next = lines[end];
      if (next === undefined || headerKind(next, allowIndent) !== undefined) break;
      end++;
    }

    const block = createBlockInstance(descriptor);
    block.deserialize(lines.slice(index + 1, end));
    blocks.push(block);
    index = end;
  }

  return blocks;
}
