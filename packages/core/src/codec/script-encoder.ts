/**
 * Script encoder: block instances to text.
 */

import type { SerializeOptions } from "../blocks/block-instance.js";
import type { BlockInstance } from "../blocks/create-block.js";

/**
 * Encode blocks as script text: one `BLOCK:<id>` section per block,
 * separated by a blank line, with a trailing newline.
 *
 * @throws InvalidSettingError if a block holds a setting its descriptor lacks
 */
export function encodeScript(blocks: readonly BlockInstance[], options: SerializeOptions = {}): string {
  if (blocks.length === 0) {
    return "";
  }
  const sections = blocks.map((block) => [`BLOCK:${block.id}`, ...block.serialize(options)].join("\n"));
  return `${sections.join("\n\n")}\n`;
}
