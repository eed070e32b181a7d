/**
 * Script generator: block instances to JavaScript statements.
 *
 * The output is a linear list of statements. The runtime embeds it in an
 * async function that declares `data`, `globals` and the runtime callees.
 */

import type { BlockInstance } from "../blocks/create-block.js";
import { decodeScript } from "../codec/script-decoder.js";
import type { DescriptorLookup } from "../registry/descriptor-registry.js";
import { createGenerationContext } from "./generation-context.js";

/**
 * Generate the program of a script. Disabled blocks emit nothing and
 * declare nothing.
 *
 * @throws BlockScriptError from the first block that fails; no partial output
 */
export function generateScript(blocks: readonly BlockInstance[]): string {
  const context = createGenerationContext();
  let source = "";
  for (const block of blocks) {
    if (block.disabled) continue;
    source += block.generate(context);
  }
  return source;
}

/** Decode a script and generate its program. */
export function compileScript(text: string, registry: DescriptorLookup): string {
  return generateScript(decodeScript(text, registry));
}
