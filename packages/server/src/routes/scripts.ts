/**
 * Script routes: decode, format and compile block scripts.
 *
 * Bodies are validated with zod. Errors are thrown and turned into JSON
 * responses by the app's error handler.
 */

import { Router } from "express";
import { z } from "zod";
import { compileScript, decodeScript, encodeScript } from "@blockscript/core";
import type { DescriptorRegistry } from "@blockscript/core";
import { summarizeBlock } from "../summaries.js";

const scriptBody = z.object({
  script: z.string(),
});

const formatBody = scriptBody.extend({
  omitDefaults: z.boolean().optional(),
});

export function createScriptRoutes(registry: DescriptorRegistry): Router {
  const router = Router();

  // POST /api/scripts/decode: script text → block summaries
  router.post("/api/scripts/decode", (req, res) => {
    const { script } = scriptBody.parse(req.body);
    res.json({ blocks: decodeScript(script, registry).map(summarizeBlock) });
  });

  // POST /api/scripts/format: script text → canonical script text
  router.post("/api/scripts/format", (req, res) => {
    const { script, omitDefaults } = formatBody.parse(req.body);
    res.json({ script: encodeScript(decodeScript(script, registry), { omitDefaults }) });
  });

  // POST /api/scripts/compile: script text → generated program
  router.post("/api/scripts/compile", (req, res) => {
    const { script } = scriptBody.parse(req.body);
    res.json({ source: compileScript(script, registry) });
  });

  return router;
}
