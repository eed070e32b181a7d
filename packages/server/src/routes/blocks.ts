/**
 * Block catalog routes: the descriptors scripts may use.
 */

import { Router } from "express";
import type { DescriptorRegistry } from "@blockscript/core";
import { summarizeDescriptor } from "../summaries.js";

export function createBlockRoutes(registry: DescriptorRegistry): Router {
  const router = Router();

  // GET /api/blocks: every descriptor, optionally filtered by ?category=
  router.get("/api/blocks", (req, res) => {
    const category = typeof req.query["category"] === "string" ? req.query["category"] : undefined;
    const descriptors = category === undefined ? registry.list() : registry.listByCategory(category);
    res.json({ blocks: descriptors.map(summarizeDescriptor), categories: registry.categories() });
  });

  // GET /api/blocks/:id: one descriptor
  router.get("/api/blocks/:id", (req, res) => {
    const id = req.params["id"] ?? "";
    const descriptor = registry.find(id);
    if (descriptor === undefined) {
      res.status(404).json({ error: { type: "NotFound", message: `Unknown block kind "${id}"` } });
      return;
    }
    res.json({ block: summarizeDescriptor(descriptor) });
  });

  return router;
}
