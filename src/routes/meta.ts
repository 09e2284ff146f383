/**
 * Metadata Routes
 * Read-only platform lookups, open to other origins.
 */

import { Router } from "express";
import cors from "cors";
import { createMetaHandler } from "../controllers/metaController.js";
import { validateQuery } from "../middlewares/validation.js";
import { metaQuerySchema } from "../middlewares/schemas/requestSchemas.js";
import type { MetadataService } from "../services/business/metadataService.js";

export function createMetaRouter(metadataService: MetadataService): Router {
  const router = Router();

  router.get("/meta", cors(), validateQuery(metaQuerySchema), createMetaHandler(metadataService));

  return router;
}
