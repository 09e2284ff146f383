/**
 * Route Aggregator
 * Combines all routers into a single router.
 */

import { Router } from "express";
import { createHealthRouter } from "./health.js";
import { createConvertRouter } from "./convert.js";
import { createMetaRouter } from "./meta.js";
import type { ConversionService } from "../services/business/conversionService.js";
import type { MetadataService } from "../services/business/metadataService.js";

export interface RouteDependencies {
  workspaceRoot: string;
  conversionService: ConversionService;
  metadataService: MetadataService;
}

export function createRouter(deps: RouteDependencies): Router {
  const router = Router();

  /** Register all route modules */
  router.use(createHealthRouter(deps.workspaceRoot));
  router.use(createConvertRouter(deps.conversionService));
  router.use(createMetaRouter(deps.metadataService));

  return router;
}
