/**
 * Metadata Controller
 * Display-only platform metadata lookup.
 */

import type { Request, Response, NextFunction } from "express";
import type { MetaQuery } from "../middlewares/schemas/requestSchemas.js";
import type { MetadataService } from "../services/business/metadataService.js";
import { buildMetadataFragment } from "../services/business/pageService.js";

/**
 * GET /meta?link= - Returns an HTML fragment describing the link
 */
export function createMetaHandler(metadataService: MetadataService) {
  return async function getMetadata(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { link }: MetaQuery = res.locals.query; // Parsed by validateQuery
      const result = await metadataService.lookup(link);

      res.type("html").send(buildMetadataFragment(result));
    } catch (error) {
      next(error);
    }
  };
}
