/**
 * Convert Routes
 * Form page and the conversion endpoint.
 */

import { Router } from "express";
import { upload } from "../config/multer.js";
import { getHomePage } from "../controllers/homeController.js";
import { createConvertHandler } from "../controllers/convertController.js";
import { createConvertLimiter } from "../middlewares/rateLimiting.js";
import { validateBody } from "../middlewares/validation.js";
import { convertSchema } from "../middlewares/schemas/requestSchemas.js";
import type { ConversionService } from "../services/business/conversionService.js";

export function createConvertRouter(conversionService: ConversionService): Router {
  const router = Router();

  /** Upload / URL form */
  router.get("/", getHomePage);

  /** Converts to WAV or AIFF and returns the file as an attachment */
  router.post(
    "/convert",
    createConvertLimiter(),
    upload.single("file"),
    validateBody(convertSchema),
    createConvertHandler(conversionService)
  );

  return router;
}
