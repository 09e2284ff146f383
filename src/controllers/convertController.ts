/**
 * Convert Controller
 * Handles the conversion form submission.
 */

import type { Request, Response, NextFunction } from "express";
import type { ConvertFields } from "../middlewares/schemas/requestSchemas.js";
import {
  toConversionRequest,
  type ConversionService,
} from "../services/business/conversionService.js";
import { deliverOutput } from "../services/business/responseDelivery.js";

/**
 * POST /convert - Converts an upload or a direct audio URL and streams the result
 */
export function createConvertHandler(conversionService: ConversionService) {
  return async function convert(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const fields: ConvertFields = req.body; // Parsed by validateBody
      const request = toConversionRequest(fields, req.file);

      await conversionService.run(request, (audio) => deliverOutput(req, res, audio));
    } catch (error) {
      next(error);
    }
  };
}
