/**
 * Validation Middleware
 * Validates request bodies and query strings against Zod schemas.
 */

import type { Request, Response, NextFunction } from "express";
import { ZodError, type ZodSchema } from "zod";
import { ValidationError } from "../utils/errors.js";

function toValidationError(error: ZodError): ValidationError {
  return new ValidationError(error.issues[0]?.message ?? "Invalid request.", error);
}

/**
 * Validates request body against a Zod schema.
 * The first issue is reported as a ValidationError.
 */
export function validateBody(schema: ZodSchema) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body ?? {});
    if (!result.success) {
      next(toValidationError(result.error));
      return;
    }
    req.body = result.data;
    next();
  };
}

/**
 * Validates the query string. Parsed values are left on res.locals.query,
 * since Express owns req.query.
 */
export function validateQuery(schema: ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      next(toValidationError(result.error));
      return;
    }
    res.locals.query = result.data;
    next();
  };
}
