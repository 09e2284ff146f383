/**
 * Error Handler Middleware
 * Centralized error handling for Express application.
 * The only place errors become HTTP status codes.
 */

import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import { AppError } from "../utils/errors.js";
import { NODE_ENV } from "../config/env.js";

/**
 * Global error handler middleware.
 * Responds with a plain-text reason: the error's own status for domain
 * errors, 400 for upload parsing errors, 500 for anything unexpected.
 * MUST be registered last in middleware chain.
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // Mid-stream failure: let Express tear the connection down
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof AppError || error instanceof multer.MulterError) {
    const statusCode = error instanceof AppError ? error.statusCode : 400;
    console.warn(`[Error] ${statusCode} ${req.method} ${req.path} - ${error.message}`);
    res.status(statusCode).type("text/plain").send(error.message);
    return;
  }

  console.error(`[Error] 500 ${req.method} ${req.path} - ${error.message}`, {
    error: error.name,
    stack: NODE_ENV !== "production" ? error.stack : undefined,
  });
  res.status(500).type("text/plain").send("Internal server error");
}

/**
 * Fallback for unmatched routes.
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).type("text/plain").send("Not found");
}
