import express, { type Express } from "express";
import helmet from "helmet";
import { createRouter, type RouteDependencies } from "./routes/index.js";
import { createApiLimiter } from "./middlewares/rateLimiting.js";
import { errorHandler, notFoundHandler } from "./middlewares/errorHandler.js";

/**
 * Builds the Express application.
 * Services are passed in so tests can swap the network and ffmpeg layers.
 */
export function createApp(deps: RouteDependencies): Express {
  const app = express();

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers; metadata thumbnails come from platform CDNs. */
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          "img-src": ["'self'", "data:", "https:"],
        },
      },
    })
  );
  /** Parses URL-only form posts; multipart is handled per route by multer. */
  app.use(express.urlencoded({ extended: false, limit: "64kb" }));

  /** Rate limiting for all routes. */
  app.use(createApiLimiter());

  /** Application routes. */
  app.use(createRouter(deps));

  app.use(notFoundHandler);

  /** Global error handler - MUST be last. */
  app.use(errorHandler);

  return app;
}
