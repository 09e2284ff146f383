/**
 * HTTP Server Entry Point
 * Wires the services, starts the Express application and
 * handles graceful shutdown on SIGTERM.
 */
import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app.js";
import { initializeApp } from "./config/init.js";
import { createAcquisitionPolicy } from "./config/policy.js";
import {
  CONVERSION_TIMEOUT_SECONDS,
  FFMPEG_PATH,
  METADATA_TIMEOUT_MS,
  PORT,
  WORKSPACE_MAX_AGE_HOURS,
  WORKSPACE_ROOT,
} from "./config/env.js";
import { ConversionService } from "./services/business/conversionService.js";
import { InputAcquirer } from "./services/business/inputAcquirer.js";
import { MetadataService } from "./services/business/metadataService.js";
import { FfmpegTranscoder } from "./services/external/ffmpeg.js";

const conversionService = new ConversionService({
  workspaceRoot: WORKSPACE_ROOT,
  acquirer: new InputAcquirer({ policy: createAcquisitionPolicy() }),
  transcoder: new FfmpegTranscoder({ timeoutSeconds: CONVERSION_TIMEOUT_SECONDS }),
});
const metadataService = new MetadataService({ timeoutMs: METADATA_TIMEOUT_MS });

const app = createApp({ workspaceRoot: WORKSPACE_ROOT, conversionService, metadataService });

/** HTTP server instance wrapping the Express application. */
const server = createServer(app);

/**
 * Prepares the workspace root before accepting requests.
 */
initializeApp({
  workspaceRoot: WORKSPACE_ROOT,
  workspaceMaxAgeHours: WORKSPACE_MAX_AGE_HOURS,
  ffmpegPath: FFMPEG_PATH,
})
  .then(() => {
    server.listen(PORT, "0.0.0.0", () => {
      console.log(`Server running on 0.0.0.0:${PORT}`);
    });
  })
  .catch((error: unknown) => {
    console.error("✗ Startup failed:", error);
    process.exit(1);
  });

/**
 * Handles graceful shutdown on SIGTERM signal.
 * In-flight conversions finish and release their workspaces first.
 */
process.on("SIGTERM", () => {
  server.close(() => process.exit(0));
});
