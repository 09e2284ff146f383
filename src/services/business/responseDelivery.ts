/**
 * Response Delivery
 * Streams a converted file to the client as an attachment.
 */

import type { Request, Response } from "express";
import type { ConvertedAudio, DeliveryOutcome, TargetFormat } from "../../types/conversion.js";

export const MEDIA_TYPES: Record<TargetFormat, string> = {
  wav: "audio/x-wav",
  aiff: "audio/aiff",
};

function isClientAbort(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = "code" in error ? error.code : undefined;
  // Express reports "Request aborted" when the peer goes away mid-response
  return code === "ECONNABORTED" || error.message === "Request aborted";
}

/**
 * Resolves once the transport has finished with the file, so the
 * caller's workspace can be released afterwards. A client that went
 * away resolves as "aborted" rather than failing the request.
 */
export async function deliverOutput(req: Request, res: Response, audio: ConvertedAudio): Promise<DeliveryOutcome> {
  res.setHeader("Content-Type", audio.mediaType);

  return new Promise<DeliveryOutcome>((resolve, reject) => {
    res.download(audio.path, audio.downloadName, (error) => {
      if (!error) return resolve("delivered");

      if (req.destroyed || res.destroyed || isClientAbort(error)) {
        console.log(`[deliver] client aborted download of ${audio.downloadName}: ${error.message}`);
        return resolve("aborted");
      }
      reject(error);
    });
  });
}
