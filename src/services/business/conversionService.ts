/**
 * Conversion Service
 * Runs one request through workspace → input → transcode → delivery.
 * Every stage failure is terminal; the workspace is always released.
 */

import path from "path";
import type {
  ConversionRequest,
  ConversionStage,
  ConvertedAudio,
  DeliveryOutcome,
  InputFile,
} from "../../types/conversion.js";
import type { ConvertFields } from "../../middlewares/schemas/requestSchemas.js";
import type { Transcoder } from "../external/ffmpeg.js";
import { ValidationError } from "../../utils/errors.js";
import type { InputAcquirer } from "./inputAcquirer.js";
import { MEDIA_TYPES } from "./responseDelivery.js";
import { withWorkspace, type Workspace } from "./workspace.js";

export interface UploadedAudio {
  originalname: string;
  buffer: Buffer;
}

export interface ConversionServiceOptions {
  workspaceRoot: string;
  acquirer: InputAcquirer;
  transcoder: Transcoder;
}

/**
 * Builds a request from validated form fields.
 * An upload takes precedence over a URL when both are given.
 */
export function toConversionRequest(fields: ConvertFields, file?: UploadedAudio): ConversionRequest {
  if (file && file.originalname) {
    return {
      format: fields.format,
      rightsConfirmed: true,
      source: { kind: "upload", fileName: file.originalname, bytes: file.buffer },
    };
  }
  if (fields.file_url) {
    return {
      format: fields.format,
      rightsConfirmed: true,
      source: { kind: "url", url: fields.file_url },
    };
  }
  throw new ValidationError("Provide a file upload or a direct audio file URL.");
}

export class ConversionService {
  constructor(private readonly options: ConversionServiceOptions) {}

  /**
   * Converts the request's source and hands the result to deliver.
   * The workspace outlives deliver, so streaming finishes before teardown.
   * The final stage logged is the outcome deliver reports.
   */
  async run(
    request: ConversionRequest,
    deliver: (audio: ConvertedAudio) => Promise<DeliveryOutcome>
  ): Promise<DeliveryOutcome> {
    return withWorkspace(this.options.workspaceRoot, async (workspace) => {
      let stage: ConversionStage = "received";
      const advance = (next: ConversionStage) => {
        stage = next;
        console.log(`[convert] ${workspace.id} ${next}`);
      };

      try {
        advance("validated");
        const input = await this.acquire(workspace, request);
        advance("acquired");

        const output = await this.options.transcoder.transcode(input, request.format);
        advance("converted");

        const outcome = await deliver({
          path: output.path,
          downloadName: path.basename(output.path),
          mediaType: MEDIA_TYPES[output.format],
          format: output.format,
        });
        advance(outcome);
        return outcome;
      } catch (error) {
        console.warn(`[convert] ${workspace.id} failed after ${stage}: ${describe(error)}`);
        throw error;
      }
    });
  }

  private async acquire(workspace: Workspace, request: ConversionRequest): Promise<InputFile> {
    const { source } = request;
    if (source.kind === "upload") {
      return this.options.acquirer.fromUpload(workspace, source.fileName, source.bytes);
    }
    return this.options.acquirer.fromUrl(workspace, source.url);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
