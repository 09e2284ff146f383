/**
 * FFmpeg Service
 * Re-encodes any input audio to the fixed uncompressed output profile.
 */

import ffmpeg from "fluent-ffmpeg";
import type { InputFile, OutputFile, TargetFormat } from "../../types/conversion.js";
import { outputPathFor } from "../../utils/fileNames.js";
import { ConversionError } from "../../utils/errors.js";

/** 44.1 kHz, 16-bit PCM stereo. Not negotiable per request. */
export const OUTPUT_SAMPLE_RATE = 44_100;
export const OUTPUT_CHANNELS = 2;

/** Sample byte order follows the container: RIFF is little-endian, AIFF big-endian. */
export const PCM_CODECS: Record<TargetFormat, string> = {
  wav: "pcm_s16le",
  aiff: "pcm_s16be",
};

export interface Transcoder {
  transcode(input: InputFile, format: TargetFormat): Promise<OutputFile>;
}

export interface FfmpegTranscoderOptions {
  /** Kill ffmpeg after this many seconds; 0 or unset waits for it to exit */
  timeoutSeconds?: number;
}

export class FfmpegTranscoder implements Transcoder {
  constructor(private readonly options: FfmpegTranscoderOptions = {}) {}

  /**
   * Writes <input base name>.<format> next to the input.
   * Engine failures surface as ConversionError with ffmpeg's stderr untouched.
   */
  async transcode(input: InputFile, format: TargetFormat): Promise<OutputFile> {
    const outputPath = outputPathFor(input.path, format);
    const timeout = this.options.timeoutSeconds || undefined;

    await new Promise<void>((resolve, reject) => {
      ffmpeg(input.path, { timeout })
        .inputOptions(["-loglevel", "error"])
        .noVideo()
        .audioCodec(PCM_CODECS[format])
        .audioFrequency(OUTPUT_SAMPLE_RATE)
        .audioChannels(OUTPUT_CHANNELS)
        .format(format)
        // bitexact keeps repeated conversions byte-identical
        .outputOptions(["-fflags", "+bitexact", "-y"])
        .on("start", (line: string) => console.log(`[transcode] ffmpeg: ${line}`))
        .on("end", () => resolve())
        .on("error", (error: Error, _stdout: string | null, stderr: string | null) => {
          console.warn(`[transcode] ffmpeg failed: ${error.message}`);
          reject(new ConversionError(stderr?.trim() || "unknown error", error));
        })
        .save(outputPath);
    });

    return { path: outputPath, format };
  }
}
