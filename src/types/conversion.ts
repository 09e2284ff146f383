/**
 * Conversion Types
 * Shapes passed between the stages of one conversion request.
 */

export const TARGET_FORMATS = ["wav", "aiff"] as const;

export type TargetFormat = (typeof TARGET_FORMATS)[number];

export type ConversionSource =
  | { kind: "upload"; fileName: string; bytes: Buffer }
  | { kind: "url"; url: string };

export interface ConversionRequest {
  format: TargetFormat;
  /** Must be confirmed before anything is written or fetched */
  rightsConfirmed: true;
  source: ConversionSource;
}

export interface InputFile {
  path: string;
  /** Includes the leading dot, ".bin" when unknown */
  extension: string;
  bytes: number;
}

export interface OutputFile {
  path: string;
  format: TargetFormat;
}

/** What gets handed to the transport layer. */
export interface ConvertedAudio {
  path: string;
  downloadName: string;
  mediaType: string;
  format: TargetFormat;
}

/** Whether the client received the whole file. */
export type DeliveryOutcome = "delivered" | "aborted";

export type ConversionStage =
  | "received"
  | "validated"
  | "acquired"
  | "converted"
  | DeliveryOutcome;
