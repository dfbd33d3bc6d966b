/**
 * Encoder adapter types: WAV bytes in, encoded (and optionally loudness-normalized) bytes out.
 */

import type { LoudnessTarget } from "../../config";

export const OUTPUT_FORMATS = ["mp3", "wav", "ogg"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

export interface EncodeOptions {
  format: OutputFormat;
  /** When set, normalize to this loudness profile before encoding. */
  loudness?: LoudnessTarget;
  sampleRateHz: number;
  channels: number;
}

export interface IAudioEncoder {
  /** Rejects with ExportError (carrying the tool's diagnostics) or CancelledError. */
  encode(wav: Buffer, options: EncodeOptions, signal?: AbortSignal): Promise<Buffer>;
}
