/**
 * Encoder factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { IAudioEncoder } from "./types";
import { FfmpegEncoder } from "./ffmpeg";
import { StubEncoder } from "./stub";

export type { EncodeOptions, IAudioEncoder, OutputFormat } from "./types";
export { OUTPUT_FORMATS, isOutputFormat } from "./types";
export { FfmpegEncoder, FFMPEG_CODECS, loudnormFilter } from "./ffmpeg";
export { StubEncoder } from "./stub";

export function createEncoder(config: AppConfig): IAudioEncoder {
  if (config.encoder.provider === "ffmpeg") {
    return new FfmpegEncoder({ ffmpegPath: config.encoder.ffmpegPath });
  }
  return new StubEncoder();
}
