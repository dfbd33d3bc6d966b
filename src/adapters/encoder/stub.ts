/**
 * Stub encoder for tests and dry runs without ffmpeg.
 * Passes WAV through untouched; cannot produce lossy formats or normalize.
 */

import { ExportError } from "../../errors";
import { logger } from "../../logging";
import type { EncodeOptions, IAudioEncoder } from "./types";

export class StubEncoder implements IAudioEncoder {
  async encode(wav: Buffer, options: EncodeOptions, _signal?: AbortSignal): Promise<Buffer> {
    if (options.format !== "wav") {
      throw new ExportError(`Stub encoder cannot write ${options.format}; use ENCODER_PROVIDER=ffmpeg`);
    }
    if (options.loudness) {
      logger.warn({ event: "STUB_ENCODER_NO_NORMALIZE" }, "Stub encoder skips loudness normalization");
    }
    return wav;
  }
}
