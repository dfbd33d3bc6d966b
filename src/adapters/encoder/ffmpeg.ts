/**
 * ffmpeg encoder: EBU R128 loudness normalization (single-pass loudnorm) and re-encode.
 *
 * The WAV is written to a private temp dir, ffmpeg writes the result next to it, and the
 * dir is removed afterwards whether ffmpeg succeeded or not.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import ffmpeg from "fluent-ffmpeg";
import type { LoudnessTarget } from "../../config";
import { CancelledError, ExportError } from "../../errors";
import { logger } from "../../logging";
import type { EncodeOptions, IAudioEncoder, OutputFormat } from "./types";

export const FFMPEG_CODECS: Record<OutputFormat, string> = {
  mp3: "libmp3lame",
  ogg: "libvorbis",
  wav: "pcm_s16le",
};

export interface FfmpegEncoderConfig {
  /** ffmpeg executable; unset = fluent-ffmpeg lookup (FFMPEG_PATH, then PATH). */
  ffmpegPath?: string;
}

export function loudnormFilter(target: LoudnessTarget): string {
  return `loudnorm=I=${target.targetLufs}:TP=${target.truePeakDb}:LRA=${target.loudnessRangeLu}`;
}

export class FfmpegEncoder implements IAudioEncoder {
  constructor(private readonly config: FfmpegEncoderConfig = {}) {}

  async encode(wav: Buffer, options: EncodeOptions, signal?: AbortSignal): Promise<Buffer> {
    if (signal?.aborted) throw new CancelledError();
    const workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "narrator-"));
    const inputPath = path.join(workDir, "input.wav");
    const outputPath = path.join(workDir, `output.${options.format}`);
    try {
      await fs.promises.writeFile(inputPath, wav);
      await this.run(inputPath, outputPath, options, signal);
      return await fs.promises.readFile(outputPath);
    } finally {
      await fs.promises.rm(workDir, { recursive: true, force: true }).catch((err: Error) => {
        logger.warn({ event: "FFMPEG_TEMP_CLEANUP_FAILED", workDir, err: err.message }, "ffmpeg: could not remove temp dir");
      });
    }
  }

  private run(inputPath: string, outputPath: string, options: EncodeOptions, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const startedAt = Date.now();
      const command = ffmpeg(inputPath)
        .audioCodec(FFMPEG_CODECS[options.format])
        .audioFrequency(options.sampleRateHz)
        .audioChannels(options.channels)
        .format(options.format);
      if (this.config.ffmpegPath) command.setFfmpegPath(this.config.ffmpegPath);
      if (options.loudness) command.audioFilters(loudnormFilter(options.loudness));

      const onAbort = (): void => {
        command.kill("SIGKILL");
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      command
        .on("start", (commandLine: string) => {
          logger.debug({ event: "FFMPEG_START", commandLine }, "ffmpeg: started");
        })
        .on("error", (err: Error, _stdout: string | null, stderr: string | null) => {
          signal?.removeEventListener("abort", onAbort);
          if (signal?.aborted) {
            reject(new CancelledError());
            return;
          }
          const diagnostics = stderr?.trim() || undefined;
          logger.error({ event: "FFMPEG_ERROR", err: err.message, diagnostics }, "ffmpeg: encode failed");
          reject(new ExportError(`ffmpeg failed: ${err.message}`, { cause: err, diagnostics }));
        })
        .on("end", () => {
          signal?.removeEventListener("abort", onAbort);
          logger.debug(
            { event: "FFMPEG_END", format: options.format, normalized: !!options.loudness, durationMs: Date.now() - startedAt },
            "ffmpeg: encode completed"
          );
          resolve();
        })
        .save(outputPath);
    });
  }
}
