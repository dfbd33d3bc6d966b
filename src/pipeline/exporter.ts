/**
 * Exporter: assembled track -> output file, optionally loudness-normalized.
 *
 * The track is serialized to WAV first. Uncompressed WAV without normalization is written
 * as-is; everything else goes through the encoder. The file is written beside its target
 * and renamed into place, so a failed or cancelled export leaves nothing behind.
 */

import * as fs from "fs";
import * as path from "path";
import type { IAudioEncoder, OutputFormat } from "../adapters/encoder/types";
import { DEFAULT_LOUDNESS, type LoudnessTarget } from "../config";
import { ExportError, NarratorError, errorMessage, throwIfAborted } from "../errors";
import { logger, logExport } from "../logging";
import type { AssembledTrack } from "./assembler";
import { pcmToWav } from "./audio-utils";

export interface ExportOptions extends Partial<LoudnessTarget> {
  format: OutputFormat;
  normalize: boolean;
}

export interface ExportResult {
  outputPath: string;
  format: OutputFormat;
  normalized: boolean;
  bytes: number;
}

function toExportError(err: unknown, message: string): NarratorError {
  if (err instanceof NarratorError) return err;
  return new ExportError(`${message}: ${errorMessage(err)}`, { cause: err });
}

export function resolveLoudness(options: Partial<LoudnessTarget>): LoudnessTarget {
  return {
    targetLufs: options.targetLufs ?? DEFAULT_LOUDNESS.targetLufs,
    truePeakDb: options.truePeakDb ?? DEFAULT_LOUDNESS.truePeakDb,
    loudnessRangeLu: options.loudnessRangeLu ?? DEFAULT_LOUDNESS.loudnessRangeLu,
  };
}

export class Exporter {
  constructor(private readonly encoder: IAudioEncoder) {}

  async export(
    track: AssembledTrack,
    outputPath: string,
    options: ExportOptions,
    signal?: AbortSignal
  ): Promise<ExportResult> {
    throwIfAborted(signal);
    const startedAt = Date.now();
    const wav = pcmToWav(track.pcm, track.sampleRateHz, track.channels, track.bitDepth);

    let data: Buffer;
    if (!options.normalize && options.format === "wav") {
      data = wav;
    } else {
      try {
        data = await this.encoder.encode(
          wav,
          {
            format: options.format,
            loudness: options.normalize ? resolveLoudness(options) : undefined,
            sampleRateHz: track.sampleRateHz,
            channels: track.channels,
          },
          signal
        );
      } catch (e) {
        throw toExportError(e, "Encoding failed");
      }
    }

    await this.writeAtomically(outputPath, data, signal);
    logExport(logger, outputPath, options.format, options.normalize, data.length, Date.now() - startedAt);
    return { outputPath, format: options.format, normalized: options.normalize, bytes: data.length };
  }

  private async writeAtomically(outputPath: string, data: Buffer, signal?: AbortSignal): Promise<void> {
    const dir = path.dirname(path.resolve(outputPath));
    const partialPath = path.join(dir, `.${path.basename(outputPath)}.${process.pid}.${Date.now()}.partial`);
    try {
      await fs.promises.mkdir(dir, { recursive: true });
      await fs.promises.writeFile(partialPath, data);
      throwIfAborted(signal);
      await fs.promises.rename(partialPath, outputPath);
    } catch (e) {
      await fs.promises.rm(partialPath, { force: true }).catch((err: Error) => {
        logger.warn({ event: "EXPORT_CLEANUP_FAILED", partialPath, err: err.message }, "Could not remove partial output");
      });
      throw toExportError(e, `Cannot write ${outputPath}`);
    }
  }
}
