/**
 * Narrator: coordinates script -> emotion lookup -> synthesis -> assembly -> export.
 * Segments are synthesized one at a time in script order.
 */

import type { ISynthesizer, RawAudioClip } from "../adapters/tts/types";
import { narrationClip } from "../adapters/tts/types";
import type { SynthesisErrorPolicy } from "../config";
import type { EmotionMappingStore } from "../emotion/store";
import {
  AssemblyError,
  CancelledError,
  NarratorError,
  SynthesisError,
  errorMessage,
  throwIfAborted,
} from "../errors";
import { logger, logAssembly, logError, logSynthesis } from "../logging";
import type { Segment } from "../script/types";
import { AudioAssembler, trackDurationMs, type AssembledTrack } from "./assembler";
import type { ExportOptions, Exporter } from "./exporter";
import type { NarrationCallbacks, NarrationResult } from "./types";

export interface NarratorConfig {
  /** abort (default): first failed segment ends the run. skip: substitute an empty clip. */
  onSynthesisError?: SynthesisErrorPolicy;
  /** Defaults to AudioAssembler with the 500 ms fallback pause. */
  assembler?: AudioAssembler;
}

export interface RenderResult {
  track: AssembledTrack;
  skipped: number[];
}

export class Narrator {
  private readonly onSynthesisError: SynthesisErrorPolicy;
  private readonly assembler: AudioAssembler;

  constructor(
    private readonly store: EmotionMappingStore,
    private readonly synthesizer: ISynthesizer,
    private readonly exporter: Exporter,
    config: NarratorConfig = {},
    private readonly callbacks: NarrationCallbacks = {}
  ) {
    this.onSynthesisError = config.onSynthesisError ?? "abort";
    this.assembler = config.assembler ?? new AudioAssembler();
  }

  /** Synthesize every segment and join them. One pause is resolved per segment. */
  async render(segments: readonly Segment[], signal?: AbortSignal): Promise<RenderResult> {
    const clips: RawAudioClip[] = [];
    const pausesMs: number[] = [];
    const skipped: number[] = [];
    const total = segments.length;

    for (const [index, segment] of segments.entries()) {
      throwIfAborted(signal);
      const profile = this.store.resolveProfile(segment.emotion);
      if (!this.store.hasEmotion(segment.emotion)) {
        logger.debug({ event: "EMOTION_FALLBACK", index, emotion: segment.emotion }, "Unknown emotion; using default profile");
      }
      this.callbacks.onSegmentStart?.({ index, total, segment });

      const startedAt = Date.now();
      let clip: RawAudioClip;
      try {
        clip = await this.synthesizer.synthesize(segment.text, profile, signal);
      } catch (e) {
        if (e instanceof CancelledError) throw e;
        const err = new SynthesisError(`Segment ${index + 1} of ${total} failed: ${errorMessage(e)}`, {
          cause: e,
          segmentIndex: index,
        });
        if (this.onSynthesisError === "abort") throw err;
        logError(logger, err, { event: "SEGMENT_SKIPPED", index });
        skipped.push(index);
        this.callbacks.onSegmentSkipped?.({ index, total, segment, error: err });
        clip = narrationClip(Buffer.alloc(0));
      }

      clips.push(clip);
      pausesMs.push(this.store.resolvePauseMs(segment.pauseAfter));
      logSynthesis(logger, index, segment.emotion, segment.text.length, clip.pcm.length, Date.now() - startedAt);
      this.callbacks.onSegmentDone?.({ index, total, segment, audioBytes: clip.pcm.length });
    }
    throwIfAborted(signal);

    let track: AssembledTrack;
    try {
      track = this.assembler.assemble(clips, pausesMs);
    } catch (e) {
      if (e instanceof NarratorError) throw e;
      throw new AssemblyError(errorMessage(e), { cause: e });
    }
    const silenceCount = track.spans.filter((s) => s.kind === "silence").length;
    logAssembly(logger, clips.length, silenceCount, trackDurationMs(track));
    return { track, skipped };
  }

  /** Render the script and export it to `outputPath`. */
  async narrate(
    segments: readonly Segment[],
    outputPath: string,
    options: ExportOptions,
    signal?: AbortSignal
  ): Promise<NarrationResult> {
    const { track, skipped } = await this.render(segments, signal);
    this.callbacks.onExportStart?.({ outputPath, format: options.format, normalize: options.normalize });
    const exported = await this.exporter.export(track, outputPath, options, signal);
    return {
      outputPath: exported.outputPath,
      format: exported.format,
      normalized: exported.normalized,
      segmentCount: segments.length,
      clipCount: track.spans.filter((s) => s.kind === "clip").length,
      silenceCount: track.spans.filter((s) => s.kind === "silence").length,
      skipped,
      durationMs: trackDurationMs(track),
      bytes: exported.bytes,
    };
  }
}
