/**
 * Audio assembler: clips in script order, joined by silences sized per pause.
 * No silence follows the last clip.
 */

import type { RawAudioClip } from "../adapters/tts/types";
import { DEFAULT_PAUSE_MS } from "../emotion/types";
import { AssemblyError } from "../errors";
import {
  NARRATION_BIT_DEPTH,
  NARRATION_CHANNELS,
  NARRATION_SAMPLE_RATE_HZ,
  PCM_BYTES_PER_SAMPLE,
  durationMsForSamples,
  samplesForMs,
} from "../audio/pcm-utils";

export type TrackSpan =
  | { readonly kind: "clip"; readonly index: number; readonly sampleCount: number }
  | { readonly kind: "silence"; readonly durationMs: number; readonly sampleCount: number };

export interface AssembledTrack {
  readonly pcm: Buffer;
  readonly sampleRateHz: number;
  readonly channels: number;
  readonly bitDepth: number;
  /** Clip and silence spans in splice order. */
  readonly spans: readonly TrackSpan[];
}

export interface AudioFormat {
  sampleRateHz: number;
  channels: number;
  bitDepth: number;
}

export const NARRATION_FORMAT: Readonly<AudioFormat> = Object.freeze({
  sampleRateHz: NARRATION_SAMPLE_RATE_HZ,
  channels: NARRATION_CHANNELS,
  bitDepth: NARRATION_BIT_DEPTH,
});

export function emptyTrack(format: AudioFormat = NARRATION_FORMAT): AssembledTrack {
  return { pcm: Buffer.alloc(0), ...format, spans: [] };
}

export function trackSampleCount(track: AssembledTrack): number {
  return track.pcm.length / ((track.bitDepth / 8) * track.channels);
}

export function trackDurationMs(track: AssembledTrack): number {
  return durationMsForSamples(trackSampleCount(track), track.sampleRateHz);
}

function sameFormat(a: AudioFormat, b: AudioFormat): boolean {
  return a.sampleRateHz === b.sampleRateHz && a.channels === b.channels && a.bitDepth === b.bitDepth;
}

function formatLabel(f: AudioFormat): string {
  return `${f.sampleRateHz} Hz/${f.channels} ch/${f.bitDepth}-bit`;
}

export class AudioAssembler {
  constructor(private readonly defaultPauseMs: number = DEFAULT_PAUSE_MS) {}

  /**
   * Join clips with `pauseDurationsMs[i]` of silence after clip i (i < last).
   * A short pause list falls back to the default pause; extra entries are ignored.
   */
  assemble(clips: readonly RawAudioClip[], pauseDurationsMs: readonly number[]): AssembledTrack {
    if (clips.length === 0) return emptyTrack();

    const format: AudioFormat = {
      sampleRateHz: clips[0].sampleRateHz,
      channels: clips[0].channels,
      bitDepth: clips[0].bitDepth,
    };
    if (format.bitDepth !== NARRATION_BIT_DEPTH) {
      throw new AssemblyError(`Unsupported bit depth ${format.bitDepth}; clips must be 16-bit PCM`);
    }
    const frameBytes = PCM_BYTES_PER_SAMPLE * format.channels;

    const parts: Buffer[] = [];
    const spans: TrackSpan[] = [];
    clips.forEach((clip, i) => {
      if (!sameFormat(clip, format)) {
        throw new AssemblyError(`Clip ${i} is ${formatLabel(clip)}, expected ${formatLabel(format)}`);
      }
      if (clip.pcm.length % frameBytes !== 0) {
        throw new AssemblyError(`Clip ${i} has ${clip.pcm.length} bytes, not a whole number of ${frameBytes}-byte frames`);
      }
      parts.push(clip.pcm);
      spans.push({ kind: "clip", index: i, sampleCount: clip.pcm.length / frameBytes });

      if (i === clips.length - 1) return;
      const durationMs = i < pauseDurationsMs.length ? pauseDurationsMs[i] : this.defaultPauseMs;
      if (!Number.isFinite(durationMs) || durationMs < 0) {
        throw new AssemblyError(`Pause after clip ${i} is ${durationMs} ms; must be a non-negative number`);
      }
      const sampleCount = samplesForMs(durationMs, format.sampleRateHz);
      parts.push(Buffer.alloc(sampleCount * frameBytes));
      spans.push({ kind: "silence", durationMs, sampleCount });
    });

    return { pcm: Buffer.concat(parts), ...format, spans };
  }
}
