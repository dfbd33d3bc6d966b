/**
 * Speech synthesis adapter types.
 * Implementations can be swapped via config (Piper CLI, stub).
 */

import type { EmotionProfile } from "../../emotion/types";
import {
  NARRATION_BIT_DEPTH,
  NARRATION_CHANNELS,
  NARRATION_SAMPLE_RATE_HZ,
  PCM_BYTES_PER_SAMPLE,
} from "../../audio/pcm-utils";

/** Raw PCM for one segment. Every adapter emits 22050 Hz mono 16-bit. */
export interface RawAudioClip {
  readonly pcm: Buffer;
  readonly sampleRateHz: number;
  readonly channels: number;
  readonly bitDepth: number;
}

/**
 * Synthesis adapter: text + emotion profile in, fixed-format PCM out.
 * Rejects with SynthesisError when the model is unavailable or refuses the text.
 */
export interface ISynthesizer {
  synthesize(text: string, profile: EmotionProfile, signal?: AbortSignal): Promise<RawAudioClip>;
}

/** Wrap narration-format PCM as a clip. */
export function narrationClip(pcm: Buffer): RawAudioClip {
  return {
    pcm,
    sampleRateHz: NARRATION_SAMPLE_RATE_HZ,
    channels: NARRATION_CHANNELS,
    bitDepth: NARRATION_BIT_DEPTH,
  };
}

export function clipSampleCount(clip: RawAudioClip): number {
  return clip.pcm.length / (PCM_BYTES_PER_SAMPLE * clip.channels);
}
