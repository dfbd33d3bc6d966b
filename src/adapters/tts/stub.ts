/**
 * Stub synthesizer for testing or dry runs without a voice model.
 * Emits silence or a sine tone whose length follows the text length and tempo.
 */

import type { EmotionProfile } from "../../emotion/types";
import { silencePcm, tonePcm } from "../../audio/pcm-utils";
import { narrationClip, type ISynthesizer, type RawAudioClip } from "./types";

export interface StubSynthesizerOptions {
  /** "silence" (default) or "tone". */
  mode?: "silence" | "tone";
  /** Milliseconds of audio per character at lengthScale 1. Default 60. */
  msPerChar?: number;
  /** Tone frequency. Default 440. */
  frequencyHz?: number;
}

export class StubSynthesizer implements ISynthesizer {
  private readonly mode: "silence" | "tone";
  private readonly msPerChar: number;
  private readonly frequencyHz: number;

  constructor(options: StubSynthesizerOptions = {}) {
    this.mode = options.mode ?? "silence";
    this.msPerChar = options.msPerChar ?? 60;
    this.frequencyHz = options.frequencyHz ?? 440;
  }

  /** Duration the stub produces for this text/profile, in ms. */
  durationMs(text: string, profile: EmotionProfile): number {
    return text.trim().length * this.msPerChar * profile.lengthScale;
  }

  async synthesize(text: string, profile: EmotionProfile, _signal?: AbortSignal): Promise<RawAudioClip> {
    const ms = this.durationMs(text, profile);
    return narrationClip(this.mode === "tone" ? tonePcm(ms, this.frequencyHz) : silencePcm(ms));
  }
}
