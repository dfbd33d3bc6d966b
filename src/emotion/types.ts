/**
 * Emotion profile and pause table types.
 */

/** Piper synthesis controls for one emotion. */
export interface EmotionProfile {
  /** Speech tempo: >1 slower, <1 faster. */
  readonly lengthScale: number;
  /** Generator noise (0..1): more = livelier intonation. */
  readonly noiseScale: number;
  /** Phoneme duration noise (0..1). */
  readonly noiseW: number;
  readonly description: string;
}

/** Pause name -> duration in milliseconds. */
export type PauseTable = ReadonlyMap<string, number>;

export const DEFAULT_PROFILE: EmotionProfile = Object.freeze({
  lengthScale: 1.0,
  noiseScale: 0.5,
  noiseW: 0.6,
  description: "",
});

export const DEFAULT_PAUSE_MS = 500;

/** Used when the config document has no `pauses` object at all. */
export const DEFAULT_PAUSES: Readonly<Record<string, number>> = Object.freeze({
  short: 250,
  medium: 500,
  long: 1000,
  very_long: 2000,
});
