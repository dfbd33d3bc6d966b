/**
 * Narration script types.
 */

/** One narrated line. Script order is splice order. */
export interface Segment {
  readonly text: string;
  /** Emotion name; resolved against the emotion store later, never validated here. */
  readonly emotion: string;
  /** Pause name for the silence that follows this segment. */
  readonly pauseAfter: string;
}

export type Script = readonly Segment[];

export const DEFAULT_EMOTION = "neutral";
export const DEFAULT_PAUSE_NAME = "medium";
