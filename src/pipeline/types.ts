/**
 * Narration pipeline callbacks and results.
 */

import type { Segment } from "../script/types";
import type { OutputFormat } from "../adapters/encoder/types";

export interface SegmentEvent {
  /** Zero-based position in the script. */
  index: number;
  total: number;
  segment: Segment;
}

export interface NarrationCallbacks {
  onSegmentStart?: (event: SegmentEvent) => void;
  onSegmentDone?: (event: SegmentEvent & { audioBytes: number }) => void;
  /** Only fired under the "skip" synthesis error policy. */
  onSegmentSkipped?: (event: SegmentEvent & { error: Error }) => void;
  onExportStart?: (event: { outputPath: string; format: OutputFormat; normalize: boolean }) => void;
}

export interface NarrationResult {
  outputPath: string;
  format: OutputFormat;
  normalized: boolean;
  segmentCount: number;
  clipCount: number;
  silenceCount: number;
  /** Indexes of segments replaced by empty clips after a synthesis failure. */
  skipped: number[];
  durationMs: number;
  bytes: number;
}
