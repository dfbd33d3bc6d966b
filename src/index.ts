/**
 * Library entry: the narration pipeline and its parts.
 */

export { loadConfig, DEFAULT_LOUDNESS, BUNDLED_EMOTIONS_CONFIG } from "./config";
export type { AppConfig, LoudnessTarget, SynthesisErrorPolicy } from "./config";
export * from "./errors";
export { EmotionMappingStore } from "./emotion/store";
export { DEFAULT_PROFILE, DEFAULT_PAUSE_MS, DEFAULT_PAUSES } from "./emotion/types";
export type { EmotionProfile, PauseTable } from "./emotion/types";
export { parseScript, parseScriptFile, emotionsUsed } from "./script/parser";
export type { Segment, Script } from "./script/types";
export * from "./adapters/tts";
export * from "./adapters/encoder";
export { AudioAssembler, emptyTrack, trackDurationMs, trackSampleCount, NARRATION_FORMAT } from "./pipeline/assembler";
export type { AssembledTrack, TrackSpan, AudioFormat } from "./pipeline/assembler";
export { Exporter, resolveLoudness } from "./pipeline/exporter";
export type { ExportOptions, ExportResult } from "./pipeline/exporter";
export { Narrator } from "./pipeline/narrator";
export type { NarratorConfig, RenderResult } from "./pipeline/narrator";
export type { NarrationCallbacks, NarrationResult, SegmentEvent } from "./pipeline/types";
export { pcmToWav, parseWav } from "./pipeline/audio-utils";
export { runCli } from "./cli/run";
