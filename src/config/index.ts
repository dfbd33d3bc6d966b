/**
 * Env-based configuration for the narrator.
 * Load from .env.local (or process.env). CLI flags override what is read here.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type TtsProvider = "piper" | "stub";
export type EncoderProvider = "ffmpeg" | "stub";
export type SynthesisErrorPolicy = "abort" | "skip";

/** Emotion config shipped with the package (config/emotions.json). */
export const BUNDLED_EMOTIONS_CONFIG = path.resolve(__dirname, "..", "..", "config", "emotions.json");

export interface LoudnessTarget {
  /** Integrated loudness target (LUFS). */
  targetLufs: number;
  /** True peak ceiling (dBTP). */
  truePeakDb: number;
  /** Loudness range target (LU). */
  loudnessRangeLu: number;
}

export const DEFAULT_LOUDNESS: LoudnessTarget = {
  targetLufs: -16,
  truePeakDb: -1.5,
  loudnessRangeLu: 11,
};

export interface AppConfig {
  /** Speech synthesis provider and options */
  tts: {
    provider: TtsProvider;
    /** Piper executable (name on PATH or absolute path). */
    piperBinary: string;
    /** Kill a synthesis call that runs longer than this. */
    timeoutMs: number;
  };

  /** Encoder / loudness normalizer */
  encoder: {
    provider: EncoderProvider;
    /** ffmpeg executable override; fluent-ffmpeg falls back to FFMPEG_PATH / PATH. */
    ffmpegPath?: string;
  };

  narration: {
    emotionsConfigPath: string;
    loudness: LoudnessTarget;
    onSynthesisError: SynthesisErrorPolicy;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getEnvNumber(key: string, defaultValue: number): number {
  const v = getEnv(key);
  if (v == null) return defaultValue;
  const n = Number(v);
  return Number.isFinite(n) ? n : defaultValue;
}

function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const v = getEnv(key)?.toLowerCase();
  return choices.find((c) => c === v) ?? defaultValue;
}

/**
 * Build config from environment variables.
 * TTS_PROVIDER and ENCODER_PROVIDER select adapters (piper/ffmpeg or stub).
 */
export function loadConfig(): AppConfig {
  return {
    tts: {
      provider: getEnvChoice("TTS_PROVIDER", ["piper", "stub"], "piper"),
      piperBinary: getEnv("PIPER_BINARY") || "piper",
      timeoutMs: (() => {
        const n = getEnvNumber("SYNTHESIS_TIMEOUT_MS", 120_000);
        return n > 0 ? n : 120_000;
      })(),
    },
    encoder: {
      provider: getEnvChoice("ENCODER_PROVIDER", ["ffmpeg", "stub"], "ffmpeg"),
      ffmpegPath: getEnv("FFMPEG_PATH"),
    },
    narration: {
      emotionsConfigPath: getEnv("NARRATOR_EMOTIONS_CONFIG") || BUNDLED_EMOTIONS_CONFIG,
      loudness: {
        targetLufs: getEnvNumber("NARRATOR_TARGET_LUFS", DEFAULT_LOUDNESS.targetLufs),
        truePeakDb: getEnvNumber("NARRATOR_TRUE_PEAK_DB", DEFAULT_LOUDNESS.truePeakDb),
        loudnessRangeLu: getEnvNumber("NARRATOR_LRA", DEFAULT_LOUDNESS.loudnessRangeLu),
      },
      onSynthesisError: getEnvChoice("NARRATOR_ON_SYNTHESIS_ERROR", ["abort", "skip"], "abort"),
    },
  };
}
