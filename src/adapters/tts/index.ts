/**
 * Synthesizer factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { ISynthesizer } from "./types";
import { StubSynthesizer } from "./stub";
import { PiperSynthesizer } from "./piper";

export type { ISynthesizer, RawAudioClip } from "./types";
export { narrationClip, clipSampleCount } from "./types";
export { StubSynthesizer } from "./stub";
export type { StubSynthesizerOptions } from "./stub";
export { PiperSynthesizer } from "./piper";
export type { PiperConfig, PiperProcess, SpawnPiper } from "./piper";

export async function createSynthesizer(config: AppConfig, modelPath: string): Promise<ISynthesizer> {
  const { provider, piperBinary, timeoutMs } = config.tts;
  if (provider === "piper") {
    return PiperSynthesizer.create({ modelPath, piperBinary, timeoutMs });
  }
  return new StubSynthesizer({ mode: "tone" });
}
