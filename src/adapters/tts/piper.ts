/**
 * Piper TTS adapter.
 *
 * Runs the Piper command-line synthesizer once per segment:
 * - Text goes in on stdin (one line = one utterance).
 * - Raw s16le mono PCM comes back on stdout (`--output_raw`).
 * - Emotion profile maps to --length_scale / --noise_scale / --noise_w.
 *
 * The voice's sample rate comes from the sidecar `<model>.onnx.json`; audio at any other
 * rate than 22050 Hz is resampled so the assembler always sees one format.
 */

import * as fs from "fs";
import { spawn } from "child_process";
import type { Readable, Writable } from "stream";
import { z } from "zod";
import type { EmotionProfile } from "../../emotion/types";
import { CancelledError, SynthesisError, errorMessage } from "../../errors";
import { NARRATION_SAMPLE_RATE_HZ, PCM_BYTES_PER_SAMPLE, resampleS16leMonoLinear } from "../../audio/pcm-utils";
import { logger } from "../../logging";
import { narrationClip, type ISynthesizer, type RawAudioClip } from "./types";

const DEFAULT_TIMEOUT_MS = 120_000;
/** Keep only the tail of Piper's stderr for error messages. */
const STDERR_TAIL_CHARS = 2000;

/** The parts of a child process the adapter uses. */
export interface PiperProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnPiper = (command: string, args: readonly string[]) => PiperProcess;

const spawnPiper: SpawnPiper = (command, args) => spawn(command, args, { stdio: ["pipe", "pipe", "pipe"] });

export interface PiperConfig {
  /** Path to the .onnx voice model. */
  modelPath: string;
  /** Piper executable (default: piper). */
  piperBinary?: string;
  /** Per-call timeout (default 120s). */
  timeoutMs?: number;
  /** Multi-speaker models only. */
  speakerId?: number;
  /** Process launcher; replaced in tests. */
  spawnProcess?: SpawnPiper;
}

const voiceConfigSchema = z.object({
  audio: z.object({ sample_rate: z.number().int().positive() }).partial().optional(),
});

/** Read `<model>.json` for the voice sample rate. Missing sidecar -> narration rate. */
async function readVoiceSampleRate(modelPath: string): Promise<number> {
  const sidecar = `${modelPath}.json`;
  let raw: string;
  try {
    raw = await fs.promises.readFile(sidecar, "utf8");
  } catch {
    logger.debug({ event: "PIPER_NO_VOICE_CONFIG", sidecar }, "piper: no voice config; assuming 22050 Hz");
    return NARRATION_SAMPLE_RATE_HZ;
  }
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (e) {
    throw new SynthesisError(`Invalid Piper voice config ${sidecar}: ${errorMessage(e)}`, { cause: e });
  }
  const parsed = voiceConfigSchema.safeParse(doc);
  if (!parsed.success) {
    throw new SynthesisError(`Invalid Piper voice config ${sidecar}: ${parsed.error.issues[0]?.message ?? "bad shape"}`);
  }
  return parsed.data.audio?.sample_rate ?? NARRATION_SAMPLE_RATE_HZ;
}

/** Collapse whitespace so one segment is one Piper utterance. */
function toUtterance(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export class PiperSynthesizer implements ISynthesizer {
  private readonly piperBinary: string;
  private readonly timeoutMs: number;
  private readonly spawnProcess: SpawnPiper;

  private constructor(
    private readonly config: PiperConfig,
    readonly voiceSampleRateHz: number
  ) {
    this.piperBinary = config.piperBinary?.trim() || "piper";
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.spawnProcess = config.spawnProcess ?? spawnPiper;
  }

  /**
   * Check the model and read its voice config. Fails with SynthesisError when the model
   * is missing, so a bad path stops the run before any segment is attempted.
   */
  static async create(config: PiperConfig): Promise<PiperSynthesizer> {
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(config.modelPath);
    } catch (e) {
      throw new SynthesisError(`Piper model not found: ${config.modelPath}`, { cause: e });
    }
    if (!stat.isFile()) {
      throw new SynthesisError(`Piper model is not a file: ${config.modelPath}`);
    }
    const sampleRateHz = await readVoiceSampleRate(config.modelPath);
    logger.info(
      { event: "PIPER_READY", modelPath: config.modelPath, sampleRateHz },
      "piper: voice model ready"
    );
    return new PiperSynthesizer(config, sampleRateHz);
  }

  buildArgs(profile: EmotionProfile): string[] {
    const args = [
      "--model", this.config.modelPath,
      "--output_raw",
      "--length_scale", String(profile.lengthScale),
      "--noise_scale", String(profile.noiseScale),
      "--noise_w", String(profile.noiseW),
    ];
    if (this.config.speakerId != null) args.push("--speaker", String(this.config.speakerId));
    return args;
  }

  async synthesize(text: string, profile: EmotionProfile, signal?: AbortSignal): Promise<RawAudioClip> {
    const utterance = toUtterance(text);
    if (!utterance) return narrationClip(Buffer.alloc(0));
    if (signal?.aborted) throw new CancelledError();

    const startedAt = Date.now();
    const raw = await this.run(utterance, profile, signal);
    if (raw.length % PCM_BYTES_PER_SAMPLE !== 0) {
      throw new SynthesisError(`Piper returned ${raw.length} bytes, not whole 16-bit samples`);
    }
    const pcm = resampleS16leMonoLinear(raw, this.voiceSampleRateHz, NARRATION_SAMPLE_RATE_HZ);
    logger.debug(
      { event: "PIPER_RESULT", textLength: utterance.length, audioBytes: pcm.length, durationMs: Date.now() - startedAt },
      "piper: synthesis completed"
    );
    return narrationClip(pcm);
  }

  private run(utterance: string, profile: EmotionProfile, signal?: AbortSignal): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      const child = this.spawnProcess(this.piperBinary, this.buildArgs(profile));
      const chunks: Buffer[] = [];
      let stderr = "";
      let settled = false;

      const finish = (err: Error | null, pcm?: Buffer): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        if (err) reject(err);
        else resolve(pcm ?? Buffer.alloc(0));
      };
      const onAbort = (): void => {
        child.kill("SIGKILL");
        finish(new CancelledError());
      };
      const timer = setTimeout(() => {
        child.kill("SIGKILL");
        finish(new SynthesisError(`Piper timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
      signal?.addEventListener("abort", onAbort, { once: true });

      child.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => {
        stderr = (stderr + chunk.toString("utf8")).slice(-STDERR_TAIL_CHARS);
      });
      child.on("error", (err) => {
        finish(new SynthesisError(`Cannot run Piper (${this.piperBinary}): ${err.message}`, { cause: err }));
      });
      child.on("close", (code, sig) => {
        if (code === 0) {
          finish(null, Buffer.concat(chunks));
          return;
        }
        const reason = code != null ? `exit code ${code}` : `signal ${sig ?? "unknown"}`;
        const detail = stderr.trim();
        finish(new SynthesisError(`Piper failed with ${reason}${detail ? `: ${detail}` : ""}`));
      });

      child.stdin.on("error", (err) => {
        // EPIPE when Piper exits before reading; the close handler reports the real failure.
        logger.debug({ event: "PIPER_STDIN_ERROR", err: err.message }, "piper: stdin closed early");
      });
      child.stdin.end(`${utterance}\n`);
    });
  }
}
