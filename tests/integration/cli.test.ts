/**
 * Integration: the CLI end to end with the stub synthesizer and stub encoder.
 * Writes real files under a temp dir; no Piper or ffmpeg needed.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { BUNDLED_EMOTIONS_CONFIG, parseWav, runCli, type AppConfig } from "../../src";

const config: AppConfig = {
  tts: { provider: "stub", piperBinary: "piper", timeoutMs: 1000 },
  encoder: { provider: "stub" },
  narration: {
    emotionsConfigPath: BUNDLED_EMOTIONS_CONFIG,
    loudness: { targetLufs: -16, truePeakDb: -1.5, loudnessRangeLu: 11 },
    onSynthesisError: "abort",
  },
};

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, io: { out: (line: string) => out.push(line), err: (line: string) => err.push(line) } };
}

describe("narrator CLI", () => {
  let dir: string;
  let inputPath: string;
  let modelPath: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "narrator-cli-"));
    inputPath = path.join(dir, "story.json");
    modelPath = path.join(dir, "voice.onnx");
    configPath = path.join(dir, "emotions.json");
    fs.writeFileSync(
      inputPath,
      JSON.stringify({
        segments: [{ text: "Hello" }, { text: "World", emotion: "tense", pause_after: "long" }],
      })
    );
    fs.writeFileSync(modelPath, "placeholder model");
    fs.writeFileSync(
      configPath,
      JSON.stringify({
        emotions: { tense: { length_scale: 0.9, noise_scale: 0.6, noise_w: 0.5, description: "Tight" } },
        pauses: { long: 1000 },
      })
    );
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("narrates a script to a WAV file", async () => {
    const outputPath = path.join(dir, "out", "story.wav");
    const { out, err, io } = capture();

    const code = await runCli(
      [inputPath, "-m", modelPath, "-c", configPath, "-o", outputPath, "-f", "wav", "--no-normalize"],
      { config, io }
    );

    expect(code).toBe(0);
    expect(err).toEqual([]);
    expect(out).toEqual([
      "Narrator",
      `   Input: ${inputPath}`,
      `   Model: ${modelPath}`,
      `   Output: ${outputPath} (wav)`,
      "",
      "Loading emotion config...",
      "Parsing input...",
      "   Found 2 segments",
      "   Emotions: neutral, tense",
      "Loading voice model...",
      "Generating audio segments...",
      "   [1/2] neutral: 'Hello'",
      "   [2/2] tense: 'World'",
      `Exporting to ${outputPath}...`,
      "",
      `Done! 1.1s of audio saved to: ${outputPath}`,
    ]);

    const wav = parseWav(fs.readFileSync(outputPath));
    expect(wav.sampleRateHz).toBe(22050);
    expect(wav.channels).toBe(1);
    expect(wav.bitDepth).toBe(16);
    // Hello 300 ms (6615) + medium fallback 500 ms (11025) + World 270 ms (5953)
    expect(wav.pcm.length / 2).toBe(23593);
    // The pause follows "Hello": samples 6615..17639 are silent.
    expect(wav.pcm.subarray(6615 * 2, 17640 * 2).every((b) => b === 0)).toBe(true);
  });

  it("shortens long segment previews", async () => {
    const long = "The lighthouse keeper counted every wave that broke against the rocks below.";
    fs.writeFileSync(inputPath, JSON.stringify({ segments: [{ text: long }] }));
    const { out, io } = capture();
    const code = await runCli(
      [inputPath, "-m", modelPath, "-c", configPath, "-o", path.join(dir, "a.wav"), "-f", "wav"],
      { config, io }
    );
    expect(code).toBe(0);
    expect(out).toContain(`   [1/1] neutral: '${long.slice(0, 50)}...'`);
    expect(out).toContain(`   Output: ${path.join(dir, "a.wav")} (wav, normalized)`);
  });

  it("fails before synthesis when the input is missing", async () => {
    const missing = path.join(dir, "nope.json");
    const { out, err, io } = capture();
    const code = await runCli([missing, "-m", modelPath, "-c", configPath], { config, io });
    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual([`error: Input file not found: ${missing}`]);
  });

  it("fails when the model is missing", async () => {
    const missing = path.join(dir, "nope.onnx");
    const { err, io } = capture();
    const code = await runCli([inputPath, "-m", missing, "-c", configPath], { config, io });
    expect(code).toBe(1);
    expect(err).toEqual([`error: Piper model not found: ${missing}`]);
  });

  it("reports a malformed script", async () => {
    fs.writeFileSync(inputPath, "{ segments: ");
    const { err, io } = capture();
    const code = await runCli([inputPath, "-m", modelPath, "-c", configPath], { config, io });
    expect(code).toBe(1);
    expect(err).toHaveLength(1);
    expect(err[0].startsWith(`error: Script ${inputPath} is not valid JSON`)).toBe(true);
  });

  it("leaves no file when the encoder cannot write the format", async () => {
    const outputPath = path.join(dir, "story.mp3");
    const { err, io } = capture();
    const code = await runCli([inputPath, "-m", modelPath, "-c", configPath, "-o", outputPath], { config, io });
    expect(code).toBe(1);
    expect(err).toEqual(["error: Stub encoder cannot write mp3; use ENCODER_PROVIDER=ffmpeg"]);
    expect(fs.existsSync(outputPath)).toBe(false);
  });

  it("lists emotions and pauses", async () => {
    const { out, io } = capture();
    const code = await runCli(["--list-emotions", "-c", configPath], { config, io });
    expect(code).toBe(0);
    expect(out).toEqual([
      "Emotions:",
      "  tense: length_scale=0.9 noise_scale=0.6 noise_w=0.5  Tight",
      "Pauses:",
      "  long: 1000 ms",
    ]);
  });

  it("lists the bundled config by default", async () => {
    const { out, io } = capture();
    expect(await runCli(["--list-emotions"], { config, io })).toBe(0);
    expect(out[0]).toBe("Emotions:");
    expect(out).toContain("  medium: 500 ms");
  });

  it("prints usage for --help", async () => {
    const { out, io } = capture();
    expect(await runCli(["--help"], { config, io })).toBe(0);
    expect(out).toHaveLength(1);
    expect(out[0].startsWith("Usage: narrator <input.json> -m <model.onnx>")).toBe(true);
  });

  it("stops with an error when cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const outputPath = path.join(dir, "story.wav");
    const { err, io } = capture();
    const code = await runCli([inputPath, "-m", modelPath, "-c", configPath, "-o", outputPath, "-f", "wav"], {
      config,
      io,
      signal: controller.signal,
    });
    expect(code).toBe(1);
    expect(err).toEqual(["error: Narration cancelled"]);
    expect(fs.existsSync(outputPath)).toBe(false);
  });
});
