/**
 * CLI runner: validates inputs up front, then runs the narration pipeline.
 * Returns the process exit code (0 ok, 1 any failure) instead of exiting, so it can be tested.
 */

import * as fs from "fs";
import { loadConfig, type AppConfig } from "../config";
import { createSynthesizer } from "../adapters/tts";
import { createEncoder } from "../adapters/encoder";
import { EmotionMappingStore } from "../emotion/store";
import { ExportError, InputError, errorMessage } from "../errors";
import { logger, logError } from "../logging";
import { Exporter } from "../pipeline/exporter";
import { Narrator } from "../pipeline/narrator";
import { emotionsUsed, parseScriptFile } from "../script/parser";
import { USAGE, parseCliArgs, type NarrateCommand } from "./args";

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliDeps {
  config?: AppConfig;
  io?: CliIO;
  /** Fires on SIGINT in main.ts. */
  signal?: AbortSignal;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const PREVIEW_CHARS = 50;

function preview(text: string): string {
  return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS)}...` : text;
}

async function requireFile(filePath: string, label: string): Promise<void> {
  try {
    const stat = await fs.promises.stat(filePath);
    if (!stat.isFile()) throw new InputError(`${label} is not a file: ${filePath}`);
  } catch (e) {
    if (e instanceof InputError) throw e;
    throw new InputError(`${label} not found: ${filePath}`, { cause: e });
  }
}

async function listEmotions(configPath: string, io: CliIO): Promise<void> {
  await requireFile(configPath, "Config file");
  const store = await EmotionMappingStore.load(configPath);
  io.out("Emotions:");
  for (const [name, p] of store.listProfiles()) {
    const desc = p.description ? `  ${p.description}` : "";
    io.out(`  ${name}: length_scale=${p.lengthScale} noise_scale=${p.noiseScale} noise_w=${p.noiseW}${desc}`);
  }
  io.out("Pauses:");
  for (const [name, ms] of store.listPauses()) {
    io.out(`  ${name}: ${ms} ms`);
  }
}

async function narrate(cmd: NarrateCommand, config: AppConfig, io: CliIO, signal?: AbortSignal): Promise<void> {
  // Every file is checked before the model is touched.
  await requireFile(cmd.inputPath, "Input file");
  await requireFile(cmd.modelPath, "Piper model");
  await requireFile(cmd.configPath, "Config file");

  io.out("Narrator");
  io.out(`   Input: ${cmd.inputPath}`);
  io.out(`   Model: ${cmd.modelPath}`);
  io.out(`   Output: ${cmd.outputPath} (${cmd.format}${cmd.normalize ? ", normalized" : ""})`);
  io.out("");

  io.out("Loading emotion config...");
  const store = await EmotionMappingStore.load(cmd.configPath);

  io.out("Parsing input...");
  const segments = await parseScriptFile(cmd.inputPath);
  io.out(`   Found ${segments.length} segments`);
  if (segments.length > 0) io.out(`   Emotions: ${emotionsUsed(segments).join(", ")}`);

  io.out("Loading voice model...");
  const synthesizer = await createSynthesizer(config, cmd.modelPath);
  const exporter = new Exporter(createEncoder(config));

  io.out("Generating audio segments...");
  const narrator = new Narrator(store, synthesizer, exporter, { onSynthesisError: cmd.onSynthesisError }, {
    onSegmentStart: ({ index, total, segment }) =>
      io.out(`   [${index + 1}/${total}] ${segment.emotion}: '${preview(segment.text)}'`),
    onSegmentSkipped: ({ index, error }) => io.err(`   skipped segment ${index + 1}: ${error.message}`),
    onExportStart: ({ outputPath }) => io.out(`Exporting to ${outputPath}...`),
  });

  const result = await narrator.narrate(
    segments,
    cmd.outputPath,
    { format: cmd.format, normalize: cmd.normalize, ...cmd.loudness },
    signal
  );
  io.out("");
  io.out(`Done! ${(result.durationMs / 1000).toFixed(1)}s of audio saved to: ${result.outputPath}`);
  if (result.skipped.length > 0) {
    io.out(`   ${result.skipped.length} segment(s) replaced with silence: ${result.skipped.map((i) => i + 1).join(", ")}`);
  }
}

export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIO;
  try {
    const config = deps.config ?? loadConfig();
    const cmd = parseCliArgs(argv, config);
    if (cmd.command === "help") {
      io.out(USAGE);
    } else if (cmd.command === "list-emotions") {
      await listEmotions(cmd.configPath, io);
    } else {
      await narrate(cmd, config, io, deps.signal);
    }
    return 0;
  } catch (e) {
    const err = e instanceof Error ? e : new Error(errorMessage(e));
    logError(logger, err);
    io.err(`error: ${err.message}`);
    if (err instanceof ExportError && err.diagnostics) io.err(err.diagnostics);
    return 1;
  }
}
