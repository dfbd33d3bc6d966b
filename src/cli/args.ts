/**
 * Command-line argument parsing.
 * Flags override the env-based config; numeric flags take `--flag=value` for negatives.
 */

import { parseArgs } from "util";
import type { AppConfig, LoudnessTarget, SynthesisErrorPolicy } from "../config";
import { OUTPUT_FORMATS, isOutputFormat, type OutputFormat } from "../adapters/encoder/types";
import { InputError, errorMessage } from "../errors";

export const USAGE = `Usage: narrator <input.json> -m <model.onnx> [options]

Turn a JSON script of emotion-tagged segments into one narrated audio file.

Options:
  -m, --model <path>       Piper voice model (.onnx), required
  -o, --output <path>      Output audio file (default: output.mp3)
  -c, --config <path>      Emotion config JSON (default: bundled config/emotions.json)
  -f, --format <fmt>       Output format: ${OUTPUT_FORMATS.join(" | ")} (default: mp3)
      --no-normalize       Skip loudness normalization
      --target-lufs=<n>    Integrated loudness target (default: -16)
      --true-peak=<n>      True peak ceiling in dBTP (default: -1.5)
      --lra=<n>            Loudness range in LU (default: 11)
      --skip-failed        Replace segments that fail to synthesize with silence
      --list-emotions      Print the emotions and pauses in the config, then exit
  -h, --help               Show this help`;

export interface NarrateCommand {
  command: "narrate";
  inputPath: string;
  modelPath: string;
  outputPath: string;
  configPath: string;
  format: OutputFormat;
  normalize: boolean;
  loudness: LoudnessTarget;
  onSynthesisError: SynthesisErrorPolicy;
}

export type CliCommand =
  | { command: "help" }
  | { command: "list-emotions"; configPath: string }
  | NarrateCommand;

function parseNumberFlag(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new InputError(`--${name} expects a number, got '${value}'`);
  }
  return n;
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        model: { type: "string", short: "m" },
        output: { type: "string", short: "o" },
        config: { type: "string", short: "c" },
        format: { type: "string", short: "f" },
        "no-normalize": { type: "boolean" },
        "target-lufs": { type: "string" },
        "true-peak": { type: "string" },
        lra: { type: "string" },
        "skip-failed": { type: "boolean" },
        "list-emotions": { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (e) {
    throw new InputError(errorMessage(e), { cause: e });
  }
}

export function parseCliArgs(argv: readonly string[], config: AppConfig): CliCommand {
  const { values, positionals } = readArgs(argv);

  if (values.help) return { command: "help" };
  const configPath = values.config ?? config.narration.emotionsConfigPath;
  if (values["list-emotions"]) return { command: "list-emotions", configPath };

  if (positionals.length === 0) throw new InputError("Missing input script path");
  if (positionals.length > 1) throw new InputError(`Unexpected arguments: ${positionals.slice(1).join(" ")}`);
  if (!values.model) throw new InputError("Missing required option --model");

  const format = values.format ?? "mp3";
  if (!isOutputFormat(format)) {
    throw new InputError(`Unsupported format '${format}'; choose one of ${OUTPUT_FORMATS.join(", ")}`);
  }

  const defaults = config.narration.loudness;
  return {
    command: "narrate",
    inputPath: positionals[0],
    modelPath: values.model,
    outputPath: values.output ?? "output.mp3",
    configPath,
    format,
    normalize: !values["no-normalize"],
    loudness: {
      targetLufs: parseNumberFlag("target-lufs", values["target-lufs"], defaults.targetLufs),
      truePeakDb: parseNumberFlag("true-peak", values["true-peak"], defaults.truePeakDb),
      loudnessRangeLu: parseNumberFlag("lra", values.lra, defaults.loudnessRangeLu),
    },
    onSynthesisError: values["skip-failed"] ? "skip" : config.narration.onSynthesisError,
  };
}
