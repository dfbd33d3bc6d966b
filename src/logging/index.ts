/**
 * Structured logging for the narration pipeline.
 * Logs synthesis, assembly, export events and errors with timestamps. Written to stderr so
 * stdout stays free for CLI progress.
 *
 * Env:
 *   LOG_LEVEL  - debug | info | warn | error | silent (default: info, silent under Jest)
 *   LOG_FILE   - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
  /** Append logs to this file in addition to stderr. */
  file?: string;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const v = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === v) ?? fallback;
}

const isTest = process.env.NODE_ENV === "test";

const defaultConfig: LoggerConfig = {
  level: parseLogLevel(process.env.LOG_LEVEL, isTest ? "silent" : "info"),
  pretty: process.env.NODE_ENV !== "production" && !isTest,
  file: process.env.LOG_FILE?.trim() || undefined,
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = config.file ?? defaultConfig.file;

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true, destination: 2 } }),
    });
  } else {
    streams.push({ stream: pino.destination(2) });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Log one synthesized segment (text length only; scripts may be unpublished work). */
export function logSynthesis(
  log: pino.Logger,
  segmentIndex: number,
  emotion: string,
  textLength: number,
  audioBytes: number,
  durationMs?: number
): void {
  log.debug({ event: "SYNTHESIS", segmentIndex, emotion, textLength, audioBytes, durationMs }, "Segment synthesized");
}

export function logAssembly(log: pino.Logger, clipCount: number, silenceCount: number, durationMs: number): void {
  log.info({ event: "ASSEMBLY", clipCount, silenceCount, durationMs }, "Track assembled");
}

export function logExport(
  log: pino.Logger,
  outputPath: string,
  format: string,
  normalize: boolean,
  bytes: number,
  durationMs?: number
): void {
  log.info({ event: "EXPORT", outputPath, format, normalize, bytes, durationMs }, "Track exported");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, name: err.name, stack: err.stack, ...context }, "Error");
}
