/**
 * Error taxonomy for the narration pipeline.
 * Each stage wraps collaborator failures into its own class so the CLI can report one message.
 */

export type NarratorErrorCode =
  | "CONFIG_ERROR"
  | "INPUT_ERROR"
  | "SYNTHESIS_ERROR"
  | "ASSEMBLY_ERROR"
  | "EXPORT_ERROR"
  | "CANCELLED";

export class NarratorError extends Error {
  constructor(
    readonly code: NarratorErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Emotion config is unreadable or structurally invalid. */
export class ConfigError extends NarratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_ERROR", message, options);
  }
}

/** Script or a required file is missing/malformed. Raised before any synthesis starts. */
export class InputError extends NarratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INPUT_ERROR", message, options);
  }
}

export class SynthesisError extends NarratorError {
  /** Zero-based segment index, when the failure belongs to one segment. */
  readonly segmentIndex?: number;

  constructor(message: string, options?: { cause?: unknown; segmentIndex?: number }) {
    super("SYNTHESIS_ERROR", message, options);
    this.segmentIndex = options?.segmentIndex;
  }
}

/** Clips cannot be joined (format mismatch, torn samples, bad pause). */
export class AssemblyError extends NarratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ASSEMBLY_ERROR", message, options);
  }
}

export class ExportError extends NarratorError {
  /** Diagnostic output of the external encoder (ffmpeg stderr), if any. */
  readonly diagnostics?: string;

  constructor(message: string, options?: { cause?: unknown; diagnostics?: string }) {
    super("EXPORT_ERROR", message, options);
    this.diagnostics = options?.diagnostics;
  }
}

export class CancelledError extends NarratorError {
  constructor(message = "Narration cancelled") {
    super("CANCELLED", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Throw CancelledError if the signal has fired. */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CancelledError();
}
