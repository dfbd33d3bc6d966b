/**
 * Script parser: JSON document -> ordered segments.
 * Document shape: { "segments": [{ "text", "emotion"?, "pause_after"? }, ...] }
 */

import * as fs from "fs";
import { z } from "zod";
import { InputError, errorMessage } from "../errors";
import { DEFAULT_EMOTION, DEFAULT_PAUSE_NAME, type Segment } from "./types";

const segmentSchema = z.object({
  text: z.string().nullish(),
  emotion: z.string().nullish(),
  pause_after: z.string().nullish(),
});

const scriptSchema = z.object({
  segments: z.array(segmentSchema).nullish(),
});

/**
 * Decode a script document. Missing `segments` yields an empty script.
 * Emotion and pause names pass through as written.
 */
export function parseScript(document: unknown): Segment[] {
  const parsed = scriptSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new InputError(`Invalid script at ${where}: ${issue?.message ?? "unrecognized document"}`, {
      cause: parsed.error,
    });
  }
  return (parsed.data.segments ?? []).map((seg) =>
    Object.freeze({
      text: seg.text ?? "",
      emotion: seg.emotion ?? DEFAULT_EMOTION,
      pauseAfter: seg.pause_after ?? DEFAULT_PAUSE_NAME,
    })
  );
}

export async function parseScriptFile(filePath: string): Promise<Segment[]> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf8");
  } catch (e) {
    throw new InputError(`Cannot read script ${filePath}: ${errorMessage(e)}`, { cause: e });
  }
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (e) {
    throw new InputError(`Script ${filePath} is not valid JSON: ${errorMessage(e)}`, { cause: e });
  }
  return parseScript(doc);
}

/** Distinct emotion names in first-use order. */
export function emotionsUsed(segments: readonly Segment[]): string[] {
  return [...new Set(segments.map((s) => s.emotion))];
}
