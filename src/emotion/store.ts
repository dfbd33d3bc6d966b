/**
 * Emotion mapping store: emotion name -> synthesis profile, pause name -> milliseconds.
 * Lookups are total: unknown names resolve to the built-in defaults.
 */

import * as fs from "fs";
import { z } from "zod";
import { ConfigError, errorMessage } from "../errors";
import { logger } from "../logging";
import {
  DEFAULT_PAUSE_MS,
  DEFAULT_PAUSES,
  DEFAULT_PROFILE,
  type EmotionProfile,
  type PauseTable,
} from "./types";

// Ranges are not checked: keeping values synthesis-safe is up to whoever writes the config.
const emotionEntrySchema = z.object({
  length_scale: z.number().optional(),
  noise_scale: z.number().optional(),
  noise_w: z.number().optional(),
  description: z.string().optional(),
});

const emotionConfigSchema = z.object({
  emotions: z.record(emotionEntrySchema).optional(),
  pauses: z.record(z.number().int().nonnegative()).optional(),
});

export type EmotionConfigDocument = z.infer<typeof emotionConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export class EmotionMappingStore {
  private constructor(
    private readonly profiles: ReadonlyMap<string, EmotionProfile>,
    private readonly pauses: PauseTable
  ) {}

  /** Build from an already-decoded JSON document. */
  static fromDocument(doc: unknown): EmotionMappingStore {
    const parsed = emotionConfigSchema.safeParse(doc);
    if (!parsed.success) {
      throw new ConfigError(`Invalid emotion config: ${formatIssues(parsed.error)}`, { cause: parsed.error });
    }

    const profiles = new Map<string, EmotionProfile>();
    for (const [name, entry] of Object.entries(parsed.data.emotions ?? {})) {
      profiles.set(
        name,
        Object.freeze({
          lengthScale: entry.length_scale ?? DEFAULT_PROFILE.lengthScale,
          noiseScale: entry.noise_scale ?? DEFAULT_PROFILE.noiseScale,
          noiseW: entry.noise_w ?? DEFAULT_PROFILE.noiseW,
          description: entry.description ?? DEFAULT_PROFILE.description,
        })
      );
    }
    // An explicit empty `pauses` object means "no named pauses", not "use the defaults".
    const pauses = new Map(Object.entries(parsed.data.pauses ?? DEFAULT_PAUSES));
    return new EmotionMappingStore(profiles, pauses);
  }

  /** Read and decode a JSON config file. */
  static async load(configPath: string): Promise<EmotionMappingStore> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(configPath, "utf8");
    } catch (e) {
      throw new ConfigError(`Cannot read emotion config ${configPath}: ${errorMessage(e)}`, { cause: e });
    }
    let doc: unknown;
    try {
      doc = JSON.parse(raw);
    } catch (e) {
      throw new ConfigError(`Emotion config ${configPath} is not valid JSON: ${errorMessage(e)}`, { cause: e });
    }
    const store = EmotionMappingStore.fromDocument(doc);
    logger.debug(
      { event: "EMOTION_CONFIG_LOADED", configPath, emotions: store.profiles.size, pauses: store.pauses.size },
      "Emotion config loaded"
    );
    return store;
  }

  resolveProfile(name: string): EmotionProfile {
    return this.profiles.get(name) ?? DEFAULT_PROFILE;
  }

  resolvePauseMs(name: string): number {
    return this.pauses.get(name) ?? DEFAULT_PAUSE_MS;
  }

  hasEmotion(name: string): boolean {
    return this.profiles.has(name);
  }

  /** Emotion names in config order. */
  listEmotions(): string[] {
    return [...this.profiles.keys()];
  }

  listProfiles(): Array<[string, EmotionProfile]> {
    return [...this.profiles.entries()];
  }

  listPauses(): Array<[string, number]> {
    return [...this.pauses.entries()];
  }
}
