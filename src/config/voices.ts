import fs from "node:fs";

import { z } from "zod";

import { env } from "./env.js";
import { ConfigurationError } from "../errors.js";
import type { TtsProvider } from "../types/provider.js";
import type { Speaker, SpeakerSpeeds } from "../types/script.js";

const speakerVoicesSchema = z.object({
  A: z.string().min(1),
  B: z.string().min(1),
});

const languageSchema = z.object({
  name: z.string(),
  defaultSpeed: z.number().positive().default(1),
  voices: z.object({
    elevenlabs: speakerVoicesSchema.optional(),
    cartesia: speakerVoicesSchema.optional(),
  }),
});

const voiceTableSchema = z.object({
  speedAdjustments: z
    .object({ A: z.number().positive(), B: z.number().positive() })
    .default({ A: 1, B: 1 }),
  languages: z.record(languageSchema),
});

export type VoiceTable = z.infer<typeof voiceTableSchema>;

let cachedTable: VoiceTable | undefined;

/** Parses a voice table from any JSON-shaped value. */
export function parseVoiceTable(raw: unknown, source = "voice table"): VoiceTable {
  const parsed = voiceTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${source}: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function loadVoiceTable(filePath: string): VoiceTable {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new ConfigurationError(
      `Unable to read voices config at ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseVoiceTable(raw, `voices config at ${filePath}`);
}

export function getVoiceTable(): VoiceTable {
  if (cachedTable) {
    return cachedTable;
  }
  cachedTable = loadVoiceTable(env.voicesConfigPath);
  return cachedTable;
}

/** Looks up the voice for one speaker; a missing entry is a configuration error. */
export function resolveVoiceId(
  table: VoiceTable,
  provider: TtsProvider,
  language: string,
  speaker: Speaker
): string {
  const languageEntry = table.languages[language];
  if (!languageEntry) {
    throw new ConfigurationError(`No voices configured for language "${language}"`);
  }
  const voiceId = languageEntry.voices[provider]?.[speaker];
  if (!voiceId) {
    throw new ConfigurationError(
      `No ${provider} voice configured for speaker ${speaker} in "${language}"`
    );
  }
  return voiceId;
}

/** Base speed scaled by each speaker's configured adjustment. */
export function speakerSpeeds(table: VoiceTable, baseSpeed: number | SpeakerSpeeds): SpeakerSpeeds {
  const base: SpeakerSpeeds =
    typeof baseSpeed === "number" ? { A: baseSpeed, B: baseSpeed } : baseSpeed;
  return {
    A: base.A * table.speedAdjustments.A,
    B: base.B * table.speedAdjustments.B,
  };
}

export function defaultSpeedFor(table: VoiceTable, language: string): number {
  return table.languages[language]?.defaultSpeed ?? 1;
}
