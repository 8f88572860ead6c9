import path from "node:path";

import { config as loadEnv } from "dotenv";

import type { OutputFormat } from "../types/audio.js";
import type { TtsProvider } from "../types/provider.js";

loadEnv();

const projectRoot = path.resolve(__dirname, "../..");

type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

function parseProvider(value: string | undefined): TtsProvider {
  return value === "elevenlabs" ? "elevenlabs" : "cartesia";
}

function parseCrossfadeCurve(value: string | undefined): "linear" | "equal-power" {
  return value === "equal-power" ? "equal-power" : "linear";
}

function parseOutputFormat(value: string | undefined): OutputFormat {
  return value === "mp3" ? "mp3" : "wav";
}

export const env = {
  port: Number.parseInt(process.env.PORT ?? "3000", 10),
  host: process.env.HOST ?? "0.0.0.0",
  serverApiKey: process.env.SERVER_API_KEY ?? "",
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  ttsProvider: parseProvider(process.env.TTS_PROVIDER),
  elevenLabsApiKey: process.env.ELEVENLABS_API_KEY ?? "",
  cartesiaApiKey: process.env.CARTESIA_API_KEY ?? "",
  outputDir:
    process.env.PODCAST_OUTPUT_DIR ?? path.resolve(projectRoot, "data/audio"),
  voicesConfigPath:
    process.env.VOICES_CONFIG_PATH ??
    path.resolve(projectRoot, "config/voices.json"),
  synthesisConcurrency: Number.parseInt(
    process.env.SYNTHESIS_CONCURRENCY ?? "4",
    10
  ),
  crossfadeMs: Number.parseFloat(process.env.CROSSFADE_MS ?? "10"),
  crossfadeCurve: parseCrossfadeCurve(process.env.CROSSFADE_CURVE),
  elevenLabsModelId: process.env.ELEVENLABS_MODEL_ID || undefined,
  cartesiaModelId: process.env.CARTESIA_MODEL_ID || undefined,
  cartesiaBaseUrl: process.env.CARTESIA_BASE_URL || undefined,
  outputFormat: parseOutputFormat(process.env.OUTPUT_FORMAT),
  emotionTablePath: path.resolve(projectRoot, "data/emotion-tags.json"),
};

export type Env = typeof env;
