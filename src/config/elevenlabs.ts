import { env, type Env } from "./env.js";

export type ElevenLabsPcmFormat = "pcm_22050" | "pcm_24000" | "pcm_44100";

export type ElevenLabsAudioConfig = {
  modelId: string;
  outputFormat: ElevenLabsPcmFormat;
  sampleRate: number;
  requestTimeoutSeconds: number;
  /** Longest text sent in one request; longer turns are split at sentence breaks. */
  maxRequestChars: number;
};

let cachedAudioConfig: ElevenLabsAudioConfig | undefined;

// eleven_v3 understands inline audio tags such as [excited] and [interrupting].
const DEFAULT_MODEL_ID = "eleven_v3";
const DEFAULT_OUTPUT_FORMAT: ElevenLabsPcmFormat = "pcm_44100";
const REQUEST_TIMEOUT_SECONDS = 120;
const MAX_REQUEST_CHARS = 4500;

export function buildElevenLabsAudioConfig(
  settings: Pick<Env, "elevenLabsModelId">
): ElevenLabsAudioConfig {
  return {
    modelId: settings.elevenLabsModelId ?? DEFAULT_MODEL_ID,
    outputFormat: DEFAULT_OUTPUT_FORMAT,
    sampleRate: 44100,
    requestTimeoutSeconds: REQUEST_TIMEOUT_SECONDS,
    maxRequestChars: MAX_REQUEST_CHARS,
  };
}

/** Returns the cached ElevenLabs configuration derived from the environment. */
export function getElevenLabsAudioConfig(): ElevenLabsAudioConfig {
  if (!cachedAudioConfig) {
    cachedAudioConfig = buildElevenLabsAudioConfig(env);
  }
  return cachedAudioConfig;
}
