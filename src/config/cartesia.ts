import { env, type Env } from "./env.js";

export type CartesiaAudioConfig = {
  baseUrl: string;
  apiVersion: string;
  modelId: string;
  outputFormat: {
    container: "raw";
    encoding: "pcm_f32le";
    sample_rate: number;
  };
  requestTimeoutMs: number;
};

let cachedAudioConfig: CartesiaAudioConfig | undefined;

const DEFAULT_BASE_URL = "https://api.cartesia.ai";
const API_VERSION = "2024-06-10";
// Experimental speed/emotion controls are honoured by the sonic-english model.
const DEFAULT_MODEL_ID = "sonic-english";
const REQUEST_TIMEOUT_MS = 30_000;

export function buildCartesiaAudioConfig(
  settings: Pick<Env, "cartesiaBaseUrl" | "cartesiaModelId">
): CartesiaAudioConfig {
  return {
    baseUrl: settings.cartesiaBaseUrl ?? DEFAULT_BASE_URL,
    apiVersion: API_VERSION,
    modelId: settings.cartesiaModelId ?? DEFAULT_MODEL_ID,
    outputFormat: {
      container: "raw",
      encoding: "pcm_f32le",
      sample_rate: 44100,
    },
    requestTimeoutMs: REQUEST_TIMEOUT_MS,
  };
}

/** Returns the cached Cartesia configuration derived from the environment. */
export function getCartesiaAudioConfig(): CartesiaAudioConfig {
  if (!cachedAudioConfig) {
    cachedAudioConfig = buildCartesiaAudioConfig(env);
  }
  return cachedAudioConfig;
}
