/** Barrel export for TTS provider adapters. */
import type { Env } from "../../config/env.js";
import type { ProviderAdapter, TtsProvider } from "../../types/provider.js";
import { createCartesiaAdapter } from "./cartesia.js";
import { createElevenLabsAdapter } from "./elevenlabs.js";

export { createCartesiaAdapter } from "./cartesia.js";
export { createElevenLabsAdapter } from "./elevenlabs.js";
export {
  DEFAULT_RETRY_POLICY,
  synthesizeWithRetry,
  type RetryPolicy,
  type SynthesizeOptions,
} from "./synthesize.js";

/** Builds the adapter for a provider using the API keys from the environment. */
export function createProviderAdapter(
  provider: TtsProvider,
  settings: Pick<Env, "elevenLabsApiKey" | "cartesiaApiKey">
): ProviderAdapter {
  switch (provider) {
    case "elevenlabs":
      return createElevenLabsAdapter({ apiKey: settings.elevenLabsApiKey });
    case "cartesia":
      return createCartesiaAdapter({ apiKey: settings.cartesiaApiKey });
  }
}
