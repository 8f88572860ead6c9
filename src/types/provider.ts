import type { AudioChunk } from "./audio.js";
import type { Segment } from "./script.js";

export type TtsProvider = "elevenlabs" | "cartesia";

export const TTS_PROVIDERS: readonly TtsProvider[] = ["elevenlabs", "cartesia"];

/** Four-letter tag embedded in output file names. */
export const PROVIDER_TAGS: Record<TtsProvider, string> = {
  elevenlabs: "11LB",
  cartesia: "CRTS",
};

export function isTtsProvider(value: unknown): value is TtsProvider {
  return value === "elevenlabs" || value === "cartesia";
}

export type ProviderCapabilities = {
  supportsQualityTiers: boolean;
  nativeSampleRate: number;
  supportsInterruptionMarkup: boolean;
};

export type ProviderRequest = {
  segment: Segment;
  /** Provider-native emotion labels. */
  resolvedTags: readonly string[];
  /** Provider-native speed value. */
  resolvedSpeed: number;
  voiceId: string;
  language: string;
};

export type ProviderAdapter = {
  readonly provider: TtsProvider;
  capabilities(): ProviderCapabilities;
  /** Units the provider bills for this request (characters sent). */
  billableUnits(request: ProviderRequest): number;
  synthesize(request: ProviderRequest, signal?: AbortSignal): Promise<AudioChunk>;
};
