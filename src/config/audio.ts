import { env, type Env } from "./env.js";
import type { FadeCurve } from "../services/audio/pcm.js";
import type { QualityTier } from "../types/audio.js";

export type TierProfile = {
  /** Output rate; undefined keeps the assembled rate. */
  sampleRate?: number;
  /** Output channel count; undefined keeps the assembled layout. */
  channels?: number;
  wavBitsPerSample: 16 | 32;
  mp3Bitrate: string;
};

export const TIER_PROFILES: Record<QualityTier, TierProfile> = {
  production: { wavBitsPerSample: 32, mp3Bitrate: "192k" },
  prototype: { sampleRate: 22050, channels: 1, wavBitsPerSample: 16, mp3Bitrate: "64k" },
};

export type AssemblyAudioConfig = {
  crossfadeMs: number;
  curve: FadeCurve;
};

let cachedConfig: AssemblyAudioConfig | undefined;

export function buildAssemblyAudioConfig(
  settings: Pick<Env, "crossfadeMs" | "crossfadeCurve">
): AssemblyAudioConfig {
  const { crossfadeMs } = settings;
  return {
    crossfadeMs: Number.isFinite(crossfadeMs) && crossfadeMs >= 0 ? crossfadeMs : 10,
    curve: settings.crossfadeCurve,
  };
}

export function getAssemblyAudioConfig(): AssemblyAudioConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = buildAssemblyAudioConfig(env);
  return cachedConfig;
}
