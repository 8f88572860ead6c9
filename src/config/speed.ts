import type { TtsProvider } from "../types/provider.js";

/** Shared user-facing speed scale; every provider is labelled on this scale. */
export const USER_SPEED_MIN = 0.7;
export const USER_SPEED_DEFAULT = 1.0;
export const USER_SPEED_MAX = 1.2;

export type SpeedProfile =
  | { mode: "identity"; min: number; max: number }
  | { mode: "signed"; scaleFactor: number; min: number; max: number };

// ElevenLabs takes the 0.7-1.2 multiplier as-is; Cartesia's experimental
// speed control is centred on zero (-1 slow, 0 normal, 1 fast).
export const SPEED_PROFILES: Record<TtsProvider, SpeedProfile> = {
  elevenlabs: { mode: "identity", min: USER_SPEED_MIN, max: USER_SPEED_MAX },
  cartesia: { mode: "signed", scaleFactor: 2, min: -1, max: 1 },
};
