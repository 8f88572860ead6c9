/**
 * Converts the shared user speed scale into each provider's native speed value and back.
 */
import {
  SPEED_PROFILES,
  USER_SPEED_DEFAULT,
  USER_SPEED_MAX,
  USER_SPEED_MIN,
  type SpeedProfile,
} from "../config/speed.js";
import { log } from "../logger.js";
import type { TtsProvider } from "../types/provider.js";

export type SpeedClampWarning = {
  provider: TtsProvider;
  requested: number;
  applied: number;
  scale: "user" | "native";
};

export type SpeedConversionOptions = {
  onClamp?: (warning: SpeedClampWarning) => void;
};

const DISPLAY_PRECISION = 10_000;

/** Maps a user speed (0.7-1.2) onto the provider's native parameter, clamping out-of-range input. */
export function toProviderSpeed(
  userSpeed: number,
  provider: TtsProvider,
  options: SpeedConversionOptions = {}
): number {
  const onClamp = options.onClamp ?? warnOnClamp;
  const profile = SPEED_PROFILES[provider];

  const finite = Number.isFinite(userSpeed) ? userSpeed : USER_SPEED_DEFAULT;
  const userValue = clamp(finite, USER_SPEED_MIN, USER_SPEED_MAX);
  if (userValue !== userSpeed) {
    onClamp({ provider, requested: userSpeed, applied: userValue, scale: "user" });
  }

  const raw = applyProfile(userValue, profile);
  const native = clamp(raw, profile.min, profile.max);
  if (native !== raw) {
    onClamp({ provider, requested: raw, applied: native, scale: "native" });
  }

  return native;
}

/** Exact inverse of toProviderSpeed inside the native range, expressed on the user scale. */
export function toDisplaySpeed(nativeSpeed: number, provider: TtsProvider): number {
  const profile = SPEED_PROFILES[provider];
  return profile.mode === "identity"
    ? nativeSpeed
    : nativeSpeed / profile.scaleFactor + 1;
}

/** Rounds a display speed for reporting; never feed the result back into toProviderSpeed. */
export function roundDisplaySpeed(displaySpeed: number): number {
  return Math.round(displaySpeed * DISPLAY_PRECISION) / DISPLAY_PRECISION;
}

/** Native values reachable from the user scale; the round-trip law holds inside this range. */
export function nativeSpeedRange(provider: TtsProvider): { min: number; max: number } {
  const profile = SPEED_PROFILES[provider];
  return {
    min: clamp(applyProfile(USER_SPEED_MIN, profile), profile.min, profile.max),
    max: clamp(applyProfile(USER_SPEED_MAX, profile), profile.min, profile.max),
  };
}

/** Two-decimal label used in output file names, e.g. "1.05". */
export function formatSpeedLabel(displaySpeed: number): string {
  return displaySpeed.toFixed(2);
}

function applyProfile(userValue: number, profile: SpeedProfile): number {
  return profile.mode === "identity"
    ? userValue
    : (userValue - 1) * profile.scaleFactor;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function warnOnClamp(warning: SpeedClampWarning): void {
  log.warn(warning, "Speed out of range; clamped");
}
