/**
 * - assembleAudio: validates chunk order, decodes, reconciles formats, crossfades and encodes.
 * - orderChunks: sorts by index and rejects gaps, duplicates and empty input.
 * - applyTierProfile: reduces the finished mix for the prototype tier.
 */
import type { Logger } from "pino";

import { TIER_PROFILES, getAssemblyAudioConfig } from "../../config/audio.js";
import { AssemblyError } from "../../errors.js";
import { log } from "../../logger.js";
import type {
  AssembledAudio,
  AudioChunk,
  OutputFormat,
  PcmAudio,
  QualityTier,
} from "../../types/audio.js";
import {
  decodeWithFfmpeg,
  encodeAudio,
  type AudioEncoder,
  type CompressedAudioDecoder,
} from "./encoder.js";
import {
  concatWithCrossfade,
  decodeRawPcm,
  frameCount,
  remix,
  resample,
  type FadeCurve,
} from "./pcm.js";

export type AssembleAudioOptions = {
  /** Number of segments the script produced; defaults to the chunk count. */
  expectedSegmentCount?: number;
  crossfadeMs?: number;
  curve?: FadeCurve;
  format?: OutputFormat;
  decoder?: CompressedAudioDecoder;
  encoder?: AudioEncoder;
  logger?: Logger;
};

/** Joins per-segment chunks into one encoded file. Input order does not matter. */
export async function assembleAudio(
  chunks: readonly AudioChunk[],
  qualityTier: QualityTier,
  options: AssembleAudioOptions = {}
): Promise<AssembledAudio> {
  const defaults = getAssemblyAudioConfig();
  const {
    expectedSegmentCount = chunks.length,
    crossfadeMs = defaults.crossfadeMs,
    curve = defaults.curve,
    format = "wav",
    decoder = decodeWithFfmpeg,
    encoder = encodeAudio,
    logger = log,
  } = options;

  const ordered = orderChunks(chunks, expectedSegmentCount);
  const decoded = await Promise.all(
    ordered.map((chunk) =>
      chunk.encoding === "mp3" ? decoder(chunk) : Promise.resolve(decodeRawPcm(chunk))
    )
  );

  const sampleRate = Math.max(...decoded.map((audio) => audio.sampleRate));
  const channels = Math.max(...decoded.map((audio) => audio.channels));
  const aligned = decoded.map((audio) => remix(resample(audio, sampleRate), channels));

  const fadeFrames = Math.round((Math.max(0, crossfadeMs) / 1000) * sampleRate);
  const mixed = concatWithCrossfade(aligned, fadeFrames, curve);
  const output = applyTierProfile(mixed, qualityTier);
  const buffer = await encoder(output, format, qualityTier);

  const durationSeconds = frameCount(output) / output.sampleRate;
  logger.debug(
    {
      segments: ordered.length,
      sampleRate: output.sampleRate,
      channels: output.channels,
      crossfadeMs,
      durationSeconds,
      qualityTier,
    },
    "Audio assembled"
  );

  return {
    buffer,
    byteSize: buffer.length,
    durationSeconds,
    sampleRate: output.sampleRate,
    channels: output.channels,
    format,
    qualityTier,
  };
}

export function orderChunks(
  chunks: readonly AudioChunk[],
  expectedSegmentCount: number
): AudioChunk[] {
  if (chunks.length === 0) {
    throw new AssemblyError("No audio chunks to assemble");
  }

  const sorted = [...chunks].sort((a, b) => a.segmentIndex - b.segmentIndex);
  sorted.forEach((chunk, position) => {
    if (chunk.segmentIndex === sorted[position - 1]?.segmentIndex) {
      throw new AssemblyError(`Duplicate audio for segment ${chunk.segmentIndex}`);
    }
    if (chunk.segmentIndex !== position) {
      throw new AssemblyError(`Missing audio for segment ${position}`);
    }
  });

  if (sorted.length !== expectedSegmentCount) {
    throw new AssemblyError(
      `Expected ${expectedSegmentCount} segments but received ${sorted.length}`
    );
  }
  return sorted;
}

/** Prototype output is downsampled after mixing; production is untouched. */
export function applyTierProfile(audio: PcmAudio, qualityTier: QualityTier): PcmAudio {
  const profile = TIER_PROFILES[qualityTier];
  const channels = profile.channels ?? audio.channels;
  const sampleRate = Math.min(profile.sampleRate ?? audio.sampleRate, audio.sampleRate);
  return resample(remix(audio, channels), sampleRate);
}
